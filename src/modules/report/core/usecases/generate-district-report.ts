/**
 * Generate District Report Use Case
 *
 * 1. Builds the performance summary and hierarchy snapshot for the district
 * 2. Writes one analysis per score component (placeholder on failure)
 * 3. Assembles the report prompt for the requested layout and stores it
 * 4. Generates the HTML report and stores it
 */

import { err, ok, type Result } from 'neverthrow';

import {
  buildPerformanceSummary,
  type BuildPerformanceSummaryDeps,
  type ComponentKey,
} from '@/modules/performance/index.js';

import { buildComponentDigests } from '../digest.js';
import { createDistrictNotFoundError, type ReportError } from '../errors.js';
import { extractHtmlDocument, reportFileNames } from '../html.js';
import { buildComponentAnalysisPrompt, buildReportPrompt } from '../prompts.js';

import type { ReportStore, TextGenerator } from '../ports.js';
import type {
  ComponentDigest,
  DetailedAnalysis,
  GeneratedReport,
  ReportLayout,
} from '../types.js';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface GenerateDistrictReportDeps extends BuildPerformanceSummaryDeps {
  textGenerator: TextGenerator;
  reportStore: ReportStore;
  /** Token limit for the HTML report request */
  reportMaxTokens?: number;
}

export interface GenerateDistrictReportInput {
  /** Report date in YYYY-MM-DD format */
  date: string;
  district: string;
  /** Defaults to the comprehensive layout */
  layout?: ReportLayout;
}

/** Token limit for each component analysis */
export const ANALYSIS_MAX_TOKENS = 2000;

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Placeholder used when a component analysis could not be generated.
 */
export const analysisUnavailable = (label: string): string => `${label} analysis not available.`;

interface ComponentAnalyses {
  analyses: DetailedAnalysis;
  missing: ComponentKey[];
}

async function writeComponentAnalyses(
  textGenerator: TextGenerator,
  digests: readonly ComponentDigest[],
  context: { district: string; date: string },
  log: Logger
): Promise<ComponentAnalyses> {
  const analyses: DetailedAnalysis = {};
  const missing: ComponentKey[] = [];

  for (const digest of digests) {
    const result = await textGenerator.generate({
      prompt: buildComponentAnalysisPrompt(digest, context),
      maxTokens: ANALYSIS_MAX_TOKENS,
    });

    if (result.isErr() || result.value.trim() === '') {
      log.warn(
        { component: digest.key, error: result.isErr() ? result.error.message : 'empty response' },
        'Component analysis unavailable'
      );
      analyses[digest.key] = analysisUnavailable(digest.label);
      missing.push(digest.key);
      continue;
    }

    analyses[digest.key] = result.value.trim();
  }

  return { analyses, missing };
}

// ─────────────────────────────────────────────────────────────────────────────
// Implementation
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Generates and stores the HTML report for one district.
 */
export async function generateDistrictReport(
  deps: GenerateDistrictReportDeps,
  input: GenerateDistrictReportInput
): Promise<Result<GeneratedReport, ReportError>> {
  const { textGenerator, reportStore, reportMaxTokens } = deps;
  const { date, district, layout = 'comprehensive' } = input;
  const log = deps.logger.child({ usecase: 'generateDistrictReport', date, district, layout });

  const summaryResult = await buildPerformanceSummary(deps, { date, district });
  if (summaryResult.isErr()) {
    return err(summaryResult.error);
  }

  const { summary, snapshot } = summaryResult.value;
  if (summary.selectedDistrict === undefined) {
    return err(createDistrictNotFoundError(district, date));
  }

  const digests = buildComponentDigests(snapshot, district);
  log.info({ components: digests.length }, 'Generating component analyses');
  const { analyses, missing } = await writeComponentAnalyses(
    textGenerator,
    digests,
    { district, date },
    log
  );

  const prompt = buildReportPrompt({
    district,
    date,
    summary,
    analyses,
    targets: digests.map(({ label, target }) => ({ label, target })),
    layout,
  });

  const fileNames = reportFileNames(district, date, layout);
  const promptResult = await reportStore.save({ fileName: fileNames.prompt, content: prompt });
  if (promptResult.isErr()) {
    log.error({ error: promptResult.error.message }, 'Failed to save report prompt');
  }

  log.info('Generating HTML report');
  const generated = await textGenerator.generate({
    prompt,
    ...(reportMaxTokens !== undefined && { maxTokens: reportMaxTokens }),
  });
  if (generated.isErr()) {
    return err(generated.error);
  }

  const html = extractHtmlDocument(generated.value);
  const htmlResult = await reportStore.save({ fileName: fileNames.html, content: html });
  if (htmlResult.isErr()) {
    return err(htmlResult.error);
  }

  log.info(
    { location: htmlResult.value, characters: html.length, missingAnalyses: missing.length },
    'District report generated'
  );

  return ok({
    district,
    date,
    layout,
    htmlLocation: htmlResult.value,
    promptLocation: promptResult.isOk() ? promptResult.value : null,
    characters: html.length,
    missingAnalyses: missing,
  });
}
