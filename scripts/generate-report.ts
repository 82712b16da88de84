#!/usr/bin/env tsx

/**
 * District Report Script
 *
 * Builds the performance summary for a district and, unless told otherwise,
 * generates and stores the HTML report.
 *
 * Usage:
 *   tsx scripts/generate-report.ts 2025-03-19 ANUPPUR
 *   tsx scripts/generate-report.ts 2025-03-19 ANUPPUR --summary-only
 *   tsx scripts/generate-report.ts 2025-03-19 ANUPPUR --two-page
 *
 * Options:
 *   --summary-only: Print the performance summary as JSON and stop
 *   --two-page:     Generate the concise two to three page report
 */

import { createConfig, parseEnv } from '../src/infra/config/index.js';
import { createLogger } from '../src/infra/logger/index.js';
import {
  buildPerformanceSummary,
  makeNregsMetricSource,
} from '../src/modules/performance/index.js';
import {
  generateDistrictReport,
  makeFsReportStore,
  makeOpenAITextGenerator,
  type ReportLayout,
} from '../src/modules/report/index.js';

interface CLIOptions {
  date: string;
  district: string;
  summaryOnly: boolean;
  layout: ReportLayout;
}

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Parse command line arguments
 */
function parseArgs(argv: string[]): CLIOptions {
  const flags = argv.filter((arg) => arg.startsWith('--'));
  const [date, district] = argv.filter((arg) => !arg.startsWith('--'));

  if (date === undefined || district === undefined) {
    throw new Error('Usage: generate-report <date> <district> [--summary-only] [--two-page]');
  }
  if (!DATE_PATTERN.test(date)) {
    throw new Error(`Invalid date '${date}', expected YYYY-MM-DD`);
  }

  return {
    date,
    district,
    summaryOnly: flags.includes('--summary-only'),
    layout: flags.includes('--two-page') ? 'two-page' : 'comprehensive',
  };
}

/**
 * Main execution function
 */
async function main(): Promise<void> {
  const options = parseArgs(process.argv.slice(2));
  const config = createConfig(parseEnv(process.env));
  const logger = createLogger({ level: config.logger.level, pretty: config.logger.pretty });

  const metricSource = makeNregsMetricSource({
    baseUrl: config.metrics.baseUrl,
    apiKey: config.metrics.apiKey,
    timeoutMs: config.metrics.timeoutMs,
    logger,
  });
  const deps = { metricSource, logger, fetchConcurrency: config.metrics.fetchConcurrency };

  if (options.summaryOnly) {
    const result = await buildPerformanceSummary(deps, {
      date: options.date,
      district: options.district,
    });
    if (result.isErr()) {
      throw new Error(result.error.message);
    }
    console.log(JSON.stringify(result.value.summary, null, 2));
    return;
  }

  const apiKey = config.report.openaiApiKey;
  if (apiKey === undefined || apiKey === '') {
    throw new Error('OPENAI_API_KEY is required to generate a report');
  }

  const result = await generateDistrictReport(
    {
      ...deps,
      textGenerator: makeOpenAITextGenerator({
        apiKey,
        model: config.report.model,
        defaultMaxTokens: config.report.maxTokens,
        logger,
      }),
      reportStore: makeFsReportStore({ outputDir: config.report.outputDir, logger }),
      reportMaxTokens: config.report.maxTokens,
    },
    { date: options.date, district: options.district, layout: options.layout }
  );

  if (result.isErr()) {
    throw new Error(`${result.error.type}: ${result.error.message}`);
  }

  const report = result.value;
  console.log('District report generated');
  console.log(`- HTML: ${report.htmlLocation} (${String(report.characters)} characters)`);
  if (report.promptLocation !== null) {
    console.log(`- Prompt: ${report.promptLocation}`);
  }
  if (report.missingAnalyses.length > 0) {
    console.log(`- Missing analyses: ${report.missingAnalyses.join(', ')}`);
  }
}

main().catch((error: unknown) => {
  const msg = error instanceof Error ? error.message : String(error);
  console.error(`Error: ${msg}`);
  process.exit(1);
});
