/**
 * Report Module Public API
 *
 * Turns a performance summary into a written district report.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export type {
  ComponentDigest,
  DigestEntry,
  DetailedAnalysis,
  ReportFile,
  ReportFileNames,
  ReportLayout,
  GeneratedReport,
} from './core/types.js';

export { REPORT_LAYOUTS } from './core/types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Errors
// ─────────────────────────────────────────────────────────────────────────────

export type {
  ReportError,
  TextGenerationError,
  ReportStorageError,
  DistrictNotFoundError,
} from './core/errors.js';

export {
  createTextGenerationError,
  createReportStorageError,
  createDistrictNotFoundError,
  getHttpStatusForError as getReportHttpStatus,
} from './core/errors.js';

// ─────────────────────────────────────────────────────────────────────────────
// Ports
// ─────────────────────────────────────────────────────────────────────────────

export type { TextGenerator, TextGenerationRequest, ReportStore } from './core/ports.js';

// ─────────────────────────────────────────────────────────────────────────────
// Pure Logic
// ─────────────────────────────────────────────────────────────────────────────

export {
  buildComponentDigest,
  buildComponentDigests,
  rankByComponent,
  readIndicators,
} from './core/digest.js';
export { COMPONENT_TARGETS } from './core/targets.js';
export { buildComponentAnalysisPrompt, buildReportPrompt } from './core/prompts.js';
export { extractHtmlDocument, reportFileNames } from './core/html.js';

// ─────────────────────────────────────────────────────────────────────────────
// Use Cases
// ─────────────────────────────────────────────────────────────────────────────

export {
  generateDistrictReport,
  analysisUnavailable,
  ANALYSIS_MAX_TOKENS,
  type GenerateDistrictReportDeps,
  type GenerateDistrictReportInput,
} from './core/usecases/generate-district-report.js';

// ─────────────────────────────────────────────────────────────────────────────
// Shell
// ─────────────────────────────────────────────────────────────────────────────

export {
  makeOpenAITextGenerator,
  type OpenAITextGeneratorConfig,
  type ChatCompletionClient,
} from './shell/llm/openai-text-generator.js';
export { makeFsReportStore, type FsReportStoreConfig } from './shell/storage/fs-report-store.js';
export { makeReportRoutes, type MakeReportRoutesDeps } from './shell/rest/routes.js';
