/**
 * Port interfaces for Report module.
 */

import type { ReportStorageError, TextGenerationError } from './errors.js';
import type { ReportFile } from './types.js';
import type { Result } from 'neverthrow';

// ─────────────────────────────────────────────────────────────────────────────
// Text Generator
// ─────────────────────────────────────────────────────────────────────────────

export interface TextGenerationRequest {
  prompt: string;
  /** Upper bound on generated tokens; the adapter default applies when omitted */
  maxTokens?: number;
}

/**
 * Large language model behind the component analyses and the HTML report.
 */
export interface TextGenerator {
  generate(request: TextGenerationRequest): Promise<Result<string, TextGenerationError>>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Report Store
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Persists report artifacts.
 */
export interface ReportStore {
  /**
   * Writes a file, replacing any previous file of the same name.
   *
   * @returns Where the file was written
   */
  save(file: ReportFile): Promise<Result<string, ReportStorageError>>;
}
