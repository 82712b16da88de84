/**
 * Domain errors for Report module.
 *
 * All errors are discriminated unions with a 'type' field for easy matching.
 */

import type { StateDataUnavailableError } from '@/modules/performance/index.js';

// ─────────────────────────────────────────────────────────────────────────────
// Infrastructure Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * The text generator failed or returned nothing.
 */
export interface TextGenerationError {
  readonly type: 'TEXT_GENERATION';
  readonly message: string;
  readonly retryable: boolean;
  readonly cause?: unknown;
}

/**
 * A report file could not be written.
 */
export interface ReportStorageError {
  readonly type: 'REPORT_STORAGE';
  readonly fileName: string;
  readonly message: string;
  readonly cause?: unknown;
}

// ─────────────────────────────────────────────────────────────────────────────
// Domain Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * The requested district has no row in the state data for the date.
 */
export interface DistrictNotFoundError {
  readonly type: 'DISTRICT_NOT_FOUND';
  readonly district: string;
  readonly message: string;
}

/**
 * Union of all report errors.
 */
export type ReportError =
  | StateDataUnavailableError
  | DistrictNotFoundError
  | TextGenerationError
  | ReportStorageError;

// ─────────────────────────────────────────────────────────────────────────────
// Error Constructors
// ─────────────────────────────────────────────────────────────────────────────

export const createTextGenerationError = (
  message: string,
  retryable = false,
  cause?: unknown
): TextGenerationError => ({
  type: 'TEXT_GENERATION',
  message,
  retryable,
  ...(cause !== undefined && { cause }),
});

export const createReportStorageError = (
  fileName: string,
  message: string,
  cause?: unknown
): ReportStorageError => ({
  type: 'REPORT_STORAGE',
  fileName,
  message,
  ...(cause !== undefined && { cause }),
});

export const createDistrictNotFoundError = (
  district: string,
  date: string
): DistrictNotFoundError => ({
  type: 'DISTRICT_NOT_FOUND',
  district,
  message: `District '${district}' not found in state data for ${date}`,
});

// ─────────────────────────────────────────────────────────────────────────────
// HTTP Status Mapping
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Maps a report error to an HTTP status code.
 */
export const getHttpStatusForError = (error: ReportError): number => {
  switch (error.type) {
    case 'DISTRICT_NOT_FOUND':
      return 404;
    case 'STATE_DATA_UNAVAILABLE':
    case 'TEXT_GENERATION':
      return 502;
    case 'REPORT_STORAGE':
      return 500;
  }
};
