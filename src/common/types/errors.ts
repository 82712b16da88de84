/**
 * Shared error helpers
 */

/**
 * Extracts a printable message from an unknown thrown value.
 */
export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
