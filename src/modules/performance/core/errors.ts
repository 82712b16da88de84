/**
 * Performance Module - Domain Errors
 *
 * Error types for metric fetching and hierarchy aggregation.
 */

/**
 * The dashboard answered with a non-success HTTP status.
 */
export interface HttpStatusError {
  readonly type: 'HTTP_STATUS';
  readonly endpoint: string;
  readonly statusCode: number;
  readonly message: string;
}

/**
 * The request never produced a response (DNS, connection, timeout).
 */
export interface NetworkError {
  readonly type: 'NETWORK';
  readonly endpoint: string;
  readonly message: string;
}

/**
 * The response body was not JSON or had no `results` array.
 */
export interface InvalidPayloadError {
  readonly type: 'INVALID_PAYLOAD';
  readonly endpoint: string;
  readonly message: string;
}

/**
 * Errors a metric source can report for a single endpoint.
 */
export type MetricFetchError = HttpStatusError | NetworkError | InvalidPayloadError;

/**
 * The state-level merge produced no districts; no summary can be built.
 */
export interface StateDataUnavailableError {
  readonly type: 'STATE_DATA_UNAVAILABLE';
  readonly date: string;
  readonly message: string;
}

/**
 * Errors of the aggregation use cases.
 */
export type PerformanceError = StateDataUnavailableError;

export const createHttpStatusError = (endpoint: string, statusCode: number): HttpStatusError => ({
  type: 'HTTP_STATUS',
  endpoint,
  statusCode,
  message: `${endpoint} responded with status ${String(statusCode)}`,
});

export const createNetworkError = (endpoint: string, message: string): NetworkError => ({
  type: 'NETWORK',
  endpoint,
  message,
});

export const createInvalidPayloadError = (
  endpoint: string,
  message: string
): InvalidPayloadError => ({
  type: 'INVALID_PAYLOAD',
  endpoint,
  message,
});

export const createStateDataUnavailableError = (date: string): StateDataUnavailableError => ({
  type: 'STATE_DATA_UNAVAILABLE',
  date,
  message: `No district data available for ${date}`,
});

/**
 * Maps a performance error to an HTTP status code.
 */
export const getHttpStatusForError = (error: PerformanceError): number => {
  switch (error.type) {
    case 'STATE_DATA_UNAVAILABLE':
      return 502;
  }
};
