/**
 * Load errors
 *
 * All errors are discriminated unions with a 'type' field for easy matching.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Error Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * The case feed could not be retrieved (network, HTTP status or timeout).
 */
export interface FetchError {
  readonly type: 'FetchError';
  readonly message: string;
  readonly url: string;
  readonly cause?: unknown;
}

/**
 * Expected columns are absent or renamed upstream.
 */
export interface SchemaError {
  readonly type: 'SchemaError';
  readonly message: string;
  readonly column: string;
}

/**
 * A row carries a value that cannot be turned into a county record.
 */
export interface ValidationError {
  readonly type: 'ValidationError';
  readonly message: string;
  readonly field: string;
  readonly value: string;
  readonly uid: string;
}

export type LoadError = FetchError | SchemaError | ValidationError;

/**
 * The state outlines for the base map could not be loaded.
 */
export interface GeographyError {
  readonly type: 'GeographyError';
  readonly message: string;
  readonly url: string;
  readonly cause?: unknown;
}

export type StartupError = LoadError | GeographyError;

// ─────────────────────────────────────────────────────────────────────────────
// Error Constructors
// ─────────────────────────────────────────────────────────────────────────────

export const createFetchError = (url: string, cause?: unknown): FetchError => ({
  type: 'FetchError',
  message: `Failed to fetch case data from ${url}: ${cause instanceof Error ? cause.message : String(cause)}`,
  url,
  cause,
});

export const createGeographyError = (url: string, cause?: unknown): GeographyError => ({
  type: 'GeographyError',
  message: `Failed to load state outlines from ${url}: ${cause instanceof Error ? cause.message : String(cause)}`,
  url,
  cause,
});

export const createSchemaError = (column: string, message?: string): SchemaError => ({
  type: 'SchemaError',
  message: message ?? `Missing expected column '${column}'`,
  column,
});

export const createValidationError = (
  uid: string,
  field: string,
  value: string,
  message: string
): ValidationError => ({
  type: 'ValidationError',
  message: `Row ${uid}: ${message}`,
  field,
  value,
  uid,
});

/**
 * Short, user-facing description of a start-up error.
 */
export const describeLoadError = (error: StartupError): string => {
  switch (error.type) {
    case 'FetchError':
      return `Could not download case data. ${error.message}`;
    case 'SchemaError':
      return `Case data has an unexpected layout. ${error.message}`;
    case 'ValidationError':
      return `Case data failed validation. ${error.message}`;
    case 'GeographyError':
      return `Could not load the base map. ${error.message}`;
  }
};
