/**
 * Base error types for the application
 * All domain errors should extend these base types
 */

/**
 * Base interface for all application errors
 */
export interface AppError {
  readonly type: string;
  readonly message: string;
  readonly cause?: unknown;
}

/**
 * Infrastructure errors
 */
export interface InfraError extends AppError {
  readonly type: 'DatabaseError';
  readonly retryable: boolean;
}

/**
 * A reference row that the snapshot does not hold.
 * `table` is the logical reference table, `key` the normalized lookup key.
 */
export interface NotFoundError extends AppError {
  readonly type: 'NotFoundError';
  readonly table: string;
  readonly key: string;
}

export const createNotFoundError = (table: string, key: string): NotFoundError => ({
  type: 'NotFoundError',
  message: `No row for '${key}' in ${table}`,
  table,
  key,
});

export const createDatabaseError = (message: string, cause?: unknown): InfraError => ({
  type: 'DatabaseError',
  message,
  retryable: false,
  cause,
});

/**
 * Extracts a message from anything thrown.
 */
export const errorMessage = (error: unknown): string => {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'object' && error !== null && 'message' in error) {
    const { message } = error;
    if (typeof message === 'string') {
      return message;
    }
  }
  return String(error);
};
