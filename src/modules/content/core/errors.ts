/**
 * Content Module - Domain Errors
 */

/**
 * A content file could not be read.
 */
export interface ContentUnavailableError {
  readonly type: 'ContentUnavailableError';
  readonly message: string;
  readonly file: string;
  readonly cause?: unknown;
}

/**
 * A content file does not match its schema or breaks a catalog rule.
 */
export interface InvalidContentError {
  readonly type: 'InvalidContentError';
  readonly message: string;
  readonly file: string;
  readonly details: string[];
}

export type ContentError = ContentUnavailableError | InvalidContentError;

export const createContentUnavailableError = (
  file: string,
  cause?: unknown
): ContentUnavailableError => ({
  type: 'ContentUnavailableError',
  message: `Content file '${file}' could not be read`,
  file,
  cause,
});

export const createInvalidContentError = (
  file: string,
  details: string[]
): InvalidContentError => ({
  type: 'InvalidContentError',
  message: `Content file '${file}' is invalid: ${details.join('; ')}`,
  file,
  details,
});
