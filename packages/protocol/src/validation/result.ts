// Shared result shape for reference-data validation

/**
 * A validation error (the data cannot be loaded)
 */
export type ReferenceValidationError = {
  path: string;
  message: string;
  code: ReferenceValidationErrorCode;
};

/**
 * A validation warning (the data loads but may behave unexpectedly)
 */
export type ReferenceValidationWarning = {
  path: string;
  message: string;
  code: ReferenceValidationWarningCode;
};

export type ReferenceValidationErrorCode =
  | 'MISSING_FIELD'
  | 'INVALID_TYPE'
  | 'INVALID_VALUE'
  | 'DUPLICATE_ID'
  | 'UNKNOWN_EFFECT'
  | 'INVALID_START';

export type ReferenceValidationWarningCode =
  | 'DANGLING_TARGET'
  | 'DEAD_END'
  | 'MISSING_DESCRIPTION'
  | 'EMPTY_CONTENTS';

/**
 * Result of parsing reference data. On success the normalized value is returned.
 */
export type ParseResult<T> =
  | { valid: true; value: T; errors: []; warnings: ReferenceValidationWarning[] }
  | { valid: false; errors: ReferenceValidationError[]; warnings: ReferenceValidationWarning[] };

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.trim() !== '';
}
