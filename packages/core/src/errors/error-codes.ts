/**
 * Strata Error Codes
 *
 * Error codes are structured as STRATA_[CATEGORY][NUMBER]:
 * - N: Not found errors (N100-N199)
 * - A: Already exists errors (A200-A299)
 * - S: Storage / IO errors (S300-S399)
 * - U: Authorization / authentication errors (U400-U499)
 * - Q: Query and statement errors (Q500-Q599)
 * - V: Validation errors (V600-V699)
 * - X: Internal errors (X900-X999)
 */

/**
 * Error code definitions with messages and suggestions
 */
export const ERROR_CODES = {
  // Not found errors (N100-N199)
  STRATA_N100: {
    code: 'STRATA_N100',
    message: 'Resource not found',
    suggestion: 'Check that the referenced resource exists.',
  },
  STRATA_N101: {
    code: 'STRATA_N101',
    message: 'Shard not found',
    suggestion: 'Create the shard with createShard() before writing to it.',
  },
  STRATA_N102: {
    code: 'STRATA_N102',
    message: 'Database not found',
    suggestion: 'Create the database first or check the database name.',
  },
  STRATA_N103: {
    code: 'STRATA_N103',
    message: 'Retention policy not found',
    suggestion: 'Check the retention policy name or the database default.',
  },
  STRATA_N104: {
    code: 'STRATA_N104',
    message: 'User not found',
    suggestion: 'Check the user name or create the user first.',
  },

  // Already exists errors (A200-A299)
  STRATA_A200: {
    code: 'STRATA_A200',
    message: 'Resource already exists',
    suggestion: 'Use a different identifier.',
  },
  STRATA_A201: {
    code: 'STRATA_A201',
    message: 'Shard already exists',
    suggestion: 'Shard IDs must be unique within a store.',
  },
  STRATA_A202: {
    code: 'STRATA_A202',
    message: 'Database already exists',
    suggestion: 'Use a different database name.',
  },
  STRATA_A203: {
    code: 'STRATA_A203',
    message: 'User already exists',
    suggestion: 'Use a different user name or drop the existing user.',
  },

  // Storage errors (S300-S399)
  STRATA_S300: {
    code: 'STRATA_S300',
    message: 'Storage operation failed',
    suggestion: 'Check that the data directory is readable and writable.',
  },
  STRATA_S301: {
    code: 'STRATA_S301',
    message: 'Store is closed',
    suggestion: 'Call open() before using the store, and do not use it after close().',
  },
  STRATA_S302: {
    code: 'STRATA_S302',
    message: 'Corrupt shard data',
    suggestion: 'The persisted shard files could not be decoded. Restore them from a backup.',
  },

  // Authorization errors (U400-U499)
  STRATA_U400: {
    code: 'STRATA_U400',
    message: 'Authorization denied',
    suggestion: 'Authenticate as a user with the privileges this statement requires.',
  },
  STRATA_U401: {
    code: 'STRATA_U401',
    message: 'Authentication failed',
    suggestion: 'Check the user name and password.',
  },

  // Query errors (Q500-Q599)
  STRATA_Q500: {
    code: 'STRATA_Q500',
    message: 'Query execution failed',
    suggestion: 'Check the statement against the current schema.',
  },
  STRATA_Q501: {
    code: 'STRATA_Q501',
    message: 'Query parse failed',
    suggestion: 'Check the query syntax near the reported position.',
  },
  STRATA_Q502: {
    code: 'STRATA_Q502',
    message: 'Statement not supported',
    suggestion: 'This statement kind has no handler configured.',
  },
  STRATA_Q503: {
    code: 'STRATA_Q503',
    message: 'Query limit exceeded',
    suggestion: 'Narrow the time range or raise maxSelectPoints.',
  },

  // Validation errors (V600-V699)
  STRATA_V600: {
    code: 'STRATA_V600',
    message: 'Validation failed',
    suggestion: 'Check the validation errors for specific issues.',
  },
  STRATA_V601: {
    code: 'STRATA_V601',
    message: 'Invalid point',
    suggestion: 'Points need a measurement, at least one field and finite numeric values.',
  },
  STRATA_V602: {
    code: 'STRATA_V602',
    message: 'Invalid configuration',
    suggestion: 'Check the options passed to the constructor.',
  },

  // Internal errors (X900-X999)
  STRATA_X900: {
    code: 'STRATA_X900',
    message: 'Internal error',
    suggestion: 'An unexpected error occurred.',
  },
} as const;

/**
 * Error code type
 */
export type ErrorCode = keyof typeof ERROR_CODES;

/**
 * Error category type
 */
export type ErrorCategory =
  | 'not_found'
  | 'already_exists'
  | 'storage'
  | 'authorization'
  | 'query'
  | 'validation'
  | 'internal';

/**
 * Get the category of an error code
 */
export function getErrorCategory(code: ErrorCode): ErrorCategory {
  const letter = code.charAt(7);
  switch (letter) {
    case 'N':
      return 'not_found';
    case 'A':
      return 'already_exists';
    case 'S':
      return 'storage';
    case 'U':
      return 'authorization';
    case 'Q':
      return 'query';
    case 'V':
      return 'validation';
    default:
      return 'internal';
  }
}

/**
 * Get error info by code
 */
export function getErrorInfo(code: ErrorCode): (typeof ERROR_CODES)[ErrorCode] {
  return ERROR_CODES[code];
}
