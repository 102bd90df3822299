/**
 * Tidelist Error Codes
 *
 * Error codes are structured as TIDE_[CATEGORY][NUMBER]:
 * - B: Bounds errors (B100-B199)
 * - L: Lifecycle errors (L200-L299)
 */

/**
 * Error code definitions with messages and suggestions
 */
export const ERROR_CODES = {
  // Bounds errors (B100-B199)
  TIDE_B100: {
    code: 'TIDE_B100',
    message: 'Index out of bounds',
    suggestion: 'Check the collection length before addressing an index.',
  },
  TIDE_B101: {
    code: 'TIDE_B101',
    message: 'Invalid range',
    suggestion:
      'The range must start at or after 0, end at or before the collection length, and have room for every replacement value.',
  },
  TIDE_B102: {
    code: 'TIDE_B102',
    message: 'Malformed change',
    suggestion: 'Build clearances with clearanceChange() so removal indices run 0..n-1.',
  },

  // Lifecycle errors (L200-L299)
  TIDE_L200: {
    code: 'TIDE_L200',
    message: 'Collection has been disposed',
    suggestion: 'Create a new collection instead of mutating one after dispose().',
  },
} as const;

/**
 * Error code type
 */
export type ErrorCode = keyof typeof ERROR_CODES;

/**
 * Error category type
 */
export type ErrorCategory = 'bounds' | 'lifecycle';

/**
 * Get the category of an error code
 */
export function getErrorCategory(code: ErrorCode): ErrorCategory {
  return code.charAt(5) === 'B' ? 'bounds' : 'lifecycle';
}

/**
 * Get error info by code
 */
export function getErrorInfo(code: ErrorCode): (typeof ERROR_CODES)[ErrorCode] {
  return ERROR_CODES[code];
}
