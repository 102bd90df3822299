/**
 * Tidelist Error System
 *
 * Structured errors with unique codes, suggestions and categories.
 *
 * @example
 * ```typescript
 * import { CollectionError } from '@tidelist/collection';
 *
 * try {
 *   list.insert('x', 99);
 * } catch (error) {
 *   if (CollectionError.isCategory(error, 'bounds')) {
 *     console.log(error.format());
 *   }
 * }
 * ```
 *
 * @module errors
 */

export {
  ERROR_CODES,
  getErrorCategory,
  getErrorInfo,
  type ErrorCategory,
  type ErrorCode,
} from './error-codes.js';

export {
  CollectionDisposedError,
  CollectionError,
  IndexOutOfBoundsError,
  InvalidRangeError,
  MalformedChangeError,
  type CollectionErrorOptions,
  type SerializedCollectionError,
} from './collection-error.js';
