/**
 * @tidelist/collection: observable, mutable ordered collections.
 *
 * An {@link ObservableCollection} publishes the full snapshot after every
 * mutation and a structured change event (insert, remove, or a composite of
 * both) describing what changed, so consumers can update incrementally.
 *
 * @example
 * ```ts
 * import { applyChange, createObservableCollection } from '@tidelist/collection';
 *
 * const todos = createObservableCollection(['write', 'review']);
 *
 * let mirror = todos.value;
 * todos.changes$.subscribe((change) => {
 *   mirror = applyChange(mirror, change);
 * });
 *
 * todos.append('ship');
 * todos.replace({ start: 0, end: 1 }, ['draft']);
 * // mirror: ['draft', 'review', 'ship']
 * ```
 *
 * @module @tidelist/collection
 */

// Types
export type {
  AssignmentMode,
  ChangeEvent,
  ChannelFactory,
  ChannelObserver,
  ClearanceChange,
  CollectionOptions,
  CompositeChange,
  EmissionMode,
  EventChannel,
  IndexRange,
  InsertChange,
  PrimitiveChange,
  RemoveChange,
} from './types.js';

// Collection
export {
  MutationGuard,
  ObservableCollection,
  createObservableCollection,
} from './collection/index.js';

// Changes
export {
  applyChange,
  applyChanges,
  changeIndex,
  changeValue,
  clearanceChange,
  compositeChange,
  flattenChange,
  insertChange,
  isPrimitiveChange,
  removeChange,
} from './change/index.js';

// Channels
export { SubjectChannel, subjectChannels } from './channel/index.js';

// Errors
export {
  CollectionDisposedError,
  CollectionError,
  ERROR_CODES,
  IndexOutOfBoundsError,
  InvalidRangeError,
  MalformedChangeError,
  getErrorCategory,
  getErrorInfo,
  type CollectionErrorOptions,
  type ErrorCategory,
  type ErrorCode,
  type SerializedCollectionError,
} from './errors/index.js';

// Observability
export {
  CollectionLogger,
  createLogger,
  type LogEntry,
  type LogLevel,
  type LoggerConfig,
} from './observability/index.js';

// Utilities
export { mapWithIndex } from './utils/index.js';
