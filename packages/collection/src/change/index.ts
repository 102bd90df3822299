export {
  changeIndex,
  changeValue,
  clearanceChange,
  compositeChange,
  flattenChange,
  insertChange,
  isPrimitiveChange,
  removeChange,
} from './change.js';

export { applyChange, applyChanges } from './apply.js';
