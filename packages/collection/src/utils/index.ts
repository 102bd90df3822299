export { mapWithIndex } from './map-with-index.js';
