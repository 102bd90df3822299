export { ObservableCollection, createObservableCollection } from './observable-collection.js';
export { MutationGuard } from './mutation-guard.js';
