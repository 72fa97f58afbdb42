export {
  createInMemoryAttributionStore,
  dispatchEach,
  dispatchBatch,
  type AttributionHook,
  type AttributionStore,
  type AttributionQueryFilter,
} from './hook.js';
