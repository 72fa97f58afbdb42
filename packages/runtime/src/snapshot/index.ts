export {
  SnapshotView,
  createSnapshotView,
  assertSingleActive,
  type SnapshotViewOptions,
} from './view.js';
