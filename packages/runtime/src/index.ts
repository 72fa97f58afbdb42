// @revlog/runtime
// Supersession, point-in-time queries and the mutation facade

// Error types
export {
  RuntimeError,
  ValidationError,
  IntegrityError,
  DuplicateIdentifierError,
  IdentityChangeError,
  RepositoryError,
  ConstraintViolation,
  RevisionNotFoundError,
  type RevisionConstraint,
} from './errors.js';

// Clocks
export { systemClock, createManualClock, type Clock, type ManualClock } from './clock.js';

// Input validation
export { requireTimestamp, requireEntityId, requirePayload, isPayload } from './validation.js';

// Supersession
export { resolveSupersession, computeBounds, isClosingCandidate } from './supersession/index.js';

// Point-in-time queries
export {
  SnapshotView,
  createSnapshotView,
  assertSingleActive,
  type SnapshotViewOptions,
} from './snapshot/index.js';

// Writes
export {
  MutationFacade,
  createMutationFacade,
  type DuplicateIdentifierPolicy,
  type IdentityChangePolicy,
  type MutationFacadeConfig,
  type MutationFacadeOptions,
  type RevisionInput,
  type MutationOptions,
  type BulkAttributionMode,
  type InsertManyOptions,
  type MutationResult,
} from './mutations/index.js';

// Attribution
export {
  createInMemoryAttributionStore,
  dispatchEach,
  dispatchBatch,
  type AttributionHook,
  type AttributionStore,
  type AttributionQueryFilter,
} from './attribution/index.js';

// Logging
export {
  consoleLogger,
  silentLogger,
  withMinimumLevel,
  createCapturingLogger,
  type Logger,
  type LogLevel,
  type LogEntry,
} from './logging/index.js';
