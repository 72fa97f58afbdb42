export { MutationFacade, createMutationFacade } from './facade.js';
export type {
  DuplicateIdentifierPolicy,
  IdentityChangePolicy,
  MutationFacadeConfig,
  MutationFacadeOptions,
  RevisionInput,
  MutationOptions,
  BulkAttributionMode,
  InsertManyOptions,
  MutationResult,
} from './types.js';
