// @revlog/protocol
// Shared types and pure helpers for the revision log.
//
// Nothing in this package performs I/O. Repositories, the runtime and the API
// all speak in these types, so storage backends can be swapped freely.

export * from './types/index.js';
export * from './validation/index.js';
