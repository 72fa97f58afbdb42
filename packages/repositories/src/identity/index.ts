export { revisionIdentityAllocator, type IdentityAllocator } from './allocator.js';
