// Re-export all protocol types

export * from './common.js';
export * from './revisions.js';
export * from './attribution.js';
