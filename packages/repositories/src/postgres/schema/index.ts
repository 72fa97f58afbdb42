// Re-export all schema tables
export * from './revisions.js';
