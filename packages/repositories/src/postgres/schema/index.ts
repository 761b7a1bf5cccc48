// Re-export all schema tables
export * from './engines.js';
export * from './mirror-records.js';
export * from './datasets.js';
export * from './models.js';
