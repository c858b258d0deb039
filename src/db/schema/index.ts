// Re-export all schema tables for use by the db module.
export * from './creator.js';
export * from './collection.js';
export * from './model.js';
export * from './model-file.js';
