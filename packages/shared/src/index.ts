// Shared package entry point
export * from './types/index.js';
export * from './schemas/index.js';
