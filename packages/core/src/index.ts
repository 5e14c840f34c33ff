// Core package entry point
export * from './quality-gate/index.js';
