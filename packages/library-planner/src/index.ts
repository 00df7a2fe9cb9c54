export * from './exclusions.js';
export * from './formats.js';
export * from './languages.js';
export * from './paths.js';
export * from './planner.js';
export * from './resumability.js';
export * from './scanner.js';
