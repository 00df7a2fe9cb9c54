export * from './config.js';
export * from './environment.js';
export * from './execution.js';
export * from './gcloud.js';
export * from './shell.js';
export * from './staging.js';
export * from './transfer.js';
