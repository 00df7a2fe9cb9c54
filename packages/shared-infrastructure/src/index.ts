/**
 * @cloud-narrator/shared-infrastructure
 *
 * Env parsing, logging, retry and child-process helpers shared by the narrator packages.
 */

export * from './env/loaders.js';
export * from './logging/logger.js';
export * from './retry.js';
export * from './process/run-command.js';
