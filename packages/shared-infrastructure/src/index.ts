/**
 * @doc-relay/shared-infrastructure
 *
 * Env parsing and call-resilience helpers shared by the pipeline packages.
 */

export * from './env/loaders.js';
export * from './retry.js';
