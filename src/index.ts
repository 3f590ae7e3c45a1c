/**
 * @arch depsum.barrel
 *
 * depsum - keeps Bazel go_repository checksums in step with go.sum.
 * Main library exports barrel file.
 */

// Configuration
export * from './core/config/index.js';

// go.sum reading
export * from './core/gosum/index.js';

// deps.bzl rewriting
export * from './core/deps-bzl/index.js';

// Pipeline
export * from './core/sync.js';

// Utilities
export * from './utils/index.js';

// CLI
export { createCli } from './cli/index.js';
