/**
 * @arch depsum.core.barrel
 */
export * from './types.js';
export * from './parser.js';
