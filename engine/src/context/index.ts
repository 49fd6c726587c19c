/**
 * Context Module
 *
 * Variable path resolution, interpolation and data transforms.
 *
 * @module context
 */

export * from './VariablePath.js';
export * from './DataTransformer.js';
