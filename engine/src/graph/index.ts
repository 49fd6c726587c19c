/**
 * Graph Analysis Utilities
 *
 * Tools for analyzing workflow graphs:
 * - DependencyGraph: edge index, reachability and loop bodies
 * - CycleDetector: find cycles over forward edges
 */

export * from './DependencyGraph.js';
export * from './CycleDetector.js';
