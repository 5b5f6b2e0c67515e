/**
 * @module src/models/numeric
 * @description Numerical Methods
 *
 * Contains:
 * - Linear algebra: vector ops, 3x3 matrices, Cholesky, least squares
 */

import * as math from './math';

// Re-export as namespace
export { math };

// Direct exports for common functions
export * from './math';
