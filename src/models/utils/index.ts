/**
 * @module src/models/utils
 * @description Shared helpers for the physical models
 *
 * - conversion: rpm / rad·s⁻¹ and degree / radian conversions
 */

export * from './conversion';
