/**
 * @module utils/conversion
 * @description Unit conversion utility functions
 */

/**
 * Convert revolutions per minute to radians per second
 *
 * @example
 * ```typescript
 * rpmToRadPerSec(60);   // returns 2π
 * rpmToRadPerSec(6000); // returns ~628.3
 * ```
 */
export function rpmToRadPerSec(rpm: number): number {
    return (rpm * 2 * Math.PI) / 60;
}

/**
 * Convert radians per second to revolutions per minute
 */
export function radPerSecToRpm(radPerSec: number): number {
    return (radPerSec * 60) / (2 * Math.PI);
}

/**
 * Convert degrees to radians
 *
 * @example
 * ```typescript
 * degreesToRadians(180); // returns π
 * ```
 */
export function degreesToRadians(degrees: number): number {
    return (degrees * Math.PI) / 180;
}

/**
 * Convert radians to degrees
 */
export function radiansToDegrees(radians: number): number {
    return (radians * 180) / Math.PI;
}
