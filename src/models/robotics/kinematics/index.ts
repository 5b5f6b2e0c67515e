/**
 * @module kinematics
 * @description Chassis-speed / wheel-state conversions
 *
 * Provides drivetrain kinematics models:
 * - Holonomic (swerve) kinematics for N >= 2 steerable modules
 * - Differential drive kinematics
 * - Field/robot frame conversion and wheel speed desaturation
 */

export * from './differential';
export * from './swerve';
export * from './types';
export * from './utils';
