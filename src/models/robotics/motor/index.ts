/**
 * @module motor
 * @description Drive motor models
 *
 * - `DriveMotor`: the force/speed capability the drivetrain depends on
 * - `DCMotor`: linear DC motor model with gearbox reduction
 */

export * from './dc-motor';
export * from './types';
