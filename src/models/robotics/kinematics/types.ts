/**
 * Kinematics module type definitions
 *
 * Robot frame: +x forward, +y left, counter-clockwise positive rotation.
 */

/**
 * 2D point or vector in meters
 */
export interface Translation2d {
    readonly x: number;
    readonly y: number;
}

/**
 * Whole-body velocity in the robot frame
 */
export interface ChassisSpeeds {
    vxMetersPerSecond: number;     // Forward
    vyMetersPerSecond: number;     // Lateral (left positive)
    omegaRadiansPerSecond: number; // Angular rate
}

/**
 * Velocity of one wheel module
 */
export interface ModuleState {
    speedMetersPerSecond: number;
    /** Steering angle (radians), in (-π, π] */
    angle: number;
}

/**
 * Left/right wheel velocities of a differential drivetrain
 */
export interface DifferentialWheelSpeeds {
    leftMetersPerSecond: number;
    rightMetersPerSecond: number;
}
