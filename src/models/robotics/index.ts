/**
 * @module src/models/robotics
 * @description Robotics: drivetrain kinematics, motors and module parameters
 *
 * Contains:
 * - Kinematics: swerve and differential chassis/wheel conversions
 * - Motor: DC motor model behind the DriveMotor capability
 * - Drivetrain: per-module physical configuration
 */

import * as kinematics from './kinematics';
import * as motor from './motor';
import * as drivetrain from './drivetrain';

// Re-export as namespaces
export { kinematics, motor, drivetrain };
