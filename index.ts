/**
 * @packageDocumentation
 * @module drivekit
 *
 * drivekit: physical and kinematic description of a wheeled robot
 *
 * Converts between whole-body chassis speeds and per-wheel states for
 * holonomic (swerve) and differential drivetrains, and derives the
 * friction and torque limits a force-aware trajectory planner needs.
 *
 * ## Modules
 * - `config` - RobotConfig, settings record, motor catalog, settings-file loader
 * - `core` - Errors and logging
 * - `robotics` - Kinematics, DC motor model, module configuration
 * - `numeric` - Small dense linear algebra
 * - `utils` - Unit conversions
 *
 * ## Usage Example
 * ```typescript
 * import { RobotConfig, ModuleConfig, resolveDriveMotor } from 'drivekit';
 *
 * const moduleConfig = new ModuleConfig({
 *     wheelRadiusMeters: 0.048,
 *     maxDriveVelocityMps: 5.45,
 *     wheelCof: 1.2,
 *     driveMotor: resolveDriveMotor('krakenX60').withReduction(5.143),
 *     driveCurrentLimitAmps: 60,
 * });
 * const robot = RobotConfig.holonomic(74.088, 6.883, moduleConfig, 0.546, 0.546);
 * const states = robot.toWheelStates({ vxMetersPerSecond: 2, vyMetersPerSecond: 0, omegaRadiansPerSecond: 1 });
 * ```
 */

// ==================== Namespaces ====================
export * as config from './src/config';
export * as core from './src/core';
export * as robotics from './src/models/robotics';
export * as numeric from './src/models/numeric';
export * as utils from './src/models/utils';

// ==================== Common Exports ====================
export * from './src/config';
export * from './src/core';
export { ModuleConfig, NOMINAL_BATTERY_VOLTAGE } from './src/models/robotics/drivetrain';
export type { ModuleConfigParams } from './src/models/robotics/drivetrain';
export { DCMotor } from './src/models/robotics/motor';
export type { DriveMotor, DCMotorParams } from './src/models/robotics/motor';
export {
    SwerveDriveKinematics,
    DifferentialDriveKinematics,
    chassisSpeeds,
    translation,
    fromFieldRelativeSpeeds,
    toFieldRelativeSpeeds,
    desaturateWheelSpeeds,
} from './src/models/robotics/kinematics';
export type {
    ChassisSpeeds,
    ModuleState,
    Translation2d,
    DifferentialWheelSpeeds,
} from './src/models/robotics/kinematics';

// ==================== Version ====================
export const VERSION = '0.1.0';
