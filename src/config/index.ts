/**
 * @module config
 * @description Robot configuration: the RobotConfig value and its settings-file adapter
 *
 * ## Modules
 * - `robot-config`: RobotConfig, drivetrain variant, topology guards
 * - `settings`: settings record schema and defaults
 * - `motor-catalog`: motor identifiers accepted in settings files
 * - `loader`: settings file → RobotConfig
 */

// ==================== RobotConfig ====================

export type { Topology, Drivetrain } from './robot-config';

export {
    GRAVITY,
    RobotConfig,
    requireHolonomic,
    requireDifferential,
} from './robot-config';

// ==================== Settings ====================

export type { RobotSettings } from './settings';

export {
    RobotSettingsSchema,
    DEFAULT_ROBOT_SETTINGS,
    parseRobotSettings,
    createRobotSettings,
} from './settings';

// ==================== Motor Catalog ====================

export type { MotorType } from './motor-catalog';

export {
    MOTOR_CATALOG,
    SUPPORTED_MOTOR_TYPES,
    isMotorType,
    resolveDriveMotor,
} from './motor-catalog';

// ==================== Loader ====================

export type { LoaderConfig } from './loader';

export {
    DEFAULT_LOADER_CONFIG,
    resolveSettingsPath,
    robotConfigFromSettings,
    loadRobotConfig,
} from './loader';
