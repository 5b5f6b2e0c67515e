/**
 * @module config/loader
 * @description Build a RobotConfig from the GUI settings file
 *
 * The only part of drivekit that does I/O. Run it once, before handing the
 * resulting config to concurrent readers.
 *
 * @example
 * ```typescript
 * import { loadRobotConfig } from 'drivekit';
 *
 * const robot = loadRobotConfig({ deployDir: '/home/lvuser/deploy' });
 * const states = robot.toWheelStates({ vxMetersPerSecond: 1, vyMetersPerSecond: 0, omegaRadiansPerSecond: 0 });
 * ```
 */

import * as fs from 'fs';
import * as path from 'path';
import {
    ConfigurationError,
    ErrorCodes,
    isDrivekitError,
    wrapError,
} from '../core/errors';
import { createLogger, type Logger } from '../core/logging';
import { ModuleConfig } from '../models/robotics/drivetrain/module-config';
import { resolveDriveMotor } from './motor-catalog';
import { RobotConfig } from './robot-config';
import { parseRobotSettings, type RobotSettings } from './settings';

// ==================== Configuration ====================

export interface LoaderConfig {
    /** Directory deployed alongside the robot program */
    deployDir: string;
    /** Settings file, relative to `deployDir` */
    settingsFile: string;
}

export const DEFAULT_LOADER_CONFIG: LoaderConfig = {
    deployDir: path.resolve(process.cwd(), 'deploy'),
    settingsFile: path.join('pathplanner', 'settings.json'),
};

export function resolveSettingsPath(config: Partial<LoaderConfig> = {}): string {
    const { deployDir, settingsFile } = { ...DEFAULT_LOADER_CONFIG, ...config };
    return path.resolve(deployDir, settingsFile);
}

// ==================== Construction ====================

/**
 * Build the drive gearbox, module config and robot config described by a settings record
 */
export function robotConfigFromSettings(settings: RobotSettings): RobotConfig {
    // Swerve modules have one drive motor; each differential side has two.
    // The current limit stays per motor.
    const numMotors = settings.holonomicMode ? 1 : 2;
    const gearbox = resolveDriveMotor(settings.driveMotorType, numMotors)
        .withReduction(settings.driveGearing);

    const moduleConfig = new ModuleConfig({
        wheelRadiusMeters: settings.driveWheelRadius,
        maxDriveVelocityMps: settings.maxDriveSpeed,
        wheelCof: settings.wheelCOF,
        driveMotor: gearbox,
        driveCurrentLimitAmps: settings.driveCurrentLimit,
    });

    if (settings.holonomicMode) {
        return RobotConfig.holonomic(
            settings.robotMass,
            settings.robotMOI,
            moduleConfig,
            settings.robotTrackwidth,
            settings.robotWheelbase
        );
    }
    return RobotConfig.differential(
        settings.robotMass,
        settings.robotMOI,
        moduleConfig,
        settings.robotTrackwidth
    );
}

// ==================== Loading ====================

/**
 * Read, validate and build the robot config from the settings file
 */
export function loadRobotConfig(
    config: Partial<LoaderConfig> = {},
    logger: Logger = createLogger('console', { scope: 'settings' })
): RobotConfig {
    const settingsPath = resolveSettingsPath(config);

    let text: string;
    try {
        text = fs.readFileSync(settingsPath, 'utf-8');
    } catch (error) {
        return fail(logger, settingsPath, wrapError(error, ErrorCodes.SETTINGS_READ_ERROR));
    }

    let raw: unknown;
    try {
        raw = JSON.parse(text);
    } catch (error) {
        return fail(logger, settingsPath, new ConfigurationError('Settings file is not valid JSON', {
            path: settingsPath,
            cause: error instanceof Error ? error.message : String(error),
        }));
    }

    try {
        const robot = robotConfigFromSettings(parseRobotSettings(raw));
        logger.info('Loaded robot config', {
            path: settingsPath,
            topology: robot.topology,
            numModules: robot.numModules,
            massKg: robot.massKg,
        });
        return robot;
    } catch (error) {
        return fail(logger, settingsPath, error);
    }
}

function fail(logger: Logger, settingsPath: string, error: unknown): never {
    logger.warn('Failed to load robot config', {
        path: settingsPath,
        code: isDrivekitError(error) ? error.code : ErrorCodes.INTERNAL_ERROR,
        message: error instanceof Error ? error.message : String(error),
    });
    throw error;
}
