/**
 * @module config/settings
 * @description Robot settings record written by the path-planning GUI
 *
 * The record is owned by the external settings producer. Keys other than
 * the ones below are ignored.
 */

import { z } from 'zod';
import { ConfigurationError } from '../core/errors';

// ==================== Schema ====================

const positive = (label: string) =>
    z.number({ invalid_type_error: `${label} must be a number` }).finite().positive();

export const RobotSettingsSchema = z.object({
    /** true for swerve/mecanum, false for tank drive */
    holonomicMode: z.boolean(),
    /** kg */
    robotMass: positive('robotMass'),
    /** kg·m² */
    robotMOI: positive('robotMOI'),
    /** m, front-to-back module spacing (holonomic only) */
    robotWheelbase: positive('robotWheelbase'),
    /** m, left-to-right module spacing */
    robotTrackwidth: positive('robotTrackwidth'),
    /** m */
    driveWheelRadius: positive('driveWheelRadius'),
    /** Motor turns per wheel turn */
    driveGearing: positive('driveGearing'),
    /** m/s */
    maxDriveSpeed: positive('maxDriveSpeed'),
    wheelCOF: positive('wheelCOF'),
    driveMotorType: z.string().min(1),
    /** A, per motor */
    driveCurrentLimit: positive('driveCurrentLimit'),
});

export type RobotSettings = z.infer<typeof RobotSettingsSchema>;

// ==================== Defaults ====================

/**
 * Defaults matching a fresh GUI project: a 27" square swerve drive
 */
export const DEFAULT_ROBOT_SETTINGS: RobotSettings = {
    holonomicMode: true,
    robotMass: 74.088,
    robotMOI: 6.883,
    robotWheelbase: 0.546,
    robotTrackwidth: 0.546,
    driveWheelRadius: 0.048,
    driveGearing: 5.143,
    maxDriveSpeed: 5.45,
    wheelCOF: 1.2,
    driveMotorType: 'krakenX60',
    driveCurrentLimit: 60,
};

// ==================== Parsing ====================

/**
 * Validate a deserialized settings record
 */
export function parseRobotSettings(raw: unknown): RobotSettings {
    const result = RobotSettingsSchema.safeParse(raw);
    if (!result.success) {
        const issues = result.error.issues.map(issue => ({
            key: issue.path.join('.'),
            message: issue.message,
        }));
        const keys = issues.map(issue => issue.key || '(root)');
        throw new ConfigurationError(`Invalid robot settings: ${keys.join(', ')}`, { issues });
    }
    return result.data;
}

/**
 * Settings record built from the defaults with some keys replaced
 */
export function createRobotSettings(overrides: Partial<RobotSettings> = {}): RobotSettings {
    return parseRobotSettings({ ...DEFAULT_ROBOT_SETTINGS, ...overrides });
}
