import { ConfigurationError } from '../../../core/errors';
import type { DriveMotor } from '../motor/types';

/**
 * Battery voltage assumed when deriving the torque available at top speed
 */
export const NOMINAL_BATTERY_VOLTAGE = 12.0;

/**
 * Physical parameters shared by every drive module of a robot
 */
export interface ModuleConfigParams {
    /** Radius of the drive wheel (m) */
    wheelRadiusMeters: number;
    /** Maximum attainable wheel surface speed (m/s) */
    maxDriveVelocityMps: number;
    /** Coefficient of friction between the wheel and the floor */
    wheelCof: number;
    /** Drive motor(s) of one module, including the gear reduction */
    driveMotor: DriveMotor;
    /** Supply current limit of the drive motor(s) (A) */
    driveCurrentLimitAmps: number;
}

/**
 * Drive module configuration
 */
export class ModuleConfig {
    readonly wheelRadiusMeters: number;
    readonly maxDriveVelocityMps: number;
    readonly wheelCof: number;
    readonly driveMotor: DriveMotor;
    readonly driveCurrentLimitAmps: number;

    /** Wheel angular speed at the max drive velocity (rad/s) */
    readonly maxDriveVelocityRadPerSec: number;
    /** Torque the motor can still produce at top speed, capped by the current limit (N·m) */
    readonly torqueLoss: number;

    constructor(params: ModuleConfigParams) {
        requirePositive('wheelRadiusMeters', params.wheelRadiusMeters);
        requirePositive('maxDriveVelocityMps', params.maxDriveVelocityMps);
        requirePositive('driveCurrentLimitAmps', params.driveCurrentLimitAmps);
        if (!Number.isFinite(params.wheelCof) || params.wheelCof < 0) {
            throw new ConfigurationError(`wheelCof must be a non-negative finite number, got ${params.wheelCof}`, {
                parameter: 'wheelCof',
                value: params.wheelCof,
            });
        }

        this.wheelRadiusMeters = params.wheelRadiusMeters;
        this.maxDriveVelocityMps = params.maxDriveVelocityMps;
        this.wheelCof = params.wheelCof;
        this.driveMotor = params.driveMotor;
        this.driveCurrentLimitAmps = params.driveCurrentLimitAmps;

        this.maxDriveVelocityRadPerSec = this.maxDriveVelocityMps / this.wheelRadiusMeters;
        const maxSpeedCurrentDraw = this.driveMotor.getCurrent(this.maxDriveVelocityRadPerSec, NOMINAL_BATTERY_VOLTAGE);
        this.torqueLoss = this.driveMotor.getTorque(Math.min(maxSpeedCurrentDraw, this.driveCurrentLimitAmps));

        Object.freeze(this);
    }
}

/**
 * Throw a ConfigurationError unless `value` is finite and strictly positive
 */
export function requirePositive(name: string, value: number): void {
    if (!Number.isFinite(value) || value <= 0) {
        throw new ConfigurationError(`${name} must be a positive finite number, got ${value}`, {
            parameter: name,
            value,
        });
    }
}
