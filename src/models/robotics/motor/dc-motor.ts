import { ConfigurationError } from '../../../core/errors';
import type { DCMotorParams, DriveMotor } from './types';

const PARAM_KEYS: readonly (keyof DCMotorParams)[] = [
    'nominalVoltageVolts',
    'stallTorqueNewtonMeters',
    'stallCurrentAmps',
    'freeCurrentAmps',
    'freeSpeedRadPerSec',
];

/**
 * Linear DC motor model
 *
 * Steady-state relations, with R = V / I_stall, Kv = ω_free / (V - R·I_free)
 * and Kt = τ_stall / I_stall:
 *
 *   I = V/R - ω/(Kv·R)
 *   τ = Kt·I
 *
 * A gearbox of `numMotors` identical motors sums torque and current and
 * keeps the free speed.
 */
export class DCMotor implements DriveMotor {
    readonly nominalVoltageVolts: number;
    readonly stallTorqueNewtonMeters: number;
    readonly stallCurrentAmps: number;
    readonly freeCurrentAmps: number;
    readonly freeSpeedRadPerSec: number;
    /** Winding resistance (Ω) */
    readonly rOhms: number;
    /** Velocity constant (rad/s per V) */
    readonly kvRadPerSecPerVolt: number;
    /** Torque constant (N·m per A) */
    readonly ktNewtonMetersPerAmp: number;

    constructor(params: DCMotorParams, numMotors = 1) {
        for (const key of PARAM_KEYS) {
            const value = params[key];
            if (!Number.isFinite(value) || value <= 0) {
                throw new ConfigurationError(`Motor parameter ${key} must be positive, got ${value}`, {
                    parameter: key,
                    value,
                });
            }
        }
        if (!Number.isInteger(numMotors) || numMotors < 1) {
            throw new ConfigurationError(`Motor count must be a positive integer, got ${numMotors}`);
        }

        this.nominalVoltageVolts = params.nominalVoltageVolts;
        this.stallTorqueNewtonMeters = params.stallTorqueNewtonMeters * numMotors;
        this.stallCurrentAmps = params.stallCurrentAmps * numMotors;
        this.freeCurrentAmps = params.freeCurrentAmps * numMotors;
        this.freeSpeedRadPerSec = params.freeSpeedRadPerSec;

        this.rOhms = this.nominalVoltageVolts / this.stallCurrentAmps;
        this.kvRadPerSecPerVolt =
            this.freeSpeedRadPerSec / (this.nominalVoltageVolts - this.rOhms * this.freeCurrentAmps);
        this.ktNewtonMetersPerAmp = this.stallTorqueNewtonMeters / this.stallCurrentAmps;

        Object.freeze(this);
    }

    getCurrent(speedRadPerSec: number, voltageInputVolts: number): number {
        return (-1.0 / this.kvRadPerSecPerVolt / this.rOhms) * speedRadPerSec + (1.0 / this.rOhms) * voltageInputVolts;
    }

    getTorque(currentAmps: number): number {
        return currentAmps * this.ktNewtonMetersPerAmp;
    }

    getVoltage(torqueNewtonMeters: number, speedRadPerSec: number): number {
        return (1.0 / this.kvRadPerSecPerVolt) * speedRadPerSec
            + (1.0 / this.ktNewtonMetersPerAmp) * this.rOhms * torqueNewtonMeters;
    }

    getSpeed(torqueNewtonMeters: number, voltageInputVolts: number): number {
        return voltageInputVolts * this.kvRadPerSecPerVolt
            - (1.0 / this.ktNewtonMetersPerAmp) * torqueNewtonMeters * this.rOhms * this.kvRadPerSecPerVolt;
    }

    /**
     * The same gearbox behind a reduction of `gearing` (input turns per output turn)
     */
    withReduction(gearing: number): DCMotor {
        if (!Number.isFinite(gearing) || gearing <= 0) {
            throw new ConfigurationError(`Gearing must be positive, got ${gearing}`, {
                parameter: 'gearing',
                value: gearing,
            });
        }
        return new DCMotor({
            nominalVoltageVolts: this.nominalVoltageVolts,
            stallTorqueNewtonMeters: this.stallTorqueNewtonMeters * gearing,
            stallCurrentAmps: this.stallCurrentAmps,
            freeCurrentAmps: this.freeCurrentAmps,
            freeSpeedRadPerSec: this.freeSpeedRadPerSec / gearing,
        });
    }
}
