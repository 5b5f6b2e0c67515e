/**
 * @module config/motor-catalog
 * @description Drive motors selectable from a settings file
 *
 * Datasheet values at 12 V for one motor. The kinematics core never sees
 * these identifiers; it only receives the resulting DriveMotor.
 */

import { UnsupportedMotorError } from '../core/errors';
import { DCMotor } from '../models/robotics/motor/dc-motor';
import type { DCMotorParams } from '../models/robotics/motor/types';
import { rpmToRadPerSec } from '../models/utils/conversion';

function motorSpec(
    stallTorqueNewtonMeters: number,
    stallCurrentAmps: number,
    freeCurrentAmps: number,
    freeSpeedRpm: number
): DCMotorParams {
    return {
        nominalVoltageVolts: 12,
        stallTorqueNewtonMeters,
        stallCurrentAmps,
        freeCurrentAmps,
        freeSpeedRadPerSec: rpmToRadPerSec(freeSpeedRpm),
    };
}

export const MOTOR_CATALOG = {
    krakenX60: motorSpec(7.09, 366, 2, 6000),
    krakenX60FOC: motorSpec(9.37, 483, 2, 5800),
    falcon500: motorSpec(4.69, 257, 1.5, 6380),
    falcon500FOC: motorSpec(5.84, 304, 1.5, 6080),
    vortex: motorSpec(3.6, 211, 3.6, 6784),
    NEO: motorSpec(2.6, 105, 1.8, 5676),
    CIM: motorSpec(2.42, 133, 2.7, 5310),
    miniCIM: motorSpec(1.41, 89, 3, 5840),
} as const satisfies Record<string, DCMotorParams>;

export type MotorType = keyof typeof MOTOR_CATALOG;

export const SUPPORTED_MOTOR_TYPES: readonly string[] = Object.freeze(Object.keys(MOTOR_CATALOG));

export function isMotorType(value: string): value is MotorType {
    return Object.prototype.hasOwnProperty.call(MOTOR_CATALOG, value);
}

/**
 * Build the gearbox for a motor identifier
 *
 * @param numMotors - Motors driving one wheel (or one side of a differential drive)
 */
export function resolveDriveMotor(motorType: string, numMotors = 1): DCMotor {
    if (!isMotorType(motorType)) {
        throw new UnsupportedMotorError(motorType, SUPPORTED_MOTOR_TYPES);
    }
    return new DCMotor(MOTOR_CATALOG[motorType], numMotors);
}
