/**
 * Kinematics utility functions
 */

import { norm } from '../../numeric/math/linear-algebra';
import type { ChassisSpeeds, ModuleState, Translation2d } from './types';

/**
 * Normalize angle to (-π, π]
 */
export function normalizeAngle(angle: number): number {
    while (angle > Math.PI) angle -= 2 * Math.PI;
    while (angle <= -Math.PI) angle += 2 * Math.PI;
    return angle;
}

/**
 * Distance of a point from the origin
 */
export function translationNorm(t: Translation2d): number {
    return norm([t.x, t.y]);
}

export function translation(x: number, y: number): Translation2d {
    return Object.freeze({ x, y });
}

export function chassisSpeeds(vx = 0, vy = 0, omega = 0): ChassisSpeeds {
    return { vxMetersPerSecond: vx, vyMetersPerSecond: vy, omegaRadiansPerSecond: omega };
}

/**
 * Convert field-relative speeds to robot-relative speeds
 *
 * @param robotHeading - Robot heading in the field frame (radians)
 */
export function fromFieldRelativeSpeeds(fieldSpeeds: ChassisSpeeds, robotHeading: number): ChassisSpeeds {
    const cos = Math.cos(robotHeading);
    const sin = Math.sin(robotHeading);
    return {
        vxMetersPerSecond: fieldSpeeds.vxMetersPerSecond * cos + fieldSpeeds.vyMetersPerSecond * sin,
        vyMetersPerSecond: -fieldSpeeds.vxMetersPerSecond * sin + fieldSpeeds.vyMetersPerSecond * cos,
        omegaRadiansPerSecond: fieldSpeeds.omegaRadiansPerSecond,
    };
}

/**
 * Convert robot-relative speeds to field-relative speeds
 *
 * @param robotHeading - Robot heading in the field frame (radians)
 */
export function toFieldRelativeSpeeds(robotSpeeds: ChassisSpeeds, robotHeading: number): ChassisSpeeds {
    return fromFieldRelativeSpeeds(robotSpeeds, -robotHeading);
}

/**
 * Scale all module speeds down uniformly so none exceeds `maxSpeedMetersPerSecond`.
 * Angles and the ratio between modules are preserved.
 */
export function desaturateWheelSpeeds(
    states: readonly ModuleState[],
    maxSpeedMetersPerSecond: number
): ModuleState[] {
    let realMax = 0;
    for (const state of states) {
        realMax = Math.max(realMax, Math.abs(state.speedMetersPerSecond));
    }

    if (realMax <= maxSpeedMetersPerSecond) {
        return states.map(state => ({ ...state }));
    }

    const k = maxSpeedMetersPerSecond / realMax;
    return states.map(state => ({
        speedMetersPerSecond: state.speedMetersPerSecond * k,
        angle: state.angle,
    }));
}
