import { ConfigurationError } from '../../../core/errors';
import type { ChassisSpeeds, DifferentialWheelSpeeds } from './types';

/**
 * Differential drive kinematics
 * Two-sided robot where each side spins independently. Lateral motion
 * is not representable and is dropped on conversion.
 */
export class DifferentialDriveKinematics {
    readonly trackwidthMeters: number;

    constructor(trackwidthMeters: number) {
        if (!Number.isFinite(trackwidthMeters) || trackwidthMeters <= 0) {
            throw new ConfigurationError(
                `Trackwidth must be a positive finite number, got ${trackwidthMeters}`,
                { parameter: 'trackwidthMeters', value: trackwidthMeters }
            );
        }
        this.trackwidthMeters = trackwidthMeters;
        Object.freeze(this);
    }

    toWheelSpeeds(speeds: ChassisSpeeds): DifferentialWheelSpeeds {
        const halfTrack = this.trackwidthMeters / 2;
        return {
            leftMetersPerSecond: speeds.vxMetersPerSecond - speeds.omegaRadiansPerSecond * halfTrack,
            rightMetersPerSecond: speeds.vxMetersPerSecond + speeds.omegaRadiansPerSecond * halfTrack,
        };
    }

    toChassisSpeeds(wheelSpeeds: DifferentialWheelSpeeds): ChassisSpeeds {
        const { leftMetersPerSecond: left, rightMetersPerSecond: right } = wheelSpeeds;
        return {
            vxMetersPerSecond: (left + right) / 2,
            vyMetersPerSecond: 0,
            omegaRadiansPerSecond: (right - left) / this.trackwidthMeters,
        };
    }
}
