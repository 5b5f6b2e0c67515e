/**
 * @module config/robot-config
 * @description Static physical and kinematic description of a wheeled robot
 *
 * A RobotConfig is built once and read by every planner that needs the
 * robot's geometry, mass properties or chassis/wheel conversions. It is a
 * frozen value: all derived constants are computed in the constructor.
 */

import { ShapeMismatchError, TopologyMisuseError } from '../core/errors';
import { DifferentialDriveKinematics } from '../models/robotics/kinematics/differential';
import { SwerveDriveKinematics } from '../models/robotics/kinematics/swerve';
import type { ChassisSpeeds, ModuleState, Translation2d } from '../models/robotics/kinematics/types';
import { translation, translationNorm } from '../models/robotics/kinematics/utils';
import { requirePositive, type ModuleConfig } from '../models/robotics/drivetrain/module-config';

// ==================== Constants ====================

/** Gravitational acceleration used for the friction estimate (m/s²) */
export const GRAVITY = 9.8;

// ==================== Types ====================

export type Topology = 'holonomic' | 'differential';

/**
 * The kinematics strategy of a robot. Exactly one solver exists per config.
 */
export type Drivetrain =
    | { readonly kind: 'holonomic'; readonly kinematics: SwerveDriveKinematics }
    | { readonly kind: 'differential'; readonly kinematics: DifferentialDriveKinematics };

// ==================== RobotConfig ====================

export class RobotConfig {
    /** Mass including bumpers and battery (kg) */
    readonly massKg: number;
    /** Moment of inertia about the vertical axis (kg·m²) */
    readonly moi: number;
    readonly moduleConfig: ModuleConfig;
    /** Robot-relative module locations; index order is shared by every per-module array */
    readonly moduleLocations: readonly Translation2d[];
    readonly drivetrain: Drivetrain;

    // Pre-calculated values reused by every trajectory generation
    readonly numModules: number;
    /** Distance from the robot center to each module (m) */
    readonly modulePivotDistance: readonly number[];
    /** Static friction force each wheel can transmit, assuming even weight distribution (N) */
    readonly wheelFrictionForce: number;
    /** Largest wheel torque before the wheel slips (N·m) */
    readonly maxTorqueFriction: number;

    private constructor(
        massKg: number,
        moi: number,
        moduleConfig: ModuleConfig,
        drivetrain: Drivetrain,
        moduleLocations: readonly Translation2d[]
    ) {
        requirePositive('massKg', massKg);
        requirePositive('moi', moi);
        requirePositive('wheelCof', moduleConfig.wheelCof);

        this.massKg = massKg;
        this.moi = moi;
        this.moduleConfig = moduleConfig;
        this.drivetrain = Object.freeze(drivetrain);
        this.moduleLocations = moduleLocations;

        this.numModules = moduleLocations.length;
        this.modulePivotDistance = Object.freeze(moduleLocations.map(translationNorm));
        this.wheelFrictionForce = moduleConfig.wheelCof * ((massKg / this.numModules) * GRAVITY);
        this.maxTorqueFriction = this.wheelFrictionForce * moduleConfig.wheelRadiusMeters;

        Object.freeze(this);
    }

    /**
     * Config for a four-module HOLONOMIC drive robot
     *
     * Modules are placed at (±wheelbase/2, ±trackwidth/2) in the order
     * front-left, front-right, back-left, back-right.
     *
     * @param trackwidthMeters - Distance between the left and right modules
     * @param wheelbaseMeters - Distance between the front and back modules
     */
    static holonomic(
        massKg: number,
        moi: number,
        moduleConfig: ModuleConfig,
        trackwidthMeters: number,
        wheelbaseMeters: number
    ): RobotConfig {
        requirePositive('trackwidthMeters', trackwidthMeters);
        requirePositive('wheelbaseMeters', wheelbaseMeters);

        const halfBase = wheelbaseMeters / 2.0;
        const halfTrack = trackwidthMeters / 2.0;
        return RobotConfig.holonomicFromLocations(massKg, moi, moduleConfig, [
            translation(halfBase, halfTrack),
            translation(halfBase, -halfTrack),
            translation(-halfBase, halfTrack),
            translation(-halfBase, -halfTrack),
        ]);
    }

    /**
     * Config for a HOLONOMIC drive robot with an arbitrary module layout (N >= 2)
     */
    static holonomicFromLocations(
        massKg: number,
        moi: number,
        moduleConfig: ModuleConfig,
        moduleLocations: readonly Translation2d[]
    ): RobotConfig {
        const kinematics = new SwerveDriveKinematics(moduleLocations);
        return new RobotConfig(
            massKg,
            moi,
            moduleConfig,
            { kind: 'holonomic', kinematics },
            kinematics.moduleLocations
        );
    }

    /**
     * Config for a DIFFERENTIAL drive robot
     *
     * The two sides sit at (0, ±trackwidth/2), left first.
     */
    static differential(
        massKg: number,
        moi: number,
        moduleConfig: ModuleConfig,
        trackwidthMeters: number
    ): RobotConfig {
        const kinematics = new DifferentialDriveKinematics(trackwidthMeters);
        const halfTrack = trackwidthMeters / 2.0;
        return new RobotConfig(
            massKg,
            moi,
            moduleConfig,
            { kind: 'differential', kinematics },
            Object.freeze([translation(0.0, halfTrack), translation(0.0, -halfTrack)])
        );
    }

    get topology(): Topology {
        return this.drivetrain.kind;
    }

    get isHolonomic(): boolean {
        return this.drivetrain.kind === 'holonomic';
    }

    /**
     * Convert robot-relative chassis speeds to per-module states, in
     * `moduleLocations` order. Differential robots get zero steering angles
     * and drop the lateral component.
     */
    toWheelStates(speeds: ChassisSpeeds): ModuleState[] {
        const drivetrain = this.drivetrain;
        switch (drivetrain.kind) {
            case 'holonomic':
                return drivetrain.kinematics.toModuleStates(speeds);
            case 'differential': {
                const wheelSpeeds = drivetrain.kinematics.toWheelSpeeds(speeds);
                return [
                    { speedMetersPerSecond: wheelSpeeds.leftMetersPerSecond, angle: 0 },
                    { speedMetersPerSecond: wheelSpeeds.rightMetersPerSecond, angle: 0 },
                ];
            }
        }
    }

    /**
     * Convert per-module states (in `moduleLocations` order) back to
     * robot-relative chassis speeds
     */
    toChassisSpeeds(states: readonly ModuleState[]): ChassisSpeeds {
        if (states.length !== this.numModules) {
            throw new ShapeMismatchError(this.numModules, states.length);
        }

        const drivetrain = this.drivetrain;
        switch (drivetrain.kind) {
            case 'holonomic':
                return drivetrain.kinematics.toChassisSpeeds(states);
            case 'differential':
                return drivetrain.kinematics.toChassisSpeeds({
                    leftMetersPerSecond: states[0].speedMetersPerSecond,
                    rightMetersPerSecond: states[1].speedMetersPerSecond,
                });
        }
    }
}

// ==================== Topology Guards ====================

/**
 * Swerve solver of a config known to be holonomic
 */
export function requireHolonomic(config: RobotConfig): SwerveDriveKinematics {
    if (config.drivetrain.kind !== 'holonomic') {
        throw new TopologyMisuseError('holonomic', config.drivetrain.kind);
    }
    return config.drivetrain.kinematics;
}

/**
 * Differential solver of a config known to be differential
 */
export function requireDifferential(config: RobotConfig): DifferentialDriveKinematics {
    if (config.drivetrain.kind !== 'differential') {
        throw new TopologyMisuseError('differential', config.drivetrain.kind);
    }
    return config.drivetrain.kinematics;
}
