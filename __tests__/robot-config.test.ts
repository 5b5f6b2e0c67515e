/**
 * RobotConfig Tests
 * Tests for construction, derived constants, conversions and topology guards
 */

import { describe, it, expect } from 'vitest';
import {
    GRAVITY,
    RobotConfig,
    requireDifferential,
    requireHolonomic,
} from '../src/config/robot-config';
import { SwerveDriveKinematics } from '../src/models/robotics/kinematics/swerve';
import { DifferentialDriveKinematics } from '../src/models/robotics/kinematics/differential';
import { chassisSpeeds, translation } from '../src/models/robotics/kinematics/utils';
import {
    ConfigurationError,
    ErrorCodes,
    ShapeMismatchError,
    TopologyMisuseError,
} from '../src/core/errors';
import { speedsClose, testModuleConfig } from './test-utils';

// ==================== Holonomic ====================

describe('RobotConfig (holonomic)', () => {
    const robot = RobotConfig.holonomic(50, 5, testModuleConfig(), 0.6, 0.5);

    describe('geometry', () => {
        it('should place modules front-left, front-right, back-left, back-right', () => {
            expect(robot.moduleLocations).toEqual([
                { x: 0.25, y: 0.3 },
                { x: 0.25, y: -0.3 },
                { x: -0.25, y: 0.3 },
                { x: -0.25, y: -0.3 },
            ]);
            expect(robot.numModules).toBe(4);
        });

        it('should compute module pivot distances', () => {
            const expected = Math.sqrt(0.25 * 0.25 + 0.3 * 0.3);
            expect(robot.modulePivotDistance).toHaveLength(4);
            for (const distance of robot.modulePivotDistance) {
                expect(distance).toBeCloseTo(expected, 12);
            }
        });

        it('should place modules at half the wheelbase and trackwidth for any dimensions', () => {
            const dimensions: [number, number][] = [
                [0.6, 0.5],
                [0.4, 0.8],
                [1.2, 1.2],
                [0.3, 0.25],
            ];

            for (const [trackwidth, wheelbase] of dimensions) {
                const sized = RobotConfig.holonomic(50, 5, testModuleConfig(), trackwidth, wheelbase);
                const x = wheelbase / 2;
                const y = trackwidth / 2;

                expect(sized.moduleLocations).toEqual([
                    { x, y },
                    { x, y: -y },
                    { x: -x, y },
                    { x: -x, y: -y },
                ]);
                for (const distance of sized.modulePivotDistance) {
                    expect(distance).toBeCloseTo(Math.hypot(x, y), 12);
                }
            }
        });

        it('should report its topology', () => {
            expect(robot.topology).toBe('holonomic');
            expect(robot.isHolonomic).toBe(true);
        });
    });

    describe('friction limits', () => {
        it('should split the weight evenly across the wheels', () => {
            // 1.0 · (50 / 4) · 9.8
            expect(robot.wheelFrictionForce).toBeCloseTo(122.5, 10);
        });

        it('should convert friction force to wheel torque', () => {
            expect(robot.maxTorqueFriction).toBeCloseTo(122.5 * 0.05, 10);
        });

        it('should scale with the friction coefficient', () => {
            const grippy = RobotConfig.holonomic(50, 5, testModuleConfig({ wheelCof: 1.5 }), 0.6, 0.5);
            expect(grippy.wheelFrictionForce).toBeCloseTo(1.5 * 12.5 * GRAVITY, 10);
        });
    });

    describe('conversions', () => {
        it('should produce the swerve module states', () => {
            const states = robot.toWheelStates(chassisSpeeds(1, 0, 0));

            expect(states).toHaveLength(4);
            for (const state of states) {
                expect(state.speedMetersPerSecond).toBe(1);
                expect(state.angle).toBe(0);
            }
        });

        it('should round-trip chassis speeds', () => {
            const speeds = chassisSpeeds(2.0, -1.0, 1.5);
            const recovered = robot.toChassisSpeeds(robot.toWheelStates(speeds));

            expect(speedsClose(recovered, speeds)).toBe(true);
        });

        it('should round-trip translation, rotation and mixed speeds in every direction', () => {
            const cases: [number, number, number][] = [
                [-3.0, 0.5, -2.0],
                [0, 0, 2.5],
                [0, 0, -4.0],
                [1.5, 0, 0],
                [0, -2.0, 0],
                [-0.4, -0.7, 0.9],
            ];
            const narrow = RobotConfig.holonomic(50, 5, testModuleConfig(), 0.4, 0.8);

            for (const [vx, vy, omega] of cases) {
                const speeds = chassisSpeeds(vx, vy, omega);

                expect(speedsClose(robot.toChassisSpeeds(robot.toWheelStates(speeds)), speeds)).toBe(true);
                expect(speedsClose(narrow.toChassisSpeeds(narrow.toWheelStates(speeds)), speeds)).toBe(true);
            }
        });

        it('should reject a wrong number of states', () => {
            const states = robot.toWheelStates(chassisSpeeds(1, 0, 0));
            states.push({ speedMetersPerSecond: 0, angle: 0 });

            expect(() => robot.toChassisSpeeds(states)).toThrow(ShapeMismatchError);
            expect(() => robot.toChassisSpeeds(states)).toThrow('Expected 4 module states, got 5');
        });
    });

    describe('topology guards', () => {
        it('should hand out the swerve solver', () => {
            expect(requireHolonomic(robot)).toBeInstanceOf(SwerveDriveKinematics);
        });

        it('should refuse the differential solver', () => {
            expect(() => requireDifferential(robot)).toThrow(TopologyMisuseError);
            expect(() => requireDifferential(robot)).toThrow('Expected a differential drivetrain, got holonomic');
        });
    });

    it('should be immutable', () => {
        expect(Object.isFrozen(robot)).toBe(true);
        expect(Object.isFrozen(robot.moduleLocations)).toBe(true);
        expect(Object.isFrozen(robot.modulePivotDistance)).toBe(true);
        expect(Object.isFrozen(robot.drivetrain)).toBe(true);
    });
});

// ==================== Custom Layouts ====================

describe('RobotConfig.holonomicFromLocations', () => {
    it('should accept three modules', () => {
        const robot = RobotConfig.holonomicFromLocations(30, 2, testModuleConfig(), [
            translation(0.3, 0),
            translation(-0.2, 0.25),
            translation(-0.2, -0.25),
        ]);

        expect(robot.numModules).toBe(3);
        expect(robot.modulePivotDistance[0]).toBeCloseTo(0.3, 12);
        expect(robot.wheelFrictionForce).toBeCloseTo(10 * GRAVITY, 10);

        const speeds = chassisSpeeds(0.5, 0.5, -1);
        expect(speedsClose(robot.toChassisSpeeds(robot.toWheelStates(speeds)), speeds)).toBe(true);
    });

    it('should reject degenerate layouts', () => {
        expect(() =>
            RobotConfig.holonomicFromLocations(30, 2, testModuleConfig(), [translation(0, 0)])
        ).toThrow(ConfigurationError);
    });
});

// ==================== Differential ====================

describe('RobotConfig (differential)', () => {
    const robot = RobotConfig.differential(40, 3, testModuleConfig(), 0.6);

    it('should place the sides at half the trackwidth, left first', () => {
        expect(robot.moduleLocations).toEqual([
            { x: 0, y: 0.3 },
            { x: 0, y: -0.3 },
        ]);
        expect(robot.modulePivotDistance[0]).toBeCloseTo(0.3, 12);
        expect(robot.modulePivotDistance[1]).toBeCloseTo(0.3, 12);
        expect(robot.topology).toBe('differential');
        expect(robot.isHolonomic).toBe(false);
    });

    it('should split the weight across two sides', () => {
        expect(robot.wheelFrictionForce).toBeCloseTo(196, 10);
    });

    it('should produce zero-angle wheel states', () => {
        const states = robot.toWheelStates(chassisSpeeds(2.0, 0.7, 1.0));

        expect(states).toHaveLength(2);
        expect(states[0].speedMetersPerSecond).toBeCloseTo(1.7, 12);
        expect(states[1].speedMetersPerSecond).toBeCloseTo(2.3, 12);
        expect(states[0].angle).toBe(0);
        expect(states[1].angle).toBe(0);
    });

    it('should recover forward and angular speed', () => {
        const speeds = robot.toChassisSpeeds([
            { speedMetersPerSecond: 1.7, angle: 0 },
            { speedMetersPerSecond: 2.3, angle: 0 },
        ]);

        expect(speeds.vxMetersPerSecond).toBeCloseTo(2.0, 12);
        expect(speeds.vyMetersPerSecond).toBe(0);
        expect(speeds.omegaRadiansPerSecond).toBeCloseTo(1.0, 12);
    });

    it('should round-trip forward and angular speed in both directions', () => {
        const cases: [number, number][] = [
            [2.0, 1.0],
            [-1.5, 0.5],
            [0, 3.0],
            [0, -2.0],
            [1.2, 0],
            [-0.8, -1.1],
        ];

        for (const [vx, omega] of cases) {
            const speeds = chassisSpeeds(vx, 0, omega);

            expect(speedsClose(robot.toChassisSpeeds(robot.toWheelStates(speeds)), speeds)).toBe(true);
        }
    });

    it('should reject a wrong number of states', () => {
        let caught: unknown;
        try {
            robot.toChassisSpeeds([{ speedMetersPerSecond: 1, angle: 0 }]);
        } catch (error) {
            caught = error;
        }

        expect(caught).toBeInstanceOf(ShapeMismatchError);
        if (caught instanceof ShapeMismatchError) {
            expect(caught.code).toBe(ErrorCodes.SHAPE_MISMATCH);
            expect(caught.expected).toBe(2);
            expect(caught.actual).toBe(1);
        }
    });

    it('should hand out only the differential solver', () => {
        expect(requireDifferential(robot)).toBeInstanceOf(DifferentialDriveKinematics);
        expect(requireDifferential(robot).trackwidthMeters).toBe(0.6);
        expect(() => requireHolonomic(robot)).toThrow('Expected a holonomic drivetrain, got differential');
    });
});

// ==================== Validation ====================

describe('RobotConfig validation', () => {
    it('should reject non-positive mass and MOI', () => {
        expect(() => RobotConfig.holonomic(0, 5, testModuleConfig(), 0.6, 0.5)).toThrow(
            'massKg must be a positive finite number, got 0'
        );
        expect(() => RobotConfig.differential(40, -1, testModuleConfig(), 0.6)).toThrow(
            'moi must be a positive finite number, got -1'
        );
    });

    it('should require a positive friction coefficient', () => {
        expect(() => RobotConfig.holonomic(50, 5, testModuleConfig({ wheelCof: 0 }), 0.6, 0.5)).toThrow(
            'wheelCof must be a positive finite number, got 0'
        );
    });

    it('should reject non-positive dimensions', () => {
        expect(() => RobotConfig.holonomic(50, 5, testModuleConfig(), 0, 0.5)).toThrow(
            'trackwidthMeters must be a positive finite number, got 0'
        );
        expect(() => RobotConfig.holonomic(50, 5, testModuleConfig(), 0.6, NaN)).toThrow(ConfigurationError);
        expect(() => RobotConfig.differential(40, 3, testModuleConfig(), 0)).toThrow(
            'Trackwidth must be a positive finite number, got 0'
        );
    });
});
