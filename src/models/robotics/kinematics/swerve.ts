import { ConfigurationError, ShapeMismatchError } from '../../../core/errors';
import {
    leastSquaresSolver3,
    type LeastSquaresSolver3,
} from '../../numeric/math/linear-algebra';
import type { ChassisSpeeds, ModuleState, Translation2d } from './types';
import { normalizeAngle, translation } from './utils';

const ORIGIN: Translation2d = translation(0, 0);

/**
 * Holonomic (swerve) drive kinematics
 *
 * Each module can steer independently, so any chassis twist is realizable.
 * Module i at (xᵢ, yᵢ) contributes two rows to the inverse-kinematics matrix:
 *
 *   [1, 0, -yᵢ]   [vx]   [vxᵢ]
 *   [0, 1,  xᵢ] · [vy] = [vyᵢ]
 *                 [ω ]
 *
 * Forward kinematics is the least-squares solution of that 2N x 3 system
 * (`leastSquaresSolver3`), exact whenever the module states come from a
 * rigid-body twist.
 */
export class SwerveDriveKinematics {
    readonly moduleLocations: readonly Translation2d[];
    readonly numModules: number;
    private readonly forwardSolver: LeastSquaresSolver3;

    constructor(moduleLocations: readonly Translation2d[]) {
        if (moduleLocations.length < 2) {
            throw new ConfigurationError(
                `A swerve drive requires at least 2 modules, got ${moduleLocations.length}`
            );
        }
        for (const [i, loc] of moduleLocations.entries()) {
            if (!Number.isFinite(loc.x) || !Number.isFinite(loc.y)) {
                throw new ConfigurationError(`Module location ${i} is not finite`, { index: i, location: loc });
            }
        }

        this.moduleLocations = Object.freeze(moduleLocations.map(loc => translation(loc.x, loc.y)));
        this.numModules = this.moduleLocations.length;
        this.forwardSolver = createForwardSolver(this.moduleLocations);

        Object.freeze(this);
    }

    /**
     * Per-module speed and steering angle realizing `speeds`
     *
     * @param centerOfRotation - Point the robot rotates about (default: robot center)
     */
    toModuleStates(speeds: ChassisSpeeds, centerOfRotation: Translation2d = ORIGIN): ModuleState[] {
        const { vxMetersPerSecond: vx, vyMetersPerSecond: vy, omegaRadiansPerSecond: omega } = speeds;

        return this.moduleLocations.map(loc => {
            const moduleVx = vx - omega * (loc.y - centerOfRotation.y);
            const moduleVy = vy + omega * (loc.x - centerOfRotation.x);
            return {
                speedMetersPerSecond: Math.hypot(moduleVx, moduleVy),
                angle: normalizeAngle(Math.atan2(moduleVy, moduleVx)),
            };
        });
    }

    /**
     * Chassis twist best matching the measured module states
     */
    toChassisSpeeds(states: readonly ModuleState[]): ChassisSpeeds {
        if (states.length !== this.numModules) {
            throw new ShapeMismatchError(this.numModules, states.length);
        }

        const moduleVelocities: number[] = [];
        for (const state of states) {
            moduleVelocities.push(
                state.speedMetersPerSecond * Math.cos(state.angle),
                state.speedMetersPerSecond * Math.sin(state.angle)
            );
        }

        const [vx, vy, omega] = this.forwardSolver.solve(moduleVelocities);
        return { vxMetersPerSecond: vx, vyMetersPerSecond: vy, omegaRadiansPerSecond: omega };
    }
}

function buildInverseMatrix(
    locations: readonly Translation2d[],
    center: Translation2d
): number[][] {
    const rows: number[][] = [];
    for (const loc of locations) {
        rows.push([1, 0, -(loc.y - center.y)]);
        rows.push([0, 1, loc.x - center.x]);
    }
    return rows;
}

// Coincident modules make the rotation column dependent on the others
function createForwardSolver(locations: readonly Translation2d[]): LeastSquaresSolver3 {
    try {
        return leastSquaresSolver3(buildInverseMatrix(locations, ORIGIN));
    } catch (error) {
        throw new ConfigurationError('Module locations are degenerate (all modules coincide)', {
            moduleLocations: locations,
            cause: error,
        });
    }
}
