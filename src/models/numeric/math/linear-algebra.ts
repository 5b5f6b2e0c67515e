/**
 * @module math/linear-algebra
 * @description Lightweight linear algebra for kinematics inversion.
 * Vector and 3x3 matrix operations without external dependencies.
 */

import { ConfigurationError } from '../../../core/errors';

// ==================== Vector Operations ====================

/**
 * Compute the dot product of two vectors
 */
export function dot(a: readonly number[], b: readonly number[]): number {
    let sum = 0;
    for (let i = 0; i < a.length; i++) {
        sum += a[i] * b[i];
    }
    return sum;
}

/**
 * Compute the Euclidean norm (L2 norm) of a vector
 */
export function norm(v: readonly number[]): number {
    return Math.sqrt(dot(v, v));
}

// ==================== 3D Types ====================

export type Vec3 = [number, number, number];

export type Mat3 = [[number, number, number], [number, number, number], [number, number, number]];

// ==================== Matrix Operations ====================

/**
 * Create a 3x3 zero matrix
 */
export function zeroMat3(): Mat3 {
    return [
        [0, 0, 0],
        [0, 0, 0],
        [0, 0, 0]
    ];
}

/**
 * Multiply a 3x3 matrix by a 3D vector
 */
export function mulMatVec3(M: Mat3, v: Vec3): Vec3 {
    return [
        M[0][0] * v[0] + M[0][1] * v[1] + M[0][2] * v[2],
        M[1][0] * v[0] + M[1][1] * v[1] + M[1][2] * v[2],
        M[2][0] * v[0] + M[2][1] * v[1] + M[2][2] * v[2]
    ];
}

/**
 * Transpose a 3x3 matrix
 */
export function transpose3(M: Mat3): Mat3 {
    return [
        [M[0][0], M[1][0], M[2][0]],
        [M[0][1], M[1][1], M[2][1]],
        [M[0][2], M[1][2], M[2][2]]
    ];
}

/**
 * Compute the determinant of a 3x3 matrix
 */
export function det3(M: Mat3): number {
    return (
        M[0][0] * (M[1][1] * M[2][2] - M[1][2] * M[2][1]) -
        M[0][1] * (M[1][0] * M[2][2] - M[1][2] * M[2][0]) +
        M[0][2] * (M[1][0] * M[2][1] - M[1][1] * M[2][0])
    );
}

/**
 * Cholesky decomposition of a 3x3 positive definite matrix.
 * Returns lower triangular matrix L such that A = L * L^T.
 * Throws when a pivot vanishes relative to its diagonal entry.
 */
export function cholesky3(A: Mat3): Mat3 {
    const L = zeroMat3();

    L[0][0] = Math.sqrt(checkPivot(A[0][0], A[0][0], 0));
    L[1][0] = 0.5 * (A[0][1] + A[1][0]) / L[0][0];
    L[1][1] = Math.sqrt(checkPivot(A[1][1] - L[1][0] * L[1][0], A[1][1], 1));
    L[2][0] = 0.5 * (A[0][2] + A[2][0]) / L[0][0];
    L[2][1] = (0.5 * (A[1][2] + A[2][1]) - L[2][0] * L[1][0]) / L[1][1];
    L[2][2] = Math.sqrt(checkPivot(A[2][2] - L[2][0] * L[2][0] - L[2][1] * L[2][1], A[2][2], 2));

    return L;
}

function checkPivot(pivot: number, diagonal: number, index: number): number {
    if (!Number.isFinite(pivot) || pivot <= PIVOT_TOLERANCE * Math.abs(diagonal)) {
        throw new ConfigurationError('Matrix is not positive definite', { index, pivot });
    }
    return pivot;
}

const PIVOT_TOLERANCE = 1e-12;

/**
 * Solve (L * L^T) x = b given the Cholesky factor L
 */
export function solveCholesky3(L: Mat3, b: Vec3): Vec3 {
    // Forward substitution: L z = b
    const z0 = b[0] / L[0][0];
    const z1 = (b[1] - L[1][0] * z0) / L[1][1];
    const z2 = (b[2] - L[2][0] * z0 - L[2][1] * z1) / L[2][2];

    // Back substitution: L^T x = z
    const x2 = z2 / L[2][2];
    const x1 = (z1 - L[2][1] * x2) / L[1][1];
    const x0 = (z0 - L[1][0] * x1 - L[2][0] * x2) / L[0][0];

    return [x0, x1, x2];
}

/**
 * Normal matrix A^T A of an N x 3 system
 */
export function normalMatrix(A: readonly (readonly number[])[]): Mat3 {
    const N = zeroMat3();
    for (const row of A) {
        for (let i = 0; i < 3; i++) {
            for (let j = 0; j < 3; j++) {
                N[i][j] += row[i] * row[j];
            }
        }
    }
    return N;
}

/**
 * Right-hand side A^T b of the normal equations
 */
export function normalRhs(A: readonly (readonly number[])[], b: readonly number[]): Vec3 {
    const r: Vec3 = [0, 0, 0];
    for (let k = 0; k < A.length; k++) {
        for (let i = 0; i < 3; i++) {
            r[i] += A[k][i] * b[k];
        }
    }
    return r;
}

/**
 * Least-squares solver for a fixed N x 3 matrix A
 */
export interface LeastSquaresSolver3 {
    readonly rows: number;
    /** Minimum-residual x for A x ≈ b */
    solve(b: readonly number[]): Vec3;
}

/**
 * Factor the normal equations of A once, for repeated solves against new right-hand sides.
 * Throws when A does not have full column rank.
 */
export function leastSquaresSolver3(A: readonly (readonly number[])[]): LeastSquaresSolver3 {
    const L = cholesky3(normalMatrix(A));
    return {
        rows: A.length,
        solve(b: readonly number[]): Vec3 {
            if (b.length !== A.length) {
                throw new ConfigurationError(`Row count ${A.length} does not match rhs length ${b.length}`);
            }
            return solveCholesky3(L, normalRhs(A, b));
        },
    };
}

/**
 * Least-squares solution of an N x 3 system A x ≈ b via the normal equations.
 * Exact when the system is consistent and A has full column rank.
 */
export function leastSquares3(A: readonly (readonly number[])[], b: readonly number[]): Vec3 {
    if (A.length !== b.length) {
        throw new ConfigurationError(`Row count ${A.length} does not match rhs length ${b.length}`);
    }
    return leastSquaresSolver3(A).solve(b);
}
