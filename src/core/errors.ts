/**
 * @module core/errors
 * @description Error types and error codes shared by every drivekit module
 *
 * Construction and shape errors are thrown synchronously at the call site.
 * Nothing is retried: every operation is a deterministic function of its inputs.
 */

// ==================== Error Codes ====================

/**
 * Standard error codes for the drivekit library
 */
export const ErrorCodes = {
    // Construction Errors
    /** Non-positive, non-finite or missing parameter, or malformed geometry */
    INVALID_CONFIG: 'INVALID_CONFIG',
    /** Motor identifier not found in the motor catalog */
    UNSUPPORTED_MOTOR: 'UNSUPPORTED_MOTOR',

    // Usage Errors
    /** Wheel-state sequence length differs from the module count */
    SHAPE_MISMATCH: 'SHAPE_MISMATCH',
    /** Topology-specific solver requested on the other topology */
    TOPOLOGY_MISUSE: 'TOPOLOGY_MISUSE',

    // I/O Errors
    /** Settings file could not be read */
    SETTINGS_READ_ERROR: 'SETTINGS_READ_ERROR',
    /** Anything not covered above */
    INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

// ==================== Error Classes ====================

/**
 * Base error class for drivekit
 */
export class DrivekitError extends Error {
    readonly code: ErrorCode;
    readonly details?: unknown;
    readonly timestamp: number;

    constructor(code: ErrorCode, message: string, details?: unknown) {
        super(message);
        this.name = 'DrivekitError';
        this.code = code;
        this.details = details;
        this.timestamp = Date.now();

        // Maintain proper stack trace in V8
        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, DrivekitError);
        }
    }

    /**
     * Convert to JSON-serializable object
     */
    toJSON(): {
        name: string;
        code: ErrorCode;
        message: string;
        details: unknown;
        timestamp: number;
    } {
        return {
            name: this.name,
            code: this.code,
            message: this.message,
            details: this.details,
            timestamp: this.timestamp,
        };
    }
}

/**
 * Invalid construction parameter (mass, MOI, wheel radius, geometry, settings record)
 */
export class ConfigurationError extends DrivekitError {
    constructor(message: string, details?: unknown) {
        super(ErrorCodes.INVALID_CONFIG, message, details);
        this.name = 'ConfigurationError';
    }
}

/**
 * Motor type identifier outside the motor catalog
 */
export class UnsupportedMotorError extends DrivekitError {
    readonly motorType: string;
    readonly supported: readonly string[];

    constructor(motorType: string, supported: readonly string[]) {
        super(
            ErrorCodes.UNSUPPORTED_MOTOR,
            `Unsupported motor type: ${motorType}`,
            { motorType, supported }
        );
        this.name = 'UnsupportedMotorError';
        this.motorType = motorType;
        this.supported = supported;
    }
}

/**
 * Per-module sequence whose length does not match the robot's module count
 */
export class ShapeMismatchError extends DrivekitError {
    readonly expected: number;
    readonly actual: number;

    constructor(expected: number, actual: number) {
        super(
            ErrorCodes.SHAPE_MISMATCH,
            `Expected ${expected} module states, got ${actual}`,
            { expected, actual }
        );
        this.name = 'ShapeMismatchError';
        this.expected = expected;
        this.actual = actual;
    }
}

/**
 * Topology-specific access on a config of the other topology
 */
export class TopologyMisuseError extends DrivekitError {
    readonly expected: string;
    readonly actual: string;

    constructor(expected: string, actual: string) {
        super(
            ErrorCodes.TOPOLOGY_MISUSE,
            `Expected a ${expected} drivetrain, got ${actual}`,
            { expected, actual }
        );
        this.name = 'TopologyMisuseError';
        this.expected = expected;
        this.actual = actual;
    }
}

// ==================== Error Utilities ====================

/**
 * Check if an error is a DrivekitError
 */
export function isDrivekitError(error: unknown): error is DrivekitError {
    return error instanceof DrivekitError;
}

/**
 * Check if an error has a specific error code
 */
export function hasErrorCode(error: unknown, code: ErrorCode): boolean {
    return isDrivekitError(error) && error.code === code;
}

/**
 * Wrap any error into a DrivekitError
 */
export function wrapError(error: unknown, defaultCode: ErrorCode = ErrorCodes.INTERNAL_ERROR): DrivekitError {
    if (isDrivekitError(error)) {
        return error;
    }

    if (error instanceof Error) {
        return new DrivekitError(defaultCode, error.message, {
            originalName: error.name,
            originalStack: error.stack,
        });
    }

    return new DrivekitError(defaultCode, String(error));
}
