/**
 * Motor module type definitions
 */

/**
 * Per-wheel force/speed capability consumed by the drivetrain models.
 * Implementations describe the motor *after* any gear reduction, so speeds
 * are wheel-shaft speeds and torques are wheel-shaft torques.
 */
export interface DriveMotor {
    /** Free (no-load) speed at nominal voltage (rad/s) */
    readonly freeSpeedRadPerSec: number;
    /** Stall torque at nominal voltage (N·m) */
    readonly stallTorqueNewtonMeters: number;
    /** Current drawn at a shaft speed under an applied voltage (A) */
    getCurrent(speedRadPerSec: number, voltageInputVolts: number): number;
    /** Torque produced by a current (N·m) */
    getTorque(currentAmps: number): number;
    /** Voltage needed to hold a torque at a speed (V) */
    getVoltage(torqueNewtonMeters: number, speedRadPerSec: number): number;
    /** Shaft speed under a load torque and applied voltage (rad/s) */
    getSpeed(torqueNewtonMeters: number, voltageInputVolts: number): number;
}

/**
 * Datasheet parameters of a single brushed/brushless DC motor
 */
export interface DCMotorParams {
    /** Voltage at which the datasheet values were measured (V) */
    nominalVoltageVolts: number;
    /** Stall torque (N·m) */
    stallTorqueNewtonMeters: number;
    /** Stall current (A) */
    stallCurrentAmps: number;
    /** Free (no-load) current (A) */
    freeCurrentAmps: number;
    /** Free (no-load) speed (rad/s) */
    freeSpeedRadPerSec: number;
}
