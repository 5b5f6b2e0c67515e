/**
 * @module src/models
 * @description Physical and kinematic models of a wheeled robot
 *
 * Organized into logical categories:
 * - robotics/: Kinematics + motors + module configuration
 * - numeric/: Small dense linear algebra
 * - utils/: Unit conversions
 */

export * as robotics from './robotics';
export * as numeric from './numeric';
export * as utils from './utils';
