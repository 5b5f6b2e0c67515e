/**
 * @module core
 * @description Cross-cutting foundations shared by models and config
 *
 * ## Modules
 * - `logging`: Structured, level-filtered logging
 * - `errors`: Unified error types and codes
 */

// ==================== Logging ====================

export type {
    LogLevel,
    LogEntry,
    Logger,
    LoggerConfig,
} from './logging';

export {
    ConsoleLogger,
    MemoryLogger,
    MultiLogger,
    createLogger,
    formatLogLine,
    isLevelEnabled,
} from './logging';

// ==================== Errors ====================

export {
    ErrorCodes,
    DrivekitError,
    ConfigurationError,
    UnsupportedMotorError,
    ShapeMismatchError,
    TopologyMisuseError,
    isDrivekitError,
    hasErrorCode,
    wrapError,
} from './errors';

export type { ErrorCode } from './errors';
