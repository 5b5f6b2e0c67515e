/**
 * @module core/logging
 * @description Structured logging for the loading boundary
 *
 * Every entry carries a fixed field schema (versioned, append-only).
 * The kinematics core is pure and never logs; only adapters that touch
 * the outside world (settings loading) take a Logger.
 */

// ==================== Types ====================

/**
 * Log level, in increasing severity
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Structured log entry
 */
export interface LogEntry {
    /** Schema version for compatibility */
    schemaVersion: string;
    level: LogLevel;
    /** Component that emitted the entry (e.g. 'settings') */
    scope: string;
    message: string;
    /** Timestamp in milliseconds */
    timestamp: number;
    fields?: Record<string, unknown>;
}

/**
 * Logger interface
 */
export interface Logger {
    debug(message: string, fields?: Record<string, unknown>): void;
    info(message: string, fields?: Record<string, unknown>): void;
    warn(message: string, fields?: Record<string, unknown>): void;
    error(message: string, fields?: Record<string, unknown>): void;
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
    /** Component name stamped on every entry */
    scope: string;
    /** Minimum level that is recorded */
    level?: LogLevel;
    /** Schema version */
    schemaVersion?: string;
}

// ==================== Constants ====================

const DEFAULT_SCHEMA_VERSION = '1.0.0';

const LEVEL_PRIORITY: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
};

/**
 * Whether an entry at `level` passes a `threshold`
 */
export function isLevelEnabled(level: LogLevel, threshold: LogLevel): boolean {
    return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[threshold];
}

// ==================== Base Logger ====================

abstract class LevelLogger implements Logger {
    protected readonly config: { scope: string; level: LogLevel; schemaVersion: string };

    constructor(config: LoggerConfig) {
        this.config = {
            scope: config.scope,
            level: config.level ?? 'info',
            schemaVersion: config.schemaVersion ?? DEFAULT_SCHEMA_VERSION,
        };
    }

    protected abstract write(entry: LogEntry): void;

    private log(level: LogLevel, message: string, fields?: Record<string, unknown>): void {
        if (!isLevelEnabled(level, this.config.level)) {
            return;
        }
        this.write({
            schemaVersion: this.config.schemaVersion,
            level,
            scope: this.config.scope,
            message,
            timestamp: Date.now(),
            ...(fields ? { fields } : {}),
        });
    }

    debug(message: string, fields?: Record<string, unknown>): void {
        this.log('debug', message, fields);
    }

    info(message: string, fields?: Record<string, unknown>): void {
        this.log('info', message, fields);
    }

    warn(message: string, fields?: Record<string, unknown>): void {
        this.log('warn', message, fields);
    }

    error(message: string, fields?: Record<string, unknown>): void {
        this.log('error', message, fields);
    }
}

// ==================== Console Logger ====================

/**
 * Console Logger: Print to console
 */
export class ConsoleLogger extends LevelLogger {
    constructor(levelOrConfig: LogLevel | LoggerConfig = 'info') {
        super(
            typeof levelOrConfig === 'string'
                ? { scope: 'drivekit', level: levelOrConfig }
                : levelOrConfig
        );
    }

    protected write(entry: LogEntry): void {
        const line = formatLogLine(entry);
        switch (entry.level) {
            case 'error':
                console.error(line);
                break;
            case 'warn':
                console.warn(line);
                break;
            default:
                console.log(line);
        }
    }
}

/**
 * Render an entry as a single console line: `[LEVEL] scope: message {fields}`
 */
export function formatLogLine(entry: LogEntry): string {
    const head = `[${entry.level.toUpperCase()}] ${entry.scope}: ${entry.message}`;
    return entry.fields ? `${head} ${JSON.stringify(entry.fields)}` : head;
}

// ==================== Memory Logger ====================

/**
 * Memory Logger: Store entries in memory.
 * Useful for testing and for embedding hosts that ship logs elsewhere.
 */
export class MemoryLogger extends LevelLogger {
    public entries: LogEntry[] = [];

    protected write(entry: LogEntry): void {
        this.entries.push(entry);
    }

    /** Entries, optionally only those at one level */
    getEntries(level?: LogLevel): LogEntry[] {
        return level ? this.entries.filter(entry => entry.level === level) : [...this.entries];
    }

    /** Export to JSONL string */
    toJSONL(): string {
        return this.entries.map(entry => JSON.stringify(entry)).join('\n');
    }

    clear(): void {
        this.entries = [];
    }
}

// ==================== Multi-Logger ====================

/**
 * Multi-Logger: Write to multiple loggers simultaneously
 */
export class MultiLogger implements Logger {
    private loggers: Logger[];

    constructor(loggers: Logger[]) {
        this.loggers = loggers;
    }

    debug(message: string, fields?: Record<string, unknown>): void {
        for (const logger of this.loggers) {
            logger.debug(message, fields);
        }
    }

    info(message: string, fields?: Record<string, unknown>): void {
        for (const logger of this.loggers) {
            logger.info(message, fields);
        }
    }

    warn(message: string, fields?: Record<string, unknown>): void {
        for (const logger of this.loggers) {
            logger.warn(message, fields);
        }
    }

    error(message: string, fields?: Record<string, unknown>): void {
        for (const logger of this.loggers) {
            logger.error(message, fields);
        }
    }
}

// ==================== Factory Functions ====================

/**
 * Create a logger based on format
 */
export function createLogger(
    format: 'console' | 'memory',
    config: LoggerConfig
): Logger {
    switch (format) {
        case 'console':
            return new ConsoleLogger(config);
        case 'memory':
            return new MemoryLogger(config);
    }
}
