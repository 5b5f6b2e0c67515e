/**
 * Logging Tests
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
    ConsoleLogger,
    MemoryLogger,
    MultiLogger,
    createLogger,
    formatLogLine,
    isLevelEnabled,
    type Logger,
} from '../src/core/logging';

describe('isLevelEnabled', () => {
    it('should order levels by severity', () => {
        expect(isLevelEnabled('error', 'warn')).toBe(true);
        expect(isLevelEnabled('warn', 'warn')).toBe(true);
        expect(isLevelEnabled('info', 'warn')).toBe(false);
        expect(isLevelEnabled('debug', 'info')).toBe(false);
    });
});

describe('MemoryLogger', () => {
    beforeEach(() => {
        vi.spyOn(Date, 'now').mockReturnValue(1000);
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('should record structured entries', () => {
        const logger = new MemoryLogger({ scope: 'settings' });

        logger.info('Loaded robot config', { numModules: 4 });

        expect(logger.entries).toEqual([
            {
                schemaVersion: '1.0.0',
                level: 'info',
                scope: 'settings',
                message: 'Loaded robot config',
                timestamp: 1000,
                fields: { numModules: 4 },
            },
        ]);
    });

    it('should omit fields when none are given', () => {
        const logger = new MemoryLogger({ scope: 'settings' });

        logger.warn('no fields');

        expect('fields' in logger.entries[0]).toBe(false);
    });

    it('should drop entries below the threshold', () => {
        const logger = new MemoryLogger({ scope: 'settings', level: 'warn' });

        logger.debug('d');
        logger.info('i');
        logger.warn('w');
        logger.error('e');

        expect(logger.entries.map(entry => entry.message)).toEqual(['w', 'e']);
    });

    it('should filter entries by level', () => {
        const logger = new MemoryLogger({ scope: 'settings', level: 'debug' });

        logger.debug('d');
        logger.warn('w1');
        logger.warn('w2');

        expect(logger.getEntries('warn').map(entry => entry.message)).toEqual(['w1', 'w2']);
        expect(logger.getEntries()).toHaveLength(3);
    });

    it('should export JSONL and clear', () => {
        const logger = new MemoryLogger({ scope: 'settings', schemaVersion: '2.0.0' });

        logger.info('a');
        logger.error('b', { code: 'X' });

        expect(logger.toJSONL()).toBe(
            '{"schemaVersion":"2.0.0","level":"info","scope":"settings","message":"a","timestamp":1000}\n' +
            '{"schemaVersion":"2.0.0","level":"error","scope":"settings","message":"b","timestamp":1000,"fields":{"code":"X"}}'
        );

        logger.clear();
        expect(logger.entries).toEqual([]);
    });
});

describe('ConsoleLogger', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('should format a single line', () => {
        expect(
            formatLogLine({
                schemaVersion: '1.0.0',
                level: 'warn',
                scope: 'settings',
                message: 'Failed to load robot config',
                timestamp: 0,
                fields: { code: 'SETTINGS_READ_ERROR' },
            })
        ).toBe('[WARN] settings: Failed to load robot config {"code":"SETTINGS_READ_ERROR"}');
    });

    it('should route levels to console methods', () => {
        const log = vi.spyOn(console, 'log').mockImplementation(() => { });
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => { });
        const error = vi.spyOn(console, 'error').mockImplementation(() => { });
        const logger = new ConsoleLogger('debug');

        logger.debug('d');
        logger.info('i');
        logger.warn('w');
        logger.error('e', { n: 1 });

        expect(log.mock.calls).toEqual([['[DEBUG] drivekit: d'], ['[INFO] drivekit: i']]);
        expect(warn).toHaveBeenCalledWith('[WARN] drivekit: w');
        expect(error).toHaveBeenCalledWith('[ERROR] drivekit: e {"n":1}');
    });

    it('should default to info', () => {
        const log = vi.spyOn(console, 'log').mockImplementation(() => { });
        const logger = new ConsoleLogger();

        logger.debug('hidden');

        expect(log).not.toHaveBeenCalled();
    });
});

describe('MultiLogger', () => {
    it('should fan out to every logger', () => {
        const a = new MemoryLogger({ scope: 'a' });
        const b = new MemoryLogger({ scope: 'b', level: 'error' });
        const multi = new MultiLogger([a, b]);

        multi.warn('w');
        multi.error('e');

        expect(a.entries.map(entry => entry.message)).toEqual(['w', 'e']);
        expect(b.entries.map(entry => entry.message)).toEqual(['e']);
    });

    it('should accept any sink that implements the four level methods', () => {
        const lines: string[] = [];
        const sink: Logger = {
            debug: message => lines.push(`debug ${message}`),
            info: message => lines.push(`info ${message}`),
            warn: message => lines.push(`warn ${message}`),
            error: message => lines.push(`error ${message}`),
        };
        const multi = new MultiLogger([sink]);

        multi.info('i');
        multi.error('e');

        expect(lines).toEqual(['info i', 'error e']);
    });
});

describe('createLogger', () => {
    it('should build the requested logger', () => {
        expect(createLogger('memory', { scope: 'settings' })).toBeInstanceOf(MemoryLogger);
        expect(createLogger('console', { scope: 'settings' })).toBeInstanceOf(ConsoleLogger);
    });
});
