import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { getLogLevel, isLogLevel, logger, logToStderr, setLogLevel, type LogLevel } from './logger.js';

function spyOnStderr() {
    return vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
}

describe('logger', () => {
    let previous: LogLevel;
    let write: ReturnType<typeof spyOnStderr>;

    beforeEach(() => {
        previous = getLogLevel();
        write = spyOnStderr();
    });

    afterEach(() => {
        setLogLevel(previous);
        vi.restoreAllMocks();
    });

    it('writes prefixed lines to stderr', () => {
        setLogLevel('info');
        logToStderr('warning', 'careful');
        expect(write).toHaveBeenCalledWith('[docx-model] [warning] careful\n');
    });

    it('drops levels below the threshold', () => {
        setLogLevel('warning');
        logger.info('hidden');
        logger.debug('hidden');
        logger.error('shown');
        expect(write.mock.calls.map(([line]) => line)).toEqual(['[docx-model] [error] shown\n']);
    });

    it('formats extra arguments', () => {
        setLogLevel('debug');
        logger.debug('values', 'text', { a: 1 }, new Error('boom'));
        expect(write).toHaveBeenCalledWith('[docx-model] [debug] values text {"a":1} boom\n');
    });

    it('recognises log levels', () => {
        expect(isLogLevel('warning')).toBe(true);
        expect(isLogLevel('verbose')).toBe(false);
        expect(isLogLevel(undefined)).toBe(false);
    });
});
