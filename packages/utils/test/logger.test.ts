import { describe, it, expect } from 'vitest';
import { createLogger, silentLogger } from '../src/index.js';

const LINE = /^\[\d{2}:\d{2}:\d{2}\.\d{3}\] /;

function collect(verbose = false) {
    const lines: string[] = [];
    const logger = createLogger({
        verbose,
        color: false,
        write: (line) => lines.push(line),
        now: () => new Date(2024, 0, 2, 3, 4, 5, 6),
    });
    return { lines, logger };
}

describe('createLogger', () => {
    it('should prefix lines with a millisecond timestamp', () => {
        const { lines, logger } = collect();
        logger.info('pulling layers');

        expect(lines).toEqual(['[03:04:05.006] pulling layers']);
    });

    it('should drop debug lines unless verbose', () => {
        const quiet = collect(false);
        quiet.logger.debug('hidden');
        expect(quiet.lines).toEqual([]);

        const loud = collect(true);
        loud.logger.debug('shown');
        expect(loud.lines).toHaveLength(1);
        expect(loud.lines[0]).toMatch(LINE);
        expect(loud.lines[0].endsWith('shown')).toBe(true);
    });

    it('should write warnings and errors', () => {
        const { lines, logger } = collect();
        logger.warn('slow');
        logger.error('failed');

        expect(lines.map((line) => line.replace(LINE, ''))).toEqual([
            'slow',
            'failed',
        ]);
    });

    it('should colorize when color is enabled', () => {
        const lines: string[] = [];
        const logger = createLogger({
            color: true,
            write: (line) => lines.push(line),
        });
        logger.error('boom');

        expect(lines[0].startsWith('\x1b[31m')).toBe(true);
    });
});

describe('silentLogger', () => {
    it('should accept every level without output', () => {
        expect(() => {
            silentLogger.debug('a');
            silentLogger.info('b');
            silentLogger.warn('c');
            silentLogger.error('d');
        }).not.toThrow();
    });
});
