/**
 * Timestamped, chalk-colored logging for pullview.
 *
 * Log lines go to stderr by default so they never interleave with the
 * rendered message stream on stdout.
 */

import { Chalk, type ChalkInstance } from 'chalk';

/**
 * Minimal logging surface accepted by pullview packages.
 */
export interface Logger {
    /** Diagnostic detail, only emitted in verbose mode. */
    debug(message: string): void;
    info(message: string): void;
    warn(message: string): void;
    error(message: string): void;
}

/**
 * Options for {@link createLogger}.
 */
export interface LoggerOptions {
    /** Emit `debug` lines (default: false). */
    verbose?: boolean;
    /** Destination for complete log lines (default: stderr). */
    write?: (line: string) => void;
    /** Colorize output; defaults to chalk's terminal detection. */
    color?: boolean;
    /** Clock used for line timestamps (default: system clock). */
    now?: () => Date;
}

/**
 * Formats a time of day as `HH:MM:SS.mmm`.
 */
function formatClock(date: Date): string {
    const time = date.toLocaleTimeString('en-US', {
        hour12: false,
        hour: '2-digit',
        minute: '2-digit',
        second: '2-digit',
    });
    return `${time}.${date.getMilliseconds().toString().padStart(3, '0')}`;
}

function selectChalk(color: boolean | undefined): ChalkInstance {
    if (color === undefined) {
        return new Chalk();
    }
    return new Chalk({ level: color ? 1 : 0 });
}

/**
 * Creates a logger that prefixes each line with a timestamp and colors
 * it by level.
 *
 * @param options - Logger configuration
 * @returns A logger writing one line per call
 *
 * @example
 * ```typescript
 * const logger = createLogger({ verbose: true });
 * logger.debug('terminfo for xterm loaded');
 * logger.error('authentication is required');
 * ```
 */
export function createLogger(options: LoggerOptions = {}): Logger {
    const {
        verbose = false,
        write = (line: string) => {
            process.stderr.write(line + '\n');
        },
        now = () => new Date(),
    } = options;
    const colors = selectChalk(options.color);

    const emit = (paint: (text: string) => string, message: string) => {
        write(paint(`[${formatClock(now())}] ${message}`));
    };

    return {
        debug(message) {
            if (verbose) {
                emit(colors.gray, message);
            }
        },
        info(message) {
            emit(colors.cyan, message);
        },
        warn(message) {
            emit(colors.yellow, message);
        },
        error(message) {
            emit(colors.red, message);
        },
    };
}

/**
 * Logger that discards everything. Default for library entry points.
 */
export const silentLogger: Logger = {
    debug() {},
    info() {},
    warn() {},
    error() {},
};
