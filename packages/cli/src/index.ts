/**
 * Main entry point for the pullview CLI.
 *
 * Reads a JSON message stream from a file or stdin and renders it to
 * stdout, in place on a terminal and as a plain log otherwise.
 */

import { createReadStream } from 'fs';
import {
    StreamDisplayError,
    displayJsonMessagesToStream,
    type AuxCallback,
    type MessageSource,
    type OutputStream,
    type StreamDisplayOptions,
} from '@pullview/display';
import { createLogger, type Logger } from '@pullview/utils';
import { createProgram, type CliOptions } from './cli.js';

export { createProgram, parseWidth, type CliOptions } from './cli.js';

/**
 * Process resources the CLI works with. Replaced in tests.
 */
export interface CliIo {
    /** Message source when no file is given. */
    stdin: MessageSource;
    /** Destination of the rendered stream. */
    stdout: OutputStream;
    /** Environment for terminal detection. */
    env: Record<string, string | undefined>;
    /** Receives each `--aux` line. */
    writeAux: (line: string) => void;
    /** Logger; created from the options when unset. */
    logger?: Logger;
}

function processIo(): CliIo {
    return {
        stdin: process.stdin,
        stdout: process.stdout,
        env: process.env,
        writeAux: (line) => {
            process.stderr.write(line);
        },
    };
}

/**
 * Derives display options from the command line and environment.
 *
 * @param options - Parsed CLI options
 * @param stdout - The output, checked for being a terminal
 * @param env - Environment holding `TERM` and the terminfo paths
 * @returns Options for {@link displayJsonMessagesToStream}
 */
export function resolveDisplayConfig(
    options: CliOptions,
    stdout: OutputStream,
    env: Record<string, string | undefined>,
): Omit<StreamDisplayOptions, 'onAux'> {
    return {
        isTerminal: !options.plain && stdout.isTTY === true,
        term: options.term,
        winSize: options.width,
        env,
    };
}

function describeFailure(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }
    return String(error);
}

/**
 * Renders one message stream as configured by `options`.
 *
 * @param options - CLI options parsed from command line arguments
 * @param io - Process resources to use
 * @returns The process exit code: 0 on success, 1 on any failure
 */
export async function runMain(
    options: CliOptions,
    io: CliIo = processIo(),
): Promise<number> {
    const logger = io.logger ?? createLogger({ verbose: options.verbose });
    const config = resolveDisplayConfig(options, io.stdout, io.env);

    const onAux: AuxCallback = (message) => {
        if (options.aux) {
            io.writeAux(JSON.stringify(message.aux) + '\n');
        } else {
            logger.debug('Skipped out-of-band payload');
        }
    };

    logger.debug(
        `Reading messages from ${options.file ?? 'stdin'}` +
            (config.isTerminal ? ' (terminal output)' : ''),
    );

    try {
        const input = options.file
            ? createReadStream(options.file)
            : io.stdin;
        await displayJsonMessagesToStream(input, io.stdout, onAux, {
            ...config,
            logger,
        });
        return 0;
    } catch (error) {
        logger.error(describeFailure(error));
        if (error instanceof StreamDisplayError) {
            logger.debug(error.toDetailedString());
        }
        return 1;
    }
}

/**
 * Parses `process.argv` and runs the command.
 */
export async function main(): Promise<void> {
    await createProgram(async (options) => {
        process.exitCode = await runMain(options);
    }).parseAsync(process.argv);
}
