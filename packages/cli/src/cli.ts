/**
 * Command line argument parsing and CLI setup for pullview.
 *
 * This module defines the command, its options, and their parsing using
 * commander.js. It exports the parsed option type used by the runner.
 */

import { Command, InvalidArgumentError } from 'commander';
import { VERSION } from '@pullview/utils';

/**
 * Parsed options of the `pullview` command.
 */
export interface CliOptions {
    /** File to read messages from; stdin when unset. */
    file?: string;
    /** Render as a plain log even when stdout is a terminal. */
    plain: boolean;
    /** Terminal type for capability lookup; overrides `TERM`. */
    term?: string;
    /** Fixed window width in columns. */
    width?: number;
    /** Print out-of-band payloads to stderr. */
    aux: boolean;
    /** Enable verbose logging. */
    verbose: boolean;
}

/**
 * Raw options as returned by commander, before defaults are applied.
 */
interface RawCliOptions {
    plain?: boolean;
    term?: string;
    width?: number;
    aux?: boolean;
    verbose?: boolean;
}

/**
 * Parses the `--width` value.
 *
 * @param value - Raw option value
 * @returns The width in columns
 * @throws {InvalidArgumentError} When the value is not a positive integer
 */
export function parseWidth(value: string): number {
    const width = Number(value);
    if (!/^\d+$/.test(value) || width <= 0) {
        throw new InvalidArgumentError('Must be a positive integer.');
    }
    return width;
}

/**
 * Creates the `pullview` command.
 *
 * The command does nothing itself: parsed options are handed to `run`.
 *
 * @param run - Receives the options once parsing succeeds
 * @returns The configured commander program
 *
 * @example
 * ```typescript
 * await createProgram(async (options) => {
 *     process.exitCode = await runMain(options);
 * }).parseAsync(process.argv);
 * ```
 */
export function createProgram(
    run: (options: CliOptions) => Promise<void>,
): Command {
    const program = new Command();

    program
        .name('pullview')
        .description(
            'Render a stream of JSON progress messages as a log, or as ' +
                'live progress rows on a terminal.',
        )
        .version(VERSION)
        .argument('[file]', 'File to read messages from (default: stdin)')
        .option('--plain', 'Never rewrite lines in place', false)
        .option('--term <name>', 'Terminal type (default: $TERM)')
        .option('--width <columns>', 'Fixed terminal width', parseWidth)
        .option('--aux', 'Print out-of-band payloads to stderr', false)
        .option('-v, --verbose', 'Enable verbose logging', false)
        .action(async (file: string | undefined, opts: RawCliOptions) => {
            await run({
                file,
                plain: opts.plain || false,
                term: opts.term,
                width: opts.width,
                aux: opts.aux || false,
                verbose: opts.verbose || false,
            });
        });

    return program;
}
