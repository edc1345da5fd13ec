/**
 * Terminal utilities: plain ANSI escape sequences and window size queries.
 *
 * The sequences here are the fallbacks used when a capability set has
 * no answer for a lookup.
 */

/**
 * Hard-coded ANSI (ECMA-48 CSI) sequences for cursor control.
 *
 * @example
 * ```typescript
 * out.write(ansi.cursorUp(2));
 * out.write(ansi.clearToLineEnd());
 * ```
 */
export const ansi = {
    /**
     * Returns ANSI escape sequence to move the cursor up.
     * @param lines - Number of rows to move
     * @returns The escape sequence string
     */
    cursorUp: (lines: number): string => `\x1b[${lines}A`,

    /**
     * Returns ANSI escape sequence to move the cursor down.
     * @param lines - Number of rows to move
     * @returns The escape sequence string
     */
    cursorDown: (lines: number): string => `\x1b[${lines}B`,

    /**
     * Returns ANSI escape sequence to clear from the start of the line
     * to the cursor.
     * @returns The escape sequence string
     */
    clearToLineStart: (): string => '\x1b[1K',

    /**
     * Returns ANSI escape sequence to clear from the cursor to the end
     * of the line.
     * @returns The escape sequence string
     */
    clearToLineEnd: (): string => '\x1b[K',
};

/**
 * Width assumed when the terminal cannot be queried.
 */
export const DEFAULT_TERMINAL_WIDTH = 200;

/**
 * Queries the width in columns of the terminal behind a file descriptor.
 *
 * Only the process's own stdout and stderr can be queried.
 *
 * @param fd - File descriptor of the output
 * @returns Terminal width, or undefined when `fd` is not a known terminal
 */
export function queryTerminalWidth(fd: number | undefined): number | undefined {
    if (fd === undefined) {
        return undefined;
    }
    for (const stream of [process.stdout, process.stderr]) {
        if (stream.fd === fd && stream.isTTY && stream.columns > 0) {
            return stream.columns;
        }
    }
    return undefined;
}
