/**
 * Cursor movement and line clearing through a capability set, falling
 * back to plain ANSI sequences for lookups the set cannot answer.
 */

import type { CapabilitySet } from './capabilities.js';
import { ansi } from './terminal.js';

/**
 * Anything text can be written to. Failures surface as thrown errors.
 */
export interface TextWriter {
    write(chunk: string): unknown;
}

/**
 * Clears the whole current line.
 *
 * terminfo has no capability for the whole line, so this clears from
 * the start of the line to the cursor (`el1`), then from the cursor to
 * the end (`el`).
 *
 * @param out - Destination
 * @param capabilities - Capability set of the destination terminal
 */
export function clearLine(out: TextWriter, capabilities: CapabilitySet): void {
    out.write(capabilities.parse('el1') ?? ansi.clearToLineStart());
    out.write(capabilities.parse('el') ?? ansi.clearToLineEnd());
}

/**
 * Moves the cursor up. Zero lines writes nothing.
 *
 * @param out - Destination
 * @param capabilities - Capability set of the destination terminal
 * @param lines - Number of rows to move
 */
export function cursorUp(
    out: TextWriter,
    capabilities: CapabilitySet,
    lines: number,
): void {
    if (lines === 0) {
        return;
    }
    out.write(capabilities.parse('cuu', lines) ?? ansi.cursorUp(lines));
}

/**
 * Moves the cursor down. Zero lines writes nothing.
 *
 * @param out - Destination
 * @param capabilities - Capability set of the destination terminal
 * @param lines - Number of rows to move
 */
export function cursorDown(
    out: TextWriter,
    capabilities: CapabilitySet,
    lines: number,
): void {
    if (lines === 0) {
        return;
    }
    out.write(capabilities.parse('cud', lines) ?? ansi.cursorDown(lines));
}
