/**
 * Compiled terminfo database reader.
 *
 * Reads the binary entries produced by `tic` (legacy 16-bit format and
 * the extended-number 32-bit format) from the standard search path.
 */

import { readFile } from 'fs/promises';
import { join } from 'path';

/** Magic number of the legacy format (16-bit numbers). */
const MAGIC_LEGACY = 0o432;
/** Magic number of the extended-number format (32-bit numbers). */
const MAGIC_NUMBER32 = 0o1036;

const HEADER_SIZE = 12;

/**
 * System directories searched after the user-configured ones.
 */
export const SYSTEM_TERMINFO_DIRS = [
    '/etc/terminfo',
    '/lib/terminfo',
    '/usr/share/terminfo',
    '/usr/lib/terminfo',
];

/**
 * Positions of the standard string capabilities used by pullview,
 * in the order fixed by the terminfo binary format.
 */
export const STRING_CAPABILITY_INDEX: Readonly<Record<string, number>> = {
    cr: 2,
    clear: 5,
    el: 6,
    ed: 7,
    cup: 10,
    cud1: 11,
    civis: 13,
    cnorm: 16,
    cuu1: 19,
    sgr0: 39,
    cud: 107,
    cub: 111,
    cuf: 112,
    cuu: 114,
    el1: 269,
};

/**
 * A decoded terminfo entry.
 */
export interface TermInfoEntry {
    /** Terminal names; the last one is usually the long description. */
    names: string[];
    /** Boolean capabilities by index. */
    booleans: boolean[];
    /** Numeric capabilities by index; -1 when absent. */
    numbers: number[];
    /** String capabilities by index; undefined when absent or cancelled. */
    strings: Array<string | undefined>;
}

/**
 * Error raised when a terminfo entry cannot be found or decoded.
 */
export class TermInfoError extends Error {
    readonly name = 'TermInfoError';

    /**
     * @param term - Terminal name that was looked up
     * @param message - What went wrong
     * @param cause - Underlying I/O error, if any
     */
    constructor(
        public readonly term: string,
        message: string,
        public readonly cause?: Error,
    ) {
        super(message, cause ? { cause } : undefined);
    }
}

/**
 * Decodes a compiled terminfo entry.
 *
 * @param term - Terminal name, used in error messages
 * @param data - Raw file contents
 * @returns The decoded entry
 * @throws {TermInfoError} When the data is not a terminfo entry or is truncated
 */
export function parseTermInfo(term: string, data: Buffer): TermInfoEntry {
    if (data.length < HEADER_SIZE) {
        throw new TermInfoError(
            term,
            `terminfo entry for ${term} is truncated`,
        );
    }

    const magic = data.readInt16LE(0);
    if (magic !== MAGIC_LEGACY && magic !== MAGIC_NUMBER32) {
        throw new TermInfoError(
            term,
            `terminfo entry for ${term} has bad magic number ` +
                `0o${magic.toString(8)}`,
        );
    }
    const numberSize = magic === MAGIC_NUMBER32 ? 4 : 2;

    const namesSize = data.readInt16LE(2);
    const booleanCount = data.readInt16LE(4);
    const numberCount = data.readInt16LE(6);
    const stringCount = data.readInt16LE(8);
    const tableSize = data.readInt16LE(10);

    if (
        namesSize < 0 ||
        booleanCount < 0 ||
        numberCount < 0 ||
        stringCount < 0 ||
        tableSize < 0
    ) {
        throw new TermInfoError(term, `terminfo entry for ${term} is corrupt`);
    }

    let offset = HEADER_SIZE;
    const namesEnd = offset + namesSize;
    const booleansEnd = namesEnd + booleanCount;
    // Numbers start on an even byte
    const numbersStart = booleansEnd + (booleansEnd % 2);
    const numbersEnd = numbersStart + numberCount * numberSize;
    const tableStart = numbersEnd + stringCount * 2;
    const tableEnd = tableStart + tableSize;

    if (data.length < tableEnd) {
        throw new TermInfoError(
            term,
            `terminfo entry for ${term} is truncated`,
        );
    }

    const names = data
        .toString('latin1', offset, namesEnd)
        .replace(/\0.*$/s, '')
        .split('|');

    const booleans: boolean[] = [];
    for (offset = namesEnd; offset < booleansEnd; offset++) {
        booleans.push(data[offset] === 1);
    }

    const numbers: number[] = [];
    for (offset = numbersStart; offset < numbersEnd; offset += numberSize) {
        numbers.push(
            numberSize === 4
                ? data.readInt32LE(offset)
                : data.readInt16LE(offset),
        );
    }

    const strings: Array<string | undefined> = [];
    for (offset = numbersEnd; offset < tableStart; offset += 2) {
        const position = data.readInt16LE(offset);
        // -1 absent, -2 cancelled
        if (position < 0 || position >= tableSize) {
            strings.push(undefined);
            continue;
        }
        const start = tableStart + position;
        const nul = data.indexOf(0, start);
        const end = nul === -1 || nul > tableEnd ? tableEnd : nul;
        strings.push(data.toString('latin1', start, end));
    }

    return { names, booleans, numbers, strings };
}

/**
 * Builds the terminfo search path from the environment.
 *
 * Order: `$TERMINFO`, `~/.terminfo`, `$TERMINFO_DIRS` (an empty entry
 * stands for `/usr/share/terminfo`), then the system directories.
 *
 * @param env - Environment variables to read
 * @returns Directories to search, without duplicates
 */
export function terminfoSearchDirs(
    env: Record<string, string | undefined>,
): string[] {
    const dirs: string[] = [];
    if (env.TERMINFO) {
        dirs.push(env.TERMINFO);
    }
    if (env.HOME) {
        dirs.push(join(env.HOME, '.terminfo'));
    }
    if (env.TERMINFO_DIRS) {
        for (const dir of env.TERMINFO_DIRS.split(':')) {
            dirs.push(dir === '' ? '/usr/share/terminfo' : dir);
        }
    }
    dirs.push(...SYSTEM_TERMINFO_DIRS);
    return [...new Set(dirs)];
}

/**
 * Candidate paths of an entry inside one database directory: the
 * first-letter layout and the hexadecimal layout used on macOS.
 */
function entryPaths(dir: string, term: string): string[] {
    const first = term[0];
    const hex = first.charCodeAt(0).toString(16);
    return [join(dir, first, term), join(dir, hex, term)];
}

function isMissingFileError(error: unknown): boolean {
    if (!(error instanceof Error) || !('code' in error)) {
        return false;
    }
    return ['ENOENT', 'ENOTDIR', 'EACCES', 'EISDIR'].includes(
        String(error.code),
    );
}

/**
 * Loads and decodes the terminfo entry for a terminal.
 *
 * @param term - Terminal name, such as `xterm-256color`
 * @param searchDirs - Database directories, searched in order
 * @returns The decoded entry of the first directory that has one
 * @throws {TermInfoError} When no directory has a readable, valid entry
 */
export async function openTermInfo(
    term: string,
    searchDirs: string[],
): Promise<TermInfoEntry> {
    if (term === '' || term.includes('/') || term.startsWith('.')) {
        throw new TermInfoError(term, `invalid terminal name "${term}"`);
    }

    for (const dir of searchDirs) {
        for (const path of entryPaths(dir, term)) {
            let data: Buffer;
            try {
                data = await readFile(path);
            } catch (error) {
                if (isMissingFileError(error)) {
                    continue;
                }
                throw new TermInfoError(
                    term,
                    `failed to read terminfo entry ${path}`,
                    error instanceof Error ? error : undefined,
                );
            }
            return parseTermInfo(term, data);
        }
    }

    throw new TermInfoError(term, `no terminfo entry found for ${term}`);
}
