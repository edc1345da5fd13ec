/**
 * Terminfo Fixtures
 *
 * Builds compiled terminfo entries in memory and on disk so capability
 * lookup can be tested without depending on the host's database.
 */

import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';

/** Indices of the string capabilities the fixtures define. */
export const FIXTURE_INDEX = {
    el: 6,
    cuu: 114,
    cud: 107,
    el1: 269,
} as const;

/**
 * Capabilities of an xterm-like terminal, as stored by `tic`
 * (`\E` already replaced by the escape byte).
 */
export const XTERM_LIKE_STRINGS: Record<number, string> = {
    [FIXTURE_INDEX.el]: '\x1b[K',
    [FIXTURE_INDEX.el1]: '\x1b[1K',
    [FIXTURE_INDEX.cuu]: '\x1b[%p1%dA',
    [FIXTURE_INDEX.cud]: '\x1b[%p1%dB',
};

export interface TermInfoFixtureOptions {
    /** Names joined with `|` in the names section. */
    names: string[];
    /** String capabilities by index. */
    strings?: Record<number, string>;
    /** Boolean capabilities by index. */
    booleans?: boolean[];
    /** Numeric capabilities by index. */
    numbers?: number[];
    /** Use the 32-bit number format. */
    number32?: boolean;
}

/**
 * Encodes a compiled terminfo entry.
 */
export function buildTermInfo(options: TermInfoFixtureOptions): Buffer {
    const { names, strings = {}, booleans = [], numbers = [] } = options;
    const numberSize = options.number32 ? 4 : 2;

    const namesSection = Buffer.from(names.join('|') + '\0', 'latin1');
    const booleanSection = Buffer.from(booleans.map((b) => (b ? 1 : 0)));
    const pad = (namesSection.length + booleanSection.length) % 2;

    const numberSection = Buffer.alloc(numbers.length * numberSize);
    numbers.forEach((value, i) => {
        if (numberSize === 4) {
            numberSection.writeInt32LE(value, i * 4);
        } else {
            numberSection.writeInt16LE(value, i * 2);
        }
    });

    const indices = Object.keys(strings).map(Number);
    const stringCount = indices.length === 0 ? 0 : Math.max(...indices) + 1;
    const offsets = Buffer.alloc(stringCount * 2);
    const table: Buffer[] = [];
    let tableSize = 0;
    for (let i = 0; i < stringCount; i++) {
        const value = strings[i];
        if (value === undefined) {
            offsets.writeInt16LE(-1, i * 2);
            continue;
        }
        offsets.writeInt16LE(tableSize, i * 2);
        const encoded = Buffer.from(value + '\0', 'latin1');
        table.push(encoded);
        tableSize += encoded.length;
    }

    const header = Buffer.alloc(12);
    header.writeInt16LE(options.number32 ? 0o1036 : 0o432, 0);
    header.writeInt16LE(namesSection.length, 2);
    header.writeInt16LE(booleanSection.length, 4);
    header.writeInt16LE(numbers.length, 6);
    header.writeInt16LE(stringCount, 8);
    header.writeInt16LE(tableSize, 10);

    return Buffer.concat([
        header,
        namesSection,
        booleanSection,
        Buffer.alloc(pad),
        numberSection,
        offsets,
        ...table,
    ]);
}

/**
 * Writes an entry into a terminfo directory using the first-letter
 * layout (`<dir>/<first char>/<name>`).
 *
 * @returns Path of the written entry
 */
export async function installTermInfo(
    dir: string,
    name: string,
    data: Buffer,
): Promise<string> {
    const entryDir = join(dir, name[0]);
    await mkdir(entryDir, { recursive: true });
    const path = join(entryDir, name);
    await writeFile(path, data);
    return path;
}
