/**
 * Tests for capability sets and their resolution
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import { createLogger } from '@pullview/utils';
import {
    NO_CAPABILITIES,
    TerminfoCapabilities,
    resolveCapabilities,
} from '../src/capabilities.js';
import { parseTermInfo } from '../src/terminfo.js';
import {
    XTERM_LIKE_STRINGS,
    buildTermInfo,
    installTermInfo,
} from '../../../test/helpers/terminfo.js';

function xtermLike(name = 'xterm-test'): TerminfoCapabilities {
    return new TerminfoCapabilities(
        parseTermInfo(
            name,
            buildTermInfo({ names: [name], strings: XTERM_LIKE_STRINGS }),
        ),
    );
}

describe('TerminfoCapabilities', () => {
    it('should expand parameterized capabilities', () => {
        const capabilities = xtermLike();

        expect(capabilities.parse('cuu', 3)).toBe('\x1b[3A');
        expect(capabilities.parse('cud', 1)).toBe('\x1b[1B');
    });

    it('should return plain capabilities', () => {
        const capabilities = xtermLike();

        expect(capabilities.parse('el')).toBe('\x1b[K');
        expect(capabilities.parse('el1')).toBe('\x1b[1K');
    });

    it('should fail lookups the entry does not define', () => {
        const capabilities = xtermLike();

        expect(capabilities.parse('cup', 1, 1)).toBeUndefined();
        expect(capabilities.parse('not-a-capability')).toBeUndefined();
    });

    it('should strip padding before expansion', () => {
        const capabilities = new TerminfoCapabilities(
            parseTermInfo(
                'slow',
                buildTermInfo({ names: ['slow'], strings: { 6: '\x1b[K$<3>' } }),
            ),
        );

        expect(capabilities.parse('el')).toBe('\x1b[K');
    });

    it('should expose the primary terminal name', () => {
        expect(xtermLike('xterm-named').term).toBe('xterm-named');
    });
});

describe('NO_CAPABILITIES', () => {
    it('should fail every lookup', () => {
        expect(NO_CAPABILITIES.parse('cuu', 1)).toBeUndefined();
        expect(NO_CAPABILITIES.parse('el')).toBeUndefined();
    });
});

describe('resolveCapabilities', () => {
    let tempDir: string;

    beforeEach(async () => {
        tempDir = await mkdtemp(join(tmpdir(), 'capabilities-test-'));
    });

    afterEach(async () => {
        await rm(tempDir, { recursive: true, force: true });
    });

    it('should load the entry named by TERM', async () => {
        await installTermInfo(
            tempDir,
            'xterm-test',
            buildTermInfo({ names: ['xterm-test'], strings: XTERM_LIKE_STRINGS }),
        );

        const capabilities = await resolveCapabilities({
            env: { TERM: 'xterm-test' },
            searchDirs: [tempDir],
        });

        expect(capabilities).toBeInstanceOf(TerminfoCapabilities);
        expect(capabilities.parse('cuu', 2)).toBe('\x1b[2A');
    });

    it('should default to vt102 when TERM is unset', async () => {
        await installTermInfo(
            tempDir,
            'vt102',
            buildTermInfo({ names: ['vt102'], strings: XTERM_LIKE_STRINGS }),
        );

        const capabilities = await resolveCapabilities({
            env: {},
            searchDirs: [tempDir],
        });

        expect(capabilities).toBeInstanceOf(TerminfoCapabilities);
    });

    it('should prefer an explicit terminal name over TERM', async () => {
        await installTermInfo(
            tempDir,
            'chosen',
            buildTermInfo({ names: ['chosen'] }),
        );

        const capabilities = await resolveCapabilities({
            env: { TERM: 'ignored' },
            term: 'chosen',
            searchDirs: [tempDir],
        });

        expect(capabilities).toBeInstanceOf(TerminfoCapabilities);
    });

    it('should degrade to the canary when the entry is missing', async () => {
        const lines: string[] = [];
        const logger = createLogger({
            verbose: true,
            color: false,
            write: (line) => lines.push(line),
        });

        const capabilities = await resolveCapabilities({
            env: { TERM: 'missing-term' },
            searchDirs: [tempDir],
            logger,
        });

        expect(capabilities).toBe(NO_CAPABILITIES);
        expect(lines).toHaveLength(1);
        expect(
            lines[0].endsWith(
                'no terminfo entry found for missing-term; using ANSI escape sequences',
            ),
        ).toBe(true);
    });

    it('should degrade to the canary when the entry is corrupt', async () => {
        const data = buildTermInfo({ names: ['broken'] });
        data.writeInt16LE(0, 0);
        await installTermInfo(tempDir, 'broken', data);

        const capabilities = await resolveCapabilities({
            env: { TERM: 'broken' },
            searchDirs: [tempDir],
        });

        expect(capabilities).toBe(NO_CAPABILITIES);
    });
});
