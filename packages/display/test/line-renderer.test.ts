/**
 * Tests for single message rendering
 */

import { describe, it, expect } from 'vitest';
import type { JsonMessage } from '@pullview/types';
import { NO_CAPABILITIES, type CapabilitySet } from '@pullview/terminal';
import { StreamDisplayError, StreamErrorCode } from '../src/errors.js';
import { displayJsonMessage, getReportedError } from '../src/line-renderer.js';
import type { ProgressRenderContext } from '../src/progress-formatter.js';

const context: ProgressRenderContext = { winSize: 80 };

function render(message: JsonMessage, capabilities?: CapabilitySet): string {
    const chunks: string[] = [];
    const out = { write: (chunk: string) => chunks.push(chunk) };
    displayJsonMessage(message, out, capabilities, context);
    return chunks.join('');
}

describe('displayJsonMessage on a plain sink', () => {
    it('should write the id and status on one line', () => {
        expect(render({ id: 'abc', status: 'Pull complete' })).toBe(
            'abc: Pull complete\n',
        );
    });

    it('should write the source tag after the id', () => {
        expect(
            render({ id: 'abc', from: 'base:latest', status: 'Pulling' }),
        ).toBe('abc: (from base:latest) Pulling\n');
    });

    it('should write stream text verbatim', () => {
        expect(render({ stream: 'Step 1/2 : FROM base\n' })).toBe(
            'Step 1/2 : FROM base\n',
        );
        expect(render({ stream: 'partial' })).toBe('partial');
    });

    it('should prefix a fixed-width timestamp', () => {
        expect(
            render({ status: 'Pulling', timeNano: 1_700_000_000_000_000_000 }),
        ).toBe('2023-11-14T22:13:20.000000000Z Pulling\n');
        expect(render({ status: 'Pulling', time: 1_700_000_000 })).toBe(
            '2023-11-14T22:13:20.000000000Z Pulling\n',
        );
    });

    it('should prefer the nanosecond timestamp', () => {
        expect(
            render({
                status: 'Pulling',
                time: 5,
                timeNano: 1_700_000_000_000_000_000,
            }),
        ).toBe('2023-11-14T22:13:20.000000000Z Pulling\n');
    });

    it('should render times far outside the calendar range of Date', () => {
        expect(render({ status: 'x', time: 100_000_000_000_000 })).toBe(
            '3170843-11-07T09:46:40.000000000Z x\n',
        );
        expect(render({ status: 'x', time: 253_402_300_800 })).toBe(
            '10000-01-01T00:00:00.000000000Z x\n',
        );
    });

    it('should suppress messages with a progress fragment', () => {
        expect(
            render({
                id: 'abc',
                status: 'Downloading',
                progressDetail: { current: 50, total: 100 },
            }),
        ).toBe('');
    });

    it('should write the status when the fragment is empty', () => {
        expect(
            render({ id: 'abc', status: 'Pull complete', progressDetail: {} }),
        ).toBe('abc: Pull complete\n');
    });

    it('should write legacy progress text', () => {
        expect(
            render({ id: 'abc', status: 'Downloading', progress: '5B/10B' }),
        ).toBe('abc: Downloading 5B/10B\n');
    });

    it('should write an empty line for an empty message', () => {
        expect(render({})).toBe('\n');
    });
});

describe('displayJsonMessage on a terminal', () => {
    it('should rewrite progress lines in place', () => {
        expect(
            render(
                {
                    id: 'abc',
                    status: 'Downloading',
                    progressDetail: { current: 50, total: 100 },
                },
                NO_CAPABILITIES,
            ),
        ).toBe('\x1b[1K\x1b[K\rabc: Downloading      50B/100B\r');
    });

    it('should rewrite legacy progress text in place', () => {
        expect(
            render(
                { id: 'abc', status: 'Extracting', progress: '1/2' },
                NO_CAPABILITIES,
            ),
        ).toBe('\x1b[1K\x1b[K\rabc: Extracting 1/2\r');
    });

    it('should use the clear sequences of the capability set', () => {
        const capabilities: CapabilitySet = {
            parse: (name) => `<${name}>`,
        };

        expect(
            render(
                { id: 'abc', status: 'Waiting', progressDetail: {} },
                capabilities,
            ),
        ).toBe('<el1><el>\rabc: Waiting \r');
    });

    it('should end plain lines with a newline', () => {
        expect(
            render({ id: 'abc', status: 'Pull complete' }, NO_CAPABILITIES),
        ).toBe('abc: Pull complete\n');
    });
});

describe('reported failures', () => {
    it('should raise the authentication failure for code 401', () => {
        const chunks: string[] = [];
        const out = { write: (chunk: string) => chunks.push(chunk) };
        let caught: unknown;
        try {
            displayJsonMessage(
                {
                    id: 'abc',
                    status: 'Downloading',
                    errorDetail: { code: 401, message: 'unauthorized' },
                },
                out,
                NO_CAPABILITIES,
            );
        } catch (error) {
            caught = error;
        }

        expect(caught).toBeInstanceOf(StreamDisplayError);
        if (caught instanceof StreamDisplayError) {
            expect(caught.code).toBe(StreamErrorCode.AUTHENTICATION_REQUIRED);
            expect(caught.message).toBe('authentication is required');
        }
        expect(chunks).toEqual([]);
    });

    it('should raise the reported message for other failures', () => {
        expect(() =>
            render({ errorDetail: { code: 404, message: 'manifest unknown' } }),
        ).toThrow(StreamDisplayError);
        expect(() =>
            render({ errorDetail: { code: 404, message: 'manifest unknown' } }),
        ).toThrow('manifest unknown');
    });

    it('should fall back to the legacy error text', () => {
        expect(() => render({ error: 'pull access denied' })).toThrow(
            'pull access denied',
        );
    });
});

describe('getReportedError', () => {
    it('should prefer the structured error', () => {
        expect(
            getReportedError({
                errorDetail: { code: 500, message: 'detailed' },
                error: 'legacy',
            }),
        ).toEqual({ code: 500, message: 'detailed' });
    });

    it('should return undefined for healthy messages', () => {
        expect(getReportedError({ status: 'ok' })).toBeUndefined();
    });
});

describe('sink failures', () => {
    it('should propagate the sink error unchanged', () => {
        const failure = new Error('EPIPE');
        const out = {
            write: () => {
                throw failure;
            },
        };

        expect(() => displayJsonMessage({ status: 'Pulling' }, out)).toThrow(
            failure,
        );
    });
});
