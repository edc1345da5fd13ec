/**
 * Tests for message validation
 */

import { describe, it, expect } from 'vitest';
import { StreamDisplayError } from '../src/errors.js';
import { validateJsonMessage } from '../src/validation.js';

function validationError(value: unknown): StreamDisplayError {
    try {
        validateJsonMessage(value);
    } catch (error) {
        if (error instanceof StreamDisplayError) {
            return error;
        }
        throw error;
    }
    throw new Error('expected validation to fail');
}

describe('validateJsonMessage', () => {
    it('should read every known field', () => {
        const message = validateJsonMessage({
            stream: 'Step 1/4\n',
            status: 'Downloading',
            progressDetail: {
                current: 10,
                total: 20,
                start: 1700000000,
                hidecounts: true,
                units: 'files',
            },
            progress: '[=>  ]',
            id: 'abc',
            from: 'base:latest',
            time: 1700000000,
            timeNano: 1700000000000000000,
            errorDetail: { code: 500, message: 'failed' },
            error: 'failed',
            aux: { digest: 'sha256:0000' },
        });

        expect(message).toEqual({
            stream: 'Step 1/4\n',
            status: 'Downloading',
            progressDetail: {
                current: 10,
                total: 20,
                start: 1700000000,
                hidecounts: true,
                units: 'files',
            },
            progress: '[=>  ]',
            id: 'abc',
            from: 'base:latest',
            time: 1700000000,
            timeNano: 1700000000000000000,
            errorDetail: { code: 500, message: 'failed' },
            error: 'failed',
            aux: { digest: 'sha256:0000' },
        });
    });

    it('should treat null like a missing field', () => {
        const message = validateJsonMessage({
            status: 'Waiting',
            progressDetail: null,
            id: null,
            aux: null,
        });

        expect(message.status).toBe('Waiting');
        expect(message.progressDetail).toBeUndefined();
        expect(message.id).toBeUndefined();
        expect(message.aux).toBeUndefined();
    });

    it('should keep an empty progress record', () => {
        const message = validateJsonMessage({ id: 'abc', progressDetail: {} });

        expect(message.progressDetail).toEqual({});
    });

    it('should drop unknown fields', () => {
        const message = validateJsonMessage({ status: 'ok', extra: 1 });

        expect(Object.keys(message)).not.toContain('extra');
    });

    it('should keep any JSON value as aux', () => {
        expect(validateJsonMessage({ aux: 0 }).aux).toBe(0);
        expect(validateJsonMessage({ aux: [1, 2] }).aux).toEqual([1, 2]);
    });
});

describe('validateJsonMessage failures', () => {
    it('should reject values that are not objects', () => {
        expect(validationError([1]).message).toBe(
            'Invalid message: expected object, got array',
        );
        expect(validationError(null).message).toBe(
            'Invalid message: expected object, got null',
        );
        expect(validationError('status').details).toEqual({ field: '$' });
    });

    it('should name the mistyped field', () => {
        const error = validationError({ id: 42 });

        expect(error.code).toBe('INVALID_MESSAGE');
        expect(error.message).toBe(
            'Invalid field id: expected string, got number',
        );
        expect(error.details).toEqual({ field: 'id' });
    });

    it('should require integers for counters', () => {
        const error = validationError({ progressDetail: { current: 1.5 } });

        expect(error.message).toBe(
            'Invalid field progressDetail.current: expected integer, got 1.5',
        );
    });

    it('should check nested records', () => {
        expect(validationError({ progressDetail: 'half' }).message).toBe(
            'Invalid field progressDetail: expected object, got string',
        );
        expect(
            validationError({ errorDetail: { code: '401' } }).message,
        ).toBe('Invalid field errorDetail.code: expected integer, got string');
        expect(
            validationError({ progressDetail: { hidecounts: 1 } }).message,
        ).toBe(
            'Invalid field progressDetail.hidecounts: expected boolean, got number',
        );
    });
});
