/**
 * Message Validation
 *
 * Turns a parsed JSON value into a {@link JsonMessage}, checking the
 * type of every known field. Unknown fields are dropped; `null` and
 * missing fields both come out as `undefined`.
 */

import type { JsonError, JsonMessage, JsonProgress } from '@pullview/types';
import { createInvalidMessageError } from './errors.js';

// ============================================================================
// RAW TYPES (before validation)
// ============================================================================

/**
 * A decoded JSON object before validation.
 */
type RawObject = Record<string, unknown>;

function isObject(value: unknown): value is RawObject {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function typeName(value: unknown): string {
    if (Array.isArray(value)) return 'array';
    return typeof value;
}

// ============================================================================
// FIELD READERS
// ============================================================================

function readString(
    obj: RawObject,
    key: string,
    path: string,
): string | undefined {
    const value = obj[key];
    if (value === undefined || value === null) return undefined;
    if (typeof value !== 'string') {
        throw createInvalidMessageError(
            path,
            `Invalid field ${path}: expected string, got ${typeName(value)}`,
        );
    }
    return value;
}

function readInteger(
    obj: RawObject,
    key: string,
    path: string,
): number | undefined {
    const value = obj[key];
    if (value === undefined || value === null) return undefined;
    if (typeof value !== 'number' || !Number.isInteger(value)) {
        const got = typeof value === 'number' ? String(value) : typeName(value);
        throw createInvalidMessageError(
            path,
            `Invalid field ${path}: expected integer, got ${got}`,
        );
    }
    return value;
}

function readBoolean(
    obj: RawObject,
    key: string,
    path: string,
): boolean | undefined {
    const value = obj[key];
    if (value === undefined || value === null) return undefined;
    if (typeof value !== 'boolean') {
        throw createInvalidMessageError(
            path,
            `Invalid field ${path}: expected boolean, got ${typeName(value)}`,
        );
    }
    return value;
}

function readObject(
    obj: RawObject,
    key: string,
    path: string,
): RawObject | undefined {
    const value = obj[key];
    if (value === undefined || value === null) return undefined;
    if (!isObject(value)) {
        throw createInvalidMessageError(
            path,
            `Invalid field ${path}: expected object, got ${typeName(value)}`,
        );
    }
    return value;
}

// ============================================================================
// VALIDATORS
// ============================================================================

function validateProgress(raw: RawObject): JsonProgress {
    return {
        current: readInteger(raw, 'current', 'progressDetail.current'),
        total: readInteger(raw, 'total', 'progressDetail.total'),
        start: readInteger(raw, 'start', 'progressDetail.start'),
        hidecounts: readBoolean(
            raw,
            'hidecounts',
            'progressDetail.hidecounts',
        ),
        units: readString(raw, 'units', 'progressDetail.units'),
    };
}

function validateError(raw: RawObject): JsonError {
    return {
        code: readInteger(raw, 'code', 'errorDetail.code'),
        message: readString(raw, 'message', 'errorDetail.message'),
    };
}

/**
 * Validates a parsed JSON value as a message.
 *
 * @param value - Output of `JSON.parse` for one value of the stream
 * @returns The message with only known, well-typed fields
 * @throws {StreamDisplayError} INVALID_MESSAGE when the value is not an
 *         object or a known field has the wrong type
 *
 * @example
 * ```typescript
 * const message = validateJsonMessage(
 *     JSON.parse('{"id":"abc","status":"Waiting"}'),
 * );
 * ```
 */
export function validateJsonMessage(value: unknown): JsonMessage {
    if (!isObject(value)) {
        const got = value === null ? 'null' : typeName(value);
        throw createInvalidMessageError(
            '$',
            `Invalid message: expected object, got ${got}`,
        );
    }

    const progressDetail = readObject(
        value,
        'progressDetail',
        'progressDetail',
    );
    const errorDetail = readObject(value, 'errorDetail', 'errorDetail');
    const aux = value.aux === null ? undefined : value.aux;

    return {
        stream: readString(value, 'stream', 'stream'),
        status: readString(value, 'status', 'status'),
        progressDetail: progressDetail && validateProgress(progressDetail),
        progress: readString(value, 'progress', 'progress'),
        id: readString(value, 'id', 'id'),
        from: readString(value, 'from', 'from'),
        time: readInteger(value, 'time', 'time'),
        timeNano: readInteger(value, 'timeNano', 'timeNano'),
        errorDetail: errorDetail && validateError(errorDetail),
        error: readString(value, 'error', 'error'),
        aux,
    };
}
