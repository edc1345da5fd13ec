/**
 * `@pullview/types`
 *
 * Shared TypeScript types for pullview packages.
 * This module describes the wire format of progress message streams
 * (one JSON object per message) and the error codes raised while
 * decoding and rendering them.
 *
 * @packageDocumentation
 */

// ============================================================================
// STREAM ERROR CODES
// ============================================================================

/**
 * Error codes for failures raised while rendering a message stream.
 *
 * @example
 * ```typescript
 * import { StreamErrorCode } from '@pullview/types';
 *
 * if (error.code === StreamErrorCode.AUTHENTICATION_REQUIRED) {
 *     console.log('Log in to the registry and try again');
 * }
 * ```
 */
export const StreamErrorCode = {
    // Transport Errors
    DECODE_FAILED: 'DECODE_FAILED',
    INVALID_MESSAGE: 'INVALID_MESSAGE',

    // Reported Operation Failures
    AUTHENTICATION_REQUIRED: 'AUTHENTICATION_REQUIRED',
    OPERATION_FAILED: 'OPERATION_FAILED',
} as const;

export type StreamErrorCode =
    (typeof StreamErrorCode)[keyof typeof StreamErrorCode];

// ============================================================================
// WIRE TYPES
// ============================================================================

/**
 * Error reported by the producer of a message stream.
 */
export interface JsonError {
    /** Numeric error code (401 means authentication is required). */
    code?: number;
    /** Human-readable error message. */
    message?: string;
}

/**
 * Structured progress of a single operation.
 *
 * `current` may exceed `total` when the producer reports inconsistent
 * numbers; renderers must tolerate it.
 */
export interface JsonProgress {
    /** Progress made so far. */
    current?: number;
    /** End value of the operation; zero or negative when unknown. */
    total?: number;
    /** Start of the operation in epoch seconds; zero when unset. */
    start?: number;
    /** If true, don't show xB/yB */
    hidecounts?: boolean;
    /** Units label; empty means bytes, rendered human-scaled. */
    units?: string;
}

/**
 * One decoded progress/status event.
 *
 * Field names follow the wire format.
 */
export interface JsonMessage {
    /** Raw stream text, written verbatim (carries its own line endings). */
    stream?: string;
    /** Short status text. */
    status?: string;
    /** Structured progress. */
    progressDetail?: JsonProgress;
    /** @deprecated Pre-rendered progress text; use `progressDetail`. */
    progress?: string;
    /** Identifier of the operation this message belongs to. */
    id?: string;
    /** Source-of-origin tag. */
    from?: string;
    /** Timestamp in epoch seconds. */
    time?: number;
    /** Timestamp in epoch nanoseconds; preferred over `time`. */
    timeNano?: number;
    /** Failure reported for the operation. */
    errorDetail?: JsonError;
    /** @deprecated Failure text; use `errorDetail`. */
    error?: string;
    /**
     * Out-of-band data, such as a content digest after a push or an
     * image id after a build. Never displayed.
     */
    aux?: unknown;
}
