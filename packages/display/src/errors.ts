/**
 * Stream Display Error Handling
 *
 * Provides the error class raised while decoding and rendering a
 * message stream, factories for each failure kind, and category helpers.
 */

import { StreamErrorCode, type JsonError } from '@pullview/types';

// Re-export for convenience
export { StreamErrorCode };

/**
 * Error code the producer uses to report missing credentials.
 */
export const AUTHENTICATION_REQUIRED_CODE = 401;

// ============================================================================
// ERROR CATEGORY HELPERS
// ============================================================================

const DECODE_ERROR_CODES = new Set<StreamErrorCode>([
    StreamErrorCode.DECODE_FAILED,
    StreamErrorCode.INVALID_MESSAGE,
]);

const REPORTED_FAILURE_CODES = new Set<StreamErrorCode>([
    StreamErrorCode.AUTHENTICATION_REQUIRED,
    StreamErrorCode.OPERATION_FAILED,
]);

/**
 * Check if an error code is a transport decode failure.
 *
 * @param code - The error code to check
 * @returns true for malformed JSON and invalid message shapes
 */
export function isDecodeError(code: StreamErrorCode): boolean {
    return DECODE_ERROR_CODES.has(code);
}

/**
 * Check if an error code is a failure reported inside the stream.
 *
 * @param code - The error code to check
 * @returns true for failures carried by a message's error field
 */
export function isReportedFailure(code: StreamErrorCode): boolean {
    return REPORTED_FAILURE_CODES.has(code);
}

// ============================================================================
// ERROR CLASS
// ============================================================================

/**
 * Error raised while decoding or rendering a message stream.
 *
 * @example
 * ```typescript
 * try {
 *     await displayJsonMessagesToStream(input, process.stdout);
 * } catch (error) {
 *     if (error instanceof StreamDisplayError) {
 *         console.error(error.toDetailedString());
 *     }
 * }
 * ```
 */
export class StreamDisplayError extends Error {
    public readonly name = 'StreamDisplayError';

    /**
     * @param code - The structured error code for programmatic handling
     * @param message - Human-readable error message
     * @param details - Optional additional context as key-value pairs
     * @param cause - Optional underlying error that caused this error
     */
    constructor(
        public readonly code: StreamErrorCode,
        message: string,
        public readonly details?: Record<string, unknown>,
        public readonly cause?: Error,
    ) {
        super(message, cause ? { cause } : undefined);
        Error.captureStackTrace?.(this, StreamDisplayError);
    }

    /**
     * Create a detailed, formatted error message with all context.
     *
     * @returns A multi-line string with error code, message, details, and cause
     */
    toDetailedString(): string {
        const parts = [`[${this.code}] ${this.message}`];
        if (this.details) {
            for (const [key, value] of Object.entries(this.details)) {
                parts.push(`  ${key}: ${JSON.stringify(value)}`);
            }
        }
        if (this.cause) parts.push(`  Cause: ${this.cause.message}`);
        return parts.join('\n');
    }
}

// ============================================================================
// ERROR FACTORIES
// ============================================================================

/**
 * Create the error for a failure reported by a message.
 *
 * Code 401 always becomes the fixed authentication failure, whatever
 * text the producer sent.
 *
 * @param error - The reported error
 * @returns A StreamDisplayError for the failed operation
 */
export function createReportedError(error: JsonError): StreamDisplayError {
    if (error.code === AUTHENTICATION_REQUIRED_CODE) {
        return new StreamDisplayError(
            StreamErrorCode.AUTHENTICATION_REQUIRED,
            'authentication is required',
        );
    }
    return new StreamDisplayError(
        StreamErrorCode.OPERATION_FAILED,
        error.message ?? '',
        error.code !== undefined ? { code: error.code } : undefined,
    );
}

/**
 * Create an error for input that is not valid JSON.
 *
 * @param message - Description of the syntax problem
 * @param offset - Character offset of the value in the input
 * @param cause - The underlying parse error
 * @returns A StreamDisplayError with DECODE_FAILED code
 */
export function createDecodeError(
    message: string,
    offset: number,
    cause?: Error,
): StreamDisplayError {
    return new StreamDisplayError(
        StreamErrorCode.DECODE_FAILED,
        message,
        { offset },
        cause,
    );
}

/**
 * Create an error for a JSON value that is not a valid message.
 *
 * @param field - Dotted path of the offending field, or `$` for the value
 * @param message - What is wrong with it
 * @returns A StreamDisplayError with INVALID_MESSAGE code
 */
export function createInvalidMessageError(
    field: string,
    message: string,
): StreamDisplayError {
    return new StreamDisplayError(StreamErrorCode.INVALID_MESSAGE, message, {
        field,
    });
}
