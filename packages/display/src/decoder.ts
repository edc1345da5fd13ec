/**
 * Streaming Message Decoder
 *
 * Splits a byte or text stream into consecutive JSON values and yields
 * each one as a validated message. Values may be separated by newlines,
 * by any other JSON whitespace, or not at all.
 */

import type { JsonMessage } from '@pullview/types';
import { createDecodeError } from './errors.js';
import { validateJsonMessage } from './validation.js';

// ============================================================================
// TYPES
// ============================================================================

/**
 * Source text of one JSON value cut from the stream.
 */
export interface RawJsonValue {
    /** The value's JSON text. */
    text: string;
    /** Character offset of the value from the start of the stream. */
    offset: number;
}

/**
 * Input accepted by {@link decodeJsonMessages}. A Node `Readable`
 * qualifies.
 */
export type MessageSource =
    | AsyncIterable<string | Uint8Array>
    | Iterable<string | Uint8Array>;

type ValueKind = 'nested' | 'string' | 'scalar';

function isWhitespace(ch: string): boolean {
    return ch === ' ' || ch === '\n' || ch === '\r' || ch === '\t';
}

// ============================================================================
// VALUE SPLITTER
// ============================================================================

/**
 * Incremental splitter cutting concatenated JSON values out of text
 * that arrives in arbitrary chunks.
 *
 * Only value boundaries are found here; syntax inside a value is left
 * to `JSON.parse`.
 *
 * @example
 * ```typescript
 * const splitter = new JsonValueSplitter();
 * splitter.push('{"a":1}{"b"'); // [{ text: '{"a":1}', offset: 0 }]
 * splitter.push(':2}\n');       // [{ text: '{"b":2}', offset: 7 }]
 * splitter.end();               // []
 * ```
 */
export class JsonValueSplitter {
    private buffer = '';
    /** Stream offset of `buffer[0]`. */
    private consumed = 0;
    /** Next character of `buffer` to scan. */
    private position = 0;
    /** Start of the value being scanned, or -1 between values. */
    private start = -1;
    private kind: ValueKind = 'nested';
    private depth = 0;
    private inString = false;
    private escaped = false;

    /**
     * Adds text and returns every value it completes.
     */
    push(text: string): RawJsonValue[] {
        this.buffer += text;
        const values: RawJsonValue[] = [];

        while (this.position < this.buffer.length) {
            const ch = this.buffer[this.position];

            if (this.start === -1) {
                if (isWhitespace(ch)) {
                    this.position++;
                    continue;
                }
                this.begin(ch);
                if (this.kind === 'nested') {
                    continue;
                }
                this.position++;
                continue;
            }

            if (this.kind === 'scalar') {
                if (isWhitespace(ch) || '{["'.includes(ch)) {
                    values.push(this.cut(this.position));
                    continue;
                }
                this.position++;
                continue;
            }

            this.position++;
            if (this.inString) {
                if (this.escaped) {
                    this.escaped = false;
                } else if (ch === '\\') {
                    this.escaped = true;
                } else if (ch === '"') {
                    this.inString = false;
                    if (this.kind === 'string') {
                        values.push(this.cut(this.position));
                    }
                }
                continue;
            }

            if (ch === '"') {
                this.inString = true;
            } else if (ch === '{' || ch === '[') {
                this.depth++;
            } else if (ch === '}' || ch === ']') {
                this.depth--;
                if (this.depth === 0) {
                    values.push(this.cut(this.position));
                }
            }
        }

        this.compact();
        return values;
    }

    /**
     * Signals the end of the stream.
     *
     * @returns A trailing scalar value, if the stream ended on one
     * @throws {StreamDisplayError} DECODE_FAILED when the stream ends
     *         inside an object, array or string
     */
    end(): RawJsonValue[] {
        if (this.start === -1) {
            return [];
        }
        if (this.kind === 'scalar') {
            return [this.cut(this.buffer.length)];
        }
        throw createDecodeError(
            'unexpected end of JSON input',
            this.consumed + this.start,
        );
    }

    private begin(ch: string): void {
        this.start = this.position;
        this.depth = 0;
        this.escaped = false;
        if (ch === '{' || ch === '[') {
            this.kind = 'nested';
            this.inString = false;
        } else if (ch === '"') {
            this.kind = 'string';
            this.inString = true;
        } else {
            this.kind = 'scalar';
            this.inString = false;
        }
    }

    private cut(end: number): RawJsonValue {
        const value = {
            text: this.buffer.slice(this.start, end),
            offset: this.consumed + this.start,
        };
        this.start = -1;
        return value;
    }

    /** Drops text no pending value needs. */
    private compact(): void {
        const keepFrom = this.start === -1 ? this.position : this.start;
        if (keepFrom === 0) {
            return;
        }
        this.buffer = this.buffer.slice(keepFrom);
        this.consumed += keepFrom;
        this.position -= keepFrom;
        if (this.start !== -1) {
            this.start = 0;
        }
    }
}

// ============================================================================
// DECODER
// ============================================================================

/**
 * Parses and validates one raw value.
 *
 * @throws {StreamDisplayError} DECODE_FAILED for invalid JSON,
 *         INVALID_MESSAGE for a value that is not a message
 */
export function parseJsonMessage(raw: RawJsonValue): JsonMessage {
    let value: unknown;
    try {
        value = JSON.parse(raw.text);
    } catch (error) {
        const cause = error instanceof Error ? error : undefined;
        const reason = cause?.message ?? String(error);
        throw createDecodeError(
            `invalid JSON at offset ${raw.offset}: ${reason}`,
            raw.offset,
            cause,
        );
    }
    return validateJsonMessage(value);
}

/**
 * Decodes a stream of JSON messages.
 *
 * Messages are yielded as soon as their closing brace arrives, so a
 * renderer consuming this generator keeps up with a live producer.
 * Errors thrown by the input itself propagate unchanged.
 *
 * @param input - Byte or text chunks, e.g. a Node `Readable`
 * @returns Validated messages in stream order
 *
 * @example
 * ```typescript
 * for await (const message of decodeJsonMessages(process.stdin)) {
 *     console.log(message.status);
 * }
 * ```
 */
export async function* decodeJsonMessages(
    input: MessageSource,
): AsyncGenerator<JsonMessage, void, undefined> {
    const splitter = new JsonValueSplitter();
    const textDecoder = new TextDecoder();

    for await (const chunk of input) {
        const text =
            typeof chunk === 'string'
                ? chunk
                : textDecoder.decode(chunk, { stream: true });
        for (const raw of splitter.push(text)) {
            yield parseJsonMessage(raw);
        }
    }

    for (const raw of splitter.push(textDecoder.decode())) {
        yield parseJsonMessage(raw);
    }
    for (const raw of splitter.end()) {
        yield parseJsonMessage(raw);
    }
}
