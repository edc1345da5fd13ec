/**
 * Stream Multiplexer
 *
 * Renders a whole message stream. On a terminal, every operation that
 * reports progress is pinned to its own row and rewritten in place; any
 * other output is appended below the grid and starts a fresh one.
 */

import type { JsonMessage } from '@pullview/types';
import {
    cursorDown,
    cursorUp,
    resolveCapabilities,
    type CapabilitySet,
} from '@pullview/terminal';
import { silentLogger, type Logger } from '@pullview/utils';
import { decodeJsonMessages, type MessageSource } from './decoder.js';
import { displayJsonMessage } from './line-renderer.js';
import type { ProgressRenderContext } from './progress-formatter.js';
import {
    createStreamSink,
    type OutputSink,
    type OutputStream,
} from './sink.js';

// ============================================================================
// OPTIONS
// ============================================================================

/**
 * Receives each out-of-band payload of the stream.
 */
export type AuxCallback = (message: JsonMessage) => void;

/**
 * Options for {@link displayJsonMessagesStream}.
 */
export interface StreamDisplayOptions {
    /** Render in place with cursor movement (default: false). */
    isTerminal?: boolean;
    /** Descriptor of the output terminal, for width queries. */
    terminalFd?: number;
    /** Receives every message carrying `aux`; those are not rendered. */
    onAux?: AuxCallback;
    /** Capability set to use instead of looking one up. */
    capabilities?: CapabilitySet;
    /** Environment for the terminfo lookup (default: `process.env`). */
    env?: Record<string, string | undefined>;
    /** Terminal name overriding `TERM`. */
    term?: string;
    /** Terminfo directories overriding the environment-derived ones. */
    searchDirs?: string[];
    /** Fixed window width in columns. */
    winSize?: number;
    /** Clock for time-left estimates. */
    now?: () => Date;
    /** Receives diagnostics (default: silent). */
    logger?: Logger;
}

// ============================================================================
// MULTIPLEXER
// ============================================================================

/**
 * Renders messages one at a time, keeping the row ledger of the
 * current progress grid.
 *
 * One instance serves one sink; it must not be shared between
 * concurrent streams.
 *
 * @example
 * ```typescript
 * const mux = new StreamMultiplexer(process.stdout, capabilities);
 * mux.render({ id: 'a1', status: 'Downloading', progressDetail });
 * mux.render({ id: 'b2', status: 'Waiting', progress: ' ' });
 * mux.render({ id: 'a1', status: 'Download complete', progress: ' ' });
 * ```
 */
export class StreamMultiplexer {
    private rows = new Map<string, number>();

    /**
     * @param out - Destination of the rendered text
     * @param capabilities - Capability set when `out` is a terminal;
     *        without one, output is append-only
     * @param context - Width and clock for progress fragments
     * @param onAux - Receives out-of-band payloads
     */
    constructor(
        private readonly out: OutputSink,
        private readonly capabilities?: CapabilitySet,
        private readonly context: ProgressRenderContext = {},
        private readonly onAux?: AuxCallback,
    ) {}

    /** Number of rows in the current grid. */
    get size(): number {
        return this.rows.size;
    }

    /**
     * Row assigned to an operation in the current grid.
     */
    rowOf(id: string): number | undefined {
        return this.rows.get(id);
    }

    /**
     * Renders one message.
     *
     * @throws {StreamDisplayError} When the message reports a failure
     */
    render(message: JsonMessage): void {
        if (message.aux !== undefined) {
            this.onAux?.(message);
            return;
        }

        const { id } = message;
        const hasProgress =
            message.progressDetail !== undefined || !!message.progress;
        if (!id || !hasProgress) {
            // a plain line ends the grid
            this.rows = new Map();
            this.renderLine(message);
            return;
        }

        let row = this.rows.get(id);
        if (row === undefined) {
            row = this.rows.size;
            this.rows.set(id, row);
            if (this.capabilities) {
                this.out.write('\n');
            }
        }

        const diff = this.rows.size - row;
        if (!this.capabilities) {
            this.renderLine(message);
            return;
        }

        cursorUp(this.out, this.capabilities, diff);
        try {
            this.renderLine(message);
        } finally {
            cursorDown(this.out, this.capabilities, diff);
        }
    }

    private renderLine(message: JsonMessage): void {
        displayJsonMessage(
            message,
            this.out,
            this.capabilities,
            this.context,
        );
    }

    /**
     * Renders every message of a sequence, stopping at the first failure.
     * Waits for a buffering sink to drain before taking the next message.
     */
    async run(
        messages: AsyncIterable<JsonMessage> | Iterable<JsonMessage>,
    ): Promise<void> {
        for await (const message of messages) {
            this.render(message);
            await this.out.ready?.();
        }
    }
}

// ============================================================================
// ENTRY POINTS
// ============================================================================

/**
 * Decodes a JSON message stream and renders it to `out`.
 *
 * On a terminal, the capability set is looked up from `TERM` unless one
 * is passed in; a failed lookup falls back to plain ANSI sequences.
 *
 * @param input - Byte or text chunks of concatenated JSON messages
 * @param out - Destination of the rendered text
 * @param options - Display configuration
 * @throws {StreamDisplayError} On malformed input or a reported failure
 *
 * @example
 * ```typescript
 * await displayJsonMessagesStream(createReadStream('pull.jsonl'), sink, {
 *     isTerminal: true,
 *     winSize: 120,
 * });
 * ```
 */
export async function displayJsonMessagesStream(
    input: MessageSource,
    out: OutputSink,
    options: StreamDisplayOptions = {},
): Promise<void> {
    const logger = options.logger ?? silentLogger;

    let capabilities: CapabilitySet | undefined;
    if (options.isTerminal) {
        capabilities =
            options.capabilities ??
            (await resolveCapabilities({
                env: options.env,
                term: options.term,
                searchDirs: options.searchDirs,
                logger,
            }));
    }

    const context: ProgressRenderContext = {
        winSize: options.winSize,
        terminalFd: options.terminalFd,
        now: options.now,
    };
    const multiplexer = new StreamMultiplexer(
        out,
        capabilities,
        context,
        options.onAux,
    );
    await multiplexer.run(decodeJsonMessages(input));
    logger.debug(`Rendered stream (${multiplexer.size} rows in last grid)`);
}

/**
 * Renders a JSON message stream to a Node writable, detecting whether
 * it is a terminal from `isTTY` and `fd`.
 *
 * @param input - Byte or text chunks of concatenated JSON messages
 * @param stream - Destination, e.g. `process.stdout`
 * @param onAux - Receives out-of-band payloads
 * @param options - Further display configuration
 * @throws {StreamDisplayError} On malformed input or a reported failure
 * @throws The stream's own error when writing fails
 */
export async function displayJsonMessagesToStream(
    input: MessageSource,
    stream: OutputStream,
    onAux?: AuxCallback,
    options: Omit<StreamDisplayOptions, 'onAux'> = {},
): Promise<void> {
    const isTerminal = options.isTerminal ?? stream.isTTY === true;
    const sink = createStreamSink(stream);
    try {
        await displayJsonMessagesStream(input, sink, {
            ...options,
            isTerminal,
            terminalFd:
                options.terminalFd ?? (isTerminal ? stream.fd : undefined),
            onAux,
        });
    } finally {
        // failures of the last writes arrive after they return
        await sink.flush();
        sink.release();
    }
    sink.assertHealthy();
}
