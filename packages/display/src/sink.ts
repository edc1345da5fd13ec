/**
 * Output sinks the renderer writes to.
 */

import { once } from 'events';
import type { TextWriter } from '@pullview/terminal';

/**
 * Destination of rendered text. A failed write throws.
 *
 * A sink that buffers may implement `ready()`; the multiplexer awaits it
 * between messages so the buffer stays bounded.
 */
export interface OutputSink extends TextWriter {
    /** Resolves once the sink accepts more output. */
    ready?(): Promise<void>;
}

/**
 * A Node writable, optionally a terminal.
 *
 * `process.stdout` and `tty.WriteStream` qualify.
 */
export interface OutputStream extends NodeJS.WritableStream {
    /** File descriptor, used to query the terminal width. */
    fd?: number;
    /** Whether the stream is an interactive terminal. */
    isTTY?: boolean;
}

/**
 * Sink over a Node writable that turns asynchronous stream errors into
 * synchronous write failures.
 */
export interface StreamSink extends OutputSink {
    ready(): Promise<void>;
    /**
     * Resolves once every write has been handed to the underlying
     * resource or has failed, and any resulting `error` event has been
     * delivered.
     */
    flush(): Promise<void>;
    /**
     * Throws the first error the stream has emitted, if any.
     */
    assertHealthy(): void;
    /**
     * Stops listening for stream errors and close.
     */
    release(): void;
}

/**
 * Wraps a Node writable as an {@link OutputSink}.
 *
 * Writable streams report failures through write callbacks and `error`
 * events, both on a later tick than the `write()` that failed. The first
 * such error is recorded and thrown from the next write, or from
 * {@link StreamSink.assertHealthy}. Call {@link StreamSink.flush} before
 * the final check so late failures are seen.
 *
 * @param stream - The writable to wrap
 * @returns A sink writing to `stream`
 */
export function createStreamSink(stream: NodeJS.WritableStream): StreamSink {
    let failure: Error | undefined;
    let pending = 0;
    let needsDrain = false;
    let settled: Array<() => void> = [];

    const record = (error: Error) => {
        failure ??= error;
    };
    stream.on('error', record);

    // a destroyed stream may never call back for writes in flight
    let closed = false;
    const wake = () => {
        const waiting = settled;
        settled = [];
        waiting.forEach((resolve) => resolve());
    };
    const onClose = () => {
        closed = true;
        wake();
    };
    stream.on('close', onClose);

    const onWritten = (error?: Error | null) => {
        if (error) {
            record(error);
        }
        pending -= 1;
        if (pending === 0) {
            wake();
        }
    };

    const assertHealthy = () => {
        if (failure) {
            throw failure;
        }
    };

    return {
        write(chunk: string) {
            assertHealthy();
            pending += 1;
            const accepted = stream.write(chunk, onWritten);
            needsDrain ||= !accepted;
            return accepted;
        },
        async ready() {
            assertHealthy();
            if (!needsDrain) {
                return;
            }
            // rejects with the stream's error if it fails instead
            await once(stream, 'drain');
            needsDrain = false;
        },
        async flush() {
            if (pending > 0 && !closed) {
                await new Promise<void>((resolve) => settled.push(resolve));
            }
            // error events are emitted on a tick after the write callback
            await new Promise<void>((resolve) => setImmediate(resolve));
        },
        assertHealthy,
        release() {
            stream.off('error', record);
            stream.off('close', onClose);
        },
    };
}
