/**
 * Renders one message as one line of output.
 */

import type { JsonError, JsonMessage } from '@pullview/types';
import { clearLine, type CapabilitySet } from '@pullview/terminal';
import { formatTimestamp } from '@pullview/utils';
import { createReportedError } from './errors.js';
import {
    formatProgress,
    type ProgressRenderContext,
} from './progress-formatter.js';
import type { OutputSink } from './sink.js';

const NANOS_PER_SECOND = 1_000_000_000n;

/**
 * Returns the failure a message reports, if any. The deprecated `error`
 * text counts when there is no `errorDetail`.
 */
export function getReportedError(message: JsonMessage): JsonError | undefined {
    if (message.errorDetail) {
        return message.errorDetail;
    }
    if (message.error) {
        return { message: message.error };
    }
    return undefined;
}

/**
 * Returns the message's timestamp in epoch nanoseconds. `timeNano` wins
 * over `time`.
 */
function getTimestamp(message: JsonMessage): bigint | undefined {
    if (message.timeNano) {
        return BigInt(message.timeNano);
    }
    if (message.time) {
        return BigInt(message.time) * NANOS_PER_SECOND;
    }
    return undefined;
}

/**
 * Writes one message to `out`.
 *
 * With a capability set (`out` is a terminal), a progress line is
 * rendered in place: the current line is cleared first and the line
 * ends in a carriage return instead of a newline. Without one,
 * structured progress is not rendered at all; status and stream text
 * are.
 *
 * @param message - The message to render
 * @param out - Destination
 * @param capabilities - Capability set when `out` is a terminal
 * @param context - Width and clock for the progress fragment
 * @throws {StreamDisplayError} When the message reports a failure;
 *         nothing is written in that case
 *
 * @example
 * ```typescript
 * displayJsonMessage({ id: 'abc', status: 'Pull complete' }, sink);
 * // writes 'abc: Pull complete\n'
 * ```
 */
export function displayJsonMessage(
    message: JsonMessage,
    out: OutputSink,
    capabilities?: CapabilitySet,
    context: ProgressRenderContext = {},
): void {
    const reported = getReportedError(message);
    if (reported) {
        throw createReportedError(reported);
    }

    const { progressDetail, progress, stream, status = '' } = message;
    const inPlace =
        capabilities !== undefined &&
        !stream &&
        (progressDetail !== undefined || !!progress);

    let endl = '\n';
    if (inPlace) {
        clearLine(out, capabilities);
        endl = '\r';
        out.write(endl);
    } else if (
        capabilities === undefined &&
        progressDetail &&
        formatProgress(progressDetail, context) !== ''
    ) {
        // progress bars are terminal-only
        return;
    }

    const timestamp = getTimestamp(message);
    if (timestamp !== undefined) {
        out.write(`${formatTimestamp(timestamp)} `);
    }
    if (message.id) {
        out.write(`${message.id}: `);
    }
    if (message.from) {
        out.write(`(from ${message.from}) `);
    }

    if (progressDetail && capabilities) {
        const fragment = formatProgress(progressDetail, context);
        out.write(`${status} ${fragment}${endl}`);
    } else if (progress) {
        out.write(`${status} ${progress}${endl}`);
    } else if (stream) {
        out.write(stream);
    } else {
        out.write(`${status}${endl}`);
    }
}
