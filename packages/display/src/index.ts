/**
 * @pullview/display
 *
 * Renders streams of JSON progress messages as a scrolling log or as a
 * live multi-row display on a terminal.
 *
 * @packageDocumentation
 */

export {
    AUTHENTICATION_REQUIRED_CODE,
    StreamDisplayError,
    StreamErrorCode,
    createDecodeError,
    createInvalidMessageError,
    createReportedError,
    isDecodeError,
    isReportedFailure,
} from './errors.js';

export { validateJsonMessage } from './validation.js';

export {
    JsonValueSplitter,
    decodeJsonMessages,
    parseJsonMessage,
    type MessageSource,
    type RawJsonValue,
} from './decoder.js';

export {
    BAR_CELLS,
    formatProgress,
    resolveWidth,
    type ProgressRenderContext,
} from './progress-formatter.js';

export { displayJsonMessage, getReportedError } from './line-renderer.js';

export {
    StreamMultiplexer,
    displayJsonMessagesStream,
    displayJsonMessagesToStream,
    type AuxCallback,
    type StreamDisplayOptions,
} from './stream-display.js';

export {
    createStreamSink,
    type OutputSink,
    type OutputStream,
    type StreamSink,
} from './sink.js';
