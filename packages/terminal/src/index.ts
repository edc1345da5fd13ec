/**
 * @pullview/terminal
 *
 * Terminal capability lookup and cursor control for in-place progress
 * rendering.
 *
 * @packageDocumentation
 */

export {
    DEFAULT_TERM,
    NO_CAPABILITIES,
    TerminfoCapabilities,
    resolveCapabilities,
    type CapabilitySet,
    type ResolveCapabilitiesOptions,
} from './capabilities.js';

export {
    clearLine,
    cursorUp,
    cursorDown,
    type TextWriter,
} from './cursor.js';

export { expandParameters, stripPadding } from './parameters.js';

export {
    ansi,
    DEFAULT_TERMINAL_WIDTH,
    queryTerminalWidth,
} from './terminal.js';

export {
    SYSTEM_TERMINFO_DIRS,
    STRING_CAPABILITY_INDEX,
    TermInfoError,
    openTermInfo,
    parseTermInfo,
    terminfoSearchDirs,
    type TermInfoEntry,
} from './terminfo.js';
