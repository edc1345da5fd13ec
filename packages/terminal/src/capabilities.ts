/**
 * Capability sets: escape-sequence lookup for the terminal being
 * rendered to.
 *
 * There are two implementations. {@link TerminfoCapabilities} answers
 * from a terminfo database entry; {@link NO_CAPABILITIES} is the canary
 * used when no entry could be loaded, and answers nothing. Callers
 * always hold a valid set and fall back to plain ANSI sequences when a
 * lookup comes back empty.
 */

import { silentLogger, type Logger } from '@pullview/utils';
import { expandParameters, stripPadding } from './parameters.js';
import {
    STRING_CAPABILITY_INDEX,
    TermInfoError,
    openTermInfo,
    terminfoSearchDirs,
    type TermInfoEntry,
} from './terminfo.js';

/**
 * Terminal type assumed when `TERM` is unset.
 */
export const DEFAULT_TERM = 'vt102';

/**
 * Lookup of terminal escape sequences by terminfo capability name.
 */
export interface CapabilitySet {
    /**
     * Resolves a string capability and expands its parameters.
     *
     * @param name - Terminfo capability name, such as `cuu` or `el1`
     * @param params - Numeric parameters for parameterized capabilities
     * @returns The escape sequence, or undefined when unsupported
     */
    parse(name: string, ...params: number[]): string | undefined;
}

/**
 * Canary capability set used when no terminfo entry is available.
 * Every lookup fails.
 */
export const NO_CAPABILITIES: CapabilitySet = {
    parse: () => undefined,
};

/**
 * Capability set backed by a decoded terminfo entry.
 */
export class TerminfoCapabilities implements CapabilitySet {
    constructor(private readonly entry: TermInfoEntry) {}

    /** Primary name of the terminal this entry describes. */
    get term(): string {
        return this.entry.names[0] ?? '';
    }

    parse(name: string, ...params: number[]): string | undefined {
        const index = STRING_CAPABILITY_INDEX[name];
        if (index === undefined) {
            return undefined;
        }
        const template = this.entry.strings[index];
        if (template === undefined) {
            return undefined;
        }
        return expandParameters(stripPadding(template), params);
    }
}

/**
 * Options for {@link resolveCapabilities}.
 */
export interface ResolveCapabilitiesOptions {
    /** Source of `TERM` and the terminfo paths (default: `process.env`). */
    env?: Record<string, string | undefined>;
    /** Terminal name; overrides `TERM`. */
    term?: string;
    /** Database directories; overrides the environment-derived search path. */
    searchDirs?: string[];
    /** Receives a debug line describing the outcome. */
    logger?: Logger;
}

/**
 * Resolves the capability set for the invoking terminal.
 *
 * A missing or unreadable terminfo entry is not an error: the canary
 * {@link NO_CAPABILITIES} is returned instead.
 *
 * @param options - Lookup configuration
 * @returns A database-backed set, or the canary
 */
export async function resolveCapabilities(
    options: ResolveCapabilitiesOptions = {},
): Promise<CapabilitySet> {
    const env = options.env ?? process.env;
    const logger = options.logger ?? silentLogger;
    const term = options.term || env.TERM || DEFAULT_TERM;
    const searchDirs = options.searchDirs ?? terminfoSearchDirs(env);

    try {
        const entry = await openTermInfo(term, searchDirs);
        logger.debug(`Loaded terminfo entry for ${term}`);
        return new TerminfoCapabilities(entry);
    } catch (error) {
        if (!(error instanceof TermInfoError)) {
            throw error;
        }
        logger.debug(`${error.message}; using ANSI escape sequences`);
        return NO_CAPABILITIES;
    }
}
