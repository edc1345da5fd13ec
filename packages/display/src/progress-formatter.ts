/**
 * Progress fragment rendering: bar, counts and time-left estimate for
 * a single {@link JsonProgress}.
 */

import type { JsonProgress } from '@pullview/types';
import {
    DEFAULT_TERMINAL_WIDTH,
    queryTerminalWidth,
} from '@pullview/terminal';
import { formatDuration, humanSize } from '@pullview/utils';

/** Number of cells of a full bar (one cell per 2%). */
export const BAR_CELLS = 50;

/** Bars are only drawn on terminals wider than this. */
const MIN_WIDTH_FOR_BAR = 110;

/** The time-left estimate is only shown on terminals wider than this. */
const MIN_WIDTH_FOR_TIME_LEFT = 50;

/**
 * Environment a progress fragment is rendered in.
 */
export interface ProgressRenderContext {
    /** Fixed window width in columns; when unset the terminal is queried. */
    winSize?: number;
    /** File descriptor of the terminal to query for its width. */
    terminalFd?: number;
    /** Clock used for the time-left estimate (default: system clock). */
    now?: () => Date;
}

/**
 * Resolves the window width for a render context.
 *
 * @returns The fixed width, the queried terminal width, or 200
 */
export function resolveWidth(context: ProgressRenderContext): number {
    if (context.winSize) {
        return context.winSize;
    }
    return queryTerminalWidth(context.terminalFd) ?? DEFAULT_TERMINAL_WIDTH;
}

/**
 * Renders the current/total counts for bytes or custom units.
 */
function formatCounts(current: number, total: number, units: string): string {
    if (units === '') {
        const currentText = humanSize(current).padStart(8);
        if (current > total) {
            // remove total display if the reported current is wonky.
            return currentText;
        }
        return `${currentText}/${humanSize(total)}`;
    }
    if (current > total) {
        return `${current} ${units}`;
    }
    return `${current}/${total} ${units}`;
}

/**
 * Renders a progress record as a single-line fragment.
 *
 * The fragment is made of up to three parts: a 50-cell bar (terminals
 * wider than 110 columns), the counts, and an estimate of the time left
 * (terminals wider than 50 columns, once a start time is known).
 *
 * @param progress - The progress record
 * @param context - Width and clock to render with
 * @returns The fragment, or an empty string when there is nothing to show
 *
 * @example
 * ```typescript
 * formatProgress({ current: 50, total: 100 }, { winSize: 80 });
 * // '     50B/100B'
 * ```
 */
export function formatProgress(
    progress: JsonProgress,
    context: ProgressRenderContext = {},
): string {
    const current = progress.current ?? 0;
    const total = progress.total ?? 0;
    const start = progress.start ?? 0;
    const units = progress.units ?? '';

    if (current <= 0 && total <= 0) {
        return '';
    }
    if (total <= 0) {
        return units === ''
            ? humanSize(current).padStart(8)
            : `${current} ${units}`;
    }

    const width = resolveWidth(context);
    const percentage = Math.min(
        BAR_CELLS,
        Math.trunc(Math.trunc((current / total) * 100) / 2),
    );

    let bar = '';
    if (width > MIN_WIDTH_FOR_BAR) {
        const filled = Math.max(0, percentage);
        bar = `[${'='.repeat(filled)}>${' '.repeat(BAR_CELLS - filled)}] `;
    }

    const counts = progress.hidecounts
        ? ''
        : formatCounts(current, total, units);

    let timeLeft = '';
    if (current > 0 && start > 0 && percentage < BAR_CELLS) {
        const now = context.now ? context.now() : new Date();
        const elapsedNanos = (now.getTime() - start * 1000) * 1e6;
        const nanosPerUnit = Math.trunc(elapsedNanos / current);
        const leftSeconds = ((total - current) * nanosPerUnit) / 1e9;

        if (width > MIN_WIDTH_FOR_TIME_LEFT) {
            timeLeft = ' ' + formatDuration(leftSeconds);
        }
    }

    return bar + counts + timeLeft;
}
