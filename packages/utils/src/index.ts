/**
 * @pullview/utils
 *
 * Shared utility functions for pullview packages
 */

export {
    createLogger,
    silentLogger,
    type Logger,
    type LoggerOptions,
} from './logger.js';

/**
 * The current version of pullview
 *
 * Used for displaying version information in the CLI.
 */
export const VERSION = '0.1.0';

/** Decimal size units, in steps of 1000. */
const DECIMAL_UNITS = ['B', 'kB', 'MB', 'GB', 'TB', 'PB', 'EB', 'ZB', 'YB'];

/**
 * Formats a byte count as a human-readable decimal size with four
 * significant digits and no trailing zeros.
 *
 * @param size - Size in bytes
 * @returns The scaled size, e.g. `50B`, `1.235MB`
 *
 * @example
 * ```ts
 * humanSize(1234567); // '1.235MB'
 * ```
 */
export function humanSize(size: number): string {
    let scaled = size;
    let unitIndex = 0;
    while (scaled >= 1000 && unitIndex < DECIMAL_UNITS.length - 1) {
        scaled /= 1000;
        unitIndex++;
    }
    return `${Number(scaled.toPrecision(4))}${DECIMAL_UNITS[unitIndex]}`;
}

/**
 * Formats a whole number of seconds as a compact duration.
 *
 * Larger units are only shown once reached, and every smaller unit is
 * shown after them: `0s`, `45s`, `1m30s`, `1h0m5s`.
 *
 * @param totalSeconds - Duration in seconds (fractions are truncated)
 * @returns The formatted duration, prefixed with `-` when negative
 */
export function formatDuration(totalSeconds: number): string {
    const whole = Math.trunc(totalSeconds);
    const sign = whole < 0 ? '-' : '';
    const abs = Math.abs(whole);

    const hours = Math.floor(abs / 3600);
    const minutes = Math.floor((abs % 3600) / 60);
    const seconds = abs % 60;

    if (hours > 0) {
        return `${sign}${hours}h${minutes}m${seconds}s`;
    }
    if (minutes > 0) {
        return `${sign}${minutes}m${seconds}s`;
    }
    return `${sign}${seconds}s`;
}

const NANOS_PER_SECOND = 1_000_000_000n;
const SECONDS_PER_DAY = 86_400n;
const DAYS_PER_ERA = 146_097n;
// days from 0000-03-01 to 1970-01-01
const EPOCH_DAY_OFFSET = 719_468n;

function floorDiv(a: bigint, b: bigint): bigint {
    const quotient = a / b;
    return a % b !== 0n && (a < 0n) !== (b < 0n) ? quotient - 1n : quotient;
}

function pad(value: bigint, width: number): string {
    return value.toString().padStart(width, '0');
}

/**
 * Converts days since the Unix epoch to a proleptic Gregorian date.
 * Works in 400-year eras starting on March 1st, so leap days fall at the
 * end of each year.
 */
function civilFromDays(days: bigint): [bigint, bigint, bigint] {
    const shifted = days + EPOCH_DAY_OFFSET;
    const era = floorDiv(shifted, DAYS_PER_ERA);
    const dayOfEra = shifted - era * DAYS_PER_ERA;
    const yearOfEra =
        (dayOfEra -
            dayOfEra / 1460n +
            dayOfEra / 36_524n -
            dayOfEra / 146_096n) /
        365n;
    const dayOfYear =
        dayOfEra - (365n * yearOfEra + yearOfEra / 4n - yearOfEra / 100n);
    const monthIndex = (5n * dayOfYear + 2n) / 153n;
    const day = dayOfYear - (153n * monthIndex + 2n) / 5n + 1n;
    const month = monthIndex < 10n ? monthIndex + 3n : monthIndex - 9n;
    const year = yearOfEra + era * 400n + (month <= 2n ? 1n : 0n);
    return [year, month, day];
}

/**
 * Formats a point in time as a fixed-width UTC timestamp with nanosecond
 * precision, `YYYY-MM-DDTHH:MM:SS.nnnnnnnnnZ`.
 *
 * The fractional part is always nine digits so every timestamp occupies
 * the same number of characters. Years past 9999 take as many digits as
 * they need and years before 0 carry a leading `-`; any `bigint` is
 * accepted.
 *
 * @param epochNanos - Nanoseconds since the Unix epoch
 * @returns The formatted timestamp
 *
 * @example
 * ```typescript
 * formatTimestamp(1_700_000_000_000_000_000n);
 * // '2023-11-14T22:13:20.000000000Z'
 * ```
 */
export function formatTimestamp(epochNanos: bigint): string {
    const seconds = floorDiv(epochNanos, NANOS_PER_SECOND);
    const nanos = epochNanos - seconds * NANOS_PER_SECOND;
    const days = floorDiv(seconds, SECONDS_PER_DAY);
    const secondOfDay = seconds - days * SECONDS_PER_DAY;
    const [year, month, day] = civilFromDays(days);

    const yearText = year < 0n ? `-${pad(-year, 4)}` : pad(year, 4);
    const date = `${yearText}-${pad(month, 2)}-${pad(day, 2)}`;
    const time = [
        secondOfDay / 3600n,
        (secondOfDay % 3600n) / 60n,
        secondOfDay % 60n,
    ]
        .map((part) => pad(part, 2))
        .join(':');
    return `${date}T${time}.${pad(nanos, 9)}Z`;
}
