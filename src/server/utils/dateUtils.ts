/**
 * Date utility functions for parsing remote timestamps
 */

import { TimestampParseError } from '../types/errors.js';

/**
 * `YYYY-MM-DDTHH:MM:SS.ffffff±HH:MM`. The fraction takes one to six digits and
 * the offset may also be written `±HHMM` or `Z`.
 */
const REMOTE_TIMESTAMP_PATTERN =
    /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})\.(\d{1,6})(Z|([+-])(\d{2}):?(\d{2}))$/;

function offsetMinutes(sign: string | undefined, hours: string | undefined, minutes: string | undefined): number | null {
    if (sign === undefined || hours === undefined || minutes === undefined) {
        return 0; // 'Z'
    }
    const h = parseInt(hours, 10);
    const m = parseInt(minutes, 10);
    if (h > 23 || m > 59) {
        return null;
    }
    const total = h * 60 + m;
    return sign === '-' ? -total : total;
}

/**
 * Parse a remote `updated_at` value into an instant.
 *
 * Sub-millisecond digits are dropped since `Date` only keeps milliseconds.
 *
 * @throws {TimestampParseError} if the value does not match the pattern or names an impossible date
 */
export function parseRemoteTimestamp(value: string): Date {
    const match = REMOTE_TIMESTAMP_PATTERN.exec(value);
    if (!match) {
        throw new TimestampParseError(value);
    }

    const [, yearStr, monthStr, dayStr, hourStr, minuteStr, secondStr, fraction, , sign, offH, offM] = match;
    const year = parseInt(yearStr, 10);
    const month = parseInt(monthStr, 10);
    const day = parseInt(dayStr, 10);
    const hour = parseInt(hourStr, 10);
    const minute = parseInt(minuteStr, 10);
    const second = parseInt(secondStr, 10);
    const millis = Math.floor(parseInt(fraction.padEnd(6, '0'), 10) / 1000);
    const offset = offsetMinutes(sign, offH, offM);

    if (offset === null || year < 1 || hour > 23 || minute > 59 || second > 59) {
        throw new TimestampParseError(value);
    }

    // setUTCFullYear avoids the two-digit year mapping of Date.UTC
    const local = new Date(0);
    local.setUTCFullYear(year, month - 1, day);
    local.setUTCHours(hour, minute, second, millis);

    if (
        local.getUTCFullYear() !== year ||
        local.getUTCMonth() !== month - 1 ||
        local.getUTCDate() !== day
    ) {
        throw new TimestampParseError(value);
    }

    return new Date(local.getTime() - offset * 60_000);
}

