import { InvalidInputError } from './errors.js';

export type Period = 'day' | 'week' | 'month';

const DAY_MS = 24 * 60 * 60 * 1000;
const PERIOD_DAYS: Record<Period, number> = { day: 1, week: 7, month: 30 };

const DATE_ONLY = /^(\d{4})-(\d{2})-(\d{2})$/;
const LOCAL_DATE_TIME = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})$/;
const ISO_DATE_TIME = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(\.\d+)?(Z|[+-]\d{2}:\d{2})$/;

function isPeriod(value: string): value is Period {
    return value === 'day' || value === 'week' || value === 'month';
}

function sameFields(d: Date, utc: boolean, fields: number[]): boolean {
    const actual = utc
        ? [d.getUTCFullYear(), d.getUTCMonth() + 1, d.getUTCDate(), d.getUTCHours(), d.getUTCMinutes(), d.getUTCSeconds()]
        : [d.getFullYear(), d.getMonth() + 1, d.getDate(), d.getHours(), d.getMinutes(), d.getSeconds()];
    return fields.every((f, i) => f === actual[i]);
}

/**
 * Start of a summary window: `since` (`YYYY-MM-DD` as UTC midnight, or an
 * ISO 8601 date-time with offset) wins over `period`, which counts back
 * from `now`. Months are 30 days.
 */
export function resolveSince(input: { since?: string; period?: string }, now: Date): Date {
    const since = input.since?.trim();
    if (since) {
        const dateOnly = DATE_ONLY.exec(since);
        if (dateOnly) {
            const fields = dateOnly.slice(1).map(Number);
            const d = new Date(Date.UTC(fields[0], fields[1] - 1, fields[2]));
            if (sameFields(d, true, fields)) return d;
        } else if (ISO_DATE_TIME.test(since)) {
            const d = new Date(since);
            if (!Number.isNaN(d.getTime())) return d;
        }
        throw new InvalidInputError(
            'since',
            "invalid since format, use ISO 8601 (e.g., '2024-01-15' or '2024-01-15T00:00:00Z')",
        );
    }

    const period = input.period?.trim() || 'month';
    if (!isPeriod(period)) {
        throw new InvalidInputError('period', `invalid period: ${period} (use 'day', 'week', or 'month')`);
    }
    return new Date(now.getTime() - PERIOD_DAYS[period] * DAY_MS);
}

/**
 * `YYYY-MM-DD` or `YYYY-MM-DD HH:mm:ss` in local time; empty means unset.
 * With `endOfDay`, a bare date stands for the last millisecond of that day.
 */
export function parseLocalDate(
    field: string,
    value: string | undefined,
    options: { endOfDay?: boolean } = {},
): Date | undefined {
    const s = value?.trim();
    if (!s) return undefined;

    const match = LOCAL_DATE_TIME.exec(s) ?? DATE_ONLY.exec(s);
    if (match) {
        const fields = match.slice(1).map(Number);
        const [y, mo, d, h = 0, mi = 0, sec = 0] = fields;
        const date = new Date(y, mo - 1, d, h, mi, sec);
        if (sameFields(date, false, fields)) {
            if (options.endOfDay && fields.length === 3) date.setHours(23, 59, 59, 999);
            return date;
        }
    }

    throw new InvalidInputError(field, `invalid date format "${s}", expected YYYY-MM-DD or YYYY-MM-DD HH:MM:SS`);
}

const pad = (n: number) => String(n).padStart(2, '0');

/** `YYYY-MM-DD_HH-mm-ss`, local time, safe in file names. */
export function fileTimestamp(date: Date): string {
    return (
        `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}` +
        `_${pad(date.getHours())}-${pad(date.getMinutes())}-${pad(date.getSeconds())}`
    );
}
