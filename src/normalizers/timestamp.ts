/**
 * Timestamp coercion
 * Unix seconds, unix milliseconds, numeric strings and date strings all map to ISO-8601
 */

// Anything above this is a millisecond epoch (1e12 s is the year 33658)
const MILLISECONDS_THRESHOLD = 1e12;

export interface TimestampResult {
    iso: string;
    parsed: boolean;
}

function fromEpoch(value: number): Date | null {
    if (!Number.isFinite(value) || value <= 0) {
        return null;
    }
    const ms = value > MILLISECONDS_THRESHOLD ? value : value * 1000;
    const date = new Date(ms);
    return Number.isNaN(date.getTime()) ? null : date;
}

function toDate(raw: unknown): Date | null {
    if (raw instanceof Date) {
        return Number.isNaN(raw.getTime()) ? null : raw;
    }
    if (typeof raw === 'number') {
        return fromEpoch(raw);
    }
    if (typeof raw === 'string') {
        const text = raw.trim();
        if (/^\d+(\.\d+)?$/.test(text)) {
            return fromEpoch(Number(text));
        }
        const ms = Date.parse(text);
        return Number.isNaN(ms) ? null : new Date(ms);
    }
    return null;
}

/**
 * Normalize a raw timestamp; unparseable input yields `now` with parsed=false
 */
export function normalizeTimestamp(raw: unknown, now: () => Date = () => new Date()): TimestampResult {
    const date = toDate(raw);
    if (date) {
        return { iso: date.toISOString(), parsed: true };
    }
    return { iso: now().toISOString(), parsed: false };
}
