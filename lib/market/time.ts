import { format, isValid, parse } from "date-fns";

const NSE_EXPIRY_FORMAT = "dd-MMM-yyyy";
const DATE_KEY_FORMAT = "yyyy-MM-dd";
const TRADING_SYMBOL_DATE_FORMAT = "dd MMM yy";

// Upstox sessions end at 03:30 IST, which is 22:00 UTC on the previous calendar day.
const TOKEN_CUTOFF_UTC_HOUR = 22;
const DAY_MS = 24 * 60 * 60 * 1000;

const REFERENCE_DATE = new Date(2000, 0, 1);

function parseStrict(value: string, pattern: string): Date | null {
    const parsed = parse(value.trim(), pattern, REFERENCE_DATE);
    return isValid(parsed) ? parsed : null;
}

/** "24-Dec-2024" -> "2024-12-24" */
export function parseNseExpiry(value: string): string | null {
    const parsed = parseStrict(value, NSE_EXPIRY_FORMAT);
    return parsed ? format(parsed, DATE_KEY_FORMAT) : null;
}

/** Accepts YYYY-MM-DD only; returns the same key normalized, or null. */
export function normalizeDateKey(value: string): string | null {
    const parsed = parseStrict(value, DATE_KEY_FORMAT);
    return parsed ? format(parsed, DATE_KEY_FORMAT) : null;
}

/** "2024-12-24" -> "24 DEC 24", the date part of an Upstox trading symbol */
export function toTradingSymbolDate(dateKey: string): string {
    const parsed = parseStrict(dateKey, DATE_KEY_FORMAT);
    if (!parsed) {
        throw new RangeError(`Invalid date key: ${dateKey}`);
    }
    return format(parsed, TRADING_SYMBOL_DATE_FORMAT).toUpperCase();
}

/**
 * First 03:30 IST cutoff strictly after `issuedAt`.
 * Tokens issued at or after the cutoff live until the next day's cutoff.
 */
export function nextTokenCutoff(issuedAt: Date): Date {
    const cutoff = Date.UTC(
        issuedAt.getUTCFullYear(),
        issuedAt.getUTCMonth(),
        issuedAt.getUTCDate(),
        TOKEN_CUTOFF_UTC_HOUR
    );
    return new Date(cutoff > issuedAt.getTime() ? cutoff : cutoff + DAY_MS);
}
