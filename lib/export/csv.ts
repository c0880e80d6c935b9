import { writeFile } from "fs/promises";
import type { EnrichedRow, RawValue } from "@/lib/market/types";

export const FIXED_COLUMNS = [
    "instrument_name",
    "expiry_date",
    "strike_price",
    "side",
    "price",
    "instrument_key",
    "lot_size",
    "transaction_type",
    "margin_required",
    "premium_earned",
] as const;

type Cell = RawValue | undefined;

/** RFC 4180 field escaping */
export function escapeField(value: Cell): string {
    const s = value === null || value === undefined ? "" : String(value);
    return /[",\r\n]/.test(s) ? `"${s.replace(/"/g, '""')}"` : s;
}

function fixedCells(row: EnrichedRow): Cell[] {
    return [
        row.instrumentName,
        row.expiryDate,
        row.strikePrice,
        row.side,
        row.price,
        row.instrumentKey,
        row.lotSize,
        row.transactionType,
        row.marginRequired,
        row.premiumEarned,
    ];
}

/**
 * Header is the fixed columns followed by every passthrough key in first-seen order.
 * A passthrough key that collides with a fixed column is written once, as the fixed value.
 */
export function toCsv(rows: readonly EnrichedRow[]): string {
    const fixed = new Set<string>(FIXED_COLUMNS);
    const rawColumns: string[] = [];
    const seen = new Set<string>();

    for (const row of rows) {
        for (const key of Object.keys(row.raw)) {
            if (fixed.has(key) || seen.has(key)) continue;
            seen.add(key);
            rawColumns.push(key);
        }
    }

    const lines = [[...FIXED_COLUMNS, ...rawColumns].map(escapeField).join(",")];
    for (const row of rows) {
        const cells = [...fixedCells(row), ...rawColumns.map((key) => row.raw[key])];
        lines.push(cells.map(escapeField).join(","));
    }

    return lines.join("\n") + "\n";
}

export async function writeCsv(path: string, rows: readonly EnrichedRow[]): Promise<void> {
    await writeFile(path, toCsv(rows), "utf-8");
}
