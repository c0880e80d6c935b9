import type { RawValue } from "@/lib/market/types";

function isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Flatten a nested JSON record into dotted keys:
 * { a: 1, b: { c: 2 } } -> { a: 1, "b.c": 2 }.
 * Arrays are kept as their JSON text; undefined values are dropped.
 */
export function flattenRecord(record: Record<string, unknown>, prefix = ""): Record<string, RawValue> {
    const flat: Record<string, RawValue> = {};

    for (const [key, value] of Object.entries(record)) {
        const path = prefix ? `${prefix}.${key}` : key;

        if (isPlainObject(value)) {
            Object.assign(flat, flattenRecord(value, path));
        } else if (Array.isArray(value)) {
            flat[path] = JSON.stringify(value);
        } else if (
            value === null ||
            typeof value === "string" ||
            typeof value === "number" ||
            typeof value === "boolean"
        ) {
            flat[path] = value;
        }
    }

    return flat;
}
