import { appendFile, readFile } from "fs/promises";
import dotenv from "dotenv";

function isMissingFile(error: unknown): boolean {
    return error instanceof Error && "code" in error && error.code === "ENOENT";
}

async function readIfExists(path: string): Promise<string> {
    try {
        return await readFile(path, "utf-8");
    } catch (error) {
        if (isMissingFile(error)) return "";
        throw error;
    }
}

/**
 * Append KEY=value lines for keys the file does not define yet.
 * Existing values are never overwritten. Returns the keys written.
 */
export async function appendMissingEnvKeys(path: string, entries: Record<string, string>): Promise<string[]> {
    const current = await readIfExists(path);
    // Same reading dotenv applies at load time, so quoted multi-line values stay opaque.
    const defined = new Set(Object.keys(dotenv.parse(current)));

    const missing = Object.entries(entries).filter(([key]) => !defined.has(key));
    if (missing.length === 0) return [];

    const prefix = current.length > 0 && !current.endsWith("\n") ? "\n" : "";
    await appendFile(path, prefix + missing.map(([key, value]) => `${key}=${value}\n`).join(""), "utf-8");

    return missing.map(([key]) => key);
}
