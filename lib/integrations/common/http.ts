export type FetchLike = (input: string | URL, init?: RequestInit) => Promise<Response>;

/**
 * fetch with an AbortController deadline. The timer is always cleared,
 * including when the body read that follows rejects.
 */
export async function fetchWithTimeout<T>(
    fetchImpl: FetchLike,
    url: string,
    init: RequestInit,
    timeoutMs: number,
    read: (response: Response) => Promise<T>
): Promise<T> {
    const controller = new AbortController();
    const timeout = setTimeout(() => { controller.abort(); }, timeoutMs);

    try {
        const response = await fetchImpl(url, { ...init, signal: controller.signal });
        return await read(response);
    } finally {
        clearTimeout(timeout);
    }
}

export function describeFailure(error: unknown): string {
    if (error instanceof Error) {
        return error.name === "AbortError" ? "request timed out" : error.message;
    }
    return String(error);
}

export function tryParseJson(body: string): { ok: true; value: unknown } | { ok: false } {
    try {
        return { ok: true, value: JSON.parse(body) };
    } catch {
        return { ok: false };
    }
}
