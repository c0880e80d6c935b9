import { config } from "@/lib/config";
import { logger } from "@/lib/logger";
import { UpstreamUnavailableError } from "@/lib/errors";
import { NseOptionChainSchema, type NseOptionChain } from "@/lib/validation/option-chain";
import { describeFailure, fetchWithTimeout, tryParseJson, type FetchLike } from "../common/http";

const UPSTREAM = "NSE";

// NSE serves JSON only to requests that look like a browser session.
const BROWSER_HEADERS: Record<string, string> = {
    "User-Agent":
        "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/129.0.0.0 Safari/537.36",
    Accept: "application/json, text/plain, */*",
    "Accept-Language": "en-US,en;q=0.9,en-IN;q=0.8",
};

type NseClientOptions = {
    baseUrl?: string;
    timeoutMs?: number;
    fetchImpl?: FetchLike;
};

type TextReply = { status: number; ok: boolean; body: string; cookies: string[] };

export class NseClient {
    private baseUrl: string;
    private timeoutMs: number;
    private fetchImpl: FetchLike;

    constructor(options: NseClientOptions = {}) {
        this.baseUrl = options.baseUrl ?? config.nse.baseUrl;
        this.timeoutMs = options.timeoutMs ?? config.http.timeoutMs;
        this.fetchImpl = options.fetchImpl ?? fetch;
    }

    private async get(url: string, cookie?: string): Promise<TextReply> {
        const headers: Record<string, string> = { ...BROWSER_HEADERS };
        if (cookie) headers.Cookie = cookie;

        try {
            return await fetchWithTimeout(this.fetchImpl, url, { headers }, this.timeoutMs, async (response) => ({
                status: response.status,
                ok: response.ok,
                body: await response.text(),
                cookies: response.headers.getSetCookie(),
            }));
        } catch (error) {
            throw new UpstreamUnavailableError(UPSTREAM, describeFailure(error), undefined, error);
        }
    }

    private async primeSession(): Promise<string> {
        const reply = await this.get(this.baseUrl);
        // Keep only "name=value" from each Set-Cookie line.
        return reply.cookies.map((line) => line.split(";")[0].trim()).filter(Boolean).join("; ");
    }

    /**
     * GET a JSON endpoint. A non-JSON first reply (NSE answers a cookieless call
     * with an HTML page, often 401/403) means the session cookies are missing,
     * so the home page is visited once and the call is repeated.
     */
    private async requestJson(path: string, query: Record<string, string>): Promise<unknown> {
        const url = `${this.baseUrl}${path}?${new URLSearchParams(query).toString()}`;

        let reply = await this.get(url);
        let parsed = tryParseJson(reply.body);

        if (!parsed.ok) {
            logger.debug({ path, status: reply.status }, "NSE returned non-JSON body, priming session cookies");
            const cookie = await this.primeSession();
            reply = await this.get(url, cookie);
            parsed = tryParseJson(reply.body);
        }

        if (!reply.ok) {
            throw new UpstreamUnavailableError(UPSTREAM, `HTTP ${reply.status}`, reply.status);
        }
        if (!parsed.ok) {
            throw new UpstreamUnavailableError(UPSTREAM, "response was not JSON", reply.status);
        }
        return parsed.value;
    }

    async getOptionChain(symbol: string): Promise<NseOptionChain> {
        const payload = await this.requestJson("/api/option-chain-indices", { symbol });
        const result = NseOptionChainSchema.safeParse(payload);

        if (!result.success) {
            throw new UpstreamUnavailableError(UPSTREAM, "unexpected option-chain payload", undefined, result.error);
        }

        logger.debug({ symbol, strikes: result.data.records?.data.length ?? 0 }, "NSE option chain received");
        return result.data;
    }
}
