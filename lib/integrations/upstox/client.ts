import { config } from "@/lib/config";
import { logger } from "@/lib/logger";
import { UpstreamUnavailableError } from "@/lib/errors";
import type { TransactionType } from "@/lib/market/types";
import { MarginResponseSchema } from "@/lib/validation/upstox";
import { describeFailure, fetchWithTimeout, tryParseJson, type FetchLike } from "../common/http";

const UPSTREAM = "UPSTOX";

export interface MarginRequest {
    instrumentKey: string;
    quantity: number;
    transactionType: TransactionType;
    product: string;
}

/** Anything that can price one margin leg; the enricher depends on this, not on the HTTP client. */
export interface MarginCalculator {
    getRequiredMargin(request: MarginRequest, accessToken: string): Promise<number>;
}

/** The margin endpoint answered 2xx but without a usable `required_margin`. */
export class MalformedMarginResponseError extends Error {
    constructor(message: string, public readonly body: unknown) {
        super(message);
        this.name = "MalformedMarginResponseError";
    }
}

type UpstoxClientOptions = {
    baseUrl?: string;
    timeoutMs?: number;
    fetchImpl?: FetchLike;
};

type JsonReply = { status: number; ok: boolean; body: unknown };

export class UpstoxClient implements MarginCalculator {
    private baseUrl: string;
    private timeoutMs: number;
    private fetchImpl: FetchLike;

    constructor(options: UpstoxClientOptions = {}) {
        this.baseUrl = options.baseUrl ?? config.upstox.baseUrl;
        this.timeoutMs = options.timeoutMs ?? config.http.timeoutMs;
        this.fetchImpl = options.fetchImpl ?? fetch;
    }

    private async post(endpoint: string, accessToken: string, payload: unknown): Promise<JsonReply> {
        const init: RequestInit = {
            method: "POST",
            headers: {
                Authorization: `Bearer ${accessToken}`,
                Accept: "application/json",
                "Content-Type": "application/json",
            },
            body: JSON.stringify(payload),
        };

        try {
            return await fetchWithTimeout(this.fetchImpl, `${this.baseUrl}${endpoint}`, init, this.timeoutMs, async (response) => {
                const text = await response.text();
                const parsed = tryParseJson(text);
                // Error pages come back as HTML; keep the text for the log.
                return { status: response.status, ok: response.ok, body: parsed.ok ? parsed.value : text };
            });
        } catch (error) {
            throw new UpstreamUnavailableError(UPSTREAM, describeFailure(error), undefined, error);
        }
    }

    async getRequiredMargin(request: MarginRequest, accessToken: string): Promise<number> {
        const reply = await this.post("/charges/margin", accessToken, {
            instruments: [
                {
                    instrument_key: request.instrumentKey,
                    quantity: request.quantity,
                    transaction_type: request.transactionType,
                    product: request.product,
                },
            ],
        });

        if (!reply.ok) {
            logger.debug({ status: reply.status, body: reply.body }, "Upstox margin call rejected");
            throw new UpstreamUnavailableError(UPSTREAM, `HTTP ${reply.status}`, reply.status);
        }

        const parsed = MarginResponseSchema.safeParse(reply.body);
        if (!parsed.success) {
            throw new MalformedMarginResponseError("response has no numeric data.required_margin", reply.body);
        }

        return parsed.data.data.required_margin;
    }
}
