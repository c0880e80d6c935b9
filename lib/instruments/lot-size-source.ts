import { config } from "@/lib/config";
import { logger } from "@/lib/logger";
import { UpstreamUnavailableError } from "@/lib/errors";
import { describeFailure, fetchWithTimeout, type FetchLike } from "@/lib/integrations/common/http";
import { DhanFutureSchema, DhanFuturesResponseSchema } from "@/lib/validation/reference";

const UPSTREAM = "LOT_SIZES";

// Every NSE future with its lot size, first page large enough to hold all of them.
const FUTURES_QUERY = { Data: { Seg: 2, Instrument: "FUT", Count: 200, Page_no: 1, ExpCode: -1 } };

export interface LotSizeEntry {
    name: string;
    lotSize: number;
}

export interface LotSizeSource {
    load(): Promise<LotSizeEntry[]>;
}

type DhanLotSizeSourceOptions = {
    url?: string;
    timeoutMs?: number;
    fetchImpl?: FetchLike;
};

/** "15 Lots" -> 15, 15 -> 15; anything else -> null */
export function parseLotType(value: number | string): number | null {
    const lot = typeof value === "number" ? value : Number.parseInt(value.trim().split(/\s+/)[0], 10);
    return Number.isInteger(lot) && lot > 0 ? lot : null;
}

export function toLotSizeEntries(payload: unknown): LotSizeEntry[] {
    const parsed = DhanFuturesResponseSchema.safeParse(payload);
    if (!parsed.success) {
        throw new UpstreamUnavailableError(UPSTREAM, "unexpected lot size payload", undefined, parsed.error);
    }

    const entries: LotSizeEntry[] = [];
    for (const item of parsed.data.data.list) {
        const future = DhanFutureSchema.safeParse(item);
        if (!future.success) continue;

        const lotSize = parseLotType(future.data.fo_dt[0].lot_type);
        if (lotSize === null) continue;

        entries.push({ name: future.data.sym.trim().toUpperCase(), lotSize });
    }
    return entries;
}

export class DhanLotSizeSource implements LotSizeSource {
    private url: string;
    private timeoutMs: number;
    private fetchImpl: FetchLike;

    constructor(options: DhanLotSizeSourceOptions = {}) {
        this.url = options.url ?? config.references.lotSizeUrl;
        this.timeoutMs = options.timeoutMs ?? config.http.timeoutMs;
        this.fetchImpl = options.fetchImpl ?? fetch;
    }

    async load(): Promise<LotSizeEntry[]> {
        logger.info({ url: this.url }, "Downloading lot sizes");

        let payload: unknown;
        try {
            payload = await fetchWithTimeout(
                this.fetchImpl,
                this.url,
                {
                    method: "POST",
                    headers: { "Content-Type": "application/json; charset=UTF-8" },
                    body: JSON.stringify(FUTURES_QUERY),
                },
                this.timeoutMs,
                async (res) => {
                    if (!res.ok) throw new UpstreamUnavailableError(UPSTREAM, `HTTP ${res.status}`, res.status);
                    const body: unknown = await res.json();
                    return body;
                }
            );
        } catch (error) {
            if (error instanceof UpstreamUnavailableError) throw error;
            throw new UpstreamUnavailableError(UPSTREAM, describeFailure(error), undefined, error);
        }

        const entries = toLotSizeEntries(payload);
        logger.info({ count: entries.length }, "Lot size download complete");
        return entries;
    }
}
