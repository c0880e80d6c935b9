/**
 * Upstox instrument master (NSE.json.gz)
 *
 * 1. Download with timeout
 * 2. Gunzip + parse
 * 3. Keep NSE_FO option contracts only (CE / PE)
 */

import zlib from "zlib";
import { config } from "@/lib/config";
import { logger } from "@/lib/logger";
import { UpstreamUnavailableError } from "@/lib/errors";
import { describeFailure, fetchWithTimeout, type FetchLike } from "@/lib/integrations/common/http";
import { UpstoxInstrumentSchema } from "@/lib/validation/reference";

const UPSTREAM = "UPSTOX_INSTRUMENTS";
const DOWNLOAD_TIMEOUT_MS = 60_000;

export interface InstrumentRecord {
    instrumentKey: string;
    /** e.g. "BANKNIFTY 51000 PE 24 DEC 24" */
    tradingSymbol: string;
}

export interface InstrumentSource {
    load(): Promise<InstrumentRecord[]>;
}

type UpstoxInstrumentSourceOptions = {
    url?: string;
    timeoutMs?: number;
    fetchImpl?: FetchLike;
};

/**
 * Async gunzip helper
 */
function gunzipAsync(buffer: Buffer): Promise<Buffer> {
    return new Promise((resolve, reject) => {
        zlib.gunzip(buffer, (err, result) => {
            if (err) reject(err);
            else resolve(result);
        });
    });
}

/**
 * Keep option contracts from the F&O segment; everything else is noise for margin lookups.
 */
export function toInstrumentRecords(raw: unknown): { records: InstrumentRecord[]; skipped: number } {
    if (!Array.isArray(raw)) {
        throw new UpstreamUnavailableError(UPSTREAM, "instrument file is not a JSON array");
    }

    const records: InstrumentRecord[] = [];
    let skipped = 0;

    for (const entry of raw) {
        const parsed = UpstoxInstrumentSchema.safeParse(entry);
        if (!parsed.success) {
            skipped++;
            continue;
        }

        const { segment, instrument_type: type } = parsed.data;
        if (segment !== "NSE_FO" || (type !== "CE" && type !== "PE")) continue;

        records.push({
            instrumentKey: parsed.data.instrument_key,
            tradingSymbol: parsed.data.trading_symbol.trim().toUpperCase(),
        });
    }

    return { records, skipped };
}

export class UpstoxInstrumentSource implements InstrumentSource {
    private url: string;
    private timeoutMs: number;
    private fetchImpl: FetchLike;

    constructor(options: UpstoxInstrumentSourceOptions = {}) {
        this.url = options.url ?? config.references.instrumentsUrl;
        this.timeoutMs = options.timeoutMs ?? DOWNLOAD_TIMEOUT_MS;
        this.fetchImpl = options.fetchImpl ?? fetch;
    }

    async load(): Promise<InstrumentRecord[]> {
        logger.info({ url: this.url }, "Downloading instruments from Upstox");

        let compressed: Buffer;
        try {
            compressed = await fetchWithTimeout(
                this.fetchImpl,
                this.url,
                {
                    headers: {
                        Accept: "application/json",
                        "Accept-Encoding": "gzip",
                    },
                },
                this.timeoutMs,
                async (res) => {
                    if (!res.ok) throw new UpstreamUnavailableError(UPSTREAM, `HTTP ${res.status}`, res.status);
                    return Buffer.from(await res.arrayBuffer());
                }
            );
        } catch (error) {
            if (error instanceof UpstreamUnavailableError) throw error;
            throw new UpstreamUnavailableError(UPSTREAM, describeFailure(error), undefined, error);
        }

        let raw: unknown;
        try {
            raw = JSON.parse((await gunzipAsync(compressed)).toString("utf-8"));
        } catch (error) {
            throw new UpstreamUnavailableError(UPSTREAM, "instrument file could not be decoded", undefined, error);
        }

        const { records, skipped } = toInstrumentRecords(raw);
        logger.info({ options: records.length, skipped }, "Instrument download complete");
        return records;
    }
}
