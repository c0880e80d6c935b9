import { logger } from "@/lib/logger";
import { NseClient } from "@/lib/integrations/nse/client";
import { flattenRecord } from "@/lib/integrations/common/normalizer";
import { priceForSide } from "@/lib/market/option-rules";
import { parseNseExpiry } from "@/lib/market/time";
import { OPTION_SIDES, type OptionQuoteRow, type OptionSide } from "@/lib/market/types";
import { OptionChainSchema, type NseChainEntry, type NseOptionChain } from "@/lib/validation/option-chain";

export interface OptionChainSource {
    getOptionChain(symbol: string): Promise<NseOptionChain>;
}

type OptionChainServiceOptions = {
    source?: OptionChainSource;
};

function toQuoteRow(
    instrumentName: string,
    expiryDate: string,
    entry: NseChainEntry,
    side: OptionSide
): OptionQuoteRow | null {
    const record = entry[side];
    if (!record) return null;

    return Object.freeze({
        instrumentName,
        expiryDate,
        strikePrice: entry.strikePrice,
        side,
        price: priceForSide(side, record),
        raw: Object.freeze(flattenRecord(record)),
    });
}

export class OptionChainService {
    private source: OptionChainSource;

    constructor(options: OptionChainServiceOptions = {}) {
        this.source = options.source ?? new NseClient();
    }

    /**
     * Quotes for one underlying and expiry. Without a side, all PE rows come
     * first, then all CE rows, each in the exchange's strike order.
     * An expiry the chain does not list yields an empty array.
     */
    async fetch(instrumentName: string, expiryDate: string, side?: OptionSide): Promise<OptionQuoteRow[]> {
        const query = OptionChainSchema.parse({ symbol: instrumentName, expiry: expiryDate, side });
        const chain = await this.source.getOptionChain(query.symbol);

        if (!chain.records) {
            logger.warn({ symbol: query.symbol }, "Option chain response carried no records");
            return [];
        }

        const entries = chain.records.data.filter((entry) => parseNseExpiry(entry.expiryDate) === query.expiry);
        const sides = query.side ? [query.side] : OPTION_SIDES;

        const rows: OptionQuoteRow[] = [];
        for (const current of sides) {
            for (const entry of entries) {
                const row = toQuoteRow(query.symbol, query.expiry, entry, current);
                if (row) rows.push(row);
            }
        }

        logger.info(
            { symbol: query.symbol, expiry: query.expiry, side: query.side ?? "ALL", rows: rows.length },
            "Option chain fetched"
        );
        return rows;
    }

    /** Expiries listed by the exchange for this underlying, as YYYY-MM-DD. */
    async listExpiries(instrumentName: string): Promise<string[]> {
        const symbol = instrumentName.trim().toUpperCase();
        const chain = await this.source.getOptionChain(symbol);
        return (chain.records?.expiryDates ?? [])
            .map(parseNseExpiry)
            .filter((value): value is string => value !== null);
    }
}
