import { InstrumentNotFoundError, LotSizeNotFoundError } from "@/lib/errors";
import { logger } from "@/lib/logger";
import { toTradingSymbolDate } from "@/lib/market/time";
import type { OptionSide } from "@/lib/market/types";
import { UpstoxInstrumentSource, type InstrumentSource } from "./instrument-source";
import { DhanLotSizeSource, type LotSizeSource } from "./lot-size-source";

type ReferenceResolverOptions = {
    instruments?: InstrumentSource;
    lotSizes?: LotSizeSource;
};

/** Upstox trading symbol for an option: "BANKNIFTY 51000 PE 24 DEC 24" */
export function optionTradingSymbol(
    instrumentName: string,
    expiryDate: string,
    strikePrice: number,
    side: OptionSide
): string {
    return `${instrumentName.trim().toUpperCase()} ${strikePrice} ${side} ${toTradingSymbolDate(expiryDate)}`;
}

/**
 * Built on first use, read-only afterwards.
 * Concurrent first callers share the same in-flight download; a failed
 * download is not remembered, so the next caller tries again.
 */
class LazyTable<V> {
    private table: ReadonlyMap<string, V> | null = null;
    private loading: Promise<ReadonlyMap<string, V>> | null = null;

    constructor(private readonly build: () => Promise<ReadonlyMap<string, V>>) {}

    async get(): Promise<ReadonlyMap<string, V>> {
        if (this.table) return this.table;
        if (!this.loading) {
            this.loading = this.build().then(
                (table) => {
                    this.table = table;
                    this.loading = null;
                    return table;
                },
                (error: unknown) => {
                    this.loading = null;
                    throw error;
                }
            );
        }
        return this.loading;
    }
}

export class ReferenceResolver {
    private readonly instrumentKeys: LazyTable<string>;
    private readonly lotSizes: LazyTable<number>;

    constructor(options: ReferenceResolverOptions = {}) {
        const instrumentSource = options.instruments ?? new UpstoxInstrumentSource();
        const lotSizeSource = options.lotSizes ?? new DhanLotSizeSource();

        this.instrumentKeys = new LazyTable(async () => {
            const index = new Map<string, string>();
            for (const record of await instrumentSource.load()) {
                // First listing wins, matching a top-down scan of the master file.
                if (!index.has(record.tradingSymbol)) index.set(record.tradingSymbol, record.instrumentKey);
            }
            logger.debug({ size: index.size }, "Instrument key index built");
            return index;
        });

        this.lotSizes = new LazyTable(async () => {
            const index = new Map<string, number>();
            for (const entry of await lotSizeSource.load()) {
                index.set(entry.name, entry.lotSize);
            }
            logger.debug({ size: index.size }, "Lot size index built");
            return index;
        });
    }

    /** Warm both tables before rows are processed concurrently. */
    async load(): Promise<void> {
        await Promise.all([this.instrumentKeys.get(), this.lotSizes.get()]);
    }

    async resolveInstrumentKey(
        instrumentName: string,
        expiryDate: string,
        strikePrice: number,
        side: OptionSide
    ): Promise<string> {
        const symbol = optionTradingSymbol(instrumentName, expiryDate, strikePrice, side);
        const key = (await this.instrumentKeys.get()).get(symbol);
        if (key === undefined) {
            throw new InstrumentNotFoundError(symbol);
        }
        return key;
    }

    async resolveLotSize(instrumentName: string): Promise<number> {
        const name = instrumentName.trim().toUpperCase();
        const lotSize = (await this.lotSizes.get()).get(name);
        if (lotSize === undefined) {
            throw new LotSizeNotFoundError(name);
        }
        return lotSize;
    }
}
