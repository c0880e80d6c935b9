import { config } from "@/lib/config";
import { logger } from "@/lib/logger";
import { EnrichmentAbortedError, MarginCalculationFailedError } from "@/lib/errors";
import type { ReferenceResolver } from "@/lib/instruments/reference-resolver";
import { UpstoxClient, type MarginCalculator } from "@/lib/integrations/upstox/client";
import { calculatePremium, MARGIN_PRODUCT_CODE, transactionForSide } from "@/lib/market/option-rules";
import type { EnrichedRow, OptionQuoteRow } from "@/lib/market/types";
import { runWorkerPool } from "@/lib/utils/worker-pool";

export type EnrichmentMode = "fail-fast" | "partial";

export interface EnrichOptions {
    /** Rows in flight at once. 1 keeps the run sequential. */
    concurrency?: number;
    mode?: EnrichmentMode;
    /** Partial mode only: abort once more rows than this have failed. */
    maxFailures?: number;
}

export interface RowFailure {
    index: number;
    rowKey: string;
    error: Error;
}

export interface EnrichmentReport {
    /** Enriched rows in input order; in partial mode failed rows are absent. */
    rows: EnrichedRow[];
    failures: RowFailure[];
}

type MarginServiceOptions = {
    resolver: ReferenceResolver;
    margins?: MarginCalculator;
};

export function rowKeyOf(row: OptionQuoteRow): string {
    return `${row.instrumentName} ${row.expiryDate} ${row.strikePrice} ${row.side}`;
}

function isEnriched(row: EnrichedRow | undefined): row is EnrichedRow {
    return row !== undefined;
}

/**
 * MarginService - appends Upstox required margin and premium earned to option quotes.
 * One margin call per row; reference lookups are served from the resolver's memory.
 */
export class MarginService {
    private resolver: ReferenceResolver;
    private margins: MarginCalculator;

    constructor(options: MarginServiceOptions) {
        this.resolver = options.resolver;
        this.margins = options.margins ?? new UpstoxClient();
    }

    async enrichRow(row: OptionQuoteRow, accessToken: string): Promise<EnrichedRow> {
        const instrumentKey = await this.resolver.resolveInstrumentKey(
            row.instrumentName,
            row.expiryDate,
            row.strikePrice,
            row.side
        );
        const lotSize = await this.resolver.resolveLotSize(row.instrumentName);
        const transactionType = transactionForSide(row.side);

        let marginRequired: number;
        try {
            marginRequired = await this.margins.getRequiredMargin(
                { instrumentKey, quantity: lotSize, transactionType, product: MARGIN_PRODUCT_CODE },
                accessToken
            );
        } catch (error) {
            const reason = error instanceof Error ? error.message : String(error);
            throw new MarginCalculationFailedError(rowKeyOf(row), reason, error);
        }

        return Object.freeze({
            ...row,
            instrumentKey,
            lotSize,
            transactionType,
            marginRequired,
            premiumEarned: calculatePremium(row.price, lotSize),
        });
    }

    async enrich(
        rows: readonly OptionQuoteRow[],
        accessToken: string,
        options: EnrichOptions = {}
    ): Promise<EnrichmentReport> {
        const concurrency = options.concurrency ?? config.enrich.concurrency;
        const mode = options.mode ?? "fail-fast";
        const maxFailures = options.maxFailures ?? Number.POSITIVE_INFINITY;

        if (rows.length === 0) {
            return { rows: [], failures: [] };
        }

        // Tables are frozen before any row runs, so workers only ever read them.
        await this.resolver.load();

        const results: (EnrichedRow | undefined)[] = new Array(rows.length);
        const failures: RowFailure[] = [];
        const startedAt = Date.now();

        logger.info({ rows: rows.length, concurrency, mode }, "Enriching option rows");

        await runWorkerPool(rows.length, concurrency, async (index) => {
            const row = rows[index];
            try {
                results[index] = await this.enrichRow(row, accessToken);
            } catch (error) {
                if (mode === "fail-fast" || !(error instanceof Error)) {
                    logger.error({ err: error, row: rowKeyOf(row) }, "Row enrichment failed, aborting run");
                    throw error;
                }

                failures.push({ index, rowKey: rowKeyOf(row), error });
                logger.warn({ err: error, row: rowKeyOf(row) }, "Row enrichment failed, skipping");

                if (failures.length > maxFailures) {
                    throw new EnrichmentAbortedError(failures.length, maxFailures);
                }
            }
        });

        failures.sort((a, b) => a.index - b.index);
        const enriched = results.filter(isEnriched);

        logger.info(
            { enriched: enriched.length, failed: failures.length, durationMs: Date.now() - startedAt },
            "Enrichment complete"
        );

        return { rows: enriched, failures };
    }
}
