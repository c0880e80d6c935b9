/**
 * Option Margin & Premium Report
 *
 * Usage:
 *   npx tsx scripts/margin-report.ts BANKNIFTY 2024-12-24 PE
 *   npx tsx scripts/margin-report.ts NIFTY 2024-12-26 --concurrency 4 --partial --out nifty.csv
 *
 * Requires UPSTOX_ACCESS_TOKEN (see scripts/generate-upstox-token.ts).
 */

import "dotenv/config";
import { handleError } from "@/lib/errors";
import { logger } from "@/lib/logger";
import { writeCsv } from "@/lib/export/csv";
import { ReferenceResolver } from "@/lib/instruments/reference-resolver";
import { UpstoxTokenProvider } from "@/lib/integrations/upstox/token-provider";
import { parseReportArgs, REPORT_USAGE } from "@/lib/validation/report-args";
import { MarginService } from "@/services/margin.service";
import { OptionChainService } from "@/services/option-chain.service";

async function main(): Promise<void> {
    const args = parseReportArgs(process.argv.slice(2));

    const tokens = new UpstoxTokenProvider();
    if (!tokens.hasToken()) {
        console.error("❌ ERROR: UPSTOX_ACCESS_TOKEN is not set");
        console.error("Run: npx tsx scripts/generate-upstox-token.ts <AUTH_CODE> --write-env");
        process.exit(1);
    }
    const accessToken = tokens.getToken();

    const chain = new OptionChainService();
    const rows = await chain.fetch(args.symbol, args.expiry, args.side);

    if (rows.length === 0) {
        const expiries = await chain.listExpiries(args.symbol);
        console.log(`⚠️  No ${args.side ?? "PE/CE"} quotes for ${args.symbol} expiring ${args.expiry}.`);
        console.log(`   Listed expiries: ${expiries.length > 0 ? expiries.join(", ") : "none"}`);
        return;
    }

    const margins = new MarginService({ resolver: new ReferenceResolver() });
    const report = await margins.enrich(rows, accessToken, {
        concurrency: args.concurrency,
        mode: args.partial ? "partial" : "fail-fast",
        maxFailures: args.maxFailures,
    });

    await writeCsv(args.out, report.rows);
    logger.info({ out: args.out, rows: report.rows.length }, "Report written");

    console.log("");
    console.log(`✅ ${report.rows.length} rows written to ${args.out}`);

    if (report.failures.length > 0) {
        console.log(`⚠️  ${report.failures.length} rows skipped (partial mode):`);
        for (const failure of report.failures) {
            console.log(`   ${failure.rowKey}: ${failure.error.message}`);
        }
    }
}

main().catch((error: unknown) => {
    const report = handleError(error);
    console.error(`❌ ERROR [${report.code}]: ${report.message}`);
    if (report.code === "VALIDATION_ERROR") {
        console.error(REPORT_USAGE);
    }
    process.exit(1);
});
