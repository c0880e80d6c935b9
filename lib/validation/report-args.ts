import { parseArgs } from "node:util";
import { z } from "zod";
import { OptionChainSchema } from "./option-chain";

const PositiveInt = z.coerce.number().int().positive();

export const ReportArgsSchema = OptionChainSchema.extend({
    out: z.string().min(1).optional(),
    concurrency: PositiveInt.optional(),
    partial: z.boolean().default(false),
    maxFailures: z.coerce.number().int().nonnegative().optional(),
})
    .refine((args) => args.maxFailures === undefined || args.partial, {
        message: "--max-failures only applies with --partial",
        path: ["maxFailures"],
    })
    .transform((args) => ({
        ...args,
        out: args.out ?? `${args.symbol}_${args.expiry}_${args.side ?? "ALL"}.csv`,
    }));

export type ReportArgs = z.output<typeof ReportArgsSchema>;

export const REPORT_USAGE =
    "Usage: npx tsx scripts/margin-report.ts <SYMBOL> <YYYY-MM-DD> [PE|CE] [--out file.csv] [--concurrency N] [--partial] [--max-failures N]";

/**
 * Positional: symbol, expiry, optional side. Throws ZodError on bad input.
 */
export function parseReportArgs(argv: string[]): ReportArgs {
    const { values, positionals } = parseArgs({
        args: argv,
        allowPositionals: true,
        options: {
            out: { type: "string", short: "o" },
            concurrency: { type: "string", short: "c" },
            partial: { type: "boolean" },
            "max-failures": { type: "string" },
        },
    });

    const [symbol, expiry, side] = positionals;

    return ReportArgsSchema.parse({
        symbol,
        expiry,
        side: side?.toUpperCase(),
        out: values.out,
        concurrency: values.concurrency,
        partial: values.partial ?? false,
        maxFailures: values["max-failures"],
    });
}
