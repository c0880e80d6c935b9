import { z } from "zod";
import { OPTION_SIDES } from "@/lib/market/types";
import { normalizeDateKey } from "@/lib/market/time";

export const OptionSideSchema = z.enum(OPTION_SIDES);

export const OptionChainSchema = z.object({
    symbol: z.string().trim().min(1, "Symbol is required").max(20).toUpperCase(),
    expiry: z.string().transform((value, ctx) => {
        const key = normalizeDateKey(value);
        if (!key) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Expiry must be YYYY-MM-DD" });
            return z.NEVER;
        }
        return key;
    }),
    side: OptionSideSchema.optional(),
});


// --- NSE option-chain-indices payload ---

const SideRecordSchema = z.record(z.unknown());

export const NseChainEntrySchema = z
    .object({
        strikePrice: z.number(),
        expiryDate: z.string(),
        PE: SideRecordSchema.optional(),
        CE: SideRecordSchema.optional(),
    })
    .passthrough();

export const NseOptionChainSchema = z
    .object({
        records: z
            .object({
                expiryDates: z.array(z.string()).default([]),
                data: z.array(NseChainEntrySchema).default([]),
            })
            .passthrough()
            .optional(),
    })
    .passthrough();

export type NseChainEntry = z.infer<typeof NseChainEntrySchema>;
export type NseOptionChain = z.infer<typeof NseOptionChainSchema>;
