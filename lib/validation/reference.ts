import { z } from "zod";

export const UpstoxInstrumentSchema = z
    .object({
        instrument_key: z.string().min(1),
        trading_symbol: z.string().min(1),
        segment: z.string(),
        instrument_type: z.string(),
        name: z.string().optional(),
        lot_size: z.number().optional(),
    })
    .passthrough();

// "15 Lots", "15", or 15
const LotTypeSchema = z.union([z.number(), z.string()]);

export const DhanFutureSchema = z
    .object({
        sym: z.string().min(1),
        fo_dt: z.array(z.object({ lot_type: LotTypeSchema }).passthrough()).min(1),
    })
    .passthrough();

export const DhanFuturesResponseSchema = z
    .object({
        data: z.object({
            list: z.array(z.unknown()),
        }),
    })
    .passthrough();
