import { z } from "zod";

export const MarginResponseSchema = z.object({
    status: z.string().optional(),
    data: z
        .object({
            required_margin: z.number(),
            final_margin: z.number().optional(),
        })
        .passthrough(),
});

export const TokenResponseSchema = z
    .object({
        access_token: z.string().min(1),
        user_id: z.string().optional(),
        user_name: z.string().optional(),
    })
    .passthrough();

export const AuthCodeSchema = z.string().trim().min(1, "Authorization code is required");
