import { z } from "zod";

// Entry scripts load .env through `import "dotenv/config"` before this module is evaluated.

const envSchema = z.object({
    // Upstox OAuth app + session
    UPSTOX_API_KEY: z.string().optional(),
    UPSTOX_API_SECRET: z.string().optional(),
    UPSTOX_REDIRECT_URI: z.string().optional(),
    UPSTOX_AUTH_CODE: z.string().optional(),
    UPSTOX_ACCESS_TOKEN: z.string().optional(),
    UPSTOX_BASE_URL: z.string().url().default("https://api.upstox.com/v2"),

    // Reference data
    UPSTOX_INSTRUMENTS_URL: z
        .string()
        .url()
        .default("https://assets.upstox.com/market-quote/instruments/exchange/NSE.json.gz"),
    LOT_SIZE_URL: z.string().url().default("https://open-web-scanx.dhan.co/scanx/allfut"),

    // Exchange
    NSE_BASE_URL: z.string().url().default("https://www.nseindia.com"),

    // Runtime
    HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
    ENRICH_CONCURRENCY: z.coerce.number().int().positive().default(1),
    NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
    LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).optional(),
});

// The parse method will throw if validation fails, implementing the "Fail Fast" rule.
const env = envSchema.parse(process.env);

const defaultLogLevel = env.NODE_ENV === "test" ? "silent" : env.NODE_ENV === "development" ? "debug" : "info";

export const config = {
    env: env.NODE_ENV,
    isDev: env.NODE_ENV === "development",
    logLevel: env.LOG_LEVEL ?? defaultLogLevel,
    http: {
        timeoutMs: env.HTTP_TIMEOUT_MS,
    },
    enrich: {
        concurrency: env.ENRICH_CONCURRENCY,
    },
    nse: {
        baseUrl: env.NSE_BASE_URL,
    },
    upstox: {
        baseUrl: env.UPSTOX_BASE_URL,
        apiKey: env.UPSTOX_API_KEY,
        apiSecret: env.UPSTOX_API_SECRET,
        redirectUri: env.UPSTOX_REDIRECT_URI,
        authCode: env.UPSTOX_AUTH_CODE,
        accessToken: env.UPSTOX_ACCESS_TOKEN,
    },
    references: {
        instrumentsUrl: env.UPSTOX_INSTRUMENTS_URL,
        lotSizeUrl: env.LOT_SIZE_URL,
    },
} as const;
