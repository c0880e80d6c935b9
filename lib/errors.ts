import { ZodError } from "zod";
import { logger } from "./logger";
import { config } from "./config";

export class ApiError extends Error {
    public readonly statusCode: number;
    public readonly code: string;

    constructor(
        message: string,
        statusCode: number = 500,
        code: string = "INTERNAL_SERVER_ERROR",
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.statusCode = statusCode;
        this.code = code;
        this.name = "ApiError";
    }
}

/** Exchange, brokerage or reference host unreachable, timed out, or answered non-2xx. */
export class UpstreamUnavailableError extends ApiError {
    constructor(
        public readonly upstream: string,
        message: string,
        public readonly status?: number,
        cause?: unknown
    ) {
        super(`${upstream}: ${message}`, 502, "UPSTREAM_UNAVAILABLE", { cause });
        this.name = "UpstreamUnavailableError";
    }
}

export class InstrumentNotFoundError extends ApiError {
    constructor(public readonly tradingSymbol: string) {
        super(`No instrument key listed for "${tradingSymbol}"`, 404, "INSTRUMENT_NOT_FOUND");
        this.name = "InstrumentNotFoundError";
    }
}

export class LotSizeNotFoundError extends ApiError {
    constructor(public readonly instrumentName: string) {
        super(`No lot size listed for "${instrumentName}"`, 404, "LOT_SIZE_NOT_FOUND");
        this.name = "LotSizeNotFoundError";
    }
}

export class MarginCalculationFailedError extends ApiError {
    constructor(public readonly rowKey: string, reason: string, cause?: unknown) {
        super(`Margin calculation failed for ${rowKey}: ${reason}`, 502, "MARGIN_CALCULATION_FAILED", { cause });
        this.name = "MarginCalculationFailedError";
    }
}

export class AuthenticationFailedError extends ApiError {
    constructor(message: string, public readonly status?: number, cause?: unknown) {
        super(message, 401, "AUTHENTICATION_FAILED", { cause });
        this.name = "AuthenticationFailedError";
    }
}

/** Partial-results run crossed its failure threshold. */
export class EnrichmentAbortedError extends ApiError {
    constructor(public readonly failures: number, public readonly maxFailures: number) {
        super(`Enrichment aborted: ${failures} rows failed (allowed ${maxFailures})`, 500, "ENRICHMENT_ABORTED");
        this.name = "EnrichmentAbortedError";
    }
}

export interface ErrorReport {
    code: string;
    message: string;
    details?: unknown; // For Validation Errors
}

export function handleError(error: unknown): ErrorReport {
    // 1. Handle Known ApiError
    if (error instanceof ApiError) {
        logger.warn({ err: error }, `${error.name}: ${error.message}`);
        return {
            code: error.code,
            message: error.message,
        };
    }

    // 2. Handle Zod Validation Errors
    if (error instanceof ZodError) {
        logger.warn({ err: error }, "Validation Error");
        return {
            code: "VALIDATION_ERROR",
            message: "Invalid input",
            details: error.errors,
        };
    }

    // 3. Handle Unexpected Errors
    logger.error({ err: error }, "Unhandled Exception");

    return {
        code: "INTERNAL_SERVER_ERROR",
        message: config.isDev && error instanceof Error ? error.message : "An unexpected error occurred.",
    };
}
