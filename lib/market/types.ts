// lib/market/types.ts

/** Exchange option codes: PE is a put, CE is a call. */
export const OPTION_SIDES = ["PE", "CE"] as const;
export type OptionSide = (typeof OPTION_SIDES)[number];

export type TransactionType = "BUY" | "SELL";

/** Scalar values kept from a flattened exchange record. */
export type RawValue = string | number | boolean | null;

/**
 * One market quote for one (instrument, expiry, strike, side) tuple.
 */
export interface OptionQuoteRow {
    /** Underlying as requested, e.g. "BANKNIFTY" */
    readonly instrumentName: string;

    /** Calendar date, YYYY-MM-DD */
    readonly expiryDate: string;

    readonly strikePrice: number;

    readonly side: OptionSide;

    /** Bid for PE, ask for CE */
    readonly price: number;

    /** The side's sub-record flattened to dotted keys, values as received */
    readonly raw: Readonly<Record<string, RawValue>>;
}

export interface EnrichedRow extends OptionQuoteRow {
    readonly instrumentKey: string;
    readonly lotSize: number;
    readonly transactionType: TransactionType;

    /** Currency units, as returned by the margin endpoint */
    readonly marginRequired: number;

    /** price × lotSize */
    readonly premiumEarned: number;
}

export interface AccessToken {
    accessToken: string;
    issuedAt: Date;
    /** Fixed daily cutoff, not issuedAt + TTL */
    expiresAt: Date;
}
