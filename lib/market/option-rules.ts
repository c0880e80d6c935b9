import type { OptionSide, TransactionType } from "./types";

/** Upstox product code for delivery margin. */
export const MARGIN_PRODUCT_CODE = "D";

/** Quote field that prices each side. A put seller receives the bid; a call seller receives the ask. */
export const PRICE_FIELD_BY_SIDE = {
    PE: "bidprice",
    CE: "askPrice",
} as const satisfies Record<OptionSide, string>;

export const TRANSACTION_BY_SIDE = {
    PE: "BUY",
    CE: "SELL",
} as const satisfies Record<OptionSide, TransactionType>;

/**
 * Pick the side-dependent price from an exchange sub-record.
 * Missing or non-numeric values read as 0, which is how NSE reports an empty book.
 */
export function priceForSide(side: OptionSide, record: Readonly<Record<string, unknown>>): number {
    const value = record[PRICE_FIELD_BY_SIDE[side]];
    return typeof value === "number" && Number.isFinite(value) ? value : 0;
}

export function transactionForSide(side: OptionSide): TransactionType {
    return TRANSACTION_BY_SIDE[side];
}

export function calculatePremium(price: number, lotSize: number): number {
    return price * lotSize;
}
