import assert from "node:assert/strict";
import test from "node:test";
import { ZodError } from "zod";
import { UpstreamUnavailableError } from "../lib/errors.ts";
import { NseOptionChainSchema, type NseOptionChain } from "../lib/validation/option-chain.ts";
import { OptionChainService, type OptionChainSource } from "./option-chain.service.ts";

function sideRecord(strikePrice: number, expiryDate: string, bidprice: number, askPrice: number) {
  return {
    strikePrice,
    expiryDate,
    underlying: "BANKNIFTY",
    openInterest: strikePrice / 1000,
    impliedVolatility: 14.2,
    bidprice,
    askPrice,
  };
}

const CHAIN = NseOptionChainSchema.parse({
  records: {
    expiryDates: ["24-Dec-2024", "31-Dec-2024"],
    data: [
      {
        strikePrice: 51000,
        expiryDate: "24-Dec-2024",
        PE: sideRecord(51000, "24-Dec-2024", 120.5, 121),
        CE: sideRecord(51000, "24-Dec-2024", 300, 301.5),
      },
      {
        strikePrice: 51100,
        expiryDate: "24-Dec-2024",
        PE: sideRecord(51100, "24-Dec-2024", 140, 141),
        CE: sideRecord(51100, "24-Dec-2024", 250, 252),
      },
      {
        strikePrice: 51200,
        expiryDate: "24-Dec-2024",
        CE: sideRecord(51200, "24-Dec-2024", 200, 202.25),
      },
      {
        strikePrice: 51000,
        expiryDate: "31-Dec-2024",
        PE: sideRecord(51000, "31-Dec-2024", 400, 405),
        CE: sideRecord(51000, "31-Dec-2024", 500, 505),
      },
    ],
  },
});

class StaticSource implements OptionChainSource {
  symbols: string[] = [];
  constructor(private readonly chain: NseOptionChain) {}

  async getOptionChain(symbol: string): Promise<NseOptionChain> {
    this.symbols.push(symbol);
    return this.chain;
  }
}

test("fetch with PE returns only puts for the expiry, priced at the bid", async () => {
  const source = new StaticSource(CHAIN);
  const rows = await new OptionChainService({ source }).fetch("BANKNIFTY", "2024-12-24", "PE");

  assert.deepEqual(source.symbols, ["BANKNIFTY"]);
  assert.deepEqual(
    rows.map((row) => [row.strikePrice, row.side, row.price, row.expiryDate]),
    [
      [51000, "PE", 120.5, "2024-12-24"],
      [51100, "PE", 140, "2024-12-24"],
    ]
  );
});

test("fetch with CE prices every row at the ask", async () => {
  const rows = await new OptionChainService({ source: new StaticSource(CHAIN) }).fetch("BANKNIFTY", "2024-12-24", "CE");

  for (const row of rows) {
    assert.equal(row.side, "CE");
    assert.equal(row.price, row.raw.askPrice);
  }
  assert.deepEqual(
    rows.map((row) => row.strikePrice),
    [51000, 51100, 51200]
  );
});

test("fetch without a side returns puts then calls", async () => {
  const rows = await new OptionChainService({ source: new StaticSource(CHAIN) }).fetch("BANKNIFTY", "2024-12-24");

  assert.deepEqual(
    rows.map((row) => `${row.side}:${row.strikePrice}:${row.price}`),
    ["PE:51000:120.5", "PE:51100:140", "CE:51000:301.5", "CE:51100:252", "CE:51200:202.25"]
  );
});

test("fetch never returns a row from another expiry", async () => {
  const rows = await new OptionChainService({ source: new StaticSource(CHAIN) }).fetch("BANKNIFTY", "2024-12-31");

  assert.equal(rows.length, 2);
  assert.ok(rows.every((row) => row.expiryDate === "2024-12-31"));
  assert.deepEqual(
    rows.map((row) => row.price),
    [400, 505]
  );
});

test("fetch returns an empty list for an unlisted expiry", async () => {
  const rows = await new OptionChainService({ source: new StaticSource(CHAIN) }).fetch("BANKNIFTY", "2025-01-07", "PE");
  assert.deepEqual(rows, []);
});

test("fetch returns an empty list when the chain has no records", async () => {
  const rows = await new OptionChainService({ source: new StaticSource(NseOptionChainSchema.parse({})) }).fetch(
    "UNKNOWN",
    "2024-12-24"
  );
  assert.deepEqual(rows, []);
});

test("fetch passes the side record through flattened and unmodified", async () => {
  const [row] = await new OptionChainService({ source: new StaticSource(CHAIN) }).fetch("banknifty", "2024-12-24", "PE");

  assert.equal(row.instrumentName, "BANKNIFTY");
  assert.deepEqual(row.raw, {
    strikePrice: 51000,
    expiryDate: "24-Dec-2024",
    underlying: "BANKNIFTY",
    openInterest: 51,
    impliedVolatility: 14.2,
    bidprice: 120.5,
    askPrice: 121,
  });
  assert.equal(Object.isFrozen(row), true);
});

test("fetch validates its input", async () => {
  const service = new OptionChainService({ source: new StaticSource(CHAIN) });
  await assert.rejects(service.fetch("", "2024-12-24"), ZodError);
  await assert.rejects(service.fetch("BANKNIFTY", "24-Dec-2024"), ZodError);
});

test("fetch propagates upstream failures", async () => {
  const service = new OptionChainService({
    source: {
      getOptionChain: async () => {
        throw new UpstreamUnavailableError("NSE", "HTTP 503", 503);
      },
    },
  });
  await assert.rejects(service.fetch("BANKNIFTY", "2024-12-24"), UpstreamUnavailableError);
});

test("listExpiries returns date keys", async () => {
  const expiries = await new OptionChainService({ source: new StaticSource(CHAIN) }).listExpiries("banknifty");
  assert.deepEqual(expiries, ["2024-12-24", "2024-12-31"]);
});
