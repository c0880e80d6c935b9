import assert from "node:assert/strict";
import test from "node:test";
import { flattenRecord } from "./normalizer.ts";

test("flattenRecord keeps scalars as they are", () => {
  assert.deepEqual(flattenRecord({ strikePrice: 51000, underlying: "BANKNIFTY", active: true, iv: null }), {
    strikePrice: 51000,
    underlying: "BANKNIFTY",
    active: true,
    iv: null,
  });
});

test("flattenRecord joins nested keys with dots", () => {
  assert.deepEqual(flattenRecord({ depth: { bid: { price: 10 }, ask: 11 } }), {
    "depth.bid.price": 10,
    "depth.ask": 11,
  });
});

test("flattenRecord stores arrays as JSON and drops undefined", () => {
  assert.deepEqual(flattenRecord({ levels: [1, 2], missing: undefined }), { levels: "[1,2]" });
});
