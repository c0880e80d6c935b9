import assert from "node:assert/strict";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import test from "node:test";
import dotenv from "dotenv";
import { appendMissingEnvKeys } from "./env-file.ts";

async function withTempDir(run: (dir: string) => Promise<void>): Promise<void> {
  const dir = await mkdtemp(join(tmpdir(), "env-file-"));
  try {
    await run(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

test("appendMissingEnvKeys creates the file when it is missing", async () => {
  await withTempDir(async (dir) => {
    const path = join(dir, ".env");

    const written = await appendMissingEnvKeys(path, { UPSTOX_ACCESS_TOKEN: "test-token" });

    assert.deepEqual(written, ["UPSTOX_ACCESS_TOKEN"]);
    assert.equal(await readFile(path, "utf-8"), "UPSTOX_ACCESS_TOKEN=test-token\n");
  });
});

test("appendMissingEnvKeys never overwrites a defined key", async () => {
  await withTempDir(async (dir) => {
    const path = join(dir, ".env");
    await writeFile(path, "UPSTOX_AUTH_CODE=old-code", "utf-8");

    const written = await appendMissingEnvKeys(path, {
      UPSTOX_AUTH_CODE: "new-code",
      UPSTOX_ACCESS_TOKEN: "test-token",
    });

    assert.deepEqual(written, ["UPSTOX_ACCESS_TOKEN"]);
    assert.equal(await readFile(path, "utf-8"), "UPSTOX_AUTH_CODE=old-code\nUPSTOX_ACCESS_TOKEN=test-token\n");
  });
});

test("appendMissingEnvKeys recognises export-prefixed lines", async () => {
  await withTempDir(async (dir) => {
    const path = join(dir, ".env");
    await writeFile(path, "export UPSTOX_ACCESS_TOKEN=test-token\n", "utf-8");

    assert.deepEqual(await appendMissingEnvKeys(path, { UPSTOX_ACCESS_TOKEN: "other" }), []);
    assert.equal(await readFile(path, "utf-8"), "export UPSTOX_ACCESS_TOKEN=test-token\n");
  });
});

test("appendMissingEnvKeys ignores key-like text inside a quoted multi-line value", async () => {
  await withTempDir(async (dir) => {
    const path = join(dir, ".env");
    const existing = 'NOTE="first\nUPSTOX_ACCESS_TOKEN=old"';
    await writeFile(path, existing, "utf-8");

    const written = await appendMissingEnvKeys(path, { UPSTOX_ACCESS_TOKEN: "test-token" });

    assert.deepEqual(written, ["UPSTOX_ACCESS_TOKEN"]);
    const content = await readFile(path, "utf-8");
    assert.equal(content, `${existing}\nUPSTOX_ACCESS_TOKEN=test-token\n`);
    assert.deepEqual(dotenv.parse(content), {
      NOTE: "first\nUPSTOX_ACCESS_TOKEN=old",
      UPSTOX_ACCESS_TOKEN: "test-token",
    });
  });
});
