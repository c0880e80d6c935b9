import assert from "node:assert/strict";
import test from "node:test";
import { AuthenticationFailedError } from "../../errors.ts";
import { exchangeCodeForToken, getAuthorizationUrl } from "./auth.ts";
import { UpstoxTokenProvider } from "./token-provider.ts";

const BASE = "https://upstox.example.test/v2";

const CREDENTIALS = {
  clientId: "test-client",
  clientSecret: "test-secret",
  redirectUri: "http://localhost:3000/callback",
};

test("getAuthorizationUrl carries client id, redirect and state", () => {
  const url = new URL(getAuthorizationUrl(CREDENTIALS, "run-1"));
  assert.equal(url.pathname.endsWith("/login/authorization/dialog"), true);
  assert.equal(url.searchParams.get("response_type"), "code");
  assert.equal(url.searchParams.get("client_id"), "test-client");
  assert.equal(url.searchParams.get("redirect_uri"), "http://localhost:3000/callback");
  assert.equal(url.searchParams.get("state"), "run-1");
});

test("exchangeCodeForToken posts the form and sets the daily cutoff", async () => {
  let url = "";
  let form = new URLSearchParams();

  const token = await exchangeCodeForToken(CREDENTIALS, "test-code", {
    baseUrl: BASE,
    now: () => new Date("2024-12-24T04:30:00.000Z"),
    fetchImpl: async (input, init) => {
      url = String(input);
      form = new URLSearchParams(String(init?.body));
      return new Response(JSON.stringify({ access_token: "test-access-token", user_id: "AB1234" }));
    },
  });

  assert.equal(url, `${BASE}/login/authorization/token`);
  assert.equal(form.get("code"), "test-code");
  assert.equal(form.get("client_id"), "test-client");
  assert.equal(form.get("client_secret"), "test-secret");
  assert.equal(form.get("grant_type"), "authorization_code");
  assert.equal(token.accessToken, "test-access-token");
  assert.equal(token.issuedAt.toISOString(), "2024-12-24T04:30:00.000Z");
  assert.equal(token.expiresAt.toISOString(), "2024-12-24T22:00:00.000Z");
});

test("exchangeCodeForToken rejects a refused code", async () => {
  await assert.rejects(
    exchangeCodeForToken(CREDENTIALS, "test-code", {
      baseUrl: BASE,
      fetchImpl: async () => new Response(JSON.stringify({ status: "error" }), { status: 400 }),
    }),
    (error: unknown) => {
      assert.ok(error instanceof AuthenticationFailedError);
      assert.equal(error.status, 400);
      assert.equal(error.code, "AUTHENTICATION_FAILED");
      return true;
    }
  );
});

test("exchangeCodeForToken rejects a reply without access_token", async () => {
  await assert.rejects(
    exchangeCodeForToken(CREDENTIALS, "test-code", {
      baseUrl: BASE,
      fetchImpl: async () => new Response(JSON.stringify({ user_id: "AB1234" })),
    }),
    { name: "AuthenticationFailedError", message: "Token exchange response had no access_token" }
  );
});

test("exchangeCodeForToken wraps network errors", async () => {
  await assert.rejects(
    exchangeCodeForToken(CREDENTIALS, "test-code", {
      baseUrl: BASE,
      fetchImpl: async () => {
        throw new TypeError("fetch failed");
      },
    }),
    { name: "AuthenticationFailedError", message: "Network error during token exchange: fetch failed" }
  );
});

test("UpstoxTokenProvider strips a Bearer prefix", () => {
  const provider = new UpstoxTokenProvider("Bearer test-token ");
  assert.equal(provider.getToken(), "test-token");
  assert.equal(provider.hasToken(), true);
});

test("UpstoxTokenProvider fails when no token is configured", () => {
  const provider = new UpstoxTokenProvider("");
  assert.equal(provider.hasToken(), false);
  assert.throws(() => provider.getToken(), AuthenticationFailedError);
});
