// ---------------------------------------------------------------------------
// Integration tests for the /gtin routes.
// ---------------------------------------------------------------------------

import { describe, it, expect } from "vitest";
import { Hono } from "hono";
import pino from "pino";

import { createApp } from "../../../src/api/server.js";
import { createErrorHandler } from "../../../src/api/middleware/error-handler.js";
import type { AppEnv } from "../../../src/api/env.js";
import type { AppConfig } from "../../../src/core/types.js";
import { defaultPrefixRegistry } from "../../../src/config/prefix-registry.js";

// ── Helpers ────────────────────────────────────────────────────────────────

const registry = defaultPrefixRegistry();

/** Create a silent pino logger for testing. */
function createTestLogger() {
  return pino({ level: "silent" });
}

function createTestApp(requestsPerMinute = 120, enabled = false, trustProxy = false) {
  return createApp({
    env: "development",
    registry,
    logger: createTestLogger(),
    rateLimitConfig: { enabled, requestsPerMinute, trustProxy },
    maxBatchSize: 3,
  });
}

function createFailingApp(env: AppConfig["env"]) {
  const app = new Hono<AppEnv>();
  app.get("/boom", () => {
    throw new Error("prefix table vanished");
  });
  app.onError(createErrorHandler(env));
  return app;
}

function lookup(code: string, as?: string) {
  const query = new URLSearchParams({ code, ...(as ? { as } : {}) });
  return createTestApp().request(`/gtin?${query.toString()}`);
}

function postBatch(body: string) {
  return createTestApp().request("/gtin/batch", {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body,
  });
}

const OREO = {
  code: "071720539774",
  format: "UpcA",
  formatName: "UPC-A",
  length: 12,
  display: "0 71720 53977 4",
  gs1Prefix: "007",
  numberSystem: "general",
  countryCode: "US",
  ean13: "0071720539774",
};

// ── Tests: GET / ───────────────────────────────────────────────────────────

describe("GET /", () => {
  it("describes the service", async () => {
    const res = await createTestApp().request("/");

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      name: "gtin-inspector",
      routes: ["/health", "/gtin", "/gtin/batch", "/gtin/expand"],
    });
  });
});

// ── Tests: GET /gtin?code= ─────────────────────────────────────────────────

describe("GET /gtin?code=", () => {
  it("returns 200 with the description of a valid code", async () => {
    const res = await lookup("071720539774");

    expect(res.status).toBe(200);
    expect(res.headers.get("content-type")).toContain("application/json");
    expect(await res.json()).toEqual(OREO);
  });

  it("accepts separators and a zero-padded UPC-A", async () => {
    expect(await (await lookup("0 71720 53977 4")).json()).toEqual(OREO);
    expect(await (await lookup("0-071720-539774")).json()).toEqual(OREO);
  });

  it("describes an EAN-13", async () => {
    const res = await lookup("8595701530526");

    expect(await res.json()).toEqual({
      code: "8595701530526",
      format: "Ean13",
      formatName: "EAN-13",
      length: 13,
      display: "8 595701 530526",
      gs1Prefix: "859",
      numberSystem: "general",
      countryCode: "CZ",
      ean13: "8595701530526",
    });
  });

  it("honours as=ean8 for a code that defaults to UPC-E", async () => {
    const res = await lookup("04182634", "ean8");

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      code: "04182634",
      format: "Ean8",
      formatName: "EAN-8",
      length: 8,
      display: "0418 2634",
      gs1Prefix: "041",
      numberSystem: "store_use",
      countryCode: null,
      ean13: null,
    });
  });

  it("honours as=upce for a code that defaults to EAN-8", async () => {
    const res = await lookup("52013485", "upce");

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      code: "52013485",
      format: "UpcE",
      formatName: "UPC-E",
      length: 8,
      display: "5 201348 5",
      gs1Prefix: "002",
      numberSystem: "general",
      countryCode: "US",
      ean13: "0020134000080",
    });
  });

  it("returns 400 with the digit count for an unsupported length", async () => {
    const res = await lookup("123");

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: 'Invalid GTIN "123": unsupported GTIN length: 3',
      type: "gtin_validation_error",
      kind: "invalid_length",
      length: 3,
    });
  });

  it("returns 400 for a bad check digit", async () => {
    const res = await lookup("071720539775");

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: 'Invalid GTIN "071720539775": invalid GTIN checksum',
      type: "gtin_validation_error",
      kind: "invalid_checksum",
    });
  });

  it("returns 400 when a forced 8-digit parse gets another length", async () => {
    const res = await lookup("071720539774", "ean8");

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({
      kind: "invalid_length",
      length: 12,
    });
  });

  it("returns 400 when the code parameter is missing", async () => {
    const res = await createTestApp().request("/gtin");

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: "Missing required query parameter: code",
      type: "validation_error",
    });
  });

  it("returns 400 for an unknown format override", async () => {
    const res = await lookup("52013485", "isbn");

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: 'Query parameter "as" must be one of: ean8, upce',
      type: "validation_error",
    });
  });
});

// ── Tests: POST /gtin/batch ────────────────────────────────────────────────

describe("POST /gtin/batch", () => {
  it("classifies every code and counts the outcomes", async () => {
    const res = await postBatch(
      JSON.stringify({ codes: ["071720539774", "071720539775"] }),
    );

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      total: 2,
      valid: 1,
      invalid: 1,
      results: [
        { input: "071720539774", ok: true, gtin: OREO },
        {
          input: "071720539775",
          ok: false,
          error: { kind: "invalid_checksum", message: "invalid GTIN checksum" },
        },
      ],
    });
  });

  it("applies the format override to the whole batch", async () => {
    const res = await postBatch(
      JSON.stringify({ codes: ["04182634", "52013485"], as: "ean8" }),
    );

    expect(await res.json()).toMatchObject({
      total: 2,
      valid: 2,
      results: [
        { ok: true, gtin: { format: "Ean8", countryCode: null } },
        { ok: true, gtin: { format: "Ean8", countryCode: "GR" } },
      ],
    });
  });

  it("returns 400 for a body that is not JSON", async () => {
    const res = await postBatch("codes=071720539774");

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: "Request body must be valid JSON",
      type: "validation_error",
    });
  });

  it.each([
    ["an empty list", { codes: [] }],
    ["too many codes", { codes: ["1", "2", "3", "4"] }],
    ["non-string codes", { codes: [71720539774] }],
    ["an unknown override", { codes: ["52013485"], as: "isbn" }],
  ])("returns 400 for %s", async (_label, body) => {
    const res = await postBatch(JSON.stringify(body));

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: "Body must be { codes: string[] } with 1-3 entries",
      type: "validation_error",
    });
  });
});

// ── Tests: GET /gtin/expand?upce= ──────────────────────────────────────────

describe("GET /gtin/expand?upce=", () => {
  it("expands a UPC-E to UPC-A and EAN-13", async () => {
    const res = await createTestApp().request("/gtin/expand?upce=04182634");

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      upce: "04182634",
      upcA: "041800000265",
      ean13: "0041800000265",
    });
  });

  it("accepts the six core digits alone", async () => {
    const res = await createTestApp().request("/gtin/expand?upce=123454");

    expect(await res.json()).toEqual({
      upce: "123454",
      upcA: "012340000053",
      ean13: "0012340000053",
    });
  });

  it("returns 400 for a digit count that is not a UPC-E", async () => {
    const res = await createTestApp().request("/gtin/expand?upce=12345");

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error:
        'Invalid GTIN "12345": GTIN conversion failed: UPC-E needs 6, 7 or 8 digits, got 5',
      type: "gtin_validation_error",
      kind: "conversion_failed",
    });
  });

  it("returns 400 when the upce parameter is missing", async () => {
    const res = await createTestApp().request("/gtin/expand");

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: "Missing required query parameter: upce",
      type: "validation_error",
    });
  });
});

// ── Tests: middleware ──────────────────────────────────────────────────────

describe("middleware", () => {
  it("echoes a well-formed X-Request-ID", async () => {
    const res = await createTestApp().request("/", {
      headers: { "X-Request-ID": "req-42" },
    });

    expect(res.headers.get("x-request-id")).toBe("req-42");
  });

  it("replaces an unsafe X-Request-ID with a UUID", async () => {
    const res = await createTestApp().request("/", {
      headers: { "X-Request-ID": "bad id; rm -rf" },
    });

    expect(res.headers.get("x-request-id")).toMatch(
      /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/,
    );
  });

  it("returns 429 once a client exceeds its per-minute budget", async () => {
    const app = createTestApp(2, true);

    expect((await app.request("/")).status).toBe(200);
    expect((await app.request("/")).status).toBe(200);

    const res = await app.request("/");
    expect(res.status).toBe(429);
    expect(Number(res.headers.get("retry-after"))).toBeGreaterThan(0);
    expect(await res.json()).toMatchObject({
      error: "Too many requests",
      type: "rate_limit_exceeded",
    });
  });

  it("keeps clients apart by X-Forwarded-For behind a trusted proxy", async () => {
    const app = createTestApp(1, true, true);
    const from = (ip: string) => ({ headers: { "X-Forwarded-For": `${ip}, 10.0.0.1` } });

    expect((await app.request("/", from("203.0.113.7"))).status).toBe(200);
    expect((await app.request("/", from("203.0.113.8"))).status).toBe(200);
    expect((await app.request("/", from("203.0.113.7"))).status).toBe(429);
  });

  it("ignores X-Forwarded-For unless the proxy is trusted", async () => {
    const app = createTestApp(1, true, false);

    expect(
      (await app.request("/", { headers: { "X-Forwarded-For": "203.0.113.7" } })).status,
    ).toBe(200);
    expect(
      (await app.request("/", { headers: { "X-Forwarded-For": "203.0.113.8" } })).status,
    ).toBe(429);
  });

  it("maps unexpected errors to 500 with their message outside production", async () => {
    const res = await createFailingApp("development").request("/boom");

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({
      error: "prefix table vanished",
      type: "internal_error",
    });
  });

  it("hides the message of unexpected errors in production", async () => {
    const res = await createFailingApp("production").request("/boom");

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({
      error: "Internal server error",
      type: "internal_error",
    });
  });
});
