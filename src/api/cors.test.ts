import type { Hono } from "hono";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { createTestApp, TEST_ORIGIN } from "../test/app.js";
import type { TestGateway } from "../test/gateway.js";

describe("CORS middleware", () => {
  let app: Hono;
  let gw: TestGateway;

  beforeAll(async () => {
    ({ app, gw } = await createTestApp());
  });

  afterAll(async () => {
    await gw.close();
  });

  it("includes CORS headers for an allowed origin", async () => {
    const res = await app.request("/ping", { headers: { Origin: TEST_ORIGIN } });
    expect(res.status).toBe(200);
    expect(res.headers.get("Access-Control-Allow-Origin")).toBe(TEST_ORIGIN);
  });

  it("answers preflight with the API key header allowed", async () => {
    const res = await app.request("/api/chat", {
      method: "OPTIONS",
      headers: {
        Origin: TEST_ORIGIN,
        "Access-Control-Request-Method": "POST",
        "Access-Control-Request-Headers": "Content-Type, X-API-Key",
      },
    });
    expect(res.status).toBe(204);
    expect(res.headers.get("Access-Control-Allow-Methods")).toBe("GET,POST");
    expect(res.headers.get("Access-Control-Allow-Headers")).toBe("Content-Type,Authorization,X-API-Key");
  });

  it("exposes the rate limit headers to browsers", async () => {
    const res = await app.request("/ping", { headers: { Origin: TEST_ORIGIN } });
    expect(res.headers.get("Access-Control-Expose-Headers")).toContain("X-RateLimit-Remaining");
  });

  it("rejects requests from disallowed origins", async () => {
    const res = await app.request("/ping", { headers: { Origin: "https://evil.example.com" } });
    expect(res.headers.get("Access-Control-Allow-Origin")).toBeNull();
  });
});
