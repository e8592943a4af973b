/**
 * Tests for health check endpoints.
 *
 * Verifies:
 * - GET /health returns 200 with status "ok"
 * - GET /ready reports the state hash and store verification
 * - X-Request-Id is set on responses
 */

import { describe, it, expect } from "vitest";
import { InMemoryLedgerStore, emptyState, computeStateHash } from "@cardflow/store";
import { createTestApp, createTestService, jsonRequest } from "./setup.js";

describe("GET /health", () => {
  it("returns 200 with status ok", async () => {
    const { app } = createTestApp();
    const res = await app.request("/health");

    expect(res.status).toBe(200);

    const body = (await res.json()) as { status: string; timestamp: string };
    expect(body.status).toBe("ok");
    expect(typeof body.timestamp).toBe("string");
  });

  it("generates an X-Request-Id header", async () => {
    const { app } = createTestApp();
    const res = await app.request("/health");

    expect(res.headers.get("X-Request-Id")).toMatch(/^[0-9a-f-]{36}$/);
  });

  it("preserves a safe incoming X-Request-Id", async () => {
    const { app } = createTestApp();
    const res = await app.request(
      jsonRequest("/health", "GET", undefined, { "X-Request-Id": "test-req-123" }),
    );

    expect(res.headers.get("X-Request-Id")).toBe("test-req-123");
  });

  it("replaces an unsafe incoming X-Request-Id", async () => {
    const { app } = createTestApp();
    const res = await app.request(
      jsonRequest("/health", "GET", undefined, { "X-Request-Id": "bad id <script>" }),
    );

    expect(res.headers.get("X-Request-Id")).not.toBe("bad id <script>");
  });
});

describe("GET /ready", () => {
  it("returns 200 with the empty-state hash and zone", async () => {
    const { app } = createTestApp();
    const res = await app.request("/ready");

    expect(res.status).toBe(200);
    const body = (await res.json()) as { status: string; stateHash: string; zone: string };
    expect(body.status).toBe("ready");
    expect(body.stateHash).toBe(computeStateHash(emptyState()));
    expect(body.zone).toBe("+03:00");
  });

  it("returns 503 when the store fails verification", async () => {
    class UnverifiedStore extends InMemoryLedgerStore {
      override verify(): boolean {
        return false;
      }
    }
    const { app } = createTestApp({ service: createTestService(new UnverifiedStore()) });
    const res = await app.request("/ready");

    expect(res.status).toBe(503);
    const body = (await res.json()) as { status: string };
    expect(body.status).toBe("not_ready");
  });

  it("is reachable without credentials when auth is on", async () => {
    const { app } = createTestApp({ auth: { apiKeys: new Map() } });
    const res = await app.request("/ready");

    expect(res.status).toBe(200);
  });
});
