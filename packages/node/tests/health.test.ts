/**
 * Tests for health check endpoints.
 *
 * Verifies:
 * - GET /health returns 200 with status "ok"
 * - GET /ready reports the domain, block and event chain state
 * - X-Request-Id is set on responses
 */

import { describe, it, expect } from "vitest";
import {
  LOCAL_DOMAIN,
  START_BLOCK,
  TOKEN,
  createTestApp,
  depositor,
  jsonRequest,
} from "./setup.js";

describe("GET /health", () => {
  it("returns 200 with status ok", async () => {
    const { app } = createTestApp();
    const res = await app.request("/health");

    expect(res.status).toBe(200);

    const body = (await res.json()) as { status: string; timestamp: string };
    expect(body.status).toBe("ok");
    expect(Number.isNaN(Date.parse(body.timestamp))).toBe(false);
  });

  it("generates an X-Request-Id", async () => {
    const { app } = createTestApp();
    const res = await app.request("/health");

    expect(res.headers.get("X-Request-Id")).toMatch(
      /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/,
    );
  });

  it("preserves incoming X-Request-Id", async () => {
    const { app } = createTestApp();
    const res = await app.request(
      jsonRequest("/health", "GET", undefined, {
        "X-Request-Id": "test-req-123",
      }),
    );

    expect(res.headers.get("X-Request-Id")).toBe("test-req-123");
  });

  it("replaces an X-Request-Id with unsafe characters", async () => {
    const { app } = createTestApp();
    const res = await app.request(
      jsonRequest("/health", "GET", undefined, {
        "X-Request-Id": "bad id<script>",
      }),
    );

    expect(res.headers.get("X-Request-Id")).not.toBe("bad id<script>");
  });
});

describe("GET /ready", () => {
  it("returns 200 ready on a fresh service", async () => {
    const { app } = createTestApp();
    const res = await app.request("/ready");

    expect(res.status).toBe(200);

    const body = (await res.json()) as Record<string, unknown>;
    expect(body).toMatchObject({
      status: "ready",
      localDomain: LOCAL_DOMAIN,
      currentBlock: START_BLOCK.toString(),
      eventStore: { valid: true, lastVerifiedPosition: 0, errors: 0, subscriberFailures: 0 },
    });
  });

  it("follows the block clock", async () => {
    const { app, service } = createTestApp();
    service.advanceBlocks(5n);

    const res = await app.request("/ready");
    const body = (await res.json()) as { currentBlock: string };

    expect(body.currentBlock).toBe("105");
  });

  it("counts subscriber failures without leaving the ready state", async () => {
    const { app, service } = createTestApp();
    service.eventStore.subscribeAll(() => {
      throw new Error("indexer offline");
    });
    service.bank.credit(TOKEN, depositor.address, 50n);
    service.wallet.deposit(TOKEN, depositor.address, 50n);

    const res = await app.request("/ready");
    const body = (await res.json()) as { status: string; eventStore: Record<string, unknown> };

    expect(res.status).toBe(200);
    expect(body.status).toBe("ready");
    expect(body.eventStore).toEqual({
      valid: true,
      lastVerifiedPosition: 1,
      errors: 0,
      subscriberFailures: 1,
    });
    expect(service.wallet.availableBalance(TOKEN, depositor.address)).toBe(50n);
    expect(service.bank.custodyOf(TOKEN)).toBe(50n);
  });
});
