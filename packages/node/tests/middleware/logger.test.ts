/**
 * Tests for logger middleware.
 */

import { describe, it, expect } from "vitest";
import { createTestApp, jsonRequest, testAccount } from "../setup.js";
import { levelForStatus } from "../../src/middleware/logger.js";
import type { RequestLogEntry } from "../../src/middleware/logger.js";

describe("loggerMiddleware", () => {
  it("calls logFn with request details", async () => {
    const entries: RequestLogEntry[] = [];
    const { app } = createTestApp({ logFn: (entry) => entries.push(entry) });

    await app.request("/health", { headers: { "X-Request-Id": "req-1" } });

    expect(entries).toHaveLength(1);
    expect(entries[0]!.level).toBe("info");
    expect(entries[0]!.method).toBe("GET");
    expect(entries[0]!.path).toBe("/health");
    expect(entries[0]!.status).toBe(200);
    expect(entries[0]!.durationMs).toBeGreaterThanOrEqual(0);
    expect(entries[0]!.requestId).toBe("req-1");
  });

  it("logs POST requests with correct status", async () => {
    const entries: RequestLogEntry[] = [];
    const { app } = createTestApp({ logFn: (entry) => entries.push(entry) });

    await app.request(
      jsonRequest("/api/v1/wallets", "POST", { signers: [testAccount(1).address] }),
    );

    expect(entries).toHaveLength(1);
    expect(entries[0]!.method).toBe("POST");
    expect(entries[0]!.status).toBe(201);
  });

  it("logs rejected requests at warn", async () => {
    const entries: RequestLogEntry[] = [];
    const { app } = createTestApp({ logFn: (entry) => entries.push(entry) });

    await app.request(jsonRequest("/api/v1/wallets", "POST", { signers: [] }));

    expect(entries[0]!.status).toBe(400);
    expect(entries[0]!.level).toBe("warn");
  });
});

describe("levelForStatus", () => {
  it("maps status classes to log levels", () => {
    expect(levelForStatus(201)).toBe("info");
    expect(levelForStatus(404)).toBe("warn");
    expect(levelForStatus(503)).toBe("error");
  });
});
