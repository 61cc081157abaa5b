/**
 * Tests for network routes: info, balances, and the development
 * funding and clock routes.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { getAddress } from "viem";
import { DEFAULT_FACTORY_ADDRESS } from "@quorumsafe/wallet";
import { createTestApp, jsonRequest, HOUR, OUTSIDER, T0 } from "./setup.js";
import type { AppInstance } from "../src/app.js";

let instance: AppInstance;

beforeEach(() => {
  instance = createTestApp();
});

// =============================================================================
// GET /api/v1/network
// =============================================================================

describe("GET /api/v1/network", () => {
  it("describes the chain, clock and factory", async () => {
    const res = await instance.app.request("/api/v1/network");

    expect(res.status).toBe(200);
    const body = (await res.json()) as { data: Record<string, unknown> };
    expect(body.data).toEqual({
      chainId: 31337,
      timestamp: T0,
      factory: getAddress(DEFAULT_FACTORY_ADDRESS),
      walletCount: 0,
    });
  });

  it("uses the configured chain id", async () => {
    const { app } = createTestApp({ serviceConfig: { chainId: 10, genesisTimestamp: T0 } });
    const res = await app.request("/api/v1/network");
    const body = (await res.json()) as { data: { chainId: number } };
    expect(body.data.chainId).toBe(10);
  });
});

// =============================================================================
// Balances and funding
// =============================================================================

describe("POST /api/v1/network/fund", () => {
  it("credits an account and reports the new balance", async () => {
    const { app } = instance;

    await app.request(jsonRequest("/api/v1/network/fund", "POST", { address: OUTSIDER, amount: "700" }));
    const res = await app.request(
      jsonRequest("/api/v1/network/fund", "POST", { address: OUTSIDER, amount: "300" }),
    );

    expect(res.status).toBe(200);
    const body = (await res.json()) as { data: { address: string; balance: string } };
    expect(body.data).toEqual({ address: OUTSIDER, balance: "1000" });

    const balance = await app.request(`/api/v1/network/balances/${OUTSIDER}`);
    const balanceBody = (await balance.json()) as { data: { balance: string } };
    expect(balanceBody.data.balance).toBe("1000");
  });

  it("rejects a negative amount", async () => {
    const res = await instance.app.request(
      jsonRequest("/api/v1/network/fund", "POST", { address: OUTSIDER, amount: "-1" }),
    );

    expect(res.status).toBe(400);
    const body = (await res.json()) as { error: { code: string; details: { issues: { path: string }[] } } };
    expect(body.error.code).toBe("VALIDATION_ERROR");
    expect(body.error.details.issues[0]!.path).toBe("amount");
  });

  it("rejects a malformed address", async () => {
    const res = await instance.app.request(
      jsonRequest("/api/v1/network/fund", "POST", { address: "0x1234", amount: "1" }),
    );

    expect(res.status).toBe(400);
  });

  it("is not mounted without devRoutes", async () => {
    const { app } = createTestApp({ devRoutes: false });
    const res = await app.request(
      jsonRequest("/api/v1/network/fund", "POST", { address: OUTSIDER, amount: "1" }),
    );

    expect(res.status).toBe(404);
  });
});

describe("GET /api/v1/network/balances/:address", () => {
  it("returns zero for an unknown account", async () => {
    const res = await instance.app.request(`/api/v1/network/balances/${OUTSIDER}`);
    const body = (await res.json()) as { data: { address: string; balance: string } };
    expect(body.data).toEqual({ address: OUTSIDER, balance: "0" });
  });

  it("returns 400 INVALID_ADDRESS for garbage", async () => {
    const res = await instance.app.request("/api/v1/network/balances/not-an-address");

    expect(res.status).toBe(400);
    const body = (await res.json()) as { error: { code: string } };
    expect(body.error.code).toBe("INVALID_ADDRESS");
  });
});

// =============================================================================
// Clock
// =============================================================================

describe("POST /api/v1/network/time", () => {
  it("advances the clock", async () => {
    const res = await instance.app.request(
      jsonRequest("/api/v1/network/time", "POST", { advance: HOUR }),
    );

    expect(res.status).toBe(200);
    const body = (await res.json()) as { data: { timestamp: number } };
    expect(body.data.timestamp).toBe(T0 + HOUR);
  });

  it("sets the clock forward", async () => {
    const res = await instance.app.request(
      jsonRequest("/api/v1/network/time", "POST", { timestamp: T0 + 10 }),
    );

    const body = (await res.json()) as { data: { timestamp: number } };
    expect(body.data.timestamp).toBe(T0 + 10);
  });

  it("refuses to move the clock backwards", async () => {
    const res = await instance.app.request(
      jsonRequest("/api/v1/network/time", "POST", { timestamp: T0 - 1 }),
    );

    expect(res.status).toBe(400);
    const body = (await res.json()) as { error: { code: string } };
    expect(body.error.code).toBe("INVALID_TIME");
  });

  it("rejects a body naming both a timestamp and an advance", async () => {
    const res = await instance.app.request(
      jsonRequest("/api/v1/network/time", "POST", { timestamp: T0 + 10, advance: 5 }),
    );

    expect(res.status).toBe(400);
    const body = (await res.json()) as { error: { code: string } };
    expect(body.error.code).toBe("VALIDATION_ERROR");
  });
});
