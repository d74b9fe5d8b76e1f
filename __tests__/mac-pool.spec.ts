import { describe, it, expect, vi } from "vitest";
import type { PortalConfig } from "../src/lib/gatewayConfig.js";
import { MacPool } from "../src/lib/macPool.js";

const MAC_A = "00:1A:79:00:00:01";
const MAC_B = "00:1A:79:00:00:02";

const portal = (overrides: Partial<PortalConfig> = {}): PortalConfig => ({
  id: "main",
  name: "Main",
  url: "http://portal.example.com/c/",
  proxy: null,
  streamsPerMac: 1,
  epgOffsetHours: 0,
  enabled: true,
  macs: [
    { mac: MAC_A, expiresAt: null },
    { mac: MAC_B, expiresAt: null },
  ],
  ...overrides,
});

const poolAt = (clock: { now: number }, options: { failureThreshold?: number; cooldownMs?: number } = {}) => {
  const pool = new MacPool({ ...options, leaseTimeoutMs: 1_000, now: () => clock.now });
  pool.configure([portal()]);
  return pool;
};

describe("MacPool", () => {
  it("hands out one lease per MAC and refuses a third", () => {
    const pool = poolAt({ now: 0 });

    const first = pool.acquire("main");
    const second = pool.acquire("main");

    expect([first.mac, second.mac]).toEqual([MAC_A, MAC_B]);
    expect(pool.stateOf("main", MAC_A)).toBe("active");
    let failure: unknown = null;
    try {
      pool.acquire("main");
    } catch (error) {
      failure = error;
    }
    expect(failure).toMatchObject({ code: "NoMacAvailable" });

    expect(pool.release(first)).toBe(true);
    expect(pool.release(first)).toBe(false);
    expect(pool.acquire("main").mac).toBe(MAC_A);
  });

  it("treats a zero limit as unlimited", () => {
    const pool = new MacPool();
    pool.configure([portal({ streamsPerMac: 0, macs: [{ mac: MAC_A, expiresAt: null }] })]);

    pool.acquire("main");
    pool.acquire("main");

    expect(pool.stateOf("main", MAC_A)).toBe("busy");
    expect(pool.activeLeases()).toBe(2);
  });

  it("prefers the MAC with the most recent handshake among equally loaded ones", () => {
    const clock = { now: 100 };
    const pool = poolAt(clock);
    pool.recordSuccess("main", MAC_B);

    expect(pool.stateOf("main", MAC_B)).toBe("available");
    expect(pool.stateOf("main", MAC_A)).toBe("unknown");
    expect(pool.acquire("main").mac).toBe(MAC_B);
  });

  it("skips excluded MACs", () => {
    const pool = poolAt({ now: 0 });
    expect(pool.acquire("main", { exclude: [MAC_A] }).mac).toBe(MAC_B);
  });

  it("cools a MAC down after repeated failures and retries it afterwards", () => {
    const clock = { now: 0 };
    const pool = poolAt(clock, { failureThreshold: 2, cooldownMs: 500 });
    vi.spyOn(console, "warn").mockImplementation(() => undefined);

    pool.recordFailure("main", MAC_A, new Error("timeout"));
    expect(pool.stateOf("main", MAC_A)).toBe("unknown");
    pool.recordFailure("main", MAC_A, new Error("timeout"));
    expect(pool.stateOf("main", MAC_A)).toBe("unreachable");
    expect(pool.describe("main")[0]).toMatchObject({ failures: 2, cooldownUntil: 500, lastError: "timeout" });
    expect(pool.acquire("main").mac).toBe(MAC_B);

    clock.now = 500;
    expect(pool.stateOf("main", MAC_A)).toBe("unknown");
    pool.sweep();
    expect(pool.describe("main")[0]).toMatchObject({ failures: 0, cooldownUntil: null });
  });

  it("only resets an elapsed cooldown when the pool is swept or asked for a lease", () => {
    const clock = { now: 0 };
    const pool = poolAt(clock, { failureThreshold: 1, cooldownMs: 500 });
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    pool.recordFailure("main", MAC_A, new Error("timeout"));

    clock.now = 600;
    expect(pool.stateOf("main", MAC_A)).toBe("unknown");
    expect(pool.describe("main")[0]).toMatchObject({ failures: 1, cooldownUntil: 500 });

    expect(pool.acquire("main").mac).toBe(MAC_A);
    expect(pool.describe("main")[0]).toMatchObject({ failures: 0, cooldownUntil: null, state: "active" });
  });

  it("marks MACs past their expiry and brings them back on reactivation", () => {
    const clock = { now: 2_000 };
    const pool = poolAt(clock);

    pool.recordExpiry("main", MAC_A, 1_000);
    pool.recordExpiry("main", MAC_B, null);

    expect(pool.stateOf("main", MAC_A)).toBe("expired");
    expect(pool.stateOf("main", MAC_B)).toBe("unknown");

    expect(pool.reactivate("main", MAC_A)).toBe(true);
    expect(pool.stateOf("main", MAC_A)).toBe("unknown");
    expect(pool.reactivate("main", "00:1A:79:00:00:99")).toBe(false);
  });

  it("reclaims leases that stopped being touched", () => {
    const clock = { now: 0 };
    const pool = poolAt(clock);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);

    const stale = pool.acquire("main");
    const live = pool.acquire("main");
    clock.now = 900;
    pool.touch(live);
    clock.now = 1_500;

    expect(pool.sweep()).toBe(1);
    expect(pool.activeLeases()).toBe(1);
    expect(pool.release(stale)).toBe(false);
    expect(pool.release(live)).toBe(true);
  });

  it("keeps runtime state across reconfiguration and drops removed MACs", () => {
    const clock = { now: 10 };
    const pool = poolAt(clock);
    pool.recordSuccess("main", MAC_A);
    pool.acquire("main");

    pool.configure([portal({ streamsPerMac: 3, macs: [{ mac: MAC_A, expiresAt: null }] })]);

    expect(pool.macsFor("main")).toEqual([MAC_A]);
    expect(pool.describe("main")).toEqual([
      {
        portalId: "main",
        mac: MAC_A,
        state: "busy",
        inUse: 1,
        limit: 3,
        failures: 0,
        expiresAt: null,
        lastHandshakeAt: 10,
        cooldownUntil: null,
        lastError: null,
      },
    ]);
    expect(pool.stateOf("main", MAC_B)).toBeNull();
  });
});
