import { beforeEach, describe, it, expect, vi } from "vitest";
import type { UserConfig } from "../src/lib/gatewayConfig.js";
import { SessionBroker, deviceFingerprint } from "../src/lib/sessionBroker.js";

const user = (overrides: Partial<UserConfig> = {}): UserConfig => ({
  username: "alice",
  password: "test-secret",
  maxConnections: 1,
  allowedPortals: [],
  expiresAt: null,
  enabled: true,
  createdAt: "2026-01-01T00:00:00.000Z",
  ...overrides,
});

describe("SessionBroker.authenticate", () => {
  const clock = { now: Date.UTC(2026, 9, 19, 23, 59) };
  const broker = new SessionBroker({
    users: () => [
      user(),
      user({ username: "bob", enabled: false }),
      user({ username: "carol", expiresAt: "2026-10-19" }),
      user({ username: "dave", expiresAt: "2026-10-18" }),
    ],
    now: () => clock.now,
  });

  it("accepts valid credentials", () => {
    const result = broker.authenticate("alice", "test-secret");
    expect(result.ok).toBe(true);
  });

  it("explains why a login is refused", () => {
    expect(broker.authenticate("alice", undefined)).toEqual({ ok: false, message: "Missing credentials" });
    expect(broker.authenticate("alice", "wrong")).toEqual({ ok: false, message: "Invalid credentials" });
    expect(broker.authenticate("nobody", "test-secret")).toEqual({ ok: false, message: "Invalid credentials" });
    expect(broker.authenticate("bob", "test-secret")).toEqual({ ok: false, message: "Account disabled" });
    expect(broker.authenticate("dave", "test-secret")).toEqual({ ok: false, message: "Account expired" });
  });

  it("treats the expiry day as still valid", () => {
    expect(broker.authenticate("carol", "test-secret").ok).toBe(true);
  });
});

describe("SessionBroker admission", () => {
  const clock = { now: 1_000_000 };
  let broker: SessionBroker;

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    clock.now = 1_000_000;
    broker = new SessionBroker({ users: () => [user()], idleTimeoutMs: 60_000, now: () => clock.now });
  });

  it("refuses a second device beyond the limit and lets the first one reconnect", () => {
    const first = broker.admit(user(), { streamId: 7, deviceId: "tv", ip: "192.0.2.10" });

    let failure: unknown = null;
    try {
      broker.admit(user(), { streamId: 7, deviceId: "phone", ip: "192.0.2.11" });
    } catch (error) {
      failure = error;
    }
    expect(failure).toMatchObject({ code: "AdmissionDenied", details: { active: 1, max: 1 } });

    clock.now += 5_000;
    const again = broker.admit(user(), { streamId: 7, deviceId: "tv", ip: "192.0.2.10" });
    expect(again).toBe(first);
    expect(again.lastActivity).toBe(1_005_000);
    expect(broker.activeCount("alice")).toBe(1);
  });

  it("frees the slot on release", () => {
    const first = broker.admit(user(), { streamId: 7, deviceId: "tv", ip: "192.0.2.10" });

    expect(broker.release(first)).toBe(true);
    expect(broker.release(first)).toBe(false);
    expect(broker.admit(user(), { streamId: 8, deviceId: "phone", ip: "192.0.2.11" }).id).toBe(2);
  });

  it("expires idle rows unless they are touched", () => {
    const row = broker.admit(user({ maxConnections: 2 }), { streamId: 7, deviceId: "tv", ip: "192.0.2.10" });
    broker.admit(user({ maxConnections: 2 }), { streamId: 8, deviceId: "tv", ip: "192.0.2.10" });

    clock.now += 50_000;
    broker.touch(row);
    clock.now += 20_000;

    expect(broker.list()).toEqual([
      {
        id: 1,
        username: "alice",
        streamId: 7,
        deviceId: "tv",
        ip: "192.0.2.10",
        label: "",
        startedAt: new Date(1_000_000).toISOString(),
        lastActivity: new Date(1_050_000).toISOString(),
      },
    ]);
  });

  it("keeps a shared row until every holder has released it", () => {
    const first = broker.admit(user(), { streamId: 5, deviceId: "tv", ip: "192.0.2.10" });
    const second = broker.admit(user(), { streamId: 5, deviceId: "tv", ip: "192.0.2.10" });
    expect(second).toBe(first);

    expect(broker.release(first)).toBe(false);
    expect(broker.activeCount("alice")).toBe(1);
    expect(() => broker.admit(user(), { streamId: 6, deviceId: "phone", ip: "192.0.2.11" })).toThrow(
      "Max connections reached for alice (1/1)",
    );

    expect(broker.release(second)).toBe(true);
    expect(broker.admit(user(), { streamId: 6, deviceId: "phone", ip: "192.0.2.11" }).id).toBe(2);
  });

  it("kicks every row of a user", () => {
    broker.admit(user({ maxConnections: 3 }), { streamId: 7, deviceId: "tv", ip: "192.0.2.10" });
    broker.admit(user({ maxConnections: 3 }), { streamId: 8, deviceId: "tv", ip: "192.0.2.10" });

    expect(broker.kick("alice")).toBe(2);
    expect(broker.activeCount("alice")).toBe(0);
  });
});

describe("deviceFingerprint", () => {
  it("is stable per ip and user agent", () => {
    const fingerprint = deviceFingerprint("192.0.2.10", "VLC/3.0");
    expect(fingerprint).toHaveLength(16);
    expect(deviceFingerprint("192.0.2.10", "VLC/3.0")).toBe(fingerprint);
    expect(deviceFingerprint("192.0.2.11", "VLC/3.0")).not.toBe(fingerprint);
  });
});
