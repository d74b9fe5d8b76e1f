import { beforeEach, describe, it, expect, vi } from "vitest";
import type { PortalHarvest } from "../src/lib/catalogMerge.js";
import { MemoryCatalogStore } from "../src/lib/catalogStore.js";
import { MemoryEpgStore, emptyGuide, type GuideSnapshot } from "../src/lib/epgStore.js";
import type { PortalConfig } from "../src/lib/gatewayConfig.js";
import {
  PortalBreaker,
  RefreshCoordinator,
  RefreshTracker,
  runWithConcurrency,
} from "../src/lib/refresh.js";

const NOW = Date.UTC(2026, 9, 19, 6);

const portal = (id: string, enabled = true): PortalConfig => ({
  id,
  name: id.toUpperCase(),
  url: `http://${id}.example.com/c/`,
  proxy: null,
  streamsPerMac: 1,
  epgOffsetHours: 0,
  enabled,
  macs: [{ mac: "00:1A:79:00:00:01", expiresAt: null }],
});

const harvestOf = (config: PortalConfig, ok = true): PortalHarvest => ({
  portalId: config.id,
  portalName: config.name,
  ok,
  refreshedAt: NOW,
  entries: ok
    ? [
        {
          kind: "live",
          portalId: config.id,
          upstreamId: "1",
          name: `${config.name} One`,
          number: 1,
          genreName: "News",
          logo: "",
          cmd: "",
          xmltvId: "",
          description: "",
          year: "",
          rating: "",
          added: "",
          sourceMac: "00:1A:79:00:00:01",
        },
      ]
    : [],
  errors: ok ? [] : ["00:1A:79:00:00:01: PortalUnreachable: down"],
});

describe("PortalBreaker", () => {
  it("doubles the pause up to the cap and clears on success", () => {
    const clock = { now: 0 };
    const breaker = new PortalBreaker(() => clock.now);

    expect(breaker.recordFailure("main")).toBe(60_000);
    expect(breaker.recordFailure("main")).toBe(120_000);
    expect(breaker.isBlocked("main")).toBe(true);
    clock.now = 120_000;
    expect(breaker.isBlocked("main")).toBe(false);

    for (let i = 0; i < 6; i += 1) {
      breaker.recordFailure("main");
    }
    expect(breaker.blockedUntil("main")).toBe(120_000 + 1_800_000);

    breaker.recordSuccess("main");
    expect(breaker.blockedUntil("main")).toBeNull();
  });
});

describe("runWithConcurrency", () => {
  it("never runs more than the limit at once", async () => {
    let running = 0;
    let peak = 0;
    const seen: number[] = [];

    await runWithConcurrency([1, 2, 3, 4, 5], 2, async (item) => {
      running += 1;
      peak = Math.max(peak, running);
      await new Promise((resolve) => setTimeout(resolve, 1));
      seen.push(item);
      running -= 1;
    });

    expect(peak).toBe(2);
    expect(seen.sort()).toEqual([1, 2, 3, 4, 5]);
  });
});

describe("RefreshCoordinator", () => {
  let portals: PortalConfig[];
  let catalogStore: MemoryCatalogStore;
  let epgStore: MemoryEpgStore;
  let guide: GuideSnapshot;

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    portals = [portal("alpha"), portal("beta"), portal("off", false)];
    catalogStore = new MemoryCatalogStore();
    epgStore = new MemoryEpgStore();
    guide = emptyGuide(NOW);
  });

  const coordinator = (refreshPortal: (config: PortalConfig) => Promise<PortalHarvest>, rebuild?: () => Promise<GuideSnapshot>) => {
    const catalog = { refreshPortal: vi.fn(refreshPortal) };
    const epg = { rebuild: vi.fn(rebuild ?? (async () => guide)) };
    const refresh = new RefreshCoordinator({
      portals: () => portals,
      catalog,
      catalogStore,
      epg,
      epgStore,
      concurrency: 2,
      breaker: new PortalBreaker(() => NOW),
      tracker: new RefreshTracker(() => NOW),
    });
    return { refresh, catalog, epg };
  };

  it("refreshes enabled portals, publishes the catalog and the guide", async () => {
    const { refresh, catalog, epg } = coordinator(async (config) => harvestOf(config));

    const report = await refresh.run("manual");

    expect(report).toEqual({
      reason: "manual",
      catalogVersion: 1,
      refreshed: ["alpha", "beta"],
      failed: [],
      skipped: [],
      epgRebuilt: true,
    });
    expect(catalog.refreshPortal).toHaveBeenCalledTimes(2);
    expect(catalogStore.snapshot().entries.live.map((entry) => entry.key)).toEqual(["alpha_1", "beta_1"]);
    expect(epg.rebuild).toHaveBeenCalledWith(
      [portals[0], portals[1]],
      catalogStore.snapshot(),
      expect.any(Function),
    );
    expect(epgStore.snapshot()).toBe(guide);
    expect(refresh.tracker.snapshot()).toEqual({
      running: false,
      phase: "done",
      reason: "manual",
      startedAt: new Date(NOW).toISOString(),
      finishedAt: new Date(NOW).toISOString(),
      currentPortal: null,
      currentStep: null,
      portalsCompleted: 2,
      portalsTotal: 2,
      errors: [],
    });
  });

  it("lets concurrent triggers join the running cycle", async () => {
    const { refresh, catalog } = coordinator(async (config) => harvestOf(config));

    const first = refresh.run("startup");
    const second = refresh.run("manual");

    expect(second).toBe(first);
    expect(refresh.isRunning()).toBe(true);
    await first;
    expect(refresh.isRunning()).toBe(false);
    expect(catalog.refreshPortal).toHaveBeenCalledTimes(2);
  });

  it("pauses a portal that failed on every MAC and keeps its old rows", async () => {
    let betaUp = true;
    const { refresh, catalog } = coordinator(async (config) =>
      harvestOf(config, config.id !== "beta" || betaUp),
    );
    await refresh.run("startup");

    betaUp = false;
    const failed = await refresh.run("manual");
    expect(failed.failed).toEqual(["beta"]);
    expect(catalogStore.snapshot().entries.live.map((entry) => entry.key)).toEqual(["alpha_1", "beta_1"]);
    expect(refresh.tracker.snapshot().errors).toEqual([
      "beta: 00:1A:79:00:00:01: PortalUnreachable: down",
    ]);

    const skipped = await refresh.run("scheduled");
    expect(skipped.skipped).toEqual(["beta"]);
    expect(skipped.catalogVersion).toBe(3);
    expect(catalog.refreshPortal).toHaveBeenCalledTimes(5);
  });

  it("finishes the cycle when the guide rebuild fails", async () => {
    const { refresh } = coordinator(
      async (config) => harvestOf(config),
      async () => {
        throw new Error("guide exploded");
      },
    );

    const report = await refresh.run();

    expect(report.epgRebuilt).toBe(false);
    expect(report.catalogVersion).toBe(1);
    expect(refresh.tracker.snapshot()).toMatchObject({ phase: "done", errors: ["epg: guide exploded"] });
  });

  it("marks the cycle failed when the catalog step throws", async () => {
    const { refresh } = coordinator(async () => {
      throw new Error("unexpected");
    });

    await expect(refresh.run()).rejects.toThrow("unexpected");
    expect(refresh.tracker.snapshot()).toMatchObject({ phase: "failed", running: false, errors: ["unexpected"] });
    expect(refresh.isRunning()).toBe(false);
  });
});
