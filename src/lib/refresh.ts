import { buildSnapshot, type CatalogMergeEngine, type PortalHarvest } from "./catalogMerge.js";
import type { CatalogStore } from "./catalogStore.js";
import type { EpgMergeEngine } from "./epgMerge.js";
import type { EpgStore } from "./epgStore.js";
import { describeError } from "./errors.js";
import type { PortalConfig } from "./gatewayConfig.js";

export type RefreshPhase = "idle" | "catalog" | "epg" | "done" | "failed";

export interface RefreshProgress {
  running: boolean;
  phase: RefreshPhase;
  reason: string | null;
  startedAt: string | null;
  finishedAt: string | null;
  currentPortal: string | null;
  currentStep: string | null;
  portalsCompleted: number;
  portalsTotal: number;
  errors: string[];
}

/** Progress of the current (or last) cycle, polled by the operations API. */
export class RefreshTracker {
  private state: RefreshProgress = {
    running: false,
    phase: "idle",
    reason: null,
    startedAt: null,
    finishedAt: null,
    currentPortal: null,
    currentStep: null,
    portalsCompleted: 0,
    portalsTotal: 0,
    errors: [],
  };

  private readonly now: () => number;

  constructor(now: () => number = Date.now) {
    this.now = now;
  }

  start(reason: string, portalsTotal: number): void {
    this.state = {
      running: true,
      phase: "catalog",
      reason,
      startedAt: new Date(this.now()).toISOString(),
      finishedAt: null,
      currentPortal: null,
      currentStep: null,
      portalsCompleted: 0,
      portalsTotal,
      errors: [],
    };
  }

  phase(phase: RefreshPhase): void {
    this.state.phase = phase;
    this.state.currentPortal = null;
    this.state.currentStep = null;
  }

  step(portalId: string, step: string): void {
    this.state.currentPortal = portalId;
    this.state.currentStep = step;
  }

  portalDone(portalId: string, error?: string): void {
    this.state.portalsCompleted += 1;
    if (error) {
      this.state.errors.push(`${portalId}: ${error}`);
    }
  }

  error(message: string): void {
    this.state.errors.push(message);
  }

  finish(failed = false): void {
    this.state.running = false;
    this.state.phase = failed ? "failed" : "done";
    this.state.currentPortal = null;
    this.state.currentStep = null;
    this.state.finishedAt = new Date(this.now()).toISOString();
  }

  snapshot(): RefreshProgress {
    return { ...this.state, errors: [...this.state.errors] };
  }
}

const BREAKER_BASE_MS = 60_000;
const BREAKER_MAX_MS = 30 * 60_000;

/** Skips portals whose last refresh failed on every MAC, doubling the pause each time. */
export class PortalBreaker {
  private readonly entries = new Map<string, { failures: number; blockedUntil: number }>();

  private readonly now: () => number;

  constructor(now: () => number = Date.now) {
    this.now = now;
  }

  isBlocked(portalId: string): boolean {
    const entry = this.entries.get(portalId);
    return Boolean(entry && entry.blockedUntil > this.now());
  }

  blockedUntil(portalId: string): number | null {
    return this.entries.get(portalId)?.blockedUntil ?? null;
  }

  recordFailure(portalId: string): number {
    const failures = (this.entries.get(portalId)?.failures ?? 0) + 1;
    const backoffMs = Math.min(BREAKER_MAX_MS, BREAKER_BASE_MS * 2 ** (failures - 1));
    this.entries.set(portalId, { failures, blockedUntil: this.now() + backoffMs });
    return backoffMs;
  }

  recordSuccess(portalId: string): void {
    this.entries.delete(portalId);
  }

  reset(): void {
    this.entries.clear();
  }
}

export const runWithConcurrency = async <T>(
  items: T[],
  limit: number,
  worker: (item: T) => Promise<void>,
): Promise<void> => {
  let index = 0;
  const runners = Array.from({ length: Math.max(1, Math.min(limit, items.length)) }, async () => {
    while (index < items.length) {
      const item = items[index];
      index += 1;
      await worker(item);
    }
  });
  await Promise.all(runners);
};

export interface RefreshReport {
  reason: string;
  catalogVersion: number;
  refreshed: string[];
  failed: string[];
  skipped: string[];
  epgRebuilt: boolean;
}

export interface RefreshCoordinatorDeps {
  portals: () => PortalConfig[];
  catalog: Pick<CatalogMergeEngine, "refreshPortal">;
  catalogStore: CatalogStore;
  epg?: Pick<EpgMergeEngine, "rebuild"> | null;
  epgStore?: EpgStore | null;
  concurrency?: number;
  breaker?: PortalBreaker;
  tracker?: RefreshTracker;
}

/**
 * Runs catalog + EPG refresh cycles. Only one cycle runs at a time; callers
 * that trigger during a cycle join it.
 */
export class RefreshCoordinator {
  readonly tracker: RefreshTracker;

  readonly breaker: PortalBreaker;

  private readonly deps: RefreshCoordinatorDeps;

  private readonly concurrency: number;

  private inflight: Promise<RefreshReport> | null = null;

  constructor(deps: RefreshCoordinatorDeps) {
    this.deps = deps;
    this.concurrency = deps.concurrency ?? 2;
    this.tracker = deps.tracker ?? new RefreshTracker();
    this.breaker = deps.breaker ?? new PortalBreaker();
  }

  isRunning(): boolean {
    return this.inflight !== null;
  }

  run(reason = "manual"): Promise<RefreshReport> {
    if (this.inflight) {
      return this.inflight;
    }
    this.inflight = this.cycle(reason).finally(() => {
      this.inflight = null;
    });
    return this.inflight;
  }

  startSchedule(intervalMs: number): () => void {
    if (intervalMs <= 0) {
      return () => undefined;
    }
    const timer = setInterval(() => {
      this.run("scheduled").catch((error: unknown) => {
        console.error("[refresh] scheduled cycle failed", describeError(error));
      });
    }, intervalMs);
    timer.unref();
    return () => clearInterval(timer);
  }

  private async cycle(reason: string): Promise<RefreshReport> {
    const portals = this.deps.portals().filter((portal) => portal.enabled);
    const harvests: PortalHarvest[] = [];
    const report: RefreshReport = {
      reason,
      catalogVersion: 0,
      refreshed: [],
      failed: [],
      skipped: [],
      epgRebuilt: false,
    };

    console.log(`[refresh] cycle started (${reason}), ${portals.length} portal(s)`);
    this.tracker.start(reason, portals.length);

    try {
      await runWithConcurrency(portals, this.concurrency, async (portal) => {
        if (this.breaker.isBlocked(portal.id)) {
          report.skipped.push(portal.id);
          this.tracker.portalDone(portal.id, "skipped, cooling down");
          return;
        }
        this.tracker.step(portal.id, "starting");
        const harvest = await this.deps.catalog.refreshPortal(portal, (step) => {
          this.tracker.step(portal.id, step);
        });
        harvests.push(harvest);
        if (harvest.ok) {
          this.breaker.recordSuccess(portal.id);
          report.refreshed.push(portal.id);
          this.tracker.portalDone(portal.id);
        } else {
          const backoffMs = this.breaker.recordFailure(portal.id);
          report.failed.push(portal.id);
          this.tracker.portalDone(portal.id, harvest.errors.join("; ") || "all MACs failed");
          console.warn(`[refresh] ${portal.id} paused for ${Math.round(backoffMs / 1000)}s`);
        }
      });

      const store = this.deps.catalogStore;
      const snapshot = buildSnapshot({
        previous: store.snapshot(),
        portals: portals.map((portal) => ({ id: portal.id, name: portal.name })),
        harvests,
        overrides: store.overrides(),
        ids: store.ids,
      });
      store.publish(snapshot);
      report.catalogVersion = snapshot.version;

      const { epg, epgStore } = this.deps;
      if (epg && epgStore) {
        this.tracker.phase("epg");
        try {
          const guide = await epg.rebuild(portals, snapshot, (portalId, step) => {
            this.tracker.step(portalId, step);
          });
          epgStore.publish(guide);
          report.epgRebuilt = true;
        } catch (error) {
          this.tracker.error(`epg: ${describeError(error)}`);
          console.error("[refresh] guide rebuild failed", describeError(error));
        }
      }

      this.tracker.finish();
      console.log(
        `[refresh] cycle done: v${report.catalogVersion}, ${report.refreshed.length} ok, ${report.failed.length} failed, ${report.skipped.length} skipped`,
      );
      return report;
    } catch (error) {
      this.tracker.error(describeError(error));
      this.tracker.finish(true);
      throw error;
    }
  }
}
