import { GatewayError, describeError } from "./errors.js";
import type { PortalConfig } from "./gatewayConfig.js";

export type MacState = "unknown" | "available" | "busy" | "active" | "expired" | "unreachable";

const SELECTABLE: ReadonlySet<MacState> = new Set<MacState>(["unknown", "available", "busy"]);

export interface MacPoolOptions {
  failureThreshold?: number;
  cooldownMs?: number;
  leaseTimeoutMs?: number;
  now?: () => number;
}

export interface MacLease {
  readonly id: number;
  readonly portalId: string;
  readonly mac: string;
  readonly acquiredAt: number;
}

export interface MacStatus {
  portalId: string;
  mac: string;
  state: MacState;
  inUse: number;
  limit: number;
  failures: number;
  expiresAt: number | null;
  lastHandshakeAt: number | null;
  cooldownUntil: number | null;
  lastError: string | null;
}

export interface AcquireOptions {
  exclude?: Iterable<string>;
}

interface MacRecord {
  portalId: string;
  mac: string;
  order: number;
  limit: number;
  configuredExpiry: number | null;
  expiresAt: number | null;
  inUse: number;
  failures: number;
  lastHandshakeAt: number | null;
  cooldownUntil: number | null;
  lastError: string | null;
}

interface LeaseRecord {
  lease: MacLease;
  lastSeen: number;
}

const keyOf = (portalId: string, mac: string): string => `${portalId}|${mac}`;

/**
 * Owns the availability state of every (portal, MAC) identity and hands out
 * leases against each MAC's concurrent-stream limit.
 */
export class MacPool {
  private readonly records = new Map<string, MacRecord>();

  private readonly leases = new Map<number, LeaseRecord>();

  private readonly failureThreshold: number;

  private readonly cooldownMs: number;

  private readonly leaseTimeoutMs: number;

  private readonly now: () => number;

  private nextLeaseId = 1;

  constructor(options: MacPoolOptions = {}) {
    this.failureThreshold = options.failureThreshold ?? 3;
    this.cooldownMs = options.cooldownMs ?? 5 * 60_000;
    this.leaseTimeoutMs = options.leaseTimeoutMs ?? 60_000;
    this.now = options.now ?? Date.now;
  }

  /**
   * Syncs the pool with the configured portals. Runtime state survives for
   * MACs that stay configured; a changed expiry date replaces the observed one.
   */
  configure(portals: PortalConfig[]): void {
    const seen = new Set<string>();

    portals.forEach((portal) => {
      portal.macs.forEach((entry, order) => {
        const key = keyOf(portal.id, entry.mac);
        seen.add(key);
        const existing = this.records.get(key);
        if (existing) {
          existing.order = order;
          existing.limit = portal.streamsPerMac;
          if (existing.configuredExpiry !== entry.expiresAt) {
            existing.configuredExpiry = entry.expiresAt;
            existing.expiresAt = entry.expiresAt;
          }
          return;
        }
        this.records.set(key, {
          portalId: portal.id,
          mac: entry.mac,
          order,
          limit: portal.streamsPerMac,
          configuredExpiry: entry.expiresAt,
          expiresAt: entry.expiresAt,
          inUse: 0,
          failures: 0,
          lastHandshakeAt: null,
          cooldownUntil: null,
          lastError: null,
        });
      });
    });

    for (const key of Array.from(this.records.keys())) {
      if (!seen.has(key)) {
        this.records.delete(key);
      }
    }
  }

  macsFor(portalId: string): string[] {
    return this.portalRecords(portalId).map((record) => record.mac);
  }

  stateOf(portalId: string, mac: string): MacState | null {
    const record = this.records.get(keyOf(portalId, mac));
    return record ? this.deriveState(record) : null;
  }

  /**
   * Picks the least-loaded usable MAC of a portal: fewest leases first, then
   * the most recent successful handshake, then configuration order.
   */
  acquire(portalId: string, options: AcquireOptions = {}): MacLease {
    const excluded = new Set(options.exclude ?? []);
    const records = this.portalRecords(portalId);
    this.endCooldowns(records);
    const candidates = records.filter(
      (record) => !excluded.has(record.mac) && SELECTABLE.has(this.deriveState(record)),
    );

    if (candidates.length === 0) {
      throw new GatewayError("NoMacAvailable", `No MAC available for portal ${portalId}`, {
        details: { portalId },
      });
    }

    candidates.sort(
      (a, b) =>
        a.inUse - b.inUse ||
        (b.lastHandshakeAt ?? -Infinity) - (a.lastHandshakeAt ?? -Infinity) ||
        a.order - b.order,
    );

    const record = candidates[0];
    record.inUse += 1;
    const now = this.now();
    const lease: MacLease = {
      id: this.nextLeaseId,
      portalId,
      mac: record.mac,
      acquiredAt: now,
    };
    this.nextLeaseId += 1;
    this.leases.set(lease.id, { lease, lastSeen: now });
    return lease;
  }

  /** Returns false when the lease was already released. */
  release(lease: MacLease): boolean {
    if (!this.leases.delete(lease.id)) {
      return false;
    }
    const record = this.records.get(keyOf(lease.portalId, lease.mac));
    if (record) {
      record.inUse = Math.max(0, record.inUse - 1);
    }
    return true;
  }

  touch(lease: MacLease): void {
    const entry = this.leases.get(lease.id);
    if (entry) {
      entry.lastSeen = this.now();
    }
  }

  activeLeases(): number {
    return this.leases.size;
  }

  recordSuccess(portalId: string, mac: string): void {
    const record = this.records.get(keyOf(portalId, mac));
    if (!record) {
      return;
    }
    record.failures = 0;
    record.cooldownUntil = null;
    record.lastError = null;
    record.lastHandshakeAt = this.now();
  }

  recordFailure(portalId: string, mac: string, error: unknown): void {
    const record = this.records.get(keyOf(portalId, mac));
    if (!record) {
      return;
    }
    this.endCooldowns([record]);
    record.failures += 1;
    record.lastError = describeError(error);
    if (record.failures >= this.failureThreshold && record.cooldownUntil === null) {
      record.cooldownUntil = this.now() + this.cooldownMs;
      console.warn(
        `[mac-pool] ${portalId} ${mac} unreachable after ${record.failures} failures, cooling down`,
      );
    }
  }

  /** Applies an expiry reported by the portal's account info. */
  recordExpiry(portalId: string, mac: string, expiresAt: number | null): void {
    const record = this.records.get(keyOf(portalId, mac));
    if (record && expiresAt !== null) {
      record.expiresAt = expiresAt;
    }
  }

  reactivate(portalId: string, mac: string): boolean {
    const record = this.records.get(keyOf(portalId, mac));
    if (!record) {
      return false;
    }
    record.expiresAt = null;
    record.failures = 0;
    record.cooldownUntil = null;
    record.lastError = null;
    return true;
  }

  /**
   * Force-releases leases that have not been touched within the lease
   * timeout and resets MACs whose cooldown has run out.
   */
  sweep(): number {
    this.endCooldowns(Array.from(this.records.values()));
    const cutoff = this.now() - this.leaseTimeoutMs;
    let reclaimed = 0;
    for (const { lease, lastSeen } of Array.from(this.leases.values())) {
      if (lastSeen < cutoff && this.release(lease)) {
        reclaimed += 1;
        console.warn(`[mac-pool] reclaimed stale lease on ${lease.portalId} ${lease.mac}`);
      }
    }
    return reclaimed;
  }

  startWatchdog(intervalMs = 15_000): () => void {
    const timer = setInterval(() => {
      this.sweep();
    }, intervalMs);
    timer.unref();
    return () => clearInterval(timer);
  }

  describe(portalId?: string): MacStatus[] {
    const records = portalId
      ? this.portalRecords(portalId)
      : Array.from(this.records.values());
    return records.map((record) => ({
      portalId: record.portalId,
      mac: record.mac,
      state: this.deriveState(record),
      inUse: record.inUse,
      limit: record.limit,
      failures: record.failures,
      expiresAt: record.expiresAt,
      lastHandshakeAt: record.lastHandshakeAt,
      cooldownUntil: record.cooldownUntil,
      lastError: record.lastError,
    }));
  }

  private portalRecords(portalId: string): MacRecord[] {
    return Array.from(this.records.values())
      .filter((record) => record.portalId === portalId)
      .sort((a, b) => a.order - b.order);
  }

  /** Cooldown over: the MAC is retried from scratch. */
  private endCooldowns(records: MacRecord[]): void {
    const now = this.now();
    records
      .filter((record) => record.cooldownUntil !== null && record.cooldownUntil <= now)
      .forEach((record) => {
        record.cooldownUntil = null;
        record.failures = 0;
        record.lastHandshakeAt = null;
      });
  }

  private deriveState(record: MacRecord): MacState {
    const now = this.now();
    if (record.expiresAt !== null && record.expiresAt <= now) {
      return "expired";
    }
    if (record.cooldownUntil !== null && record.cooldownUntil > now) {
      return "unreachable";
    }
    if (record.limit > 0 && record.inUse >= record.limit) {
      return "active";
    }
    if (record.inUse > 0) {
      return "busy";
    }
    // An elapsed cooldown still pending its reset counts as never handshaken.
    return record.lastHandshakeAt !== null && record.cooldownUntil === null ? "available" : "unknown";
  }
}
