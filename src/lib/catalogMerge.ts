import type { PortalSession } from "../portalSession.js";
import { describeError } from "./errors.js";
import type { PortalConfig } from "./gatewayConfig.js";
import type { MacPool } from "./macPool.js";
import type { PortalClientProvider } from "./portalClients.js";
import type { PortalGenre } from "./portalPayloads.js";
import { StreamIdRegistry, streamKey, type CatalogKind } from "./streamIds.js";

export type { CatalogKind } from "./streamIds.js";

export const CATALOG_KINDS: readonly CatalogKind[] = ["live", "vod", "series"];

const UNCATEGORIZED = "Other";

/** Upstream values of one catalog row, before operator overrides. */
export interface RawCatalogEntry {
  kind: CatalogKind;
  portalId: string;
  upstreamId: string;
  name: string;
  number: number | null;
  genreName: string;
  logo: string;
  cmd: string;
  xmltvId: string;
  description: string;
  year: string;
  rating: string;
  added: string;
  sourceMac: string;
}

export interface CatalogOverride {
  name?: string;
  number?: number | null;
  genre?: string;
  epgId?: string;
  enabled?: boolean;
  /** Name of the same channel on another portal, tried when this one cannot play. */
  fallback?: string;
}

/** Overrides per kind, keyed by `streamKey(kind, portalId, upstreamId)`. */
export type CatalogOverrides = Record<CatalogKind, Record<string, CatalogOverride>>;

export const emptyOverrides = (): CatalogOverrides => ({ live: {}, vod: {}, series: {} });

export interface CatalogEntry {
  readonly kind: CatalogKind;
  readonly key: string;
  readonly streamId: number;
  readonly portalId: string;
  readonly portalName: string;
  readonly upstreamId: string;
  readonly name: string;
  readonly number: number | null;
  readonly genreName: string;
  readonly categoryId: string;
  readonly logo: string;
  readonly cmd: string;
  readonly xmltvId: string;
  /** Operator-assigned EPG id; empty when none. */
  readonly epgIdOverride: string;
  /** Operator-assigned fallback channel name; empty when none. */
  readonly fallbackName: string;
  readonly enabled: boolean;
  readonly description: string;
  readonly year: string;
  readonly rating: string;
  readonly added: string;
  readonly source: Readonly<RawCatalogEntry>;
}

export interface CatalogCategory {
  readonly kind: CatalogKind;
  readonly categoryId: string;
  readonly name: string;
  readonly portalId: string;
}

export interface PortalCatalogStatus {
  readonly portalId: string;
  readonly portalName: string;
  readonly ok: boolean;
  readonly refreshedAt: number | null;
  readonly error: string | null;
}

export interface CatalogSnapshot {
  readonly version: number;
  readonly builtAt: number;
  readonly portals: readonly PortalCatalogStatus[];
  readonly entries: Readonly<Record<CatalogKind, readonly CatalogEntry[]>>;
  readonly categories: Readonly<Record<CatalogKind, readonly CatalogCategory[]>>;
  readonly byStreamId: ReadonlyMap<number, CatalogEntry>;
  readonly byKey: ReadonlyMap<string, CatalogEntry>;
}

export interface PortalHarvest {
  portalId: string;
  portalName: string;
  ok: boolean;
  refreshedAt: number;
  entries: RawCatalogEntry[];
  errors: string[];
}

export const categoryIdOf = (portalId: string, genreName: string): string =>
  `${portalId}_${genreName}`;

const deepFreeze = <T>(value: T): T => {
  if (value && typeof value === "object" && !(value instanceof Map) && !Object.isFrozen(value)) {
    Object.freeze(value);
    Object.values(value).forEach((child) => {
      deepFreeze(child);
    });
  }
  return value;
};

export const emptySnapshot = (now = Date.now()): CatalogSnapshot =>
  deepFreeze({
    version: 0,
    builtAt: now,
    portals: [],
    entries: { live: [], vod: [], series: [] },
    categories: { live: [], vod: [], series: [] },
    byStreamId: new Map<number, CatalogEntry>(),
    byKey: new Map<string, CatalogEntry>(),
  });

export interface BuildSnapshotInput {
  previous: CatalogSnapshot | null;
  /** Portals in display order. Portals missing here are dropped. */
  portals: Array<{ id: string; name: string }>;
  harvests: PortalHarvest[];
  overrides: CatalogOverrides;
  ids: StreamIdRegistry;
  now?: number;
}

/**
 * Builds an immutable snapshot from fresh harvests. Portals whose harvest
 * failed (or that were not refreshed at all) keep their previous rows.
 */
export const buildSnapshot = (input: BuildSnapshotInput): CatalogSnapshot => {
  const now = input.now ?? Date.now();
  const harvests = new Map(input.harvests.map((harvest) => [harvest.portalId, harvest]));
  const previousStatus = new Map(
    (input.previous?.portals ?? []).map((status) => [status.portalId, status]),
  );

  const rows: Array<{ raw: RawCatalogEntry; portalName: string }> = [];
  const statuses: PortalCatalogStatus[] = [];

  input.portals.forEach((portal) => {
    const harvest = harvests.get(portal.id);
    if (harvest?.ok) {
      harvest.entries.forEach((raw) => rows.push({ raw, portalName: portal.name }));
      statuses.push({
        portalId: portal.id,
        portalName: portal.name,
        ok: true,
        refreshedAt: harvest.refreshedAt,
        error: null,
      });
      return;
    }

    CATALOG_KINDS.forEach((kind) => {
      (input.previous?.entries[kind] ?? [])
        .filter((entry) => entry.portalId === portal.id)
        .forEach((entry) => rows.push({ raw: entry.source, portalName: portal.name }));
    });

    const before = previousStatus.get(portal.id);
    statuses.push({
      portalId: portal.id,
      portalName: portal.name,
      ok: harvest ? false : before?.ok ?? false,
      refreshedAt: before?.refreshedAt ?? null,
      error: harvest ? harvest.errors.join("; ") || "refresh failed" : before?.error ?? null,
    });
  });

  const keys = rows.map(({ raw }) => streamKey(raw.kind, raw.portalId, raw.upstreamId));
  const idTable = input.ids.assign(keys);

  const entries: Record<CatalogKind, CatalogEntry[]> = { live: [], vod: [], series: [] };
  const categories: Record<CatalogKind, CatalogCategory[]> = { live: [], vod: [], series: [] };
  const seenCategories = new Set<string>();
  const byStreamId = new Map<number, CatalogEntry>();
  const byKey = new Map<string, CatalogEntry>();

  rows.forEach(({ raw, portalName }, index) => {
    const key = keys[index];
    if (byKey.has(key)) {
      return;
    }
    const streamId = idTable.get(key);
    if (streamId === undefined) {
      return;
    }
    const override = input.overrides[raw.kind][key] ?? {};
    const genreName = override.genre?.trim() || raw.genreName || UNCATEGORIZED;
    const categoryId = categoryIdOf(raw.portalId, genreName);
    const entry: CatalogEntry = {
      kind: raw.kind,
      key,
      streamId,
      portalId: raw.portalId,
      portalName,
      upstreamId: raw.upstreamId,
      name: override.name?.trim() || raw.name,
      number: override.number !== undefined ? override.number : raw.number,
      genreName,
      categoryId,
      logo: raw.logo,
      cmd: raw.cmd,
      xmltvId: raw.xmltvId,
      epgIdOverride: override.epgId?.trim() ?? "",
      fallbackName: override.fallback?.trim() ?? "",
      enabled: override.enabled ?? true,
      description: raw.description,
      year: raw.year,
      rating: raw.rating,
      added: raw.added,
      source: { ...raw },
    };

    entries[raw.kind].push(entry);
    byStreamId.set(streamId, entry);
    byKey.set(key, entry);

    const categoryKey = `${raw.kind}|${categoryId}`;
    if (entry.enabled && !seenCategories.has(categoryKey)) {
      seenCategories.add(categoryKey);
      categories[raw.kind].push({
        kind: raw.kind,
        categoryId,
        name: `${portalName} - ${genreName}`,
        portalId: raw.portalId,
      });
    }
  });

  return deepFreeze({
    version: (input.previous?.version ?? 0) + 1,
    builtAt: now,
    portals: statuses,
    entries,
    categories,
    byStreamId,
    byKey,
  });
};

const nameKey = (name: string): string => name.trim().replace(/\s+/g, " ").toLowerCase();

/**
 * Enabled live entries on other portals whose name matches the entry's
 * fallback name, in catalog order.
 */
export const findFallbackChannels = (snapshot: CatalogSnapshot, entry: CatalogEntry): CatalogEntry[] => {
  if (entry.kind !== "live" || !entry.fallbackName) {
    return [];
  }
  const wanted = nameKey(entry.fallbackName);
  return snapshot.entries.live.filter(
    (candidate) =>
      candidate.enabled && candidate.portalId !== entry.portalId && nameKey(candidate.name) === wanted,
  );
};

/**
 * Keys of enabled live entries whose name already appeared earlier in the
 * catalog. The first occurrence, in portal order, is the one kept.
 */
export const findDuplicateEntries = (
  snapshot: CatalogSnapshot,
  portalEnabled: (portalId: string) => boolean = () => true,
): string[] => {
  const seen = new Set<string>();
  const duplicates: string[] = [];
  snapshot.entries.live
    .filter((entry) => entry.enabled && portalEnabled(entry.portalId))
    .forEach((entry) => {
      const key = nameKey(entry.name);
      if (seen.has(key)) {
        duplicates.push(entry.key);
        return;
      }
      seen.add(key);
    });
  return duplicates;
};

export interface MergeProgress {
  (step: string): void;
}

export interface CatalogMergeEngineOptions {
  includeVod?: boolean;
  includeSeries?: boolean;
  now?: () => number;
}

const genreLookup = (genres: PortalGenre[]): Map<string, string> =>
  new Map(genres.map((genre) => [genre.id, genre.title]));

/**
 * Queries every usable MAC of a portal and unions the results. The first MAC
 * to report a given upstream id wins; a failing MAC is recorded and skipped.
 */
export class CatalogMergeEngine {
  private readonly clients: PortalClientProvider;

  private readonly pool: MacPool;

  private readonly includeVod: boolean;

  private readonly includeSeries: boolean;

  private readonly now: () => number;

  constructor(clients: PortalClientProvider, pool: MacPool, options: CatalogMergeEngineOptions = {}) {
    this.clients = clients;
    this.pool = pool;
    this.includeVod = options.includeVod ?? true;
    this.includeSeries = options.includeSeries ?? true;
    this.now = options.now ?? Date.now;
  }

  async refreshPortal(portal: PortalConfig, onStep?: MergeProgress): Promise<PortalHarvest> {
    const merged = new Map<string, RawCatalogEntry>();
    const errors: string[] = [];
    let succeeded = 0;

    for (const mac of portal.macs.map((entry) => entry.mac)) {
      const state = this.pool.stateOf(portal.id, mac);
      if (state === "expired" || state === "unreachable") {
        continue;
      }

      onStep?.(`${mac}: channels`);
      try {
        const session = await this.clients.session(portal, mac);
        const rows = await this.harvestMac(portal, mac, session, onStep);
        rows.forEach((row) => {
          const key = streamKey(row.kind, row.portalId, row.upstreamId);
          if (!merged.has(key)) {
            merged.set(key, row);
          }
        });
        this.pool.recordSuccess(portal.id, mac);
        succeeded += 1;
        await this.refreshExpiry(portal, mac, session);
      } catch (error) {
        const message = `${mac}: ${describeError(error)}`;
        errors.push(message);
        this.pool.recordFailure(portal.id, mac, error);
        console.warn(`[refresh] ${portal.id} ${message}`);
      }
    }

    const ok = succeeded > 0;
    if (ok) {
      console.log(
        `[refresh] ${portal.id} merged ${merged.size} entries from ${succeeded}/${portal.macs.length} MACs`,
      );
    } else {
      console.warn(`[refresh] ${portal.id} failed on every MAC`);
    }

    return {
      portalId: portal.id,
      portalName: portal.name,
      ok,
      refreshedAt: this.now(),
      entries: Array.from(merged.values()),
      errors,
    };
  }

  private async harvestMac(
    portal: PortalConfig,
    mac: string,
    session: PortalSession,
    onStep?: MergeProgress,
  ): Promise<RawCatalogEntry[]> {
    const genres = genreLookup(await session.listGenres());
    const channels = await session.listChannels();

    const rows: RawCatalogEntry[] = channels.map((channel) => ({
      kind: "live",
      portalId: portal.id,
      upstreamId: channel.id,
      name: channel.name,
      number: channel.number,
      genreName: genres.get(channel.genreId) ?? "",
      logo: channel.logo,
      cmd: channel.cmd,
      xmltvId: channel.xmltvId,
      description: "",
      year: "",
      rating: "",
      added: "",
      sourceMac: mac,
    }));

    // VOD and series are optional on most portals; a failure there keeps the live rows.
    if (this.includeVod) {
      onStep?.(`${mac}: vod`);
      rows.push(...(await this.harvestMedia(portal, mac, session, "vod")));
    }
    if (this.includeSeries) {
      onStep?.(`${mac}: series`);
      rows.push(...(await this.harvestMedia(portal, mac, session, "series")));
    }

    return rows;
  }

  private async harvestMedia(
    portal: PortalConfig,
    mac: string,
    session: PortalSession,
    kind: "vod" | "series",
  ): Promise<RawCatalogEntry[]> {
    try {
      const categories = genreLookup(
        kind === "vod" ? await session.listVodCategories() : await session.listSeriesCategories(),
      );
      const items = kind === "vod" ? await session.listVod() : await session.listSeries();
      return items.map((item) => ({
        kind,
        portalId: portal.id,
        upstreamId: item.id,
        name: item.name,
        number: null,
        genreName: categories.get(item.categoryId) ?? "",
        logo: item.logo,
        cmd: item.cmd,
        xmltvId: "",
        description: item.description,
        year: item.year,
        rating: item.rating,
        added: item.added,
        sourceMac: mac,
      }));
    } catch (error) {
      console.warn(`[refresh] ${portal.id} ${mac} ${kind} listing skipped`, describeError(error));
      return [];
    }
  }

  private async refreshExpiry(portal: PortalConfig, mac: string, session: PortalSession): Promise<void> {
    try {
      const info = await session.getAccountInfo();
      this.pool.recordExpiry(portal.id, mac, info.expiresAt);
    } catch (error) {
      console.warn(`[refresh] ${portal.id} ${mac} account info unavailable`, describeError(error));
    }
  }
}
