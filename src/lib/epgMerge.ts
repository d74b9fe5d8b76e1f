import type { CatalogEntry, CatalogSnapshot } from "./catalogMerge.js";
import { describeError } from "./errors.js";
import { EpgMatcher, type EpgMatchPolicy } from "./epgMatcher.js";
import type { FallbackEpgSource, FallbackGuide } from "./epgFallback.js";
import { GuideBuilder, type EpgProgramme, type GuideSnapshot } from "./epgStore.js";
import type { PortalConfig } from "./gatewayConfig.js";
import type { MacPool } from "./macPool.js";
import type { PortalClientProvider } from "./portalClients.js";
import type { PortalEpgEntry } from "./portalPayloads.js";

const HOUR_MS = 60 * 60 * 1000;
const RETENTION_MS = 2 * 24 * HOUR_MS;

export const portalEpgId = (portalId: string, upstreamId: string): string =>
  `${portalId}_${upstreamId}`;

/**
 * Keeps, per channel, the variant with the most programmes. Portals often
 * return partial guides for some MACs.
 */
export const mergeRichest = (
  target: Map<string, PortalEpgEntry[]>,
  variant: Map<string, PortalEpgEntry[]>,
): void => {
  variant.forEach((entries, channelId) => {
    const existing = target.get(channelId);
    if (!existing || entries.length > existing.length) {
      target.set(channelId, entries);
    }
  });
};

export const toPortalProgrammes = (
  entries: PortalEpgEntry[],
  offsetHours: number,
  floor: number,
): EpgProgramme[] => {
  const shift = offsetHours * HOUR_MS;
  return entries
    .map((entry) => ({
      start: entry.start + shift,
      stop: entry.stop + shift,
      title: entry.title,
      description: entry.description,
      source: "portal" as const,
    }))
    .filter((programme) => programme.stop >= floor);
};

export interface EffectiveEpgInput {
  entry: CatalogEntry;
  portalHasProgrammes: boolean;
  matcher: EpgMatcher | null;
}

/** override → portal id (when the portal has programmes) → fallback match → "". */
export const resolveEffectiveEpgId = ({ entry, portalHasProgrammes, matcher }: EffectiveEpgInput): string => {
  if (entry.epgIdOverride) {
    return entry.epgIdOverride;
  }
  if (portalHasProgrammes) {
    return portalEpgId(entry.portalId, entry.upstreamId);
  }
  if (matcher) {
    const match = matcher.match(entry.name);
    if (match.tier !== "none") {
      return match.channelId;
    }
  }
  return "";
};

export interface EpgFallbackSettings {
  enabled: boolean;
  countries: string[];
  match: EpgMatchPolicy;
}

export interface EpgMergeOptions {
  windowHours?: number;
  fallback?: FallbackEpgSource | null;
  settings: EpgFallbackSettings;
  now?: () => number;
}

export type EpgProgress = (portalId: string, step: string) => void;

export class EpgMergeEngine {
  private readonly clients: PortalClientProvider;

  private readonly pool: MacPool;

  private readonly windowHours: number;

  private readonly fallback: FallbackEpgSource | null;

  private readonly settings: EpgFallbackSettings;

  private readonly now: () => number;

  constructor(clients: PortalClientProvider, pool: MacPool, options: EpgMergeOptions) {
    this.clients = clients;
    this.pool = pool;
    this.windowHours = options.windowHours ?? 24;
    this.fallback = options.fallback ?? null;
    this.settings = options.settings;
    this.now = options.now ?? Date.now;
  }

  async fetchPortalEpg(portal: PortalConfig, onStep?: EpgProgress): Promise<Map<string, PortalEpgEntry[]>> {
    const merged = new Map<string, PortalEpgEntry[]>();
    for (const { mac } of portal.macs) {
      const state = this.pool.stateOf(portal.id, mac);
      if (state === "expired" || state === "unreachable") {
        continue;
      }
      onStep?.(portal.id, `${mac}: epg`);
      try {
        const session = await this.clients.session(portal, mac);
        mergeRichest(merged, await session.getEpg(this.windowHours));
      } catch (error) {
        this.pool.recordFailure(portal.id, mac, error);
        console.warn(`[epg] ${portal.id} ${mac} guide failed`, describeError(error));
      }
    }
    return merged;
  }

  /**
   * Rebuilds the guide for every enabled live entry of the snapshot. Portal
   * programmes are upserted first so fallback data can never replace them.
   */
  async rebuild(
    portals: PortalConfig[],
    catalog: CatalogSnapshot,
    onStep?: EpgProgress,
  ): Promise<GuideSnapshot> {
    const now = this.now();
    const floor = now - RETENTION_MS;
    const builder = new GuideBuilder();
    const portalIds = new Set<string>();

    for (const portal of portals.filter((candidate) => candidate.enabled)) {
      const raw = await this.fetchPortalEpg(portal, onStep);
      raw.forEach((entries, upstreamId) => {
        const programmes = toPortalProgrammes(entries, portal.epgOffsetHours, floor);
        if (programmes.length > 0) {
          const epgId = portalEpgId(portal.id, upstreamId);
          builder.upsertProgrammes(epgId, programmes);
          portalIds.add(epgId);
        }
      });
    }

    const guide = await this.loadFallback();
    const matcher = guide ? new EpgMatcher(guide.channels, this.settings.match) : null;

    catalog.entries.live
      .filter((entry) => entry.enabled)
      .forEach((entry) => {
        const ownId = portalEpgId(entry.portalId, entry.upstreamId);
        const epgId = resolveEffectiveEpgId({
          entry,
          portalHasProgrammes: portalIds.has(ownId),
          matcher,
        });
        if (!epgId) {
          return;
        }
        const fallbackProgrammes = guide?.programmes.get(epgId);
        if (fallbackProgrammes && epgId !== ownId) {
          builder.upsertProgrammes(epgId, fallbackProgrammes);
        }
        builder.assign(entry.key, { epgId, displayName: entry.name, icon: entry.logo });
      });

    const snapshot = builder.build(now);
    console.log(
      `[epg] guide rebuilt: ${snapshot.channels.length} channels, ${snapshot.programmes.size} with programmes`,
    );
    return snapshot;
  }

  private async loadFallback(): Promise<FallbackGuide | null> {
    if (!this.fallback || !this.settings.enabled || this.settings.countries.length === 0) {
      return null;
    }
    return this.fallback.load(this.settings.countries);
  }
}
