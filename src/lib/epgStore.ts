export type EpgSource = "portal" | "fallback";

export interface EpgProgramme {
  readonly start: number;
  readonly stop: number;
  readonly title: string;
  readonly description: string;
  readonly source: EpgSource;
}

export interface GuideChannelInfo {
  readonly epgId: string;
  readonly displayName: string;
  readonly icon: string;
}

export interface GuideSnapshot {
  readonly builtAt: number;
  readonly channels: readonly GuideChannelInfo[];
  readonly programmes: ReadonlyMap<string, readonly EpgProgramme[]>;
  /** Catalog key of a live entry → the EPG id it was given. */
  readonly assignments: ReadonlyMap<string, string>;
}

export const emptyGuide = (now = Date.now()): GuideSnapshot => ({
  builtAt: now,
  channels: [],
  programmes: new Map(),
  assignments: new Map(),
});

const sortProgrammes = (programmes: readonly EpgProgramme[]): EpgProgramme[] =>
  [...programmes].sort((a, b) => a.start - b.start);

/**
 * Decides whether `incoming` may replace `existing` for one EPG id. Portal
 * data is never replaced by fallback data; within a source the richer
 * variant wins.
 */
export const shouldReplace = (
  existing: readonly EpgProgramme[] | undefined,
  incoming: readonly EpgProgramme[],
): boolean => {
  if (!existing || existing.length === 0) {
    return incoming.length > 0;
  }
  const existingSource = existing[0].source;
  const incomingSource = incoming[0]?.source;
  if (incomingSource === undefined) {
    return false;
  }
  if (existingSource === "portal" && incomingSource === "fallback") {
    return false;
  }
  if (existingSource === "fallback" && incomingSource === "portal") {
    return true;
  }
  return incoming.length > existing.length;
};

/** Mutable working set for one guide rebuild. */
export class GuideBuilder {
  private readonly programmes = new Map<string, EpgProgramme[]>();

  private readonly channels = new Map<string, GuideChannelInfo>();

  private readonly assignments = new Map<string, string>();

  upsertProgrammes(epgId: string, programmes: readonly EpgProgramme[]): boolean {
    if (!epgId || !shouldReplace(this.programmes.get(epgId), programmes)) {
      return false;
    }
    this.programmes.set(epgId, sortProgrammes(programmes));
    return true;
  }

  programmesFor(epgId: string): readonly EpgProgramme[] {
    return this.programmes.get(epgId) ?? [];
  }

  hasProgrammes(epgId: string): boolean {
    return (this.programmes.get(epgId)?.length ?? 0) > 0;
  }

  assign(catalogKey: string, channel: GuideChannelInfo): void {
    this.assignments.set(catalogKey, channel.epgId);
    if (!this.channels.has(channel.epgId)) {
      this.channels.set(channel.epgId, channel);
    }
  }

  build(now = Date.now()): GuideSnapshot {
    const used = new Set(this.channels.keys());
    const programmes = new Map<string, readonly EpgProgramme[]>();
    this.programmes.forEach((list, epgId) => {
      if (used.has(epgId)) {
        programmes.set(epgId, Object.freeze(list));
      }
    });
    return Object.freeze({
      builtAt: now,
      channels: Object.freeze(Array.from(this.channels.values())),
      programmes,
      assignments: new Map(this.assignments),
    });
  }
}

export interface EpgStore {
  snapshot(): GuideSnapshot;
  publish(snapshot: GuideSnapshot): void;
  programmesFor(epgId: string): readonly EpgProgramme[];
  upsertProgrammes(epgId: string, programmes: readonly EpgProgramme[]): boolean;
}

export class MemoryEpgStore implements EpgStore {
  private current: GuideSnapshot = emptyGuide();

  snapshot(): GuideSnapshot {
    return this.current;
  }

  publish(snapshot: GuideSnapshot): void {
    this.current = snapshot;
  }

  programmesFor(epgId: string): readonly EpgProgramme[] {
    return this.current.programmes.get(epgId) ?? [];
  }

  /** Copy-on-write update of a single id in the published guide. */
  upsertProgrammes(epgId: string, programmes: readonly EpgProgramme[]): boolean {
    if (!epgId || !shouldReplace(this.current.programmes.get(epgId), programmes)) {
      return false;
    }
    const next = new Map(this.current.programmes);
    next.set(epgId, Object.freeze(sortProgrammes(programmes)));
    this.current = Object.freeze({ ...this.current, programmes: next });
    return true;
  }
}
