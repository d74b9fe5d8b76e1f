import { createHash } from "node:crypto";

export type CatalogKind = "live" | "vod" | "series";

const MAX_ID = 0x7fffffff;

/** Live keys stay `portalId_upstreamId`; VOD and series keys carry a prefix. */
export const streamKey = (kind: CatalogKind, portalId: string, upstreamId: string): string =>
  kind === "live" ? `${portalId}_${upstreamId}` : `${kind}:${portalId}_${upstreamId}`;

export const hashStreamKey = (key: string): number =>
  Number.parseInt(createHash("md5").update(key).digest("hex").slice(0, 8), 16) & MAX_ID;

const nextCandidate = (id: number): number => (id >= MAX_ID ? 1 : id + 1);

/** Refresh cycles a key may be absent before its id is released. */
export const DEFAULT_RETAIN_CYCLES = 48;

export interface StreamIdRegistryOptions {
  retainCycles?: number;
}

/**
 * Maps catalog keys to non-negative 31-bit ids. A key keeps its id while it
 * drops out of a refresh for up to `retainCycles` cycles; after that the id
 * is released. New keys are hashed and step upwards on collision.
 */
export class StreamIdRegistry {
  private readonly byKey = new Map<string, number>();

  private readonly byId = new Map<number, string>();

  /** Consecutive `assign` calls that did not mention the key. */
  private readonly missed = new Map<string, number>();

  private readonly retainCycles: number;

  constructor(previous: Iterable<[string, number]> = [], options: StreamIdRegistryOptions = {}) {
    this.retainCycles = options.retainCycles ?? DEFAULT_RETAIN_CYCLES;
    for (const [key, id] of previous) {
      if (!this.byId.has(id) && !this.byKey.has(key) && id > 0 && id <= MAX_ID) {
        this.byKey.set(key, id);
        this.byId.set(id, key);
      }
    }
  }

  /** Assigns ids to every key and returns the table restricted to `keys`. */
  assign(keys: Iterable<string>): Map<string, number> {
    const wanted = Array.from(new Set(keys));
    this.age(new Set(wanted));
    const fresh = wanted.filter((key) => !this.byKey.has(key)).sort();

    fresh.forEach((key) => {
      let id = hashStreamKey(key);
      if (id === 0) {
        id = 1;
      }
      while (this.byId.has(id)) {
        id = nextCandidate(id);
      }
      this.byKey.set(key, id);
      this.byId.set(id, key);
    });

    const table = new Map<string, number>();
    wanted.forEach((key) => {
      const id = this.byKey.get(key);
      if (id !== undefined) {
        table.set(key, id);
      }
    });
    return table;
  }

  private age(seen: ReadonlySet<string>): void {
    for (const [key, id] of Array.from(this.byKey.entries())) {
      if (seen.has(key)) {
        this.missed.delete(key);
        continue;
      }
      const missed = (this.missed.get(key) ?? 0) + 1;
      if (missed > this.retainCycles) {
        this.byKey.delete(key);
        this.byId.delete(id);
        this.missed.delete(key);
      } else {
        this.missed.set(key, missed);
      }
    }
  }

  idOf(key: string): number | undefined {
    return this.byKey.get(key);
  }

  entries(): Array<[string, number]> {
    return Array.from(this.byKey.entries());
  }
}
