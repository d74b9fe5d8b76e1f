import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import path from "node:path";
import {
  CATALOG_KINDS,
  buildSnapshot,
  emptyOverrides,
  emptySnapshot,
  type CatalogEntry,
  type CatalogKind,
  type CatalogOverride,
  type CatalogOverrides,
  type CatalogSnapshot,
  type PortalHarvest,
  type RawCatalogEntry,
} from "./catalogMerge.js";
import { describeError } from "./errors.js";
import { isRecord, toFiniteNumber, toTrimmedString } from "./http.js";
import { StreamIdRegistry } from "./streamIds.js";

export interface CatalogStore {
  snapshot(): CatalogSnapshot;
  publish(snapshot: CatalogSnapshot): void;
  overrides(): CatalogOverrides;
  applyOverride(kind: CatalogKind, key: string, override: CatalogOverride | null): CatalogSnapshot;
  applyOverrides(kind: CatalogKind, changes: ReadonlyArray<[string, CatalogOverride | null]>): CatalogSnapshot;
  readEnabledByPortal(portalId: string, kind: CatalogKind): CatalogEntry[];
  readonly ids: StreamIdRegistry;
}

export interface MemoryCatalogStoreOptions {
  /** JSON file for overrides, stream ids and the last catalog rows. */
  filePath?: string | null;
}

interface PersistedPortal {
  id: string;
  name: string;
  refreshedAt: number | null;
}

interface PersistedCatalog {
  overrides: CatalogOverrides;
  streamIds: Array<[string, number]>;
  portals: PersistedPortal[];
  rows: RawCatalogEntry[];
}

const KIND_SET: ReadonlySet<string> = new Set<string>(CATALOG_KINDS);

export const isCatalogKind = (value: unknown): value is CatalogKind =>
  typeof value === "string" && KIND_SET.has(value);

export const parseCatalogOverride = (value: unknown): CatalogOverride | null => {
  if (!isRecord(value)) {
    return null;
  }
  const override: CatalogOverride = {};
  if (typeof value.name === "string") override.name = value.name;
  if (value.number === null || typeof value.number === "number") override.number = value.number;
  if (typeof value.genre === "string") override.genre = value.genre;
  if (typeof value.epgId === "string") override.epgId = value.epgId;
  if (typeof value.enabled === "boolean") override.enabled = value.enabled;
  if (typeof value.fallback === "string") override.fallback = value.fallback;
  return override;
};

const parseRow = (value: unknown): RawCatalogEntry | null => {
  if (!isRecord(value) || !isCatalogKind(value.kind)) {
    return null;
  }
  const portalId = toTrimmedString(value.portalId);
  const upstreamId = toTrimmedString(value.upstreamId);
  if (!portalId || !upstreamId) {
    return null;
  }
  return {
    kind: value.kind,
    portalId,
    upstreamId,
    name: toTrimmedString(value.name),
    number: toFiniteNumber(value.number),
    genreName: toTrimmedString(value.genreName),
    logo: toTrimmedString(value.logo),
    cmd: toTrimmedString(value.cmd),
    xmltvId: toTrimmedString(value.xmltvId),
    description: toTrimmedString(value.description),
    year: toTrimmedString(value.year),
    rating: toTrimmedString(value.rating),
    added: toTrimmedString(value.added),
    sourceMac: toTrimmedString(value.sourceMac),
  };
};

export const parsePersistedCatalog = (value: unknown): PersistedCatalog => {
  const result: PersistedCatalog = { overrides: emptyOverrides(), streamIds: [], portals: [], rows: [] };
  if (!isRecord(value)) {
    return result;
  }

  const overrides = value.overrides;
  if (isRecord(overrides)) {
    CATALOG_KINDS.forEach((kind) => {
      const perKind = overrides[kind];
      if (!isRecord(perKind)) {
        return;
      }
      Object.entries(perKind).forEach(([key, raw]) => {
        const override = parseCatalogOverride(raw);
        if (override) {
          result.overrides[kind][key] = override;
        }
      });
    });
  }

  if (Array.isArray(value.streamIds)) {
    value.streamIds.forEach((pair) => {
      if (Array.isArray(pair) && typeof pair[0] === "string" && typeof pair[1] === "number") {
        result.streamIds.push([pair[0], pair[1]]);
      }
    });
  }

  if (Array.isArray(value.portals)) {
    value.portals.forEach((portal) => {
      if (isRecord(portal) && typeof portal.id === "string") {
        result.portals.push({
          id: portal.id,
          name: toTrimmedString(portal.name) || portal.id,
          refreshedAt: toFiniteNumber(portal.refreshedAt),
        });
      }
    });
  }

  if (Array.isArray(value.rows)) {
    value.rows.forEach((row) => {
      const parsed = parseRow(row);
      if (parsed) {
        result.rows.push(parsed);
      }
    });
  }

  return result;
};

/**
 * In-memory catalog store. Readers get the current snapshot by reference;
 * `publish` swaps it in one assignment.
 */
export class MemoryCatalogStore implements CatalogStore {
  readonly ids: StreamIdRegistry;

  private current: CatalogSnapshot;

  private overrideTable: CatalogOverrides;

  private readonly filePath: string | null;

  private persisting: Promise<void> = Promise.resolve();

  constructor(options: MemoryCatalogStoreOptions = {}, seed?: PersistedCatalog) {
    this.filePath = options.filePath ?? null;
    this.ids = new StreamIdRegistry(seed?.streamIds ?? []);
    this.overrideTable = seed?.overrides ?? emptyOverrides();
    this.current = emptySnapshot();

    if (seed && seed.portals.length > 0) {
      const harvests: PortalHarvest[] = seed.portals.map((portal) => ({
        portalId: portal.id,
        portalName: portal.name,
        ok: true,
        refreshedAt: portal.refreshedAt ?? 0,
        entries: seed.rows.filter((row) => row.portalId === portal.id),
        errors: [],
      }));
      this.current = buildSnapshot({
        previous: null,
        portals: seed.portals,
        harvests,
        overrides: this.overrideTable,
        ids: this.ids,
      });
    }
  }

  static async open(filePath: string): Promise<MemoryCatalogStore> {
    let seed: PersistedCatalog | undefined;
    try {
      const text = await readFile(filePath, "utf8");
      seed = parsePersistedCatalog(JSON.parse(text));
      console.log(`[catalog] restored ${seed.rows.length} rows from ${filePath}`);
    } catch (error) {
      if (isRecord(error) && error.code === "ENOENT") {
        console.log(`[catalog] no saved catalog at ${filePath}, starting empty`);
      } else {
        console.warn(`[catalog] could not restore ${filePath}`, describeError(error));
      }
    }
    return new MemoryCatalogStore({ filePath }, seed);
  }

  snapshot(): CatalogSnapshot {
    return this.current;
  }

  publish(snapshot: CatalogSnapshot): void {
    this.current = snapshot;
    this.schedulePersist();
  }

  overrides(): CatalogOverrides {
    return this.overrideTable;
  }

  /** Stores (or clears, with `null`) an override and republishes without touching upstream. */
  applyOverride(kind: CatalogKind, key: string, override: CatalogOverride | null): CatalogSnapshot {
    return this.applyOverrides(kind, [[key, override]]);
  }

  /** Several overrides, one republish. */
  applyOverrides(kind: CatalogKind, changes: ReadonlyArray<[string, CatalogOverride | null]>): CatalogSnapshot {
    const nextKind = { ...this.overrideTable[kind] };
    changes.forEach(([key, override]) => {
      if (override) {
        nextKind[key] = { ...nextKind[key], ...override };
      } else {
        delete nextKind[key];
      }
    });
    this.overrideTable = { ...this.overrideTable, [kind]: nextKind };

    const previous = this.current;
    const rebuilt = buildSnapshot({
      previous,
      portals: previous.portals.map((portal) => ({ id: portal.portalId, name: portal.portalName })),
      harvests: [],
      overrides: this.overrideTable,
      ids: this.ids,
    });
    this.publish(rebuilt);
    return rebuilt;
  }

  readEnabledByPortal(portalId: string, kind: CatalogKind): CatalogEntry[] {
    return this.current.entries[kind].filter(
      (entry) => entry.portalId === portalId && entry.enabled,
    );
  }

  /** Resolves once pending writes are on disk. */
  flush(): Promise<void> {
    return this.persisting;
  }

  private schedulePersist(): void {
    const filePath = this.filePath;
    if (!filePath) {
      return;
    }
    this.persisting = this.persisting
      .then(() => this.writeFile(filePath))
      .catch((error: unknown) => {
        console.warn(`[catalog] saving ${filePath} failed`, describeError(error));
      });
  }

  private async writeFile(filePath: string): Promise<void> {
    const snapshot = this.current;
    const payload: PersistedCatalog = {
      overrides: this.overrideTable,
      streamIds: this.ids.entries(),
      portals: snapshot.portals.map((portal) => ({
        id: portal.portalId,
        name: portal.portalName,
        refreshedAt: portal.refreshedAt,
      })),
      rows: CATALOG_KINDS.flatMap((kind) => snapshot.entries[kind].map((entry) => entry.source)),
    };
    await mkdir(path.dirname(filePath), { recursive: true });
    const tmp = `${filePath}.tmp`;
    await writeFile(tmp, JSON.stringify(payload), "utf8");
    await rename(tmp, filePath);
  }
}
