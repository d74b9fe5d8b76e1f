import { beforeEach, describe, it, expect, vi } from "vitest";
import {
  CatalogMergeEngine,
  buildSnapshot,
  emptyOverrides,
  findDuplicateEntries,
  type PortalHarvest,
  type RawCatalogEntry,
} from "../src/lib/catalogMerge.js";
import type { PortalConfig } from "../src/lib/gatewayConfig.js";
import { MacPool } from "../src/lib/macPool.js";
import { PortalClients } from "../src/lib/portalClients.js";
import { StreamIdRegistry } from "../src/lib/streamIds.js";
import { fakePortal } from "./helpers/fakePortal.js";
import { fakeStalker, macOf, type FakeMacCatalog } from "./helpers/fakeStalker.js";

const MAC_A = "00:1A:79:00:00:01";
const MAC_B = "00:1A:79:00:00:02";

const portal: PortalConfig = {
  id: "main",
  name: "Main",
  url: "http://portal.example.com/stalker_portal/server/load.php",
  proxy: null,
  streamsPerMac: 1,
  epgOffsetHours: 0,
  enabled: true,
  macs: [
    { mac: MAC_A, expiresAt: null },
    { mac: MAC_B, expiresAt: null },
  ],
};

const raw = (overrides: Partial<RawCatalogEntry>): RawCatalogEntry => ({
  kind: "live",
  portalId: "main",
  upstreamId: "101",
  name: "Das Erste",
  number: 1,
  genreName: "News",
  logo: "",
  cmd: "ffrt http://localhost/ch/101",
  xmltvId: "",
  description: "",
  year: "",
  rating: "",
  added: "",
  sourceMac: MAC_A,
  ...overrides,
});

const harvest = (entries: RawCatalogEntry[], overrides: Partial<PortalHarvest> = {}): PortalHarvest => ({
  portalId: "main",
  portalName: "Main",
  ok: true,
  refreshedAt: 1_000,
  entries,
  errors: [],
  ...overrides,
});

const PORTALS = [{ id: "main", name: "Main" }];

describe("buildSnapshot", () => {
  it("indexes entries and derives categories per portal genre", () => {
    const ids = new StreamIdRegistry();
    const snapshot = buildSnapshot({
      previous: null,
      portals: PORTALS,
      harvests: [
        harvest([
          raw({}),
          raw({ upstreamId: "102", name: "ZDF", genreName: "" }),
          raw({ kind: "vod", upstreamId: "501", name: "Film", genreName: "Movies", number: null }),
        ]),
      ],
      overrides: emptyOverrides(),
      ids,
      now: 5_000,
    });

    expect(snapshot.version).toBe(1);
    expect(snapshot.builtAt).toBe(5_000);
    expect(snapshot.entries.live.map((entry) => [entry.key, entry.categoryId])).toEqual([
      ["main_101", "main_News"],
      ["main_102", "main_Other"],
    ]);
    expect(snapshot.categories.live).toEqual([
      { kind: "live", categoryId: "main_News", name: "Main - News", portalId: "main" },
      { kind: "live", categoryId: "main_Other", name: "Main - Other", portalId: "main" },
    ]);
    expect(snapshot.entries.vod[0].key).toBe("vod:main_501");

    const first = snapshot.entries.live[0];
    expect(first.streamId).toBe(ids.idOf("main_101"));
    expect(snapshot.byStreamId.get(first.streamId)).toBe(first);
    expect(snapshot.byKey.get("vod:main_501")?.name).toBe("Film");
    expect(snapshot.portals).toEqual([
      { portalId: "main", portalName: "Main", ok: true, refreshedAt: 1_000, error: null },
    ]);
    expect(Object.isFrozen(snapshot.entries.live)).toBe(true);
  });

  it("keeps the previous rows of a portal whose refresh failed", () => {
    const ids = new StreamIdRegistry();
    const previous = buildSnapshot({
      previous: null,
      portals: PORTALS,
      harvests: [harvest([raw({})])],
      overrides: emptyOverrides(),
      ids,
    });

    const next = buildSnapshot({
      previous,
      portals: PORTALS,
      harvests: [harvest([], { ok: false, errors: ["00:1A:79:00:00:01: timeout"] })],
      overrides: emptyOverrides(),
      ids,
    });

    expect(next.version).toBe(2);
    expect(next.entries.live.map((entry) => entry.key)).toEqual(["main_101"]);
    expect(next.entries.live[0].streamId).toBe(previous.entries.live[0].streamId);
    expect(next.portals[0]).toEqual({
      portalId: "main",
      portalName: "Main",
      ok: false,
      refreshedAt: 1_000,
      error: "00:1A:79:00:00:01: timeout",
    });
  });

  it("drops portals that are no longer configured", () => {
    const ids = new StreamIdRegistry();
    const previous = buildSnapshot({
      previous: null,
      portals: PORTALS,
      harvests: [harvest([raw({})])],
      overrides: emptyOverrides(),
      ids,
    });

    const next = buildSnapshot({ previous, portals: [], harvests: [], overrides: emptyOverrides(), ids });

    expect(next.entries.live).toEqual([]);
    expect(next.portals).toEqual([]);
  });

  it("applies operator overrides on top of upstream values", () => {
    const overrides = emptyOverrides();
    overrides.live.main_101 = { name: "Das Erste HD", number: null, genre: "Public", epgId: " ard.de " };
    overrides.live.main_102 = { enabled: false };

    const snapshot = buildSnapshot({
      previous: null,
      portals: PORTALS,
      harvests: [harvest([raw({}), raw({ upstreamId: "102", name: "ZDF", genreName: "Hidden" })])],
      overrides,
      ids: new StreamIdRegistry(),
    });

    const [first, second] = snapshot.entries.live;
    expect(first).toMatchObject({
      name: "Das Erste HD",
      number: null,
      genreName: "Public",
      categoryId: "main_Public",
      epgIdOverride: "ard.de",
      enabled: true,
    });
    expect(first.source.name).toBe("Das Erste");
    expect(second.enabled).toBe(false);
    expect(snapshot.categories.live.map((category) => category.categoryId)).toEqual(["main_Public"]);
  });
});

describe("findDuplicateEntries", () => {
  const snapshot = (() => {
    const overrides = emptyOverrides();
    overrides.live.main_104 = { enabled: false };
    return buildSnapshot({
      previous: null,
      portals: [
        { id: "main", name: "Main" },
        { id: "side", name: "Side" },
      ],
      harvests: [
        harvest([
          raw({}),
          raw({ upstreamId: "102", name: "ZDF" }),
          raw({ upstreamId: "103", name: "DAS  ERSTE" }),
          raw({ upstreamId: "104", name: "ZDF" }),
        ]),
        harvest([raw({ portalId: "side", upstreamId: "201", name: "zdf" })], {
          portalId: "side",
          portalName: "Side",
        }),
      ],
      overrides,
      ids: new StreamIdRegistry(),
    });
  })();

  it("keeps the first enabled occurrence of each name", () => {
    expect(findDuplicateEntries(snapshot)).toEqual(["main_103", "side_201"]);
  });

  it("ignores portals that are switched off", () => {
    expect(findDuplicateEntries(snapshot, (portalId) => portalId !== "side")).toEqual(["main_103"]);
  });
});

describe("CatalogMergeEngine", () => {
  let pool: MacPool;

  const engineFor = (macCatalogs: Record<string, FakeMacCatalog>) => {
    const portalFake = fakePortal(fakeStalker(macCatalogs));
    const clients = new PortalClients({ fetchImpl: portalFake.fetchImpl });
    return { engine: new CatalogMergeEngine(clients, pool, { now: () => 9_000 }), portalFake };
  };

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    pool = new MacPool({ now: () => 9_000 });
    pool.configure([portal]);
  });

  it("unions every MAC's listing with the first MAC winning", async () => {
    const { engine } = engineFor({
      [MAC_A]: {
        genres: [{ id: "1", title: "News" }],
        channels: [{ id: 101, name: "Das Erste", number: "1", tv_genre_id: "1", cmd: "ffrt http://localhost/ch/101" }],
        vodCategories: [{ id: "7", title: "Movies" }],
        vod: [{ id: "501", name: "Film", category_id: "7", cmd: "/media/501.mpg" }],
        expiry: "2026-11-05 00:00:00",
      },
      [MAC_B]: {
        genres: [{ id: "1", title: "News" }],
        channels: [
          { id: 101, name: "Das Erste (B)", number: "1", tv_genre_id: "1" },
          { id: 102, name: "ZDF", number: "2", tv_genre_id: "1" },
        ],
      },
    });

    const result = await engine.refreshPortal(portal);

    expect(result.ok).toBe(true);
    expect(result.refreshedAt).toBe(9_000);
    expect(result.errors).toEqual([]);
    expect(result.entries.map((entry) => [entry.kind, entry.upstreamId, entry.name, entry.sourceMac])).toEqual([
      ["live", "101", "Das Erste", MAC_A],
      ["vod", "501", "Film", MAC_A],
      ["live", "102", "ZDF", MAC_B],
    ]);
    expect(result.entries[0].genreName).toBe("News");
    expect(result.entries[1].genreName).toBe("Movies");
    expect(pool.describe("main").map((status) => status.lastHandshakeAt)).toEqual([9_000, 9_000]);
    expect(pool.describe("main")[0].expiresAt).toBe(Date.UTC(2026, 10, 5));
  });

  it("records a failing MAC and keeps the others", async () => {
    const { engine } = engineFor({
      [MAC_A]: { down: true },
      [MAC_B]: { channels: [{ id: 102, name: "ZDF" }] },
    });

    const result = await engine.refreshPortal(portal);

    expect(result.ok).toBe(true);
    expect(result.entries.map((entry) => entry.upstreamId)).toEqual(["102"]);
    expect(result.errors).toEqual([`${MAC_A}: PortalUnreachable: Portal main is unreachable`]);
    expect(pool.describe("main")[0].failures).toBe(1);
  });

  it("reports a failed harvest when no MAC answers", async () => {
    const { engine } = engineFor({ [MAC_A]: { down: true }, [MAC_B]: { down: true } });

    const result = await engine.refreshPortal(portal);

    expect(result.ok).toBe(false);
    expect(result.entries).toEqual([]);
    expect(result.errors).toHaveLength(2);
  });

  it("skips expired MACs without contacting the portal", async () => {
    pool.recordExpiry("main", MAC_A, 1_000);
    const { engine, portalFake } = engineFor({ [MAC_B]: { channels: [{ id: 102, name: "ZDF" }] } });

    await engine.refreshPortal(portal);

    expect(portalFake.calls.some((call) => macOf(call) === MAC_A)).toBe(false);
  });
});
