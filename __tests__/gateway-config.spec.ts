import { mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, it, expect, vi } from "vitest";
import {
  FileConfigSource,
  loadGatewayEnvConfig,
  normalizeMac,
  parseGatewayConfig,
} from "../src/lib/gatewayConfig.js";
import { deriveDeviceId } from "../src/lib/hdhomerun.js";

const codeOf = (fn: () => unknown): string => {
  try {
    fn();
  } catch (error) {
    return error instanceof Error && "code" in error ? String(error.code) : "unexpected";
  }
  return "none";
};

describe("loadGatewayEnvConfig", () => {
  it("falls back to defaults for an empty environment", () => {
    const config = loadGatewayEnvConfig({});

    expect(config.port).toBe(8001);
    expect(config.configPath).toBe(path.join("data", "gateway.json"));
    expect(config.streamMode).toBe("redirect");
    expect(config.flaresolverrUrl).toBeNull();
    expect(config.refreshIntervalMs).toBe(21_600_000);
    expect(config.epgFallbackEnabled).toBe(false);
    expect(config.epgMatch).toEqual({
      substringMinRatio: 0.8,
      fuzzyWordMatch: false,
      fuzzyMinOverlap: 0.75,
    });
    expect(config.leaseTimeoutMs).toBe(60_000);
    expect(config.hdhr).toBeNull();
    expect(config.ffprobeBin).toBe("ffprobe");
    expect(config.streamCheckTimeoutMs).toBe(15_000);
  });

  it("enables the network tuner once a lineup user is named", () => {
    const config = loadGatewayEnvConfig({ HDHR_USER: "alice", HDHR_NAME: "Living Room", HDHR_TUNERS: "4" });

    expect(config.hdhr).toEqual({
      name: "Living Room",
      deviceId: deriveDeviceId("Living Room"),
      tuners: 4,
      username: "alice",
    });
    expect(config.hdhr?.deviceId).toMatch(/^[0-9A-F]{8}$/);
  });

  it("reads overrides and ignores invalid values", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);

    const config = loadGatewayEnvConfig({
      PORT: "abc",
      STREAM_MODE: "PROXY",
      EPG_FALLBACK_ENABLED: "yes",
      EPG_FALLBACK_COUNTRIES: "de, at,,",
      EPG_SUBSTRING_MIN_RATIO: "1.5",
      EPG_FUZZY_WORD_MATCH: "true",
      MAC_COOLDOWN_SECONDS: "30",
      GATEWAY_CONFIG: "/etc/gateway.json",
    });

    expect(config.port).toBe(8001);
    expect(config.streamMode).toBe("proxy");
    expect(config.epgFallbackEnabled).toBe(true);
    expect(config.epgFallbackCountries).toEqual(["DE", "AT"]);
    expect(config.epgMatch.substringMinRatio).toBe(0.8);
    expect(config.epgMatch.fuzzyWordMatch).toBe(true);
    expect(config.macCooldownMs).toBe(30_000);
    expect(config.configPath).toBe("/etc/gateway.json");
    expect(warn).toHaveBeenCalledTimes(2);
  });

  it("keeps redirect for an unknown stream mode", () => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    expect(loadGatewayEnvConfig({ STREAM_MODE: "bogus" }).streamMode).toBe("redirect");
  });
});

describe("normalizeMac", () => {
  it("accepts separators and bare hex", () => {
    expect(normalizeMac("00-1a-79-00-00-01")).toBe("00:1A:79:00:00:01");
    expect(normalizeMac(" 001A79000001 ")).toBe("00:1A:79:00:00:01");
  });

  it("rejects anything that is not six octets", () => {
    expect(codeOf(() => normalizeMac("zz"))).toBe("ConfigurationError");
    expect(codeOf(() => normalizeMac("00:1A:79:00:00"))).toBe("ConfigurationError");
  });
});

describe("parseGatewayConfig", () => {
  it("normalises portals and users", () => {
    const config = parseGatewayConfig({
      portals: [
        {
          id: "main",
          url: "http://portal.example.com/c/",
          proxy: "socks5://10.0.0.6:1080",
          streamsPerMac: 2,
          macs: [
            "00:1a:79:00:00:01",
            { mac: "00-1A-79-00-00-01" },
            { mac: "001A79000002", expiresAt: "2026-12-31" },
          ],
        },
      ],
      users: [{ username: "alice", password: "test-secret" }],
    });

    expect(config.portals).toEqual([
      {
        id: "main",
        name: "main",
        url: "http://portal.example.com/c/",
        proxy: { scheme: "socks5", host: "10.0.0.6", port: 1080, raw: "socks5://10.0.0.6:1080" },
        streamsPerMac: 2,
        epgOffsetHours: 0,
        enabled: true,
        macs: [
          { mac: "00:1A:79:00:00:01", expiresAt: null },
          { mac: "00:1A:79:00:00:02", expiresAt: Date.UTC(2026, 11, 31) },
        ],
      },
    ]);
    expect(config.users).toEqual([
      {
        username: "alice",
        password: "test-secret",
        maxConnections: 1,
        allowedPortals: [],
        expiresAt: null,
        enabled: true,
        createdAt: "1970-01-01T00:00:00.000Z",
      },
    ]);
  });

  it("names unnamed portals by position", () => {
    const config = parseGatewayConfig({
      portals: [{ url: "https://tv.example.net/c/", macs: [], enabled: false }],
    });
    expect(config.portals[0]).toMatchObject({ id: "portal1", enabled: false, proxy: null });
    expect(config.users).toEqual([]);
  });

  it("rejects invalid configuration", () => {
    const portal = { id: "main", url: "http://portal.example.com/c/", macs: [] };

    expect(codeOf(() => parseGatewayConfig([]))).toBe("ConfigurationError");
    expect(codeOf(() => parseGatewayConfig({ portals: [portal, portal] }))).toBe("ConfigurationError");
    expect(codeOf(() => parseGatewayConfig({ portals: [{ ...portal, url: "ftp://x" }] }))).toBe(
      "ConfigurationError",
    );
    expect(codeOf(() => parseGatewayConfig({ portals: [{ ...portal, proxy: "socks5://" }] }))).toBe(
      "ConfigurationError",
    );
    expect(codeOf(() => parseGatewayConfig({ portals: [{ id: "x", url: "http://a.example" }] }))).toBe(
      "ConfigurationError",
    );
    expect(codeOf(() => parseGatewayConfig({ users: [{ username: "bob" }] }))).toBe("ConfigurationError");
    expect(
      codeOf(() =>
        parseGatewayConfig({ users: [{ username: "bob", password: "test-secret", expiresAt: "31.12.2026" }] }),
      ),
    ).toBe("ConfigurationError");
  });
});

describe("FileConfigSource", () => {
  let dir = "";

  afterEach(async () => {
    if (dir) {
      await rm(dir, { recursive: true, force: true });
      dir = "";
    }
  });

  it("loads and validates a json file", async () => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    dir = await mkdtemp(path.join(os.tmpdir(), "gateway-config-"));
    const file = path.join(dir, "gateway.json");
    await writeFile(
      file,
      JSON.stringify({
        portals: [{ id: "main", url: "http://portal.example.com/c/", macs: ["001A79000001"] }],
        users: [{ username: "alice", password: "test-secret", maxConnections: 3 }],
      }),
    );

    const config = await new FileConfigSource(file).load();

    expect(config.portals[0].macs).toEqual([{ mac: "00:1A:79:00:00:01", expiresAt: null }]);
    expect(config.users[0].maxConnections).toBe(3);
  });

  it("reports unreadable and invalid files as configuration errors", async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "gateway-config-"));
    const file = path.join(dir, "broken.json");
    await writeFile(file, "{ not json");

    await expect(new FileConfigSource(file).load()).rejects.toMatchObject({ code: "ConfigurationError" });
    await expect(new FileConfigSource(path.join(dir, "missing.json")).load()).rejects.toMatchObject({
      code: "ConfigurationError",
    });
  });
});
