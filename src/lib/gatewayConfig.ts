import { readFile } from "node:fs/promises";
import path from "node:path";
import { GatewayError } from "./errors.js";
import { deriveDeviceId, type HdhrSettings } from "./hdhomerun.js";
import { isRecord, toFiniteNumber, toTrimmedString } from "./http.js";
import { parseProxyDescriptor, type ProxyDescriptor } from "./proxyDescriptor.js";

export type StreamMode = "redirect" | "proxy" | "transcode";

const STREAM_MODES: readonly StreamMode[] = ["redirect", "proxy", "transcode"];

export interface EpgMatchPolicy {
  substringMinRatio: number;
  fuzzyWordMatch: boolean;
  fuzzyMinOverlap: number;
}

export const DEFAULT_EPG_MATCH_POLICY: EpgMatchPolicy = {
  substringMinRatio: 0.8,
  fuzzyWordMatch: false,
  fuzzyMinOverlap: 0.75,
};

export interface GatewayEnvConfig {
  port: number;
  corsOrigin: string;
  configPath: string;
  dataDir: string;
  streamMode: StreamMode;
  ffmpegBin: string;
  ffprobeBin: string;
  streamCheckTimeoutMs: number;
  sslocalBin: string;
  /** `null` when HDHR_USER is unset; the tuner routes then answer 404. */
  hdhr: HdhrSettings | null;
  flaresolverrUrl: string | null;
  refreshConcurrency: number;
  refreshIntervalMs: number;
  epgWindowHours: number;
  epgFallbackEnabled: boolean;
  epgFallbackCountries: string[];
  epgFallbackBaseUrl: string;
  epgMatch: EpgMatchPolicy;
  macFailureThreshold: number;
  macCooldownMs: number;
  leaseTimeoutMs: number;
  connectionIdleMs: number;
  portalShortTimeoutMs: number;
  portalLongTimeoutMs: number;
}

type Env = Record<string, string | undefined>;

const readInt = (env: Env, key: string, fallback: number, min = 0): number => {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }
  const parsed = Number.parseInt(raw, 10);
  if (!Number.isFinite(parsed) || parsed < min) {
    console.warn(`[config] ${key}="${raw}" is not a valid number, using ${fallback}`);
    return fallback;
  }
  return parsed;
};

const readRatio = (env: Env, key: string, fallback: number): number => {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }
  const parsed = Number.parseFloat(raw);
  if (!Number.isFinite(parsed) || parsed <= 0 || parsed > 1) {
    console.warn(`[config] ${key}="${raw}" must be in (0, 1], using ${fallback}`);
    return fallback;
  }
  return parsed;
};

const readFlag = (env: Env, key: string, fallback: boolean): boolean => {
  const raw = env[key]?.trim().toLowerCase();
  if (!raw) {
    return fallback;
  }
  return raw === "1" || raw === "true" || raw === "yes" || raw === "on";
};

const isStreamMode = (value: string): value is StreamMode =>
  STREAM_MODES.some((mode) => mode === value);

export const loadGatewayEnvConfig = (env: Env): GatewayEnvConfig => {
  const rawMode = env.STREAM_MODE?.trim().toLowerCase() ?? "";
  let streamMode: StreamMode = "redirect";
  if (rawMode) {
    if (isStreamMode(rawMode)) {
      streamMode = rawMode;
    } else {
      console.warn(`[config] unknown STREAM_MODE "${rawMode}", using redirect`);
    }
  }

  const dataDir = env.DATA_DIR?.trim() || "./data";
  const hdhrName = env.HDHR_NAME?.trim() || "Portal Gateway";
  const hdhrUser = env.HDHR_USER?.trim() ?? "";

  return {
    port: readInt(env, "PORT", 8001, 1),
    corsOrigin: env.CORS_ORIGIN?.trim() || "*",
    configPath: env.GATEWAY_CONFIG?.trim() || path.join(dataDir, "gateway.json"),
    dataDir,
    streamMode,
    ffmpegBin: env.FFMPEG_BIN?.trim() || "ffmpeg",
    ffprobeBin: env.FFPROBE_BIN?.trim() || "ffprobe",
    streamCheckTimeoutMs: readInt(env, "STREAM_CHECK_TIMEOUT_SECONDS", 15, 1) * 1000,
    sslocalBin: env.SSLOCAL_BIN?.trim() || "sslocal",
    hdhr: hdhrUser
      ? {
          name: hdhrName,
          deviceId: env.HDHR_DEVICE_ID?.trim() || deriveDeviceId(hdhrName),
          tuners: readInt(env, "HDHR_TUNERS", 10, 1),
          username: hdhrUser,
        }
      : null,
    flaresolverrUrl: env.FLARESOLVERR_URL?.trim() || null,
    refreshConcurrency: readInt(env, "REFRESH_CONCURRENCY", 2, 1),
    refreshIntervalMs: readInt(env, "REFRESH_INTERVAL_MINUTES", 360, 0) * 60_000,
    epgWindowHours: readInt(env, "EPG_WINDOW_HOURS", 24, 1),
    epgFallbackEnabled: readFlag(env, "EPG_FALLBACK_ENABLED", false),
    epgFallbackCountries: (env.EPG_FALLBACK_COUNTRIES ?? "")
      .split(",")
      .map((code) => code.trim().toUpperCase())
      .filter(Boolean),
    epgFallbackBaseUrl:
      env.EPG_FALLBACK_BASE_URL?.trim() || "https://epgshare01.online/epgshare01/",
    epgMatch: {
      substringMinRatio: readRatio(
        env,
        "EPG_SUBSTRING_MIN_RATIO",
        DEFAULT_EPG_MATCH_POLICY.substringMinRatio,
      ),
      fuzzyWordMatch: readFlag(env, "EPG_FUZZY_WORD_MATCH", DEFAULT_EPG_MATCH_POLICY.fuzzyWordMatch),
      fuzzyMinOverlap: readRatio(
        env,
        "EPG_FUZZY_MIN_OVERLAP",
        DEFAULT_EPG_MATCH_POLICY.fuzzyMinOverlap,
      ),
    },
    macFailureThreshold: readInt(env, "MAC_FAILURE_THRESHOLD", 3, 1),
    macCooldownMs: readInt(env, "MAC_COOLDOWN_SECONDS", 300, 1) * 1000,
    leaseTimeoutMs: readInt(env, "LEASE_TIMEOUT_SECONDS", 60, 1) * 1000,
    connectionIdleMs: readInt(env, "CONNECTION_IDLE_SECONDS", 60, 1) * 1000,
    portalShortTimeoutMs: readInt(env, "PORTAL_TIMEOUT_SECONDS", 10, 1) * 1000,
    portalLongTimeoutMs: readInt(env, "PORTAL_LONG_TIMEOUT_SECONDS", 30, 1) * 1000,
  };
};

export interface MacConfig {
  mac: string;
  expiresAt: number | null;
}

export interface PortalConfig {
  id: string;
  name: string;
  url: string;
  proxy: ProxyDescriptor | null;
  streamsPerMac: number;
  epgOffsetHours: number;
  enabled: boolean;
  macs: MacConfig[];
}

export interface UserConfig {
  username: string;
  password: string;
  maxConnections: number;
  allowedPortals: string[];
  /** YYYY-MM-DD, inclusive. */
  expiresAt: string | null;
  enabled: boolean;
  createdAt: string;
}

export interface GatewayConfig {
  portals: PortalConfig[];
  users: UserConfig[];
}

export interface ConfigSource {
  load(): Promise<GatewayConfig>;
}

const MAC_PATTERN = /^[0-9A-F]{12}$/;

/** Accepts `:`/`-` separated or bare hex and returns `XX:XX:XX:XX:XX:XX`. */
export const normalizeMac = (value: string): string => {
  const hex = value.trim().toUpperCase().replace(/[:-]/g, "");
  if (!MAC_PATTERN.test(hex)) {
    throw new GatewayError("ConfigurationError", `Invalid MAC address "${value}"`);
  }
  return hex.match(/.{2}/g)?.join(":") ?? hex;
};

const configError = (message: string): GatewayError =>
  new GatewayError("ConfigurationError", message);

const parseDate = (value: unknown, label: string): number | null => {
  const text = toTrimmedString(value);
  if (!text) {
    return null;
  }
  const ts = Date.parse(text);
  if (!Number.isFinite(ts)) {
    throw configError(`${label} has an invalid date "${text}"`);
  }
  return ts;
};

const readBoolean = (value: unknown, fallback: boolean): boolean => {
  if (typeof value === "boolean") {
    return value;
  }
  if (typeof value === "string") {
    return value === "true" || value === "1";
  }
  return fallback;
};

const parseMacs = (value: unknown, portalId: string): MacConfig[] => {
  if (!Array.isArray(value)) {
    throw configError(`Portal ${portalId} needs a "macs" array`);
  }
  const seen = new Set<string>();
  return value.flatMap((entry): MacConfig[] => {
    const raw = typeof entry === "string" ? entry : isRecord(entry) ? toTrimmedString(entry.mac) : "";
    const mac = normalizeMac(raw);
    if (seen.has(mac)) {
      return [];
    }
    seen.add(mac);
    const expiresAt = isRecord(entry) ? parseDate(entry.expiresAt, `MAC ${mac}`) : null;
    return [{ mac, expiresAt }];
  });
};

export const parsePortalConfig = (value: unknown, index: number): PortalConfig => {
  if (!isRecord(value)) {
    throw configError(`Portal #${index + 1} is not an object`);
  }
  const id = toTrimmedString(value.id) || `portal${index + 1}`;
  const url = toTrimmedString(value.url);
  try {
    const parsed = new URL(url);
    if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
      throw new Error("unsupported protocol");
    }
  } catch {
    throw configError(`Portal ${id} has an invalid url "${url}"`);
  }

  const rawProxy = toTrimmedString(value.proxy);
  let proxy: ProxyDescriptor | null;
  try {
    proxy = parseProxyDescriptor(rawProxy);
  } catch (error) {
    throw new GatewayError("ConfigurationError", `Portal ${id} has an invalid proxy`, {
      cause: error,
    });
  }

  const streamsPerMac = toFiniteNumber(value.streamsPerMac) ?? 1;
  if (streamsPerMac < 0) {
    throw configError(`Portal ${id} has a negative streamsPerMac`);
  }

  return {
    id,
    name: toTrimmedString(value.name) || id,
    url,
    proxy,
    streamsPerMac: Math.floor(streamsPerMac),
    epgOffsetHours: toFiniteNumber(value.epgOffsetHours) ?? 0,
    enabled: readBoolean(value.enabled, true),
    macs: parseMacs(value.macs, id),
  };
};

export const parseUserConfig = (value: unknown, index: number): UserConfig => {
  if (!isRecord(value)) {
    throw configError(`User #${index + 1} is not an object`);
  }
  const username = toTrimmedString(value.username);
  const password = typeof value.password === "string" ? value.password : "";
  if (!username || !password) {
    throw configError(`User #${index + 1} needs a username and password`);
  }
  const expiresAt = toTrimmedString(value.expiresAt);
  if (expiresAt && !/^\d{4}-\d{2}-\d{2}$/.test(expiresAt)) {
    throw configError(`User ${username} has an invalid expiresAt "${expiresAt}"`);
  }
  const allowedPortals = Array.isArray(value.allowedPortals)
    ? value.allowedPortals.map(toTrimmedString).filter(Boolean)
    : [];

  return {
    username,
    password,
    maxConnections: Math.max(1, Math.floor(toFiniteNumber(value.maxConnections) ?? 1)),
    allowedPortals,
    expiresAt: expiresAt || null,
    enabled: readBoolean(value.enabled, true),
    createdAt: toTrimmedString(value.createdAt) || new Date(0).toISOString(),
  };
};

export const parseGatewayConfig = (value: unknown): GatewayConfig => {
  if (!isRecord(value)) {
    throw configError("Gateway configuration must be a JSON object");
  }
  const portals = Array.isArray(value.portals) ? value.portals.map(parsePortalConfig) : [];
  const users = Array.isArray(value.users) ? value.users.map(parseUserConfig) : [];

  const portalIds = new Set<string>();
  portals.forEach((portal) => {
    if (portalIds.has(portal.id)) {
      throw configError(`Duplicate portal id "${portal.id}"`);
    }
    portalIds.add(portal.id);
  });

  const usernames = new Set<string>();
  users.forEach((user) => {
    if (usernames.has(user.username)) {
      throw configError(`Duplicate username "${user.username}"`);
    }
    usernames.add(user.username);
  });

  return { portals, users };
};

export class FileConfigSource implements ConfigSource {
  private readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  async load(): Promise<GatewayConfig> {
    let text: string;
    try {
      text = await readFile(this.filePath, "utf8");
    } catch (error) {
      throw new GatewayError("ConfigurationError", `Cannot read ${this.filePath}`, { cause: error });
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (error) {
      throw new GatewayError("ConfigurationError", `${this.filePath} is not valid JSON`, {
        cause: error,
      });
    }

    const config = parseGatewayConfig(parsed);
    console.log(
      `[config] loaded ${config.portals.length} portal(s) and ${config.users.length} user(s) from ${this.filePath}`,
    );
    return config;
  }
}
