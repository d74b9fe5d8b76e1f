import { readFile } from "node:fs/promises";
import path from "node:path";
import { promisify } from "node:util";
import * as zlib from "node:zlib";
import { XMLParser } from "fast-xml-parser";
import { describeError } from "./errors.js";
import {
  defaultFetch,
  fetchBufferWithRetry,
  isRecord,
  readCache,
  writeCache,
  type FetchLike,
} from "./http.js";
import type { GuideChannel } from "./epgMatcher.js";
import type { EpgProgramme } from "./epgStore.js";

const gunzip = promisify(zlib.gunzip);

export const DEFAULT_FEEDS_FILE = path.resolve(process.cwd(), "server/data/fallbackEpgFeeds.json");
export const MAX_FALLBACK_PROGRAMMES = 50;
const FEED_TIMEOUT_MS = 60_000;
const FEED_CACHE_TTL_MS = 6 * 60 * 60 * 1000;

export interface FallbackGuide {
  channels: GuideChannel[];
  programmes: Map<string, EpgProgramme[]>;
}

const ARRAY_PATHS = new Set([
  "tv.channel",
  "tv.channel.display-name",
  "tv.programme",
  "tv.programme.title",
  "tv.programme.desc",
]);

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: true,
  isArray: (_name, jpath) => ARRAY_PATHS.has(jpath),
});

/** `20240101120000 +0100` → epoch ms. A missing offset means UTC. */
export const parseXmltvTime = (value: string): number | null => {
  const match = /^(\d{4})(\d{2})(\d{2})(\d{2})(\d{2})(\d{2})?\s*([+-])?(\d{2})?(\d{2})?/.exec(value.trim());
  if (!match) {
    return null;
  }
  const [, year, month, day, hour, minute, second = "0", sign, offH = "0", offM = "0"] = match;
  const utc = Date.UTC(
    Number(year),
    Number(month) - 1,
    Number(day),
    Number(hour),
    Number(minute),
    Number(second),
  );
  const offsetMs = (Number(offH) * 60 + Number(offM)) * 60_000;
  return sign === "-" ? utc + offsetMs : utc - offsetMs;
};

const textOf = (value: unknown): string => {
  const first = Array.isArray(value) ? value[0] : value;
  if (typeof first === "string") {
    return first.trim();
  }
  if (isRecord(first) && typeof first["#text"] === "string") {
    return first["#text"].trim();
  }
  return "";
};

const listOf = (value: unknown): unknown[] => (Array.isArray(value) ? value : []);

export interface ParseFeedOptions {
  /** Programmes that ended before this instant are dropped. */
  floor?: number;
  maxPerChannel?: number;
}

export const parseXmltvFeed = (xml: string, options: ParseFeedOptions = {}): FallbackGuide => {
  const floor = options.floor ?? Number.NEGATIVE_INFINITY;
  const maxPerChannel = options.maxPerChannel ?? MAX_FALLBACK_PROGRAMMES;
  const document: unknown = parser.parse(xml);
  const tv = isRecord(document) ? document.tv : null;
  if (!isRecord(tv)) {
    return { channels: [], programmes: new Map() };
  }

  const channels: GuideChannel[] = [];
  const known = new Set<string>();
  listOf(tv.channel).forEach((channel) => {
    if (!isRecord(channel) || typeof channel["@_id"] !== "string") {
      return;
    }
    const id = channel["@_id"].trim();
    if (!id) {
      return;
    }
    known.add(id);
    listOf(channel["display-name"]).forEach((name) => {
      const displayName = textOf(name);
      if (displayName) {
        channels.push({ id, displayName });
      }
    });
  });

  const programmes = new Map<string, EpgProgramme[]>();
  listOf(tv.programme).forEach((programme) => {
    if (!isRecord(programme) || typeof programme["@_channel"] !== "string") {
      return;
    }
    const channelId = programme["@_channel"].trim();
    if (!known.has(channelId)) {
      return;
    }
    const start = parseXmltvTime(typeof programme["@_start"] === "string" ? programme["@_start"] : "");
    const stop = parseXmltvTime(typeof programme["@_stop"] === "string" ? programme["@_stop"] : "");
    if (start === null || stop === null || stop <= start || stop < floor) {
      return;
    }
    const list = programmes.get(channelId) ?? [];
    list.push({
      start,
      stop,
      title: textOf(programme.title),
      description: textOf(programme.desc),
      source: "fallback",
    });
    programmes.set(channelId, list);
  });

  programmes.forEach((list, channelId) => {
    programmes.set(
      channelId,
      list.sort((a, b) => a.start - b.start).slice(0, maxPerChannel),
    );
  });

  return { channels, programmes };
};

export const loadFallbackFeeds = async (filePath = DEFAULT_FEEDS_FILE): Promise<Record<string, string>> => {
  const parsed: unknown = JSON.parse(await readFile(filePath, "utf8"));
  const feeds: Record<string, string> = {};
  if (isRecord(parsed)) {
    Object.entries(parsed).forEach(([country, file]) => {
      if (typeof file === "string" && file) {
        feeds[country.toUpperCase()] = file;
      }
    });
  }
  return feeds;
};

export interface FallbackEpgSourceConfig {
  baseUrl: string;
  feeds: Record<string, string>;
  fetchImpl?: FetchLike;
  cacheTtlMs?: number;
  now?: () => number;
}

const isGzip = (buffer: Buffer): boolean => buffer.length > 2 && buffer[0] === 0x1f && buffer[1] === 0x8b;

/** Country XMLTV feeds, fetched and parsed on demand and cached per country. */
export class FallbackEpgSource {
  private readonly baseUrl: string;

  private readonly feeds: Record<string, string>;

  private readonly fetchImpl: FetchLike;

  private readonly cacheTtlMs: number;

  private readonly now: () => number;

  constructor(config: FallbackEpgSourceConfig) {
    this.baseUrl = config.baseUrl.endsWith("/") ? config.baseUrl : `${config.baseUrl}/`;
    this.feeds = config.feeds;
    this.fetchImpl = config.fetchImpl ?? defaultFetch;
    this.cacheTtlMs = config.cacheTtlMs ?? FEED_CACHE_TTL_MS;
    this.now = config.now ?? Date.now;
  }

  /** Merges the feeds of all countries. Unknown codes and failed feeds are skipped. */
  async load(countries: string[]): Promise<FallbackGuide> {
    const merged: FallbackGuide = { channels: [], programmes: new Map() };

    for (const raw of countries) {
      const country = raw.trim().toUpperCase();
      const file = this.feeds[country];
      if (!file) {
        console.warn(`[epg] no fallback feed for country ${country}`);
        continue;
      }
      try {
        const guide = await this.loadCountry(country, file);
        merged.channels.push(...guide.channels);
        guide.programmes.forEach((list, channelId) => {
          if (!merged.programmes.has(channelId)) {
            merged.programmes.set(channelId, list);
          }
        });
      } catch (error) {
        console.warn(`[epg] fallback feed ${country} failed`, describeError(error));
      }
    }

    return merged;
  }

  private async loadCountry(country: string, file: string): Promise<FallbackGuide> {
    const cacheKey = `epg-fallback:${country}`;
    const cached = readCache<FallbackGuide>(cacheKey);
    if (cached) {
      return cached;
    }

    const url = `${this.baseUrl}${file}`;
    console.log(`[epg] fetching fallback feed ${country} from ${url}`);
    const { response, body } = await fetchBufferWithRetry(this.fetchImpl, url, { method: "GET" }, {
      maxRetries: 2,
      timeoutMs: FEED_TIMEOUT_MS,
    });
    if (!response.ok) {
      throw new Error(`HTTP ${response.status}`);
    }
    const xml = (isGzip(body) ? await gunzip(body) : body).toString("utf8");
    const guide = parseXmltvFeed(xml, { floor: this.now() - 2 * 24 * 60 * 60 * 1000 });
    const total = Array.from(guide.programmes.values()).reduce((sum, list) => sum + list.length, 0);
    console.log(`[epg] fallback ${country}: ${guide.channels.length} names, ${total} programmes`);
    writeCache(cacheKey, guide, this.cacheTtlMs);
    return guide;
  }
}
