import type { CatalogEntry, CatalogKind, CatalogSnapshot } from "./catalogMerge.js";
import type { EpgProgramme, GuideChannelInfo, GuideSnapshot } from "./epgStore.js";
import { streamKey } from "./streamIds.js";
import type { UserConfig } from "./gatewayConfig.js";

export interface XtreamView {
  catalog: CatalogSnapshot;
  guide: GuideSnapshot;
  user: UserConfig;
  /** Portals currently enabled in configuration. */
  portalEnabled: (portalId: string) => boolean;
}

export interface ServerAddress {
  scheme: string;
  host: string;
}

export const authFailure = (message: string) => ({
  user_info: { auth: 0, message },
});

const toUnixSeconds = (ms: number): number => Math.floor(ms / 1000);

const pad = (value: number): string => String(value).padStart(2, "0");

export const formatEpgDate = (ms: number): string => {
  const date = new Date(ms);
  return (
    `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())} ` +
    `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`
  );
};

const base64 = (value: string): string => Buffer.from(value, "utf8").toString("base64");

export const userInfo = (
  user: UserConfig,
  activeConnections: number,
  address: ServerAddress,
  now = Date.now(),
) => {
  const [hostname, explicitPort] = address.host.split(":");
  const port = explicitPort ?? (address.scheme === "https" ? "443" : "80");
  const expiry = user.expiresAt ? Date.parse(`${user.expiresAt}T00:00:00Z`) : Number.NaN;

  return {
    user_info: {
      username: user.username,
      password: user.password,
      message: "",
      auth: 1,
      status: "Active",
      exp_date: Number.isFinite(expiry) ? String(toUnixSeconds(expiry)) : null,
      is_trial: "0",
      active_cons: String(activeConnections),
      created_at: user.createdAt,
      max_connections: String(user.maxConnections),
      allowed_output_formats: ["m3u8", "ts"],
    },
    server_info: {
      url: hostname,
      port,
      https_port: address.scheme === "https" ? port : "",
      server_protocol: address.scheme,
      rtmp_port: "",
      timezone: "UTC",
      timestamp_now: toUnixSeconds(now),
      time_now: formatEpgDate(now),
    },
  };
};

export const canSee = (view: XtreamView, entry: CatalogEntry): boolean =>
  entry.enabled &&
  view.portalEnabled(entry.portalId) &&
  (view.user.allowedPortals.length === 0 || view.user.allowedPortals.includes(entry.portalId));

export const visibleEntries = (
  view: XtreamView,
  kind: CatalogKind,
  categoryId?: string,
): CatalogEntry[] =>
  view.catalog.entries[kind].filter(
    (entry) => canSee(view, entry) && (!categoryId || entry.categoryId === categoryId),
  );

const lookup = (view: XtreamView, ref: string, kind: CatalogKind): CatalogEntry | undefined => {
  if (/^\d+$/.test(ref)) {
    return view.catalog.byStreamId.get(Number.parseInt(ref, 10));
  }
  // Some players send the custom_sid back instead of the numeric id.
  const split = ref.lastIndexOf("_");
  if (split <= 0 || split === ref.length - 1) {
    return undefined;
  }
  return view.catalog.byKey.get(streamKey(kind, ref.slice(0, split), ref.slice(split + 1)));
};

/**
 * Resolves a stream reference (numeric id or `portalId_upstreamId`) through
 * the snapshot's id table. Entries the user cannot see count as missing.
 */
export const resolveStreamRef = (
  view: XtreamView,
  ref: string,
  kind: CatalogKind,
): CatalogEntry | null => {
  const entry = lookup(view, ref.trim(), kind);
  if (!entry || entry.kind !== kind || !canSee(view, entry)) {
    return null;
  }
  return entry;
};

export const categories = (view: XtreamView, kind: CatalogKind) => {
  const used = new Set(visibleEntries(view, kind).map((entry) => entry.categoryId));
  return view.catalog.categories[kind]
    .filter((category) => used.has(category.categoryId))
    .map((category) => ({
      category_id: category.categoryId,
      category_name: category.name,
      parent_id: 0,
    }));
};

/** override, then the guide's assignment, then nothing. */
export const epgChannelIdOf = (entry: CatalogEntry, guide: GuideSnapshot): string =>
  entry.epgIdOverride || guide.assignments.get(entry.key) || "";

export const liveStreams = (view: XtreamView, categoryId?: string) =>
  visibleEntries(view, "live", categoryId).map((entry, index) => ({
    num: entry.number ?? index + 1,
    name: entry.name,
    stream_type: "live",
    stream_id: entry.streamId,
    stream_icon: entry.logo,
    epg_channel_id: epgChannelIdOf(entry, view.guide),
    added: "",
    category_id: entry.categoryId,
    custom_sid: entry.key,
    tv_archive: 0,
    direct_source: "",
    tv_archive_duration: 0,
    container_extension: "ts",
  }));

const fiveBased = (rating: string): number => {
  const value = Number.parseFloat(rating);
  return Number.isFinite(value) ? Math.round((value / 2) * 10) / 10 : 0;
};

export const vodStreams = (view: XtreamView, categoryId?: string) =>
  visibleEntries(view, "vod", categoryId).map((entry, index) => ({
    num: index + 1,
    name: entry.name,
    stream_type: "movie",
    stream_id: entry.streamId,
    stream_icon: entry.logo,
    rating: entry.rating,
    rating_5based: fiveBased(entry.rating),
    added: entry.added,
    category_id: entry.categoryId,
    container_extension: "mp4",
    custom_sid: entry.key,
    direct_source: "",
  }));

export const seriesList = (view: XtreamView, categoryId?: string) =>
  visibleEntries(view, "series", categoryId).map((entry, index) => ({
    num: index + 1,
    name: entry.name,
    series_id: entry.streamId,
    cover: entry.logo,
    plot: entry.description,
    cast: "",
    director: "",
    genre: entry.genreName,
    releaseDate: entry.year,
    last_modified: entry.added,
    rating: entry.rating,
    rating_5based: fiveBased(entry.rating),
    backdrop_path: [],
    youtube_trailer: "",
    episode_run_time: "",
    category_id: entry.categoryId,
  }));

export const vodInfo = (entry: CatalogEntry) => ({
  info: {
    movie_image: entry.logo,
    name: entry.name,
    plot: entry.description,
    description: entry.description,
    releasedate: entry.year,
    rating: entry.rating,
    genre: entry.genreName,
  },
  movie_data: {
    stream_id: entry.streamId,
    name: entry.name,
    added: entry.added,
    category_id: entry.categoryId,
    container_extension: "mp4",
    custom_sid: entry.key,
    direct_source: "",
  },
});

export const seriesInfo = (entry: CatalogEntry) => ({
  seasons: [],
  info: {
    name: entry.name,
    cover: entry.logo,
    plot: entry.description,
    genre: entry.genreName,
    releaseDate: entry.year,
    rating: entry.rating,
    category_id: entry.categoryId,
  },
  episodes: {},
});

const listing = (entry: CatalogEntry, epgId: string, programme: EpgProgramme, now: number) => ({
  id: `${entry.streamId}_${programme.start}`,
  epg_id: epgId,
  title: base64(programme.title),
  lang: "en",
  start: formatEpgDate(programme.start),
  end: formatEpgDate(programme.stop),
  description: base64(programme.description),
  channel_id: epgId,
  start_timestamp: String(toUnixSeconds(programme.start)),
  stop_timestamp: String(toUnixSeconds(programme.stop)),
  now_playing: programme.start <= now && programme.stop > now ? 1 : 0,
  has_archive: 0,
});

/** Upcoming (and current) programmes of a channel, at most `limit`. */
export const shortEpg = (view: XtreamView, entry: CatalogEntry, limit: number, now = Date.now()) => {
  const epgId = epgChannelIdOf(entry, view.guide);
  const programmes = epgId ? view.guide.programmes.get(epgId) ?? [] : [];
  return {
    epg_listings: programmes
      .filter((programme) => programme.stop > now)
      .slice(0, Math.max(0, limit))
      .map((programme) => listing(entry, epgId, programme, now)),
  };
};

export const simpleDataTable = (view: XtreamView, entry: CatalogEntry, now = Date.now()) => {
  const epgId = epgChannelIdOf(entry, view.guide);
  const programmes = epgId ? view.guide.programmes.get(epgId) ?? [] : [];
  return { epg_listings: programmes.map((programme) => listing(entry, epgId, programme, now)) };
};

/** Guide channels the user may see, one per EPG id. */
export const guideChannels = (view: XtreamView): GuideChannelInfo[] => {
  const seen = new Map<string, GuideChannelInfo>();
  visibleEntries(view, "live").forEach((entry) => {
    const epgId = epgChannelIdOf(entry, view.guide);
    if (epgId && !seen.has(epgId)) {
      seen.set(epgId, { epgId, displayName: entry.name, icon: entry.logo });
    }
  });
  return Array.from(seen.values());
};

const singleLine = (value: string): string => value.replace(/[\r\n]+/g, " ");

const attr = (value: string): string => singleLine(value).replace(/"/g, "'");

export interface PlaylistOptions {
  baseUrl: string;
  username: string;
  password: string;
  includeVod?: boolean;
}

export const buildM3u = (view: XtreamView, options: PlaylistOptions): string => {
  const credentials = `${encodeURIComponent(options.username)}/${encodeURIComponent(options.password)}`;
  const lines = ["#EXTM3U"];

  visibleEntries(view, "live").forEach((entry) => {
    lines.push(
      `#EXTINF:-1 tvg-id="${attr(epgChannelIdOf(entry, view.guide))}" tvg-name="${attr(entry.name)}" tvg-logo="${attr(entry.logo)}" group-title="${attr(entry.genreName)}",${singleLine(entry.name)}`,
      `${options.baseUrl}/live/${credentials}/${entry.streamId}.ts`,
    );
  });

  if (options.includeVod) {
    visibleEntries(view, "vod").forEach((entry) => {
      lines.push(
        `#EXTINF:-1 tvg-name="${attr(entry.name)}" tvg-logo="${attr(entry.logo)}" group-title="${attr(entry.genreName)}",${singleLine(entry.name)}`,
        `${options.baseUrl}/movie/${credentials}/${entry.streamId}.mp4`,
      );
    });
  }

  return `${lines.join("\n")}\n`;
};
