import { isRecord, toFiniteNumber, toTrimmedString } from "./http.js";

export interface PortalGenre {
  id: string;
  title: string;
}

export interface PortalChannel {
  id: string;
  name: string;
  number: number | null;
  genreId: string;
  logo: string;
  cmd: string;
  xmltvId: string;
}

export interface PortalMediaItem {
  id: string;
  name: string;
  categoryId: string;
  logo: string;
  cmd: string;
  description: string;
  year: string;
  rating: string;
  added: string;
  isSeries: boolean;
}

export interface PortalEpgEntry {
  start: number;
  stop: number;
  title: string;
  description: string;
}

export interface PortalPage<T> {
  items: T[];
  totalItems: number | null;
  pageSize: number | null;
}

export interface PortalAccountInfo {
  expiresAt: number | null;
  expiryText: string;
  raw: Record<string, unknown>;
}

export const readJs = (envelope: Record<string, unknown>): unknown => envelope.js;

export const readToken = (envelope: Record<string, unknown>): string | null => {
  const js = readJs(envelope);
  if (!isRecord(js)) {
    return null;
  }
  const token = toTrimmedString(js.token);
  return token || null;
};

const resolveLogo = (value: unknown, origin: string): string => {
  const logo = toTrimmedString(value);
  if (!logo) {
    return "";
  }
  if (/^https?:\/\//i.test(logo)) {
    return logo;
  }
  return logo.startsWith("/") ? `${origin}${logo}` : "";
};

const parseCategoryList = (value: unknown): PortalGenre[] | null => {
  if (!Array.isArray(value)) {
    return null;
  }
  return value.flatMap((entry): PortalGenre[] => {
    if (!isRecord(entry)) {
      return [];
    }
    const id = toTrimmedString(entry.id);
    const title = toTrimmedString(entry.title);
    // "*" is the portal's synthetic "All" bucket.
    if (!id || id === "*" || !title) {
      return [];
    }
    return [{ id, title }];
  });
};

export const toPortalGenres = (envelope: Record<string, unknown>): PortalGenre[] | null =>
  parseCategoryList(readJs(envelope));

export const toPortalChannels = (
  envelope: Record<string, unknown>,
  origin: string,
): PortalChannel[] | null => {
  const js = readJs(envelope);
  const data = isRecord(js) ? js.data : null;
  if (!Array.isArray(data)) {
    return null;
  }
  return data.flatMap((entry): PortalChannel[] => {
    if (!isRecord(entry)) {
      return [];
    }
    const id = toTrimmedString(entry.id);
    const name = toTrimmedString(entry.name);
    if (!id || !name) {
      return [];
    }
    return [
      {
        id,
        name,
        number: toFiniteNumber(entry.number),
        genreId: toTrimmedString(entry.tv_genre_id) || toTrimmedString(entry.genre_id),
        logo: resolveLogo(entry.logo, origin),
        cmd: toTrimmedString(entry.cmd),
        xmltvId: toTrimmedString(entry.xmltv_id),
      },
    ];
  });
};

const isTruthyFlag = (value: unknown): boolean =>
  value === true || value === 1 || value === "1" || value === "true";

export const toPortalMediaPage = (
  envelope: Record<string, unknown>,
  origin: string,
  fallbackCategoryId: string,
): PortalPage<PortalMediaItem> | null => {
  const js = readJs(envelope);
  const data = isRecord(js) ? js.data : null;
  if (!isRecord(js) || !Array.isArray(data)) {
    return null;
  }
  const items = data.flatMap((entry): PortalMediaItem[] => {
    if (!isRecord(entry)) {
      return [];
    }
    const id = toTrimmedString(entry.id);
    const name = toTrimmedString(entry.name);
    if (!id || !name) {
      return [];
    }
    return [
      {
        id,
        name,
        categoryId: toTrimmedString(entry.category_id) || fallbackCategoryId,
        logo: resolveLogo(entry.screenshot_uri, origin),
        cmd: toTrimmedString(entry.cmd),
        description: toTrimmedString(entry.description),
        year: toTrimmedString(entry.year),
        rating: toTrimmedString(entry.rating_imdb) || toTrimmedString(entry.rating_kinopoisk),
        added: toTrimmedString(entry.added),
        isSeries: isTruthyFlag(entry.is_series),
      },
    ];
  });
  return {
    items,
    totalItems: toFiniteNumber(js.total_items),
    pageSize: toFiniteNumber(js.max_page_items),
  };
};

export const toPortalCategories = (envelope: Record<string, unknown>): PortalGenre[] | null =>
  parseCategoryList(readJs(envelope));

/**
 * `get_epg_info` answers with `js.data` keyed by channel id. Timestamps are
 * unix seconds; entries without both bounds are dropped.
 */
export const toPortalEpg = (
  envelope: Record<string, unknown>,
): Map<string, PortalEpgEntry[]> | null => {
  const js = readJs(envelope);
  const data = isRecord(js) ? js.data : null;
  if (!isRecord(data)) {
    return Array.isArray(data) && data.length === 0 ? new Map() : null;
  }

  const result = new Map<string, PortalEpgEntry[]>();
  Object.entries(data).forEach(([channelId, entries]) => {
    if (!Array.isArray(entries)) {
      return;
    }
    const programmes = entries.flatMap((entry): PortalEpgEntry[] => {
      if (!isRecord(entry)) {
        return [];
      }
      const start = toFiniteNumber(entry.start_timestamp);
      const stop = toFiniteNumber(entry.stop_timestamp);
      if (!start || !stop || stop <= start) {
        return [];
      }
      return [
        {
          start: start * 1000,
          stop: stop * 1000,
          title: toTrimmedString(entry.name),
          description: toTrimmedString(entry.descr),
        },
      ];
    });
    if (programmes.length > 0) {
      result.set(channelId, programmes);
    }
  });
  return result;
};

/** The playable URL is the last whitespace-separated token of a `cmd`. */
export const extractLink = (cmd: string): string | null => {
  const tokens = cmd.trim().split(/\s+/);
  const last = tokens[tokens.length - 1] ?? "";
  return /^(https?|rtmp|rtsp|udp):\/\//i.test(last) ? last : null;
};

export const toCreatedLink = (envelope: Record<string, unknown>): string | null => {
  const js = readJs(envelope);
  if (!isRecord(js)) {
    return null;
  }
  return extractLink(toTrimmedString(js.cmd));
};

/**
 * Portals report expiry in free-form text ("November 5, 2026, 12:00 am",
 * "2026-11-05 00:00:00", "Unlimited"). Anything unparseable means unknown.
 */
export const parsePortalExpiry = (value: string): number | null => {
  const text = value.trim();
  if (!text || /unlim|never|∞/i.test(text)) {
    return null;
  }
  const isoLike = /^(\d{4})-(\d{2})-(\d{2})(?:[ T](\d{2}):(\d{2})(?::(\d{2}))?)?/.exec(text);
  if (isoLike) {
    const [, year, month, day, hour = "0", minute = "0", second = "0"] = isoLike;
    return Date.UTC(
      Number(year),
      Number(month) - 1,
      Number(day),
      Number(hour),
      Number(minute),
      Number(second),
    );
  }
  const parsed = Date.parse(text.replace(/,(?=\s*\d{1,2}:\d{2})/, ""));
  return Number.isFinite(parsed) ? parsed : null;
};

export const toAccountInfo = (envelope: Record<string, unknown>): PortalAccountInfo | null => {
  const js = readJs(envelope);
  if (!isRecord(js)) {
    return null;
  }
  const expiryText = toTrimmedString(js.phone) || toTrimmedString(js.end_date);
  return { expiresAt: expiryText ? parsePortalExpiry(expiryText) : null, expiryText, raw: js };
};

export const isRecordEnvelope = (value: unknown): value is Record<string, unknown> =>
  isRecord(value) && "js" in value;
