import { DEFAULT_EPG_MATCH_POLICY, type EpgMatchPolicy } from "./gatewayConfig.js";

export type { EpgMatchPolicy } from "./gatewayConfig.js";

export interface GuideChannel {
  id: string;
  displayName: string;
}

export type EpgMatch =
  | { tier: "exact" | "substring" | "fuzzy"; channelId: string; score: number }
  | { tier: "none" };

const NO_MATCH: EpgMatch = { tier: "none" };

const BRACKETED = /\([^)]*\)|\[[^\]]*\]|\{[^}]*\}/g;
// HD/SD only count as noise when punctuation sets them apart ("ARD | HD", "HD: ARD").
const PUNCTUATED_DEFINITION =
  /[^\p{L}\p{N}\s+]+\s*\b(?:hd|sd)\b|\b(?:hd|sd)\b\s*[^\p{L}\p{N}\s+]+/gu;
const QUALITY_TOKENS =
  /\b(?:fhd|uhd|4k|8k|hevc|h\.?265|h\.?264|x265|2160p|1080[pi]|720p|50fps|60fps)\b/g;
const PUNCTUATION = /[^\p{L}\p{N}\s+]+/gu;

/**
 * Reduces a channel name to its comparable form. Unambiguous quality tokens
 * are dropped; a bare trailing "HD" is kept because "ARD" and "ARD HD" can be
 * different feeds.
 */
export const normalizeChannelName = (name: string): string =>
  name
    .normalize("NFD")
    .replace(/\p{M}+/gu, "")
    .toLowerCase()
    .replace(BRACKETED, " ")
    .replace(QUALITY_TOKENS, " ")
    .replace(PUNCTUATED_DEFINITION, " ")
    .replace(PUNCTUATION, " ")
    .replace(/\s+/g, " ")
    .trim();

const wordsOf = (value: string): Set<string> => new Set(value.split(" ").filter(Boolean));

interface IndexedChannel {
  id: string;
  normalized: string;
  words: Set<string>;
}

interface Scored {
  id: string;
  score: number;
}

/** Best candidate, or `null` when two different channels tie for it. */
const pickUnique = (scored: Scored[]): Scored | null => {
  if (scored.length === 0) {
    return null;
  }
  const best = Math.max(...scored.map((entry) => entry.score));
  const winners = new Set(scored.filter((entry) => entry.score === best).map((entry) => entry.id));
  if (winners.size !== 1) {
    return null;
  }
  return { id: Array.from(winners)[0], score: best };
};

export class EpgMatcher {
  private readonly exact = new Map<string, string>();

  private readonly channels: IndexedChannel[] = [];

  private readonly policy: EpgMatchPolicy;

  constructor(channels: Iterable<GuideChannel>, policy: Partial<EpgMatchPolicy> = {}) {
    this.policy = { ...DEFAULT_EPG_MATCH_POLICY, ...policy };
    for (const channel of channels) {
      const normalized = normalizeChannelName(channel.displayName);
      if (!normalized) {
        continue;
      }
      if (!this.exact.has(normalized)) {
        this.exact.set(normalized, channel.id);
      }
      this.channels.push({ id: channel.id, normalized, words: wordsOf(normalized) });
    }
  }

  get size(): number {
    return this.channels.length;
  }

  match(name: string): EpgMatch {
    const normalized = normalizeChannelName(name);
    if (!normalized) {
      return NO_MATCH;
    }

    const exact = this.exact.get(normalized);
    if (exact !== undefined) {
      return { tier: "exact", channelId: exact, score: 1 };
    }

    const substring = pickUnique(
      this.channels.flatMap((channel): Scored[] => {
        const [shorter, longer] =
          channel.normalized.length <= normalized.length
            ? [channel.normalized, normalized]
            : [normalized, channel.normalized];
        if (!longer.includes(shorter)) {
          return [];
        }
        const score = shorter.length / longer.length;
        return score >= this.policy.substringMinRatio ? [{ id: channel.id, score }] : [];
      }),
    );
    if (substring) {
      return { tier: "substring", channelId: substring.id, score: substring.score };
    }

    if (!this.policy.fuzzyWordMatch) {
      return NO_MATCH;
    }

    const words = wordsOf(normalized);
    const fuzzy = pickUnique(
      this.channels.flatMap((channel): Scored[] => {
        let shared = 0;
        words.forEach((word) => {
          if (channel.words.has(word)) {
            shared += 1;
          }
        });
        const score = shared / Math.max(words.size, channel.words.size);
        return score >= this.policy.fuzzyMinOverlap ? [{ id: channel.id, score }] : [];
      }),
    );
    return fuzzy ? { tier: "fuzzy", channelId: fuzzy.id, score: fuzzy.score } : NO_MATCH;
  }
}
