import { gzipSync } from "node:zlib";
import { Response } from "undici";
import { beforeEach, describe, it, expect, vi } from "vitest";
import {
  FallbackEpgSource,
  loadFallbackFeeds,
  parseXmltvFeed,
  parseXmltvTime,
} from "../src/lib/epgFallback.js";
import type { FetchLike } from "../src/lib/http.js";

const FEED = `<?xml version="1.0" encoding="UTF-8"?>
<tv generator-info-name="test">
  <channel id="Das.Erste.de">
    <display-name lang="de">Das Erste</display-name>
    <display-name>ARD</display-name>
  </channel>
  <channel id="ZDF.de">
    <display-name>ZDF</display-name>
  </channel>
  <programme start="20240101100000 +0000" stop="20240101110000 +0000" channel="Das.Erste.de">
    <title lang="de">Tagesschau</title>
    <desc lang="de">Nachrichten</desc>
  </programme>
  <programme start="20240101090000 +0000" stop="20240101100000 +0000" channel="Das.Erste.de">
    <title>Morgenmagazin</title>
  </programme>
  <programme start="20240101090000 +0000" stop="20240101080000 +0000" channel="ZDF.de">
    <title>Backwards</title>
  </programme>
  <programme start="20240101090000 +0000" stop="20240101100000 +0000" channel="Unknown.de">
    <title>Orphan</title>
  </programme>
</tv>`;

describe("parseXmltvTime", () => {
  it("applies the offset", () => {
    expect(parseXmltvTime("20240101120000 +0100")).toBe(Date.UTC(2024, 0, 1, 11));
    expect(parseXmltvTime("20240101120000 -0230")).toBe(Date.UTC(2024, 0, 1, 14, 30));
  });

  it("treats a missing offset and missing seconds as UTC", () => {
    expect(parseXmltvTime("202401011200")).toBe(Date.UTC(2024, 0, 1, 12));
  });

  it("rejects garbage", () => {
    expect(parseXmltvTime("tomorrow")).toBeNull();
  });
});

describe("parseXmltvFeed", () => {
  it("reads every display name and sorts programmes of known channels", () => {
    const guide = parseXmltvFeed(FEED);

    expect(guide.channels).toEqual([
      { id: "Das.Erste.de", displayName: "Das Erste" },
      { id: "Das.Erste.de", displayName: "ARD" },
      { id: "ZDF.de", displayName: "ZDF" },
    ]);
    expect(Array.from(guide.programmes.keys())).toEqual(["Das.Erste.de"]);
    expect(guide.programmes.get("Das.Erste.de")).toEqual([
      {
        start: Date.UTC(2024, 0, 1, 9),
        stop: Date.UTC(2024, 0, 1, 10),
        title: "Morgenmagazin",
        description: "",
        source: "fallback",
      },
      {
        start: Date.UTC(2024, 0, 1, 10),
        stop: Date.UTC(2024, 0, 1, 11),
        title: "Tagesschau",
        description: "Nachrichten",
        source: "fallback",
      },
    ]);
  });

  it("drops ended programmes and caps each channel", () => {
    const guide = parseXmltvFeed(FEED, { floor: Date.UTC(2024, 0, 1, 10, 30), maxPerChannel: 1 });
    expect(guide.programmes.get("Das.Erste.de")?.map((entry) => entry.title)).toEqual(["Tagesschau"]);
  });

  it("returns an empty guide for documents without a tv root", () => {
    const guide = parseXmltvFeed("<html></html>");
    expect(guide.channels).toEqual([]);
    expect(guide.programmes.size).toBe(0);
  });
});

describe("loadFallbackFeeds", () => {
  it("reads the bundled country table", async () => {
    const feeds = await loadFallbackFeeds();
    expect(feeds.DE).toBe("epg_ripper_DE1.xml.gz");
  });
});

describe("FallbackEpgSource", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  it("fetches gzip feeds once per country and skips unknown codes", async () => {
    const fetchImpl = vi.fn<FetchLike>(async () => new Response(new Uint8Array(gzipSync(FEED))));
    const source = new FallbackEpgSource({
      baseUrl: "https://epg.example.com/feeds",
      feeds: { AT: "at.xml.gz" },
      fetchImpl,
      now: () => Date.UTC(2024, 0, 2),
    });

    const guide = await source.load(["at", "xx"]);
    await source.load(["AT"]);

    expect(fetchImpl).toHaveBeenCalledTimes(1);
    expect(String(fetchImpl.mock.calls[0][0])).toBe("https://epg.example.com/feeds/at.xml.gz");
    expect(guide.channels).toHaveLength(3);
    expect(guide.programmes.get("Das.Erste.de")).toHaveLength(2);
  });

  it("accepts plain xml and keeps the first country's programmes for shared ids", async () => {
    const second = FEED.replace("Morgenmagazin", "Other Feed");
    const fetchImpl = vi.fn<FetchLike>(async (input) =>
      new Response(String(input).endsWith("ch.xml") ? FEED : second),
    );
    const source = new FallbackEpgSource({
      baseUrl: "https://epg.example.com/",
      feeds: { CH: "ch.xml", LU: "lu.xml" },
      fetchImpl,
      now: () => Date.UTC(2024, 0, 2),
    });

    const guide = await source.load(["CH", "LU"]);

    expect(guide.channels).toHaveLength(6);
    expect(guide.programmes.get("Das.Erste.de")?.[0].title).toBe("Morgenmagazin");
  });

  it("skips feeds that fail", async () => {
    const fetchImpl = vi.fn<FetchLike>(async () => new Response("nope", { status: 500 }));
    const source = new FallbackEpgSource({
      baseUrl: "https://epg.example.com/",
      feeds: { NL: "nl.xml.gz" },
      fetchImpl,
    });

    const guide = await source.load(["NL"]);

    expect(guide.channels).toEqual([]);
    expect(console.warn).toHaveBeenCalledWith("[epg] fallback feed NL failed", "HTTP 500");
  });
});
