import { XMLBuilder } from "fast-xml-parser";
import type { EpgProgramme, GuideChannelInfo } from "./epgStore.js";

const HOUR_MS = 60 * 60 * 1000;

const builder = new XMLBuilder({
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  format: true,
  suppressEmptyNode: true,
});

const pad = (value: number): string => String(value).padStart(2, "0");

export const formatXmltvTime = (ms: number): string => {
  const date = new Date(ms);
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
    `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())} +0000`
  );
};

/** A 24 h block from the start of the current hour, titled after the channel. */
export const placeholderProgramme = (channel: GuideChannelInfo, now: number): EpgProgramme => {
  const start = Math.floor(now / HOUR_MS) * HOUR_MS;
  return {
    start,
    stop: start + 24 * HOUR_MS,
    title: channel.displayName,
    description: "",
    source: "fallback",
  };
};

export interface XmltvInput {
  channels: readonly GuideChannelInfo[];
  programmesFor: (epgId: string) => readonly EpgProgramme[];
  now?: number;
}

export const buildXmltv = ({ channels, programmesFor, now = Date.now() }: XmltvInput): string => {
  const channelNodes = channels.map((channel) => ({
    "@_id": channel.epgId,
    "display-name": channel.displayName,
    ...(channel.icon ? { icon: { "@_src": channel.icon } } : {}),
  }));

  const programmeNodes = channels.flatMap((channel) => {
    const programmes = programmesFor(channel.epgId);
    const list = programmes.length > 0 ? programmes : [placeholderProgramme(channel, now)];
    return list.map((programme) => ({
      "@_start": formatXmltvTime(programme.start),
      "@_stop": formatXmltvTime(programme.stop),
      "@_channel": channel.epgId,
      title: { "#text": programme.title, "@_lang": "en" },
      ...(programme.description ? { desc: { "#text": programme.description, "@_lang": "en" } } : {}),
    }));
  });

  const xml: unknown = builder.build({
    "?xml": { "@_version": "1.0", "@_encoding": "UTF-8" },
    tv: {
      "@_generator-info-name": "portal-gateway",
      channel: channelNodes,
      programme: programmeNodes,
    },
  });
  return String(xml);
};
