import { createHash } from "node:crypto";
import { visibleEntries, type XtreamView } from "./xtream.js";

export interface HdhrSettings {
  name: string;
  deviceId: string;
  tuners: number;
  /** Gateway user whose credentials and portal restrictions the lineup uses. */
  username: string;
}

export interface LineupEntry {
  GuideNumber: string;
  GuideName: string;
  URL: string;
}

/** Stable 8-hex-digit device id derived from the tuner name. */
export const deriveDeviceId = (name: string): string =>
  createHash("sha1").update(name).digest("hex").slice(0, 8).toUpperCase();

export const discoverDocument = (settings: HdhrSettings, baseUrl: string) => ({
  BaseURL: baseUrl,
  DeviceAuth: settings.name,
  DeviceID: settings.deviceId,
  FirmwareName: "portal-gateway",
  FirmwareVersion: "1",
  FriendlyName: settings.name,
  LineupURL: `${baseUrl}/lineup.json`,
  Manufacturer: "portal-gateway",
  ModelNumber: "HDTC-2US",
  TunerCount: settings.tuners,
});

export const LINEUP_STATUS = {
  ScanInProgress: 0,
  ScanPossible: 0,
  Source: "Cable",
  SourceList: ["Cable"],
} as const;

/**
 * Live channels the lineup user can see, numbered like the XC listing and
 * sorted by guide number.
 */
export const buildLineup = (view: XtreamView, baseUrl: string): LineupEntry[] => {
  const credentials = `${encodeURIComponent(view.user.username)}/${encodeURIComponent(view.user.password)}`;
  return visibleEntries(view, "live")
    .map((entry, index) => ({
      number: entry.number ?? index + 1,
      row: {
        GuideNumber: String(entry.number ?? index + 1),
        GuideName: entry.name,
        URL: `${baseUrl}/live/${credentials}/${entry.streamId}.ts`,
      },
    }))
    .sort((a, b) => a.number - b.number)
    .map(({ row }) => row);
};
