import type { Request } from "express";
import type { CatalogStore } from "../lib/catalogStore.js";
import type { EpgStore } from "../lib/epgStore.js";
import type { GatewayConfig, StreamMode, UserConfig } from "../lib/gatewayConfig.js";
import type { HdhrSettings } from "../lib/hdhomerun.js";
import type { FetchLike } from "../lib/http.js";
import type { MacPool } from "../lib/macPool.js";
import type { PlaybackService } from "../lib/playback.js";
import type { RefreshCoordinator } from "../lib/refresh.js";
import type { SessionBroker } from "../lib/sessionBroker.js";
import type { ServerAddress, XtreamView } from "../lib/xtream.js";

/** Everything the HTTP layer reaches into. Built once in server/index.ts. */
export interface GatewayContext {
  streamMode: StreamMode;
  ffmpegBin: string;
  ffprobeBin: string;
  streamCheckTimeoutMs: number;
  hdhr: HdhrSettings | null;
  config: () => GatewayConfig;
  reload: () => Promise<GatewayConfig>;
  broker: SessionBroker;
  catalogStore: CatalogStore;
  epgStore: EpgStore;
  pool: MacPool;
  playback: Pick<PlaybackService, "open" | "release" | "touch">;
  refresh: Pick<RefreshCoordinator, "run" | "isRunning" | "tracker">;
  fetchImpl: FetchLike;
  now: () => number;
}

export const readQuery = (req: Request, key: string): string | undefined => {
  const value = req.query[key];
  if (typeof value === "string") {
    return value;
  }
  if (Array.isArray(value) && typeof value[0] === "string") {
    return value[0];
  }
  return undefined;
};

const firstHeaderValue = (value: string | undefined): string | undefined =>
  value?.split(",")[0]?.trim() || undefined;

/** Scheme and host as the player sees them, honouring reverse-proxy headers. */
export const requestAddress = (req: Request): ServerAddress => ({
  scheme: firstHeaderValue(req.get("x-forwarded-proto")) ?? req.protocol,
  host: firstHeaderValue(req.get("x-forwarded-host")) ?? req.get("host") ?? "localhost",
});

export const baseUrlOf = (req: Request): string => {
  const { scheme, host } = requestAddress(req);
  return `${scheme}://${host}`;
};

export const viewFor = (context: GatewayContext, user: UserConfig): XtreamView => {
  const enabled = new Set(
    context
      .config()
      .portals.filter((portal) => portal.enabled)
      .map((portal) => portal.id),
  );
  return {
    catalog: context.catalogStore.snapshot(),
    guide: context.epgStore.snapshot(),
    user,
    portalEnabled: (portalId) => enabled.has(portalId),
  };
};
