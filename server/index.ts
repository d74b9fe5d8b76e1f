import "dotenv/config";
import type { Server } from "node:http";
import path from "node:path";
import { createGatewayApp } from "../src/express/server.js";
import { CatalogMergeEngine, findFallbackChannels } from "../src/lib/catalogMerge.js";
import { MemoryCatalogStore } from "../src/lib/catalogStore.js";
import { FlareSolverrClient } from "../src/lib/challengeSolver.js";
import { FallbackEpgSource, loadFallbackFeeds } from "../src/lib/epgFallback.js";
import { EpgMergeEngine } from "../src/lib/epgMerge.js";
import { MemoryEpgStore } from "../src/lib/epgStore.js";
import { describeError } from "../src/lib/errors.js";
import {
  FileConfigSource,
  loadGatewayEnvConfig,
  type GatewayConfig,
} from "../src/lib/gatewayConfig.js";
import { defaultFetch } from "../src/lib/http.js";
import { MacPool } from "../src/lib/macPool.js";
import { PlaybackService } from "../src/lib/playback.js";
import { PortalClients } from "../src/lib/portalClients.js";
import { ProxyTunnelFactory } from "../src/lib/proxyTunnel.js";
import { RefreshCoordinator } from "../src/lib/refresh.js";
import { SessionBroker } from "../src/lib/sessionBroker.js";
import { ShadowsocksBridgeLauncher } from "../src/lib/shadowsocksBridge.js";

declare global {
  // eslint-disable-next-line no-var
  var __gatewayServer: Server | undefined;
}

const env = loadGatewayEnvConfig(process.env);
const configSource = new FileConfigSource(path.resolve(process.cwd(), env.configPath));
let config: GatewayConfig = { portals: [], users: [] };

const pool = new MacPool({
  failureThreshold: env.macFailureThreshold,
  cooldownMs: env.macCooldownMs,
  leaseTimeoutMs: env.leaseTimeoutMs,
});

const clients = new PortalClients({
  tunnels: new ProxyTunnelFactory(new ShadowsocksBridgeLauncher({ binary: env.sslocalBin })),
  challengeSolver: env.flaresolverrUrl
    ? new FlareSolverrClient({ endpoint: env.flaresolverrUrl })
    : null,
  shortTimeoutMs: env.portalShortTimeoutMs,
  longTimeoutMs: env.portalLongTimeoutMs,
});

const broker = new SessionBroker({
  users: () => config.users,
  idleTimeoutMs: env.connectionIdleMs,
});

const applyConfig = async (next: GatewayConfig): Promise<void> => {
  config = next;
  pool.configure(next.portals);
  await clients.reconcile(next.portals);
};

const reload = async (): Promise<GatewayConfig> => {
  const next = await configSource.load();
  await applyConfig(next);
  return next;
};

const start = async (): Promise<void> => {
  await applyConfig(await configSource.load());

  const catalogStore = await MemoryCatalogStore.open(
    path.resolve(process.cwd(), env.dataDir, "catalog.json"),
  );
  const epgStore = new MemoryEpgStore();

  const fallback = env.epgFallbackEnabled
    ? new FallbackEpgSource({
        baseUrl: env.epgFallbackBaseUrl,
        feeds: await loadFallbackFeeds(),
      })
    : null;

  const refresh = new RefreshCoordinator({
    portals: () => config.portals,
    catalog: new CatalogMergeEngine(clients, pool),
    catalogStore,
    epg: new EpgMergeEngine(clients, pool, {
      windowHours: env.epgWindowHours,
      fallback,
      settings: {
        enabled: env.epgFallbackEnabled,
        countries: env.epgFallbackCountries,
        match: env.epgMatch,
      },
    }),
    epgStore,
    concurrency: env.refreshConcurrency,
  });

  const playback = new PlaybackService({
    pool,
    clients,
    portal: (portalId) => config.portals.find((portal) => portal.id === portalId),
    fallbacks: (entry) => findFallbackChannels(catalogStore.snapshot(), entry),
  });

  const app = createGatewayApp(
    {
      streamMode: env.streamMode,
      ffmpegBin: env.ffmpegBin,
      ffprobeBin: env.ffprobeBin,
      streamCheckTimeoutMs: env.streamCheckTimeoutMs,
      hdhr: env.hdhr,
      config: () => config,
      reload,
      broker,
      catalogStore,
      epgStore,
      pool,
      playback,
      refresh,
      fetchImpl: defaultFetch,
      now: Date.now,
    },
    { corsOrigin: env.corsOrigin },
  );

  const runningServer = globalThis.__gatewayServer;
  if (runningServer) {
    runningServer.close();
  }

  const server = app.listen(env.port, () => {
    console.log(`[gateway] listening on ${env.port} (stream mode: ${env.streamMode})`);
  });

  server.on("error", (error: NodeJS.ErrnoException) => {
    if (error.code === "EADDRINUSE") {
      console.error(
        `Port ${env.port} is already in use. Set PORT to a free port or stop the other process.`,
      );
      return;
    }
    console.error("Server failed to start", error);
  });

  globalThis.__gatewayServer = server;

  const stopWatchdog = pool.startWatchdog();
  const stopSchedule = refresh.startSchedule(env.refreshIntervalMs);

  refresh.run("startup").catch((error: unknown) => {
    console.error("[refresh] startup cycle failed", describeError(error));
  });

  const shutdown = (signal: string) => {
    console.log(`[gateway] ${signal} received, shutting down`);
    stopSchedule();
    stopWatchdog();
    server.close();
    Promise.all([clients.closeAll(), catalogStore.flush()])
      .catch((error: unknown) => {
        console.warn("[gateway] shutdown cleanup failed", describeError(error));
      })
      .finally(() => {
        process.exit(0);
      });
  };
  process.once("SIGTERM", () => shutdown("SIGTERM"));
  process.once("SIGINT", () => shutdown("SIGINT"));
};

if (process.env.NODE_ENV !== "test") {
  start().catch((error: unknown) => {
    console.error("[gateway] startup failed", describeError(error));
    process.exitCode = 1;
  });
}
