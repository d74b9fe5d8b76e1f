import { spawn, type ChildProcessByStdio } from "node:child_process";
import type { Readable, Writable } from "node:stream";
import type { CatalogEntry } from "./catalogMerge.js";
import { GatewayError, describeError, isGatewayError } from "./errors.js";
import type { PortalConfig } from "./gatewayConfig.js";
import type { MacLease, MacPool } from "./macPool.js";
import type { PortalClientProvider } from "./portalClients.js";
import type { OutboundTransport } from "./proxyTunnel.js";

export interface PlaybackTarget {
  entry: CatalogEntry;
  portal: PortalConfig;
  lease: MacLease;
  url: string;
  transport: OutboundTransport;
}

export interface PlaybackServiceOptions {
  pool: MacPool;
  clients: PortalClientProvider;
  portal: (portalId: string) => PortalConfig | undefined;
  /** MACs tried per request: the first pick plus one retry. */
  maxAttempts?: number;
  /** Equivalent channels on other portals, tried in order when the entry cannot play. */
  fallbacks?: (entry: CatalogEntry) => CatalogEntry[];
}

/** Lets the caller veto fallback candidates, e.g. portals a user may not watch. */
export type FallbackFilter = (candidate: CatalogEntry) => boolean;

const FALLBACK_TRIGGERS = ["NoMacAvailable", "PlaybackUnavailable", "StreamNotFound"] as const;

/**
 * Turns a catalog entry into a playable upstream URL by leasing a MAC and
 * asking that MAC's session for a link. A failing MAC is recorded and the
 * request is retried once on a different one; after that the entry's
 * fallback channels on other portals get their turn.
 */
export class PlaybackService {
  private readonly pool: MacPool;

  private readonly clients: PortalClientProvider;

  private readonly portal: (portalId: string) => PortalConfig | undefined;

  private readonly maxAttempts: number;

  private readonly fallbacks: (entry: CatalogEntry) => CatalogEntry[];

  constructor(options: PlaybackServiceOptions) {
    this.pool = options.pool;
    this.clients = options.clients;
    this.portal = options.portal;
    this.maxAttempts = options.maxAttempts ?? 2;
    this.fallbacks = options.fallbacks ?? (() => []);
  }

  async open(entry: CatalogEntry, accept: FallbackFilter = () => true): Promise<PlaybackTarget> {
    try {
      return await this.openOnPortal(entry);
    } catch (error) {
      if (!isGatewayError(error, ...FALLBACK_TRIGGERS)) {
        throw error;
      }
      const candidates = this.fallbacks(entry).filter(accept);
      for (const candidate of candidates) {
        try {
          const target = await this.openOnPortal(candidate);
          console.log(`[playback] ${entry.key} fell back to ${candidate.key}`);
          return target;
        } catch (fallbackError) {
          if (!isGatewayError(fallbackError, ...FALLBACK_TRIGGERS)) {
            throw fallbackError;
          }
          console.warn(`[playback] fallback ${candidate.key} for ${entry.key} failed`, describeError(fallbackError));
        }
      }
      throw error;
    }
  }

  private async openOnPortal(entry: CatalogEntry): Promise<PlaybackTarget> {
    const portal = this.portal(entry.portalId);
    if (!portal || !portal.enabled) {
      throw new GatewayError("StreamNotFound", `Portal ${entry.portalId} is not available`);
    }

    const tried: string[] = [];
    let lastError: unknown = null;

    for (let attempt = 0; attempt < this.maxAttempts; attempt += 1) {
      let lease: MacLease;
      try {
        lease = this.pool.acquire(portal.id, { exclude: tried });
      } catch (error) {
        if (attempt === 0) {
          throw error;
        }
        lastError = lastError ?? error;
        break;
      }
      tried.push(lease.mac);

      try {
        const session = await this.clients.session(portal, lease.mac);
        const url =
          entry.kind === "live"
            ? await session.resolveStreamLink(entry.upstreamId, entry.cmd)
            : await session.resolveVodLink(entry.cmd);
        const transport = await this.clients.transport(portal);
        this.pool.recordSuccess(portal.id, lease.mac);
        console.log(`[playback] ${entry.key} via ${lease.mac}`);
        return { entry, portal, lease, url, transport };
      } catch (error) {
        lastError = error;
        this.pool.recordFailure(portal.id, lease.mac, error);
        this.pool.release(lease);
        console.warn(`[playback] ${entry.key} failed on ${lease.mac}`, describeError(error));
        if (isGatewayError(error, "StreamNotFound")) {
          throw error;
        }
      }
    }

    throw new GatewayError("PlaybackUnavailable", `No streams available for ${entry.key}`, {
      cause: lastError,
      details: { tried },
    });
  }

  release(target: PlaybackTarget): void {
    this.pool.release(target.lease);
  }

  touch(target: PlaybackTarget): void {
    this.pool.touch(target.lease);
  }
}

/** ffmpeg reads the upstream from stdin, so it never opens its own connection to the portal. */
export const buildTranscodeArgs = (): string[] => [
  "-hide_banner",
  "-loglevel",
  "error",
  "-i",
  "pipe:0",
  "-map",
  "0",
  "-c",
  "copy",
  "-f",
  "mpegts",
  "pipe:1",
];

export interface TranscodeProcess {
  stdout: Readable;
  kill: () => void;
}

/** Remuxes `input` into MPEG-TS on stdout. */
export const spawnTranscoder = (
  ffmpegBin: string,
  input: Readable,
  onError: (error: Error) => void,
): TranscodeProcess => {
  const child: ChildProcessByStdio<Writable, Readable, Readable> = spawn(ffmpegBin, buildTranscodeArgs(), {
    stdio: ["pipe", "pipe", "pipe"],
  });
  let stopping = false;

  child.stderr.on("data", (data: Buffer) => {
    const message = data.toString().trim();
    if (message && !stopping) {
      console.warn(`[playback] ffmpeg: ${message}`);
    }
  });

  child.stdin.on("error", (error) => {
    // EPIPE once ffmpeg has exited; the exit handler reports that.
    if (!stopping && !("code" in error && error.code === "EPIPE")) {
      onError(error);
    }
  });
  input.on("error", (error) => {
    if (!stopping) {
      onError(error);
    }
  });
  input.pipe(child.stdin);

  child.on("exit", (code, signal) => {
    if (stopping || signal === "SIGTERM") {
      return;
    }
    if (code !== null && code !== 0) {
      onError(new Error(`ffmpeg exited with code ${code}`));
    }
  });

  child.on("error", (error) => {
    if (!stopping) {
      onError(error);
    }
  });

  return {
    stdout: child.stdout,
    kill: () => {
      stopping = true;
      input.unpipe(child.stdin);
      input.destroy();
      if (!child.killed) {
        child.kill("SIGTERM");
      }
    },
  };
};
