import { Router, type NextFunction, type Request, type Response } from "express";
import { Readable } from "node:stream";
import type { ReadableStream as NodeReadableStream } from "node:stream/web";
import type { CatalogKind } from "../lib/catalogMerge.js";
import { describeError, isGatewayError } from "../lib/errors.js";
import { spawnTranscoder, type PlaybackTarget } from "../lib/playback.js";
import { deviceFingerprint, type ActiveConnection } from "../lib/sessionBroker.js";
import { authFailure, canSee, resolveStreamRef } from "../lib/xtream.js";
import { MAG_USER_AGENT } from "../portalSession.js";
import { viewFor, type GatewayContext } from "./context.js";

const HEARTBEAT_MS = 10_000;
const RESERVED_USERNAMES = new Set(["data"]);

const stripExtension = (value: string): string => value.replace(/\.[a-z0-9]+$/i, "");

const contentTypeFor = (kind: CatalogKind): string => (kind === "live" ? "video/mp2t" : "video/mp4");

/**
 * Ties a playback target and a connection row to the downstream socket. The
 * first call to `stop` releases both; later calls are no-ops.
 */
const bindLifetime = (context: GatewayContext, target: PlaybackTarget, connection: ActiveConnection) => {
  const controller = new AbortController();
  let stopped = false;
  const heartbeat = setInterval(() => {
    context.playback.touch(target);
    context.broker.touch(connection);
  }, HEARTBEAT_MS);
  heartbeat.unref();

  return {
    signal: controller.signal,
    stop: () => {
      if (stopped) {
        return;
      }
      stopped = true;
      clearInterval(heartbeat);
      controller.abort();
      context.playback.release(target);
      context.broker.release(connection);
    },
  };
};

type Lifetime = ReturnType<typeof bindLifetime>;

/**
 * Fetches the resolved link through the target's transport. Answers 502 and
 * stops the lifetime when the upstream refuses; returns `null` then.
 */
const openUpstream = async (
  context: GatewayContext,
  target: PlaybackTarget,
  lifetime: Lifetime,
  req: Request,
  res: Response,
): Promise<{ body: Readable; contentType: string | null } | null> => {
  try {
    const upstream = await context.fetchImpl(target.url, {
      headers: { "user-agent": MAG_USER_AGENT, accept: req.get("accept") ?? "*/*" },
      dispatcher: target.transport.dispatcher,
      signal: lifetime.signal,
    });
    if (!upstream.ok || !upstream.body) {
      console.warn(`[playback] ${target.entry.key} upstream answered ${upstream.status}`);
      lifetime.stop();
      res.status(502).type("text/plain").send("Upstream unavailable");
      return null;
    }
    return {
      body: Readable.fromWeb(upstream.body as unknown as NodeReadableStream),
      contentType: upstream.headers.get("content-type"),
    };
  } catch (error) {
    if (lifetime.signal.aborted) {
      return null;
    }
    lifetime.stop();
    console.warn(`[playback] ${target.entry.key} upstream failed`, describeError(error));
    if (!res.headersSent) {
      res.status(502).type("text/plain").send("Upstream unavailable");
    }
    return null;
  }
};

const proxyStream = async (
  context: GatewayContext,
  target: PlaybackTarget,
  connection: ActiveConnection,
  req: Request,
  res: Response,
): Promise<void> => {
  const lifetime = bindLifetime(context, target, connection);
  res.on("close", lifetime.stop);

  const upstream = await openUpstream(context, target, lifetime, req, res);
  if (!upstream) {
    return;
  }
  res.status(200).type(upstream.contentType ?? contentTypeFor(target.entry.kind));
  upstream.body.on("error", (error) => {
    if (!lifetime.signal.aborted) {
      console.warn(`[playback] ${target.entry.key} stream error`, describeError(error));
    }
    lifetime.stop();
    res.end();
  });
  upstream.body.pipe(res);
};

/** Same upstream fetch as proxy mode; ffmpeg only remuxes what arrives on stdin. */
const transcodeStream = async (
  context: GatewayContext,
  target: PlaybackTarget,
  connection: ActiveConnection,
  req: Request,
  res: Response,
): Promise<void> => {
  const lifetime = bindLifetime(context, target, connection);
  res.on("close", lifetime.stop);

  const upstream = await openUpstream(context, target, lifetime, req, res);
  if (!upstream) {
    return;
  }
  if (lifetime.signal.aborted) {
    upstream.body.destroy();
    return;
  }
  const transcoder = spawnTranscoder(context.ffmpegBin, upstream.body, (error) => {
    console.warn(`[playback] ${target.entry.key} transcoder failed`, describeError(error));
    lifetime.stop();
    if (!res.headersSent) {
      res.status(502).type("text/plain").send("Upstream unavailable");
      return;
    }
    res.end();
  });
  res.on("close", transcoder.kill);
  res.status(200).type("video/mp2t");
  transcoder.stdout.pipe(res);
};

export const makeStreamHandler =
  (context: GatewayContext, kind: CatalogKind) =>
  async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    const { username, password, id } = req.params;
    if (RESERVED_USERNAMES.has(username)) {
      res.status(403).end();
      return;
    }

    const auth = context.broker.authenticate(username, password);
    if (!auth.ok) {
      res.status(401).json(authFailure(auth.message));
      return;
    }

    const view = viewFor(context, auth.user);
    const entry = resolveStreamRef(view, stripExtension(id), kind);
    if (!entry) {
      res.status(404).json({ error: "stream_not_found" });
      return;
    }

    const ip = req.ip ?? "unknown";
    let connection: ActiveConnection;
    try {
      connection = context.broker.admit(auth.user, {
        streamId: entry.streamId,
        deviceId: deviceFingerprint(ip, req.get("user-agent") ?? ""),
        ip,
        label: entry.name,
      });
    } catch (error) {
      if (isGatewayError(error, "AdmissionDenied")) {
        console.warn(`[xc] ${error.message}`);
        res.status(429).json(authFailure(error.message));
        return;
      }
      next(error);
      return;
    }

    let target: PlaybackTarget;
    try {
      target = await context.playback.open(entry, (candidate) => canSee(view, candidate));
    } catch (error) {
      context.broker.release(connection);
      if (isGatewayError(error, "NoMacAvailable", "PlaybackUnavailable")) {
        console.warn(`[playback] ${entry.key}: ${describeError(error)}`);
        res.status(503).type("text/plain").send("No streams available");
        return;
      }
      if (isGatewayError(error, "StreamNotFound")) {
        res.status(404).json({ error: "stream_not_found" });
        return;
      }
      next(error);
      return;
    }

    switch (context.streamMode) {
      case "proxy":
        await proxyStream(context, target, connection, req, res);
        return;
      case "transcode":
        await transcodeStream(context, target, connection, req, res);
        return;
      default:
        // The player fetches the link itself; the row expires once it stops polling.
        context.playback.release(target);
        res.redirect(302, target.url);
    }
  };

export const makePlaybackRouter = (context: GatewayContext): Router => {
  const router = Router();
  const live = makeStreamHandler(context, "live");
  const movie = makeStreamHandler(context, "vod");

  router.get("/live/:username/:password/:id", live);
  router.get("/xc/:username/:password/:id", live);
  router.get("/movie/:username/:password/:id", movie);
  router.get("/:username/:password/:id", live);
  router.get("/:username/:password/", (req, res) => {
    const { username, password } = req.params;
    if (RESERVED_USERNAMES.has(username)) {
      res.status(403).end();
      return;
    }
    const query = new URLSearchParams({ username, password });
    res.redirect(302, `/player_api.php?${query.toString()}`);
  });
  return router;
};
