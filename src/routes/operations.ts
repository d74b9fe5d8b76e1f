import { Router, type NextFunction, type Request, type Response } from "express";
import rateLimit from "express-rate-limit";
import { Readable } from "node:stream";
import type { ReadableStream as NodeReadableStream } from "node:stream/web";
import { findDuplicateEntries, type CatalogEntry, type CatalogOverride } from "../lib/catalogMerge.js";
import { isCatalogKind, parseCatalogOverride } from "../lib/catalogStore.js";
import { describeError, isGatewayError } from "../lib/errors.js";
import { normalizeMac } from "../lib/gatewayConfig.js";
import type { PlaybackTarget } from "../lib/playback.js";
import { runStreamCheck, type StreamCheckResult } from "../lib/streamCheck.js";
import { MAG_USER_AGENT } from "../portalSession.js";
import { readQuery, type GatewayContext } from "./context.js";
import { makeHealthHandler } from "./health.js";

const refreshLimiter = rateLimit({
  windowMs: 60 * 1000,
  max: 6,
  standardHeaders: true,
  legacyHeaders: false,
  keyGenerator: (req) => req.ip ?? "unknown",
  message: { message: "rate_limited" },
});

const wantsWait = (req: Request): boolean => {
  const value = readQuery(req, "wait");
  return value === "1" || value === "true";
};

export const makeRefreshHandler =
  (context: GatewayContext) =>
  async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    const alreadyRunning = context.refresh.isRunning();
    const cycle = context.refresh.run("manual");

    if (wantsWait(req)) {
      try {
        res.json(await cycle);
      } catch (error) {
        next(error);
      }
      return;
    }

    cycle.catch((error: unknown) => {
      console.error("[refresh] manual cycle failed", describeError(error));
    });
    res.status(202).json({ started: !alreadyRunning, running: true });
  };

export const makeReloadHandler =
  (context: GatewayContext) =>
  async (_req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const config = await context.reload();
      res.json({ portals: config.portals.length, users: config.users.length });
    } catch (error) {
      if (isGatewayError(error, "ConfigurationError")) {
        res.status(400).json({ error: error.code, message: error.message });
        return;
      }
      next(error);
    }
  };

const findEntry = (context: GatewayContext, ref: string): CatalogEntry | undefined => {
  const snapshot = context.catalogStore.snapshot();
  return /^\d+$/.test(ref) ? snapshot.byStreamId.get(Number.parseInt(ref, 10)) : snapshot.byKey.get(ref);
};

/** Pipes the resolved link, fetched through the target's transport, into ffprobe. */
const checkTarget = async (context: GatewayContext, target: PlaybackTarget): Promise<StreamCheckResult> => {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), context.streamCheckTimeoutMs);
  try {
    const upstream = await context.fetchImpl(target.url, {
      headers: { "user-agent": MAG_USER_AGENT },
      dispatcher: target.transport.dispatcher,
      signal: controller.signal,
    });
    if (!upstream.ok || !upstream.body) {
      return { ok: false, formatName: "", streams: [], error: `upstream answered ${upstream.status}` };
    }
    const body = Readable.fromWeb(upstream.body as unknown as NodeReadableStream);
    return await runStreamCheck(context.ffprobeBin, body, context.streamCheckTimeoutMs);
  } catch (error) {
    return { ok: false, formatName: "", streams: [], error: describeError(error) };
  } finally {
    clearTimeout(timer);
    controller.abort();
  }
};

export const makeStreamCheckHandler =
  (context: GatewayContext) =>
  async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    const entry = findEntry(context, req.params.ref);
    if (!entry) {
      res.status(404).json({ error: "stream_not_found" });
      return;
    }

    let target: PlaybackTarget;
    try {
      // Check this entry only, never a fallback channel.
      target = await context.playback.open(entry, () => false);
    } catch (error) {
      if (isGatewayError(error, "StreamNotFound")) {
        res.status(404).json({ error: "stream_not_found" });
        return;
      }
      if (isGatewayError(error, "NoMacAvailable", "PlaybackUnavailable")) {
        res.status(503).json({ error: error.code, message: error.message });
        return;
      }
      next(error);
      return;
    }

    try {
      const result = await checkTarget(context, target);
      console.log(`[stream-check] ${entry.key} via ${target.lease.mac}: ${result.ok ? "ok" : result.error ?? "failed"}`);
      res.json({ key: entry.key, portalId: target.portal.id, mac: target.lease.mac, ...result });
    } finally {
      context.playback.release(target);
    }
  };

export const makeOperationsRouter = (context: GatewayContext): Router => {
  const router = Router();

  router.get("/health", makeHealthHandler(context));

  router.get("/refresh/status", (_req, res) => {
    const snapshot = context.catalogStore.snapshot();
    res.json({
      ...context.refresh.tracker.snapshot(),
      catalogVersion: snapshot.version,
      portals: snapshot.portals,
    });
  });
  router.post("/refresh", refreshLimiter, makeRefreshHandler(context));

  router.get("/macs", (req, res) => {
    res.json({ macs: context.pool.describe(readQuery(req, "portal")) });
  });
  router.post("/macs/:portalId/:mac/reactivate", (req, res) => {
    let mac: string;
    try {
      mac = normalizeMac(req.params.mac);
    } catch {
      res.status(400).json({ error: "invalid_mac" });
      return;
    }
    if (!context.pool.reactivate(req.params.portalId, mac)) {
      res.status(404).json({ error: "mac_not_found" });
      return;
    }
    res.json({ reactivated: true });
  });

  router.get("/connections", (_req, res) => {
    res.json({ connections: context.broker.list() });
  });
  router.delete("/connections/:username", (req, res) => {
    res.json({ dropped: context.broker.kick(req.params.username) });
  });

  router.post("/catalog/live/deactivate-duplicates", (_req, res) => {
    const enabled = new Set(
      context
        .config()
        .portals.filter((portal) => portal.enabled)
        .map((portal) => portal.id),
    );
    const keys = findDuplicateEntries(context.catalogStore.snapshot(), (portalId) => enabled.has(portalId));
    const snapshot =
      keys.length > 0
        ? context.catalogStore.applyOverrides(
            "live",
            keys.map((key): [string, CatalogOverride] => [key, { enabled: false }]),
          )
        : context.catalogStore.snapshot();
    console.log(`[catalog] deactivated ${keys.length} duplicate channel(s)`);
    res.json({ deactivated: keys.length, keys, catalogVersion: snapshot.version });
  });

  router.get("/streams/:ref/check", makeStreamCheckHandler(context));

  router.patch("/catalog/:kind/:key", (req, res) => {
    const { kind, key } = req.params;
    const override = parseCatalogOverride(req.body);
    if (!isCatalogKind(kind) || !override) {
      res.status(400).json({ error: "invalid_override" });
      return;
    }
    const snapshot = context.catalogStore.applyOverride(kind, key, override);
    res.json({ catalogVersion: snapshot.version, entry: snapshot.byKey.get(key) ?? null });
  });
  router.delete("/catalog/:kind/:key", (req, res) => {
    const { kind, key } = req.params;
    if (!isCatalogKind(kind)) {
      res.status(400).json({ error: "invalid_override" });
      return;
    }
    const snapshot = context.catalogStore.applyOverride(kind, key, null);
    res.json({ catalogVersion: snapshot.version });
  });

  router.post("/admin/reload", makeReloadHandler(context));

  return router;
};
