import { Router, type Request, type Response } from "express";
import rateLimit from "express-rate-limit";
import { buildXmltv } from "../lib/xmltv.js";
import {
  authFailure,
  buildM3u,
  categories,
  guideChannels,
  liveStreams,
  resolveStreamRef,
  seriesInfo,
  seriesList,
  shortEpg,
  simpleDataTable,
  userInfo,
  vodInfo,
  vodStreams,
} from "../lib/xtream.js";
import type { UserConfig } from "../lib/gatewayConfig.js";
import { baseUrlOf, readQuery, requestAddress, viewFor, type GatewayContext } from "./context.js";

const DEFAULT_SHORT_EPG_LIMIT = 4;

const xcLimiter = rateLimit({
  windowMs: 60 * 1000,
  max: 240,
  standardHeaders: true,
  legacyHeaders: false,
  keyGenerator: (req) => req.ip ?? "unknown",
  message: { message: "rate_limited" },
});

/**
 * Authenticates from the query string. On failure the XC negative shape has
 * already been written and `null` comes back.
 */
const authenticate = (context: GatewayContext, req: Request, res: Response): UserConfig | null => {
  const result = context.broker.authenticate(readQuery(req, "username"), readQuery(req, "password"));
  if (!result.ok) {
    console.warn(`[xc] auth rejected for ${readQuery(req, "username") ?? "?"}: ${result.message}`);
    res.json(authFailure(result.message));
    return null;
  }
  return result.user;
};

export const makePlayerApiHandler =
  (context: GatewayContext) =>
  (req: Request, res: Response): void => {
    const user = authenticate(context, req, res);
    if (!user) {
      return;
    }
    const view = viewFor(context, user);
    const action = readQuery(req, "action") ?? "";
    const categoryId = readQuery(req, "category_id") || undefined;

    switch (action) {
      case "get_live_categories":
        res.json(categories(view, "live"));
        return;
      case "get_live_streams":
        res.json(liveStreams(view, categoryId));
        return;
      case "get_vod_categories":
        res.json(categories(view, "vod"));
        return;
      case "get_vod_streams":
        res.json(vodStreams(view, categoryId));
        return;
      case "get_series_categories":
        res.json(categories(view, "series"));
        return;
      case "get_series":
        res.json(seriesList(view, categoryId));
        return;
      case "get_vod_info": {
        const entry = resolveStreamRef(view, readQuery(req, "vod_id") ?? "", "vod");
        if (!entry) {
          res.status(404).json({ error: "stream_not_found" });
          return;
        }
        res.json(vodInfo(entry));
        return;
      }
      case "get_series_info": {
        const entry = resolveStreamRef(view, readQuery(req, "series_id") ?? "", "series");
        if (!entry) {
          res.status(404).json({ error: "stream_not_found" });
          return;
        }
        res.json(seriesInfo(entry));
        return;
      }
      case "get_short_epg":
      case "get_simple_data_table": {
        const entry = resolveStreamRef(view, readQuery(req, "stream_id") ?? "", "live");
        if (!entry) {
          res.json({ epg_listings: [] });
          return;
        }
        const now = context.now();
        if (action === "get_simple_data_table") {
          res.json(simpleDataTable(view, entry, now));
          return;
        }
        const limit = Number.parseInt(readQuery(req, "limit") ?? "", 10);
        res.json(shortEpg(view, entry, Number.isFinite(limit) ? limit : DEFAULT_SHORT_EPG_LIMIT, now));
        return;
      }
      default:
        res.json(
          userInfo(user, context.broker.activeCount(user.username), requestAddress(req), context.now()),
        );
    }
  };

export const makePlaylistHandler =
  (context: GatewayContext) =>
  (req: Request, res: Response): void => {
    const user = authenticate(context, req, res);
    if (!user) {
      return;
    }
    const playlist = buildM3u(viewFor(context, user), {
      baseUrl: baseUrlOf(req),
      username: user.username,
      password: user.password,
      includeVod: readQuery(req, "type") === "m3u_plus",
    });
    res
      .status(200)
      .type("audio/x-mpegurl")
      .set("Content-Disposition", 'attachment; filename="playlist.m3u"')
      .send(playlist);
  };

export const makeXmltvHandler =
  (context: GatewayContext) =>
  (req: Request, res: Response): void => {
    const user = authenticate(context, req, res);
    if (!user) {
      return;
    }
    const view = viewFor(context, user);
    const xml = buildXmltv({
      channels: guideChannels(view),
      programmesFor: (epgId) => view.guide.programmes.get(epgId) ?? [],
      now: context.now(),
    });
    res.status(200).type("application/xml").send(xml);
  };

export const makeXtreamRouter = (context: GatewayContext): Router => {
  const router = Router();
  router.get("/player_api.php", xcLimiter, makePlayerApiHandler(context));
  router.get("/get.php", xcLimiter, makePlaylistHandler(context));
  router.get("/xmltv.php", xcLimiter, makeXmltvHandler(context));
  return router;
};
