import { Router, type Request, type Response } from "express";
import { LINEUP_STATUS, buildLineup, discoverDocument } from "../lib/hdhomerun.js";
import type { UserConfig } from "../lib/gatewayConfig.js";
import { baseUrlOf, viewFor, type GatewayContext } from "./context.js";

/** The lineup user, or `null` after answering 404 when the tuner is off. */
const lineupUser = (context: GatewayContext, res: Response): UserConfig | null => {
  const username = context.hdhr?.username;
  const user = context.config().users.find((candidate) => candidate.username === username);
  if (!user || !user.enabled) {
    res.status(404).end();
    return null;
  }
  return user;
};

/**
 * HDHomeRun emulation so DVR software (Plex, Jellyfin, Emby) can add the
 * gateway as a network tuner. Stream URLs carry the lineup user's XC
 * credentials and go through the normal playback routes.
 */
export const makeHdhomerunRouter = (context: GatewayContext): Router => {
  const router = Router();

  router.get("/discover.json", (req, res) => {
    const user = lineupUser(context, res);
    if (user && context.hdhr) {
      res.json(discoverDocument(context.hdhr, baseUrlOf(req)));
    }
  });

  router.get("/lineup_status.json", (_req, res) => {
    if (lineupUser(context, res)) {
      res.json(LINEUP_STATUS);
    }
  });

  const lineup = (req: Request, res: Response) => {
    const user = lineupUser(context, res);
    if (!user) {
      return;
    }
    const entries = buildLineup(viewFor(context, user), baseUrlOf(req));
    console.log(`[hdhr] lineup delivered (${entries.length} channels)`);
    res.json(entries);
  };
  router.get("/lineup.json", lineup);
  router.post("/lineup.post", lineup);

  return router;
};
