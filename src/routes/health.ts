import type { Request, Response } from "express";
import type { GatewayContext } from "./context.js";

export const makeHealthHandler =
  (context: GatewayContext) =>
  (_req: Request, res: Response): void => {
    const snapshot = context.catalogStore.snapshot();
    res.json({
      ok: true,
      ts: new Date(context.now()).toISOString(),
      catalogVersion: snapshot.version,
      refreshing: context.refresh.isRunning(),
      activeLeases: context.pool.activeLeases(),
    });
  };
