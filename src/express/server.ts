import express from "express";
import cors from "cors";
import { describeError } from "../lib/errors.js";
import type { GatewayContext } from "../routes/context.js";
import { makeHdhomerunRouter } from "../routes/hdhomerun.js";
import { makeOperationsRouter } from "../routes/operations.js";
import { makePlaybackRouter } from "../routes/playback.js";
import { makeXtreamRouter } from "../routes/xtream.js";

export interface GatewayAppOptions {
  corsOrigin?: string;
}

export const createGatewayApp = (
  context: GatewayContext,
  options: GatewayAppOptions = {},
): express.Express => {
  const app = express();
  app.set("trust proxy", 1);

  app.use(
    cors({
      origin: options.corsOrigin ?? "*",
      methods: ["GET", "POST", "PATCH", "DELETE"],
    }),
  );
  app.use(express.json());

  // Operations first: `/api/refresh/status` would otherwise look like `/:u/:p/:id`.
  app.use("/api", makeOperationsRouter(context));
  app.use(makeHdhomerunRouter(context));
  app.use(makeXtreamRouter(context));
  app.use(makePlaybackRouter(context));

  app.use(
    (
      error: unknown,
      _req: express.Request,
      res: express.Response,
      _next: express.NextFunction,
    ) => {
      console.error("[express]", describeError(error));
      if (res.headersSent) {
        res.end();
        return;
      }
      res.status(500).json({ error: "server_error" });
    },
  );

  return app;
};
