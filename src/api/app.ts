import express, { type NextFunction, type Request, type Response } from "express";
import type { DatasetStore } from "../dataset/store.js";
import { httpStatusFor } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import type { Matcher } from "../matching/engine.js";
import { datasetRouter } from "./routes/dataset.js";
import { matchRouter } from "./routes/match.js";

export function createApp(deps: { matcher: Matcher; store: DatasetStore }) {
  const app = express();
  app.use(express.json({ limit: "1mb" }));

  app.get("/health", (_req, res) => res.json({ ok: true }));
  app.use("/api", matchRouter(deps.matcher));
  app.use("/api", datasetRouter(deps.store));

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const status = httpStatusFor(err);
    const message = err instanceof Error ? err.message : String(err);
    if (status >= 500) logger.error({ err, path: req.path }, "Request failed");
    else logger.warn({ path: req.path, error: message }, "Request rejected");
    res.status(status).json({ error: err instanceof Error ? err.name : "Error", message });
  });

  return app;
}
