import { Router } from "express";
import type { DatasetStore } from "../../dataset/store.js";

export function datasetRouter(store: DatasetStore): Router {
  const router = Router();

  router.get("/dataset", async (_req, res, next) => {
    try {
      const snapshot = await store.acquire();
      const meta = snapshot.metadata();
      res.json({
        snapshotId: meta.snapshotId,
        rowCount: meta.rowCount,
        columnCount: meta.columnCount,
        columns: meta.columns,
        source: meta.source,
        activatedAt: meta.activatedAt.toISOString(),
      });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
