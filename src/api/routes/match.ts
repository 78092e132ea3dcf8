import { Router, type NextFunction, type Request, type Response } from "express";
import { z } from "zod";
import type { Matcher, MatchReport } from "../../matching/engine.js";

const urlBody = z.object({ url: z.string().trim().min(1) });

const optionalTrimmed = z.string().trim().transform((val) => (val === "" ? undefined : val)).optional();
const attributesBody = z.object({
  projectName: z.string().trim().default(""),
  areaName: z.string().trim().default(""),
  bedrooms: z.union([z.number().int().min(0), z.string()]).nullable().optional(),
  sizeSqft: z.union([z.number().positive(), z.string()]).nullable().optional(),
  propertyType: optionalTrimmed,
  masterProject: optionalTrimmed,
  sourceUrl: z.string().trim().default(""),
}).refine((v) => v.projectName !== "" || v.areaName !== "", {
  message: "projectName or areaName is required",
});

/** JSON shape returned to clients: records flattened to their register columns. */
export function serializeReport(report: MatchReport) {
  return {
    status: report.status,
    matches: report.matches.map((m) => ({
      score: Math.round(m.score * 10000) / 10000,
      matchedFields: m.matchedFields,
      rowId: m.record.rowId,
      record: m.record.fields,
    })),
    listing: report.listing,
    candidates: report.candidates,
    stage: report.stage,
    snapshot: {
      snapshotId: report.snapshot.snapshotId,
      rowCount: report.snapshot.rowCount,
      activatedAt: report.snapshot.activatedAt.toISOString(),
    },
  };
}

export function matchRouter(matcher: Matcher): Router {
  const router = Router();

  router.post("/match", async (req: Request, res: Response, next: NextFunction) => {
    const parsed = urlBody.safeParse(req.body || {});
    if (!parsed.success) {
      return res.status(400).json({ error: "invalid_request", issues: parsed.error.issues });
    }
    try {
      const report = await matcher.findMatch(parsed.data.url);
      res.json(serializeReport(report));
    } catch (err) {
      next(err);
    }
  });

  router.post("/match/attributes", async (req: Request, res: Response, next: NextFunction) => {
    const parsed = attributesBody.safeParse(req.body || {});
    if (!parsed.success) {
      return res.status(400).json({ error: "invalid_request", issues: parsed.error.issues });
    }
    try {
      const report = await matcher.matchListing(parsed.data);
      res.json(serializeReport(report));
    } catch (err) {
      next(err);
    }
  });

  return router;
}
