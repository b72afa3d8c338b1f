import type { Request, Response } from "express";
import Joi from "joi";
import logger from "../utils/logger";
import type { HistoryService } from "../services/history.service";
import type { RetrievalService } from "../services/retrieval.service";

const testDownloadSchema = Joi.object<{ url: string }>({
  url: Joi.string()
    .uri({ scheme: ["http", "https"] })
    .required(),
});

export interface DownloadControllerDeps {
  devMode: boolean;
  history: HistoryService;
  retrieval: RetrievalService;
  gatewayHealth: () => Promise<boolean>;
}

export function createDownloadController(deps: DownloadControllerDeps) {
  async function getStats(req: Request, res: Response): Promise<void> {
    try {
      const stats = await deps.history.stats();
      res.status(200).json(stats);
    } catch (error) {
      logger.error("Error in getStats controller:", error);
      res.status(500).json({ error: "Internal server error" });
    }
  }

  async function testDownload(req: Request, res: Response): Promise<void> {
    if (!deps.devMode) {
      res.status(403).json({ error: "Test endpoint only available in DEV_MODE" });
      return;
    }

    try {
      const { error, value } = testDownloadSchema.validate(req.body || {});
      if (error) {
        res.status(400).json({ error: "Invalid request body", details: error.message });
        return;
      }

      const result = await deps.retrieval.fetch(value.url);
      if (result.ok) {
        res.status(200).json({ ok: true, media: result.media });
      } else {
        res.status(422).json({
          ok: false,
          error: { kind: result.error.kind, detail: result.error.detail },
        });
      }
    } catch (error) {
      logger.error("Error in testDownload controller:", error);
      res.status(500).json({ error: "Internal server error" });
    }
  }

  async function healthCheck(req: Request, res: Response): Promise<void> {
    const gateway = await deps.gatewayHealth();
    res.status(200).json({
      status: gateway ? "healthy" : "degraded",
      timestamp: new Date().toISOString(),
      gateway,
    });
  }

  return { getStats, testDownload, healthCheck };
}
