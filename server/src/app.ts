import express, { type Express } from "express";
import cors from "cors";
import type { Settings } from "./config/settings";
import { authMiddleware } from "./middleware/auth.middleware";
import { createDownloadController } from "./controllers/download.controller";
import { createWebhookController } from "./controllers/webhook.controller";
import type DownloadService from "./services/download.service";
import type { HistoryService } from "./services/history.service";
import type { MessagingGateway } from "./services/messaging.service";
import type { RetrievalService } from "./services/retrieval.service";
import { RecentMessageIds } from "./utils/message-cache";

export interface AppDeps {
  settings: Pick<Settings, "apiKey" | "verifyToken" | "devMode">;
  downloads: DownloadService;
  messaging: MessagingGateway;
  history: HistoryService;
  retrieval: RetrievalService;
  gatewayHealth: () => Promise<boolean>;
  recentMessages?: RecentMessageIds;
}

export function createApp(deps: AppDeps): Express {
  const app = express();

  const webhook = createWebhookController({
    verifyToken: deps.settings.verifyToken,
    downloads: deps.downloads,
    messaging: deps.messaging,
    recentMessages: deps.recentMessages ?? new RecentMessageIds(),
  });
  const downloads = createDownloadController({
    devMode: deps.settings.devMode,
    history: deps.history,
    retrieval: deps.retrieval,
    gatewayHealth: deps.gatewayHealth,
  });
  const requireApiKey = authMiddleware(deps.settings.apiKey);

  // Middleware
  app.use(cors());
  app.use(express.json());

  // Public routes
  app.get("/health", downloads.healthCheck);
  app.get("/webhook", webhook.verifyWebhook);
  app.post("/webhook", webhook.receiveWebhook);

  // Protected routes
  app.get("/stats", requireApiKey, downloads.getStats);
  app.post("/test-download", requireApiKey, downloads.testDownload);

  return app;
}
