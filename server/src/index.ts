import dotenv from "dotenv";
import type { Server } from "http";
import { createApp } from "./app";
import { loadSettings } from "./config/settings";
import DBService from "./services/db.service";
import DownloadService, { type Preparation } from "./services/download.service";
import { DeliveryRouter } from "./services/delivery.service";
import { HistoryService } from "./services/history.service";
import { WahaService } from "./services/messaging.service";
import { RetentionService } from "./services/retention.service";
import { RetrievalService } from "./services/retrieval.service";
import { StorageService } from "./services/storage.service";
import { YtDlpService } from "./services/ytdlp.service";
import { InFlightRegistry, Semaphore } from "./utils/concurrency";
import { setupCookies } from "./utils/cookies";
import logger from "./utils/logger";

// Load environment variables
dotenv.config();

const RETRIEVAL_TIMEOUT_MS = 10 * 60 * 1000;

async function startServer() {
  const settings = loadSettings();
  logger.level = settings.logLevel;

  // Initialize services
  logger.info("Initializing services...");

  const db = new DBService(settings.dbPath);
  await db.init();

  const storage = new StorageService(settings.storage, settings.retentionWindowSeconds);
  if (storage.isConfigured()) {
    await storage.ensureBucket();
  }

  const cookies = await setupCookies(settings.cookies);
  const retrieval = new RetrievalService(
    new YtDlpService({
      binary: settings.ytdlpPath,
      downloadDir: settings.downloadDir,
      cookies,
      timeoutMs: RETRIEVAL_TIMEOUT_MS,
    }),
  );
  const router = new DeliveryRouter({
    inlineThresholdBytes: settings.inlineThresholdBytes,
    retentionWindowSeconds: settings.retentionWindowSeconds,
    cloudAvailable: () => storage.isConfigured(),
  });
  const messaging = new WahaService({
    baseUrl: settings.waha.baseUrl,
    sessionName: settings.waha.sessionName,
    apiKey: settings.waha.apiKey,
  });
  const history = new HistoryService(db);
  const retention = new RetentionService({
    storage,
    retentionWindowSeconds: settings.retentionWindowSeconds,
    sweepIntervalSeconds: settings.sweepIntervalSeconds,
    downloadDir: settings.downloadDir,
  });

  const downloads = new DownloadService({
    retrieval,
    router,
    storage,
    messaging,
    history,
    retention,
    inFlight: new InFlightRegistry<string, Preparation>(),
    limiter: new Semaphore(settings.maxConcurrentRetrievals),
    retry: {
      maxAttempts: settings.retrievalMaxAttempts,
      backoffMs: settings.retrievalBackoffMs,
    },
  });

  await retention.adoptOrphans();
  retention.start();

  const app = createApp({
    settings,
    downloads,
    messaging,
    history,
    retrieval,
    gatewayHealth: () => messaging.healthCheck(),
  });

  // Start HTTP server
  const server = await new Promise<Server>((resolve) => {
    const listening = app.listen(settings.port, "0.0.0.0", () => resolve(listening));
  });
  logger.info(`Server listening on port ${settings.port}`);
  logger.info(`Dev mode: ${settings.devMode}`);
  logger.info("Server ready to accept requests");

  // Graceful shutdown
  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info(`${signal} received, shutting down gracefully...`);

    await new Promise<void>((resolve) => {
      server.close((err) => {
        if (err) logger.error("Error closing HTTP server:", err);
        resolve();
      });
    });
    if (downloads.inFlightCount > 0) {
      logger.info(`Waiting for ${downloads.inFlightCount} download request(s) to finish...`);
    }
    await downloads.drain();
    await retention.stop();
    await db.close();
    process.exit(0);
  };

  for (const signal of ["SIGTERM", "SIGINT"] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((error) => {
        logger.error("Error during shutdown:", error);
        process.exit(1);
      });
    });
  }
}

startServer().catch((error) => {
  logger.error("Failed to start server:", error);
  process.exit(1);
});
