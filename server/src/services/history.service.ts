import logger from "../utils/logger";
import type { DownloadStore } from "./db.service";
import type { DownloadRecord, DownloadStats } from "../models/download.model";
import { PersistenceError, errorMessage } from "../models/errors";

/**
 * Durable log of download attempts. Bookkeeping failures are logged and
 * never surface to the caller.
 */
export class HistoryService {
  constructor(private readonly store: DownloadStore) {}

  /**
   * Resolves once the record is written, or once the failure is logged.
   * The user row is independent: failing to upsert it does not stop the record.
   */
  async record(record: DownloadRecord): Promise<boolean> {
    try {
      await this.store.insertUser(record.sender, record.createdAt);
    } catch (error) {
      logger.warn(`Could not upsert user ${record.sender}: ${errorMessage(error)}`);
    }

    try {
      await this.store.insertDownloadRecord(record);
      logger.info("Download recorded", {
        sender: record.sender,
        url: record.url,
        status: record.status,
        size: record.size,
      });
      return true;
    } catch (error) {
      const failure = new PersistenceError(
        `Could not record download: ${errorMessage(error)}`,
        error,
      );
      logger.error(failure.message, {
        kind: failure.kind,
        sender: record.sender,
        url: record.url,
        status: record.status,
      });
      return false;
    }
  }

  stats(): Promise<DownloadStats> {
    return this.store.queryStats();
  }
}
