import fs from "fs";
import path from "path";
import { v4 as uuidv4 } from "uuid";
import logger from "../utils/logger";
import { Mutex } from "../utils/concurrency";
import type { CloudStorage } from "./storage.service";
import type { RetentionEntry, RetentionTarget } from "../models/download.model";
import { errorCode, errorMessage } from "../models/errors";

export interface RetentionOptions {
  storage: CloudStorage;
  retentionWindowSeconds: number;
  sweepIntervalSeconds: number;
  /** Scanned by {@link RetentionService.adoptOrphans}. */
  downloadDir?: string;
}

/**
 * Process-wide registry of local files and remote objects that must be
 * deleted once their retention deadline passes.
 */
export class RetentionService {
  private entries = new Map<string, RetentionEntry>();
  private mutex = new Mutex();
  private timer: NodeJS.Timeout | null = null;
  private currentSweep: Promise<number> | null = null;
  private stopped = false;

  constructor(private readonly options: RetentionOptions) {}

  get size(): number {
    return this.entries.size;
  }

  list(): RetentionEntry[] {
    return [...this.entries.values()].map((entry) => ({ ...entry }));
  }

  register(target: RetentionTarget, registeredAt: Date = new Date()): RetentionEntry | null {
    if (this.stopped) {
      logger.warn("Retention tracker stopped, not registering artifact", { ...target });
      return null;
    }
    if (!target.localPath && !target.remoteRef) {
      return null;
    }

    const entry: RetentionEntry = {
      id: uuidv4(),
      localPath: target.localPath,
      remoteRef: target.remoteRef,
      registeredAt,
      deadline: new Date(registeredAt.getTime() + this.options.retentionWindowSeconds * 1000),
      state: "live",
      localDeleted: !target.localPath,
      remoteDeleted: !target.remoteRef,
    };
    this.entries.set(entry.id, entry);

    logger.debug("Registered artifact for retention", {
      id: entry.id,
      localPath: entry.localPath,
      remoteRef: entry.remoteRef,
      deadline: entry.deadline.toISOString(),
    });
    return entry;
  }

  /**
   * Deletes every live entry whose deadline is at or before `now` and
   * returns how many were fully removed. Calls are serialized.
   */
  sweep(now: Date = new Date()): Promise<number> {
    const run = this.mutex.runExclusive(() => this.sweepDue(now));
    this.currentSweep = run;
    return run;
  }

  private async sweepDue(now: Date): Promise<number> {
    const due = [...this.entries.values()].filter(
      (entry) => entry.state === "live" && entry.deadline.getTime() <= now.getTime(),
    );
    if (due.length === 0) return 0;

    logger.info(`Retention sweep: ${due.length} artifact(s) due`);
    let deleted = 0;

    for (const entry of due) {
      entry.state = "deleting";

      const [localOk, remoteOk] = await Promise.all([
        this.deleteLocal(entry),
        this.deleteRemote(entry),
      ]);
      entry.localDeleted = localOk;
      entry.remoteDeleted = remoteOk;

      if (localOk && remoteOk) {
        entry.state = "gone";
        this.entries.delete(entry.id);
        deleted++;
      } else {
        // retried on the next sweep
        entry.state = "live";
      }
    }

    logger.info(`Retention sweep complete`, { deleted, remaining: this.entries.size });
    return deleted;
  }

  private async deleteLocal(entry: RetentionEntry): Promise<boolean> {
    if (entry.localDeleted || !entry.localPath) return true;

    try {
      await fs.promises.unlink(entry.localPath);
      logger.info(`Deleted local file ${entry.localPath}`);
      return true;
    } catch (error) {
      if (errorCode(error) === "ENOENT") {
        logger.info(`Local file already gone: ${entry.localPath}`);
        return true;
      }
      logger.error(`Error deleting local file ${entry.localPath}: ${errorMessage(error)}`);
      return false;
    }
  }

  private async deleteRemote(entry: RetentionEntry): Promise<boolean> {
    if (entry.remoteDeleted || !entry.remoteRef) return true;

    try {
      const result = await this.options.storage.delete(entry.remoteRef);
      if (result === "not_found") {
        logger.info(`Remote object already gone: ${entry.remoteRef}`);
      }
      return true;
    } catch (error) {
      logger.error(`Error deleting remote object ${entry.remoteRef}: ${errorMessage(error)}`);
      return false;
    }
  }

  /**
   * Registers leftovers of a previous process: files in the download
   * directory and objects under the storage prefix, each aged from its
   * modification time.
   */
  async adoptOrphans(now: Date = new Date()): Promise<number> {
    const known = new Set<string>();
    for (const entry of this.entries.values()) {
      if (entry.localPath) known.add(entry.localPath);
      if (entry.remoteRef) known.add(entry.remoteRef);
    }

    let adopted = 0;
    const { downloadDir } = this.options;

    if (downloadDir) {
      let names: string[] = [];
      try {
        names = await fs.promises.readdir(downloadDir);
      } catch (error) {
        if (errorCode(error) !== "ENOENT") {
          logger.error(`Error scanning ${downloadDir}: ${errorMessage(error)}`);
        }
      }

      for (const name of names) {
        const localPath = path.join(downloadDir, name);
        if (known.has(localPath)) continue;
        try {
          const stats = await fs.promises.stat(localPath);
          if (!stats.isFile()) continue;
          if (this.register({ localPath }, minDate(stats.mtime, now))) adopted++;
        } catch (error) {
          logger.warn(`Could not stat ${localPath}: ${errorMessage(error)}`);
        }
      }
    }

    try {
      const objects = await this.options.storage.listObjects();
      for (const object of objects) {
        if (known.has(object.remoteRef)) continue;
        if (this.register({ remoteRef: object.remoteRef }, minDate(object.lastModified, now))) {
          adopted++;
        }
      }
    } catch (error) {
      logger.error(`Error listing stored objects: ${errorMessage(error)}`);
    }

    if (adopted > 0) {
      logger.info(`Adopted ${adopted} orphaned artifact(s) for retention`);
    }
    return adopted;
  }

  start(): void {
    if (this.timer || this.stopped) return;

    const intervalMs = this.options.sweepIntervalSeconds * 1000;
    this.timer = setInterval(() => {
      this.sweep().catch((error) => {
        logger.error("Retention sweep failed:", error);
      });
    }, intervalMs);
    logger.info(`Retention sweep scheduled every ${this.options.sweepIntervalSeconds}s`);
  }

  /** Refuses new registrations and waits for a running sweep to finish. */
  async stop(): Promise<void> {
    this.stopped = true;
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    if (this.currentSweep) {
      await this.currentSweep.catch((error) => {
        logger.error("Retention sweep failed during shutdown:", error);
      });
    }
    logger.info("Retention tracker stopped", { pending: this.entries.size });
  }
}

function minDate(a: Date, b: Date): Date {
  return a.getTime() <= b.getTime() ? a : b;
}
