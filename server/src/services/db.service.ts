import sqlite3 from "sqlite3";
import logger from "../utils/logger";
import type { DownloadRecord, DownloadStats } from "../models/download.model";

export interface DownloadStore {
  /** Resolves true when the sender was not known before. */
  insertUser(sender: string, createdAt: Date): Promise<boolean>;
  insertDownloadRecord(record: DownloadRecord): Promise<number>;
  queryStats(): Promise<DownloadStats>;
}

interface TotalsRow {
  total: number;
  success: number | null;
  total_size: number | null;
}

interface DayRow {
  day: string;
  count: number;
}

interface CountRow {
  count: number;
}

class DBService implements DownloadStore {
  private db: sqlite3.Database | null = null;

  constructor(private readonly dbPath: string) {}

  async init(): Promise<void> {
    this.db = await new Promise<sqlite3.Database>((resolve, reject) => {
      const db = new sqlite3.Database(this.dbPath, (err) => {
        if (err) {
          logger.error("Could not connect to database", err);
          reject(err);
        } else {
          resolve(db);
        }
      });
    });
    logger.info(`Connected to database at ${this.dbPath}`);

    await this.run(`
      CREATE TABLE IF NOT EXISTS users (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        sender TEXT UNIQUE NOT NULL,
        created_at TEXT NOT NULL
      )
    `);
    await this.run(`
      CREATE TABLE IF NOT EXISTS downloads (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        sender TEXT NOT NULL,
        url TEXT NOT NULL,
        title TEXT,
        size_bytes INTEGER,
        duration_seconds REAL,
        status TEXT NOT NULL,
        created_at TEXT NOT NULL
      )
    `);
    await this.run(`CREATE INDEX IF NOT EXISTS idx_downloads_sender ON downloads(sender)`);
    await this.run(`CREATE INDEX IF NOT EXISTS idx_downloads_created ON downloads(created_at)`);
  }

  async close(): Promise<void> {
    const db = this.db;
    if (!db) return;
    this.db = null;
    await new Promise<void>((resolve, reject) => {
      db.close((err) => (err ? reject(err) : resolve()));
    });
  }

  async insertUser(sender: string, createdAt: Date): Promise<boolean> {
    const changes = await this.run(
      "INSERT OR IGNORE INTO users (sender, created_at) VALUES (?, ?)",
      [sender, createdAt.toISOString()],
    );
    if (changes.changes > 0) {
      logger.info("User created", { sender });
      return true;
    }
    return false;
  }

  async insertDownloadRecord(record: DownloadRecord): Promise<number> {
    const result = await this.run(
      `
        INSERT INTO downloads (
          sender, url, title, size_bytes, duration_seconds, status, created_at
        ) VALUES (?, ?, ?, ?, ?, ?, ?)
      `,
      [
        record.sender,
        record.url,
        record.title,
        record.size,
        record.duration,
        record.status,
        record.createdAt.toISOString(),
      ],
    );
    return result.lastID;
  }

  async queryStats(): Promise<DownloadStats> {
    const totals = await this.get<TotalsRow>(`
      SELECT
        COUNT(*) AS total,
        SUM(CASE WHEN status = 'success' THEN 1 ELSE 0 END) AS success,
        SUM(CASE WHEN status = 'success' THEN size_bytes ELSE 0 END) AS total_size
      FROM downloads
    `);
    const users = await this.get<CountRow>("SELECT COUNT(*) AS count FROM users");
    const days = await this.all<DayRow>(`
      SELECT substr(created_at, 1, 10) AS day, COUNT(*) AS count
      FROM downloads
      GROUP BY day
      ORDER BY day
    `);

    const total = totals?.total ?? 0;
    const success = totals?.success ?? 0;
    const byDay: Record<string, number> = {};
    for (const row of days) {
      byDay[row.day] = row.count;
    }

    return {
      total,
      success,
      failed: total - success,
      byDay,
      totalUsers: users?.count ?? 0,
      totalSizeBytes: totals?.total_size ?? 0,
    };
  }

  private connection(): sqlite3.Database {
    if (!this.db) {
      throw new Error("DBService not initialized");
    }
    return this.db;
  }

  private run(sql: string, params: unknown[] = []): Promise<sqlite3.RunResult> {
    const db = this.connection();
    return new Promise((resolve, reject) => {
      db.run(sql, params, function (this: sqlite3.RunResult, err: Error | null) {
        if (err) reject(err);
        else resolve(this);
      });
    });
  }

  private get<T>(sql: string, params: unknown[] = []): Promise<T | undefined> {
    const db = this.connection();
    return new Promise((resolve, reject) => {
      db.get<T>(sql, params, (err, row) => {
        if (err) reject(err);
        else resolve(row);
      });
    });
  }

  private all<T>(sql: string, params: unknown[] = []): Promise<T[]> {
    const db = this.connection();
    return new Promise((resolve, reject) => {
      db.all<T>(sql, params, (err, rows) => {
        if (err) reject(err);
        else resolve(rows);
      });
    });
  }
}

export default DBService;
