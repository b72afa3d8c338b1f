import fs from "fs";
import http from "http";
import os from "os";
import path from "path";
import type { CloudStorage, DeleteResult } from "../src/services/storage.service";
import type { MessagingGateway } from "../src/services/messaging.service";
import type { DownloadStore } from "../src/services/db.service";
import type { BackendDownload, RetrievalBackend } from "../src/services/ytdlp.service";
import type {
  DownloadRecord,
  DownloadStats,
  OutboundPayload,
  StoredObject,
  UploadedArtifact,
} from "../src/models/download.model";
import { DeliveryError } from "../src/models/errors";

export const MB = 1024 * 1024;

export function makeTempDir(prefix = "media-relay-test-"): Promise<string> {
  return fs.promises.mkdtemp(path.join(os.tmpdir(), prefix));
}

/** Creates a sparse file of exactly `size` bytes. */
export async function writeSizedFile(filePath: string, size: number): Promise<string> {
  await fs.promises.writeFile(filePath, "");
  await fs.promises.truncate(filePath, size);
  return filePath;
}

export async function listen(server: http.Server): Promise<string> {
  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", () => resolve()));
  const address = server.address();
  if (address === null || typeof address === "string") {
    throw new Error("Server has no TCP address");
  }
  return `http://127.0.0.1:${address.port}`;
}

export function close(server: http.Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}

export class FakeBackend implements RetrievalBackend {
  calls: string[] = [];

  constructor(private readonly behave: (url: string, call: number) => Promise<BackendDownload>) {}

  async download(url: string): Promise<BackendDownload> {
    this.calls.push(url);
    return this.behave(url, this.calls.length);
  }
}

export class FakeStorage implements CloudStorage {
  configured = true;
  uploadError: Error | null = null;
  deleteError: Error | null = null;
  uploads: string[] = [];
  deleted: string[] = [];
  missing = new Set<string>();
  objects: StoredObject[] = [];

  isConfigured(): boolean {
    return this.configured;
  }

  async upload(localPath: string): Promise<UploadedArtifact> {
    this.uploads.push(localPath);
    if (this.uploadError) throw this.uploadError;
    const remoteRef = `wa-downloads/${path.basename(localPath)}`;
    return {
      remoteRef,
      url: `https://cloud.test/${remoteRef}`,
      localPath,
      uploadedAt: new Date(),
    };
  }

  async delete(remoteRef: string): Promise<DeleteResult> {
    if (this.deleteError) throw this.deleteError;
    this.deleted.push(remoteRef);
    return this.missing.has(remoteRef) ? "not_found" : "ok";
  }

  async listObjects(): Promise<StoredObject[]> {
    return this.objects;
  }
}

export interface SentMessage {
  recipient: string;
  payload: OutboundPayload;
}

/** Gateway that keeps every message it accepted. */
export class RecordingGateway implements MessagingGateway {
  sent: SentMessage[] = [];
  rejectKinds = new Set<OutboundPayload["kind"]>();

  async send(recipient: string, payload: OutboundPayload): Promise<void> {
    if (this.rejectKinds.has(payload.kind)) {
      throw new DeliveryError("transport_rejected", "Gateway answered 500", 500);
    }
    this.sent.push({ recipient, payload });
  }

  kindsFor(recipient: string): OutboundPayload["kind"][] {
    return this.sent.filter((m) => m.recipient === recipient).map((m) => m.payload.kind);
  }
}

export class MemoryStore implements DownloadStore {
  records: DownloadRecord[] = [];
  users = new Set<string>();
  attempts = 0;
  failing = false;
  failingUsers = false;

  async insertUser(sender: string): Promise<boolean> {
    this.attempts++;
    if (this.failing || this.failingUsers) throw new Error("database is locked");
    const isNew = !this.users.has(sender);
    this.users.add(sender);
    return isNew;
  }

  async insertDownloadRecord(record: DownloadRecord): Promise<number> {
    if (this.failing) throw new Error("database is locked");
    this.records.push(record);
    return this.records.length;
  }

  async queryStats(): Promise<DownloadStats> {
    const success = this.records.filter((r) => r.status === "success").length;
    return {
      total: this.records.length,
      success,
      failed: this.records.length - success,
      byDay: {},
      totalUsers: this.users.size,
      totalSizeBytes: 0,
    };
  }
}
