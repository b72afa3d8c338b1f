import path from "path";
import { Client } from "minio";
import { S3Client, GetObjectCommand } from "@aws-sdk/client-s3";
import { getSignedUrl } from "@aws-sdk/s3-request-presigner";
import { v4 as uuidv4 } from "uuid";
import logger from "../utils/logger";
import { sanitizeFilename } from "../utils/sanitizer";
import type { StorageSettings } from "../config/settings";
import type { StoredObject, UploadedArtifact } from "../models/download.model";
import { UploadError, errorCode, errorMessage } from "../models/errors";

export type DeleteResult = "ok" | "not_found";

export interface CloudStorage {
  isConfigured(): boolean;
  upload(localPath: string): Promise<UploadedArtifact>;
  delete(remoteRef: string): Promise<DeleteResult>;
  listObjects(): Promise<StoredObject[]>;
}

// S3 caps presigned URLs at seven days
export const MAX_PRESIGN_SECONDS = 7 * 24 * 3600;

/** Presigned links cannot outlive seven days, whatever the retention window. */
export function effectiveLinkExpirySeconds(requestedSeconds: number): number {
  return Math.min(requestedSeconds, MAX_PRESIGN_SECONDS);
}

const NETWORK_CODES = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "ENOTFOUND",
  "ETIMEDOUT",
  "EAI_AGAIN",
  "EPIPE",
  "RequestTimeout",
]);

const QUOTA_CODES = new Set([
  "QuotaExceeded",
  "EntityTooLarge",
  "XMinioStorageFull",
  "XMinioAdminBucketQuotaExceeded",
]);

export function classifyUploadError(error: unknown): UploadError {
  if (error instanceof UploadError) return error;

  const code = errorCode(error);
  const message = errorMessage(error);
  if (code && QUOTA_CODES.has(code)) {
    return new UploadError("quota", message);
  }
  if (code && NETWORK_CODES.has(code)) {
    return new UploadError("network_error", message);
  }
  return new UploadError("unknown", message);
}

function isNotFound(error: unknown): boolean {
  const code = errorCode(error);
  return code === "NotFound" || code === "NoSuchKey";
}

const CONTENT_TYPES: Record<string, string> = {
  ".mp4": "video/mp4",
  ".webm": "video/webm",
  ".mkv": "video/x-matroska",
  ".mov": "video/quicktime",
  ".m4a": "audio/mp4",
  ".mp3": "audio/mpeg",
};

export function contentTypeFor(filePath: string): string {
  return CONTENT_TYPES[path.extname(filePath).toLowerCase()] ?? "application/octet-stream";
}

export class StorageService implements CloudStorage {
  private client: Client;
  private externalS3Client: S3Client;
  private bucket: string;
  private prefix: string;
  private linkExpirySeconds: number;
  private configured: boolean;

  constructor(settings: StorageSettings, linkExpirySeconds: number) {
    const [host, portStr] = settings.endpoint.split(":");
    const port = parseInt(portStr || (settings.useSSL ? "443" : "9000"), 10);

    this.configured = Boolean(settings.accessKey && settings.secretKey);

    // Internal client for server-to-MinIO operations
    this.client = new Client({
      endPoint: host,
      port,
      useSSL: settings.useSSL,
      accessKey: settings.accessKey,
      secretKey: settings.secretKey,
    });

    // Links are signed offline against the externally reachable endpoint
    this.externalS3Client = new S3Client({
      endpoint: `${settings.useSSL ? "https" : "http"}://${settings.externalEndpoint}`,
      region: "us-east-1",
      credentials: {
        accessKeyId: settings.accessKey,
        secretAccessKey: settings.secretKey,
      },
      forcePathStyle: true,
    });

    this.bucket = settings.bucket;
    this.prefix = settings.prefix;
    this.linkExpirySeconds = effectiveLinkExpirySeconds(linkExpirySeconds);

    if (this.configured) {
      logger.info(
        `StorageService initialized with endpoint: ${settings.endpoint}, external: ${settings.externalEndpoint}, bucket: ${this.bucket}`,
      );
    } else {
      logger.warn("Cloud storage credentials missing - uploads will be skipped");
    }
  }

  isConfigured(): boolean {
    return this.configured;
  }

  async ensureBucket(): Promise<void> {
    try {
      const exists = await this.client.bucketExists(this.bucket);
      if (!exists) {
        await this.client.makeBucket(this.bucket, "us-east-1");
        logger.info(`Bucket created: ${this.bucket}`);
      } else {
        logger.info(`Bucket already exists: ${this.bucket}`);
      }
    } catch (error) {
      logger.error(`Error ensuring bucket ${this.bucket}:`, error);
      throw error;
    }
  }

  objectKeyFor(localPath: string): string {
    return `${this.prefix}/${uuidv4()}-${sanitizeFilename(path.basename(localPath))}`;
  }

  async upload(localPath: string): Promise<UploadedArtifact> {
    if (!this.configured) {
      throw new UploadError("unknown", "Cloud storage is not configured");
    }

    const objectKey = this.objectKeyFor(localPath);
    try {
      logger.info(`Uploading ${localPath} to ${this.bucket}/${objectKey}`);
      await this.client.fPutObject(this.bucket, objectKey, localPath, {
        "Content-Type": contentTypeFor(localPath),
      });

      const url = await this.generatePresignedGetUrl(objectKey, path.basename(localPath));
      logger.info(`Upload complete for ${objectKey}`);

      return {
        remoteRef: objectKey,
        url,
        localPath,
        uploadedAt: new Date(),
      };
    } catch (error) {
      const classified = classifyUploadError(error);
      logger.error(`Error uploading ${localPath} (${classified.kind}):`, error);
      throw classified;
    }
  }

  async generatePresignedGetUrl(objectKey: string, filename?: string): Promise<string> {
    const command = new GetObjectCommand({
      Bucket: this.bucket,
      Key: objectKey,
      ...(filename
        ? { ResponseContentDisposition: `inline; filename="${sanitizeFilename(filename)}"` }
        : {}),
    });

    const url = await getSignedUrl(this.externalS3Client, command, {
      expiresIn: this.linkExpirySeconds,
    });
    logger.debug(
      `Generated presigned GET URL for ${objectKey}, expires in ${this.linkExpirySeconds}s`,
    );
    return url;
  }

  async delete(remoteRef: string): Promise<DeleteResult> {
    try {
      await this.client.statObject(this.bucket, remoteRef);
    } catch (error) {
      if (isNotFound(error)) {
        return "not_found";
      }
      logger.error(`Error checking object ${remoteRef} before delete:`, error);
      throw error;
    }

    await this.client.removeObject(this.bucket, remoteRef);
    logger.info(`Deleted object ${remoteRef}`);
    return "ok";
  }

  async listObjects(): Promise<StoredObject[]> {
    if (!this.configured) return [];

    const objects: StoredObject[] = [];
    const stream = this.client.listObjectsV2(this.bucket, `${this.prefix}/`, true);

    await new Promise<void>((resolve, reject) => {
      stream.on("data", (item) => {
        if (item.name && item.lastModified) {
          objects.push({ remoteRef: item.name, lastModified: item.lastModified });
        }
      });
      stream.on("error", reject);
      stream.on("end", () => resolve());
    });

    return objects;
  }
}
