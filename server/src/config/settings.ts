import Joi from "joi";
import path from "path";
import { ValidationError } from "../models/errors";

const MB = 1024 * 1024;

export interface StorageSettings {
  endpoint: string;
  externalEndpoint: string;
  useSSL: boolean;
  accessKey: string;
  secretKey: string;
  bucket: string;
  prefix: string;
}

export interface Settings {
  port: number;
  apiKey: string;
  verifyToken: string;
  devMode: boolean;
  logLevel: string;
  waha: {
    baseUrl: string;
    sessionName: string;
    apiKey: string;
  };
  dbPath: string;
  downloadDir: string;
  ytdlpPath: string;
  cookies: {
    youtube: string;
    facebook: string;
  };
  storage: StorageSettings;
  inlineThresholdBytes: number;
  retentionWindowSeconds: number;
  maxConcurrentRetrievals: number;
  sweepIntervalSeconds: number;
  retrievalMaxAttempts: number;
  retrievalBackoffMs: number;
}

interface RawEnv {
  SERVER_PORT: number;
  SERVER_API_KEY: string;
  VERIFY_TOKEN: string;
  DEV_MODE: boolean;
  LOG_LEVEL: string;
  WAHA_BASE_URL: string;
  WAHA_SESSION_NAME: string;
  WAHA_API_KEY: string;
  DB_PATH: string;
  DOWNLOAD_DIR: string;
  YTDLP_PATH: string;
  YOUTUBE_COOKIES_CONTENT: string;
  FACEBOOK_COOKIES_CONTENT: string;
  MINIO_ENDPOINT: string;
  MINIO_EXTERNAL_ENDPOINT: string;
  MINIO_USE_SSL: boolean;
  MINIO_ACCESS_KEY: string;
  MINIO_SECRET_KEY: string;
  MINIO_BUCKET: string;
  MINIO_PREFIX: string;
  INLINE_THRESHOLD_MB: number;
  RETENTION_HOURS: number;
  MAX_CONCURRENT_RETRIEVALS: number;
  SWEEP_INTERVAL_SECONDS: number;
  RETRIEVAL_MAX_ATTEMPTS: number;
  RETRIEVAL_BACKOFF_MS: number;
}

const envSchema = Joi.object<RawEnv>({
  SERVER_PORT: Joi.number().port().default(8080),
  SERVER_API_KEY: Joi.string().allow("").default(""),
  VERIFY_TOKEN: Joi.string().allow("").default(""),
  DEV_MODE: Joi.boolean().default(false),
  LOG_LEVEL: Joi.string()
    .valid("error", "warn", "info", "http", "verbose", "debug", "silly")
    .insensitive()
    .default("info"),
  WAHA_BASE_URL: Joi.string()
    .uri({ scheme: ["http", "https"] })
    .default("http://localhost:3000"),
  WAHA_SESSION_NAME: Joi.string().default("default"),
  WAHA_API_KEY: Joi.string().allow("").default(""),
  DB_PATH: Joi.string().default(path.join(process.cwd(), "downloads.db")),
  DOWNLOAD_DIR: Joi.string().default(path.join(process.cwd(), "downloads")),
  YTDLP_PATH: Joi.string().default("yt-dlp"),
  YOUTUBE_COOKIES_CONTENT: Joi.string().allow("").default(""),
  FACEBOOK_COOKIES_CONTENT: Joi.string().allow("").default(""),
  MINIO_ENDPOINT: Joi.string().default("localhost:9000"),
  MINIO_EXTERNAL_ENDPOINT: Joi.string().default(Joi.ref("MINIO_ENDPOINT")),
  MINIO_USE_SSL: Joi.boolean().default(false),
  MINIO_ACCESS_KEY: Joi.string().allow("").default(""),
  MINIO_SECRET_KEY: Joi.string().allow("").default(""),
  MINIO_BUCKET: Joi.string().default("media-relay"),
  MINIO_PREFIX: Joi.string()
    .pattern(/^[a-zA-Z0-9_-]+$/)
    .default("wa-downloads"),
  INLINE_THRESHOLD_MB: Joi.number().min(0).default(16),
  RETENTION_HOURS: Joi.number().positive().default(24),
  MAX_CONCURRENT_RETRIEVALS: Joi.number().integer().min(1).default(2),
  SWEEP_INTERVAL_SECONDS: Joi.number().integer().min(1).default(900),
  RETRIEVAL_MAX_ATTEMPTS: Joi.number().integer().min(1).max(5).default(3),
  RETRIEVAL_BACKOFF_MS: Joi.number().integer().min(0).default(1000),
}).unknown(true);

/**
 * Validates the environment and maps it onto {@link Settings}.
 * Throws a {@link ValidationError} naming every malformed value.
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const result = envSchema.validate(env, { convert: true, abortEarly: false });
  if (result.error !== undefined) {
    const details = result.error.details.map((detail) => detail.message).join("; ");
    throw new ValidationError(`Invalid configuration: ${details}`);
  }
  const value = result.value;

  return {
    port: value.SERVER_PORT,
    apiKey: value.SERVER_API_KEY,
    verifyToken: value.VERIFY_TOKEN,
    devMode: value.DEV_MODE,
    logLevel: value.LOG_LEVEL.toLowerCase(),
    waha: {
      baseUrl: value.WAHA_BASE_URL,
      sessionName: value.WAHA_SESSION_NAME,
      apiKey: value.WAHA_API_KEY,
    },
    dbPath: value.DB_PATH,
    downloadDir: value.DOWNLOAD_DIR,
    ytdlpPath: value.YTDLP_PATH,
    cookies: {
      youtube: value.YOUTUBE_COOKIES_CONTENT.trim(),
      facebook: value.FACEBOOK_COOKIES_CONTENT.trim(),
    },
    storage: {
      endpoint: value.MINIO_ENDPOINT,
      externalEndpoint: value.MINIO_EXTERNAL_ENDPOINT,
      useSSL: value.MINIO_USE_SSL,
      accessKey: value.MINIO_ACCESS_KEY,
      secretKey: value.MINIO_SECRET_KEY,
      bucket: value.MINIO_BUCKET,
      prefix: value.MINIO_PREFIX,
    },
    inlineThresholdBytes: Math.round(value.INLINE_THRESHOLD_MB * MB),
    retentionWindowSeconds: Math.round(value.RETENTION_HOURS * 3600),
    maxConcurrentRetrievals: value.MAX_CONCURRENT_RETRIEVALS,
    sweepIntervalSeconds: value.SWEEP_INTERVAL_SECONDS,
    retrievalMaxAttempts: value.RETRIEVAL_MAX_ATTEMPTS,
    retrievalBackoffMs: value.RETRIEVAL_BACKOFF_MS,
  };
}
