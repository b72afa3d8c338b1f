import fs from "fs";
import logger from "../utils/logger";
import type { RetrievalBackend } from "./ytdlp.service";
import type { RetrievalErrorKind, RetrievedMedia } from "../models/download.model";
import { RetrievalError, errorCode, errorMessage } from "../models/errors";

export type RetrievalResult =
  | { ok: true; media: RetrievedMedia }
  | { ok: false; error: RetrievalError };

const NETWORK_CODES = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "ENOTFOUND",
  "ETIMEDOUT",
  "EAI_AGAIN",
  "ENETUNREACH",
  "EHOSTUNREACH",
  "ECONNABORTED",
]);

// Checked in order; the first matching phrase wins.
const MESSAGE_RULES: Array<{ kind: RetrievalErrorKind; phrases: string[] }> = [
  { kind: "unsupported_source", phrases: ["unsupported url", "no suitable extractor"] },
  {
    kind: "auth_required",
    phrases: [
      "checkpoint",
      "sign in to",
      "login required",
      "log in",
      "authentication",
      "private video",
      "video is private",
      "use --cookies",
      "cookies",
    ],
  },
  {
    kind: "not_found",
    phrases: [
      "http error 404",
      "http error 410",
      "not found",
      "video unavailable",
      "has been removed",
      "does not exist",
      "no longer available",
      "requested format not available",
    ],
  },
  {
    kind: "network_error",
    phrases: [
      "timed out",
      "timeout",
      "connection reset",
      "connection refused",
      "network is unreachable",
      "temporary failure in name resolution",
      "getaddrinfo",
      "unable to download webpage",
      "http error 5",
      "http error 429",
    ],
  },
];

/**
 * Maps anything the backend throws onto a {@link RetrievalError}.
 */
export function classifyRetrievalError(error: unknown): RetrievalError {
  if (error instanceof RetrievalError) return error;

  const code = errorCode(error);
  const detail = errorMessage(error);

  if (code === "ENOENT" && detail.includes("spawn")) {
    return new RetrievalError("unknown", "Retrieval tool is not installed");
  }
  if (code && NETWORK_CODES.has(code)) {
    return new RetrievalError("network_error", detail);
  }

  const lowered = detail.toLowerCase();
  for (const rule of MESSAGE_RULES) {
    if (rule.phrases.some((phrase) => lowered.includes(phrase))) {
      return new RetrievalError(rule.kind, detail);
    }
  }
  return new RetrievalError("unknown", detail);
}

/**
 * Adapter over a {@link RetrievalBackend}: one backend call per fetch,
 * size measured from disk, every failure classified.
 */
export class RetrievalService {
  constructor(private readonly backend: RetrievalBackend) {}

  async fetch(url: string): Promise<RetrievalResult> {
    logger.info("Starting media retrieval", { url });

    try {
      const download = await this.backend.download(url);

      let size: number;
      try {
        const stats = await fs.promises.stat(download.filePath);
        size = stats.size;
      } catch (error) {
        throw new RetrievalError(
          "unknown",
          `Downloaded file is missing: ${errorMessage(error)}`,
        );
      }

      if (size === 0) {
        await fs.promises.rm(download.filePath, { force: true });
        throw new RetrievalError("unknown", "The downloaded file is empty");
      }

      if (download.declaredSize !== undefined && download.declaredSize !== size) {
        logger.warn("Declared size differs from file on disk", {
          url,
          declared: download.declaredSize,
          actual: size,
        });
      }

      const media: RetrievedMedia = {
        localPath: download.filePath,
        size,
        title: download.title?.trim() || "video",
        duration: download.duration ?? null,
        sourceUrl: url,
      };

      logger.info("Media retrieved", {
        path: media.localPath,
        size: media.size,
        duration: media.duration,
      });
      return { ok: true, media };
    } catch (error) {
      const classified = classifyRetrievalError(error);
      logger.error(`Retrieval failed (${classified.kind})`, { url, detail: classified.detail });
      return { ok: false, error: classified };
    }
  }
}
