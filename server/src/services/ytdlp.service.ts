import { spawn } from "child_process";
import fs from "fs";
import path from "path";
import axios, { type AxiosResponse } from "axios";
import Joi from "joi";
import { v4 as uuidv4 } from "uuid";
import logger from "../utils/logger";
import type { CookieFiles } from "../utils/cookies";
import { hostMatches, isFacebookShareUrl } from "../utils/url";
import { RetrievalError, errorCode, errorMessage } from "../models/errors";

export interface BackendDownload {
  filePath: string;
  title?: string;
  duration?: number;
  declaredSize?: number;
}

/**
 * The external tool that turns a URL into a file on disk. One call, one
 * attempt; failures are thrown.
 */
export interface RetrievalBackend {
  download(url: string): Promise<BackendDownload>;
}

export interface YtDlpOptions {
  binary: string;
  /** Arguments placed before the yt-dlp ones, e.g. a script path when `binary` is an interpreter. */
  binaryArgs?: string[];
  downloadDir: string;
  cookies?: CookieFiles;
  timeoutMs?: number;
}

const FORMAT = "best[ext=mp4]/bestvideo[ext=mp4]+bestaudio[ext=m4a]/best";

const USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36";

const CHECKPOINT_URL_MARKERS = ["checkpoint", "login", "security"];
const CHECKPOINT_BODY_MARKERS = ["security check", "checkpoint"];

interface InfoJson {
  filepath: string;
  title?: string;
  duration?: number | null;
  filesize?: number | null;
  filesize_approx?: number | null;
}

const infoSchema = Joi.object<InfoJson>({
  filepath: Joi.string().required(),
  title: Joi.string().allow(""),
  duration: Joi.number().min(0).allow(null),
  filesize: Joi.number().min(0).allow(null),
  filesize_approx: Joi.number().min(0).allow(null),
}).unknown(true);

/** Parses the info JSON yt-dlp prints after moving the final file. */
export function parseInfoJson(stdout: string): BackendDownload {
  const lines = stdout
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.startsWith("{"));
  const last = lines[lines.length - 1];
  if (!last) {
    throw new RetrievalError("unknown", "yt-dlp printed no media information");
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(last);
  } catch {
    throw new RetrievalError("unknown", "yt-dlp printed malformed media information");
  }

  const result = infoSchema.validate(parsed);
  if (result.error !== undefined) {
    throw new RetrievalError("unknown", `Unexpected media information: ${result.error.message}`);
  }
  const info = result.value;

  return {
    filePath: info.filepath,
    title: info.title || undefined,
    duration: info.duration ?? undefined,
    declaredSize: info.filesize ?? info.filesize_approx ?? undefined,
  };
}

function finalUrlOf(response: AxiosResponse): string | undefined {
  const request: unknown = response.request;
  if (typeof request !== "object" || request === null || !("res" in request)) {
    return undefined;
  }
  const res: unknown = request.res;
  if (typeof res === "object" && res !== null && "responseUrl" in res) {
    return typeof res.responseUrl === "string" ? res.responseUrl : undefined;
  }
  return undefined;
}

/**
 * Downloads media with the yt-dlp command line tool.
 */
export class YtDlpService implements RetrievalBackend {
  constructor(private readonly options: YtDlpOptions) {}

  async download(url: string): Promise<BackendDownload> {
    let target = url;
    if (isFacebookShareUrl(url)) {
      logger.info("Detected Facebook share URL - resolving...");
      target = await this.resolveShareUrl(url);
      logger.info("Resolved share URL", { resolvedUrl: target });
    }

    await fs.promises.mkdir(this.options.downloadDir, { recursive: true });
    const id = uuidv4();
    try {
      const stdout = await this.run(this.buildArgs(target, id));
      return parseInfoJson(stdout);
    } catch (error) {
      await this.removeAttemptFiles(id);
      throw error;
    }
  }

  /** Every file of one attempt is named `<id>.*`: the final file, `.part` files and unmerged streams. */
  buildArgs(url: string, id: string = uuidv4()): string[] {
    const args = [
      "--no-playlist",
      "--no-progress",
      "--format",
      FORMAT,
      "--merge-output-format",
      "mp4",
      "--user-agent",
      USER_AGENT,
      "--output",
      path.join(this.options.downloadDir, `${id}.%(ext)s`),
      "--print",
      "after_move:%()j",
    ];

    const cookieFile = this.cookieFileFor(url);
    if (cookieFile) {
      args.push("--cookies", cookieFile);
    }

    args.push(url);
    return args;
  }

  private cookieFileFor(url: string): string | undefined {
    const cookies = this.options.cookies;
    if (!cookies) return undefined;
    if (hostMatches(url, "youtube.com") || hostMatches(url, "youtu.be")) {
      return cookies.youtube;
    }
    if (hostMatches(url, "facebook.com") || hostMatches(url, "fb.watch")) {
      return cookies.facebook;
    }
    return undefined;
  }

  private async removeAttemptFiles(id: string): Promise<void> {
    const dir = this.options.downloadDir;
    let names: string[];
    try {
      names = await fs.promises.readdir(dir);
    } catch (error) {
      logger.warn(`Could not list ${dir} after a failed download: ${errorMessage(error)}`);
      return;
    }

    for (const name of names.filter((entry) => entry.startsWith(`${id}.`))) {
      try {
        await fs.promises.rm(path.join(dir, name), { force: true });
        logger.debug("Removed leftover download file", { file: name });
      } catch (error) {
        logger.warn(`Could not remove leftover download file ${name}: ${errorMessage(error)}`);
      }
    }
  }

  async resolveShareUrl(url: string): Promise<string> {
    let response: AxiosResponse<string>;
    try {
      response = await axios.get<string>(url, {
        headers: {
          "User-Agent": USER_AGENT,
          "Accept-Language": "en-US,en;q=0.9",
          Accept: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
        },
        maxRedirects: 10,
        timeout: 15000,
        responseType: "text",
        validateStatus: () => true,
      });
    } catch (error) {
      throw new RetrievalError(
        "network_error",
        `Could not resolve share link (${errorCode(error) ?? "no response"})`,
      );
    }

    if (response.status === 404 || response.status === 410) {
      throw new RetrievalError("not_found", `Share link answered ${response.status}`);
    }

    const finalUrl = finalUrlOf(response) ?? url;
    const lowerUrl = finalUrl.toLowerCase();
    if (CHECKPOINT_URL_MARKERS.some((marker) => lowerUrl.includes(marker))) {
      logger.warn("Facebook checkpoint detected", { url: finalUrl });
      throw new RetrievalError("auth_required", "Facebook security checkpoint detected");
    }

    const body = typeof response.data === "string" ? response.data.toLowerCase() : "";
    if (CHECKPOINT_BODY_MARKERS.some((marker) => body.includes(marker))) {
      logger.warn("Facebook security challenge detected", { url: finalUrl });
      throw new RetrievalError("auth_required", "Facebook security challenge detected");
    }

    if (response.status >= 500) {
      throw new RetrievalError("network_error", `Share link answered ${response.status}`);
    }

    return finalUrl;
  }

  private run(args: string[]): Promise<string> {
    const { binary, binaryArgs = [], timeoutMs = 300000 } = this.options;

    return new Promise((resolve, reject) => {
      const proc = spawn(binary, [...binaryArgs, ...args], {
        env: process.env,
        stdio: ["ignore", "pipe", "pipe"],
      });

      let stdout = "";
      let stderr = "";
      let timedOut = false;

      const timer = setTimeout(() => {
        timedOut = true;
        proc.kill("SIGKILL");
      }, timeoutMs);

      proc.stdout.setEncoding("utf8");
      proc.stderr.setEncoding("utf8");
      proc.stdout.on("data", (data: string) => {
        stdout += data;
      });
      proc.stderr.on("data", (data: string) => {
        stderr += data;
      });

      proc.on("close", (code) => {
        clearTimeout(timer);
        if (timedOut) {
          reject(new RetrievalError("network_error", `yt-dlp timed out after ${timeoutMs}ms`));
        } else if (code === 0) {
          resolve(stdout);
        } else {
          const message = stderr.trim() || stdout.trim() || `yt-dlp exited with code ${code}`;
          reject(new Error(message));
        }
      });

      proc.on("error", (error) => {
        clearTimeout(timer);
        reject(error);
      });
    });
  }
}
