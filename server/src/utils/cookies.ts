import fs from "fs";
import os from "os";
import path from "path";
import { v4 as uuidv4 } from "uuid";
import logger from "./logger";
import { errorMessage } from "../models/errors";

const NETSCAPE_HEADER = "# Netscape HTTP Cookie File";

export interface CookieFiles {
  youtube?: string;
  facebook?: string;
}

/**
 * Writes a base64-encoded Netscape cookie jar to a private temp file and
 * returns its path, or undefined when the content is empty or unreadable.
 */
export async function writeCookieFile(
  label: string,
  base64Content: string,
  dir: string = os.tmpdir(),
): Promise<string | undefined> {
  if (!base64Content) return undefined;

  try {
    const decoded = Buffer.from(base64Content, "base64");
    if (decoded.length === 0) {
      logger.warn(`${label} cookies decoded to an empty file, ignoring`);
      return undefined;
    }
    if (!decoded.subarray(0, NETSCAPE_HEADER.length).toString("utf8").startsWith(NETSCAPE_HEADER)) {
      logger.warn(`Decoded ${label} cookies file does not start with the Netscape header`);
    }

    const filePath = path.join(dir, `${label}_cookies_${uuidv4()}.txt`);
    await fs.promises.writeFile(filePath, decoded, { mode: 0o600 });
    logger.info(`${label} cookies file created`, { path: filePath });
    return filePath;
  } catch (error) {
    logger.error(`Error creating ${label} cookies file: ${errorMessage(error)}`);
    return undefined;
  }
}

export async function setupCookies(
  content: { youtube: string; facebook: string },
  dir?: string,
): Promise<CookieFiles> {
  return {
    youtube: await writeCookieFile("youtube", content.youtube, dir),
    facebook: await writeCookieFile("facebook", content.facebook, dir),
  };
}
