const MAX_NAME_LENGTH = 80;

/**
 * Turns an arbitrary media title or path into a name that is safe both on
 * disk and as part of an object key.
 * - Basename only (no path traversal)
 * - Letters, digits, underscore, hyphen and dot only; emoji and punctuation dropped
 * - Whitespace runs collapse to one underscore
 * - Lowercase, at most 80 characters, extension kept when truncating
 * - Falls back to `fallback` when nothing is left
 */
export function sanitizeFilename(
  name: string | undefined | null,
  fallback = "video",
): string {
  if (!name) return fallback;

  const base = name.split(/[\\/]/).pop() || "";

  let s = base
    .normalize("NFKD")
    .replace(/[\u0300-\u036f]/g, "")
    .trim()
    .replace(/\s+/g, "_")
    .replace(/[^A-Za-z0-9._-]/g, "")
    .replace(/_{2,}/g, "_")
    .replace(/^[._]+/, "")
    .replace(/_+$/, "")
    .toLowerCase();

  if (s.length > MAX_NAME_LENGTH) {
    const dot = s.lastIndexOf(".");
    const ext = dot > 0 && s.length - dot <= 6 ? s.slice(dot) : "";
    s = s.slice(0, MAX_NAME_LENGTH - ext.length) + ext;
  }

  return s || fallback;
}

/** File name presented to the chat recipient for a downloaded video. */
export function mediaFilename(title: string, localPath: string): string {
  const dot = localPath.lastIndexOf(".");
  const ext = dot > localPath.lastIndexOf("/") ? localPath.slice(dot).toLowerCase() : ".mp4";
  return `${sanitizeFilename(title)}${ext}`;
}
