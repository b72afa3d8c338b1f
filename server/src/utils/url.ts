const SUPPORTED_HOSTS = new Set([
  "youtube.com",
  "www.youtube.com",
  "m.youtube.com",
  "youtu.be",
  "facebook.com",
  "www.facebook.com",
  "m.facebook.com",
  "fb.watch",
]);

const TRACKING_PARAMS = new Set(["fbclid", "si", "feature", "igshid"]);

const URL_PATTERN = /https?:\/\/[^\s<>"']+/i;

/** First http(s) URL in a chat message, without trailing punctuation. */
export function extractUrl(text: string): string | null {
  const match = URL_PATTERN.exec(text);
  if (!match) return null;
  return match[0].replace(/[.,;:!?)\]]+$/, "");
}

export function parseAbsoluteUrl(value: string): URL | null {
  try {
    const url = new URL(value);
    if (url.protocol !== "http:" && url.protocol !== "https:") return null;
    return url;
  } catch {
    return null;
  }
}

export function isSupportedSource(value: string): boolean {
  const url = parseAbsoluteUrl(value);
  return url !== null && SUPPORTED_HOSTS.has(url.hostname.toLowerCase());
}

export function isFacebookShareUrl(value: string): boolean {
  const url = parseAbsoluteUrl(value);
  if (!url) return false;
  return url.hostname.toLowerCase().endsWith("facebook.com") && url.pathname.startsWith("/share");
}

export function hostMatches(value: string, domain: string): boolean {
  const url = parseAbsoluteUrl(value);
  if (!url) return false;
  const host = url.hostname.toLowerCase();
  return host === domain || host.endsWith(`.${domain}`);
}

/**
 * Canonical form used as the single-flight key: scheme and host lowercased,
 * fragment and tracking parameters dropped, remaining query sorted.
 */
export function normalizeUrl(value: string): string {
  const url = parseAbsoluteUrl(value);
  if (!url) {
    throw new Error(`Not an absolute http(s) URL: ${value}`);
  }

  url.hash = "";

  const kept = [...url.searchParams.entries()]
    .filter(([key]) => !key.toLowerCase().startsWith("utm_") && !TRACKING_PARAMS.has(key.toLowerCase()))
    .sort(([a, av], [b, bv]) => (a === b ? av.localeCompare(bv) : a.localeCompare(b)));
  url.search = "";
  for (const [key, val] of kept) {
    url.searchParams.append(key, val);
  }

  if (url.pathname.length > 1 && url.pathname.endsWith("/")) {
    url.pathname = url.pathname.replace(/\/+$/, "");
  }

  return url.toString();
}
