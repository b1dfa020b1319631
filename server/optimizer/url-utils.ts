import { createHash } from "crypto";
import { posix } from "path";

const FETCHABLE_PROTOCOLS = ["http:", "https:"];

export function normalizeUrl(urlString: string, baseUrl?: string): string | null {
  try {
    const trimmed = urlString.trim();
    if (!trimmed) return null;

    const url = baseUrl ? new URL(trimmed, baseUrl) : new URL(trimmed);
    if (!FETCHABLE_PROTOCOLS.includes(url.protocol)) {
      return null;
    }

    url.hash = "";
    return url.toString();
  } catch {
    return null;
  }
}

export function isSameOrigin(url1: string, url2: string): boolean {
  try {
    const parsed1 = new URL(url1);
    const parsed2 = new URL(url2);
    return parsed1.origin === parsed2.origin;
  } catch {
    return false;
  }
}

export function getOrigin(url: string): string | null {
  try {
    return new URL(url).origin;
  } catch {
    return null;
  }
}

export function getDomainFromUrl(url: string): string {
  try {
    const parsed = new URL(url);
    const hostname = parsed.hostname.toLowerCase().replace(/\.$/, "");
    if (!hostname) return "example-com";
    return parsed.port ? `${hostname}-${parsed.port}` : hostname;
  } catch {
    return "example-com";
  }
}

function sanitizeSegment(segment: string): string {
  let decoded = segment;
  try {
    decoded = decodeURIComponent(segment);
  } catch {
    // keep the raw segment
  }
  const cleaned = decoded.replace(/[^a-zA-Z0-9._-]/g, "_");
  if (cleaned === "" || cleaned === "." || cleaned === "..") return "_";
  return cleaned;
}

/**
 * Maps an absolute URL to a path inside the site mirror. Same-origin resources
 * keep their original path; other origins live under `_external/<host>/`.
 * Query strings are folded into the file name so distinct URLs never share a file.
 */
export function toMirrorPath(url: string, rootUrl: string): string {
  const parsed = new URL(url);

  const segments = parsed.pathname.split("/").filter(Boolean).map(sanitizeSegment);
  if (parsed.pathname.endsWith("/") || segments.length === 0) {
    segments.push("index.html");
  }

  if (parsed.search) {
    const digest = createHash("sha1").update(parsed.search).digest("hex").slice(0, 8);
    const last = segments[segments.length - 1];
    const ext = posix.extname(last);
    const stem = ext ? last.slice(0, -ext.length) : last;
    segments[segments.length - 1] = `${stem}-${digest}${ext}`;
  }

  if (!isSameOrigin(url, rootUrl)) {
    segments.unshift("_external", sanitizeSegment(parsed.host));
  }

  return segments.join("/");
}

export function replaceExtension(localPath: string, ext: string): string {
  const current = posix.extname(localPath);
  const stem = current ? localPath.slice(0, -current.length) : localPath;
  return `${stem}.${ext}`;
}
