import pLimit from "p-limit";
import type { OptimizeConfig, Resource, ResourceGraph, ResourceKind, ResourceReference, ReferenceOrigin } from "./types";
import { FetchError, errorMessage, throwIfCancelled } from "./errors";
import { extractDocumentReferences, extractStylesheetReferences, kindFromContentType } from "./extractor";
import { normalizeUrl, toMirrorPath } from "./url-utils";
import { silentLogger, type Logger } from "../log";

export const ROOT_DOCUMENT_PATH = "_original/index.html";

type FetchOutcome =
  | { body: Buffer; contentType: string; statusCode: number; finalUrl: string }
  | { error: string };

async function fetchWithTimeout(
  url: string,
  timeoutMs: number,
  userAgent: string,
  signals: AbortSignal[]
): Promise<FetchOutcome> {
  const controller = new AbortController();
  let timedOut = false;
  const timeoutId = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, timeoutMs);

  const onAbort = () => controller.abort();
  for (const signal of signals) {
    if (signal.aborted) {
      controller.abort();
    } else {
      signal.addEventListener("abort", onAbort, { once: true });
    }
  }

  try {
    const response = await fetch(url, {
      signal: controller.signal,
      headers: {
        "User-Agent": userAgent,
        Accept: "*/*",
      },
      redirect: "follow",
    });

    if (!response.ok) {
      return { error: `HTTP ${response.status}` };
    }

    const body = Buffer.from(await response.arrayBuffer());
    return {
      body,
      contentType: response.headers.get("content-type") || "",
      statusCode: response.status,
      finalUrl: response.url || url,
    };
  } catch (e) {
    if (timedOut) {
      return { error: `Request timeout after ${timeoutMs}ms` };
    }
    if (controller.signal.aborted) {
      return { error: "Request aborted" };
    }
    return { error: errorMessage(e) || "Unknown fetch error" };
  } finally {
    clearTimeout(timeoutId);
    for (const signal of signals) {
      signal.removeEventListener("abort", onAbort);
    }
  }
}

export interface FetchSiteOptions {
  // user cancellation; stops in-flight fetches and throws RunCancelledError
  signal?: AbortSignal;
  // overall run deadline; remaining fetches become unresolved and the graph partial
  deadline?: AbortSignal;
  logger?: Logger;
}

interface PendingReference {
  url: string;
  origin: ReferenceOrigin;
  kind: ResourceKind;
  referrer: string;
  depth: number;
}

export async function fetchSite(config: OptimizeConfig, options: FetchSiteOptions = {}): Promise<ResourceGraph> {
  const { signal, deadline } = options;
  const log = options.logger ?? silentLogger;
  const signals = [signal, deadline].filter((s): s is AbortSignal => s !== undefined);

  const rootUrl = normalizeUrl(config.url);
  if (!rootUrl) {
    throw new FetchError(config.url, "Invalid root URL");
  }

  throwIfCancelled(signal);
  const rootResult = await fetchWithTimeout(rootUrl, config.timeoutMs, config.userAgent, signals);
  throwIfCancelled(signal);

  if ("error" in rootResult) {
    throw new FetchError(rootUrl, rootResult.error);
  }

  const contentType = rootResult.contentType;
  if (contentType && !contentType.includes("text/html") && !contentType.includes("application/xhtml")) {
    throw new FetchError(rootUrl, `Non-HTML content type: ${contentType}`);
  }

  const html = rootResult.body.toString("utf8");
  const baseUrl = normalizeUrl(rootResult.finalUrl) ?? rootUrl;
  const root: Resource = {
    url: rootUrl,
    kind: "html",
    originalBytes: rootResult.body,
    localPath: ROOT_DOCUMENT_PATH,
    contentType: contentType || "text/html",
  };

  const limit = pLimit(config.concurrency);
  const warnings: string[] = [];
  const discovered: PendingReference[] = [];
  const outcomes = new Map<string, Resource | string>([[rootUrl, root]]);
  const resources: Resource[] = [];
  let toFetch: PendingReference[] = [];

  // Only shared state across fetch tasks. has() and add() run with no await
  // between them, so two tasks can never both claim one URL.
  const queued = new Set<string>([rootUrl]);
  const claim = (url: string): boolean => {
    if (queued.has(url)) return false;
    queued.add(url);
    return true;
  };

  const enqueue = (reference: PendingReference) => {
    discovered.push(reference);
    if (!claim(reference.url)) return;

    if (reference.origin === "css-import" && reference.depth > config.maxCssImportDepth) {
      const reason = `Stylesheet import nested deeper than ${config.maxCssImportDepth} level(s)`;
      outcomes.set(reference.url, reason);
      warnings.push(`${reason}: ${reference.url}`);
      return;
    }
    toFetch.push(reference);
  };

  for (const reference of extractDocumentReferences(html, baseUrl)) {
    enqueue({ ...reference, referrer: rootUrl, depth: 0 });
  }

  const processReference = async (item: PendingReference) => {
    const result = await fetchWithTimeout(item.url, config.timeoutMs, config.userAgent, signals);
    return { item, result };
  };

  while (toFetch.length > 0) {
    const batch = toFetch;
    toFetch = [];

    if (deadline?.aborted) {
      for (const item of batch) {
        outcomes.set(item.url, "Run deadline exceeded");
      }
      continue;
    }

    const results = await Promise.all(batch.map((item) => limit(() => processReference(item))));
    throwIfCancelled(signal);

    // batch order, not completion order, so the graph is deterministic
    for (const { item, result } of results) {
      if ("error" in result) {
        const reason = deadline?.aborted ? "Run deadline exceeded" : result.error;
        outcomes.set(item.url, reason);
        log.warn(`${item.url}: ${reason}`);
        continue;
      }

      const resource: Resource = {
        url: item.url,
        kind: kindFromContentType(result.contentType, item.kind),
        originalBytes: result.body,
        localPath: toMirrorPath(item.url, baseUrl),
        contentType: result.contentType,
      };
      outcomes.set(item.url, resource);
      resources.push(resource);

      if (resource.kind !== "css") continue;

      const sheet = extractStylesheetReferences(result.body.toString("utf8"), item.url);
      if (sheet.error) {
        warnings.push(`Could not parse ${item.url}: ${sheet.error}`);
      }
      for (const url of sheet.imports) {
        enqueue({ url, origin: "css-import", kind: "css", referrer: item.url, depth: item.depth + 1 });
      }
      for (const asset of sheet.assets) {
        enqueue({ ...asset, referrer: item.url, depth: item.depth + 1 });
      }
    }
  }

  const references: ResourceReference[] = discovered.map((reference) => {
    const outcome = outcomes.get(reference.url);
    if (outcome !== undefined && typeof outcome !== "string") {
      return { ...reference, status: "resolved", resource: outcome };
    }
    return { ...reference, status: "unresolved", reason: outcome ?? "Not fetched" };
  });

  const unresolvedCount = new Set(references.filter((r) => r.status === "unresolved").map((r) => r.url)).size;
  if (unresolvedCount > 0) {
    log.warn(`${unresolvedCount} resource(s) could not be fetched`);
  }
  log.info(`Fetched ${resources.length} resource(s) for ${rootUrl}`);

  return {
    root,
    baseUrl,
    html,
    references,
    resources,
    partial: unresolvedCount > 0 || deadline?.aborted === true,
    warnings,
  };
}

export function buildResourceIndex(graph: ResourceGraph): Map<string, Resource> {
  const index = new Map<string, Resource>();
  for (const resource of graph.resources) {
    index.set(resource.url, resource);
  }
  return index;
}
