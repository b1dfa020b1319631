import * as cheerio from "cheerio";
import type { Element as DomElement } from "domhandler";
import type { OptimizationAction, OptimizationKind, ActionStatus } from "@shared/report-types";
import type {
  BoundingBox,
  CriticalCssSet,
  ImageInfo,
  LayoutSnapshot,
  OptimizedAsset,
  Resource,
  ResourceGraph,
  ResourceKind,
} from "./types";
import type { ImageEncoder } from "./images";
import { errorMessage } from "./errors";
import { CSS_URL_PATTERN, documentBaseUrl } from "./extractor";
import { buildResourceIndex } from "./fetcher";
import { createHeadInserter, documentOrder, findFirstPaintElement } from "./document";
import { elementPath, isBelowFold, pathKey } from "./layout";
import { getOrigin, normalizeUrl, replaceExtension } from "./url-utils";
import { silentLogger, type Logger } from "../log";

const OPTIMAL_FORMATS = new Set(["webp", "avif"]);
const VECTOR_FORMATS = new Set(["svg"]);

// Independent third-party tags that never depend on page script order.
const ASYNC_SAFE_HOSTS = [
  /(^|\.)googletagmanager\.com$/,
  /(^|\.)google-analytics\.com$/,
  /(^|\.)connect\.facebook\.net$/,
  /(^|\.)static\.hotjar\.com$/,
  /(^|\.)plausible\.io$/,
];

export const CACHE_POLICIES: Record<ResourceKind, string | null> = {
  css: "public, max-age=31536000, immutable",
  js: "public, max-age=31536000, immutable",
  font: "public, max-age=31536000, immutable",
  image: "public, max-age=2592000",
  html: null,
  other: null,
};

export interface OptimizationResult {
  // working copy of the document; the fetched original is never touched
  document: cheerio.CheerioAPI;
  actions: OptimizationAction[];
  assets: OptimizedAsset[];
}

class ActionLog {
  readonly actions: OptimizationAction[] = [];

  record(
    targetResourceUrl: string,
    kind: OptimizationKind,
    status: ActionStatus,
    before: string,
    after: string,
    detail?: string
  ): void {
    this.actions.push(Object.freeze({ targetResourceUrl, kind, status, before, after, ...(detail ? { detail } : {}) }));
  }
}

function describeSize(bytes: number, format: string): string {
  return `${bytes} bytes (${format})`;
}

async function reencodeImages(
  graph: ResourceGraph,
  encoder: ImageEncoder,
  log: ActionLog
): Promise<{ info: Map<string, ImageInfo>; assets: OptimizedAsset[] }> {
  const info = new Map<string, ImageInfo>();
  const assets: OptimizedAsset[] = [];

  for (const resource of graph.resources) {
    if (resource.kind !== "image") continue;

    const image = await encoder.inspect(resource.originalBytes);
    const before = describeSize(resource.originalBytes.length, image?.format ?? "unknown");
    if (!image) {
      log.record(resource.url, "convert-format", "skipped", before, before, "Image could not be decoded");
      continue;
    }
    info.set(resource.url, image);

    const format = image.format.toLowerCase();
    if (VECTOR_FORMATS.has(format)) {
      log.record(resource.url, "convert-format", "skipped", before, before, "Vector image");
      continue;
    }
    if (format === "avif") {
      log.record(resource.url, "convert-format", "skipped", before, before, "Already in an optimal format");
      continue;
    }

    const kind: OptimizationKind = OPTIMAL_FORMATS.has(format) ? "compress" : "convert-format";
    let encoded: Buffer;
    try {
      encoded = await encoder.encode(resource.originalBytes, "webp");
    } catch (error) {
      log.record(resource.url, kind, "skipped", before, before, `Re-encoding failed: ${errorMessage(error)}`);
      continue;
    }

    const after = describeSize(encoded.length, "webp");
    if (encoded.length < resource.originalBytes.length) {
      assets.push({ url: resource.url, localPath: replaceExtension(resource.localPath, "optimized.webp"), bytes: encoded });
      log.record(resource.url, kind, "applied", before, after);
    } else {
      log.record(resource.url, kind, "skipped", before, after, "Re-encoded image is not smaller");
    }
  }

  return { info, assets };
}

function scaledDimension(known: number, from: number, to: number): number {
  return Math.max(1, Math.round((known * to) / from));
}

function optimizeImageElements(
  $: cheerio.CheerioAPI,
  base: string,
  index: Map<string, Resource>,
  imageInfo: Map<string, ImageInfo>,
  layout: LayoutSnapshot | null,
  unresolved: Map<string, string>,
  log: ActionLog
): DomElement | null {
  const boxes = new Map<string, BoundingBox>();
  for (const entry of layout?.elements ?? []) {
    boxes.set(pathKey(entry.path), entry.box);
  }

  let lcpCandidate: DomElement | null = null;
  let largestArea = 0;

  $("img[src]").each((_, el) => {
    const $img = $(el);
    const src = $img.attr("src") ?? "";
    const url = normalizeUrl(src, base) ?? src;
    const info = index.has(url) ? imageInfo.get(url) : undefined;

    const width = $img.attr("width");
    const height = $img.attr("height");
    if (width && height) {
      log.record(url, "add-dimensions", "skipped", `width=${width} height=${height}`, `width=${width} height=${height}`, "Explicit dimensions already present");
    } else if (info) {
      const before = width ? `width=${width}` : height ? `height=${height}` : "none";
      let w = info.width;
      let h = info.height;
      if (width && Number(width) > 0) {
        w = Number(width);
        h = scaledDimension(info.height, info.width, w);
      } else if (height && Number(height) > 0) {
        h = Number(height);
        w = scaledDimension(info.width, info.height, h);
      }
      $img.attr("width", String(w));
      $img.attr("height", String(h));
      log.record(url, "add-dimensions", "applied", before, `width=${w} height=${h}`);
    } else {
      const reason = unresolved.get(url) ?? "image could not be decoded";
      log.record(url, "add-dimensions", "skipped", "none", "none", `Intrinsic dimensions undiscoverable: ${reason}`);
    }

    const loading = $img.attr("loading");
    const box = layout ? boxes.get(pathKey(elementPath(el))) : undefined;
    if (!layout || !box) {
      log.record(url, "add-lazy-load", "skipped", loading ?? "none", loading ?? "none", "No layout data for element");
      return;
    }

    if (isBelowFold(box, layout.viewport)) {
      if (loading === "lazy") {
        log.record(url, "add-lazy-load", "skipped", "lazy", "lazy", "Already lazy-loaded");
      } else {
        $img.attr("loading", "lazy");
        log.record(url, "add-lazy-load", "applied", loading ?? "none", "lazy");
      }
      return;
    }

    if (loading === "lazy") {
      $img.removeAttr("loading");
      log.record(url, "add-lazy-load", "skipped", "lazy", "none", "Above the fold; lazy loading removed");
    }

    const area = box.width * box.height;
    if (area > largestArea) {
      largestArea = area;
      lcpCandidate = el;
    }
  });

  return lcpCandidate;
}

function optimizeScripts($: cheerio.CheerioAPI, base: string, log: ActionLog): void {
  const order = documentOrder($);
  const firstPaint = findFirstPaintElement($);
  const firstPaintIndex = firstPaint ? order.get(firstPaint) ?? Infinity : Infinity;

  $("script[src]").each((_, el) => {
    const $script = $(el);
    const src = $script.attr("src") ?? "";
    const url = normalizeUrl(src, base) ?? src;

    if ($script.attr("defer") !== undefined || $script.attr("async") !== undefined) {
      const current = $script.attr("async") !== undefined ? "async" : "defer";
      log.record(url, current, "skipped", current, current, "Already non-blocking");
      return;
    }
    if ($script.attr("type") === "module") {
      log.record(url, "defer", "skipped", "module", "module", "Module scripts are deferred by default");
      return;
    }

    const position = order.get(el) ?? 0;
    if (position < firstPaintIndex) {
      log.record(url, "defer", "skipped", "blocking", "blocking", "Runs before first paint content; left untouched");
      return;
    }

    let host = "";
    try {
      host = new URL(url).hostname;
    } catch {
      // relative URL that could not be resolved
    }

    if (ASYNC_SAFE_HOSTS.some((pattern) => pattern.test(host))) {
      $script.attr("async", "");
      log.record(url, "async", "applied", "blocking", "async");
    } else {
      $script.attr("defer", "");
      log.record(url, "defer", "applied", "blocking", "defer");
    }
  });
}

function criticalFontUrls(critical: CriticalCssSet): string[] {
  const urls: string[] = [];
  for (const rule of critical.rules) {
    if (!/^@font-face/i.test(rule)) continue;
    const first = Array.from(rule.matchAll(CSS_URL_PATTERN))[0];
    const url = first ? normalizeUrl(first[2]) : null;
    if (url && !urls.includes(url)) urls.push(url);
  }
  return urls;
}

function addResourceHints(
  $: cheerio.CheerioAPI,
  graph: ResourceGraph,
  critical: CriticalCssSet,
  index: Map<string, Resource>,
  lcpCandidate: DomElement | null,
  base: string,
  log: ActionLog
): void {
  const insert = createHeadInserter($);
  const rootOrigin = getOrigin(graph.baseUrl);

  const existing = new Set<string>();
  $("link[rel~='preconnect'][href], link[rel~='dns-prefetch'][href]").each((_, el) => {
    const origin = getOrigin($(el).attr("href") ?? "");
    if (origin) existing.add(origin);
  });

  const origins: string[] = [];
  for (const reference of graph.references) {
    const origin = getOrigin(reference.url);
    if (origin && origin !== rootOrigin && !origins.includes(origin)) origins.push(origin);
  }

  for (const origin of origins) {
    if (existing.has(origin)) {
      log.record(origin, "add-resource-hint", "skipped", "preconnect", "preconnect", "Hint already present");
      continue;
    }
    insert(`<link rel="preconnect" href="${origin}" crossorigin>`);
    insert(`<link rel="dns-prefetch" href="${origin}">`);
    log.record(origin, "add-resource-hint", "applied", "none", "preconnect, dns-prefetch");
  }

  for (const url of criticalFontUrls(critical)) {
    const font = index.get(url);
    if (!font || font.kind !== "font") continue;
    const $link = $("<link>").attr({ rel: "preload", href: url, as: "font", crossorigin: "" });
    insert($.html($link));
    log.record(url, "add-resource-hint", "applied", "none", "preload as=font");
  }

  if (lcpCandidate) {
    const $img = $(lcpCandidate);
    const src = $img.attr("src") ?? "";
    const url = normalizeUrl(src, base) ?? src;
    $img.attr("fetchpriority", "high");
    insert($.html($("<link>").attr({ rel: "preload", href: url, as: "image", fetchpriority: "high" })));
    log.record(url, "add-resource-hint", "applied", "none", "preload as=image, fetchpriority=high");
  }
}

function recommendCachePolicies(graph: ResourceGraph, log: ActionLog): void {
  for (const resource of graph.resources) {
    const policy = CACHE_POLICIES[resource.kind];
    if (!policy) continue;
    log.record(resource.url, "set-cache-header", "recommended", "as served", `Cache-Control: ${policy}`);
  }
}

export async function optimizeResources(
  graph: ResourceGraph,
  layout: LayoutSnapshot | null,
  critical: CriticalCssSet,
  encoder: ImageEncoder,
  logger: Logger = silentLogger
): Promise<OptimizationResult> {
  const log = new ActionLog();
  const $ = cheerio.load(graph.html);
  const base = documentBaseUrl($, graph.baseUrl);
  const index = buildResourceIndex(graph);

  const unresolved = new Map<string, string>();
  for (const reference of graph.references) {
    if (reference.status === "unresolved") unresolved.set(reference.url, reference.reason);
  }

  const { info, assets } = await reencodeImages(graph, encoder, log);
  const lcpCandidate = optimizeImageElements($, base, index, info, layout, unresolved, log);
  optimizeScripts($, base, log);
  addResourceHints($, graph, critical, index, lcpCandidate, base, log);
  recommendCachePolicies(graph, log);

  const applied = log.actions.filter((action) => action.status === "applied").length;
  logger.info(`Applied ${applied} optimization(s), ${log.actions.length - applied} skipped or recommended`);

  return { document: $, actions: log.actions, assets };
}
