import type { MetricsDocument, OptimizationRunReport, RunMeta } from "@shared/report-types";
import type { ImageInfo, ReferenceOrigin, Resource, ResourceGraph, ResourceKind, ResourceReference } from "./types";
import type { ImageEncoder } from "./images";
import { compareMetrics } from "./reporter";
import { ROOT_DOCUMENT_PATH } from "./fetcher";
import { toMirrorPath } from "./url-utils";

// Fixtures shared by the test suites.

export const ROOT_URL = "https://site.test/";

const CONTENT_TYPES: Record<ResourceKind, string> = {
  html: "text/html",
  css: "text/css",
  js: "application/javascript",
  image: "image/png",
  font: "font/woff2",
  other: "application/octet-stream",
};

const ORIGINS: Record<ResourceKind, ReferenceOrigin> = {
  html: "link-icon",
  css: "link-stylesheet",
  js: "script-src",
  image: "img-src",
  font: "css-url",
  other: "link-icon",
};

export function makeResource(url: string, kind: ResourceKind, body: string): Resource {
  return {
    url,
    kind,
    originalBytes: Buffer.from(body),
    localPath: toMirrorPath(url, ROOT_URL),
    contentType: CONTENT_TYPES[kind],
  };
}

export function makeGraph(
  html: string,
  resources: Resource[] = [],
  extra: { references?: ResourceReference[]; partial?: boolean } = {}
): ResourceGraph {
  const resolved: ResourceReference[] = resources.map((resource) => ({
    url: resource.url,
    origin: ORIGINS[resource.kind],
    kind: resource.kind,
    referrer: ROOT_URL,
    depth: 0,
    status: "resolved",
    resource,
  }));

  return {
    root: {
      url: ROOT_URL,
      kind: "html",
      originalBytes: Buffer.from(html),
      localPath: ROOT_DOCUMENT_PATH,
      contentType: "text/html",
    },
    baseUrl: ROOT_URL,
    html,
    references: [...resolved, ...(extra.references ?? [])],
    resources,
    partial: extra.partial ?? false,
    warnings: [],
  };
}

/** Encoder that looks images up by their byte content and encodes to a fixed size. */
export class FakeImageEncoder implements ImageEncoder {
  constructor(
    private readonly images: Record<string, ImageInfo>,
    private readonly encodedSize = 10
  ) {}

  async inspect(bytes: Buffer): Promise<ImageInfo | null> {
    return this.images[bytes.toString("utf8")] ?? null;
  }

  async encode(): Promise<Buffer> {
    return Buffer.alloc(this.encodedSize);
  }
}

export interface LighthouseValues {
  score: number;
  lcp: number;
  cls: number;
  tbt: number;
  tti: number;
}

export function lighthouseResult(values: LighthouseValues, audits: Record<string, object> = {}): unknown {
  return {
    categories: { performance: { score: values.score } },
    audits: {
      "largest-contentful-paint": { title: "Largest Contentful Paint", numericValue: values.lcp },
      "cumulative-layout-shift": { title: "Cumulative Layout Shift", numericValue: values.cls },
      "total-blocking-time": { title: "Total Blocking Time", numericValue: values.tbt },
      interactive: { title: "Time to Interactive", numericValue: values.tti },
      ...audits,
    },
  };
}

export function makeMetrics(
  performanceScore: number,
  largestContentfulPaintMs: number,
  cumulativeLayoutShift: number,
  totalBlockingTimeMs: number,
  timeToInteractiveMs: number
): MetricsDocument {
  return {
    performanceScore,
    largestContentfulPaintMs,
    cumulativeLayoutShift,
    totalBlockingTimeMs,
    timeToInteractiveMs,
    source: "analyzer",
    degraded: false,
  };
}

export function makeMeta(overrides: Partial<RunMeta> = {}): RunMeta {
  return {
    url: ROOT_URL,
    domain: "site.test",
    generatedAt: "2024-01-01T00:00:00.000Z",
    durationMs: 12300,
    partial: false,
    degraded: false,
    resourceCount: 3,
    unresolved: [],
    criticalRuleCount: 4,
    warnings: [],
    ...overrides,
  };
}

export function sampleRunReport(): OptimizationRunReport {
  return {
    meta: makeMeta(),
    comparison: compareMetrics(makeMetrics(62, 3000, 0.25, 400, 5000), makeMetrics(80, 2100, 0.05, 150, 5200), [
      {
        targetResourceUrl: "https://site.test/js/app.js",
        kind: "defer",
        status: "applied",
        before: "blocking",
        after: "defer",
      },
    ]),
  };
}
