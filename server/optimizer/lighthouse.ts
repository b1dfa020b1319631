import lighthouse from "lighthouse";
import * as chromeLauncher from "chrome-launcher";
import { z } from "zod";
import type { MetricsDocument } from "@shared/report-types";
import type { BrowserPreference } from "./types";
import { AuditOutputError, AuditTimeoutError, AuditUnavailableError, errorMessage } from "./errors";
import { resolveBrowser } from "./browser";
import { withTimeout } from "./timeout";
import { silentLogger, type Logger } from "../log";

export interface AnalyzerOptions {
  browser: BrowserPreference;
  timeoutMs: number;
}

/** Black-box page analyzer: given a URL, returns its raw result document. */
export interface PageAnalyzer {
  analyze(url: string, options: AnalyzerOptions): Promise<unknown>;
}

const LighthouseAuditSchema = z.object({
  title: z.string().optional(),
  description: z.string().optional(),
  score: z.number().nullable().optional(),
  numericValue: z.number().optional(),
  details: z.unknown().optional(),
});

const LighthouseResultSchema = z.object({
  categories: z.object({
    performance: z.object({
      score: z.number().nullable(),
    }),
  }),
  audits: z.record(LighthouseAuditSchema),
});

export type LighthouseResult = z.infer<typeof LighthouseResultSchema>;

export interface AuditOpportunity {
  id: string;
  title: string;
  description: string;
  score: number;
}

export interface AuditOutcome {
  metrics: MetricsDocument;
  opportunities: AuditOpportunity[];
  error?: string;
}

export const PLACEHOLDER_METRICS: Omit<MetricsDocument, "degradedReason"> = {
  performanceScore: 65,
  largestContentfulPaintMs: 2500,
  cumulativeLayoutShift: 0.1,
  totalBlockingTimeMs: 150,
  timeToInteractiveMs: 3800,
  source: "placeholder",
  degraded: true,
};

export function placeholderMetrics(reason: string): MetricsDocument {
  return Object.freeze({ ...PLACEHOLDER_METRICS, degradedReason: reason });
}

function numericAudit(result: LighthouseResult, id: string): number {
  const value = result.audits[id]?.numericValue;
  if (value === undefined) {
    throw new AuditOutputError(`audit "${id}" has no numeric value`);
  }
  return value;
}

export function normalizeLighthouseResult(raw: unknown): { metrics: MetricsDocument; opportunities: AuditOpportunity[] } {
  const parsed = LighthouseResultSchema.safeParse(raw);
  if (!parsed.success) {
    throw new AuditOutputError(parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; "));
  }

  const result = parsed.data;
  const score = result.categories.performance.score;
  if (score === null) {
    throw new AuditOutputError("performance category has no score");
  }

  const metrics: MetricsDocument = Object.freeze({
    performanceScore: Math.round(score * 100),
    largestContentfulPaintMs: Math.round(numericAudit(result, "largest-contentful-paint")),
    cumulativeLayoutShift: Number(numericAudit(result, "cumulative-layout-shift").toFixed(3)),
    totalBlockingTimeMs: Math.round(numericAudit(result, "total-blocking-time")),
    timeToInteractiveMs: Math.round(numericAudit(result, "interactive")),
    source: "analyzer",
    degraded: false,
  });

  const opportunities: AuditOpportunity[] = [];
  for (const [id, audit] of Object.entries(result.audits)) {
    if (audit.score === null || audit.score === undefined || audit.score >= 0.9 || audit.details === undefined) continue;
    opportunities.push({
      id,
      title: audit.title ?? id,
      description: audit.description ?? "",
      score: audit.score,
    });
  }
  opportunities.sort((a, b) => a.score - b.score || a.id.localeCompare(b.id));

  return { metrics, opportunities };
}

export class LighthouseAnalyzer implements PageAnalyzer {
  async analyze(url: string, options: AnalyzerOptions): Promise<unknown> {
    const executable = resolveBrowser(options.browser);
    if (!executable) {
      throw new AuditUnavailableError("no compatible browser found");
    }

    // each run gets its own browser and profile directory
    let chrome: chromeLauncher.LaunchedChrome;
    try {
      chrome = await chromeLauncher.launch({
        chromePath: executable.path,
        chromeFlags: ["--headless=new", "--no-sandbox", "--disable-gpu"],
      });
    } catch (error) {
      throw new AuditUnavailableError(`could not launch ${executable.kind}: ${errorMessage(error)}`);
    }

    try {
      const result = await withTimeout(
        lighthouse(url, {
          port: chrome.port,
          output: "json",
          logLevel: "error",
          onlyCategories: ["performance"],
        }),
        options.timeoutMs,
        () => new AuditTimeoutError(url, options.timeoutMs)
      );
      if (!result) {
        throw new AuditOutputError("analyzer returned no result");
      }
      return result.lhr;
    } finally {
      chrome.kill();
    }
  }
}

/**
 * Runs the analyzer once. Any failure is turned into placeholder metrics that
 * are flagged as degraded, with the reason kept on the outcome.
 */
export async function runAudit(
  url: string,
  analyzer: PageAnalyzer,
  options: AnalyzerOptions,
  logger: Logger = silentLogger
): Promise<AuditOutcome> {
  logger.info(`Auditing ${url}`);
  try {
    const raw = await analyzer.analyze(url, options);
    const { metrics, opportunities } = normalizeLighthouseResult(raw);
    logger.info(`Performance score for ${url}: ${metrics.performanceScore}`);
    return { metrics, opportunities };
  } catch (error) {
    const reason = errorMessage(error);
    logger.warn(`Audit of ${url} failed, using placeholder metrics: ${reason}`);
    return { metrics: placeholderMetrics(reason), opportunities: [], error: reason };
  }
}
