import type { Express, Request, Response } from "express";
import type { Server } from "http";
import { z } from "zod";
import type { AnalysisReport, OptimizationRunReport } from "@shared/report-types";
import { runOptimization } from "./optimizer";
import { AuditUnavailableError, FetchError, RunCancelledError, errorMessage } from "./optimizer/errors";
import { BrowserPreferenceSchema } from "./optimizer/types";
import { renderAnalysisMarkdown, renderMarkdownReport } from "./optimizer/reporter";

const OptimizeRequestSchema = z.object({
  url: z.string().url(),
  browser: BrowserPreferenceSchema.optional(),
  extractCriticalCss: z.boolean().optional(),
  optimizeAndTest: z.boolean().optional(),
  concurrency: z.coerce.number().int().positive().optional(),
  timeoutMs: z.coerce.number().int().positive().optional(),
  runTimeoutMs: z.coerce.number().int().positive().optional(),
  auditTimeoutMs: z.coerce.number().int().positive().optional(),
  userAgent: z.string().optional(),
});

const MetricsSchema = z.object({
  performanceScore: z.number(),
  largestContentfulPaintMs: z.number(),
  cumulativeLayoutShift: z.number(),
  totalBlockingTimeMs: z.number(),
  timeToInteractiveMs: z.number(),
  source: z.enum(["analyzer", "placeholder"]),
  degraded: z.boolean(),
  degradedReason: z.string().optional(),
});

const MetaSchema = z.object({
  url: z.string(),
  domain: z.string(),
  generatedAt: z.string(),
  durationMs: z.number(),
  partial: z.boolean(),
  degraded: z.boolean(),
  resourceCount: z.number(),
  unresolved: z.array(z.object({ url: z.string(), reason: z.string() })),
  criticalRuleCount: z.number(),
  warnings: z.array(z.string()),
});

const MetricKeySchema = z.enum([
  "performanceScore",
  "largestContentfulPaintMs",
  "cumulativeLayoutShift",
  "totalBlockingTimeMs",
  "timeToInteractiveMs",
]);

const RunReportSchema = z.object({
  meta: MetaSchema,
  comparison: z.object({
    originalMetrics: MetricsSchema,
    optimizedMetrics: MetricsSchema,
    perMetricDelta: z.object({
      performanceScore: z.number().nullable(),
      largestContentfulPaintMs: z.number().nullable(),
      cumulativeLayoutShift: z.number().nullable(),
      totalBlockingTimeMs: z.number().nullable(),
      timeToInteractiveMs: z.number().nullable(),
    }),
    metrics: z.array(
      z.object({
        metric: MetricKeySchema,
        label: z.string(),
        original: z.number(),
        optimized: z.number(),
        delta: z.number().nullable(),
        higherIsBetter: z.boolean(),
        verdict: z.enum(["improved", "regressed", "unchanged", "unavailable"]),
      })
    ),
    actionsApplied: z.array(
      z.object({
        targetResourceUrl: z.string(),
        kind: z.enum([
          "convert-format",
          "compress",
          "add-dimensions",
          "add-lazy-load",
          "defer",
          "async",
          "add-resource-hint",
          "set-cache-header",
        ]),
        status: z.enum(["applied", "skipped", "recommended"]),
        before: z.string(),
        after: z.string(),
        detail: z.string().optional(),
      })
    ),
  }),
}) satisfies z.ZodType<OptimizationRunReport>;

const AnalysisReportSchema = z.object({
  meta: MetaSchema,
  metrics: MetricsSchema,
  estimatedImprovement: z.object({
    currentScore: z.number(),
    potentialScore: z.number(),
    improvement: z.number(),
  }),
  recommendations: z.array(
    z.object({
      auditId: z.string(),
      title: z.string(),
      score: z.number(),
      importance: z.enum(["high", "medium"]),
      steps: z.array(z.string()),
    })
  ),
  automationOpportunities: z.array(
    z.object({
      task: z.string(),
      approach: z.string(),
      complexity: z.enum(["low", "medium"]),
      auditIds: z.array(z.string()),
    })
  ),
  criticalCssFile: z.string().nullable(),
}) satisfies z.ZodType<AnalysisReport>;

export interface RouteDependencies {
  runOptimization: typeof runOptimization;
}

function statusFor(error: unknown): number {
  if (error instanceof FetchError) return 502;
  if (error instanceof AuditUnavailableError) return 503;
  if (error instanceof RunCancelledError) return 499;
  return 500;
}

export async function registerRoutes(
  httpServer: Server,
  app: Express,
  dependencies: RouteDependencies = { runOptimization }
): Promise<Server> {
  app.post("/api/optimize", async (req: Request, res: Response) => {
    const parsed = OptimizeRequestSchema.safeParse(req.body);

    if (!parsed.success) {
      res.status(400).json({
        error: true,
        message: "Invalid request body",
        details: parsed.error.errors,
      });
      return;
    }

    // stop the run when the client goes away
    const controller = new AbortController();
    res.on("close", () => {
      if (!res.writableFinished) controller.abort();
    });

    try {
      const result = await dependencies.runOptimization(parsed.data, { signal: controller.signal });
      res.json(result);
    } catch (error) {
      if (res.headersSent || controller.signal.aborted) return;
      res.status(statusFor(error)).json({
        error: true,
        message: errorMessage(error) || "An error occurred during the run",
      });
    }
  });

  app.post("/api/export/markdown", (req: Request, res: Response) => {
    const runReport = RunReportSchema.safeParse(req.body);
    const analysisReport = runReport.success ? null : AnalysisReportSchema.safeParse(req.body);

    let markdown: string;
    if (runReport.success) {
      markdown = renderMarkdownReport(runReport.data);
    } else if (analysisReport?.success) {
      markdown = renderAnalysisMarkdown(analysisReport.data);
    } else {
      res.status(400).json({
        error: true,
        message: "Invalid report data",
      });
      return;
    }

    res.setHeader("Content-Type", "text/markdown");
    res.setHeader(
      "Content-Disposition",
      `attachment; filename="speed-report-${new Date().toISOString().split("T")[0]}.md"`
    );
    res.send(markdown);
  });

  app.get("/api/health", (_req: Request, res: Response) => {
    res.json({ status: "ok", service: "site-speedup" });
  });

  return httpServer;
}
