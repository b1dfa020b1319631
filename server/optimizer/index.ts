import type {
  AnalysisReport,
  MetricsDocument,
  OptimizationRunReport,
  RunMeta,
  UnresolvedResource,
} from "@shared/report-types";
import type { CriticalCssSet, LayoutSnapshot, OptimizeConfig, OptimizeConfigInput, ResourceGraph } from "./types";
import { parseConfig } from "./types";
import { AuditUnavailableError, RunCancelledError, throwIfCancelled } from "./errors";
import { fetchSite, ROOT_DOCUMENT_PATH } from "./fetcher";
import { collectLayout, PuppeteerLayoutRenderer, type LayoutRenderer } from "./layout";
import { extractCriticalCss, renderCriticalCss } from "./critical-css";
import { optimizeResources } from "./resource-optimizer";
import { rewriteDocument, OPTIMIZED_DOCUMENT_PATH } from "./rewriter";
import { SharpImageEncoder, type ImageEncoder } from "./images";
import { LighthouseAnalyzer, placeholderMetrics, runAudit, type AuditOutcome, type PageAnalyzer } from "./lighthouse";
import { estimateImprovement, findAutomationOpportunities, generateRecommendations } from "./recommendations";
import { compareMetrics, renderAnalysisMarkdown, renderMarkdownReport } from "./reporter";
import { SiteWorkspace } from "./workspace";
import { serveDirectory, type SiteServer } from "./local-server";
import { getDomainFromUrl } from "./url-utils";
import { createLogger, type Logger } from "../log";

export const CRITICAL_CSS_FILE = "critical.css";
export const REPORT_JSON_FILE = "comparison-report.json";
export const REPORT_MARKDOWN_FILE = "comparison-report.md";
export const ANALYSIS_JSON_FILE = "analysis-report.json";
export const ANALYSIS_MARKDOWN_FILE = "analysis-report.md";

const DEADLINE_REASON = "Run deadline exceeded";

export interface PipelineCollaborators {
  renderer: LayoutRenderer;
  analyzer: PageAnalyzer;
  encoder: ImageEncoder;
  serve: SiteServer;
}

export interface RunOptions {
  signal?: AbortSignal;
  collaborators?: Partial<PipelineCollaborators>;
  logger?: Logger;
}

export type RunResult =
  | { mode: "optimize"; outputDir: string; files: readonly string[]; report: OptimizationRunReport }
  | { mode: "analyze"; outputDir: string; files: readonly string[]; report: AnalysisReport };

function defaultCollaborators(config: OptimizeConfig): PipelineCollaborators {
  return {
    renderer: new PuppeteerLayoutRenderer(config.browser, config.renderTimeoutMs),
    analyzer: new LighthouseAnalyzer(),
    encoder: new SharpImageEncoder(),
    serve: serveDirectory,
  };
}

class RunDeadline {
  private readonly controller = new AbortController();
  private readonly timer: NodeJS.Timeout;
  private readonly expiresAt: number;

  constructor(timeoutMs: number) {
    this.expiresAt = Date.now() + timeoutMs;
    this.timer = setTimeout(() => this.controller.abort(), timeoutMs);
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get expired(): boolean {
    return this.controller.signal.aborted;
  }

  remainingMs(): number {
    return Math.max(0, this.expiresAt - Date.now());
  }

  clear(): void {
    clearTimeout(this.timer);
  }
}

function unresolvedResources(graph: ResourceGraph): UnresolvedResource[] {
  const seen = new Map<string, string>();
  for (const reference of graph.references) {
    if (reference.status === "unresolved" && !seen.has(reference.url)) {
      seen.set(reference.url, reference.reason);
    }
  }
  return Array.from(seen, ([url, reason]) => ({ url, reason }));
}

interface RunContext {
  config: OptimizeConfig;
  collaborators: PipelineCollaborators;
  deadline: RunDeadline;
  signal?: AbortSignal;
  logger: Logger;
  warnings: string[];
}

type AuditAttempt = AuditOutcome & { skipped: boolean };

async function auditWithinDeadline(url: string, context: RunContext): Promise<AuditAttempt> {
  const { config, deadline } = context;
  if (deadline.expired) {
    context.logger.warn(`Skipping audit of ${url}: ${DEADLINE_REASON.toLowerCase()}`);
    return { metrics: placeholderMetrics(DEADLINE_REASON), opportunities: [], error: DEADLINE_REASON, skipped: true };
  }

  const outcome = await runAudit(
    url,
    context.collaborators.analyzer,
    { browser: config.browser, timeoutMs: Math.min(config.auditTimeoutMs, deadline.remainingMs()) },
    context.logger
  );
  throwIfCancelled(context.signal);
  return { ...outcome, skipped: false };
}

async function deriveCriticalCss(
  graph: ResourceGraph,
  context: RunContext
): Promise<{ layout: LayoutSnapshot | null; critical: CriticalCssSet }> {
  if (context.deadline.expired) {
    context.warnings.push(`Layout skipped: ${DEADLINE_REASON.toLowerCase()}`);
    return { layout: null, critical: { rules: [] } };
  }

  const { snapshot, warning } = await collectLayout(graph, context.collaborators.renderer, context.config, context.logger);
  throwIfCancelled(context.signal);
  if (warning) context.warnings.push(warning);

  if (!context.config.extractCriticalCss) {
    return { layout: snapshot, critical: { rules: [] } };
  }

  const { critical, warnings } = extractCriticalCss(graph, snapshot);
  context.warnings.push(...warnings);
  context.logger.info(`Extracted ${critical.rules.length} critical CSS rule(s)`);
  return { layout: snapshot, critical };
}

function buildMeta(
  graph: ResourceGraph,
  context: RunContext,
  startedAt: number,
  critical: CriticalCssSet,
  metrics: MetricsDocument[],
  layoutMissing: boolean
): RunMeta {
  return {
    url: graph.root.url,
    domain: getDomainFromUrl(graph.root.url),
    generatedAt: new Date().toISOString(),
    durationMs: Date.now() - startedAt,
    partial: graph.partial || context.deadline.expired,
    degraded: layoutMissing || metrics.some((m) => m.degraded),
    resourceCount: graph.resources.length,
    unresolved: unresolvedResources(graph),
    criticalRuleCount: critical.rules.length,
    warnings: [...graph.warnings, ...context.warnings],
  };
}

async function optimizeAndCompare(
  graph: ResourceGraph,
  workspace: SiteWorkspace,
  context: RunContext,
  startedAt: number
): Promise<RunResult> {
  const { layout, critical } = await deriveCriticalCss(graph, context);
  if (context.config.extractCriticalCss) {
    await workspace.write(CRITICAL_CSS_FILE, renderCriticalCss(critical));
  }

  const result = await optimizeResources(graph, layout, critical, context.collaborators.encoder, context.logger);
  throwIfCancelled(context.signal);
  for (const asset of result.assets) {
    await workspace.write(asset.localPath, asset.bytes);
  }
  await workspace.write(OPTIMIZED_DOCUMENT_PATH, rewriteDocument(result, graph, critical));

  // one analyzer at a time: both runs need the same browser profile
  const original = await auditWithinDeadline(graph.root.url, context);
  const site = await context.collaborators.serve(workspace.stagingDir);
  let optimized: AuditAttempt;
  try {
    optimized = await auditWithinDeadline(site.url, context);
  } finally {
    await site.close();
  }

  if (original.error && optimized.error && !original.skipped && !optimized.skipped) {
    const outputDir = await workspace.commit();
    context.logger.warn(`Optimized site written to ${outputDir} without a comparison report`);
    throw new AuditUnavailableError(`both analyzer runs failed (original: ${original.error}; optimized: ${optimized.error})`);
  }

  const report: OptimizationRunReport = {
    meta: buildMeta(graph, context, startedAt, critical, [original.metrics, optimized.metrics], layout === null),
    comparison: compareMetrics(original.metrics, optimized.metrics, result.actions),
  };
  await workspace.write(REPORT_JSON_FILE, JSON.stringify(report, null, 2));
  await workspace.write(REPORT_MARKDOWN_FILE, renderMarkdownReport(report));

  const files = [...workspace.files];
  const outputDir = await workspace.commit();
  return { mode: "optimize", outputDir, files, report };
}

async function analyzeOnly(
  graph: ResourceGraph,
  workspace: SiteWorkspace,
  context: RunContext,
  startedAt: number
): Promise<RunResult> {
  let critical: CriticalCssSet = { rules: [] };
  let layout: LayoutSnapshot | null = null;
  if (context.config.extractCriticalCss) {
    ({ layout, critical } = await deriveCriticalCss(graph, context));
    await workspace.write(CRITICAL_CSS_FILE, renderCriticalCss(critical));
  }

  const audit = await auditWithinDeadline(graph.root.url, context);
  if (audit.error && !audit.skipped) {
    const outputDir = await workspace.commit();
    context.logger.warn(`Artifacts written to ${outputDir} without an analysis report`);
    throw new AuditUnavailableError(`analyzer run failed: ${audit.error}`);
  }

  // layout is only collected for critical CSS here
  const layoutMissing = context.config.extractCriticalCss && layout === null;
  const meta = buildMeta(graph, context, startedAt, critical, [audit.metrics], layoutMissing);

  const recommendations = generateRecommendations(audit.opportunities);
  const report: AnalysisReport = {
    meta,
    metrics: audit.metrics,
    estimatedImprovement: estimateImprovement(audit.metrics.performanceScore, audit.opportunities),
    recommendations,
    automationOpportunities: findAutomationOpportunities(recommendations),
    criticalCssFile: context.config.extractCriticalCss ? CRITICAL_CSS_FILE : null,
  };
  await workspace.write(ANALYSIS_JSON_FILE, JSON.stringify(report, null, 2));
  await workspace.write(ANALYSIS_MARKDOWN_FILE, renderAnalysisMarkdown(report));

  const files = [...workspace.files];
  const outputDir = await workspace.commit();
  return { mode: "analyze", outputDir, files, report };
}

/**
 * Runs the whole pipeline for one site. A FetchError for the root document is
 * thrown before anything is written; any later error except cancellation is
 * thrown after the site directory has been committed.
 */
export async function runOptimization(input: OptimizeConfigInput, options: RunOptions = {}): Promise<RunResult> {
  const startedAt = Date.now();
  const config = parseConfig(input);
  const logger = options.logger ?? createLogger("optimizer");
  const deadline = new RunDeadline(config.runTimeoutMs);
  const context: RunContext = {
    config,
    collaborators: { ...defaultCollaborators(config), ...options.collaborators },
    deadline,
    signal: options.signal,
    logger,
    warnings: [],
  };

  let workspace: SiteWorkspace | null = null;
  try {
    const graph = await fetchSite(config, { signal: options.signal, deadline: deadline.signal, logger });

    workspace = await SiteWorkspace.create(config.outputDir, getDomainFromUrl(graph.root.url));
    await workspace.write(ROOT_DOCUMENT_PATH, graph.root.originalBytes);
    for (const resource of graph.resources) {
      await workspace.write(resource.localPath, resource.originalBytes);
    }
    throwIfCancelled(options.signal);

    return config.optimizeAndTest
      ? await optimizeAndCompare(graph, workspace, context, startedAt)
      : await analyzeOnly(graph, workspace, context, startedAt);
  } catch (error) {
    if (workspace && !workspace.committed) {
      // a cancelled run leaves no output; any other failure keeps what was produced
      if (error instanceof RunCancelledError) {
        await workspace.discard();
      } else {
        await workspace.commit();
      }
    }
    throw error;
  } finally {
    deadline.clear();
  }
}

export { parseConfig, OptimizeConfigSchema } from "./types";
export type { OptimizeConfig, OptimizeConfigInput } from "./types";
