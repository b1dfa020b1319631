import type {
  AnalysisReport,
  ComparisonReport,
  DeltaVerdict,
  MetricDelta,
  MetricKey,
  MetricsDocument,
  OptimizationAction,
  OptimizationRunReport,
  RunMeta,
} from "@shared/report-types";

interface MetricDefinition {
  key: MetricKey;
  label: string;
  unit: "" | "ms";
  decimals: number;
  higherIsBetter: boolean;
}

export const METRIC_DEFINITIONS: readonly MetricDefinition[] = [
  { key: "performanceScore", label: "Performance score", unit: "", decimals: 0, higherIsBetter: true },
  { key: "largestContentfulPaintMs", label: "Largest Contentful Paint", unit: "ms", decimals: 0, higherIsBetter: false },
  { key: "cumulativeLayoutShift", label: "Cumulative Layout Shift", unit: "", decimals: 3, higherIsBetter: false },
  { key: "totalBlockingTimeMs", label: "Total Blocking Time", unit: "ms", decimals: 0, higherIsBetter: false },
  { key: "timeToInteractiveMs", label: "Time to Interactive", unit: "ms", decimals: 0, higherIsBetter: false },
];

export const SIGN_CONVENTION =
  "Delta is optimized minus original. For the performance score a positive delta is an improvement; " +
  "for LCP, CLS, TBT and TTI a positive delta is a regression.";

function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

function verdictFor(delta: number | null, higherIsBetter: boolean): DeltaVerdict {
  if (delta === null) return "unavailable";
  if (delta === 0) return "unchanged";
  return delta > 0 === higherIsBetter ? "improved" : "regressed";
}

export function compareMetrics(
  original: MetricsDocument,
  optimized: MetricsDocument,
  actions: readonly OptimizationAction[]
): ComparisonReport {
  // placeholder numbers never produce a delta
  const comparable = !original.degraded && !optimized.degraded;

  const metrics: MetricDelta[] = METRIC_DEFINITIONS.map((definition) => {
    const before = original[definition.key];
    const after = optimized[definition.key];
    const delta = comparable ? roundTo(after - before, definition.decimals) : null;
    return {
      metric: definition.key,
      label: definition.label,
      original: before,
      optimized: after,
      delta,
      higherIsBetter: definition.higherIsBetter,
      verdict: verdictFor(delta, definition.higherIsBetter),
    };
  });

  const deltaOf = (key: MetricKey): number | null => metrics.find((m) => m.metric === key)?.delta ?? null;
  const perMetricDelta: Record<MetricKey, number | null> = {
    performanceScore: deltaOf("performanceScore"),
    largestContentfulPaintMs: deltaOf("largestContentfulPaintMs"),
    cumulativeLayoutShift: deltaOf("cumulativeLayoutShift"),
    totalBlockingTimeMs: deltaOf("totalBlockingTimeMs"),
    timeToInteractiveMs: deltaOf("timeToInteractiveMs"),
  };

  return Object.freeze({
    originalMetrics: original,
    optimizedMetrics: optimized,
    perMetricDelta,
    metrics,
    actionsApplied: [...actions],
  });
}

function formatValue(definition: MetricDefinition, value: number): string {
  const text = definition.decimals > 0 ? value.toFixed(definition.decimals) : String(value);
  return definition.unit ? `${text} ${definition.unit}` : text;
}

function formatDelta(definition: MetricDefinition, delta: number | null): string {
  if (delta === null) return "n/a";
  const sign = delta > 0 ? "+" : "";
  return `${sign}${formatValue(definition, delta)}`;
}

function formatMeasured(definition: MetricDefinition, metrics: MetricsDocument): string {
  const value = formatValue(definition, metrics[definition.key]);
  return metrics.degraded ? `${value} (placeholder)` : value;
}

function escapeCell(text: string): string {
  return text.replace(/\|/g, "\\|").replace(/\n/g, " ");
}

function renderMetaNotes(meta: RunMeta, documents: MetricsDocument[]): string[] {
  const lines: string[] = [];
  if (meta.partial) {
    lines.push(
      `> **Partial run:** ${meta.unresolved.length} resource(s) could not be fetched or the run deadline was reached.`
    );
  }
  for (const document of documents) {
    if (document.degraded) {
      lines.push(
        `> **Placeholder metrics:** the analyzer failed (${document.degradedReason ?? "unknown reason"}); these numbers are synthetic.`
      );
    }
  }
  if (lines.length > 0) lines.push("");
  return lines;
}

function renderUnresolved(meta: RunMeta): string[] {
  if (meta.unresolved.length === 0) return [];
  return [
    "## Unresolved resources",
    "",
    ...meta.unresolved.map((entry) => `- ${entry.url}: ${entry.reason}`),
    "",
  ];
}

function renderWarnings(meta: RunMeta): string[] {
  if (meta.warnings.length === 0) return [];
  return ["## Warnings", "", ...meta.warnings.map((warning) => `- ${warning}`), ""];
}

function renderActions(actions: readonly OptimizationAction[]): string[] {
  const lines: string[] = [];
  const applied = actions.filter((a) => a.status === "applied");
  const skipped = actions.filter((a) => a.status === "skipped");
  const recommended = actions.filter((a) => a.status === "recommended");

  lines.push("## Optimizations applied", "");
  if (applied.length === 0) {
    lines.push("No optimizations were applied.", "");
  } else {
    lines.push("| Kind | Resource | Before | After |", "| --- | --- | --- | --- |");
    for (const action of applied) {
      lines.push(
        `| ${action.kind} | ${escapeCell(action.targetResourceUrl)} | ${escapeCell(action.before)} | ${escapeCell(action.after)} |`
      );
    }
    lines.push("");
  }

  if (skipped.length > 0) {
    lines.push("## Skipped", "");
    for (const action of skipped) {
      lines.push(`- ${action.kind} ${action.targetResourceUrl}: ${action.detail ?? "preconditions not met"}`);
    }
    lines.push("");
  }

  if (recommended.length > 0) {
    lines.push("## Recommended cache headers", "");
    for (const action of recommended) {
      lines.push(`- ${action.targetResourceUrl}: \`${action.after}\``);
    }
    lines.push("");
  }

  return lines;
}

export function renderMarkdownReport(report: OptimizationRunReport): string {
  const { meta, comparison } = report;
  const lines: string[] = [
    `# Page speed report: ${meta.url}`,
    "",
    `Generated ${meta.generatedAt} in ${(meta.durationMs / 1000).toFixed(1)}s. ` +
      `${meta.resourceCount} resource(s) mirrored, ${meta.criticalRuleCount} critical CSS rule(s) inlined.`,
    "",
    ...renderMetaNotes(meta, [comparison.originalMetrics, comparison.optimizedMetrics]),
    "## Metrics",
    "",
    SIGN_CONVENTION,
    "",
    "| Metric | Original | Optimized | Delta | Verdict |",
    "| --- | --- | --- | --- | --- |",
  ];

  for (const definition of METRIC_DEFINITIONS) {
    const entry = comparison.metrics.find((m) => m.metric === definition.key);
    lines.push(
      `| ${definition.label} | ${formatMeasured(definition, comparison.originalMetrics)} | ` +
        `${formatMeasured(definition, comparison.optimizedMetrics)} | ` +
        `${formatDelta(definition, entry?.delta ?? null)} | ${entry?.verdict ?? "unavailable"} |`
    );
  }
  lines.push("");

  lines.push(...renderActions(comparison.actionsApplied));
  lines.push(...renderUnresolved(meta));
  lines.push(...renderWarnings(meta));

  lines.push(
    "## Next steps",
    "",
    "1. Compare the optimized copy in this directory with the live page.",
    "2. Apply the changes that held up to the production build.",
    "3. Configure the recommended cache headers on the origin server.",
    "4. Re-run this report after deploying.",
    ""
  );

  return lines.join("\n");
}

export function renderAnalysisMarkdown(report: AnalysisReport): string {
  const { meta, metrics, estimatedImprovement: estimate } = report;
  const lines: string[] = [
    `# Page speed analysis: ${meta.url}`,
    "",
    `Generated ${meta.generatedAt}.`,
    "",
    ...renderMetaNotes(meta, [metrics]),
    "## Metrics",
    "",
    "| Metric | Value |",
    "| --- | --- |",
    ...METRIC_DEFINITIONS.map((definition) => `| ${definition.label} | ${formatMeasured(definition, metrics)} |`),
    "",
    "## Estimated improvement",
    "",
    `Fixing every failing audit could take the score from ${estimate.currentScore} to ${estimate.potentialScore} (+${estimate.improvement} points). This is a rough heuristic, not a measurement.`,
    "",
    "## Recommendations",
    "",
  ];

  if (report.recommendations.length === 0) {
    lines.push("No failing audits.", "");
  }
  report.recommendations.forEach((recommendation, index) => {
    lines.push(`### ${index + 1}. ${recommendation.title} (${recommendation.importance})`, "");
    for (const step of recommendation.steps) lines.push(`- ${step}`);
    lines.push("");
  });

  if (report.automationOpportunities.length > 0) {
    lines.push("## Automation opportunities", "");
    for (const opportunity of report.automationOpportunities) {
      lines.push(`- **${opportunity.task}** (${opportunity.complexity}): ${opportunity.approach}. Covers ${opportunity.auditIds.join(", ")}.`);
    }
    lines.push("");
  }

  if (report.criticalCssFile) {
    lines.push("## Critical CSS", "", `Written to \`${report.criticalCssFile}\`.`, "");
  }

  lines.push(...renderUnresolved(meta));
  lines.push(...renderWarnings(meta));

  return lines.join("\n");
}
