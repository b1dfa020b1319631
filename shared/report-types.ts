export type MetricKey =
  | "performanceScore"
  | "largestContentfulPaintMs"
  | "cumulativeLayoutShift"
  | "totalBlockingTimeMs"
  | "timeToInteractiveMs";

export type MetricsSource = "analyzer" | "placeholder";

export interface MetricsDocument {
  performanceScore: number;
  largestContentfulPaintMs: number;
  cumulativeLayoutShift: number;
  totalBlockingTimeMs: number;
  timeToInteractiveMs: number;
  source: MetricsSource;
  // true when the numbers are a stand-in for a failed analyzer run
  degraded: boolean;
  degradedReason?: string;
}

export type OptimizationKind =
  | "convert-format"
  | "compress"
  | "add-dimensions"
  | "add-lazy-load"
  | "defer"
  | "async"
  | "add-resource-hint"
  | "set-cache-header";

export type ActionStatus = "applied" | "skipped" | "recommended";

export interface OptimizationAction {
  readonly targetResourceUrl: string;
  readonly kind: OptimizationKind;
  readonly status: ActionStatus;
  readonly before: string;
  readonly after: string;
  readonly detail?: string;
}

export type DeltaVerdict = "improved" | "regressed" | "unchanged" | "unavailable";

export interface MetricDelta {
  metric: MetricKey;
  label: string;
  original: number;
  optimized: number;
  // optimized - original; null when either side is placeholder data
  delta: number | null;
  higherIsBetter: boolean;
  verdict: DeltaVerdict;
}

export interface ComparisonReport {
  originalMetrics: MetricsDocument;
  optimizedMetrics: MetricsDocument;
  perMetricDelta: Record<MetricKey, number | null>;
  metrics: MetricDelta[];
  actionsApplied: OptimizationAction[];
}

export interface UnresolvedResource {
  url: string;
  reason: string;
}

export interface RunMeta {
  url: string;
  domain: string;
  generatedAt: string;
  durationMs: number;
  partial: boolean;
  degraded: boolean;
  resourceCount: number;
  unresolved: UnresolvedResource[];
  criticalRuleCount: number;
  warnings: string[];
}

export interface OptimizationRunReport {
  meta: RunMeta;
  comparison: ComparisonReport;
}

export type RecommendationImportance = "high" | "medium";

export interface Recommendation {
  auditId: string;
  title: string;
  score: number;
  importance: RecommendationImportance;
  steps: string[];
}

export interface ScoreEstimate {
  currentScore: number;
  potentialScore: number;
  // points on the 0-100 score, never more than 100 - currentScore
  improvement: number;
}

export type AutomationComplexity = "low" | "medium";

export interface AutomationOpportunity {
  task: string;
  approach: string;
  complexity: AutomationComplexity;
  auditIds: string[];
}

export interface AnalysisReport {
  meta: RunMeta;
  metrics: MetricsDocument;
  estimatedImprovement: ScoreEstimate;
  recommendations: Recommendation[];
  automationOpportunities: AutomationOpportunity[];
  criticalCssFile: string | null;
}
