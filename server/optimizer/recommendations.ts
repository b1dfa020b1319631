import type {
  AutomationOpportunity,
  Recommendation,
  RecommendationImportance,
  ScoreEstimate,
} from "@shared/report-types";
import type { AuditOpportunity } from "./lighthouse";

const HIGH_IMPORTANCE_BELOW = 0.5;
const PASSING_SCORE = 0.9;

const STEPS_BY_AUDIT: Record<string, string[]> = {
  "render-blocking-resources": [
    "Add the defer attribute to scripts that are not needed for first paint.",
    "Inline critical CSS and load the remaining stylesheets asynchronously.",
  ],
  "unminified-css": ["Minify CSS files.", "Add a minification step to the build."],
  "unminified-javascript": ["Minify JS files.", "Add a minification step to the build."],
  "unused-css-rules": [
    "Remove unused CSS.",
    "Prune unused selectors automatically during the build.",
  ],
  "unused-javascript": ["Split bundles so each page loads only the code it runs.", "Remove dead code."],
  "offscreen-images": ['Add loading="lazy" to images below the fold.'],
  "uses-responsive-images": ["Serve sized variants with srcset and sizes."],
  "uses-optimized-images": [
    "Compress images and serve modern formats such as WebP.",
    "Add an image optimization step to the build.",
  ],
  "modern-image-formats": ["Serve images as WebP or AVIF."],
  "uses-text-compression": ["Enable gzip or Brotli compression on the server."],
  "uses-long-cache-ttl": ["Serve static assets with a long Cache-Control max-age."],
  "unsized-images": ["Give every image explicit width and height attributes."],
  "font-display": ['Use font-display: swap in @font-face rules.'],
  "uses-rel-preconnect": ["Preconnect to required third-party origins."],
};

const AUTOMATIONS: Array<Omit<AutomationOpportunity, "auditIds"> & { audits: string[] }> = [
  {
    task: "Critical CSS, deferred scripts and lazy images",
    approach: "Run in optimize-and-test mode to apply these rewrites to a local copy and measure them",
    complexity: "low",
    audits: ["render-blocking-resources", "offscreen-images", "unsized-images", "uses-rel-preconnect"],
  },
  {
    task: "Image optimization",
    approach: "Build an automated image optimization pipeline that emits WebP or AVIF",
    complexity: "medium",
    audits: ["uses-optimized-images", "modern-image-formats", "uses-responsive-images"],
  },
  {
    task: "Asset minification",
    approach: "Add a minification step for CSS and JS to the build",
    complexity: "low",
    audits: ["unminified-css", "unminified-javascript"],
  },
];

function roundToTenth(value: number): number {
  return Math.round(value * 10) / 10;
}

function importanceFor(score: number): RecommendationImportance {
  return score < HIGH_IMPORTANCE_BELOW ? "high" : "medium";
}

/** Turns failing analyzer audits into recommendations, high importance first. */
export function generateRecommendations(opportunities: AuditOpportunity[]): Recommendation[] {
  const recommendations = opportunities.map((opportunity) => ({
    auditId: opportunity.id,
    title: opportunity.title,
    score: opportunity.score,
    importance: importanceFor(opportunity.score),
    steps: STEPS_BY_AUDIT[opportunity.id] ?? [`Address "${opportunity.title}".`],
  }));

  const rank: Record<RecommendationImportance, number> = { high: 0, medium: 1 };
  // stable sort keeps analyzer order within a group
  return recommendations.sort((a, b) => rank[a.importance] - rank[b.importance]);
}

/**
 * Rough score gain from fixing every failing audit: badly failing audits
 * weigh more, and the total never goes past a perfect score.
 */
export function estimateImprovement(currentScore: number, opportunities: Pick<AuditOpportunity, "score">[]): ScoreEstimate {
  let potential = 0;
  for (const { score } of opportunities) {
    potential += (PASSING_SCORE - score) * (score < HIGH_IMPORTANCE_BELOW ? 5 : 2);
  }

  const improvement = roundToTenth(Math.max(0, Math.min(potential, 100 - currentScore)));
  return {
    currentScore,
    potentialScore: roundToTenth(Math.min(currentScore + improvement, 100)),
    improvement,
  };
}

export function findAutomationOpportunities(recommendations: Recommendation[]): AutomationOpportunity[] {
  const failing = new Set(recommendations.map((recommendation) => recommendation.auditId));
  return AUTOMATIONS.flatMap(({ audits, ...automation }) => {
    const auditIds = audits.filter((id) => failing.has(id));
    return auditIds.length > 0 ? [{ ...automation, auditIds }] : [];
  });
}
