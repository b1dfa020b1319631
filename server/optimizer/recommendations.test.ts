import { describe, expect, it } from "vitest";
import { estimateImprovement, findAutomationOpportunities, generateRecommendations } from "./recommendations";

describe("generateRecommendations", () => {
  it("puts high-importance audits first and keeps analyzer order within a group", () => {
    const recommendations = generateRecommendations([
      { id: "unused-javascript", title: "Reduce unused JavaScript", description: "", score: 0.7 },
      { id: "render-blocking-resources", title: "Eliminate render-blocking resources", description: "", score: 0.3 },
      { id: "bootup-time", title: "Reduce JavaScript execution time", description: "", score: 0.2 },
    ]);

    expect(recommendations.map((r) => [r.auditId, r.importance])).toEqual([
      ["render-blocking-resources", "high"],
      ["bootup-time", "high"],
      ["unused-javascript", "medium"],
    ]);
  });

  it("gives known audits concrete steps and others a generic one", () => {
    const [known, unknown] = generateRecommendations([
      { id: "offscreen-images", title: "Defer offscreen images", description: "", score: 0.1 },
      { id: "bootup-time", title: "Reduce JavaScript execution time", description: "", score: 0.1 },
    ]);

    expect(known.steps).toEqual(['Add loading="lazy" to images below the fold.']);
    expect(unknown.steps).toEqual(['Address "Reduce JavaScript execution time".']);
  });
});

describe("estimateImprovement", () => {
  it("weighs badly failing audits more than nearly passing ones", () => {
    expect(estimateImprovement(73, [{ score: 0.2 }, { score: 0.6 }])).toEqual({
      currentScore: 73,
      potentialScore: 77.1,
      improvement: 4.1,
    });
  });

  it("never promises more than a perfect score", () => {
    expect(estimateImprovement(98, [{ score: 0.1 }])).toEqual({ currentScore: 98, potentialScore: 100, improvement: 2 });
  });

  it("expects nothing when no audit fails", () => {
    expect(estimateImprovement(91, [])).toEqual({ currentScore: 91, potentialScore: 91, improvement: 0 });
  });
});

describe("findAutomationOpportunities", () => {
  it("groups failing audits under the tasks that can automate them", () => {
    const recommendations = generateRecommendations([
      { id: "modern-image-formats", title: "Serve images in next-gen formats", description: "", score: 0.4 },
      { id: "unminified-css", title: "Minify CSS", description: "", score: 0.7 },
      { id: "uses-optimized-images", title: "Efficiently encode images", description: "", score: 0.5 },
    ]);

    expect(findAutomationOpportunities(recommendations).map((o) => [o.task, o.complexity, o.auditIds])).toEqual([
      ["Image optimization", "medium", ["uses-optimized-images", "modern-image-formats"]],
      ["Asset minification", "low", ["unminified-css"]],
    ]);
  });

  it("finds none for audits nothing here automates", () => {
    const recommendations = generateRecommendations([
      { id: "bootup-time", title: "Reduce JavaScript execution time", description: "", score: 0.2 },
    ]);

    expect(findAutomationOpportunities(recommendations)).toEqual([]);
  });
});
