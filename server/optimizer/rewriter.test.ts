import * as cheerio from "cheerio";
import { describe, expect, it } from "vitest";
import { buildLocalPathMap, rewriteDocument } from "./rewriter";
import type { OptimizationResult } from "./resource-optimizer";
import { makeGraph, makeResource } from "./testing";

const html = `<!DOCTYPE html><html><head><meta charset="utf-8"><base href="https://site.test/"><link rel="stylesheet" href="/css/main.css" media="screen"><style>.a{background:url(/img/bg.png)}</style></head><body><img src="/img/hero.png"><script src="https://cdn.other.test/lib.js"></script></body></html>`;

const resources = [
  makeResource("https://site.test/css/main.css", "css", ".a { color: red; }"),
  makeResource("https://site.test/img/bg.png", "image", "bg"),
  makeResource("https://site.test/img/hero.png", "image", "hero"),
  makeResource("https://cdn.other.test/lib.js", "js", "lib()"),
];

const critical = {
  rules: [".a { color: red; }", '@font-face { font-family: X; src: url("https://site.test/fonts/x.woff2"); }'],
};

function workingCopy(): OptimizationResult {
  return {
    document: cheerio.load(html),
    actions: [],
    assets: [{ url: "https://site.test/img/hero.png", localPath: "img/hero.optimized.webp", bytes: Buffer.from("webp") }],
  };
}

describe("rewriteDocument", () => {
  it("is byte-identical across runs", () => {
    const graph = makeGraph(html, resources);

    expect(rewriteDocument(workingCopy(), graph, critical)).toBe(rewriteDocument(workingCopy(), graph, critical));
  });

  it("inlines critical CSS ahead of every other stylesheet", () => {
    const output = rewriteDocument(workingCopy(), makeGraph(html, resources), critical);
    const $ = cheerio.load(output);

    const head = $("head").children().map((_, el) => el.tagName).get();
    expect(head).toEqual(["meta", "style", "link", "noscript", "style"]);
    expect($("head > style").first().attr("id")).toBe("critical-css");
    expect($("#critical-css").text()).toBe(
      '.a { color: red; }\n@font-face { font-family: X; src: url("https://site.test/fonts/x.woff2"); }'
    );
  });

  it("loads the remaining stylesheets asynchronously with a no-script fallback", () => {
    const output = rewriteDocument(workingCopy(), makeGraph(html, resources), critical);
    const $ = cheerio.load(output);
    const link = $("head > link");

    expect(link.attr("rel")).toBe("preload");
    expect(link.attr("as")).toBe("style");
    expect(link.attr("onload")).toBe("this.onload=null;this.rel='stylesheet'");
    expect(link.attr("href")).toBe("css/main.css");
    expect(output).toContain('<noscript><link rel="stylesheet" href="css/main.css" media="screen"></noscript>');
  });

  it("points references at the local mirror and optimized assets", () => {
    const output = rewriteDocument(workingCopy(), makeGraph(html, resources), critical);
    const $ = cheerio.load(output);

    expect($("base")).toHaveLength(0);
    expect($("img").attr("src")).toBe("img/hero.optimized.webp");
    expect($("script").attr("src")).toBe("_external/cdn.other.test/lib.js");
    expect($("head > style").last().text()).toBe('.a{background:url("img/bg.png")}');
  });

  it("keeps unresolved references absolute", () => {
    const output = rewriteDocument(workingCopy(), makeGraph(html, []), { rules: [] });
    const $ = cheerio.load(output);

    expect($("img").attr("src")).toBe("img/hero.optimized.webp");
    expect($("script").attr("src")).toBe("https://cdn.other.test/lib.js");
    expect($("link").attr("href")).toBe("https://site.test/css/main.css");
  });

  it("points every srcset candidate at its local copy", () => {
    const picture = `<html><head></head><body><picture><source srcset="/img/hero.webp 1x, /img/hero-2x.webp 2x"><img src="/img/hero.png" srcset="/img/hero.png 1x, https://cdn.other.test/hero-2x.png 2x"></picture></body></html>`;
    const graph = makeGraph(picture, [
      makeResource("https://site.test/img/hero.webp", "image", "webp"),
      makeResource("https://site.test/img/hero-2x.webp", "image", "webp-2x"),
      makeResource("https://site.test/img/hero.png", "image", "hero"),
    ]);

    const output = rewriteDocument({ ...workingCopy(), document: cheerio.load(picture) }, graph, { rules: [] });
    const $ = cheerio.load(output);

    expect($("source").attr("srcset")).toBe("img/hero.webp 1x, img/hero-2x.webp 2x");
    expect($("img").attr("srcset")).toBe("img/hero.optimized.webp 1x, https://cdn.other.test/hero-2x.png 2x");
  });

  it("leaves stylesheets render-blocking when there is no critical CSS", () => {
    const output = rewriteDocument(workingCopy(), makeGraph(html, resources), { rules: [] });
    const $ = cheerio.load(output);

    expect($("#critical-css")).toHaveLength(0);
    expect($("head > link").attr("rel")).toBe("stylesheet");
    expect($("noscript")).toHaveLength(0);
  });

  it("does not modify the working document", () => {
    const result = workingCopy();
    const before = result.document.html();

    rewriteDocument(result, makeGraph(html, resources), critical);

    expect(result.document.html()).toBe(before);
  });
});

describe("buildLocalPathMap", () => {
  it("prefers optimized assets over mirrored originals", () => {
    const paths = buildLocalPathMap(makeGraph(html, resources), workingCopy());

    expect(paths.get("https://site.test/img/hero.png")).toBe("img/hero.optimized.webp");
    expect(paths.get("https://site.test/img/bg.png")).toBe("img/bg.png");
  });
});
