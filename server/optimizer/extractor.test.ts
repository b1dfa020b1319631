import { describe, expect, it } from "vitest";
import {
  extractDocumentReferences,
  extractStylesheetReferences,
  hasRel,
  kindFromContentType,
  kindFromUrl,
  parseSrcset,
} from "./extractor";

describe("extractDocumentReferences", () => {
  it("lists stylesheets, fonts, icons, scripts, images and style url()s in document order", () => {
    const html = `<!DOCTYPE html>
<html><head>
<base href="https://site.test/sub/">
<link rel="stylesheet" href="main.css">
<link rel="preload" as="font" href="/fonts/a.woff2">
<link rel="icon" href="/favicon.ico">
<link rel="preconnect" href="https://cdn.test">
<style>body { background: url('bg.png') } .x { background: url(data:image/png;base64,AA) }</style>
<script src="app.js"></script>
</head><body>
<img src="/img/hero.jpg">
<div style='background-image: url("/img/tile.png")'></div>
<a href="/page">link</a>
</body></html>`;

    expect(extractDocumentReferences(html, "https://site.test/")).toEqual([
      { url: "https://site.test/sub/main.css", origin: "link-stylesheet", kind: "css" },
      { url: "https://site.test/fonts/a.woff2", origin: "link-font", kind: "font" },
      { url: "https://site.test/favicon.ico", origin: "link-icon", kind: "image" },
      { url: "https://site.test/sub/bg.png", origin: "style-url", kind: "image" },
      { url: "https://site.test/sub/app.js", origin: "script-src", kind: "js" },
      { url: "https://site.test/img/hero.jpg", origin: "img-src", kind: "image" },
      { url: "https://site.test/img/tile.png", origin: "style-url", kind: "image" },
    ]);
  });

  it("keeps duplicate references so each one can be annotated", () => {
    const html = `<link rel="stylesheet" href="https://site.test/main.css"><link rel="stylesheet" href="/main.css">`;

    const urls = extractDocumentReferences(html, "https://site.test/").map((r) => r.url);

    expect(urls).toEqual(["https://site.test/main.css", "https://site.test/main.css"]);
  });

  it("lists every srcset candidate of images and picture sources", () => {
    const html = `<img src="a.png" srcset="a-2x.png 2x, a-3x.png 3x"><picture><source srcset="b.webp 480w,b-wide.webp 960w"><img src="b.png"></picture>`;

    expect(extractDocumentReferences(html, "https://site.test/").map((r) => [r.url, r.origin, r.kind])).toEqual([
      ["https://site.test/a.png", "img-src", "image"],
      ["https://site.test/a-2x.png", "img-src", "image"],
      ["https://site.test/a-3x.png", "img-src", "image"],
      ["https://site.test/b.webp", "img-src", "image"],
      ["https://site.test/b-wide.webp", "img-src", "image"],
      ["https://site.test/b.png", "img-src", "image"],
    ]);
  });
});

describe("parseSrcset", () => {
  it("splits candidates and keeps their descriptors", () => {
    expect(parseSrcset(" small.png, big.png 2x ,wide.png 960w")).toEqual([
      { url: "small.png", descriptor: "" },
      { url: "big.png", descriptor: "2x" },
      { url: "wide.png", descriptor: "960w" },
    ]);
  });

  it("keeps the commas inside a data: URL", () => {
    expect(parseSrcset("data:image/png;base64,AAAA 1x, big.png 2x")).toEqual([
      { url: "data:image/png;base64,AAAA", descriptor: "1x" },
      { url: "big.png", descriptor: "2x" },
    ]);
  });
});

describe("extractStylesheetReferences", () => {
  it("separates @import targets from url() assets", () => {
    const css = `@import url("reset.css");
@import 'theme.css' screen;
.a { background: url(../img/a.png) }
@font-face { font-family: X; src: url("/f/x.woff2") format("woff2"); }`;

    const result = extractStylesheetReferences(css, "https://site.test/css/main.css");

    expect(result.imports).toEqual(["https://site.test/css/reset.css", "https://site.test/css/theme.css"]);
    expect(result.assets).toEqual([
      { url: "https://site.test/img/a.png", origin: "css-url", kind: "image" },
      { url: "https://site.test/f/x.woff2", origin: "css-url", kind: "font" },
    ]);
    expect(result.error).toBeUndefined();
  });

  it("reports unparseable stylesheets instead of throwing", () => {
    const result = extractStylesheetReferences("a { color: red", "https://site.test/broken.css");

    expect(result.imports).toEqual([]);
    expect(result.error).toBeDefined();
  });
});

describe("resource kinds", () => {
  it("prefers the served content type", () => {
    expect(kindFromContentType("text/css; charset=utf-8", "other")).toBe("css");
    expect(kindFromContentType("image/avif", "other")).toBe("image");
    expect(kindFromContentType("application/octet-stream", "font")).toBe("font");
  });

  it("guesses from the extension", () => {
    expect(kindFromUrl("https://site.test/a.woff2?v=3")).toBe("font");
    expect(kindFromUrl("https://site.test/a.mjs")).toBe("js");
    expect(kindFromUrl("https://site.test/a")).toBe("other");
  });

  it("matches rel tokens case-insensitively", () => {
    expect(hasRel("Preload StyleSheet", "stylesheet")).toBe(true);
    expect(hasRel("alternate stylesheets", "stylesheet")).toBe(false);
    expect(hasRel(undefined, "stylesheet")).toBe(false);
  });
});
