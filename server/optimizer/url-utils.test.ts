import { describe, expect, it } from "vitest";
import { getDomainFromUrl, isSameOrigin, normalizeUrl, replaceExtension, toMirrorPath } from "./url-utils";

const ROOT = "https://site.test/";

describe("normalizeUrl", () => {
  it("resolves relative references and drops the fragment", () => {
    expect(normalizeUrl("../a/b.css#top", "https://site.test/page/sub/")).toBe("https://site.test/page/a/b.css");
  });

  it("rejects non-fetchable schemes and blank values", () => {
    expect(normalizeUrl("javascript:void(0)")).toBeNull();
    expect(normalizeUrl("data:image/png;base64,AAAA", ROOT)).toBeNull();
    expect(normalizeUrl("   ")).toBeNull();
  });
});

describe("isSameOrigin", () => {
  it("compares scheme, host and port", () => {
    expect(isSameOrigin("https://site.test/a", "https://site.test/b")).toBe(true);
    expect(isSameOrigin("https://site.test/a", "http://site.test/a")).toBe(false);
    expect(isSameOrigin("https://site.test/a", "https://site.test:8443/a")).toBe(false);
  });
});

describe("getDomainFromUrl", () => {
  it("uses the host name and folds in the port", () => {
    expect(getDomainFromUrl("https://Site.Test/docs")).toBe("site.test");
    expect(getDomainFromUrl("http://127.0.0.1:8080/")).toBe("127.0.0.1-8080");
  });

  it("falls back for unparseable input", () => {
    expect(getDomainFromUrl("not a url")).toBe("example-com");
  });
});

describe("toMirrorPath", () => {
  it("keeps same-origin paths", () => {
    expect(toMirrorPath("https://site.test/css/main.css", ROOT)).toBe("css/main.css");
  });

  it("maps directory URLs to index.html", () => {
    expect(toMirrorPath("https://site.test/", ROOT)).toBe("index.html");
    expect(toMirrorPath("https://site.test/docs/", ROOT)).toBe("docs/index.html");
  });

  it("puts other origins under _external", () => {
    expect(toMirrorPath("https://cdn.other.test/lib/a%20b.js", ROOT)).toBe("_external/cdn.other.test/lib/a_b.js");
  });

  it("gives distinct query strings distinct files", () => {
    const v1 = toMirrorPath("https://site.test/app.js?v=1", ROOT);
    const v2 = toMirrorPath("https://site.test/app.js?v=2", ROOT);

    expect(v1).toMatch(/^app-[0-9a-f]{8}\.js$/);
    expect(v2).toMatch(/^app-[0-9a-f]{8}\.js$/);
    expect(v1).not.toBe(v2);
  });

  it("never escapes the mirror root", () => {
    expect(toMirrorPath("https://site.test/a/..%2Fsecret.txt", ROOT)).toBe("a/.._secret.txt");
  });
});

describe("replaceExtension", () => {
  it("swaps the last extension", () => {
    expect(replaceExtension("img/hero.png", "optimized.webp")).toBe("img/hero.optimized.webp");
    expect(replaceExtension("img/hero", "webp")).toBe("img/hero.webp");
  });
});
