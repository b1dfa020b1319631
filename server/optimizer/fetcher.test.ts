import { afterEach, describe, expect, it, vi } from "vitest";
import { fetchSite } from "./fetcher";
import { FetchError, RunCancelledError } from "./errors";
import { parseConfig } from "./types";

type Route = { body: string; type: string; status?: number; finalUrl?: string } | "hang";

function stubSite(routes: Record<string, Route>): string[] {
  const requested: string[] = [];
  vi.stubGlobal(
    "fetch",
    vi.fn(async (input: string, init?: RequestInit): Promise<Response> => {
      requested.push(input);
      const route = routes[input];
      if (route === "hang") {
        return new Promise<Response>((_, reject) => {
          init?.signal?.addEventListener("abort", () => reject(new Error("The operation was aborted")));
        });
      }
      if (!route) {
        return new Response("not found", { status: 404 });
      }
      const response = new Response(route.body, { status: route.status ?? 200, headers: { "content-type": route.type } });
      if (route.finalUrl) {
        // fetch reports where redirects ended through response.url
        Object.defineProperty(response, "url", { value: route.finalUrl });
      }
      return response;
    })
  );
  return requested;
}

const config = parseConfig({ url: "https://site.test/", timeoutMs: 50, concurrency: 2 });

describe("fetchSite", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("fetches a stylesheet linked twice only once", async () => {
    const requested = stubSite({
      "https://site.test/": {
        type: "text/html",
        body: `<html><head>
<link rel="stylesheet" href="https://site.test/css/main.css">
<link rel="stylesheet" href="/css/main.css">
</head><body></body></html>`,
      },
      "https://site.test/css/main.css": { type: "text/css", body: ".hero { background: url(../img/bg.png) }" },
      "https://site.test/img/bg.png": { type: "image/png", body: "png-bytes" },
    });

    const graph = await fetchSite(config);

    expect(graph.resources.map((r) => r.url)).toEqual(["https://site.test/css/main.css", "https://site.test/img/bg.png"]);
    expect(requested.filter((url) => url === "https://site.test/css/main.css")).toHaveLength(1);
    expect(graph.references.map((r) => [r.url, r.origin, r.status])).toEqual([
      ["https://site.test/css/main.css", "link-stylesheet", "resolved"],
      ["https://site.test/css/main.css", "link-stylesheet", "resolved"],
      ["https://site.test/img/bg.png", "css-url", "resolved"],
    ]);
    expect(graph.resources[1].localPath).toBe("img/bg.png");
    expect(graph.partial).toBe(false);
  });

  it("resolves references against the URL the root redirected to", async () => {
    stubSite({
      "https://site.test/docs": {
        type: "text/html",
        body: `<html><head><link rel="stylesheet" href="main.css"></head><body></body></html>`,
        finalUrl: "https://site.test/docs/",
      },
      "https://site.test/docs/main.css": { type: "text/css", body: ".t{color:red}" },
    });

    const graph = await fetchSite(parseConfig({ url: "https://site.test/docs", timeoutMs: 50 }));

    expect(graph.root.url).toBe("https://site.test/docs");
    expect(graph.baseUrl).toBe("https://site.test/docs/");
    expect(graph.resources.map((r) => [r.url, r.localPath])).toEqual([["https://site.test/docs/main.css", "docs/main.css"]]);
  });

  it("records a timed-out resource as unresolved and marks the graph partial", async () => {
    stubSite({
      "https://site.test/": {
        type: "text/html",
        body: `<html><body><img src="/img/large.jpg"><script src="/js/app.js"></script></body></html>`,
      },
      "https://site.test/img/large.jpg": "hang",
      "https://site.test/js/app.js": { type: "application/javascript", body: "console.log(1)" },
    });

    const graph = await fetchSite(config);

    const image = graph.references.find((r) => r.url === "https://site.test/img/large.jpg");
    expect(image).toMatchObject({ status: "unresolved", reason: "Request timeout after 50ms" });
    expect(graph.resources.map((r) => r.url)).toEqual(["https://site.test/js/app.js"]);
    expect(graph.partial).toBe(true);
  });

  it("treats stylesheet imports past the depth limit as unresolved", async () => {
    const requested = stubSite({
      "https://site.test/": {
        type: "text/html",
        body: `<html><head><link rel="stylesheet" href="/main.css"></head></html>`,
      },
      "https://site.test/main.css": { type: "text/css", body: `@import "a.css"; body { margin: 0 }` },
      "https://site.test/a.css": { type: "text/css", body: `@import "b.css"; p { margin: 0 }` },
      "https://site.test/b.css": { type: "text/css", body: "h1 { margin: 0 }" },
    });

    const graph = await fetchSite(config);

    expect(requested).not.toContain("https://site.test/b.css");
    expect(graph.references.find((r) => r.url === "https://site.test/a.css")).toMatchObject({
      status: "resolved",
      depth: 1,
    });
    expect(graph.references.find((r) => r.url === "https://site.test/b.css")).toMatchObject({
      status: "unresolved",
      reason: "Stylesheet import nested deeper than 1 level(s)",
    });
    expect(graph.warnings).toEqual(["Stylesheet import nested deeper than 1 level(s): https://site.test/b.css"]);
  });

  it("fails when the root document cannot be fetched", async () => {
    stubSite({ "https://site.test/": { type: "text/html", body: "down", status: 503 } });

    await expect(fetchSite(config)).rejects.toThrow(FetchError);
    await expect(fetchSite(config)).rejects.toThrow("Failed to fetch https://site.test/: HTTP 503");
  });

  it("fails when the root document is not HTML", async () => {
    stubSite({ "https://site.test/": { type: "application/pdf", body: "%PDF" } });

    await expect(fetchSite(config)).rejects.toThrow("Non-HTML content type: application/pdf");
  });

  it("stops when the run is cancelled", async () => {
    stubSite({ "https://site.test/": { type: "text/html", body: "<html></html>" } });
    const controller = new AbortController();
    controller.abort();

    await expect(fetchSite(config, { signal: controller.signal })).rejects.toThrow(RunCancelledError);
  });

  it("marks remaining resources unresolved once the run deadline passes", async () => {
    stubSite({
      "https://site.test/": { type: "text/html", body: `<html><body><img src="/a.png"></body></html>` },
      "https://site.test/a.png": "hang",
    });
    const deadline = new AbortController();
    setTimeout(() => deadline.abort(), 10);

    const graph = await fetchSite(parseConfig({ url: "https://site.test/", timeoutMs: 5000 }), {
      deadline: deadline.signal,
    });

    expect(graph.references[0]).toMatchObject({ status: "unresolved", reason: "Run deadline exceeded" });
    expect(graph.partial).toBe(true);
  });
});
