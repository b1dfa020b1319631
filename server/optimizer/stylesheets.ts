import * as cheerio from "cheerio";
import type { Resource, ResourceGraph } from "./types";
import { documentBaseUrl, hasRel } from "./extractor";
import { normalizeUrl } from "./url-utils";

export interface StylesheetSource {
  // null for inline <style> blocks
  url: string | null;
  css: string;
}

/**
 * All stylesheets of the document in cascade order. Imported sheets are placed
 * ahead of the sheet that imports them; unresolved sheets are left out.
 */
export function collectStylesheets(graph: ResourceGraph): StylesheetSource[] {
  const $ = cheerio.load(graph.html);
  const base = documentBaseUrl($, graph.baseUrl);

  const cssByUrl = new Map<string, Resource>();
  for (const resource of graph.resources) {
    if (resource.kind === "css") cssByUrl.set(resource.url, resource);
  }

  const importsByReferrer = new Map<string, string[]>();
  for (const reference of graph.references) {
    if (reference.origin !== "css-import" || reference.status !== "resolved") continue;
    const list = importsByReferrer.get(reference.referrer) ?? [];
    list.push(reference.url);
    importsByReferrer.set(reference.referrer, list);
  }

  const sources: StylesheetSource[] = [];
  const emitted = new Set<string>();

  const emitSheet = (url: string) => {
    if (emitted.has(url)) return;
    const resource = cssByUrl.get(url);
    if (!resource) return;
    emitted.add(url);

    for (const imported of importsByReferrer.get(url) ?? []) {
      emitSheet(imported);
    }
    sources.push({ url, css: resource.originalBytes.toString("utf8") });
  };

  $("link[href], style").each((_, el) => {
    const $el = $(el);
    if (el.tagName.toLowerCase() === "style") {
      sources.push({ url: null, css: $el.text() });
      return;
    }
    if (!hasRel($el.attr("rel"), "stylesheet")) return;

    const href = $el.attr("href");
    const url = href ? normalizeUrl(href, base) : null;
    if (url) emitSheet(url);
  });

  return sources;
}
