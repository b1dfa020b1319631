import * as cheerio from "cheerio";
import type { CriticalCssSet, ResourceGraph } from "./types";
import type { OptimizationResult } from "./resource-optimizer";
import { renderCriticalCss } from "./critical-css";
import { ensureHead } from "./document";
import { CSS_URL_PATTERN, documentBaseUrl, hasRel, parseSrcset } from "./extractor";
import { normalizeUrl } from "./url-utils";

export const OPTIMIZED_DOCUMENT_PATH = "index.html";

const ASYNC_STYLESHEET_ONLOAD = "this.onload=null;this.rel='stylesheet'";
const REWRITTEN_ATTRIBUTES: Array<[selector: string, attribute: string]> = [
  ["link[href]", "href"],
  ["script[src]", "src"],
  ["img[src]", "src"],
  ["source[src]", "src"],
];

export function buildLocalPathMap(graph: ResourceGraph, result: Pick<OptimizationResult, "assets">): Map<string, string> {
  const paths = new Map<string, string>();
  for (const resource of graph.resources) {
    paths.set(resource.url, resource.localPath);
  }
  for (const asset of result.assets) {
    paths.set(asset.url, asset.localPath);
  }
  return paths;
}

function rewriteCssUrls(css: string, base: string, paths: Map<string, string>): string {
  return css.replace(CSS_URL_PATTERN, (match, _quote: string, raw: string) => {
    const absolute = normalizeUrl(raw, base);
    if (!absolute) return match;
    return `url("${paths.get(absolute) ?? absolute}")`;
  });
}

function rewriteSrcset(srcset: string, base: string, paths: Map<string, string>): string {
  return parseSrcset(srcset)
    .map(({ url, descriptor }) => {
      const absolute = normalizeUrl(url, base);
      const target = absolute ? paths.get(absolute) ?? absolute : url;
      return descriptor ? `${target} ${descriptor}` : target;
    })
    .join(", ");
}

/**
 * Produces the optimized document from the optimizer's working tree. The
 * working tree is copied first, so equal inputs always give equal output.
 */
export function rewriteDocument(result: OptimizationResult, graph: ResourceGraph, critical: CriticalCssSet): string {
  const $ = cheerio.load(result.document.html());
  const base = documentBaseUrl($, graph.baseUrl);
  const paths = buildLocalPathMap(graph, result);

  // local paths are relative to the site directory
  $("base").remove();

  for (const [selector, attribute] of REWRITTEN_ATTRIBUTES) {
    $(selector).each((_, el) => {
      const $el = $(el);
      const rel = $el.attr("rel");
      if (hasRel(rel, "preconnect") || hasRel(rel, "dns-prefetch")) return;

      const value = $el.attr(attribute) ?? "";
      const absolute = normalizeUrl(value, base);
      if (!absolute) return;
      $el.attr(attribute, paths.get(absolute) ?? absolute);
    });
  }

  $("img[srcset], source[srcset]").each((_, el) => {
    const $el = $(el);
    $el.attr("srcset", rewriteSrcset($el.attr("srcset") ?? "", base, paths));
  });

  $("style").each((_, el) => {
    const $el = $(el);
    $el.text(rewriteCssUrls($el.text(), base, paths));
  });
  $("[style]").each((_, el) => {
    const $el = $(el);
    $el.attr("style", rewriteCssUrls($el.attr("style") ?? "", base, paths));
  });

  if (critical.rules.length > 0) {
    const head = ensureHead($);
    const $critical = $("<style>").attr("id", "critical-css").text(rewriteCssUrls(renderCriticalCss(critical), base, paths));

    const firstStylesheet = head.children("style, link").filter((_, el) => el.tagName === "style" || hasRel($(el).attr("rel"), "stylesheet")).first();
    if (firstStylesheet.length > 0) {
      firstStylesheet.before($critical);
    } else {
      head.append($critical);
    }

    $("link[href]").each((_, el) => {
      const $link = $(el);
      if (!hasRel($link.attr("rel"), "stylesheet")) return;

      const href = $link.attr("href") ?? "";
      const $fallback = $("<link>").attr("rel", "stylesheet").attr("href", href);
      const media = $link.attr("media");
      if (media) $fallback.attr("media", media);

      $link.attr("rel", "preload").attr("as", "style").attr("onload", ASYNC_STYLESHEET_ONLOAD);
      $link.after($("<noscript></noscript>").append($fallback));
    });
  }

  return $.html();
}
