import * as cheerio from "cheerio";
import postcss from "postcss";
import type { ReferenceOrigin, ResourceKind } from "./types";
import { errorMessage } from "./errors";
import { normalizeUrl } from "./url-utils";

export interface DiscoveredReference {
  url: string;
  origin: ReferenceOrigin;
  kind: ResourceKind;
}

const FONT_EXTENSIONS = /\.(woff2?|ttf|otf|eot)(\?|$)/i;
const IMAGE_EXTENSIONS = /\.(png|jpe?g|gif|webp|avif|svg|bmp|ico)(\?|$)/i;
export const CSS_URL_PATTERN = /url\(\s*(['"]?)(.*?)\1\s*\)/gi;

export function kindFromUrl(url: string): ResourceKind {
  if (FONT_EXTENSIONS.test(url)) return "font";
  if (IMAGE_EXTENSIONS.test(url)) return "image";
  if (/\.css(\?|$)/i.test(url)) return "css";
  if (/\.m?js(\?|$)/i.test(url)) return "js";
  return "other";
}

export function kindFromContentType(contentType: string, fallback: ResourceKind): ResourceKind {
  const type = contentType.toLowerCase();
  if (type.includes("text/css")) return "css";
  if (type.includes("javascript")) return "js";
  if (type.startsWith("image/")) return "image";
  if (type.startsWith("font/") || type.includes("font-woff")) return "font";
  if (type.includes("text/html")) return "html";
  return fallback;
}

export function hasRel(rel: string | undefined, value: string): boolean {
  if (!rel) return false;
  return rel.toLowerCase().split(/\s+/).includes(value);
}

function extractCssUrls(cssText: string): string[] {
  const urls: string[] = [];
  for (const match of Array.from(cssText.matchAll(CSS_URL_PATTERN))) {
    const value = match[2].trim();
    if (value && !value.startsWith("data:") && !value.startsWith("#")) {
      urls.push(value);
    }
  }
  return urls;
}

export interface SrcsetCandidate {
  url: string;
  // width or density descriptor, empty when absent
  descriptor: string;
}

/** Splits a srcset value into candidates. A URL runs to the next whitespace, so data: URLs keep their commas. */
export function parseSrcset(value: string): SrcsetCandidate[] {
  const candidates: SrcsetCandidate[] = [];
  let rest = value.replace(/^[\s,]+/, "");

  while (rest) {
    const url = rest.match(/^\S+/)?.[0] ?? "";
    rest = rest.slice(url.length);

    if (url.endsWith(",")) {
      candidates.push({ url: url.replace(/,+$/, ""), descriptor: "" });
    } else {
      const end = rest.indexOf(",");
      candidates.push({ url, descriptor: (end === -1 ? rest : rest.slice(0, end)).trim() });
      rest = end === -1 ? "" : rest.slice(end + 1);
    }
    rest = rest.replace(/^[\s,]+/, "");
  }

  return candidates;
}

export function documentBaseUrl($: cheerio.CheerioAPI, pageUrl: string): string {
  const href = $("base[href]").attr("href");
  return (href && normalizeUrl(href, pageUrl)) || pageUrl;
}

export function extractDocumentReferences(html: string, pageUrl: string): DiscoveredReference[] {
  const $ = cheerio.load(html);
  const references: DiscoveredReference[] = [];
  const base = documentBaseUrl($, pageUrl);

  const push = (raw: string | undefined, origin: ReferenceOrigin, kind: ResourceKind) => {
    if (!raw) return;
    const url = normalizeUrl(raw, base);
    if (url) {
      references.push({ url, origin, kind });
    }
  };

  const pushSrcset = (value: string | undefined) => {
    for (const candidate of parseSrcset(value ?? "")) {
      push(candidate.url, "img-src", "image");
    }
  };

  $("link[href], script[src], img[src], img[srcset], source[srcset], style, [style]").each((_, el) => {
    const $el = $(el);
    const tag = el.tagName.toLowerCase();

    if (tag === "link") {
      const rel = $el.attr("rel");
      const href = $el.attr("href");
      if (hasRel(rel, "stylesheet")) {
        push(href, "link-stylesheet", "css");
      } else if ((hasRel(rel, "preload") && $el.attr("as") === "font") || (href && FONT_EXTENSIONS.test(href))) {
        push(href, "link-font", "font");
      } else if (hasRel(rel, "icon")) {
        push(href, "link-icon", "image");
      }
    } else if (tag === "script") {
      push($el.attr("src"), "script-src", "js");
    } else if (tag === "img") {
      push($el.attr("src"), "img-src", "image");
      pushSrcset($el.attr("srcset"));
    } else if (tag === "source") {
      pushSrcset($el.attr("srcset"));
    } else if (tag === "style") {
      for (const url of extractCssUrls($el.text())) {
        push(url, "style-url", kindFromUrl(url));
      }
    }

    const inlineStyle = $el.attr("style");
    if (inlineStyle) {
      for (const url of extractCssUrls(inlineStyle)) {
        push(url, "style-url", kindFromUrl(url));
      }
    }
  });

  return references;
}

export interface StylesheetReferences {
  imports: string[];
  assets: DiscoveredReference[];
  error?: string;
}

export function extractStylesheetReferences(cssText: string, stylesheetUrl: string): StylesheetReferences {
  const imports: string[] = [];
  const assets: DiscoveredReference[] = [];

  try {
    const root = postcss.parse(cssText);

    root.walkAtRules("import", (rule) => {
      const match = rule.params.match(/^(?:url\(\s*)?(['"]?)([^'")\s]+)\1/);
      const url = match ? normalizeUrl(match[2], stylesheetUrl) : null;
      if (url) imports.push(url);
    });

    root.walkDecls((decl) => {
      for (const raw of extractCssUrls(decl.value)) {
        const url = normalizeUrl(raw, stylesheetUrl);
        if (url) {
          assets.push({ url, origin: "css-url", kind: kindFromUrl(url) });
        }
      }
    });
  } catch (error) {
    return { imports, assets, error: errorMessage(error) };
  }

  return { imports, assets };
}
