import * as cheerio from "cheerio";
import type { Element as DomElement } from "domhandler";
import postcss, { type AtRule, type ChildNode, type Declaration, type Rule } from "postcss";
import type { CriticalCssSet, LayoutSnapshot, ResourceGraph } from "./types";
import { errorMessage } from "./errors";
import { CSS_URL_PATTERN, documentBaseUrl } from "./extractor";
import { intersectsViewport, resolvePath } from "./layout";
import { collectStylesheets } from "./stylesheets";
import { normalizeUrl } from "./url-utils";

const UNIVERSAL_SELECTORS = new Set(["*", "html", "body", ":root"]);
const WRAPPING_AT_RULES = new Set(["media", "supports"]);

// Pseudo-elements and state pseudo-classes cannot be matched against a static tree.
const UNMATCHABLE_PSEUDO =
  /::?(before|after|first-line|first-letter|placeholder|selection|marker|backdrop|hover|focus-within|focus-visible|focus|active|visited|link|target|checked|disabled|enabled)(?![\w-])/gi;

// In the font shorthand the family list follows the size and optional line height.
const FONT_SHORTHAND_SIZE =
  /(?:^|\s)(?:\d*\.?\d+(?:px|em|rem|%|pt|pc|ex|ch|vw|vh|vmin|vmax|cm|mm|in|q)|xx-small|x-small|small|medium|large|x-large|xx-large|xxx-large|smaller|larger)(?:\s*\/\s*[^\s,]+)?\s+(.+)$/i;

export interface CriticalCssResult {
  critical: CriticalCssSet;
  warnings: string[];
}

export function stripUnmatchablePseudo(selector: string): string {
  const stripped = selector.replace(UNMATCHABLE_PSEUDO, "").trim();
  if (!stripped || /[>+~]$/.test(stripped)) return `${stripped}*`.trim();
  return stripped;
}

export function isUniversalSelector(selector: string): boolean {
  return UNIVERSAL_SELECTORS.has(stripUnmatchablePseudo(selector).toLowerCase());
}

function isDependentAtRule(node: Rule | AtRule): node is AtRule {
  return node.type === "atrule" && (node.name.toLowerCase() === "font-face" || isKeyframes(node));
}

function isKeyframes(node: AtRule): boolean {
  return /^(-[a-z]+-)?keyframes$/i.test(node.name);
}

function shorthandFamilies(value: string): string[] {
  const match = FONT_SHORTHAND_SIZE.exec(value);
  return match ? fontFamilies(match[1]) : [];
}

function animationNames(value: string): string[] {
  return value
    .split(/[\s,]+/)
    .map((token) => token.replace(/^['"]|['"]$/g, ""))
    .filter(Boolean);
}

function fontFamilies(value: string): string[] {
  return value
    .split(",")
    .map((family) => family.trim().replace(/^['"]|['"]$/g, "").toLowerCase())
    .filter(Boolean);
}

interface UsedNames {
  families: Set<string>;
  animations: Set<string>;
}

class RuleMatcher {
  constructor(private readonly visible: cheerio.Cheerio<DomElement>) {}

  matches(rule: Rule): boolean {
    return rule.selectors.some((selector) => {
      if (isUniversalSelector(selector)) return true;
      try {
        return this.visible.is(stripUnmatchablePseudo(selector));
      } catch {
        // selector syntax the matcher does not support
        return false;
      }
    });
  }
}

function visibleElements($: cheerio.CheerioAPI, layout: LayoutSnapshot): cheerio.Cheerio<DomElement> {
  const elements: DomElement[] = [];
  for (const entry of layout.elements) {
    if (!intersectsViewport(entry.box, layout.viewport)) continue;
    const el = resolvePath($, entry.path);
    if (el) elements.push(el);
  }
  return $(elements);
}

/**
 * Keeps a rule node when it styles something in the first viewport. Wrapping
 * at-rules survive only around retained rules. @font-face and @keyframes are
 * kept here and dropped later unless a retained rule names their family or
 * animation.
 */
function filterNodes(nodes: ChildNode[], matcher: RuleMatcher, used: UsedNames): Array<Rule | AtRule> {
  const kept: Array<Rule | AtRule> = [];

  for (const node of nodes) {
    if (node.type === "rule") {
      if (matcher.matches(node)) {
        kept.push(node);
        node.walkDecls(/^font(-family)?$/i, (decl: Declaration) => {
          const families = decl.prop.toLowerCase() === "font" ? shorthandFamilies(decl.value) : fontFamilies(decl.value);
          for (const family of families) used.families.add(family);
        });
        node.walkDecls(/^animation(-name)?$/i, (decl: Declaration) => {
          for (const name of animationNames(decl.value)) used.animations.add(name);
        });
      }
    } else if (node.type === "atrule" && WRAPPING_AT_RULES.has(node.name.toLowerCase())) {
      const children = filterNodes(node.nodes ?? [], matcher, used);
      if (children.some((child) => !isDependentAtRule(child))) {
        const wrapper: AtRule = node.clone({ nodes: [] });
        wrapper.append(children.map((child) => child.clone()));
        kept.push(wrapper);
      }
    } else if (node.type === "atrule" && isDependentAtRule(node)) {
      kept.push(node);
    }
  }

  return kept;
}

// Inlined rules move into the document, so relative url()s must stop depending on the sheet location.
function absolutizeUrls(node: Rule | AtRule, sheetUrl: string): void {
  node.walkDecls((decl) => {
    if (!decl.value.includes("url(")) return;
    decl.value = decl.value.replace(CSS_URL_PATTERN, (match, _quote: string, raw: string) => {
      const absolute = normalizeUrl(raw, sheetUrl);
      return absolute ? `url("${absolute}")` : match;
    });
  });
}

function fontFaceFamily(node: AtRule): string | null {
  let family: string | null = null;
  node.walkDecls("font-family", (decl) => {
    family = fontFamilies(decl.value)[0] ?? null;
  });
  return family;
}

export function extractCriticalCss(graph: ResourceGraph, layout: LayoutSnapshot | null): CriticalCssResult {
  const warnings: string[] = [];
  if (!layout) {
    return { critical: { rules: [] }, warnings: ["No layout data; critical CSS is empty"] };
  }

  const $ = cheerio.load(graph.html);
  const base = documentBaseUrl($, graph.baseUrl);
  const matcher = new RuleMatcher(visibleElements($, layout));
  const used: UsedNames = { families: new Set(), animations: new Set() };
  const candidates: Array<Rule | AtRule> = [];

  for (const sheet of collectStylesheets(graph)) {
    try {
      const root = postcss.parse(sheet.css);
      const kept = filterNodes(root.nodes, matcher, used);
      for (const node of kept) absolutizeUrls(node, sheet.url ?? base);
      candidates.push(...kept);
    } catch (error) {
      warnings.push(`Skipped stylesheet ${sheet.url ?? "(inline)"}: ${errorMessage(error)}`);
    }
  }

  const rules: string[] = [];
  const seen = new Set<string>();
  for (const node of candidates) {
    if (node.type === "atrule" && node.name.toLowerCase() === "font-face") {
      const family = fontFaceFamily(node);
      if (!family || !used.families.has(family)) continue;
    } else if (node.type === "atrule" && isKeyframes(node) && !used.animations.has(node.params.trim())) {
      continue;
    }

    const text = node.toString().trim();
    if (seen.has(text)) continue;
    seen.add(text);
    rules.push(text);
  }

  return { critical: { rules }, warnings };
}

export function renderCriticalCss(critical: CriticalCssSet): string {
  return critical.rules.join("\n");
}
