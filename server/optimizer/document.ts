import * as cheerio from "cheerio";
import { isText, type AnyNode, type Element as DomElement } from "domhandler";

export function ensureHead($: cheerio.CheerioAPI): cheerio.Cheerio<DomElement> {
  let head = $("head").first();
  if (head.length === 0) {
    $("html").prepend("<head></head>");
    head = $("head").first();
  }
  return head;
}

/**
 * Inserts markup at the top of <head>, keeping a leading <meta charset> first.
 * Successive calls with the same inserter keep their call order.
 */
export function createHeadInserter($: cheerio.CheerioAPI): (markup: string) => void {
  const head = ensureHead($);
  const charset = head.children("meta[charset]").first();
  let anchor: cheerio.Cheerio<AnyNode> | null = charset.length > 0 ? charset : null;

  return (markup: string) => {
    const node = $(markup);
    if (anchor) {
      anchor.after(node);
    } else {
      head.prepend(node);
    }
    anchor = node.last();
  };
}

/** Elements in document order, for "comes before" comparisons. */
export function documentOrder($: cheerio.CheerioAPI): Map<DomElement, number> {
  const order = new Map<DomElement, number>();
  $<DomElement, "*">("*").each((index, el) => {
    order.set(el, index);
  });
  return order;
}

const NON_PAINT_TAGS = new Set(["script", "noscript", "style", "link", "meta", "template", "br", "title", "base"]);
const REPLACED_TAGS = new Set(["img", "svg", "video", "canvas", "picture", "iframe", "input", "button", "textarea", "select"]);

/** First element in <body> that puts something on screen: own text or a replaced element. */
export function findFirstPaintElement($: cheerio.CheerioAPI): DomElement | null {
  let found: DomElement | null = null;
  $("body *").each((_, el) => {
    const tag = el.tagName.toLowerCase();
    if (NON_PAINT_TAGS.has(tag)) return;
    if ($(el).parents("noscript, template").length > 0) return;

    const hasOwnText = el.children.some((child) => isText(child) && child.data.trim().length > 0);
    if (REPLACED_TAGS.has(tag) || hasOwnText) {
      found = el;
      return false;
    }
  });
  return found;
}
