import * as cheerio from "cheerio";
import { hasChildren, isTag, type AnyNode, type Element as DomElement } from "domhandler";
import puppeteer, { type Browser } from "puppeteer-core";
import type { BoundingBox, BrowserPreference, ElementBox, LayoutSnapshot, OptimizeConfig, ResourceGraph, Viewport } from "./types";
import { NoViewportDataError, errorMessage } from "./errors";
import { resolveBrowser } from "./browser";
import { collectStylesheets } from "./stylesheets";
import { withTimeout } from "./timeout";
import { silentLogger, type Logger } from "../log";

export const LAYOUT_INJECTED_ATTRIBUTE = "data-layout-injected";

export interface LayoutRenderer {
  render(html: string, stylesheets: string[], viewport: Viewport, baseUrl: string): Promise<ElementBox[]>;
}

/**
 * Adds a <base> and the stylesheet text to the document. Injected nodes carry
 * LAYOUT_INJECTED_ATTRIBUTE so element paths still line up with the original markup.
 */
export function buildRenderDocument(html: string, stylesheets: string[], baseUrl: string): string {
  const $ = cheerio.load(html);
  let head = $("head").first();
  if (head.length === 0) {
    $("html").prepend("<head></head>");
    head = $("head").first();
  }

  head.prepend($("<base>").attr("href", baseUrl).attr(LAYOUT_INJECTED_ATTRIBUTE, ""));
  for (const css of stylesheets) {
    head.append($("<style>").attr(LAYOUT_INJECTED_ATTRIBUTE, "").text(css));
  }
  return $.html();
}

export class PuppeteerLayoutRenderer implements LayoutRenderer {
  constructor(
    private readonly browser: BrowserPreference,
    private readonly timeoutMs: number
  ) {}

  async render(html: string, stylesheets: string[], viewport: Viewport, baseUrl: string): Promise<ElementBox[]> {
    const executable = resolveBrowser(this.browser);
    if (!executable) {
      throw new NoViewportDataError("no compatible browser found");
    }

    const browser = await this.launch(executable.path, executable.kind);
    try {
      const page = await browser.newPage();
      await page.setViewport(viewport);
      // the tree has to stay exactly as parsed
      await page.setJavaScriptEnabled(false);

      await page.setContent(buildRenderDocument(html, stylesheets, baseUrl), {
        waitUntil: "load",
        timeout: this.timeoutMs,
      });

      return await page.evaluate((injectedAttribute: string) => {
        const results: { path: number[]; tagName: string; box: { x: number; y: number; width: number; height: number } }[] = [];
        const visit = (element: Element, path: number[]) => {
          const rect = element.getBoundingClientRect();
          results.push({
            path,
            tagName: element.tagName.toLowerCase(),
            box: { x: rect.x + window.scrollX, y: rect.y + window.scrollY, width: rect.width, height: rect.height },
          });
          let index = 0;
          for (const child of Array.from(element.children)) {
            if (child.hasAttribute(injectedAttribute)) continue;
            visit(child, [...path, index]);
            index++;
          }
        };
        visit(document.documentElement, []);
        return results;
      }, LAYOUT_INJECTED_ATTRIBUTE);
    } finally {
      await browser.close();
    }
  }

  private async launch(executablePath: string, kind: BrowserPreference): Promise<Browser> {
    try {
      return await puppeteer.launch({
        executablePath,
        headless: true,
        args: ["--no-sandbox", "--disable-gpu"],
      });
    } catch (error) {
      throw new NoViewportDataError(`could not launch ${kind}: ${errorMessage(error)}`);
    }
  }
}

export function intersectsViewport(box: BoundingBox, viewport: Viewport): boolean {
  if (box.width <= 0 && box.height <= 0) return false;
  return box.y < viewport.height && box.y + box.height > 0 && box.x < viewport.width && box.x + box.width > 0;
}

export function isBelowFold(box: BoundingBox, viewport: Viewport): boolean {
  return box.y >= viewport.height;
}

function elementChildren(node: AnyNode): DomElement[] {
  return hasChildren(node) ? node.children.filter(isTag) : [];
}

export function pathKey(path: number[]): string {
  return path.join("/");
}

/** Element child-index path of `el`, counted from <html> the way the renderer counts. */
export function elementPath(el: DomElement): number[] {
  const path: number[] = [];
  let current = el;
  while (current.parent && isTag(current.parent)) {
    path.unshift(elementChildren(current.parent).indexOf(current));
    current = current.parent;
  }
  return path;
}

export function resolvePath($: cheerio.CheerioAPI, path: number[]): DomElement | null {
  let current: DomElement | undefined = $("html").get(0);
  for (const index of path) {
    if (!current) return null;
    current = elementChildren(current)[index];
  }
  return current ?? null;
}

export interface LayoutCollection {
  snapshot: LayoutSnapshot | null;
  warning?: string;
}

export async function collectLayout(
  graph: ResourceGraph,
  renderer: LayoutRenderer,
  config: OptimizeConfig,
  logger: Logger = silentLogger
): Promise<LayoutCollection> {
  const viewport: Viewport = { width: config.viewportWidth, height: config.viewportHeight };
  const stylesheets = collectStylesheets(graph).map((sheet) => sheet.css);

  try {
    const elements = await withTimeout(
      renderer.render(graph.html, stylesheets, viewport, graph.baseUrl),
      config.renderTimeoutMs,
      () => new NoViewportDataError(`renderer timed out after ${config.renderTimeoutMs}ms`)
    );
    if (elements.length === 0) {
      throw new NoViewportDataError("renderer returned no elements");
    }
    logger.info(`Collected layout for ${elements.length} element(s) at ${viewport.width}x${viewport.height}`);
    return { snapshot: { viewport, elements } };
  } catch (error) {
    const warning =
      error instanceof NoViewportDataError ? error.message : new NoViewportDataError(errorMessage(error)).message;
    logger.warn(warning);
    return { snapshot: null, warning };
  }
}
