import { z } from "zod";

export const BrowserPreferenceSchema = z.enum(["brave", "chrome"]);

export type BrowserPreference = z.infer<typeof BrowserPreferenceSchema>;

export const OptimizeConfigSchema = z.object({
  url: z.string().url().default("https://example.com"),
  outputDir: z.string().min(1).default("implementation-tests"),
  browser: BrowserPreferenceSchema.default("brave"),
  extractCriticalCss: z.boolean().default(true),
  optimizeAndTest: z.boolean().default(true),
  concurrency: z.number().int().positive().default(6),
  timeoutMs: z.number().int().positive().default(15000),
  runTimeoutMs: z.number().int().positive().default(300000),
  auditTimeoutMs: z.number().int().positive().default(120000),
  renderTimeoutMs: z.number().int().positive().default(30000),
  viewportWidth: z.number().int().positive().default(1280),
  viewportHeight: z.number().int().positive().default(800),
  maxCssImportDepth: z.number().int().nonnegative().default(1),
  userAgent: z
    .string()
    .default("Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) site-speedup/1.0"),
});

export type OptimizeConfig = Readonly<z.infer<typeof OptimizeConfigSchema>>;

export type OptimizeConfigInput = z.input<typeof OptimizeConfigSchema>;

export function parseConfig(input: OptimizeConfigInput): OptimizeConfig {
  return Object.freeze(OptimizeConfigSchema.parse(input));
}

export type ResourceKind = "html" | "css" | "js" | "image" | "font" | "other";

export interface Resource {
  readonly url: string;
  readonly kind: ResourceKind;
  readonly originalBytes: Buffer;
  // relative to the site directory, always with forward slashes
  readonly localPath: string;
  readonly contentType: string;
}

export type ReferenceOrigin =
  | "link-stylesheet"
  | "link-font"
  | "link-icon"
  | "script-src"
  | "img-src"
  | "style-url"
  | "css-url"
  | "css-import";

interface ReferenceBase {
  url: string;
  origin: ReferenceOrigin;
  kind: ResourceKind;
  // the document or stylesheet the reference was found in
  referrer: string;
  // stylesheet nesting depth; 0 for references made by the document itself
  depth: number;
}

export interface ResolvedReference extends ReferenceBase {
  status: "resolved";
  resource: Resource;
}

export interface UnresolvedReference extends ReferenceBase {
  status: "unresolved";
  reason: string;
}

export type ResourceReference = ResolvedReference | UnresolvedReference;

export interface ResourceGraph {
  root: Resource;
  // where the document was served from after redirects; its references resolve against this
  baseUrl: string;
  html: string;
  references: ResourceReference[];
  // deduplicated by absolute URL, in discovery order
  resources: Resource[];
  partial: boolean;
  warnings: string[];
}

export interface Viewport {
  width: number;
  height: number;
}

export interface BoundingBox {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface ElementBox {
  // element child indices starting below <html>
  path: number[];
  tagName: string;
  box: BoundingBox;
}

export interface LayoutSnapshot {
  viewport: Viewport;
  elements: ElementBox[];
}

export interface CriticalCssSet {
  readonly rules: readonly string[];
}

export interface ImageInfo {
  width: number;
  height: number;
  format: string;
}

export interface OptimizedAsset {
  url: string;
  localPath: string;
  bytes: Buffer;
}
