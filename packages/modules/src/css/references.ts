import { parseRequest, type AssetContext, type AssetReference, type ResolveResult } from "@graphpack/core";
import { defineTask, type TaskContext } from "@graphpack/tasks";

export type CssReferenceKind = "import" | "url";

const COMMENT = /\/\*[\s\S]*?\*\//g;
const IMPORT_RULE = /@import\s+(?:url\(\s*)?["']?([^"')\s;]+)["']?\s*\)?[^;]*;/g;
const URL_FUNCTION = /url\(\s*["']?([^"')]+?)["']?\s*\)/g;
const EXTERNAL_URL = /^(?:[a-z][a-z0-9+.-]*:|\/\/|#)/i;

export interface CssImport {
  readonly kind: CssReferenceKind;
  readonly url: string;
}

/** `@import` targets and `url()` values, skipping data, remote and fragment URLs. */
export function extractCssImports(text: string): CssImport[] {
  const source = text.replace(COMMENT, "");
  const found: CssImport[] = [];
  for (const match of source.matchAll(IMPORT_RULE)) {
    const url = match[1];
    if (url && !EXTERNAL_URL.test(url)) found.push({ kind: "import", url });
  }
  for (const match of source.replace(IMPORT_RULE, "").matchAll(URL_FUNCTION)) {
    const url = match[1]?.trim();
    if (url && !EXTERNAL_URL.test(url)) found.push({ kind: "url", url });
  }
  return found;
}

/**
 * CSS URLs are relative unless they say otherwise; `~pkg/file` names a
 * package.
 */
export function cssRequest(url: string): string {
  if (url.startsWith("~")) return url.slice(1);
  if (url.startsWith("./") || url.startsWith("../") || url.startsWith("/")) return url;
  return `./${url}`;
}

export class CssAssetReference implements AssetReference {
  readonly context: AssetContext;
  readonly kind: CssReferenceKind;
  readonly url: string;
  readonly taskKey: string;

  constructor(context: AssetContext, kind: CssReferenceKind, url: string) {
    this.context = context;
    this.kind = kind;
    this.url = url;
    this.taskKey = `css-${kind}(${url}|${context.taskKey})`;
  }

  resolveReference(ctx: TaskContext): Promise<ResolveResult> {
    return ctx.call(resolveCssReference, this);
  }

  toString(): string {
    return `css ${this.kind} ${this.url}`;
  }
}

const resolveCssReference = defineTask(
  "css/resolve-reference",
  (ctx: TaskContext, reference: CssAssetReference): Promise<ResolveResult> => {
    const { context } = reference;
    const path = reference.url.split(/[?#]/, 1)[0] ?? reference.url;
    return context.resolveAsset(ctx, context.contextPath(), parseRequest(cssRequest(path)), context.resolveOptions());
  },
);
