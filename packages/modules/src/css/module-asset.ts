import type { Asset, AssetContext, AssetReference, FileContent, FileSystemPath, ModuleAsset } from "@graphpack/core";
import { defineTask, type TaskContext } from "@graphpack/tasks";

import { CssAssetReference, extractCssImports } from "./references.js";

/** A stylesheet. Content passes through; `@import` and `url()` become references. */
export class CssModuleAsset implements ModuleAsset {
  readonly moduleKind = "css";
  readonly source: Asset;
  readonly context: AssetContext;
  readonly taskKey: string;

  constructor(source: Asset, context: AssetContext) {
    this.source = source;
    this.context = context;
    this.taskKey = `css(${source.taskKey}|${context.taskKey})`;
  }

  path(): FileSystemPath {
    return this.source.path();
  }

  content(ctx: TaskContext): Promise<FileContent> {
    return this.source.content(ctx);
  }

  references(ctx: TaskContext): Promise<readonly AssetReference[]> {
    return ctx.call(cssReferences, this);
  }

  toString(): string {
    return `css ${String(this.path())}`;
  }
}

const cssReferences = defineTask(
  "css/references",
  async (ctx: TaskContext, asset: CssModuleAsset): Promise<readonly AssetReference[]> => {
    const content = await asset.source.content(ctx);
    if (content.type === "not-found") return [];
    const references = new Map<string, AssetReference>();
    for (const found of extractCssImports(content.text)) {
      const reference = new CssAssetReference(asset.context, found.kind, found.url);
      if (!references.has(reference.taskKey)) references.set(reference.taskKey, reference);
    }
    return Array.from(references.values());
  },
);
