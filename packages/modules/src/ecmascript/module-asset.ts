import {
  fileContent,
  parseRequest,
  type Asset,
  type AssetContext,
  type AssetReference,
  type Environment,
  type FileContent,
  type FileSystemPath,
  type ModuleAsset,
} from "@graphpack/core";
import { debug } from "@graphpack/shared";
import { defineTask, type TaskContext } from "@graphpack/tasks";

import { extractImports } from "./analyze.js";
import { EsmAssetReference } from "./references.js";
import { transpile, type EcmascriptTransform } from "./transforms.js";
import { TypescriptTypesAssetReference } from "./typescript/types-reference.js";

export type EcmascriptModuleType = "ecmascript" | "typescript" | "typescript-declaration";

/** JavaScript or TypeScript source, with its imports as references. */
export class EcmascriptModuleAsset implements ModuleAsset {
  readonly moduleKind: EcmascriptModuleType;
  readonly source: Asset;
  readonly context: AssetContext;
  readonly transforms: readonly EcmascriptTransform[];
  readonly environment: Environment;
  readonly taskKey: string;

  constructor(
    source: Asset,
    context: AssetContext,
    type: EcmascriptModuleType,
    transforms: readonly EcmascriptTransform[],
    environment: Environment,
  ) {
    this.source = source;
    this.context = context;
    this.moduleKind = type;
    this.transforms = transforms;
    this.environment = environment;
    this.taskKey = `${type}(${source.taskKey}|${transforms.join("+")}|${context.taskKey}|${environment.taskKey})`;
  }

  path(): FileSystemPath {
    return this.source.path();
  }

  content(ctx: TaskContext): Promise<FileContent> {
    return ctx.call(ecmascriptContent, this);
  }

  references(ctx: TaskContext): Promise<readonly AssetReference[]> {
    return ctx.call(ecmascriptReferences, this);
  }

  /** TypeScript modules always strip types, whether or not a rule asked. */
  effectiveTransforms(): readonly EcmascriptTransform[] {
    if (this.moduleKind !== "typescript" || this.transforms.includes("typescript")) return this.transforms;
    return ["typescript", ...this.transforms];
  }

  toString(): string {
    return `${this.moduleKind} ${String(this.path())}`;
  }
}

const ecmascriptContent = defineTask(
  "ecmascript/content",
  async (ctx: TaskContext, asset: EcmascriptModuleAsset): Promise<FileContent> => {
    const content = await asset.source.content(ctx);
    if (content.type === "not-found" || asset.moduleKind === "typescript-declaration") return content;
    const transforms = asset.effectiveTransforms();
    if (transforms.length === 0) return content;
    return fileContent(
      transpile({
        fileName: asset.path().fileName,
        text: content.text,
        transforms,
        moduleSystem: asset.environment.moduleSystem,
      }),
    );
  },
);

const ecmascriptReferences = defineTask(
  "ecmascript/references",
  async (ctx: TaskContext, asset: EcmascriptModuleAsset): Promise<readonly AssetReference[]> => {
    const content = await asset.source.content(ctx);
    if (content.type === "not-found") return [];

    const references = new Map<string, AssetReference>();
    for (const record of extractImports(asset.path().fileName, content.text)) {
      const reference =
        record.kind === "types"
          ? new TypescriptTypesAssetReference(asset.context, parseRequest(record.specifier))
          : new EsmAssetReference(asset.context, record.specifier, record.kind, record.transition);
      if (!references.has(reference.taskKey)) references.set(reference.taskKey, reference);
    }
    debug.module("ecmascript.references", { path: asset.path(), count: references.size });
    return Array.from(references.values());
  },
);
