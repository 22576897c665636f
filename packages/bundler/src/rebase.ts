import {
  ResolveResult,
  type Asset,
  type AssetReference,
  type FileContent,
  type FileSystemPath,
} from "@graphpack/core";
import { defineTask, type TaskContext } from "@graphpack/tasks";

/** Where `path` lands when `inputDir` is moved to `outputDir`; unchanged when outside it. */
export function rebasePath(path: FileSystemPath, inputDir: FileSystemPath, outputDir: FileSystemPath): FileSystemPath {
  const relative = path.relativeTo(inputDir);
  if (relative === null) return path;
  return outputDir.join(relative) ?? path;
}

/**
 * `source` moved from `inputDir` to `outputDir`, with the same content and
 * every referenced asset moved the same way.
 */
export class RebasedAsset implements Asset {
  readonly source: Asset;
  readonly inputDir: FileSystemPath;
  readonly outputDir: FileSystemPath;
  readonly taskKey: string;

  constructor(source: Asset, inputDir: FileSystemPath, outputDir: FileSystemPath) {
    this.source = source;
    this.inputDir = inputDir;
    this.outputDir = outputDir;
    this.taskKey = `rebased(${source.taskKey}|${inputDir.taskKey}->${outputDir.taskKey})`;
  }

  path(): FileSystemPath {
    return rebasePath(this.source.path(), this.inputDir, this.outputDir);
  }

  content(ctx: TaskContext): Promise<FileContent> {
    return this.source.content(ctx);
  }

  references(ctx: TaskContext): Promise<readonly AssetReference[]> {
    return ctx.call(rebasedReferences, this);
  }

  toString(): string {
    return `rebased ${String(this.path())}`;
  }
}

export class RebasedAssetReference implements AssetReference {
  readonly reference: AssetReference;
  readonly inputDir: FileSystemPath;
  readonly outputDir: FileSystemPath;
  readonly taskKey: string;

  constructor(reference: AssetReference, inputDir: FileSystemPath, outputDir: FileSystemPath) {
    this.reference = reference;
    this.inputDir = inputDir;
    this.outputDir = outputDir;
    this.taskKey = `rebased(${reference.taskKey}|${inputDir.taskKey}->${outputDir.taskKey})`;
  }

  resolveReference(ctx: TaskContext): Promise<ResolveResult> {
    return ctx.call(resolveRebasedReference, this);
  }

  toString(): string {
    return `rebased ${this.reference.toString()}`;
  }
}

const rebasedReferences = defineTask(
  "rebase/references",
  async (ctx: TaskContext, asset: RebasedAsset): Promise<readonly AssetReference[]> => {
    const references = await asset.source.references(ctx);
    return references.map((reference) => new RebasedAssetReference(reference, asset.inputDir, asset.outputDir));
  },
);

const resolveRebasedReference = defineTask(
  "rebase/resolve-reference",
  async (ctx: TaskContext, rebased: RebasedAssetReference): Promise<ResolveResult> => {
    const { inputDir, outputDir } = rebased;
    const result = await rebased.reference.resolveReference(ctx);
    return new ResolveResult(
      result.primary.map((asset) => new RebasedAsset(asset, inputDir, outputDir)),
      result.references.map((reference) => new RebasedAssetReference(reference, inputDir, outputDir)),
      result.externals,
    );
  },
);
