import type { Asset, AssetContext, AssetReference, FileContent, FileSystemPath, ModuleAsset } from "@graphpack/core";
import type { TaskContext } from "@graphpack/tasks";

/** Images, fonts and other files copied as they are. */
export class StaticModuleAsset implements ModuleAsset {
  readonly moduleKind = "static";
  readonly source: Asset;
  readonly context: AssetContext;
  readonly taskKey: string;

  constructor(source: Asset, context: AssetContext) {
    this.source = source;
    this.context = context;
    this.taskKey = `static(${source.taskKey}|${context.taskKey})`;
  }

  path(): FileSystemPath {
    return this.source.path();
  }

  content(ctx: TaskContext): Promise<FileContent> {
    return this.source.content(ctx);
  }

  async references(): Promise<readonly AssetReference[]> {
    return [];
  }

  toString(): string {
    return `static ${String(this.path())}`;
  }
}
