import { invalidJsonModule, type Asset, type AssetReference, type FileContent, type FileSystemPath, type ModuleAsset } from "@graphpack/core";
import { defineTask, type TaskContext } from "@graphpack/tasks";

/** A JSON file imported as a module. Content is checked, then passed through. */
export class JsonModuleAsset implements ModuleAsset {
  readonly moduleKind = "json";
  readonly source: Asset;
  readonly context = null;
  readonly taskKey: string;

  constructor(source: Asset) {
    this.source = source;
    this.taskKey = `json(${source.taskKey})`;
  }

  path(): FileSystemPath {
    return this.source.path();
  }

  content(ctx: TaskContext): Promise<FileContent> {
    return ctx.call(jsonContent, this);
  }

  async references(): Promise<readonly AssetReference[]> {
    return [];
  }

  toString(): string {
    return `json ${String(this.path())}`;
  }
}

const jsonContent = defineTask("json/content", async (ctx: TaskContext, asset: JsonModuleAsset): Promise<FileContent> => {
  const content = await asset.source.content(ctx);
  if (content.type === "not-found") return content;
  try {
    JSON.parse(content.text);
  } catch (error) {
    ctx.report(invalidJsonModule(asset.path().path, error instanceof Error ? error.message : String(error)));
  }
  return content;
});
