import { shortHash, type Keyed } from "@graphpack/shared";
import type { TaskContext } from "@graphpack/tasks";

import type { AssetContext } from "./context.js";
import { fileContent, type FileContent } from "./fs/file-system.js";
import type { FileSystemPath } from "./fs/path.js";
import type { AssetReference } from "./reference.js";

/**
 * Unit of the build graph: a path, lazily computed content and lazily
 * computed outgoing references. Assets are immutable and compared by
 * `taskKey`; two objects with the same key are the same asset.
 */
export interface Asset extends Keyed {
  path(): FileSystemPath;
  content(ctx: TaskContext): Promise<FileContent>;
  references(ctx: TaskContext): Promise<readonly AssetReference[]>;
}

/**
 * An asset that was classified by the module factory. `context` is the
 * nested context the module resolves its own requests in, when it has one.
 */
export interface ModuleAsset extends Asset {
  readonly moduleKind: string;
  readonly source: Asset;
  readonly context: AssetContext | null;
}

export function isModuleAsset(asset: Asset): asset is ModuleAsset {
  return "moduleKind" in asset && "source" in asset && "context" in asset;
}

/** A file as it exists on its file system. */
export class SourceAsset implements Asset {
  readonly #path: FileSystemPath;
  readonly taskKey: string;

  constructor(path: FileSystemPath) {
    this.#path = path;
    this.taskKey = `source(${path.taskKey})`;
  }

  path(): FileSystemPath {
    return this.#path;
  }

  content(ctx: TaskContext): Promise<FileContent> {
    return this.#path.read(ctx);
  }

  async references(): Promise<readonly AssetReference[]> {
    return [];
  }

  toString(): string {
    return String(this.#path);
  }
}

/** An asset with fixed content and references, not backed by a file. */
export class VirtualAsset implements Asset {
  readonly #path: FileSystemPath;
  readonly #content: FileContent;
  readonly #references: readonly AssetReference[];
  readonly taskKey: string;

  constructor(path: FileSystemPath, content: FileContent | string, references: readonly AssetReference[] = []) {
    this.#path = path;
    this.#content = typeof content === "string" ? fileContent(content) : content;
    this.#references = references;
    this.taskKey = `virtual(${path.taskKey}#${shortHash([this.#content, references])})`;
  }

  path(): FileSystemPath {
    return this.#path;
  }

  async content(): Promise<FileContent> {
    return this.#content;
  }

  async references(): Promise<readonly AssetReference[]> {
    return this.#references;
  }

  toString(): string {
    return `virtual ${String(this.#path)}`;
  }
}
