import * as fs from "node:fs/promises";
import * as path from "node:path";
import type { Keyed } from "@graphpack/shared";

export type FileContent =
  | { readonly type: "content"; readonly text: string }
  | { readonly type: "not-found" };

export type FileType = "file" | "directory" | "missing";

export const NOT_FOUND: FileContent = Object.freeze({ type: "not-found" });

export function fileContent(text: string): FileContent {
  return { type: "content", text };
}

/**
 * Storage behind `FileSystemPath`. Paths handed to a file system are already
 * normalized: forward slashes, no leading slash, "" for the root.
 */
export interface FileSystem extends Keyed {
  readonly name: string;
  read(path: string): Promise<FileContent>;
  stat(path: string): Promise<FileType>;
  /** Writing `not-found` removes the file. */
  write(path: string, content: FileContent): Promise<void>;
}

export class DiskFileSystem implements FileSystem {
  readonly name: string;
  readonly root: string;

  constructor(name: string, root: string) {
    this.name = name;
    this.root = path.resolve(root);
  }

  get taskKey(): string {
    return `fs:${this.name}`;
  }

  async read(file: string): Promise<FileContent> {
    try {
      return fileContent(await fs.readFile(this.#abs(file), "utf8"));
    } catch (error) {
      if (isMissingError(error)) return NOT_FOUND;
      throw error;
    }
  }

  async stat(file: string): Promise<FileType> {
    try {
      const stats = await fs.stat(this.#abs(file));
      return stats.isDirectory() ? "directory" : "file";
    } catch (error) {
      if (isMissingError(error)) return "missing";
      throw error;
    }
  }

  async write(file: string, content: FileContent): Promise<void> {
    const abs = this.#abs(file);
    if (content.type === "not-found") {
      await fs.rm(abs, { force: true });
      return;
    }
    await fs.mkdir(path.dirname(abs), { recursive: true });
    await fs.writeFile(abs, content.text, "utf8");
  }

  #abs(file: string): string {
    return path.join(this.root, ...file.split("/"));
  }
}

function isMissingError(error: unknown): boolean {
  return (
    error instanceof Error &&
    "code" in error &&
    (error.code === "ENOENT" || error.code === "ENOTDIR")
  );
}

/** In-process file system for virtual inputs, outputs and tests. */
export class MemoryFileSystem implements FileSystem {
  readonly name: string;
  #files = new Map<string, string>();

  constructor(name: string, files: Readonly<Record<string, string>> = {}) {
    this.name = name;
    for (const [file, text] of Object.entries(files)) {
      this.#files.set(trimSlashes(file), text);
    }
  }

  get taskKey(): string {
    return `fs:${this.name}`;
  }

  async read(file: string): Promise<FileContent> {
    const text = this.#files.get(file);
    return text === undefined ? NOT_FOUND : fileContent(text);
  }

  async stat(file: string): Promise<FileType> {
    if (this.#files.has(file)) return "file";
    const prefix = file === "" ? "" : `${file}/`;
    for (const key of this.#files.keys()) {
      if (key.startsWith(prefix)) return "directory";
    }
    return "missing";
  }

  async write(file: string, content: FileContent): Promise<void> {
    if (content.type === "not-found") {
      this.#files.delete(file);
    } else {
      this.#files.set(file, content.text);
    }
  }

  /** Synchronous edit, for seeding and simulating changes. */
  set(file: string, text: string): void {
    this.#files.set(trimSlashes(file), text);
  }

  delete(file: string): void {
    this.#files.delete(trimSlashes(file));
  }

  has(file: string): boolean {
    return this.#files.has(trimSlashes(file));
  }

  readText(file: string): string | undefined {
    return this.#files.get(trimSlashes(file));
  }

  /** Sorted list of every stored file. */
  list(): string[] {
    return Array.from(this.#files.keys()).sort();
  }
}

function trimSlashes(file: string): string {
  return file.replace(/^\/+|\/+$/g, "");
}
