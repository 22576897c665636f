import type { Keyed } from "@graphpack/shared";
import { defineTask, type TaskContext, type TaskEngine } from "@graphpack/tasks";

import type { FileContent, FileSystem, FileType } from "./file-system.js";

/**
 * A location inside one file system. `path` is relative to the file system
 * root, uses forward slashes and is "" for the root itself.
 */
export class FileSystemPath implements Keyed {
  readonly fs: FileSystem;
  readonly path: string;

  private constructor(fs: FileSystem, path: string) {
    this.fs = fs;
    this.path = path;
  }

  static root(fs: FileSystem): FileSystemPath {
    return new FileSystemPath(fs, "");
  }

  /** Build a path from a root-relative string; throws when it escapes the root. */
  static of(fs: FileSystem, path: string): FileSystemPath {
    const normalized = normalizeSegments(path);
    if (normalized === null) {
      throw new Error(`Path "${path}" escapes the root of file system "${fs.name}"`);
    }
    return new FileSystemPath(fs, normalized);
  }

  get taskKey(): string {
    return `${this.fs.name}:${this.path}`;
  }

  get fileName(): string {
    const slash = this.path.lastIndexOf("/");
    return slash === -1 ? this.path : this.path.slice(slash + 1);
  }

  /** Extension including the dot (`.ts`), or "" when there is none. */
  get extension(): string {
    const name = this.fileName;
    const dot = name.lastIndexOf(".");
    return dot <= 0 ? "" : name.slice(dot);
  }

  isRoot(): boolean {
    return this.path === "";
  }

  /** The containing directory; the root is its own parent. */
  parent(): FileSystemPath {
    const slash = this.path.lastIndexOf("/");
    return new FileSystemPath(this.fs, slash === -1 ? "" : this.path.slice(0, slash));
  }

  /** Join a relative path; null when the result would leave the root. */
  join(relative: string): FileSystemPath | null {
    const joined = this.path === "" ? relative : `${this.path}/${relative}`;
    const normalized = normalizeSegments(joined);
    return normalized === null ? null : new FileSystemPath(this.fs, normalized);
  }

  /** Same directory, different extension (`a.js` -> `a.ts`). */
  withExtension(extension: string): FileSystemPath {
    const ext = this.extension;
    const base = ext ? this.path.slice(0, -ext.length) : this.path;
    return new FileSystemPath(this.fs, base + extension);
  }

  /** True when this path lies strictly below `dir` on the same file system. */
  isInside(dir: FileSystemPath): boolean {
    if (this.fs !== dir.fs || this.path === dir.path) return false;
    return dir.path === "" || this.path.startsWith(`${dir.path}/`);
  }

  /** Path relative to `dir`, or null when not inside it. */
  relativeTo(dir: FileSystemPath): string | null {
    if (!this.isInside(dir)) return null;
    return dir.path === "" ? this.path : this.path.slice(dir.path.length + 1);
  }

  read(ctx: TaskContext): Promise<FileContent> {
    return ctx.call(readFile, this);
  }

  type(ctx: TaskContext): Promise<FileType> {
    return ctx.call(fileType, this);
  }

  write(content: FileContent): Promise<void> {
    return this.fs.write(this.path, content);
  }

  equals(other: FileSystemPath): boolean {
    return this.fs === other.fs && this.path === other.path;
  }

  toString(): string {
    return `[${this.fs.name}]/${this.path}`;
  }
}

function normalizeSegments(path: string): string | null {
  const segments: string[] = [];
  for (const segment of path.replace(/\\/g, "/").split("/")) {
    if (segment === "" || segment === ".") continue;
    if (segment === "..") {
      if (segments.length === 0) return null;
      segments.pop();
      continue;
    }
    segments.push(segment);
  }
  return segments.join("/");
}

export const readFile = defineTask("fs/read", (_ctx, path: FileSystemPath) => path.fs.read(path.path));

export const fileType = defineTask("fs/type", (_ctx, path: FileSystemPath) => path.fs.stat(path.path));

/**
 * Mark everything that read or probed `path` stale. Probes of the parent
 * directory are included since creating or deleting a file changes them.
 */
export function invalidatePath(engine: TaskEngine, path: FileSystemPath): number {
  let count = engine.invalidate(readFile, path) + engine.invalidate(fileType, path);
  for (let dir = path.parent(); ; dir = dir.parent()) {
    count += engine.invalidate(fileType, dir);
    if (dir.isRoot()) break;
  }
  return count;
}
