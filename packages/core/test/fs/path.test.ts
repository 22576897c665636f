import { describe, test, expect } from "vitest";
import { TaskEngine } from "@graphpack/tasks";

import { MemoryFileSystem } from "../../src/fs/file-system.js";
import { FileSystemPath, fileType, invalidatePath, readFile } from "../../src/fs/path.js";

describe("FileSystemPath", () => {
  const fs = new MemoryFileSystem("mem");

  test("normalizes separators and dot segments", () => {
    const path = FileSystemPath.of(fs, "/src//a/../b.js");
    expect(path.path).toBe("src/b.js");
    expect(path.taskKey).toBe("mem:src/b.js");
    expect(String(path)).toBe("[mem]/src/b.js");
  });

  test("refuses to leave the root", () => {
    expect(() => FileSystemPath.of(fs, "../outside")).toThrow('escapes the root of file system "mem"');
    expect(FileSystemPath.of(fs, "src").join("../..")).toBeNull();
  });

  test("names and extensions", () => {
    const decl = FileSystemPath.of(fs, "src/types/b.d.ts");
    expect(decl.fileName).toBe("b.d.ts");
    expect(decl.extension).toBe(".ts");
    expect(FileSystemPath.of(fs, ".gitignore").extension).toBe("");
    expect(FileSystemPath.of(fs, "src/a.js").withExtension(".ts").path).toBe("src/a.ts");
  });

  test("parent of the root is the root", () => {
    const root = FileSystemPath.root(fs);
    expect(FileSystemPath.of(fs, "src/a.js").parent().path).toBe("src");
    expect(root.parent().equals(root)).toBe(true);
  });

  test("isInside is strict and per file system", () => {
    const dist = FileSystemPath.of(fs, "dist");
    expect(FileSystemPath.of(fs, "dist/a.js").isInside(dist)).toBe(true);
    expect(dist.isInside(dist)).toBe(false);
    expect(FileSystemPath.of(fs, "distant/a.js").isInside(dist)).toBe(false);
    expect(dist.isInside(FileSystemPath.root(fs))).toBe(true);
    expect(FileSystemPath.of(new MemoryFileSystem("other"), "dist/a.js").isInside(dist)).toBe(false);
    expect(FileSystemPath.of(fs, "dist/css/a.css").relativeTo(dist)).toBe("css/a.css");
    expect(FileSystemPath.of(fs, "src/a.js").relativeTo(dist)).toBeNull();
  });
});

describe("MemoryFileSystem", () => {
  test("reads, stats and writes", async () => {
    const fs = new MemoryFileSystem("mem", { "/src/a.js": "export {}" });
    expect(await fs.read("src/a.js")).toEqual({ type: "content", text: "export {}" });
    expect(await fs.read("src/missing.js")).toEqual({ type: "not-found" });
    expect(await fs.stat("src")).toBe("directory");
    expect(await fs.stat("")).toBe("directory");
    expect(await fs.stat("src/a.js")).toBe("file");
    expect(await fs.stat("lib")).toBe("missing");

    await FileSystemPath.of(fs, "dist/a.js").write({ type: "content", text: "out" });
    expect(fs.list()).toEqual(["dist/a.js", "src/a.js"]);
    await FileSystemPath.of(fs, "dist/a.js").write({ type: "not-found" });
    expect(fs.has("dist/a.js")).toBe(false);
  });

  test("file reads are memoized until the path is invalidated", async () => {
    const fs = new MemoryFileSystem("mem", { "src/a.js": "one" });
    const engine = new TaskEngine();
    const path = FileSystemPath.of(fs, "src/a.js");

    expect(await engine.run(readFile, path)).toEqual({ type: "content", text: "one" });
    expect(await engine.run(fileType, path)).toBe("file");
    fs.set("src/a.js", "two");
    expect(await engine.run(readFile, path)).toEqual({ type: "content", text: "one" });

    expect(invalidatePath(engine, path)).toBe(2);
    expect(await engine.run(readFile, path)).toEqual({ type: "content", text: "two" });
  });
});
