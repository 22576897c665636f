import { describe, test, expect } from "vitest";

import { parseRequest } from "../../src/resolve/request.js";

describe("parseRequest", () => {
  test("relative and server-relative paths", () => {
    expect(parseRequest("./a")).toEqual({ type: "relative", request: "./a", path: "./a" });
    expect(parseRequest("..")).toEqual({ type: "relative", request: "..", path: ".." });
    expect(parseRequest("/static/logo.png")).toEqual({
      type: "server-relative",
      request: "/static/logo.png",
      path: "static/logo.png",
    });
  });

  test("package names with and without scope and subpath", () => {
    expect(parseRequest("react")).toEqual({ type: "module", request: "react", module: "react", path: "" });
    expect(parseRequest("lodash/fp")).toEqual({ type: "module", request: "lodash/fp", module: "lodash", path: "/fp" });
    expect(parseRequest("@scope/pkg/sub/file")).toEqual({
      type: "module",
      request: "@scope/pkg/sub/file",
      module: "@scope/pkg",
      path: "/sub/file",
    });
  });

  test("builtins", () => {
    expect(parseRequest("node:fs")).toEqual({ type: "builtin", request: "node:fs", name: "fs" });
    expect(parseRequest("path")).toEqual({ type: "builtin", request: "path", name: "path" });
    expect(parseRequest("fs/promises")).toEqual({ type: "builtin", request: "fs/promises", name: "fs/promises" });
  });

  test("URIs", () => {
    expect(parseRequest("https://cdn.example.com/x.js")).toMatchObject({ type: "uri", protocol: "https" });
    expect(parseRequest("data:text/javascript,export{}")).toMatchObject({ type: "uri", protocol: "data" });
  });

  test("empty and malformed requests", () => {
    expect(parseRequest("")).toEqual({ type: "empty", request: "" });
    expect(parseRequest("   ")).toEqual({ type: "empty", request: "   " });
    expect(parseRequest("@scope")).toMatchObject({ type: "unknown", reason: "scoped package name is incomplete" });
    expect(parseRequest("#internal")).toMatchObject({ type: "unknown" });
  });
});
