import { afterEach, describe, test, expect } from "vitest";

import { configureDebug, debug, getDebugChannel, isDebugEnabled, refreshDebugChannels } from "../src/debug.js";

describe("debug channels", () => {
  afterEach(() => {
    refreshDebugChannels([]);
    configureDebug({ format: "pretty", output: console.log });
  });

  test("only enabled channels write", () => {
    const lines: string[] = [];
    configureDebug({ output: (line) => lines.push(line) });
    refreshDebugChannels(["resolve"]);

    debug.resolve("lookup", { request: "./a", found: true });
    debug.graph("aggregate", { assets: 3 });

    expect(lines).toEqual(['[resolve.lookup] { request="./a", found=true }']);
    expect(isDebugEnabled("resolve")).toBe(true);
    expect(isDebugEnabled("graph")).toBe(false);
  });

  test("values with their own toString print through it", () => {
    const lines: string[] = [];
    configureDebug({ output: (line) => lines.push(line) });
    refreshDebugChannels(["*"]);

    debug.emit("write", { path: { toString: () => "[mem]/dist/a.js" } });

    expect(lines).toEqual(["[emit.write] { path=<[mem]/dist/a.js> }"]);
  });

  test("json format and extra channels", () => {
    const lines: string[] = [];
    configureDebug({ format: "json", output: (line) => lines.push(line) });
    const custom = getDebugChannel("Custom");
    refreshDebugChannels(["custom"]);

    getDebugChannel("custom")("point", { n: 1 });
    custom("stale");

    expect(lines).toEqual(['{"channel":"custom","point":"point","data":{"n":1}}']);
  });
});
