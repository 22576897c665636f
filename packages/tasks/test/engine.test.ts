import { describe, test, expect } from "vitest";
import { buildDiagnostic } from "@graphpack/shared";

import { TaskEngine, taskKey, type TaskContext } from "../src/engine.js";
import { TaskCycleError } from "../src/errors.js";
import { defineTask } from "../src/task.js";

describe("TaskEngine", () => {
  test("memoizes calls by task and arguments", async () => {
    let runs = 0;
    const double = defineTask("test/double", async (_ctx, n: number) => {
      runs++;
      return n * 2;
    });
    const engine = new TaskEngine();

    expect(await engine.run(double, 2)).toBe(4);
    expect(await engine.run(double, 2)).toBe(4);
    expect(await engine.run(double, 3)).toBe(6);
    expect(runs).toBe(2);
    expect(engine.stats()).toMatchObject({ entries: 2, computed: 2, memoHits: 1 });
  });

  test("concurrent identical calls share one computation", async () => {
    let runs = 0;
    const slow = defineTask("test/slow", async (_ctx, name: string) => {
      runs++;
      await new Promise((resolve) => setTimeout(resolve, 5));
      return name.toUpperCase();
    });
    const engine = new TaskEngine();

    const [a, b] = await Promise.all([engine.run(slow, "x"), engine.run(slow, "x")]);
    expect([a, b]).toEqual(["X", "X"]);
    expect(runs).toBe(1);
  });

  test("invalidation marks dependents stale and recomputes lazily", async () => {
    const values = new Map([["a", 1], ["b", 10]]);
    let parentRuns = 0;
    const leaf = defineTask("test/leaf", async (_ctx, name: string) => values.get(name) ?? 0);
    const sum = defineTask("test/sum", async (ctx) => {
      parentRuns++;
      return (await ctx.call(leaf, "a")) + (await ctx.call(leaf, "b"));
    });
    const engine = new TaskEngine();

    expect(await engine.run(sum)).toBe(11);
    values.set("a", 5);
    expect(engine.invalidate(leaf, "a")).toBe(2);
    expect(engine.freshness(sum)).toBe("stale");
    expect(engine.freshness(leaf, "b")).toBe("fresh");

    expect(await engine.run(sum)).toBe(15);
    expect(parentRuns).toBe(2);
  });

  test("invalidateWhere selects entries by task id", async () => {
    const leaf = defineTask("test/where-leaf", async (_ctx, n: number) => n);
    const engine = new TaskEngine();
    await engine.run(leaf, 1);
    await engine.run(leaf, 2);

    expect(engine.invalidateWhere((taskId) => taskId === "test/where-leaf")).toBe(2);
    expect(engine.freshness(leaf, 1)).toBe("stale");
  });

  test("cycle-tolerant tasks resolve re-entrant calls with their fallback", async () => {
    const edges: Record<string, string[]> = { a: ["b"], b: ["a", "c"], c: [] };
    const count = defineTask(
      "test/count",
      async (ctx: TaskContext, node: string): Promise<number> => {
        let total = 1;
        for (const next of edges[node] ?? []) total += await ctx.call(count, next);
        return total;
      },
      { cycle: { fallback: () => 0 } },
    );
    const engine = new TaskEngine();

    expect(await engine.run(count, "a")).toBe(3);
  });

  test("callers outside the cycle wait for the call in flight", async () => {
    const edges: Record<string, string[]> = { a: ["c"], b: ["c"], c: [] };
    const visited: string[] = [];
    const visit = defineTask(
      "test/visit",
      async (ctx: TaskContext, node: string): Promise<string[]> => {
        if (node === "c") await new Promise((resolve) => setTimeout(resolve, 20));
        visited.push(node);
        const nested = await Promise.all((edges[node] ?? []).map((next) => ctx.call(visit, next)));
        return [node, ...nested.flat()];
      },
      { cycle: { fallback: () => [] } },
    );
    const engine = new TaskEngine();

    const first = engine.run(visit, "a");
    expect(await engine.run(visit, "b")).toEqual(["b", "c"]);
    expect(visited).toContain("c");
    expect(await first).toEqual(["a", "c"]);
  });

  test("sibling branches that wait on each other take the fallback", async () => {
    const edges: Record<string, string[]> = { a: ["b", "c"], b: ["c"], c: ["b"] };
    const count = defineTask(
      "test/count-branches",
      async (ctx: TaskContext, node: string): Promise<number> => {
        const counts = await Promise.all((edges[node] ?? []).map((next) => ctx.call(count, next)));
        return counts.reduce((sum, n) => sum + n, 1);
      },
      { cycle: { fallback: () => 0 } },
    );
    const engine = new TaskEngine();

    expect(await engine.run(count, "a")).toBe(4);
  });

  test("sibling branches that wait on each other fail without a fallback", async () => {
    const edges: Record<string, string[]> = { a: ["b", "c"], b: ["c"], c: ["b"] };
    const mutual = defineTask("test/mutual", async (ctx: TaskContext, node: string): Promise<number> => {
      const counts = await Promise.all((edges[node] ?? []).map((next) => ctx.call(mutual, next)));
      return counts.reduce((sum, n) => sum + n, 1);
    });
    const engine = new TaskEngine();

    const error = await engine.run(mutual, "a").catch((e: unknown) => e);
    expect(error).toBeInstanceOf(TaskCycleError);
    expect(error instanceof TaskCycleError ? error.chain : []).toEqual([
      taskKey(mutual, ["b"]),
      taskKey(mutual, ["c"]),
      taskKey(mutual, ["b"]),
    ]);
  });

  test("other tasks that await themselves fail with TaskCycleError", async () => {
    const loop = defineTask("test/loop", async (ctx: TaskContext, name: string): Promise<number> => ctx.call(loop, name));
    const engine = new TaskEngine();
    const key = taskKey(loop, ["x"]);

    const error = await engine.run(loop, "x").catch((e: unknown) => e);
    expect(error).toBeInstanceOf(TaskCycleError);
    expect(error instanceof TaskCycleError ? error.chain : []).toEqual([key, key]);
    expect(engine.freshness(loop, "x")).toBe("stale");
  });

  test("failures are not cached", async () => {
    let attempts = 0;
    const flaky = defineTask("test/flaky", async () => {
      attempts++;
      if (attempts === 1) throw new Error("first attempt fails");
      return "ok";
    });
    const engine = new TaskEngine();

    await expect(engine.run(flaky)).rejects.toThrow("first attempt fails");
    expect(await engine.run(flaky)).toBe("ok");
    expect(attempts).toBe(2);
  });

  test("diagnostics are kept with their task and collected transitively", async () => {
    const diag = buildDiagnostic({ code: "T0001", message: "child says hi", stage: "graph", severity: "warning" });
    const child = defineTask("test/child", async (ctx, n: number) => {
      ctx.report(diag);
      return n;
    });
    const parent = defineTask("test/parent", async (ctx) => (await ctx.call(child, 1)) + (await ctx.call(child, 2)));
    const engine = new TaskEngine();

    await engine.run(parent);
    await engine.run(parent);

    expect(engine.diagnostics(parent)).toEqual([diag]);
    expect(engine.diagnostics(child, 2)).toEqual([diag]);
  });

  test("recomputing a call forgets the stale calls it no longer makes", async () => {
    let version = 1;
    const part = defineTask("test/part", async (_ctx, name: string) => name.length);
    const whole = defineTask("test/whole", async (ctx) => ctx.call(part, `v${version}`));
    const engine = new TaskEngine();
    await engine.run(part, "kept");
    await engine.run(whole);

    version = 2;
    engine.invalidate(part, "v1");
    expect(await engine.run(whole)).toBe(2);

    expect(engine.freshness(part, "v1")).toBeUndefined();
    expect(engine.freshness(part, "v2")).toBe("fresh");
    expect(engine.freshness(part, "kept")).toBe("fresh");
    expect(engine.stats()).toMatchObject({ entries: 3, pruned: 1 });
  });

  test("taskKey combines the id with serialized arguments", () => {
    const task = defineTask("test/key", async (_ctx, _a: string, _b: { taskKey: string }) => null);
    expect(taskKey(task, ["x", { taskKey: "mem:a" }])).toBe('test/key["x",{"__key__":"mem:a"}]');
  });
});
