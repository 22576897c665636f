import { describe, test, expect } from "vitest";
import { allReferencedAssets, type Asset } from "@graphpack/core";
import { defineTask, TaskEngine, type TaskContext } from "@graphpack/tasks";

import { aggregate } from "../../src/graph/aggregate.js";
import {
  computeBackReferences,
  formatTopReferences,
  mostReferenced,
  printMostReferenced,
  ReferencesList,
  topReferences,
} from "../../src/graph/back-references.js";
import { chain, names, TestGraph } from "../graph-fixture.js";

const EDGES = {
  "a.js": ["b.js", "c.js"],
  "c.js": ["d.js"],
  "d.js": ["b.js"],
};

describe("computeBackReferences", () => {
  test("lists every asset that references a target", async () => {
    const graph = new TestGraph(EDGES);
    const engine = new TaskEngine();
    const list = await engine.run(computeBackReferences, await engine.run(aggregate, graph.node("a.js")));

    expect(names(list.referencedBy(graph.node("b.js")))).toEqual(["a.js", "d.js"]);
    expect(names(list.referencedBy(graph.node("d.js")))).toEqual(["c.js"]);
    expect(list.referencedBy(graph.node("a.js"))).toEqual([]);
    expect(list.size).toBe(3);
  });
});

describe("incremental back references", () => {
  test("an edit at the end of a long chain recomputes a few tasks", async () => {
    const edges = chain(1000);
    const graph = new TestGraph(edges);
    const engine = new TaskEngine();
    const backReferences = defineTask("test/chain-back-references", async (ctx: TaskContext, asset: Asset) =>
      ctx.call(computeBackReferences, await ctx.call(aggregate, asset)),
    );
    await engine.run(backReferences, graph.node("m0.js"));
    const before = engine.stats().computed;

    edges["m999.js"] = ["m1000.js"];
    engine.invalidate(allReferencedAssets, graph.node("m999.js"));
    const list = await engine.run(backReferences, graph.node("m0.js"));

    expect(names(list.referencedBy(graph.node("m1000.js")))).toEqual(["m999.js"]);
    expect(list.size).toBe(1000);
    expect(engine.stats().computed - before).toBeLessThan(50);
  });
});

describe("ReferencesList.merge", () => {
  test("gives the same sets in any order", () => {
    const graph = new TestGraph({});
    const [a, b, c] = [graph.node("a.js"), graph.node("b.js"), graph.node("c.js")];
    const left = new ReferencesList();
    left.add(c, a);
    const right = new ReferencesList();
    right.add(c, b);
    right.add(c, a);

    const sorted = (list: ReferencesList) => names(list.referencedBy(c)).sort();
    expect(sorted(ReferencesList.merge([left, right]))).toEqual(["a.js", "b.js"]);
    expect(sorted(ReferencesList.merge([right, left]))).toEqual(["a.js", "b.js"]);
  });
});

describe("topReferences", () => {
  test("keeps the five most referenced, earlier entries first on ties", () => {
    const graph = new TestGraph({});
    const list = new ReferencesList();
    const counts = [1, 3, 2, 5, 4, 2, 6];
    counts.forEach((count, i) => {
      for (let from = 0; from < count; from++) list.add(graph.node(`t${i + 1}.js`), graph.node(`f${from}.js`));
    });

    const top = topReferences(list);

    expect(top.map((entry) => [entry.asset.path().path, entry.referencedBy.length])).toEqual([
      ["t7.js", 6],
      ["t4.js", 5],
      ["t5.js", 4],
      ["t2.js", 3],
      ["t3.js", 2],
    ]);
  });
});

describe("topReferences over insertion orders", () => {
  function listOf(graph: TestGraph, counts: readonly number[], order: readonly number[]): ReferencesList {
    const list = new ReferencesList();
    for (const i of order) {
      for (let from = 0; from < (counts[i] ?? 0); from++) list.add(graph.node(`t${i + 1}.js`), graph.node(`f${from}.js`));
    }
    return list;
  }

  function orders(length: number): number[][] {
    const forward = Array.from({ length }, (_, i) => i);
    const rotations = forward.map((shift) => forward.map((i) => (i + shift) % length));
    return [...rotations, ...rotations.map((order) => [...order].reverse())];
  }

  test("selects the same five regardless of order", () => {
    const graph = new TestGraph({});
    const counts = [1, 3, 2, 5, 4, 7, 6];

    for (const order of orders(counts.length)) {
      const top = topReferences(listOf(graph, counts, order));
      expect(top.map((entry) => entry.asset.path().path)).toEqual(["t6.js", "t7.js", "t4.js", "t5.js", "t2.js"]);
    }
  });

  test("ties at the cut keep the counts and vary only the member", () => {
    const graph = new TestGraph({});
    const counts = [1, 3, 2, 5, 4, 2, 6];

    for (const order of orders(counts.length)) {
      const top = topReferences(listOf(graph, counts, order));
      expect(top.map((entry) => entry.referencedBy.length)).toEqual([6, 5, 4, 3, 2]);
      expect(["t3.js", "t6.js"]).toContain(top[4]?.asset.path().path);
    }
  });
});

describe("mostReferenced", () => {
  test("formats the report", async () => {
    const graph = new TestGraph(EDGES);
    const entries = await new TaskEngine().run(mostReferenced, graph.node("a.js"));

    expect(formatTopReferences(entries)).toEqual([
      "TOP REFERENCES:",
      "b.js -> 2 times referenced",
      "c.js -> 1 times referenced",
      "d.js -> 1 times referenced",
    ]);
  });

  test("printMostReferenced writes one line per entry", async () => {
    const graph = new TestGraph(EDGES);
    const lines: string[] = [];
    const print = defineTask("test/print", (ctx: TaskContext, asset: Asset) =>
      printMostReferenced(ctx, asset, (line) => lines.push(line)),
    );

    await new TaskEngine().run(print, graph.node("a.js"));

    expect(lines).toHaveLength(4);
    expect(lines[1]).toBe("b.js -> 2 times referenced");
  });
});
