import { describe, test, expect } from "vitest";
import { TaskEngine } from "@graphpack/tasks";

import {
  aggregate,
  aggregatedAssets,
  aggregatedDepth,
  AggregatedGroup,
  AggregatedLeaf,
  balancedGroup,
  FANOUT,
  groupLevel,
  type AggregatedGraphNode,
} from "../../src/graph/aggregate.js";
import { chain, names, TestGraph } from "../graph-fixture.js";

function widest(node: AggregatedGraphNode): number {
  if (node.type === "leaf") return 0;
  return Math.max(node.children.length, ...node.children.map(widest));
}

describe("aggregate", () => {
  test("a chain keeps its assets in reference order", async () => {
    const graph = new TestGraph({ "a.js": ["b.js"], "b.js": ["c.js"] });
    const root = await new TaskEngine().run(aggregate, graph.node("a.js"));

    expect(names(aggregatedAssets(root))).toEqual(["a.js", "b.js", "c.js"]);
    expect(root).toBeInstanceOf(AggregatedGroup);
  });

  test("a long chain stays shallow", async () => {
    const graph = new TestGraph(chain(1000));
    const root = await new TaskEngine().run(aggregate, graph.node("m0.js"));
    const assets = names(aggregatedAssets(root));

    expect(assets).toHaveLength(1000);
    expect(assets.slice(0, 3)).toEqual(["m0.js", "m1.js", "m2.js"]);
    expect(assets[999]).toBe("m999.js");
    expect(aggregatedDepth(root)).toBeLessThanOrEqual(10);
    expect(widest(root)).toBeLessThanOrEqual(FANOUT);
  });

  test("every asset appears once in graphs with diamonds and cycles", async () => {
    const graph = new TestGraph({
      "a.js": ["b.js", "c.js"],
      "b.js": ["d.js"],
      "c.js": ["d.js"],
      "d.js": ["b.js"],
    });
    const root = await new TaskEngine().run(aggregate, graph.node("a.js"));

    expect(names(aggregatedAssets(root))).toEqual(["a.js", "b.js", "c.js", "d.js"]);
  });

  test("a root that references itself is a single leaf", async () => {
    const graph = new TestGraph({ "a.js": ["a.js"] });
    const root = await new TaskEngine().run(aggregate, graph.node("a.js"));

    expect(root).toBeInstanceOf(AggregatedLeaf);
    expect(names(aggregatedAssets(root))).toEqual(["a.js"]);
  });

  test("wide fan-outs are split into balanced groups", async () => {
    const leaves = Array.from({ length: 20 }, (_, i) => `x${i}.js`);
    const graph = new TestGraph({ "root.js": leaves });
    const root = await new TaskEngine().run(aggregate, graph.node("root.js"));

    expect(names(aggregatedAssets(root))).toEqual(["root.js", ...leaves]);
    expect(widest(root)).toBeLessThanOrEqual(FANOUT);
    expect(aggregatedDepth(root)).toBeLessThanOrEqual(5);
  });
});

describe("balancedGroup", () => {
  const graph = new TestGraph({});
  const leaf = (name: string) => new AggregatedLeaf(graph.node(name));

  test("a single node is returned as is", () => {
    const only = leaf("a.js");
    expect(balancedGroup([only])).toBe(only);
  });

  test("every group but the last holds two to FANOUT nodes", () => {
    const nodes = Array.from({ length: 100 }, (_, i) => leaf(`n${i}.js`));
    const groups = groupLevel(nodes, 0);
    const widths = groups.map((node) => (node.type === "group" ? node.children.length : 1));

    expect(widths.reduce((sum, width) => sum + width, 0)).toBe(100);
    for (const width of widths.slice(0, -1)) {
      expect(width).toBeGreaterThanOrEqual(2);
      expect(width).toBeLessThanOrEqual(FANOUT);
    }
    expect(groups.length).toBeLessThanOrEqual(50);
  });

  test("an edit regroups only the end of a level", () => {
    const nodes = Array.from({ length: 100 }, (_, i) => leaf(`n${i}.js`));
    const before = groupLevel(nodes, 0).map((node) => node.taskKey);
    const after = groupLevel([...nodes, leaf("n100.js")], 0).map((node) => node.taskKey);

    expect(after.slice(0, before.length - 1)).toEqual(before.slice(0, -1));
  });

  test("group keys depend only on the children", () => {
    const first = balancedGroup([leaf("a.js"), leaf("b.js")]);
    const second = balancedGroup([leaf("a.js"), leaf("b.js")]);
    const other = balancedGroup([leaf("b.js"), leaf("a.js")]);
    expect(first).toBeInstanceOf(AggregatedGroup);
    expect(first.taskKey).toBe(second.taskKey);
    expect(first.taskKey).not.toBe(other.taskKey);
  });
});
