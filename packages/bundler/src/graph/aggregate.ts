import { allReferencedAssets, type Asset } from "@graphpack/core";
import { debug, shortHash, type Keyed } from "@graphpack/shared";
import { defineTask, type TaskContext } from "@graphpack/tasks";

import { immediateDominators } from "./dominators.js";

/** Widest group. */
export const FANOUT = 8;

/** A node whose key hashes to 0 modulo this closes its group; groups average this width. */
const BOUNDARY_MODULUS = 4;

export class AggregatedLeaf implements Keyed {
  readonly type = "leaf";
  readonly asset: Asset;
  readonly taskKey: string;

  constructor(asset: Asset) {
    this.asset = asset;
    this.taskKey = `aggregated:asset:${asset.taskKey}`;
  }
}

export class AggregatedGroup implements Keyed {
  readonly type = "group";
  readonly children: readonly AggregatedGraphNode[];
  readonly taskKey: string;

  constructor(children: readonly AggregatedGraphNode[]) {
    this.children = children;
    // Derived from the children, so an unchanged subtree keeps its key.
    this.taskKey = `aggregated:group:${shortHash(children.map((c) => c.taskKey), 24)}`;
  }
}

export type AggregatedGraphNode = AggregatedLeaf | AggregatedGroup;

function closesGroup(node: AggregatedGraphNode, level: number): boolean {
  return Number.parseInt(shortHash([level, node.taskKey], 8), 16) % BOUNDARY_MODULUS === 0;
}

/**
 * One level of grouping. Boundaries fall after nodes whose key hashes to a
 * boundary, so an edit only regroups its neighbourhood. Groups hold at least
 * two nodes (only the last may hold one) and at most FANOUT.
 */
export function groupLevel(nodes: readonly AggregatedGraphNode[], level: number): AggregatedGraphNode[] {
  const groups: AggregatedGraphNode[] = [];
  let current: AggregatedGraphNode[] = [];
  for (const node of nodes) {
    current.push(node);
    if (current.length >= FANOUT || (current.length >= 2 && closesGroup(node, level))) {
      groups.push(new AggregatedGroup(current));
      current = [];
    }
  }
  const [last] = current;
  if (current.length === 1 && last) groups.push(last);
  else if (current.length > 1) groups.push(new AggregatedGroup(current));
  return groups;
}

/**
 * One node over `nodes`, in order. Each level at least halves the count, so
 * the depth is logarithmic.
 */
export function balancedGroup(nodes: readonly AggregatedGraphNode[]): AggregatedGraphNode {
  let level = nodes;
  for (let depth = 0; level.length > 1; depth++) {
    level = groupLevel(level, depth);
  }
  const [root] = level;
  if (!root) throw new Error("Cannot group an empty list of nodes");
  return root;
}

/** Levels between `node` and its deepest leaf. */
export function aggregatedDepth(node: AggregatedGraphNode): number {
  if (node.type === "leaf") return 0;
  return 1 + Math.max(...node.children.map(aggregatedDepth));
}

/** Leaf assets of a node, depth first. */
export function aggregatedAssets(node: AggregatedGraphNode): Asset[] {
  const assets: Asset[] = [];
  const stack: AggregatedGraphNode[] = [node];
  while (stack.length > 0) {
    const current = stack.pop();
    if (!current) break;
    if (current.type === "leaf") {
      assets.push(current.asset);
    } else {
      for (let i = current.children.length - 1; i >= 0; i--) {
        const child = current.children[i];
        if (child) stack.push(child);
      }
    }
  }
  return assets;
}

/**
 * The graph reachable from `root` as a balanced tree over its assets. Assets
 * are ordered by a preorder walk of the dominator tree, so every reachable
 * asset appears exactly once, cycles included, and the assets an asset
 * dominates sit next to it.
 */
export const aggregate = defineTask(
  "graph/aggregate",
  async (ctx: TaskContext, root: Asset): Promise<AggregatedGraphNode> => {
    const assets: Asset[] = [root];
    const indices = new Map<string, number>([[root.taskKey, 0]]);
    const successors: number[][] = [];

    let frontier: number[] = [0];
    while (frontier.length > 0) {
      const referenced = await Promise.all(
        frontier.map((index) => ctx.call(allReferencedAssets, assetAt(assets, index))),
      );
      const next: number[] = [];
      frontier.forEach((index, position) => {
        const targets: number[] = [];
        for (const asset of referenced[position] ?? []) {
          let target = indices.get(asset.taskKey);
          if (target === undefined) {
            target = assets.length;
            assets.push(asset);
            indices.set(asset.taskKey, target);
            next.push(target);
          }
          targets.push(target);
        }
        successors[index] = targets;
      });
      frontier = next;
    }

    const idom = immediateDominators(successors);
    const dominated: number[][] = assets.map(() => []);
    for (let index = 1; index < assets.length; index++) {
      dominated[idom[index] ?? 0]?.push(index);
    }

    const leaves: AggregatedLeaf[] = [];
    const stack = [0];
    while (stack.length > 0) {
      const index = stack.pop();
      if (index === undefined) break;
      leaves.push(new AggregatedLeaf(assetAt(assets, index)));
      const children = dominated[index] ?? [];
      for (let i = children.length - 1; i >= 0; i--) {
        const child = children[i];
        if (child !== undefined) stack.push(child);
      }
    }

    const node = balancedGroup(leaves);
    debug.graph("aggregate", { root: root.taskKey, assets: assets.length });
    return node;
  },
);

function assetAt(assets: readonly Asset[], index: number): Asset {
  const asset = assets[index];
  if (!asset) throw new Error(`No asset at index ${index}`);
  return asset;
}
