import { allReferencedAssets, type Asset } from "@graphpack/core";
import { defineTask, type TaskContext } from "@graphpack/tasks";

import { aggregate, type AggregatedGraphNode } from "./aggregate.js";

export interface BackReferenceEntry {
  readonly asset: Asset;
  readonly referencedBy: readonly Asset[];
}

/** For every referenced asset, the set of assets referencing it. */
export class ReferencesList {
  readonly #entries = new Map<string, { asset: Asset; referencedBy: Map<string, Asset> }>();

  add(target: Asset, from: Asset): void {
    let entry = this.#entries.get(target.taskKey);
    if (!entry) {
      entry = { asset: target, referencedBy: new Map() };
      this.#entries.set(target.taskKey, entry);
    }
    entry.referencedBy.set(from.taskKey, from);
  }

  /** Union of several lists; merging in any order gives the same sets. */
  static merge(lists: Iterable<ReferencesList>): ReferencesList {
    const merged = new ReferencesList();
    for (const list of lists) {
      for (const entry of list.#entries.values()) {
        for (const from of entry.referencedBy.values()) merged.add(entry.asset, from);
      }
    }
    return merged;
  }

  referencedBy(asset: Asset): Asset[] {
    return Array.from(this.#entries.get(asset.taskKey)?.referencedBy.values() ?? []);
  }

  entries(): BackReferenceEntry[] {
    return Array.from(this.#entries.values(), ({ asset, referencedBy }) => ({
      asset,
      referencedBy: Array.from(referencedBy.values()),
    }));
  }

  get size(): number {
    return this.#entries.size;
  }
}

/** Back references over every asset in `node`. */
export const computeBackReferences = defineTask(
  "graph/back-references",
  async (ctx: TaskContext, node: AggregatedGraphNode): Promise<ReferencesList> => {
    if (node.type === "leaf") {
      const list = new ReferencesList();
      for (const target of await ctx.call(allReferencedAssets, node.asset)) {
        list.add(target, node.asset);
      }
      return list;
    }
    const children = await Promise.all(node.children.map((child) => ctx.call(computeBackReferences, child)));
    return ReferencesList.merge(children);
  },
);

/**
 * The `n` most referenced assets, most references first. Each candidate
 * goes in front of the first member with fewer references, pushing the
 * rest down; equal counts keep iteration order.
 */
export function topReferences(list: ReferencesList, n = 5): BackReferenceEntry[] {
  const top: BackReferenceEntry[] = [];
  for (const entry of list.entries()) {
    const count = entry.referencedBy.length;
    const slot = top.findIndex((member) => member.referencedBy.length < count);
    if (slot === -1) {
      if (top.length < n) top.push(entry);
      continue;
    }
    top.splice(slot, 0, entry);
    if (top.length > n) top.pop();
  }
  return top;
}

export const mostReferenced = defineTask(
  "graph/most-referenced",
  async (ctx: TaskContext, asset: Asset): Promise<BackReferenceEntry[]> => {
    const node = await ctx.call(aggregate, asset);
    return topReferences(await ctx.call(computeBackReferences, node));
  },
);

export function formatTopReferences(entries: readonly BackReferenceEntry[]): string[] {
  return [
    "TOP REFERENCES:",
    ...entries.map((entry) => `${entry.asset.path().path} -> ${entry.referencedBy.length} times referenced`),
  ];
}

export async function printMostReferenced(
  ctx: TaskContext,
  asset: Asset,
  write: (line: string) => void = (line) => console.log(line),
): Promise<void> {
  const entries = await ctx.call(mostReferenced, asset);
  for (const line of formatTopReferences(entries)) write(line);
}
