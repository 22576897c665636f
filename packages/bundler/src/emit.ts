import { allReferencedAssets, type Asset, type FileSystemPath } from "@graphpack/core";
import { debug } from "@graphpack/shared";
import { allCompleted, COMPLETED, defineTask, type Completion, type TaskContext } from "@graphpack/tasks";

import { aggregate, type AggregatedGraphNode } from "./graph/aggregate.js";

/** Write one asset to its own path. */
export const emitAsset = defineTask("emit/asset", async (ctx: TaskContext, asset: Asset): Promise<Completion> => {
  const path = asset.path();
  await path.write(await asset.content(ctx));
  debug.emit("write", { path });
  return COMPLETED;
});

/**
 * Write `asset` and everything it reaches. A call that would wait on an
 * emission which is itself waiting on the caller completes at once, which
 * ends cycles; any other caller waits for the emission in flight.
 */
export const emitAssetsRecursive = defineTask(
  "emit/recursive",
  async (ctx: TaskContext, asset: Asset): Promise<Completion> => {
    await ctx.call(emitAsset, asset);
    const referenced = await ctx.call(allReferencedAssets, asset);
    return allCompleted(referenced.map((next) => ctx.call(emitAssetsRecursive, next)));
  },
  { cycle: { fallback: () => COMPLETED } },
);

export function emit(ctx: TaskContext, asset: Asset): Promise<Completion> {
  return ctx.call(emitAssetsRecursive, asset);
}

/** Write `asset` only when it lies inside `outputDir`. */
export const emitAssetIntoDir = defineTask(
  "emit/asset-into-dir",
  async (ctx: TaskContext, asset: Asset, outputDir: FileSystemPath): Promise<Completion> => {
    if (!asset.path().isInside(outputDir)) {
      debug.emit("skip.outside", { path: asset.path(), outputDir });
      return COMPLETED;
    }
    return ctx.call(emitAsset, asset);
  },
);

export const emitAggregatedAssets = defineTask(
  "emit/aggregated",
  async (ctx: TaskContext, node: AggregatedGraphNode, outputDir: FileSystemPath): Promise<Completion> => {
    if (node.type === "leaf") return ctx.call(emitAssetIntoDir, node.asset, outputDir);
    for (const child of node.children) {
      await ctx.call(emitAggregatedAssets, child, outputDir);
    }
    return COMPLETED;
  },
);

/** Aggregate the graph under `asset`, then write the part inside `outputDir`. */
export async function emitWithCompletion(ctx: TaskContext, asset: Asset, outputDir: FileSystemPath): Promise<Completion> {
  const node = await ctx.call(aggregate, asset);
  return ctx.call(emitAggregatedAssets, node, outputDir);
}
