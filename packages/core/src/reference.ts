import type { Keyed } from "@graphpack/shared";
import { defineTask, type TaskContext } from "@graphpack/tasks";

import type { Asset } from "./asset.js";
import { ResolveResult } from "./resolve/result.js";

/** An outgoing edge of an asset; resolving it yields the assets it points at. */
export interface AssetReference extends Keyed {
  resolveReference(ctx: TaskContext): Promise<ResolveResult>;
  toString(): string;
}

/** A reference to an asset that is already known. */
export class SingleAssetReference implements AssetReference {
  readonly #asset: Asset;
  readonly #description: string;
  readonly taskKey: string;

  constructor(asset: Asset, description = "asset") {
    this.#asset = asset;
    this.#description = description;
    this.taskKey = `ref(${description}->${asset.taskKey})`;
  }

  async resolveReference(): Promise<ResolveResult> {
    return ResolveResult.single(this.#asset);
  }

  toString(): string {
    return `${this.#description} ${String(this.#asset.path())}`;
  }
}

/**
 * Every asset an asset points at, directly or through the nested references
 * carried by resolve results. Each asset once, in discovery order.
 */
export const allReferencedAssets = defineTask(
  "core/all-referenced-assets",
  async (ctx: TaskContext, asset: Asset): Promise<readonly Asset[]> => {
    const assets = new Map<string, Asset>();
    const seenReferences = new Set<string>();
    let pending = [...(await asset.references(ctx))];

    while (pending.length > 0) {
      const fresh = pending.filter((reference) => {
        if (seenReferences.has(reference.taskKey)) return false;
        seenReferences.add(reference.taskKey);
        return true;
      });
      const results = await Promise.all(fresh.map((reference) => reference.resolveReference(ctx)));
      pending = [];
      for (const result of results) {
        for (const primary of result.primary) {
          if (!assets.has(primary.taskKey)) assets.set(primary.taskKey, primary);
        }
        pending.push(...result.references);
      }
    }

    return Array.from(assets.values());
  },
);
