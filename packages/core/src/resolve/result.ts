import type { Keyed } from "@graphpack/shared";

import type { Asset } from "../asset.js";
import type { AssetReference } from "../reference.js";

/**
 * Outcome of resolving one request: the assets it points at, further
 * references that take part in the graph without being primary (such as a
 * TypeScript types lookup), and external specifiers left to the runtime.
 * An empty result is how a failed resolution is represented.
 */
export class ResolveResult implements Keyed {
  readonly primary: readonly Asset[];
  readonly references: readonly AssetReference[];
  readonly externals: readonly string[];
  readonly taskKey: string;

  constructor(primary: readonly Asset[], references: readonly AssetReference[] = [], externals: readonly string[] = []) {
    this.primary = primary;
    this.references = references;
    this.externals = externals;
    this.taskKey = `resolved(${primary.map((a) => a.taskKey).join(",")};${references
      .map((r) => r.taskKey)
      .join(",")};${externals.join(",")})`;
  }

  static single(asset: Asset): ResolveResult {
    return new ResolveResult([asset]);
  }

  static unresolvable(): ResolveResult {
    return new ResolveResult([]);
  }

  static external(specifier: string): ResolveResult {
    return new ResolveResult([], [], [specifier]);
  }

  get isUnresolvable(): boolean {
    return this.primary.length === 0 && this.externals.length === 0;
  }

  /** Attach a reference; a reference with the same key is only kept once. */
  withReference(reference: AssetReference): ResolveResult {
    if (this.references.some((r) => r.taskKey === reference.taskKey)) return this;
    return new ResolveResult(this.primary, [...this.references, reference], this.externals);
  }

  /** Replace every primary asset, keeping references and externals. */
  async mapAssets(fn: (asset: Asset) => Promise<Asset>): Promise<ResolveResult> {
    const primary = await Promise.all(this.primary.map(fn));
    return new ResolveResult(primary, this.references, this.externals);
  }
}
