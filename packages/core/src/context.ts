import type { Keyed } from "@graphpack/shared";
import type { TaskContext } from "@graphpack/tasks";

import type { Asset } from "./asset.js";
import type { Environment } from "./environment.js";
import type { FileSystemPath } from "./fs/path.js";
import type { ResolveOptions } from "./resolve/options.js";
import type { Request } from "./resolve/request.js";
import type { ResolveResult } from "./resolve/result.js";

/**
 * The environment in which requests are resolved and sources become modules.
 * Contexts are immutable values; `with*` derivations return new contexts.
 * Two contexts with the same `taskKey` behave identically.
 */
export interface AssetContext extends Keyed {
  contextPath(): FileSystemPath;
  environment(): Environment;
  resolveOptions(): ResolveOptions;

  /** Resolve `request` from `contextPath` and process every asset found. */
  resolveAsset(
    ctx: TaskContext,
    contextPath: FileSystemPath,
    request: Request,
    options: ResolveOptions,
  ): Promise<ResolveResult>;
  processResolveResult(ctx: TaskContext, result: ResolveResult): Promise<ResolveResult>;
  process(ctx: TaskContext, asset: Asset): Promise<Asset>;

  withContextPath(contextPath: FileSystemPath): AssetContext;
  withEnvironment(environment: Environment): AssetContext;
  /** Unknown names are reported and leave the context untransitioned. */
  withTransition(ctx: TaskContext, name: string): AssetContext;
}
