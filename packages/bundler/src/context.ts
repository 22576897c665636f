import {
  resolve,
  type Asset,
  type AssetContext,
  type Environment,
  type FileSystemPath,
  type Request,
  type ResolveOptions,
  type ResolveResult,
  type Transition,
  type TransitionTable,
  unknownTransition,
} from "@graphpack/core";
import { TypescriptTypesAssetReference } from "@graphpack/modules";
import { debug, shortHash } from "@graphpack/shared";
import { defineTask, type TaskContext } from "@graphpack/tasks";

import { module } from "./module.js";
import type { ModuleOptionsContext } from "./module-options/options-context.js";
import { resolveOptions, typescriptResolveOptions } from "./resolve-options.js";

export interface ModuleAssetContextOptions {
  transitions: TransitionTable;
  contextPath: FileSystemPath;
  environment: Environment;
  moduleOptionsContext: ModuleOptionsContext;
  transition?: Transition | null;
}

/**
 * The asset context of the bundler: resolves requests with environment-aware
 * options and turns sources into modules, through the active transition when
 * there is one.
 */
export class ModuleAssetContext implements AssetContext {
  readonly transitions: TransitionTable;
  readonly moduleOptionsContext: ModuleOptionsContext;
  readonly transition: Transition | null;
  readonly #contextPath: FileSystemPath;
  readonly #environment: Environment;
  readonly taskKey: string;

  private constructor(options: ModuleAssetContextOptions) {
    this.transitions = options.transitions;
    this.moduleOptionsContext = options.moduleOptionsContext;
    this.transition = options.transition ?? null;
    this.#contextPath = options.contextPath;
    this.#environment = options.environment;
    const settings = shortHash([this.transitions, this.moduleOptionsContext], 16);
    this.taskKey = `context(${this.#contextPath.taskKey}|${this.#environment.taskKey}|${this.transition?.taskKey ?? "-"}|${settings})`;
  }

  static create(options: ModuleAssetContextOptions): ModuleAssetContext {
    return new ModuleAssetContext(options);
  }

  contextPath(): FileSystemPath {
    return this.#contextPath;
  }

  environment(): Environment {
    return this.#environment;
  }

  resolveOptions(): ResolveOptions {
    return this.#environment.isTypescriptEnabled()
      ? typescriptResolveOptions(this.#contextPath, this.#environment)
      : resolveOptions(this.#contextPath, this.#environment);
  }

  resolveAsset(ctx: TaskContext, contextPath: FileSystemPath, request: Request, options: ResolveOptions): Promise<ResolveResult> {
    return ctx.call(resolveAsset, this, contextPath, request, options);
  }

  processResolveResult(ctx: TaskContext, result: ResolveResult): Promise<ResolveResult> {
    return ctx.call(processResolveResult, this, result);
  }

  process(ctx: TaskContext, asset: Asset): Promise<Asset> {
    return ctx.call(processAsset, this, asset);
  }

  withContextPath(contextPath: FileSystemPath): ModuleAssetContext {
    return new ModuleAssetContext({ ...this.#fields(), contextPath });
  }

  withEnvironment(environment: Environment): ModuleAssetContext {
    return new ModuleAssetContext({ ...this.#fields(), environment });
  }

  withTransition(ctx: TaskContext, name: string): ModuleAssetContext {
    const transition = this.transitions.get(name);
    if (!transition) {
      ctx.report(unknownTransition(name, this.#contextPath.path, this.transitions.names()));
      return new ModuleAssetContext(this.#fields());
    }
    debug.context("transition", { name, contextPath: this.#contextPath });
    return new ModuleAssetContext({ ...this.#fields(), transition });
  }

  /** Every field except the transition. */
  #fields(): ModuleAssetContextOptions {
    return {
      transitions: this.transitions,
      contextPath: this.#contextPath,
      environment: this.#environment,
      moduleOptionsContext: this.moduleOptionsContext,
    };
  }

  toString(): string {
    const via = this.transition ? ` via ${this.transition.name}` : "";
    return `context ${String(this.#contextPath)} (${String(this.#environment)})${via}`;
  }
}

/* =============================================================================
 * Tasks
 * ============================================================================= */

const resolveAsset = defineTask(
  "context/resolve-asset",
  async (
    ctx: TaskContext,
    context: ModuleAssetContext,
    contextPath: FileSystemPath,
    request: Request,
    options: ResolveOptions,
  ): Promise<ResolveResult> => {
    const result = await ctx.call(resolve, contextPath, request, options);
    const processed = await context.processResolveResult(ctx, result);
    if (!context.environment().isTypescriptEnabled()) return processed;

    const typesContext = ModuleAssetContext.create({
      transitions: context.transitions,
      contextPath,
      environment: context.environment(),
      moduleOptionsContext: context.moduleOptionsContext,
    });
    return processed.withReference(new TypescriptTypesAssetReference(typesContext, request));
  },
);

const processResolveResult = defineTask(
  "context/process-resolve-result",
  (ctx: TaskContext, context: ModuleAssetContext, result: ResolveResult): Promise<ResolveResult> =>
    result.mapAssets((asset) => context.process(ctx, asset)),
);

const processAsset = defineTask(
  "context/process",
  async (ctx: TaskContext, context: ModuleAssetContext, asset: Asset): Promise<Asset> => {
    const { transition } = context;
    if (!transition) {
      return ctx.call(module, asset, context.transitions, context.environment(), context.moduleOptionsContext);
    }
    const source = await transition.processSource(ctx, asset);
    const environment = transition.processEnvironment(context.environment());
    const built = await ctx.call(module, source, context.transitions, environment, context.moduleOptionsContext);
    debug.context("process.transitioned", { transition: transition.name, asset: built.taskKey });
    return transition.processModule(ctx, built);
  },
);
