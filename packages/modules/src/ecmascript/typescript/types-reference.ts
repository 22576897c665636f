import {
  lookup,
  ResolveResult,
  SourceAsset,
  type AssetContext,
  type AssetReference,
  type Request,
  type ResolveOptions,
} from "@graphpack/core";
import { debug } from "@graphpack/shared";
import { defineTask, type TaskContext } from "@graphpack/tasks";

/**
 * Where TypeScript looks for the declarations of a request: `.d.ts` first,
 * `types`/`typings` fields, the `types` export condition, then
 * `@types/<name>`.
 */
export function typesResolveOptions(base: ResolveOptions): ResolveOptions {
  const extensionAlias: Record<string, readonly string[]> = {};
  for (const [from, to] of Object.entries(base.extensionAlias)) {
    extensionAlias[from] = [".d.ts", ...to];
  }
  extensionAlias[".js"] ??= [".d.ts", ".js"];
  return {
    extensions: unique([".d.ts", ...base.extensions]),
    extensionAlias,
    modules: base.modules,
    mainFields: unique(["types", "typings", ...base.mainFields]),
    conditions: unique(["types", ...base.conditions]),
    typesFallback: true,
  };
}

function unique(values: readonly string[]): string[] {
  return Array.from(new Set(values));
}

/**
 * The declarations behind a request, looked up from the context it was made
 * in. A request without declarations resolves to nothing and is not
 * reported.
 */
export class TypescriptTypesAssetReference implements AssetReference {
  readonly context: AssetContext;
  readonly request: Request;
  readonly taskKey: string;

  constructor(context: AssetContext, request: Request) {
    this.context = context;
    this.request = request;
    this.taskKey = `types(${request.request}|${context.taskKey})`;
  }

  resolveReference(ctx: TaskContext): Promise<ResolveResult> {
    return ctx.call(resolveTypesReference, this);
  }

  toString(): string {
    return `typescript types ${this.request.request}`;
  }
}

const resolveTypesReference = defineTask(
  "ecmascript/resolve-types-reference",
  async (ctx: TaskContext, reference: TypescriptTypesAssetReference): Promise<ResolveResult> => {
    const { context, request } = reference;
    const options = typesResolveOptions(context.resolveOptions());
    const outcome = await ctx.call(lookup, context.contextPath(), request, options);
    if (outcome.type !== "found") {
      debug.resolve("types.missing", { request: request.request, outcome: outcome.type });
      return ResolveResult.unresolvable();
    }
    return ResolveResult.single(await context.process(ctx, new SourceAsset(outcome.path)));
  },
);
