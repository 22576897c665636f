import { parseRequest, type AssetContext, type AssetReference, type ResolveOptions, type ResolveResult } from "@graphpack/core";
import { defineTask, type TaskContext } from "@graphpack/tasks";

import type { ImportKind } from "./analyze.js";

/**
 * An import made by an ECMAScript module. Resolves from the module's own
 * context, through the named transition when the import carries one.
 */
export class EsmAssetReference implements AssetReference {
  readonly context: AssetContext;
  readonly request: string;
  readonly kind: Exclude<ImportKind, "types">;
  readonly transition: string | null;
  readonly taskKey: string;

  constructor(context: AssetContext, request: string, kind: Exclude<ImportKind, "types">, transition: string | null = null) {
    this.context = context;
    this.request = request;
    this.kind = kind;
    this.transition = transition;
    const via = transition === null ? "" : `@${transition}`;
    this.taskKey = `esm(${kind}:${request}${via}|${context.taskKey})`;
  }

  resolveReference(ctx: TaskContext): Promise<ResolveResult> {
    return ctx.call(resolveEsmReference, this);
  }

  toString(): string {
    return `${this.kind} ${this.request}`;
  }
}

const resolveEsmReference = defineTask(
  "ecmascript/resolve-reference",
  (ctx: TaskContext, reference: EsmAssetReference): Promise<ResolveResult> => {
    const origin = reference.context;
    const target = reference.transition === null ? origin : origin.withTransition(ctx, reference.transition);
    const options = target.resolveOptions();
    return target.resolveAsset(
      ctx,
      origin.contextPath(),
      parseRequest(reference.request),
      reference.kind === "require" ? requireOptions(options) : options,
    );
  },
);

/** `require()` matches the `require` export condition in place of `import`. */
function requireOptions(options: ResolveOptions): ResolveOptions {
  if (!options.conditions.includes("import")) return options;
  const conditions = options.conditions.map((c) => (c === "import" ? "require" : c));
  return { ...options, conditions: Array.from(new Set(conditions)) };
}
