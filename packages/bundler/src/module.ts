import { isModuleAsset, type Asset, type Environment, type TransitionTable } from "@graphpack/core";
import { CssModuleAsset, EcmascriptModuleAsset, StaticModuleAsset } from "@graphpack/modules";
import { debug } from "@graphpack/shared";
import { defineTask, type TaskContext } from "@graphpack/tasks";

import { ModuleAssetContext } from "./context.js";
import { ConfigErrorCode, ConfigurationError } from "./errors.js";
import { JsonModuleAsset } from "./json.js";
import { moduleOptions, moduleTypeFromEffects, resolveModuleRuleEffects } from "./module-options/index.js";
import type { ModuleOptionsContext } from "./module-options/options-context.js";

/**
 * Classify `source` by the rules for its directory and wrap it in the
 * matching module asset. Wrapping modules get a nested context at the
 * source's directory; TypeScript modules resolve with TypeScript enabled.
 */
export const module = defineTask(
  "bundler/module",
  async (
    ctx: TaskContext,
    source: Asset,
    transitions: TransitionTable,
    environment: Environment,
    moduleOptionsContext: ModuleOptionsContext,
  ): Promise<Asset> => {
    const path = source.path();
    const directory = path.parent();
    const { rules } = await ctx.call(moduleOptions, directory, moduleOptionsContext);
    const moduleType = moduleTypeFromEffects(resolveModuleRuleEffects(rules, path), path);
    debug.module("classify", { path, moduleType: moduleType.type });

    const nested = (env: Environment) =>
      ModuleAssetContext.create({ transitions, contextPath: directory, environment: env, moduleOptionsContext });

    switch (moduleType.type) {
      case "raw":
        return source;
      case "json":
        return isModuleAsset(source) && source.moduleKind === "json" ? source : new JsonModuleAsset(source);
      case "css":
        return reuse(source, "css", nested(environment)) ?? new CssModuleAsset(source, nested(environment));
      case "static":
        return reuse(source, "static", nested(environment)) ?? new StaticModuleAsset(source, nested(environment));
      case "ecmascript": {
        const context = nested(environment);
        return (
          reuse(source, "ecmascript", context) ??
          new EcmascriptModuleAsset(source, context, "ecmascript", moduleType.transforms, environment)
        );
      }
      case "typescript":
      case "typescript-declaration": {
        const context = nested(environment.withTypescript());
        return (
          reuse(source, moduleType.type, context) ??
          new EcmascriptModuleAsset(source, context, moduleType.type, moduleType.transforms, environment)
        );
      }
      case "custom":
        throw new ConfigurationError(
          `Custom module type "${moduleType.name}" has no factory`,
          ConfigErrorCode.CUSTOM_MODULE_TYPE,
          path.path,
        );
    }
  },
);

/**
 * `source` itself when it already is the module this call would build, so
 * processing a processed asset again is a no-op.
 */
function reuse(source: Asset, kind: string, context: ModuleAssetContext): Asset | null {
  if (!isModuleAsset(source) || source.moduleKind !== kind) return null;
  return source.context?.taskKey === context.taskKey ? source : null;
}
