import type { FileSystemPath } from "@graphpack/core";
import { debug } from "@graphpack/shared";
import { defineTask, type TaskContext } from "@graphpack/tasks";

import { ecmascript, typescript, type ModuleType } from "./module-type.js";
import type { ModuleOptionsContext } from "./options-context.js";
import { any, moduleTypeRule, pathEndsWith, pathHasExtension, type ModuleRule } from "./rule.js";

export const STATIC_EXTENSIONS: readonly string[] = [
  ".png",
  ".jpg",
  ".jpeg",
  ".gif",
  ".webp",
  ".avif",
  ".ico",
  ".svg",
  ".woff",
  ".woff2",
  ".ttf",
  ".otf",
  ".eot",
];

export interface ModuleOptions {
  readonly rules: readonly ModuleRule[];
}

function extensions(...list: readonly string[]) {
  return any(...list.map(pathHasExtension));
}

/**
 * Rules for sources in `contextPath`: the built-in defaults, then the
 * context's custom rules.
 */
export const moduleOptions = defineTask(
  "bundler/module-options",
  async (_ctx: TaskContext, contextPath: FileSystemPath, options: ModuleOptionsContext): Promise<ModuleOptions> => {
    const vendored = contextPath.path.split("/").includes("node_modules");
    const jsTransforms = options.enableJsx && !vendored ? ecmascript("react") : ecmascript();
    const declarations: ModuleType = options.enableTypes ? { type: "typescript-declaration", transforms: [] } : { type: "raw" };

    const rules: ModuleRule[] = [
      moduleTypeRule(pathHasExtension(".json"), { type: "json" }),
      moduleTypeRule(extensions(".js", ".mjs", ".cjs"), jsTransforms),
      moduleTypeRule(pathHasExtension(".jsx"), ecmascript("react")),
      moduleTypeRule(extensions(".ts", ".mts", ".cts"), typescript()),
      moduleTypeRule(pathHasExtension(".tsx"), typescript("react")),
      moduleTypeRule(any(pathEndsWith(".d.ts"), pathEndsWith(".d.mts"), pathEndsWith(".d.cts")), declarations),
      moduleTypeRule(pathHasExtension(".css"), { type: "css" }),
      moduleTypeRule(extensions(...STATIC_EXTENSIONS), { type: "static" }),
      ...options.rules,
    ];

    debug.module("options", { contextPath, vendored, custom: options.rules.length });
    return { rules };
  },
);
