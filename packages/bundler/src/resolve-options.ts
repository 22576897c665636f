import type { Environment, FileSystemPath, ResolveOptions } from "@graphpack/core";

function isVendored(contextPath: FileSystemPath): boolean {
  return contextPath.path.split("/").includes("node_modules");
}

/** Resolution for JavaScript sources in `contextPath`. */
export function resolveOptions(contextPath: FileSystemPath, environment: Environment): ResolveOptions {
  const browser = environment.target === "browser";
  return {
    extensions: isVendored(contextPath) ? [".js", ".mjs", ".cjs", ".json"] : [".js", ".mjs", ".cjs", ".jsx", ".json"],
    extensionAlias: {},
    modules: ["node_modules"],
    mainFields: browser ? ["browser", "module", "main"] : ["module", "main"],
    conditions: environment.exportConditions(),
    typesFallback: false,
  };
}

/**
 * Resolution once TypeScript is enabled: TypeScript extensions first, and
 * `./x.js` finds `x.ts`. Packages ship compiled files, so the aliases stay
 * off inside `node_modules`.
 */
export function typescriptResolveOptions(contextPath: FileSystemPath, environment: Environment): ResolveOptions {
  const base = resolveOptions(contextPath, environment);
  if (isVendored(contextPath)) return base;
  return {
    ...base,
    extensions: [".ts", ".tsx", ".mts", ".cts", ...base.extensions],
    extensionAlias: {
      ".js": [".ts", ".tsx", ".js"],
      ".jsx": [".tsx", ".jsx"],
      ".mjs": [".mts", ".mjs"],
      ".cjs": [".cts", ".cjs"],
    },
  };
}
