import type { ModuleRule } from "./rule.js";

/** Switches and custom rules for classifying files. */
export interface ModuleOptionsContext {
  /** Apply the `react` transform to `.js` files outside `node_modules`. */
  readonly enableJsx: boolean;
  /** Treat `.d.ts` files as declarations instead of raw files. */
  readonly enableTypes: boolean;
  /** Appended after the defaults, so they win on conflicts. */
  readonly rules: readonly ModuleRule[];
}

export function createModuleOptionsContext(options: Partial<ModuleOptionsContext> = {}): ModuleOptionsContext {
  return {
    enableJsx: options.enableJsx ?? false,
    enableTypes: options.enableTypes ?? false,
    rules: options.rules ?? [],
  };
}
