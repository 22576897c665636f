export interface ResolveOptions {
  /** Appended to extensionless requests, in order. */
  readonly extensions: readonly string[];
  /** Extensions tried in place of the written one (`.js` -> `.ts`). */
  readonly extensionAlias: Readonly<Record<string, readonly string[]>>;
  /** Directory names searched upwards for packages. */
  readonly modules: readonly string[];
  /** package.json fields consulted for a package entry, in order. */
  readonly mainFields: readonly string[];
  /** Conditions matched against package.json `exports`, in priority order. */
  readonly conditions: readonly string[];
  /** Try `@types/<name>` when a package has no entry of its own. */
  readonly typesFallback: boolean;
}

export const DEFAULT_RESOLVE_OPTIONS: ResolveOptions = {
  extensions: [".js", ".mjs", ".cjs", ".json"],
  extensionAlias: {},
  modules: ["node_modules"],
  mainFields: ["module", "main"],
  conditions: ["import", "default"],
  typesFallback: false,
};
