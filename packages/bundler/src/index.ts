// Bundler core
//
// Module rules and factory, the module asset context, the aggregated graph
// with its back-reference analysis, emission, and the bundler facade.

export { createBundler, type Bundler } from "./bundler.js";
export { ModuleAssetContext, type ModuleAssetContextOptions } from "./context.js";
export { module } from "./module.js";
export { JsonModuleAsset } from "./json.js";
export { RebasedAsset, RebasedAssetReference, rebasePath } from "./rebase.js";
export { resolveOptions, typescriptResolveOptions } from "./resolve-options.js";
export { createTransition, type TransitionOptions } from "./transitions.js";
export { ConfigErrorCode, ConfigurationError, type ConfigErrorCodeType } from "./errors.js";

export * from "./module-options/index.js";

export {
  aggregate,
  aggregatedAssets,
  aggregatedDepth,
  AggregatedGroup,
  AggregatedLeaf,
  balancedGroup,
  FANOUT,
  groupLevel,
  type AggregatedGraphNode,
} from "./graph/aggregate.js";
export { immediateDominators } from "./graph/dominators.js";
export {
  computeBackReferences,
  formatTopReferences,
  mostReferenced,
  printMostReferenced,
  ReferencesList,
  topReferences,
  type BackReferenceEntry,
} from "./graph/back-references.js";

export {
  emit,
  emitAggregatedAssets,
  emitAsset,
  emitAssetIntoDir,
  emitAssetsRecursive,
  emitWithCompletion,
} from "./emit.js";

export {
  CONFIG_FILE_NAME,
  configRuleToModuleRule,
  DEFAULT_ENVIRONMENT,
  DEFAULT_OUTPUT_DIR,
  loadConfigFile,
  mergeConfig,
  normalizeDebugChannels,
  normalizeOptions,
  parseConfig,
  type BundlerConfig,
  type BundlerOptions,
  type ConfigCondition,
  type ConfigRule,
  type ResolvedBundlerOptions,
} from "./defaults.js";
