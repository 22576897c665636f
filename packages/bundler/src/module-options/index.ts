export { resolveModuleRuleEffects, moduleTypeFromEffects } from "./effects.js";
export { moduleOptions, STATIC_EXTENSIONS, type ModuleOptions } from "./module-options.js";
export {
  ecmascript,
  isModuleTypeName,
  MODULE_TYPE_NAMES,
  RAW,
  typescript,
  type ModuleType,
  type ModuleTypeName,
} from "./module-type.js";
export { createModuleOptionsContext, type ModuleOptionsContext } from "./options-context.js";
export {
  all,
  any,
  ECMASCRIPT_TRANSFORMS_EFFECT,
  matchesCondition,
  MODULE_TYPE_EFFECT,
  moduleTypeRule,
  not,
  pathEndsWith,
  pathHasExtension,
  pathInDirectory,
  type ModuleRule,
  type ModuleRuleCondition,
  type ModuleRuleEffect,
} from "./rule.js";
