import type { FileSystemPath } from "@graphpack/core";
import type { EcmascriptTransform } from "@graphpack/modules";

import type { ModuleType } from "./module-type.js";

/** A predicate over the path of a source file. */
export type ModuleRuleCondition =
  | { readonly type: "all"; readonly conditions: readonly ModuleRuleCondition[] }
  | { readonly type: "any"; readonly conditions: readonly ModuleRuleCondition[] }
  | { readonly type: "not"; readonly condition: ModuleRuleCondition }
  | { readonly type: "path-ends-with"; readonly suffix: string }
  | { readonly type: "path-has-extension"; readonly extension: string }
  /** Some ancestor directory has this name (`node_modules`). */
  | { readonly type: "path-in-directory"; readonly name: string }
  | { readonly type: "path-in-exact-directory"; readonly directory: FileSystemPath }
  | { readonly type: "path-matches"; readonly source: string; readonly flags?: string };

export type ModuleRuleEffect =
  | { readonly type: "module-type"; readonly moduleType: ModuleType }
  | { readonly type: "ecmascript-transforms"; readonly transforms: readonly EcmascriptTransform[] };

export const MODULE_TYPE_EFFECT = "module-type";
export const ECMASCRIPT_TRANSFORMS_EFFECT = "ecmascript-transforms";

export interface ModuleRule {
  readonly condition: ModuleRuleCondition;
  /** Effect key -> effect. */
  readonly effects: Readonly<Record<string, ModuleRuleEffect>>;
}

export function matchesCondition(condition: ModuleRuleCondition, path: FileSystemPath): boolean {
  switch (condition.type) {
    case "all":
      return condition.conditions.every((c) => matchesCondition(c, path));
    case "any":
      return condition.conditions.some((c) => matchesCondition(c, path));
    case "not":
      return !matchesCondition(condition.condition, path);
    case "path-ends-with":
      return path.path.endsWith(condition.suffix);
    case "path-has-extension":
      return path.extension === condition.extension;
    case "path-in-directory":
      return path.path.split("/").slice(0, -1).includes(condition.name);
    case "path-in-exact-directory":
      return path.isInside(condition.directory);
    case "path-matches":
      return new RegExp(condition.source, condition.flags).test(path.path);
  }
}

/* =============================================================================
 * Condition builders
 * ============================================================================= */

export const all = (...conditions: ModuleRuleCondition[]): ModuleRuleCondition => ({ type: "all", conditions });
export const any = (...conditions: ModuleRuleCondition[]): ModuleRuleCondition => ({ type: "any", conditions });
export const not = (condition: ModuleRuleCondition): ModuleRuleCondition => ({ type: "not", condition });
export const pathEndsWith = (suffix: string): ModuleRuleCondition => ({ type: "path-ends-with", suffix });
export const pathHasExtension = (extension: string): ModuleRuleCondition => ({ type: "path-has-extension", extension });
export const pathInDirectory = (name: string): ModuleRuleCondition => ({ type: "path-in-directory", name });

export function moduleTypeRule(condition: ModuleRuleCondition, moduleType: ModuleType): ModuleRule {
  return { condition, effects: { [MODULE_TYPE_EFFECT]: { type: "module-type", moduleType } } };
}
