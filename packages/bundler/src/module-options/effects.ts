import type { FileSystemPath } from "@graphpack/core";
import { debug } from "@graphpack/shared";

import { ConfigErrorCode, ConfigurationError } from "../errors.js";
import { RAW, type ModuleType } from "./module-type.js";
import {
  ECMASCRIPT_TRANSFORMS_EFFECT,
  MODULE_TYPE_EFFECT,
  matchesCondition,
  type ModuleRule,
  type ModuleRuleEffect,
} from "./rule.js";

/**
 * Merge the effects of every rule matching `path`, in rule order. A later
 * rule replaces the effect an earlier one set under the same key.
 */
export function resolveModuleRuleEffects(rules: readonly ModuleRule[], path: FileSystemPath): Map<string, ModuleRuleEffect> {
  const effects = new Map<string, ModuleRuleEffect>();
  for (const rule of rules) {
    if (!matchesCondition(rule.condition, path)) continue;
    for (const [key, effect] of Object.entries(rule.effects)) {
      effects.set(key, effect);
    }
  }
  return effects;
}

/**
 * The module type selected by merged effects; `raw` when no rule chose one.
 * Extra ECMAScript transforms are appended to ECMAScript and TypeScript types.
 */
export function moduleTypeFromEffects(effects: ReadonlyMap<string, ModuleRuleEffect>, path?: FileSystemPath): ModuleType {
  const effect = effects.get(MODULE_TYPE_EFFECT);
  if (!effect) return RAW;
  if (effect.type !== "module-type") {
    throw new ConfigurationError(
      `Effect "${MODULE_TYPE_EFFECT}" must be a module type, got "${effect.type}"`,
      ConfigErrorCode.INVALID_MODULE_TYPE_EFFECT,
      path?.path,
    );
  }

  const moduleType = effect.moduleType;
  const extra = effects.get(ECMASCRIPT_TRANSFORMS_EFFECT);
  if (extra?.type !== "ecmascript-transforms" || extra.transforms.length === 0) return moduleType;

  switch (moduleType.type) {
    case "ecmascript":
    case "typescript":
    case "typescript-declaration": {
      const transforms = [...moduleType.transforms];
      for (const transform of extra.transforms) {
        if (!transforms.includes(transform)) transforms.push(transform);
      }
      debug.module("effects.transforms", { path, transforms });
      return { ...moduleType, transforms };
    }
    default:
      return moduleType;
  }
}
