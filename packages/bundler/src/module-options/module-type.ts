import type { EcmascriptTransform } from "@graphpack/modules";

/** What a file becomes. Closed: `custom` is recognised only to be rejected. */
export type ModuleType =
  | { readonly type: "ecmascript"; readonly transforms: readonly EcmascriptTransform[] }
  | { readonly type: "typescript"; readonly transforms: readonly EcmascriptTransform[] }
  | { readonly type: "typescript-declaration"; readonly transforms: readonly EcmascriptTransform[] }
  | { readonly type: "json" }
  | { readonly type: "raw" }
  | { readonly type: "css" }
  | { readonly type: "static" }
  | { readonly type: "custom"; readonly name: string };

export type ModuleTypeName = ModuleType["type"];

export const MODULE_TYPE_NAMES: readonly ModuleTypeName[] = [
  "ecmascript",
  "typescript",
  "typescript-declaration",
  "json",
  "raw",
  "css",
  "static",
  "custom",
];

export const RAW: ModuleType = { type: "raw" };

export function ecmascript(...transforms: EcmascriptTransform[]): ModuleType {
  return { type: "ecmascript", transforms };
}

export function typescript(...transforms: EcmascriptTransform[]): ModuleType {
  return { type: "typescript", transforms };
}

export function isModuleTypeName(value: unknown): value is ModuleTypeName {
  return typeof value === "string" && MODULE_TYPE_NAMES.some((name) => name === value);
}
