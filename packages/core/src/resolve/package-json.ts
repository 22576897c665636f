import { defineTask, type TaskContext } from "@graphpack/tasks";

import { invalidPackageJson } from "../diagnostics/codes.js";
import type { FileSystemPath } from "../fs/path.js";

export type PackageJson = Readonly<Record<string, unknown>>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Parsed package.json at `path`, or null when missing or invalid. */
export const readPackageJson = defineTask(
  "resolve/package-json",
  async (ctx: TaskContext, path: FileSystemPath): Promise<PackageJson | null> => {
    const content = await path.read(ctx);
    if (content.type === "not-found") return null;
    let parsed: unknown;
    try {
      parsed = JSON.parse(content.text);
    } catch (error) {
      ctx.report(invalidPackageJson(path.path, error instanceof Error ? error.message : String(error)));
      return null;
    }
    if (!isRecord(parsed)) {
      ctx.report(invalidPackageJson(path.path, "expected a JSON object"));
      return null;
    }
    return parsed;
  },
);

/**
 * Pick the target of an `exports` entry for the given conditions. Strings
 * are targets, arrays are fallbacks, objects are condition maps matched in
 * their own key order.
 */
export function resolveExportTarget(entry: unknown, conditions: readonly string[]): string | null {
  if (typeof entry === "string") return entry;
  if (Array.isArray(entry)) {
    for (const candidate of entry) {
      const target = resolveExportTarget(candidate, conditions);
      if (target !== null) return target;
    }
    return null;
  }
  if (isRecord(entry)) {
    for (const [condition, value] of Object.entries(entry)) {
      if (condition === "default" || conditions.includes(condition)) {
        const target = resolveExportTarget(value, conditions);
        if (target !== null) return target;
      }
    }
  }
  return null;
}

/**
 * Target for `subpath` ("." or "./x") from a package's `exports` field;
 * undefined when the package has no `exports`.
 */
export function packageExport(pkg: PackageJson, subpath: string, conditions: readonly string[]): string | null | undefined {
  const exportsField = pkg["exports"];
  if (exportsField === undefined) return undefined;
  if (isRecord(exportsField) && Object.keys(exportsField).some((k) => k.startsWith("."))) {
    return resolveExportTarget(exportsField[subpath], conditions);
  }
  return subpath === "." ? resolveExportTarget(exportsField, conditions) : null;
}

export function stringField(pkg: PackageJson, field: string): string | null {
  const value = pkg[field];
  return typeof value === "string" && value.length > 0 ? value : null;
}
