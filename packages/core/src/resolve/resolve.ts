import { debug } from "@graphpack/shared";
import { defineTask, type TaskContext } from "@graphpack/tasks";

import { SourceAsset } from "../asset.js";
import { malformedRequest, unresolvedRequest } from "../diagnostics/codes.js";
import { FileSystemPath } from "../fs/path.js";
import type { ResolveOptions } from "./options.js";
import { packageExport, readPackageJson, stringField } from "./package-json.js";
import type { Request } from "./request.js";
import { ResolveResult } from "./result.js";

export type LookupOutcome =
  | { readonly type: "found"; readonly path: FileSystemPath }
  | { readonly type: "external"; readonly specifier: string }
  | { readonly type: "not-found" }
  | { readonly type: "malformed"; readonly reason: string };

const NOT_FOUND_OUTCOME: LookupOutcome = { type: "not-found" };

/**
 * Locate the file a request points at without reporting anything. Callers
 * that treat a miss as optional (the types lookup) use this directly.
 */
export const lookup = defineTask(
  "resolve/lookup",
  async (ctx: TaskContext, contextPath: FileSystemPath, request: Request, options: ResolveOptions): Promise<LookupOutcome> => {
    switch (request.type) {
      case "empty":
        return { type: "malformed", reason: "request is empty" };
      case "unknown":
        return { type: "malformed", reason: request.reason };
      case "builtin":
      case "uri":
        return { type: "external", specifier: request.request };
      case "relative":
        return found(await resolvePath(ctx, contextPath.join(request.path), options));
      case "server-relative":
        return found(await resolvePath(ctx, FileSystemPath.root(contextPath.fs).join(request.path), options));
      case "module":
        return found(await resolveModule(ctx, contextPath, request.module, request.path, options));
    }
  },
);

function found(path: FileSystemPath | null): LookupOutcome {
  return path ? { type: "found", path } : NOT_FOUND_OUTCOME;
}

/**
 * Resolve a request from `contextPath` to source assets. Failures are
 * reported and produce an empty result; builtins and URIs are external.
 */
export const resolve = defineTask(
  "resolve/resolve",
  async (ctx: TaskContext, contextPath: FileSystemPath, request: Request, options: ResolveOptions): Promise<ResolveResult> => {
    const outcome = await ctx.call(lookup, contextPath, request, options);
    debug.resolve("resolve", { from: contextPath, request: request.request, outcome: outcome.type });
    switch (outcome.type) {
      case "found":
        return ResolveResult.single(new SourceAsset(outcome.path));
      case "external":
        return ResolveResult.external(outcome.specifier);
      case "malformed":
        ctx.report(malformedRequest(request.request, contextPath.path, outcome.reason));
        return ResolveResult.unresolvable();
      case "not-found":
        ctx.report(unresolvedRequest(request.request, contextPath.path));
        return ResolveResult.unresolvable();
    }
  },
);

async function isFile(ctx: TaskContext, path: FileSystemPath): Promise<boolean> {
  return (await path.type(ctx)) === "file";
}

function withSuffix(path: FileSystemPath, suffix: string): FileSystemPath | null {
  return path.isRoot() ? null : path.parent().join(`${path.fileName}${suffix}`);
}

async function resolveFile(ctx: TaskContext, path: FileSystemPath, options: ResolveOptions): Promise<FileSystemPath | null> {
  if (await isFile(ctx, path)) return path;

  for (const alias of options.extensionAlias[path.extension] ?? []) {
    const candidate = path.withExtension(alias);
    if (await isFile(ctx, candidate)) return candidate;
  }

  for (const extension of options.extensions) {
    const candidate = withSuffix(path, extension);
    if (candidate && (await isFile(ctx, candidate))) return candidate;
  }
  return null;
}

async function resolveDirectory(ctx: TaskContext, dir: FileSystemPath, options: ResolveOptions): Promise<FileSystemPath | null> {
  const manifest = dir.join("package.json");
  const pkg = manifest ? await ctx.call(readPackageJson, manifest) : null;
  if (pkg) {
    for (const field of options.mainFields) {
      const main = stringField(pkg, field);
      const target = main ? dir.join(main) : null;
      if (!target || target.equals(dir)) continue;
      const file = await resolveFile(ctx, target, options);
      if (file) return file;
      if ((await target.type(ctx)) === "directory") {
        const index = await resolveIndex(ctx, target, options);
        if (index) return index;
      }
    }
  }
  return resolveIndex(ctx, dir, options);
}

async function resolveIndex(ctx: TaskContext, dir: FileSystemPath, options: ResolveOptions): Promise<FileSystemPath | null> {
  for (const extension of options.extensions) {
    const candidate = dir.join(`index${extension}`);
    if (candidate && (await isFile(ctx, candidate))) return candidate;
  }
  return null;
}

async function resolvePath(ctx: TaskContext, path: FileSystemPath | null, options: ResolveOptions): Promise<FileSystemPath | null> {
  if (!path) return null;
  const file = path.isRoot() ? null : await resolveFile(ctx, path, options);
  if (file) return file;
  if ((await path.type(ctx)) === "directory") return resolveDirectory(ctx, path, options);
  return null;
}

async function resolveModule(
  ctx: TaskContext,
  contextPath: FileSystemPath,
  name: string,
  subpath: string,
  options: ResolveOptions,
): Promise<FileSystemPath | null> {
  const direct = await findPackage(ctx, contextPath, name, subpath, options);
  if (direct.type !== "missing" || !options.typesFallback || name.startsWith("@types/")) {
    return direct.type === "found" ? direct.path : null;
  }
  const typesName = `@types/${name.startsWith("@") ? name.slice(1).replace("/", "__") : name}`;
  const types = await findPackage(ctx, contextPath, typesName, subpath, options);
  return types.type === "found" ? types.path : null;
}

type PackageLookup =
  | { readonly type: "found"; readonly path: FileSystemPath }
  | { readonly type: "unresolved" }
  | { readonly type: "missing" };

/** Walk up from `contextPath` through every `modules` directory. */
async function findPackage(
  ctx: TaskContext,
  contextPath: FileSystemPath,
  name: string,
  subpath: string,
  options: ResolveOptions,
): Promise<PackageLookup> {
  for (let dir = contextPath; ; dir = dir.parent()) {
    if (!options.modules.includes(dir.fileName)) {
      for (const modulesDir of options.modules) {
        const pkgDir = dir.join(`${modulesDir}/${name}`);
        if (!pkgDir || (await pkgDir.type(ctx)) !== "directory") continue;
        const file = await resolveInPackage(ctx, pkgDir, subpath, options);
        return file ? { type: "found", path: file } : { type: "unresolved" };
      }
    }
    if (dir.isRoot()) return { type: "missing" };
  }
}

async function resolveInPackage(
  ctx: TaskContext,
  pkgDir: FileSystemPath,
  subpath: string,
  options: ResolveOptions,
): Promise<FileSystemPath | null> {
  const manifest = pkgDir.join("package.json");
  const pkg = manifest ? await ctx.call(readPackageJson, manifest) : null;
  if (pkg) {
    const target = packageExport(pkg, subpath === "" ? "." : `.${subpath}`, options.conditions);
    if (target === null) return null;
    if (target !== undefined) {
      const path = pkgDir.join(target);
      return path ? resolveFile(ctx, path, options) : null;
    }
  }
  if (subpath !== "") return resolvePath(ctx, pkgDir.join(subpath.slice(1)), options);
  return resolveDirectory(ctx, pkgDir, options);
}
