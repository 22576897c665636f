// Collaborator contracts for the bundler core
//
// File systems and paths, assets and references, request parsing and
// resolution, environments, transitions and the AssetContext contract.

export {
  DiskFileSystem,
  MemoryFileSystem,
  NOT_FOUND,
  fileContent,
  type FileContent,
  type FileSystem,
  type FileType,
} from "./fs/file-system.js";
export { FileSystemPath, fileType, invalidatePath, readFile } from "./fs/path.js";

export { Environment, type EnvironmentOptions, type ExecutionTarget, type ModuleSystem } from "./environment.js";

export { SourceAsset, VirtualAsset, isModuleAsset, type Asset, type ModuleAsset } from "./asset.js";
export { SingleAssetReference, allReferencedAssets, type AssetReference } from "./reference.js";

export { parseRequest, type Request } from "./resolve/request.js";
export { DEFAULT_RESOLVE_OPTIONS, type ResolveOptions } from "./resolve/options.js";
export { ResolveResult } from "./resolve/result.js";
export { lookup, resolve, type LookupOutcome } from "./resolve/resolve.js";
export { packageExport, readPackageJson, resolveExportTarget, type PackageJson } from "./resolve/package-json.js";

export { TransitionTable, type Transition } from "./transition.js";
export type { AssetContext } from "./context.js";

export * from "./diagnostics/codes.js";
