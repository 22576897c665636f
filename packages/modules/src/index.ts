// Per-filetype module assets
//
// ECMAScript and TypeScript (with their import references and the
// TypeScript types lookup), CSS and static files.

export { EcmascriptModuleAsset, type EcmascriptModuleType } from "./ecmascript/module-asset.js";
export { EsmAssetReference } from "./ecmascript/references.js";
export { extractImports, type ImportKind, type ImportRecord } from "./ecmascript/analyze.js";
export {
  ECMASCRIPT_TRANSFORMS,
  isEcmascriptTransform,
  transpile,
  type EcmascriptTransform,
  type TranspileInput,
} from "./ecmascript/transforms.js";
export { TypescriptTypesAssetReference, typesResolveOptions } from "./ecmascript/typescript/types-reference.js";

export { CssModuleAsset } from "./css/module-asset.js";
export { CssAssetReference, cssRequest, extractCssImports, type CssImport, type CssReferenceKind } from "./css/references.js";

export { StaticModuleAsset } from "./static.js";
