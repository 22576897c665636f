import ts from "typescript";

import type { ModuleSystem } from "@graphpack/core";

export type EcmascriptTransform = "typescript" | "react" | "commonjs";

export const ECMASCRIPT_TRANSFORMS: readonly EcmascriptTransform[] = ["typescript", "react", "commonjs"];

export function isEcmascriptTransform(value: unknown): value is EcmascriptTransform {
  return typeof value === "string" && ECMASCRIPT_TRANSFORMS.some((t) => t === value);
}

export interface TranspileInput {
  fileName: string;
  text: string;
  transforms: readonly EcmascriptTransform[];
  moduleSystem: ModuleSystem;
}

/**
 * Apply transforms with the TypeScript emitter. Without transforms the text is
 * returned as written.
 */
export function transpile(input: TranspileInput): string {
  const { transforms } = input;
  if (transforms.length === 0) return input.text;

  const commonjs = transforms.includes("commonjs") || input.moduleSystem === "commonjs";
  const result = ts.transpileModule(input.text, {
    fileName: input.fileName,
    reportDiagnostics: false,
    compilerOptions: {
      target: ts.ScriptTarget.ES2022,
      module: commonjs ? ts.ModuleKind.CommonJS : ts.ModuleKind.ESNext,
      jsx: transforms.includes("react") ? ts.JsxEmit.ReactJSX : ts.JsxEmit.Preserve,
      isolatedModules: true,
      sourceMap: false,
    },
  });
  return result.outputText;
}
