/* =======================================================================================
 * DIAGNOSTIC MODEL
 * ---------------------------------------------------------------------------------------
 * One envelope for everything the build reports without failing: unresolved
 * requests, unknown transitions, malformed module sources. Fatal conditions
 * are thrown as errors instead.
 * ======================================================================================= */

export type DiagnosticSeverity = "error" | "warning" | "info";

/** Where the diagnostic was produced, for routing and filtering. */
export type DiagnosticStage =
  | "resolve"
  | "module"
  | "context"
  | "graph"
  | "emit"
  | "config";

export interface Diagnostic<
  TCode extends string = string,
  TData extends Record<string, unknown> = Record<string, unknown>,
> {
  code: TCode;
  message: string;
  stage: DiagnosticStage;
  severity: DiagnosticSeverity;
  /** Display path of the file the diagnostic is about, when there is one. */
  path: string | null;
  data?: Readonly<TData>;
}

export interface BuildDiagnosticInput<
  TCode extends string = string,
  TData extends Record<string, unknown> = Record<string, unknown>,
> {
  code: TCode;
  message: string;
  stage: DiagnosticStage;
  severity?: DiagnosticSeverity;
  path?: string | null;
  data?: Readonly<TData>;
}

export function buildDiagnostic<
  TCode extends string,
  TData extends Record<string, unknown> = Record<string, unknown>,
>(input: BuildDiagnosticInput<TCode, TData>): Diagnostic<TCode, TData> {
  return {
    code: input.code,
    message: input.message,
    stage: input.stage,
    severity: input.severity ?? "error",
    path: input.path ?? null,
    ...(input.data ? { data: input.data } : {}),
  };
}

/** `error GPK0001 [resolve] src/a.ts: Unable to resolve "./b"` */
export function formatDiagnostic(diag: Diagnostic): string {
  const location = diag.path ? ` ${diag.path}:` : "";
  return `${diag.severity} ${diag.code} [${diag.stage}]${location} ${diag.message}`;
}

/** Stable identity used to drop duplicates when diagnostics are collected. */
export function diagnosticKey(diag: Diagnostic): string {
  return `${diag.code}\u0000${diag.path ?? ""}\u0000${diag.message}`;
}

export function hasErrors(diagnostics: readonly Diagnostic[]): boolean {
  return diagnostics.some((d) => d.severity === "error");
}
