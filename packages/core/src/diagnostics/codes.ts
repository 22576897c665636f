/**
 * Build Diagnostic Codes
 *
 * Codes follow the pattern GPKxxxx where:
 * - GPK0001-GPK0009: Resolution and context (requests, transitions, packages)
 * - GPK0010-GPK0019: Module sources
 *
 * Severity guidelines:
 * - Unresolved or malformed requests: "error"; the import is dropped from the graph
 * - Unknown transitions and broken package.json files: "warning"; the build
 *   falls back to the untransitioned context or the next lookup
 * - Unparseable module sources: "error"
 */

import { buildDiagnostic, type Diagnostic } from "@graphpack/shared";

/** Request could not be resolved from its context */
export const GPK0001_UNRESOLVED_REQUEST = "GPK0001";

/** Request text does not parse as any known request kind */
export const GPK0002_MALFORMED_REQUEST = "GPK0002";

/** Context asked for a transition that is not in its table */
export const GPK0003_UNKNOWN_TRANSITION = "GPK0003";

/** package.json exists but is not a JSON object */
export const GPK0004_INVALID_PACKAGE_JSON = "GPK0004";

/** JSON module source is not valid JSON */
export const GPK0010_INVALID_JSON_MODULE = "GPK0010";

export function unresolvedRequest(request: string, from: string): Diagnostic {
  return buildDiagnostic({
    code: GPK0001_UNRESOLVED_REQUEST,
    message: `Unable to resolve "${request}"`,
    stage: "resolve",
    severity: "error",
    path: from,
    data: { request },
  });
}

export function malformedRequest(request: string, from: string, reason: string): Diagnostic {
  return buildDiagnostic({
    code: GPK0002_MALFORMED_REQUEST,
    message: `Malformed request "${request}": ${reason}`,
    stage: "resolve",
    severity: "error",
    path: from,
    data: { request },
  });
}

export function unknownTransition(name: string, from: string, known: readonly string[]): Diagnostic {
  const hint = known.length > 0 ? ` (known: ${known.join(", ")})` : "";
  return buildDiagnostic({
    code: GPK0003_UNKNOWN_TRANSITION,
    message: `Unknown transition "${name}"${hint}; continuing without a transition`,
    stage: "context",
    severity: "warning",
    path: from,
    data: { transition: name },
  });
}

export function invalidPackageJson(path: string, reason: string): Diagnostic {
  return buildDiagnostic({
    code: GPK0004_INVALID_PACKAGE_JSON,
    message: `Ignoring package.json: ${reason}`,
    stage: "resolve",
    severity: "warning",
    path,
  });
}

export function invalidJsonModule(path: string, reason: string): Diagnostic {
  return buildDiagnostic({
    code: GPK0010_INVALID_JSON_MODULE,
    message: `Invalid JSON: ${reason}`,
    stage: "module",
    severity: "error",
    path,
  });
}
