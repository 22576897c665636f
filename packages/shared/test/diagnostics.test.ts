import { describe, test, expect } from "vitest";

import { buildDiagnostic, diagnosticKey, formatDiagnostic, hasErrors } from "../src/diagnostics.js";

describe("diagnostics", () => {
  test("buildDiagnostic defaults severity and path", () => {
    const diag = buildDiagnostic({ code: "GPK9999", message: "boom", stage: "graph" });
    expect(diag).toEqual({ code: "GPK9999", message: "boom", stage: "graph", severity: "error", path: null });
  });

  test("formatDiagnostic includes the path when present", () => {
    const withPath = buildDiagnostic({
      code: "GPK0001",
      message: 'Unable to resolve "./b"',
      stage: "resolve",
      path: "src",
    });
    expect(formatDiagnostic(withPath)).toBe('error GPK0001 [resolve] src: Unable to resolve "./b"');

    const warning = buildDiagnostic({ code: "GPK0003", message: "unknown", stage: "context", severity: "warning" });
    expect(formatDiagnostic(warning)).toBe("warning GPK0003 [context] unknown");
  });

  test("diagnosticKey ignores data and severity", () => {
    const a = buildDiagnostic({ code: "X", message: "m", stage: "emit", data: { n: 1 } });
    const b = buildDiagnostic({ code: "X", message: "m", stage: "emit", severity: "warning" });
    expect(diagnosticKey(a)).toBe(diagnosticKey(b));
  });

  test("hasErrors only counts errors", () => {
    const warning = buildDiagnostic({ code: "W", message: "w", stage: "config", severity: "warning" });
    const error = buildDiagnostic({ code: "E", message: "e", stage: "config" });
    expect(hasErrors([warning])).toBe(false);
    expect(hasErrors([warning, error])).toBe(true);
  });
});
