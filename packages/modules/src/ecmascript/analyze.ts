import ts from "typescript";

/**
 * How a specifier is used:
 * - `esm`: static `import` / `export ... from`
 * - `dynamic`: `import()`
 * - `require`: `require()` and `import x = require()`
 * - `types`: type-only imports and `import("x")` types
 */
export type ImportKind = "esm" | "dynamic" | "require" | "types";

export interface ImportRecord {
  readonly specifier: string;
  readonly kind: ImportKind;
  /** Value of the `transition` import attribute, if any. */
  readonly transition: string | null;
}

/**
 * Collect every module specifier in a source file, in source order.
 * Non-literal specifiers (`import(name)`) are skipped.
 */
export function extractImports(fileName: string, text: string): ImportRecord[] {
  const sf = ts.createSourceFile(fileName, text, ts.ScriptTarget.Latest, true, scriptKindFor(fileName));
  const records: ImportRecord[] = [];

  const visit = (node: ts.Node): void => {
    if (ts.isImportDeclaration(node) && ts.isStringLiteral(node.moduleSpecifier)) {
      records.push({
        specifier: node.moduleSpecifier.text,
        kind: node.importClause?.isTypeOnly ? "types" : "esm",
        transition: transitionAttribute(node.attributes),
      });
    } else if (ts.isExportDeclaration(node) && node.moduleSpecifier && ts.isStringLiteral(node.moduleSpecifier)) {
      records.push({
        specifier: node.moduleSpecifier.text,
        kind: node.isTypeOnly ? "types" : "esm",
        transition: transitionAttribute(node.attributes),
      });
    } else if (
      ts.isImportEqualsDeclaration(node) &&
      ts.isExternalModuleReference(node.moduleReference) &&
      ts.isStringLiteral(node.moduleReference.expression)
    ) {
      records.push({
        specifier: node.moduleReference.expression.text,
        kind: node.isTypeOnly ? "types" : "require",
        transition: null,
      });
    } else if (ts.isCallExpression(node)) {
      const kind = callKind(node);
      const [arg] = node.arguments;
      if (kind && arg && ts.isStringLiteralLike(arg)) {
        records.push({ specifier: arg.text, kind, transition: null });
      }
    } else if (
      ts.isImportTypeNode(node) &&
      ts.isLiteralTypeNode(node.argument) &&
      ts.isStringLiteral(node.argument.literal)
    ) {
      records.push({ specifier: node.argument.literal.text, kind: "types", transition: null });
    }
    ts.forEachChild(node, visit);
  };

  visit(sf);
  return records;
}

function callKind(node: ts.CallExpression): ImportKind | null {
  if (node.expression.kind === ts.SyntaxKind.ImportKeyword) return "dynamic";
  if (ts.isIdentifier(node.expression) && node.expression.text === "require" && node.arguments.length === 1) {
    return "require";
  }
  return null;
}

function transitionAttribute(attributes: ts.ImportAttributes | undefined): string | null {
  for (const element of attributes?.elements ?? []) {
    if (element.name.text === "transition" && ts.isStringLiteral(element.value)) {
      return element.value.text;
    }
  }
  return null;
}

function scriptKindFor(fileName: string): ts.ScriptKind {
  if (fileName.endsWith(".tsx")) return ts.ScriptKind.TSX;
  if (/\.[cm]?ts$/.test(fileName)) return ts.ScriptKind.TS;
  if (fileName.endsWith(".jsx")) return ts.ScriptKind.JSX;
  return ts.ScriptKind.JS;
}
