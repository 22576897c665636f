import { builtinModules } from "node:module";

/**
 * A parsed import specifier. Every variant keeps the original text in
 * `request` for diagnostics.
 */
export type Request =
  | { readonly type: "relative"; readonly request: string; readonly path: string }
  | { readonly type: "server-relative"; readonly request: string; readonly path: string }
  | { readonly type: "module"; readonly request: string; readonly module: string; readonly path: string }
  | { readonly type: "builtin"; readonly request: string; readonly name: string }
  | { readonly type: "uri"; readonly request: string; readonly protocol: string }
  | { readonly type: "empty"; readonly request: string }
  | { readonly type: "unknown"; readonly request: string; readonly reason: string };

const BUILTINS = new Set(builtinModules);
const URI_PATTERN = /^([a-z][a-z0-9+.-]*):/i;
const SCOPED_MODULE = /^(@[^/\s]+\/[^/\s]+)(\/.*)?$/;
const BARE_MODULE = /^([^/@.\s][^/\s]*)(\/.*)?$/;

export function parseRequest(text: string): Request {
  const request = text;
  if (text.trim() === "") return { type: "empty", request };
  if (text.includes("\0")) return { type: "unknown", request, reason: "contains a NUL character" };

  if (text === "." || text === ".." || text.startsWith("./") || text.startsWith("../")) {
    return { type: "relative", request, path: text };
  }
  if (text.startsWith("/")) {
    return { type: "server-relative", request, path: text.slice(1) };
  }
  if (text.startsWith("node:")) {
    return { type: "builtin", request, name: text.slice("node:".length) };
  }
  if (BUILTINS.has(text)) return { type: "builtin", request, name: text };

  const uri = URI_PATTERN.exec(text);
  // Single letters are Windows drive letters, not schemes.
  if (uri?.[1] && uri[1].length > 1) {
    return { type: "uri", request, protocol: uri[1].toLowerCase() };
  }

  if (text.startsWith("#")) {
    return { type: "unknown", request, reason: "package import maps are not supported" };
  }

  if (text.startsWith("@")) {
    const scoped = SCOPED_MODULE.exec(text);
    if (!scoped?.[1]) return { type: "unknown", request, reason: "scoped package name is incomplete" };
    return { type: "module", request, module: scoped[1], path: scoped[2] ?? "" };
  }

  const bare = BARE_MODULE.exec(text);
  if (!bare?.[1]) return { type: "unknown", request, reason: "not a relative path or package name" };
  return { type: "module", request, module: bare[1], path: bare[2] ?? "" };
}
