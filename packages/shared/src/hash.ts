import { createHash } from "node:crypto";

/**
 * A value with its own identity. Assets, paths, contexts and graph nodes
 * implement this so that they serialize (and therefore memoize) by identity
 * instead of by structure.
 */
export interface Keyed {
  readonly taskKey: string;
}

export function isKeyed(value: unknown): value is Keyed {
  return (
    typeof value === "object" &&
    value !== null &&
    "taskKey" in value &&
    typeof value.taskKey === "string"
  );
}

/**
 * Deterministic, stable JSON-like serialization for hashing and memo keys.
 * - Sorts object keys.
 * - `Keyed` values serialize as their key.
 * - Treats `undefined` / functions as nullish literals to keep hashing total.
 * - Not resilient to cycles (inputs are expected to be DAG-friendly).
 */
export function stableSerialize(value: unknown): string {
  return serialize(value);
}

export function stableHash(value: unknown): string {
  return createHash("sha256").update(stableSerialize(value)).digest("hex");
}

/** Short hash for display-friendly identifiers. */
export function shortHash(value: unknown, length = 12): string {
  return stableHash(value).slice(0, length);
}

function serialize(value: unknown): string {
  switch (typeof value) {
    case "string":
      return JSON.stringify(value);
    case "number":
      return Number.isFinite(value) ? String(value) : `"${String(value)}"`;
    case "boolean":
      return value ? "true" : "false";
    case "undefined":
      return "null";
    case "function":
      return '"<fn>"';
    case "object":
      if (value === null) return "null";
      if (isKeyed(value)) return `{"__key__":${JSON.stringify(value.taskKey)}}`;
      if (value instanceof Map) return serializeMap(value);
      if (value instanceof Set) return serializeSet(value);
      if (value instanceof RegExp) return JSON.stringify(String(value));
      if (Array.isArray(value)) return serializeArray(value);
      return serializeObject(value);
    default:
      return JSON.stringify(String(value));
  }
}

function serializeArray(arr: readonly unknown[]): string {
  const parts: string[] = [];
  for (let i = 0; i < arr.length; i++) {
    parts.push(serialize(arr[i]));
  }
  return `[${parts.join(",")}]`;
}

function serializeMap(map: ReadonlyMap<unknown, unknown>): string {
  const entries = Array.from(map.entries()).sort(([a], [b]) => {
    const aKey = serialize(a);
    const bKey = serialize(b);
    return aKey < bKey ? -1 : aKey > bKey ? 1 : 0;
  });
  const parts = entries.map(([k, v]) => `[${serialize(k)},${serialize(v)}]`);
  return `{"__map__":[${parts.join(",")}]}`;
}

function serializeSet(set: ReadonlySet<unknown>): string {
  const sorted = Array.from(set.values())
    .map((v) => serialize(v))
    .sort();
  return `{"__set__":[${sorted.join(",")}]}`;
}

function serializeObject(obj: object): string {
  const keys = Object.keys(obj).sort();
  const parts: string[] = [];
  for (const k of keys) {
    parts.push(`${JSON.stringify(k)}:${serialize(Reflect.get(obj, k))}`);
  }
  return `{${parts.join(",")}}`;
}
