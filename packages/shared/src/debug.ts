/**
 * Debug Channels
 *
 * Targeted debug logging for following how requests, modules and graph nodes
 * flow through the build. Channels are toggled by the `GRAPHPACK_DEBUG`
 * environment variable:
 *
 * ```bash
 * GRAPHPACK_DEBUG=resolve npm test        # Just the resolver
 * GRAPHPACK_DEBUG=module,graph npm test   # Multiple channels
 * GRAPHPACK_DEBUG=* npm test              # Everything
 * ```
 *
 * In code (always present, no-op when disabled):
 * ```typescript
 * debug.resolve("request.unresolved", { request, context });
 * ```
 */

/** Debug data can be any serializable value */
export type DebugData = Record<string, unknown>;

/** A debug channel function - logs when enabled, no-op when disabled */
export type DebugChannel = (point: string, data?: DebugData) => void;

export interface DebugConfig {
  /** Format output as JSON (machine-readable) or pretty (human-readable) */
  format: "json" | "pretty";
  timestamps: boolean;
  /** Custom output function (defaults to console.log) */
  output: (message: string) => void;
}

export const DEBUG_ENV = "GRAPHPACK_DEBUG";

const DEFAULT_CONFIG: DebugConfig = {
  format: "pretty",
  timestamps: false,
  output: console.log,
};

let config: DebugConfig = { ...DEFAULT_CONFIG };

function parseDebugEnv(): Set<string> {
  const env = process.env[DEBUG_ENV] ?? "";
  if (!env || env === "0" || env === "false") return new Set();
  if (env === "*" || env === "1" || env === "true") {
    return new Set(["*"]);
  }
  return new Set(env.split(",").map((s) => s.trim().toLowerCase()));
}

let enabledChannels = parseDebugEnv();

/** Additional channels created outside of this module */
const extraChannels = new Map<string, DebugChannel>();

function isEnabled(channel: string): boolean {
  return enabledChannels.has("*") || enabledChannels.has(channel.toLowerCase());
}

function formatMessage(
  channel: string,
  point: string,
  data: DebugData | undefined,
): string {
  const prefix = config.timestamps
    ? `[${new Date().toISOString()}] `
    : "";

  if (config.format === "json") {
    return JSON.stringify({
      channel,
      point,
      ...(data && { data }),
      ...(config.timestamps && { timestamp: Date.now() }),
    });
  }

  const label = `[${channel}.${point}]`;
  if (!data || Object.keys(data).length === 0) {
    return `${prefix}${label}`;
  }
  return `${prefix}${label} ${formatData(data)}`;
}

function formatData(data: DebugData, depth = 0): string {
  const entries = Object.entries(data);
  if (entries.length === 0) return "{}";

  const parts: string[] = [];
  for (const [key, value] of entries) {
    parts.push(`${key}=${formatValue(value, depth)}`);
  }

  const inline = `{ ${parts.join(", ")} }`;
  if (inline.length <= 100 || depth > 0) return inline;
  return `{\n  ${parts.join(",\n  ")}\n}`;
}

function formatValue(value: unknown, depth: number): string {
  if (value === null) return "null";
  if (value === undefined) return "undefined";
  if (typeof value === "string") {
    if (value.length > 80) return `"${value.slice(0, 77)}..."`;
    return `"${value}"`;
  }
  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  if (Array.isArray(value)) {
    if (value.length === 0) return "[]";
    if (value.length <= 3 && depth < 2) {
      const inline = `[${value.map((v) => formatValue(v, depth + 1)).join(", ")}]`;
      if (inline.length <= 60) return inline;
    }
    return `[${value.length} items]`;
  }
  if (typeof value === "object") {
    // Paths, assets and tasks all print something readable through toString().
    if (value.toString !== Object.prototype.toString) {
      return `<${String(value)}>`;
    }
    if (depth < 1) {
      return formatData({ ...value }, depth + 1);
    }
    return "{...}";
  }
  try {
    return JSON.stringify(value);
  } catch {
    return "[unserializable]";
  }
}

function createChannel(name: string): DebugChannel {
  if (!isEnabled(name)) {
    return () => {};
  }
  return (point: string, data?: DebugData) => {
    config.output(formatMessage(name, point, data));
  };
}

/**
 * Get or create an extra debug channel by name.
 * Channels are refreshed when refreshDebugChannels() is called.
 */
export function getDebugChannel(name: string): DebugChannel {
  const key = name.trim().toLowerCase();
  if (!key) return () => {};
  const existing = extraChannels.get(key);
  if (existing) return existing;
  const channel = createChannel(key);
  extraChannels.set(key, channel);
  return channel;
}

/**
 * Re-read `GRAPHPACK_DEBUG` (or take an explicit channel list) and rebuild
 * every channel.
 */
export function refreshDebugChannels(channels?: readonly string[]): void {
  enabledChannels = channels
    ? new Set(channels.map((c) => c.trim().toLowerCase()))
    : parseDebugEnv();
  debug.tasks = createChannel("tasks");
  debug.resolve = createChannel("resolve");
  debug.module = createChannel("module");
  debug.context = createChannel("context");
  debug.graph = createChannel("graph");
  debug.emit = createChannel("emit");
  debug.diagnostics = createChannel("diagnostics");
  for (const name of extraChannels.keys()) {
    extraChannels.set(name, createChannel(name));
  }
}

export function configureDebug(options: Partial<DebugConfig>): void {
  config = { ...config, ...options };
}

/**
 * Check if any debug channel is enabled.
 * Useful for guarding expensive data collection.
 */
export function isDebugEnabled(channel?: string): boolean {
  if (channel) return isEnabled(channel);
  return enabledChannels.size > 0;
}

export const DEBUG_CHANNELS = [
  "tasks",
  "resolve",
  "module",
  "context",
  "graph",
  "emit",
  "diagnostics",
] as const;

export type DebugChannelName = (typeof DEBUG_CHANNELS)[number];

/**
 * Debug channels for each subsystem.
 *
 * ```typescript
 * debug.graph("aggregate.done", { root: String(root.path()), nodes: 12 });
 * ```
 */
export const debug: Record<DebugChannelName, DebugChannel> = {
  /** Task engine: memo hits, recomputes, invalidation */
  tasks: createChannel("tasks"),

  /** Request parsing and file/module lookup */
  resolve: createChannel("resolve"),

  /** Rule matching and module construction */
  module: createChannel("module"),

  /** Asset context derivation and transitions */
  context: createChannel("context"),

  /** Aggregated graph and back references */
  graph: createChannel("graph"),

  emit: createChannel("emit"),

  /** Every reported diagnostic */
  diagnostics: createChannel("diagnostics"),
};
