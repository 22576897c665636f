import {
  FileSystemPath,
  invalidatePath,
  parseRequest,
  SourceAsset,
  type Asset,
  type ResolveResult,
} from "@graphpack/core";
import { debug, diagnosticKey, formatDiagnostic, refreshDebugChannels, type Diagnostic } from "@graphpack/shared";
import { defineTask, TaskEngine, type Completion, type TaskContext } from "@graphpack/tasks";

import { ModuleAssetContext } from "./context.js";
import { normalizeOptions, type BundlerOptions, type ResolvedBundlerOptions } from "./defaults.js";
import { emit, emitWithCompletion } from "./emit.js";
import { formatTopReferences, mostReferenced } from "./graph/back-references.js";
import { RebasedAsset } from "./rebase.js";

export interface Bundler {
  readonly engine: TaskEngine;
  readonly options: ResolvedBundlerOptions;
  /** Context at the project root. */
  readonly context: ModuleAssetContext;

  /** The module for a root-relative source path. */
  entry(path: string): Promise<Asset>;
  /** Resolve a request as if imported from the directory `from`. */
  resolve(request: string, from?: string): Promise<ResolveResult>;
  /** Write the entry's module graph in place. */
  emit(entry: string): Promise<Completion>;
  /** Write the entry's module graph, moved from the input to the output directory. */
  emitToOutput(entry: string): Promise<Completion>;
  /** Write the most referenced assets of the entry's graph, one line each, unprefixed. */
  printMostReferenced(entry: string, write?: (line: string) => void): Promise<void>;
  /** A file changed; returns how many cached results went stale. */
  invalidate(path: string): number;
  /** Diagnostics of every operation run so far. */
  diagnostics(): Diagnostic[];
}

const entryModule = defineTask(
  "bundler/entry",
  (ctx: TaskContext, context: ModuleAssetContext, path: FileSystemPath): Promise<Asset> =>
    context.process(ctx, new SourceAsset(path)),
);

const resolveRequest = defineTask(
  "bundler/resolve",
  (ctx: TaskContext, context: ModuleAssetContext, request: string): Promise<ResolveResult> =>
    context.resolveAsset(ctx, context.contextPath(), parseRequest(request), context.resolveOptions()),
);

const emitEntry = defineTask(
  "bundler/emit",
  async (ctx: TaskContext, context: ModuleAssetContext, path: FileSystemPath): Promise<Completion> =>
    emit(ctx, await ctx.call(entryModule, context, path)),
);

const emitEntryToOutput = defineTask(
  "bundler/emit-to-output",
  async (
    ctx: TaskContext,
    context: ModuleAssetContext,
    path: FileSystemPath,
    inputDir: FileSystemPath,
    outputDir: FileSystemPath,
  ): Promise<Completion> => {
    const asset = await ctx.call(entryModule, context, path);
    return emitWithCompletion(ctx, new RebasedAsset(asset, inputDir, outputDir), outputDir);
  },
);

const mostReferencedFromEntry = defineTask(
  "bundler/most-referenced",
  async (ctx: TaskContext, context: ModuleAssetContext, path: FileSystemPath) =>
    ctx.call(mostReferenced, await ctx.call(entryModule, context, path)),
);

/** Wire an engine, a root context and the operations on it. */
export function createBundler(userOptions: BundlerOptions = {}): Bundler {
  const options = normalizeOptions(userOptions);
  if (options.debugChannels.length > 0) refreshDebugChannels(options.debugChannels);

  const engine = new TaskEngine();
  const root = FileSystemPath.root(options.fileSystem);
  const context = ModuleAssetContext.create({
    transitions: options.transitions,
    contextPath: root,
    environment: options.environment,
    moduleOptionsContext: options.moduleOptionsContext,
  });
  const roots = new Map<string, () => Diagnostic[]>();
  const { logger } = options;

  const at = (path: string): FileSystemPath => FileSystemPath.of(options.fileSystem, path);

  const track = (key: string, collect: () => Diagnostic[]): void => {
    if (!roots.has(key)) roots.set(key, collect);
  };

  return {
    engine,
    options,
    context,

    entry(path) {
      const source = at(path);
      track(`entry:${source.taskKey}`, () => engine.diagnostics(entryModule, context, source));
      return engine.run(entryModule, context, source);
    },

    resolve(request, from = "") {
      const scoped = context.withContextPath(at(from));
      track(`resolve:${scoped.taskKey}:${request}`, () => engine.diagnostics(resolveRequest, scoped, request));
      return engine.run(resolveRequest, scoped, request);
    },

    async emit(entry) {
      const source = at(entry);
      track(`emit:${source.taskKey}`, () => engine.diagnostics(emitEntry, context, source));
      const completion = await engine.run(emitEntry, context, source);
      logger.info(`emitted ${entry}`);
      return completion;
    },

    async emitToOutput(entry) {
      const source = at(entry);
      const { inputDir, outputDir } = options;
      track(`emit-to-output:${source.taskKey}`, () =>
        engine.diagnostics(emitEntryToOutput, context, source, inputDir, outputDir),
      );
      const completion = await engine.run(emitEntryToOutput, context, source, inputDir, outputDir);
      logger.info(`emitted ${entry} into ${outputDir.path}`);
      return completion;
    },

    async printMostReferenced(entry, write = (line) => console.log(line)) {
      const source = at(entry);
      const entries = await engine.run(mostReferencedFromEntry, context, source);
      for (const line of formatTopReferences(entries)) write(line);
    },

    invalidate(path) {
      const count = invalidatePath(engine, at(path));
      debug.tasks("invalidate.path", { path, stale: count });
      return count;
    },

    diagnostics() {
      const seen = new Set<string>();
      const out: Diagnostic[] = [];
      for (const collect of roots.values()) {
        for (const diagnostic of collect()) {
          const key = diagnosticKey(diagnostic);
          if (seen.has(key)) continue;
          seen.add(key);
          out.push(diagnostic);
        }
      }
      for (const diagnostic of out) debug.diagnostics("collected", { diagnostic: formatDiagnostic(diagnostic) });
      return out;
    },
  };
}
