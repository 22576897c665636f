import { debug, diagnosticKey, formatDiagnostic, stableSerialize, type Diagnostic } from "@graphpack/shared";

import { TaskCycleError } from "./errors.js";
import type { Task } from "./task.js";

/*
 * Memoizing task engine.
 *
 * Every call is keyed by `(task id, serialized args)`. While a task runs, the
 * calls it makes through its TaskContext are recorded as dependency edges, so
 * invalidating one entry eagerly marks everything that read it stale. Stale
 * entries recompute lazily on their next call; fresh entries return the cached
 * promise. Concurrent calls with the same key share one in-flight promise.
 *
 * A caller that finds its key in flight waits for it, unless that call is
 * already waiting on the caller (its own ancestor, or a sibling branch that
 * reached it first). Such a cycle resolves to the task's fallback, or fails
 * with TaskCycleError when the task has none.
 */

export type Freshness = "pending" | "fresh" | "stale";

interface TaskEntry {
  readonly key: string;
  readonly taskId: string;
  freshness: Freshness;
  promise: Promise<unknown> | null;
  /** Keys this entry called during its last computation. */
  readonly dependencies: Set<string>;
  /** Keys of entries that called this one. */
  readonly dependents: Set<string>;
  /** In-flight calls this entry is waiting on. */
  readonly awaiting: Set<string>;
  diagnostics: Diagnostic[];
  generation: number;
}

type CallFn = <TArgs extends readonly unknown[], TResult>(
  task: Task<TArgs, TResult>,
  args: TArgs,
) => Promise<TResult>;

/**
 * Capability handed to a running task: call other tasks (recording the edge)
 * and report diagnostics against the current call.
 */
export class TaskContext {
  #call: CallFn;
  #report: (diagnostic: Diagnostic) => void;
  #key: string;

  constructor(key: string, call: CallFn, report: (diagnostic: Diagnostic) => void) {
    this.#key = key;
    this.#call = call;
    this.#report = report;
  }

  get taskKey(): string {
    return this.#key;
  }

  call<TArgs extends readonly unknown[], TResult>(task: Task<TArgs, TResult>, ...args: TArgs): Promise<TResult> {
    return this.#call(task, args);
  }

  report(diagnostic: Diagnostic): void {
    this.#report(diagnostic);
  }
}

export interface TaskEngineStats {
  entries: number;
  computed: number;
  memoHits: number;
  invalidated: number;
  pruned: number;
}

export class TaskEngine {
  #entries = new Map<string, TaskEntry>();
  #stats: TaskEngineStats = { entries: 0, computed: 0, memoHits: 0, invalidated: 0, pruned: 0 };

  /** Call a task from outside any task. */
  run<TArgs extends readonly unknown[], TResult>(task: Task<TArgs, TResult>, ...args: TArgs): Promise<TResult> {
    return this.#invoke(null, [], task, args);
  }

  /** Current state of a call, or undefined when it was never made. */
  freshness<TArgs extends readonly unknown[], TResult>(
    task: Task<TArgs, TResult>,
    ...args: TArgs
  ): Freshness | undefined {
    return this.#entries.get(taskKey(task, args))?.freshness;
  }

  /** Mark one call stale, along with every call that depended on it. */
  invalidate<TArgs extends readonly unknown[], TResult>(task: Task<TArgs, TResult>, ...args: TArgs): number {
    return this.#markStale([taskKey(task, args)]);
  }

  /** Mark every matching call stale, along with its dependents. */
  invalidateWhere(predicate: (taskId: string, key: string) => boolean): number {
    const roots: string[] = [];
    for (const entry of this.#entries.values()) {
      if (predicate(entry.taskId, entry.key)) roots.push(entry.key);
    }
    return this.#markStale(roots);
  }

  /**
   * Diagnostics reported by a call and by everything it transitively called,
   * without duplicates, in discovery order.
   */
  diagnostics<TArgs extends readonly unknown[], TResult>(task: Task<TArgs, TResult>, ...args: TArgs): Diagnostic[] {
    const out: Diagnostic[] = [];
    const seenDiagnostics = new Set<string>();
    const visited = new Set<string>();
    const queue = [taskKey(task, args)];
    while (queue.length > 0) {
      const key = queue.shift();
      if (key === undefined || visited.has(key)) continue;
      visited.add(key);
      const entry = this.#entries.get(key);
      if (!entry) continue;
      for (const diag of entry.diagnostics) {
        const id = diagnosticKey(diag);
        if (seenDiagnostics.has(id)) continue;
        seenDiagnostics.add(id);
        out.push(diag);
      }
      queue.push(...entry.dependencies);
    }
    return out;
  }

  stats(): TaskEngineStats {
    return { ...this.#stats, entries: this.#entries.size };
  }

  clear(): void {
    this.#entries.clear();
  }

  #invoke<TArgs extends readonly unknown[], TResult>(
    parent: TaskEntry | null,
    stack: readonly string[],
    task: Task<TArgs, TResult>,
    args: TArgs,
  ): Promise<TResult> {
    const key = taskKey(task, args);
    let entry = this.#entries.get(key);
    if (!entry) {
      entry = {
        key,
        taskId: task.id,
        freshness: "stale",
        promise: null,
        dependencies: new Set(),
        dependents: new Set(),
        awaiting: new Set(),
        diagnostics: [],
        generation: 0,
      };
      this.#entries.set(key, entry);
    }

    if (parent) {
      parent.dependencies.add(key);
      entry.dependents.add(parent.key);
    }

    if (entry.freshness === "fresh" && entry.promise) {
      this.#stats.memoHits++;
      debug.tasks("memo.hit", { key });
      return entry.promise as Promise<TResult>;
    }

    if (entry.freshness === "pending" && entry.promise) {
      const chain = parent ? this.#cycleThrough(key, parent.key, stack) : null;
      if (chain) {
        if (task.cycleFallback) {
          debug.tasks("cycle.shortCircuit", { key });
          return Promise.resolve(task.cycleFallback());
        }
        return Promise.reject(new TaskCycleError(chain));
      }
      const pending = entry.promise as Promise<TResult>;
      if (parent) this.#wait(parent, key, pending);
      return pending;
    }

    const promise = this.#compute(entry, stack, task, args);
    if (parent) this.#wait(parent, key, promise);
    return promise;
  }

  /**
   * The cycle closed by `caller` waiting on the in-flight `key`, as
   * `[key, ..., caller, key]`, or null when `key` does not wait on `caller`.
   */
  #cycleThrough(key: string, caller: string, stack: readonly string[]): string[] | null {
    if (stack.includes(key)) return [...stack.slice(stack.indexOf(key)), key];

    const previous = new Map<string, string>();
    const queue = [key];
    while (queue.length > 0) {
      const current = queue.shift();
      if (current === undefined) break;
      if (current === caller) {
        const chain = [current];
        for (let step = previous.get(current); step !== undefined; step = previous.get(step)) chain.unshift(step);
        return [...chain, key];
      }
      const entry = this.#entries.get(current);
      if (!entry || entry.freshness !== "pending") continue;
      for (const next of entry.awaiting) {
        if (next === key || previous.has(next)) continue;
        previous.set(next, current);
        queue.push(next);
      }
    }
    return null;
  }

  #wait(parent: TaskEntry, key: string, promise: Promise<unknown>): void {
    parent.awaiting.add(key);
    const release = (): void => {
      parent.awaiting.delete(key);
    };
    void promise.then(release, release);
  }

  #compute<TArgs extends readonly unknown[], TResult>(
    entry: TaskEntry,
    stack: readonly string[],
    task: Task<TArgs, TResult>,
    args: TArgs,
  ): Promise<TResult> {
    entry.freshness = "pending";
    this.#clearDependencies(entry);
    entry.diagnostics = [];
    entry.generation++;
    const generation = entry.generation;
    const childStack = [...stack, entry.key];

    const ctx = new TaskContext(
      entry.key,
      (child, childArgs) => this.#invoke(entry, childStack, child, childArgs),
      (diagnostic) => {
        entry.diagnostics.push(diagnostic);
        debug.diagnostics("report", { task: entry.key, diagnostic: formatDiagnostic(diagnostic) });
      },
    );

    this.#stats.computed++;
    debug.tasks("compute", { key: entry.key });

    // Deferred so the entry holds its promise before the task body runs.
    const promise = Promise.resolve().then(() => task.run(ctx, ...args));
    entry.promise = promise;

    void promise.then(
      () => {
        if (entry.generation === generation && entry.freshness === "pending") {
          entry.freshness = "fresh";
        }
      },
      (error: unknown) => {
        if (entry.generation !== generation) return;
        debug.tasks("failed", { key: entry.key, error: error instanceof Error ? error.message : String(error) });
        // Failures are not cached; the next call recomputes.
        entry.freshness = "stale";
        entry.promise = null;
      },
    );

    return promise;
  }

  #clearDependencies(entry: TaskEntry): void {
    const dropped = [...entry.dependencies];
    for (const dep of dropped) {
      this.#entries.get(dep)?.dependents.delete(entry.key);
    }
    entry.dependencies.clear();
    this.#prune(dropped);
  }

  /**
   * Forget stale entries nothing depends on any more, such as the calls of a
   * superseded graph node, and then their own unreferenced dependencies.
   */
  #prune(keys: readonly string[]): void {
    const queue = [...keys];
    while (queue.length > 0) {
      const key = queue.pop();
      if (key === undefined) continue;
      const entry = this.#entries.get(key);
      if (!entry || entry.freshness !== "stale" || entry.dependents.size > 0) continue;
      this.#entries.delete(key);
      this.#stats.pruned++;
      for (const dep of entry.dependencies) {
        this.#entries.get(dep)?.dependents.delete(key);
        queue.push(dep);
      }
    }
  }

  #markStale(roots: readonly string[]): number {
    let count = 0;
    const stack = [...roots];
    while (stack.length > 0) {
      const key = stack.pop();
      if (key === undefined) continue;
      const entry = this.#entries.get(key);
      if (!entry || entry.freshness === "stale") continue;
      entry.freshness = "stale";
      count++;
      stack.push(...entry.dependents);
    }
    this.#stats.invalidated += count;
    if (count > 0) debug.tasks("invalidate", { roots: roots.length, stale: count });
    return count;
  }
}

export function taskKey<TArgs extends readonly unknown[], TResult>(task: Task<TArgs, TResult>, args: TArgs): string {
  return `${task.id}${stableSerialize(args)}`;
}
