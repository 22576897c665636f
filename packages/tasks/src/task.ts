import type { TaskContext } from "./engine.js";

export type TaskFn<TArgs extends readonly unknown[], TResult> = (
  ctx: TaskContext,
  ...args: TArgs
) => Promise<TResult>;

/**
 * A pure function registered with the engine. Calls are memoized by
 * `(id, serialized args)`; arguments that implement `Keyed` serialize by key.
 */
export interface Task<TArgs extends readonly unknown[], TResult> {
  readonly id: string;
  readonly run: TaskFn<TArgs, TResult>;
  /**
   * Set on tasks that tolerate self-recursion. A call that would wait on an
   * in-flight call already waiting on the caller resolves to this value.
   */
  readonly cycleFallback: (() => TResult) | null;
}

export interface TaskOptions<TResult> {
  cycle?: {
    fallback: () => TResult;
  };
}

export function defineTask<TArgs extends readonly unknown[], TResult>(
  id: string,
  run: TaskFn<TArgs, TResult>,
  options: TaskOptions<TResult> = {},
): Task<TArgs, TResult> {
  return {
    id,
    run,
    cycleFallback: options.cycle?.fallback ?? null,
  };
}
