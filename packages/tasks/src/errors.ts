export const TaskErrorCode = {
  CYCLE: "TASK_CYCLE",
} as const;

export type TaskErrorCodeType = (typeof TaskErrorCode)[keyof typeof TaskErrorCode];

/**
 * A task awaited its own in-flight result. Only tasks defined with a `cycle`
 * fallback may re-enter themselves.
 */
export class TaskCycleError extends Error {
  readonly code: TaskErrorCodeType = TaskErrorCode.CYCLE;

  constructor(public readonly chain: readonly string[]) {
    super(`Task cycle detected: ${chain.join(" -> ")}`);
    this.name = "TaskCycleError";
  }
}
