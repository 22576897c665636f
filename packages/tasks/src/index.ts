// Memoizing task substrate
//
// Every graph operation runs as a task: memoized by (task id, args), tracked
// for invalidation, optionally tolerant of re-entrant calls.

export { TaskEngine, TaskContext, taskKey, type Freshness, type TaskEngineStats } from "./engine.js";
export { defineTask, type Task, type TaskFn, type TaskOptions } from "./task.js";
export { COMPLETED, allCompleted, type Completion } from "./completion.js";
export { TaskCycleError, TaskErrorCode, type TaskErrorCodeType } from "./errors.js";
