import type { Asset, Environment, Transition } from "@graphpack/core";
import type { TaskContext } from "@graphpack/tasks";

export interface TransitionOptions {
  name: string;
  /** Replacement environment, or a function deriving it from the current one. */
  environment?: Environment | ((environment: Environment) => Environment);
  processSource?: (ctx: TaskContext, asset: Asset) => Promise<Asset>;
  processModule?: (ctx: TaskContext, asset: Asset) => Promise<Asset>;
}

let transitionCount = 0;

/**
 * Build a transition from optional hooks; a missing hook leaves its input
 * unchanged. Every call makes a distinct transition, even under a name
 * already in use.
 */
export function createTransition(options: TransitionOptions): Transition {
  const { name, environment, processSource, processModule } = options;
  const id = ++transitionCount;
  return {
    name,
    taskKey: `transition(${name}#${id})`,
    processSource: (ctx, asset) => (processSource ? processSource(ctx, asset) : Promise.resolve(asset)),
    processEnvironment: (current) => {
      if (environment === undefined) return current;
      return typeof environment === "function" ? environment(current) : environment;
    },
    processModule: (ctx, asset) => (processModule ? processModule(ctx, asset) : Promise.resolve(asset)),
  };
}
