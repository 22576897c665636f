import type { Keyed } from "@graphpack/shared";
import type { TaskContext } from "@graphpack/tasks";

import type { Asset } from "./asset.js";
import type { Environment } from "./environment.js";

/**
 * Hooks that move an asset into another environment, such as server code
 * importing a client component. Hooks run in order: source, environment,
 * then the finished module.
 */
export interface Transition extends Keyed {
  readonly name: string;
  processSource(ctx: TaskContext, asset: Asset): Promise<Asset>;
  processEnvironment(environment: Environment): Environment;
  processModule(ctx: TaskContext, asset: Asset): Promise<Asset>;
}

/** Named transitions available to a context and everything derived from it. */
export class TransitionTable implements Keyed {
  readonly #transitions: ReadonlyMap<string, Transition>;
  readonly taskKey: string;

  constructor(transitions: Iterable<Transition> = []) {
    const map = new Map<string, Transition>();
    for (const transition of transitions) {
      if (map.has(transition.name)) {
        throw new Error(`Duplicate transition "${transition.name}"`);
      }
      map.set(transition.name, transition);
    }
    this.#transitions = map;
    this.taskKey = `transitions(${Array.from(map.values(), (t) => t.taskKey).sort().join(",")})`;
  }

  get(name: string): Transition | undefined {
    return this.#transitions.get(name);
  }

  names(): string[] {
    return Array.from(this.#transitions.keys()).sort();
  }

  get size(): number {
    return this.#transitions.size;
  }
}
