import { stableSerialize, type Keyed } from "@graphpack/shared";

export type ExecutionTarget = "node" | "browser" | "edge";
export type ModuleSystem = "esm" | "commonjs";

export interface EnvironmentOptions {
  target?: ExecutionTarget;
  moduleSystem?: ModuleSystem;
  typescript?: boolean;
  /** Extra export conditions, on top of those implied by target and module system. */
  conditions?: readonly string[];
}

/**
 * Where the code runs. Immutable: derivations return a new value and never
 * touch the receiver.
 */
export class Environment implements Keyed {
  readonly target: ExecutionTarget;
  readonly moduleSystem: ModuleSystem;
  readonly typescript: boolean;
  readonly conditions: readonly string[];
  readonly taskKey: string;

  private constructor(target: ExecutionTarget, moduleSystem: ModuleSystem, typescript: boolean, conditions: readonly string[]) {
    this.target = target;
    this.moduleSystem = moduleSystem;
    this.typescript = typescript;
    this.conditions = conditions;
    this.taskKey = `env${stableSerialize({ target, moduleSystem, typescript, conditions })}`;
  }

  static create(options: EnvironmentOptions = {}): Environment {
    return new Environment(
      options.target ?? "node",
      options.moduleSystem ?? "esm",
      options.typescript ?? false,
      [...(options.conditions ?? [])],
    );
  }

  isTypescriptEnabled(): boolean {
    return this.typescript;
  }

  withTypescript(): Environment {
    if (this.typescript) return this;
    return new Environment(this.target, this.moduleSystem, true, this.conditions);
  }

  withTarget(target: ExecutionTarget): Environment {
    return new Environment(target, this.moduleSystem, this.typescript, this.conditions);
  }

  withModuleSystem(moduleSystem: ModuleSystem): Environment {
    return new Environment(this.target, moduleSystem, this.typescript, this.conditions);
  }

  /** Export conditions in priority order. */
  exportConditions(): string[] {
    const conditions = [...this.conditions];
    conditions.push(this.moduleSystem === "esm" ? "import" : "require");
    conditions.push(this.target === "browser" ? "browser" : this.target === "edge" ? "edge-light" : "node");
    conditions.push("default");
    return conditions;
  }

  equals(other: Environment): boolean {
    return this.taskKey === other.taskKey;
  }

  toString(): string {
    return `${this.target}/${this.moduleSystem}${this.typescript ? "+ts" : ""}`;
  }
}
