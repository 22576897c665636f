/**
 * Bundler defaults and normalization
 *
 * This file contains:
 * 1. Default values for every option
 * 2. Normalization (user options -> resolved options)
 * 3. Loading and validating `graphpack.config.json`
 */

import {
  DiskFileSystem,
  Environment,
  FileSystemPath,
  TransitionTable,
  type EnvironmentOptions,
  type ExecutionTarget,
  type FileSystem,
  type ModuleSystem,
  type Transition,
} from "@graphpack/core";
import { isEcmascriptTransform, type EcmascriptTransform } from "@graphpack/modules";
import {
  createConsoleLogger,
  DEBUG_CHANNELS,
  DEBUG_ENV,
  type DebugChannelName,
  type Logger,
} from "@graphpack/shared";

import { ConfigErrorCode, ConfigurationError } from "./errors.js";
import {
  createModuleOptionsContext,
  isModuleTypeName,
  MODULE_TYPE_EFFECT,
  ECMASCRIPT_TRANSFORMS_EFFECT,
  type ModuleOptionsContext,
  type ModuleRule,
  type ModuleRuleCondition,
  type ModuleRuleEffect,
  type ModuleType,
  type ModuleTypeName,
} from "./module-options/index.js";

// ============================================================================
// Option types
// ============================================================================

/** A rule as written in a config file. */
export interface ConfigRule {
  /** Condition; `path-in-exact-directory` takes a root-relative directory string. */
  test: ConfigCondition;
  type: ModuleTypeName;
  transforms?: EcmascriptTransform[];
}

export type ConfigCondition =
  | { type: "all" | "any"; conditions: ConfigCondition[] }
  | { type: "not"; condition: ConfigCondition }
  | { type: "path-ends-with"; suffix: string }
  | { type: "path-has-extension"; extension: string }
  | { type: "path-in-directory"; name: string }
  | { type: "path-in-exact-directory"; directory: string }
  | { type: "path-matches"; source: string; flags?: string };

/** The part of the options a config file may set. */
export interface BundlerConfig {
  inputDir?: string;
  outputDir?: string;
  environment?: EnvironmentOptions;
  moduleOptions?: {
    enableJsx?: boolean;
    enableTypes?: boolean;
    rules?: ConfigRule[];
  };
  debug?: boolean | DebugChannelName[];
}

export interface BundlerOptions extends Omit<BundlerConfig, "moduleOptions"> {
  /** Project directory on disk; ignored when `fileSystem` is given. */
  root?: string;
  fileSystem?: FileSystem;
  moduleOptions?: {
    enableJsx?: boolean;
    enableTypes?: boolean;
    /** Ready-made rules, appended after the config file's. */
    rules?: readonly ModuleRule[];
    configRules?: ConfigRule[];
  };
  transitions?: readonly Transition[];
  logger?: Logger;
}

export interface ResolvedBundlerOptions {
  fileSystem: FileSystem;
  inputDir: FileSystemPath;
  outputDir: FileSystemPath;
  environment: Environment;
  moduleOptionsContext: ModuleOptionsContext;
  transitions: TransitionTable;
  logger: Logger;
  debugChannels: DebugChannelName[];
}

// ============================================================================
// Default Values
// ============================================================================

export const CONFIG_FILE_NAME = "graphpack.config.json";
export const DEFAULT_OUTPUT_DIR = "dist";
export const DEFAULT_ENVIRONMENT: Required<EnvironmentOptions> = {
  target: "node",
  moduleSystem: "esm",
  typescript: false,
  conditions: [],
};

// ============================================================================
// Normalization
// ============================================================================

/**
 * Debug channels to enable. `GRAPHPACK_DEBUG` wins over the options.
 */
export function normalizeDebugChannels(options: boolean | DebugChannelName[] | undefined): DebugChannelName[] {
  const envChannels = process.env[DEBUG_ENV];
  if (envChannels) {
    if (envChannels.trim() === "*") return [...DEBUG_CHANNELS];
    return envChannels.split(",").map((c) => c.trim()).filter(isDebugChannelName);
  }
  if (options === undefined || options === false) return [];
  if (options === true) return [...DEBUG_CHANNELS];
  return options;
}

function isDebugChannelName(value: string): value is DebugChannelName {
  return DEBUG_CHANNELS.some((channel) => channel === value);
}

export function normalizeOptions(options: BundlerOptions = {}): ResolvedBundlerOptions {
  const fileSystem = options.fileSystem ?? new DiskFileSystem("project", options.root ?? ".");
  const inputDir = FileSystemPath.of(fileSystem, options.inputDir ?? "");
  const outputDir = FileSystemPath.of(fileSystem, options.outputDir ?? DEFAULT_OUTPUT_DIR);
  if (outputDir.equals(inputDir) || inputDir.isInside(outputDir)) {
    throw new ConfigurationError(
      `Output directory "${outputDir.path}" must not contain the input directory`,
      ConfigErrorCode.INVALID_OPTIONS,
    );
  }

  const moduleOptions = options.moduleOptions ?? {};
  const rules = [
    ...(moduleOptions.configRules ?? []).map((rule) => configRuleToModuleRule(rule, fileSystem)),
    ...(moduleOptions.rules ?? []),
  ];

  return {
    fileSystem,
    inputDir,
    outputDir,
    environment: Environment.create({ ...DEFAULT_ENVIRONMENT, ...options.environment }),
    moduleOptionsContext: createModuleOptionsContext({
      enableJsx: moduleOptions.enableJsx,
      enableTypes: moduleOptions.enableTypes,
      rules,
    }),
    transitions: new TransitionTable(options.transitions ?? []),
    logger: options.logger ?? createConsoleLogger(),
    debugChannels: normalizeDebugChannels(options.debug),
  };
}

/** Config file values under explicit options; explicit values win. */
export function mergeConfig(config: BundlerConfig | null, options: BundlerOptions): BundlerOptions {
  if (!config) return options;
  return {
    ...options,
    inputDir: options.inputDir ?? config.inputDir,
    outputDir: options.outputDir ?? config.outputDir,
    environment: { ...config.environment, ...options.environment },
    moduleOptions: {
      enableJsx: options.moduleOptions?.enableJsx ?? config.moduleOptions?.enableJsx,
      enableTypes: options.moduleOptions?.enableTypes ?? config.moduleOptions?.enableTypes,
      configRules: [...(config.moduleOptions?.rules ?? []), ...(options.moduleOptions?.configRules ?? [])],
      rules: options.moduleOptions?.rules,
    },
    debug: options.debug ?? config.debug,
  };
}

export function configRuleToModuleRule(rule: ConfigRule, fileSystem: FileSystem): ModuleRule {
  const effects: Record<string, ModuleRuleEffect> = {
    [MODULE_TYPE_EFFECT]: { type: "module-type", moduleType: configModuleType(rule) },
  };
  if (rule.transforms && rule.transforms.length > 0) {
    effects[ECMASCRIPT_TRANSFORMS_EFFECT] = { type: "ecmascript-transforms", transforms: rule.transforms };
  }
  return { condition: configCondition(rule.test, fileSystem), effects };
}

function configModuleType(rule: ConfigRule): ModuleType {
  switch (rule.type) {
    case "ecmascript":
    case "typescript":
    case "typescript-declaration":
      return { type: rule.type, transforms: [] };
    case "custom":
      return { type: "custom", name: "config" };
    default:
      return { type: rule.type };
  }
}

function configCondition(condition: ConfigCondition, fileSystem: FileSystem): ModuleRuleCondition {
  switch (condition.type) {
    case "all":
    case "any":
      return { type: condition.type, conditions: condition.conditions.map((c) => configCondition(c, fileSystem)) };
    case "not":
      return { type: "not", condition: configCondition(condition.condition, fileSystem) };
    case "path-in-exact-directory":
      return { type: "path-in-exact-directory", directory: FileSystemPath.of(fileSystem, condition.directory) };
    default:
      return condition;
  }
}

// ============================================================================
// Config file
// ============================================================================

/**
 * Read `graphpack.config.json` from `dir` on `fileSystem`.
 *
 * @returns The validated config, or null when there is no config file
 */
export async function loadConfigFile(fileSystem: FileSystem, dir = ""): Promise<BundlerConfig | null> {
  const path = FileSystemPath.of(fileSystem, dir).join(CONFIG_FILE_NAME);
  if (!path) return null;
  const content = await fileSystem.read(path.path);
  if (content.type === "not-found") return null;

  let parsed: unknown;
  try {
    parsed = JSON.parse(content.text);
  } catch (error) {
    throw invalid(path.path, `not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
  return parseConfig(parsed, path.path);
}

/** Validate an untrusted config value. */
export function parseConfig(value: unknown, source = CONFIG_FILE_NAME): BundlerConfig {
  if (!isRecord(value)) throw invalid(source, "expected an object");
  const config: BundlerConfig = {};

  const inputDir = value["inputDir"];
  if (inputDir !== undefined) config.inputDir = expectString(inputDir, "inputDir", source);
  const outputDir = value["outputDir"];
  if (outputDir !== undefined) config.outputDir = expectString(outputDir, "outputDir", source);

  const environment = value["environment"];
  if (environment !== undefined) config.environment = parseEnvironment(environment, source);

  const moduleOptions = value["moduleOptions"];
  if (moduleOptions !== undefined) {
    if (!isRecord(moduleOptions)) throw invalid(source, `"moduleOptions" must be an object`);
    const rules = moduleOptions["rules"];
    config.moduleOptions = {
      enableJsx: optionalBoolean(moduleOptions["enableJsx"], "moduleOptions.enableJsx", source),
      enableTypes: optionalBoolean(moduleOptions["enableTypes"], "moduleOptions.enableTypes", source),
      rules: rules === undefined ? undefined : expectArray(rules, "moduleOptions.rules", source).map((r, i) =>
        parseRule(r, `moduleOptions.rules[${i}]`, source),
      ),
    };
  }

  const debugOption = value["debug"];
  if (typeof debugOption === "boolean") {
    config.debug = debugOption;
  } else if (debugOption !== undefined) {
    config.debug = expectArray(debugOption, "debug", source).map((channel) => {
      if (typeof channel !== "string" || !isDebugChannelName(channel)) {
        throw invalid(source, `unknown debug channel ${JSON.stringify(channel)}`);
      }
      return channel;
    });
  }
  return config;
}

const TARGETS: readonly ExecutionTarget[] = ["node", "browser", "edge"];
const MODULE_SYSTEMS: readonly ModuleSystem[] = ["esm", "commonjs"];

function parseEnvironment(value: unknown, source: string): EnvironmentOptions {
  if (!isRecord(value)) throw invalid(source, `"environment" must be an object`);
  const options: EnvironmentOptions = {};
  const target = value["target"];
  if (target !== undefined) {
    const match = TARGETS.find((t) => t === target);
    if (!match) throw invalid(source, `"environment.target" must be one of ${TARGETS.join(", ")}`);
    options.target = match;
  }
  const moduleSystem = value["moduleSystem"];
  if (moduleSystem !== undefined) {
    const match = MODULE_SYSTEMS.find((m) => m === moduleSystem);
    if (!match) throw invalid(source, `"environment.moduleSystem" must be one of ${MODULE_SYSTEMS.join(", ")}`);
    options.moduleSystem = match;
  }
  options.typescript = optionalBoolean(value["typescript"], "environment.typescript", source);
  const conditions = value["conditions"];
  if (conditions !== undefined) {
    options.conditions = expectArray(conditions, "environment.conditions", source).map((c) =>
      expectString(c, "environment.conditions[]", source),
    );
  }
  return options;
}

function parseRule(value: unknown, at: string, source: string): ConfigRule {
  if (!isRecord(value)) throw invalid(source, `"${at}" must be an object`);
  const type = value["type"];
  if (!isModuleTypeName(type)) throw invalid(source, `"${at}.type" is not a module type`);
  const rule: ConfigRule = { test: parseCondition(value["test"], `${at}.test`, source), type };
  const transforms = value["transforms"];
  if (transforms !== undefined) {
    rule.transforms = expectArray(transforms, `${at}.transforms`, source).map((t) => {
      if (!isEcmascriptTransform(t)) throw invalid(source, `"${at}.transforms" has unknown transform ${JSON.stringify(t)}`);
      return t;
    });
  }
  return rule;
}

function parseCondition(value: unknown, at: string, source: string): ConfigCondition {
  if (!isRecord(value)) throw invalid(source, `"${at}" must be an object`);
  const nested = () =>
    expectArray(value["conditions"], `${at}.conditions`, source).map((c, i) =>
      parseCondition(c, `${at}.conditions[${i}]`, source),
    );
  switch (value["type"]) {
    case "all":
      return { type: "all", conditions: nested() };
    case "any":
      return { type: "any", conditions: nested() };
    case "not":
      return { type: "not", condition: parseCondition(value["condition"], `${at}.condition`, source) };
    case "path-ends-with":
      return { type: "path-ends-with", suffix: expectString(value["suffix"], `${at}.suffix`, source) };
    case "path-has-extension":
      return { type: "path-has-extension", extension: expectString(value["extension"], `${at}.extension`, source) };
    case "path-in-directory":
      return { type: "path-in-directory", name: expectString(value["name"], `${at}.name`, source) };
    case "path-in-exact-directory":
      return { type: "path-in-exact-directory", directory: expectString(value["directory"], `${at}.directory`, source) };
    case "path-matches": {
      const pattern = expectString(value["source"], `${at}.source`, source);
      const flags = value["flags"] === undefined ? undefined : expectString(value["flags"], `${at}.flags`, source);
      try {
        new RegExp(pattern, flags);
      } catch (error) {
        throw invalid(source, `"${at}" is not a valid pattern: ${error instanceof Error ? error.message : String(error)}`);
      }
      return { type: "path-matches", source: pattern, flags };
    }
    default:
      throw invalid(source, `"${at}.type" is not a condition type`);
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function expectString(value: unknown, at: string, source: string): string {
  if (typeof value !== "string") throw invalid(source, `"${at}" must be a string`);
  return value;
}

function expectArray(value: unknown, at: string, source: string): unknown[] {
  if (!Array.isArray(value)) throw invalid(source, `"${at}" must be an array`);
  return value;
}

function optionalBoolean(value: unknown, at: string, source: string): boolean | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== "boolean") throw invalid(source, `"${at}" must be a boolean`);
  return value;
}

function invalid(source: string, message: string): ConfigurationError {
  return new ConfigurationError(`${source}: ${message}`, ConfigErrorCode.INVALID_OPTIONS, source);
}
