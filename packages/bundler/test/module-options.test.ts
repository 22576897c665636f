import { describe, test, expect } from "vitest";
import { FileSystemPath, MemoryFileSystem } from "@graphpack/core";
import { TaskEngine } from "@graphpack/tasks";

import { ConfigErrorCode, ConfigurationError } from "../src/errors.js";
import { moduleTypeFromEffects, resolveModuleRuleEffects } from "../src/module-options/effects.js";
import { moduleOptions } from "../src/module-options/module-options.js";
import { ecmascript, RAW, typescript, type ModuleType } from "../src/module-options/module-type.js";
import { createModuleOptionsContext, type ModuleOptionsContext } from "../src/module-options/options-context.js";
import {
  all,
  ECMASCRIPT_TRANSFORMS_EFFECT,
  matchesCondition,
  MODULE_TYPE_EFFECT,
  moduleTypeRule,
  not,
  pathEndsWith,
  pathHasExtension,
  pathInDirectory,
  type ModuleRuleEffect,
} from "../src/module-options/rule.js";

const fs = new MemoryFileSystem("mem");
const at = (path: string) => FileSystemPath.of(fs, path);

describe("matchesCondition", () => {
  test("directory conditions look at ancestors only", () => {
    expect(matchesCondition(pathInDirectory("node_modules"), at("node_modules/react/index.js"))).toBe(true);
    expect(matchesCondition(pathInDirectory("node_modules"), at("src/node_modules"))).toBe(false);
    expect(matchesCondition({ type: "path-in-exact-directory", directory: at("src") }, at("src/a/b.js"))).toBe(true);
    expect(matchesCondition({ type: "path-in-exact-directory", directory: at("src") }, at("srcx/b.js"))).toBe(false);
  });

  test("combinators and patterns", () => {
    const sourceJs = all(pathHasExtension(".js"), not(pathInDirectory("node_modules")));
    expect(matchesCondition(sourceJs, at("src/a.js"))).toBe(true);
    expect(matchesCondition(sourceJs, at("node_modules/x/a.js"))).toBe(false);
    expect(matchesCondition({ type: "path-matches", source: "\\.worker\\.js$" }, at("src/a.worker.js"))).toBe(true);
    expect(matchesCondition(pathEndsWith(".d.ts"), at("types/a.d.ts"))).toBe(true);
  });
});

describe("resolveModuleRuleEffects", () => {
  test("later rules replace earlier effects under the same key", () => {
    const rules = [
      moduleTypeRule(pathHasExtension(".js"), ecmascript()),
      moduleTypeRule(pathEndsWith(".worker.js"), RAW),
      moduleTypeRule(pathHasExtension(".css"), { type: "css" }),
    ];
    expect(moduleTypeFromEffects(resolveModuleRuleEffects(rules, at("src/a.js")))).toEqual(ecmascript());
    expect(moduleTypeFromEffects(resolveModuleRuleEffects(rules, at("src/a.worker.js")))).toEqual(RAW);
  });
});

describe("moduleTypeFromEffects", () => {
  test("no module type effect means raw", () => {
    expect(moduleTypeFromEffects(new Map())).toEqual({ type: "raw" });
  });

  test("a module type key holding another effect is a configuration error", () => {
    const effects = new Map<string, ModuleRuleEffect>([
      [MODULE_TYPE_EFFECT, { type: "ecmascript-transforms", transforms: ["react"] }],
    ]);
    let caught: unknown;
    try {
      moduleTypeFromEffects(effects, at("src/a.js"));
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(ConfigurationError);
    expect(caught).toMatchObject({ code: ConfigErrorCode.INVALID_MODULE_TYPE_EFFECT, path: "src/a.js" });
  });

  test("extra transforms are appended once to ECMAScript types", () => {
    const extra: ModuleRuleEffect = { type: "ecmascript-transforms", transforms: ["react", "commonjs"] };
    const withExtra = (moduleType: ModuleType) =>
      moduleTypeFromEffects(
        new Map<string, ModuleRuleEffect>([
          [MODULE_TYPE_EFFECT, { type: "module-type", moduleType }],
          [ECMASCRIPT_TRANSFORMS_EFFECT, extra],
        ]),
      );

    expect(withExtra(typescript("react"))).toEqual({ type: "typescript", transforms: ["react", "commonjs"] });
    expect(withExtra({ type: "css" })).toEqual({ type: "css" });
  });
});

describe("moduleOptions", () => {
  async function classify(path: string, options: ModuleOptionsContext): Promise<ModuleType> {
    const file = at(path);
    const { rules } = await new TaskEngine().run(moduleOptions, file.parent(), options);
    return moduleTypeFromEffects(resolveModuleRuleEffects(rules, file), file);
  }

  const options = createModuleOptionsContext({
    enableJsx: true,
    enableTypes: true,
    rules: [moduleTypeRule(pathInDirectory("legacy"), ecmascript("commonjs"))],
  });

  test("default rules by extension", async () => {
    expect(await classify("src/a.js", options)).toEqual(ecmascript("react"));
    expect(await classify("node_modules/x/a.js", options)).toEqual(ecmascript());
    expect(await classify("src/a.jsx", options)).toEqual(ecmascript("react"));
    expect(await classify("src/a.mts", options)).toEqual(typescript());
    expect(await classify("src/a.tsx", options)).toEqual(typescript("react"));
    expect(await classify("src/a.d.ts", options)).toEqual({ type: "typescript-declaration", transforms: [] });
    expect(await classify("src/a.json", options)).toEqual({ type: "json" });
    expect(await classify("src/a.css", options)).toEqual({ type: "css" });
    expect(await classify("src/logo.svg", options)).toEqual({ type: "static" });
    expect(await classify("src/README.md", options)).toEqual(RAW);
  });

  test("declarations are raw files unless types are enabled", async () => {
    expect(await classify("src/a.d.ts", createModuleOptionsContext())).toEqual(RAW);
    expect(await classify("src/a.js", createModuleOptionsContext())).toEqual(ecmascript());
  });

  test("custom rules come after the defaults", async () => {
    expect(await classify("src/legacy/a.js", options)).toEqual(ecmascript("commonjs"));
  });
});
