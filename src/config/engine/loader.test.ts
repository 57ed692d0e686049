/**
 * Engine and process configuration tests.
 *
 * Run: node --import tsx src/config/engine/loader.test.ts
 */

import { strict as assert } from "node:assert";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { fileURLToPath } from "node:url";

import { ConfigError, loadConfig, validateConfig } from "../index.js";
import {
  EngineConfigError,
  loadEngineConfig,
  loadEngineConfigFile,
  validateEngineConfig,
  type EngineConfigInput,
} from "./index.js";

// ═══════════════════════════════════════════════════════════════════════════
// TEST HELPERS
// ═══════════════════════════════════════════════════════════════════════════

let passed = 0;
let failed = 0;

function test(name: string, fn: () => void): void {
  try {
    fn();
    passed++;
    console.log(`  ✓ ${name}`);
  } catch (err) {
    failed++;
    console.error(`  ✗ ${name}`);
    console.error(`    ${err instanceof Error ? err.message : String(err)}`);
  }
}

function section(title: string): void {
  console.log(`\n── ${title} ──`);
}

const EXAMPLE_CONFIG = fileURLToPath(new URL("../../../config/engine.json", import.meta.url));

function minimalConfig(): EngineConfigInput {
  return {
    version: "1.0.0",
    dataTypes: [
      {
        name: "Plan",
        columns: ["Task"],
        rowKey: "Task",
        filenamePattern: "{logicalId} {timestamp}.json",
      },
    ],
    hubs: [{ name: "P1", hosts: ["Plan"] }],
  };
}

function withEnv(vars: Record<string, string | undefined>, fn: () => void): void {
  const saved = Object.fromEntries(Object.keys(vars).map((key) => [key, process.env[key]]));
  const apply = (values: Record<string, string | undefined>) => {
    for (const [key, value] of Object.entries(values)) {
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
  };
  apply(vars);
  try {
    fn();
  } finally {
    apply(saved);
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// ENGINE CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════

section("Engine configuration");

test("defaults are applied", () => {
  const config = loadEngineConfig(minimalConfig());
  assert.deepEqual(config.options, {
    overwrite: false,
    annotationPolicy: "non-blank",
    timestampFormat: "tick",
    maxConcurrency: 4,
  });
  assert.deepEqual(config.steps, []);
  assert.deepEqual(config.hubs[0], { name: "P1", parent: null, hosts: ["Plan"] });
  assert.deepEqual(config.dataTypes[0]?.columns, [{ name: "Task", type: "string", nullable: true }]);
});

test("loaded configuration is deeply frozen", () => {
  const config = loadEngineConfig(minimalConfig());
  assert.ok(Object.isFrozen(config));
  assert.ok(Object.isFrozen(config.dataTypes[0]?.columns));
});

test("input bindings default to offset 0", () => {
  const config = loadEngineConfig({
    ...minimalConfig(),
    steps: [
      {
        id: "copy",
        logic: "copy",
        inputs: { source: { object: { dataType: "Plan", logicalId: "A" }, hub: "P1" } },
        output: { object: { dataType: "Plan", logicalId: "B" }, hub: "P1" },
      },
    ],
  });
  assert.deepEqual(config.steps[0]?.inputs.source, {
    object: { dataType: "Plan", logicalId: "A" },
    hub: "P1",
    offset: 0,
  });
});

test("absolute bindings accept YYMMDD dates", () => {
  const config = loadEngineConfig({
    ...minimalConfig(),
    steps: [
      {
        id: "copy",
        logic: "copy",
        inputs: { pinned: { object: { dataType: "Plan", logicalId: "A" }, hub: "P1", at: "230531" } },
        output: { object: { dataType: "Plan", logicalId: "B" }, hub: "P1" },
      },
    ],
  });
  assert.deepEqual(config.steps[0]?.inputs.pinned, {
    object: { dataType: "Plan", logicalId: "A" },
    hub: "P1",
    at: 19508,
  });
});

test("a binding with both offset and at is rejected", () => {
  const result = validateEngineConfig({
    ...minimalConfig(),
    steps: [
      {
        id: "copy",
        logic: "copy",
        inputs: { both: { object: { dataType: "Plan", logicalId: "A" }, hub: "P1", offset: -1, at: 3 } },
        output: { object: { dataType: "Plan", logicalId: "B" }, hub: "P1" },
      },
    ],
  });
  assert.equal(result.success, false);
  assert.deepEqual(result.errors?.[0]?.path, ["steps", 0, "inputs", "both"]);
});

test("invalid configuration lists every issue with its path", () => {
  assert.throws(
    () =>
      loadEngineConfig({
        version: "one",
        dataTypes: [{ name: "Plan", columns: [], rowKey: "Task", filenamePattern: "{logicalId}" }],
        hubs: [],
      }),
    (err: unknown) => {
      assert.ok(err instanceof EngineConfigError);
      const paths = err.issues.map((issue) => issue.path.join("."));
      assert.ok(paths.includes("version"));
      assert.ok(paths.includes("dataTypes.0.columns"));
      assert.ok(paths.includes("dataTypes.0.filenamePattern"));
      assert.ok(err.format().startsWith("Engine configuration validation failed:\n  - "));
      return true;
    }
  );
});

test("the example configuration file is valid", () => {
  const config = loadEngineConfigFile(EXAMPLE_CONFIG);
  assert.equal(config.options.timestampFormat, "yymmdd");
  assert.deepEqual(
    config.steps.map((step) => step.id),
    ["route-tasks", "summarize-workload"]
  );
});

test("unreadable and malformed files are reported", () => {
  const dir = mkdtempSync(join(tmpdir(), "engine-config-"));
  try {
    const broken = join(dir, "broken.json");
    writeFileSync(broken, "{ version: ", "utf-8");

    assert.throws(
      () => loadEngineConfigFile(join(dir, "missing.json")),
      (err: unknown) => err instanceof EngineConfigError && err.issues[0]?.code === "io"
    );
    assert.throws(
      () => loadEngineConfigFile(broken),
      (err: unknown) => err instanceof EngineConfigError && err.issues[0]?.code === "json"
    );
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
});

// ═══════════════════════════════════════════════════════════════════════════
// PROCESS CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════

section("Process configuration");

test("environment values are read with defaults", () => {
  withEnv(
    { NODE_ENV: "test", ENGINE_CONFIG: undefined, MAX_CONCURRENCY: "2", FORCED_TODAY: "230531" },
    () => {
      const config = loadConfig();
      assert.equal(config.env, "test");
      assert.equal(config.engineConfigPath, "config/engine.json");
      assert.equal(config.maxConcurrency, 2);
      assert.equal(config.forcedToday, "230531");
      validateConfig(config);
    }
  );
});

test("DEBUG makes debug the default log level", () => {
  withEnv({ DEBUG: "yes", LOG_LEVEL: undefined }, () => {
    const config = loadConfig();
    assert.equal(config.debug, true);
    assert.equal(config.logLevel, "debug");
  });
  withEnv({ DEBUG: "yes", LOG_LEVEL: "warn" }, () => {
    assert.equal(loadConfig().logLevel, "warn");
  });
  withEnv({ DEBUG: undefined, LOG_LEVEL: undefined }, () => {
    assert.equal(loadConfig().logLevel, "info");
  });
});

test("invalid values fail validation", () => {
  withEnv({ NODE_ENV: "test", LOG_LEVEL: "verbose" }, () => {
    assert.throws(() => validateConfig(loadConfig()), ConfigError);
  });
  withEnv({ NODE_ENV: "test", LOG_LEVEL: "info", FORCED_TODAY: "May 31" }, () => {
    assert.throws(() => validateConfig(loadConfig()), ConfigError);
  });
  withEnv({ MAX_CONCURRENCY: "many" }, () => {
    assert.throws(() => loadConfig(), ConfigError);
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// SUMMARY
// ═══════════════════════════════════════════════════════════════════════════

console.log(`\n═══════════════════════════════════════════════`);
console.log(`  Results: ${passed} passed, ${failed} failed`);
console.log(`═══════════════════════════════════════════════\n`);

if (failed > 0) {
  process.exit(1);
}
