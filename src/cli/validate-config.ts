#!/usr/bin/env node
/**
 * CLI command to validate an engine configuration.
 *
 * Validates:
 * - Configuration schema (data types, hubs, steps, options)
 * - Registries (duplicate or unknown types, hosting, hub tree)
 * - Step declarations (causality of every input binding)
 * - Same-timestamp dependency graph (no cycles), at timestamp 0 and at every
 *   timestamp an absolute `at` binding names
 *
 * Usage:
 *   npx tsx src/cli/validate-config.ts [options]
 *   npm run validate-config
 *
 * Options:
 *   --config <path>   Path to engine configuration JSON (default: config/engine.json)
 *   --verbose         Show detailed output
 *   --json            Output entire report as JSON (for CI parsing)
 *   --summary         Print only the top-level summary report
 *   -h, --help        Show this help message
 *
 * Exit codes:
 *   0 - All validations passed
 *   1 - One or more validations failed
 */

import { resolve } from "node:path";
import { parseArgs } from "node:util";

import {
  EngineConfigError,
  loadEngineConfigFile,
  type EngineConfig,
} from "../config/engine/index.js";
import { createEngineContext, type EngineContext } from "../engine/index.js";
import { InMemoryTabularIO } from "../store/index.js";
import { buildRunGraph, graphTimestamps } from "../workflow/index.js";
import { describeError } from "../errors.js";

// ============================================================
// Types
// ============================================================

interface StepResult {
  success: boolean;
  component: string;
  message: string;
  details?: string[];
}

interface ValidationReport {
  timestamp: string;
  configPath: string;
  steps: StepResult[];
  summary: {
    stepsPassed: number;
    stepsFailed: number;
    stepsTotal: number;
    dataTypes?: number;
    hubs?: number;
    workflowSteps?: number;
  };
}

// ============================================================
// CLI Parsing
// ============================================================

function parseCliArgs() {
  const { values } = parseArgs({
    options: {
      config: { type: "string", default: "config/engine.json" },
      verbose: { type: "boolean", default: false },
      json: { type: "boolean", default: false },
      summary: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  if (values.help) {
    console.log(`
Usage: validate-config [options]

Options:
  --config <path>   Path to engine configuration JSON (default: config/engine.json)
  --verbose         Show detailed output
  --json            Output entire report as JSON (for CI parsing)
  --summary         Print only the top-level summary report
  -h, --help        Show this help message
`);
    process.exit(0);
  }

  return values;
}

// ============================================================
// Output Formatting
// ============================================================

const COLORS = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  green: "\x1b[32m",
  red: "\x1b[31m",
};

const useColors = process.stdout.isTTY && !process.env.NO_COLOR;

function c(color: keyof typeof COLORS, text: string): string {
  return useColors ? `${COLORS[color]}${text}${COLORS.reset}` : text;
}

function printHeader(configPath: string): void {
  console.log("");
  console.log(c("bold", "═".repeat(60)));
  console.log(c("bold", " Engine Configuration Validation"));
  console.log(c("dim", ` ${configPath}`));
  console.log(c("bold", "═".repeat(60)));
  console.log("");
}

function printSuccess(component: string, message: string): void {
  console.log(`${c("green", "✓")} ${c("bold", component)}: ${message}`);
}

function printFailure(component: string, message: string): void {
  console.log(`${c("red", "✗")} ${c("bold", component)}: ${message}`);
}

function printDetail(text: string, indent = 2): void {
  console.log(`${" ".repeat(indent)}${c("dim", "•")} ${text}`);
}

function printError(text: string, indent = 4): void {
  console.log(`${" ".repeat(indent)}${c("red", "•")} ${text}`);
}

function printFooter(passed: number, failed: number): void {
  console.log("");
  console.log("─".repeat(60));
  if (failed === 0) {
    console.log(c("green", `✓ All validations passed (${passed}/${passed})`));
  } else {
    console.log(c("red", `✗ Validation failed: ${failed} error(s)`));
  }
  console.log("─".repeat(60));
  console.log("");
}

function printSummary(report: ValidationReport): void {
  const { stepsPassed, stepsFailed, stepsTotal } = report.summary;
  console.log("");
  console.log(c("bold", " Validation Summary"));
  console.log("");
  if (stepsFailed === 0) {
    console.log(`  Validation steps:  ${c("green", `${stepsPassed}/${stepsTotal} passed`)}`);
  } else {
    console.log(`  Validation steps:  ${c("red", `${stepsFailed} failed`)} / ${stepsTotal} total`);
  }
  if (report.summary.dataTypes !== undefined) {
    console.log(`  Data types:        ${report.summary.dataTypes}`);
    console.log(`  Hubs:              ${report.summary.hubs ?? 0}`);
    console.log(`  Workflow steps:    ${report.summary.workflowSteps ?? 0}`);
  }
  console.log("");
}

// ============================================================
// Validation Step Functions
// ============================================================

function runSchemaStep(configPath: string): { step: StepResult; config?: Readonly<EngineConfig> } {
  try {
    const config = loadEngineConfigFile(configPath);
    return {
      step: {
        success: true,
        component: "Schema",
        message: `version ${config.version}`,
        details: [
          `Annotation policy: ${config.options.annotationPolicy}`,
          `Timestamp format: ${config.options.timestampFormat}`,
          `Max concurrency: ${config.options.maxConcurrency}`,
        ],
      },
      config,
    };
  } catch (err) {
    return {
      step: {
        success: false,
        component: "Schema",
        message: "validation failed",
        details: [err instanceof EngineConfigError ? err.format() : describeError(err).message],
      },
    };
  }
}

function runRegistryStep(config: Readonly<EngineConfig>): { step: StepResult; context?: EngineContext } {
  try {
    const context = createEngineContext(config, { io: new InMemoryTabularIO() });
    const details = [
      ...context.schemas.list().map((name) => {
        const type = context.schemas.get(name);
        return `${name}: ${type.columns.length} column(s), ${type.annotatedColumns.length} annotated, hosted by ${
          context.hubs.hubsHosting(name).join(", ") || "no hub"
        }`;
      }),
      ...context.hubs.list().map((hub) => `Hub ${context.hubs.path(hub).join("/")}`),
    ];
    return {
      step: {
        success: true,
        component: "Registries",
        message: `${context.schemas.list().length} data type(s), ${context.hubs.list().length} hub(s), ${
          context.steps.list().length
        } step(s)`,
        details,
      },
      context,
    };
  } catch (err) {
    const { code, message } = describeError(err);
    return {
      step: {
        success: false,
        component: "Registries",
        message: code,
        details: [err instanceof EngineConfigError ? err.format() : message],
      },
    };
  }
}

function runGraphStep(context: EngineContext): StepResult {
  const steps = context.steps.list();
  const timestamps = graphTimestamps(steps);
  const details: string[] = [];
  for (const timestamp of timestamps) {
    try {
      const graph = buildRunGraph(steps, timestamp);
      details.push(`Execution order at ${timestamp}: ${graph.order.join(", ") || "(no steps)"}`);
    } catch (err) {
      const { code, message } = describeError(err);
      return {
        success: false,
        component: "Dependency graph",
        message: `${code} at timestamp ${timestamp}`,
        details: [message],
      };
    }
  }
  return {
    success: true,
    component: "Dependency graph",
    message: `acyclic at ${timestamps.length} timestamp(s)`,
    details,
  };
}

// ============================================================
// Main
// ============================================================

function main(): void {
  const args = parseCliArgs();
  const configPath = resolve(args.config ?? "config/engine.json");
  const isJson = args.json === true;
  const isSummary = args.summary === true;
  const isVerbose = args.verbose === true;
  const printSteps = !isJson && !isSummary;
  const steps: StepResult[] = [];

  if (printSteps) {
    printHeader(configPath);
  }

  function record(step: StepResult): void {
    steps.push(step);
    if (!printSteps) {
      return;
    }
    if (step.success) {
      printSuccess(step.component, step.message);
      if (isVerbose) {
        step.details?.forEach((d) => printDetail(d));
      }
    } else {
      printFailure(step.component, step.message);
      step.details?.forEach((d) => printError(d));
    }
    console.log("");
  }

  const schema = runSchemaStep(configPath);
  record(schema.step);

  let context: EngineContext | undefined;
  if (schema.config) {
    const registries = runRegistryStep(schema.config);
    record(registries.step);
    context = registries.context;
  }

  if (context) {
    record(runGraphStep(context));
  }

  const passed = steps.filter((s) => s.success).length;
  const failed = steps.length - passed;
  const report: ValidationReport = {
    timestamp: new Date().toISOString(),
    configPath,
    steps,
    summary: {
      stepsPassed: passed,
      stepsFailed: failed,
      stepsTotal: steps.length,
      dataTypes: context?.schemas.list().length,
      hubs: context?.hubs.list().length,
      workflowSteps: context?.steps.list().length,
    },
  };

  if (isJson) {
    console.log(JSON.stringify(report, null, 2));
  } else if (isSummary) {
    printSummary(report);
  } else {
    printFooter(passed, failed);
  }

  process.exit(failed > 0 ? 1 : 0);
}

main();
