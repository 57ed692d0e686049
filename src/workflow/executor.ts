/**
 * Workflow executor.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * ONE RUN AT TIMESTAMP t
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * Before any step runs:
 *   - absolute bindings are checked against t (causality)
 *   - the same-timestamp dependency graph is built (CyclicDependencyError)
 *
 * Then each step, as soon as its upstream steps have finished and a worker
 * slot is free:
 *
 *   1. resolve inputs    read at t: exact get; read before t: latest at or
 *                        before that time
 *   2. compute           call the business-logic plugin
 *   3. merge (opt.)      carry annotations of the output's version before t
 *   4. put               store at t, honouring overwrite
 *   5. baseline (opt.)   keep the computed table beside the artifact
 *
 * A missing input skips an optional step and fails any other step with
 * UnresolvedInputError. A failed step does not undo its committed siblings;
 * the run reports per-step outcomes and an overall status.
 *
 * Cancellation (AbortSignal) stops steps that have not started; steps in
 * flight finish writing their artifact or write nothing.
 */

import { EngineError, describeError } from "../errors.js";
import { mergeForward, type AnnotationPolicy, type OrphanedAnnotationWarning } from "../annotations/index.js";
import { CausalityValidator } from "../causality/index.js";
import type { SchemaRegistry } from "../schema/index.js";
import {
  NotFoundError,
  describeObject,
  type Artifact,
  type TemporalObjectStore,
} from "../store/index.js";
import type { Table } from "../table/index.js";
import { InvalidTimestampError, isTimestamp, type Timestamp } from "../timestamp/index.js";
import { silentLogger, workflowRunId, type Logger } from "../logging/index.js";
import { buildRunGraph } from "./graph.js";
import type { StepRegistry } from "./registry.js";
import { bindingTimestamp, type InputBinding, type WorkflowStep } from "./step.js";

export class UnresolvedInputError extends EngineError {
  constructor(
    readonly stepId: string,
    readonly input: string,
    readonly binding: InputBinding,
    readonly timestamp: Timestamp
  ) {
    super(
      "UNRESOLVED_INPUT",
      `Step "${stepId}" input "${input}": no artifact of ${describeObject(binding.object)} in hub "${binding.hub}" at or before timestamp ${timestamp}`
    );
  }
}

export type StepStatus = "succeeded" | "skipped" | "failed" | "cancelled";

export type StepOutcome =
  | {
      stepId: string;
      status: "succeeded";
      address: string;
      /** Annotation cells carried from the previous version */
      carried: number;
      warnings: OrphanedAnnotationWarning[];
    }
  | { stepId: string; status: "skipped"; reason: string }
  | { stepId: string; status: "failed"; error: { code: string; message: string } }
  | { stepId: string; status: "cancelled" };

export type RunStatus = "succeeded" | "partially_succeeded" | "failed" | "cancelled";

export interface RunReport {
  /** "<process run id>@<timestamp>" */
  runId: string;
  timestamp: Timestamp;
  status: RunStatus;
  /** One outcome per step, in declaration order */
  outcomes: StepOutcome[];
  startedAt: string;
  finishedAt: string;
}

export interface RunOptions {
  signal?: AbortSignal;
  /** Overrides the executor's maxConcurrency for this run */
  concurrency?: number;
}

export interface WorkflowExecutorOptions {
  store: TemporalObjectStore;
  schemas: SchemaRegistry;
  steps: StepRegistry;
  validator?: CausalityValidator;
  logger?: Logger;
  /** Default for steps that do not set overwrite */
  overwrite?: boolean;
  annotationPolicy?: AnnotationPolicy;
  maxConcurrency?: number;
}

/** Thrown inside a step when an optional input is missing. */
class SkipStep extends Error {}

export function summarizeRun(outcomes: readonly StepOutcome[]): RunStatus {
  const count = (status: StepStatus) => outcomes.filter((o) => o.status === status).length;
  if (count("cancelled") > 0) {
    return "cancelled";
  }
  if (count("failed") === 0) {
    return "succeeded";
  }
  return count("succeeded") > 0 ? "partially_succeeded" : "failed";
}

export class WorkflowExecutor {
  private readonly store: TemporalObjectStore;
  private readonly schemas: SchemaRegistry;
  private readonly steps: StepRegistry;
  private readonly validator: CausalityValidator;
  private readonly logger: Logger;
  private readonly overwrite: boolean;
  private readonly annotationPolicy: AnnotationPolicy;
  private readonly maxConcurrency: number;

  constructor(options: WorkflowExecutorOptions) {
    this.store = options.store;
    this.schemas = options.schemas;
    this.steps = options.steps;
    this.validator = options.validator ?? new CausalityValidator();
    this.logger = (options.logger ?? silentLogger).child({ component: "executor" });
    this.overwrite = options.overwrite ?? false;
    this.annotationPolicy = options.annotationPolicy ?? "non-blank";
    this.maxConcurrency = options.maxConcurrency ?? 4;
  }

  /**
   * Execute every registered step for `timestamp`.
   *
   * @throws InvalidTimestampError, FutureReferenceError,
   *   SelfReferenceAtSameTimestampError, CyclicDependencyError; all before
   *   any step runs. Step failures are reported, not thrown.
   */
  async run(timestamp: Timestamp, options: RunOptions = {}): Promise<RunReport> {
    if (!isTimestamp(timestamp)) {
      throw new InvalidTimestampError(`Run timestamp must be a non-negative integer, got ${timestamp}`);
    }
    const steps = this.steps.list();
    for (const step of steps) {
      this.validator.validateAt(step, timestamp);
    }
    const graph = buildRunGraph(steps, timestamp);

    const startedAt = new Date().toISOString();
    const runId = workflowRunId(timestamp);
    const log = this.logger.child({ run: runId });
    const limit = Math.max(1, options.concurrency ?? this.maxConcurrency);
    log.info("Run started", { steps: steps.length, concurrency: limit });

    const byId = new Map(steps.map((step): [string, WorkflowStep] => [step.id, step]));
    const waiting = new Map<string, number>();
    const dependents = new Map<string, string[]>();
    for (const [id, upstream] of graph.dependencies) {
      waiting.set(id, upstream.size);
      for (const dependency of upstream) {
        dependents.set(dependency, [...(dependents.get(dependency) ?? []), id]);
      }
    }
    const ready = graph.order.filter((id) => waiting.get(id) === 0);
    const outcomes = new Map<string, StepOutcome>();

    await new Promise<void>((resolve) => {
      let running = 0;

      const finish = (outcome: StepOutcome) => {
        outcomes.set(outcome.stepId, outcome);
        for (const id of dependents.get(outcome.stepId) ?? []) {
          const left = (waiting.get(id) ?? 1) - 1;
          waiting.set(id, left);
          if (left === 0) {
            ready.push(id);
          }
        }
      };

      const pump = () => {
        while (running < limit && ready.length > 0) {
          const id = ready.shift();
          const step = id === undefined ? undefined : byId.get(id);
          if (!step) {
            continue;
          }
          if (options.signal?.aborted) {
            finish({ stepId: step.id, status: "cancelled" });
            continue;
          }
          running++;
          this.executeStep(step, timestamp, log.child({ step: step.id })).then(
            (outcome) => {
              running--;
              finish(outcome);
              pump();
            },
            (err: unknown) => {
              running--;
              finish({ stepId: step.id, status: "failed", error: describeError(err) });
              pump();
            }
          );
        }
        if (running === 0 && ready.length === 0) {
          resolve();
        }
      };

      pump();
    });

    const ordered = steps.map(
      (step): StepOutcome => outcomes.get(step.id) ?? { stepId: step.id, status: "cancelled" }
    );
    const report: RunReport = {
      runId,
      timestamp,
      status: summarizeRun(ordered),
      outcomes: ordered,
      startedAt,
      finishedAt: new Date().toISOString(),
    };
    log.info("Run finished", {
      status: report.status,
      succeeded: ordered.filter((o) => o.status === "succeeded").length,
      failed: ordered.filter((o) => o.status === "failed").length,
    });
    return report;
  }

  private async executeStep(step: WorkflowStep, timestamp: Timestamp, log: Logger): Promise<StepOutcome> {
    try {
      const inputs = await this.resolveInputs(step, timestamp);
      const computed = await this.steps.logicFor(step)(inputs, timestamp);
      const { object, hub } = step.output;
      const dataType = this.schemas.get(object.dataType);

      let table: Table = computed;
      let carried = 0;
      let warnings: OrphanedAnnotationWarning[] = [];
      if (step.mergeAnnotations) {
        const prior = await this.previousVersion(step, timestamp);
        if (prior) {
          const baseline =
            this.annotationPolicy === "differs-from-baseline"
              ? await this.store.getBaseline(hub, object, prior.timestamp)
              : undefined;
          const merged = mergeForward(prior.table, computed, {
            annotatedColumns: dataType.annotatedColumns,
            rowKey: dataType.rowKey,
            policy: this.annotationPolicy,
            baseline,
          });
          table = merged.table;
          carried = merged.carried;
          warnings = merged.warnings;
          for (const warning of warnings) {
            log.warn("Orphaned annotation", { rowKey: warning.rowKey, annotations: warning.annotations });
          }
        }
      }

      const artifact = await this.store.put(hub, object, timestamp, table, step.overwrite ?? this.overwrite);
      if (dataType.keepBaseline) {
        await this.store.putBaseline(hub, object, timestamp, computed);
      }
      log.info("Step succeeded", { address: artifact.address, rows: table.rows.length, carried });
      return { stepId: step.id, status: "succeeded", address: artifact.address, carried, warnings };
    } catch (err) {
      if (err instanceof SkipStep) {
        log.info("Step skipped", { reason: err.message });
        return { stepId: step.id, status: "skipped", reason: err.message };
      }
      const error = describeError(err);
      log.error("Step failed", error);
      return { stepId: step.id, status: "failed", error };
    }
  }

  private async resolveInputs(step: WorkflowStep, timestamp: Timestamp): Promise<Record<string, Artifact>> {
    const inputs: Record<string, Artifact> = {};
    for (const [name, binding] of Object.entries(step.inputs)) {
      const at = bindingTimestamp(binding, timestamp);
      try {
        if (at < 0) {
          throw new NotFoundError(`Timestamp ${at} precedes the time axis`);
        }
        inputs[name] =
          at === timestamp
            ? await this.store.get(binding.hub, binding.object, at)
            : await this.store.getLatestAtOrBefore(binding.hub, binding.object, at);
      } catch (err) {
        if (!(err instanceof NotFoundError)) {
          throw err;
        }
        const unresolved = new UnresolvedInputError(step.id, name, binding, at);
        if (step.optional) {
          throw new SkipStep(unresolved.message);
        }
        throw unresolved;
      }
    }
    return inputs;
  }

  private async previousVersion(step: WorkflowStep, timestamp: Timestamp): Promise<Artifact | undefined> {
    if (timestamp === 0) {
      return undefined;
    }
    try {
      return await this.store.getLatestAtOrBefore(step.output.hub, step.output.object, timestamp - 1);
    } catch (err) {
      if (err instanceof NotFoundError) {
        return undefined;
      }
      throw err;
    }
  }
}
