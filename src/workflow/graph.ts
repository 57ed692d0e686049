/**
 * Same-timestamp dependency graph of one run.
 *
 * Edges:
 *   - A -> B when B reads, at the run timestamp, an object A writes
 *   - A -> B when both write the same object and A is declared first
 *
 * Reads of earlier timestamps add no edge: nothing written by this run is
 * visible to them. The causality validator rules out cross-timestamp cycles,
 * so a cycle here is always between steps of one timestamp:
 *
 *   A writes X, reads Y@t
 *   B writes Y, reads X@t       -> CyclicDependencyError
 */

import { EngineError } from "../errors.js";
import type { Timestamp } from "../timestamp/index.js";
import { isAbsolute, readsRunTimestamp, type WorkflowStep } from "./step.js";

export class CyclicDependencyError extends EngineError {
  constructor(readonly cycle: readonly string[]) {
    super("CYCLIC_DEPENDENCY", `Steps depend on each other at the same timestamp: ${cycle.join(" -> ")}`);
  }
}

export interface RunGraph {
  /** Step ids in a valid execution order (declaration order among peers) */
  readonly order: readonly string[];
  /** Step id -> ids of the steps it must wait for */
  readonly dependencies: ReadonlyMap<string, ReadonlySet<string>>;
}

function objectKey(hub: string, dataType: string, logicalId: string): string {
  return JSON.stringify([hub, dataType, logicalId]);
}

/**
 * Run timestamps whose graphs cover every run: 0, then each distinct `at`
 * of an absolute binding, ascending. At any other timestamp only offset-0
 * reads add edges, so its graph is a subgraph of the one at 0.
 */
export function graphTimestamps(steps: readonly WorkflowStep[]): Timestamp[] {
  const timestamps = new Set<Timestamp>([0]);
  for (const step of steps) {
    for (const binding of Object.values(step.inputs)) {
      if (isAbsolute(binding)) {
        timestamps.add(binding.at);
      }
    }
  }
  return [...timestamps].sort((a, b) => a - b);
}

/**
 * @throws CyclicDependencyError
 */
export function buildRunGraph(steps: readonly WorkflowStep[], timestamp: Timestamp): RunGraph {
  const writers = new Map<string, string[]>();
  for (const step of steps) {
    const key = objectKey(step.output.hub, step.output.object.dataType, step.output.object.logicalId);
    const list = writers.get(key) ?? [];
    list.push(step.id);
    writers.set(key, list);
  }

  const dependencies = new Map<string, Set<string>>(steps.map((step) => [step.id, new Set<string>()]));
  const dependOn = (id: string, upstream: string) => {
    if (id !== upstream) {
      dependencies.get(id)?.add(upstream);
    }
  };

  for (const list of writers.values()) {
    list.forEach((id, i) => {
      const previous = list[i - 1];
      if (previous !== undefined) {
        dependOn(id, previous);
      }
    });
  }

  for (const step of steps) {
    for (const binding of Object.values(step.inputs)) {
      if (!readsRunTimestamp(binding, timestamp)) {
        continue;
      }
      const key = objectKey(binding.hub, binding.object.dataType, binding.object.logicalId);
      for (const writer of writers.get(key) ?? []) {
        dependOn(step.id, writer);
      }
    }
  }

  // Kahn's algorithm, always picking the earliest declared ready step
  const remaining = new Map<string, number>();
  for (const [id, upstream] of dependencies) {
    remaining.set(id, upstream.size);
  }
  const order: string[] = [];
  let progressed = true;
  while (progressed) {
    progressed = false;
    for (const step of steps) {
      if (remaining.get(step.id) !== 0) {
        continue;
      }
      remaining.delete(step.id);
      order.push(step.id);
      for (const [id, upstream] of dependencies) {
        const count = remaining.get(id);
        if (count !== undefined && upstream.has(step.id)) {
          remaining.set(id, count - 1);
        }
      }
      progressed = true;
      break;
    }
  }

  if (remaining.size > 0) {
    throw new CyclicDependencyError(findCycle(steps, dependencies, remaining));
  }
  return { order, dependencies };
}

/**
 * Every blocked step waits on another blocked step, so walking upstream
 * from any of them must revisit a step.
 */
function findCycle(
  steps: readonly WorkflowStep[],
  dependencies: ReadonlyMap<string, ReadonlySet<string>>,
  blocked: ReadonlyMap<string, number>
): string[] {
  const start = steps.find((step) => blocked.has(step.id))?.id;
  const walked: string[] = [];
  let current = start;
  while (current !== undefined && !walked.includes(current)) {
    walked.push(current);
    current = [...(dependencies.get(current) ?? [])].find((id) => blocked.has(id));
  }
  if (current === undefined) {
    return walked;
  }
  const cycle = walked.slice(walked.indexOf(current)).reverse();
  return [...cycle, cycle[0] ?? current];
}
