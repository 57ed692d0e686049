/**
 * Workflow step shapes and the business-logic plugin contract.
 *
 * A step reads named inputs, each bound to a logical object in a hub at a
 * time relative to the run (`offset`, 0 = the run itself, negative =
 * earlier) or at a fixed time (`at`), and writes exactly one output object
 * at the run timestamp.
 */

import type { LogicalObject, Artifact } from "../store/index.js";
import type { Table } from "../table/index.js";
import type { Timestamp } from "../timestamp/index.js";

export interface RelativeBinding {
  readonly object: LogicalObject;
  readonly hub: string;
  readonly offset: number;
}

export interface AbsoluteBinding {
  readonly object: LogicalObject;
  readonly hub: string;
  readonly at: Timestamp;
}

export type InputBinding = RelativeBinding | AbsoluteBinding;

export interface OutputBinding {
  readonly object: LogicalObject;
  readonly hub: string;
}

export interface WorkflowStep {
  readonly id: string;
  /** Name of the registered business-logic plugin */
  readonly logic: string;
  readonly inputs: Readonly<Record<string, InputBinding>>;
  readonly output: OutputBinding;
  /** Skip instead of failing when an input cannot be resolved */
  readonly optional: boolean;
  /** Falls back to the engine option when unset */
  readonly overwrite?: boolean;
  /** Carry annotations of the output's previous version forward */
  readonly mergeAnnotations: boolean;
}

/**
 * Pluggable computation of a step: resolved inputs by binding name plus the
 * run timestamp in, one table for the output object out.
 */
export type BusinessLogic = (
  inputs: Readonly<Record<string, Artifact>>,
  timestamp: Timestamp
) => Table | Promise<Table>;

export function isAbsolute(binding: InputBinding): binding is AbsoluteBinding {
  return "at" in binding;
}

/**
 * The timestamp a binding reads at for a run at `runTimestamp`.
 */
export function bindingTimestamp(binding: InputBinding, runTimestamp: Timestamp): Timestamp {
  return isAbsolute(binding) ? binding.at : runTimestamp + binding.offset;
}

/**
 * Whether the binding reads exactly the run timestamp (an exact `get`
 * rather than a lookup of the latest earlier version).
 */
export function readsRunTimestamp(binding: InputBinding, runTimestamp: Timestamp): boolean {
  return bindingTimestamp(binding, runTimestamp) === runTimestamp;
}
