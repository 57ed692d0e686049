/**
 * Projection and snapshots of stored content.
 *
 * projectObjects copies sampled versions of chosen objects from one store
 * into another, e.g. to build a small dataset a test can run against.
 * snapshotHub copies everything under a hub as-is, e.g. to record what a
 * hub held after each timestamp of a multi-step test scenario.
 */

import { EngineError } from "../errors.js";
import type { HubTaxonomy } from "../hubs/index.js";
import {
  describeObject,
  type LogicalObject,
  type TabularIO,
  type TemporalObjectStore,
} from "../store/index.js";
import type { Table } from "../table/index.js";
import type { Timestamp } from "../timestamp/index.js";
import { silentLogger, type Logger } from "../logging/index.js";
import type { Sampler } from "./samplers.js";

export interface ProjectionStat {
  object: LogicalObject;
  timestamp: Timestamp;
  address: string;
  inputRows: number;
  outputRows: number;
  /** False when the sample was empty and not saved */
  saved: boolean;
}

export interface ProjectionResult {
  stats: ProjectionStat[];
  /** Objects with no version in the source hub */
  missing: LogicalObject[];
}

export interface ProjectOptions {
  source: TemporalObjectStore;
  target: TemporalObjectStore;
  hub: string;
  objects: readonly LogicalObject[];
  sampler: Sampler;
  /** Save empty samples too (default false) */
  keepEmpty?: boolean;
  overwrite?: boolean;
  logger?: Logger;
}

/**
 * Sample every version of `objects` in `hub` of `source` and store the
 * samples at the same keys in `target`. All versions are sampled together,
 * so cross-table samplers see the whole set.
 */
export async function projectObjects(options: ProjectOptions): Promise<ProjectionResult> {
  const log = (options.logger ?? silentLogger).child({ component: "projector", hub: options.hub });
  const loaded = new Map<string, { object: LogicalObject; timestamp: Timestamp; table: Table }>();
  const missing: LogicalObject[] = [];

  for (const object of options.objects) {
    const timestamps = options.source.listTimestamps(options.hub, object);
    if (timestamps.length === 0) {
      missing.push(object);
      log.warn("Nothing to project", { object: describeObject(object) });
      continue;
    }
    for (const timestamp of timestamps) {
      const artifact = await options.source.get(options.hub, object, timestamp);
      loaded.set(artifact.address, { object, timestamp, table: artifact.table });
    }
  }
  log.info("Loaded artifacts", { artifacts: loaded.size, objects: options.objects.length });

  const samples = options.sampler.sample(
    new Map([...loaded].map(([address, entry]): [string, Table] => [address, entry.table]))
  );

  const stats: ProjectionStat[] = [];
  for (const [address, entry] of loaded) {
    const sample = samples.get(address);
    const outputRows = sample?.rows.length ?? 0;
    const saved = sample !== undefined && (outputRows > 0 || options.keepEmpty === true);
    if (sample && saved) {
      await options.target.put(options.hub, entry.object, entry.timestamp, sample, options.overwrite ?? false);
    }
    stats.push({
      object: entry.object,
      timestamp: entry.timestamp,
      address,
      inputRows: entry.table.rows.length,
      outputRows,
      saved,
    });
  }
  log.info("Projection finished", { saved: stats.filter((s) => s.saved).length, missing: missing.length });
  return { stats, missing };
}

export type SnapshotMode = "populate" | "enrich";

export class InvalidSnapshotError extends EngineError {
  constructor(message: string) {
    super("INVALID_SNAPSHOT", message);
  }
}

export interface SnapshotOptions {
  hubs: HubTaxonomy;
  hub: string;
  source: TabularIO;
  target: TabularIO;
  /**
   * "populate" wipes the hub's folder in the target first; "enrich" keeps
   * it and overwrites only files of the same name.
   */
  mode: SnapshotMode;
  /** Folder in the target to copy under, e.g. "ACTUALS@3" */
  targetRoot?: string;
  /**
   * Store reading `target`; its version index is rebuilt for the copied
   * hubs. Cannot be combined with `targetRoot`.
   */
  targetStore?: TemporalObjectStore;
}

/**
 * Copy every file under `hub` (child hubs included) from `source` to
 * `target`. Files are copied as they are, bypassing any store; a
 * TemporalObjectStore over `target` only sees them once hydrated, which
 * happens here when it is passed as `targetStore`.
 *
 * @returns number of files copied
 */
export async function snapshotHub(options: SnapshotOptions): Promise<number> {
  if (options.targetStore && options.targetRoot) {
    throw new InvalidSnapshotError(
      `A target store cannot be refreshed for a snapshot under "${options.targetRoot}"`
    );
  }
  const folder = options.hubs.path(options.hub).join("/");
  const targetOf = (address: string) =>
    options.targetRoot ? `${options.targetRoot}/${address}` : address;

  if (options.mode === "populate") {
    await options.target.remove(targetOf(folder));
  }

  let copied = 0;
  for (const address of await options.source.list(folder)) {
    const table = await options.source.read(address);
    if (!table) {
      continue;
    }
    await options.target.write(targetOf(address), table);
    copied++;
  }

  if (options.targetStore) {
    for (const hub of subtree(options.hubs, options.hub)) {
      for (const dataType of [...options.hubs.get(hub).hosts].sort()) {
        await options.targetStore.hydrate(hub, dataType);
      }
    }
  }
  return copied;
}

function subtree(hubs: HubTaxonomy, hub: string): string[] {
  return [hub, ...hubs.children(hub).flatMap((child) => subtree(hubs, child.name))];
}
