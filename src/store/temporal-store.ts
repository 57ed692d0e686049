/**
 * Temporal object store.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * VERSIONED ARTIFACTS
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * A logical object (data type + logical id, e.g. Report/"ProductX") has no
 * storage of its own. What is stored are its artifacts: one table per
 * timestamp, written once under the address the hub resolver computes.
 *
 *   X@1, X@5, X@9       put at three timestamps
 *   get(X, 5)           exact lookup -> X@5
 *   latest(X, 7)        greatest timestamp <= 7 -> X@5
 *   latest(X, 0)        NotFoundError
 *
 * WRITE RULES:
 *   - Every put is validated against the data type first.
 *   - Writes to one (object, timestamp) key are serialized. Without
 *     `overwrite`, a second write to an existing key fails with
 *     DuplicateArtifactError instead of racing or merging.
 *   - Writes to distinct keys are independent.
 *   - Artifacts are never deleted here.
 *
 * Reads go straight to the tabular I/O provider, whose atomic writes
 * guarantee a reader never sees a partial artifact.
 */

import { EngineError } from "../errors.js";
import type { SchemaRegistry } from "../schema/index.js";
import type { Address, HubPathResolver } from "../hubs/index.js";
import { cloneTable, type Table } from "../table/index.js";
import { InvalidTimestampError, isTimestamp, type Timestamp } from "../timestamp/index.js";
import { silentLogger, type Logger } from "../logging/index.js";
import type { TabularIO } from "./tabular-io.js";
import { VersionIndex } from "./version-index.js";
import { KeyedLock } from "./key-lock.js";

/**
 * The "X" in X@t1, X@t2: a key, never stored on its own.
 */
export interface LogicalObject {
  readonly dataType: string;
  readonly logicalId: string;
}

/**
 * One timestamped materialization of a logical object.
 */
export interface Artifact {
  readonly object: LogicalObject;
  readonly hub: string;
  readonly timestamp: Timestamp;
  readonly address: Address;
  readonly table: Table;
}

export function sameObject(a: LogicalObject, b: LogicalObject): boolean {
  return a.dataType === b.dataType && a.logicalId === b.logicalId;
}

export function describeObject(object: LogicalObject): string {
  return `${object.dataType}/${object.logicalId}`;
}

export class DuplicateArtifactError extends EngineError {
  constructor(readonly address: Address, readonly timestamp: Timestamp) {
    super(
      "DUPLICATE_ARTIFACT",
      `An artifact already exists at ${address} (timestamp ${timestamp}); pass overwrite to replace it`
    );
  }
}

export class NotFoundError extends EngineError {
  constructor(message: string) {
    super("NOT_FOUND", message);
  }
}

export interface TemporalObjectStoreOptions {
  schemas: SchemaRegistry;
  resolver: HubPathResolver;
  io: TabularIO;
  logger?: Logger;
}

export class TemporalObjectStore {
  private readonly schemas: SchemaRegistry;
  private readonly resolver: HubPathResolver;
  private readonly io: TabularIO;
  private readonly logger: Logger;
  private readonly index = new VersionIndex();
  private readonly locks = new KeyedLock();

  constructor(options: TemporalObjectStoreOptions) {
    this.schemas = options.schemas;
    this.resolver = options.resolver;
    this.io = options.io;
    this.logger = (options.logger ?? silentLogger).child({ component: "store" });
  }

  private static indexKey(hub: string, object: LogicalObject): string {
    return JSON.stringify([hub, object.dataType, object.logicalId]);
  }

  /**
   * Validate and store `table` as the artifact of `object` at `timestamp`.
   *
   * @throws SchemaViolationError if the table does not match the data type
   * @throws UnhostedTypeError if `hub` does not host the data type
   * @throws DuplicateArtifactError if the key exists and overwrite is false
   */
  async put(
    hub: string,
    object: LogicalObject,
    timestamp: Timestamp,
    table: Table,
    overwrite = false
  ): Promise<Artifact> {
    this.schemas.validate(table, object.dataType);
    const address = this.resolver.resolve(hub, object.dataType, object.logicalId, timestamp);
    const key = TemporalObjectStore.indexKey(hub, object);
    const stored = cloneTable(table);

    await this.locks.runExclusive(address, async () => {
      const exists = this.index.has(key, timestamp) || (await this.io.exists(address));
      if (exists && !overwrite) {
        throw new DuplicateArtifactError(address, timestamp);
      }
      await this.io.write(address, stored);
      this.index.add(key, timestamp);
      this.logger.debug(exists ? "Artifact overwritten" : "Artifact stored", {
        address,
        timestamp,
        rows: stored.rows.length,
      });
    });

    return { object, hub, timestamp, address, table: cloneTable(stored) };
  }

  /**
   * Exact-timestamp lookup.
   *
   * @throws NotFoundError
   */
  async get(hub: string, object: LogicalObject, timestamp: Timestamp): Promise<Artifact> {
    const address = this.resolver.resolve(hub, object.dataType, object.logicalId, timestamp);
    const table = await this.io.read(address);
    if (!table) {
      throw new NotFoundError(
        `No artifact of ${describeObject(object)} in hub "${hub}" at timestamp ${timestamp}`
      );
    }
    this.index.add(TemporalObjectStore.indexKey(hub, object), timestamp);
    return { object, hub, timestamp, address, table };
  }

  /**
   * The artifact with the greatest timestamp <= `timestamp`.
   *
   * @throws NotFoundError when no version exists at or before `timestamp`
   * @throws InvalidTimestampError unless `timestamp` is a non-negative integer
   */
  async getLatestAtOrBefore(
    hub: string,
    object: LogicalObject,
    timestamp: Timestamp
  ): Promise<Artifact> {
    if (!isTimestamp(timestamp)) {
      throw new InvalidTimestampError(`Timestamp must be a non-negative integer, got ${timestamp}`);
    }
    this.resolver.assertHosted(hub, object.dataType);
    const found = this.index.latestAtOrBefore(TemporalObjectStore.indexKey(hub, object), timestamp);
    if (found === undefined) {
      throw new NotFoundError(
        `No artifact of ${describeObject(object)} in hub "${hub}" at or before timestamp ${timestamp}`
      );
    }
    return this.get(hub, object, found);
  }

  /**
   * All known timestamps of `object`, ascending. The returned array is a
   * snapshot and can be iterated any number of times.
   */
  listTimestamps(hub: string, object: LogicalObject): Timestamp[] {
    this.resolver.assertHosted(hub, object.dataType);
    return this.index.list(TemporalObjectStore.indexKey(hub, object));
  }

  /**
   * Store the machine-computed table an artifact was published from. Used by
   * the "differs-from-baseline" annotation policy to tell user edits from
   * computed values. Baselines follow the artifact's overwrite semantics.
   */
  async putBaseline(
    hub: string,
    object: LogicalObject,
    timestamp: Timestamp,
    table: Table
  ): Promise<void> {
    const address = this.resolver.resolve(
      hub,
      object.dataType,
      object.logicalId,
      timestamp,
      "baseline"
    );
    await this.locks.runExclusive(address, () => this.io.write(address, cloneTable(table)));
  }

  async getBaseline(
    hub: string,
    object: LogicalObject,
    timestamp: Timestamp
  ): Promise<Table | undefined> {
    const address = this.resolver.resolve(
      hub,
      object.dataType,
      object.logicalId,
      timestamp,
      "baseline"
    );
    return this.io.read(address);
  }

  /**
   * Rebuild the version index for every artifact of `dataType` stored under
   * `hub`, e.g. after a restart against a persistent backend. Files that do
   * not match the data type's filename pattern are ignored.
   *
   * @returns number of versions indexed
   */
  async hydrate(hub: string, dataType: string): Promise<number> {
    const directory = this.resolver.directory(hub, dataType);
    // Index keys of this (hub, data type) all start with this prefix
    this.index.clear(JSON.stringify([hub, dataType]).slice(0, -1) + ",");
    let count = 0;
    for (const address of await this.io.list(directory)) {
      const parsed = this.resolver.parse(hub, dataType, address);
      if (!parsed) {
        continue;
      }
      this.index.add(
        TemporalObjectStore.indexKey(hub, { dataType, logicalId: parsed.logicalId }),
        parsed.timestamp
      );
      count++;
    }
    this.logger.info("Version index hydrated", { hub, dataType, versions: count });
    return count;
  }
}
