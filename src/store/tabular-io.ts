/**
 * Tabular I/O provider contract.
 *
 * The engine never touches spreadsheets or folders directly. It reads and
 * writes whole tables at string addresses through this interface, and any
 * hierarchical key-value backend (filesystem, object store) can sit behind
 * it.
 *
 * Implementations must make a completed write visible atomically: a reader
 * sees either the previous content or the new content, never a mix.
 */

import { EngineError } from "../errors.js";
import { cloneTable, type Table } from "../table/index.js";
import type { Address } from "../hubs/index.js";

export class InvalidAddressError extends EngineError {
  constructor(readonly address: Address, reason: string) {
    super("INVALID_ADDRESS", `Address "${address}" ${reason}`);
  }
}

export interface TabularIO {
  /** The table at `address`, or undefined when nothing is stored there */
  read(address: Address): Promise<Table | undefined>;
  /** Store `table` at `address`, replacing what was there */
  write(address: Address, table: Table): Promise<void>;
  exists(address: Address): Promise<boolean>;
  /** Every stored address under the folder `prefix`, sorted */
  list(prefix: Address): Promise<Address[]>;
  /** Delete everything under the folder `prefix` */
  remove(prefix: Address): Promise<void>;
}

function underFolder(address: Address, prefix: Address): boolean {
  if (prefix === "") {
    return true;
  }
  const folder = prefix.endsWith("/") ? prefix : `${prefix}/`;
  return address.startsWith(folder);
}

/**
 * In-process provider backed by a Map. Stores and returns copies.
 */
export class InMemoryTabularIO implements TabularIO {
  private readonly blobs = new Map<Address, Table>();

  async read(address: Address): Promise<Table | undefined> {
    const table = this.blobs.get(address);
    return table ? cloneTable(table) : undefined;
  }

  async write(address: Address, table: Table): Promise<void> {
    this.blobs.set(address, cloneTable(table));
  }

  async exists(address: Address): Promise<boolean> {
    return this.blobs.has(address);
  }

  async list(prefix: Address): Promise<Address[]> {
    return [...this.blobs.keys()].filter((address) => underFolder(address, prefix)).sort();
  }

  async remove(prefix: Address): Promise<void> {
    for (const address of [...this.blobs.keys()]) {
      if (underFolder(address, prefix)) {
        this.blobs.delete(address);
      }
    }
  }

  get size(): number {
    return this.blobs.size;
  }
}
