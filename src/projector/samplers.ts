/**
 * Samplers: shrink large tables into small ones for test datasets.
 *
 * A sampler maps named tables (usually by address) to samples of them. Each
 * sample keeps the columns of its source table and a subset of its rows, in
 * their original order. Samplers compose with ChainSampler.
 */

import { EngineError } from "../errors.js";
import { cellsEqual, type CellValue, type Table } from "../table/index.js";

export type TableSet = ReadonlyMap<string, Table>;

export interface Sampler {
  sample(tables: TableSet): Map<string, Table>;
}

export class InvalidSamplerError extends EngineError {
  constructor(message: string) {
    super("INVALID_SAMPLER", message);
  }
}

function mapTables(tables: TableSet, fn: (table: Table) => Table): Map<string, Table> {
  const sampled = new Map<string, Table>();
  for (const [name, table] of tables) {
    sampled.set(name, fn(table));
  }
  return sampled;
}

/**
 * Distinct values of `column` across every table that has it, in first-seen
 * order. Useful for choosing what an AnyOfFilterSampler should keep.
 */
export function valueList(tables: TableSet, column: string): CellValue[] {
  const values: CellValue[] = [];
  for (const table of tables.values()) {
    if (!table.columns.includes(column)) {
      continue;
    }
    for (const row of table.rows) {
      const value = row[column] ?? null;
      if (!values.includes(value)) {
        values.push(value);
      }
    }
  }
  return values;
}

/**
 * Keeps the first `size` rows of each table.
 */
export class FirstFoundSampler implements Sampler {
  constructor(readonly size: number) {
    if (!Number.isInteger(size) || size < 0) {
      throw new InvalidSamplerError(`Sample size must be a non-negative integer, got ${size}`);
    }
  }

  sample(tables: TableSet): Map<string, Table> {
    return mapTables(tables, (table) => ({
      columns: [...table.columns],
      rows: table.rows.slice(0, this.size).map((row) => ({ ...row })),
    }));
  }
}

/**
 * Keeps rows whose `column` holds one of `allowed`. Tables without the
 * column pass through whole.
 */
export class AnyOfFilterSampler implements Sampler {
  constructor(
    readonly column: string,
    readonly allowed: readonly CellValue[]
  ) {}

  sample(tables: TableSet): Map<string, Table> {
    return mapTables(tables, (table) => {
      if (!table.columns.includes(this.column)) {
        return { columns: [...table.columns], rows: table.rows.map((row) => ({ ...row })) };
      }
      return {
        columns: [...table.columns],
        rows: table.rows
          .filter((row) => this.allowed.some((value) => cellsEqual(row[this.column], value)))
          .map((row) => ({ ...row })),
      };
    });
  }
}

/**
 * Feeds each sampler's output into the next.
 */
export class ChainSampler implements Sampler {
  private readonly samplers: readonly Sampler[];

  constructor(samplers: readonly Sampler[]) {
    if (samplers.length === 0) {
      throw new InvalidSamplerError("A sampler chain needs at least one sampler");
    }
    this.samplers = [...samplers];
  }

  sample(tables: TableSet): Map<string, Table> {
    let current: TableSet = tables;
    for (const sampler of this.samplers) {
      current = sampler.sample(current);
    }
    return new Map(current);
  }
}
