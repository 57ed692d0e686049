/**
 * Schema registry.
 *
 * Holds every DataType the process knows about: its required columns and
 * their value constraints, the columns users may annotate, the natural row
 * key and the filename pattern artifacts of the type are stored under.
 *
 * Types are registered once at startup and are immutable afterwards. Columns
 * outside `requiredColumns ∪ annotatedColumns` are passed through without
 * being examined.
 */

import { EngineError } from "../errors.js";
import {
  DataTypeSchema,
  type ColumnSpec,
  type ColumnType,
  type DataTypeDefinition,
  type DataTypeInput,
} from "../config/engine/schema.js";
import { EngineConfigError, formatZodIssues } from "../config/engine/loader.js";
import { isBlank, type Table } from "../table/table.js";
import type { TimestampFormat } from "../timestamp/index.js";
import { FilenamePattern } from "./filename-pattern.js";
import { matchesColumnType } from "./column-types.js";

export class DuplicateTypeError extends EngineError {
  constructor(readonly dataType: string) {
    super("DUPLICATE_TYPE", `Data type "${dataType}" is already registered`);
  }
}

export class UnknownTypeError extends EngineError {
  constructor(readonly dataType: string) {
    super("UNKNOWN_TYPE", `Data type "${dataType}" is not registered`);
  }
}

/**
 * A required column whose values break its declared constraint.
 */
export interface ColumnTypeViolation {
  column: string;
  expected: ColumnType;
  /** Zero-based indexes of the offending rows */
  rows: number[];
  /** True when the violation is a blank cell in a non-nullable column */
  blank: boolean;
}

export class SchemaViolationError extends EngineError {
  constructor(
    readonly dataType: string,
    readonly missingColumns: readonly string[],
    readonly typeViolations: readonly ColumnTypeViolation[]
  ) {
    super("SCHEMA_VIOLATION", SchemaViolationError.describe(dataType, missingColumns, typeViolations));
  }

  private static describe(
    dataType: string,
    missing: readonly string[],
    violations: readonly ColumnTypeViolation[]
  ): string {
    const parts: string[] = [];
    if (missing.length > 0) {
      parts.push(`missing required column(s): ${missing.join(", ")}`);
    }
    for (const v of violations) {
      const what = v.blank ? "blank value(s) in non-nullable column" : `value(s) not of type ${v.expected}`;
      parts.push(`${v.column}: ${what} at row(s) ${v.rows.join(", ")}`);
    }
    return `Artifact does not match data type "${dataType}": ${parts.join("; ")}`;
  }
}

/**
 * A registered DataType with its compiled filename pattern.
 */
export interface RegisteredDataType {
  readonly name: string;
  readonly columns: readonly ColumnSpec[];
  readonly annotatedColumns: readonly string[];
  readonly rowKey: readonly string[];
  readonly filenamePattern: string;
  readonly keepBaseline: boolean;
  readonly pattern: FilenamePattern;
}

function toRegisteredDataType(
  definition: DataTypeDefinition,
  format: TimestampFormat
): RegisteredDataType {
  return Object.freeze({
    name: definition.name,
    columns: Object.freeze(definition.columns.map((c) => Object.freeze({ ...c }))),
    annotatedColumns: Object.freeze([...definition.annotatedColumns]),
    rowKey: Object.freeze([...definition.rowKey]),
    filenamePattern: definition.filenamePattern,
    keepBaseline: definition.keepBaseline,
    pattern: new FilenamePattern(definition.filenamePattern, format),
  });
}

export class SchemaRegistry {
  private readonly types = new Map<string, RegisteredDataType>();

  constructor(readonly timestampFormat: TimestampFormat = "tick") {}

  /**
   * Register a data type.
   *
   * @throws DuplicateTypeError if the name is taken
   * @throws EngineConfigError if the declaration itself is malformed
   */
  register(declaration: DataTypeInput): RegisteredDataType {
    const parsed = DataTypeSchema.safeParse(declaration);
    if (!parsed.success) {
      const issues = formatZodIssues(parsed.error.issues);
      throw new EngineConfigError(
        `Invalid declaration for data type "${declaration.name}"`,
        issues
      );
    }

    const definition = parsed.data;
    if (this.types.has(definition.name)) {
      throw new DuplicateTypeError(definition.name);
    }

    const registered = toRegisteredDataType(definition, this.timestampFormat);
    this.types.set(definition.name, registered);
    return registered;
  }

  has(dataType: string): boolean {
    return this.types.has(dataType);
  }

  /**
   * @throws UnknownTypeError
   */
  get(dataType: string): RegisteredDataType {
    const registered = this.types.get(dataType);
    if (!registered) {
      throw new UnknownTypeError(dataType);
    }
    return registered;
  }

  list(): string[] {
    return [...this.types.keys()].sort();
  }

  requiredColumns(dataType: string): readonly ColumnSpec[] {
    return this.get(dataType).columns;
  }

  annotatedColumns(dataType: string): ReadonlySet<string> {
    return new Set(this.get(dataType).annotatedColumns);
  }

  /**
   * Every missing required column and every constraint violation, in
   * declaration order. Empty when the table conforms.
   */
  check(table: Table, dataType: string): {
    missingColumns: string[];
    typeViolations: ColumnTypeViolation[];
  } {
    const { columns } = this.get(dataType);
    const present = new Set(table.columns);
    const missingColumns: string[] = [];
    const typeViolations: ColumnTypeViolation[] = [];

    for (const spec of columns) {
      if (!present.has(spec.name)) {
        missingColumns.push(spec.name);
        continue;
      }

      const blankRows: number[] = [];
      const badRows: number[] = [];
      table.rows.forEach((row, index) => {
        const value = row[spec.name];
        if (isBlank(value)) {
          if (!spec.nullable) blankRows.push(index);
        } else if (!matchesColumnType(spec.type, value)) {
          badRows.push(index);
        }
      });

      if (blankRows.length > 0) {
        typeViolations.push({ column: spec.name, expected: spec.type, rows: blankRows, blank: true });
      }
      if (badRows.length > 0) {
        typeViolations.push({ column: spec.name, expected: spec.type, rows: badRows, blank: false });
      }
    }

    return { missingColumns, typeViolations };
  }

  /**
   * @throws SchemaViolationError listing every problem found
   */
  validate(table: Table, dataType: string): void {
    const { missingColumns, typeViolations } = this.check(table, dataType);
    if (missingColumns.length > 0 || typeViolations.length > 0) {
      throw new SchemaViolationError(dataType, missingColumns, typeViolations);
    }
  }
}
