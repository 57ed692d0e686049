/**
 * Annotation merge engine.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * CARRYING USER EDITS FORWARD
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * A workflow recomputes its output at t2 from scratch. Users may have edited
 * designated (annotated) columns of the t1 version in the meantime, e.g.
 * "Re-route to" = "U2" on row "Task7". Those edits must survive:
 *
 *   prior@t1   Task7 | Hours 3 | Re-route to "U2"
 *   fresh@t2   Task7 | Hours 4 | Re-route to ""
 *   merged     Task7 | Hours 4 | Re-route to "U2"
 *
 * Rows are matched by the data type's natural row key, never by position.
 *
 *   - key in both        annotations of prior win, cell by cell
 *   - key only in fresh  passed through
 *   - key only in prior  dropped; its annotations become warnings
 *
 * WHAT COUNTS AS AN ANNOTATION:
 *   "non-blank"              any non-blank annotated cell at t1
 *   "differs-from-baseline"  an annotated cell whose t1 value differs from the
 *                            machine-computed baseline of t1. A user clearing
 *                            a computed value is an annotation too. Rows the
 *                            baseline lacks fall back to "non-blank".
 */

import { EngineError } from "../errors.js";
import type { AnnotationPolicy } from "../config/engine/schema.js";
import {
  cellsEqual,
  displayRowKey,
  isBlank,
  rowKeyOf,
  type CellValue,
  type Row,
  type Table,
} from "../table/index.js";

export type { AnnotationPolicy };

export class RowKeyAmbiguityError extends EngineError {
  constructor(
    readonly side: "prior" | "fresh" | "baseline",
    readonly rowKey: string
  ) {
    super(
      "ROW_KEY_AMBIGUOUS",
      `Row key "${rowKey}" occurs more than once in the ${side} artifact`
    );
  }
}

/**
 * Annotations on a row that no longer exists in the fresh computation.
 * Reported, never fatal.
 */
export interface OrphanedAnnotationWarning {
  readonly code: "ORPHANED_ANNOTATION";
  readonly rowKey: string;
  readonly annotations: Readonly<Record<string, CellValue>>;
  readonly message: string;
}

export interface MergeOptions {
  annotatedColumns: Iterable<string>;
  rowKey: readonly string[];
  /** Defaults to "non-blank" */
  policy?: AnnotationPolicy;
  /** Machine-computed table the prior artifact was published from */
  baseline?: Table;
}

export interface MergeResult {
  table: Table;
  /** Number of cells whose prior annotation replaced the fresh value */
  carried: number;
  warnings: OrphanedAnnotationWarning[];
}

function indexRows(
  table: Table,
  keyColumns: readonly string[],
  side: RowKeyAmbiguityError["side"]
): Map<string, Row> {
  const rows = new Map<string, Row>();
  for (const row of table.rows) {
    const key = rowKeyOf(row, keyColumns);
    if (rows.has(key)) {
      throw new RowKeyAmbiguityError(side, displayRowKey(row, keyColumns));
    }
    rows.set(key, row);
  }
  return rows;
}

/**
 * The annotated cells of `row`, by column.
 */
function annotationsOf(
  row: Row,
  columns: readonly string[],
  baselineRow: Row | undefined,
  policy: AnnotationPolicy
): Map<string, CellValue> {
  const found = new Map<string, CellValue>();
  for (const column of columns) {
    const value = row[column] ?? null;
    const annotated =
      policy === "differs-from-baseline" && baselineRow
        ? !cellsEqual(value, baselineRow[column])
        : !isBlank(value);
    if (annotated) {
      found.set(column, value);
    }
  }
  return found;
}

/**
 * Merge the annotations of `prior` into `fresh`.
 *
 * Row order and non-annotated columns come from `fresh`. Annotated columns
 * `fresh` lacks but `prior` has are appended so carried values have a home.
 *
 * @throws RowKeyAmbiguityError if a row key repeats within either table
 */
export function mergeForward(prior: Table, fresh: Table, options: MergeOptions): MergeResult {
  const policy = options.policy ?? "non-blank";
  const keyColumns = options.rowKey;
  const annotated = [...new Set(options.annotatedColumns)].filter((column) =>
    prior.columns.includes(column)
  );

  const priorRows = indexRows(prior, keyColumns, "prior");
  const freshRows = indexRows(fresh, keyColumns, "fresh");
  const baselineRows =
    policy === "differs-from-baseline" && options.baseline
      ? indexRows(options.baseline, keyColumns, "baseline")
      : new Map<string, Row>();

  const columns = [
    ...fresh.columns,
    ...annotated.filter((column) => !fresh.columns.includes(column)),
  ];

  let carried = 0;
  const rows = fresh.rows.map((freshRow) => {
    const key = rowKeyOf(freshRow, keyColumns);
    const priorRow = priorRows.get(key);
    const merged: Record<string, CellValue> = {};
    for (const column of columns) {
      merged[column] = freshRow[column] ?? null;
    }
    if (!priorRow) {
      return merged;
    }
    for (const [column, value] of annotationsOf(priorRow, annotated, baselineRows.get(key), policy)) {
      merged[column] = value;
      carried++;
    }
    return merged;
  });

  const warnings: OrphanedAnnotationWarning[] = [];
  for (const [key, priorRow] of priorRows) {
    if (freshRows.has(key)) {
      continue;
    }
    const annotations = annotationsOf(priorRow, annotated, baselineRows.get(key), policy);
    if (annotations.size === 0) {
      continue;
    }
    const rowKey = displayRowKey(priorRow, keyColumns);
    warnings.push({
      code: "ORPHANED_ANNOTATION",
      rowKey,
      annotations: Object.fromEntries(annotations),
      message: `Row "${rowKey}" is gone from the fresh computation; dropped annotations on ${[
        ...annotations.keys(),
      ].join(", ")}`,
    });
  }

  return { table: { columns, rows }, carried, warnings };
}
