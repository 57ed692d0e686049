/**
 * Annotation merge tests.
 *
 * Run: node --import tsx src/annotations/merge.test.ts
 */

import { strict as assert } from "node:assert";

import type { Table } from "../table/index.js";
import { mergeForward, RowKeyAmbiguityError } from "./merge.js";

// ═══════════════════════════════════════════════════════════════════════════
// TEST HELPERS
// ═══════════════════════════════════════════════════════════════════════════

let passed = 0;
let failed = 0;

function test(name: string, fn: () => void): void {
  try {
    fn();
    passed++;
    console.log(`  ✓ ${name}`);
  } catch (err) {
    failed++;
    console.error(`  ✗ ${name}`);
    console.error(`    ${err instanceof Error ? err.message : String(err)}`);
  }
}

function section(title: string): void {
  console.log(`\n── ${title} ──`);
}

const COLUMNS = ["Task", "Hours", "Owner", "Re-route to"];
const OPTIONS = { annotatedColumns: ["Re-route to"], rowKey: ["Task"] };

const PRIOR: Table = {
  columns: COLUMNS,
  rows: [
    { Task: "Task7", Hours: 3, Owner: "U1", "Re-route to": "U2" },
    { Task: "Task8", Hours: 2, Owner: "U1", "Re-route to": null },
  ],
};

const FRESH: Table = {
  columns: COLUMNS,
  rows: [
    { Task: "Task8", Hours: 5, Owner: "U3", "Re-route to": null },
    { Task: "Task7", Hours: 4, Owner: "U3", "Re-route to": "" },
    { Task: "Task9", Hours: 1, Owner: "U3", "Re-route to": null },
  ],
};

// ═══════════════════════════════════════════════════════════════════════════
// NON-BLANK POLICY
// ═══════════════════════════════════════════════════════════════════════════

section("Non-blank policy");

test("re-route annotation survives recomputation", () => {
  const { table, carried, warnings } = mergeForward(PRIOR, FRESH, OPTIONS);
  assert.deepEqual(table.rows[1], { Task: "Task7", Hours: 4, Owner: "U3", "Re-route to": "U2" });
  assert.equal(carried, 1);
  assert.deepEqual(warnings, []);
});

test("row order and other rows come from the fresh table", () => {
  const { table } = mergeForward(PRIOR, FRESH, OPTIONS);
  assert.deepEqual(table.columns, COLUMNS);
  assert.deepEqual(table.rows[0], FRESH.rows[0]);
  assert.deepEqual(table.rows[2], FRESH.rows[2]);
  assert.equal(table.rows.length, 3);
});

test("a prior annotation overrides a freshly computed value", () => {
  const fresh: Table = {
    columns: COLUMNS,
    rows: [{ Task: "Task7", Hours: 4, Owner: "U3", "Re-route to": "U5" }],
  };
  const { table } = mergeForward(PRIOR, fresh, OPTIONS);
  assert.equal(table.rows[0]?.["Re-route to"], "U2");
});

test("merging a table with itself leaves it unchanged", () => {
  const { table } = mergeForward(PRIOR, PRIOR, OPTIONS);
  assert.deepEqual(table, PRIOR);
});

test("non-annotated columns are never carried", () => {
  const { table } = mergeForward(PRIOR, FRESH, OPTIONS);
  assert.equal(table.rows[1]?.Owner, "U3");
  assert.equal(table.rows[1]?.Hours, 4);
});

test("annotated column missing from the fresh table is appended", () => {
  const fresh: Table = { columns: ["Task", "Hours"], rows: [{ Task: "Task7", Hours: 4 }] };
  const { table } = mergeForward(PRIOR, fresh, OPTIONS);
  assert.deepEqual(table.columns, ["Task", "Hours", "Re-route to"]);
  assert.deepEqual(table.rows[0], { Task: "Task7", Hours: 4, "Re-route to": "U2" });
});

test("composite row keys match on every key column", () => {
  const prior: Table = {
    columns: ["Area", "Task", "Note"],
    rows: [
      { Area: "A", Task: "1", Note: "keep" },
      { Area: "B", Task: "1", Note: null },
    ],
  };
  const fresh: Table = {
    columns: ["Area", "Task", "Note"],
    rows: [
      { Area: "B", Task: "1", Note: null },
      { Area: "A", Task: "1", Note: null },
    ],
  };
  const { table } = mergeForward(prior, fresh, { annotatedColumns: ["Note"], rowKey: ["Area", "Task"] });
  assert.deepEqual(table.rows, [
    { Area: "B", Task: "1", Note: null },
    { Area: "A", Task: "1", Note: "keep" },
  ]);
});

// ═══════════════════════════════════════════════════════════════════════════
// ORPHANS AND AMBIGUITY
// ═══════════════════════════════════════════════════════════════════════════

section("Orphans and ambiguity");

test("annotations on a vanished row are reported, not carried", () => {
  const fresh: Table = {
    columns: COLUMNS,
    rows: [{ Task: "Task8", Hours: 5, Owner: "U3", "Re-route to": null }],
  };
  const { table, warnings } = mergeForward(PRIOR, fresh, OPTIONS);
  assert.equal(table.rows.length, 1);
  assert.equal(warnings.length, 1);
  assert.equal(warnings[0]?.code, "ORPHANED_ANNOTATION");
  assert.equal(warnings[0]?.rowKey, "Task7");
  assert.deepEqual(warnings[0]?.annotations, { "Re-route to": "U2" });
});

test("vanished rows without annotations produce no warning", () => {
  const fresh: Table = {
    columns: COLUMNS,
    rows: [{ Task: "Task7", Hours: 5, Owner: "U3", "Re-route to": null }],
  };
  const { warnings } = mergeForward(PRIOR, fresh, OPTIONS);
  assert.deepEqual(warnings, []);
});

test("duplicate row keys in either table are rejected", () => {
  const duplicated: Table = {
    columns: COLUMNS,
    rows: [
      { Task: "Task7", Hours: 1, Owner: "U1", "Re-route to": null },
      { Task: "Task7", Hours: 2, Owner: "U1", "Re-route to": null },
    ],
  };
  assert.throws(() => mergeForward(duplicated, FRESH, OPTIONS), RowKeyAmbiguityError);
  assert.throws(
    () => mergeForward(PRIOR, duplicated, OPTIONS),
    (err: unknown) => err instanceof RowKeyAmbiguityError && err.side === "fresh" && err.rowKey === "Task7"
  );
});

// ═══════════════════════════════════════════════════════════════════════════
// BASELINE POLICY
// ═══════════════════════════════════════════════════════════════════════════

section("Differs-from-baseline policy");

const COMPUTED_AT_T1: Table = {
  columns: COLUMNS,
  rows: [
    { Task: "Task7", Hours: 3, Owner: "U1", "Re-route to": "U2" },
    { Task: "Task8", Hours: 2, Owner: "U1", "Re-route to": "U4" },
  ],
};

test("computed values equal to the baseline are not annotations", () => {
  const prior: Table = {
    columns: COLUMNS,
    rows: [
      { Task: "Task7", Hours: 3, Owner: "U1", "Re-route to": "U2" },
      { Task: "Task8", Hours: 2, Owner: "U1", "Re-route to": "U6" },
    ],
  };
  const fresh: Table = {
    columns: COLUMNS,
    rows: [
      { Task: "Task7", Hours: 4, Owner: "U1", "Re-route to": "U3" },
      { Task: "Task8", Hours: 4, Owner: "U1", "Re-route to": "U3" },
    ],
  };
  const { table, carried } = mergeForward(prior, fresh, {
    ...OPTIONS,
    policy: "differs-from-baseline",
    baseline: COMPUTED_AT_T1,
  });
  assert.equal(table.rows[0]?.["Re-route to"], "U3");
  assert.equal(table.rows[1]?.["Re-route to"], "U6");
  assert.equal(carried, 1);
});

test("a cleared computed value is carried as blank", () => {
  const prior: Table = {
    columns: COLUMNS,
    rows: [{ Task: "Task8", Hours: 2, Owner: "U1", "Re-route to": null }],
  };
  const fresh: Table = {
    columns: COLUMNS,
    rows: [{ Task: "Task8", Hours: 4, Owner: "U1", "Re-route to": "U3" }],
  };
  const { table } = mergeForward(prior, fresh, {
    ...OPTIONS,
    policy: "differs-from-baseline",
    baseline: COMPUTED_AT_T1,
  });
  assert.equal(table.rows[0]?.["Re-route to"], null);
});

test("rows missing from the baseline fall back to non-blank", () => {
  const prior: Table = {
    columns: COLUMNS,
    rows: [{ Task: "Task9", Hours: 2, Owner: "U1", "Re-route to": "U7" }],
  };
  const fresh: Table = {
    columns: COLUMNS,
    rows: [{ Task: "Task9", Hours: 4, Owner: "U1", "Re-route to": null }],
  };
  const { table } = mergeForward(prior, fresh, {
    ...OPTIONS,
    policy: "differs-from-baseline",
    baseline: COMPUTED_AT_T1,
  });
  assert.equal(table.rows[0]?.["Re-route to"], "U7");
});

test("without a baseline the policy behaves as non-blank", () => {
  const { table } = mergeForward(PRIOR, FRESH, { ...OPTIONS, policy: "differs-from-baseline" });
  assert.equal(table.rows[1]?.["Re-route to"], "U2");
});

// ═══════════════════════════════════════════════════════════════════════════
// SUMMARY
// ═══════════════════════════════════════════════════════════════════════════

console.log(`\n═══════════════════════════════════════════════`);
console.log(`  Results: ${passed} passed, ${failed} failed`);
console.log(`═══════════════════════════════════════════════\n`);

if (failed > 0) {
  process.exit(1);
}
