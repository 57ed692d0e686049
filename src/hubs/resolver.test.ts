/**
 * Hub taxonomy and path resolver tests.
 *
 * Run: node --import tsx src/hubs/resolver.test.ts
 */

import { strict as assert } from "node:assert";

import { EngineConfigError } from "../config/engine/loader.js";
import { SchemaRegistry, UnknownTypeError } from "../schema/index.js";
import {
  HubPathResolver,
  HubTaxonomy,
  InvalidTaxonomyError,
  UnhostedTypeError,
  UnknownHubError,
} from "./index.js";

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

function makeSchemas(): SchemaRegistry {
  const schemas = new SchemaRegistry();
  schemas.register({
    name: "Report",
    columns: ["Task"],
    rowKey: "Task",
    filenamePattern: "{logicalId} {timestamp}.json",
  });
  schemas.register({
    name: "Plan",
    columns: ["Task"],
    rowKey: "Task",
    filenamePattern: "{timestamp}@{logicalId}",
  });
  return schemas;
}

const HUBS = [
  { name: "inputs", hosts: ["Report"] },
  { name: "publications" },
  { name: "P1", parent: "publications", hosts: ["Report"] },
  { name: "Plans", parent: "P1", hosts: ["Plan"] },
];

function makeResolver(): HubPathResolver {
  const schemas = makeSchemas();
  return new HubPathResolver(HubTaxonomy.create(HUBS, schemas), schemas);
}

// ═══════════════════════════════════════════════════════════════════════════
// TAXONOMY
// ═══════════════════════════════════════════════════════════════════════════

section("Taxonomy");

test("paths run from the root down to the node", () => {
  const hubs = HubTaxonomy.create(HUBS);
  assert.deepEqual(hubs.path("Plans"), ["publications", "P1", "Plans"]);
  assert.deepEqual(hubs.path("inputs"), ["inputs"]);
});

test("hosting is not inherited by children or from parents", () => {
  const hubs = HubTaxonomy.create(HUBS);
  assert.equal(hubs.hosts("P1", "Report"), true);
  assert.equal(hubs.hosts("Plans", "Report"), false);
  assert.equal(hubs.hosts("publications", "Report"), false);
  assert.deepEqual(hubs.hubsHosting("Report"), ["P1", "inputs"]);
});

test("children and roots are listed by name", () => {
  const hubs = HubTaxonomy.create(HUBS);
  assert.deepEqual(hubs.children("publications").map((h) => h.name), ["P1"]);
  assert.deepEqual(hubs.roots().map((h) => h.name), ["inputs", "publications"]);
});

test("unknown hub names throw UnknownHubError", () => {
  const hubs = HubTaxonomy.create(HUBS);
  assert.throws(() => hubs.path("P9"), UnknownHubError);
  assert.throws(() => hubs.hosts("P9", "Report"), UnknownHubError);
});

test("duplicate names, unknown parents and parent cycles are rejected", () => {
  assert.throws(() => HubTaxonomy.create([{ name: "a" }, { name: "a" }]), InvalidTaxonomyError);
  assert.throws(() => HubTaxonomy.create([{ name: "a", parent: "b" }]), InvalidTaxonomyError);
  assert.throws(
    () =>
      HubTaxonomy.create([
        { name: "a", parent: "b" },
        { name: "b", parent: "a" },
      ]),
    InvalidTaxonomyError
  );
});

test("hub names that are not plain folder names are rejected", () => {
  for (const name of [".", "..", ".baseline", ".hidden"]) {
    assert.throws(
      () => HubTaxonomy.create([{ name: "A", hosts: [] }, { name, parent: "A" }]),
      EngineConfigError,
      name
    );
  }
});

test("data type names starting with '.' are rejected", () => {
  for (const name of [".", "..", ".baseline"]) {
    assert.throws(
      () =>
        new SchemaRegistry().register({
          name,
          columns: ["Task"],
          rowKey: "Task",
          filenamePattern: "{logicalId} {timestamp}.json",
        }),
      EngineConfigError,
      name
    );
  }
});

test("hosting an unregistered type is rejected when schemas are given", () => {
  assert.throws(
    () => HubTaxonomy.create([{ name: "a", hosts: ["Ghost"] }], makeSchemas()),
    UnknownTypeError
  );
});

// ═══════════════════════════════════════════════════════════════════════════
// RESOLVE
// ═══════════════════════════════════════════════════════════════════════════

section("resolve");

test("addresses follow hub path, data type and filename pattern", () => {
  const resolver = makeResolver();
  assert.equal(resolver.resolve("P1", "Report", "ProductX", 5), "publications/P1/Report/ProductX 5.json");
  assert.equal(resolver.resolve("Plans", "Plan", "ProductX", 5), "publications/P1/Plans/Plan/5@ProductX");
  assert.equal(
    resolver.resolve("P1", "Report", "ProductX", 5, "baseline"),
    "publications/P1/Report/.baseline/ProductX 5.json"
  );
});

test("resolve is deterministic", () => {
  const a = makeResolver();
  const b = makeResolver();
  assert.equal(a.resolve("inputs", "Report", "X", 3), a.resolve("inputs", "Report", "X", 3));
  assert.equal(a.resolve("inputs", "Report", "X", 3), b.resolve("inputs", "Report", "X", 3));
});

test("distinct inputs never share an address", () => {
  const resolver = makeResolver();
  const ids = ["X", "X 1", "X%201", "X 10", "X1", "a/b", "a%2Fb", " ", "Ünïcode"];
  const seen = new Map<string, string>();
  for (const hub of ["inputs", "P1"]) {
    for (const id of ids) {
      for (const t of [0, 1, 10, 101]) {
        const address = resolver.resolve(hub, "Report", id, t);
        const tuple = JSON.stringify([hub, id, t]);
        assert.equal(seen.get(address), undefined, `${tuple} collides with ${seen.get(address)}`);
        seen.set(address, tuple);
      }
    }
  }
  assert.equal(seen.size, 2 * ids.length * 4);
});

test("resolving into a hub that does not host the type throws UnhostedTypeError", () => {
  const resolver = makeResolver();
  assert.throws(() => resolver.resolve("publications", "Report", "X", 1), UnhostedTypeError);
  assert.throws(() => resolver.resolve("Plans", "Report", "X", 1), UnhostedTypeError);
});

test("unknown hubs and types are reported as such", () => {
  const resolver = makeResolver();
  assert.throws(() => resolver.resolve("P9", "Report", "X", 1), UnknownHubError);
  assert.throws(() => resolver.resolve("P1", "Ghost", "X", 1), UnknownTypeError);
});

// ═══════════════════════════════════════════════════════════════════════════
// PARSE
// ═══════════════════════════════════════════════════════════════════════════

section("parse");

test("parse inverts resolve", () => {
  const resolver = makeResolver();
  const address = resolver.resolve("P1", "Report", "Product X/2", 12);
  assert.deepEqual(resolver.parse("P1", "Report", address), { logicalId: "Product X/2", timestamp: 12 });
});

test("parse ignores addresses outside the directory or nested below it", () => {
  const resolver = makeResolver();
  assert.equal(resolver.parse("P1", "Report", "inputs/Report/X 1.json"), null);
  assert.equal(resolver.parse("P1", "Report", "publications/P1/Report/.baseline/X 1.json"), null);
  assert.equal(resolver.parse("P1", "Report", "publications/P1/Report/readme.txt"), null);
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
