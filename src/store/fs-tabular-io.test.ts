/**
 * Filesystem tabular I/O tests. Each test works in its own temp directory.
 *
 * Run: node --import tsx src/store/fs-tabular-io.test.ts
 */

import { strict as assert } from "node:assert";
import { mkdtemp, mkdir, readdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import type { Table } from "../table/index.js";
import { CorruptArtifactError, FileSystemTabularIO, InvalidAddressError } from "./index.js";

// ═══════════════════════════════════════════════════════════════════════════
// TEST HELPERS
// ═══════════════════════════════════════════════════════════════════════════

let passed = 0;
let failed = 0;

async function test(name: string, fn: (root: string) => Promise<void>): Promise<void> {
  const root = await mkdtemp(join(tmpdir(), "fs-tabular-io-"));
  try {
    await fn(root);
    passed++;
    console.log(`  ✓ ${name}`);
  } catch (err) {
    failed++;
    console.error(`  ✗ ${name}`);
    console.error(`    ${err instanceof Error ? err.message : String(err)}`);
  } finally {
    await rm(root, { recursive: true, force: true });
  }
}

function section(title: string): void {
  console.log(`\n── ${title} ──`);
}

const TABLE: Table = {
  columns: ["Task", "Hours"],
  rows: [
    { Task: "Task7", Hours: 3 },
    { Task: "Task8", Hours: null },
  ],
};

// ═══════════════════════════════════════════════════════════════════════════
// READ / WRITE
// ═══════════════════════════════════════════════════════════════════════════

section("read / write");

await test("write then read returns the table", async (root) => {
  const io = new FileSystemTabularIO(root);
  await io.write("inputs/Report/ProductX 1.json", TABLE);
  assert.deepEqual(await io.read("inputs/Report/ProductX 1.json"), TABLE);
  assert.equal(await io.exists("inputs/Report/ProductX 1.json"), true);
});

await test("missing addresses read as undefined", async (root) => {
  const io = new FileSystemTabularIO(root);
  assert.equal(await io.read("inputs/Report/nothing.json"), undefined);
  assert.equal(await io.exists("inputs/Report/nothing.json"), false);
});

await test("a folder is not an existing artifact", async (root) => {
  const io = new FileSystemTabularIO(root);
  await io.write("inputs/Report/a.json", TABLE);
  assert.equal(await io.exists("inputs/Report"), false);
});

await test("write leaves no temporary files behind", async (root) => {
  const io = new FileSystemTabularIO(root);
  await io.write("a/b.json", TABLE);
  await io.write("a/b.json", { columns: ["Task"], rows: [] });
  assert.deepEqual(await readdir(join(root, "a")), ["b.json"]);
  assert.deepEqual(await io.read("a/b.json"), { columns: ["Task"], rows: [] });
});

await test("unparseable content throws CorruptArtifactError", async (root) => {
  const io = new FileSystemTabularIO(root);
  await mkdir(join(root, "a"), { recursive: true });
  await writeFile(join(root, "a", "broken.json"), "{not json", "utf-8");
  await writeFile(join(root, "a", "shape.json"), JSON.stringify({ columns: "Task" }), "utf-8");

  await assert.rejects(io.read("a/broken.json"), CorruptArtifactError);
  await assert.rejects(io.read("a/shape.json"), CorruptArtifactError);
});

await test("addresses escaping the root are rejected", async (root) => {
  const io = new FileSystemTabularIO(root);
  await assert.rejects(io.read("../outside.json"), InvalidAddressError);
  await assert.rejects(io.write("a//b.json", TABLE), InvalidAddressError);
});

// ═══════════════════════════════════════════════════════════════════════════
// LIST / REMOVE
// ═══════════════════════════════════════════════════════════════════════════

section("list / remove");

await test("list is recursive, sorted and skips temporary files", async (root) => {
  const io = new FileSystemTabularIO(root);
  await io.write("hub/Report/b 2.json", TABLE);
  await io.write("hub/Report/a 1.json", TABLE);
  await io.write("hub/Report/.baseline/a 1.json", TABLE);
  await io.write("other/Report/c 1.json", TABLE);
  await writeFile(join(root, "hub", "Report", "a 3.json.0a1b2c3d.tmp"), "{}", "utf-8");

  assert.deepEqual(await io.list("hub/Report"), [
    "hub/Report/.baseline/a 1.json",
    "hub/Report/a 1.json",
    "hub/Report/b 2.json",
  ]);
  assert.deepEqual(await io.list("missing"), []);
});

await test("remove deletes only the given folder", async (root) => {
  const io = new FileSystemTabularIO(root);
  await io.write("hub/Report/a 1.json", TABLE);
  await io.write("other/Report/c 1.json", TABLE);

  await io.remove("hub");
  assert.deepEqual(await io.list(""), ["other/Report/c 1.json"]);
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
