import test from "node:test";
import assert from "node:assert/strict";
import {
  PatchConflictError,
  PatchLedgerMismatchError,
  PatchTargetMissingError
} from "../src/errors.js";
import { LEDGER_FILE, readLedger } from "../src/patch/ledger.js";
import { parsePatchFile } from "../src/patch/load.js";
import { applyStack, reverseStack, stackStatus } from "../src/patch/stack.js";
import type { Patch } from "../src/patch/types.js";
import { MemoryTree } from "../src/tree/memory.js";
import { Logger } from "../src/logger.js";

const log = new Logger("test");
const now = () => new Date("2026-01-01T00:00:00.000Z");

function patch(id: string, ...lines: string[]): Patch {
  return parsePatchFile(`${id}.patch`, `${lines.join("\n")}\n`);
}

function baseTree(): MemoryTree {
  return new MemoryTree({
    "src/app.txt": "one\ntwo\nthree\n",
    "src/keep.txt": "x\n"
  });
}

const upperTwo = patch("0001-a", "--- a/src/app.txt", "+++ b/src/app.txt", "@@ -1,3 +1,3 @@", " one", "-two", "+TWO", " three");
const createNew = patch("0002-b", "--- /dev/null", "+++ b/src/new.txt", "@@ -0,0 +1,2 @@", "+a", "+b");
const upperThree = patch("0003-c", "--- a/src/app.txt", "+++ b/src/app.txt", "@@ -2,2 +2,2 @@", " TWO", "-three", "+THREE");
const removeKeep = patch("0002-b", "--- a/src/keep.txt", "+++ /dev/null", "@@ -1 +0,0 @@", "-x");
const conflicting = patch("0002-b", "--- a/src/keep.txt", "+++ b/src/keep.txt", "@@ -1 +1 @@", "-y", "+z");

test("applies the stack in identifier order and records the ledger", async () => {
  const tree = baseTree();
  const report = await applyStack(tree, [upperThree, createNew, upperTwo], { log, now });

  assert.deepEqual(
    report.results.map((r) => [r.id, r.status]),
    [
      ["0001-a", "applied"],
      ["0002-b", "applied"],
      ["0003-c", "applied"]
    ]
  );
  assert.deepEqual(report.applied, ["0001-a", "0002-b", "0003-c"]);
  assert.equal(report.noop, false);
  assert.equal(await tree.readFile("src/app.txt"), "one\nTWO\nTHREE\n");
  assert.equal(await tree.readFile("src/new.txt"), "a\nb\n");
  assert.deepEqual(await readLedger(tree), [
    { id: "0001-a", sha256: upperTwo.sha256, appliedAt: "2026-01-01T00:00:00.000Z", created: [] },
    { id: "0002-b", sha256: createNew.sha256, appliedAt: "2026-01-01T00:00:00.000Z", created: ["src/new.txt"] },
    { id: "0003-c", sha256: upperThree.sha256, appliedAt: "2026-01-01T00:00:00.000Z", created: [] }
  ]);
});

test("applying an already-applied stack changes nothing", async () => {
  const tree = baseTree();
  const stack = [upperTwo, createNew, upperThree];
  await applyStack(tree, stack, { log, now });
  const before = tree.snapshot();
  const mutations = tree.mutations;

  const report = await applyStack(tree, stack, { log, now });

  assert.equal(report.noop, true);
  assert.deepEqual(
    report.results.map((r) => r.status),
    ["already-applied", "already-applied", "already-applied"]
  );
  assert.equal(tree.mutations, mutations);
  assert.deepEqual(tree.snapshot(), before);
});

test("only the patches after the ledger are applied", async () => {
  const tree = baseTree();
  await applyStack(tree, [upperTwo], { log, now });
  const report = await applyStack(tree, [upperTwo, createNew, upperThree], { log, now });

  assert.deepEqual(
    report.results.map((r) => [r.id, r.status]),
    [
      ["0001-a", "already-applied"],
      ["0002-b", "applied"],
      ["0003-c", "applied"]
    ]
  );
});

test("reverse after apply restores the original tree byte for byte", async () => {
  const tree = baseTree();
  const original = tree.snapshot();
  const stack = [upperTwo, createNew, upperThree];
  await applyStack(tree, stack, { log, now });

  const report = await reverseStack(tree, stack, { log });

  assert.deepEqual(
    report.results.map((r) => [r.id, r.status]),
    [
      ["0003-c", "reversed"],
      ["0002-b", "reversed"],
      ["0001-a", "reversed"]
    ]
  );
  assert.deepEqual(report.applied, []);
  assert.deepEqual(tree.snapshot(), original);
  assert.equal(await tree.readFile(LEDGER_FILE), null);
});

test("a patch that deletes a file is undone by recreating it", async () => {
  const tree = baseTree();
  const original = tree.snapshot();
  const stack = [upperTwo, removeKeep];

  const applied = await applyStack(tree, stack, { log, now });

  assert.deepEqual(
    applied.results.map((r) => [r.id, r.status, r.files]),
    [
      ["0001-a", "applied", ["src/app.txt"]],
      ["0002-b", "applied", ["src/keep.txt"]]
    ]
  );
  assert.equal(await tree.readFile("src/keep.txt"), null);
  assert.deepEqual(
    (await readLedger(tree)).map((entry) => entry.created),
    [[], []]
  );

  const reversed = await reverseStack(tree, stack, { log });

  assert.deepEqual(
    reversed.results.map((r) => [r.id, r.status]),
    [
      ["0002-b", "reversed"],
      ["0001-a", "reversed"]
    ]
  );
  assert.deepEqual(tree.snapshot(), original);
});

test("reverse only undoes what the ledger records", async () => {
  const tree = baseTree();
  const stack = [upperTwo, createNew, upperThree];
  await applyStack(tree, [upperTwo], { log, now });

  const report = await reverseStack(tree, stack, { log });

  assert.deepEqual(
    report.results.map((r) => [r.id, r.status]),
    [
      ["0003-c", "not-applied"],
      ["0002-b", "not-applied"],
      ["0001-a", "reversed"]
    ]
  );
  assert.equal(await tree.readFile("src/app.txt"), "one\ntwo\nthree\n");
});

test("reverse on an unpatched tree is a no-op", async () => {
  const tree = baseTree();
  const report = await reverseStack(tree, [upperTwo], { log });
  assert.equal(report.noop, true);
  assert.equal(tree.mutations, 0);
});

test("a conflict stops the run and names the patch and what was applied", async () => {
  const tree = baseTree();

  await assert.rejects(applyStack(tree, [upperTwo, conflicting, upperThree], { log, now }), (err: unknown) => {
    assert.ok(err instanceof PatchConflictError);
    assert.equal(err.patchId, "0002-b");
    assert.equal(err.filePath, "src/keep.txt");
    assert.deepEqual(err.applied, ["0001-a"]);
    return true;
  });

  assert.equal(await tree.readFile("src/app.txt"), "one\nTWO\nthree\n");
  assert.equal(await tree.readFile("src/keep.txt"), "x\n");
  assert.deepEqual(
    (await readLedger(tree)).map((entry) => entry.id),
    ["0001-a"]
  );
});

test("a patch that fails on its second file writes nothing", async () => {
  const tree = baseTree();
  const before = tree.snapshot();
  const multi = patch(
    "0001-multi",
    "diff --git a/src/app.txt b/src/app.txt",
    "--- a/src/app.txt",
    "+++ b/src/app.txt",
    "@@ -1,3 +1,3 @@",
    " one",
    "-two",
    "+TWO",
    " three",
    "diff --git a/src/keep.txt b/src/keep.txt",
    "--- a/src/keep.txt",
    "+++ b/src/keep.txt",
    "@@ -1 +1 @@",
    "-y",
    "+z"
  );

  await assert.rejects(applyStack(tree, [multi], { log, now }), PatchConflictError);
  assert.equal(tree.mutations, 0);
  assert.deepEqual(tree.snapshot(), before);
});

test("modifying a file that does not exist is a missing-target error", async () => {
  const tree = baseTree();
  const missing = patch("0001-missing", "--- a/src/gone.txt", "+++ b/src/gone.txt", "@@ -1 +1 @@", "-x", "+y");

  await assert.rejects(applyStack(tree, [missing], { log, now }), (err: unknown) => {
    assert.ok(err instanceof PatchTargetMissingError);
    assert.equal(err.filePath, "src/gone.txt");
    assert.deepEqual(err.applied, []);
    return true;
  });
});

test("creating a file that already exists is a conflict", async () => {
  const tree = baseTree();
  const create = patch("0001-create", "--- /dev/null", "+++ b/src/keep.txt", "@@ -0,0 +1 @@", "+x");

  await assert.rejects(
    applyStack(tree, [create], { log, now }),
    (err: unknown) => err instanceof PatchConflictError && err.filePath === "src/keep.txt"
  );
});

test("renames move the file and reverse back", async () => {
  const tree = baseTree();
  const original = tree.snapshot();
  const rename = patch(
    "0001-rename",
    "diff --git a/src/keep.txt b/src/kept.txt",
    "--- a/src/keep.txt",
    "+++ b/src/kept.txt",
    "@@ -1 +1 @@",
    "-x",
    "+y"
  );

  await applyStack(tree, [rename], { log, now });
  assert.equal(await tree.readFile("src/keep.txt"), null);
  assert.equal(await tree.readFile("src/kept.txt"), "y\n");

  await reverseStack(tree, [rename], { log });
  assert.deepEqual(tree.snapshot(), original);
});

test("a changed patch no longer matches the ledger", async () => {
  const tree = baseTree();
  await applyStack(tree, [upperTwo], { log, now });
  const edited = patch("0001-a", "--- a/src/app.txt", "+++ b/src/app.txt", "@@ -1,3 +1,3 @@", " one", "-two", "+Two", " three");

  await assert.rejects(
    applyStack(tree, [edited], { log, now }),
    (err: unknown) => err instanceof PatchLedgerMismatchError && err.patchId === "0001-a" && err.action === "apply"
  );
  await assert.rejects(reverseStack(tree, [edited], { log }), PatchLedgerMismatchError);
});

test("status lists applied and pending patches", async () => {
  const tree = baseTree();
  await applyStack(tree, [upperTwo], { log, now });

  assert.deepEqual(await stackStatus(tree, [upperThree, createNew, upperTwo]), {
    applied: ["0001-a"],
    pending: ["0002-b", "0003-c"],
    mismatch: null
  });
  assert.deepEqual(await stackStatus(tree, [upperThree]), {
    applied: ["0001-a"],
    pending: [],
    mismatch: "0001-a: recorded at position 1, where the stack now has 0003-c"
  });
});

test("an aborted signal stops before the next patch", async () => {
  const tree = baseTree();
  const controller = new AbortController();
  controller.abort();

  const report = await applyStack(tree, [upperTwo, createNew], { log, now, signal: controller.signal });
  assert.deepEqual(report.applied, []);
  assert.equal(tree.mutations, 0);
});
