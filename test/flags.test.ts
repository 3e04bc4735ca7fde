import test from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs/promises";
import path from "node:path";
import {
  compose,
  composeFlags,
  isArchitecture,
  isVariant,
  outputDirFor,
  writeBuildConfiguration
} from "../src/build/flags.js";
import { ConfigError } from "../src/errors.js";
import { Logger } from "../src/logger.js";
import { createTempDir, removeDir } from "../src/utils/fs.js";

const log = new Logger("test");
const BASE = 'is_component_build = false\nenable_nacl = false\n';
const RELEASE = "is_debug = false\nsymbol_level = 0\n";
const DEBUG = "is_debug = true\n";

async function withFlagsDir(fn: (dir: string) => Promise<void>): Promise<void> {
  const tempRoot = await createTempDir("forkstack-flags-");
  try {
    await fs.writeFile(path.join(tempRoot, "base.gn"), BASE);
    await fs.writeFile(path.join(tempRoot, "release.gn"), RELEASE);
    await fs.writeFile(path.join(tempRoot, "debug.gn"), DEBUG);
    await fn(tempRoot);
  } finally {
    await removeDir(tempRoot);
  }
}

test("release x64 is base, then release, then the CPU line", async () => {
  await withFlagsDir(async (dir) => {
    const config = await compose(dir, "release", "x64");
    assert.equal(config.content, `${BASE}${RELEASE}target_cpu = "x64"\n`);
    assert.equal(config.outputDir, "out/Release_x64");
    assert.equal(config.variant, "release");
    assert.equal(config.architecture, "x64");
  });
});

test("debug arm64 uses the debug fragment and directory", async () => {
  await withFlagsDir(async (dir) => {
    const config = await compose(dir, "debug", "arm64");
    assert.equal(config.content, `${BASE}${DEBUG}target_cpu = "arm64"\n`);
    assert.equal(config.outputDir, "out/Debug_arm64");
  });
});

test("a fragment without a trailing newline still leaves the CPU line on its own line", () => {
  assert.equal(
    composeFlags({ base: "a = 1", variant: "b = 2" }, "x64"),
    'a = 1\nb = 2\ntarget_cpu = "x64"\n'
  );
  assert.equal(composeFlags({ base: "", variant: "" }, "arm64"), 'target_cpu = "arm64"\n');
});

test("a missing fragment is a ConfigError", async () => {
  await withFlagsDir(async (dir) => {
    await fs.rm(path.join(dir, "release.gn"));
    await assert.rejects(compose(dir, "release", "x64"), ConfigError);
  });
});

test("args.gn is kept on incremental builds and rewritten on clean ones", async () => {
  const treeRoot = await createTempDir("forkstack-tree-");
  try {
    const argsPath = path.join(treeRoot, "out", "Debug_x64", "args.gn");
    const config = { variant: "debug" as const, architecture: "x64" as const, outputDir: outputDirFor("debug", "x64"), content: "v1\n" };

    assert.equal(await writeBuildConfiguration(treeRoot, config, false, log), true);
    assert.equal(await fs.readFile(argsPath, "utf8"), "v1\n");

    assert.equal(await writeBuildConfiguration(treeRoot, { ...config, content: "v2\n" }, false, log), false);
    assert.equal(await fs.readFile(argsPath, "utf8"), "v1\n");

    assert.equal(await writeBuildConfiguration(treeRoot, { ...config, content: "v3\n" }, true, log), true);
    assert.equal(await fs.readFile(argsPath, "utf8"), "v3\n");
  } finally {
    await removeDir(treeRoot);
  }
});

test("variant and architecture guards", () => {
  assert.equal(isVariant("release"), true);
  assert.equal(isVariant("Release"), false);
  assert.equal(isArchitecture("arm64"), true);
  assert.equal(isArchitecture("x86"), false);
});
