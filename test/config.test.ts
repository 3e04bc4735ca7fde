import test from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs/promises";
import path from "node:path";
import { DEFAULT_TARGETS } from "../src/build/invoke.js";
import { applySourceOverride, loadConfig, parseConfig, parseConfigText } from "../src/config/load.js";
import { ConfigError } from "../src/errors.js";
import { Logger } from "../src/logger.js";
import { DEFAULT_CLEAN_EXCLUDE } from "../src/sync/types.js";
import { createTempDir, removeDir } from "../src/utils/fs.js";

const FULL = `
build:
  type: release
  architecture: x64
steps:
  git_setup: true
  apply_patches: false
  package: true
paths:
  chromium_src: ../chromium/src
  patches: patches
sync:
  remote: upstream
  clean_scopes: [out]
  clean_exclude: [third_party, "out/*/gen"]
  fetch_depth: full
  sync_dependencies: false
overlays:
  - name: theme
    source: resources/theme
    destination: chrome/app/theme
  - source: build/icons
    destination: chrome/app/theme/default_100_percent
    required: false
icons:
  script: scripts/generate_icons.sh
  image: assets/icon.png
  output: build/icons
targets: [chrome]
signing:
  script: scripts/sign.sh
packaging:
  script: scripts/package.sh
`;

test("an empty document takes every default relative to the root", () => {
  const config = parseConfig({}, "/proj");
  assert.deepEqual(config.paths, {
    root: "/proj",
    chromiumSrc: "/proj/chromium_src",
    patches: "/proj/patches",
    versionFile: "/proj/CHROMIUM_VERSION",
    flags: "/proj/flags"
  });
  assert.deepEqual(config.steps, {});
  assert.deepEqual(config.sync, {
    remote: "origin",
    cleanScopes: [],
    cleanExclude: DEFAULT_CLEAN_EXCLUDE,
    fetchDepth: 1,
    syncDependencies: true
  });
  assert.deepEqual(config.overlays, []);
  assert.equal(config.icons, null);
  assert.deepEqual(config.targets, DEFAULT_TARGETS);
  assert.equal(config.signing, null);
  assert.equal(config.packaging, null);
  assert.equal(config.build.variant, undefined);
  assert.equal(config.build.architecture, undefined);
});

test("every section is read and paths resolve against the root", () => {
  const config = parseConfigText(FULL, "/proj", "forkstack.yaml");

  assert.equal(config.build.variant, "release");
  assert.equal(config.build.architecture, "x64");
  assert.deepEqual(config.steps, { sync: true, applyPatches: false, package: true });
  assert.equal(config.paths.chromiumSrc, "/chromium/src");
  assert.equal(config.paths.patches, "/proj/patches");
  assert.deepEqual(config.sync, {
    remote: "upstream",
    cleanScopes: ["out"],
    cleanExclude: ["third_party", "out/*/gen"],
    fetchDepth: "full",
    syncDependencies: false
  });
  assert.deepEqual(config.overlays, [
    { name: "theme", source: "/proj/resources/theme", destination: "chrome/app/theme", required: true },
    { name: "icons", source: "/proj/build/icons", destination: "chrome/app/theme/default_100_percent", required: false }
  ]);
  assert.deepEqual(config.icons, {
    script: "/proj/scripts/generate_icons.sh",
    image: "/proj/assets/icon.png",
    outputDir: "/proj/build/icons"
  });
  assert.deepEqual(config.targets, ["chrome"]);
  assert.deepEqual(config.signing, { script: "/proj/scripts/sign.sh" });
  assert.deepEqual(config.packaging, { script: "/proj/scripts/package.sh" });
});

test("all field problems are reported together", () => {
  const text = ["build:", "  type: fast", "steps:", '  clean: "yes"', "sync:", "  fetch_depth: -1", "overlays:", "  - source: res", ""].join("\n");

  assert.throws(
    () => parseConfigText(text, "/proj", "test.yaml"),
    (err: unknown) => {
      assert.ok(err instanceof ConfigError);
      assert.deepEqual(err.issues, [
        "build.type: expected debug or release, got fast",
        "steps.clean: expected true or false",
        'sync.fetch_depth: expected a positive integer or "full"',
        "overlays[0]: source and destination are required"
      ]);
      assert.ok(err.message.startsWith("Invalid test.yaml\n  - build.type"));
      return true;
    }
  );
});

test("an empty clean allow-list is a configuration error", () => {
  assert.throws(
    () => parseConfig({ sync: { clean_exclude: [] } }, "/proj"),
    (err: unknown) => err instanceof ConfigError && err.issues[0] === "sync.clean_exclude: the allow-list must not be empty"
  );
});

test("malformed YAML and non-mapping documents are rejected", () => {
  assert.throws(() => parseConfigText("build: [unclosed", "/proj"), /Failed to parse YAML/);
  assert.throws(() => parseConfigText("- a\n- b\n", "/proj"), /expected a mapping at the top level/);
});

test("loadConfig resolves paths against the file's directory", async () => {
  const tempRoot = await createTempDir("forkstack-config-");
  try {
    const configPath = path.join(tempRoot, "forkstack.yaml");
    await fs.writeFile(configPath, "paths:\n  chromium_src: src\n");

    const config = await loadConfig(configPath);
    assert.equal(config.paths.root, tempRoot);
    assert.equal(config.paths.chromiumSrc, path.join(tempRoot, "src"));

    const defaults = await loadConfig(undefined, tempRoot);
    assert.equal(defaults.paths.versionFile, path.join(tempRoot, "CHROMIUM_VERSION"));

    await assert.rejects(loadConfig(path.join(tempRoot, "missing.yaml")), ConfigError);
  } finally {
    await removeDir(tempRoot);
  }
});

test("a source tree override that does not exist keeps the configured tree", async (t) => {
  const warn = t.mock.method(console, "warn", () => {});
  t.mock.method(console, "log", () => {});
  const tempRoot = await createTempDir("forkstack-config-");
  try {
    const config = parseConfig({ paths: { chromium_src: "src" } }, tempRoot);
    const log = new Logger("test");

    const overridden = await applySourceOverride(config, tempRoot, log);
    assert.equal(overridden.paths.chromiumSrc, tempRoot);
    assert.equal(overridden.paths.patches, config.paths.patches);
    assert.equal(warn.mock.callCount(), 0);

    const missing = path.join(tempRoot, "missing");
    const kept = await applySourceOverride(config, missing, log);
    assert.equal(kept.paths.chromiumSrc, path.join(tempRoot, "src"));
    assert.equal(warn.mock.callCount(), 1);
    assert.ok(String(warn.mock.calls[0].arguments[0]).includes(`Provided source tree does not exist: ${missing}`));

    assert.equal(await applySourceOverride(config, undefined, log), config);
  } finally {
    await removeDir(tempRoot);
  }
});
