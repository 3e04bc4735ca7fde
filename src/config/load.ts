import fs from "node:fs/promises";
import path from "node:path";
import * as yaml from "js-yaml";
import { isArchitecture, isVariant } from "../build/flags.js";
import { DEFAULT_TARGETS } from "../build/invoke.js";
import { ConfigError, errorMessage } from "../errors.js";
import { log as rootLog, type Logger } from "../logger.js";
import type { OverlaySpec } from "../resources/overlay.js";
import type { IconPipelineOptions } from "../resources/icons.js";
import { DEFAULT_SYNC_OPTIONS } from "../sync/types.js";
import { pathExists } from "../utils/fs.js";
import { resolveFrom } from "../utils/paths.js";
import type { ForkstackConfig, ReleaseScript, StepFlags, SyncSettings } from "./types.js";

type RawRecord = Record<string, unknown>;

function isRecord(value: unknown): value is RawRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Collects every problem in one pass so the user sees them all at once. */
class Reader {
  readonly issues: string[] = [];

  section(parent: RawRecord, key: string): RawRecord {
    const value = parent[key];
    if (value === undefined || value === null) return {};
    if (!isRecord(value)) {
      this.issues.push(`${key}: expected a mapping`);
      return {};
    }
    return value;
  }

  string(parent: RawRecord, key: string, label: string): string | undefined {
    const value = parent[key];
    if (value === undefined || value === null) return undefined;
    if (typeof value !== "string" || value.trim() === "") {
      this.issues.push(`${label}: expected a non-empty string`);
      return undefined;
    }
    return value;
  }

  boolean(parent: RawRecord, key: string, label: string): boolean | undefined {
    const value = parent[key];
    if (value === undefined || value === null) return undefined;
    if (typeof value !== "boolean") {
      this.issues.push(`${label}: expected true or false`);
      return undefined;
    }
    return value;
  }

  stringList(parent: RawRecord, key: string, label: string): string[] | undefined {
    const value = parent[key];
    if (value === undefined || value === null) return undefined;
    if (!Array.isArray(value) || !value.every((item): item is string => typeof item === "string" && item !== "")) {
      this.issues.push(`${label}: expected a list of strings`);
      return undefined;
    }
    return value;
  }
}

function readSteps(reader: Reader, raw: RawRecord): Partial<StepFlags> {
  const steps: Partial<StepFlags> = {};
  const keys: Array<[keyof StepFlags, string]> = [
    ["sync", "git_setup"],
    ["reset", "reset"],
    ["clean", "clean"],
    ["applyPatches", "apply_patches"],
    ["build", "build"],
    ["sign", "sign"],
    ["package", "package"]
  ];
  for (const [field, key] of keys) {
    const value = reader.boolean(raw, key, `steps.${key}`);
    if (value !== undefined) {
      steps[field] = value;
    }
  }
  return steps;
}

function readSync(reader: Reader, raw: RawRecord): SyncSettings {
  const depth = raw.fetch_depth;
  let fetchDepth = DEFAULT_SYNC_OPTIONS.fetchDepth;
  if (depth === "full") {
    fetchDepth = "full";
  } else if (typeof depth === "number" && Number.isInteger(depth) && depth > 0) {
    fetchDepth = depth;
  } else if (depth !== undefined && depth !== null) {
    reader.issues.push(`sync.fetch_depth: expected a positive integer or "full"`);
  }

  const cleanExclude = reader.stringList(raw, "clean_exclude", "sync.clean_exclude") ?? DEFAULT_SYNC_OPTIONS.cleanExclude;
  if (cleanExclude.length === 0) {
    reader.issues.push("sync.clean_exclude: the allow-list must not be empty");
  }

  return {
    remote: reader.string(raw, "remote", "sync.remote") ?? "origin",
    cleanScopes: reader.stringList(raw, "clean_scopes", "sync.clean_scopes") ?? DEFAULT_SYNC_OPTIONS.cleanScopes,
    cleanExclude,
    fetchDepth,
    syncDependencies: reader.boolean(raw, "sync_dependencies", "sync.sync_dependencies") ?? DEFAULT_SYNC_OPTIONS.syncDependencies
  };
}

function readOverlays(reader: Reader, raw: unknown, root: string): OverlaySpec[] {
  if (raw === undefined || raw === null) return [];
  if (!Array.isArray(raw)) {
    reader.issues.push("overlays: expected a list");
    return [];
  }
  const overlays: OverlaySpec[] = [];
  raw.forEach((entry: unknown, index: number) => {
    const label = `overlays[${index}]`;
    if (!isRecord(entry)) {
      reader.issues.push(`${label}: expected a mapping`);
      return;
    }
    const source = reader.string(entry, "source", `${label}.source`);
    const destination = reader.string(entry, "destination", `${label}.destination`);
    const required = reader.boolean(entry, "required", `${label}.required`) ?? true;
    if (source === undefined || destination === undefined) {
      reader.issues.push(`${label}: source and destination are required`);
      return;
    }
    overlays.push({
      name: reader.string(entry, "name", `${label}.name`) ?? path.basename(source),
      source: resolveFrom(root, source),
      destination,
      required
    });
  });
  return overlays;
}

function readIcons(reader: Reader, raw: RawRecord, root: string): IconPipelineOptions | null {
  if (Object.keys(raw).length === 0) return null;
  const script = reader.string(raw, "script", "icons.script");
  const image = reader.string(raw, "image", "icons.image");
  const output = reader.string(raw, "output", "icons.output");
  if (script === undefined || image === undefined || output === undefined) {
    reader.issues.push("icons: script, image and output are required");
    return null;
  }
  return { script: resolveFrom(root, script), image: resolveFrom(root, image), outputDir: resolveFrom(root, output) };
}

function readReleaseScript(reader: Reader, raw: RawRecord, section: string, root: string): ReleaseScript | null {
  const script = reader.string(raw, "script", `${section}.script`);
  return script !== undefined ? { script: resolveFrom(root, script) } : null;
}

/** Validates a parsed configuration document. Relative paths resolve against `root`. */
export function parseConfig(raw: unknown, root: string, source = "configuration"): ForkstackConfig {
  if (raw === undefined || raw === null) {
    raw = {};
  }
  if (!isRecord(raw)) {
    throw new ConfigError(`Invalid ${source}: expected a mapping at the top level`);
  }
  const reader = new Reader();

  const build = reader.section(raw, "build");
  const type = reader.string(build, "type", "build.type");
  const architecture = reader.string(build, "architecture", "build.architecture");
  if (type !== undefined && !isVariant(type)) {
    reader.issues.push(`build.type: expected debug or release, got ${type}`);
  }
  if (architecture !== undefined && !isArchitecture(architecture)) {
    reader.issues.push(`build.architecture: expected arm64 or x64, got ${architecture}`);
  }

  const paths = reader.section(raw, "paths");

  const config: ForkstackConfig = {
    paths: {
      root,
      chromiumSrc: resolveFrom(root, reader.string(paths, "chromium_src", "paths.chromium_src") ?? "chromium_src"),
      patches: resolveFrom(root, reader.string(paths, "patches", "paths.patches") ?? "patches"),
      versionFile: resolveFrom(root, reader.string(paths, "version_file", "paths.version_file") ?? "CHROMIUM_VERSION"),
      flags: resolveFrom(root, reader.string(paths, "flags", "paths.flags") ?? "flags")
    },
    build: {
      variant: type !== undefined && isVariant(type) ? type : undefined,
      architecture: architecture !== undefined && isArchitecture(architecture) ? architecture : undefined
    },
    steps: readSteps(reader, reader.section(raw, "steps")),
    sync: readSync(reader, reader.section(raw, "sync")),
    overlays: readOverlays(reader, raw.overlays, root),
    icons: readIcons(reader, reader.section(raw, "icons"), root),
    targets: reader.stringList(raw, "targets", "targets") ?? DEFAULT_TARGETS,
    signing: readReleaseScript(reader, reader.section(raw, "signing"), "signing", root),
    packaging: readReleaseScript(reader, reader.section(raw, "packaging"), "packaging", root)
  };

  if (reader.issues.length > 0) {
    throw new ConfigError(`Invalid ${source}`, reader.issues);
  }
  return config;
}

export function parseConfigText(text: string, root: string, source = "configuration"): ForkstackConfig {
  let raw: unknown;
  try {
    raw = yaml.load(text);
  } catch (err) {
    throw new ConfigError(`Failed to parse YAML in ${source}: ${errorMessage(err)}`);
  }
  return parseConfig(raw, root, source);
}

/** Loads a YAML configuration file; without one, every setting takes its default relative to `cwd`. */
export async function loadConfig(configFile: string | undefined, cwd = process.cwd()): Promise<ForkstackConfig> {
  if (configFile === undefined) {
    return parseConfig({}, path.resolve(cwd), "defaults");
  }
  const filePath = path.resolve(cwd, configFile);
  let text: string;
  try {
    text = await fs.readFile(filePath, "utf8");
  } catch (err) {
    throw new ConfigError(`Failed to read config file ${filePath}: ${errorMessage(err)}`);
  }
  return parseConfigText(text, path.dirname(filePath), path.basename(filePath));
}

/**
 * Replaces the source tree location with one given on the command line. A
 * directory that does not exist is reported and the configured one is kept.
 */
export async function applySourceOverride(
  config: ForkstackConfig,
  dir: string | undefined,
  log: Logger = rootLog.child("config")
): Promise<ForkstackConfig> {
  if (dir === undefined) {
    return config;
  }
  const chromiumSrc = path.resolve(dir);
  if (!(await pathExists(chromiumSrc))) {
    log.warn(`Provided source tree does not exist: ${chromiumSrc}`);
    log.info(`Using ${config.paths.chromiumSrc}`);
    return config;
  }
  return { ...config, paths: { ...config.paths, chromiumSrc } };
}
