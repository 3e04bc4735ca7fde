import fs from "node:fs/promises";
import path from "node:path";
import { ConfigError } from "../errors.js";
import { log as rootLog, type Logger } from "../logger.js";
import { pathExists, readTextIfExists } from "../utils/fs.js";

export const VARIANTS = ["debug", "release"] as const;
export const ARCHITECTURES = ["arm64", "x64"] as const;

export type BuildVariant = (typeof VARIANTS)[number];
export type Architecture = (typeof ARCHITECTURES)[number];

export const BUILD_CONFIG_FILE = "args.gn";

export interface BuildConfiguration {
  variant: BuildVariant;
  architecture: Architecture;
  /** Output directory relative to the tree root, e.g. `out/Release_x64`. */
  outputDir: string;
  content: string;
}

export function isVariant(value: string): value is BuildVariant {
  return (VARIANTS as readonly string[]).includes(value);
}

export function isArchitecture(value: string): value is Architecture {
  return (ARCHITECTURES as readonly string[]).includes(value);
}

export function outputDirFor(variant: BuildVariant, architecture: Architecture): string {
  const label = variant === "release" ? "Release" : "Debug";
  return `out/${label}_${architecture}`;
}

export interface FlagFragments {
  base: string;
  variant: string;
}

function joinFragments(parts: string[]): string {
  let content = "";
  for (const part of parts) {
    if (content.length > 0 && !content.endsWith("\n")) {
      content += "\n";
    }
    content += part;
  }
  return content;
}

/** Base flags, then variant flags, then the CPU assignment. Later keys win inside the build tool. */
export function composeFlags(fragments: FlagFragments, architecture: Architecture): string {
  return joinFragments([fragments.base, fragments.variant, `target_cpu = "${architecture}"\n`]);
}

export async function readFlagFragments(flagsDir: string, variant: BuildVariant): Promise<FlagFragments> {
  const read = async (name: string) => {
    const filePath = path.join(flagsDir, name);
    const content = await readTextIfExists(filePath);
    if (content === null) {
      throw new ConfigError(`Build flag fragment not found: ${filePath}`);
    }
    return content;
  };
  return { base: await read("base.gn"), variant: await read(`${variant}.gn`) };
}

export async function compose(flagsDir: string, variant: BuildVariant, architecture: Architecture): Promise<BuildConfiguration> {
  const fragments = await readFlagFragments(flagsDir, variant);
  return {
    variant,
    architecture,
    outputDir: outputDirFor(variant, architecture),
    content: composeFlags(fragments, architecture)
  };
}

/**
 * Materializes `args.gn` for a clean build or when it does not exist yet;
 * incremental builds keep the existing file. Returns whether it was written.
 */
export async function writeBuildConfiguration(
  treeRoot: string,
  config: BuildConfiguration,
  clean: boolean,
  log: Logger = rootLog.child("flags")
): Promise<boolean> {
  const target = path.join(treeRoot, config.outputDir, BUILD_CONFIG_FILE);
  if (!clean && (await pathExists(target))) {
    log.info(`Keeping existing ${path.relative(treeRoot, target)}`);
    return false;
  }
  await fs.mkdir(path.dirname(target), { recursive: true });
  await fs.writeFile(target, config.content, "utf8");
  log.info(`Wrote ${path.relative(treeRoot, target)} (${config.variant}, ${config.architecture})`);
  return true;
}
