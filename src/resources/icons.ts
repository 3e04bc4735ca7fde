import path from "node:path";
import { BuildError, ConfigError } from "../errors.js";
import { log as rootLog, type Logger } from "../logger.js";
import { commandOutput, runCommand, type CommandRunner } from "../utils/exec.js";
import { pathExists } from "../utils/fs.js";

export interface IconPipelineOptions {
  /** Generator script, invoked as `<script> <image> <outputDir>`. */
  script: string;
  image: string;
  outputDir: string;
}

export type IconPipelineOutcome = { status: "generated"; outputDir: string } | { status: "skipped"; reason: string };

/**
 * Runs the external icon-asset generator. A missing source image only warns:
 * the generated icon sets are optional, unlike the primary resource overlays.
 */
export async function generateIcons(
  options: IconPipelineOptions,
  run: CommandRunner = runCommand,
  log: Logger = rootLog.child("icons")
): Promise<IconPipelineOutcome> {
  const image = path.resolve(options.image);
  if (!(await pathExists(image))) {
    const reason = `source image not found: ${image}`;
    log.warn(`Skipping icon generation: ${reason}`);
    return { status: "skipped", reason };
  }
  const script = path.resolve(options.script);
  if (!(await pathExists(script))) {
    throw new ConfigError(`Icon generator script not found: ${script}`);
  }
  const outputDir = path.resolve(options.outputDir);
  log.info(`Generating icons from ${image}`);
  const result = await run(script, [image, outputDir], { stream: true });
  if (result.exitCode !== 0) {
    throw new BuildError(path.basename(script), result.exitCode, commandOutput(result));
  }
  return { status: "generated", outputDir };
}
