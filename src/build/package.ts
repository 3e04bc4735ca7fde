import path from "node:path";
import { BuildError, ConfigError } from "../errors.js";
import { log as rootLog, type Logger } from "../logger.js";
import { commandOutput, runCommand, type CommandRunner } from "../utils/exec.js";
import { pathExists } from "../utils/fs.js";
import type { Architecture, BuildVariant } from "./flags.js";

export type ReleaseStep = "sign" | "package";

export interface ReleaseStepRequest {
  step: ReleaseStep;
  /** Receives the build output directory, architecture and variant as arguments. */
  script: string;
  treeRoot: string;
  outputDir: string;
  architecture: Architecture;
  variant: BuildVariant;
}

const STEP_LABELS: Record<ReleaseStep, string> = {
  sign: "Signing",
  package: "Packaging"
};

/** Runs the signing or packaging script against a finished build. */
export async function runReleaseStep(
  request: ReleaseStepRequest,
  run: CommandRunner = runCommand,
  log: Logger = rootLog.child(request.step)
): Promise<void> {
  const label = STEP_LABELS[request.step];
  const script = path.resolve(request.script);
  if (!(await pathExists(script))) {
    throw new ConfigError(`${label} script not found: ${script}`);
  }
  const outputDir = path.join(request.treeRoot, request.outputDir);
  log.info(`${label} ${outputDir}`);
  const result = await run(script, [outputDir, request.architecture, request.variant], {
    cwd: request.treeRoot,
    stream: true
  });
  if (result.exitCode !== 0) {
    throw new BuildError(path.basename(script), result.exitCode, commandOutput(result));
  }
  log.success(`${label} complete`);
}
