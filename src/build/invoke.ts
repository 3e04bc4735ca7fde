import { BuildError } from "../errors.js";
import { log as rootLog, type Logger } from "../logger.js";
import { commandOutput, formatCommand, runCommand, type CommandRunner } from "../utils/exec.js";

export const DEFAULT_TARGETS = ["chrome", "chromedriver"];

export interface BuildInvokerOptions {
  treeRoot: string;
  generator?: string;
  runner?: string;
  run?: CommandRunner;
  log?: Logger;
}

/** Generates build files for `outputDir` and builds `targets` with the external tools. */
export async function invokeBuild(outputDir: string, targets: readonly string[], options: BuildInvokerOptions): Promise<void> {
  const run = options.run ?? runCommand;
  const log = options.log ?? rootLog.child("build");
  const steps: Array<[string, string[]]> = [
    [options.generator ?? "gn", ["gen", outputDir, "--fail-on-unused-args"]],
    [options.runner ?? "autoninja", ["-C", outputDir, ...targets]]
  ];

  for (const [command, args] of steps) {
    log.info(formatCommand(command, args));
    const result = await run(command, args, { cwd: options.treeRoot, stream: true });
    if (result.exitCode !== 0) {
      throw new BuildError(command, result.exitCode, commandOutput(result));
    }
  }
  log.success(`Built ${targets.join(", ")} in ${outputDir}`);
}
