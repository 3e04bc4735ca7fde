#!/usr/bin/env node
import { Command } from "commander";
import { compose, writeBuildConfiguration } from "./build/flags.js";
import { applySourceOverride, loadConfig } from "./config/load.js";
import { resolveBuildOptions, type BuildOptions, type CliFlags } from "./config/options.js";
import { ReadlinePromptProvider } from "./config/prompt.js";
import type { ForkstackConfig, StepFlags } from "./config/types.js";
import { errorMessage, PatchStackError, SyncError } from "./errors.js";
import { log } from "./logger.js";
import { loadPatchStack } from "./patch/load.js";
import { applyStack, reverseStack, stackStatus } from "./patch/stack.js";
import type { ApplyReport } from "./patch/types.js";
import { runPipeline, type PipelineResult } from "./pipeline.js";
import { DirectoryTree } from "./tree/directory.js";
import { withTreeLock } from "./tree/lock.js";
import { VersionPin } from "./version/pin.js";

const EXIT_FAILURE = 1;
const EXIT_INTERRUPTED = 130;

interface ProjectOptions {
  config?: string;
  chromiumSrc?: string;
}

interface BuildCommandOptions extends ProjectOptions {
  release?: boolean;
  nonInteractive?: boolean;
  sync?: boolean;
  reset?: boolean;
  clean?: boolean;
  applyPatches?: boolean;
  build?: boolean;
  sign?: boolean;
  package?: boolean;
}

interface ComposeCommandOptions extends ProjectOptions {
  release?: boolean;
  write?: boolean;
}

const interrupt = new AbortController();
for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.on(signal, () => {
    if (interrupt.signal.aborted) return;
    log.warn(`Received ${signal}, stopping after the running step`);
    interrupt.abort();
  });
}

async function loadProject(options: ProjectOptions): Promise<ForkstackConfig> {
  return applySourceOverride(await loadConfig(options.config), options.chromiumSrc);
}

function reportError(err: unknown): void {
  log.error(errorMessage(err));
  if (err instanceof SyncError && err.output) {
    console.error(err.output);
  }
  if (err instanceof PatchStackError) {
    log.error(`Tree left with ${err.applied.length} patches applied; reverse them or sync with --reset to recover`);
  }
}

function fail(err: unknown): void {
  reportError(err);
  process.exitCode = interrupt.signal.aborted ? EXIT_INTERRUPTED : EXIT_FAILURE;
}

function finish(result: PipelineResult): void {
  for (const stage of result.stages) {
    console.log(`  ${stage.stage.padEnd(10)} ${stage.status}${stage.detail ? `  ${stage.detail}` : ""}`);
  }
  if (result.interrupted || interrupt.signal.aborted) {
    process.exitCode = EXIT_INTERRUPTED;
  } else if (!result.ok) {
    log.error(`Stage ${result.failedStage ?? "unknown"} failed`);
    fail(result.error);
  }
}

function printReport(report: ApplyReport): void {
  for (const result of report.results) {
    console.log(`  ${result.status.padEnd(16)} ${result.id}`);
  }
  console.log(report.noop ? "Nothing to do." : `Applied patches: ${report.applied.length}`);
}

function withProjectOptions(command: Command): Command {
  return command
    .option("-c, --config <file>", "YAML configuration file")
    .option("-S, --chromium-src <dir>", "Upstream source tree (overrides paths.chromium_src)");
}

const program = new Command();

program
  .name("forkstack")
  .description("Build driver for a browser fork kept as a patch stack on top of upstream sources.")
  .version("0.1.0");

withProjectOptions(
  program
    .command("build")
    .description("Run the full pipeline: sync, patch, overlay resources, compose flags, build, sign, package.")
    .argument("[arch]", "Target architecture (arm64 or x64)")
)
  .option("-r, --release", "Build the release variant (default: debug)")
  .option("-y, --non-interactive", "Never prompt; unset steps are skipped")
  .option("--sync", "Fetch and check out the pinned upstream revision")
  .option("--no-sync", "Do not sync the source tree")
  .option("--reset", "Discard tracked modifications before syncing")
  .option("--no-reset", "Keep tracked modifications")
  .option("--clean", "Remove untracked build output and rewrite args.gn")
  .option("--no-clean", "Keep untracked files and an existing args.gn")
  .option("--apply-patches", "Apply the patch stack and copy resources")
  .option("--no-apply-patches", "Leave the tree unpatched")
  .option("--build", "Run the build")
  .option("--no-build", "Skip composing flags and building")
  .option("-s, --sign", "Sign the build")
  .option("--no-sign", "Skip signing")
  .option("-P, --package", "Create the distributable package")
  .option("--no-package", "Skip packaging")
  .action(async (arch: string | undefined, opts: BuildCommandOptions) => {
    try {
      const config = await loadProject(opts);
      const steps: Partial<StepFlags> = {
        sync: opts.sync,
        reset: opts.reset,
        clean: opts.clean,
        applyPatches: opts.applyPatches,
        build: opts.build,
        sign: opts.sign,
        package: opts.package
      };
      const flags: CliFlags = { architecture: arch, release: opts.release, steps };
      const interactive = !opts.nonInteractive && process.stdin.isTTY === true;
      const options = await resolveBuildOptions(flags, config, interactive ? new ReadlinePromptProvider() : null);
      log.info(`Building ${options.variant} for ${options.architecture}`);
      finish(await runPipeline(config, options, { signal: interrupt.signal }));
    } catch (err) {
      fail(err);
    }
  });

withProjectOptions(
  program.command("sync").description("Bring the source tree to the pinned upstream revision.")
)
  .option("--reset", "Discard tracked modifications first")
  .option("--clean", "Remove untracked build output (allow-listed paths are kept)")
  .action(async (opts: ProjectOptions & { reset?: boolean; clean?: boolean }) => {
    try {
      const config = await loadProject(opts);
      const options: BuildOptions = {
        variant: config.build.variant ?? "debug",
        architecture: config.build.architecture ?? "arm64",
        steps: {
          sync: true,
          reset: opts.reset ?? config.steps.reset ?? false,
          clean: opts.clean ?? config.steps.clean ?? false,
          applyPatches: false,
          build: false,
          sign: false,
          package: false
        }
      };
      finish(await runPipeline(config, options, { signal: interrupt.signal }));
    } catch (err) {
      fail(err);
    }
  });

const patch = program.command("patch").description("Manage the patch stack in the source tree.");

async function patchAction(opts: ProjectOptions, action: "apply" | "reverse"): Promise<void> {
  try {
    const config = await loadProject(opts);
    const tree = new DirectoryTree(config.paths.chromiumSrc);
    const patches = await loadPatchStack(config.paths.patches);
    const report = await withTreeLock(tree.root, () =>
      action === "apply"
        ? applyStack(tree, patches, { signal: interrupt.signal })
        : reverseStack(tree, patches, { signal: interrupt.signal })
    );
    printReport(report);
    if (interrupt.signal.aborted) {
      process.exitCode = EXIT_INTERRUPTED;
    }
  } catch (err) {
    fail(err);
  }
}

withProjectOptions(patch.command("apply").description("Apply every pending patch in order.")).action(
  (opts: ProjectOptions) => patchAction(opts, "apply")
);

withProjectOptions(patch.command("reverse").description("Undo the applied patches, newest first.")).action(
  (opts: ProjectOptions) => patchAction(opts, "reverse")
);

withProjectOptions(patch.command("status").description("Show applied and pending patches.")).action(
  async (opts: ProjectOptions) => {
    try {
      const config = await loadProject(opts);
      const status = await stackStatus(
        new DirectoryTree(config.paths.chromiumSrc),
        await loadPatchStack(config.paths.patches)
      );
      for (const id of status.applied) console.log(`  applied  ${id}`);
      for (const id of status.pending) console.log(`  pending  ${id}`);
      if (status.mismatch) {
        log.error(`Ledger does not match the patch stack: ${status.mismatch}`);
        process.exitCode = EXIT_FAILURE;
      }
    } catch (err) {
      fail(err);
    }
  }
);

withProjectOptions(
  program
    .command("compose")
    .description("Print the composed args.gn for a variant and architecture.")
    .argument("[arch]", "Target architecture (arm64 or x64)")
)
  .option("-r, --release", "Compose the release variant")
  .option("-w, --write", "Write the file into the output directory instead of printing it")
  .action(async (arch: string | undefined, opts: ComposeCommandOptions) => {
    try {
      const config = await loadProject(opts);
      const { variant, architecture } = await resolveBuildOptions(
        { architecture: arch, release: opts.release, steps: {} },
        config,
        null
      );
      const configuration = await compose(config.paths.flags, variant, architecture);
      if (opts.write) {
        await writeBuildConfiguration(config.paths.chromiumSrc, configuration, true);
      } else {
        process.stdout.write(configuration.content);
      }
    } catch (err) {
      fail(err);
    }
  });

withProjectOptions(program.command("version").description("Print the pinned upstream revision.")).action(
  async (opts: ProjectOptions) => {
    try {
      const config = await loadProject(opts);
      console.log(await new VersionPin(config.paths.versionFile).resolve());
    } catch (err) {
      fail(err);
    }
  }
);

await program.parseAsync(process.argv);
