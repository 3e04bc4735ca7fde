import { compose, writeBuildConfiguration, type Architecture, type BuildVariant } from "./build/flags.js";
import { invokeBuild } from "./build/invoke.js";
import { runReleaseStep, type ReleaseStep } from "./build/package.js";
import type { BuildOptions } from "./config/options.js";
import type { ForkstackConfig, ReleaseScript } from "./config/types.js";
import { ConfigError, errorMessage } from "./errors.js";
import { log as rootLog, type Logger } from "./logger.js";
import { loadPatchStack } from "./patch/load.js";
import { applyStack } from "./patch/stack.js";
import { generateIcons } from "./resources/icons.js";
import { overlayResources } from "./resources/overlay.js";
import { GitRepository } from "./sync/git.js";
import { syncSourceTree } from "./sync/sync.js";
import type { Repository } from "./sync/types.js";
import { DirectoryTree } from "./tree/directory.js";
import { acquireTreeLock, type TreeLock } from "./tree/lock.js";
import type { TreeFileSystem } from "./tree/types.js";
import { runCommand, type CommandRunner } from "./utils/exec.js";
import { VersionPin } from "./version/pin.js";

export const STAGES = ["version", "sync", "patches", "resources", "flags", "build", "sign", "package"] as const;
export type StageName = (typeof STAGES)[number];

export interface StageResult {
  stage: StageName;
  status: "completed" | "skipped" | "failed";
  detail?: string;
}

export interface PipelineResult {
  ok: boolean;
  stages: StageResult[];
  failedStage?: StageName;
  error?: unknown;
  /** Set when the run stopped between stages because `signal` fired. */
  interrupted: boolean;
  elapsedMs: number;
}

/** Progress reported to `notify`, for chat or desktop notifications. */
export type PipelineEvent =
  | { type: "started"; variant: BuildVariant; architecture: Architecture }
  | { type: "stage"; stage: StageName; detail: string }
  | { type: "succeeded"; elapsedMs: number }
  | { type: "failed"; stage: StageName; message: string; elapsedMs: number }
  | { type: "interrupted"; elapsedMs: number };

export interface PipelineDependencies {
  repository?: Repository;
  tree?: TreeFileSystem;
  run?: CommandRunner;
  log?: Logger;
  /** Checked between stages; the running stage is always allowed to finish. */
  signal?: AbortSignal;
  notify?: (event: PipelineEvent) => void;
  /** Clock in milliseconds, for the elapsed time summary. */
  now?: () => number;
}

export function formatElapsed(ms: number): string {
  const seconds = Math.floor(ms / 1000);
  return `${Math.floor(seconds / 60)}m ${seconds % 60}s`;
}

interface Stage {
  name: StageName;
  enabled: boolean;
  /** Stages that modify the source tree run under the tree lock. */
  locked: boolean;
  run(): Promise<string>;
}

/**
 * Runs every enabled stage in order and stops at the first failure. Errors are
 * reported in the result rather than thrown so the caller can map them to an
 * exit code.
 */
export async function runPipeline(
  config: ForkstackConfig,
  options: BuildOptions,
  deps: PipelineDependencies = {}
): Promise<PipelineResult> {
  const log = deps.log ?? rootLog.child("pipeline");
  const run = deps.run ?? runCommand;
  const treeRoot = config.paths.chromiumSrc;
  const tree = deps.tree ?? new DirectoryTree(treeRoot);
  const repository =
    deps.repository ?? new GitRepository(treeRoot, { remote: config.sync.remote, run, log: log.child("git") });
  const pin = new VersionPin(config.paths.versionFile);
  const { steps } = options;
  const now = deps.now ?? Date.now;
  const startedAt = now();
  const notify = deps.notify ?? (() => {});

  let outputDir: string | null = null;

  if (!steps.sync && (steps.reset || steps.clean)) {
    log.warn("Reset and untracked cleaning only take effect together with sync");
  }

  const releaseStage = (step: ReleaseStep, release: ReleaseScript | null): Stage => ({
    name: step,
    enabled: steps[step],
    locked: false,
    run: async () => {
      if (!release) {
        const section = step === "sign" ? "signing" : "packaging";
        throw new ConfigError(`The ${step} step was requested but no ${section}.script is configured`);
      }
      const dir = outputDir ?? (await compose(config.paths.flags, options.variant, options.architecture)).outputDir;
      await runReleaseStep(
        {
          step,
          script: release.script,
          treeRoot,
          outputDir: dir,
          architecture: options.architecture,
          variant: options.variant
        },
        run,
        log.child(step)
      );
      return dir;
    }
  });

  const stages: Stage[] = [
    {
      name: "version",
      enabled: true,
      locked: false,
      run: async () => {
        const revision = await pin.resolve();
        log.info(`Pinned upstream revision: ${revision}`);
        return revision;
      }
    },
    {
      name: "sync",
      enabled: steps.sync,
      locked: true,
      run: async () => {
        const result = await syncSourceTree({ repository, tree, log: log.child("sync") }, await pin.resolve(), {
          resetTracked: steps.reset,
          cleanUntracked: steps.clean,
          cleanScopes: config.sync.cleanScopes,
          cleanExclude: config.sync.cleanExclude,
          fetchDepth: config.sync.fetchDepth,
          syncDependencies: config.sync.syncDependencies
        });
        return `${result.revision} (${result.commit})`;
      }
    },
    {
      name: "patches",
      enabled: steps.applyPatches,
      locked: true,
      run: async () => {
        const patches = await loadPatchStack(config.paths.patches);
        const report = await applyStack(tree, patches, { log: log.child("patches"), signal: deps.signal });
        const applied = report.results.filter((r) => r.status === "applied").length;
        return `${applied} applied, ${report.results.length - applied} already applied`;
      }
    },
    {
      name: "resources",
      enabled: steps.applyPatches,
      locked: true,
      run: async () => {
        if (config.icons) {
          await generateIcons(config.icons, run, log.child("icons"));
        }
        const outcomes = await overlayResources(treeRoot, config.overlays, log.child("resources"));
        const copied = outcomes.filter((o) => o.status === "copied").length;
        return `${copied} of ${outcomes.length} overlays copied`;
      }
    },
    {
      name: "flags",
      enabled: steps.build,
      locked: false,
      run: async () => {
        const configuration = await compose(config.paths.flags, options.variant, options.architecture);
        outputDir = configuration.outputDir;
        const written = await writeBuildConfiguration(treeRoot, configuration, steps.clean, log.child("flags"));
        return `${configuration.outputDir} (${written ? "written" : "kept"})`;
      }
    },
    {
      name: "build",
      enabled: steps.build,
      locked: false,
      run: async () => {
        const dir = outputDir ?? (await compose(config.paths.flags, options.variant, options.architecture)).outputDir;
        await invokeBuild(dir, config.targets, { treeRoot, run, log: log.child("build") });
        return config.targets.join(", ");
      }
    },
    releaseStage("sign", config.signing),
    releaseStage("package", config.packaging)
  ];

  const results: StageResult[] = [];
  let lock: TreeLock | null = null;
  notify({ type: "started", variant: options.variant, architecture: options.architecture });
  try {
    for (const [index, stage] of stages.entries()) {
      if (deps.signal?.aborted) {
        log.warn(`Interrupted before ${stage.name}`);
        for (const rest of stages.slice(index)) {
          results.push({ stage: rest.name, status: "skipped" });
        }
        const elapsedMs = now() - startedAt;
        notify({ type: "interrupted", elapsedMs });
        return { ok: false, stages: results, interrupted: true, elapsedMs };
      }
      if (!stage.enabled) {
        results.push({ stage: stage.name, status: "skipped" });
        continue;
      }
      try {
        if (stage.locked && lock === null) {
          lock = await acquireTreeLock(treeRoot, log.child("lock"));
        }
        const detail = await stage.run();
        results.push({ stage: stage.name, status: "completed", detail });
        notify({ type: "stage", stage: stage.name, detail });
      } catch (error) {
        results.push({ stage: stage.name, status: "failed" });
        for (const rest of stages.slice(index + 1)) {
          results.push({ stage: rest.name, status: "skipped" });
        }
        const elapsedMs = now() - startedAt;
        notify({ type: "failed", stage: stage.name, message: errorMessage(error), elapsedMs });
        return { ok: false, stages: results, failedStage: stage.name, error, interrupted: false, elapsedMs };
      }
    }
  } finally {
    await lock?.release();
  }

  const elapsedMs = now() - startedAt;
  log.success(`Build completed in ${formatElapsed(elapsedMs)}`);
  notify({ type: "succeeded", elapsedMs });
  return { ok: true, stages: results, interrupted: false, elapsedMs };
}
