import { isArchitecture, type Architecture, type BuildVariant } from "../build/flags.js";
import { ConfigError } from "../errors.js";
import type { PromptProvider } from "./prompt.js";
import { STEP_NAMES, type ForkstackConfig, type StepFlags } from "./types.js";

/** Values given on the command line; `undefined` means the flag was not passed. */
export interface CliFlags {
  architecture?: string;
  release?: boolean;
  steps: Partial<StepFlags>;
}

export interface BuildOptions {
  variant: BuildVariant;
  architecture: Architecture;
  steps: StepFlags;
}

export const DEFAULT_ARCHITECTURE: Architecture = "arm64";

const STEP_QUESTIONS: Record<keyof StepFlags, string | null> = {
  sync: "Fetch and check out the pinned upstream revision?",
  reset: "Discard all tracked modifications in the source tree?",
  clean: "Remove untracked build output and start a clean build?",
  applyPatches: "Apply patches and copy resources?",
  build: null,
  sign: "Sign the build?",
  package: "Create the distributable package?"
};

const STEP_DEFAULTS: StepFlags = {
  sync: false,
  reset: false,
  clean: false,
  applyPatches: false,
  build: true,
  sign: false,
  package: false
};

/**
 * Settles every build option. A command-line flag wins over the configuration
 * file; anything still open is asked through `prompt`, or takes its default
 * when there is no prompt (non-interactive runs). Only the build step
 * defaults to on, and it is never asked.
 */
export async function resolveBuildOptions(
  flags: CliFlags,
  config: ForkstackConfig,
  prompt: PromptProvider | null
): Promise<BuildOptions> {
  const architecture = flags.architecture ?? config.build.architecture ?? DEFAULT_ARCHITECTURE;
  if (!isArchitecture(architecture)) {
    throw new ConfigError(`Unsupported architecture: ${architecture}`, ["expected arm64 or x64"]);
  }
  const variant: BuildVariant = flags.release === true ? "release" : config.build.variant ?? "debug";

  const steps: StepFlags = { ...STEP_DEFAULTS };
  for (const name of STEP_NAMES) {
    const given = flags.steps[name] ?? config.steps[name];
    const question = STEP_QUESTIONS[name];
    if (given !== undefined) {
      steps[name] = given;
    } else if (prompt !== null && question !== null) {
      steps[name] = await prompt.confirm(question);
    }
  }
  return { variant, architecture, steps };
}
