import type { Architecture, BuildVariant } from "../build/flags.js";
import type { OverlaySpec } from "../resources/overlay.js";
import type { IconPipelineOptions } from "../resources/icons.js";
import type { FetchDepth } from "../sync/types.js";

export interface StepFlags {
  /** Fetch and check out the pinned revision. */
  sync: boolean;
  /** Discard tracked modifications before syncing. */
  reset: boolean;
  /** Remove untracked build output while syncing and regenerate the build configuration. */
  clean: boolean;
  /** Apply the patch stack and copy resource overlays. */
  applyPatches: boolean;
  /** Compose the build configuration and run the build. */
  build: boolean;
  /** Run the signing script after a successful build. */
  sign: boolean;
  /** Run the packaging script that produces the distributable. */
  package: boolean;
}

export const STEP_NAMES = ["sync", "reset", "clean", "applyPatches", "build", "sign", "package"] as const satisfies readonly (keyof StepFlags)[];

export interface ProjectPaths {
  /** Directory the configuration was loaded from; relative paths resolve against it. */
  root: string;
  chromiumSrc: string;
  patches: string;
  versionFile: string;
  flags: string;
}

export interface SyncSettings {
  remote: string;
  cleanScopes: string[];
  cleanExclude: string[];
  fetchDepth: FetchDepth;
  syncDependencies: boolean;
}

export interface ReleaseScript {
  script: string;
}

export interface ForkstackConfig {
  paths: ProjectPaths;
  build: { variant?: BuildVariant; architecture?: Architecture };
  steps: Partial<StepFlags>;
  sync: SyncSettings;
  overlays: OverlaySpec[];
  icons: IconPipelineOptions | null;
  targets: string[];
  signing: ReleaseScript | null;
  packaging: ReleaseScript | null;
}
