/** Version-control operations SourceTreeSync needs from a working tree. */
export interface Repository {
  readonly root: string;
  /** Discards every tracked modification, back to HEAD. */
  resetHard(): Promise<void>;
  /** Paths with tracked modifications, relative to the root. */
  trackedChanges(): Promise<string[]>;
  /** Untracked and ignored paths under `scopes`; directories end with `/`. */
  listUntracked(scopes: readonly string[]): Promise<string[]>;
  /** Direct entries of an untracked directory, in the same form. */
  listEntries(dir: string): Promise<string[]>;
  removePaths(paths: readonly string[]): Promise<void>;
  /** Fetches remote refs and makes `revision` available locally when the remote has it. */
  fetch(revision: string, depth: FetchDepth): Promise<void>;
  /** Commit the revision points at, or null if it is unknown locally. */
  resolveRevision(revision: string): Promise<string | null>;
  checkout(commit: string): Promise<void>;
  head(): Promise<string>;
  /** Brings nested dependency trees in line with the checked-out revision. */
  syncDependencies(): Promise<void>;
}

export type FetchDepth = number | "full";

export interface SyncOptions {
  resetTracked: boolean;
  cleanUntracked: boolean;
  /** Sub-paths the clean is limited to; empty means the whole tree. */
  cleanScopes: string[];
  /** Globs (relative to the tree root) the clean must never remove, nor anything beneath them. */
  cleanExclude: string[];
  fetchDepth: FetchDepth;
  syncDependencies: boolean;
}

export interface CleanPlan {
  remove: string[];
  preserve: string[];
  /** Directories kept because allow-listed paths sit somewhere below them. */
  descend: string[];
}

export interface SyncResult {
  revision: string;
  commit: string;
  reset: boolean;
  clean: CleanPlan | null;
  dependenciesSynced: boolean;
}

export const DEFAULT_CLEAN_EXCLUDE = [
  "third_party",
  "buildtools",
  "tools",
  "v8",
  "native_client",
  "out/*/gen",
  "out/*/obj",
  "out/*/args.gn"
];

export const DEFAULT_SYNC_OPTIONS: SyncOptions = {
  resetTracked: false,
  cleanUntracked: false,
  cleanScopes: [],
  cleanExclude: DEFAULT_CLEAN_EXCLUDE,
  fetchDepth: 1,
  syncDependencies: true
};
