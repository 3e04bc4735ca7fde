import { ConfigError, SyncError } from "../errors.js";
import { log as rootLog, type Logger } from "../logger.js";
import { discardAppliedStack, readLedger } from "../patch/ledger.js";
import type { TreeFileSystem } from "../tree/types.js";
import type { UpstreamRevision } from "../version/pin.js";
import { planClean } from "./clean.js";
import type { CleanPlan, Repository, SyncOptions, SyncResult } from "./types.js";

export interface SyncContext {
  repository: Repository;
  /** File view of the same tree, used for the applied-patch ledger and the files it lists. */
  tree: TreeFileSystem;
  log?: Logger;
}

function describeChanges(paths: string[]): string {
  const shown = paths.slice(0, 10).join("\n");
  return paths.length > 10 ? `${shown}\n... and ${paths.length - 10} more` : shown;
}

/**
 * Plans the clean level by level: git reports a wholly untracked directory as
 * one entry, so directories holding allow-listed paths are listed and planned
 * again until only protected subtrees remain.
 */
async function planUntracked(repository: Repository, scopes: string[], allowList: string[]): Promise<CleanPlan> {
  const plan: CleanPlan = { remove: [], preserve: [], descend: [] };
  let candidates = await repository.listUntracked(scopes);
  while (candidates.length > 0) {
    const level = planClean(candidates, allowList);
    plan.remove.push(...level.remove);
    plan.preserve.push(...level.preserve);
    plan.descend.push(...level.descend);
    candidates = [];
    for (const dir of level.descend) {
      candidates.push(...(await repository.listEntries(dir)));
    }
  }
  return plan;
}

/**
 * Brings the working tree to exactly `revision`: optional hard reset, optional
 * allow-listed clean, fetch, checkout and dependency sync. On success the
 * tracked state matches the revision with no local modifications.
 */
export async function syncSourceTree(
  context: SyncContext,
  revision: UpstreamRevision,
  options: SyncOptions
): Promise<SyncResult> {
  const { repository, tree } = context;
  const log = context.log ?? rootLog.child("sync");

  if (options.cleanUntracked && options.cleanExclude.length === 0) {
    throw new ConfigError("cleanUntracked requires a non-empty exclusion allow-list");
  }

  log.info(`Syncing ${repository.root} to ${revision}`);

  const ledger = await readLedger(tree);
  if (options.resetTracked) {
    await repository.resetHard();
    const created = await discardAppliedStack(tree);
    if (ledger.length > 0) {
      log.info(`Discarded ${ledger.length} applied patches and ${created.length} files they created`);
    }
  } else if (ledger.length > 0) {
    throw new SyncError(
      `Working tree has ${ledger.length} patches applied; re-run with resetTracked or reverse the stack first`,
      ledger.map((entry) => entry.id).join("\n")
    );
  }

  let clean: CleanPlan | null = null;
  if (options.cleanUntracked) {
    clean = await planUntracked(repository, options.cleanScopes, options.cleanExclude);
    log.info(`Removing ${clean.remove.length} untracked paths, preserving ${clean.preserve.length}`);
    await repository.removePaths(clean.remove);
  }

  const dirty = await repository.trackedChanges();
  if (dirty.length > 0) {
    throw new SyncError(
      `Working tree has ${dirty.length} tracked modifications; re-run with resetTracked to discard them`,
      describeChanges(dirty)
    );
  }

  await repository.fetch(revision, options.fetchDepth);
  const commit = await repository.resolveRevision(revision);
  if (commit === null) {
    throw new SyncError(`Revision ${revision} does not exist in the remote repository`);
  }
  await repository.checkout(commit);

  if (options.syncDependencies) {
    await repository.syncDependencies();
  }

  const head = await repository.head();
  if (head !== commit) {
    throw new SyncError(`Checkout ended at ${head} instead of ${commit} (${revision})`);
  }
  const remaining = await repository.trackedChanges();
  if (remaining.length > 0) {
    throw new SyncError("Working tree has tracked modifications after sync", describeChanges(remaining));
  }

  log.success(`Source tree at ${revision} (${commit})`);

  return {
    revision,
    commit,
    reset: options.resetTracked,
    clean,
    dependenciesSynced: options.syncDependencies
  };
}
