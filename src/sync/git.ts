import fs from "node:fs/promises";
import path from "node:path";
import { SyncError } from "../errors.js";
import { log as rootLog, type Logger } from "../logger.js";
import { commandOutput, formatCommand, runCommand, type CommandRunner } from "../utils/exec.js";
import { listEntries } from "../utils/fs.js";
import { safeJoin } from "../utils/paths.js";
import type { FetchDepth, Repository } from "./types.js";

export interface GitRepositoryOptions {
  remote?: string;
  /** Command that syncs nested dependency trees, e.g. `gclient`. */
  dependencySyncCommand?: string;
  run?: CommandRunner;
  log?: Logger;
}

const C_ESCAPES: Record<string, number> = { a: 7, b: 8, t: 9, n: 10, v: 11, f: 12, r: 13, '"': 34, "\\": 92 };

/** Undoes git's C-style quoting of path names (`"na\303\257ve"`). Unquoted names pass through. */
export function unquoteGitPath(raw: string): string {
  if (raw.length < 2 || !raw.startsWith('"') || !raw.endsWith('"')) {
    return raw;
  }
  const chars = [...raw.slice(1, -1)];
  const bytes: number[] = [];
  for (let i = 0; i < chars.length; i++) {
    if (chars[i] !== "\\") {
      bytes.push(...Buffer.from(chars[i], "utf8"));
      continue;
    }
    const octal = /^[0-7]{3}$/.exec(chars.slice(i + 1, i + 4).join(""));
    if (octal) {
      bytes.push(parseInt(octal[0], 8));
      i += 3;
    } else {
      const escaped = chars[i + 1] ?? "\\";
      bytes.push(C_ESCAPES[escaped] ?? escaped.charCodeAt(0));
      i += 1;
    }
  }
  return Buffer.from(bytes).toString("utf8");
}

/** Parses `git clean --dry-run` output ("Would remove <path>"). */
export function parseCleanDryRun(output: string): string[] {
  return output
    .split(/\r?\n/)
    .map((line) => /^Would remove (.+)$/.exec(line.trim()))
    .filter((match): match is RegExpExecArray => match !== null)
    .map((match) => unquoteGitPath(match[1]));
}

/** Paths from `git status --porcelain`, ignoring untracked entries. */
export function parsePorcelainStatus(output: string): string[] {
  return output
    .split(/\r?\n/)
    .filter((line) => line.length > 3 && !line.startsWith("??") && !line.startsWith("!!"))
    .map((line) => {
      const entry = line.slice(3);
      const arrow = entry.indexOf(" -> ");
      return arrow === -1 ? entry : entry.slice(arrow + 4);
    });
}

export class GitRepository implements Repository {
  readonly root: string;
  private readonly remote: string;
  private readonly dependencySyncCommand: string;
  private readonly run: CommandRunner;
  private readonly log: Logger;

  constructor(root: string, options: GitRepositoryOptions = {}) {
    this.root = path.resolve(root);
    this.remote = options.remote ?? "origin";
    this.dependencySyncCommand = options.dependencySyncCommand ?? "gclient";
    this.run = options.run ?? runCommand;
    this.log = options.log ?? rootLog.child("git");
  }

  private async exec(
    command: string,
    args: string[],
    options: { stream?: boolean; allowFailure?: boolean } = {}
  ): Promise<{ ok: boolean; stdout: string; output: string }> {
    const result = await this.run(command, args, { cwd: this.root, stream: options.stream });
    const ok = result.exitCode === 0;
    if (!ok && !options.allowFailure) {
      throw new SyncError(
        `${formatCommand(command, args)} exited with code ${result.exitCode ?? "unknown"}`,
        commandOutput(result)
      );
    }
    return { ok, stdout: result.stdout, output: commandOutput(result) };
  }

  private git(args: string[], options?: { stream?: boolean; allowFailure?: boolean }) {
    return this.exec("git", args, options);
  }

  async resetHard(): Promise<void> {
    this.log.info("Discarding tracked modifications");
    await this.git(["reset", "--hard", "--quiet", "HEAD"]);
  }

  async trackedChanges(): Promise<string[]> {
    const { stdout } = await this.git(["status", "--porcelain", "--untracked-files=no"]);
    return parsePorcelainStatus(stdout);
  }

  async listUntracked(scopes: readonly string[]): Promise<string[]> {
    const { stdout } = await this.git(["-c", "core.quotePath=false", "clean", "-n", "-d", "-x", "-ff", "--", ...scopes]);
    return parseCleanDryRun(stdout);
  }

  async listEntries(dir: string): Promise<string[]> {
    const prefix = dir.endsWith("/") ? dir : `${dir}/`;
    const entries = await listEntries(safeJoin(this.root, prefix));
    return entries.map((entry) => `${prefix}${entry}`);
  }

  async removePaths(paths: readonly string[]): Promise<void> {
    for (const relPath of paths) {
      await fs.rm(safeJoin(this.root, relPath), { recursive: true, force: true });
    }
  }

  /**
   * Fetches tags, then the revision itself when no fetched ref reaches it: a
   * pinned commit hash below a branch tip is invisible to a shallow fetch.
   */
  async fetch(revision: string, depth: FetchDepth): Promise<void> {
    const depthArgs = depth === "full" ? [] : [`--depth=${depth}`];
    this.log.info(`Fetching ${this.remote}${depth === "full" ? "" : ` (depth ${depth})`}`);
    await this.git(["fetch", this.remote, "--tags", "--force", ...depthArgs], { stream: true });
    if ((await this.resolveRevision(revision)) !== null) {
      return;
    }
    this.log.info(`Fetching ${revision} from ${this.remote}`);
    const pinned = await this.git(["fetch", this.remote, revision, ...depthArgs], { stream: true, allowFailure: true });
    if (!pinned.ok) {
      throw new SyncError(`Revision ${revision} does not exist in the remote repository`, pinned.output);
    }
  }

  async resolveRevision(revision: string): Promise<string | null> {
    const { ok, stdout } = await this.git(["rev-parse", "--verify", "--quiet", `${revision}^{commit}`], {
      allowFailure: true
    });
    const commit = stdout.trim();
    return ok && commit ? commit : null;
  }

  async checkout(commit: string): Promise<void> {
    this.log.info(`Checking out ${commit}`);
    await this.git(["-c", "advice.detachedHead=false", "checkout", "--detach", commit]);
  }

  async head(): Promise<string> {
    const { stdout } = await this.git(["rev-parse", "HEAD"]);
    return stdout.trim();
  }

  async syncDependencies(): Promise<void> {
    this.log.info("Syncing dependencies (this may take a while)");
    await this.exec(this.dependencySyncCommand, ["sync", "-D", "--no-history", "--shallow"], { stream: true });
  }
}
