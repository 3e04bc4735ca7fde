import ignore from "ignore";
import { ConfigError } from "../errors.js";
import { LEDGER_FILE } from "../patch/ledger.js";
import { LOCK_FILE } from "../tree/lock.js";
import type { CleanPlan } from "./types.js";

const ALWAYS_PRESERVED = [LEDGER_FILE, LOCK_FILE];

function segmentMatches(segment: string, name: string): boolean {
  const escaped = /^[#!]/.test(segment) ? `\\${segment}` : segment;
  return ignore().add(escaped).ignores(name);
}

/** Whether `pattern` can match something strictly below the directory `dir`. */
function mayMatchBelow(pattern: string, dir: string): boolean {
  const patternSegments = pattern.split("/");
  const dirSegments = dir.split("/");
  for (const [index, dirSegment] of dirSegments.entries()) {
    const segment = patternSegments[index];
    if (segment === undefined) return false;
    if (segment === "**") return true;
    if (!segmentMatches(segment, dirSegment)) return false;
  }
  return patternSegments.length > dirSegments.length;
}

function ancestorsAndSelf(relPath: string): string[] {
  const segments = relPath.split("/");
  return segments.map((_, index) => segments.slice(0, index + 1).join("/"));
}

/**
 * Splits clean candidates into paths to remove and paths the allow-list
 * protects. Allow-list entries are gitignore globs anchored at the tree root.
 * A candidate is kept when it or one of its parent directories matches. A
 * directory that only contains something the allow-list names goes to
 * `descend`, so its entries can be planned in turn.
 */
export function planClean(candidates: readonly string[], allowList: readonly string[]): CleanPlan {
  if (allowList.length === 0) {
    throw new ConfigError("Refusing to clean untracked files without an exclusion allow-list");
  }
  const patterns = [...allowList, ...ALWAYS_PRESERVED].map((pattern) => pattern.replace(/^\/+/, "").replace(/\/+$/, ""));
  const matcher = ignore().add(patterns.map((pattern) => `/${pattern}`));

  const plan: CleanPlan = { remove: [], preserve: [], descend: [] };
  for (const candidate of candidates) {
    const relPath = candidate.replace(/^\.\//, "");
    const bare = relPath.replace(/\/+$/, "");
    const isDir = relPath.endsWith("/");
    if (ancestorsAndSelf(bare).some((p) => matcher.ignores(p))) {
      plan.preserve.push(relPath);
    } else if (isDir && patterns.some((pattern) => mayMatchBelow(pattern, bare))) {
      plan.descend.push(relPath);
    } else {
      plan.remove.push(relPath);
    }
  }
  return plan;
}
