import { applyPatch, parsePatch, type Hunk, type ParsedDiff } from "diff";
import { ConfigError, errorMessage } from "../errors.js";
import { ensureSafeRelPath } from "../utils/paths.js";
import type { FilePatch } from "./types.js";

const DEV_NULL = "/dev/null";
// `git format-patch` ends with "-- " and the git version, which would read as a removed line.
const FORMAT_PATCH_SIGNATURE = /\n-- \n[^\n]*\n*$/;

function stripPathPrefix(fileName: string | undefined): string | null {
  if (fileName === undefined || fileName === DEV_NULL) {
    return null;
  }
  return fileName.replace(/^(?:a\/|b\/|\.\/)/, "");
}

/** Splits a unified diff into per-file patches. Diffs without hunks (mode changes, binaries) are ignored. */
export function parseFilePatches(content: string, source: string): FilePatch[] {
  let diffs: ParsedDiff[];
  try {
    diffs = parsePatch(content.replace(FORMAT_PATCH_SIGNATURE, "\n"));
  } catch (err) {
    throw new ConfigError(`Patch ${source} is not a valid unified diff: ${errorMessage(err)}`);
  }

  const files: FilePatch[] = [];
  for (const diff of diffs) {
    if (diff.hunks.length === 0) continue;
    const oldPath = stripPathPrefix(diff.oldFileName);
    const newPath = stripPathPrefix(diff.newFileName);
    if (oldPath === null && newPath === null) {
      throw new ConfigError(`Patch ${source} has a hunk without a file header`);
    }
    for (const filePath of [oldPath, newPath]) {
      if (filePath === null) continue;
      try {
        ensureSafeRelPath(filePath);
      } catch (err) {
        throw new ConfigError(`Patch ${source} touches an unsafe path: ${errorMessage(err)}`);
      }
    }
    files.push({ oldPath, newPath, diff });
  }

  if (files.length === 0) {
    throw new ConfigError(`Patch ${source} contains no text changes`);
  }
  return files;
}

/** Applies with exact context matching; hunks may shift but never fuzz. Returns false on mismatch. */
export function applyFilePatch(source: string, patch: FilePatch): string | false {
  return applyPatch(source, patch.diff, { fuzzFactor: 0 });
}

function invertHunk(hunk: Hunk): Hunk {
  return {
    ...hunk,
    oldStart: hunk.newStart,
    oldLines: hunk.newLines,
    newStart: hunk.oldStart,
    newLines: hunk.oldLines,
    lines: hunk.lines.map((line) => {
      if (line.startsWith("+")) return `-${line.slice(1)}`;
      if (line.startsWith("-")) return `+${line.slice(1)}`;
      return line;
    })
  };
}

export function invertFilePatch(patch: FilePatch): FilePatch {
  return {
    oldPath: patch.newPath,
    newPath: patch.oldPath,
    diff: {
      ...patch.diff,
      oldFileName: patch.diff.newFileName,
      newFileName: patch.diff.oldFileName,
      oldHeader: patch.diff.newHeader,
      newHeader: patch.diff.oldHeader,
      hunks: patch.diff.hunks.map(invertHunk)
    }
  };
}
