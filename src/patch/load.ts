import fs from "node:fs/promises";
import path from "node:path";
import { ConfigError } from "../errors.js";
import { compareCodeUnits, isDirectory, listFiles } from "../utils/fs.js";
import { hashText } from "../utils/hash.js";
import { safeJoin } from "../utils/paths.js";
import { parseFilePatches } from "./text.js";
import type { Patch } from "./types.js";

const PATCH_SUFFIX = ".patch";

export function patchIdFromPath(relPath: string): string {
  return relPath.endsWith(PATCH_SUFFIX) ? relPath.slice(0, -PATCH_SUFFIX.length) : relPath;
}

export function parsePatchFile(relPath: string, content: string, sourcePath = relPath): Patch {
  return {
    id: patchIdFromPath(relPath),
    sourcePath,
    sha256: hashText(content),
    files: parseFilePatches(content, relPath)
  };
}

/** Orders a stack by identifier. The order is the same on every machine and locale. */
export function sortPatches(patches: readonly Patch[]): Patch[] {
  const sorted = [...patches].sort((a, b) => compareCodeUnits(a.id, b.id));
  for (let i = 1; i < sorted.length; i++) {
    if (sorted[i].id === sorted[i - 1].id) {
      throw new ConfigError(`Duplicate patch identifier: ${sorted[i].id}`);
    }
  }
  return sorted;
}

/** Reads every `*.patch` file under `patchDir` (recursively) as one ordered stack. */
export async function loadPatchStack(patchDir: string): Promise<Patch[]> {
  const root = path.resolve(patchDir);
  if (!(await isDirectory(root))) {
    throw new ConfigError(`Patch directory not found: ${root}`);
  }
  const relPaths = await listFiles(root, `**/*${PATCH_SUFFIX}`);
  const patches: Patch[] = [];
  for (const relPath of relPaths) {
    const absPath = safeJoin(root, relPath);
    const content = await fs.readFile(absPath, "utf8");
    patches.push(parsePatchFile(relPath, content, absPath));
  }
  return sortPatches(patches);
}
