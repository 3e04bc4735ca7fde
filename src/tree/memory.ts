import { compareCodeUnits } from "../utils/fs.js";
import { ensureSafeRelPath, toPosixPath } from "../utils/paths.js";
import type { TreeFileSystem } from "./types.js";

/** In-process tree, for dry runs and for exercising the patch stack without a checkout. */
export class MemoryTree implements TreeFileSystem {
  readonly root: string;
  private readonly files = new Map<string, string>();
  private mutationCount = 0;

  constructor(initial: Record<string, string> = {}, root = "memory://tree") {
    this.root = root;
    for (const [relPath, content] of Object.entries(initial)) {
      this.files.set(normalize(relPath), content);
    }
  }

  /** Number of writes and removals performed since construction. */
  get mutations(): number {
    return this.mutationCount;
  }

  async readFile(relPath: string): Promise<string | null> {
    return this.files.get(normalize(relPath)) ?? null;
  }

  async writeFile(relPath: string, content: string): Promise<void> {
    this.mutationCount += 1;
    this.files.set(normalize(relPath), content);
  }

  async removeFile(relPath: string): Promise<void> {
    this.mutationCount += 1;
    this.files.delete(normalize(relPath));
  }

  snapshot(): Record<string, string> {
    const result: Record<string, string> = {};
    for (const key of [...this.files.keys()].sort(compareCodeUnits)) {
      result[key] = this.files.get(key) ?? "";
    }
    return result;
  }
}

function normalize(relPath: string): string {
  ensureSafeRelPath(relPath);
  return toPosixPath(relPath);
}
