import fs from "node:fs/promises";
import path from "node:path";
import { ConfigError } from "../errors.js";
import { isErrnoException, readTextIfExists, writeTextAtomic } from "../utils/fs.js";
import { safeJoin } from "../utils/paths.js";
import type { TreeFileSystem } from "./types.js";

export class DirectoryTree implements TreeFileSystem {
  readonly root: string;

  constructor(root: string) {
    this.root = path.resolve(root);
  }

  async readFile(relPath: string): Promise<string | null> {
    const absPath = safeJoin(this.root, relPath);
    let stat;
    try {
      stat = await fs.lstat(absPath);
    } catch (err) {
      if (isErrnoException(err) && (err.code === "ENOENT" || err.code === "ENOTDIR")) {
        return null;
      }
      throw err;
    }
    if (!stat.isFile()) {
      const kind = stat.isSymbolicLink() ? "symbolic link" : stat.isDirectory() ? "directory" : "special file";
      throw new ConfigError(`Not a regular file in the source tree: ${relPath}`, [`${absPath} is a ${kind}`]);
    }
    return readTextIfExists(absPath);
  }

  async writeFile(relPath: string, content: string): Promise<void> {
    await writeTextAtomic(safeJoin(this.root, relPath), content);
  }

  async removeFile(relPath: string): Promise<void> {
    await fs.rm(safeJoin(this.root, relPath), { force: true });
  }
}
