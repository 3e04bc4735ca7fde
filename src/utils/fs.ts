import fs from "node:fs/promises";
import path from "node:path";
import os from "node:os";
import { createReadStream, createWriteStream } from "node:fs";
import { pipeline } from "node:stream/promises";
import { randomUUID } from "node:crypto";
import fg from "fast-glob";
import { ensureSafeRelPath, safeJoin, toPosixPath } from "./paths.js";

export async function ensureDir(dirPath: string): Promise<void> {
  await fs.mkdir(dirPath, { recursive: true });
}

export async function pathExists(targetPath: string): Promise<boolean> {
  try {
    await fs.access(targetPath);
    return true;
  } catch {
    return false;
  }
}

export async function isDirectory(targetPath: string): Promise<boolean> {
  try {
    return (await fs.stat(targetPath)).isDirectory();
  } catch {
    return false;
  }
}

/** Reads a UTF-8 file, returning null when it does not exist. */
export async function readTextIfExists(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, "utf8");
  } catch (err) {
    if (isErrnoException(err) && err.code === "ENOENT") {
      return null;
    }
    throw err;
  }
}

/** Writes through a sibling temp file and a rename, so readers never see a half-written file. */
export async function writeTextAtomic(filePath: string, content: string): Promise<void> {
  await ensureDir(path.dirname(filePath));
  const tempPath = path.join(path.dirname(filePath), `.${path.basename(filePath)}.${randomUUID()}.tmp`);
  try {
    await fs.writeFile(tempPath, content, "utf8");
    await fs.rename(tempPath, filePath);
  } catch (err) {
    await fs.rm(tempPath, { force: true });
    throw err;
  }
}

export async function listFiles(rootDir: string, pattern = "**/*", ignore: string[] = []): Promise<string[]> {
  const entries = await fg(pattern, {
    cwd: rootDir,
    dot: true,
    onlyFiles: true,
    followSymbolicLinks: false,
    ignore,
    unique: true
  });
  const files = entries.map((entry) => {
    const relPath = toPosixPath(entry);
    ensureSafeRelPath(relPath);
    return relPath;
  });
  return files.sort(compareCodeUnits);
}

/** Direct children of `dirPath`; directories end with `/` and symlinks are never followed. */
export async function listEntries(dirPath: string): Promise<string[]> {
  const entries = await fg("*", {
    cwd: dirPath,
    dot: true,
    onlyFiles: false,
    markDirectories: true,
    followSymbolicLinks: false,
    deep: 1
  });
  return entries.map(toPosixPath).sort(compareCodeUnits);
}

export async function copyFileStream(srcPath: string, destPath: string): Promise<void> {
  await ensureDir(path.dirname(destPath));
  await pipeline(createReadStream(srcPath), createWriteStream(destPath));
}

/**
 * Copies every file under `srcDir` into `destDir`, replacing files that already
 * exist. Files in `destDir` with no counterpart in `srcDir` are left alone.
 */
export async function copyDirOverwrite(srcDir: string, destDir: string): Promise<string[]> {
  await ensureDir(destDir);
  const files = await listFiles(srcDir);
  for (const relPath of files) {
    await copyFileStream(safeJoin(srcDir, relPath), safeJoin(destDir, relPath));
  }
  return files;
}

export async function createTempDir(prefix: string): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeDir(targetPath: string): Promise<void> {
  await fs.rm(targetPath, { recursive: true, force: true });
}

/** Locale-independent ordering; the same on every machine. */
export function compareCodeUnits(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}
