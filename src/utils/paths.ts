import path from "node:path";

export function toPosixPath(inputPath: string): string {
  return inputPath.replace(/\\/g, "/");
}

/** Throws unless `relPath` is a non-empty, relative, forward-only tree path. */
export function ensureSafeRelPath(relPath: string): void {
  const posixPath = toPosixPath(relPath);
  if (posixPath.includes("\0")) {
    throw new Error(`Invalid path contains null byte: ${relPath}`);
  }
  if (!posixPath || posixPath === ".") {
    throw new Error(`Empty paths are not allowed`);
  }
  if (posixPath.startsWith("/")) {
    throw new Error(`Absolute paths are not allowed: ${relPath}`);
  }
  if (/^[a-zA-Z]:/.test(posixPath)) {
    throw new Error(`Drive paths are not allowed: ${relPath}`);
  }
  for (const segment of posixPath.replace(/\/$/, "").split("/")) {
    if (!segment) {
      throw new Error(`Invalid path segment in: ${relPath}`);
    }
    if (segment === "..") {
      throw new Error(`Path traversal is not allowed: ${relPath}`);
    }
  }
}

export function safeJoin(rootDir: string, relPosixPath: string): string {
  ensureSafeRelPath(relPosixPath);
  const relNative = toPosixPath(relPosixPath).split("/").join(path.sep);
  const rootResolved = path.resolve(rootDir);
  const targetResolved = path.resolve(rootResolved, relNative);
  if (!isInside(rootResolved, targetResolved)) {
    throw new Error(`Path escapes root: ${relPosixPath}`);
  }
  return targetResolved;
}

export function isInside(rootDir: string, targetPath: string): boolean {
  const relative = path.relative(path.resolve(rootDir), path.resolve(targetPath));
  return !relative.startsWith("..") && !path.isAbsolute(relative);
}

/** Resolves `target` against `baseDir` unless it is already absolute. */
export function resolveFrom(baseDir: string, target: string): string {
  return path.isAbsolute(target) ? target : path.resolve(baseDir, target);
}
