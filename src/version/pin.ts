import path from "node:path";
import { ConfigError } from "../errors.js";
import { readTextIfExists } from "../utils/fs.js";

export type UpstreamRevision = string;

const VERSION_KEYS = ["MAJOR", "MINOR", "BUILD", "PATCH"] as const;

/**
 * Parses the pinned-version file. Accepts either a single identifier
 * (`137.0.7151.69`, a tag or a commit) or the upstream `MAJOR=`/`MINOR=`/
 * `BUILD=`/`PATCH=` key-value form.
 */
export function parseVersionPin(content: string, source = "version file"): UpstreamRevision {
  const lines = content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith("#"));

  if (lines.length === 0) {
    throw new ConfigError(`Pinned version is empty: ${source}`);
  }

  if (lines.every((line) => /^[A-Z]+=/.test(line))) {
    return parseKeyValuePin(lines, source);
  }

  if (lines.length > 1) {
    throw new ConfigError(`Pinned version must contain exactly one identifier: ${source}`, lines);
  }
  const [revision] = lines;
  if (/\s/.test(revision)) {
    throw new ConfigError(`Pinned version contains whitespace: ${source}`, [revision]);
  }
  return revision;
}

function parseKeyValuePin(lines: string[], source: string): UpstreamRevision {
  const values = new Map<string, string>();
  for (const line of lines) {
    const separator = line.indexOf("=");
    values.set(line.slice(0, separator), line.slice(separator + 1).trim());
  }
  const missing = VERSION_KEYS.filter((key) => !/^\d+$/.test(values.get(key) ?? ""));
  if (missing.length > 0) {
    throw new ConfigError(
      `Pinned version is incomplete: ${source}`,
      missing.map((key) => `${key} must be a number`)
    );
  }
  return VERSION_KEYS.map((key) => values.get(key)).join(".");
}

/**
 * Source of truth for the upstream revision. The first successful `resolve()`
 * is memoized, so one build invocation never sees two different revisions.
 */
export class VersionPin {
  private resolved: Promise<UpstreamRevision> | null = null;

  constructor(readonly filePath: string) {}

  resolve(): Promise<UpstreamRevision> {
    if (!this.resolved) {
      const pending = this.read();
      this.resolved = pending;
      pending.catch(() => {
        this.resolved = null;
      });
    }
    return this.resolved;
  }

  private async read(): Promise<UpstreamRevision> {
    const content = await readTextIfExists(this.filePath);
    if (content === null) {
      throw new ConfigError(`Pinned version file not found: ${this.filePath}`);
    }
    return parseVersionPin(content, path.basename(this.filePath));
  }
}
