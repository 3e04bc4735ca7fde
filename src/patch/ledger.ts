import { ConfigError, errorMessage } from "../errors.js";
import type { TreeFileSystem } from "../tree/types.js";
import type { LedgerEntry } from "./types.js";

/** Tree-root file recording which patches are applied, in application order. */
export const LEDGER_FILE = ".forkstack-applied.json";

interface LedgerDocument {
  version: 1;
  entries: LedgerEntry[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isStringList(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === "string");
}

function isLedgerEntry(value: unknown): value is LedgerEntry {
  return (
    isRecord(value) &&
    typeof value.id === "string" &&
    typeof value.sha256 === "string" &&
    typeof value.appliedAt === "string" &&
    isStringList(value.created)
  );
}

export async function readLedger(tree: TreeFileSystem): Promise<LedgerEntry[]> {
  const raw = await tree.readFile(LEDGER_FILE);
  if (raw === null) {
    return [];
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(`Applied-patch ledger is not valid JSON: ${errorMessage(err)}`);
  }
  if (!isRecord(parsed) || parsed.version !== 1 || !Array.isArray(parsed.entries)) {
    throw new ConfigError(`Applied-patch ledger has an unknown format: ${LEDGER_FILE}`);
  }
  const entries: LedgerEntry[] = [];
  parsed.entries.forEach((entry: unknown, index: number) => {
    if (!isLedgerEntry(entry)) {
      throw new ConfigError(`Invalid ledger entry at index ${index}: ${LEDGER_FILE}`);
    }
    entries.push({ id: entry.id, sha256: entry.sha256, appliedAt: entry.appliedAt, created: [...entry.created] });
  });
  return entries;
}

/** Persists the ledger; an empty ledger removes the file so an unpatched tree carries no trace. */
export async function writeLedger(tree: TreeFileSystem, entries: LedgerEntry[]): Promise<void> {
  if (entries.length === 0) {
    await tree.removeFile(LEDGER_FILE);
    return;
  }
  const document: LedgerDocument = { version: 1, entries };
  await tree.writeFile(LEDGER_FILE, `${JSON.stringify(document, null, 2)}\n`);
}

export async function clearLedger(tree: TreeFileSystem): Promise<void> {
  if ((await tree.readFile(LEDGER_FILE)) !== null) {
    await tree.removeFile(LEDGER_FILE);
  }
}

/**
 * Deletes the files recorded patches created, then the ledger itself. Run
 * after a hard reset, which restores tracked files only, so the stack can be
 * applied again from scratch.
 */
export async function discardAppliedStack(tree: TreeFileSystem): Promise<string[]> {
  const entries = await readLedger(tree);
  const created = [...new Set(entries.flatMap((entry) => entry.created))];
  for (const relPath of created) {
    await tree.removeFile(relPath);
  }
  await clearLedger(tree);
  return created;
}
