import path from "node:path";
import { ResourceMissingError } from "../errors.js";
import { log as rootLog, type Logger } from "../logger.js";
import { copyDirOverwrite, isDirectory } from "../utils/fs.js";
import { safeJoin } from "../utils/paths.js";

export interface OverlaySpec {
  name: string;
  /** Directory holding the fork-owned files. */
  source: string;
  /** Destination relative to the tree root. */
  destination: string;
  /** Missing required sources fail the build; optional ones only warn. */
  required: boolean;
}

export interface OverlayOutcome {
  name: string;
  status: "copied" | "skipped";
  files: string[];
}

/**
 * Copies each overlay into the tree, replacing files that exist and leaving
 * unrelated files at the destination alone.
 */
export async function overlayResources(
  treeRoot: string,
  specs: readonly OverlaySpec[],
  log: Logger = rootLog.child("resources")
): Promise<OverlayOutcome[]> {
  const outcomes: OverlayOutcome[] = [];
  for (const spec of specs) {
    const source = path.resolve(spec.source);
    if (!(await isDirectory(source))) {
      if (spec.required) {
        throw new ResourceMissingError(spec.name, source);
      }
      log.warn(`Skipping overlay "${spec.name}": source directory not found: ${source}`);
      outcomes.push({ name: spec.name, status: "skipped", files: [] });
      continue;
    }
    const destination = safeJoin(treeRoot, spec.destination);
    log.info(`Copying ${spec.name}`);
    log.info(`  from: ${source}`);
    log.info(`    to: ${destination}`);
    const files = await copyDirOverwrite(source, destination);
    outcomes.push({ name: spec.name, status: "copied", files });
  }
  return outcomes;
}
