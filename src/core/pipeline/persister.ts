/**
 * Output persistence
 */

import { promises as fs } from "node:fs";
import path from "node:path";
import { PIPELINE_CONSTANTS } from "../constants";
import { PersistenceError, toError } from "../errors";
import type { Monster } from "../types";
import { Logger } from "../utils/logger";
import { toMonsterRecord } from "./enricher";

/**
 * Whether the output file is already there
 */
export async function outputExists(destination: string): Promise<boolean> {
  try {
    await fs.access(destination);
    return true;
  } catch {
    return false;
  }
}

/**
 * Serializes monsters as an indented JSON array
 */
export function serializeMonsters(monsters: readonly Monster[]): string {
  return (
    JSON.stringify(
      monsters.map(toMonsterRecord),
      null,
      PIPELINE_CONSTANTS.JSON_INDENT,
    ) + "\n"
  );
}

/**
 * Writes monsters to `destination` as a JSON array.
 * The content goes to a temp file first and is then linked into place, so the
 * destination is either absent or complete. An existing destination is never replaced.
 * @returns The destination path
 * @throws PersistenceError if the destination exists or the write fails
 */
export async function persist(
  monsters: readonly Monster[],
  destination: string,
): Promise<string> {
  const dir = path.dirname(destination);
  const tmp = path.join(
    dir,
    `.${path.basename(destination)}.${process.pid}.${Date.now()}.tmp`,
  );

  let created = false;
  let written = false;
  try {
    const data = serializeMonsters(monsters);
    await fs.mkdir(dir, { recursive: true });
    created = true;
    await fs.writeFile(tmp, data, { encoding: "utf8", flag: "wx" });
    written = true;
    await fs.link(tmp, destination);
  } catch (e) {
    const err = toError(e);
    const clobber = written && "code" in err && err.code === "EEXIST";
    throw new PersistenceError(
      clobber
        ? `Refusing to overwrite existing output: ${destination}`
        : `Failed to save monsters to ${destination}: ${err.message}`,
      destination,
      err,
    );
  } finally {
    // A failed cleanup must not mask the outcome of the write
    if (created) {
      await fs.rm(tmp, { force: true }).catch((e: unknown) => {
        Logger.warn(`Could not remove temp file ${tmp}`, {
          error: toError(e).message,
        });
      });
    }
  }

  Logger.info(`Successfully saved ${monsters.length} monsters to ${destination}`, {
    count: monsters.length,
  });
  return destination;
}
