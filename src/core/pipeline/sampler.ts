/**
 * Random selection of catalog entries
 */

import { ValidationError } from "../errors";
import { Logger } from "../utils/logger";

/**
 * Draws `count` distinct elements uniformly at random (partial Fisher-Yates)
 * @returns New array; the input is left untouched
 */
export function sampleWithoutReplacement<T>(items: readonly T[], count: number): T[] {
  const pool = [...items];
  const n = Math.min(count, pool.length);
  for (let i = 0; i < n; i++) {
    const j = i + Math.floor(Math.random() * (pool.length - i));
    [pool[i], pool[j]] = [pool[j], pool[i]];
  }
  return pool.slice(0, n);
}

/**
 * Selects `count` random entries without replacement.
 * When fewer than `count` are available, every entry is returned and a warning is logged.
 * @throws ValidationError if count is not a non-negative integer
 */
export function selectRandom<T extends { name: string }>(
  summaries: readonly T[],
  count: number,
): T[] {
  if (!Number.isInteger(count) || count < 0) {
    throw new ValidationError("count must be a non-negative integer", "count");
  }

  if (summaries.length < count) {
    Logger.warn(
      `Requested ${count} monsters but only ${summaries.length} available. Using all available.`,
      { requested: count, count: summaries.length },
    );
    return [...summaries];
  }

  Logger.info(
    `Selecting ${count} random monsters from ${summaries.length} available monsters`,
  );
  const selected = sampleWithoutReplacement(summaries, count);
  Logger.info(`Selected monsters: ${selected.map((m) => m.name).join(", ")}`, {
    count: selected.length,
  });
  return selected;
}
