/**
 * Detail enrichment: fetch each selected monster and normalize it
 */

import type { ApiClient } from "../client";
import { ValidationError, toError } from "../errors";
import type { Action, Monster, MonsterRecord, MonsterSummary } from "../types";
import { Logger } from "../utils/logger";
import { isObject, nullableInt, type RawObject } from "../validation";

function normalizeActions(raw: RawObject): Action[] {
  const actions = raw.actions;
  if (!actions) return [];
  if (!Array.isArray(actions)) {
    throw new ValidationError("actions must be a list", "actions");
  }
  return actions.map((entry, i) => {
    if (!isObject(entry)) {
      throw new ValidationError(`actions[${i}] must be an object`, "actions");
    }
    const name = entry.name === undefined ? "" : entry.name;
    const desc = entry.desc === undefined ? "" : entry.desc;
    if (typeof name !== "string" || typeof desc !== "string") {
      throw new ValidationError(
        `actions[${i}] name and desc must be strings`,
        "actions",
      );
    }
    return { name, desc };
  });
}

function asInt(value: unknown): number | null {
  return typeof value === "number" && Number.isInteger(value) ? value : null;
}

/**
 * armor_class arrives either as `[{ value, type }, ...]` or as a bare integer.
 * Falsy values and any other shape yield null; it never fails the monster.
 */
function normalizeArmorClass(raw: RawObject): number | null {
  const ac = raw.armor_class;
  if (!ac) return null;
  if (Array.isArray(ac)) {
    const first: unknown = ac[0];
    return isObject(first) ? asInt(first.value) : null;
  }
  return asInt(ac);
}

/**
 * Maps a raw detail payload to a Monster.
 * A stat that is missing or null becomes null; 0 is kept as 0.
 * @throws ValidationError if the payload is malformed
 */
export function normalizeMonster(raw: unknown): Monster {
  if (!isObject(raw)) {
    throw new ValidationError("Monster details must be an object");
  }

  const name = raw.name === undefined ? "" : raw.name;
  if (typeof name !== "string") {
    throw new ValidationError("name must be a string", "name");
  }

  return {
    name,
    hitPoints: nullableInt(raw, "hit_points", "Monster"),
    armorClass: normalizeArmorClass(raw),
    actions: normalizeActions(raw),
  };
}

/**
 * Serialized form with keys in output order
 */
export function toMonsterRecord(monster: Monster): MonsterRecord {
  return {
    name: monster.name,
    hit_points: monster.hitPoints,
    armor_class: monster.armorClass,
    actions: monster.actions.map((a) => ({ name: a.name, desc: a.desc })),
  };
}

export function fromMonsterRecord(record: MonsterRecord): Monster {
  return {
    name: record.name,
    hitPoints: record.hit_points,
    armorClass: record.armor_class,
    actions: record.actions,
  };
}

/**
 * Fetches and normalizes each summary in order, one request at a time.
 * A summary whose fetch or normalization fails is logged and left out.
 */
export async function enrich(
  client: ApiClient,
  summaries: readonly MonsterSummary[],
): Promise<Monster[]> {
  const monsters: Monster[] = [];

  for (const summary of summaries) {
    try {
      Logger.info(`Fetching details for: ${summary.name}`, {
        url: summary.url,
      });
      const raw = await client.getJson(summary.url);
      const monster = normalizeMonster(raw);
      monsters.push(monster);
      Logger.monsterProcessed(
        monster.name,
        monster.hitPoints,
        monster.armorClass,
      );
    } catch (e) {
      Logger.monsterFailed(summary.name, summary.url, toError(e));
    }
  }

  Logger.info(
    `Successfully processed ${monsters.length} of ${summaries.length} monsters`,
    { count: monsters.length, requested: summaries.length },
  );
  return monsters;
}
