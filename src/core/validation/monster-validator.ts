/**
 * Payload validation for catalog and hand-off data
 */

import { ValidationError } from "../errors";
import type {
  Action,
  CatalogResponse,
  MonsterRecord,
  MonsterSummary,
} from "../types";

export type RawObject = Record<string, unknown>;

export function isObject(value: unknown): value is RawObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function requireObject(value: unknown, label: string): RawObject {
  if (!isObject(value)) {
    throw new ValidationError(`${label} must be an object`);
  }
  return value;
}

function requireString(o: RawObject, field: string, label: string): string {
  const v = o[field];
  if (typeof v !== "string") {
    throw new ValidationError(`${label} ${field} must be a string`, field);
  }
  return v;
}

/**
 * Reads an optional integer field; missing and null both yield null
 */
export function nullableInt(
  o: RawObject,
  field: string,
  label: string,
): number | null {
  const v = o[field];
  if (v === undefined || v === null) return null;
  if (typeof v !== "number" || !Number.isInteger(v)) {
    throw new ValidationError(
      `${label} ${field} must be an integer or null`,
      field,
    );
  }
  return v;
}

/**
 * Validates a catalog entry
 * @throws ValidationError if index, name or url is missing or not a string
 */
export function parseMonsterSummary(value: unknown): MonsterSummary {
  const o = requireObject(value, "Monster summary");
  return {
    index: requireString(o, "index", "Monster summary"),
    name: requireString(o, "name", "Monster summary"),
    url: requireString(o, "url", "Monster summary"),
  };
}

/**
 * Validates the catalog list payload
 * @throws ValidationError if count is not an integer or results is not a list of summaries
 */
export function parseCatalogResponse(value: unknown): CatalogResponse {
  const o = requireObject(value, "Catalog response");
  const { count, results } = o;
  if (typeof count !== "number" || !Number.isInteger(count)) {
    throw new ValidationError(
      "Catalog response count must be an integer",
      "count",
    );
  }
  if (!Array.isArray(results)) {
    throw new ValidationError(
      "Catalog response results must be a list",
      "results",
    );
  }
  return { count, results: results.map(parseMonsterSummary) };
}

/**
 * Validates an action; missing name or desc is an error here, unlike raw API actions
 */
export function parseAction(value: unknown): Action {
  const o = requireObject(value, "Action");
  return {
    name: requireString(o, "name", "Action"),
    desc: requireString(o, "desc", "Action"),
  };
}

/**
 * Validates a serialized monster record
 */
export function parseMonsterRecord(value: unknown): MonsterRecord {
  const o = requireObject(value, "Monster record");
  const actions = o.actions ?? [];
  if (!Array.isArray(actions)) {
    throw new ValidationError(
      "Monster record actions must be a list",
      "actions",
    );
  }
  return {
    name: requireString(o, "name", "Monster record"),
    hit_points: nullableInt(o, "hit_points", "Monster record"),
    armor_class: nullableInt(o, "armor_class", "Monster record"),
    actions: actions.map(parseAction),
  };
}
