/**
 * Monster catalog types
 */

/** Lightweight catalog reference, as listed by the catalog endpoint */
export interface MonsterSummary {
  index: string;
  name: string;
  url: string;
}

/** Raw list payload; `count` is not checked against `results.length` */
export interface CatalogResponse {
  count: number;
  results: MonsterSummary[];
}

export interface Action {
  name: string;
  desc: string;
}

/** Normalized monster. `null` marks a stat the source did not provide. */
export interface Monster {
  name: string;
  hitPoints: number | null;
  armorClass: number | null;
  actions: Action[];
}

/** Serialized form of a Monster, as written to the output file */
export interface MonsterRecord {
  name: string;
  hit_points: number | null;
  armor_class: number | null;
  actions: Action[];
}
