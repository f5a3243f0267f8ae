/**
 * Pipeline stage and run types
 */

export const PIPELINE_STAGES = [
  "fetch_monsters",
  "select_random_monsters",
  "fetch_monster_details",
  "save_monsters",
] as const;

/** Stage id; also the hand-off key a stage pushes its output under */
export type PipelineStage = (typeof PIPELINE_STAGES)[number];

export type PipelineState = "FETCH" | "SAMPLE" | "ENRICH" | "PERSIST" | "DONE";

export interface PipelineOptions {
  /** Number of monsters to sample (default: 5) */
  count?: number;
  /** Keep only the first N catalog entries before sampling (default: all) */
  limit?: number;
  /** Output file path (default: monsters.json) */
  outputFile?: string;
}

export interface PipelineResult {
  status: "completed" | "skipped";
  outputFile: string;
  monsterCount: number;
  stagesRun: PipelineStage[];
  durationSec: number;
}
