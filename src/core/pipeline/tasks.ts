/**
 * Stage tasks. Each task pulls its upstream stage's output from the hand-off
 * channel, runs one pipeline step and pushes its own output.
 * Direct runs and scheduler-driven runs share these functions.
 */

import { performance } from "node:perf_hooks";
import type { ApiClient } from "../client";
import { AppConfig } from "../config";
import { MissingUpstreamDataError } from "../errors";
import type { MonsterSummary, PipelineStage } from "../types";
import { secondsSince } from "../utils/date";
import { Logger } from "../utils/logger";
import { parseMonsterRecord, parseMonsterSummary } from "../validation";
import { enrich, fromMonsterRecord, toMonsterRecord } from "./enricher";
import { fetchSummaries } from "./fetcher";
import type { HandoffChannel } from "./handoff";
import { persist } from "./persister";
import { selectRandom } from "./sampler";

export interface TaskContext {
  client: ApiClient;
  handoff: HandoffChannel;
}

export interface StageOptions {
  count?: number;
  limit?: number;
  outputFile?: string;
}

/**
 * Upstream stage of each stage
 */
export const UPSTREAM = {
  select_random_monsters: "fetch_monsters",
  fetch_monster_details: "select_random_monsters",
  save_monsters: "fetch_monster_details",
} as const satisfies Record<string, PipelineStage>;

type DownstreamStage = keyof typeof UPSTREAM;

export interface SaveResult {
  outputFile: string;
  monsterCount: number;
}

/**
 * Pulls the upstream output of `stage` and validates each entry
 * @throws MissingUpstreamDataError if the value is absent, not a list, or empty
 */
async function pullUpstream<T>(
  handoff: HandoffChannel,
  stage: DownstreamStage,
  parse: (value: unknown) => T,
): Promise<T[]> {
  const upstream = UPSTREAM[stage];
  const data = await handoff.pull(upstream);
  if (!Array.isArray(data) || data.length === 0) {
    throw new MissingUpstreamDataError(stage, upstream);
  }
  return data.map(parse);
}

export async function fetchMonstersTask(
  ctx: TaskContext,
  options: StageOptions = {},
): Promise<MonsterSummary[]> {
  const summaries = await fetchSummaries(ctx.client, options.limit);
  await ctx.handoff.push("fetch_monsters", summaries);
  Logger.info(`Fetched ${summaries.length} monsters from catalog`, {
    count: summaries.length,
  });
  return summaries;
}

export async function selectRandomMonstersTask(
  ctx: TaskContext,
  options: StageOptions = {},
): Promise<MonsterSummary[]> {
  const count = options.count ?? AppConfig.SAMPLE_COUNT;
  const summaries = await pullUpstream(
    ctx.handoff,
    "select_random_monsters",
    parseMonsterSummary,
  );
  const selected = selectRandom(summaries, count);
  await ctx.handoff.push("select_random_monsters", selected);
  return selected;
}

export async function fetchMonsterDetailsTask(ctx: TaskContext) {
  const selected = await pullUpstream(
    ctx.handoff,
    "fetch_monster_details",
    parseMonsterSummary,
  );
  const monsters = await enrich(ctx.client, selected);
  await ctx.handoff.push(
    "fetch_monster_details",
    monsters.map(toMonsterRecord),
  );
  return monsters;
}

export async function saveMonstersTask(
  ctx: TaskContext,
  options: StageOptions = {},
): Promise<SaveResult> {
  const outputFile = options.outputFile ?? AppConfig.OUTPUT_FILE;
  const records = await pullUpstream(
    ctx.handoff,
    "save_monsters",
    parseMonsterRecord,
  );
  const saved = await persist(records.map(fromMonsterRecord), outputFile);
  await ctx.handoff.push("save_monsters", saved);
  return { outputFile: saved, monsterCount: records.length };
}

/**
 * Runs one stage by id. Returns the number of items the stage produced.
 */
export async function runStage(
  stage: PipelineStage,
  ctx: TaskContext,
  options: StageOptions = {},
): Promise<number> {
  const t0 = performance.now();
  Logger.stageStarted(stage);

  let produced: number;
  switch (stage) {
    case "fetch_monsters":
      produced = (await fetchMonstersTask(ctx, options)).length;
      break;
    case "select_random_monsters":
      produced = (await selectRandomMonstersTask(ctx, options)).length;
      break;
    case "fetch_monster_details":
      produced = (await fetchMonsterDetailsTask(ctx)).length;
      break;
    case "save_monsters":
      produced = (await saveMonstersTask(ctx, options)).monsterCount;
      break;
  }

  Logger.stageCompleted(stage, produced, secondsSince(t0));
  return produced;
}
