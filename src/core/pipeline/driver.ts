/**
 * Pipeline driver: FETCH -> SAMPLE -> ENRICH -> PERSIST -> DONE
 */

import { performance } from "node:perf_hooks";
import type { ApiClient } from "../client";
import { AppConfig } from "../config";
import { toError } from "../errors";
import type {
  PipelineOptions,
  PipelineResult,
  PipelineStage,
  PipelineState,
} from "../types";
import { formatDuration, secondsSince } from "../utils/date";
import { Logger } from "../utils/logger";
import { InMemoryHandoff, type HandoffChannel } from "./handoff";
import { outputExists } from "./persister";
import { runStage } from "./tasks";

export interface PipelineDeps {
  client: ApiClient;
  /** Defaults to a fresh in-memory channel */
  handoff?: HandoffChannel;
}

/** State -> stage it runs, in execution order */
const TRANSITIONS: ReadonlyArray<[PipelineState, PipelineStage]> = [
  ["FETCH", "fetch_monsters"],
  ["SAMPLE", "select_random_monsters"],
  ["ENRICH", "fetch_monster_details"],
  ["PERSIST", "save_monsters"],
];

/**
 * Runs the four stages in order.
 * If the output file already exists, no stage runs and the result is "skipped".
 * The first stage failure aborts the run and is rethrown; no output file is written then.
 */
export async function runPipeline(
  options: PipelineOptions,
  deps: PipelineDeps,
): Promise<PipelineResult> {
  const t0 = performance.now();
  const { count, limit, outputFile } = AppConfig.pipelineDefaults(options);
  const handoff = deps.handoff ?? new InMemoryHandoff();
  const stagesRun: PipelineStage[] = [];

  if (await outputExists(outputFile)) {
    Logger.info(
      `${outputFile} already exists, skipping run. Delete it to force re-execution`,
      { outputFile },
    );
    return {
      status: "skipped",
      outputFile,
      monsterCount: 0,
      stagesRun,
      durationSec: secondsSince(t0),
    };
  }

  const ctx = { client: deps.client, handoff };
  let state: PipelineState = "FETCH";
  let monsterCount = 0;

  try {
    for (const [from, stage] of TRANSITIONS) {
      state = from;
      Logger.debug(`Pipeline state: ${state}`, { stage });
      monsterCount = await runStage(stage, ctx, { count, limit, outputFile });
      stagesRun.push(stage);
    }
    state = "DONE";
    Logger.debug(`Pipeline state: ${state}`);
  } catch (e) {
    Logger.error(`Pipeline failed in state ${state}`, toError(e), {
      state,
      outputFile,
    });
    throw e;
  }

  await handoff.clear();

  const durationSec = secondsSince(t0);
  Logger.info(
    `Generated ${monsterCount} monsters in ${outputFile} (${formatDuration(durationSec)})`,
    { count: monsterCount, outputFile, duration: durationSec },
  );

  return {
    status: "completed",
    outputFile,
    monsterCount,
    stagesRun,
    durationSec,
  };
}
