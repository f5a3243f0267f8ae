/**
 * Pipeline Service - builds the collaborators of a run from configuration.
 * Used by the CLI and the queue worker.
 */

import { ApiClient, type FetchLike } from "../client";
import { AppConfig } from "../config";
import type { HandoffChannel } from "../pipeline/handoff";
import { runPipeline } from "../pipeline/driver";
import type { PipelineOptions, PipelineResult } from "../types";

/**
 * Creates an API client from AppConfig
 */
export function createApiClient(fetchImpl?: FetchLike): ApiClient {
  return new ApiClient({
    origin: AppConfig.API_ORIGIN,
    basePath: AppConfig.API_BASE_PATH,
    timeoutMs: AppConfig.REQUEST_TIMEOUT_MS,
    fetchImpl,
  });
}

/**
 * Runs the whole pipeline with a configured client
 */
export async function runMonsterPipeline(
  options: PipelineOptions = {},
  handoff?: HandoffChannel,
): Promise<PipelineResult> {
  return runPipeline(options, { client: createApiClient(), handoff });
}
