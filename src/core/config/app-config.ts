/**
 * Centralized application configuration
 */

import { API_CONSTANTS, PIPELINE_CONSTANTS, QUEUE_CONSTANTS } from "../constants";
import { envInt, envOptionalInt, envStr } from "./env";

export class AppConfig {
  // Remote catalog
  static readonly API_ORIGIN = envStr("API_ORIGIN", "https://www.dnd5eapi.co");
  static readonly API_BASE_PATH = envStr("API_BASE_PATH", "/api/2014");
  static readonly REQUEST_TIMEOUT_MS = envInt(
    "REQUEST_TIMEOUT_MS",
    API_CONSTANTS.DEFAULT_TIMEOUT_MS,
  );

  // Pipeline
  static readonly SAMPLE_COUNT = envInt(
    "SAMPLE_COUNT",
    PIPELINE_CONSTANTS.DEFAULT_SAMPLE_COUNT,
  );
  static readonly FETCH_LIMIT = envOptionalInt("FETCH_LIMIT");
  static readonly OUTPUT_FILE = envStr(
    "OUTPUT_FILE",
    PIPELINE_CONSTANTS.DEFAULT_OUTPUT_FILE,
  );

  // Queue mode
  static readonly REDIS_HOST = envStr("REDIS_HOST", "localhost");
  static readonly REDIS_PORT = envInt("REDIS_PORT", 6379);
  static readonly REDIS_PASSWORD = process.env.REDIS_PASSWORD;
  static readonly HANDOFF_TTL_SECONDS = envInt(
    "HANDOFF_TTL_SECONDS",
    QUEUE_CONSTANTS.DEFAULT_HANDOFF_TTL_SECONDS,
  );
  static readonly PIPELINE_CRON = envStr("PIPELINE_CRON", "0 2 * * *");
  static readonly HEALTH_PORT = envInt("HEALTH_PORT", 8080);

  /**
   * Pipeline defaults, with explicit values taking precedence
   */
  static pipelineDefaults(overrides: {
    count?: number;
    limit?: number;
    outputFile?: string;
  } = {}) {
    return {
      count: overrides.count ?? AppConfig.SAMPLE_COUNT,
      limit: overrides.limit ?? AppConfig.FETCH_LIMIT,
      outputFile: overrides.outputFile ?? AppConfig.OUTPUT_FILE,
    };
  }
}
