/**
 * Application constants
 */

// Catalog API constants
export const API_CONSTANTS = {
  MONSTERS_RESOURCE: "monsters",
  USER_AGENT: "monster-pipeline/1.0",
  ACCEPT_HEADER: "application/json",
  DEFAULT_TIMEOUT_MS: 30000,
} as const;

// Pipeline constants
export const PIPELINE_CONSTANTS = {
  DEFAULT_SAMPLE_COUNT: 5,
  DEFAULT_OUTPUT_FILE: "monsters.json",
  JSON_INDENT: 2,
} as const;

// Queue constants
export const QUEUE_CONSTANTS = {
  QUEUE_NAME: "monster-pipeline",
  SCHEDULER_ID: "monster-pipeline-recurring",
  HANDOFF_PREFIX: "handoff",
  DEFAULT_HANDOFF_TTL_SECONDS: 86400,
} as const;
