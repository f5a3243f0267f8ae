/**
 * BullMQ Queue Configuration
 * Schedules pipeline runs and processes them in a worker
 */

import { Queue, Worker, type Job } from "bullmq";
import Redis from "ioredis";
import { AppConfig } from "../config";
import { QUEUE_CONSTANTS } from "../constants";
import { toError } from "../errors";
import { RedisHandoff } from "../pipeline/handoff";
import type { PipelineOptions, PipelineResult } from "../types";
import { Logger } from "../utils/logger";
import { runMonsterPipeline } from "./pipeline-service";

let connection: Redis | undefined;

/**
 * Shared Redis connection, created on first use
 */
export function getConnection(): Redis {
  connection ??= new Redis({
    host: AppConfig.REDIS_HOST,
    port: AppConfig.REDIS_PORT,
    password: AppConfig.REDIS_PASSWORD,
    maxRetriesPerRequest: null, // Required for BullMQ
  });
  return connection;
}

/**
 * Closes the shared Redis connection if one was opened
 */
export async function closeConnection(): Promise<void> {
  if (!connection) return;
  await connection.quit();
  connection = undefined;
}

export type PipelineJobData = PipelineOptions;

export const QUEUE_NAMES = {
  PIPELINE: QUEUE_CONSTANTS.QUEUE_NAME,
} as const;

/**
 * Create a new pipeline queue
 */
export function createPipelineQueue() {
  return new Queue<PipelineJobData, PipelineResult>(QUEUE_NAMES.PIPELINE, {
    connection: getConnection(),
  });
}

/**
 * Default processor for pipeline jobs.
 * Stages hand their output over through Redis, namespaced by the job id.
 */
export async function processPipelineJob(
  job: Job<PipelineJobData, PipelineResult>,
): Promise<PipelineResult> {
  const { count, limit, outputFile } = job.data;

  Logger.info(`Processing job ${job.id}`, { count, limit, outputFile });

  const handoff = new RedisHandoff(getConnection(), {
    runId: job.id ?? `${job.name}-${job.timestamp}`,
    ttlSeconds: AppConfig.HANDOFF_TTL_SECONDS,
  });

  try {
    const result = await runMonsterPipeline({ count, limit, outputFile }, handoff);
    Logger.info(`Job ${job.id} ${result.status}`, {
      count: result.monsterCount,
      outputFile: result.outputFile,
    });
    return result;
  } catch (error) {
    Logger.error(`Job ${job.id} failed`, toError(error));
    throw error;
  }
}

/**
 * Setup default event handlers for a worker
 */
export function setupWorkerEventHandlers(
  worker: Worker<PipelineJobData, PipelineResult>,
) {
  worker.on("completed", (job) => {
    Logger.info(`Job ${job.id} completed successfully`);
  });

  worker.on("failed", (job, err) => {
    Logger.error(`Job ${job?.id} failed`, err);
  });

  worker.on("error", (err) => {
    Logger.error("Worker error", err);
  });
}

/**
 * Create a worker to process pipeline jobs, one at a time
 */
export function createPipelineWorker(
  processor: (
    job: Job<PipelineJobData, PipelineResult>,
  ) => Promise<PipelineResult> = processPipelineJob,
  setupEvents = true,
) {
  const worker = new Worker<PipelineJobData, PipelineResult>(
    QUEUE_NAMES.PIPELINE,
    processor,
    {
      connection: getConnection(),
      concurrency: 1,
    },
  );

  if (setupEvents) {
    setupWorkerEventHandlers(worker);
  }

  return worker;
}

/**
 * Schedule recurring pipeline runs using upsertJobScheduler
 */
export async function scheduleRecurringPipeline(
  queue: Queue<PipelineJobData, PipelineResult>,
  options: PipelineJobData & { cron?: string } = {},
) {
  const { cron = AppConfig.PIPELINE_CRON, ...data } = options;

  await queue.upsertJobScheduler(
    QUEUE_CONSTANTS.SCHEDULER_ID,
    {
      pattern: cron,
    },
    {
      name: "monster-pipeline",
      data,
      opts: {
        removeOnComplete: {
          age: 24 * 3600, // Keep completed jobs for 24 hours
          count: 1000,
        },
        removeOnFail: {
          age: 7 * 24 * 3600, // Keep failed jobs for 7 days
        },
      },
    },
  );

  Logger.info("Scheduled recurring pipeline run", { cron, ...data });
}

/**
 * Schedule a one-time pipeline run.
 * Retries are safe: a run whose output already exists is skipped.
 */
export async function scheduleOneTimePipeline(
  queue: Queue<PipelineJobData, PipelineResult>,
  data: PipelineJobData,
  options: { delay?: number } = {},
) {
  const job = await queue.add("monster-pipeline-onetime", data, {
    delay: options.delay,
    attempts: 3,
    backoff: {
      type: "exponential",
      delay: 60000, // 1 minute
    },
  });

  Logger.info(`Scheduled one-time pipeline job: ${job.id}`, { ...data });

  return job;
}

/**
 * Get all scheduled jobs using the Job Scheduler API
 */
export async function getScheduledJobs(
  queue: Queue<PipelineJobData, PipelineResult>,
) {
  return queue.getJobSchedulers();
}

/**
 * Remove a scheduled recurring job by scheduler ID
 */
export async function removeScheduledJob(
  queue: Queue<PipelineJobData, PipelineResult>,
  schedulerId: string,
) {
  await queue.removeJobScheduler(schedulerId);
  Logger.info(`Removed scheduled job: ${schedulerId}`);
}
