/**
 * Scheduler Entry Point
 * Sets up the recurring pipeline job
 */

import "dotenv/config";
import { AppConfig } from "./core/config";
import { QUEUE_CONSTANTS } from "./core/constants";
import { toError } from "./core/errors";
import {
  closeConnection,
  createPipelineQueue,
  getScheduledJobs,
  removeScheduledJob,
  scheduleOneTimePipeline,
  scheduleRecurringPipeline,
} from "./core/services";
import { Logger } from "./core/utils/logger";

async function main() {
  const argv = process.argv.slice(2);

  if (argv.includes("--help") || argv.includes("-h")) {
    console.log(`
Scheduler - Configure the recurring pipeline job

Usage:
  npm run scheduler                         # Schedule with default settings
  npm run scheduler -- --cron "0 0 * * *"   # Custom schedule
  npm run scheduler -- --once               # Enqueue a single run now
  npm run scheduler -- --remove             # Remove the recurring job

Options:
  --cron <pattern>   Cron pattern (default: "${AppConfig.PIPELINE_CRON}")
  --count <n>        Monsters to sample (default: ${AppConfig.SAMPLE_COUNT})
  --limit <n>        Keep only the first N catalog entries (default: all)
  --output <file>    Output file (default: ${AppConfig.OUTPUT_FILE})
  --once             Enqueue one run instead of a recurring schedule
  --remove           Remove the recurring schedule

Environment Variables:
  REDIS_HOST             Redis host (default: localhost)
  REDIS_PORT             Redis port (default: 6379)
  REDIS_PASSWORD         Redis password (optional)
`);
    return;
  }

  const getArg = (flag: string) => {
    const i = argv.indexOf(flag);
    return i >= 0 ? argv[i + 1] : undefined;
  };
  const numArg = (flag: string) => {
    const v = getArg(flag);
    if (v === undefined) return undefined;
    const n = Number(v);
    if (!Number.isInteger(n) || n < 0) {
      throw new Error(`${flag} must be a non-negative integer, got "${v}"`);
    }
    return n;
  };

  const cron = getArg("--cron") ?? AppConfig.PIPELINE_CRON;
  const defaults = AppConfig.pipelineDefaults({
    count: numArg("--count"),
    limit: numArg("--limit"),
    outputFile: getArg("--output"),
  });

  Logger.info("Starting scheduler to configure the recurring pipeline", {
    cron,
    ...defaults,
  });

  const queue = createPipelineQueue();
  try {
    if (argv.includes("--remove")) {
      await removeScheduledJob(queue, QUEUE_CONSTANTS.SCHEDULER_ID);
    } else if (argv.includes("--once")) {
      await scheduleOneTimePipeline(queue, defaults);
    } else {
      await scheduleRecurringPipeline(queue, { cron, ...defaults });
      Logger.info(`✅ Scheduled recurring pipeline: ${cron}`);
    }

    const scheduled = await getScheduledJobs(queue);
    Logger.info(`Total scheduled jobs: ${scheduled.length}`);
    scheduled.forEach((scheduler) => {
      Logger.info(`  - ${scheduler.key}: ${scheduler.pattern ?? scheduler.every}`);
    });
  } finally {
    await queue.close();
    await closeConnection();
  }
  Logger.info("Scheduler completed");
}

main().then(
  () => process.exit(0),
  (e) => {
    Logger.error("Scheduler failed", toError(e));
    process.exit(1);
  },
);
