import "dotenv/config";
import {
  AppConfig,
  Logger,
  PIPELINE_STAGES,
  RedisHandoff,
  closeConnection,
  createApiClient,
  getConnection,
  runMonsterPipeline,
  runStage,
  toError,
  type PipelineStage,
} from "./core";

const USAGE = `Usage:
tsx src/cli.ts [--count N] [--limit N] [--output FILE]
tsx src/cli.ts --stage <stage> --run-id <id> [--count N] [--limit N] [--output FILE]

Direct mode runs all four stages in-process. Stage mode runs a single stage and
hands its output to the next one through Redis, keyed by --run-id.

Options:
  --count    Monsters to sample (default: ${AppConfig.SAMPLE_COUNT})
  --limit    Keep only the first N catalog entries (default: all)
  --output   Output file (default: ${AppConfig.OUTPUT_FILE})
  --stage    One of: ${PIPELINE_STAGES.join(", ")}
  --run-id   Hand-off namespace shared by the stages of one run

Examples:
  npm run cli -- --count 3
  npm run cli -- --stage fetch_monsters --run-id 2025-01-01`;

function isStage(value: string): value is PipelineStage {
  return PIPELINE_STAGES.some((s) => s === value);
}

function parseIntArg(name: string, raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const n = Number(raw);
  if (!Number.isInteger(n) || n < 0) {
    throw new Error(`${name} must be a non-negative integer, got "${raw}"`);
  }
  return n;
}

async function main(): Promise<number> {
  const argv = process.argv.slice(2);

  const hasFlag = (flag: string) => argv.includes(flag);
  const getArg = (flag: string) => {
    const i = argv.lastIndexOf(flag);
    return i >= 0 ? argv[i + 1] : undefined;
  };

  if (hasFlag("--help") || hasFlag("-h")) {
    Logger.info(USAGE);
    return 0;
  }

  const options = {
    count: parseIntArg("--count", getArg("--count")),
    limit: parseIntArg("--limit", getArg("--limit")),
    outputFile: getArg("--output"),
  };

  const stage = getArg("--stage");
  if (stage === undefined) {
    const result = await runMonsterPipeline(options);
    if (result.status === "skipped") {
      Logger.info(`Nothing to do, ${result.outputFile} already exists`);
    } else {
      Logger.info(
        `✅ Pipeline completed: ${result.monsterCount} monsters in ${result.outputFile}`,
      );
    }
    return 0;
  }

  if (!isStage(stage)) {
    Logger.error(`❌ Unknown stage: ${stage}`);
    Logger.info(`Available stages: ${PIPELINE_STAGES.join(", ")}`);
    return 1;
  }

  const runId = getArg("--run-id");
  if (!runId) {
    Logger.error("❌ --stage requires --run-id");
    return 1;
  }

  try {
    const handoff = new RedisHandoff(getConnection(), {
      runId,
      ttlSeconds: AppConfig.HANDOFF_TTL_SECONDS,
    });
    const produced = await runStage(
      stage,
      { client: createApiClient(), handoff },
      AppConfig.pipelineDefaults(options),
    );
    Logger.info(`✅ Stage ${stage} completed: ${produced} items`);
    return 0;
  } finally {
    await closeConnection();
  }
}

main().then(
  (code) => process.exit(code),
  (e) => {
    Logger.error("❌ Pipeline failed", toError(e));
    process.exit(1);
  },
);
