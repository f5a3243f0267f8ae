import pino from "pino";

const pretty = !["production", "test"].includes(process.env.NODE_ENV ?? "");

// Set log level via env LOG_LEVEL (default: info)
const logger = pino({
  level: process.env.LOG_LEVEL || "info",
  transport: pretty
    ? {
        target: "pino-pretty",
        options: { colorize: true },
      }
    : undefined,
});

export interface LogMeta {
  stage?: string;
  url?: string;
  duration?: number;
  count?: number;
  error?: string;
  [key: string]: unknown;
}

export class Logger {
  static info(message: string, meta?: LogMeta): void {
    logger.info(meta || {}, message);
  }
  static warn(message: string, meta?: LogMeta): void {
    logger.warn(meta || {}, message);
  }
  static error(message: string, error?: Error, meta?: LogMeta): void {
    const errorMeta = {
      ...meta,
      error: error?.message,
      stack: error?.stack,
    };
    logger.error(errorMeta, message);
  }
  static debug(message: string, meta?: LogMeta): void {
    logger.debug(meta || {}, message);
  }
  // Convenience methods for common logging patterns
  static stageStarted(stage: string, meta?: LogMeta): void {
    this.info(`Stage started: ${stage}`, { stage, ...meta });
  }
  static stageCompleted(stage: string, count: number, duration: number): void {
    this.info(`Stage completed: ${stage}`, { stage, count, duration });
  }
  static monsterProcessed(
    name: string,
    hitPoints: number | null,
    armorClass: number | null,
  ): void {
    this.info(`Processed ${name}`, { monster: name, hitPoints, armorClass });
  }
  static monsterFailed(name: string, url: string, error: Error): void {
    this.error(`Failed to process ${name}`, error, { monster: name, url });
  }
}
