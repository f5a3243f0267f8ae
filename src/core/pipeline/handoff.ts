/**
 * Inter-stage hand-off channels.
 * A stage pushes its output under its own stage id; the next stage pulls it.
 * Channels store values as given and never reshape them.
 */

import { QUEUE_CONSTANTS } from "../constants";

export interface HandoffChannel {
  push(key: string, value: unknown): Promise<void>;
  /** Resolves undefined when nothing was pushed under `key` */
  pull(key: string): Promise<unknown>;
  clear(): Promise<void>;
}

/**
 * Channel for a single in-process run
 */
export class InMemoryHandoff implements HandoffChannel {
  private readonly values = new Map<string, unknown>();

  async push(key: string, value: unknown): Promise<void> {
    this.values.set(key, value);
  }

  async pull(key: string): Promise<unknown> {
    return this.values.get(key);
  }

  async clear(): Promise<void> {
    this.values.clear();
  }
}

/**
 * The subset of the ioredis client the Redis channel needs
 */
export interface KeyValueStore {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, mode: "EX", seconds: number): Promise<unknown>;
  del(key: string): Promise<number>;
}

export interface RedisHandoffOptions {
  /** Namespaces the keys of one run, e.g. a job id */
  runId: string;
  ttlSeconds?: number;
  prefix?: string;
}

/**
 * Channel backed by Redis, for stages that run in separate processes.
 * Values are stored as JSON under `<prefix>:<runId>:<key>` and expire after the TTL.
 */
export class RedisHandoff implements HandoffChannel {
  private readonly runId: string;
  private readonly ttlSeconds: number;
  private readonly prefix: string;
  private readonly pushed = new Set<string>();

  constructor(
    private readonly store: KeyValueStore,
    options: RedisHandoffOptions,
  ) {
    this.runId = options.runId;
    this.ttlSeconds =
      options.ttlSeconds ?? QUEUE_CONSTANTS.DEFAULT_HANDOFF_TTL_SECONDS;
    this.prefix = options.prefix ?? QUEUE_CONSTANTS.HANDOFF_PREFIX;
  }

  keyFor(key: string): string {
    return `${this.prefix}:${this.runId}:${key}`;
  }

  async push(key: string, value: unknown): Promise<void> {
    const fullKey = this.keyFor(key);
    await this.store.set(fullKey, JSON.stringify(value), "EX", this.ttlSeconds);
    this.pushed.add(fullKey);
  }

  async pull(key: string): Promise<unknown> {
    const raw = await this.store.get(this.keyFor(key));
    if (raw === null) return undefined;
    return JSON.parse(raw);
  }

  /** Deletes the keys this instance pushed; anything else expires via TTL */
  async clear(): Promise<void> {
    for (const fullKey of this.pushed) {
      await this.store.del(fullKey);
    }
    this.pushed.clear();
  }
}
