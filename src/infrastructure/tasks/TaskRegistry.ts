/**
 * Task Registry - single-flight run state keyed by run name
 *
 * `tryStart` claims a key atomically; a second claim while the first run is
 * active is refused. State carries the latest step, progress and the final
 * result or error so callers can poll it.
 */

import { Redis as IORedis } from 'ioredis';
import { z } from 'zod';
import { getConfig } from '../../config/index.js';
import { createLogger } from '../logging/logger.js';

const logger = createLogger('task-registry');

// =============================================================================
// TYPES
// =============================================================================

export interface TaskProgress {
  step?: string;
  detail?: string;
  processed?: number;
  total?: number;
}

export interface TaskState {
  key: string;
  running: boolean;
  startedAt: Date;
  finishedAt: Date | null;
  step: string | null;
  detail: string | null;
  processed: number | null;
  total: number | null;
  result: unknown;
  error: string | null;
}

export interface TaskRegistry {
  /** False when a run under `key` is already active */
  tryStart(key: string): Promise<boolean>;
  update(key: string, progress: TaskProgress): Promise<void>;
  complete(key: string, result: unknown): Promise<void>;
  fail(key: string, error: string): Promise<void>;
  get(key: string): Promise<TaskState | null>;
}

function startedState(key: string, at: Date): TaskState {
  return {
    key,
    running: true,
    startedAt: at,
    finishedAt: null,
    step: null,
    detail: null,
    processed: null,
    total: null,
    result: null,
    error: null,
  };
}

function withProgress(state: TaskState, progress: TaskProgress): TaskState {
  return {
    ...state,
    step: progress.step ?? state.step,
    detail: progress.detail ?? state.detail,
    processed: progress.processed ?? state.processed,
    total: progress.total ?? state.total,
  };
}

// =============================================================================
// IN-MEMORY REGISTRY
// =============================================================================

/**
 * Single-process registry
 */
export class InMemoryTaskRegistry implements TaskRegistry {
  private states = new Map<string, TaskState>();

  constructor(private now: () => Date = () => new Date()) {}

  async tryStart(key: string): Promise<boolean> {
    if (this.states.get(key)?.running) {
      return false;
    }
    this.states.set(key, startedState(key, this.now()));
    return true;
  }

  async update(key: string, progress: TaskProgress): Promise<void> {
    const state = this.states.get(key);
    if (state?.running) {
      this.states.set(key, withProgress(state, progress));
    }
  }

  async complete(key: string, result: unknown): Promise<void> {
    this.finish(key, { result });
  }

  async fail(key: string, error: string): Promise<void> {
    this.finish(key, { error });
  }

  async get(key: string): Promise<TaskState | null> {
    const state = this.states.get(key);
    return state ? { ...state } : null;
  }

  private finish(key: string, outcome: Pick<Partial<TaskState>, 'result' | 'error'>): void {
    const state = this.states.get(key) ?? startedState(key, this.now());
    this.states.set(key, { ...state, ...outcome, running: false, finishedAt: this.now() });
  }
}

// =============================================================================
// REDIS REGISTRY
// =============================================================================

/**
 * The Redis commands the registry needs
 */
export interface RedisStore {
  /** SET NX with expiry; true when the key was set */
  setIfAbsent(key: string, value: string, ttlMs: number): Promise<boolean>;
  set(key: string, value: string): Promise<void>;
  get(key: string): Promise<string | null>;
  del(key: string): Promise<void>;
}

export function ioredisStore(client: IORedis): RedisStore {
  return {
    setIfAbsent: async (key, value, ttlMs) => (await client.set(key, value, 'PX', ttlMs, 'NX')) === 'OK',
    set: async (key, value) => {
      await client.set(key, value);
    },
    get: (key) => client.get(key),
    del: async (key) => {
      await client.del(key);
    },
  };
}

const storedStateSchema = z.object({
  key: z.string(),
  running: z.boolean(),
  startedAt: z.coerce.date(),
  finishedAt: z.coerce.date().nullable(),
  step: z.string().nullable(),
  detail: z.string().nullable(),
  processed: z.number().nullable(),
  total: z.number().nullable(),
  result: z.unknown(),
  error: z.string().nullable(),
});

/** A crashed worker's lock expires after this long */
const DEFAULT_LOCK_TTL_MS = 6 * 60 * 60 * 1000;

/**
 * Registry shared by every process on the same Redis. The lock key is a
 * SET NX with expiry; the state is a JSON document beside it.
 */
export class RedisTaskRegistry implements TaskRegistry {
  constructor(
    private store: RedisStore,
    private prefix: string,
    private lockTtlMs: number = DEFAULT_LOCK_TTL_MS,
    private now: () => Date = () => new Date()
  ) {}

  async tryStart(key: string): Promise<boolean> {
    const startedAt = this.now();
    const acquired = await this.store.setIfAbsent(this.lockKey(key), startedAt.toISOString(), this.lockTtlMs);
    if (!acquired) {
      return false;
    }
    await this.write(startedState(key, startedAt));
    return true;
  }

  async update(key: string, progress: TaskProgress): Promise<void> {
    const state = await this.get(key);
    if (state?.running) {
      await this.write(withProgress(state, progress));
    }
  }

  async complete(key: string, result: unknown): Promise<void> {
    await this.finish(key, { result });
  }

  async fail(key: string, error: string): Promise<void> {
    await this.finish(key, { error });
  }

  async get(key: string): Promise<TaskState | null> {
    const raw = await this.store.get(this.stateKey(key));
    if (raw === null) {
      return null;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      logger.warn({ key, err: error }, 'Unreadable task state');
      return null;
    }

    const parsed = storedStateSchema.safeParse(json);
    if (!parsed.success) {
      logger.warn({ key, issues: parsed.error.issues.length }, 'Task state has unexpected shape');
      return null;
    }
    return { ...parsed.data, result: parsed.data.result ?? null };
  }

  private async finish(key: string, outcome: Pick<Partial<TaskState>, 'result' | 'error'>): Promise<void> {
    const state = (await this.get(key)) ?? startedState(key, this.now());
    await this.write({ ...state, ...outcome, running: false, finishedAt: this.now() });
    await this.store.del(this.lockKey(key));
  }

  private async write(state: TaskState): Promise<void> {
    await this.store.set(this.stateKey(state.key), JSON.stringify(state));
  }

  private lockKey(key: string): string {
    return `${this.prefix}:task:${key}:lock`;
  }

  private stateKey(key: string): string {
    return `${this.prefix}:task:${key}:state`;
  }
}

// =============================================================================
// SINGLETON INSTANCE
// =============================================================================

let registryInstance: TaskRegistry | null = null;
let registryClient: IORedis | null = null;

export function getTaskRegistry(): TaskRegistry {
  if (!registryInstance) {
    const config = getConfig();
    if (config.queue.registry === 'redis') {
      registryClient = new IORedis(config.queue.redisUrl);
      registryInstance = new RedisTaskRegistry(ioredisStore(registryClient), config.queue.prefix);
    } else {
      registryInstance = new InMemoryTaskRegistry();
    }
  }
  return registryInstance;
}

export async function closeTaskRegistry(): Promise<void> {
  if (registryClient) {
    await registryClient.quit();
    registryClient = null;
  }
  registryInstance = null;
}
