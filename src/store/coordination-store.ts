/**
 * Coordination Store
 *
 * Redis-backed with in-memory fallback. Redis failures surface as
 * `StoreUnavailableError`; callers decide whether to propagate or degrade.
 */

import Redis from 'ioredis';
import { CoordinationStore, RangeOptions, ScoreBound } from './types';
import { StoreUnavailableError } from '../resilience/errors';
import { storeErrors } from '../observability/metrics';
import { logger } from '../observability/logger';

type ExecResult = [Error | null, unknown][] | null;

// ───── Redis Implementation ─────────────────────────────────────

export class RedisCoordinationStore implements CoordinationStore {
  readonly kind = 'redis' as const;
  private readonly log = logger.child({ component: 'store-redis' });

  constructor(private readonly redis: Redis) {}

  async get(key: string): Promise<string | null> {
    return this.run('get', () => this.redis.get(key));
  }

  async set(key: string, value: string, ttlSeconds?: number): Promise<void> {
    await this.run('set', () =>
      ttlSeconds !== undefined
        ? this.redis.set(key, value, 'EX', ttlSeconds)
        : this.redis.set(key, value),
    );
  }

  async setIfAbsent(key: string, value: string, ttlSeconds: number): Promise<boolean> {
    // SET NX returns 'OK' if key was set, null if it already exists
    const result = await this.run('setIfAbsent', () => this.redis.set(key, value, 'EX', ttlSeconds, 'NX'));
    return result === 'OK';
  }

  async del(...keys: string[]): Promise<number> {
    if (keys.length === 0) return 0;
    return this.run('del', () => this.redis.del(...keys));
  }

  async exists(key: string): Promise<boolean> {
    return (await this.run('exists', () => this.redis.exists(key))) === 1;
  }

  async expire(key: string, ttlSeconds: number): Promise<boolean> {
    return (await this.run('expire', () => this.redis.expire(key, ttlSeconds))) === 1;
  }

  async ttl(key: string): Promise<number> {
    return this.run('ttl', () => this.redis.ttl(key));
  }

  async pushTail(key: string, value: string, ttlSeconds?: number): Promise<number> {
    if (ttlSeconds === undefined) {
      return this.run('pushTail', () => this.redis.rpush(key, value));
    }
    const results = await this.run('pushTail', () =>
      this.redis.multi().rpush(key, value).expire(key, ttlSeconds).exec(),
    );
    const length = this.unwrap('pushTail', results)[0];
    return typeof length === 'number' ? length : 0;
  }

  async listRange(key: string, start: number, stop: number): Promise<string[]> {
    return this.run('listRange', () => this.redis.lrange(key, start, stop));
  }

  async listLength(key: string): Promise<number> {
    return this.run('listLength', () => this.redis.llen(key));
  }

  async pushHeadCapped(key: string, value: string, maxLength: number): Promise<void> {
    const results = await this.run('pushHeadCapped', () =>
      this.redis.pipeline().lpush(key, value).ltrim(key, 0, maxLength - 1).exec(),
    );
    this.unwrap('pushHeadCapped', results);
  }

  async drainList(key: string, alsoDelete: string[] = []): Promise<string[]> {
    const results = await this.run('drainList', () =>
      this.redis.multi().lrange(key, 0, -1).del(key, ...alsoDelete).exec(),
    );
    const items = this.unwrap('drainList', results)[0];
    if (!Array.isArray(items)) return [];
    return items.filter((item): item is string => typeof item === 'string');
  }

  async sortedAdd(key: string, score: number, member: string): Promise<void> {
    await this.run('sortedAdd', () => this.redis.zadd(key, score, member));
  }

  async sortedRemove(key: string, member: string): Promise<boolean> {
    return (await this.run('sortedRemove', () => this.redis.zrem(key, member))) > 0;
  }

  async sortedRangeByScore(
    key: string,
    min: ScoreBound,
    max: ScoreBound,
    options?: RangeOptions,
  ): Promise<string[]> {
    if (options?.count !== undefined) {
      const offset = options.offset ?? 0;
      const count = options.count;
      return this.run('sortedRangeByScore', () =>
        this.redis.zrangebyscore(key, min, max, 'LIMIT', offset, count),
      );
    }
    return this.run('sortedRangeByScore', () => this.redis.zrangebyscore(key, min, max));
  }

  async sortedRemoveRangeByScore(key: string, min: ScoreBound, max: ScoreBound): Promise<number> {
    return this.run('sortedRemoveRangeByScore', () => this.redis.zremrangebyscore(key, min, max));
  }

  async ping(): Promise<boolean> {
    try {
      return (await this.redis.ping()) === 'PONG';
    } catch (err) {
      this.log.warn({ err }, 'Redis ping failed');
      return false;
    }
  }

  async close(): Promise<void> {
    await this.redis.quit();
  }

  private async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      storeErrors.inc({ operation });
      this.log.error({ err, operation }, 'Coordination store command failed');
      throw new StoreUnavailableError(operation, err);
    }
  }

  /** Return per-command results of a MULTI/pipeline, failing on any command error. */
  private unwrap(operation: string, results: ExecResult): unknown[] {
    if (!results) {
      storeErrors.inc({ operation });
      throw new StoreUnavailableError(operation, new Error('transaction aborted'));
    }
    const values: unknown[] = [];
    for (const [err, value] of results) {
      if (err) {
        storeErrors.inc({ operation });
        throw new StoreUnavailableError(operation, err);
      }
      values.push(value);
    }
    return values;
  }
}

// ───── In-Memory Implementation ─────────────────────────────────

type MemoryValue =
  | { type: 'string'; value: string }
  | { type: 'list'; items: string[] }
  | { type: 'zset'; members: Map<string, number> };

type MemoryEntry = MemoryValue & { expiresAt?: number };

/**
 * Single-process stand-in with Redis semantics for the commands above.
 * Expiry is evaluated lazily against `now`, so tests can move the clock.
 */
export class InMemoryCoordinationStore implements CoordinationStore {
  readonly kind = 'memory' as const;
  private readonly entries = new Map<string, MemoryEntry>();

  constructor(private readonly now: () => number = Date.now) {}

  async get(key: string): Promise<string | null> {
    const entry = this.live(key);
    if (!entry) return null;
    if (entry.type !== 'string') throw this.wrongType('get', key);
    return entry.value;
  }

  async set(key: string, value: string, ttlSeconds?: number): Promise<void> {
    this.entries.set(key, { type: 'string', value, expiresAt: this.expiry(ttlSeconds) });
  }

  async setIfAbsent(key: string, value: string, ttlSeconds: number): Promise<boolean> {
    if (this.live(key)) return false;
    await this.set(key, value, ttlSeconds);
    return true;
  }

  async del(...keys: string[]): Promise<number> {
    let removed = 0;
    for (const key of keys) {
      if (this.live(key)) removed++;
      this.entries.delete(key);
    }
    return removed;
  }

  async exists(key: string): Promise<boolean> {
    return this.live(key) !== undefined;
  }

  async expire(key: string, ttlSeconds: number): Promise<boolean> {
    const entry = this.live(key);
    if (!entry) return false;
    entry.expiresAt = this.expiry(ttlSeconds);
    return true;
  }

  async ttl(key: string): Promise<number> {
    const entry = this.live(key);
    if (!entry) return -2;
    if (entry.expiresAt === undefined) return -1;
    return Math.ceil((entry.expiresAt - this.now()) / 1000);
  }

  async pushTail(key: string, value: string, ttlSeconds?: number): Promise<number> {
    const list = this.listEntry('pushTail', key);
    list.items.push(value);
    if (ttlSeconds !== undefined) list.expiresAt = this.expiry(ttlSeconds);
    return list.items.length;
  }

  async listRange(key: string, start: number, stop: number): Promise<string[]> {
    const entry = this.live(key);
    if (!entry) return [];
    if (entry.type !== 'list') throw this.wrongType('listRange', key);
    const len = entry.items.length;
    const from = start < 0 ? Math.max(len + start, 0) : start;
    const to = stop < 0 ? len + stop : Math.min(stop, len - 1);
    return from > to ? [] : entry.items.slice(from, to + 1);
  }

  async listLength(key: string): Promise<number> {
    const entry = this.live(key);
    if (!entry) return 0;
    if (entry.type !== 'list') throw this.wrongType('listLength', key);
    return entry.items.length;
  }

  async pushHeadCapped(key: string, value: string, maxLength: number): Promise<void> {
    const list = this.listEntry('pushHeadCapped', key);
    list.items.unshift(value);
    list.items.splice(maxLength);
  }

  async drainList(key: string, alsoDelete: string[] = []): Promise<string[]> {
    const items = await this.listRange(key, 0, -1);
    await this.del(key, ...alsoDelete);
    return items;
  }

  async sortedAdd(key: string, score: number, member: string): Promise<void> {
    let entry = this.live(key);
    if (!entry) {
      entry = { type: 'zset', members: new Map() };
      this.entries.set(key, entry);
    }
    if (entry.type !== 'zset') throw this.wrongType('sortedAdd', key);
    entry.members.set(member, score);
  }

  async sortedRemove(key: string, member: string): Promise<boolean> {
    const entry = this.live(key);
    if (!entry) return false;
    if (entry.type !== 'zset') throw this.wrongType('sortedRemove', key);
    return entry.members.delete(member);
  }

  async sortedRangeByScore(
    key: string,
    min: ScoreBound,
    max: ScoreBound,
    options?: RangeOptions,
  ): Promise<string[]> {
    const entry = this.live(key);
    if (!entry) return [];
    if (entry.type !== 'zset') throw this.wrongType('sortedRangeByScore', key);
    const [lo, hi] = [toScore(min), toScore(max)];
    const members = Array.from(entry.members.entries())
      .filter(([, score]) => score >= lo && score <= hi)
      .sort(([aMember, aScore], [bMember, bScore]) => aScore - bScore || aMember.localeCompare(bMember))
      .map(([member]) => member);
    const offset = options?.offset ?? 0;
    return options?.count !== undefined
      ? members.slice(offset, offset + options.count)
      : members.slice(offset);
  }

  async sortedRemoveRangeByScore(key: string, min: ScoreBound, max: ScoreBound): Promise<number> {
    const entry = this.live(key);
    if (!entry) return 0;
    if (entry.type !== 'zset') throw this.wrongType('sortedRemoveRangeByScore', key);
    const [lo, hi] = [toScore(min), toScore(max)];
    let removed = 0;
    for (const [member, score] of Array.from(entry.members.entries())) {
      if (score >= lo && score <= hi) {
        entry.members.delete(member);
        removed++;
      }
    }
    return removed;
  }

  async ping(): Promise<boolean> {
    return true;
  }

  async close(): Promise<void> {
    this.entries.clear();
  }

  private live(key: string): MemoryEntry | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (entry.expiresAt !== undefined && this.now() >= entry.expiresAt) {
      this.entries.delete(key);
      return undefined;
    }
    return entry;
  }

  private listEntry(operation: string, key: string): Extract<MemoryEntry, { type: 'list' }> {
    const entry = this.live(key);
    if (!entry) {
      const created: Extract<MemoryEntry, { type: 'list' }> = { type: 'list', items: [] };
      this.entries.set(key, created);
      return created;
    }
    if (entry.type !== 'list') throw this.wrongType(operation, key);
    return entry;
  }

  private expiry(ttlSeconds?: number): number | undefined {
    return ttlSeconds === undefined ? undefined : this.now() + ttlSeconds * 1000;
  }

  private wrongType(operation: string, key: string): StoreUnavailableError {
    return new StoreUnavailableError(operation, new Error(`WRONGTYPE operation against key ${key}`));
  }
}

function toScore(bound: ScoreBound): number {
  if (bound === '-inf') return -Infinity;
  if (bound === '+inf') return Infinity;
  return bound;
}

// ───── Factory ──────────────────────────────────────────────────

export function createCoordinationStore(redis?: Redis): CoordinationStore {
  if (redis) {
    logger.info('Coordination store: Redis-backed');
    return new RedisCoordinationStore(redis);
  }
  logger.warn('Coordination store: In-memory (single process only, not for production)');
  return new InMemoryCoordinationStore();
}
