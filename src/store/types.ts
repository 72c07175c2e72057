/**
 * Coordination Store Types
 *
 * The shared, TTL-capable key-value store every component coordinates
 * through. One handle per process, owned and closed by the entrypoint.
 */

export type ScoreBound = number | '-inf' | '+inf';

export interface RangeOptions {
  offset?: number;
  count?: number;
}

export interface CoordinationStore {
  readonly kind: 'redis' | 'memory';

  get(key: string): Promise<string | null>;
  /** Last-write-wins. Without a TTL the key never expires. */
  set(key: string, value: string, ttlSeconds?: number): Promise<void>;
  /** Test-and-set: writes only when the key is absent. */
  setIfAbsent(key: string, value: string, ttlSeconds: number): Promise<boolean>;
  /** Deletes every key in one command; returns how many existed. */
  del(...keys: string[]): Promise<number>;
  exists(key: string): Promise<boolean>;
  expire(key: string, ttlSeconds: number): Promise<boolean>;
  /** Remaining seconds; -1 when the key has no expiry, -2 when missing. */
  ttl(key: string): Promise<number>;

  /** Append to a list, optionally (re)setting the list TTL in the same round trip. */
  pushTail(key: string, value: string, ttlSeconds?: number): Promise<number>;
  listRange(key: string, start: number, stop: number): Promise<string[]>;
  listLength(key: string): Promise<number>;
  /** Prepend and trim so only the newest `maxLength` entries remain. */
  pushHeadCapped(key: string, value: string, maxLength: number): Promise<void>;
  /** Atomically read a whole list and delete it together with `alsoDelete`. */
  drainList(key: string, alsoDelete?: string[]): Promise<string[]>;

  sortedAdd(key: string, score: number, member: string): Promise<void>;
  sortedRemove(key: string, member: string): Promise<boolean>;
  /** Inclusive score range, ascending. */
  sortedRangeByScore(key: string, min: ScoreBound, max: ScoreBound, options?: RangeOptions): Promise<string[]>;
  /** Inclusive score range; returns how many members were removed. */
  sortedRemoveRangeByScore(key: string, min: ScoreBound, max: ScoreBound): Promise<number>;

  ping(): Promise<boolean>;
  close(): Promise<void>;
}
