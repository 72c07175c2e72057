import { ContactHints, SessionRef } from '../session/types';

/**
 * What one inbound message turned into.
 * - `scheduled`: this caller won the lock; a drain job runs after the window
 * - `buffered`: another worker owns aggregation; nothing to do now
 * - `degraded`: aggregation skipped; process `combinedText` immediately
 */
export type AggregationDecision =
  | { outcome: 'scheduled'; bufferCount: number; drainAt: number }
  | { outcome: 'buffered'; bufferCount: number }
  | { outcome: 'degraded'; reason: 'disabled' | 'store_unavailable'; combinedText: string; bufferCount: 1 };

export interface DrainedBatch {
  session: SessionRef;
  messages: string[];
  combinedText: string;
  /** Latest display name and first channel origin seen in the batch */
  contact: ContactHints;
}

/** One buffer entry as stored */
export interface BufferedMessage extends ContactHints {
  text: string;
}

export interface MessageAggregatorOptions {
  enabled?: boolean;
  windowSeconds?: number;
  separator?: string;
  /** Lock outlives the window by this much so it cannot expire mid-wait */
  lockMarginSeconds?: number;
  /** Marker and buffer lifetime beyond the window */
  markerMarginSeconds?: number;
  now?: () => number;
}

export type DrainHandler = (session: SessionRef) => Promise<void>;

/** Runs the delayed drain step outside the request that won the lock. */
export interface DrainScheduler {
  schedule(session: SessionRef, delayMs: number): void;
  onDrain(handler: DrainHandler): void;
  /** Jobs waiting to fire in this process */
  pending(): number;
  stop(): void;
}
