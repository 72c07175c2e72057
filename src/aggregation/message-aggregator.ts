/**
 * Message Aggregator
 *
 * Coalesces messages that arrive for one session within the aggregation
 * window into a single unit of work. Coordination happens only through the
 * store: a processing marker, a test-and-set lock and an ordered buffer per
 * session. The lock winner does not wait in the request path; it hands the
 * session to a DrainScheduler, whose job calls `drainSession` once the
 * window has passed.
 */

import { v4 as uuidv4 } from 'uuid';
import { AggregationDecision, BufferedMessage, DrainScheduler, DrainedBatch, MessageAggregatorOptions } from './types';
import { ContactHints, SessionRef } from '../session/types';
import { SessionKeyspace } from '../session/session-keyspace';
import { CoordinationStore } from '../store/types';
import { isStoreUnavailable } from '../resilience/errors';
import { logger } from '../observability/logger';
import { maskIdentity, previewText } from '../observability/pii-redactor';
import { aggregatedBatchSize, aggregationDecisions } from '../observability/metrics';

export const DEFAULT_AGGREGATION_WINDOW_SECONDS = 30;
const DEFAULT_LOCK_MARGIN_SECONDS = 5;
const DEFAULT_MARKER_MARGIN_SECONDS = 10;

export class MessageAggregator {
  private readonly log = logger.child({ component: 'message-aggregator' });
  private readonly enabled: boolean;
  private readonly windowSeconds: number;
  private readonly separator: string;
  private readonly lockTtl: number;
  private readonly markerTtl: number;
  private readonly now: () => number;

  constructor(
    private readonly store: CoordinationStore,
    private readonly keyspace: SessionKeyspace,
    private readonly scheduler: DrainScheduler,
    options: MessageAggregatorOptions = {},
  ) {
    this.enabled = options.enabled ?? true;
    this.windowSeconds = options.windowSeconds ?? DEFAULT_AGGREGATION_WINDOW_SECONDS;
    this.separator = options.separator ?? ' ';
    this.lockTtl = this.windowSeconds + Math.max(1, options.lockMarginSeconds ?? DEFAULT_LOCK_MARGIN_SECONDS);
    this.markerTtl = this.windowSeconds + Math.max(1, options.markerMarginSeconds ?? DEFAULT_MARKER_MARGIN_SECONDS);
    this.now = options.now ?? Date.now;
  }

  get windowMs(): number {
    return this.windowSeconds * 1000;
  }

  /**
   * Buffer one inbound message and decide who processes it. Contact hints
   * travel inside the buffer entry; nothing else about the session is written.
   */
  async submit(session: SessionRef, text: string, contact: ContactHints = {}): Promise<AggregationDecision> {
    if (!this.enabled) {
      return this.degraded(text, 'disabled');
    }

    const keys = this.keysFor(session);
    const entry = encodeEntry(text, contact);
    try {
      if (await this.store.exists(keys.marker)) {
        return await this.joinBuffer(session, entry);
      }

      const acquired = await this.store.setIfAbsent(keys.lock, uuidv4(), this.lockTtl);
      if (!acquired) {
        // Lost the race between the marker check and the lock
        return await this.joinBuffer(session, entry);
      }

      await this.store.set(keys.marker, '1', this.markerTtl);
      const bufferCount = await this.store.pushTail(keys.buffer, entry, this.markerTtl);
      this.scheduler.schedule(session, this.windowMs);

      aggregationDecisions.inc({ outcome: 'scheduled' });
      this.log.debug(
        { identity: maskIdentity(session.identity), channel: session.channel, windowSeconds: this.windowSeconds },
        'Aggregation window opened',
      );
      return { outcome: 'scheduled', bufferCount, drainAt: this.now() + this.windowMs };
    } catch (err) {
      if (!isStoreUnavailable(err)) throw err;
      this.log.warn(
        { identity: maskIdentity(session.identity), channel: session.channel, err },
        'Store unavailable; processing without aggregation',
      );
      return this.degraded(text, 'store_unavailable');
    }
  }

  /**
   * Take everything buffered for the session and release its lock and
   * marker in the same atomic step. An empty batch means someone else
   * already drained or cleared it.
   */
  async drainSession(session: SessionRef): Promise<DrainedBatch> {
    const keys = this.keysFor(session);
    const entries = (await this.store.drainList(keys.buffer, [keys.lock, keys.marker])).map(decodeEntry);

    if (entries.length === 0) {
      this.log.warn({ identity: maskIdentity(session.identity), channel: session.channel }, 'Buffer empty at drain');
      return { session, messages: [], combinedText: '', contact: {} };
    }

    const messages = entries.map((e) => e.text);
    const combinedText = messages.join(this.separator);
    aggregatedBatchSize.observe(messages.length);
    this.log.info(
      {
        identity: maskIdentity(session.identity),
        channel: session.channel,
        count: messages.length,
        preview: previewText(combinedText),
      },
      'Messages combined',
    );
    return { session, messages, combinedText, contact: mergeContact(entries) };
  }

  /** Drop buffer, lock and marker for a session (admin / tests). */
  async clearBuffer(session: SessionRef): Promise<void> {
    const keys = this.keysFor(session);
    await this.store.del(keys.buffer, keys.lock, keys.marker);
  }

  async bufferedCount(session: SessionRef): Promise<number> {
    return this.store.listLength(this.keysFor(session).buffer);
  }

  private async joinBuffer(session: SessionRef, entry: string): Promise<AggregationDecision> {
    const bufferCount = await this.store.pushTail(this.keysFor(session).buffer, entry, this.markerTtl);
    aggregationDecisions.inc({ outcome: 'buffered' });
    this.log.debug(
      { identity: maskIdentity(session.identity), channel: session.channel, bufferCount },
      'Message added to open buffer',
    );
    return { outcome: 'buffered', bufferCount };
  }

  private degraded(text: string, reason: 'disabled' | 'store_unavailable'): AggregationDecision {
    aggregationDecisions.inc({ outcome: 'degraded' });
    aggregatedBatchSize.observe(1);
    return { outcome: 'degraded', reason, combinedText: text, bufferCount: 1 };
  }

  private keysFor(session: SessionRef): { buffer: string; lock: string; marker: string } {
    return {
      buffer: this.keyspace.sessionKey('msg_buffer', session),
      lock: this.keyspace.sessionKey('msg_lock', session),
      marker: this.keyspace.sessionKey('msg_processing', session),
    };
  }
}

// ==================== Buffer entries ====================

function encodeEntry(text: string, contact: ContactHints): string {
  const entry: BufferedMessage = { text };
  if (contact.displayName) entry.displayName = contact.displayName;
  if (contact.channelOrigin) entry.channelOrigin = contact.channelOrigin;
  return JSON.stringify(entry);
}

/** Entries that are not JSON objects with a `text` string are taken as raw text. */
function decodeEntry(raw: string): BufferedMessage {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return { text: raw };
  }
  if (typeof parsed !== 'object' || parsed === null || !('text' in parsed) || typeof parsed.text !== 'string') {
    return { text: raw };
  }

  const entry: BufferedMessage = { text: parsed.text };
  if ('displayName' in parsed && typeof parsed.displayName === 'string') entry.displayName = parsed.displayName;
  if ('channelOrigin' in parsed && typeof parsed.channelOrigin === 'string') entry.channelOrigin = parsed.channelOrigin;
  return entry;
}

/** Latest display name wins; the first origin in arrival order is kept. */
function mergeContact(entries: BufferedMessage[]): ContactHints {
  const contact: ContactHints = {};
  for (const entry of entries) {
    if (entry.displayName) contact.displayName = entry.displayName;
    if (entry.channelOrigin && !contact.channelOrigin) contact.channelOrigin = entry.channelOrigin;
  }
  return contact;
}
