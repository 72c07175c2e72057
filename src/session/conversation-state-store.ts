/**
 * Conversation State Store
 *
 * Status + metadata per (identity, channel), each with its own TTL.
 * The only component that touches session records in the coordination
 * store. Writes are last-write-wins; store failures propagate to the
 * caller so that a transport error is never mistaken for BOT_ACTIVE.
 */

import {
  ContactHints,
  ConversationMeta,
  ConversationStatus,
  SessionRef,
  SessionTtl,
  isConversationStatus,
} from './types';
import { SessionKeyspace } from './session-keyspace';
import { CoordinationStore } from '../store/types';
import { logger } from '../observability/logger';
import { maskIdentity } from '../observability/pii-redactor';

export const DEFAULT_SESSION_TTL_SECONDS = 7 * 24 * 60 * 60;

export interface ConversationStateStoreOptions {
  defaultTtlSeconds?: number;
  now?: () => number;
}

export class ConversationStateStore {
  private readonly log = logger.child({ component: 'conversation-state' });
  readonly defaultTtlSeconds: number;
  private readonly now: () => number;

  constructor(
    private readonly store: CoordinationStore,
    private readonly keyspace: SessionKeyspace,
    options: ConversationStateStoreOptions = {},
  ) {
    this.defaultTtlSeconds = options.defaultTtlSeconds ?? DEFAULT_SESSION_TTL_SECONDS;
    this.now = options.now ?? Date.now;
  }

  // ==================== Status ====================

  /** Absence means BOT_ACTIVE. Read-only: never creates a record. */
  async getStatus(session: SessionRef): Promise<ConversationStatus> {
    const record = await this.keyspace.resolve(this.store, 'status', session);
    if (!record) return 'BOT_ACTIVE';

    if (!isConversationStatus(record.value)) {
      this.log.warn(
        { identity: maskIdentity(session.identity), channel: session.channel, value: record.value },
        'Unknown status in store; treating as BOT_ACTIVE',
      );
      return 'BOT_ACTIVE';
    }
    return record.value;
  }

  async setStatus(session: SessionRef, status: ConversationStatus, ttlSeconds?: number): Promise<void> {
    await this.store.set(
      this.keyspace.recordKey('status', session),
      status,
      ttlSeconds ?? this.defaultTtlSeconds,
    );
    this.log.info(
      { identity: maskIdentity(session.identity), channel: session.channel, status },
      'Status updated',
    );
  }

  async isBotActive(session: SessionRef): Promise<boolean> {
    return (await this.getStatus(session)) === 'BOT_ACTIVE';
  }

  async isHumanActive(session: SessionRef): Promise<boolean> {
    return (await this.getStatus(session)) === 'HUMAN_ACTIVE';
  }

  // ==================== Metadata ====================

  async getMeta(session: SessionRef): Promise<ConversationMeta | null> {
    const record = await this.keyspace.resolve(this.store, 'meta', session);
    if (!record) return null;

    let parsed: unknown;
    try {
      parsed = JSON.parse(record.value);
    } catch (err) {
      this.log.error({ err, key: record.key }, 'Failed to deserialize conversation meta');
      return null;
    }
    return migrateMeta(parsed, session, this.now());
  }

  async setMeta(session: SessionRef, meta: ConversationMeta, ttlSeconds?: number): Promise<void> {
    await this.store.set(
      this.keyspace.recordKey('meta', session),
      JSON.stringify(meta),
      ttlSeconds ?? this.defaultTtlSeconds,
    );
  }

  /** Save metadata keeping whatever lifetime the qualified record has left. */
  async setMetaKeepingTtl(session: SessionRef, meta: ConversationMeta): Promise<void> {
    const remaining = await this.store.ttl(this.keyspace.recordKey('meta', session));
    await this.setMeta(session, meta, remaining > 0 ? remaining : undefined);
  }

  /** Existing metadata, or a fresh record for a first contact. */
  async getOrCreateMeta(session: SessionRef): Promise<ConversationMeta> {
    return (await this.getMeta(session)) ?? this.freshMeta(session);
  }

  freshMeta(session: SessionRef): ConversationMeta {
    const now = this.now();
    return {
      identity: session.identity,
      channel: session.channel,
      status: 'BOT_ACTIVE',
      lastActivity: now,
      messageCount: 0,
      createdAt: now,
    };
  }

  /**
   * Record an inbound batch: bumps the counter and activity time, keeps the
   * latest display name and pins the first-touch channel origin.
   */
  async touchActivity(session: SessionRef, contact: ContactHints = {}): Promise<ConversationMeta> {
    const meta = await this.getOrCreateMeta(session);
    meta.lastActivity = this.now();
    meta.messageCount += 1;
    if (contact.displayName) meta.displayName = contact.displayName;
    if (contact.channelOrigin && !meta.channelOrigin) meta.channelOrigin = contact.channelOrigin;
    await this.setMetaKeepingTtl(session, meta);
    return meta;
  }

  async getTtl(session: SessionRef): Promise<SessionTtl> {
    const [status, meta] = await Promise.all([
      this.store.ttl(this.keyspace.recordKey('status', session)),
      this.store.ttl(this.keyspace.recordKey('meta', session)),
    ]);
    return { status, meta };
  }

  // ==================== Removal ====================

  /** Evicts status, metadata and any legacy remnants in one command. */
  async delete(session: SessionRef): Promise<void> {
    const removed = await this.store.del(...this.keyspace.allKeysFor(session));
    this.log.info(
      { identity: maskIdentity(session.identity), channel: session.channel, removed },
      'Conversation deleted',
    );
  }
}

// ==================== Record migration ====================

function pick(source: Record<string, unknown>, ...names: string[]): unknown {
  for (const name of names) {
    if (source[name] !== undefined && source[name] !== null) return source[name];
  }
  return undefined;
}

function asString(value: unknown): string | undefined {
  return typeof value === 'string' && value !== '' ? value : undefined;
}

/** Epoch ms from a number or an ISO string (older records stored ISO). */
function asTimestamp(value: unknown): number | undefined {
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string') {
    const parsed = Date.parse(value);
    return Number.isNaN(parsed) ? undefined : parsed;
  }
  return undefined;
}

/**
 * Default and migrate a stored metadata record. Tolerates the snake_case,
 * ISO-timestamped shape written before channel segregation.
 */
export function migrateMeta(raw: unknown, session: SessionRef, now: number): ConversationMeta {
  const source: Record<string, unknown> =
    raw !== null && typeof raw === 'object' && !Array.isArray(raw) ? { ...raw } : {};

  const status = pick(source, 'status');
  const messageCount = pick(source, 'messageCount', 'message_count');
  const createdAt = asTimestamp(pick(source, 'createdAt', 'created_at')) ?? now;

  const meta: ConversationMeta = {
    identity: asString(pick(source, 'identity', 'phone_normalized')) ?? session.identity,
    channel: asString(pick(source, 'channel', 'canal')) ?? session.channel,
    status: isConversationStatus(status) ? status : 'BOT_ACTIVE',
    lastActivity: asTimestamp(pick(source, 'lastActivity', 'last_activity')) ?? createdAt,
    messageCount: typeof messageCount === 'number' && messageCount >= 0 ? Math.floor(messageCount) : 0,
    createdAt,
  };

  const contactId = asString(pick(source, 'contactId', 'contact_id'));
  const handoffReason = asString(pick(source, 'handoffReason', 'handoff_reason'));
  const assignedOwnerId = asString(pick(source, 'assignedOwnerId', 'assigned_owner_id'));
  const channelOrigin = asString(pick(source, 'channelOrigin', 'channel_origin'));
  const displayName = asString(pick(source, 'displayName', 'display_name'));
  const lastClientMessageAt = asTimestamp(pick(source, 'lastClientMessageAt', 'last_client_message_at'));
  const lastOperatorMessageAt = asTimestamp(
    pick(source, 'lastOperatorMessageAt', 'last_operator_message_at', 'last_human_message'),
  );
  const humanActivatedAt = asTimestamp(pick(source, 'humanActivatedAt', 'human_activated_at'));

  if (contactId) meta.contactId = contactId;
  if (handoffReason) meta.handoffReason = handoffReason;
  if (assignedOwnerId) meta.assignedOwnerId = assignedOwnerId;
  if (channelOrigin) meta.channelOrigin = channelOrigin;
  if (displayName) meta.displayName = displayName;
  if (lastClientMessageAt !== undefined) meta.lastClientMessageAt = lastClientMessageAt;
  if (lastOperatorMessageAt !== undefined) meta.lastOperatorMessageAt = lastOperatorMessageAt;
  if (humanActivatedAt !== undefined) meta.humanActivatedAt = humanActivatedAt;

  return meta;
}
