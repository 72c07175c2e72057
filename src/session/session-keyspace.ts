/**
 * Session Keyspace
 *
 * Every per-session key is qualified by channel so that one phone number
 * arriving through two channels never shares state. Records written before
 * channel segregation (`<prefix>conv_state:<identity>`) are still readable,
 * but nothing ever writes that form again; they retire through their TTL.
 */

import { ResolvedRecord, SessionRecordKind, SessionRef } from './types';
import { CoordinationStore } from '../store/types';
import { legacyKeyHits } from '../observability/metrics';
import { logger } from '../observability/logger';
import { maskIdentity } from '../observability/pii-redactor';

const RECORD_NAMESPACES: Record<SessionRecordKind, string> = {
  status: 'conv_state',
  meta: 'conv_meta',
};

export class SessionKeyspace {
  private readonly log = logger.child({ component: 'session-keyspace' });

  constructor(
    private readonly prefix: string = '',
    private readonly legacyFallback: boolean = true,
  ) {}

  /** Lowercased, `:`-free channel token; blank channels map to `default`. */
  static normalizeChannel(channel: string): string {
    const token = channel.trim().toLowerCase().replace(/[\s:]+/g, '_');
    return token || 'default';
  }

  /** Channel-qualified key in any session namespace (`msg_buffer`, `appointment`, ...). */
  sessionKey(namespace: string, session: SessionRef): string {
    return `${this.prefix}${namespace}:${session.identity}:${SessionKeyspace.normalizeChannel(session.channel)}`;
  }

  /** Key that is not tied to a session (indexes, counters). */
  globalKey(name: string): string {
    return `${this.prefix}${name}`;
  }

  /** Write path: always the channel-qualified form. */
  recordKey(kind: SessionRecordKind, session: SessionRef): string {
    return this.sessionKey(RECORD_NAMESPACES[kind], session);
  }

  legacyKey(kind: SessionRecordKind, identity: string): string {
    return `${this.prefix}${RECORD_NAMESPACES[kind]}:${identity}`;
  }

  /** Every key a session may occupy, legacy remnants included. */
  allKeysFor(session: SessionRef): string[] {
    return [
      this.recordKey('status', session),
      this.recordKey('meta', session),
      this.legacyKey('status', session.identity),
      this.legacyKey('meta', session.identity),
    ];
  }

  /**
   * Read path: qualified key first, then the legacy key on a miss.
   * Never writes.
   */
  async resolve(
    store: CoordinationStore,
    kind: SessionRecordKind,
    session: SessionRef,
  ): Promise<ResolvedRecord | null> {
    const key = this.recordKey(kind, session);
    const value = await store.get(key);
    if (value !== null) {
      return { key, value, legacy: false };
    }
    if (!this.legacyFallback) return null;

    const legacyKey = this.legacyKey(kind, session.identity);
    const legacyValue = await store.get(legacyKey);
    if (legacyValue === null) return null;

    legacyKeyHits.inc({ kind });
    this.log.debug(
      { kind, identity: maskIdentity(session.identity), channel: session.channel },
      'Served session record from legacy key',
    );
    return { key: legacyKey, value: legacyValue, legacy: true };
  }
}
