import { ConversationStatus } from '../session/types';

/** Allowed status transitions; anything else is rejected and logged */
export const STATE_TRANSITIONS: Record<ConversationStatus, ConversationStatus[]> = {
  BOT_ACTIVE: ['PENDING_HANDOFF', 'HUMAN_ACTIVE', 'IN_CONVERSATION', 'CLOSED'],
  PENDING_HANDOFF: ['HUMAN_ACTIVE', 'IN_CONVERSATION', 'BOT_ACTIVE', 'CLOSED'],
  HUMAN_ACTIVE: ['IN_CONVERSATION', 'BOT_ACTIVE', 'CLOSED'],
  IN_CONVERSATION: ['HUMAN_ACTIVE', 'BOT_ACTIVE', 'CLOSED'],
  CLOSED: [],
};

export interface StateTransitionEvent {
  identity: string;
  channel: string;
  from: ConversationStatus;
  to: ConversationStatus;
  reason: string;
  timestamp: number;
}

/** Result of evaluating the dual wall-clock timers */
export type TimeoutSignal = 'client_timeout' | 'advisor_timeout' | 'none';

export interface TimeoutCheck {
  signal: TimeoutSignal;
  /** Milliseconds since the message the signal was measured from */
  elapsedMs?: number;
}

export interface HandoffTimings {
  /** TTL applied to operator-owned sessions (default 72h) */
  humanActiveTtlSeconds: number;
  /** Silence after the operator's last message that ends an operator session (default 24h) */
  clientTimeoutMs: number;
  /** Unanswered client message age that reclaims the session (default 72h) */
  advisorTimeoutMs: number;
}

export const DEFAULT_HANDOFF_TIMINGS: HandoffTimings = {
  humanActiveTtlSeconds: 72 * 60 * 60,
  clientTimeoutMs: 24 * 60 * 60 * 1000,
  advisorTimeoutMs: 72 * 60 * 60 * 1000,
};
