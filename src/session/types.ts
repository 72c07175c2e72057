/** Who owns the conversation right now */
export type ConversationStatus =
  | 'BOT_ACTIVE'
  | 'PENDING_HANDOFF'
  | 'HUMAN_ACTIVE'
  | 'IN_CONVERSATION'
  | 'CLOSED';

export const CONVERSATION_STATUSES: readonly ConversationStatus[] = [
  'BOT_ACTIVE',
  'PENDING_HANDOFF',
  'HUMAN_ACTIVE',
  'IN_CONVERSATION',
  'CLOSED',
];

/** Statuses in which an operator owns the conversation */
export const OPERATOR_OWNED: readonly ConversationStatus[] = ['HUMAN_ACTIVE', 'IN_CONVERSATION'];

export function isConversationStatus(value: unknown): value is ConversationStatus {
  return typeof value === 'string' && CONVERSATION_STATUSES.some((s) => s === value);
}

/** One conversation is addressed by (identity, channel) */
export interface SessionRef {
  identity: string;
  channel: string;
}

/** Rich per-session record; timestamps are epoch milliseconds */
export interface ConversationMeta {
  identity: string;
  channel: string;
  contactId?: string;
  status: ConversationStatus;
  lastActivity: number;
  handoffReason?: string;
  assignedOwnerId?: string;
  /** First-touch lead source (`facebook`, `website`, ...) used for routing */
  channelOrigin?: string;
  displayName?: string;
  messageCount: number;
  createdAt: number;
  lastClientMessageAt?: number;
  lastOperatorMessageAt?: number;
  humanActivatedAt?: number;
}

/** Contact details an inbound delivery carries; applied with the batch that contains it */
export interface ContactHints {
  displayName?: string;
  channelOrigin?: string;
}

/** Record kinds stored per session */
export type SessionRecordKind = 'status' | 'meta';

/** Result of a two-phase key lookup */
export interface ResolvedRecord {
  key: string;
  value: string;
  /** True when the value came from a channel-less key */
  legacy: boolean;
}

/** Remaining lifetime of a session's records, in seconds (-2 missing, -1 no expiry) */
export interface SessionTtl {
  status: number;
  meta: number;
}
