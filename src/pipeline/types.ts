/**
 * Pipeline Types
 *
 * Contracts of the collaborators that surround the coordination core:
 * the assistant, the CRM, the alert channel and the outbound transport.
 */

import { ConversationStatus, SessionRef } from '../session/types';
import { TimeoutSignal } from '../orchestrator/types';
import { AssignmentResult } from '../routing/types';

// ───── Assistant ─────

export type HandoffPriority = 'none' | 'low' | 'medium' | 'high' | 'immediate';

/** Structured signal returned next to the reply text */
export interface AssistantSignal {
  handoffPriority: HandoffPriority;
  visitIntent: boolean;
  sentimentScore: number;
  /** Free-text reason the assistant gives for a handoff */
  handoffReason?: string;
}

export interface AssistantContext {
  session: SessionRef;
  status: ConversationStatus;
  displayName?: string;
  messageCount: number;
  /** True when an operator session ended because the client went silent */
  resumedWithContext: boolean;
}

export interface AssistantReply {
  text: string;
  signal: AssistantSignal;
}

export interface AssistantService {
  reply(combinedText: string, context: AssistantContext): Promise<AssistantReply>;
}

// ───── CRM ─────

export interface CrmHandoffRecord {
  identity: string;
  channel: string;
  owner: string | null;
  handoffReason: string;
}

export interface CrmClient {
  syncHandoff(record: CrmHandoffRecord): Promise<void>;
  /** Mirror a client message the bot did not answer (operator-owned sessions) */
  mirrorInbound(session: SessionRef, text: string): Promise<void>;
}

// ───── Alerts ─────

export interface OrphanLeadAlert {
  identity: string;
  channel: string;
  team: string;
  reason: string;
  contactId?: string;
  timestamp: number;
  metadata?: Record<string, string>;
}

export interface OutOfHoursFlag {
  identity: string;
  channel: string;
  priority: HandoffPriority;
  nextOpening: string;
  timestamp: number;
}

/** Fire-and-forget: failures are logged, never retried */
export interface AlertChannel {
  orphanLead(alert: OrphanLeadAlert): Promise<void>;
  outOfHours(flag: OutOfHoursFlag): Promise<void>;
}

// ───── Outbound transport ─────

export interface ReplySink {
  send(session: SessionRef, text: string): Promise<void>;
}

// ───── Inbound contract ─────

export interface InboundEvent {
  rawIdentity: string;
  channelHint: string;
  text: string;
  displayName?: string;
  /** Channel-origin metadata from the transport (utm, referrer, ...) */
  metadata?: Record<string, string | undefined>;
}

/** What the transport adapter gets back for one delivery */
export interface InboundResult {
  session: SessionRef;
  shouldRespond: boolean;
  combinedText?: string;
  /** Reply to send synchronously (degraded mode only) */
  reply?: string;
  /** The message joined a buffer whose drain is scheduled elsewhere */
  deferred: boolean;
  bufferCount: number;
}

export type Responder = 'bot' | 'human' | 'pending_handoff';

/** Outcome of processing one aggregated unit of work */
export interface ProcessOutcome {
  session: SessionRef;
  responder: Responder;
  status: ConversationStatus;
  timeout: TimeoutSignal;
  reply?: string;
  signal?: AssistantSignal;
  handoffRequested: boolean;
  assignment?: AssignmentResult;
  outOfHours: boolean;
}
