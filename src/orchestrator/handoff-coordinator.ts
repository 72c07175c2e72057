/**
 * Handoff Coordinator
 *
 * BOT/HUMAN arbitration on top of ConversationStateStore, plus the dual
 * wall-clock timeout detector for operator-owned sessions.
 *
 * No transition uses compare-and-swap. Callers serialize per-session
 * invocations (the aggregation lock gives one writer per session).
 */

import { ConversationStateStore } from '../session/conversation-state-store';
import { ConversationMeta, ConversationStatus, OPERATOR_OWNED, SessionRef } from '../session/types';
import { HandoffStateMachine, handoffStateMachine } from './state-machine';
import { DEFAULT_HANDOFF_TIMINGS, HandoffTimings, TimeoutCheck } from './types';
import { AssistantSignal } from '../pipeline/types';
import { logger } from '../observability/logger';
import { maskIdentity } from '../observability/pii-redactor';
import { timeoutSignals } from '../observability/metrics';

export const DEFAULT_HANDOFF_REASON = 'Client requested an advisor';

export interface HandoffCoordinatorOptions {
  timings?: Partial<HandoffTimings>;
  now?: () => number;
  stateMachine?: HandoffStateMachine;
}

export class HandoffCoordinator {
  private readonly log = logger.child({ component: 'handoff-coordinator' });
  private readonly timings: HandoffTimings;
  private readonly now: () => number;
  private readonly machine: HandoffStateMachine;

  constructor(
    private readonly state: ConversationStateStore,
    options: HandoffCoordinatorOptions = {},
  ) {
    this.timings = { ...DEFAULT_HANDOFF_TIMINGS, ...options.timings };
    this.now = options.now ?? Date.now;
    this.machine = options.stateMachine ?? handoffStateMachine;
  }

  get humanActiveTtlSeconds(): number {
    return this.timings.humanActiveTtlSeconds;
  }

  getStatus(session: SessionRef): Promise<ConversationStatus> {
    return this.state.getStatus(session);
  }

  // ==================== Transitions ====================

  /**
   * Bot asks for a human. Not unconditional: a HUMAN_ACTIVE or IN_CONVERSATION
   * session stays with its operator and this returns false without writing.
   * Release it with `activateBot` first to re-queue it.
   */
  async requestHandoff(session: SessionRef, reason: string = DEFAULT_HANDOFF_REASON): Promise<boolean> {
    const meta = await this.transitionTo(session, 'PENDING_HANDOFF', reason);
    if (!meta) return false;

    meta.handoffReason = reason;
    await this.persist(session, meta, this.state.defaultTtlSeconds);
    return true;
  }

  /** Operator takes ownership; TTL becomes the human window. */
  async activateHuman(session: SessionRef, ownerId?: string, reason?: string): Promise<boolean> {
    const meta = await this.transitionTo(session, 'HUMAN_ACTIVE', reason ?? 'operator_takeover');
    if (!meta) return false;

    const now = this.now();
    if (ownerId) meta.assignedOwnerId = ownerId;
    if (reason) meta.handoffReason = reason;
    meta.humanActivatedAt = now;
    await this.persist(session, meta, this.timings.humanActiveTtlSeconds);
    return true;
  }

  /** Operator-visible sub-state; same TTL and reclaim rules as HUMAN_ACTIVE. */
  async markInConversation(session: SessionRef, ownerId?: string): Promise<boolean> {
    const meta = await this.transitionTo(session, 'IN_CONVERSATION', 'operator_in_conversation');
    if (!meta) return false;

    if (ownerId) meta.assignedOwnerId = ownerId;
    meta.humanActivatedAt ??= this.now();
    await this.persist(session, meta, this.timings.humanActiveTtlSeconds);
    return true;
  }

  /** Hand control back to the bot: clears the reason, default TTL. */
  async activateBot(session: SessionRef, reason = 'bot_reactivated'): Promise<boolean> {
    const meta = await this.transitionTo(session, 'BOT_ACTIVE', reason);
    if (!meta) return false;

    delete meta.handoffReason;
    await this.persist(session, meta, this.state.defaultTtlSeconds);
    return true;
  }

  /**
   * Extend an operator session by a fresh human window. Only valid while
   * HUMAN_ACTIVE; otherwise nothing is written.
   */
  async refreshHumanTtl(session: SessionRef): Promise<boolean> {
    const status = await this.state.getStatus(session);
    if (status !== 'HUMAN_ACTIVE') {
      this.log.debug({ identity: maskIdentity(session.identity), status }, 'TTL refresh skipped');
      return false;
    }

    const meta = await this.state.getOrCreateMeta(session);
    meta.status = 'HUMAN_ACTIVE';
    await this.persist(session, meta, this.timings.humanActiveTtlSeconds);
    return true;
  }

  /** Terminal. Removes every record of the session, legacy keys included. */
  async closeConversation(session: SessionRef): Promise<void> {
    const current = await this.state.getStatus(session);
    this.machine.transition(session, current, 'CLOSED', 'conversation_closed');
    await this.state.delete(session);
  }

  // ==================== Timestamps ====================

  async updateClientMessageTimestamp(session: SessionRef): Promise<void> {
    const meta = await this.state.getOrCreateMeta(session);
    meta.lastClientMessageAt = this.now();
    await this.state.setMetaKeepingTtl(session, meta);
  }

  async updateOperatorMessageTimestamp(session: SessionRef): Promise<void> {
    const meta = await this.state.getOrCreateMeta(session);
    meta.lastOperatorMessageAt = this.now();
    await this.state.setMetaKeepingTtl(session, meta);
  }

  /**
   * An operator wrote to the client. Takes ownership of a bot or pending
   * session and keeps an operator session alive.
   */
  async recordOperatorReply(session: SessionRef, ownerId?: string): Promise<ConversationStatus> {
    await this.updateOperatorMessageTimestamp(session);
    const status = await this.state.getStatus(session);

    if (status === 'HUMAN_ACTIVE') {
      await this.refreshHumanTtl(session);
      return status;
    }
    if (status === 'IN_CONVERSATION') {
      await this.markInConversation(session, ownerId);
      return status;
    }
    await this.activateHuman(session, ownerId, 'operator_reply');
    return 'HUMAN_ACTIVE';
  }

  // ==================== Timeout detection ====================

  /**
   * Client silence is checked before operator silence: when both hold,
   * `client_timeout` wins.
   */
  async checkConversationTimeout(session: SessionRef): Promise<TimeoutCheck> {
    const status = await this.state.getStatus(session);
    if (!OPERATOR_OWNED.includes(status)) return { signal: 'none' };

    const meta = await this.state.getMeta(session);
    if (!meta) return { signal: 'none' };

    const result = this.evaluateTimeout(meta, this.now());
    if (result.signal !== 'none') {
      timeoutSignals.inc({ signal: result.signal });
      this.log.info(
        { identity: maskIdentity(session.identity), channel: session.channel, ...result },
        'Conversation timeout detected',
      );
    }
    return result;
  }

  evaluateTimeout(meta: ConversationMeta, now: number): TimeoutCheck {
    const client = meta.lastClientMessageAt;
    const operator = meta.lastOperatorMessageAt;

    if (operator !== undefined && (client === undefined || operator > client)) {
      const elapsedMs = now - operator;
      if (elapsedMs >= this.timings.clientTimeoutMs) {
        return { signal: 'client_timeout', elapsedMs };
      }
    }

    // Measured from the last client message whether or not the operator ever replied
    if (client !== undefined && (operator === undefined || client > operator)) {
      const elapsedMs = now - client;
      if (elapsedMs >= this.timings.advisorTimeoutMs) {
        return { signal: 'advisor_timeout', elapsedMs };
      }
    }

    return { signal: 'none' };
  }

  // ==================== Assistant signal ====================

  /** Applies the assistant's structured signal; returns true when a handoff was requested. */
  async applyAssistantSignal(session: SessionRef, signal: AssistantSignal): Promise<boolean> {
    if (!this.machine.shouldHandOff(signal.handoffPriority)) return false;
    return this.requestHandoff(session, signal.handoffReason ?? DEFAULT_HANDOFF_REASON);
  }

  // ==================== Internals ====================

  private async transitionTo(
    session: SessionRef,
    target: ConversationStatus,
    reason: string,
  ): Promise<ConversationMeta | null> {
    const current = await this.state.getStatus(session);
    const { allowed } = this.machine.transition(session, current, target, reason);
    if (!allowed) return null;

    const meta = await this.state.getOrCreateMeta(session);
    meta.status = target;
    return meta;
  }

  private async persist(session: SessionRef, meta: ConversationMeta, ttlSeconds: number): Promise<void> {
    meta.lastActivity = this.now();
    await this.state.setStatus(session, meta.status, ttlSeconds);
    await this.state.setMeta(session, meta, ttlSeconds);
  }
}
