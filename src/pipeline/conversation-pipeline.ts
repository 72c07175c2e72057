/**
 * Conversation Pipeline
 *
 * Entry point the transport adapter calls for every inbound delivery:
 * normalize the identity, buffer through the aggregator, and, once a unit
 * of work is ready (immediately in degraded mode, otherwise from the drain
 * job), decide who answers it.
 *
 * Flow per unit of work:
 *   1. Operator-owned sessions are checked for timeouts first
 *      (advisor_timeout reclaims, client_timeout resumes with context)
 *   2. Activity and the client timestamp are recorded
 *   3. Responder: human (bot silent, CRM mirror), pending_handoff
 *      (holding notice) or bot (assistant reply + signal)
 *   4. A handoff signal assigns an owner, raises orphan / out-of-hours
 *      alerts and syncs the CRM
 */

import {
  AlertChannel,
  AssistantService,
  CrmClient,
  HandoffPriority,
  InboundEvent,
  InboundResult,
  ProcessOutcome,
  ReplySink,
} from './types';
import { PhoneNormalizer } from '../identity/phone-normalizer';
import { ConversationStateStore } from '../session/conversation-state-store';
import { SessionKeyspace } from '../session/session-keyspace';
import { ContactHints, ConversationMeta, ConversationStatus, OPERATOR_OWNED, SessionRef } from '../session/types';
import { HandoffCoordinator, DEFAULT_HANDOFF_REASON } from '../orchestrator/handoff-coordinator';
import { TimeoutSignal } from '../orchestrator/types';
import { MessageAggregator } from '../aggregation/message-aggregator';
import { LeadRoundRobinAssigner } from '../routing/lead-assigner';
import { OrphanLeadAlerts } from '../routing/orphan-alerts';
import { AssignmentResult } from '../routing/types';
import { BusinessHours } from '../scheduling/business-hours';
import { ValidationError, toErrorMessage } from '../resilience/errors';
import { logger } from '../observability/logger';
import { maskIdentity, previewText } from '../observability/pii-redactor';
import { TraceContext, createTraceContext, endSpan, startSpan, traceDurationMs } from '../observability/trace';
import { pipelineDuration } from '../observability/metrics';

export interface PipelineMessages {
  pendingHandoffNotice: string;
  outOfHoursNotice: (nextOpening: string) => string;
}

export const DEFAULT_PIPELINE_MESSAGES: PipelineMessages = {
  pendingHandoffNotice: 'An advisor will be with you shortly. Thanks for your patience.',
  outOfHoursNotice: (nextOpening) =>
    `We are outside business hours right now. An advisor will contact you ${nextOpening}. Your request has been recorded.`,
};

export interface PipelineDependencies {
  normalizer: PhoneNormalizer;
  state: ConversationStateStore;
  coordinator: HandoffCoordinator;
  aggregator: MessageAggregator;
  assigner: LeadRoundRobinAssigner;
  orphanAlerts: OrphanLeadAlerts;
  businessHours: BusinessHours;
  assistant: AssistantService;
  crm?: CrmClient;
  alerts?: AlertChannel;
  replySink?: ReplySink;
  messages?: Partial<PipelineMessages>;
  now?: () => number;
}

export class ConversationPipeline {
  private readonly log = logger.child({ component: 'pipeline' });
  private readonly messages: PipelineMessages;
  private readonly now: () => number;

  constructor(private readonly deps: PipelineDependencies) {
    this.messages = { ...DEFAULT_PIPELINE_MESSAGES, ...deps.messages };
    this.now = deps.now ?? Date.now;
  }

  /** Normalize and canonicalize the transport's addressing. Throws ValidationError. */
  resolveSession(rawIdentity: string, channelHint: string): SessionRef {
    const result = this.deps.normalizer.normalize(rawIdentity);
    if (!result.valid) {
      throw new ValidationError(
        result.errorKind ?? 'invalid_length',
        rawIdentity,
        result.errorMessage ?? 'identity could not be normalized',
      );
    }
    return { identity: result.identity, channel: SessionKeyspace.normalizeChannel(channelHint) };
  }

  async handleInbound(
    event: InboundEvent,
    trace: TraceContext = createTraceContext({ clock: this.now }),
  ): Promise<InboundResult> {
    const session = this.resolveSession(event.rawIdentity, event.channelHint);
    trace.channel = session.channel;
    const log = this.log.child({ requestId: trace.requestId, identity: maskIdentity(session.identity), channel: session.channel });

    const contact = this.contactHints(event);

    const spanBuffer = startSpan(trace, 'aggregator.submit');
    const decision = await this.deps.aggregator.submit(session, event.text, contact);
    endSpan(trace, spanBuffer);

    if (decision.outcome !== 'degraded') {
      log.debug({ outcome: decision.outcome, bufferCount: decision.bufferCount }, 'Inbound buffered');
      return { session, shouldRespond: false, deferred: true, bufferCount: decision.bufferCount };
    }

    const outcome = await this.process(session, decision.combinedText, trace, contact);
    return {
      session,
      shouldRespond: outcome.reply !== undefined,
      combinedText: decision.combinedText,
      reply: outcome.reply,
      deferred: false,
      bufferCount: decision.bufferCount,
    };
  }

  /**
   * Drain job body: take the session's buffered messages and process them as
   * one unit. Replies go out through the reply sink. Null when the buffer was
   * already empty.
   */
  async processDeferred(session: SessionRef): Promise<ProcessOutcome | null> {
    const trace = createTraceContext({ channel: session.channel, clock: this.now });
    const batch = await this.deps.aggregator.drainSession(session);
    if (batch.messages.length === 0) return null;

    const outcome = await this.process(session, batch.combinedText, trace, batch.contact);
    if (outcome.reply !== undefined) {
      if (this.deps.replySink) {
        await this.deps.replySink.send(session, outcome.reply);
      } else {
        this.log.warn({ identity: maskIdentity(session.identity) }, 'No reply sink configured; deferred reply dropped');
      }
    }
    this.log.info(
      { requestId: trace.requestId, responder: outcome.responder, count: batch.messages.length, durationMs: traceDurationMs(trace) },
      'Deferred batch processed',
    );
    return outcome;
  }

  /** An operator wrote to the client from the CRM / inbox side. */
  async handleOperatorMessage(
    rawIdentity: string,
    channelHint: string,
    ownerId?: string,
  ): Promise<{ session: SessionRef; status: ConversationStatus }> {
    const session = this.resolveSession(rawIdentity, channelHint);
    const status = await this.deps.coordinator.recordOperatorReply(session, ownerId);
    return { session, status };
  }

  /**
   * One aggregated unit of work, and the only place inbound traffic writes
   * session metadata. Store failures propagate to the caller.
   */
  async process(
    session: SessionRef,
    text: string,
    trace: TraceContext,
    contact: ContactHints = {},
  ): Promise<ProcessOutcome> {
    const { coordinator, state } = this.deps;
    const log = this.log.child({ requestId: trace.requestId, identity: maskIdentity(session.identity), channel: session.channel });
    const spanProcess = startSpan(trace, 'pipeline.process');
    const stopTimer = pipelineDuration.startTimer();

    try {
      // 1. Timeouts are judged against the previous client message
      let status = await coordinator.getStatus(session);
      let timeout: TimeoutSignal = 'none';
      if (OPERATOR_OWNED.includes(status)) {
        timeout = (await coordinator.checkConversationTimeout(session)).signal;
        if (timeout !== 'none') {
          await coordinator.activateBot(session, timeout);
          status = 'BOT_ACTIVE';
        }
      }

      // 2. Record the inbound
      const meta = await state.touchActivity(session, contact);
      await coordinator.updateClientMessageTimestamp(session);

      const base: ProcessOutcome = {
        session,
        responder: 'bot',
        status,
        timeout,
        handoffRequested: false,
        outOfHours: false,
      };

      // 3. Responder
      if (OPERATOR_OWNED.includes(status)) {
        await this.mirrorToCrm(session, text);
        log.info({ status }, 'Operator owns conversation; bot stays silent');
        stopTimer({ responder: 'human' });
        endSpan(trace, spanProcess);
        return { ...base, responder: 'human' };
      }

      if (status === 'PENDING_HANDOFF') {
        log.info('Handoff pending; sending holding notice');
        stopTimer({ responder: 'pending_handoff' });
        endSpan(trace, spanProcess);
        return { ...base, responder: 'pending_handoff', reply: this.messages.pendingHandoffNotice };
      }

      const spanAssistant = startSpan(trace, 'assistant.reply');
      const answer = await this.deps.assistant.reply(text, {
        session,
        status,
        displayName: meta.displayName,
        messageCount: meta.messageCount,
        resumedWithContext: timeout === 'client_timeout',
      });
      endSpan(trace, spanAssistant);

      const outcome: ProcessOutcome = { ...base, reply: answer.text, signal: answer.signal };

      // 4. Handoff
      const handoffRequested = await coordinator.applyAssistantSignal(session, answer.signal);
      if (handoffRequested) {
        const reason = answer.signal.handoffReason ?? DEFAULT_HANDOFF_REASON;
        outcome.handoffRequested = true;
        outcome.status = 'PENDING_HANDOFF';
        outcome.assignment = await this.assignOwner(session, meta, reason);

        const at = new Date(this.now());
        if (this.deps.businessHours.shouldFlagOutOfHours(answer.signal.handoffPriority, at)) {
          const nextOpening = this.deps.businessHours.nextOpening(at);
          const label = nextOpening?.label ?? 'as soon as possible';
          outcome.outOfHours = true;
          outcome.reply = `${answer.text}\n\n${this.messages.outOfHoursNotice(label)}`;
          await this.raiseOutOfHours(session, answer.signal.handoffPriority, label);
        }
      }

      log.info(
        {
          preview: previewText(text, 40),
          handoff: outcome.handoffRequested,
          priority: answer.signal.handoffPriority,
          timeout,
        },
        'Bot replied',
      );
      stopTimer({ responder: 'bot' });
      endSpan(trace, spanProcess);
      return outcome;
    } catch (err) {
      endSpan(trace, spanProcess, 'error');
      log.error({ err }, 'Pipeline processing failed');
      throw err;
    }
  }

  // ==================== Handoff side effects ====================

  private async assignOwner(session: SessionRef, meta: ConversationMeta, reason: string): Promise<AssignmentResult> {
    const { assigner, state } = this.deps;
    const origin = meta.channelOrigin ?? assigner.detectChannelOrigin({}, session.channel);
    const assignment = await assigner.getNextOwner(origin);

    if (assignment.ownerId === null) {
      await this.deps.orphanAlerts.record({
        identity: session.identity,
        channel: session.channel,
        team: assignment.team,
        reason: 'no_active_owner',
        contactId: meta.contactId,
        timestamp: this.now(),
        metadata: { channelOrigin: origin, handoffReason: reason },
      });
    } else {
      const current = await state.getOrCreateMeta(session);
      current.assignedOwnerId = assignment.ownerId;
      await state.setMetaKeepingTtl(session, current);
    }

    if (this.deps.crm) {
      try {
        await this.deps.crm.syncHandoff({
          identity: session.identity,
          channel: session.channel,
          owner: assignment.ownerId,
          handoffReason: reason,
        });
      } catch (err) {
        this.log.error({ identity: maskIdentity(session.identity), error: toErrorMessage(err) }, 'CRM handoff sync failed');
      }
    }
    return assignment;
  }

  private async raiseOutOfHours(
    session: SessionRef,
    priority: HandoffPriority,
    nextOpening: string,
  ): Promise<void> {
    if (!this.deps.alerts) return;
    try {
      await this.deps.alerts.outOfHours({
        identity: session.identity,
        channel: session.channel,
        priority,
        nextOpening,
        timestamp: this.now(),
      });
    } catch (err) {
      this.log.error({ identity: maskIdentity(session.identity), error: toErrorMessage(err) }, 'Out-of-hours alert failed');
    }
  }

  private async mirrorToCrm(session: SessionRef, text: string): Promise<void> {
    if (!this.deps.crm) return;
    try {
      await this.deps.crm.mirrorInbound(session, text);
    } catch (err) {
      this.log.error({ identity: maskIdentity(session.identity), error: toErrorMessage(err) }, 'CRM mirror failed');
    }
  }

  /** Display name and lead source, buffered with the message; no store access. */
  private contactHints(event: InboundEvent): ContactHints {
    const contact: ContactHints = {};
    if (event.displayName) contact.displayName = event.displayName;
    if (event.metadata !== undefined && Object.values(event.metadata).some((v) => v)) {
      contact.channelOrigin = this.deps.assigner.detectChannelOrigin(event.metadata, event.channelHint);
    }
    return contact;
  }
}
