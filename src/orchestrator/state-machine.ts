import { ConversationStatus, SessionRef } from '../session/types';
import { STATE_TRANSITIONS, StateTransitionEvent } from './types';
import { HandoffPriority } from '../pipeline/types';
import { logger } from '../observability/logger';
import { maskIdentity } from '../observability/pii-redactor';
import { stateTransitions } from '../observability/metrics';

export interface TransitionResult {
  allowed: boolean;
  event: StateTransitionEvent | null;
}

export class HandoffStateMachine {
  /**
   * Validate a status change. Re-entering the current status is allowed
   * (it refreshes the record) but produces no event.
   */
  transition(
    session: SessionRef,
    currentState: ConversationStatus,
    targetState: ConversationStatus,
    reason: string,
  ): TransitionResult {
    if (currentState === targetState) {
      return { allowed: true, event: null };
    }

    const allowed = STATE_TRANSITIONS[currentState];
    if (!allowed.includes(targetState)) {
      logger.warn(
        { identity: maskIdentity(session.identity), channel: session.channel, from: currentState, to: targetState, reason },
        'Invalid state transition attempted',
      );
      return { allowed: false, event: null };
    }

    const event: StateTransitionEvent = {
      identity: session.identity,
      channel: session.channel,
      from: currentState,
      to: targetState,
      reason,
      timestamp: Date.now(),
    };

    stateTransitions.inc({ from: currentState, to: targetState });
    logger.info({ ...event, identity: maskIdentity(event.identity) }, 'State transition');

    return { allowed: true, event };
  }

  /** Only the two most urgent assistant priorities hand the conversation over. */
  shouldHandOff(priority: HandoffPriority): boolean {
    return priority === 'high' || priority === 'immediate';
  }
}

export const handoffStateMachine = new HandoffStateMachine();
