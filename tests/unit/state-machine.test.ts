import { HandoffStateMachine } from '../../src/orchestrator/state-machine';

const session = { identity: '+573001234567', channel: 'whatsapp' };

describe('HandoffStateMachine', () => {
  let sm: HandoffStateMachine;

  beforeEach(() => {
    sm = new HandoffStateMachine();
  });

  describe('transition', () => {
    it('should allow BOT_ACTIVE -> PENDING_HANDOFF', () => {
      const result = sm.transition(session, 'BOT_ACTIVE', 'PENDING_HANDOFF', 'client asked');
      expect(result.allowed).toBe(true);
      expect(result.event).toMatchObject({
        identity: '+573001234567',
        channel: 'whatsapp',
        from: 'BOT_ACTIVE',
        to: 'PENDING_HANDOFF',
        reason: 'client asked',
      });
    });

    it('should allow an operator to take over a bot session directly', () => {
      expect(sm.transition(session, 'BOT_ACTIVE', 'HUMAN_ACTIVE', 'operator_reply').allowed).toBe(true);
    });

    it('should allow HUMAN_ACTIVE <-> IN_CONVERSATION', () => {
      expect(sm.transition(session, 'HUMAN_ACTIVE', 'IN_CONVERSATION', 'x').allowed).toBe(true);
      expect(sm.transition(session, 'IN_CONVERSATION', 'HUMAN_ACTIVE', 'x').allowed).toBe(true);
    });

    it('should allow reclaiming an operator session for the bot', () => {
      expect(sm.transition(session, 'HUMAN_ACTIVE', 'BOT_ACTIVE', 'advisor_timeout').allowed).toBe(true);
    });

    it('should reject HUMAN_ACTIVE -> PENDING_HANDOFF', () => {
      const result = sm.transition(session, 'HUMAN_ACTIVE', 'PENDING_HANDOFF', 'test');
      expect(result.allowed).toBe(false);
      expect(result.event).toBeNull();
    });

    it('should treat CLOSED as terminal', () => {
      expect(sm.transition(session, 'CLOSED', 'BOT_ACTIVE', 'reopen').allowed).toBe(false);
    });

    it('should allow re-entering the current status without an event', () => {
      const result = sm.transition(session, 'HUMAN_ACTIVE', 'HUMAN_ACTIVE', 'refresh');
      expect(result).toEqual({ allowed: true, event: null });
    });
  });

  describe('shouldHandOff', () => {
    it('should hand off only for high and immediate priority', () => {
      expect(sm.shouldHandOff('immediate')).toBe(true);
      expect(sm.shouldHandOff('high')).toBe(true);
      expect(sm.shouldHandOff('medium')).toBe(false);
      expect(sm.shouldHandOff('low')).toBe(false);
      expect(sm.shouldHandOff('none')).toBe(false);
    });
  });
});
