import { HandoffCoordinator, DEFAULT_HANDOFF_REASON } from '../../src/orchestrator/handoff-coordinator';
import { ConversationStateStore } from '../../src/session/conversation-state-store';
import { SessionKeyspace } from '../../src/session/session-keyspace';
import { InMemoryCoordinationStore } from '../../src/store/coordination-store';

const HOUR_MS = 60 * 60 * 1000;
const session = { identity: '+573001234567', channel: 'whatsapp' };
const STATUS_KEY = 'handoff:conv_state:+573001234567:whatsapp';
const META_KEY = 'handoff:conv_meta:+573001234567:whatsapp';

describe('HandoffCoordinator', () => {
  let clock: number;
  let store: InMemoryCoordinationStore;
  let state: ConversationStateStore;
  let coordinator: HandoffCoordinator;

  beforeEach(() => {
    clock = Date.UTC(2026, 9, 19, 12, 0, 0);
    const now = () => clock;
    store = new InMemoryCoordinationStore(now);
    state = new ConversationStateStore(store, new SessionKeyspace('handoff:'), { defaultTtlSeconds: 86_400, now });
    coordinator = new HandoffCoordinator(state, { now });
  });

  describe('requestHandoff', () => {
    it('should move a fresh session to PENDING_HANDOFF keeping the reason exactly', async () => {
      expect(await coordinator.requestHandoff(session, 'client asked')).toBe(true);

      expect(await coordinator.getStatus(session)).toBe('PENDING_HANDOFF');
      const meta = await state.getMeta(session);
      expect(meta?.handoffReason).toBe('client asked');
      expect(meta?.status).toBe('PENDING_HANDOFF');
      expect(await store.ttl(STATUS_KEY)).toBe(86_400);
    });

    it('should use the default reason', async () => {
      await coordinator.requestHandoff(session);
      expect((await state.getMeta(session))?.handoffReason).toBe(DEFAULT_HANDOFF_REASON);
    });

    it('should refuse once an operator owns the session', async () => {
      await coordinator.activateHuman(session, 'owner-101');
      expect(await coordinator.requestHandoff(session, 'again')).toBe(false);
      expect(await coordinator.getStatus(session)).toBe('HUMAN_ACTIVE');
    });
  });

  describe('activateHuman', () => {
    it('should apply the 72h TTL and revert to BOT_ACTIVE once it expires', async () => {
      expect(await coordinator.activateHuman(session, 'owner-101')).toBe(true);
      expect(await coordinator.getStatus(session)).toBe('HUMAN_ACTIVE');
      expect(await store.ttl(STATUS_KEY)).toBe(72 * 3600);
      expect(await store.ttl(META_KEY)).toBe(72 * 3600);

      const meta = await state.getMeta(session);
      expect(meta?.assignedOwnerId).toBe('owner-101');
      expect(meta?.humanActivatedAt).toBe(clock);

      clock += 72 * HOUR_MS;
      expect(await coordinator.getStatus(session)).toBe('BOT_ACTIVE');
    });
  });

  describe('refreshHumanTtl', () => {
    it('should return false and change nothing on a bot session', async () => {
      await state.setStatus(session, 'BOT_ACTIVE', 500);
      const setSpy = jest.spyOn(store, 'set');

      expect(await coordinator.refreshHumanTtl(session)).toBe(false);
      expect(setSpy).not.toHaveBeenCalled();
      expect(await store.ttl(STATUS_KEY)).toBe(500);
    });

    it('should extend a human session by a fresh window', async () => {
      await coordinator.activateHuman(session);
      clock += 10 * HOUR_MS;
      expect(await store.ttl(STATUS_KEY)).toBe(62 * 3600);

      expect(await coordinator.refreshHumanTtl(session)).toBe(true);
      expect(await store.ttl(STATUS_KEY)).toBe(72 * 3600);
      expect((await state.getMeta(session))?.lastActivity).toBe(clock);
    });
  });

  describe('activateBot', () => {
    it('should clear the reason and restore the default TTL', async () => {
      await coordinator.requestHandoff(session, 'client asked');
      await coordinator.activateHuman(session);

      expect(await coordinator.activateBot(session, 'advisor_timeout')).toBe(true);
      expect(await coordinator.getStatus(session)).toBe('BOT_ACTIVE');
      expect((await state.getMeta(session))?.handoffReason).toBeUndefined();
      expect(await store.ttl(STATUS_KEY)).toBe(86_400);
    });
  });

  describe('recordOperatorReply', () => {
    it('should take over a pending session', async () => {
      await coordinator.requestHandoff(session);
      expect(await coordinator.recordOperatorReply(session, 'owner-102')).toBe('HUMAN_ACTIVE');

      const meta = await state.getMeta(session);
      expect(meta?.assignedOwnerId).toBe('owner-102');
      expect(meta?.handoffReason).toBe('operator_reply');
      expect(meta?.lastOperatorMessageAt).toBe(clock);
    });

    it('should keep IN_CONVERSATION', async () => {
      await coordinator.markInConversation(session, 'owner-101');
      expect(await coordinator.recordOperatorReply(session)).toBe('IN_CONVERSATION');
      expect(await coordinator.getStatus(session)).toBe('IN_CONVERSATION');
    });
  });

  describe('closeConversation', () => {
    it('should delete every record of the session', async () => {
      await coordinator.activateHuman(session);
      await store.set('handoff:conv_state:+573001234567', 'HUMAN_ACTIVE');

      await coordinator.closeConversation(session);

      expect(await store.exists(STATUS_KEY)).toBe(false);
      expect(await store.exists(META_KEY)).toBe(false);
      expect(await coordinator.getStatus(session)).toBe('BOT_ACTIVE');
    });
  });

  describe('checkConversationTimeout', () => {
    it('should return none while the bot owns the session', async () => {
      await coordinator.updateOperatorMessageTimestamp(session);
      clock += 100 * HOUR_MS;
      expect(await coordinator.checkConversationTimeout(session)).toEqual({ signal: 'none' });
    });

    it('should signal client_timeout even when the client message is also past 72h', async () => {
      await coordinator.activateHuman(session);
      await coordinator.updateClientMessageTimestamp(session);
      clock += 47 * HOUR_MS;
      await coordinator.updateOperatorMessageTimestamp(session);
      await coordinator.refreshHumanTtl(session);
      clock += 25 * HOUR_MS;

      // client message is 72h old, operator message 25h old
      expect(await coordinator.checkConversationTimeout(session)).toEqual({
        signal: 'client_timeout',
        elapsedMs: 25 * HOUR_MS,
      });
    });

    it('should signal advisor_timeout when the client waited 72h', async () => {
      await coordinator.activateHuman(session);
      await coordinator.updateClientMessageTimestamp(session);
      clock += 71 * HOUR_MS;
      await coordinator.refreshHumanTtl(session);
      clock += HOUR_MS;

      expect(await coordinator.checkConversationTimeout(session)).toEqual({
        signal: 'advisor_timeout',
        elapsedMs: 72 * HOUR_MS,
      });
    });

    it('should stay quiet inside both windows', async () => {
      await coordinator.activateHuman(session);
      await coordinator.updateOperatorMessageTimestamp(session);
      clock += 23 * HOUR_MS;
      expect(await coordinator.checkConversationTimeout(session)).toEqual({ signal: 'none' });
    });
  });

  describe('evaluateTimeout', () => {
    it('should ignore a stale operator message the client already answered', () => {
      const meta = state.freshMeta(session);
      meta.lastOperatorMessageAt = clock - 50 * HOUR_MS;
      meta.lastClientMessageAt = clock - 30 * HOUR_MS;
      expect(coordinator.evaluateTimeout(meta, clock)).toEqual({ signal: 'none' });
    });
  });

  describe('applyAssistantSignal', () => {
    it('should request a handoff for a high priority signal', async () => {
      const handedOff = await coordinator.applyAssistantSignal(session, {
        handoffPriority: 'high',
        visitIntent: false,
        sentimentScore: -0.4,
        handoffReason: 'wants a quote',
      });
      expect(handedOff).toBe(true);
      expect((await state.getMeta(session))?.handoffReason).toBe('wants a quote');
    });

    it('should ignore a medium priority signal', async () => {
      const handedOff = await coordinator.applyAssistantSignal(session, {
        handoffPriority: 'medium',
        visitIntent: true,
        sentimentScore: 0.2,
      });
      expect(handedOff).toBe(false);
      expect(await coordinator.getStatus(session)).toBe('BOT_ACTIVE');
    });
  });
});
