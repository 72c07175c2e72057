import { MessageAggregator } from '../../src/aggregation/message-aggregator';
import { SessionKeyspace } from '../../src/session/session-keyspace';
import { InMemoryCoordinationStore } from '../../src/store/coordination-store';
import { StoreUnavailableError } from '../../src/resilience/errors';
import { ManualDrainScheduler } from '../helpers/manual-drain-scheduler';

const alice = { identity: '+573001111111', channel: 'whatsapp' };
const bob = { identity: '+573002222222', channel: 'whatsapp' };

describe('MessageAggregator', () => {
  let clock: number;
  let store: InMemoryCoordinationStore;
  let scheduler: ManualDrainScheduler;
  let aggregator: MessageAggregator;
  let processed: Array<{ identity: string; text: string }>;

  beforeEach(() => {
    clock = Date.UTC(2026, 9, 19, 12, 0, 0);
    const now = () => clock;
    store = new InMemoryCoordinationStore(now);
    scheduler = new ManualDrainScheduler();
    aggregator = new MessageAggregator(store, new SessionKeyspace('handoff:'), scheduler, { windowSeconds: 30, now });

    processed = [];
    scheduler.onDrain(async (session) => {
      const batch = await aggregator.drainSession(session);
      if (batch.messages.length > 0) processed.push({ identity: session.identity, text: batch.combinedText });
    });
  });

  describe('submit', () => {
    it('should schedule one drain for the first message of a window', async () => {
      expect(await aggregator.submit(alice, 'hola')).toEqual({
        outcome: 'scheduled',
        bufferCount: 1,
        drainAt: clock + 30_000,
      });
      expect(scheduler.scheduled).toEqual([{ session: alice, delayMs: 30_000 }]);
    });

    it('should buffer later messages of the same window', async () => {
      await aggregator.submit(alice, 'a');
      clock += 5_000;
      expect(await aggregator.submit(alice, 'b')).toEqual({ outcome: 'buffered', bufferCount: 2 });
      expect(scheduler.scheduled).toHaveLength(1);
    });

    it('should set lock and marker TTLs beyond the window', async () => {
      await aggregator.submit(alice, 'a');
      expect(await store.ttl('handoff:msg_lock:+573001111111:whatsapp')).toBe(35);
      expect(await store.ttl('handoff:msg_processing:+573001111111:whatsapp')).toBe(40);
      expect(await store.ttl('handoff:msg_buffer:+573001111111:whatsapp')).toBe(40);
    });

    it('should join the buffer when the lock is already held', async () => {
      await store.set('handoff:msg_lock:+573001111111:whatsapp', 'other-worker', 35);
      expect(await aggregator.submit(alice, 'a')).toEqual({ outcome: 'buffered', bufferCount: 1 });
      expect(scheduler.scheduled).toHaveLength(0);
    });

    it('should process immediately when aggregation is disabled', async () => {
      const off = new MessageAggregator(store, new SessionKeyspace('handoff:'), scheduler, { enabled: false });
      expect(await off.submit(alice, 'hola')).toEqual({
        outcome: 'degraded',
        reason: 'disabled',
        combinedText: 'hola',
        bufferCount: 1,
      });
      expect(await store.exists('handoff:msg_buffer:+573001111111:whatsapp')).toBe(false);
    });

    it('should degrade to immediate processing when the store is unavailable', async () => {
      jest.spyOn(store, 'exists').mockRejectedValue(new StoreUnavailableError('exists'));
      expect(await aggregator.submit(alice, 'hola')).toEqual({
        outcome: 'degraded',
        reason: 'store_unavailable',
        combinedText: 'hola',
        bufferCount: 1,
      });
    });

    it('should rethrow unexpected errors', async () => {
      jest.spyOn(store, 'exists').mockRejectedValue(new TypeError('bug'));
      await expect(aggregator.submit(alice, 'hola')).rejects.toThrow('bug');
    });
  });

  describe('drain', () => {
    it('should turn three messages into one process call in arrival order', async () => {
      await aggregator.submit(alice, 'a');
      clock += 2_000;
      await aggregator.submit(alice, 'b');
      clock += 2_000;
      await aggregator.submit(alice, 'c');

      clock += 26_000;
      await scheduler.fireAll();

      expect(processed).toEqual([{ identity: '+573001111111', text: 'a b c' }]);
    });

    it('should never mix two sessions', async () => {
      await aggregator.submit(alice, 'a1');
      await aggregator.submit(bob, 'b1');
      await aggregator.submit(alice, 'a2');
      await aggregator.submit(bob, 'b2');

      await scheduler.fireAll();

      expect(processed).toEqual([
        { identity: '+573001111111', text: 'a1 a2' },
        { identity: '+573002222222', text: 'b1 b2' },
      ]);
    });

    it('should keep channels of one identity apart', async () => {
      await aggregator.submit(alice, 'wa');
      await aggregator.submit({ identity: alice.identity, channel: 'web' }, 'site');
      expect(scheduler.scheduled).toHaveLength(2);
    });

    it('should release lock and marker so the next message opens a new window', async () => {
      await aggregator.submit(alice, 'first');
      await scheduler.fireAll();

      expect(await store.exists('handoff:msg_lock:+573001111111:whatsapp')).toBe(false);
      expect(await store.exists('handoff:msg_processing:+573001111111:whatsapp')).toBe(false);
      expect((await aggregator.submit(alice, 'second')).outcome).toBe('scheduled');
    });

    it('should return an empty batch when nothing is buffered', async () => {
      expect(await aggregator.drainSession(alice)).toEqual({
        session: alice,
        messages: [],
        combinedText: '',
        contact: {},
      });
    });

    it('should carry contact hints through the buffer without other writes', async () => {
      const setSpy = jest.spyOn(store, 'set');
      await aggregator.submit(alice, 'hola', { displayName: 'Laura', channelOrigin: 'facebook' });
      await aggregator.submit(alice, 'soy yo', { displayName: 'Laura M', channelOrigin: 'website' });
      await aggregator.submit(alice, 'gracias');

      expect(setSpy.mock.calls.map(([key]) => key)).toEqual([
        'handoff:msg_lock:+573001111111:whatsapp',
        'handoff:msg_processing:+573001111111:whatsapp',
      ]);
      expect(await aggregator.drainSession(alice)).toEqual({
        session: alice,
        messages: ['hola', 'soy yo', 'gracias'],
        combinedText: 'hola soy yo gracias',
        contact: { displayName: 'Laura M', channelOrigin: 'facebook' },
      });
    });

    it('should read plain-text entries left in a buffer', async () => {
      await store.pushTail('handoff:msg_buffer:+573001111111:whatsapp', 'legacy text', 40);
      expect((await aggregator.drainSession(alice)).combinedText).toBe('legacy text');
    });

    it('should join with the configured separator', async () => {
      const newline = new MessageAggregator(store, new SessionKeyspace('handoff:'), scheduler, {
        separator: '\n',
        now: () => clock,
      });
      await newline.submit(bob, 'x');
      await newline.submit(bob, 'y');
      expect((await newline.drainSession(bob)).combinedText).toBe('x\ny');
    });
  });

  describe('housekeeping', () => {
    it('should count and clear a buffer', async () => {
      await aggregator.submit(alice, 'a');
      await aggregator.submit(alice, 'b');
      expect(await aggregator.bufferedCount(alice)).toBe(2);

      await aggregator.clearBuffer(alice);
      expect(await aggregator.bufferedCount(alice)).toBe(0);
      expect(await store.exists('handoff:msg_lock:+573001111111:whatsapp')).toBe(false);
    });
  });
});
