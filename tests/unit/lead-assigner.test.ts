import { LeadRoundRobinAssigner } from '../../src/routing/lead-assigner';
import { SessionKeyspace } from '../../src/session/session-keyspace';
import { InMemoryCoordinationStore } from '../../src/store/coordination-store';
import { RoutingConfig } from '../../src/config/types';
import { StoreUnavailableError } from '../../src/resilience/errors';

function buildConfig(overrides: Partial<RoutingConfig> = {}): RoutingConfig {
  return {
    teams: {
      sales: [
        { id: 'owner-a', name: 'Ana', active: true },
        { id: 'owner-b', name: 'Bruno', active: true },
        { id: 'owner-c', name: 'Carla', active: false },
      ],
      solo: [{ id: 'owner-s', name: 'Sofia', active: true }],
      empty: [{ id: 'owner-x', name: 'Xavier', active: false }],
      default: [{ id: 'owner-d', name: 'Diego', active: true }],
    },
    channelToTeam: {
      website: 'sales',
      facebook: 'sales',
      instagram: 'solo',
      google_ads: 'solo',
      classifieds: 'empty',
      whatsapp_direct: 'default',
    },
    fallbackTeam: 'default',
    defaultChannel: 'whatsapp_direct',
    explicitChannelFields: ['channel_origin', 'source', 'utm_source'],
    referrerRules: [
      { channel: 'facebook', keywords: ['facebook', 'fb.com'] },
      { channel: 'instagram', keywords: ['instagram'] },
    ],
    businessHours: { weekly: {} },
    ...overrides,
  };
}

const COUNTER_KEY = 'handoff:lead_assigner:index:sales';

describe('LeadRoundRobinAssigner', () => {
  let store: InMemoryCoordinationStore;
  let assigner: LeadRoundRobinAssigner;

  beforeEach(() => {
    store = new InMemoryCoordinationStore();
    assigner = new LeadRoundRobinAssigner(store, new SessionKeyspace('handoff:'), buildConfig());
  });

  describe('getNextOwner', () => {
    it('should rotate two active owners A, B, A, B', async () => {
      const owners: Array<string | null> = [];
      for (let i = 0; i < 4; i++) {
        owners.push((await assigner.getNextOwner('website')).ownerId);
      }
      expect(owners).toEqual(['owner-a', 'owner-b', 'owner-a', 'owner-b']);
      expect(await store.get(COUNTER_KEY)).toBe('4');
    });

    it('should return every owner once before repeating', async () => {
      const first = await assigner.getNextOwner('website');
      const second = await assigner.getNextOwner('facebook');
      expect(new Set([first.ownerId, second.ownerId])).toEqual(new Set(['owner-a', 'owner-b']));
      expect(second).toEqual({
        outcome: 'assigned',
        ownerId: 'owner-b',
        ownerName: 'Bruno',
        team: 'sales',
        channelOrigin: 'facebook',
        rotationIndex: 1,
      });
    });

    it('should never touch the counter with a single active owner', async () => {
      const setSpy = jest.spyOn(store, 'set');
      const getSpy = jest.spyOn(store, 'get');

      for (let i = 0; i < 3; i++) {
        const result = await assigner.getNextOwner('instagram');
        expect(result.ownerId).toBe('owner-s');
        expect(result.rotationIndex).toBeUndefined();
      }

      expect(setSpy).not.toHaveBeenCalled();
      expect(getSpy).not.toHaveBeenCalled();
      expect(await store.get('handoff:lead_assigner:index:solo')).toBeNull();
    });

    it('should return unassigned when no owner is active', async () => {
      expect(await assigner.getNextOwner('classifieds')).toEqual({
        outcome: 'unassigned',
        ownerId: null,
        team: 'empty',
        channelOrigin: 'classifieds',
      });
    });

    it('should route an unmapped channel to the fallback team', async () => {
      const result = await assigner.getNextOwner('tiktok');
      expect(result.team).toBe('default');
      expect(result.ownerId).toBe('owner-d');
    });

    it('should treat inherited object keys as unmapped channels', async () => {
      const result = await assigner.getNextOwner('constructor');
      expect(result.team).toBe('default');
      expect(result.ownerId).toBe('owner-d');
      expect(assigner.activeOwners('toString').map((o) => o.id)).toEqual(['owner-d']);
    });

    it('should use the default channel when none is given', async () => {
      expect((await assigner.getNextOwner()).channelOrigin).toBe('whatsapp_direct');
    });

    it('should restart from 0 on a corrupt counter', async () => {
      await store.set(COUNTER_KEY, 'garbage');
      expect((await assigner.getNextOwner('website')).ownerId).toBe('owner-a');
      expect(await store.get(COUNTER_KEY)).toBe('1');
    });

    it('should still assign when the store is unreachable', async () => {
      jest.spyOn(store, 'get').mockRejectedValue(new StoreUnavailableError('get'));
      jest.spyOn(store, 'set').mockRejectedValue(new StoreUnavailableError('set'));

      const result = await assigner.getNextOwner('website');
      expect(result.ownerId).toBe('owner-a');
      expect(result.rotationIndex).toBe(0);
    });

    it('should pick up a counter left by another process', async () => {
      await store.set(COUNTER_KEY, '7');
      expect((await assigner.getNextOwner('website')).ownerId).toBe('owner-b');
    });
  });

  describe('detectChannelOrigin', () => {
    it('should prefer an explicit metadata field', () => {
      expect(assigner.detectChannelOrigin({ utm_source: 'Google Ads', referrer: 'https://facebook.com/x' })).toBe(
        'google_ads',
      );
    });

    it('should skip an explicit value that maps to no team', () => {
      expect(assigner.detectChannelOrigin({ channel_origin: 'newsletter', source: 'Website' })).toBe('website');
    });

    it('should match referrer keywords in rule order', () => {
      expect(assigner.detectChannelOrigin({ referrer: 'https://l.FB.com/?u=instagram' })).toBe('facebook');
      expect(assigner.detectChannelOrigin({ referrer: 'https://www.instagram.com/p/1' })).toBe('instagram');
    });

    it('should ignore metadata values naming inherited object keys', () => {
      expect(assigner.detectChannelOrigin({ utm_source: 'constructor' }, 'whatsapp')).toBe('whatsapp_direct');
      expect(assigner.detectChannelOrigin({ source: '__proto__' }, 'toString')).toBe('whatsapp_direct');
    });

    it('should use the transport hint before the default', () => {
      expect(assigner.detectChannelOrigin({}, 'Instagram')).toBe('instagram');
      expect(assigner.detectChannelOrigin({}, 'sms')).toBe('whatsapp_direct');
    });
  });

  describe('helpers', () => {
    it('should look up owner names across teams', () => {
      expect(assigner.getOwnerName('owner-s')).toBe('Sofia');
      expect(assigner.getOwnerName('nobody')).toBeNull();
    });

    it('should reset a team rotation to 0', async () => {
      await assigner.getNextOwner('website');
      await assigner.resetRotation('sales');
      expect((await assigner.getNextOwner('website')).ownerId).toBe('owner-a');
    });

    it('should report per-team stats', async () => {
      await assigner.getNextOwner('website');
      const stats = await assigner.getAssignmentStats();

      expect(stats.store).toBe('memory');
      expect(stats.teams.sales).toEqual({ activeOwners: 2, counter: 1, nextOwner: 'Bruno' });
      expect(stats.teams.empty).toEqual({ activeOwners: 0, counter: 0, nextOwner: null });
    });
  });
});
