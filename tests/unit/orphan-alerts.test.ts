import { OrphanLeadAlerts } from '../../src/routing/orphan-alerts';
import { SessionKeyspace } from '../../src/session/session-keyspace';
import { InMemoryCoordinationStore } from '../../src/store/coordination-store';
import { AlertChannel, OrphanLeadAlert } from '../../src/pipeline/types';
import { StoreUnavailableError } from '../../src/resilience/errors';

function alertFor(identity: string, timestamp: number): OrphanLeadAlert {
  return { identity, channel: 'whatsapp', team: 'team_direct', reason: 'no_active_owner', timestamp };
}

describe('OrphanLeadAlerts', () => {
  let store: InMemoryCoordinationStore;
  let channel: { orphanLead: jest.Mock; outOfHours: jest.Mock };
  let alerts: OrphanLeadAlerts;

  beforeEach(() => {
    store = new InMemoryCoordinationStore();
    channel = {
      orphanLead: jest.fn().mockResolvedValue(undefined),
      outOfHours: jest.fn().mockResolvedValue(undefined),
    };
    const alertChannel: AlertChannel = channel;
    alerts = new OrphanLeadAlerts(store, new SessionKeyspace('handoff:'), alertChannel, 2);
  });

  it('should store alerts newest first and forward them', async () => {
    await alerts.record(alertFor('+573001111111', 1));
    await alerts.record(alertFor('+573002222222', 2));

    const pending = await alerts.pending();
    expect(pending.map((a) => a.identity)).toEqual(['+573002222222', '+573001111111']);
    expect(channel.orphanLead).toHaveBeenCalledTimes(2);
    expect(channel.orphanLead).toHaveBeenLastCalledWith(alertFor('+573002222222', 2));
  });

  it('should cap the stored list', async () => {
    await alerts.record(alertFor('+573001111111', 1));
    await alerts.record(alertFor('+573002222222', 2));
    await alerts.record(alertFor('+573003333333', 3));

    expect(await store.listLength('handoff:lead_assigner:orphan_alerts')).toBe(2);
    expect((await alerts.pending(1)).map((a) => a.timestamp)).toEqual([3]);
  });

  it('should not fail when delivery fails', async () => {
    channel.orphanLead.mockRejectedValue(new Error('webhook down'));
    await expect(alerts.record(alertFor('+573001111111', 1))).resolves.toBeUndefined();
    expect(await alerts.pending()).toHaveLength(1);
  });

  it('should still deliver when the store is unreachable', async () => {
    jest.spyOn(store, 'pushHeadCapped').mockRejectedValue(new StoreUnavailableError('pushHeadCapped'));
    await alerts.record(alertFor('+573001111111', 1));
    expect(channel.orphanLead).toHaveBeenCalledTimes(1);
  });

  it('should skip unreadable entries', async () => {
    await store.pushHeadCapped('handoff:lead_assigner:orphan_alerts', '{not json', 10);
    await store.pushHeadCapped('handoff:lead_assigner:orphan_alerts', '{"identity":"+573001111111"}', 10);
    await alerts.record(alertFor('+573002222222', 5));

    expect(await alerts.pending()).toEqual([alertFor('+573002222222', 5)]);
  });
});
