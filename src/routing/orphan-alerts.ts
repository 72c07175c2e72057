import { SessionKeyspace } from '../session/session-keyspace';
import { CoordinationStore } from '../store/types';
import { AlertChannel, OrphanLeadAlert } from '../pipeline/types';
import { isStoreUnavailable, toErrorMessage } from '../resilience/errors';
import { logger } from '../observability/logger';
import { maskIdentity } from '../observability/pii-redactor';
import { orphanLeads } from '../observability/metrics';

export const ORPHAN_ALERTS_KEY = 'lead_assigner:orphan_alerts';
export const MAX_STORED_ALERTS = 100;

function isOrphanLeadAlert(value: unknown): value is OrphanLeadAlert {
  if (value === null || typeof value !== 'object') return false;
  const record: Record<string, unknown> = { ...value };
  return (
    typeof record.identity === 'string' &&
    typeof record.channel === 'string' &&
    typeof record.team === 'string' &&
    typeof record.reason === 'string' &&
    typeof record.timestamp === 'number'
  );
}

/**
 * Leads no active owner could take. Recording is fire-and-forget: the
 * inbound flow never fails because an alert could not be stored or sent.
 */
export class OrphanLeadAlerts {
  private readonly log = logger.child({ component: 'orphan-alerts' });
  private readonly key: string;

  constructor(
    private readonly store: CoordinationStore,
    keyspace: SessionKeyspace,
    private readonly channel?: AlertChannel,
    private readonly maxStored: number = MAX_STORED_ALERTS,
  ) {
    this.key = keyspace.globalKey(ORPHAN_ALERTS_KEY);
  }

  async record(alert: OrphanLeadAlert): Promise<void> {
    orphanLeads.inc();
    this.log.warn(
      { identity: maskIdentity(alert.identity), channel: alert.channel, team: alert.team, reason: alert.reason },
      'Orphan lead',
    );

    try {
      await this.store.pushHeadCapped(this.key, JSON.stringify(alert), this.maxStored);
    } catch (err) {
      if (!isStoreUnavailable(err)) throw err;
      this.log.error({ err }, 'Orphan alert not stored');
    }

    if (this.channel) {
      try {
        await this.channel.orphanLead(alert);
      } catch (err) {
        this.log.error({ error: toErrorMessage(err) }, 'Orphan alert delivery failed');
      }
    }
  }

  /** Newest first. */
  async pending(limit = 10): Promise<OrphanLeadAlert[]> {
    if (limit <= 0) return [];

    let raw: string[];
    try {
      raw = await this.store.listRange(this.key, 0, limit - 1);
    } catch (err) {
      if (!isStoreUnavailable(err)) throw err;
      this.log.error({ err }, 'Orphan alerts unreadable');
      return [];
    }

    const alerts: OrphanLeadAlert[] = [];
    for (const entry of raw) {
      try {
        const parsed: unknown = JSON.parse(entry);
        if (isOrphanLeadAlert(parsed)) alerts.push(parsed);
      } catch (err) {
        this.log.warn({ error: toErrorMessage(err) }, 'Skipping unreadable orphan alert');
      }
    }
    return alerts;
  }
}
