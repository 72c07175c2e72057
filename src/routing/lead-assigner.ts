/**
 * Lead Round-Robin Assigner
 *
 * channel of origin → team → next active owner. The rotation counter lives
 * in the coordination store without a TTL so fairness survives restarts.
 * Concurrent assignments may read the same counter value; approximate
 * fairness is accepted.
 */

import { OwnerConfig, RoutingConfig } from '../config/types';
import { AssignmentResult, AssignmentStats, OriginMetadata, TeamAssignmentStats } from './types';
import { SessionKeyspace } from '../session/session-keyspace';
import { CoordinationStore } from '../store/types';
import { isStoreUnavailable } from '../resilience/errors';
import { logger } from '../observability/logger';
import { leadAssignments } from '../observability/metrics';

const COUNTER_NAMESPACE = 'lead_assigner:index';

/** `Google Ads` → `google_ads` */
function toChannelToken(value: string): string {
  return value.trim().toLowerCase().replace(/\s+/g, '_');
}

export class LeadRoundRobinAssigner {
  private readonly log = logger.child({ component: 'lead-assigner' });

  constructor(
    private readonly store: CoordinationStore,
    private readonly keyspace: SessionKeyspace,
    private readonly config: RoutingConfig,
  ) {}

  resolveTeam(channelOrigin: string): string {
    return this.isKnownChannel(channelOrigin) ? this.config.channelToTeam[channelOrigin] : this.config.fallbackTeam;
  }

  activeOwners(team: string): OwnerConfig[] {
    const { teams, fallbackTeam } = this.config;
    let owners: OwnerConfig[] = [];
    if (Object.hasOwn(teams, team)) owners = teams[team];
    else if (Object.hasOwn(teams, fallbackTeam)) owners = teams[fallbackTeam];
    return owners.filter((o) => o.active);
  }

  async getNextOwner(channelOrigin: string = this.config.defaultChannel): Promise<AssignmentResult> {
    const team = this.resolveTeam(channelOrigin);
    const owners = this.activeOwners(team);

    if (owners.length === 0) {
      leadAssignments.inc({ team, outcome: 'unassigned' });
      this.log.error({ team, channelOrigin }, 'No active owners for team');
      return { outcome: 'unassigned', ownerId: null, team, channelOrigin };
    }

    // Single owner: the counter is neither read nor written
    if (owners.length === 1) {
      const [owner] = owners;
      leadAssignments.inc({ team, outcome: 'assigned' });
      this.log.info({ team, channelOrigin, ownerId: owner.id }, 'Assigned to sole active owner');
      return { outcome: 'assigned', ownerId: owner.id, ownerName: owner.name, team, channelOrigin };
    }

    const counter = await this.readCounter(team);
    const rotationIndex = counter % owners.length;
    const owner = owners[rotationIndex];
    await this.writeCounter(team, counter + 1);

    leadAssignments.inc({ team, outcome: 'assigned' });
    this.log.info({ team, channelOrigin, ownerId: owner.id, rotationIndex }, 'Round-robin assignment');
    return { outcome: 'assigned', ownerId: owner.id, ownerName: owner.name, team, channelOrigin, rotationIndex };
  }

  /**
   * Best-effort origin detection: an explicit metadata field, then a referrer
   * keyword, then the transport channel hint, then the default origin.
   */
  detectChannelOrigin(metadata: OriginMetadata = {}, hint?: string): string {
    for (const field of this.config.explicitChannelFields) {
      const value = metadata[field];
      if (!value) continue;
      const token = toChannelToken(value);
      if (this.isKnownChannel(token)) return token;
    }

    const referrer = (metadata.referrer ?? '').toLowerCase();
    if (referrer) {
      for (const rule of this.config.referrerRules) {
        if (rule.keywords.some((keyword) => referrer.includes(keyword.toLowerCase()))) {
          return rule.channel;
        }
      }
    }

    if (hint) {
      const token = toChannelToken(hint);
      if (this.isKnownChannel(token)) return token;
    }

    return this.config.defaultChannel;
  }

  getOwnerName(ownerId: string): string | null {
    for (const owners of Object.values(this.config.teams)) {
      const match = owners.find((o) => o.id === ownerId);
      if (match) return match.name;
    }
    return null;
  }

  async resetRotation(team: string = this.config.fallbackTeam): Promise<void> {
    await this.store.set(this.counterKey(team), '0');
    this.log.info({ team }, 'Rotation counter reset');
  }

  async getAssignmentStats(): Promise<AssignmentStats> {
    const teams: Record<string, TeamAssignmentStats> = {};
    for (const team of Object.keys(this.config.teams)) {
      const owners = this.activeOwners(team);
      const counter = await this.readCounter(team);
      teams[team] = {
        activeOwners: owners.length,
        counter,
        nextOwner: owners.length > 0 ? owners[counter % owners.length].name : null,
      };
    }
    return { store: this.store.kind, teams };
  }

  /** Own keys only; metadata values such as `constructor` must not match inherited members. */
  private isKnownChannel(token: string): boolean {
    return Object.hasOwn(this.config.channelToTeam, token);
  }

  // ==================== Counter ====================

  private counterKey(team: string): string {
    return this.keyspace.globalKey(`${COUNTER_NAMESPACE}:${team}`);
  }

  /** An unreachable store degrades to position 0 rather than failing the handoff. */
  private async readCounter(team: string): Promise<number> {
    let raw: string | null;
    try {
      raw = await this.store.get(this.counterKey(team));
    } catch (err) {
      if (!isStoreUnavailable(err)) throw err;
      this.log.warn({ team, err }, 'Rotation counter unreadable; starting from 0');
      return 0;
    }
    if (raw === null) return 0;

    const counter = Number.parseInt(raw, 10);
    if (!Number.isFinite(counter) || counter < 0) {
      this.log.warn({ team, raw }, 'Corrupt rotation counter; starting from 0');
      return 0;
    }
    return counter;
  }

  private async writeCounter(team: string, value: number): Promise<void> {
    try {
      await this.store.set(this.counterKey(team), String(value));
    } catch (err) {
      if (!isStoreUnavailable(err)) throw err;
      this.log.warn({ team, err }, 'Rotation counter not persisted');
    }
  }
}
