/**
 * Lead Routing Types
 */

export type AssignmentOutcome = 'assigned' | 'unassigned';

export interface AssignmentResult {
  outcome: AssignmentOutcome;
  /** Null when the team has no active owner (orphan lead) */
  ownerId: string | null;
  ownerName?: string;
  team: string;
  channelOrigin: string;
  /** Position in the active-owner list; absent when the counter was not consulted */
  rotationIndex?: number;
}

export interface TeamAssignmentStats {
  activeOwners: number;
  counter: number;
  nextOwner: string | null;
}

export interface AssignmentStats {
  store: 'redis' | 'memory';
  teams: Record<string, TeamAssignmentStats>;
}

/** Channel-origin hints sent by the transport (utm_source, referrer, ...) */
export type OriginMetadata = Record<string, string | undefined>;
