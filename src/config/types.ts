/** Human owner that can receive leads */
export interface OwnerConfig {
  id: string;
  name: string;
  active: boolean;
}

export type Weekday = 'monday' | 'tuesday' | 'wednesday' | 'thursday' | 'friday' | 'saturday' | 'sunday';

export const WEEKDAYS: readonly Weekday[] = [
  'monday',
  'tuesday',
  'wednesday',
  'thursday',
  'friday',
  'saturday',
  'sunday',
];

/** Local wall-clock window, `HH:MM` 24h, both ends inclusive */
export interface OpeningWindow {
  open: string;
  close: string;
}

/** A missing or null day is closed */
export type WeeklySchedule = Partial<Record<Weekday, OpeningWindow | null>>;

export interface BusinessHoursConfig {
  /** IANA zone; falls back to BUSINESS_TIMEZONE */
  timezone?: string;
  weekly: WeeklySchedule;
}

/** Ordered: the first rule whose keyword occurs in the referrer wins */
export interface ReferrerRule {
  channel: string;
  keywords: string[];
}

export interface RoutingConfig {
  teams: Record<string, OwnerConfig[]>;
  channelToTeam: Record<string, string>;
  fallbackTeam: string;
  /** Origin used when nothing in the metadata identifies one */
  defaultChannel: string;
  /** Metadata fields that may name the origin outright, in lookup order */
  explicitChannelFields: string[];
  referrerRules: ReferrerRule[];
  businessHours: BusinessHoursConfig;
}
