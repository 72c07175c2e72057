import { BusinessHoursConfig, OpeningWindow, WEEKDAYS, Weekday } from '../config/types';
import { NextOpening } from './types';
import { HandoffPriority } from '../pipeline/types';
import { ConfigError } from '../resilience/errors';
import { logger } from '../observability/logger';

interface LocalTime {
  weekday: Weekday;
  minutes: number;
}

function toMinutes(hhmm: string): number {
  const [hours, minutes] = hhmm.split(':').map((part) => Number.parseInt(part, 10));
  return hours * 60 + minutes;
}

/** `08:30` → `8:30 AM`, `17:00` → `5:00 PM` */
export function formatClock(hhmm: string): string {
  const total = toMinutes(hhmm);
  const hours24 = Math.floor(total / 60);
  const minutes = total % 60;
  const period = hours24 < 12 ? 'AM' : 'PM';
  const hours12 = hours24 % 12 === 0 ? 12 : hours24 % 12;
  return `${hours12}:${String(minutes).padStart(2, '0')} ${period}`;
}

function createFormatter(timeZone: string): Intl.DateTimeFormat {
  try {
    return new Intl.DateTimeFormat('en-US', {
      timeZone,
      weekday: 'long',
      hour: '2-digit',
      minute: '2-digit',
      hourCycle: 'h23',
    });
  } catch {
    throw new ConfigError('businessHours.timezone', [`unknown time zone '${timeZone}'`]);
  }
}

/**
 * Weekly opening table evaluated in the business time zone, whatever the
 * host's own zone is.
 */
export class BusinessHours {
  private readonly formatter: Intl.DateTimeFormat;
  readonly timezone: string;

  constructor(
    private readonly config: BusinessHoursConfig,
    fallbackTimezone = 'America/Bogota',
  ) {
    this.timezone = config.timezone ?? fallbackTimezone;
    this.formatter = createFormatter(this.timezone);
  }

  windowFor(day: Weekday): OpeningWindow | null {
    return this.config.weekly[day] ?? null;
  }

  isBusinessHours(at: Date = new Date()): boolean {
    const local = this.localTime(at);
    const slot = this.windowFor(local.weekday);
    if (!slot) return false;
    return local.minutes >= toMinutes(slot.open) && local.minutes <= toMinutes(slot.close);
  }

  /** Null when the table has no open day at all. */
  nextOpening(at: Date = new Date()): NextOpening | null {
    const local = this.localTime(at);
    const today = this.windowFor(local.weekday);
    if (today && local.minutes < toMinutes(today.open)) {
      return this.opening(local.weekday, 0, today);
    }

    const start = WEEKDAYS.indexOf(local.weekday);
    for (let daysAhead = 1; daysAhead <= 7; daysAhead++) {
      const day = WEEKDAYS[(start + daysAhead) % 7];
      const slot = this.windowFor(day);
      if (slot) return this.opening(day, daysAhead, slot);
    }
    return null;
  }

  /** Only urgent handoffs raised outside opening hours are flagged. */
  shouldFlagOutOfHours(priority: HandoffPriority, at: Date = new Date()): boolean {
    if (priority !== 'high' && priority !== 'immediate') return false;
    if (this.isBusinessHours(at)) return false;

    logger.info({ priority }, 'Urgent handoff outside business hours');
    return true;
  }

  private opening(weekday: Weekday, daysAhead: number, slot: OpeningWindow): NextOpening {
    const clock = formatClock(slot.open);
    const label =
      daysAhead === 0 ? `today at ${clock}` : daysAhead === 1 ? `tomorrow at ${clock}` : `on ${weekday} at ${clock}`;
    return { daysAhead, weekday, opensAt: slot.open, label };
  }

  private localTime(at: Date): LocalTime {
    let weekday: Weekday = 'monday';
    let hours = 0;
    let minutes = 0;
    for (const part of this.formatter.formatToParts(at)) {
      if (part.type === 'weekday') {
        const match = WEEKDAYS.find((d) => d === part.value.toLowerCase());
        if (match) weekday = match;
      } else if (part.type === 'hour') {
        hours = Number.parseInt(part.value, 10) % 24;
      } else if (part.type === 'minute') {
        minutes = Number.parseInt(part.value, 10);
      }
    }
    return { weekday, minutes: hours * 60 + minutes };
  }
}
