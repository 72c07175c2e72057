/**
 * Appointment Schedule Index
 *
 * One record per (identity, channel) plus a pointer to it in a sorted set
 * scored by the scheduled time, so reminder and follow-up sweeps are range
 * queries instead of scans. Cancelling removes the pointer; the record
 * itself stays until its TTL for audit.
 */

import {
  ACTIVE_APPOINTMENT_STATUSES,
  Appointment,
  AppointmentIndexOptions,
  DueWindow,
  NewAppointment,
  isAppointmentStatus,
} from './types';
import { SessionRef } from '../session/types';
import { SessionKeyspace } from '../session/session-keyspace';
import { CoordinationStore } from '../store/types';
import { logger } from '../observability/logger';
import { maskIdentity } from '../observability/pii-redactor';

const HOUR_MS = 60 * 60 * 1000;
const DAY_SECONDS = 24 * 60 * 60;

export const DEFAULT_APPOINTMENT_TTL_DAYS = 30;
export const DEFAULT_REMINDER_WINDOW: DueWindow = { fromMs: 23 * HOUR_MS, toMs: 25 * HOUR_MS };
export const DEFAULT_FOLLOWUP_WINDOW: DueWindow = { fromMs: -25 * HOUR_MS, toMs: -23 * HOUR_MS };

const INDEX_NAME = 'appointment_index';

export class AppointmentScheduleIndex {
  private readonly log = logger.child({ component: 'appointment-index' });
  private readonly indexKey: string;
  private readonly ttlSeconds: number;
  private readonly reminderWindow: DueWindow;
  private readonly followupWindow: DueWindow;
  private readonly now: () => number;

  constructor(
    private readonly store: CoordinationStore,
    private readonly keyspace: SessionKeyspace,
    options: AppointmentIndexOptions = {},
  ) {
    this.indexKey = keyspace.globalKey(INDEX_NAME);
    this.ttlSeconds = (options.ttlDays ?? DEFAULT_APPOINTMENT_TTL_DAYS) * DAY_SECONDS;
    this.reminderWindow = options.reminderWindow ?? DEFAULT_REMINDER_WINDOW;
    this.followupWindow = options.followupWindow ?? DEFAULT_FOLLOWUP_WINDOW;
    this.now = options.now ?? Date.now;
  }

  // ==================== Records ====================

  /** Create or replace the session's appointment. */
  async create(session: SessionRef, input: NewAppointment): Promise<Appointment> {
    const scheduledAt = input.scheduledAt instanceof Date ? input.scheduledAt.getTime() : input.scheduledAt;
    if (!Number.isFinite(scheduledAt)) {
      throw new RangeError('Appointment time is not a valid date');
    }

    const appointment: Appointment = {
      identity: session.identity,
      channel: session.channel,
      scheduledAt,
      status: 'pending',
      reminderSent: false,
      followupSent: false,
      createdAt: this.now(),
    };
    if (input.contactName) appointment.contactName = input.contactName;
    if (input.contactId) appointment.contactId = input.contactId;
    if (input.notes) appointment.notes = input.notes;

    const key = this.recordKey(session);
    await this.save(key, appointment);
    await this.store.sortedAdd(this.indexKey, scheduledAt, key);

    this.log.info(
      {
        identity: maskIdentity(session.identity),
        channel: session.channel,
        scheduledAt: new Date(scheduledAt).toISOString(),
      },
      'Appointment created',
    );
    return appointment;
  }

  async get(session: SessionRef): Promise<Appointment | null> {
    return this.load(this.recordKey(session));
  }

  confirm(session: SessionRef): Promise<boolean> {
    return this.update(session, (a) => {
      a.status = 'confirmed';
    });
  }

  complete(session: SessionRef): Promise<boolean> {
    return this.update(session, (a) => {
      a.status = 'completed';
    });
  }

  markNoShow(session: SessionRef): Promise<boolean> {
    return this.update(session, (a) => {
      a.status = 'no_show';
    });
  }

  async cancel(session: SessionRef): Promise<boolean> {
    const updated = await this.update(session, (a) => {
      a.status = 'cancelled';
    });
    if (updated) {
      await this.store.sortedRemove(this.indexKey, this.recordKey(session));
      this.log.info({ identity: maskIdentity(session.identity), channel: session.channel }, 'Appointment cancelled');
    }
    return updated;
  }

  markReminderSent(session: SessionRef): Promise<boolean> {
    return this.update(session, (a) => {
      a.reminderSent = true;
    });
  }

  markFollowupSent(session: SessionRef): Promise<boolean> {
    return this.update(session, (a) => {
      a.followupSent = true;
    });
  }

  // ==================== Sweeps ====================

  /** Scheduled 23–25h from now, still expected, no reminder yet. */
  async dueForReminder(): Promise<Appointment[]> {
    const now = this.now();
    const candidates = await this.range(now + this.reminderWindow.fromMs, now + this.reminderWindow.toMs);
    const due = candidates.filter((a) => !a.reminderSent && ACTIVE_APPOINTMENT_STATUSES.includes(a.status));
    this.log.debug({ candidates: candidates.length, due: due.length }, 'Reminder sweep');
    return due;
  }

  /** Took place 23–25h ago, completed, no follow-up yet. */
  async dueForFollowup(): Promise<Appointment[]> {
    const now = this.now();
    const candidates = await this.range(now + this.followupWindow.fromMs, now + this.followupWindow.toMs);
    const due = candidates.filter((a) => !a.followupSent && a.status === 'completed');

    // Pointers older than the follow-up window are never swept again
    const trimmed = await this.store.sortedRemoveRangeByScore(this.indexKey, '-inf', now + this.followupWindow.fromMs - 1);
    this.log.debug({ candidates: candidates.length, due: due.length, trimmed }, 'Follow-up sweep');
    return due;
  }

  /** Next pending/confirmed appointments from now, earliest first. */
  async upcoming(limit = 10, identity?: string): Promise<Appointment[]> {
    if (limit <= 0) return [];

    const result: Appointment[] = [];
    const pageSize = limit * 2;
    let offset = 0;

    while (result.length < limit) {
      const keys = await this.store.sortedRangeByScore(this.indexKey, this.now(), '+inf', { offset, count: pageSize });
      for (const key of keys) {
        // No pruning here: removing pointers would shift the next page
        const appointment = await this.load(key);
        if (!appointment) continue;
        if (identity && appointment.identity !== identity) continue;
        if (!ACTIVE_APPOINTMENT_STATUSES.includes(appointment.status)) continue;
        result.push(appointment);
        if (result.length >= limit) break;
      }
      if (keys.length < pageSize) break;
      offset += pageSize;
    }
    return result;
  }

  // ==================== Internals ====================

  private recordKey(session: SessionRef): string {
    return this.keyspace.sessionKey('appointment', session);
  }

  private async range(min: number, max: number): Promise<Appointment[]> {
    const keys = await this.store.sortedRangeByScore(this.indexKey, min, max);
    const appointments: Appointment[] = [];
    for (const key of keys) {
      const appointment = await this.loadIndexed(key);
      if (appointment) appointments.push(appointment);
    }
    return appointments;
  }

  /** Loads a record behind an index pointer, pruning pointers whose record expired. */
  private async loadIndexed(key: string): Promise<Appointment | null> {
    const appointment = await this.load(key);
    if (!appointment && !(await this.store.exists(key))) {
      await this.store.sortedRemove(this.indexKey, key);
      this.log.debug({ key }, 'Pruned index pointer to expired appointment');
    }
    return appointment;
  }

  private async load(key: string): Promise<Appointment | null> {
    const raw = await this.store.get(key);
    if (raw === null) return null;

    try {
      return migrateAppointment(JSON.parse(raw));
    } catch (err) {
      this.log.error({ err, key }, 'Failed to deserialize appointment');
      return null;
    }
  }

  private async update(session: SessionRef, mutate: (appointment: Appointment) => void): Promise<boolean> {
    const key = this.recordKey(session);
    const appointment = await this.load(key);
    if (!appointment) return false;

    mutate(appointment);
    await this.save(key, appointment);
    return true;
  }

  /** Records live at least until their follow-up window has passed. */
  private async save(key: string, appointment: Appointment): Promise<void> {
    const untilFollowup = Math.ceil(
      (appointment.scheduledAt - this.now() - this.followupWindow.fromMs) / 1000,
    );
    await this.store.set(key, JSON.stringify(appointment), Math.max(this.ttlSeconds, untilFollowup));
  }
}

// ==================== Record migration ====================

function field(source: Record<string, unknown>, ...names: string[]): unknown {
  for (const name of names) {
    if (source[name] !== undefined && source[name] !== null) return source[name];
  }
  return undefined;
}

function toEpoch(value: unknown): number | undefined {
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string') {
    const parsed = Date.parse(value);
    return Number.isNaN(parsed) ? undefined : parsed;
  }
  return undefined;
}

function toText(value: unknown): string | undefined {
  return typeof value === 'string' && value !== '' ? value : undefined;
}

/**
 * Normalize a stored appointment. Older records are snake_cased with ISO
 * times; unknown statuses fall back to `pending`.
 */
export function migrateAppointment(raw: unknown): Appointment {
  if (raw === null || typeof raw !== 'object' || Array.isArray(raw)) {
    throw new TypeError('Appointment record is not an object');
  }
  const source: Record<string, unknown> = { ...raw };

  const identity = toText(field(source, 'identity', 'phone_normalized'));
  const channel = toText(field(source, 'channel', 'canal'));
  const scheduledAt = toEpoch(field(source, 'scheduledAt', 'scheduled_datetime'));
  if (!identity || !channel || scheduledAt === undefined) {
    throw new TypeError('Appointment record lacks identity, channel or scheduled time');
  }

  const status = field(source, 'status');
  const appointment: Appointment = {
    identity,
    channel,
    scheduledAt,
    status: isAppointmentStatus(status) ? status : 'pending',
    reminderSent: field(source, 'reminderSent', 'reminder_sent') === true,
    followupSent: field(source, 'followupSent', 'followup_sent') === true,
    createdAt: toEpoch(field(source, 'createdAt', 'created_at')) ?? scheduledAt,
  };

  const contactName = toText(field(source, 'contactName', 'contact_name'));
  const contactId = toText(field(source, 'contactId', 'contact_id'));
  const notes = toText(field(source, 'notes'));
  if (contactName) appointment.contactName = contactName;
  if (contactId) appointment.contactId = contactId;
  if (notes) appointment.notes = notes;

  return appointment;
}

