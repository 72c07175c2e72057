/**
 * Appointment Scheduling Types
 */

export type AppointmentStatus = 'pending' | 'confirmed' | 'completed' | 'cancelled' | 'no_show';

export const APPOINTMENT_STATUSES: readonly AppointmentStatus[] = [
  'pending',
  'confirmed',
  'completed',
  'cancelled',
  'no_show',
];

/** Statuses that still expect the client to show up */
export const ACTIVE_APPOINTMENT_STATUSES: readonly AppointmentStatus[] = ['pending', 'confirmed'];

export function isAppointmentStatus(value: unknown): value is AppointmentStatus {
  return typeof value === 'string' && APPOINTMENT_STATUSES.some((s) => s === value);
}

export interface Appointment {
  identity: string;
  channel: string;
  /** Epoch ms */
  scheduledAt: number;
  status: AppointmentStatus;
  reminderSent: boolean;
  followupSent: boolean;
  createdAt: number;
  contactName?: string;
  contactId?: string;
  notes?: string;
}

export interface NewAppointment {
  scheduledAt: Date | number;
  contactName?: string;
  contactId?: string;
  notes?: string;
}

/** Offsets relative to now, in ms; both ends inclusive */
export interface DueWindow {
  fromMs: number;
  toMs: number;
}

export interface AppointmentIndexOptions {
  ttlDays?: number;
  /** Default: 23h to 25h ahead */
  reminderWindow?: DueWindow;
  /** Default: 25h to 23h ago */
  followupWindow?: DueWindow;
  now?: () => number;
}

/** Delivers the messages; the index only decides who is due. */
export interface AppointmentNotifier {
  sendReminder(appointment: Appointment): Promise<void>;
  sendFollowup(appointment: Appointment): Promise<void>;
}

export interface DispatchTally {
  sent: number;
  failed: number;
}

export interface ReminderRunResult {
  reminders: DispatchTally;
  followups: DispatchTally;
  durationMs: number;
}

export interface NextOpening {
  daysAhead: number;
  weekday: string;
  /** `HH:MM` in the business time zone */
  opensAt: string;
  /** "today at 8:30 AM", "tomorrow at 8:30 AM", "on monday at 8:30 AM" */
  label: string;
}
