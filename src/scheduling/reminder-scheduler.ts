import { AppointmentScheduleIndex } from './appointment-index';
import { Appointment, AppointmentNotifier, DispatchTally, ReminderRunResult } from './types';
import { SessionRef } from '../session/types';
import { appointmentDispatches } from '../observability/metrics';
import { logger } from '../observability/logger';
import { maskIdentity } from '../observability/pii-redactor';

type DispatchKind = 'reminder' | 'followup';

/**
 * AppointmentReminderScheduler — sweeps the appointment index on an interval
 * and sends 24h reminders and 24h follow-ups.
 *
 * The due windows are two hours wide for an hourly job; the sent flags keep
 * an appointment from being notified twice.
 */
export class AppointmentReminderScheduler {
  private intervalHandle?: NodeJS.Timeout;
  private running = false;
  private log = logger.child({ component: 'reminder-scheduler' });

  constructor(
    private readonly index: AppointmentScheduleIndex,
    private readonly notifier: AppointmentNotifier,
    private readonly intervalMs: number = 60 * 60 * 1000, // 1 hour
  ) {}

  /**
   * Start the scheduler. Sweeps immediately, then at the configured interval.
   */
  start(): void {
    if (this.intervalHandle) return;

    this.log.info({ intervalMinutes: this.intervalMs / 60_000 }, 'Reminder scheduler started');

    this.runSweep().catch((err) => this.log.error({ err }, 'Initial reminder sweep failed'));

    this.intervalHandle = setInterval(() => {
      this.runSweep().catch((err) => this.log.error({ err }, 'Scheduled reminder sweep failed'));
    }, this.intervalMs);
    this.intervalHandle.unref();
  }

  stop(): void {
    if (this.intervalHandle) {
      clearInterval(this.intervalHandle);
      this.intervalHandle = undefined;
      this.log.info('Reminder scheduler stopped');
    }
  }

  /**
   * Ad-hoc sweep. Resolves to null when a sweep is already in progress.
   */
  async triggerRun(): Promise<ReminderRunResult | null> {
    return this.runSweep();
  }

  isRunning(): boolean {
    return this.running;
  }

  private async runSweep(): Promise<ReminderRunResult | null> {
    if (this.running) {
      this.log.warn('Reminder sweep already running, skipping');
      return null;
    }

    this.running = true;
    const start = Date.now();

    try {
      const reminders = await this.dispatch('reminder', await this.index.dueForReminder());
      const followups = await this.dispatch('followup', await this.index.dueForFollowup());
      const result: ReminderRunResult = { reminders, followups, durationMs: Date.now() - start };

      this.log.info(result, 'Reminder sweep completed');
      return result;
    } finally {
      this.running = false;
    }
  }

  private async dispatch(kind: DispatchKind, due: Appointment[]): Promise<DispatchTally> {
    const tally: DispatchTally = { sent: 0, failed: 0 };

    for (const appointment of due) {
      const session: SessionRef = { identity: appointment.identity, channel: appointment.channel };
      try {
        if (kind === 'reminder') {
          await this.notifier.sendReminder(appointment);
          await this.index.markReminderSent(session);
        } else {
          await this.notifier.sendFollowup(appointment);
          await this.index.markFollowupSent(session);
        }
        tally.sent += 1;
        appointmentDispatches.inc({ kind, status: 'sent' });
      } catch (err) {
        tally.failed += 1;
        appointmentDispatches.inc({ kind, status: 'failed' });
        this.log.error(
          { kind, identity: maskIdentity(appointment.identity), channel: appointment.channel, err },
          'Appointment notification failed',
        );
      }
    }
    return tally;
  }
}
