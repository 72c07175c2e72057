import { DrainHandler, DrainScheduler } from './types';
import { SessionRef } from '../session/types';
import { SessionKeyspace } from '../session/session-keyspace';
import { logger } from '../observability/logger';
import { maskIdentity } from '../observability/pii-redactor';

/**
 * In-process drain jobs on unref'd timers. The store lock, not this map,
 * guarantees one drain per window; the map only avoids arming a second
 * timer for a session in the same process.
 */
export class TimerDrainScheduler implements DrainScheduler {
  private readonly timers = new Map<string, NodeJS.Timeout>();
  private handler?: DrainHandler;
  private log = logger.child({ component: 'drain-scheduler' });

  onDrain(handler: DrainHandler): void {
    this.handler = handler;
  }

  schedule(session: SessionRef, delayMs: number): void {
    const id = `${session.identity}|${SessionKeyspace.normalizeChannel(session.channel)}`;
    if (this.timers.has(id)) return;

    const timer = setTimeout(() => {
      this.timers.delete(id);
      this.fire(session).catch((err) => this.log.error({ err }, 'Drain job crashed'));
    }, delayMs);
    timer.unref();
    this.timers.set(id, timer);
  }

  pending(): number {
    return this.timers.size;
  }

  /** Cancel every armed timer; buffered messages expire with their TTL. */
  stop(): void {
    for (const timer of this.timers.values()) clearTimeout(timer);
    if (this.timers.size > 0) {
      this.log.info({ cancelled: this.timers.size }, 'Drain scheduler stopped');
    }
    this.timers.clear();
  }

  private async fire(session: SessionRef): Promise<void> {
    if (!this.handler) {
      this.log.warn({ identity: maskIdentity(session.identity) }, 'No drain handler registered; job dropped');
      return;
    }
    try {
      await this.handler(session);
    } catch (err) {
      this.log.error(
        { identity: maskIdentity(session.identity), channel: session.channel, err },
        'Drain job failed',
      );
    }
  }
}
