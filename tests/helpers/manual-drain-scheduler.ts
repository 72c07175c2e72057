import { DrainHandler, DrainScheduler } from '../../src/aggregation/types';
import { SessionRef } from '../../src/session/types';

/** Records scheduled drains; tests fire them by hand. */
export class ManualDrainScheduler implements DrainScheduler {
  readonly scheduled: Array<{ session: SessionRef; delayMs: number }> = [];
  private handler?: DrainHandler;

  schedule(session: SessionRef, delayMs: number): void {
    this.scheduled.push({ session, delayMs });
  }

  onDrain(handler: DrainHandler): void {
    this.handler = handler;
  }

  pending(): number {
    return this.scheduled.length;
  }

  stop(): void {
    this.scheduled.length = 0;
  }

  async fireAll(): Promise<void> {
    const jobs = this.scheduled.splice(0);
    for (const job of jobs) {
      if (this.handler) await this.handler(job.session);
    }
  }
}
