/**
 * Route Schedule
 *
 * Runs a routing pass on a cron expression. A tick that fires while the
 * previous pass is still running is skipped.
 */

import cron, { type ScheduledTask } from 'node-cron';
import type { PersonRouter, RoutingSummary } from './person-router';

export class RouteSchedule {
  private task: ScheduledTask | null = null;
  private running: Promise<RoutingSummary | null> | null = null;

  /**
   * @throws Error if the cron expression is invalid
   */
  constructor(
    private readonly router: PersonRouter,
    private readonly expression: string
  ) {
    if (!cron.validate(expression)) {
      throw new Error(`Invalid cron expression: '${expression}'`);
    }
  }

  start(): void {
    if (this.task) {
      return;
    }

    console.log(`[Scheduler] Routing on '${this.expression}'`);
    this.task = cron.schedule(this.expression, () => {
      this.runOnce().catch((error: unknown) => {
        console.error('[Scheduler] Routing pass failed:', error);
      });
    });
  }

  stop(): void {
    this.task?.stop();
    this.task = null;
  }

  /**
   * Runs one pass now, unless one is already running.
   *
   * @returns The pass summary, or null if the run was skipped
   */
  async runOnce(): Promise<RoutingSummary | null> {
    if (this.running) {
      console.log('[Scheduler] Previous routing pass still running, skipping');
      return null;
    }

    this.running = this.router.routeMultiple();
    try {
      return await this.running;
    } finally {
      this.running = null;
    }
  }
}
