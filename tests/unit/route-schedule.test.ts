/**
 * Route Schedule Tests
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { RouteSchedule } from '../../src/core/routing/route-schedule';
import type { RoutingSummary } from '../../src/core/routing/person-router';
import { cleanupTestContext, createTestContext, type TestContext } from '../setup';

const summary: RoutingSummary = { people: 1, prepared: 1, failed: [], sent: 1, undelivered: [] };

describe('RouteSchedule', () => {
  let ctx: TestContext;

  beforeEach(() => {
    ctx = createTestContext();
  });

  afterEach(() => {
    vi.restoreAllMocks();
    cleanupTestContext(ctx);
  });

  it('rejects an invalid cron expression', () => {
    expect(() => new RouteSchedule(ctx.services.router, 'every morning')).toThrow(
      "Invalid cron expression: 'every morning'"
    );
  });

  it('skips a pass while the previous one is running', async () => {
    let finish: (value: RoutingSummary) => void = () => undefined;
    const routeMultiple = vi
      .spyOn(ctx.services.router, 'routeMultiple')
      .mockImplementation(() => new Promise<RoutingSummary>((resolve) => (finish = resolve)));
    const schedule = new RouteSchedule(ctx.services.router, '0 9 * * *');

    const first = schedule.runOnce();
    const skipped = await schedule.runOnce();
    finish(summary);

    expect(skipped).toBeNull();
    expect(await first).toEqual(summary);
    expect(routeMultiple).toHaveBeenCalledTimes(1);
  });

  it('runs again once the previous pass has finished', async () => {
    const routeMultiple = vi.spyOn(ctx.services.router, 'routeMultiple').mockResolvedValue(summary);
    const schedule = new RouteSchedule(ctx.services.router, '0 9 * * *');

    await schedule.runOnce();
    await schedule.runOnce();

    expect(routeMultiple).toHaveBeenCalledTimes(2);
  });

  it('runs again after a failed pass', async () => {
    const routeMultiple = vi
      .spyOn(ctx.services.router, 'routeMultiple')
      .mockRejectedValueOnce(new Error('directory down'))
      .mockResolvedValueOnce(summary);
    const schedule = new RouteSchedule(ctx.services.router, '0 9 * * *');

    await expect(schedule.runOnce()).rejects.toThrow('directory down');
    expect(await schedule.runOnce()).toEqual(summary);
    expect(routeMultiple).toHaveBeenCalledTimes(2);
  });
});
