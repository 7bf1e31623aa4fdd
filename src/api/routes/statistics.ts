/**
 * Statistics Routes
 *
 * GET /api/statistics/:personId → PersonStatistics
 */

import { Hono } from 'hono';
import type { StatisticsCalculator } from '@/core/statistics';
import { success } from '../utils/response';

export function statisticsRoutes(calculator: StatisticsCalculator): Hono {
  const router = new Hono();

  router.get('/:personId', async (c) => {
    const statistics = await calculator.forPerson(c.req.param('personId'));
    return success(c, statistics);
  });

  return router;
}
