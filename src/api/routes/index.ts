/**
 * API Routes - Barrel Export
 *
 * `createApiRouter` mounts everything served under `/api`. The webhook and
 * health routes are mounted at the root by the server because the gateway
 * and probes expect them there.
 */

import { Hono } from 'hono';
import type { Services } from '@/services';
import { success } from '../utils/response';
import { statisticsRoutes } from './statistics';

export { healthRoutes } from './health';
export { webhookRoutes } from './webhook';
export { statisticsRoutes } from './statistics';

export interface ApiInfo {
  name: string;
  version: string;
  endpoints: {
    path: string;
    description: string;
  }[];
}

const API_VERSION = '0.1.0';

export function createApiRouter(services: Pick<Services, 'statistics'>): Hono {
  const router = new Hono();

  router.get('/', (c) => {
    const apiInfo: ApiInfo = {
      name: 'quiz-dispatch API',
      version: API_VERSION,
      endpoints: [
        { path: '/api/statistics/:personId', description: 'Answer statistics for one person' },
        { path: '/webhook', description: 'Chat gateway callback' },
        { path: '/health', description: 'Health check endpoint' },
      ],
    };

    return success(c, apiInfo);
  });

  router.route('/statistics', statisticsRoutes(services.statistics));

  return router;
}

export default createApiRouter;
