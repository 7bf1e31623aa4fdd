/**
 * Health Check Route
 *
 * Lightweight liveness probe, skipped by the request logger.
 */

import { Hono } from 'hono';
import { success } from '../utils/response';

export interface HealthCheckData {
  status: 'ok';
  timestamp: string;
  environment: string;
  version: string;
}

const APP_VERSION = '0.1.0';

export function healthRoutes(): Hono {
  const router = new Hono();

  router.get('/', (c) => {
    const healthData: HealthCheckData = {
      status: 'ok',
      timestamp: new Date().toISOString(),
      environment: process.env.NODE_ENV || 'development',
      version: APP_VERSION,
    };

    return success(c, healthData);
  });

  return router;
}
