/**
 * HTTP Server for quiz-dispatch
 *
 * `createApp` builds the Hono application around an already-wired set of
 * services, which lets tests drive it through `app.request()` without a
 * socket. `startServer` binds it with @hono/node-server and, when routing is
 * enabled, starts the cron schedule alongside it.
 *
 * Routes:
 * - GET  /health                    liveness probe
 * - POST /webhook                   chat gateway callback
 * - GET  /api                       API info
 * - GET  /api/statistics/:personId  per-person answer statistics
 */

import { Hono } from 'hono';
import { serve, type ServerType } from '@hono/node-server';
import type { Services } from '@/services';
import { RouteSchedule } from '@/core/routing';
import { errorHandler, loggerMiddleware } from './middleware';
import { createApiRouter, healthRoutes, webhookRoutes } from './routes';
import { error } from './utils/response';

export interface AppOptions {
  /** Disable request logging (tests) */
  quiet?: boolean;
}

export function createApp(
  services: Pick<Services, 'webhook' | 'statistics'>,
  options: AppOptions = {}
): Hono {
  const app = new Hono();

  app.onError(errorHandler());

  if (!options.quiet) {
    app.use('*', loggerMiddleware());
  }

  app.route('/health', healthRoutes());
  app.route('/webhook', webhookRoutes(services.webhook));
  app.route('/api', createApiRouter(services));

  app.notFound((c) => error(c, 'NOT_FOUND', `Route ${c.req.method} ${c.req.path} not found`, 404));

  return app;
}

export interface RunningServer {
  server: ServerType;
  schedule: RouteSchedule | null;
  /** Stops the schedule, closes the socket and the database */
  stop(): Promise<void>;
}

/**
 * Binds the app on the configured host and port.
 */
export function startServer(services: Services): RunningServer {
  const { server: serverConfig, routing } = services.config;
  const app = createApp(services);

  const server = serve({
    fetch: app.fetch,
    port: serverConfig.port,
    hostname: serverConfig.host,
  });

  const schedule = routing.enabled ? new RouteSchedule(services.router, routing.cron) : null;
  schedule?.start();

  console.log(`[Server] Listening on http://${serverConfig.host}:${serverConfig.port}`);
  console.log(`[Server] Environment: ${serverConfig.nodeEnv}`);
  console.log(
    schedule
      ? `[Server] Routing schedule '${routing.cron}' active`
      : '[Server] Routing schedule disabled'
  );

  const stop = (): Promise<void> =>
    new Promise((resolve, reject) => {
      schedule?.stop();
      server.close((err) => {
        services.close();
        if (err) {
          reject(err);
        } else {
          resolve();
        }
      });
    });

  return { server, schedule, stop };
}
