/**
 * CLI Serve Command
 *
 * Starts the HTTP server (webhook, statistics, health) and the routing
 * schedule when enabled. Runs until SIGINT or SIGTERM.
 */

import { startServer } from '@/api';
import type { Services } from '@/services';

export function runServeCommand(services: Services): void {
  const running = startServer(services);

  const shutdown = (signal: string): void => {
    console.log(`\n[Server] Received ${signal}, shutting down...`);
    running
      .stop()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        console.error('[Server] Shutdown failed:', error);
        process.exit(1);
      });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}
