/**
 * Request Logger Middleware
 *
 * Logs one line per request:
 * ```
 * [API] POST    /webhook 200 - 15ms
 * [API] GET     /api/statistics/p1 404 - 3ms
 * ```
 */

import type { MiddlewareHandler } from 'hono';

export interface LoggerConfig {
  /** Prefix for log messages */
  prefix: string;
  /** Paths to skip logging (e.g., health checks) */
  skipPaths: string[];
  /** Whether to log in color (for terminal output) */
  colorize: boolean;
}

const DEFAULT_LOGGER_CONFIG: LoggerConfig = {
  prefix: '[API]',
  skipPaths: ['/health'],
  colorize: process.env.NODE_ENV !== 'production',
};

const colors = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  red: '\x1b[31m',
  cyan: '\x1b[36m',
};

function getStatusColor(status: number): string {
  if (status >= 500) return colors.red;
  if (status >= 400) return colors.yellow;
  if (status >= 300) return colors.cyan;
  return colors.green;
}

function formatResponseTime(ms: number): string {
  return ms < 1000 ? `${ms}ms` : `${(ms / 1000).toFixed(2)}s`;
}

/**
 * Creates a logger middleware that logs method, path, status and duration.
 */
export function loggerMiddleware(config: Partial<LoggerConfig> = {}): MiddlewareHandler {
  const finalConfig: LoggerConfig = {
    ...DEFAULT_LOGGER_CONFIG,
    ...config,
  };

  return async (c, next) => {
    const path = c.req.path;
    if (finalConfig.skipPaths.some((skip) => path.startsWith(skip))) {
      return next();
    }

    const startTime = performance.now();
    await next();
    const responseTime = Math.round(performance.now() - startTime);

    const method = c.req.method;
    const status = c.res.status;

    const line = finalConfig.colorize
      ? [
          finalConfig.prefix,
          method.padEnd(7),
          path,
          `${getStatusColor(status)}${status}${colors.reset}`,
          '-',
          `${colors.dim}${formatResponseTime(responseTime)}${colors.reset}`,
        ].join(' ')
      : `${finalConfig.prefix} ${method} ${path} ${status} - ${formatResponseTime(responseTime)}`;

    console.log(line);
  };
}

export { DEFAULT_LOGGER_CONFIG };
