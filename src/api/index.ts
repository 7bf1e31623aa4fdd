/**
 * API Module - Barrel Export
 *
 * @example
 * ```typescript
 * import { createApp } from '@/api';
 *
 * const app = createApp(services);
 * const res = await app.request('/health');
 * ```
 */

export { createApp, startServer, type AppOptions, type RunningServer } from './server';

export {
  errorHandler,
  formatErrorResponse,
  AppError,
  ErrorCodes,
  type ErrorCode,
  loggerMiddleware,
  DEFAULT_LOGGER_CONFIG,
  type LoggerConfig,
} from './middleware';

export { createApiRouter, healthRoutes, webhookRoutes, statisticsRoutes } from './routes';

export type { ApiResponse, ApiError, ApiErrorResponse, ApiResult } from './types';

export { success, error } from './utils/response';
