/**
 * API Middleware - Barrel Export
 */

export {
  errorHandler,
  formatErrorResponse,
  AppError,
  ErrorCodes,
  type ErrorCode,
} from './error-handler';

export { loggerMiddleware, DEFAULT_LOGGER_CONFIG, type LoggerConfig } from './logger';
