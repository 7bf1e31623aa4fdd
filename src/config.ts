/**
 * Centralized Configuration Module
 *
 * Type-safe, validated configuration loaded from environment variables.
 * Production runs additionally require the external service settings
 * (see `validateConfig`).
 *
 * Usage:
 *   import { config, validateConfig } from './config';
 *
 *   console.log(config.server.port);
 *   console.log(config.scheduler.strategy);
 *
 *   // Throws if production requirements are not met
 *   validateConfig();
 *
 * @module config
 */

import { z } from 'zod';

// =============================================================================
// Configuration Schema
// =============================================================================

const configSchema = z.object({
  server: z.object({
    port: z.number().int().positive().default(3000),
    host: z.string().default('0.0.0.0'),
    nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
  }),

  database: z.object({
    // SQLite file path, or ':memory:'
    path: z.string().min(1).default('quiz-dispatch.db'),
  }),

  // Chat gateway that delivers messages and calls the webhook
  gateway: z.object({
    baseUrl: z.string().url().optional(),
    serviceId: z.string().optional(),
    timeoutMs: z.number().int().positive().default(10000),
  }),

  // User directory; either a user API or a local JSON file of people
  directory: z.object({
    baseUrl: z.string().url().optional(),
    token: z.string().default(''),
    file: z.string().optional(),
    timeoutMs: z.number().int().positive().default(10000),
  }),

  scheduler: z.object({
    strategy: z.enum(['simple', 'smart']).default('smart'),
    mu: z.number().default(4),
    sigma: z.number().positive().default(20),
    epsilon: z.number().nonnegative().default(0.001),
    periodUnitMs: z.number().positive().default(24 * 60 * 60 * 1000),
    batchSize: z.number().int().positive().default(1),
  }),

  routing: z.object({
    enabled: z.boolean().default(false),
    cron: z.string().default('0 9 * * *'),
  }),

  scoring: z.object({
    // 'constant' gives open answers a fixed score; 'llm' asks the model
    openScorer: z.enum(['constant', 'llm']).default('constant'),
    openScore: z.number().min(0).max(1).default(0.5),
  }),

  anthropic: z.object({
    apiKey: z.string().optional(),
    model: z.string().default('claude-3-5-haiku-latest'),
  }),
});

// TypeScript type inferred from the Zod schema
export type Config = z.infer<typeof configSchema>;

// =============================================================================
// Environment Variable Loading
// =============================================================================

/**
 * Parse an integer from an environment variable string.
 * Returns undefined if the value is not a valid integer.
 */
function parseIntOrUndefined(value: string | undefined): number | undefined {
  if (!value) return undefined;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? undefined : parsed;
}

function parseFloatOrUndefined(value: string | undefined): number | undefined {
  if (!value) return undefined;
  const parsed = parseFloat(value);
  return isNaN(parsed) ? undefined : parsed;
}

function parseBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined || value === '') return undefined;
  return ['1', 'true', 'yes', 'on'].includes(value.toLowerCase());
}

/**
 * Reads the raw (unvalidated) configuration from an environment.
 * Missing values are left undefined so the schema defaults apply.
 */
function loadFromEnvironment(env: NodeJS.ProcessEnv): Record<string, Record<string, unknown>> {
  return {
    server: {
      port: parseIntOrUndefined(env.PORT),
      host: env.HOST,
      nodeEnv: env.NODE_ENV || undefined,
    },
    database: {
      path: env.DATABASE_PATH || undefined,
    },
    gateway: {
      baseUrl: env.GATEWAY_URL || undefined,
      serviceId: env.GATEWAY_SERVICE_ID || undefined,
      timeoutMs: parseIntOrUndefined(env.GATEWAY_TIMEOUT_MS),
    },
    directory: {
      baseUrl: env.DIRECTORY_URL || undefined,
      token: env.DIRECTORY_TOKEN,
      file: env.DIRECTORY_FILE || undefined,
      timeoutMs: parseIntOrUndefined(env.DIRECTORY_TIMEOUT_MS),
    },
    scheduler: {
      strategy: env.SCHEDULER_STRATEGY || undefined,
      mu: parseFloatOrUndefined(env.SCHEDULER_MU),
      sigma: parseFloatOrUndefined(env.SCHEDULER_SIGMA),
      epsilon: parseFloatOrUndefined(env.SCHEDULER_EPSILON),
      periodUnitMs: parseIntOrUndefined(env.SCHEDULER_PERIOD_MS),
      batchSize: parseIntOrUndefined(env.SCHEDULER_BATCH_SIZE),
    },
    routing: {
      enabled: parseBoolean(env.ROUTING_ENABLED),
      cron: env.ROUTING_CRON || undefined,
    },
    scoring: {
      openScorer: env.OPEN_SCORER || undefined,
      openScore: parseFloatOrUndefined(env.OPEN_SCORE),
    },
    anthropic: {
      apiKey: env.ANTHROPIC_API_KEY || undefined,
      model: env.ANTHROPIC_MODEL || undefined,
    },
  };
}

// =============================================================================
// Configuration Validation
// =============================================================================

/**
 * Configuration validation error with detailed information about missing/invalid values.
 */
export class ConfigValidationError extends Error {
  public readonly missingVars: string[];
  public readonly invalidVars: { name: string; reason: string }[];

  constructor(
    message: string,
    missingVars: string[] = [],
    invalidVars: { name: string; reason: string }[] = []
  ) {
    super(message);
    this.name = 'ConfigValidationError';
    this.missingVars = missingVars;
    this.invalidVars = invalidVars;
  }
}

/**
 * Parses a configuration from the given environment.
 *
 * @throws {ConfigValidationError} If a value has the wrong type or range
 */
export function parseConfig(env: NodeJS.ProcessEnv): Config {
  const result = configSchema.safeParse(loadFromEnvironment(env));

  if (!result.success) {
    const invalidVars = result.error.issues.map((issue) => ({
      name: issue.path.join('.'),
      reason: issue.message,
    }));
    throw new ConfigValidationError(
      `Invalid configuration: ${invalidVars.map((v) => `${v.name}: ${v.reason}`).join('; ')}`,
      [],
      invalidVars
    );
  }

  return result.data;
}

/**
 * Checks the requirements that only apply to some setups.
 *
 * Always:
 * - ANTHROPIC_API_KEY when OPEN_SCORER=llm
 *
 * In production:
 * - GATEWAY_URL and GATEWAY_SERVICE_ID
 * - DIRECTORY_URL or DIRECTORY_FILE
 *
 * @throws {ConfigValidationError} If a requirement is not met
 *
 * @example
 * ```typescript
 * try {
 *   validateConfig();
 * } catch (error) {
 *   if (error instanceof ConfigValidationError) {
 *     console.error('Missing vars:', error.missingVars);
 *   }
 *   process.exit(1);
 * }
 * ```
 */
export function validateConfig(target: Config = config): void {
  const missingVars: string[] = [];

  if (target.scoring.openScorer === 'llm' && !target.anthropic.apiKey) {
    missingVars.push('ANTHROPIC_API_KEY');
  }

  if (target.server.nodeEnv === 'production') {
    if (!target.gateway.baseUrl) {
      missingVars.push('GATEWAY_URL');
    }
    if (!target.gateway.serviceId) {
      missingVars.push('GATEWAY_SERVICE_ID');
    }
    if (!target.directory.baseUrl && !target.directory.file) {
      missingVars.push('DIRECTORY_URL');
    }
  }

  if (missingVars.length > 0) {
    throw new ConfigValidationError(
      `Missing required environment variables: ${missingVars.join(', ')}`,
      missingVars
    );
  }
}

// =============================================================================
// Configuration Export
// =============================================================================

function loadConfig(): Config {
  try {
    return parseConfig(process.env);
  } catch (error) {
    console.error('Invalid configuration:');
    console.error(error instanceof Error ? error.message : error);
    process.exit(1);
  }
}

/**
 * The validated, type-safe configuration object, parsed once at load time.
 *
 * @example
 * ```typescript
 * import { config } from './config';
 *
 * serve({ fetch: app.fetch, port: config.server.port });
 * ```
 */
export const config: Config = loadConfig();

export default config;
