/**
 * Configuration Tests
 */

import { describe, it, expect } from 'vitest';
import { ConfigValidationError, parseConfig, validateConfig } from '../../src/config';

describe('parseConfig', () => {
  it('applies defaults to an empty environment', () => {
    const config = parseConfig({});

    expect(config.server).toEqual({ port: 3000, host: '0.0.0.0', nodeEnv: 'development' });
    expect(config.database.path).toBe('quiz-dispatch.db');
    expect(config.scheduler).toEqual({
      strategy: 'smart',
      mu: 4,
      sigma: 20,
      epsilon: 0.001,
      periodUnitMs: 86_400_000,
      batchSize: 1,
    });
    expect(config.routing).toEqual({ enabled: false, cron: '0 9 * * *' });
    expect(config.scoring).toEqual({ openScorer: 'constant', openScore: 0.5 });
    expect(config.gateway.baseUrl).toBeUndefined();
  });

  it('reads values from the environment', () => {
    const config = parseConfig({
      PORT: '8080',
      DATABASE_PATH: ':memory:',
      GATEWAY_URL: 'http://gateway.test',
      GATEWAY_SERVICE_ID: 'svc-1',
      SCHEDULER_STRATEGY: 'simple',
      SCHEDULER_MU: '2.5',
      SCHEDULER_BATCH_SIZE: '3',
      ROUTING_ENABLED: 'yes',
      ROUTING_CRON: '*/5 * * * *',
      OPEN_SCORE: '0.25',
    });

    expect(config.server.port).toBe(8080);
    expect(config.database.path).toBe(':memory:');
    expect(config.gateway).toEqual({
      baseUrl: 'http://gateway.test',
      serviceId: 'svc-1',
      timeoutMs: 10000,
    });
    expect(config.scheduler.strategy).toBe('simple');
    expect(config.scheduler.mu).toBe(2.5);
    expect(config.scheduler.batchSize).toBe(3);
    expect(config.routing).toEqual({ enabled: true, cron: '*/5 * * * *' });
    expect(config.scoring.openScore).toBe(0.25);
  });

  it('ignores numbers that do not parse', () => {
    expect(parseConfig({ PORT: 'abc' }).server.port).toBe(3000);
  });

  it('treats unknown boolean words as false', () => {
    expect(parseConfig({ ROUTING_ENABLED: 'nope' }).routing.enabled).toBe(false);
  });

  it('rejects values out of range', () => {
    expect(() => parseConfig({ PORT: '-1' })).toThrow(ConfigValidationError);
  });

  it('names every invalid setting', () => {
    try {
      parseConfig({ SCHEDULER_STRATEGY: 'fancy', GATEWAY_URL: 'not a url' });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigValidationError);
      if (error instanceof ConfigValidationError) {
        expect(error.invalidVars.map((v) => v.name).sort()).toEqual([
          'gateway.baseUrl',
          'scheduler.strategy',
        ]);
      }
    }
  });
});

describe('validateConfig', () => {
  it('accepts a development setup without external services', () => {
    expect(() => validateConfig(parseConfig({}))).not.toThrow();
  });

  it('requires the gateway and directory in production', () => {
    try {
      validateConfig(parseConfig({ NODE_ENV: 'production' }));
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigValidationError);
      if (error instanceof ConfigValidationError) {
        expect(error.missingVars).toEqual(['GATEWAY_URL', 'GATEWAY_SERVICE_ID', 'DIRECTORY_URL']);
      }
    }
  });

  it('accepts a directory file in place of a directory URL', () => {
    const config = parseConfig({
      NODE_ENV: 'production',
      GATEWAY_URL: 'http://gateway.test',
      GATEWAY_SERVICE_ID: 'svc-1',
      DIRECTORY_FILE: 'data/people.example.json',
    });

    expect(() => validateConfig(config)).not.toThrow();
  });

  it('requires an API key for the model scorer', () => {
    expect(() => validateConfig(parseConfig({ OPEN_SCORER: 'llm' }))).toThrow(
      'Missing required environment variables: ANTHROPIC_API_KEY'
    );
  });
});
