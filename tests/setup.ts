/**
 * Test Setup Module
 *
 * Builds an isolated service graph for integration and API tests:
 * - in-memory SQLite database with the schema applied
 * - FakeGateway recording every outbound message
 * - StaticDirectory holding the people under test
 * - controllable clock and seeded random source
 */

import { parseConfig, type Config } from '../src/config';
import { GatewayError } from '../src/core/errors';
import type { OutboundMessage } from '../src/core/dispatch';
import type { Person } from '../src/core/models';
import { createSeededRandom } from '../src/core/scheduling';
import type { PointsCalculator } from '../src/core/scoring';
import { StaticDirectory, type Directory } from '../src/directory';
import type { ChatGateway, SendResult } from '../src/gateway';
import { createServices, type Services } from '../src/services';
import { openDatabase } from '../src/storage';

// ============================================================================
// Fake Gateway
// ============================================================================

/**
 * In-process chat gateway. Hands out numeric handles starting at 100 and can
 * be told to fail the next sends, or every send to one user.
 */
export class FakeGateway implements ChatGateway {
  readonly sent: OutboundMessage[] = [];
  private nextHandle = 100;
  private failuresLeft = 0;
  private readonly rejectedUsers = new Set<string>();

  /** Makes the next `count` sends fail with HTTP 503 */
  failNext(count: number = 1): void {
    this.failuresLeft = count;
  }

  /** Makes every send to `userId` fail with HTTP 403 */
  rejectUser(userId: string): void {
    this.rejectedUsers.add(userId);
  }

  /** Sets the handle returned by the next successful send */
  setNextHandle(handle: number): void {
    this.nextHandle = handle;
  }

  async send(message: OutboundMessage): Promise<SendResult> {
    if (this.rejectedUsers.has(message.userId)) {
      throw new GatewayError('Gateway responded with HTTP 403', 403);
    }
    if (this.failuresLeft > 0) {
      this.failuresLeft--;
      throw new GatewayError('Gateway responded with HTTP 503', 503);
    }

    this.sent.push(message);
    return { messageHandle: String(this.nextHandle++) };
  }
}

// ============================================================================
// Test Clock
// ============================================================================

export interface TestClock {
  now: () => Date;
  set(date: Date): void;
  advance(ms: number): void;
}

export function createTestClock(start: Date = new Date('2024-03-01T09:00:00Z')): TestClock {
  let current = start.getTime();
  return {
    now: () => new Date(current),
    set: (date) => {
      current = date.getTime();
    },
    advance: (ms) => {
      current += ms;
    },
  };
}

// ============================================================================
// Test Context
// ============================================================================

export interface TestContextOptions {
  people?: Person[];
  /** Replaces the StaticDirectory built from `people` */
  directory?: Directory;
  strategy?: 'simple' | 'smart';
  batchSize?: number;
  calculator?: PointsCalculator;
  seed?: number;
}

export interface TestContext {
  services: Services;
  gateway: FakeGateway;
  clock: TestClock;
  config: Config;
}

export function createTestConfig(env: Record<string, string> = {}): Config {
  return parseConfig({
    NODE_ENV: 'test',
    DATABASE_PATH: ':memory:',
    ...env,
  });
}

/**
 * Creates a fresh service graph over an empty in-memory database.
 */
export function createTestContext(options: TestContextOptions = {}): TestContext {
  const config = createTestConfig({
    SCHEDULER_STRATEGY: options.strategy ?? 'simple',
    SCHEDULER_BATCH_SIZE: String(options.batchSize ?? 1),
  });
  const gateway = new FakeGateway();
  const clock = createTestClock();

  const services = createServices({
    config,
    database: openDatabase(':memory:'),
    gateway,
    directory: options.directory ?? new StaticDirectory(options.people ?? []),
    calculator: options.calculator,
    random: createSeededRandom(options.seed ?? 42),
    now: clock.now,
  });

  return { services, gateway, clock, config };
}

export function cleanupTestContext(ctx: TestContext): void {
  ctx.services.close();
}
