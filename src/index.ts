/**
 * quiz-dispatch - Library Entry Point
 *
 * Picks questions for people, delivers them through a chat gateway and scores
 * the answers that come back through the webhook. The CLI in
 * `src/cli/index.ts` is the usual way to run it; this barrel exposes the same
 * building blocks for embedding.
 *
 * @example
 * ```typescript
 * import { parseConfig } from './config';
 * import { createServices, createApp } from './index';
 *
 * const services = createServices({ config: parseConfig(process.env) });
 * const app = createApp(services);
 * ```
 */

export * from './core/models';
export * from './core/errors';
export * from './core/records/record-lifecycle';
export * from './core/scoring';
export * from './core/scheduling';
export * from './core/dispatch';
export * from './core/routing';
export * from './core/statistics';
export * from './directory';
export * from './gateway';
export { createServices, type ServiceOptions, type Services } from './services';
export { createApp, startServer } from './api';
