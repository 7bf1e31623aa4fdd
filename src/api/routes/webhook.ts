/**
 * Gateway Webhook Route
 *
 * The chat gateway posts every user interaction here. The body is handed to
 * the WebhookHandler, which validates it and drives answer scoring and the
 * next delivery. Failures surface through the error handler, so the gateway
 * sees a 4xx for payloads it should not retry and a 5xx/502 otherwise.
 *
 * POST /webhook → { success: true, data: { handled: true } }
 */

import { Hono } from 'hono';
import type { WebhookHandler } from '@/core/dispatch';
import { AppError, ErrorCodes } from '../middleware/error-handler';
import { success } from '../utils/response';

export function webhookRoutes(handler: WebhookHandler): Hono {
  const router = new Hono();

  router.post('/', async (c) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch (err) {
      throw new AppError(ErrorCodes.BAD_REQUEST, 'Request body must be valid JSON', 400, {
        reason: err instanceof Error ? err.message : String(err),
      });
    }

    await handler.handle(body);
    return success(c, { handled: true });
  });

  return router;
}
