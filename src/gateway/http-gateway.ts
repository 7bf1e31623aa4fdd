/**
 * HTTP Chat Gateway
 *
 * Sends messages to the chat gateway's REST endpoint:
 *
 *   POST <baseUrl>/message
 *   { "service_id": "...", "messages": [{ "user_id", "type", "text", "buttons"?, "reply_to"? }] }
 *
 * and expects
 *
 *   { "sent_messages": [{ "message_id": 123 }] }
 *
 * The message id becomes the record's message handle, so it must be an
 * integer (a JSON number, or a string of digits).
 */

import { z } from 'zod';
import { GatewayError } from '@/core/errors';
import type { OutboundMessage } from '@/core/dispatch/types';
import type { ChatGateway, SendResult } from './types';

export interface HttpChatGatewayConfig {
  /** Gateway base URL, without trailing slash */
  baseUrl: string;
  /** Identifies this service to the gateway */
  serviceId: string;
  /** Request timeout in milliseconds */
  timeoutMs: number;
  /** Fetch implementation (default: global fetch) */
  fetch?: typeof fetch;
}

const messageIdSchema = z.union([
  z.number().int().nonnegative(),
  z.string().regex(/^\d+$/, 'message_id must be numeric'),
]);

const sendResponseSchema = z.object({
  sent_messages: z.array(z.object({ message_id: messageIdSchema })).min(1),
});

/**
 * Wire form of one outbound message.
 */
export function toWireMessage(message: OutboundMessage): Record<string, unknown> {
  const base = { user_id: message.userId, type: message.type, text: message.text };

  switch (message.type) {
    case 'SIMPLE':
      return base;
    case 'WITH_BUTTONS':
      return { ...base, buttons: message.buttons };
    case 'REPLY':
      return { ...base, reply_to: message.replyTo };
  }
}

/**
 * Extracts the message handle from a gateway response body.
 *
 * @throws GatewayError if the body does not carry a numeric message id
 */
export function parseSendResponse(body: unknown, status: number): SendResult {
  const parsed = sendResponseSchema.safeParse(body);
  if (!parsed.success) {
    throw new GatewayError('Gateway response has no valid message id', status, {
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
  }

  return { messageHandle: String(parsed.data.sent_messages[0].message_id) };
}

export class HttpChatGateway implements ChatGateway {
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly config: HttpChatGatewayConfig) {
    this.fetchImpl = config.fetch ?? fetch;
  }

  async send(message: OutboundMessage): Promise<SendResult> {
    const url = `${this.config.baseUrl}/message`;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.config.timeoutMs);

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          service_id: this.config.serviceId,
          messages: [toWireMessage(message)],
        }),
        signal: controller.signal,
      });
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        throw new GatewayError(`Gateway request timed out after ${this.config.timeoutMs}ms`);
      }
      throw new GatewayError(
        `Gateway request failed: ${error instanceof Error ? error.message : String(error)}`
      );
    } finally {
      clearTimeout(timeoutId);
    }

    if (!response.ok) {
      const text = await response.text().catch(() => '');
      throw new GatewayError(`Gateway responded with HTTP ${response.status}`, response.status, {
        body: text.substring(0, 500),
      });
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch {
      throw new GatewayError('Gateway response is not valid JSON', response.status);
    }

    return parseSendResponse(body, response.status);
  }
}
