/**
 * Chat Gateway Types
 *
 * The gateway is the external service that delivers messages to people
 * and reports their replies back through the webhook.
 */

import type { OutboundMessage } from '@/core/dispatch/types';

/**
 * Result of a successful send.
 */
export interface SendResult {
  /** Gateway-assigned id of the delivered message */
  messageHandle: string;
}

export interface ChatGateway {
  /**
   * Delivers one message.
   *
   * @throws GatewayError if the gateway rejects the message or its reply
   *   cannot be understood
   */
  send(message: OutboundMessage): Promise<SendResult>;
}
