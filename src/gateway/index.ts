/**
 * Gateway Module - Barrel Export
 */

export type { ChatGateway, SendResult } from './types';
export {
  HttpChatGateway,
  parseSendResponse,
  toWireMessage,
  type HttpChatGatewayConfig,
} from './http-gateway';
