/**
 * Dispatch Types
 *
 * The dispatcher never branches on the concrete record type. Instead each
 * record is handed to a MessageFactory through `dispatchRecord`, which calls
 * `createTest` or `createOpen` depending on the record kind. Factories differ
 * in what they do with the message they build: the gateway dispatcher queues
 * it for sending, the detached factory only returns it.
 */

import type { AnswerRecord, OpenRecord, TestRecord } from '../models';

/**
 * Builds a value of type T from a record of either kind.
 */
export interface MessageFactory<T> {
  createTest(record: TestRecord): T;
  createOpen(record: OpenRecord): T;
}

/**
 * Outbound message layout understood by the chat gateway.
 *
 * - 'SIMPLE': plain text
 * - 'WITH_BUTTONS': text plus one button per entry of `buttons`
 * - 'REPLY': text sent as a reply to an earlier message
 */
export type OutboundMessage =
  | { type: 'SIMPLE'; userId: string; text: string }
  | { type: 'WITH_BUTTONS'; userId: string; text: string; buttons: string[] }
  | { type: 'REPLY'; userId: string; text: string; replyTo: string };

/**
 * Answer payload delivered by the gateway with a feedback event.
 */
export type AnswerPayload =
  | { type: 'BUTTON'; buttonId: number }
  | { type: 'SIMPLE' | 'REPLY'; text: string };

/**
 * Lifecycle of a message wrapper: built, accepted by the gateway, and
 * finally either acknowledged or replied to by the person.
 */
export type MessageState = 'created' | 'sent' | 'ack_received' | 'reply_received';

/**
 * A question delivered for one record. Sending it transfers the record;
 * the reply to it is validated here before scoring.
 */
export interface QuestionMessage {
  readonly kind: 'question';
  readonly record: AnswerRecord;
  readonly state: MessageState;

  /** Renders the outbound payload for this message */
  render(): OutboundMessage;

  /**
   * Called once the gateway has accepted the message.
   * Transfers the record to the given handle.
   */
  markSent(messageHandle: string): void;

  /**
   * Validates the answer payload for this message kind and stores the raw
   * answer on the record. Scoring is done by the caller.
   *
   * @throws ValidationError if the payload kind does not fit the message
   */
  acceptAnswer(payload: AnswerPayload, at?: Date): void;

  /** Text sent back to the person after their answer has been scored */
  feedbackText(points: number): string;
}

/**
 * A message that carries no record state: answer feedback and reminders
 * about an outstanding question.
 */
export interface NoticeMessage {
  readonly kind: 'notice';
  readonly state: MessageState;
  render(): OutboundMessage;
  markSent(messageHandle: string): void;
}

export type GatewayMessage = QuestionMessage | NoticeMessage;
