/**
 * Dispatch Module - Barrel Export
 *
 * Message wrappers, the outbound queue and the inbound answer path.
 */

export type {
  AnswerPayload,
  GatewayMessage,
  MessageFactory,
  MessageState,
  NoticeMessage,
  OutboundMessage,
  QuestionMessage,
} from './types';

export {
  CORRECT_ANSWER_TEXT,
  DONT_KNOW_OPTION,
  FeedbackMessage,
  OpenMessage,
  REMINDER_TEXT,
  ReminderMessage,
  TestMessage,
  WRONG_ANSWER_TEXT,
  detachedMessageFactory,
  openFeedbackText,
} from './messages';

export {
  MessageDispatcher,
  type Feedback,
  type FeedbackResult,
  type MessageDispatcherDependencies,
} from './message-dispatcher';

export {
  WebhookHandler,
  toAnswerPayload,
  webhookEventSchema,
  type WebhookEvent,
  type WebhookOutcome,
} from './webhook-handler';
