/**
 * Gateway Messages
 *
 * Message wrappers built by the factories. A question message renders one
 * record's question and validates the reply to it:
 *
 * - TestMessage: buttons, the first one being "don't know"; the answer is the
 *   pressed button's index (1 is the first option)
 * - OpenMessage: plain text; the answer is the reply text
 *
 * Notice messages carry no record state: answer feedback, and reminders that
 * reply to a question the person has not answered yet.
 */

import { ConsistencyError, ValidationError } from '../errors';
import type { AnswerRecord, OpenRecord, TestRecord } from '../models';
import { setAnswer, transferRecord } from '../records/record-lifecycle';
import type {
  AnswerPayload,
  MessageFactory,
  MessageState,
  NoticeMessage,
  OutboundMessage,
  QuestionMessage,
} from './types';

/** Label of the extra first button on test questions */
export const DONT_KNOW_OPTION = "I don't know";

export const CORRECT_ANSWER_TEXT = 'Correct answer!';
export const WRONG_ANSWER_TEXT = 'Wrong answer ;(';
export const REMINDER_TEXT = 'You still have an unanswered question. Please answer it first.';

export function openFeedbackText(points: number): string {
  // Two decimals at most, without trailing zeros
  const shown = Number(points.toFixed(2));
  return `My preliminary score for your answer is ${shown}; it may change after review.`;
}

abstract class BaseQuestionMessage<R extends AnswerRecord> implements QuestionMessage {
  readonly kind = 'question' as const;
  private currentState: MessageState;

  constructor(readonly record: R) {
    // A record that already has a handle was delivered earlier
    this.currentState = record.messageHandle === null ? 'created' : 'sent';
  }

  get state(): MessageState {
    return this.currentState;
  }

  abstract render(): OutboundMessage;

  abstract feedbackText(points: number): string;

  /**
   * Extracts the raw answer from the payload.
   *
   * @throws ValidationError if the payload does not fit this message
   */
  protected abstract answerFrom(payload: AnswerPayload): string;

  markSent(messageHandle: string): void {
    transferRecord(this.record, messageHandle);
    this.currentState = 'sent';
  }

  acceptAnswer(payload: AnswerPayload, at: Date = new Date()): void {
    if (this.currentState !== 'sent') {
      throw new ConsistencyError(
        `Message for record '${this.record.id}' cannot take an answer in state '${this.currentState}'`
      );
    }

    setAnswer(this.record, this.answerFrom(payload), at);
    this.currentState = payload.type === 'BUTTON' ? 'ack_received' : 'reply_received';
  }
}

export class TestMessage extends BaseQuestionMessage<TestRecord> {
  render(): OutboundMessage {
    return {
      type: 'WITH_BUTTONS',
      userId: this.record.personId,
      text: this.record.question.text,
      buttons: [DONT_KNOW_OPTION, ...this.record.question.options],
    };
  }

  feedbackText(points: number): string {
    return points === 1 ? CORRECT_ANSWER_TEXT : WRONG_ANSWER_TEXT;
  }

  protected answerFrom(payload: AnswerPayload): string {
    if (payload.type !== 'BUTTON') {
      throw new ValidationError('Test questions are answered with a button', {
        recordId: this.record.id,
        payloadType: payload.type,
      });
    }

    const buttonCount = this.record.question.options.length + 1;
    if (!Number.isInteger(payload.buttonId) || payload.buttonId < 0 || payload.buttonId >= buttonCount) {
      throw new ValidationError(`Button ${payload.buttonId} does not exist`, {
        recordId: this.record.id,
        buttonId: payload.buttonId,
      });
    }

    return String(payload.buttonId);
  }
}

export class OpenMessage extends BaseQuestionMessage<OpenRecord> {
  render(): OutboundMessage {
    return {
      type: 'SIMPLE',
      userId: this.record.personId,
      text: this.record.question.text,
    };
  }

  feedbackText(points: number): string {
    return openFeedbackText(points);
  }

  protected answerFrom(payload: AnswerPayload): string {
    if (payload.type === 'BUTTON') {
      throw new ValidationError('Open questions are answered with text', {
        recordId: this.record.id,
        payloadType: payload.type,
      });
    }
    return payload.text;
  }
}

abstract class BaseNoticeMessage implements NoticeMessage {
  readonly kind = 'notice' as const;
  private currentState: MessageState = 'created';

  get state(): MessageState {
    return this.currentState;
  }

  abstract render(): OutboundMessage;

  markSent(_messageHandle: string): void {
    this.currentState = 'sent';
  }
}

/**
 * Plain text sent after an answer has been scored.
 */
export class FeedbackMessage extends BaseNoticeMessage {
  constructor(
    private readonly userId: string,
    private readonly text: string
  ) {
    super();
  }

  render(): OutboundMessage {
    return { type: 'SIMPLE', userId: this.userId, text: this.text };
  }
}

/**
 * Reply to a delivered question the person has not answered yet.
 */
export class ReminderMessage extends BaseNoticeMessage {
  private readonly replyTo: string;

  /**
   * @throws ConsistencyError if the record was never delivered
   */
  constructor(private readonly record: AnswerRecord) {
    super();
    if (record.state !== 'transferred' || record.messageHandle === null) {
      throw new ConsistencyError(`Record '${record.id}' has no delivered message to remind about`, {
        recordId: record.id,
        state: record.state,
      });
    }
    this.replyTo = record.messageHandle;
  }

  render(): OutboundMessage {
    return {
      type: 'REPLY',
      userId: this.record.personId,
      text: REMINDER_TEXT,
      replyTo: this.replyTo,
    };
  }
}

/**
 * Factory that only builds the message. Used to recover the typed message
 * for a stored record, and by the router to stage messages before commit.
 */
export const detachedMessageFactory: MessageFactory<QuestionMessage> = {
  createTest: (record) => new TestMessage(record),
  createOpen: (record) => new OpenMessage(record),
};
