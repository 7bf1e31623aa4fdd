/**
 * Message Dispatcher
 *
 * Owns the outbound queue and the inbound answer path.
 *
 * Outbound: question messages are queued (directly through
 * `createTest`/`createOpen`, or in bulk through `enqueue`) and delivered in
 * order by `sendMessages`. Each delivered question is transferred and
 * persisted in its own unit of work. A message the gateway rejects is
 * dropped from the queue and its record stays 'not_answered', so the
 * router plans it again on the person's next preparation. The flush goes on
 * with the other messages and reports every failure at the end.
 *
 * Inbound: `handleFeedback` resolves the record by message handle, applies
 * and scores the answer in one unit of work, then sends the feedback text.
 * Feedback and reminders go straight to the gateway, never behind the queue.
 *
 * @example
 * ```typescript
 * const dispatcher = new MessageDispatcher({ gateway, records, unitOfWork, calculator });
 * dispatchRecord(record, dispatcher);   // queues a TestMessage or OpenMessage
 * await dispatcher.sendMessages();
 * ```
 */

import { ConsistencyError, DeliveryError, NotFoundError, type DeliveryFailure } from '../errors';
import type { OpenRecord, TestRecord } from '../models';
import { dispatchRecord, scoreRecord } from '../records/record-lifecycle';
import type { PointsCalculator } from '../scoring/types';
import type { ChatGateway } from '@/gateway/types';
import type { RecordRepository } from '@/storage/repositories';
import type { TransactionRunner } from '@/storage/unit-of-work';
import {
  FeedbackMessage,
  OpenMessage,
  ReminderMessage,
  TestMessage,
  detachedMessageFactory,
} from './messages';
import type {
  AnswerPayload,
  GatewayMessage,
  MessageFactory,
  NoticeMessage,
  QuestionMessage,
} from './types';

export interface MessageDispatcherDependencies {
  gateway: ChatGateway;
  records: RecordRepository;
  unitOfWork: TransactionRunner;
  calculator: PointsCalculator;
  /** Clock for answer times (default: new Date()) */
  now?: () => Date;
}

/**
 * Inbound answer, as reported by the gateway.
 */
export interface Feedback {
  /** Handle of the message being answered */
  messageHandle: string;
  payload: AnswerPayload;
}

/**
 * Outcome of a handled answer.
 */
export interface FeedbackResult {
  recordId: string;
  points: number;
  state: 'pending' | 'answered';
}

export class MessageDispatcher implements MessageFactory<GatewayMessage> {
  private readonly gateway: ChatGateway;
  private readonly records: RecordRepository;
  private readonly unitOfWork: TransactionRunner;
  private readonly calculator: PointsCalculator;
  private readonly now: () => Date;

  private queue: GatewayMessage[] = [];

  /** Settles when the running flush, if any, has finished */
  private flushing: Promise<unknown> = Promise.resolve();

  constructor(deps: MessageDispatcherDependencies) {
    this.gateway = deps.gateway;
    this.records = deps.records;
    this.unitOfWork = deps.unitOfWork;
    this.calculator = deps.calculator;
    this.now = deps.now ?? (() => new Date());
  }

  /** Number of messages waiting to be sent */
  get pendingCount(): number {
    return this.queue.length;
  }

  /** Snapshot of the queue, in sending order */
  get pending(): readonly GatewayMessage[] {
    return [...this.queue];
  }

  createTest(record: TestRecord): GatewayMessage {
    const message = new TestMessage(record);
    this.enqueue([message]);
    return message;
  }

  createOpen(record: OpenRecord): GatewayMessage {
    const message = new OpenMessage(record);
    this.enqueue([message]);
    return message;
  }

  /**
   * Appends messages to the queue. A question whose record is already
   * queued (staged by an overlapping routing pass, or still in flight) is
   * not queued twice.
   */
  enqueue(messages: GatewayMessage[]): void {
    const queuedRecords = new Set(
      this.queue.flatMap((message) => (message.kind === 'question' ? [message.record.id] : []))
    );

    for (const message of messages) {
      if (message.kind === 'question') {
        if (queuedRecords.has(message.record.id)) {
          continue;
        }
        queuedRecords.add(message.record.id);
      }
      this.queue.push(message);
    }
  }

  /**
   * Delivers the queued messages in order, or only those for `personId`.
   * Flushes never overlap: a call made during a flush starts once that
   * flush has finished.
   *
   * @returns The number of messages delivered by this call
   * @throws DeliveryError after the flush if any message was not delivered
   */
  sendMessages(personId?: string): Promise<number> {
    const run = this.flushing.then(() => this.flush(personId));
    this.flushing = run.catch(() => undefined);
    return run;
  }

  /**
   * Finds the unique record delivered under `messageHandle` and wraps it in
   * the message type of its kind.
   *
   * @throws NotFoundError if no record has this handle
   * @throws ConsistencyError if more than one record has it
   */
  async resolveMessage(messageHandle: string): Promise<QuestionMessage> {
    const found = await this.records.findByMessageHandle(messageHandle);

    if (found.length === 0) {
      throw new NotFoundError('Message', messageHandle);
    }
    if (found.length > 1) {
      throw new ConsistencyError(`Message handle '${messageHandle}' belongs to ${found.length} records`, {
        messageHandle,
        recordIds: found.map((record) => record.id),
      });
    }

    return dispatchRecord(found[0], detachedMessageFactory);
  }

  /**
   * Applies an answer: validates it against the message kind, stores it,
   * scores the record and persists the result, all in one unit of work.
   * The feedback text is then sent to the person.
   *
   * @throws NotFoundError for an unknown handle
   * @throws ConsistencyError if the record was already answered
   * @throws ValidationError if the payload does not fit the question kind
   * @throws GatewayError if the feedback could not be sent (the score stays)
   */
  async handleFeedback(feedback: Feedback): Promise<FeedbackResult> {
    const { message, result } = await this.unitOfWork.run(async () => {
      const resolved = await this.resolveMessage(feedback.messageHandle);
      const record = resolved.record;

      if (record.state !== 'transferred') {
        throw new ConsistencyError(`Record '${record.id}' was already answered`, {
          recordId: record.id,
          state: record.state,
          messageHandle: feedback.messageHandle,
        });
      }

      resolved.acceptAnswer(feedback.payload, this.now());
      const points = await scoreRecord(record, this.calculator);
      await this.records.save(record);

      const state = resolved.record.state === 'pending' ? 'pending' : 'answered';
      return { message: resolved, result: { recordId: record.id, points, state } satisfies FeedbackResult };
    });

    console.log(
      `[Dispatcher] Record ${result.recordId} scored ${result.points} (${result.state})`
    );

    await this.sendNotice(new FeedbackMessage(message.record.personId, message.feedbackText(result.points)));

    return result;
  }

  /**
   * Reminds the person of their delivered but unanswered question, if they
   * have one.
   *
   * @returns true if a reminder was sent
   * @throws GatewayError if the reminder could not be sent
   */
  async sendReminder(personId: string): Promise<boolean> {
    const outstanding = await this.records.findTransferred(personId);
    if (!outstanding) {
      return false;
    }

    await this.sendNotice(new ReminderMessage(outstanding));
    console.log(`[Dispatcher] Reminded ${personId} of message ${outstanding.messageHandle}`);
    return true;
  }

  private async sendNotice(message: NoticeMessage): Promise<void> {
    const { messageHandle } = await this.gateway.send(message.render());
    message.markSent(messageHandle);
  }

  private async flush(personId?: string): Promise<number> {
    const batch = this.queue.filter(
      (message) => personId === undefined || recipientOf(message) === personId
    );
    const failures: DeliveryFailure[] = [];
    let sent = 0;

    for (const message of batch) {
      try {
        await this.deliver(message);
        sent++;
      } catch (error) {
        failures.push({ personId: recipientOf(message), error });
        console.error(`[Dispatcher] Could not deliver to ${recipientOf(message)}:`, error);
      } finally {
        // Stays queued while in flight, so a re-plan of the same record is not queued twice
        this.queue = this.queue.filter((queued) => queued !== message);
      }
    }

    if (sent > 0) {
      console.log(`[Dispatcher] Sent ${sent} message(s)`);
    }
    if (failures.length > 0) {
      throw new DeliveryError(failures, sent);
    }
    return sent;
  }

  private async deliver(message: GatewayMessage): Promise<void> {
    const { messageHandle } = await this.gateway.send(message.render());

    if (message.kind === 'notice') {
      message.markSent(messageHandle);
      return;
    }

    await this.unitOfWork.run(async () => {
      message.markSent(messageHandle);
      const stored = await this.records.markTransferred(message.record.id, messageHandle);
      if (!stored) {
        throw new ConsistencyError(
          `Record '${message.record.id}' was delivered but is no longer waiting to be sent`,
          { recordId: message.record.id, messageHandle }
        );
      }
    });
  }
}

function recipientOf(message: GatewayMessage): string {
  return message.kind === 'question' ? message.record.personId : message.render().userId;
}
