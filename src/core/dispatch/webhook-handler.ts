/**
 * Webhook Handler
 *
 * Entry point for events pushed by the chat gateway:
 *
 * - FEEDBACK: a person answered a message. The answer is handled; if the
 *   person's session is still open, the next delivery is requested.
 * - SESSION: a person opened (or closed) a chat session. An open session
 *   requests delivery.
 *
 * Requesting delivery reminds the person of a question still waiting for
 * an answer, or else prepares and sends their next question. It holds the
 * person's lock throughout, so overlapping events for one person ask at
 * most one new question.
 *
 * The handler is built once with the dispatcher and router it drives.
 */

import { z } from 'zod';
import { ValidationError } from '../errors';
import type { PersonRouter } from '../routing/person-router';
import type { FeedbackResult, MessageDispatcher } from './message-dispatcher';
import type { AnswerPayload } from './types';

const sessionSchema = z.object({
  user_id: z.union([z.string().min(1), z.number().int()]).transform(String),
  state: z.enum(['OPEN', 'CLOSED']),
});

const feedbackSchema = z.object({
  message_id: z.union([z.string().min(1), z.number().int()]).transform(String),
  type: z.enum(['BUTTON', 'SIMPLE', 'REPLY']),
  button_id: z.union([z.number().int(), z.string().regex(/^\d+$/).transform(Number)]).optional(),
  text: z.string().optional(),
});

/**
 * Validates a raw webhook body.
 */
export const webhookEventSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('FEEDBACK'),
    feedback: feedbackSchema,
    session: sessionSchema.optional(),
  }),
  z.object({
    type: z.literal('SESSION'),
    session: sessionSchema.optional(),
  }),
]);

export type WebhookEvent = z.infer<typeof webhookEventSchema>;

/**
 * What the handler did with an event.
 */
export interface WebhookOutcome {
  feedback: FeedbackResult | null;
  /** Whether delivery was requested for the session's person */
  deliveryRequested: boolean;
}

/**
 * Converts a validated feedback entry to an answer payload.
 *
 * @throws ValidationError if the field the type needs is missing
 */
export function toAnswerPayload(event: Extract<WebhookEvent, { type: 'FEEDBACK' }>): AnswerPayload {
  const { type, button_id: buttonId, text } = event.feedback;

  if (type === 'BUTTON') {
    if (buttonId === undefined) {
      throw new ValidationError('BUTTON feedback needs a button_id');
    }
    return { type, buttonId };
  }

  if (text === undefined) {
    throw new ValidationError(`${type} feedback needs a text`);
  }
  return { type, text };
}

export class WebhookHandler {
  constructor(
    private readonly dispatcher: MessageDispatcher,
    private readonly router: PersonRouter
  ) {}

  /**
   * Validates and handles one webhook body.
   *
   * @throws ValidationError if the body is malformed
   */
  async handle(body: unknown): Promise<WebhookOutcome> {
    const parsed = webhookEventSchema.safeParse(body);
    if (!parsed.success) {
      throw new ValidationError('Invalid webhook payload', {
        issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      });
    }

    return this.handleEvent(parsed.data);
  }

  async handleEvent(event: WebhookEvent): Promise<WebhookOutcome> {
    let feedback: FeedbackResult | null = null;

    if (event.type === 'FEEDBACK') {
      console.log(`[Webhook] Feedback for message ${event.feedback.message_id}`);
      feedback = await this.dispatcher.handleFeedback({
        messageHandle: event.feedback.message_id,
        payload: toAnswerPayload(event),
      });
    } else {
      console.log(
        `[Webhook] Session ${event.session?.state ?? 'event'} for ${event.session?.user_id ?? 'unknown user'}`
      );
    }

    if (event.session?.state === 'OPEN') {
      await this.requestDelivery(event.session.user_id);
      return { feedback, deliveryRequested: true };
    }

    return { feedback, deliveryRequested: false };
  }

  /**
   * Sends the person a reminder about their unanswered question, or their
   * next question if there is none outstanding. Only the person's own
   * messages are flushed.
   *
   * @returns The number of messages delivered
   * @throws GatewayError if the person's message could not be delivered
   */
  requestDelivery(personId: string): Promise<number> {
    return this.router.locks.run(personId, async () => {
      if (await this.dispatcher.sendReminder(personId)) {
        return 1;
      }
      await this.router.prepareNext(personId);
      return this.dispatcher.sendMessages(personId);
    });
  }
}
