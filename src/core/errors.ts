/**
 * Domain Errors
 *
 * Every failure raised by the core carries a `kind` so callers (the webhook
 * route, the CLI, the routing loop) can react without string matching:
 *
 * - 'validation': an inbound payload has the wrong shape for its record
 * - 'not_found': a message handle, person or question does not exist
 * - 'gateway': the chat gateway rejected a send or answered with a bad body
 *   (`DeliveryError` collects the failures of one flush)
 * - 'consistency': a record was asked to move to a state it cannot reach
 */

export type QuizErrorKind = 'validation' | 'not_found' | 'gateway' | 'consistency';

export class QuizError extends Error {
  /** The category of failure */
  readonly kind: QuizErrorKind;
  /** Additional context for logs and API responses */
  readonly details?: unknown;

  constructor(message: string, kind: QuizErrorKind, details?: unknown) {
    super(message);
    this.name = 'QuizError';
    this.kind = kind;
    this.details = details;
  }
}

export class ValidationError extends QuizError {
  constructor(message: string, details?: unknown) {
    super(message, 'validation', details);
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends QuizError {
  constructor(resource: string, id: string) {
    super(`${resource} '${id}' not found`, 'not_found', { resource, id });
    this.name = 'NotFoundError';
  }
}

export class GatewayError extends QuizError {
  /** HTTP status returned by the gateway, if a response arrived */
  readonly status: number | null;

  constructor(message: string, status: number | null = null, details?: unknown) {
    super(message, 'gateway', details);
    this.name = 'GatewayError';
    this.status = status;
  }
}

export class ConsistencyError extends QuizError {
  constructor(message: string, details?: unknown) {
    super(message, 'consistency', details);
    this.name = 'ConsistencyError';
  }
}

/**
 * One message that could not be delivered during a flush.
 */
export interface DeliveryFailure {
  personId: string;
  error: unknown;
}

/**
 * Raised by a flush that could not deliver every message. The messages that
 * went through stay delivered; `failures` lists the rest, one per message.
 */
export class DeliveryError extends GatewayError {
  readonly failures: DeliveryFailure[];
  /** Messages the same flush did deliver */
  readonly sent: number;

  constructor(failures: DeliveryFailure[], sent: number) {
    const reasons = failures.map(
      ({ personId, error }) => `${personId}: ${error instanceof Error ? error.message : String(error)}`
    );
    const status =
      failures.length === 1 && failures[0].error instanceof GatewayError ? failures[0].error.status : null;

    super(`Could not deliver ${failures.length} message(s) (${reasons.join('; ')})`, status, {
      sent,
      undelivered: failures.map((failure) => failure.personId),
    });
    this.name = 'DeliveryError';
    this.failures = failures;
    this.sent = sent;
  }

  /** Ids of the people who did not get their message, without repeats */
  get personIds(): string[] {
    return [...new Set(this.failures.map((failure) => failure.personId))];
  }
}
