/**
 * Person Router
 *
 * Turns generator output into records and queued messages.
 *
 * For one person, `prepareNext`:
 * 1. reads the person from the directory and asks the generator for a batch
 * 2. creates a record (ask time = now) for every fresh question; planned
 *    records are reused as they are
 * 3. builds the message of every record without queueing it
 * 4. inserts the new records in one unit of work
 * 5. only after that commit, queues the messages on the dispatcher
 *
 * If the commit fails nothing is queued, so no message can go out for a
 * record that was never stored.
 *
 * Preparations for the same person must not overlap, or both would sample
 * fresh questions. `routeMultiple` runs each one under `locks`, and so does
 * every other caller that can run alongside it (the webhook handler).
 */

import type { Directory } from '@/directory/types';
import type { RecordRepository } from '@/storage/repositories';
import type { TransactionRunner } from '@/storage/unit-of-work';
import { detachedMessageFactory } from '../dispatch/messages';
import type { MessageDispatcher } from '../dispatch/message-dispatcher';
import type { QuestionMessage } from '../dispatch/types';
import type { AnswerRecord } from '../models';
import { dispatchRecord, initRecord } from '../records/record-lifecycle';
import { isRecord, type Generator } from '../scheduling/types';
import { DeliveryError } from '../errors';
import { PersonLocks } from './person-locks';

export interface PersonRouterDependencies {
  directory: Directory;
  generator: Generator;
  records: RecordRepository;
  unitOfWork: TransactionRunner;
  dispatcher: MessageDispatcher;
  /** Items requested per person and pass (default: 1) */
  batchSize?: number;
  now?: () => Date;
  /** Shared with every other component that prepares for a person */
  locks?: PersonLocks;
}

/**
 * Outcome of one routing pass over all people.
 */
export interface RoutingSummary {
  /** People in the directory */
  people: number;
  /** Messages staged across all people */
  prepared: number;
  /** Ids of people whose preparation failed */
  failed: string[];
  /** Messages delivered by the final flush */
  sent: number;
  /** Ids of people whose message the gateway did not take */
  undelivered: string[];
}

export class PersonRouter {
  private readonly directory: Directory;
  private readonly generator: Generator;
  private readonly records: RecordRepository;
  private readonly unitOfWork: TransactionRunner;
  private readonly dispatcher: MessageDispatcher;
  private readonly batchSize: number;
  private readonly now: () => Date;

  readonly locks: PersonLocks;

  constructor(deps: PersonRouterDependencies) {
    this.directory = deps.directory;
    this.generator = deps.generator;
    this.records = deps.records;
    this.unitOfWork = deps.unitOfWork;
    this.dispatcher = deps.dispatcher;
    this.batchSize = deps.batchSize ?? 1;
    this.now = deps.now ?? (() => new Date());
    this.locks = deps.locks ?? new PersonLocks();
  }

  /**
   * Prepares the next batch for one person and queues its messages.
   * Nothing is sent; call `dispatcher.sendMessages()` for that. Does not
   * take the person's lock.
   *
   * @returns The queued messages (empty when there is nothing to ask)
   * @throws NotFoundError if the directory does not know the person
   */
  async prepareNext(personId: string): Promise<QuestionMessage[]> {
    const person = await this.directory.getPerson(personId);
    const batch = await this.generator.nextBunch(person, this.batchSize);

    if (batch.length === 0) {
      console.log(`[Router] Nothing to ask ${personId}`);
      return [];
    }

    const askTime = this.now();
    const created: AnswerRecord[] = [];
    const records = batch.map((item) => {
      if (isRecord(item)) {
        return item;
      }
      const record = initRecord(item, person.id, askTime);
      created.push(record);
      return record;
    });

    const messages = records.map((record) => dispatchRecord(record, detachedMessageFactory));

    await this.unitOfWork.run(async () => {
      for (const record of created) {
        await this.records.create(record);
      }
    });

    this.dispatcher.enqueue(messages);

    console.log(
      `[Router] Prepared ${messages.length} message(s) for ${personId} ` +
        `(${created.length} new, ${records.length - created.length} planned)`
    );
    return messages;
  }

  /**
   * Prepares every person in the directory, then flushes the dispatcher.
   * A failure for one person, while preparing or delivering, is logged and
   * reported in the summary; it does not stop the others.
   */
  async routeMultiple(): Promise<RoutingSummary> {
    const people = await this.directory.getAllPeople();
    let prepared = 0;
    const failed: string[] = [];

    for (const person of people) {
      try {
        const messages = await this.locks.run(person.id, () => this.prepareNext(person.id));
        prepared += messages.length;
      } catch (error) {
        failed.push(person.id);
        console.error(`[Router] Failed to prepare ${person.id}:`, error);
      }
    }

    let sent: number;
    let undelivered: string[] = [];
    try {
      sent = await this.dispatcher.sendMessages();
    } catch (error) {
      if (!(error instanceof DeliveryError)) {
        throw error;
      }
      sent = error.sent;
      undelivered = error.personIds;
    }

    console.log(
      `[Router] Routing pass done: ${people.length} people, ${prepared} prepared, ` +
        `${failed.length} failed, ${sent} sent, ${undelivered.length} undelivered`
    );
    return { people: people.length, prepared, failed, sent, undelivered };
  }
}
