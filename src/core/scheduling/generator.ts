/**
 * Base Generator
 *
 * Shared batch logic for every selection strategy:
 *
 * 1. Planned records (not answered, ask time reached) are served first,
 *    oldest first. If they already fill the batch, nothing else is read.
 * 2. Candidates are the questions sharing a group with the person, minus
 *    the questions of those planned records.
 * 3. The strategy picks fresh questions from the candidates to fill the
 *    remaining places.
 *
 * A person without groups, or without eligible questions, simply gets the
 * planned records (possibly none).
 */

import type { Person, Question } from '../models';
import type {
  Clock,
  Generator,
  GeneratorOptions,
  RandomSource,
  ScheduledItem,
  SchedulingStore,
} from './types';

export abstract class BaseGenerator implements Generator {
  protected readonly random: RandomSource;
  protected readonly now: Clock;

  constructor(
    protected readonly store: SchedulingStore,
    options: GeneratorOptions = {}
  ) {
    this.random = options.random ?? Math.random;
    this.now = options.now ?? (() => new Date());
  }

  async nextBunch(person: Person, count: number = 1): Promise<ScheduledItem[]> {
    if (count <= 0) {
      return [];
    }

    const now = this.now();
    const planned = await this.store.findPlannedRecords(person.id, now);
    if (planned.length >= count) {
      return planned.slice(0, count);
    }

    const groupIds = person.groups.map((group) => group.groupId);
    if (groupIds.length === 0) {
      return planned;
    }

    const candidates = await this.store.findCandidateQuestions(
      groupIds,
      planned.map((record) => record.questionId)
    );
    if (candidates.length === 0) {
      return planned;
    }

    const fresh = await this.selectCandidates(
      person,
      candidates,
      Math.min(count - planned.length, candidates.length),
      now
    );
    return [...planned, ...fresh];
  }

  /**
   * Picks `count` distinct questions from `candidates`. May return fewer
   * if the strategy rules some candidates out.
   */
  protected abstract selectCandidates(
    person: Person,
    candidates: Question[],
    count: number,
    now: Date
  ): Promise<Question[]>;
}
