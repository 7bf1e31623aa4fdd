/**
 * Smart Generator
 *
 * Weighted selection of fresh questions (see weights.ts). Candidates that
 * another person holds an unfinished record for are left out entirely, so
 * one question is not asked of several people while someone is still
 * answering or waiting for review.
 */

import type { Person, Question } from '../models';
import { BaseGenerator } from './generator';
import { sampleWeighted } from './random';
import type { GeneratorOptions, SchedulingStore } from './types';
import {
  DEFAULT_SMART_WEIGHT_OPTIONS,
  candidateWeight,
  resolveWeights,
  type SmartWeightOptions,
} from './weights';

export interface SmartGeneratorOptions extends GeneratorOptions, Partial<SmartWeightOptions> {}

/**
 * @example
 * ```typescript
 * const generator = new SmartGenerator(store, { mu: 4, sigma: 20, epsilon: 0.001 });
 * const batch = await generator.nextBunch(person, 3);
 * ```
 */
export class SmartGenerator extends BaseGenerator {
  private readonly weightOptions: SmartWeightOptions;

  constructor(store: SchedulingStore, options: SmartGeneratorOptions = {}) {
    super(store, options);
    this.weightOptions = {
      mu: options.mu ?? DEFAULT_SMART_WEIGHT_OPTIONS.mu,
      sigma: options.sigma ?? DEFAULT_SMART_WEIGHT_OPTIONS.sigma,
      epsilon: options.epsilon ?? DEFAULT_SMART_WEIGHT_OPTIONS.epsilon,
      periodUnitMs: options.periodUnitMs ?? DEFAULT_SMART_WEIGHT_OPTIONS.periodUnitMs,
    };
  }

  /**
   * Computes the selection probability of every candidate still in the
   * pool. Excluded candidates do not appear in the result.
   */
  async probabilities(
    person: Person,
    candidates: Question[],
    now: Date = this.now()
  ): Promise<Map<string, number>> {
    const pool = await this.excludeHeldByOthers(person, candidates);
    const weights = await this.weigh(person, pool, now);
    return new Map(pool.map((question, index) => [question.id, weights[index]]));
  }

  protected async selectCandidates(
    person: Person,
    candidates: Question[],
    count: number,
    now: Date
  ): Promise<Question[]> {
    const pool = await this.excludeHeldByOthers(person, candidates);
    if (pool.length === 0) {
      return [];
    }

    const weights = await this.weigh(person, pool, now);
    return sampleWeighted(pool, weights, count, this.random);
  }

  private async excludeHeldByOthers(person: Person, candidates: Question[]): Promise<Question[]> {
    const held = new Set(
      await this.store.findQuestionsHeldByOthers(
        person.id,
        candidates.map((question) => question.id)
      )
    );
    return candidates.filter((question) => !held.has(question.id));
  }

  private async weigh(person: Person, pool: Question[], now: Date): Promise<number[]> {
    const history = new Map(
      (await this.store.findHistory(person.id, pool.map((question) => question.id))).map(
        (entry) => [entry.questionId, entry]
      )
    );

    return resolveWeights(
      pool.map((question) =>
        candidateWeight(person, question, history.get(question.id), now, this.weightOptions)
      )
    );
  }
}
