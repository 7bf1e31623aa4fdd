/**
 * Simple Generator
 *
 * Picks fresh questions uniformly at random, without replacement.
 */

import type { Person, Question } from '../models';
import { BaseGenerator } from './generator';
import { sampleUniform } from './random';

export class SimpleGenerator extends BaseGenerator {
  protected async selectCandidates(
    _person: Person,
    candidates: Question[],
    count: number
  ): Promise<Question[]> {
    return sampleUniform(candidates, count, this.random);
  }
}
