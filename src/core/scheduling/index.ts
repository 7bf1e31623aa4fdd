/**
 * Scheduling Module - Barrel Export
 *
 * @example
 * ```typescript
 * import { SmartGenerator, createSeededRandom } from '@/core/scheduling';
 *
 * const generator = new SmartGenerator(store, { random: createSeededRandom(7) });
 * const batch = await generator.nextBunch(person, 2);
 * ```
 */

export type {
  Clock,
  Generator,
  GeneratorOptions,
  QuestionHistory,
  RandomSource,
  ScheduledItem,
  SchedulingStore,
} from './types';
export { isRecord } from './types';

export { BaseGenerator } from './generator';
export { SimpleGenerator } from './simple-generator';
export { SmartGenerator, type SmartGeneratorOptions } from './smart-generator';
export {
  DEFAULT_SMART_WEIGHT_OPTIONS,
  UNSET_WEIGHT_MULTIPLIER,
  candidateWeight,
  decayEnvelope,
  levelFactor,
  maxSharedLevel,
  resolveWeights,
  type SmartWeightOptions,
} from './weights';
export { createSeededRandom, sampleUniform, sampleWeighted } from './random';
