/**
 * Smart Selection Weights
 *
 * Pure weight computation for the smart generator. For a question the
 * person has points on, the weight grows with the time since it was last
 * asked relative to the points earned on it, follows an oscillating
 * envelope over the time since it was first asked, and falls off as the
 * question's level moves away from the person's level:
 *
 *   timeFactor  = gapSeconds / pointsSum
 *   envelope    = |cos(π · log2(elapsed + μ))| ^ ((elapsed + μ)² / σ) + ε
 *   levelFactor = exp(−0.5 · (maxSharedLevel − level)²)
 *   weight      = timeFactor · envelope · levelFactor
 *
 * `elapsed` is measured in periods (one day by default) and `gapSeconds`
 * in seconds. Questions without points have no weight yet (null); see
 * `resolveWeights` for how those are filled in.
 */

import type { Person, Question } from '../models';
import type { QuestionHistory } from './types';

export interface SmartWeightOptions {
  /** Envelope phase shift, in periods */
  mu: number;
  /** Envelope sharpness; larger values flatten it */
  sigma: number;
  /** Floor added to the envelope so no weight is exactly zero */
  epsilon: number;
  /** Length of one period in milliseconds */
  periodUnitMs: number;
}

export const DEFAULT_SMART_WEIGHT_OPTIONS: SmartWeightOptions = {
  mu: 4,
  sigma: 20,
  epsilon: 0.001,
  periodUnitMs: 24 * 60 * 60 * 1000,
};

/**
 * Multiplier applied to the largest known weight to give questions the
 * person has never earned points on.
 */
export const UNSET_WEIGHT_MULTIPLIER = 10;

/**
 * Highest level the person holds in a group the question belongs to, or
 * null if they share no group.
 */
export function maxSharedLevel(person: Person, question: Question): number | null {
  const questionGroups = new Set(question.groupIds);
  const levels = person.groups
    .filter((group) => questionGroups.has(group.groupId))
    .map((group) => group.level);

  return levels.length > 0 ? Math.max(...levels) : null;
}

/**
 * Envelope over the number of periods since the question was first asked.
 */
export function decayEnvelope(elapsedPeriods: number, options: SmartWeightOptions): number {
  const shifted = elapsedPeriods + options.mu;
  const base = Math.abs(Math.cos(Math.PI * Math.log2(shifted)));
  return base ** (shifted ** 2 / options.sigma) + options.epsilon;
}

/**
 * Gaussian preference for questions at the person's level. Without a
 * shared group there is no level to compare with and the factor is 1.
 */
export function levelFactor(person: Person, question: Question): number {
  const target = maxSharedLevel(person, question);
  if (target === null) {
    return 1;
  }
  return Math.exp(-0.5 * (target - question.level) ** 2);
}

/**
 * Computes the raw weight of one candidate.
 *
 * Elapsed time and gap are clamped at zero, so a record planned for the
 * future cannot produce a negative weight.
 *
 * @returns The weight, or null when the person has no points on it
 */
export function candidateWeight(
  person: Person,
  question: Question,
  history: QuestionHistory | undefined,
  now: Date,
  options: SmartWeightOptions = DEFAULT_SMART_WEIGHT_OPTIONS
): number | null {
  if (!history || history.pointsSum === null || history.pointsSum <= 0) {
    return null;
  }

  const elapsedPeriods = Math.max(0, now.getTime() - history.firstAskTime.getTime()) / options.periodUnitMs;
  const gapSeconds = Math.max(0, now.getTime() - history.lastAskTime.getTime()) / 1000;

  const timeFactor = (gapSeconds / history.pointsSum) * decayEnvelope(elapsedPeriods, options);

  return timeFactor * levelFactor(person, question);
}

/**
 * Turns raw weights into a probability distribution.
 *
 * - null (unset) weights become 10 × the largest known weight, or 1 when no
 *   known weight is positive
 * - non-finite known weights count as 0
 * - if every weight is 0 the distribution is uniform
 */
export function resolveWeights(weights: ReadonlyArray<number | null>): number[] {
  if (weights.length === 0) {
    return [];
  }

  const known = weights.map((weight) =>
    weight === null ? null : Number.isFinite(weight) && weight > 0 ? weight : 0
  );
  const maxKnown = Math.max(0, ...known.map((weight) => weight ?? 0));
  const placeholder = maxKnown > 0 ? UNSET_WEIGHT_MULTIPLIER * maxKnown : 1;

  const filled = known.map((weight) => weight ?? placeholder);
  const total = filled.reduce((sum, weight) => sum + weight, 0);

  if (total <= 0) {
    return filled.map(() => 1 / filled.length);
  }
  return filled.map((weight) => weight / total);
}
