/**
 * Scheduling Store
 *
 * Adapts the question and record repositories to the SchedulingStore
 * interface the generators read through.
 */

import type { SchedulingStore } from '@/core/scheduling/types';
import type { QuestionRepository, RecordRepository } from './repositories';

export function createSchedulingStore(
  questions: QuestionRepository,
  records: RecordRepository
): SchedulingStore {
  return {
    findPlannedRecords: (personId, now) => records.findPlanned(personId, now),
    findCandidateQuestions: (groupIds, excludeIds) => questions.findByGroups(groupIds, excludeIds),
    findHistory: (personId, questionIds) => records.findHistory(personId, questionIds),
    findQuestionsHeldByOthers: (personId, questionIds) =>
      records.findQuestionsHeldByOthers(personId, questionIds),
  };
}
