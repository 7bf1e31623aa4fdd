/**
 * Person Statistics Calculator
 *
 * Summarises a person's progress over the questions they may be asked:
 *
 * - questionsCount: questions sharing a group with the person
 * - answeredCount: questions the person has answered at least once
 * - correctCount: points summed over the latest answer to each of those
 *   questions (a correct test answer counts 1, open answers their score)
 *
 * @example
 * ```typescript
 * const calculator = new StatisticsCalculator(directory, questionRepo, recordRepo);
 * const stats = await calculator.forPerson('person-1');
 * console.log(`${stats.answeredCount}/${stats.questionsCount} answered`);
 * ```
 */

import type { Directory } from '@/directory/types';
import type { QuestionRepository, RecordRepository } from '@/storage/repositories';

export interface PersonStatistics {
  personId: string;
  questionsCount: number;
  answeredCount: number;
  correctCount: number;
}

export class StatisticsCalculator {
  constructor(
    private readonly directory: Directory,
    private readonly questions: QuestionRepository,
    private readonly records: RecordRepository
  ) {}

  /**
   * @throws NotFoundError if the directory does not know the person
   */
  async forPerson(personId: string): Promise<PersonStatistics> {
    const person = await this.directory.getPerson(personId);

    const questionsCount = await this.questions.countByGroups(
      person.groups.map((group) => group.groupId)
    );
    const latest = await this.records.findLatestAnswers(person.id);

    return {
      personId: person.id,
      questionsCount,
      answeredCount: latest.length,
      correctCount: latest.reduce((sum, record) => sum + record.points, 0),
    };
  }
}
