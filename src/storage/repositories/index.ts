/**
 * Repository Layer - Barrel Export
 *
 * @example
 * ```typescript
 * import { QuestionRepository, RecordRepository } from '@/storage/repositories';
 *
 * const questionRepo = new QuestionRepository(db);
 * const recordRepo = new RecordRepository(db);
 * ```
 */

export type { Repository } from './base';

export {
  QuestionRepository,
  generateQuestionId,
  type CreateQuestionInput,
  type UpdateQuestionInput,
} from './question.repository';

export { RecordRepository, type UpdateRecordInput } from './record.repository';
