/**
 * Base Repository Interface
 *
 * Shared shape of the repositories. Business code works with domain models
 * (Question, AnswerRecord); the repositories own the mapping to and from
 * Drizzle rows.
 */

/**
 * Standard CRUD operations.
 *
 * @typeParam T - The domain model returned by the repository
 * @typeParam CreateInput - What `create` accepts
 * @typeParam UpdateInput - What `update` accepts (partial fields)
 */
export interface Repository<T, CreateInput, UpdateInput> {
  /** Returns the entity, or null if there is none with this id */
  findById(id: string): Promise<T | null>;

  findAll(): Promise<T[]>;

  create(input: CreateInput): Promise<T>;

  /**
   * Changes only the fields present in `input`.
   *
   * @throws NotFoundError if the entity does not exist
   */
  update(id: string, input: UpdateInput): Promise<T>;

  /**
   * @throws NotFoundError if the entity does not exist
   */
  delete(id: string): Promise<void>;
}
