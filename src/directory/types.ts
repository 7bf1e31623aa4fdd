/**
 * Directory Types
 *
 * The directory is the external user service that knows who the people
 * are and which groups they belong to.
 */

import type { Person } from '@/core/models';

export interface Directory {
  getAllPeople(): Promise<Person[]>;

  /**
   * @throws NotFoundError if the directory has no such person
   */
  getPerson(personId: string): Promise<Person>;
}

/**
 * The directory could not be reached or answered with an error.
 */
export class DirectoryError extends Error {
  /** HTTP status, if a response arrived */
  readonly status: number | null;

  constructor(message: string, status: number | null = null) {
    super(message);
    this.name = 'DirectoryError';
    this.status = status;
  }
}
