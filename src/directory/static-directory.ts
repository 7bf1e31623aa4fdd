/**
 * Static Directory
 *
 * In-memory directory over a fixed list of people. Used by the tests and
 * for local runs without a user service (DIRECTORY_FILE).
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { NotFoundError } from '@/core/errors';
import type { Person } from '@/core/models';
import type { Directory } from './types';

const peopleFileSchema = z.array(
  z.object({
    id: z.string().min(1),
    fullName: z.string().default(''),
    groups: z
      .array(z.object({ groupId: z.string().min(1), level: z.number().int() }))
      .default([]),
  })
);

export class StaticDirectory implements Directory {
  private readonly people: Map<string, Person>;

  constructor(people: Person[]) {
    this.people = new Map(people.map((person) => [person.id, person]));
  }

  /**
   * Loads people from a JSON file holding an array of
   * `{ id, fullName, groups: [{ groupId, level }] }`.
   */
  static fromFile(path: string): StaticDirectory {
    const raw: unknown = JSON.parse(readFileSync(path, 'utf-8'));
    return new StaticDirectory(peopleFileSchema.parse(raw));
  }

  async getAllPeople(): Promise<Person[]> {
    return [...this.people.values()];
  }

  async getPerson(personId: string): Promise<Person> {
    const person = this.people.get(personId);
    if (!person) {
      throw new NotFoundError('Person', personId);
    }
    return person;
  }
}
