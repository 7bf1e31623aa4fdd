/**
 * Static Directory Tests
 */

import { fileURLToPath } from 'node:url';
import { describe, it, expect } from 'vitest';
import { NotFoundError } from '../../src/core/errors';
import { StaticDirectory } from '../../src/directory/static-directory';

const peopleFile = fileURLToPath(new URL('../../data/people.example.json', import.meta.url));

describe('StaticDirectory', () => {
  it('loads people from a JSON file', async () => {
    const directory = StaticDirectory.fromFile(peopleFile);

    const people = await directory.getAllPeople();

    expect(people.map((p) => p.id)).toEqual(['person-1', 'person-2']);
    expect(await directory.getPerson('person-2')).toEqual({
      id: 'person-2',
      fullName: 'Sam Example',
      groups: [{ groupId: 'computing', level: 3 }],
    });
  });

  it('raises NotFoundError for an unknown person', async () => {
    const directory = new StaticDirectory([]);

    await expect(directory.getPerson('ghost')).rejects.toBeInstanceOf(NotFoundError);
  });
});
