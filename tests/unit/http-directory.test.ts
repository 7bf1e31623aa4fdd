/**
 * HTTP Directory Tests
 */

import { describe, it, expect, vi } from 'vitest';
import { NotFoundError } from '../../src/core/errors';
import { HttpDirectory, toPerson } from '../../src/directory/http-directory';
import { DirectoryError } from '../../src/directory/types';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

function createDirectory(respond: () => Promise<Response>) {
  const fetchMock = vi.fn<typeof fetch>(respond);
  const directory = new HttpDirectory({
    baseUrl: 'http://directory.test',
    token: 'test-secret',
    timeoutMs: 1000,
    fetch: fetchMock,
  });
  return { directory, fetchMock };
}

const alice = {
  id: 'u1',
  fullName: 'Alice Example',
  memberships: [{ groupId: 'g1' }, { groupId: 'g2' }],
  data: {
    groupLevels: [
      { groupId: 'g1', level: 2 },
      { groupId: 'g3', level: 5 },
    ],
  },
};

describe('toPerson', () => {
  it('keeps only levels for groups the user belongs to', () => {
    expect(toPerson(alice)).toEqual({
      id: 'u1',
      fullName: 'Alice Example',
      groups: [{ groupId: 'g1', level: 2 }],
    });
  });

  it('falls back to a placeholder name and no groups', () => {
    expect(toPerson({ id: 'u2', memberships: [{ groupId: 'g1' }], data: {} })).toEqual({
      id: 'u2',
      fullName: 'Name',
      groups: [],
    });
  });
});

describe('HttpDirectory', () => {
  it('lists everyone from the search endpoint', async () => {
    const { directory, fetchMock } = createDirectory(async () =>
      jsonResponse({ users: [alice, { id: 'u2' }] })
    );

    const people = await directory.getAllPeople();

    expect(people.map((p) => p.id)).toEqual(['u1', 'u2']);
    expect(people[1]).toEqual({ id: 'u2', fullName: 'Name', groups: [] });
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('http://directory.test/api/user/search?queryString=*');
    expect(init?.headers).toEqual({ Authorization: 'test-secret' });
  });

  it('fetches one person', async () => {
    const { directory, fetchMock } = createDirectory(async () => jsonResponse({ user: alice }));

    const found = await directory.getPerson('u1');

    expect(found.groups).toEqual([{ groupId: 'g1', level: 2 }]);
    expect(fetchMock.mock.calls[0][0]).toBe('http://directory.test/api/user/u1');
  });

  it('raises NotFoundError for an unknown person', async () => {
    const { directory } = createDirectory(async () => new Response('', { status: 404 }));

    await expect(directory.getPerson('ghost')).rejects.toBeInstanceOf(NotFoundError);
  });

  it('raises DirectoryError on a server error', async () => {
    const { directory } = createDirectory(async () => new Response('', { status: 500 }));

    await expect(directory.getAllPeople()).rejects.toThrow(
      new DirectoryError('Directory responded with HTTP 500', 500)
    );
  });

  it('raises DirectoryError on an unexpected body', async () => {
    const { directory } = createDirectory(async () => jsonResponse({ user: { name: 'no id' } }));

    await expect(directory.getPerson('u1')).rejects.toThrow(
      "Directory response for 'u1' has an unexpected shape"
    );
  });
});
