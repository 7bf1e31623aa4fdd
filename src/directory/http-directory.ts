/**
 * HTTP Directory
 *
 * Reads people from a FusionAuth-style user API:
 *
 *   GET <baseUrl>/api/user/search?queryString=*   -> { users: [User] }
 *   GET <baseUrl>/api/user/<id>                    -> { user: User }
 *
 * A user's groups are their memberships; the level for each group comes
 * from `data.groupLevels`. Groups without a level entry are left out, as
 * are level entries for groups the user is no longer a member of.
 */

import { z } from 'zod';
import { NotFoundError } from '@/core/errors';
import type { Person } from '@/core/models';
import { DirectoryError, type Directory } from './types';

export interface HttpDirectoryConfig {
  baseUrl: string;
  /** Sent verbatim in the Authorization header */
  token: string;
  timeoutMs: number;
  fetch?: typeof fetch;
}

const userSchema = z.object({
  id: z.string(),
  fullName: z.string().optional(),
  memberships: z.array(z.object({ groupId: z.string() })).default([]),
  data: z
    .object({
      groupLevels: z.array(z.object({ groupId: z.string(), level: z.number() })).optional(),
    })
    .passthrough()
    .default({}),
});

type DirectoryUser = z.infer<typeof userSchema>;

const searchResponseSchema = z.object({ users: z.array(userSchema).default([]) });
const userResponseSchema = z.object({ user: userSchema });

/**
 * Maps a directory user to a Person.
 */
export function toPerson(user: DirectoryUser): Person {
  const memberOf = new Set(user.memberships.map((membership) => membership.groupId));

  return {
    id: user.id,
    fullName: user.fullName ?? 'Name',
    groups: (user.data.groupLevels ?? [])
      .filter((entry) => memberOf.has(entry.groupId))
      .map((entry) => ({ groupId: entry.groupId, level: entry.level })),
  };
}

export class HttpDirectory implements Directory {
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly config: HttpDirectoryConfig) {
    this.fetchImpl = config.fetch ?? fetch;
  }

  async getAllPeople(): Promise<Person[]> {
    const body = await this.get('/api/user/search?queryString=*');
    const parsed = searchResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new DirectoryError('Directory search response has an unexpected shape');
    }
    return parsed.data.users.map(toPerson);
  }

  async getPerson(personId: string): Promise<Person> {
    const body = await this.get(`/api/user/${encodeURIComponent(personId)}`, personId);
    const parsed = userResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new DirectoryError(`Directory response for '${personId}' has an unexpected shape`);
    }
    return toPerson(parsed.data.user);
  }

  private async get(path: string, personId?: string): Promise<unknown> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.config.timeoutMs);

    try {
      const response = await this.fetchImpl(`${this.config.baseUrl}${path}`, {
        headers: { Authorization: this.config.token },
        signal: controller.signal,
      });

      if (response.status === 404 && personId !== undefined) {
        throw new NotFoundError('Person', personId);
      }
      if (!response.ok) {
        throw new DirectoryError(`Directory responded with HTTP ${response.status}`, response.status);
      }

      return await response.json();
    } catch (error) {
      if (error instanceof NotFoundError || error instanceof DirectoryError) {
        throw error;
      }
      if (error instanceof Error && error.name === 'AbortError') {
        throw new DirectoryError(`Directory request timed out after ${this.config.timeoutMs}ms`);
      }
      throw new DirectoryError(
        `Directory request failed: ${error instanceof Error ? error.message : String(error)}`
      );
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
