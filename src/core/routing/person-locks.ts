/**
 * Per-person Locks
 *
 * Runs units of work for the same person one after another, while work for
 * different people proceeds independently. A person's chain is dropped once
 * it has no work left.
 *
 * @example
 * ```typescript
 * const locks = new PersonLocks();
 * await Promise.all([
 *   locks.run('p1', () => router.prepareNext('p1')),
 *   locks.run('p1', () => router.prepareNext('p1')), // starts after the first
 * ]);
 * ```
 */

export class PersonLocks {
  private readonly tails = new Map<string, Promise<void>>();

  run<T>(personId: string, work: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(personId) ?? Promise.resolve();
    const result = previous.then(work);

    const tail: Promise<void> = result.then(
      () => this.release(personId, tail),
      () => this.release(personId, tail)
    );
    this.tails.set(personId, tail);

    return result;
  }

  private release(personId: string, tail: Promise<void>): void {
    if (this.tails.get(personId) === tail) {
      this.tails.delete(personId);
    }
  }
}
