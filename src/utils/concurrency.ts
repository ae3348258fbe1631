/**
 * Map items through fn with at most `limit` calls in flight.
 * Results keep the input order. After the first rejection no new item is started.
 */
export async function mapLimit<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results: R[] = new Array<R>(items.length);
  let cursor = 0;
  let failed = false;

  const workers = Array.from({ length: Math.max(1, Math.min(limit, items.length)) }, async () => {
    while (cursor < items.length && !failed) {
      const index = cursor;
      cursor += 1;
      try {
        results[index] = await fn(items[index], index);
      } catch (error) {
        failed = true;
        throw error;
      }
    }
  });

  await Promise.all(workers);
  return results;
}

/**
 * Single deadline shared by a whole run
 */
export class Deadline {
  private readonly expiresAt: number;

  constructor(timeoutMs: number, private readonly now: () => number = Date.now) {
    this.expiresAt = now() + timeoutMs;
  }

  static never(): Deadline {
    return new Deadline(Number.POSITIVE_INFINITY);
  }

  isExpired(): boolean {
    return this.now() >= this.expiresAt;
  }
}
