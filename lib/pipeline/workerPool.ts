/**
 * Runs `tasks` with at most `limit` in flight. Results keep the index of their task, and the
 * returned promise settles only after every task has.
 */
export async function runWithLimit<T>(tasks: Array<() => Promise<T>>, limit: number): Promise<T[]> {
  const results: T[] = new Array(tasks.length);
  let next = 0;

  async function worker() {
    while (true) {
      const i = next++;
      if (i >= tasks.length) return;
      results[i] = await tasks[i]();
    }
  }

  const n = Math.max(1, Math.min(limit, tasks.length || 1));
  await Promise.all(Array.from({ length: n }, () => worker()));
  return results;
}
