/**
 * Bounded fan-out for the per-player fetches.
 *
 * Up to `limit` lanes pull tasks from one shared cursor; results keep task
 * order. Fail-fast: the first rejection (in practice an aborted fetch) rejects
 * the run and the other lanes stop pulling new tasks.
 */
export async function runWithConcurrency<T>(
  tasks: readonly (() => Promise<T>)[],
  limit: number,
): Promise<T[]> {
  const results = new Array<T>(tasks.length);
  const cursor = tasks.entries();
  let failed = false;

  const lane = async (): Promise<void> => {
    for (const [i, task] of cursor) {
      if (failed) return;
      try {
        results[i] = await task();
      } catch (error) {
        failed = true;
        throw error;
      }
    }
  };

  const lanes = Math.min(Math.max(1, limit), tasks.length);
  await Promise.all(Array.from({ length: lanes }, () => lane()));
  return results;
}
