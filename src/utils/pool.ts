export type ProgressCallback = (completed: number, total: number) => void;

/**
 * Run tasks with at most `workers` in flight. Results keep task order.
 * A rejecting task rejects the whole run; callers that need per-task isolation
 * catch inside the task.
 */
export async function runWithConcurrency<T>(
  tasks: Array<() => Promise<T>>,
  workers: number,
  onProgress?: ProgressCallback,
): Promise<T[]> {
  if (tasks.length === 0) return [];
  const concurrency = Math.max(1, Math.min(tasks.length, Math.floor(workers)));
  const results = new Array<T>(tasks.length);
  let completed = 0;
  let nextIndex = 0;

  const worker = async (): Promise<void> => {
    while (nextIndex < tasks.length) {
      const current = nextIndex;
      nextIndex += 1;
      const task = tasks[current];
      if (!task) continue;
      try {
        results[current] = await task();
      } finally {
        completed += 1;
        onProgress?.(completed, tasks.length);
      }
    }
  };

  await Promise.all(Array.from({ length: concurrency }, () => worker()));
  return results;
}
