export const MAX_WORKERS = 16

/**
 * Runs tasks on a fixed number of workers, keeping result order.
 * `onProgress` fires after every task, successful or not.
 */
export async function runWithConcurrency<T>(
  tasks: Array<() => Promise<T>>,
  workers: number,
  onProgress?: ((completed: number, total: number) => void) | null
): Promise<T[]> {
  if (tasks.length === 0) return []
  const concurrency = Math.max(1, Math.min(MAX_WORKERS, Math.round(workers)))
  const results: T[] = new Array(tasks.length)
  const total = tasks.length
  let completed = 0
  let nextIndex = 0

  const worker = async () => {
    while (true) {
      const current = nextIndex
      if (current >= tasks.length) return
      nextIndex += 1
      try {
        results[current] = await tasks[current]()
      } finally {
        completed += 1
        onProgress?.(completed, total)
      }
    }
  }

  const runners = Array.from({ length: Math.min(concurrency, tasks.length) }, () => worker())
  await Promise.all(runners)
  return results
}
