/**
 * Run `task` with an AbortSignal that fires after `timeoutMs`.
 * Rejects with the error produced by `onTimeout` if the task has not settled by then.
 */
export async function withTimeout<T>(
  task: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  onTimeout: () => Error
): Promise<T> {
  const controller = new AbortController()
  let timer: ReturnType<typeof setTimeout> | undefined

  const expired = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      // Reject first so the timeout wins over whatever the aborted task throws
      reject(onTimeout())
      controller.abort()
    }, timeoutMs)
  })

  try {
    return await Promise.race([task(controller.signal), expired])
  } finally {
    clearTimeout(timer)
  }
}
