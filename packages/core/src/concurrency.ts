/**
 * A unit of work that stops when `signal` aborts
 */
export type AbortableTask<T> = (signal: AbortSignal) => Promise<T>

function abortReason(signal: AbortSignal): unknown {
  return signal.reason ?? new Error('Aborted')
}

/**
 * Run tasks with a concurrency limit.
 *
 * Results keep task order regardless of completion order. The first rejection
 * aborts the shared signal, workers stop pulling tasks and the pool rejects
 * with that error once in-flight tasks settle. Aborting `parent` has the same
 * effect with the parent's reason.
 */
export async function runConcurrent<T>(
  tasks: readonly AbortableTask<T>[],
  limit: number,
  parent?: AbortSignal,
): Promise<T[]> {
  if (parent?.aborted)
    throw abortReason(parent)

  const controller = new AbortController()
  const onParentAbort = (): void => controller.abort(parent ? abortReason(parent) : undefined)
  parent?.addEventListener('abort', onParentAbort, { once: true })

  const results: T[] = new Array<T>(tasks.length)
  const state: { failure?: { error: unknown } } = {}
  let i = 0

  async function worker(): Promise<void> {
    while (i < tasks.length && !controller.signal.aborted) {
      const idx = i++
      const task = tasks[idx]
      if (!task)
        continue
      try {
        results[idx] = await task(controller.signal)
      }
      catch (error) {
        if (!state.failure) {
          state.failure = { error }
          controller.abort(error)
        }
        return
      }
    }
  }

  try {
    const workers = Math.max(1, Math.min(limit, tasks.length))
    await Promise.all(Array.from({ length: workers }, worker))
  }
  finally {
    parent?.removeEventListener('abort', onParentAbort)
  }

  if (state.failure)
    throw state.failure.error
  if (controller.signal.aborted)
    throw abortReason(controller.signal)
  return results
}
