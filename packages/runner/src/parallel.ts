export type ParallelTask<T = void> = (signal: AbortSignal) => Promise<T>;

/**
 * Runs every task concurrently under one shared signal.
 *
 * The first failure aborts the shared signal (its reason is that error) and
 * is what rejects; the call still waits for every task to settle, so nothing
 * is left pending. Aborting `parent` aborts the shared signal too.
 */
export async function runParallel<T>(tasks: readonly ParallelTask<T>[], parent?: AbortSignal): Promise<T[]> {
  const controller = new AbortController();
  const onParentAbort = (): void => {
    if (parent) controller.abort(parent.reason);
  };
  if (parent?.aborted) controller.abort(parent.reason);
  else parent?.addEventListener('abort', onParentAbort, { once: true });

  const failure: { failed: boolean; error: unknown } = { failed: false, error: undefined };
  try {
    const settled = await Promise.allSettled(
      tasks.map(async (task) => {
        try {
          return await task(controller.signal);
        } catch (err) {
          if (!failure.failed) {
            failure.failed = true;
            failure.error = err;
            controller.abort(err);
          }
          throw err;
        }
      }),
    );

    if (failure.failed) throw failure.error;
    const values: T[] = [];
    for (const outcome of settled) {
      if (outcome.status === 'fulfilled') values.push(outcome.value);
    }
    return values;
  } finally {
    parent?.removeEventListener('abort', onParentAbort);
  }
}
