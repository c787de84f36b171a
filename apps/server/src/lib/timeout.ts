/**
 * Runs `task` with an abort signal that fires after `ms`. The returned promise
 * rejects with `onTimeout()` as soon as the deadline passes, whether or not the
 * task honours the signal.
 */
export async function withTimeout<T>(
  task: (signal: AbortSignal) => Promise<T>,
  ms: number,
  onTimeout: () => Error
): Promise<T> {
  const ctrl = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(onTimeout());
      ctrl.abort();
    }, ms);
  });
  try {
    return await Promise.race([task(ctrl.signal), deadline]);
  } finally {
    clearTimeout(timer);
  }
}
