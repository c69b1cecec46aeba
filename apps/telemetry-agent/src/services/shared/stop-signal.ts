/**
 * Shared cancellation flag for the agent's long-running loops.
 * Unlike a bare AbortSignal it can be cleared again for a restart.
 */
export class StopSignal {
  private controller = new AbortController();

  get isSet(): boolean {
    return this.controller.signal.aborted;
  }

  set(): void {
    this.controller.abort();
  }

  clear(): void {
    if (this.isSet) this.controller = new AbortController();
  }

  /**
   * Waits up to `seconds`. Resolves `true` as soon as the signal is set,
   * `false` if the full time elapsed.
   */
  wait(seconds: number): Promise<boolean> {
    const signal = this.controller.signal;
    if (signal.aborted) return Promise.resolve(true);

    return new Promise<boolean>((resolve) => {
      const onAbort = () => {
        clearTimeout(timer);
        resolve(true);
      };
      const timer = setTimeout(() => {
        signal.removeEventListener('abort', onAbort);
        resolve(false);
      }, Math.max(0, seconds * 1_000));
      signal.addEventListener('abort', onAbort, { once: true });
    });
  }
}

/** Resolves `true` if `task` settled within `seconds`. Never rejects. */
export async function settlesWithin(task: Promise<unknown>, seconds: number): Promise<boolean> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<false>((resolve) => {
    timer = setTimeout(() => resolve(false), seconds * 1_000);
  });
  const settled = task.then(
    () => true as const,
    () => true as const,
  );
  try {
    return await Promise.race([settled, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
