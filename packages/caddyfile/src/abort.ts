/**
 * A signal that fires when the caller aborts or when `timeoutMs` elapses,
 * whichever comes first. Call `dispose()` once the guarded work settles: it
 * clears the timer and detaches from the caller's signal.
 */
export type Deadline = {
  signal: AbortSignal;
  timedOut: () => boolean;
  dispose: () => void;
};

export function deadline(timeoutMs: number, callerSignal?: AbortSignal): Deadline {
  const controller = new AbortController();
  let expired = false;

  const timer = setTimeout(() => {
    expired = true;
    controller.abort(new Error(`timed out after ${timeoutMs}ms`));
  }, timeoutMs);
  const onCaller = () => controller.abort(callerSignal?.reason);

  if (callerSignal?.aborted) controller.abort(callerSignal.reason);
  callerSignal?.addEventListener("abort", onCaller, { once: true });

  return {
    signal: controller.signal,
    timedOut: () => expired && !callerSignal?.aborted,
    dispose: () => {
      clearTimeout(timer);
      callerSignal?.removeEventListener("abort", onCaller);
    },
  };
}

/**
 * Settle with `work`, or reject with the signal's reason as soon as it
 * aborts. Used for response bodies, which a custom `fetch` may not tie to
 * the request signal.
 */
export function untilAborted<T>(signal: AbortSignal, work: Promise<T>): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    work.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(err);
      },
    );
    if (signal.aborted) onAbort();
    else signal.addEventListener("abort", onAbort, { once: true });
  });
}
