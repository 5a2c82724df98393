/**
 * Deadline and cancellation helpers shared by the broker and the agents
 */

export class DeadlineExceeded extends Error {
  readonly label: string;
  readonly ms: number;

  constructor(label: string, ms: number) {
    super(`Timeout: ${label} exceeded ${ms}ms`);
    this.name = 'DeadlineExceeded';
    this.label = label;
    this.ms = ms;
  }
}

export class Cancelled extends Error {
  constructor(label: string) {
    super(`Cancelled: ${label}`);
    this.name = 'Cancelled';
  }
}

/**
 * Run `fn` with its own abort signal that fires when `ms` elapses or the
 * parent signal aborts. The returned promise settles at the deadline even
 * if `fn` ignores its signal.
 */
export function withDeadline<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  ms: number,
  label: string,
  parent?: AbortSignal
): Promise<T> {
  const controller = new AbortController();

  return new Promise<T>((resolve, reject) => {
    if (parent?.aborted) {
      reject(new Cancelled(label));
      return;
    }

    let settled = false;
    const finish = (): void => {
      settled = true;
      clearTimeout(timer);
      parent?.removeEventListener('abort', onParentAbort);
    };

    const onParentAbort = (): void => {
      if (settled) return;
      finish();
      const error = new Cancelled(label);
      controller.abort(error);
      reject(error);
    };

    const timer = setTimeout(() => {
      if (settled) return;
      finish();
      const error = new DeadlineExceeded(label, ms);
      controller.abort(error);
      reject(error);
    }, ms);

    parent?.addEventListener('abort', onParentAbort, { once: true });

    fn(controller.signal).then(
      (value) => {
        if (settled) return;
        finish();
        resolve(value);
      },
      (error: unknown) => {
        if (settled) return;
        finish();
        reject(error);
      }
    );
  });
}

/**
 * Milliseconds left before an absolute deadline, clamped to `fallback`
 */
export function remainingBudget(deadline: number | undefined, fallback: number): number {
  if (deadline === undefined) {
    return fallback;
  }
  return Math.max(0, Math.min(fallback, deadline - Date.now()));
}

/**
 * Run `fn` with the caller's signal and reject with Cancelled as soon as the
 * signal aborts, whether or not `fn` honours it
 */
export function untilAborted<T>(fn: (signal: AbortSignal) => Promise<T>, signal: AbortSignal, label: string): Promise<T> {
  if (signal.aborted) {
    return Promise.reject(new Cancelled(label));
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => {
      reject(new Cancelled(label));
    };
    signal.addEventListener('abort', onAbort, { once: true });

    fn(signal).then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}
