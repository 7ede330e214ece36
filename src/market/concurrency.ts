import { CancelledError, MarketPipelineError } from "./errors";

export async function mapWithConcurrency<TIn, TOut>(
  items: readonly TIn[],
  concurrency: number,
  fn: (item: TIn) => Promise<TOut>
): Promise<TOut[]> {
  if (!Number.isFinite(concurrency)) {
    throw new Error(`Invalid concurrency: ${concurrency}`);
  }

  // NOTE: If you want best-effort behavior (partial progress), ensure `fn` handles
  // per-item errors internally. Unhandled rejections will fail the whole run.
  const max = Math.max(1, Math.floor(concurrency));
  const results: TOut[] = new Array(items.length);
  let nextIndex = 0;

  async function worker(): Promise<void> {
    while (true) {
      const current = nextIndex;
      nextIndex += 1;
      if (current >= items.length) {
        return;
      }

      results[current] = await fn(items[current] as TIn);
    }
  }

  await Promise.all(Array.from({ length: Math.min(max, items.length) }, () => worker()));
  return results;
}

export type Limiter = <T>(fn: () => Promise<T>) => Promise<T>;

/**
* Caps how many `fn` calls are in flight at once across independent callers.
*/
export function createLimiter(concurrency: number): Limiter {
  const max = Math.max(1, Math.floor(concurrency));
  let active = 0;
  const waiting: Array<() => void> = [];

  function release(): void {
    active -= 1;
    const next = waiting.shift();
    if (next) {
      active += 1;
      next();
    }
  }

  return async <T>(fn: () => Promise<T>): Promise<T> => {
    if (active >= max) {
      await new Promise<void>((resolve) => waiting.push(resolve));
    } else {
      active += 1;
    }

    try {
      return await fn();
    } finally {
      release();
    }
  };
}

export function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new CancelledError();
  }
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError());
      return;
    }

    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);

    function onAbort(): void {
      clearTimeout(timer);
      reject(new CancelledError());
    }

    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
* Runs `fn` with a signal that aborts after `timeoutMs` or when `parent` aborts.
* `onTimeout` builds the error thrown for an expired deadline.
*/
export async function withTimeout<T>(
  timeoutMs: number,
  parent: AbortSignal | undefined,
  onTimeout: () => Error,
  fn: (signal: AbortSignal) => Promise<T>
): Promise<T> {
  throwIfAborted(parent);

  const controller = new AbortController();
  let timedOut = false;
  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, timeoutMs);
  const forward = (): void => controller.abort();
  parent?.addEventListener("abort", forward, { once: true });

  const aborted = new Promise<never>((_, reject) => {
    controller.signal.addEventListener(
      "abort",
      () => reject(timedOut ? onTimeout() : new CancelledError()),
      { once: true }
    );
  });
  // Aborts after `fn` settles must not surface as unhandled rejections.
  aborted.catch(() => undefined);

  try {
    return await Promise.race([fn(controller.signal), aborted]);
  } finally {
    clearTimeout(timer);
    parent?.removeEventListener("abort", forward);
  }
}

export type RetryOptions = {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  signal?: AbortSignal;
  onRetry?: (info: { attempt: number; delayMs: number; error: unknown }) => void;
};

export function backoffDelayMs(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
  return Math.min(maxDelayMs, baseDelayMs * 2 ** (attempt - 1));
}

/**
* Retries only errors flagged `retryable`; everything else is rethrown at once.
* Resolves with the value and the number of attempts it took.
*/
export async function withRetry<T>(
  opts: RetryOptions,
  fn: (attempt: number) => Promise<T>
): Promise<{ value: T; attempts: number }> {
  const maxAttempts = Math.max(1, Math.floor(opts.maxAttempts));

  for (let attempt = 1; ; attempt += 1) {
    throwIfAborted(opts.signal);
    try {
      return { value: await fn(attempt), attempts: attempt };
    } catch (error) {
      const retryable = error instanceof MarketPipelineError && error.retryable;
      if (!retryable || attempt >= maxAttempts) {
        throw new RetryExhaustedError(error, attempt);
      }

      const delayMs = backoffDelayMs(attempt, opts.baseDelayMs, opts.maxDelayMs);
      opts.onRetry?.({ attempt, delayMs, error });
      await sleep(delayMs, opts.signal);
    }
  }
}

/**
* Carries the last error together with the number of attempts spent.
*/
export class RetryExhaustedError extends Error {
  readonly attempts: number;
  readonly lastError: unknown;

  constructor(lastError: unknown, attempts: number) {
    super(lastError instanceof Error ? lastError.message : String(lastError), { cause: lastError });
    this.name = "RetryExhaustedError";
    this.attempts = attempts;
    this.lastError = lastError;
  }
}
