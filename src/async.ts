/**
 * Concurrency, deadline and retry helpers shared by the embedder, the loader
 * and the answer generator.
 */
import { CancelledError, TimeoutError } from "./errors";

/** Throw a {@link CancelledError} (or the signal's own Error reason) if aborted. */
export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) throw abortReason(signal);
}

function abortReason(signal: AbortSignal): Error {
  const reason: unknown = signal.reason;
  if (reason instanceof Error && reason.name !== "AbortError") return reason;
  return new CancelledError();
}

/**
 * Simple semaphore for controlling concurrency
 */
export class Semaphore {
  private permits: number;
  private waiting: Array<() => void> = [];

  constructor(permits: number) {
    this.permits = Math.max(1, Math.floor(permits));
  }

  async run<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }

  private acquire(): Promise<void> {
    if (this.permits > 0) {
      this.permits--;
      return Promise.resolve();
    }
    return new Promise((resolve) => this.waiting.push(resolve));
  }

  private release(): void {
    const next = this.waiting.shift();
    // Hand the permit straight to the next waiter.
    if (next) next();
    else this.permits++;
  }
}

/**
 * Map `items` through `fn` with at most `limit` calls in flight. Results are
 * aligned with the inputs regardless of completion order. Each call gets a
 * signal that aborts when `signal` does or when any other call fails, so work
 * still in flight stops once the map has rejected.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number, signal: AbortSignal) => Promise<R>,
  signal?: AbortSignal,
): Promise<R[]> {
  throwIfAborted(signal);
  const controller = new AbortController();
  const onParentAbort = () => controller.abort(signal ? abortReason(signal) : undefined);
  signal?.addEventListener("abort", onParentAbort, { once: true });

  const semaphore = new Semaphore(limit);
  const results = new Array<R>(items.length);
  try {
    await Promise.all(
      items.map((item, index) =>
        semaphore.run(async () => {
          throwIfAborted(controller.signal);
          try {
            results[index] = await fn(item, index, controller.signal);
          } catch (e) {
            if (!controller.signal.aborted) {
              controller.abort(new CancelledError("Cancelled after a concurrent task failed"));
            }
            throw e;
          }
        }),
      ),
    );
  } finally {
    signal?.removeEventListener("abort", onParentAbort);
  }
  return results;
}

/**
 * Run `fn` with a deadline. The signal handed to `fn` aborts when the deadline
 * passes or when `parent` aborts; the returned promise then rejects with a
 * {@link TimeoutError} or the cancellation error without waiting for `fn`.
 */
export async function withTimeout<T>(
  timeoutMs: number,
  operation: string,
  fn: (signal: AbortSignal) => Promise<T>,
  parent?: AbortSignal,
): Promise<T> {
  throwIfAborted(parent);
  const controller = new AbortController();
  const onParentAbort = () => controller.abort(parent ? abortReason(parent) : undefined);
  parent?.addEventListener("abort", onParentAbort, { once: true });

  const aborted = new Promise<never>((_, reject) => {
    controller.signal.addEventListener("abort", () => reject(abortReason(controller.signal)), {
      once: true,
    });
  });
  const timer = setTimeout(
    () => controller.abort(new TimeoutError(operation, timeoutMs)),
    timeoutMs,
  );
  try {
    return await Promise.race([fn(controller.signal), aborted]);
  } finally {
    clearTimeout(timer);
    parent?.removeEventListener("abort", onParentAbort);
  }
}

/** Resolve after `ms`, or reject early if `signal` aborts. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortReason(signal));
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      if (signal) reject(abortReason(signal));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

export interface RetryOptions {
  /** Extra attempts after the first one. */
  retries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** Only errors classified transient are retried. */
  isTransient: (error: unknown) => boolean;
  signal?: AbortSignal;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

/** Delay before retry number `attempt` (0-based): base * 2^attempt, capped. */
export function backoffDelay(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
  return Math.min(maxDelayMs, baseDelayMs * 2 ** attempt);
}

/**
 * Call `fn` until it succeeds, a non-transient error is thrown, or the retry
 * budget is spent; the last error is rethrown unchanged.
 */
export async function retry<T>(fn: (attempt: number) => Promise<T>, opts: RetryOptions): Promise<T> {
  for (let attempt = 0; ; attempt++) {
    throwIfAborted(opts.signal);
    try {
      return await fn(attempt);
    } catch (e) {
      if (attempt >= opts.retries || !opts.isTransient(e)) throw e;
      const delay = backoffDelay(attempt, opts.baseDelayMs, opts.maxDelayMs);
      opts.onRetry?.(e, attempt + 1, delay);
      await sleep(delay, opts.signal);
    }
  }
}
