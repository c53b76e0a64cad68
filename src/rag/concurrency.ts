import pLimit, { type LimitFunction } from "p-limit";
import pRetry, { AbortError, type FailedAttemptError } from "p-retry";
import type { Logger } from "pino";
import { ProviderHttpError } from "./errors.js";

export type { LimitFunction };

export function createWorkerPool(concurrency: number): LimitFunction {
  return pLimit(Math.max(1, concurrency));
}

/**
 * Serializes tasks per key; tasks on different keys run freely.
 * Queues are dropped once they drain.
 */
export class KeyedMutex {
  private readonly queues = new Map<string, LimitFunction>();

  async run<T>(key: string, task: () => Promise<T>): Promise<T> {
    let queue = this.queues.get(key);
    if (!queue) {
      queue = pLimit(1);
      this.queues.set(key, queue);
    }
    const current = queue;
    try {
      return await current(task);
    } finally {
      if (current.activeCount === 0 && current.pendingCount === 0) {
        this.queues.delete(key);
      }
    }
  }

  get activeKeys(): number {
    return this.queues.size;
  }
}

interface Flight<V> {
  promise: Promise<V>;
  controller: AbortController;
  waiters: number;
}

/**
 * At most one computation per key. Late callers join the running one.
 * A caller that aborts only detaches; the computation is aborted once
 * every caller has gone.
 */
export class SingleFlight<V> {
  private readonly flights = new Map<string, Flight<V>>();

  async do(
    key: string,
    compute: (signal: AbortSignal) => Promise<V>,
    signal?: AbortSignal,
  ): Promise<{ value: V; shared: boolean }> {
    signal?.throwIfAborted();

    let flight = this.flights.get(key);
    const shared = flight !== undefined;
    if (!flight) {
      const controller = new AbortController();
      const created: Flight<V> = {
        controller,
        waiters: 0,
        promise: Promise.resolve()
          .then(() => compute(controller.signal))
          .finally(() => {
            if (this.flights.get(key) === created) this.flights.delete(key);
          }),
      };
      // Waiters observe the rejection.
      created.promise.catch(() => undefined);
      this.flights.set(key, created);
      flight = created;
    }

    flight.waiters++;
    try {
      const value = await raceAbort(flight.promise, signal);
      return { value, shared };
    } finally {
      flight.waiters--;
      if (flight.waiters === 0 && signal?.aborted) {
        if (this.flights.get(key) === flight) this.flights.delete(key);
        flight.controller.abort(signal.reason);
      }
    }
  }

  get inFlight(): number {
    return this.flights.size;
  }
}

export function raceAbort<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return promise;
  if (signal.aborted) return Promise.reject(signal.reason);

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    signal.addEventListener("abort", onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      },
    );
  });
}

/** Caller signal combined with a per-call timeout. */
export function callSignal(timeoutMs: number, signal?: AbortSignal): AbortSignal {
  const timeout = AbortSignal.timeout(timeoutMs);
  return signal ? AbortSignal.any([signal, timeout]) : timeout;
}

export interface RetryPolicy {
  retries: number;
  minTimeoutMs: number;
  maxTimeoutMs: number;
}

interface RetryOptions extends RetryPolicy {
  label: string;
  signal?: AbortSignal;
  logger?: Logger;
}

/**
 * Exponential backoff around an external call. Client errors (4xx other than
 * 408/429) and caller cancellation are not retried.
 */
export function withRetry<T>(task: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
  return pRetry(
    async (attempt) => {
      try {
        return await task(attempt);
      } catch (error) {
        if (options.signal?.aborted) throw new AbortError(abortReason(options.signal));
        if (error instanceof ProviderHttpError && !error.retryable) throw new AbortError(error);
        throw error;
      }
    },
    {
      retries: options.retries,
      minTimeout: options.minTimeoutMs,
      maxTimeout: options.maxTimeoutMs,
      factor: 2,
      signal: options.signal,
      onFailedAttempt: (error: FailedAttemptError) => {
        options.logger?.warn(
          {
            attemptNumber: error.attemptNumber,
            retriesLeft: error.retriesLeft,
            error: error.message,
          },
          `${options.label} failed attempt`,
        );
      },
    },
  );
}

function abortReason(signal: AbortSignal): Error {
  const reason: unknown = signal.reason;
  return reason instanceof Error ? reason : new Error("The operation was aborted");
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === "AbortError" || error.name === "TimeoutError");
}
