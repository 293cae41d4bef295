import { isAppError, timeout, CODES } from "../utils/errors";

export type RetryPolicy = {
  maxAttempts: number;
  /** Upper bound for a single attempt; no bound when omitted. */
  perCallTimeoutMs?: number;
  /** Delay before attempt `attempt + 1`, given the 1-based attempt that just failed. */
  backoff: (attempt: number) => number;
};

export function exponentialBackoff(baseMs: number, maxMs: number): (attempt: number) => number {
  return (attempt) => Math.min(maxMs, baseMs * 2 ** Math.max(0, attempt - 1));
}

export type AttemptContext = { attempt: number; signal: AbortSignal };

export type PolicyOutcome<T> =
  | { status: "ok"; value: T; errors: unknown[]; attempts: number }
  | { status: "failed"; error: unknown; errors: unknown[]; attempts: number }
  | { status: "timed_out"; error: unknown; errors: unknown[]; attempts: number }
  | { status: "cancelled"; errors: unknown[]; attempts: number };

export type RetryInfo = { attempt: number; error: unknown; delayMs: number; timedOut: boolean };

export type ExecuteOptions = {
  /** Parent signal; once aborted no further attempt starts and the running one is abandoned. */
  signal?: AbortSignal;
  /** Errors that are not worth another attempt. Timeouts are always retried. */
  isRetryable?: (err: unknown) => boolean;
  onRetry?: (info: RetryInfo) => void;
};

/** Settles with `promise`, or rejects with the signal's reason as soon as it aborts. */
export function raceAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    if (signal.aborted) onAbort();
    else signal.addEventListener("abort", onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (err) => {
        signal.removeEventListener("abort", onAbort);
        reject(err);
      }
    );
  });
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => {
      clearTimeout(handle);
      reject(signal?.reason);
    };
    const handle = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/** A child controller that aborts with its parent. */
export function linkedController(parent?: AbortSignal): { controller: AbortController; dispose: () => void } {
  const controller = new AbortController();
  if (!parent) return { controller, dispose: () => {} };
  const onAbort = () => controller.abort(parent.reason);
  if (parent.aborted) onAbort();
  else parent.addEventListener("abort", onAbort, { once: true });
  return { controller, dispose: () => parent.removeEventListener("abort", onAbort) };
}

async function runAttempt<T>(
  task: (ctx: AttemptContext) => Promise<T>,
  attempt: number,
  policy: RetryPolicy,
  parent?: AbortSignal
): Promise<T> {
  const { controller, dispose } = linkedController(parent);
  let timer: ReturnType<typeof setTimeout> | undefined;
  if (policy.perCallTimeoutMs !== undefined) {
    const limit = policy.perCallTimeoutMs;
    timer = setTimeout(() => controller.abort(timeout(`attempt ${attempt} exceeded ${limit}ms`)), limit);
  }
  try {
    return await raceAbort(task({ attempt, signal: controller.signal }), controller.signal);
  } finally {
    if (timer) clearTimeout(timer);
    dispose();
  }
}

/**
 * Runs `task` under a retry policy: bounded attempts, a per-attempt timeout
 * and backoff between attempts. The outcome reflects the final attempt.
 */
export async function executeWithPolicy<T>(
  task: (ctx: AttemptContext) => Promise<T>,
  policy: RetryPolicy,
  opts: ExecuteOptions = {}
): Promise<PolicyOutcome<T>> {
  const { signal, isRetryable = () => true, onRetry } = opts;
  const errors: unknown[] = [];
  const maxAttempts = Math.max(1, policy.maxAttempts);

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    if (signal?.aborted) {
      return { status: "cancelled", errors, attempts: attempt - 1 };
    }
    try {
      const value = await runAttempt(task, attempt, policy, signal);
      return { status: "ok", value, errors, attempts: attempt };
    } catch (err) {
      if (signal?.aborted) {
        return { status: "cancelled", errors, attempts: attempt };
      }
      errors.push(err);
      const timedOut = isAppError(err, CODES.timeout);
      const last = attempt >= maxAttempts;
      if (last || (!timedOut && !isRetryable(err))) {
        return timedOut
          ? { status: "timed_out", error: err, errors, attempts: attempt }
          : { status: "failed", error: err, errors, attempts: attempt };
      }
      const delayMs = policy.backoff(attempt);
      onRetry?.({ attempt, error: err, delayMs, timedOut });
      if (delayMs > 0) {
        try {
          await sleep(delayMs, signal);
        } catch {
          return { status: "cancelled", errors, attempts: attempt };
        }
      }
    }
  }
  return { status: "failed", error: errors[errors.length - 1], errors, attempts: maxAttempts };
}
