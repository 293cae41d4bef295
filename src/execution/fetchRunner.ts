import { safeEmit } from "../utils/events";
import { CODES, codeOf, isAppError, messageOf, timeout, toolExecutionFailed, argumentResolutionFailed } from "../utils/errors";
import type { ErrorCode } from "../utils/errors";
import type { Logger } from "../utils/logger";
import type { EventSink } from "../types/orchestrator";
import type { ErrorRecord, FetchResult, ToolCall } from "../types/state";
import type { PipelineConfig } from "../orchestrator/context";
import type { PreparedCall, ToolRegistry } from "../tools/registry";
import { executeWithPolicy, exponentialBackoff, linkedController, type RetryPolicy } from "./policy";
import { resolveArguments, type ArgumentResolverDeps } from "./argumentResolver";
import { truncatePayload } from "./truncate";

export type FetchConfig = Pick<
  PipelineConfig,
  | "maxToolCallAttempts"
  | "perCallTimeoutMs"
  | "aggregateFetchTimeoutMs"
  | "truncationByteBudget"
  | "backoffBaseMs"
  | "backoffMaxMs"
  | "maxConcurrentCalls"
>;

export type FetchErrorRecord = Omit<ErrorRecord, "stage">;

export type FetchOutcome = {
  /** One entry per planned call, in plan order. Incomplete when `cancelled`. */
  results: FetchResult[];
  errors: FetchErrorRecord[];
  cancelled: boolean;
  aggregateTimedOut: boolean;
};

type Slot = { result: FetchResult; errors: FetchErrorRecord[] };

function errorCode(err: unknown, fallback: ErrorCode): ErrorCode {
  return isAppError(err) ? codeOf(err) : fallback;
}

function whenAborted(signal: AbortSignal): { promise: Promise<void>; dispose: () => void } {
  let onAbort: () => void = () => {};
  const promise = new Promise<void>((resolve) => {
    onAbort = () => resolve();
    if (signal.aborted) resolve();
    else signal.addEventListener("abort", onAbort, { once: true });
  });
  return { promise, dispose: () => signal.removeEventListener("abort", onAbort) };
}

/**
 * Runs every planned call with bounded concurrency. Each call resolves its
 * arguments, runs under the retry policy and writes only its own slot. The
 * stage ends when all calls are terminal, when the aggregate deadline fires
 * (outstanding calls become timed_out) or when the turn is cancelled.
 */
export async function fetchRunner(params: {
  plan: readonly ToolCall[];
  registry: ToolRegistry;
  resolver: ArgumentResolverDeps;
  config: FetchConfig;
  signal?: AbortSignal;
  onEvent?: EventSink;
  logger?: Logger;
}): Promise<FetchOutcome> {
  const { plan, registry, resolver, config, signal, onEvent, logger } = params;
  const started = Date.now();
  safeEmit(onEvent, { type: "fetch:start", detail: { calls: plan.length } }, logger);

  const slots = Array.from({ length: plan.length }, (): Slot | undefined => undefined);
  const { controller, dispose } = linkedController(signal);
  const stageSignal = controller.signal;
  let closed = false;
  let aggregateTimedOut = false;

  const policy: RetryPolicy = {
    maxAttempts: config.maxToolCallAttempts,
    perCallTimeoutMs: config.perCallTimeoutMs,
    backoff: exponentialBackoff(config.backoffBaseMs, config.backoffMaxMs),
  };

  const settle = (index: number, slot: Slot) => {
    if (closed) return;
    slots[index] = slot;
    const r = slot.result;
    safeEmit(
      onEvent,
      { type: "fetch:call:done", detail: { tool: r.toolName, status: r.status, attempts: r.attempts, truncated: r.truncated } },
      logger
    );
  };

  const prepare = async (call: ToolCall): Promise<PreparedCall> => {
    const tool = registry.get(call.name);
    if (!tool) throw argumentResolutionFailed(`Unknown tool: ${call.name}`);
    return resolveArguments(tool, call.rawArgsSpec, resolver, stageSignal);
  };

  const runCall = async (index: number): Promise<void> => {
    const call = plan[index];
    let prepared: PreparedCall;
    try {
      prepared = await prepare(call);
    } catch (e) {
      if (stageSignal.aborted) return;
      logger?.warn(`[fetch] ${call.name} arguments rejected`, e);
      settle(index, {
        result: { toolName: call.name, status: "failed", payload: "", truncated: false, attempts: 0, error: messageOf(e) },
        errors: [{ code: errorCode(e, CODES.argument_resolution_failed), message: messageOf(e), toolName: call.name }],
      });
      return;
    }

    const outcome = await executeWithPolicy(
      async ({ signal: attemptSignal }) => {
        try {
          return await prepared.execute({ signal: attemptSignal });
        } catch (e) {
          if (attemptSignal.aborted) throw e;
          throw isAppError(e) ? e : toolExecutionFailed(e);
        }
      },
      policy,
      {
        signal: stageSignal,
        onRetry: ({ attempt, error, delayMs, timedOut }) => {
          logger?.warn(`[fetch] ${call.name} attempt ${attempt} ${timedOut ? "timed out" : "failed"}; retry in ${delayMs}ms`, error);
          safeEmit(onEvent, { type: "fetch:call:retry", detail: { tool: call.name, attempt: attempt + 1, timedOut } }, logger);
        },
      }
    );
    if (outcome.status === "cancelled") return;

    const errors: FetchErrorRecord[] = outcome.errors.map((err, i) => ({
      code: errorCode(err, CODES.tool_execution_failed),
      message: messageOf(err),
      toolName: call.name,
      attempt: i + 1,
    }));
    const args = prepared.args;
    if (outcome.status === "ok") {
      const { payload, truncated, bytes } = truncatePayload(outcome.value, config.truncationByteBudget);
      if (truncated) logger?.info(`[fetch] ${call.name} payload truncated to ${bytes} bytes`);
      settle(index, {
        result: { toolName: call.name, status: "ok", payload, truncated, attempts: outcome.attempts, args },
        errors,
      });
      return;
    }
    settle(index, {
      result: {
        toolName: call.name,
        status: outcome.status,
        payload: "",
        truncated: false,
        attempts: outcome.attempts,
        args,
        error: messageOf(outcome.error),
      },
      errors,
    });
  };

  const guarded = async (index: number) => {
    try {
      await runCall(index);
    } catch (e) {
      // runCall settles every expected failure itself; anything here is a defect
      logger?.error(`[fetch] ${plan[index].name} crashed`, e);
      settle(index, {
        result: { toolName: plan[index].name, status: "failed", payload: "", truncated: false, attempts: 0, error: messageOf(e) },
        errors: [{ code: CODES.internal, message: messageOf(e), toolName: plan[index].name }],
      });
    }
  };

  let cursor = 0;
  const worker = async () => {
    while (!stageSignal.aborted && cursor < plan.length) {
      const index = cursor++;
      await guarded(index);
    }
  };

  const deadline = setTimeout(() => {
    aggregateTimedOut = true;
    controller.abort(timeout(`aggregate fetch timeout after ${config.aggregateFetchTimeoutMs}ms`));
  }, config.aggregateFetchTimeoutMs);
  const aborted = whenAborted(stageSignal);
  const workers = Array.from({ length: Math.min(config.maxConcurrentCalls, plan.length) }, () => worker());

  try {
    await Promise.race([Promise.all(workers), aborted.promise]);
  } finally {
    closed = true;
    clearTimeout(deadline);
    aborted.dispose();
    dispose();
  }

  const cancelled = Boolean(signal?.aborted);
  if (cancelled) {
    logger?.info(`[fetch] cancelled after ${Date.now() - started}ms`);
    const done = slots.filter((s): s is Slot => s !== undefined);
    return {
      results: done.map((s) => s.result),
      errors: done.flatMap((s) => s.errors),
      cancelled: true,
      aggregateTimedOut: false,
    };
  }

  const pending = slots.filter((s) => s === undefined).length;
  if (aggregateTimedOut && pending > 0) {
    safeEmit(onEvent, { type: "fetch:timeout", detail: { pending } }, logger);
  }
  const filled: Slot[] = slots.map(
    (slot, i) =>
      slot ?? {
        result: {
          toolName: plan[i].name,
          status: "timed_out",
          payload: "",
          truncated: false,
          attempts: 0,
          error: "aggregate fetch timeout",
        },
        errors: [{ code: CODES.timeout, message: "aggregate fetch timeout", toolName: plan[i].name }],
      }
  );
  const results = filled.map((s) => s.result);
  safeEmit(
    onEvent,
    {
      type: "fetch:done",
      detail: { ok: results.filter((r) => r.status === "ok").length, total: results.length, durationMs: Date.now() - started },
    },
    logger
  );
  return { results, errors: filled.flatMap((s) => s.errors), cancelled: false, aggregateTimedOut };
}
