import { argumentResolutionFailed, isAppError, CODES } from "../utils/errors";
import type { GenerationClient } from "../types/generation";
import type { ModelSettings } from "../config/modelResolver";
import type { Logger } from "../utils/logger";
import type { PreparedCall, RegisteredTool } from "../tools/registry";
import { formatDate, resolvePeriod } from "./timeRange";
import { executeWithPolicy } from "./policy";

export type ArgumentResolverDeps = {
  generation: GenerationClient;
  prompt: string;
  model: string;
  modelSettings?: ModelSettings;
  /** Bound on the model call; unbounded when omitted. */
  timeoutMs?: number;
  now: () => Date;
  logger?: Logger;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Replaces a `period` phrase with concrete startDate/endDate; undefined when there is nothing to resolve. */
export function expandPeriod(raw: Readonly<Record<string, unknown>>, now: Date): Record<string, unknown> | undefined {
  const { period, ...rest } = raw;
  if (typeof period !== "string" || !period.trim()) return undefined;
  const resolved = resolvePeriod(period, now);
  if (!resolved) return undefined;
  return { ...rest, ...resolved };
}

/**
 * Turns the planner's raw arguments into a validated call. Order: the raw
 * arguments as given, then a deterministic `period` expansion, then one
 * structured-generation request. Throws argument_resolution_failed when none
 * validates; aborts propagate as the signal's reason.
 */
export async function resolveArguments(
  tool: RegisteredTool,
  rawArgs: Readonly<Record<string, unknown>>,
  deps: ArgumentResolverDeps,
  signal?: AbortSignal
): Promise<PreparedCall> {
  const direct = tool.prepare(rawArgs);
  if (direct.ok) return direct.call;

  const now = deps.now();
  const expanded = expandPeriod(rawArgs, now);
  let lastError = direct.error;
  if (expanded) {
    const retried = tool.prepare(expanded);
    if (retried.ok) {
      deps.logger?.info(`[args] ${tool.name} period resolved`, expanded);
      return retried.call;
    }
    lastError = retried.error;
  }

  let generated: unknown;
  try {
    const outcome = await executeWithPolicy(
      ({ signal: attemptSignal }) =>
        deps.generation.generateStructured<unknown>({
          name: "argument-resolver",
          prompt: deps.prompt,
          message: `Resolve arguments for ${tool.name}.`,
          context: {
            CURRENT_DATE: formatDate(now),
            TOOL_JSON: tool.describe(),
            RAW_ARGS_JSON: expanded ?? rawArgs,
            VALIDATION_ERROR: lastError,
          },
          model: deps.model,
          modelSettings: deps.modelSettings,
          schema: tool.parameters,
          signal: attemptSignal,
        }),
      { maxAttempts: 1, perCallTimeoutMs: deps.timeoutMs, backoff: () => 0 },
      { signal }
    );
    if (outcome.status === "cancelled") throw signal?.reason;
    if (outcome.status !== "ok") throw outcome.error;
    const res = outcome.value;
    if (!res.ok) {
      throw argumentResolutionFailed(`${tool.name}: ${res.error}`, { details: { rawArgs } });
    }
    generated = res.value;
  } catch (e) {
    if (signal?.aborted || isAppError(e, CODES.argument_resolution_failed)) throw e;
    throw argumentResolutionFailed(`${tool.name}: arguments could not be generated`, { cause: e, details: { rawArgs } });
  }

  const final = tool.prepare(isRecord(generated) ? generated : {});
  if (!final.ok) {
    throw argumentResolutionFailed(`${tool.name}: ${final.error}`, { details: { rawArgs, generated } });
  }
  return final.call;
}
