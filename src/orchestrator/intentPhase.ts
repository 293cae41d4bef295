import type { EventSink } from "../types/orchestrator";
import type { GenerationClient } from "../types/generation";
import type { Logger } from "../utils/logger";
import type { PipelineConfig } from "./context";
import type { ToolRegistry } from "../tools/registry";
import { safeEmit } from "../utils/events";
import { GenerationUnavailableError, parseFailed, messageOf, isAppError, CODES, type ErrorCode } from "../utils/errors";
import { buildIntentPlanSchema, type IntentPlan } from "../planning/schemas";
import { executeWithPolicy, exponentialBackoff } from "../execution/policy";
import { formatDate } from "../execution/timeRange";
import { downgradeIntent, recentHistory, withError, withIntent, type AgentState, type ToolCall } from "../types/state";

export type IntentPhaseConfig = Pick<
  PipelineConfig,
  | "maxIntentParseRetries"
  | "maxPlannedCalls"
  | "historyTurns"
  | "backoffBaseMs"
  | "backoffMaxMs"
  | "generationTimeoutMs"
  | "modelIdentifierForStructuredGen"
  | "structuredModelSettings"
>;

export type IntentPhaseResult =
  | { kind: "parsed"; state: AgentState }
  | { kind: "failed"; state: AgentState; error: GenerationUnavailableError }
  | { kind: "cancelled"; state: AgentState };

function attemptCode(err: unknown): ErrorCode {
  if (err instanceof GenerationUnavailableError) return CODES.generation_unavailable;
  return isAppError(err, CODES.timeout) ? CODES.timeout : CODES.parse_failed;
}

function toToolPlan(plan: IntentPlan): ToolCall[] {
  return plan.tool_plan.map((c) => ({ name: c.tool_name, rawArgsSpec: c.args, reasoning: c.reasoning }));
}

/** Applies a validated plan; `other` never carries calls and a data intent without calls falls back to `other`. */
export function applyIntentPlan(state: AgentState, plan: IntentPlan): AgentState {
  const notes = { reasoning: plan.reasoning, analysisFocus: plan.analysis_focus };
  if (plan.intent === "other") {
    return { ...withIntent(state, "other", notes), toolPlan: [] };
  }
  const toolPlan = toToolPlan(plan);
  const next = withIntent(state, plan.intent, notes);
  return toolPlan.length === 0 ? downgradeIntent(next) : { ...next, toolPlan };
}

export async function intentPhase(params: {
  state: AgentState;
  registry: ToolRegistry;
  generation: GenerationClient;
  prompt: string;
  config: IntentPhaseConfig;
  now: Date;
  signal?: AbortSignal;
  onEvent?: EventSink;
  logger?: Logger;
}): Promise<IntentPhaseResult> {
  const { state, registry, generation, prompt, config, now, signal, onEvent, logger } = params;
  safeEmit(onEvent, { type: "intent:start", detail: { turn: state.turn } }, logger);
  const started = Date.now();

  const schema = buildIntentPlanSchema(registry.names(), config.maxPlannedCalls);
  const context = { CURRENT_DATE: formatDate(now), TOOLS_JSON: registry.describe() };
  const history = recentHistory(state.history, config.historyTurns);

  const outcome = await executeWithPolicy(
    async ({ signal: attemptSignal }) => {
      const res = await generation.generateStructured({
        name: "intent-parser",
        prompt,
        message: state.userQuery,
        context,
        history,
        model: config.modelIdentifierForStructuredGen,
        modelSettings: config.structuredModelSettings,
        schema,
        signal: attemptSignal,
      });
      if (!res.ok) throw parseFailed(res.error, { details: { raw: res.raw } });
      return res.value;
    },
    {
      maxAttempts: config.maxIntentParseRetries + 1,
      perCallTimeoutMs: config.generationTimeoutMs,
      backoff: exponentialBackoff(config.backoffBaseMs, config.backoffMaxMs),
    },
    {
      signal,
      onRetry: ({ attempt, error }) => {
        logger?.warn(`[intent] attempt ${attempt} rejected`, error);
        safeEmit(onEvent, { type: "intent:retry", detail: { attempt: attempt + 1 } }, logger);
      },
    }
  );

  if (outcome.status === "cancelled") {
    return { kind: "cancelled", state };
  }

  if (outcome.status === "ok") {
    const next = applyIntentPlan(state, outcome.value);
    safeEmit(
      onEvent,
      {
        type: "intent:done",
        detail: { intent: next.intent, tools: next.toolPlan.map((c) => c.name), durationMs: Date.now() - started },
      },
      logger
    );
    return { kind: "parsed", state: next };
  }

  // No attempt got an answer from the service: a hang counts the same as a refused connection.
  const codes = outcome.errors.map(attemptCode);
  if (codes.length > 0 && codes.every((c) => c !== CODES.parse_failed)) {
    const last = outcome.errors[outcome.errors.length - 1];
    const error =
      last instanceof GenerationUnavailableError
        ? last
        : new GenerationUnavailableError(`intent-parser: no response within ${config.generationTimeoutMs}ms`, { cause: last });
    logger?.error(`[intent] generation unavailable after ${outcome.attempts} attempts`, error);
    return { kind: "failed", state, error };
  }

  let degraded = downgradeIntent(state);
  outcome.errors.forEach((err, i) => {
    degraded = withError(degraded, {
      code: codes[i],
      message: messageOf(err),
      attempt: i + 1,
    });
  });
  logger?.warn(`[intent] degraded to other after ${outcome.attempts} attempts`);
  safeEmit(onEvent, { type: "intent:degraded", detail: { attempts: outcome.attempts } }, logger);
  return { kind: "parsed", state: degraded };
}
