import type { EventSink } from "../types/orchestrator";
import type { GenerationClient } from "../types/generation";
import type { Logger } from "../utils/logger";
import type { PipelineConfig } from "./context";
import type { PromptSet } from "../agents/promptLoader";
import { safeEmit } from "../utils/events";
import { CODES, GenerationUnavailableError } from "../utils/errors";
import { executeWithPolicy, exponentialBackoff } from "../execution/policy";
import { formatDate } from "../execution/timeRange";
import { recentHistory, type AgentState, type FetchResult } from "../types/state";
import {
  EMPTY_ANSWER_MESSAGE,
  PARSE_FALLBACK_MESSAGE,
  PERSONAS,
  limitationLines,
  limitationsNotice,
  noDataMessage,
} from "../agents/personas";

export type AnalyzePhaseConfig = Pick<
  PipelineConfig,
  | "maxSynthesisAttempts"
  | "historyTurns"
  | "backoffBaseMs"
  | "backoffMaxMs"
  | "generationTimeoutMs"
  | "modelIdentifierForSynthesis"
  | "synthesisModelSettings"
>;

export type AnalyzePhaseResult =
  | { kind: "answered"; response: string; modelCalled: boolean }
  | { kind: "failed"; error: GenerationUnavailableError }
  | { kind: "cancelled" };

function dataFor(results: readonly FetchResult[]) {
  return results
    .filter((r) => r.status === "ok")
    .map((r) => ({ tool: r.toolName, args: r.args ?? {}, truncated: r.truncated, result: r.payload }));
}

/**
 * Writes the reply for a turn. Deterministic replies cover a failed parse and
 * a fetch that returned nothing; otherwise the persona for the intent answers
 * from the retrieved data, with a notice prefixed when data is partial.
 */
export async function analyzePhase(params: {
  state: AgentState;
  generation: GenerationClient;
  prompts: PromptSet;
  config: AnalyzePhaseConfig;
  now: Date;
  signal?: AbortSignal;
  onEvent?: EventSink;
  logger?: Logger;
}): Promise<AnalyzePhaseResult> {
  const { state, generation, prompts, config, now, signal, onEvent, logger } = params;
  const intent = state.intent ?? "other";
  const persona = PERSONAS[intent];
  const results = state.fetchResults;

  if (intent === "other" && state.intentDowngraded && state.errorTrace.some((e) => e.code === CODES.parse_failed)) {
    logger?.info("[analyze] parse fallback reply");
    return { kind: "answered", response: PARSE_FALLBACK_MESSAGE, modelCalled: false };
  }
  if (intent !== "other" && !results.some((r) => r.status === "ok")) {
    logger?.info("[analyze] no data retrieved; deterministic reply");
    return { kind: "answered", response: noDataMessage(results), modelCalled: false };
  }

  safeEmit(onEvent, { type: "analyze:start", detail: { persona: persona.name } }, logger);
  const started = Date.now();
  const limitations = limitationLines(results);
  const context: Record<string, unknown> = { CURRENT_DATE: formatDate(now) };
  if (intent !== "other") context.DATA_JSON = dataFor(results);
  if (limitations.length) context.LIMITATIONS = limitations.join("\n");
  if (state.analysisFocus) context.ANALYSIS_FOCUS = state.analysisFocus;

  const outcome = await executeWithPolicy(
    ({ signal: attemptSignal }) =>
      generation.generateText({
        name: persona.name,
        prompt: prompts[persona.prompt],
        message: state.userQuery,
        context,
        history: recentHistory(state.history, config.historyTurns),
        model: config.modelIdentifierForSynthesis,
        modelSettings: config.synthesisModelSettings,
        signal: attemptSignal,
      }),
    {
      maxAttempts: config.maxSynthesisAttempts,
      perCallTimeoutMs: config.generationTimeoutMs,
      backoff: exponentialBackoff(config.backoffBaseMs, config.backoffMaxMs),
    },
    {
      signal,
      isRetryable: (err) => err instanceof GenerationUnavailableError,
      onRetry: ({ attempt, error }) => logger?.warn(`[analyze] attempt ${attempt} failed`, error),
    }
  );

  if (outcome.status === "cancelled") return { kind: "cancelled" };
  if (outcome.status !== "ok") {
    const error =
      outcome.error instanceof GenerationUnavailableError
        ? outcome.error
        : new GenerationUnavailableError(`${persona.name}: synthesis failed`, { cause: outcome.error });
    logger?.error(`[analyze] ${persona.name} unavailable after ${outcome.attempts} attempts`, error);
    return { kind: "failed", error };
  }

  const text = outcome.value.trim() || EMPTY_ANSWER_MESSAGE;
  const notice = intent === "other" ? undefined : limitationsNotice(results);
  logger?.info(`[analyze] ${persona.name} chars=${text.length} durationMs=${Date.now() - started}`);
  return { kind: "answered", response: notice ? `${notice}\n\n${text}` : text, modelCalled: true };
}
