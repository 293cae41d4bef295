import type { EventSink } from "../types/orchestrator";
import type { GenerationClient } from "../types/generation";
import type { ToolRegistry } from "../tools/registry";
import { safeEmit } from "../utils/events";
import { createLogger, type Logger } from "../utils/logger";
import { internal, preconditionFailed, type AppError } from "../utils/errors";
import { loadPromptSet, type PromptSet } from "../agents/promptLoader";
import { fetchRunner } from "../execution/fetchRunner";
import type { ArgumentResolverDeps } from "../execution/argumentResolver";
import { buildPipelineConfig, configFromEnv, configFromModels, type PipelineConfig } from "./context";
import { intentPhase } from "./intentPhase";
import { analyzePhase } from "./analyzePhase";
import { cancel, fail, route, transition } from "./stateMachine";
import { createTurnState, isTerminal, withError, type ActiveStage, type AgentState, type Stage } from "../types/state";

export type OrchestratorOptions = {
  registry: ToolRegistry;
  generation: GenerationClient;
  /** Defaults to config/models.json merged with env options. */
  config?: PipelineConfig;
  prompts?: PromptSet;
  clock?: () => Date;
  logger?: Logger;
};

export type SubmitOptions = {
  signal?: AbortSignal;
  onEvent?: EventSink;
};

type TurnContext = {
  now: Date;
  signal?: AbortSignal;
  onEvent?: EventSink;
  logger: Logger;
};

type StepResult = { next: Stage; state: AgentState; failure?: AppError };

type StageHandler = (state: AgentState, turn: TurnContext) => Promise<StepResult>;

/** Runs conversation turns through INTENT_PARSING → ROUTE → DATA_FETCHING → ANALYZING. */
export class Orchestrator {
  readonly config: PipelineConfig;
  private readonly registry: ToolRegistry;
  private readonly generation: GenerationClient;
  private readonly prompts: PromptSet;
  private readonly clock: () => Date;
  private readonly logger: Logger;
  private readonly handlers: Record<ActiveStage, StageHandler>;

  constructor(opts: OrchestratorOptions) {
    this.registry = opts.registry;
    this.generation = opts.generation;
    this.config = opts.config ?? buildPipelineConfig(configFromModels(), configFromEnv());
    this.prompts = opts.prompts ?? loadPromptSet();
    this.clock = opts.clock ?? (() => new Date());
    this.logger = opts.logger ?? createLogger();
    this.handlers = {
      INTENT_PARSING: (state, turn) => this.parseIntent(state, turn),
      ROUTE: async (state) => ({ next: route(state), state }),
      DATA_FETCHING: (state, turn) => this.fetchData(state, turn),
      ANALYZING: (state, turn) => this.analyze(state, turn),
    };
  }

  /** Runs one turn to DONE, FAILED or CANCELLED. Recoverable stage failures never throw. */
  async submit(prior: AgentState | undefined, message: string, opts: SubmitOptions = {}): Promise<AgentState> {
    const { signal, onEvent } = opts;
    let state = createTurnState(prior, message.trim());
    const logger = this.logger.child(`${state.conversationId.slice(0, 8)}#${state.turn}`);
    const turn: TurnContext = { now: this.clock(), signal, onEvent, logger };
    logger.info(`[turn] start query=${JSON.stringify(state.userQuery)}`);

    if (!state.userQuery) {
      state = fail(state, preconditionFailed("message must not be empty"));
    }

    try {
      for (;;) {
        const stage = state.stage;
        if (isTerminal(stage)) break;
        if (signal?.aborted) {
          state = cancel(state);
          break;
        }
        const step = await this.handlers[stage](state, turn);
        state = step.next === "FAILED" ? fail(step.state, step.failure ?? internal(`${stage} failed`)) : transition(step.state, step.next);
        logger.info(`[turn] ${stage} -> ${state.stage}`);
      }
    } catch (e) {
      logger.error(`[turn] unexpected error in ${state.stage}`, e);
      state = signal?.aborted ? cancel(state) : fail(state, internal(e));
    }

    if (state.stage === "DONE") {
      safeEmit(onEvent, { type: "final", detail: { reply: state.finalResponse } }, logger);
    } else if (state.stage === "CANCELLED") {
      safeEmit(onEvent, { type: "cancelled" }, logger);
    } else if (state.failure) {
      safeEmit(onEvent, { type: "error", detail: { code: state.failure.code, message: state.failure.message } }, logger);
    }
    logger.info(`[turn] end stage=${state.stage}`);
    return state;
  }

  private async parseIntent(state: AgentState, turn: TurnContext): Promise<StepResult> {
    const result = await intentPhase({
      state,
      registry: this.registry,
      generation: this.generation,
      prompt: this.prompts["intent-parser"],
      config: this.config,
      now: turn.now,
      signal: turn.signal,
      onEvent: turn.onEvent,
      logger: turn.logger,
    });
    switch (result.kind) {
      case "parsed":
        return { next: "ROUTE", state: result.state };
      case "cancelled":
        return { next: "CANCELLED", state: result.state };
      case "failed":
        return { next: "FAILED", state: result.state, failure: result.error };
    }
  }

  private async fetchData(state: AgentState, turn: TurnContext): Promise<StepResult> {
    const outcome = await fetchRunner({
      plan: state.toolPlan,
      registry: this.registry,
      resolver: {
        generation: this.generation,
        prompt: this.prompts["argument-resolver"],
        ...this.argumentModel(),
        timeoutMs: this.config.generationTimeoutMs,
        now: () => turn.now,
        logger: turn.logger,
      },
      config: this.config,
      signal: turn.signal,
      onEvent: turn.onEvent,
      logger: turn.logger,
    });
    let next = outcome.errors.reduce(withError, state);
    next = { ...next, fetchResults: outcome.results };
    return { next: outcome.cancelled ? "CANCELLED" : "ANALYZING", state: next };
  }

  private argumentModel(): Pick<ArgumentResolverDeps, "model" | "modelSettings"> {
    const { modelIdentifierForArgumentResolution: model } = this.config;
    return model
      ? { model, modelSettings: this.config.argumentResolutionModelSettings }
      : { model: this.config.modelIdentifierForStructuredGen, modelSettings: this.config.structuredModelSettings };
  }

  private async analyze(state: AgentState, turn: TurnContext): Promise<StepResult> {
    const result = await analyzePhase({
      state,
      generation: this.generation,
      prompts: this.prompts,
      config: this.config,
      now: turn.now,
      signal: turn.signal,
      onEvent: turn.onEvent,
      logger: turn.logger,
    });
    switch (result.kind) {
      case "answered":
        return { next: "DONE", state: { ...state, finalResponse: result.response } };
      case "cancelled":
        return { next: "CANCELLED", state };
      case "failed":
        return { next: "FAILED", state, failure: result.error };
    }
  }
}
