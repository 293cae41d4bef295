import { randomUUID } from "crypto";
import type { ErrorCode } from "../utils/errors";

export const INTENTS = ["factual_query", "insight_analysis", "recommendation", "other"] as const;
export type Intent = (typeof INTENTS)[number];

export const STAGES = [
  "INTENT_PARSING",
  "ROUTE",
  "DATA_FETCHING",
  "ANALYZING",
  "DONE",
  "FAILED",
  "CANCELLED",
] as const;
export type Stage = (typeof STAGES)[number];
export type TerminalStage = Extract<Stage, "DONE" | "FAILED" | "CANCELLED">;
export type ActiveStage = Exclude<Stage, TerminalStage>;

export type ConversationTurn = { role: "user" | "assistant"; content: string };

export type ToolCall = {
  readonly name: string;
  readonly rawArgsSpec: Readonly<Record<string, unknown>>;
  readonly reasoning?: string;
};

export type FetchStatus = "ok" | "failed" | "timed_out";

export type FetchResult = {
  readonly toolName: string;
  readonly status: FetchStatus;
  /** Serialized payload; empty unless status is ok. */
  readonly payload: string;
  readonly truncated: boolean;
  readonly attempts: number;
  readonly args?: Readonly<Record<string, unknown>>;
  readonly error?: string;
};

export type ErrorRecord = {
  readonly stage: Stage;
  readonly code: ErrorCode;
  readonly message: string;
  readonly toolName?: string;
  readonly attempt?: number;
};

export type AgentState = {
  readonly conversationId: string;
  readonly turn: number;
  readonly userQuery: string;
  readonly history: readonly ConversationTurn[];
  readonly intent?: Intent;
  readonly intentDowngraded: boolean;
  readonly reasoning?: string;
  readonly analysisFocus?: string;
  readonly toolPlan: readonly ToolCall[];
  readonly fetchResults: readonly FetchResult[];
  readonly finalResponse?: string;
  readonly stage: Stage;
  readonly errorTrace: readonly ErrorRecord[];
  readonly failure?: { readonly code: ErrorCode; readonly message: string };
};

export function isTerminal(stage: Stage): stage is TerminalStage {
  return stage === "DONE" || stage === "FAILED" || stage === "CANCELLED";
}

function carryHistory(prior: AgentState): ConversationTurn[] {
  const history = [...prior.history];
  if (prior.stage === "DONE" && prior.finalResponse !== undefined) {
    history.push({ role: "user", content: prior.userQuery }, { role: "assistant", content: prior.finalResponse });
  }
  return history;
}

/** Starts a new turn, continuing the conversation of `prior` when given. */
export function createTurnState(prior: AgentState | undefined, userQuery: string): AgentState {
  return {
    conversationId: prior?.conversationId ?? randomUUID(),
    turn: prior ? prior.turn + 1 : 1,
    userQuery,
    history: prior ? carryHistory(prior) : [],
    intentDowngraded: false,
    toolPlan: [],
    fetchResults: [],
    stage: "INTENT_PARSING",
    errorTrace: [],
  };
}

export function withIntent(
  state: AgentState,
  intent: Intent,
  notes: { reasoning?: string; analysisFocus?: string } = {}
): AgentState {
  if (state.intent !== undefined) {
    throw new Error(`intent already set to ${state.intent}`);
  }
  return { ...state, intent, reasoning: notes.reasoning, analysisFocus: notes.analysisFocus };
}

/** The one permitted intent change after classification. */
export function downgradeIntent(state: AgentState): AgentState {
  if (state.intentDowngraded) {
    throw new Error("intent was already downgraded");
  }
  return { ...state, intent: "other", intentDowngraded: true, toolPlan: [] };
}

export function withError(state: AgentState, record: Omit<ErrorRecord, "stage">): AgentState {
  return { ...state, errorTrace: [...state.errorTrace, { stage: state.stage, ...record }] };
}

export function recentHistory(history: readonly ConversationTurn[], turns: number): ConversationTurn[] {
  return turns > 0 ? history.slice(-turns) : [];
}
