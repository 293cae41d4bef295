import { CODES, codeOf, messageOf, type ErrorCode } from "../utils/errors";
import { UNAVAILABLE_MESSAGE } from "../agents/personas";
import type { ActiveStage, AgentState, Stage } from "../types/state";

export const TRANSITIONS: Readonly<Record<ActiveStage, readonly Stage[]>> = {
  INTENT_PARSING: ["ROUTE", "FAILED", "CANCELLED"],
  ROUTE: ["DATA_FETCHING", "ANALYZING", "FAILED", "CANCELLED"],
  DATA_FETCHING: ["ANALYZING", "FAILED", "CANCELLED"],
  ANALYZING: ["DONE", "FAILED", "CANCELLED"],
};

const FAILURE_MESSAGES: Partial<Record<ErrorCode, string>> = {
  [CODES.generation_unavailable]: UNAVAILABLE_MESSAGE,
  [CODES.precondition_failed]: "Please enter a question about your listening history.",
};

const INTERNAL_FAILURE_MESSAGE = "Sorry, something went wrong while handling this request. Please try again.";

export function canTransition(from: Stage, to: Stage): boolean {
  if (from === "DONE" || from === "FAILED" || from === "CANCELLED") return false;
  return TRANSITIONS[from].includes(to);
}

export function transition(state: AgentState, to: Stage): AgentState {
  if (!canTransition(state.stage, to)) {
    throw new Error(`illegal transition ${state.stage} -> ${to}`);
  }
  if (to === "CANCELLED" || to === "FAILED") {
    return { ...state, stage: to, finalResponse: undefined };
  }
  return { ...state, stage: to };
}

/** Ends the turn in FAILED with a generic user-facing message; the cause goes to errorTrace. */
export function fail(state: AgentState, error: unknown): AgentState {
  const code = codeOf(error);
  const recorded: AgentState = {
    ...state,
    errorTrace: [...state.errorTrace, { stage: state.stage, code, message: messageOf(error) }],
  };
  return {
    ...transition(recorded, "FAILED"),
    failure: { code, message: FAILURE_MESSAGES[code] ?? INTERNAL_FAILURE_MESSAGE },
  };
}

export function cancel(state: AgentState): AgentState {
  const recorded: AgentState = {
    ...state,
    errorTrace: [...state.errorTrace, { stage: state.stage, code: CODES.cancelled, message: "turn cancelled" }],
  };
  return transition(recorded, "CANCELLED");
}

/** ROUTE: `other` goes straight to the analyst with no data. */
export function route(state: AgentState): "DATA_FETCHING" | "ANALYZING" {
  return state.intent === undefined || state.intent === "other" || state.toolPlan.length === 0
    ? "ANALYZING"
    : "DATA_FETCHING";
}
