import type { FetchResult, FetchStatus, Intent } from "../types/state";
import type { PromptName } from "./promptLoader";

export type Persona = { name: string; prompt: PromptName };

export const PERSONAS: Record<Intent, Persona> = {
  factual_query: { name: "FactChecker", prompt: "fact-checker" },
  insight_analysis: { name: "MusicCriticAnalyst", prompt: "music-critic-analyst" },
  recommendation: { name: "RecommendationExpert", prompt: "recommendation-expert" },
  other: { name: "DirectResponder", prompt: "direct-responder" },
};

export const UNAVAILABLE_MESSAGE =
  "Sorry, I couldn't complete this request because the language model service is unavailable. Please try again later.";

export const PARSE_FALLBACK_MESSAGE =
  "Sorry, I couldn't understand that request. You can ask about your listening history, for example your top artists, listening trends over time, a summary of a period, or recommendations.";

export const EMPTY_ANSWER_MESSAGE = "Sorry, I couldn't put together an answer from the data that was retrieved.";

const STATUS_TEXT: Record<FetchStatus, string> = {
  ok: "ok",
  failed: "failed",
  timed_out: "timed out",
};

function describeResult(r: FetchResult): string {
  return `${r.toolName} (${STATUS_TEXT[r.status]})`;
}

/** Reply used when no call returned data; nothing is inferred. */
export function noDataMessage(results: readonly FetchResult[]): string {
  const list = results.map(describeResult).join(", ");
  return `Sorry, I could not retrieve the data needed to answer this: ${list}. Please try again later.`;
}

/** Deterministic prefix flagging partial or truncated data; undefined when the data is complete. */
export function limitationsNotice(results: readonly FetchResult[]): string | undefined {
  const missing = results.filter((r) => r.status !== "ok").map((r) => r.toolName);
  const parts: string[] = [];
  if (missing.length) parts.push(`Based on partial data: could not retrieve ${missing.join(", ")}.`);
  if (results.some((r) => r.status === "ok" && r.truncated)) {
    parts.push("Some results were truncated, so this may not be complete.");
  }
  return parts.length ? parts.join(" ") : undefined;
}

/** LIMITATIONS lines handed to the analyst model. */
export function limitationLines(results: readonly FetchResult[]): string[] {
  const lines: string[] = [];
  for (const r of results) {
    if (r.status !== "ok") lines.push(`${describeResult(r)}: no data${r.error ? ` (${r.error})` : ""}`);
    else if (r.truncated) lines.push(`${r.toolName}: result truncated, only the leading entries are included`);
  }
  return lines;
}
