// Prompt loader for agent instruction XML files.
// - Default directory: <cwd>/prompts
// - Override via env PROMPTS_PATH
// - Optional dev reload (PROMPTS_DEV_RELOAD=true) bypasses cache

import fs from "fs";
import path from "path";

const cache = new Map<string, string>();

export function promptsDir(): string {
  const p = process.env.PROMPTS_PATH;
  if (p && p.trim().length > 0) return path.resolve(p);
  return path.resolve(process.cwd(), "prompts");
}

export function loadPrompt(agentName: string, fallback?: string): string {
  const preferReload = String(process.env.PROMPTS_DEV_RELOAD || "").toLowerCase() === "true";
  const filePath = path.join(promptsDir(), `${agentName}.xml`);
  const cached = preferReload ? undefined : cache.get(filePath);
  if (cached !== undefined) return cached;

  let text = "";
  try {
    text = fs.readFileSync(filePath, "utf8").replace(/^\uFEFF/, "").trim(); // strip BOM
  } catch (e) {
    if (!fallback) {
      throw new Error(`Prompt XML not found or unreadable for ${agentName}: ${filePath}`, { cause: e });
    }
  }
  const prompt = text || fallback;
  if (!prompt) {
    throw new Error(`No prompt available for ${agentName}. ${filePath} is empty and no fallback was provided.`);
  }
  if (!preferReload) cache.set(filePath, prompt);
  return prompt;
}

export const PROMPT_NAMES = {
  intentParser: "intent-parser",
  argumentResolver: "argument-resolver",
  factChecker: "fact-checker",
  musicCriticAnalyst: "music-critic-analyst",
  recommendationExpert: "recommendation-expert",
  directResponder: "direct-responder",
} as const;

export type PromptName = (typeof PROMPT_NAMES)[keyof typeof PROMPT_NAMES];

export type PromptSet = Record<PromptName, string>;

/** Reads every prompt the pipeline uses; fails fast on a missing file. */
export function loadPromptSet(): PromptSet {
  return {
    "intent-parser": loadPrompt(PROMPT_NAMES.intentParser),
    "argument-resolver": loadPrompt(PROMPT_NAMES.argumentResolver),
    "fact-checker": loadPrompt(PROMPT_NAMES.factChecker),
    "music-critic-analyst": loadPrompt(PROMPT_NAMES.musicCriticAnalyst),
    "recommendation-expert": loadPrompt(PROMPT_NAMES.recommendationExpert),
    "direct-responder": loadPrompt(PROMPT_NAMES.directResponder),
  };
}
