import { run, extractAllTextOutput } from "@openai/agents";
import { buildAgent, buildInput } from "./builders";
import { GenerationUnavailableError, messageOf } from "../utils/errors";
import { describeIssues } from "../planning/schemas";
import type { GenerationClient, StructuredRequest, StructuredResult, TextRequest } from "../types/generation";
import type { Logger } from "../utils/logger";

const FENCE = /^```(?:json)?\s*([\s\S]*?)\s*```$/;

/** Model output as JSON, tolerating a surrounding markdown code fence. */
export function parseJsonOutput(text: string): { ok: true; value: unknown } | { ok: false; error: string } {
  const trimmed = text.trim();
  const match = FENCE.exec(trimmed);
  const body = match ? match[1] : trimmed;
  try {
    return { ok: true, value: JSON.parse(body) };
  } catch (e) {
    return { ok: false, error: `invalid JSON: ${messageOf(e)}` };
  }
}

/** Structured and free-text generation on the OpenAI Agents SDK. */
export class AgentsGenerationClient implements GenerationClient {
  constructor(private readonly logger?: Logger) {}

  async generateStructured<T>(request: StructuredRequest<T>): Promise<StructuredResult<T>> {
    const text = await this.runAgent(request);
    const parsed = parseJsonOutput(text);
    if (!parsed.ok) {
      return { ok: false, error: parsed.error, raw: text };
    }
    const validation = request.schema.safeParse(parsed.value);
    if (!validation.success) {
      return { ok: false, error: describeIssues(validation.error), raw: text };
    }
    return { ok: true, value: validation.data };
  }

  async generateText(request: TextRequest): Promise<string> {
    return (await this.runAgent(request)).trim();
  }

  private async runAgent(request: TextRequest): Promise<string> {
    const { name, prompt, message, context, history, model, modelSettings, signal } = request;
    const agent = buildAgent({ name, model, instructions: prompt, modelSettings });
    const input = buildInput({ message, context, history });
    const started = Date.now();
    try {
      const res = await run(agent, input, { signal, maxTurns: 1 });
      const output =
        typeof res.finalOutput === "string" && res.finalOutput ? res.finalOutput : extractAllTextOutput(res.newItems);
      this.logger?.info(`[agent] ${name} model=${model} chars=${output.length} durationMs=${Date.now() - started}`);
      return output;
    } catch (e) {
      if (signal?.aborted) throw signal.reason ?? e;
      this.logger?.error(`[agent] ${name} model=${model} failed`, e);
      throw new GenerationUnavailableError(`${name}: ${messageOf(e)}`, { cause: e });
    }
  }
}
