import type { z } from "zod";
import type { ModelSettings } from "../config/modelResolver";
import type { ConversationTurn } from "./state";

type BaseRequest = {
  /** Agent name, used for logs and tracing. */
  name: string;
  /** System instructions (prompt XML or persona). */
  prompt: string;
  /** The user's message for this call. */
  message: string;
  context: Record<string, unknown>;
  history?: readonly ConversationTurn[];
  model: string;
  modelSettings?: ModelSettings;
  signal?: AbortSignal;
};

export type StructuredRequest<T> = BaseRequest & {
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
};

export type TextRequest = BaseRequest;

export type StructuredResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: string; raw?: string };

/**
 * Everything the pipeline needs from a language model: a value conforming to
 * a schema, or free text under a persona. Implementations throw
 * GenerationUnavailableError when the service cannot be reached and let an
 * abort surface as the signal's reason.
 */
export interface GenerationClient {
  generateStructured<T>(request: StructuredRequest<T>): Promise<StructuredResult<T>>;
  generateText(request: TextRequest): Promise<string>;
}
