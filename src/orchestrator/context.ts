import { z } from 'zod';
import { loadModelsConfig, resolveAgentModel, ModelSettingsSchema, type ModelsConfig } from '../config/modelResolver';

const positiveInt = z.number().int().positive();

export const PipelineConfigSchema = z.object({
  maxIntentParseRetries: z.number().int().min(0).default(2),
  maxToolCallAttempts: positiveInt.default(3),
  maxSynthesisAttempts: positiveInt.default(2),
  perCallTimeoutMs: positiveInt.default(15000),
  generationTimeoutMs: positiveInt.default(60000),
  aggregateFetchTimeoutMs: positiveInt.default(45000),
  truncationByteBudget: z.number().int().min(128).default(4000),
  backoffBaseMs: z.number().int().min(0).default(250),
  backoffMaxMs: z.number().int().min(0).default(4000),
  maxConcurrentCalls: positiveInt.default(4),
  maxPlannedCalls: positiveInt.default(5),
  historyTurns: z.number().int().min(0).default(6),
  modelIdentifierForStructuredGen: z.string().min(1),
  modelIdentifierForSynthesis: z.string().min(1),
  /** Falls back to the structured model when unset. */
  modelIdentifierForArgumentResolution: z.string().min(1).optional(),
  structuredModelSettings: ModelSettingsSchema.optional(),
  argumentResolutionModelSettings: ModelSettingsSchema.optional(),
  synthesisModelSettings: ModelSettingsSchema.optional(),
});

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;
export type PipelineConfigInput = z.input<typeof PipelineConfigSchema>;

function getNum(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return undefined;
  const n = Number(raw);
  return Number.isFinite(n) && n >= 0 ? n : undefined;
}

/** Pipeline options taken from the environment; unset or unparsable values stay undefined. */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): Partial<PipelineConfigInput> {
  return {
    maxIntentParseRetries: getNum(env, 'INTENT_PARSE_RETRIES'),
    maxToolCallAttempts: getNum(env, 'TOOL_CALL_ATTEMPTS'),
    perCallTimeoutMs: getNum(env, 'TOOL_CALL_TIMEOUT_MS'),
    generationTimeoutMs: getNum(env, 'GENERATION_TIMEOUT_MS'),
    aggregateFetchTimeoutMs: getNum(env, 'FETCH_TIMEOUT_MS'),
    truncationByteBudget: getNum(env, 'TRUNCATION_BYTES'),
    maxConcurrentCalls: getNum(env, 'FETCH_CONCURRENCY'),
  };
}

/** Model identifiers and settings for the intent, argument and synthesis calls, from config/models.json. */
export function configFromModels(models: ModelsConfig = loadModelsConfig()): Pick<
  PipelineConfigInput,
  | 'modelIdentifierForStructuredGen'
  | 'modelIdentifierForSynthesis'
  | 'modelIdentifierForArgumentResolution'
  | 'structuredModelSettings'
  | 'synthesisModelSettings'
  | 'argumentResolutionModelSettings'
> {
  const structured = resolveAgentModel(models, 'intent-parser');
  const synthesis = resolveAgentModel(models, 'analyst');
  const args = resolveAgentModel(models, 'argument-resolver');
  return {
    modelIdentifierForStructuredGen: structured.model,
    modelIdentifierForSynthesis: synthesis.model,
    modelIdentifierForArgumentResolution: args.model,
    structuredModelSettings: structured.modelSettings,
    synthesisModelSettings: synthesis.modelSettings,
    argumentResolutionModelSettings: args.modelSettings,
  };
}

/**
 * Validates the options an orchestrator runs with. Later sources win:
 * explicit overrides over env over defaults.
 */
export function buildPipelineConfig(...sources: Array<Partial<PipelineConfigInput>>): PipelineConfig {
  const merged: Record<string, unknown> = {};
  for (const source of sources) {
    for (const [key, value] of Object.entries(source)) {
      if (value !== undefined) merged[key] = value;
    }
  }
  const parsed = PipelineConfigSchema.safeParse(merged);
  if (!parsed.success) {
    throw new Error(
      `pipeline config validation failed: ${parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')}`
    );
  }
  return parsed.data;
}
