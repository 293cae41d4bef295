import fs from 'fs';
import path from 'path';
import { z } from 'zod';

export const ModelSettingsSchema = z
  .object({
    temperature: z.number().min(0).max(2).optional(),
    topP: z.number().min(0).max(1).optional(),
    maxTokens: z.number().int().positive().optional(),
  })
  .strict();

const AgentModelEntrySchema = z.union([
  z.string().trim().min(1),
  z.object({
    model: z.string().trim().min(1).optional(),
    modelSettings: ModelSettingsSchema.optional(),
  }),
]);

const ModelsConfigSchema = z.object({
  default: z.string().min(1, 'config.default must be a non-empty string'),
  agents: z.record(AgentModelEntrySchema).default({}),
});

export type ModelSettings = z.infer<typeof ModelSettingsSchema>;
export type ModelsConfig = z.infer<typeof ModelsConfigSchema>;
export type AgentModelConfig = { model: string; modelSettings?: ModelSettings };

export function modelsConfigPath(): string {
  return path.resolve(process.cwd(), 'config', 'models.json');
}

export function loadModelsConfig(configPath = modelsConfigPath()): ModelsConfig {
  let raw: string;
  try {
    raw = fs.readFileSync(configPath, 'utf-8');
  } catch (err) {
    throw new Error(`Failed to read model config at ${configPath}: ${err instanceof Error ? err.message : String(err)}`, { cause: err });
  }
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new Error(`Invalid JSON in ${configPath}: ${err instanceof Error ? err.message : String(err)}`, { cause: err });
  }
  const parsed = ModelsConfigSchema.safeParse(json);
  if (!parsed.success) {
    throw new Error(
      `models.json validation failed: ${parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ')}`
    );
  }
  return parsed.data;
}

export function resolveAgentModel(cfg: ModelsConfig, agentName?: string): AgentModelConfig {
  const entry = agentName ? cfg.agents[agentName] : undefined;
  if (entry === undefined) return { model: cfg.default };
  if (typeof entry === 'string') return { model: entry };
  return { model: entry.model ?? cfg.default, modelSettings: entry.modelSettings };
}
