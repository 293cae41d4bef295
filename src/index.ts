export { Orchestrator, type OrchestratorOptions, type SubmitOptions } from './orchestrator/run';
export { TRANSITIONS, canTransition } from './orchestrator/stateMachine';
export {
  buildPipelineConfig,
  configFromEnv,
  configFromModels,
  PipelineConfigSchema,
  type PipelineConfig,
  type PipelineConfigInput,
} from './orchestrator/context';
export { ToolRegistry, defineTool, type RegisteredTool, type ToolDescription } from './tools/registry';
export { buildToolRegistry } from './tools/definitions';
export { ListeningHistory } from './data/listeningHistory';
export * from './data/queryService';
export { AgentsGenerationClient } from './agents/generationClient';
export type { GenerationClient, StructuredRequest, StructuredResult, TextRequest } from './types/generation';
export type { AgentState, ConversationTurn, FetchResult, FetchStatus, Intent, Stage, ToolCall } from './types/state';
export type { OrchestratorEvent, EventSink } from './types/orchestrator';
export { AppError, GenerationUnavailableError, CODES, formatForUser } from './utils/errors';
export { renderMessage } from './utils/events';
export { createLogger, type Logger } from './utils/logger';
