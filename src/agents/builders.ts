import { Agent, user as userMsg, assistant as assistantMsg, system as systemMsg, type AgentInputItem } from '@openai/agents';
import type { ModelSettings } from '../config/modelResolver';
import type { ConversationTurn } from '../types/state';

export function buildAgent(params: { name: string; model: string; instructions: string; modelSettings?: ModelSettings }) {
  const { name, model, instructions, modelSettings } = params;
  if (modelSettings && Object.keys(modelSettings).length > 0) {
    return new Agent({ name, model, instructions, modelSettings });
  }
  return new Agent({ name, model, instructions });
}

export function buildInput(params: {
  message: string;
  context: Record<string, unknown>;
  history?: readonly ConversationTurn[];
}): AgentInputItem[] {
  const { message, context, history = [] } = params;
  const msgs: AgentInputItem[] = history.map((turn) =>
    turn.role === 'user' ? userMsg(turn.content) : assistantMsg(turn.content)
  );
  msgs.push(userMsg(message));
  for (const [key, value] of Object.entries(context)) {
    if (value === undefined) continue;
    const rendered = typeof value === 'string' ? value : JSON.stringify(value);
    msgs.push(systemMsg(`${key}=${rendered}`));
  }
  return msgs;
}
