import { createLogger, type Logger } from './logger';
import { formatEventMessage } from '../i18n/messages';
import type { EventSink, OrchestratorEvent } from '../types/orchestrator';

// Emits event to callback and appends minimal analysis log.
export function safeEmit(cb: EventSink | undefined, ev: OrchestratorEvent, logger?: Logger) {
  try {
    if (typeof cb === 'function') cb(ev);
  } catch (e) {
    (logger ?? createLogger()).warn(`[event] listener failed for ${ev.type}`, e);
  }
  const lg = logger ?? createLogger();
  const detail = ev.detail ? serializeDetail(ev.detail) : '';
  lg.info(`[event] ${ev.type}${detail ? ` detail=${detail}` : ''}`);
}

function serializeDetail(detail: unknown): string {
  try {
    return JSON.stringify(detail);
  } catch (e) {
    return `<unserializable: ${e instanceof Error ? e.message : String(e)}>`;
  }
}

// Convenience: render a human message for UI from event type/detail.
export function renderMessage(ev: OrchestratorEvent): string {
  return formatEventMessage(ev.type, ev.detail);
}
