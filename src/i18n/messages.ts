// Event message templates for progress display.
// Keep content concise; actual UI can render these strings as-is.

import type { EventDetail } from '../types/orchestrator';

type Template = string | ((detail: EventDetail) => string);

function num(v: unknown): number | undefined {
  return typeof v === 'number' && Number.isFinite(v) ? v : undefined;
}

function str(v: unknown): string | undefined {
  return typeof v === 'string' && v.length > 0 ? v : undefined;
}

const templates: Record<string, Record<string, Template>> = {
  en: {
    'intent:start': 'Analyzing intent…',
    'intent:retry': ({ attempt }) => `Intent output was not usable, retrying${num(attempt) ? ` (attempt ${num(attempt)})` : ''}…`,
    'intent:done': ({ intent, tools }) => {
      const list = Array.isArray(tools) ? tools.filter((t): t is string => typeof t === 'string') : [];
      return `Intent: ${str(intent) ?? 'unknown'}${list.length ? ` (tools: ${list.join(', ')})` : ''}.`;
    },
    'intent:degraded': 'Could not classify the request; answering directly.',
    'fetch:start': ({ calls }) => `Fetching data${num(calls) ? ` (${num(calls)} calls)` : ''}…`,
    'fetch:call:retry': ({ tool, attempt }) => `Retrying ${str(tool) ?? 'tool'}${num(attempt) ? ` (attempt ${num(attempt)})` : ''}…`,
    'fetch:call:done': ({ tool, status }) => `${str(tool) ?? 'tool'}: ${str(status) ?? 'done'}.`,
    'fetch:timeout': 'Data fetch took too long; continuing with what is available.',
    'fetch:done': ({ ok, total }) => `Data fetched${num(total) !== undefined ? ` (${num(ok) ?? 0}/${num(total)} succeeded)` : ''}.`,
    'analyze:start': ({ persona }) => `Writing the answer${str(persona) ? ` as ${str(persona)}` : ''}…`,
    final: 'Answer is ready.',
    cancelled: 'Run stopped by user.',
    error: ({ message }) => `Error: ${str(message) ?? 'unknown'}`,
  },
};

function getLocale(): string {
  const v = String(process.env.LOCALE || 'en').toLowerCase();
  return templates[v] ? v : 'en';
}

export function formatEventMessage(type?: string, detail?: EventDetail): string {
  const dict = templates[getLocale()] ?? templates.en;
  const tmpl = type ? dict[type] : undefined;
  if (!tmpl) return '';
  if (typeof tmpl === 'function') return tmpl(detail ?? {});
  return tmpl;
}
