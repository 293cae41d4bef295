import { describe, it, expect } from 'vitest';
import { intentPhase } from '../intentPhase';
import { buildToolRegistry } from '../../tools/definitions';
import { createTurnState, type AgentState } from '../../types/state';
import type { OrchestratorEvent } from '../../types/orchestrator';
import { NOW, ScriptedGeneration, TEST_PROMPTS, testConfig, testHistory, type Step } from '../../__tests__/fakes';

const registry = buildToolRegistry(testHistory());

const topArtists = {
  intent: 'factual_query',
  reasoning: 'ranking question',
  tool_plan: [{ tool_name: 'top_n_entities', args: { entity: 'artist', n: 3 } }],
};

async function parse(steps: Step[], opts: { state?: AgentState; retries?: number; historyTurns?: number; timeoutMs?: number } = {}) {
  const generation = new ScriptedGeneration({ 'intent-parser': steps });
  const events: OrchestratorEvent[] = [];
  const result = await intentPhase({
    state: opts.state ?? createTurnState(undefined, 'What are my top 3 artists?'),
    registry,
    generation,
    prompt: TEST_PROMPTS['intent-parser'],
    config: testConfig({
      maxIntentParseRetries: opts.retries ?? 2,
      historyTurns: opts.historyTurns ?? 6,
      generationTimeoutMs: opts.timeoutMs,
    }),
    now: NOW,
    onEvent: (ev) => events.push(ev),
  });
  return { result, generation, events };
}

describe('intentPhase', () => {
  it('produces an intent and tool plan from a valid response', async () => {
    const { result, generation } = await parse([{ json: topArtists }]);
    expect(result.kind).toBe('parsed');
    expect(result.state.intent).toBe('factual_query');
    expect(result.state.reasoning).toBe('ranking question');
    expect(result.state.toolPlan).toEqual([
      { name: 'top_n_entities', rawArgsSpec: { entity: 'artist', n: 3 }, reasoning: undefined },
    ]);
    const [request] = generation.calls;
    expect(request.context.CURRENT_DATE).toBe('2026-01-05');
    expect(request.message).toBe('What are my top 3 artists?');
  });

  it('retries invalid responses and keeps the first valid one', async () => {
    const { result, generation, events } = await parse([{ text: 'not json' }, { json: { intent: 'maybe' } }, { json: topArtists }]);
    expect(result.state.intent).toBe('factual_query');
    expect(result.state.intentDowngraded).toBe(false);
    expect(generation.calls).toHaveLength(3);
    expect(events.filter((e) => e.type === 'intent:retry').map((e) => e.detail)).toEqual([{ attempt: 2 }, { attempt: 3 }]);
  });

  it('treats a plan naming an unknown tool as invalid', async () => {
    const unknown = { intent: 'factual_query', tool_plan: [{ tool_name: 'drop_tables', args: {} }] };
    const { result, generation } = await parse([{ json: unknown }, { json: topArtists }]);
    expect(result.state.toolPlan.map((c) => c.name)).toEqual(['top_n_entities']);
    expect(generation.calls).toHaveLength(2);
  });

  it('degrades to other after exhausting retries', async () => {
    const { result, events } = await parse([{ text: 'x' }, { text: 'y' }, { text: 'z' }]);
    expect(result.kind).toBe('parsed');
    expect(result.state).toMatchObject({ intent: 'other', intentDowngraded: true, toolPlan: [] });
    expect(result.state.errorTrace.map((e) => [e.stage, e.code, e.attempt])).toEqual([
      ['INTENT_PARSING', 'parse_failed', 1],
      ['INTENT_PARSING', 'parse_failed', 2],
      ['INTENT_PARSING', 'parse_failed', 3],
    ]);
    expect(events.some((e) => e.type === 'intent:degraded')).toBe(true);
  });

  it('honours the configured retry count', async () => {
    const { generation } = await parse([{ text: 'x' }, { json: topArtists }], { retries: 0 });
    expect(generation.calls).toHaveLength(1);
  });

  it('fails when every attempt finds the service unavailable', async () => {
    const { result } = await parse([{ unavailable: true }, { unavailable: true }, { unavailable: true }]);
    expect(result.kind).toBe('failed');
  });

  it('fails when every attempt outlives the generation timeout', async () => {
    const { result } = await parse([{ hang: true }, { hang: true }], { retries: 1, timeoutMs: 20 });
    expect(result.kind).toBe('failed');
    if (result.kind !== 'failed') return;
    expect(result.error.code).toBe('generation_unavailable');
    expect(result.error.message).toBe('intent-parser: no response within 20ms');
  });

  it('degrades when a timed-out attempt is followed by an unusable one', async () => {
    const { result } = await parse([{ hang: true }, { text: 'not json' }], { retries: 1, timeoutMs: 20 });
    expect(result.kind).toBe('parsed');
    expect(result.state.intent).toBe('other');
    expect(result.state.errorTrace.map((e) => e.code)).toEqual(['timeout', 'parse_failed']);
  });

  it('clears any plan attached to intent other', async () => {
    const { result } = await parse([{ json: { intent: 'other', tool_plan: [{ tool_name: 'summary_stats', args: {} }] } }]);
    expect(result.state).toMatchObject({ intent: 'other', intentDowngraded: false, toolPlan: [] });
  });

  it('downgrades a data intent that planned no calls', async () => {
    const { result } = await parse([{ json: { intent: 'insight_analysis', tool_plan: [] } }]);
    expect(result.state).toMatchObject({ intent: 'other', intentDowngraded: true, toolPlan: [] });
    expect(result.state.errorTrace).toEqual([]);
  });

  it('is deterministic for identical responses', async () => {
    const first = await parse([{ json: topArtists }]);
    const second = await parse([{ json: topArtists }]);
    expect(first.result.state.intent).toBe(second.result.state.intent);
    expect(first.result.state.toolPlan).toEqual(second.result.state.toolPlan);
  });

  it('sends only the most recent history turns', async () => {
    const state: AgentState = {
      ...createTurnState(undefined, 'And last year?'),
      history: [
        { role: 'user', content: 'q1' },
        { role: 'assistant', content: 'a1' },
        { role: 'user', content: 'q2' },
        { role: 'assistant', content: 'a2' },
      ],
    };
    const { generation } = await parse([{ json: topArtists }], { state, historyTurns: 2 });
    expect(generation.calls[0].history).toEqual([
      { role: 'user', content: 'q2' },
      { role: 'assistant', content: 'a2' },
    ]);
  });
});
