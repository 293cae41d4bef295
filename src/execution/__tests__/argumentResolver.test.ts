import { describe, it, expect } from 'vitest';
import { expandPeriod, resolveArguments, type ArgumentResolverDeps } from '../argumentResolver';
import { buildToolRegistry } from '../../tools/definitions';
import { CODES, isAppError } from '../../utils/errors';
import { NOW, ScriptedGeneration, testHistory, type Step } from '../../__tests__/fakes';

const registry = buildToolRegistry(testHistory());
const topTool = registry.get('top_n_entities');
const rangeTool = registry.get('date_range_filter');
if (!topTool || !rangeTool) throw new Error('tools missing');

function deps(script: Step[] = []): ArgumentResolverDeps & { generation: ScriptedGeneration } {
  return {
    generation: new ScriptedGeneration({ 'argument-resolver': script }),
    prompt: 'resolve',
    model: 'test-structured',
    now: () => NOW,
  };
}

async function rejection(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (e) {
    return e;
  }
  throw new Error('expected a rejection');
}

describe('expandPeriod', () => {
  it('replaces period with concrete dates', () => {
    expect(expandPeriod({ entity: 'artist', period: 'last year' }, NOW)).toEqual({
      entity: 'artist',
      startDate: '2025-01-01',
      endDate: '2025-12-31',
    });
  });

  it('returns undefined without a resolvable period', () => {
    expect(expandPeriod({ entity: 'artist' }, NOW)).toBeUndefined();
    expect(expandPeriod({ period: 'after the concert' }, NOW)).toBeUndefined();
  });
});

describe('resolveArguments', () => {
  it('uses valid arguments as given', async () => {
    const d = deps();
    const call = await resolveArguments(topTool, { entity: 'artist', n: 3 }, d);
    expect(call.args).toEqual({ entity: 'artist', n: 3 });
    expect(d.generation.calls).toHaveLength(0);
  });

  it('resolves "last year" to the previous calendar year without a model call', async () => {
    const d = deps();
    const call = await resolveArguments(topTool, { entity: 'artist', n: 3, period: 'last year' }, d);
    expect(call.args).toEqual({ entity: 'artist', n: 3, startDate: '2025-01-01', endDate: '2025-12-31' });
    expect(d.generation.calls).toHaveLength(0);
  });

  it('asks the model when the arguments are still incomplete', async () => {
    const d = deps([{ json: { startDate: '2025-09-01', endDate: '2025-12-31', limit: 10 } }]);
    const raw = { period: 'since september', limit: 10 };
    const call = await resolveArguments(rangeTool, raw, d);
    expect(call.args).toEqual({ startDate: '2025-09-01', endDate: '2025-12-31', limit: 10 });
    const [request] = d.generation.calls;
    expect(request.context).toMatchObject({ CURRENT_DATE: '2026-01-05', RAW_ARGS_JSON: raw });
  });

  it('fails with argument_resolution_failed when generated arguments do not validate', async () => {
    const d = deps([{ json: { artist: 'Artist One' } }]);
    const err = await rejection(resolveArguments(rangeTool, { artist: 'Artist One' }, d));
    expect(isAppError(err, CODES.argument_resolution_failed)).toBe(true);
  });

  it('fails with argument_resolution_failed when the model is unavailable', async () => {
    const d = deps([{ unavailable: true }]);
    const err = await rejection(resolveArguments(rangeTool, {}, d));
    expect(isAppError(err, CODES.argument_resolution_failed)).toBe(true);
  });

  it('fails with argument_resolution_failed when the model call times out', async () => {
    const d = { ...deps([{ hang: true }]), timeoutMs: 20 };
    const err = await rejection(resolveArguments(rangeTool, {}, d));
    expect(isAppError(err, CODES.argument_resolution_failed)).toBe(true);
    expect(err instanceof Error && isAppError(err.cause, CODES.timeout)).toBe(true);
  });

  it('propagates an abort', async () => {
    const d = deps([{ hang: true }]);
    const controller = new AbortController();
    const reason = new Error('stop');
    const pending = resolveArguments(rangeTool, {}, d, controller.signal);
    controller.abort(reason);
    expect(await rejection(pending)).toBe(reason);
  });
});
