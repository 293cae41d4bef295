import fs from 'fs';
import os from 'os';
import path from 'path';
import { describe, it, expect, afterEach } from 'vitest';
import { loadPrompt, loadPromptSet, PROMPT_NAMES } from '../promptLoader';
import { PERSONAS, limitationsNotice } from '../personas';
import type { FetchResult } from '../../types/state';

describe('promptLoader', () => {
  const saved = process.env.PROMPTS_PATH;
  afterEach(() => {
    if (saved === undefined) delete process.env.PROMPTS_PATH;
    else process.env.PROMPTS_PATH = saved;
  });

  it('loads every prompt the pipeline uses from the repository', () => {
    const prompts = loadPromptSet();
    for (const name of Object.values(PROMPT_NAMES)) {
      expect(prompts[name].startsWith('<')).toBe(true);
    }
    expect(prompts['intent-parser']).toContain('TOOLS_JSON');
  });

  it('reads from PROMPTS_PATH and strips a byte order mark', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'listening-prompts-'));
    fs.writeFileSync(path.join(dir, 'custom-agent.xml'), '\uFEFF<custom/>\n');
    process.env.PROMPTS_PATH = dir;
    expect(loadPrompt('custom-agent')).toBe('<custom/>');
  });

  it('uses the fallback for a missing file and throws without one', () => {
    process.env.PROMPTS_PATH = fs.mkdtempSync(path.join(os.tmpdir(), 'listening-prompts-'));
    expect(loadPrompt('absent-agent', '<fallback/>')).toBe('<fallback/>');
    expect(() => loadPrompt('another-absent-agent')).toThrow(/Prompt XML not found/);
  });
});

describe('personas', () => {
  it('maps every intent to a persona prompt', () => {
    expect(PERSONAS.factual_query.name).toBe('FactChecker');
    expect(PERSONAS.insight_analysis.name).toBe('MusicCriticAnalyst');
    expect(PERSONAS.recommendation.name).toBe('RecommendationExpert');
    expect(PERSONAS.other.name).toBe('DirectResponder');
  });

  it('combines the partial and truncated notices', () => {
    const results: FetchResult[] = [
      { toolName: 'summary_stats', status: 'ok', payload: '{}', truncated: true, attempts: 1 },
      { toolName: 'listening_trend', status: 'timed_out', payload: '', truncated: false, attempts: 3 },
      { toolName: 'top_n_entities', status: 'failed', payload: '', truncated: false, attempts: 3 },
    ];
    expect(limitationsNotice(results)).toBe(
      'Based on partial data: could not retrieve listening_trend, top_n_entities. Some results were truncated, so this may not be complete.'
    );
    expect(limitationsNotice([results[0]].map((r) => ({ ...r, truncated: false })))).toBeUndefined();
  });
});
