import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';

import { afterEach, describe, expect, it } from 'vitest';

import { countAssistantContentChars, extractPiUsage, sumPiUsage } from '../src/usage/pi-transcript';
import { tempDirs } from './fake-environment';

const dirs = tempDirs();
afterEach(() => dirs.cleanup());

function messageEnd(usage: Record<string, unknown>, role = 'assistant'): string {
  return JSON.stringify({ type: 'message_end', message: { role, usage } });
}

async function writeTranscript(lines: string[]): Promise<string> {
  const path = join(await dirs.make(), 'pi_output.log');
  await writeFile(path, `${lines.join('\n')}\n`, 'utf8');
  return path;
}

const piOptions = {
  provider: 'anthropic' as const,
  model: 'claude-3-5-sonnet-latest',
  outputMode: 'json' as const,
  noSession: false,
};

describe('sumPiUsage', () => {
  it('sums assistant message_end usage and accepts both cost shapes', () => {
    const totals = sumPiUsage([
      '{"type":"agent_start"}',
      messageEnd({ input: 100, output: 20, cacheRead: 5, cacheWrite: 1, cost: 0.02 }),
      messageEnd({ input: 999, output: 999 }, 'user'),
      'plain text progress line',
      messageEnd({ input: 50, output: 10, cost: { total: 0.03, input: 0.01 } }),
    ]);

    expect(totals.input).toBe(150);
    expect(totals.output).toBe(30);
    expect(totals.cacheRead).toBe(5);
    expect(totals.cacheWrite).toBe(1);
    expect(totals.cost).toBeCloseTo(0.05);
  });

  it('skips malformed lines and events with negative or fractional counts', () => {
    const totals = sumPiUsage([
      '{"type":"message_end","message":{"role":"assistant","usage":{"input":',
      messageEnd({ input: -5, output: 10 }),
      messageEnd({ input: 1.5, output: 2.5 }),
      messageEnd({ input: 7, output: 3 }),
    ]);

    expect(totals).toEqual({ input: 7, output: 3, cacheRead: 0, cacheWrite: 0, cost: 0 });
  });
});

describe('countAssistantContentChars', () => {
  it('counts string content by length and structured content by its JSON', () => {
    const lines = [
      JSON.stringify({ type: 'message_update', message: { role: 'assistant', content: 'x'.repeat(40) } }),
      JSON.stringify({ type: 'message_update', message: { role: 'assistant', content: [{ type: 'text', text: 'abcd' }] } }),
      JSON.stringify({ type: 'message_update', message: { role: 'user', content: 'ignored' } }),
    ];
    // '[{"type":"text","text":"abcd"}]' is 31 characters.
    expect(countAssistantContentChars(lines)).toBe(71);
  });

  it('ignores assistant lines that do not decode', () => {
    expect(countAssistantContentChars(['{"role":"assistant","content": broken'])).toBe(0);
  });
});

describe('extractPiUsage', () => {
  it('reports the summed usage from a json transcript', async () => {
    const path = await writeTranscript([
      '{"type":"agent_start"}',
      messageEnd({ input: 100, output: 20, cacheRead: 5, cacheWrite: 1, cost: 0.02 }),
      messageEnd({ input: 50, output: 10, cost: { total: 0.03 } }),
    ]);

    const result = await extractPiUsage(path, piOptions);

    expect(result.outcome).toBe('reported');
    expect(result.context.nInputTokens).toBe(150);
    expect(result.context.nOutputTokens).toBe(30);
    expect(result.context.nCacheTokens).toBe(5);
    expect(result.context.nCacheWriteTokens).toBe(1);
    expect(result.context.costUsd).toBeCloseTo(0.05);
    expect(result.context.success).toBe(true);
    expect(result.context.metadata).toEqual({
      provider: 'anthropic',
      model: 'claude-3-5-sonnet-latest',
      output_mode: 'json',
      success: true,
      session_saved: true,
      actual_api_usage: true,
    });
  });

  it('estimates usage when the transcript reports none', async () => {
    const path = await writeTranscript(['Hello world']);

    const result = await extractPiUsage(path, { ...piOptions, model: null, outputMode: 'text', noSession: true });

    expect(result.outcome).toBe('estimated');
    expect(result.context.nInputTokens).toBe(500);
    expect(result.context.nOutputTokens).toBe(100);
    expect(result.context.nCacheTokens).toBe(0);
    // 500 input at 0.015/5 per 1k plus 100 output at 0.015 per 1k.
    expect(result.context.costUsd).toBeCloseTo(0.003);
    expect(result.context.success).toBe(false);
    expect(result.context.metadata).toEqual({
      provider: 'anthropic',
      model: 'default',
      output_mode: 'text',
      success: false,
      session_saved: false,
      actual_api_usage: false,
    });
  });

  it('estimates output tokens from assistant content length', async () => {
    const path = await writeTranscript([
      JSON.stringify({ type: 'message_update', message: { role: 'assistant', content: 'y'.repeat(800) } }),
    ]);

    const result = await extractPiUsage(path, { ...piOptions, provider: 'openai', model: 'gpt-4o' });

    expect(result.outcome).toBe('estimated');
    expect(result.context.nOutputTokens).toBe(200);
    expect(result.context.costUsd).toBeCloseTo(0.0006);
  });

  it('marks the run failed when an error appears near the top', async () => {
    const path = await writeTranscript(['Error: 401 unauthorized', messageEnd({ input: 10, output: 10 })]);

    const result = await extractPiUsage(path, piOptions);

    expect(result.outcome).toBe('reported');
    expect(result.context.success).toBe(false);
  });

  it('returns a missing outcome with an error marker when there is no transcript', async () => {
    const dir = await dirs.make();

    const result = await extractPiUsage(join(dir, 'pi_output.log'), {
      ...piOptions,
      provider: 'openai',
      model: 'gpt-5.1-codex',
    });

    expect(result.outcome).toBe('missing');
    expect(result.context.nInputTokens).toBeNull();
    expect(result.context.costUsd).toBeNull();
    expect(result.context.metadata).toEqual({
      error: 'No output file found',
      provider: 'openai',
      model: 'gpt-5.1-codex',
    });
  });

  it('returns a failed outcome when the transcript cannot be read', async () => {
    const dir = await dirs.make();

    const result = await extractPiUsage(dir, piOptions);

    expect(result.outcome).toBe('failed');
    expect(result.context.metadata.error).toEqual(expect.stringContaining('EISDIR'));
  });
});
