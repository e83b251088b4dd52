import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

import { afterEach, describe, expect, it } from 'vitest';

import { DROID_SESSION_COMPLETE, extractDroidUsage } from '../src/usage/droid-output';
import { droidCostPer1k, piOutputCostPer1k } from '../src/usage/pricing';
import { tempDirs } from './fake-environment';

const dirs = tempDirs();
afterEach(() => dirs.cleanup());

async function writeLog(dir: string, content: string): Promise<string> {
  const path = join(dir, 'droid_output.log');
  await writeFile(path, content, 'utf8');
  return path;
}

describe('extractDroidUsage', () => {
  it('estimates tokens from output and instruction length', async () => {
    const dir = await dirs.make();
    const path = await writeLog(dir, `${'a'.repeat(399)}\n`);

    const result = await extractDroidUsage(path, {
      droidModel: 'claude-sonnet-4-20250514',
      reasoningEffort: 'medium',
      instruction: 'b'.repeat(40),
      logsDir: dir,
    });

    expect(result.outcome).toBe('estimated');
    expect(result.context.nOutputTokens).toBe(100);
    expect(result.context.nInputTokens).toBe(10);
    // 110 tokens at 0.003 per 1k.
    expect(result.context.costUsd).toBeCloseTo(0.00033);
    expect(result.context.success).toBe(true);
    expect(result.context.metadata).toEqual({
      droid_model: 'claude-sonnet-4-20250514',
      reasoning_effort: 'medium',
      success: true,
      session_complete: false,
      output_lines: 2,
      errors: null,
    });
  });

  it('collects error lines and fails the run', async () => {
    const dir = await dirs.make();
    const path = await writeLog(dir, 'Error: not authenticated\nTask failed\nok\n');

    const result = await extractDroidUsage(path, {
      droidModel: 'gpt-5-codex',
      reasoningEffort: 'high',
      instruction: null,
      logsDir: dir,
    });

    expect(result.context.nOutputTokens).toBe(10);
    expect(result.context.nInputTokens).toBeNull();
    expect(result.context.costUsd).toBeCloseTo(0.0001);
    expect(result.context.success).toBe(false);
    expect(result.context.metadata.errors).toEqual(['Error: not authenticated', 'Task failed']);
    expect(result.context.metadata.output_lines).toBe(4);
  });

  it('flags a completed session', async () => {
    const dir = await dirs.make();
    const path = await writeLog(dir, `done\n${DROID_SESSION_COMPLETE}\n`);

    const result = await extractDroidUsage(path, {
      droidModel: 'droid-core',
      reasoningEffort: 'off',
      instruction: 'go',
      logsDir: dir,
    });

    expect(result.context.metadata.session_complete).toBe(true);
  });

  it('leaves output tokens unset for an empty log', async () => {
    const dir = await dirs.make();
    const path = await writeLog(dir, '');

    const result = await extractDroidUsage(path, {
      droidModel: 'claude-sonnet-4-20250514',
      reasoningEffort: 'medium',
      instruction: 'hi',
      logsDir: dir,
    });

    expect(result.context.nOutputTokens).toBeNull();
    expect(result.context.nInputTokens).toBe(1);
    expect(result.context.success).toBe(false);
  });

  it('samples command output when the main log is missing', async () => {
    const dir = await dirs.make();
    await mkdir(join(dir, 'command-1'), { recursive: true });
    await writeFile(join(dir, 'command-1', 'stdout.txt'), 'z'.repeat(600), 'utf8');

    const result = await extractDroidUsage(join(dir, 'droid_output.log'), {
      droidModel: 'claude-sonnet-4-20250514',
      reasoningEffort: 'medium',
      instruction: 'go',
      logsDir: dir,
    });

    expect(result.outcome).toBe('missing');
    expect(result.context.metadata).toEqual({
      error: 'No main output file',
      command_output_sample: 'z'.repeat(500),
      droid_model: 'claude-sonnet-4-20250514',
    });
  });

  it('reports a missing log with no command output', async () => {
    const dir = await dirs.make();

    const result = await extractDroidUsage(join(dir, 'droid_output.log'), {
      droidModel: 'gpt-5-codex',
      reasoningEffort: 'medium',
      instruction: null,
      logsDir: dir,
    });

    expect(result.outcome).toBe('missing');
    expect(result.context.metadata).toEqual({ error: 'No output file found', droid_model: 'gpt-5-codex' });
    expect(result.context.success).toBeNull();
  });

  it('skips command output it cannot read', async () => {
    const dir = await dirs.make();
    await mkdir(join(dir, 'command-0', 'stdout.txt'), { recursive: true });

    const result = await extractDroidUsage(join(dir, 'droid_output.log'), {
      droidModel: 'gpt-5-codex',
      reasoningEffort: 'medium',
      instruction: null,
      logsDir: dir,
    });

    expect(result.outcome).toBe('missing');
    expect(result.context.metadata).toEqual({ error: 'No output file found', droid_model: 'gpt-5-codex' });
  });

  it('samples a later command when an earlier one is unreadable', async () => {
    const dir = await dirs.make();
    await mkdir(join(dir, 'command-0', 'stdout.txt'), { recursive: true });
    await mkdir(join(dir, 'command-2'), { recursive: true });
    await writeFile(join(dir, 'command-2', 'stdout.txt'), 'Auth file found\n', 'utf8');

    const result = await extractDroidUsage(join(dir, 'droid_output.log'), {
      droidModel: 'gpt-5-codex',
      reasoningEffort: 'medium',
      instruction: null,
      logsDir: dir,
    });

    expect(result.context.metadata).toEqual({
      error: 'No main output file',
      command_output_sample: 'Auth file found\n',
      droid_model: 'gpt-5-codex',
    });
  });
});

describe('pricing', () => {
  it('rates droid models by family', () => {
    expect(droidCostPer1k('claude-opus-4-1-20250805')).toBe(0.015);
    expect(droidCostPer1k('gpt-5-codex-high')).toBe(0.01);
    expect(droidCostPer1k('glm-4.6')).toBe(0.003);
  });

  it('rates pi output by provider with a default', () => {
    expect(piOutputCostPer1k('anthropic')).toBe(0.015);
    expect(piOutputCostPer1k('groq')).toBe(0);
    expect(piOutputCostPer1k('xai')).toBe(0.002);
  });
});
