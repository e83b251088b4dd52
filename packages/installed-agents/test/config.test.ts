import { describe, expect, it } from 'vitest';

import {
  FactoryDroidOptionsSchema,
  PiMonoOptionsSchema,
  mapPiModel,
  normalizeModelId,
  parseAgentOptions,
  resolveDroidModel,
  resolvePiModelConfig,
} from '../src/config';
import { AgentConfigError } from '../src/errors';
import { captureLogger } from './fake-environment';

describe('resolvePiModelConfig', () => {
  it('takes the provider from a provider/model name', () => {
    expect(resolvePiModelConfig({ modelName: 'openai/gpt-5.1-codex' })).toEqual({
      provider: 'openai',
      piModel: 'gpt-5.1-codex',
    });
  });

  it('accepts an explicit provider alongside a prefixed model name', () => {
    expect(resolvePiModelConfig({ modelName: 'openai/gpt-5.1-codex', provider: 'openai' })).toEqual({
      provider: 'openai',
      piModel: 'gpt-5.1-codex',
    });
  });

  it('strips a repeated provider prefix from an explicit pi model', () => {
    expect(resolvePiModelConfig({ provider: 'openai', piModel: 'openai/gpt-5.1-codex' })).toEqual({
      provider: 'openai',
      piModel: 'gpt-5.1-codex',
    });
  });

  it('maps claude shorthands by family', () => {
    expect(resolvePiModelConfig({ modelName: 'anthropic/claude-3-haiku' }).piModel).toBe('claude-3-5-haiku-latest');
    expect(resolvePiModelConfig({ modelName: 'anthropic/claude-opus' }).piModel).toBe('claude-3-opus-latest');
    expect(resolvePiModelConfig({ modelName: 'anthropic/claude' }).piModel).toBeNull();
  });

  it('passes unrecognised model names through', () => {
    expect(resolvePiModelConfig({ modelName: 'groq/llama-3.1-70b' })).toEqual({
      provider: 'groq',
      piModel: 'llama-3.1-70b',
    });
    expect(resolvePiModelConfig({ modelName: 'google/gemini-pro' }).piModel).toBe('gemini-2.0-flash-exp');
  });

  it('requires provider/model when no provider option is set', () => {
    expect(() => resolvePiModelConfig({ modelName: 'claude-sonnet' })).toThrow(AgentConfigError);
    expect(() => resolvePiModelConfig({})).toThrow("pi-mono expects a model name like 'provider/model'.");
  });

  it('rejects unknown providers', () => {
    expect(() => resolvePiModelConfig({ modelName: 'mistral/large' })).toThrow(
      "Unknown provider 'mistral' for pi-mono agent. Supported: anthropic, openai, google, groq, cerebras, xai, openrouter"
    );
  });
});

describe('mapPiModel', () => {
  it('maps gpt variants', () => {
    expect(mapPiModel('gpt-5.1-codex-mini')).toBe('gpt-5.1-codex-mini');
    expect(mapPiModel('gpt-5.1')).toBe('gpt-5.1');
    expect(mapPiModel('gpt-4-turbo')).toBe('gpt-4-turbo');
    expect(mapPiModel('gpt-o1')).toBe('o1-preview');
    expect(mapPiModel('gpt-3.5')).toBe('gpt-3.5-turbo');
  });

  it('warns before defaulting an unknown gpt model', () => {
    const logger = captureLogger();
    expect(mapPiModel('gpt-9', logger)).toBe('gpt-4o');
    expect(logger.lines).toEqual(["warn: Unknown GPT model 'gpt-9', defaulting to gpt-4o"]);
  });

  it('returns null for an empty model', () => {
    expect(mapPiModel('')).toBeNull();
  });
});

describe('normalizeModelId', () => {
  it('strips a prefix matching the provider, case-insensitively', () => {
    expect(normalizeModelId('openai', 'OpenAI/gpt-5')).toBe('gpt-5');
  });

  it('keeps other prefixes and plain ids', () => {
    expect(normalizeModelId('openrouter', 'anthropic/claude-3.5-sonnet')).toBe('anthropic/claude-3.5-sonnet');
    expect(normalizeModelId('openai', 'gpt-5')).toBe('gpt-5');
    expect(normalizeModelId('openai', null)).toBeNull();
  });
});

describe('resolveDroidModel', () => {
  it('uses the droidModel option without a model name', () => {
    expect(resolveDroidModel(undefined, 'sonnet')).toBe('claude-sonnet-4-20250514');
    expect(resolveDroidModel(undefined, 'gpt-5-high')).toBe('gpt-5-codex-high');
  });

  it('picks the shorthand from an anthropic model name', () => {
    expect(resolveDroidModel('anthropic/claude-opus-4', 'sonnet')).toBe('claude-opus-4-1-20250805');
    expect(resolveDroidModel('anthropic/claude-3-haiku', 'opus')).toBe('claude-sonnet-4-20250514');
  });

  it('maps openai gpt-5 names and keeps the option otherwise', () => {
    expect(resolveDroidModel('openai/gpt-5-codex', 'sonnet')).toBe('gpt-5-codex');
    expect(resolveDroidModel('openai/gpt-4o', 'opus')).toBe('claude-opus-4-1-20250805');
  });

  it('passes factory models and bare names through', () => {
    expect(resolveDroidModel('factory/droid-core', 'sonnet')).toBe('droid-core');
    expect(resolveDroidModel('glm-4.6', 'sonnet')).toBe('glm-4.6');
    expect(resolveDroidModel('opus', 'sonnet')).toBe('claude-opus-4-1-20250805');
  });

  it('rejects unknown providers', () => {
    expect(() => resolveDroidModel('google/gemini-pro', 'sonnet')).toThrow(
      "Unknown provider 'google' for factory-droid agent. Supported: anthropic, openai, factory"
    );
  });
});

describe('parseAgentOptions', () => {
  it('fills defaults', () => {
    expect(parseAgentOptions(FactoryDroidOptionsSchema, undefined, 'factory-droid')).toEqual({
      droidModel: 'sonnet',
      reasoningEffort: 'medium',
      timeoutSeconds: 1800,
    });
    expect(parseAgentOptions(PiMonoOptionsSchema, {}, 'pi-mono')).toEqual({
      outputMode: 'json',
      noSession: false,
      timeoutSeconds: 1800,
    });
  });

  it('reports invalid values with their path', () => {
    expect(() => parseAgentOptions(PiMonoOptionsSchema, { outputMode: 'xml' }, 'pi-mono')).toThrow(
      /^Invalid options for pi-mono: outputMode: /
    );
    expect(() => parseAgentOptions(PiMonoOptionsSchema, { timeoutSeconds: 0 }, 'pi-mono')).toThrow(
      /timeoutSeconds: /
    );
  });

  it('rejects unknown keys', () => {
    expect(() => parseAgentOptions(FactoryDroidOptionsSchema, { timeout: 5 }, 'factory-droid')).toThrow(
      "Invalid options for factory-droid: (root): Unrecognized key(s) in object: 'timeout'"
    );
  });
});
