/**
 * Agent options and provider/model resolution.
 *
 * Options arrive as loose key/value input (constructor arguments, CLI flags,
 * a config file) and are validated here before any command is built.
 */

import { z } from 'zod';

import { AgentConfigError } from './errors';
import type { AgentName, Logger, Provider } from './types';

// ---------------------------------------------------------------------------
// Option schemas
// ---------------------------------------------------------------------------

const TimeoutSecondsSchema = z.number().int().positive().default(1800);

export const ReasoningEffortSchema = z.enum(['off', 'low', 'medium', 'high']);
export type ReasoningEffort = z.infer<typeof ReasoningEffortSchema>;

export const FactoryDroidOptionsSchema = z
  .object({
    /** Shorthand (sonnet, opus, gpt-5, ...) or a Factory model id. */
    droidModel: z.string().min(1).default('sonnet'),
    reasoningEffort: ReasoningEffortSchema.default('medium'),
    timeoutSeconds: TimeoutSecondsSchema,
    /** Host directory holding auth.json, settings.json and config.json. */
    factoryHome: z.string().min(1).optional(),
  })
  .strict();

export type FactoryDroidOptions = z.input<typeof FactoryDroidOptionsSchema>;
export type ResolvedFactoryDroidOptions = z.output<typeof FactoryDroidOptionsSchema>;

export const OutputModeSchema = z.enum(['json', 'text']);
export type OutputMode = z.infer<typeof OutputModeSchema>;

export const PiMonoOptionsSchema = z
  .object({
    provider: z.string().min(1).optional(),
    /** Exact pi model id; skips shorthand mapping. */
    piModel: z.string().min(1).optional(),
    outputMode: OutputModeSchema.default('json'),
    noSession: z.boolean().default(false),
    timeoutSeconds: TimeoutSecondsSchema,
    /** npm version of pi-coding-agent to install (default: latest). */
    piVersion: z.string().min(1).optional(),
    /** Prebuilt `npm pack` tarball uploaded instead of installing from the registry. */
    bundlePath: z.string().min(1).optional(),
  })
  .strict();

export type PiMonoOptions = z.input<typeof PiMonoOptionsSchema>;
export type ResolvedPiMonoOptions = z.output<typeof PiMonoOptionsSchema>;

/** Option schema per agent, keyed like the registry. */
export const AGENT_OPTION_SCHEMAS = {
  'factory-droid': FactoryDroidOptionsSchema,
  'pi-mono': PiMonoOptionsSchema,
} satisfies Record<AgentName, z.AnyZodObject>;

export function parseAgentOptions<S extends z.ZodTypeAny>(
  schema: S,
  raw: unknown,
  agent: string
): z.output<S> {
  const result = schema.safeParse(raw ?? {});
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new AgentConfigError(`Invalid options for ${agent}: ${issues}`);
  }
  return result.data;
}

// ---------------------------------------------------------------------------
// Model names
// ---------------------------------------------------------------------------

/** Split "provider/model" at the first slash. */
export function splitModelName(modelName: string): [string, string] | null {
  const idx = modelName.indexOf('/');
  if (idx === -1) return null;
  return [modelName.slice(0, idx), modelName.slice(idx + 1)];
}

/**
 * Drop a leading "provider/" that repeats the selected provider, so
 * `--provider openai --model openai/gpt-5.1-codex` becomes `gpt-5.1-codex`.
 */
export function normalizeModelId(provider: string, model: string | null): string | null {
  if (!model) return model;
  const split = splitModelName(model);
  if (!split) return model;
  const [prefix, remainder] = split;
  return prefix.toLowerCase() === provider.toLowerCase() ? remainder : model;
}

// ---------------------------------------------------------------------------
// pi-coding-agent
// ---------------------------------------------------------------------------

/** Harness provider name → pi provider name. */
export const PI_PROVIDERS: Record<Provider, string> = {
  anthropic: 'anthropic',
  openai: 'openai',
  google: 'google',
  groq: 'groq',
  cerebras: 'cerebras',
  xai: 'xai',
  openrouter: 'openrouter',
};

export function isProvider(value: string): value is Provider {
  return Object.prototype.hasOwnProperty.call(PI_PROVIDERS, value);
}

/** Map a loosely named model to a pi model id; null when there is nothing to pass. */
export function mapPiModel(model: string, logger?: Logger): string | null {
  const lower = model.toLowerCase();

  if (lower.includes('claude')) {
    if (lower.includes('haiku')) return 'claude-3-5-haiku-latest';
    if (lower.includes('opus')) return 'claude-3-opus-latest';
    if (lower.includes('sonnet')) return 'claude-3-5-sonnet-latest';
    return null;
  }

  if (lower.includes('gpt')) {
    if (lower.includes('5.1-codex-mini')) return 'gpt-5.1-codex-mini';
    if (lower.includes('5.1-codex')) return 'gpt-5.1-codex';
    if (lower.includes('5.1')) return 'gpt-5.1';
    if (lower.includes('4o')) return 'gpt-4o';
    if (lower.includes('4-turbo') || lower.includes('4turbo')) return 'gpt-4-turbo';
    if (lower.includes('o1')) return 'o1-preview';
    if (lower.includes('3.5')) return 'gpt-3.5-turbo';
    logger?.warn(`Unknown GPT model '${model}', defaulting to gpt-4o`);
    return 'gpt-4o';
  }

  if (lower.includes('gemini')) return 'gemini-2.0-flash-exp';

  return model || null;
}

export interface PiModelConfig {
  provider: Provider;
  /** Model id passed to `pi --model`; null lets pi choose. */
  piModel: string | null;
}

export function resolvePiModelConfig(params: {
  modelName?: string;
  provider?: string;
  piModel?: string;
  logger?: Logger;
}): PiModelConfig {
  let provider: string;
  let model: string;

  if (!params.provider) {
    const split = params.modelName ? splitModelName(params.modelName) : null;
    if (!split) {
      throw new AgentConfigError("pi-mono expects a model name like 'provider/model'.");
    }
    [provider, model] = split;
  } else {
    provider = params.provider;
    const split = params.modelName ? splitModelName(params.modelName) : null;
    model = split ? split[1] : params.modelName ?? '';
  }

  if (!isProvider(provider)) {
    throw new AgentConfigError(
      `Unknown provider '${provider}' for pi-mono agent. Supported: ${Object.keys(PI_PROVIDERS).join(', ')}`
    );
  }

  const piModel = params.piModel ?? mapPiModel(model, params.logger);

  return {
    provider,
    piModel: normalizeModelId(PI_PROVIDERS[provider], piModel),
  };
}

// ---------------------------------------------------------------------------
// Factory Droid
// ---------------------------------------------------------------------------

/** Shorthand → Factory model id. Factory has no haiku, so it falls back to sonnet. */
export const DROID_MODEL_IDS: Readonly<Record<string, string>> = {
  sonnet: 'claude-sonnet-4-20250514',
  opus: 'claude-opus-4-1-20250805',
  haiku: 'claude-sonnet-4-20250514',
  'gpt-5': 'gpt-5-codex',
  'gpt-5-codex': 'gpt-5-codex',
  'gpt-5-high': 'gpt-5-codex-high',
};

/** Providers a "provider/model" name may name for Factory Droid. */
export const DROID_PROVIDERS = ['anthropic', 'openai', 'factory'] as const;

function isDroidProvider(value: string): value is (typeof DROID_PROVIDERS)[number] {
  return DROID_PROVIDERS.some((p) => p === value);
}

/**
 * Resolve the `droid exec -m` model. A "provider/model" name picks the
 * shorthand by family; a bare name is used as the shorthand itself; without
 * a name the `droidModel` option applies.
 */
export function resolveDroidModel(modelName: string | undefined, droidModel: string): string {
  let shorthand = droidModel;

  if (modelName) {
    const split = splitModelName(modelName);
    if (!split) {
      shorthand = modelName;
    } else {
      const [provider, model] = split;
      if (!isDroidProvider(provider)) {
        throw new AgentConfigError(
          `Unknown provider '${provider}' for factory-droid agent. Supported: ${DROID_PROVIDERS.join(', ')}`
        );
      }

      const lower = model.toLowerCase();
      if (provider === 'anthropic') {
        if (lower.includes('haiku')) shorthand = 'haiku';
        else if (lower.includes('opus')) shorthand = 'opus';
        else if (lower.includes('sonnet')) shorthand = 'sonnet';
      } else if (provider === 'openai') {
        if (lower.includes('gpt-5')) shorthand = 'gpt-5';
      } else if (model) {
        shorthand = model;
      }
    }
  }

  return DROID_MODEL_IDS[shorthand] ?? shorthand;
}
