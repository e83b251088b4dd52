import * as fs from 'node:fs/promises';

import { z } from 'zod';

import { AGENT_OPTION_SCHEMAS } from './config';
import { AgentConfigError, CliUsageError } from './errors';
import { errorMessage } from './files';
import type { AgentName } from './types';

export function usageText(): string {
  return [
    'installed-agents: run coding-agent CLIs inside a task container',
    '',
    'Usage:',
    '  installed-agents list',
    '  installed-agents plan  <agent> --instruction <text> [--model <provider/model>] [--option k=v]... [--config <path>]',
    '  installed-agents run   <agent> --container <id> --logs-dir <dir> --instruction <text> [--model <provider/model>]',
    '                         [--option k=v]... [--config <path>]',
    '  installed-agents usage <agent> --logs-dir <dir> [--instruction <text>] [--model <provider/model>]',
    '                         [--option k=v]... [--config <path>]',
    '  installed-agents version',
    '',
    'Agents: factory-droid, pi-mono',
    '',
    'Exit codes:',
    '  0 = OK',
    '  1 = agent run reported failure',
    '  2 = USAGE/CONFIG error',
    '',
    'Flag values may not start with "--"; pass such an instruction as @file.',
    '',
    'Examples:',
    "  installed-agents plan pi-mono --model openai/gpt-5.1-codex --instruction 'fix the failing test'",
    '  installed-agents run factory-droid --container task-1 --logs-dir ./logs --model anthropic/claude-opus --instruction @task.md',
    '  installed-agents usage pi-mono --logs-dir ./logs --model anthropic/claude-sonnet --option outputMode=text',
  ].join('\n');
}

// ---------------------------------------------------------------------------
// Flags
// ---------------------------------------------------------------------------

export function readFlag(args: string[], name: string): string | undefined {
  const idx = args.indexOf(name);
  if (idx === -1) return undefined;
  const value = args[idx + 1];
  if (!value || value.startsWith('--')) return undefined;
  return value;
}

export function hasFlag(args: string[], name: string): boolean {
  return args.includes(name);
}

function requireFlag(args: string[], name: string, command: string): string {
  const value = readFlag(args, name);
  if (!value) {
    throw new CliUsageError(`Missing required flag for ${command}: ${name}\n\nRun: installed-agents --help`);
  }
  return value;
}

export type OptionValue = string | number | boolean;

/** Strip optional/default/nullable wrappers down to the field's own type. */
function baseType(field: z.ZodTypeAny): z.ZodTypeAny {
  let current = field;
  while (
    current instanceof z.ZodOptional ||
    current instanceof z.ZodNullable ||
    current instanceof z.ZodDefault
  ) {
    current = current instanceof z.ZodDefault ? current.removeDefault() : current.unwrap();
  }
  return current;
}

/**
 * Convert a raw `--option` value to the type its schema field expects:
 * `true`/`false` for booleans, numerals for numbers. Everything else,
 * including values for unknown keys, stays a string for zod to judge.
 */
export function coerceOptionValue(field: z.ZodTypeAny | undefined, raw: string): OptionValue {
  const type = field ? baseType(field) : undefined;
  if (type instanceof z.ZodBoolean) {
    if (raw === 'true') return true;
    if (raw === 'false') return false;
  }
  if (type instanceof z.ZodNumber && /^-?\d+(\.\d+)?$/.test(raw)) {
    return Number(raw);
  }
  return raw;
}

export function coerceOptionValues(
  schema: z.AnyZodObject,
  raw: Record<string, string>
): Record<string, OptionValue> {
  const shape: Record<string, z.ZodTypeAny> = schema.shape;
  const out: Record<string, OptionValue> = {};
  for (const [key, value] of Object.entries(raw)) {
    out[key] = coerceOptionValue(shape[key], value);
  }
  return out;
}

/** Collect every `--option key=value` pair as raw strings; later pairs override earlier ones. */
export function readOptionFlags(args: string[]): Record<string, string> {
  const options: Record<string, string> = {};
  for (let i = 0; i < args.length; i++) {
    if (args[i] !== '--option') continue;
    const pair = args[i + 1];
    const eq = pair ? pair.indexOf('=') : -1;
    if (!pair || eq <= 0) {
      throw new CliUsageError('--option expects key=value');
    }
    options[pair.slice(0, eq)] = pair.slice(eq + 1);
    i++;
  }
  return options;
}

// ---------------------------------------------------------------------------
// Commands
// ---------------------------------------------------------------------------

export interface AgentArgs {
  agent: string;
  modelName?: string;
  /** Raw `--option` values, coerced per agent schema in resolveAgentOptions. */
  options: Record<string, string>;
  configPath?: string;
}

export type ParsedArgs =
  | { command: 'list' }
  | { command: 'version' }
  | (AgentArgs & { command: 'plan'; instruction: string })
  | (AgentArgs & { command: 'run'; instruction: string; container: string; logsDir: string })
  | (AgentArgs & { command: 'usage'; instruction?: string; logsDir: string });

function readAgentArgs(argv: string[], command: string): AgentArgs {
  const agent = argv[1];
  if (!agent || agent.startsWith('--')) {
    throw new CliUsageError(`Usage: installed-agents ${command} <agent> ...\n\nRun: installed-agents --help`);
  }
  return {
    agent,
    modelName: readFlag(argv, '--model'),
    options: readOptionFlags(argv),
    configPath: readFlag(argv, '--config'),
  };
}

export function parseCliArgs(argv: string[]): ParsedArgs {
  if (argv.length === 0 || hasFlag(argv, '--help') || hasFlag(argv, '-h')) {
    throw new CliUsageError(usageText());
  }

  if (argv[0] === 'version' || hasFlag(argv, '--version')) {
    return { command: 'version' };
  }

  if (argv[0] === 'list') {
    return { command: 'list' };
  }

  if (argv[0] === 'plan') {
    const base = readAgentArgs(argv, 'plan');
    return { ...base, command: 'plan', instruction: requireFlag(argv, '--instruction', 'plan') };
  }

  if (argv[0] === 'run') {
    const base = readAgentArgs(argv, 'run');
    return {
      ...base,
      command: 'run',
      instruction: requireFlag(argv, '--instruction', 'run'),
      container: requireFlag(argv, '--container', 'run'),
      logsDir: requireFlag(argv, '--logs-dir', 'run'),
    };
  }

  if (argv[0] === 'usage') {
    const base = readAgentArgs(argv, 'usage');
    return {
      ...base,
      command: 'usage',
      instruction: readFlag(argv, '--instruction'),
      logsDir: requireFlag(argv, '--logs-dir', 'usage'),
    };
  }

  throw new CliUsageError(usageText());
}

/** An instruction of the form `@path` is read from that file. */
export async function resolveInstruction(value: string): Promise<string> {
  if (!value.startsWith('@')) return value;
  const path = value.slice(1);
  try {
    return await fs.readFile(path, 'utf8');
  } catch (err) {
    throw new CliUsageError(`Could not read instruction file at ${path}: ${errorMessage(err)}`);
  }
}

// ---------------------------------------------------------------------------
// Config file
// ---------------------------------------------------------------------------

const AgentOptionsRecordSchema = z.record(z.unknown());

export const AgentsConfigFileSchema = z.object({
  config_version: z.literal('1'),
  agents: z
    .object({
      'factory-droid': AgentOptionsRecordSchema.optional(),
      'pi-mono': AgentOptionsRecordSchema.optional(),
    })
    .strict()
    .default({}),
});

export type AgentsConfigFile = z.infer<typeof AgentsConfigFileSchema>;

export async function loadAgentsConfigFile(path: string): Promise<AgentsConfigFile> {
  let raw: string;
  try {
    raw = await fs.readFile(path, 'utf8');
  } catch (err) {
    throw new AgentConfigError(`Could not read config file at ${path}: ${errorMessage(err)}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new AgentConfigError(`Config file is not valid JSON: ${errorMessage(err)}`);
  }

  const result = AgentsConfigFileSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new AgentConfigError(`Config must be {"config_version":"1","agents":{...}}: ${issues}`);
  }
  return result.data;
}

/** Options for one agent: config file values first, `--option` flags on top. */
export async function resolveAgentOptions(
  agent: AgentName,
  args: Pick<AgentArgs, 'options' | 'configPath'>
): Promise<Record<string, unknown>> {
  const fromFile = args.configPath ? (await loadAgentsConfigFile(args.configPath)).agents[agent] : undefined;
  return { ...(fromFile ?? {}), ...coerceOptionValues(AGENT_OPTION_SCHEMAS[agent], args.options) };
}
