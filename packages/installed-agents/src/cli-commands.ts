/**
 * Command implementations behind the `installed-agents` binary.
 *
 * Every command writes one JSON document to stdout; progress goes through
 * the logger (stderr). runCli never throws: failures become an ERROR
 * document and an exit code.
 */

import { createAgent, isAgentName, listAgents } from './agents/index';
import type { BaseInstalledAgent } from './base';
import {
  parseCliArgs,
  resolveAgentOptions,
  resolveInstruction,
  type AgentArgs,
} from './cli-args';
import type { AgentEnv } from './env';
import type { ExecutionEnvironment } from './environment';
import { AgentConfigError, AgentSetupError, CliUsageError } from './errors';
import type { AgentContext, ExecInput, JsonValue, Logger } from './types';
import { createAgentContext, formatCost } from './usage/record';

export const CLI_VERSION = '0.1.0';

const REDACTED = '[REDACTED]';

export interface CliDeps {
  env: AgentEnv;
  logger: Logger;
  stdout: (text: string) => void;
  createEnvironment: (container: string) => ExecutionEnvironment;
}

type ErrorCode = 'USAGE_ERROR' | 'CONFIG_ERROR' | 'SETUP_ERROR' | 'INTERNAL_ERROR';

function output(deps: CliDeps, value: JsonValue): void {
  deps.stdout(`${JSON.stringify(value, null, 2)}\n`);
}

function errorOutput(deps: CliDeps, code: ErrorCode, reason: string): void {
  output(deps, { status: 'ERROR', reason_code: code, reason });
}

/** Command descriptor as printed by `plan`: env values never leave the process. */
export function redactExecInput(input: ExecInput): JsonValue {
  const out: { [key: string]: JsonValue } = { command: input.command };
  if (input.cwd) out.cwd = input.cwd;
  if (input.timeoutSec !== undefined) out.timeout_sec = input.timeoutSec;
  if (input.env) {
    const env: { [key: string]: JsonValue } = {};
    for (const key of Object.keys(input.env).sort()) env[key] = REDACTED;
    out.env = env;
  }
  return out;
}

function contextJson(context: AgentContext): JsonValue {
  return {
    n_input_tokens: context.nInputTokens,
    n_output_tokens: context.nOutputTokens,
    n_cache_tokens: context.nCacheTokens,
    n_cache_write_tokens: context.nCacheWriteTokens,
    cost_usd: context.costUsd,
    success: context.success,
    metadata: context.metadata,
  };
}

function exitCodeForContext(context: AgentContext): number {
  return context.success === false ? 1 : 0;
}

async function buildAgent(
  args: AgentArgs,
  logsDir: string,
  deps: CliDeps
): Promise<BaseInstalledAgent> {
  if (!isAgentName(args.agent)) {
    throw new AgentConfigError(`Unknown agent "${args.agent}". Supported: ${listAgents().join(', ')}`);
  }
  const options = await resolveAgentOptions(args.agent, args);
  return createAgent(
    args.agent,
    { logsDir, modelName: args.modelName, env: deps.env, logger: deps.logger },
    options
  );
}

function logUsageSummary(deps: CliDeps, agent: BaseInstalledAgent, context: AgentContext): void {
  deps.logger.info(
    `${agent.name()}: input=${context.nInputTokens ?? 'n/a'} output=${context.nOutputTokens ?? 'n/a'} ` +
      `cost=${formatCost(context.costUsd)} success=${String(context.success)}`
  );
}

async function dispatch(argv: string[], deps: CliDeps): Promise<number> {
  const parsed = parseCliArgs(argv);

  if (parsed.command === 'version') {
    deps.stdout(`installed-agents ${CLI_VERSION}\n`);
    return 0;
  }

  if (parsed.command === 'list') {
    output(deps, { agents: listAgents() });
    return 0;
  }

  if (parsed.command === 'plan') {
    const instruction = await resolveInstruction(parsed.instruction);
    const agent = await buildAgent(parsed, '.', deps);
    output(deps, {
      agent: agent.name(),
      version: agent.version(),
      commands: agent.createRunAgentCommands(instruction).map(redactExecInput),
    });
    return 0;
  }

  if (parsed.command === 'run') {
    const instruction = await resolveInstruction(parsed.instruction);
    const agent = await buildAgent(parsed, parsed.logsDir, deps);
    const environment = deps.createEnvironment(parsed.container);

    await agent.setup(environment);
    const context = await agent.run(instruction, environment, createAgentContext());

    logUsageSummary(deps, agent, context);
    output(deps, { agent: agent.name(), context: contextJson(context) });
    return exitCodeForContext(context);
  }

  const agent = await buildAgent(parsed, parsed.logsDir, deps);
  if (parsed.instruction) {
    agent.recordInstruction(await resolveInstruction(parsed.instruction));
  }
  const context = createAgentContext();
  const extraction = await agent.populateContextPostRun(context);

  logUsageSummary(deps, agent, context);
  output(deps, {
    agent: agent.name(),
    outcome: extraction.outcome,
    ...(extraction.outcome === 'failed' ? { error: extraction.error } : {}),
    context: contextJson(context),
  });
  return exitCodeForContext(context);
}

export async function runCli(argv: string[], deps: CliDeps): Promise<number> {
  try {
    return await dispatch(argv, deps);
  } catch (err) {
    if (err instanceof CliUsageError) {
      errorOutput(deps, 'USAGE_ERROR', err.message);
      return 2;
    }
    if (err instanceof AgentConfigError) {
      errorOutput(deps, 'CONFIG_ERROR', err.message);
      return 2;
    }
    if (err instanceof AgentSetupError) {
      deps.logger.error(err.message);
      errorOutput(deps, 'SETUP_ERROR', err.message);
      return 1;
    }
    errorOutput(deps, 'INTERNAL_ERROR', err instanceof Error ? err.message : 'unknown error');
    return 2;
  }
}
