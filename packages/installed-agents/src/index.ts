/**
 * installed-agents
 *
 * Adapters that install coding-agent CLIs (Factory Droid, pi-coding-agent)
 * into a task container, run them on an instruction, and report token usage
 * and cost in a common record.
 *
 * Each agent knows how to:
 *   1. Render and run its install script, and upload credentials
 *   2. Build the shell commands for one instruction
 *   3. Extract usage from the transcript the run leaves behind
 */

// Agents
export { BaseInstalledAgent, AGENT_LOGS_DIR, WORKSPACE_DIR, INSTALL_DIR, DEFAULT_TEMPLATES_DIR } from './base';
export type { BaseAgentParams } from './base';
export { createAgent, listAgents, isAgentName, FactoryDroidAgent, PiMonoAgent } from './agents/index';
export type { FactoryDroidAgentParams } from './agents/factory-droid';
export { substitutePlaceholders } from './agents/factory-droid';
export type { PiMonoAgentParams } from './agents/pi-mono';

// Configuration
export {
  FactoryDroidOptionsSchema,
  PiMonoOptionsSchema,
  AGENT_OPTION_SCHEMAS,
  parseAgentOptions,
  resolvePiModelConfig,
  resolveDroidModel,
  normalizeModelId,
  splitModelName,
  mapPiModel,
  isProvider,
  PI_PROVIDERS,
  DROID_MODEL_IDS,
} from './config';
export type {
  FactoryDroidOptions,
  PiMonoOptions,
  PiModelConfig,
  ReasoningEffort,
  OutputMode,
} from './config';
export { readAgentEnv } from './env';
export type { AgentEnv } from './env';

// Environments
export { DockerEnvironment, runProcess, TIMEOUT_RETURN_CODE } from './environment';
export type { ExecutionEnvironment, DockerEnvironmentOptions } from './environment';

// Usage
export { extractPiUsage, sumPiUsage, countAssistantContentChars } from './usage/pi-transcript';
export type { PiUsageOptions, UsageTotals } from './usage/pi-transcript';
export { extractDroidUsage } from './usage/droid-output';
export type { DroidUsageOptions } from './usage/droid-output';
export { createAgentContext, DEFAULT_ESTIMATION } from './usage/record';
export type { EstimationConstants } from './usage/record';

// Utilities
export { shellQuote } from './shell';
export { renderTemplate, renderTemplateFile } from './template';
export type { TemplateVariables } from './template';
export { createStderrLogger, silentLogger } from './logger';
export { AgentConfigError, AgentSetupError, CliUsageError, TemplateError } from './errors';

// Types
export type {
  AgentContext,
  AgentName,
  ExecInput,
  ExecOptions,
  ExecResult,
  JsonValue,
  Logger,
  Provider,
  UsageExtraction,
  UsageOutcome,
} from './types';

// CLI
export { runCli, redactExecInput, CLI_VERSION } from './cli-commands';
export type { CliDeps } from './cli-commands';
export { parseCliArgs, loadAgentsConfigFile, resolveAgentOptions, coerceOptionValue, coerceOptionValues } from './cli-args';
export type { ParsedArgs, AgentsConfigFile } from './cli-args';
