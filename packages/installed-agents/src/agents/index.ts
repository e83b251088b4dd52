/**
 * Agent registry: maps agent names to their constructors.
 */

import type { BaseAgentParams, BaseInstalledAgent } from '../base';
import { FactoryDroidOptionsSchema, PiMonoOptionsSchema, parseAgentOptions } from '../config';
import { AgentConfigError } from '../errors';
import type { AgentName } from '../types';
import { FactoryDroidAgent } from './factory-droid';
import { PiMonoAgent } from './pi-mono';

export { FactoryDroidAgent, PiMonoAgent };

type AgentFactory = (params: BaseAgentParams, options: unknown) => BaseInstalledAgent;

/** Registry of all supported agents. Options are validated before construction. */
const AGENTS: Record<AgentName, AgentFactory> = {
  'factory-droid': (params, options) =>
    new FactoryDroidAgent({
      ...params,
      options: parseAgentOptions(FactoryDroidOptionsSchema, options, 'factory-droid'),
    }),
  'pi-mono': (params, options) =>
    new PiMonoAgent({
      ...params,
      options: parseAgentOptions(PiMonoOptionsSchema, options, 'pi-mono'),
    }),
};

const AGENT_NAMES: readonly AgentName[] = ['factory-droid', 'pi-mono'];

export function isAgentName(value: string): value is AgentName {
  return AGENT_NAMES.some((name) => name === value);
}

/** List all supported agent names. */
export function listAgents(): AgentName[] {
  return [...AGENT_NAMES];
}

/** Construct an agent by name; unknown names and invalid options fail with AgentConfigError. */
export function createAgent(name: string, params: BaseAgentParams, options?: unknown): BaseInstalledAgent {
  if (!isAgentName(name)) {
    throw new AgentConfigError(`Unknown agent "${name}". Supported: ${AGENT_NAMES.join(', ')}`);
  }
  return AGENTS[name](params, options);
}
