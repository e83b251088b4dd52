/**
 * Types shared by the installed-agent adapters.
 */

// ---------------------------------------------------------------------------
// Agent identification
// ---------------------------------------------------------------------------

/** Supported agent names. */
export type AgentName = 'factory-droid' | 'pi-mono';

/** Upstream model vendors understood by pi-coding-agent. */
export type Provider =
  | 'anthropic'
  | 'openai'
  | 'google'
  | 'groq'
  | 'cerebras'
  | 'xai'
  | 'openrouter';

// ---------------------------------------------------------------------------
// JSON values
// ---------------------------------------------------------------------------

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

// ---------------------------------------------------------------------------
// Commands
// ---------------------------------------------------------------------------

/** One shell invocation to run inside the execution environment. */
export interface ExecInput {
  command: string;
  /** Variables forwarded to the command; undefined when none are set. */
  env?: Record<string, string>;
  cwd?: string;
  /** Hard limit enforced by the environment. */
  timeoutSec?: number;
}

export interface ExecOptions {
  cwd?: string;
  env?: Record<string, string>;
  timeoutSec?: number;
}

export interface ExecResult {
  stdout: string;
  stderr: string;
  returnCode: number;
}

// ---------------------------------------------------------------------------
// Usage record
// ---------------------------------------------------------------------------

/**
 * Usage and outcome of one agent run, handed back to the harness.
 * Token counts and cost stay null when nothing could be derived.
 */
export interface AgentContext {
  nInputTokens: number | null;
  nOutputTokens: number | null;
  /** Cache-read tokens. */
  nCacheTokens: number | null;
  nCacheWriteTokens: number | null;
  costUsd: number | null;
  success: boolean | null;
  metadata: Record<string, JsonValue>;
}

/** How a usage record was obtained from the transcript. */
export type UsageOutcome = 'reported' | 'estimated' | 'missing' | 'failed';

export type UsageExtraction =
  | { outcome: 'reported'; context: AgentContext }
  | { outcome: 'estimated'; context: AgentContext }
  | { outcome: 'missing'; context: AgentContext }
  | { outcome: 'failed'; context: AgentContext; error: string };

// ---------------------------------------------------------------------------
// Logging
// ---------------------------------------------------------------------------

export interface Logger {
  info: (msg: string) => void;
  warn: (msg: string) => void;
  error: (msg: string) => void;
  debug?: (msg: string) => void;
}
