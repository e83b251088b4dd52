import type { AgentContext } from '../types';

/**
 * Constants behind the heuristic estimates used when a transcript reports no
 * usage. They are rough by nature and kept overridable.
 */
export interface EstimationConstants {
  charsPerToken: number;
  /** Input tokens assumed for a typical instruction. */
  fallbackInputTokens: number;
  /** Floor for the estimated output tokens. */
  minOutputTokens: number;
  /** Input tokens cost this many times less than output tokens. */
  inputCostDivisor: number;
  /** Leading transcript lines scanned for error markers. */
  errorScanLines: number;
}

export const DEFAULT_ESTIMATION: EstimationConstants = {
  charsPerToken: 4,
  fallbackInputTokens: 500,
  minOutputTokens: 100,
  inputCostDivisor: 5,
  errorScanLines: 20,
};

export function createAgentContext(): AgentContext {
  return {
    nInputTokens: null,
    nOutputTokens: null,
    nCacheTokens: null,
    nCacheWriteTokens: null,
    costUsd: null,
    success: null,
    metadata: {},
  };
}

const ERROR_MARKER = /error|failed/i;

export function isErrorLine(line: string): boolean {
  return ERROR_MARKER.test(line);
}

/** Whether any of the first `limit` lines carries an error marker. */
export function headHasErrors(lines: readonly string[], limit: number): boolean {
  return lines.slice(0, limit).some(isErrorLine);
}

export function splitLines(content: string): string[] {
  return content.split('\n');
}

export function formatCost(cost: number | null): string {
  return cost === null ? 'n/a' : `$${cost.toFixed(4)}`;
}
