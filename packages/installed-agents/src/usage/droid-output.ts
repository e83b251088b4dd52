/**
 * Usage estimation for Factory Droid.
 *
 * `droid exec` prints plain text and exposes no token counts, so every
 * figure here is an estimate derived from output and instruction length.
 */

import { readFile } from 'node:fs/promises';
import { join } from 'node:path';

import { errorMessage, fileExists, readTextIfExists } from '../files';
import { silentLogger } from '../logger';
import type { JsonValue, Logger, UsageExtraction } from '../types';
import { droidCostPer1k } from './pricing';
import {
  DEFAULT_ESTIMATION,
  createAgentContext,
  formatCost,
  headHasErrors,
  isErrorLine,
  splitLines,
  type EstimationConstants,
} from './record';

export const DROID_SESSION_COMPLETE = '=== Factory Droid Session Complete ===';

/** Command log directories searched for a sample when the main log is missing. */
const STDOUT_SAMPLE_COMMANDS = 5;
const STDOUT_SAMPLE_CHARS = 500;
const MAX_ERROR_LINES = 5;

export interface DroidUsageOptions {
  droidModel: string;
  reasoningEffort: string;
  /** Instruction of the run, when known; drives the input estimate. */
  instruction: string | null;
  /** Host logs directory holding `command-<n>/stdout.txt`. */
  logsDir: string;
  constants?: EstimationConstants;
  logger?: Logger;
}

/** First readable, non-empty command stdout; unreadable entries are skipped. */
async function findStdoutSample(logsDir: string, logger: Logger): Promise<string | null> {
  for (let i = 0; i < STDOUT_SAMPLE_COMMANDS; i++) {
    const path = join(logsDir, `command-${i}`, 'stdout.txt');
    let content: string | null;
    try {
      content = await readTextIfExists(path);
    } catch (err) {
      logger.debug?.(`Skipping unreadable ${path}: ${errorMessage(err)}`);
      continue;
    }
    if (content) return content.slice(0, STDOUT_SAMPLE_CHARS);
  }
  return null;
}

export async function extractDroidUsage(
  outputFile: string,
  options: DroidUsageOptions
): Promise<UsageExtraction> {
  const logger = options.logger ?? silentLogger;
  const constants = options.constants ?? DEFAULT_ESTIMATION;

  if (!(await fileExists(outputFile))) {
    logger.warn('Factory Droid output file not found');
    const context = createAgentContext();
    const sample = await findStdoutSample(options.logsDir, logger);
    context.metadata = sample
      ? { error: 'No main output file', command_output_sample: sample, droid_model: options.droidModel }
      : { error: 'No output file found', droid_model: options.droidModel };
    return { outcome: 'missing', context };
  }

  try {
    const content = await readFile(outputFile, 'utf8');
    const lines = splitLines(content);

    const outputTokens = Math.floor(content.length / constants.charsPerToken);
    const inputTokens = options.instruction
      ? Math.max(Math.floor(options.instruction.length / constants.charsPerToken), 1)
      : null;

    const context = createAgentContext();
    context.nInputTokens = inputTokens;
    context.nOutputTokens = outputTokens > 0 ? outputTokens : null;

    const totalTokens = (context.nInputTokens ?? 0) + (context.nOutputTokens ?? 0);
    context.costUsd = totalTokens ? (totalTokens / 1000) * droidCostPer1k(options.droidModel) : null;

    context.success = !headHasErrors(lines, constants.errorScanLines) && outputTokens > 0;

    const errorLines = lines.filter(isErrorLine).slice(0, MAX_ERROR_LINES);
    const metadata: Record<string, JsonValue> = {
      droid_model: options.droidModel,
      reasoning_effort: options.reasoningEffort,
      success: context.success,
      session_complete: content.includes(DROID_SESSION_COMPLETE),
      output_lines: lines.length,
      errors: errorLines.length > 0 ? errorLines : null,
    };
    context.metadata = metadata;

    logger.info(
      `Metrics extracted: ${context.nInputTokens} input tokens, ` +
        `${context.nOutputTokens} output tokens, ${formatCost(context.costUsd)} cost`
    );

    return { outcome: 'estimated', context };
  } catch (err) {
    const error = errorMessage(err);
    logger.error(`Failed to parse Factory Droid output: ${error}`);
    const context = createAgentContext();
    context.metadata = { error, droid_model: options.droidModel };
    return { outcome: 'failed', context, error };
  }
}
