/**
 * Usage extraction for pi-coding-agent transcripts.
 *
 * In `--mode json` pi streams one JSON event per line. Each completed
 * assistant message ends with a `message_end` event carrying that exchange's
 * usage:
 *
 *   {"type":"message_end","message":{"role":"assistant","usage":{"input":1200,
 *    "output":340,"cacheRead":0,"cacheWrite":0,"cost":{"total":0.0081}}}}
 *
 * Totals are summed over all such events. Transcripts without usage (text
 * mode, or a run that died early) fall back to a character-count estimate.
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';

import { errorMessage, fileExists } from '../files';
import { silentLogger } from '../logger';
import type { AgentContext, JsonValue, Logger, Provider, UsageExtraction } from '../types';
import { piOutputCostPer1k } from './pricing';
import {
  DEFAULT_ESTIMATION,
  createAgentContext,
  formatCost,
  headHasErrors,
  splitLines,
  type EstimationConstants,
} from './record';

// ---------------------------------------------------------------------------
// Event schema
// ---------------------------------------------------------------------------

const CountSchema = z.number().int().nonnegative().nullish();

/** Cost is either a bare number or a breakdown with a `total`. */
const CostSchema = z.union([
  z.number(),
  z.object({ total: z.number().nullish() }).passthrough(),
]);

export const PiUsageSchema = z
  .object({
    input: CountSchema,
    output: CountSchema,
    cacheRead: CountSchema,
    cacheWrite: CountSchema,
    cost: CostSchema.nullish(),
  })
  .passthrough();

export const PiMessageEndEventSchema = z
  .object({
    type: z.literal('message_end'),
    message: z
      .object({
        role: z.literal('assistant'),
        usage: PiUsageSchema,
      })
      .passthrough(),
  })
  .passthrough();

export type PiUsage = z.infer<typeof PiUsageSchema>;

// ---------------------------------------------------------------------------
// Accumulation
// ---------------------------------------------------------------------------

export interface UsageTotals {
  input: number;
  output: number;
  cacheRead: number;
  cacheWrite: number;
  cost: number;
}

function costOf(cost: PiUsage['cost']): number {
  if (cost === null || cost === undefined) return 0;
  if (typeof cost === 'number') return cost;
  return cost.total ?? 0;
}

function tryParseJson(line: string): unknown {
  try {
    return JSON.parse(line);
  } catch {
    return undefined;
  }
}

/** Sum usage over every assistant `message_end` event. Lines that are not JSON are skipped. */
export function sumPiUsage(lines: Iterable<string>): UsageTotals {
  const totals: UsageTotals = { input: 0, output: 0, cacheRead: 0, cacheWrite: 0, cost: 0 };

  for (const raw of lines) {
    const line = raw.trim();
    if (!line || !line.startsWith('{')) continue;

    const parsed = PiMessageEndEventSchema.safeParse(tryParseJson(line));
    if (!parsed.success) continue;

    const usage = parsed.data.message.usage;
    totals.input += usage.input ?? 0;
    totals.output += usage.output ?? 0;
    totals.cacheRead += usage.cacheRead ?? 0;
    totals.cacheWrite += usage.cacheWrite ?? 0;
    totals.cost += costOf(usage.cost);
  }

  return totals;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Characters of assistant message content, for the fallback estimate. Only
 * lines mentioning both an assistant role and a content field are decoded.
 */
export function countAssistantContentChars(lines: Iterable<string>): number {
  let chars = 0;
  for (const line of lines) {
    if (!line.includes('"role":"assistant"') || !line.includes('"content"')) continue;

    const event = tryParseJson(line.trim());
    if (!isRecord(event) || !isRecord(event.message) || !('content' in event.message)) continue;

    const content = event.message.content;
    chars += typeof content === 'string' ? content.length : (JSON.stringify(content) ?? '').length;
  }
  return chars;
}

// ---------------------------------------------------------------------------
// Extraction
// ---------------------------------------------------------------------------

export interface PiUsageOptions {
  provider: Provider;
  /** Model passed to pi; null when pi picks its default. */
  model: string | null;
  outputMode: 'json' | 'text';
  noSession: boolean;
  constants?: EstimationConstants;
  logger?: Logger;
}

export async function extractPiUsage(
  outputFile: string,
  options: PiUsageOptions
): Promise<UsageExtraction> {
  const logger = options.logger ?? silentLogger;
  const constants = options.constants ?? DEFAULT_ESTIMATION;
  const model = options.model || 'default';

  if (!(await fileExists(outputFile))) {
    logger.warn('pi-coding-agent output file not found');
    const context = createAgentContext();
    context.metadata = { error: 'No output file found', provider: options.provider, model };
    return { outcome: 'missing', context };
  }

  try {
    const lines = splitLines(await readFile(outputFile, 'utf8'));
    const totals = sumPiUsage(lines);
    const reported = totals.input > 0 || totals.output > 0;

    const context: AgentContext = {
      ...createAgentContext(),
      nInputTokens: totals.input,
      nOutputTokens: totals.output,
      nCacheTokens: totals.cacheRead,
      nCacheWriteTokens: totals.cacheWrite,
      costUsd: totals.cost,
    };

    if (!reported) {
      logger.warn('No usage data found in streaming log, using fallback estimation');
      const chars = countAssistantContentChars(lines);
      const outRate = piOutputCostPer1k(options.provider);
      const inRate = outRate / constants.inputCostDivisor;

      context.nInputTokens = constants.fallbackInputTokens;
      context.nOutputTokens = Math.max(
        Math.floor(chars / constants.charsPerToken),
        constants.minOutputTokens
      );
      context.costUsd =
        (context.nInputTokens / 1000) * inRate + (context.nOutputTokens / 1000) * outRate;
    }

    const hasErrors = headHasErrors(lines, constants.errorScanLines);
    context.success = !hasErrors && totals.output > 0;

    const metadata: Record<string, JsonValue> = {
      provider: options.provider,
      model,
      output_mode: options.outputMode,
      success: context.success,
      session_saved: !options.noSession,
      actual_api_usage: reported,
    };
    context.metadata = metadata;

    logger.info(
      `${reported ? 'Actual' : 'Estimated'} API usage: ${context.nInputTokens} input, ` +
        `${context.nOutputTokens} output, ${context.nCacheTokens} cache read tokens, ` +
        `${formatCost(context.costUsd)} cost`
    );

    return reported ? { outcome: 'reported', context } : { outcome: 'estimated', context };
  } catch (err) {
    const error = errorMessage(err);
    logger.error(`Failed to parse pi-coding-agent output: ${error}`);
    const context = createAgentContext();
    context.metadata = { error, provider: options.provider, model };
    return { outcome: 'failed', context, error };
  }
}
