/**
 * Rough per-1000-token rates for estimated costs. Only used when the tool
 * reports no cost of its own.
 */

import type { Provider } from '../types';

/** Output-token cost per 1000 tokens, by provider (pi-coding-agent). */
export const PI_OUTPUT_COST_PER_1K: Partial<Record<Provider, number>> = {
  anthropic: 0.015,
  openai: 0.002,
  google: 0.001,
  groq: 0.0,
};

export const DEFAULT_PI_OUTPUT_COST_PER_1K = 0.002;

export function piOutputCostPer1k(provider: Provider): number {
  return PI_OUTPUT_COST_PER_1K[provider] ?? DEFAULT_PI_OUTPUT_COST_PER_1K;
}

export type DroidCostFamily = 'sonnet' | 'opus' | 'haiku' | 'gpt-5' | 'droid-core';

/** Blended cost per 1000 tokens, by Factory model family. */
export const DROID_COST_PER_1K: Record<DroidCostFamily, number> = {
  sonnet: 0.003,
  opus: 0.015,
  haiku: 0.0008,
  'gpt-5': 0.01,
  'droid-core': 0.002,
};

export const DEFAULT_DROID_COST_PER_1K = 0.003;

export function droidCostFamily(droidModel: string): DroidCostFamily | null {
  const lower = droidModel.toLowerCase();
  if (lower.includes('opus')) return 'opus';
  if (lower.includes('haiku')) return 'haiku';
  if (lower.includes('sonnet')) return 'sonnet';
  if (lower.includes('gpt-5')) return 'gpt-5';
  if (lower.includes('droid-core')) return 'droid-core';
  return null;
}

export function droidCostPer1k(droidModel: string): number {
  const family = droidCostFamily(droidModel);
  return family ? DROID_COST_PER_1K[family] : DEFAULT_DROID_COST_PER_1K;
}
