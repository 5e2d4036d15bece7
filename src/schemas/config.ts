import { z } from 'zod';

export const ENTRY_PRICE_SOURCES = ['close', 'open', 'high', 'low', 'next_open'] as const;

export const pipelineConfigSchema = z.object({
  atr_period: z.number().int('atr_period must be an integer').min(1, 'atr_period must be >= 1').default(14),
  sl_multiplier: z.number().positive('sl_multiplier must be > 0').default(1.5),
  tp_multiplier: z.number().positive('tp_multiplier must be > 0').default(3.0),
  /** Validity is decided by the tick rounder, an unusable value only disables rounding */
  tick_size: z.unknown().optional(),
  entry_price_source: z.enum(ENTRY_PRICE_SOURCES).default('close'),
  rounding_mode: z.enum(['nearest', 'directional']).default('nearest'),
  invalid_tick_behavior: z.enum(['no_round', 'error']).default('no_round'),
  close_policy: z.enum(['opposite_signal', 'sl_tp_hit']).default('opposite_signal')
}).passthrough().transform((raw) => ({
  atrPeriod: raw.atr_period,
  slMultiplier: raw.sl_multiplier,
  tpMultiplier: raw.tp_multiplier,
  tickSize: raw.tick_size === null ? undefined : raw.tick_size,
  entryPriceSource: raw.entry_price_source,
  roundingMode: raw.rounding_mode,
  invalidTickBehavior: raw.invalid_tick_behavior,
  closePolicy: raw.close_policy
}));

export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = pipelineConfigSchema.parse({});

export type PipelineConfigInput = z.input<typeof pipelineConfigSchema>;
export type PipelineConfig = z.output<typeof pipelineConfigSchema>;
export type EntryPriceSource = PipelineConfig['entryPriceSource'];
export type RoundingMode = PipelineConfig['roundingMode'];
export type InvalidTickBehavior = PipelineConfig['invalidTickBehavior'];
export type ClosePolicyName = PipelineConfig['closePolicy'];

/** Formats the first zod issue as `path: message` */
export function describeIssue(error: z.ZodError, fallback: string): string {
  const first = error.issues[0];
  return first ? `${first.path.join('.')}: ${first.message}` : fallback;
}
