/**
 * Tick Rounder
 * Snaps SL/TP to the broker's price increment. An unusable tick size disables
 * rounding for the affected rows (or raises, when configured to).
 */

import { ConfigError } from '../lib/errors';
import { decimalPlaces, isFiniteNum, toNumber } from '../lib/numbers';
import { InvalidTickBehavior, RoundingMode } from '../schemas/config';
import { OutputRecord, SignalType } from '../types/signal';

export type RoundDirection = 'nearest' | 'floor' | 'ceil';

export interface RoundOptions {
  mode: RoundingMode;
  invalidTickBehavior: InvalidTickBehavior;
}

export interface RoundResult {
  records: OutputRecord[];
  /** One per skipped record, numbered by bar index (list position when the bar is unknown) */
  warnings: string[];
}

const DEFAULT_ROUND_OPTIONS: RoundOptions = { mode: 'nearest', invalidTickBehavior: 'no_round' };

// Ratio is snapped to 9 decimals so float noise (100.025 / 0.05 = 2000.4999…) does not decide ties
const RATIO_DECIMALS = 9;
// toFixed accepts at most 100 digits
const MAX_DECIMALS = 100;

/** Positive finite tick or undefined; numeric strings are accepted */
export function resolveTickSize(tickSize: unknown): number | undefined {
  const n = toNumber(tickSize);
  return n !== undefined && n > 0 ? n : undefined;
}

function roundHalfAwayFromZero(x: number): number {
  return Math.sign(x) * Math.round(Math.abs(x));
}

export function roundToTick(value: number, tick: number, direction: RoundDirection = 'nearest'): number {
  const ratio = Number((value / tick).toFixed(RATIO_DECIMALS));
  let steps: number;
  switch (direction) {
    case 'floor':
      steps = Math.floor(ratio);
      break;
    case 'ceil':
      steps = Math.ceil(ratio);
      break;
    default:
      steps = roundHalfAwayFromZero(ratio);
  }
  const rounded = Number((steps * tick).toFixed(Math.min(decimalPlaces(tick), MAX_DECIMALS)));
  return Object.is(rounded, -0) ? 0 : rounded;
}

/** BUY: SL down, TP up. SELL: SL up, TP down */
export function directionFor(field: 'slPrice' | 'tpPrice', type: SignalType, mode: RoundingMode): RoundDirection {
  if (mode === 'nearest') return 'nearest';
  const down = (field === 'slPrice') === (type === 'BUY');
  return down ? 'floor' : 'ceil';
}

function hasRoundable(record: OutputRecord): boolean {
  return isFiniteNum(record.slPrice) || isFiniteNum(record.tpPrice);
}

export function roundRecords(
  records: readonly OutputRecord[],
  tickSize: unknown,
  options: RoundOptions = DEFAULT_ROUND_OPTIONS
): RoundResult {
  const tick = resolveTickSize(tickSize);
  const warnings: string[] = [];

  if (tick === undefined) {
    if (options.invalidTickBehavior === 'error') {
      throw new ConfigError(`invalid tick_size: ${String(tickSize)}`);
    }
    const copied = records.map((record, i) => {
      if (hasRoundable(record)) {
        warnings.push(`invalid tick_size: rounding skipped for row ${record.index ?? i}`);
      }
      return withRounded(record, record.slPrice, record.tpPrice);
    });
    return { records: copied, warnings };
  }

  const rounded = records.map((record) => {
    const sl = isFiniteNum(record.slPrice)
      ? roundToTick(record.slPrice, tick, directionFor('slPrice', record.type, options.mode))
      : undefined;
    const tp = isFiniteNum(record.tpPrice)
      ? roundToTick(record.tpPrice, tick, directionFor('tpPrice', record.type, options.mode))
      : undefined;
    return withRounded(record, sl, tp);
  });
  return { records: rounded, warnings };
}

function withRounded(record: OutputRecord, sl: number | undefined, tp: number | undefined): OutputRecord {
  const next: OutputRecord = { ...record };
  if (sl !== undefined) next.slPriceRounded = sl;
  if (tp !== undefined) next.tpPriceRounded = tp;
  return next;
}
