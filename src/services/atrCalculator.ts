/**
 * ATR Calculator
 * True Range + Wilder-smoothed ATR over a chronologically ordered bar series.
 */

import { ConfigError } from '../lib/errors';
import { Bar } from '../types/signal';

export const DEFAULT_ATR_PERIOD = 14;

export function trueRange(bar: Bar, prevClose?: number): number {
  const hl = bar.high - bar.low;
  if (prevClose === undefined) return hl;
  return Math.max(hl, Math.abs(bar.high - prevClose), Math.abs(bar.low - prevClose));
}

export function computeTrueRange(bars: readonly Bar[]): number[] {
  return bars.map((bar, i) => trueRange(bar, i > 0 ? bars[i - 1].close : undefined));
}

/**
 * Wilder ATR: seeded at bar `period - 1` with the mean of the first `period`
 * true ranges, then atr_t = (atr_{t-1} * (period - 1) + tr_t) / period.
 * Entries before the seed are undefined.
 */
export function wilderAtr(trueRanges: readonly number[], period: number): (number | undefined)[] {
  assertPeriod(period);
  const out: (number | undefined)[] = new Array(trueRanges.length).fill(undefined);
  if (trueRanges.length < period) return out;

  let sum = 0;
  for (let i = 0; i < period; i++) sum += trueRanges[i];
  let prev = sum / period;
  out[period - 1] = prev;

  for (let i = period; i < trueRanges.length; i++) {
    prev = (prev * (period - 1) + trueRanges[i]) / period;
    out[i] = prev;
  }
  return out;
}

export function computeAtr(bars: readonly Bar[], period: number = DEFAULT_ATR_PERIOD): Bar[] {
  assertPeriod(period);
  const tr = computeTrueRange(bars);
  const atr = wilderAtr(tr, period);
  return bars.map((bar, i) => {
    const next: Bar = { ...bar, trueRange: tr[i] };
    const value = atr[i];
    if (value === undefined) {
      delete next.atr;
    } else {
      next.atr = value;
    }
    return next;
  });
}

function assertPeriod(period: number): void {
  if (!Number.isInteger(period) || period < 1) {
    throw new ConfigError(`atr_period must be an integer >= 1, got ${period}`);
  }
}
