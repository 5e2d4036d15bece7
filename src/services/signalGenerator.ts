/**
 * Signal Generator: EMA crossover with RSI confirmation.
 * Used when a run has no signals file; output feeds the regular pipeline.
 */

import { EMA, RSI } from 'technicalindicators';
import { Bar, SignalRequest } from '../types/signal';

export interface GeneratorParams {
  emaShort: number;
  emaLong: number;
  rsiPeriod: number;
  /** BUY only when RSI at the cross is at or below this */
  rsiBuyThreshold: number;
  /** SELL only when RSI at the cross is at or above this */
  rsiSellThreshold: number;
  /** Minimum bars between two consecutive signals */
  minSignalDistance: number;
  maxSignals?: number;
}

export const DEFAULT_GENERATOR_PARAMS: GeneratorParams = {
  emaShort: 12,
  emaLong: 26,
  rsiPeriod: 14,
  rsiBuyThreshold: 30,
  rsiSellThreshold: 70,
  minSignalDistance: 5
};

const NEUTRAL_RSI = 50;

/** Left-pads library output (which starts after warmup) so index i matches bar i */
function alignToBars(values: number[], length: number): (number | undefined)[] {
  const offset = length - values.length;
  return Array.from({ length }, (_, i) => (i >= offset ? values[i - offset] : undefined));
}

export function generateSignals(bars: readonly Bar[], params: Partial<GeneratorParams> = {}): SignalRequest[] {
  const p: GeneratorParams = { ...DEFAULT_GENERATOR_PARAMS, ...params };
  const n = bars.length;
  if (n < Math.max(p.emaShort, p.emaLong, p.rsiPeriod) + 1) return [];

  const closes = bars.map((b) => b.close);
  const emaShort = alignToBars(EMA.calculate({ period: p.emaShort, values: closes }), n);
  const emaLong = alignToBars(EMA.calculate({ period: p.emaLong, values: closes }), n);
  const rsi = alignToBars(RSI.calculate({ period: p.rsiPeriod, values: closes }), n);

  const signals: SignalRequest[] = [];
  let lastIdx = Number.NEGATIVE_INFINITY;
  let prevSign = 0;

  for (let i = 0; i < n; i++) {
    const s = emaShort[i];
    const l = emaLong[i];
    if (s === undefined || l === undefined) continue;
    const sign = Math.sign(s - l);
    const crossUp = prevSign < 0 && sign > 0;
    const crossDown = prevSign > 0 && sign < 0;
    prevSign = sign;

    if (p.maxSignals !== undefined && signals.length >= p.maxSignals) break;
    if (i - lastIdx < p.minSignalDistance) continue;

    const r = rsi[i] ?? NEUTRAL_RSI;
    if (crossUp && r <= p.rsiBuyThreshold) {
      signals.push({ index: i, date: bars[i].date, type: 'BUY' });
      lastIdx = i;
    } else if (crossDown && r >= p.rsiSellThreshold) {
      signals.push({ index: i, date: bars[i].date, type: 'SELL' });
      lastIdx = i;
    }
  }

  return signals;
}
