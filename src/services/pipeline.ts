/**
 * Single-ticker pipeline:
 * bars → ATR → attach → sort → single-open filter → SL/TP → tick rounding.
 */

import { DataError } from '../lib/errors';
import { logger } from '../lib/logger';
import { PipelineConfig } from '../schemas/config';
import { AttachedSignal, Bar, OutputRecord, SignalRequest, isResolved } from '../types/signal';
import { computeAtr } from './atrCalculator';
import { createClosePolicy, PositionClosePolicy } from './closePolicies';
import { filterOverlappingSignals, sortByBarIndex } from './positionFilter';
import { attachSignals } from './signalAttacher';
import { computeSlTp } from './sltpCalculator';
import { roundRecords } from './tickRounder';

export interface PipelineResult {
  /** Bars with trueRange / atr */
  bars: Bar[];
  /** Kept signals with SL/TP and rounded levels */
  records: OutputRecord[];
  /** Signals suppressed by the position filter */
  skipped: OutputRecord[];
  /** Kept and skipped rows in bar order, unresolved rows last */
  ledger: OutputRecord[];
  /** Tick rounding warnings, reported once per run */
  warnings: string[];
}

export interface PipelineOptions {
  /** Overrides the policy named in config.closePolicy */
  closePolicy?: PositionClosePolicy;
}

export function assertChronological(bars: readonly Bar[]): void {
  for (let i = 1; i < bars.length; i++) {
    if (bars[i].date <= bars[i - 1].date) {
      throw new DataError(
        `Bars must be sorted and unique by date: ${bars[i].date} at ${i} follows ${bars[i - 1].date}`
      );
    }
  }
}

/** Rows carrying an input note keep it verbatim and get no SL/TP */
export function applySlTp(signal: AttachedSignal, config: PipelineConfig): OutputRecord {
  if (!isResolved(signal) || signal.note?.trim()) return { ...signal };
  const { sl, tp, note } = computeSlTp(
    signal.entryPrice,
    signal.atrValue,
    config.slMultiplier,
    config.tpMultiplier,
    signal.type
  );
  const record: OutputRecord = { ...signal, notes: note ? [...signal.notes, note] : [...signal.notes] };
  if (sl !== undefined) record.slPrice = sl;
  if (tp !== undefined) record.tpPrice = tp;
  return record;
}

export function runPipeline(
  rawBars: readonly Bar[],
  requests: readonly SignalRequest[],
  config: PipelineConfig,
  options: PipelineOptions = {}
): PipelineResult {
  assertChronological(rawBars);
  const bars = computeAtr(rawBars, config.atrPeriod);

  const attached = sortByBarIndex(attachSignals(bars, requests, { entryPriceSource: config.entryPriceSource }));
  const policy = options.closePolicy ?? createClosePolicy(config.closePolicy, bars, config);
  const { kept, skipped } = filterOverlappingSignals(attached, policy);

  const withLevels = kept.map((signal) => applySlTp(signal, config));
  const { records, warnings } = roundRecords(withLevels, config.tickSize, {
    mode: config.roundingMode,
    invalidTickBehavior: config.invalidTickBehavior
  });
  const skippedRecords: OutputRecord[] = skipped.map((signal) => ({ ...signal }));

  logger.debug('Pipeline', 'Run complete', {
    bars: bars.length,
    signals: requests.length,
    kept: records.length,
    skipped: skippedRecords.length,
    policy: policy.name,
    warnings: warnings.length
  });

  return {
    bars,
    records,
    skipped: skippedRecords,
    ledger: sortByBarIndex([...records, ...skippedRecords]),
    warnings
  };
}
