/**
 * Data Validator: checks one price file on its own before a run.
 * ATR needs `atr_period + 1` bars; fewer is fatal, fewer than
 * MIN_IDEAL_BARS only earns a warning.
 */

import { InsufficientDataError } from '../lib/errors';
import { Bar } from '../types/signal';
import { readBars } from './priceReader';

export const MIN_IDEAL_BARS = 30;

export interface DataReport {
  file: string;
  bars: number;
  firstDate?: string;
  lastDate?: string;
  atrPeriod: number;
  minRequired: number;
  minIdeal: number;
  warning?: string;
}

export function validateBars(
  bars: readonly Bar[],
  atrPeriod: number,
  source: string,
  minIdeal: number = MIN_IDEAL_BARS
): DataReport {
  const minRequired = atrPeriod + 1;
  if (bars.length < minRequired) {
    throw new InsufficientDataError(bars.length, minRequired, source);
  }

  const report: DataReport = {
    file: source,
    bars: bars.length,
    firstDate: bars[0]?.date,
    lastDate: bars[bars.length - 1]?.date,
    atrPeriod,
    minRequired,
    minIdeal
  };
  if (bars.length < minIdeal) {
    report.warning = `barely enough bars: ${bars.length} >= ${minRequired} but below ${minIdeal}`;
  }
  return report;
}

/** Missing file, missing columns and malformed rows fail through the price reader */
export async function validateDataFile(filePath: string, atrPeriod: number, minIdeal?: number): Promise<DataReport> {
  const bars = await readBars(filePath);
  return validateBars(bars, atrPeriod, filePath, minIdeal);
}
