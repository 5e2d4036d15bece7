/**
 * SL/TP Calculator
 * ATR-based stop-loss / take-profit levels. Never throws: bad inputs degrade to a note.
 */

import { isFiniteNum } from '../lib/numbers';
import { NoteCode, SignalType } from '../types/signal';

export const DEFAULT_SL_MULTIPLIER = 1.5;
export const DEFAULT_TP_MULTIPLIER = 3.0;

export interface SlTpResult {
  sl?: number;
  tp?: number;
  note?: NoteCode;
}

export function computeSlTp(
  entry: number | undefined,
  atr: number | undefined,
  slMultiplier: number = DEFAULT_SL_MULTIPLIER,
  tpMultiplier: number = DEFAULT_TP_MULTIPLIER,
  type: SignalType = 'BUY'
): SlTpResult {
  if (atr === undefined) return { note: 'insufficient_data_for_atr' };
  if (!isFiniteNum(entry) || !isFiniteNum(atr) || atr <= 0) return { note: 'invalid_entry_or_atr' };

  const sl = type === 'BUY' ? entry - slMultiplier * atr : entry + slMultiplier * atr;
  const tp = type === 'BUY' ? entry + tpMultiplier * atr : entry - tpMultiplier * atr;

  if (sl <= 0) return { sl, tp, note: 'sl_non_positive' };
  return { sl, tp };
}
