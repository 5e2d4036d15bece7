/**
 * Bars, signal requests and ledger records flowing through the pipeline.
 * Every stage returns new objects; nothing here is mutated in place.
 */

export interface Bar {
  date: string;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
  trueRange?: number;
  /** Absent during the ATR warmup window */
  atr?: number;
}

export type SignalType = 'BUY' | 'SELL';

export interface SignalRequest {
  index?: number;
  date?: string;
  type: SignalType;
  /** Free-text note carried over from the input file */
  note?: string;
}

export const NOTE_CODES = [
  'signal_date_not_in_data',
  'signal_reference_missing',
  'insufficient_data_for_atr',
  'invalid_entry_or_atr',
  'overlapping_open_signal',
  'position_not_checked',
  'cannot_use_next_open',
  'sl_non_positive',
  'position_open_until_end'
] as const;

export type NoteCode = (typeof NOTE_CODES)[number];

export const NOTE_DELIMITER = ';';

export interface AttachedSignal extends SignalRequest {
  entryPrice?: number;
  atrValue?: number;
  /** Note codes plus any verbatim input note, in the order they were added */
  notes: string[];
}

/** Attached signal whose bar was found */
export interface ResolvedSignal extends AttachedSignal {
  index: number;
}

export interface OutputRecord extends AttachedSignal {
  slPrice?: number;
  tpPrice?: number;
  slPriceRounded?: number;
  tpPriceRounded?: number;
}

export function isResolved(signal: AttachedSignal): signal is ResolvedSignal {
  return signal.index !== undefined;
}

export function withNote<T extends AttachedSignal>(signal: T, note: string): T {
  return { ...signal, notes: [...signal.notes, note] };
}

export function joinNotes(notes: readonly string[]): string {
  return notes.filter((n) => n.trim() !== '').join(NOTE_DELIMITER);
}
