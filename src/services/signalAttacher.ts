/**
 * Signal Attacher
 * Resolves each signal request to a bar, then reads entry price and ATR from it.
 */

import { IndexError } from '../lib/errors';
import { AttachedSignal, Bar, NoteCode, SignalRequest } from '../types/signal';
import { EntryPriceSource } from '../schemas/config';

export interface AttachOptions {
  entryPriceSource: EntryPriceSource;
}

interface EntryLookup {
  price?: number;
  note?: NoteCode;
}

export function resolveEntryPrice(bars: readonly Bar[], index: number, source: EntryPriceSource): EntryLookup {
  const bar = bars[index];
  switch (source) {
    case 'close':
      return { price: bar.close };
    case 'open':
      return { price: bar.open };
    case 'high':
      return { price: bar.high };
    case 'low':
      return { price: bar.low };
    case 'next_open': {
      const next = bars[index + 1];
      return next ? { price: next.open } : { note: 'cannot_use_next_open' };
    }
  }
}

/** Index wins over date; an out-of-range index is fatal */
export function resolveBarIndex(bars: readonly Bar[], request: SignalRequest): number | undefined {
  if (request.index !== undefined) {
    if (!Number.isInteger(request.index) || request.index < 0 || request.index >= bars.length) {
      throw new IndexError(request.index, bars.length);
    }
    return request.index;
  }
  if (request.date === undefined) return undefined;
  const found = bars.findIndex((bar) => bar.date === request.date);
  return found >= 0 ? found : undefined;
}

function initialNotes(request: SignalRequest): string[] {
  const note = request.note?.trim();
  return note ? [note] : [];
}

export function attachSignal(bars: readonly Bar[], request: SignalRequest, options: AttachOptions): AttachedSignal {
  const notes = initialNotes(request);
  const index = resolveBarIndex(bars, request);
  const { index: _requested, ...rest } = request;

  if (index === undefined) {
    const code: NoteCode = request.date === undefined || request.date.trim() === ''
      ? 'signal_reference_missing'
      : 'signal_date_not_in_data';
    return { ...rest, notes: [...notes, code] };
  }

  const entry = resolveEntryPrice(bars, index, options.entryPriceSource);
  const attached: AttachedSignal = {
    ...rest,
    index,
    date: bars[index].date,
    notes: entry.note ? [...notes, entry.note] : notes
  };
  if (entry.price !== undefined) attached.entryPrice = entry.price;
  const atr = bars[index].atr;
  if (atr !== undefined) attached.atrValue = atr;
  return attached;
}

export function attachSignals(
  bars: readonly Bar[],
  requests: readonly SignalRequest[],
  options: AttachOptions
): AttachedSignal[] {
  return requests.map((request) => attachSignal(bars, request, options));
}
