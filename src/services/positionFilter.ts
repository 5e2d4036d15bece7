/**
 * Position Filter
 * Single-open enforcement over index-ordered signals. Overlapping signals are
 * routed to `skipped` with a note, never dropped.
 */

import { DataError } from '../lib/errors';
import { AttachedSignal, isResolved, withNote } from '../types/signal';
import { OpenPosition, OppositeSignalClosePolicy, PositionClosePolicy } from './closePolicies';

export interface FilterResult {
  kept: AttachedSignal[];
  skipped: AttachedSignal[];
}

/** Stable sort by resolved bar index; unresolved signals keep their order at the end */
export function sortByBarIndex<T extends AttachedSignal>(signals: readonly T[]): T[] {
  return signals
    .map((signal, order) => ({ signal, order }))
    .sort((a, b) => {
      const ia = a.signal.index ?? Number.POSITIVE_INFINITY;
      const ib = b.signal.index ?? Number.POSITIVE_INFINITY;
      if (ia !== ib) return ia - ib;
      return a.order - b.order;
    })
    .map(({ signal }) => signal);
}

export function filterOverlappingSignals(
  signals: readonly AttachedSignal[],
  policy: PositionClosePolicy = new OppositeSignalClosePolicy()
): FilterResult {
  const kept: AttachedSignal[] = [];
  const skipped: AttachedSignal[] = [];
  let open: OpenPosition | undefined;
  let lastIndex = -1;

  for (const signal of signals) {
    if (!isResolved(signal)) {
      kept.push(withNote(signal, 'position_not_checked'));
      continue;
    }
    if (signal.index < lastIndex) {
      throw new DataError(`Signals must be ordered by bar index: ${signal.index} follows ${lastIndex}`);
    }
    lastIndex = signal.index;

    if (open && !policy.isClosedBy(open, signal)) {
      skipped.push(withNote(signal, 'overlapping_open_signal'));
      continue;
    }

    const { position, note } = policy.open(signal);
    const accepted = note ? withNote(signal, note) : signal;
    open = { ...position, signal: accepted };
    kept.push(accepted);
  }

  return { kept, skipped };
}
