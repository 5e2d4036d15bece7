/**
 * Close policies for the position filter: decide when an open position is over.
 */

import { isFiniteNum } from '../lib/numbers';
import { ClosePolicyName, PipelineConfig } from '../schemas/config';
import { Bar, NoteCode, ResolvedSignal } from '../types/signal';
import { computeSlTp } from './sltpCalculator';

export interface OpenPosition {
  signal: ResolvedSignal;
  /** Bar on which a price-based exit happens; undefined when none is known */
  closeIndex?: number;
}

export interface PositionOpening {
  position: OpenPosition;
  note?: NoteCode;
}

export interface PositionClosePolicy {
  readonly name: ClosePolicyName;
  open(signal: ResolvedSignal): PositionOpening;
  /** True when `next` arrives after `position` has closed */
  isClosedBy(position: OpenPosition, next: ResolvedSignal): boolean;
}

/**
 * A position closes on the first signal of the opposite type, which then
 * opens the next position. Same-type signals never close it.
 */
export class OppositeSignalClosePolicy implements PositionClosePolicy {
  public readonly name = 'opposite_signal' as const;

  open(signal: ResolvedSignal): PositionOpening {
    return { position: { signal } };
  }

  isClosedBy(position: OpenPosition, next: ResolvedSignal): boolean {
    return next.type !== position.signal.type;
  }
}

export interface SlTpHitPolicyConfig {
  slMultiplier: number;
  tpMultiplier: number;
}

/**
 * A position closes on the first later bar that touches its raw TP or SL
 * (TP checked first). Signals on or before that bar overlap it. Without
 * entry/ATR, or without a hit in the data, the position stays open to the end.
 */
export class SlTpHitClosePolicy implements PositionClosePolicy {
  public readonly name = 'sl_tp_hit' as const;

  constructor(
    private readonly bars: readonly Bar[],
    private readonly config: SlTpHitPolicyConfig
  ) {}

  open(signal: ResolvedSignal): PositionOpening {
    const closeIndex = this.findExitBar(signal);
    if (closeIndex === undefined) {
      return { position: { signal }, note: 'position_open_until_end' };
    }
    return { position: { signal, closeIndex } };
  }

  isClosedBy(position: OpenPosition, next: ResolvedSignal): boolean {
    return position.closeIndex !== undefined && next.index > position.closeIndex;
  }

  private findExitBar(signal: ResolvedSignal): number | undefined {
    const { sl, tp } = computeSlTp(
      signal.entryPrice,
      signal.atrValue,
      this.config.slMultiplier,
      this.config.tpMultiplier,
      signal.type
    );
    if (!isFiniteNum(sl) || !isFiniteNum(tp)) return undefined;

    for (let j = signal.index + 1; j < this.bars.length; j++) {
      const { high, low } = this.bars[j];
      if (signal.type === 'BUY') {
        if (high >= tp || low <= sl) return j;
      } else if (low <= tp || high >= sl) {
        return j;
      }
    }
    return undefined;
  }
}

export function createClosePolicy(
  name: ClosePolicyName,
  bars: readonly Bar[],
  config: Pick<PipelineConfig, 'slMultiplier' | 'tpMultiplier'>
): PositionClosePolicy {
  switch (name) {
    case 'opposite_signal':
      return new OppositeSignalClosePolicy();
    case 'sl_tp_hit':
      return new SlTpHitClosePolicy(bars, { slMultiplier: config.slMultiplier, tpMultiplier: config.tpMultiplier });
  }
}
