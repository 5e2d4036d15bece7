import { describe, it, expect } from 'vitest';
import { applySlTp, assertChronological, runPipeline } from './pipeline';
import { DataError, IndexError } from '../lib/errors';
import { pipelineConfigSchema } from '../schemas/config';
import { Bar, SignalRequest } from '../types/signal';

// true range is 4 on every bar, so ATR(2) is 4 from bar 1 on
const bars: Bar[] = [
  { date: '2024-01-01', open: 100, high: 102, low: 98, close: 100, volume: 10 },
  { date: '2024-01-02', open: 100, high: 103, low: 99, close: 101, volume: 10 },
  { date: '2024-01-03', open: 101, high: 104, low: 100, close: 102, volume: 10 },
  { date: '2024-01-04', open: 102, high: 105, low: 101, close: 103, volume: 10 },
  { date: '2024-01-05', open: 103, high: 106, low: 102, close: 104, volume: 10 }
];

const config = pipelineConfigSchema.parse({ atr_period: 2, sl_multiplier: 1.1, tick_size: 0.25 });

describe('assertChronological', () => {
  it('rejects unsorted or duplicate dates', () => {
    expect(() => assertChronological([bars[1], bars[0]])).toThrow(DataError);
    expect(() => assertChronological([bars[0], bars[0]])).toThrow(DataError);
    expect(() => assertChronological(bars)).not.toThrow();
  });
});

describe('applySlTp', () => {
  it('skips levels for rows with an input note', () => {
    const record = applySlTp({ index: 1, type: 'BUY', note: 'manual', notes: ['manual'], entryPrice: 101, atrValue: 4 }, config);
    expect(record.slPrice).toBeUndefined();
    expect(record.notes).toEqual(['manual']);
  });

  it('appends the calculator note', () => {
    const record = applySlTp({ index: 0, type: 'BUY', notes: [], entryPrice: 100 }, config);
    expect(record.notes).toEqual(['insufficient_data_for_atr']);
  });
});

describe('runPipeline', () => {
  const requests: SignalRequest[] = [
    { index: 4, type: 'SELL' },
    { index: 1, type: 'BUY' },
    { date: '2023-06-30', type: 'SELL' },
    { date: '2024-01-03', type: 'BUY' }
  ];

  it('produces kept records, skipped rows and a merged ledger', () => {
    const result = runPipeline(bars, requests, config);

    expect(result.bars[1].atr).toBe(4);
    expect(result.records.map((r) => r.index)).toEqual([1, 4, undefined]);
    expect(result.skipped.map((r) => r.index)).toEqual([2]);
    expect(result.skipped[0].notes).toEqual(['overlapping_open_signal']);
    expect(result.ledger.map((r) => r.index)).toEqual([1, 2, 4, undefined]);
    expect(result.warnings).toEqual([]);
  });

  it('computes and rounds levels for kept signals', () => {
    const [buy, sell, unresolved] = runPipeline(bars, requests, config).records;

    expect(buy.entryPrice).toBe(101);
    expect(buy.slPrice).toBeCloseTo(96.6, 10);
    expect(buy.tpPrice).toBe(113);
    expect(buy.slPriceRounded).toBe(96.5);
    expect(buy.tpPriceRounded).toBe(113);

    expect(sell.slPrice).toBeCloseTo(108.4, 10);
    expect(sell.tpPrice).toBe(92);
    expect(sell.slPriceRounded).toBe(108.5);
    expect(sell.tpPriceRounded).toBe(92);

    expect(unresolved.notes).toEqual(['signal_date_not_in_data', 'position_not_checked']);
    expect(unresolved.slPrice).toBeUndefined();
  });

  it('warns once per row when the tick size is unusable', () => {
    const noTick = pipelineConfigSchema.parse({ atr_period: 2, tick_size: 'n/a' });
    const result = runPipeline(bars, [{ index: 1, type: 'BUY' }], noTick);
    expect(result.records[0].slPriceRounded).toBe(result.records[0].slPrice);
    expect(result.warnings).toEqual(['invalid tick_size: rounding skipped for row 1']);
  });

  it('names the bar of each unrounded row when a skipped row sits between them', () => {
    const zeroTick = pipelineConfigSchema.parse({ atr_period: 2, tick_size: 0 });
    const result = runPipeline(
      bars,
      [{ index: 1, type: 'BUY' }, { index: 2, type: 'BUY' }, { index: 4, type: 'SELL' }],
      zeroTick
    );
    expect(result.ledger.map((r) => [r.index, r.notes.join(';')])).toEqual([
      [1, ''],
      [2, 'overlapping_open_signal'],
      [4, '']
    ]);
    expect(result.warnings).toEqual([
      'invalid tick_size: rounding skipped for row 1',
      'invalid tick_size: rounding skipped for row 4'
    ]);
  });

  it('fails on a signal index outside the bars', () => {
    expect(() => runPipeline(bars, [{ index: 9, type: 'BUY' }], config)).toThrow(IndexError);
  });

  it('handles an empty signal list', () => {
    const result = runPipeline(bars, [], config);
    expect(result.records).toEqual([]);
    expect(result.ledger).toEqual([]);
  });

  it('switches to price-based exits with close_policy sl_tp_hit', () => {
    const hitConfig = pipelineConfigSchema.parse({ atr_period: 2, close_policy: 'sl_tp_hit' });
    // BUY at 101 with ATR 4: SL 95, TP 113; never touched, so the later BUY overlaps
    const result = runPipeline(bars, [{ index: 1, type: 'BUY' }, { index: 3, type: 'SELL' }], hitConfig);
    expect(result.records.map((r) => r.index)).toEqual([1]);
    expect(result.records[0].notes).toEqual(['position_open_until_end']);
    expect(result.skipped.map((r) => r.index)).toEqual([3]);
  });
});
