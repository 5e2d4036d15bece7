import { describe, it, expect } from 'vitest';
import { verifyLedger, verifyLedgerFile } from './ledgerVerifier';
import { formatLedgerCsv } from './ledgerWriter';
import { runPipeline } from './pipeline';
import { DataError, InputNotFoundError, MissingColumnError } from '../lib/errors';
import { DEFAULT_PIPELINE_CONFIG, pipelineConfigSchema } from '../schemas/config';
import { Bar } from '../types/signal';

const HEADER = 'date,signal_type,entry_price,atr_value,sl_price,tp_price,sl_price_rounded,tp_price_rounded';

const bars: Bar[] = [
  { date: '2024-01-01', open: 100, high: 102, low: 98, close: 100, volume: 10 },
  { date: '2024-01-02', open: 100, high: 103, low: 99, close: 101, volume: 10 },
  { date: '2024-01-03', open: 101, high: 104, low: 100, close: 102, volume: 10 },
  { date: '2024-01-04', open: 102, high: 105, low: 101, close: 103, volume: 10 },
  { date: '2024-01-05', open: 103, high: 106, low: 102, close: 104, volume: 10 }
];

describe('verifyLedger', () => {
  it('passes a ledger the pipeline wrote', () => {
    const config = pipelineConfigSchema.parse({ atr_period: 2, sl_multiplier: 1.1, tick_size: 0.25 });
    const result = runPipeline(
      bars,
      [{ index: 1, type: 'BUY' }, { index: 2, type: 'BUY' }, { index: 4, type: 'SELL' }, { date: '2023-06-30', type: 'SELL' }],
      config
    );
    const report = verifyLedger(formatLedgerCsv(result.ledger, config), config);

    expect(report).toMatchObject({
      total: 4,
      checked: 2,
      okRaw: 2,
      okRounded: 2,
      insufficient: 1,
      unpriced: 1,
      rawRate: 1,
      passed: true
    });
    expect(report.mismatches).toEqual([]);
  });

  it('reports levels that do not follow from entry and ATR', () => {
    const csv = [HEADER, '2024-01-02,BUY,100.00,2.00,97.00,106.00,97.00,106.00', '2024-01-03,SELL,100.00,2.00,97.00,94.00,97.00,94.00'].join('\n');
    const report = verifyLedger(csv, DEFAULT_PIPELINE_CONFIG, 'AAA_signals.csv');

    expect(report.checked).toBe(2);
    expect(report.okRaw).toBe(1);
    expect(report.okRounded).toBe(2);
    expect(report.rawRate).toBe(0.5);
    expect(report.passed).toBe(false);
    expect(report.mismatches).toHaveLength(1);
    expect(report.mismatches[0]).toMatchObject({ row: 2, type: 'SELL', expected: { sl: 103, tp: 94 }, found: { sl: 97, tp: 94 } });
  });

  it('allows for the two-decimal precision of the written columns', () => {
    // ATR 2.6667 written as 2.67; SL 95.99995 written as 96.00, TP 108.0001 as 108.00
    const csv = [HEADER, '2024-01-02,BUY,100.00,2.67,96.00,108.00,96.00,108.00'].join('\n');
    const report = verifyLedger(csv, DEFAULT_PIPELINE_CONFIG);
    expect(report.okRaw).toBe(1);
    expect(report.passed).toBe(true);
  });

  it('fails an empty ledger', () => {
    const report = verifyLedger(`${HEADER}\n`, DEFAULT_PIPELINE_CONFIG);
    expect(report.checked).toBe(0);
    expect(report.passed).toBe(false);
  });

  it('requires entry and ATR columns', () => {
    expect(() => verifyLedger('date,sl_price\n2024-01-02,97\n', DEFAULT_PIPELINE_CONFIG)).toThrow(MissingColumnError);
  });

  it('rejects non-numeric entry or ATR', () => {
    const csv = [HEADER, '2024-01-02,BUY,abc,2.00,97.00,106.00,97.00,106.00'].join('\n');
    expect(() => verifyLedger(csv, DEFAULT_PIPELINE_CONFIG, 'x.csv')).toThrow(DataError);
  });
});

describe('verifyLedgerFile', () => {
  it('throws InputNotFoundError for a missing ledger', async () => {
    await expect(verifyLedgerFile('/nonexistent/AAA_signals.csv', DEFAULT_PIPELINE_CONFIG)).rejects.toBeInstanceOf(InputNotFoundError);
  });
});
