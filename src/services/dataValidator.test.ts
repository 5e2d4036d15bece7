import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { validateBars, validateDataFile } from './dataValidator';
import { EXIT_CODES, InsufficientDataError, InputNotFoundError, MissingColumnError } from '../lib/errors';
import { Bar } from '../types/signal';

function makeBars(count: number): Bar[] {
  return Array.from({ length: count }, (_, i) => ({
    date: new Date(Date.UTC(2024, 0, 1 + i)).toISOString().slice(0, 10),
    open: 100,
    high: 101,
    low: 99,
    close: 100,
    volume: 1000
  }));
}

describe('validateBars', () => {
  it('needs atr_period + 1 bars', () => {
    try {
      validateBars(makeBars(14), 14, 'AAA.csv');
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(InsufficientDataError);
      expect(err instanceof InsufficientDataError && err.exitCode).toBe(EXIT_CODES.insufficientData);
      expect(err instanceof Error && err.message).toBe('Not enough rows for ATR in AAA.csv: 14 bar(s), need at least 15');
    }
  });

  it('warns when the series is only just long enough', () => {
    const report = validateBars(makeBars(15), 14, 'AAA.csv');
    expect(report).toMatchObject({ bars: 15, minRequired: 15, minIdeal: 30, firstDate: '2024-01-01', lastDate: '2024-01-15' });
    expect(report.warning).toBe('barely enough bars: 15 >= 15 but below 30');
  });

  it('passes a comfortable series without warning', () => {
    expect(validateBars(makeBars(30), 14, 'AAA.csv').warning).toBeUndefined();
  });
});

describe('validateDataFile', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'sltp-data-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('reads and checks a price file', async () => {
    const file = path.join(dir, 'AAA.csv');
    const rows = makeBars(6).map((b) => `${b.date},${b.open},${b.high},${b.low},${b.close},${b.volume}`);
    fs.writeFileSync(file, ['date,open,high,low,close,volume', ...rows].join('\n'));
    const report = await validateDataFile(file, 5);
    expect(report.bars).toBe(6);
    expect(report.file).toBe(file);
  });

  it('surfaces reader failures', async () => {
    await expect(validateDataFile(path.join(dir, 'missing.csv'), 14)).rejects.toBeInstanceOf(InputNotFoundError);
    const file = path.join(dir, 'BBB.csv');
    fs.writeFileSync(file, 'date,close\n2024-01-01,1\n');
    await expect(validateDataFile(file, 14)).rejects.toBeInstanceOf(MissingColumnError);
  });
});
