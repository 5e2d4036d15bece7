/**
 * Price Reader: OHLCV CSV → sorted Bar series.
 */

import fs from 'fs/promises';
import { existsSync } from 'fs';
import { pickColumns, resolveColumns } from '../lib/columns';
import { parseCsvRecords } from '../lib/csv';
import { DataError, InputNotFoundError, MissingColumnError } from '../lib/errors';
import { BAR_COLUMN_ALIASES, barRowSchema } from '../schemas/rows';
import { describeIssue } from '../schemas/config';
import { Bar } from '../types/signal';

export const REQUIRED_BAR_COLUMNS = ['date', 'open', 'high', 'low', 'close', 'volume'] as const;

const ISO_DAY = /^(\d{4}-\d{2}-\d{2})/;

/** Timestamps become YYYY-MM-DD; text that does not parse is kept as is */
export function normalizeDate(value: string): string {
  const trimmed = value.trim();
  const iso = ISO_DAY.exec(trimmed);
  if (iso) return iso[1];
  const parsed = new Date(trimmed);
  if (Number.isNaN(parsed.getTime())) return trimmed;
  // non-ISO text parses as local time
  const mm = String(parsed.getMonth() + 1).padStart(2, '0');
  const dd = String(parsed.getDate()).padStart(2, '0');
  return `${parsed.getFullYear()}-${mm}-${dd}`;
}

export function parseBars(text: string, source = 'price data'): Bar[] {
  const { headers, records } = parseCsvRecords(text);
  const { mapping, missing } = resolveColumns(headers, BAR_COLUMN_ALIASES, REQUIRED_BAR_COLUMNS);
  if (missing.length > 0) throw new MissingColumnError(missing, source);

  const bars = records.map((record, i) => {
    const result = barRowSchema.safeParse(pickColumns(record, mapping));
    if (!result.success) {
      throw new DataError(`${source} row ${i + 1}: ${describeIssue(result.error, 'invalid bar')}`);
    }
    const row = result.data;
    return {
      date: normalizeDate(row.date),
      open: row.open,
      high: row.high,
      low: row.low,
      close: row.close,
      volume: row.volume
    };
  });

  const sorted = bars
    .map((bar, order) => ({ bar, order }))
    .sort((a, b) => (a.bar.date < b.bar.date ? -1 : a.bar.date > b.bar.date ? 1 : a.order - b.order))
    .map(({ bar }) => bar);

  for (let i = 1; i < sorted.length; i++) {
    if (sorted[i].date === sorted[i - 1].date) {
      throw new DataError(`${source}: duplicate bar date ${sorted[i].date}`);
    }
  }
  return sorted;
}

export async function readBars(filePath: string): Promise<Bar[]> {
  if (!existsSync(filePath)) throw new InputNotFoundError(filePath);
  const text = await fs.readFile(filePath, 'utf8');
  return parseBars(text, filePath);
}
