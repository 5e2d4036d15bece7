/**
 * Signal Reader: signals CSV → SignalRequest list.
 */

import fs from 'fs/promises';
import { existsSync } from 'fs';
import { pickColumns, resolveColumns } from '../lib/columns';
import { formatCsvRow, parseCsvRecords } from '../lib/csv';
import { DataError, MissingColumnError, MissingSignalsError } from '../lib/errors';
import { describeIssue } from '../schemas/config';
import { SIGNAL_COLUMN_ALIASES, signalRowSchema } from '../schemas/rows';
import { SignalRequest } from '../types/signal';
import { normalizeDate } from './priceReader';

export function parseSignals(text: string, source = 'signals'): SignalRequest[] {
  const { headers, records } = parseCsvRecords(text);
  const { mapping, missing } = resolveColumns(headers, SIGNAL_COLUMN_ALIASES, ['signal_type']);
  if (missing.length > 0) throw new MissingColumnError(missing, source);
  if (!('index' in mapping) && !('date' in mapping)) {
    throw new MissingColumnError(['index|date'], source);
  }

  return records.map((record, i) => {
    const result = signalRowSchema.safeParse(pickColumns(record, mapping));
    if (!result.success) {
      throw new DataError(`${source} row ${i + 1}: ${describeIssue(result.error, 'invalid signal')}`);
    }
    const row = result.data;
    const request: SignalRequest = { type: row.signal_type };
    if (row.index !== undefined) request.index = row.index;
    if (row.date !== undefined) request.date = normalizeDate(row.date);
    if (row.note !== undefined) request.note = row.note;
    return request;
  });
}

export async function readSignals(filePath: string | undefined): Promise<SignalRequest[]> {
  if (filePath === undefined) throw new MissingSignalsError();
  if (!existsSync(filePath)) throw new MissingSignalsError(`Signals file not found: ${filePath}`);
  const text = await fs.readFile(filePath, 'utf8');
  return parseSignals(text, filePath);
}

export function formatSignalsCsv(requests: readonly SignalRequest[]): string {
  const lines = [formatCsvRow(['index', 'date', 'signal_type', 'note'])];
  for (const r of requests) {
    lines.push(formatCsvRow([r.index === undefined ? '' : String(r.index), r.date ?? '', r.type, r.note ?? '']));
  }
  return `${lines.join('\n')}\n`;
}
