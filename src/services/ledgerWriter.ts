/**
 * Ledger Writer: fixed column order, numbers with two decimals, absent → empty.
 */

import fs from 'fs/promises';
import path from 'path';
import { formatCsvRow } from '../lib/csv';
import { isFiniteNum } from '../lib/numbers';
import { PipelineConfig } from '../schemas/config';
import { joinNotes, OutputRecord } from '../types/signal';

export const LEDGER_COLUMNS = [
  'date',
  'signal_type',
  'entry_price',
  'atr_value',
  'sl_price',
  'tp_price',
  'sl_price_rounded',
  'tp_price_rounded',
  'atr_period',
  'sl_multiplier',
  'tp_multiplier',
  'entry_price_source',
  'notes'
] as const;

export type LedgerColumn = (typeof LEDGER_COLUMNS)[number];

export function formatNumber(value: number | undefined): string {
  return isFiniteNum(value) ? value.toFixed(2) : '';
}

export function toLedgerRow(record: OutputRecord, config: PipelineConfig): Record<LedgerColumn, string> {
  return {
    date: record.date ?? '',
    signal_type: record.type,
    entry_price: formatNumber(record.entryPrice),
    atr_value: formatNumber(record.atrValue),
    sl_price: formatNumber(record.slPrice),
    tp_price: formatNumber(record.tpPrice),
    sl_price_rounded: formatNumber(record.slPriceRounded),
    tp_price_rounded: formatNumber(record.tpPriceRounded),
    atr_period: String(config.atrPeriod),
    sl_multiplier: formatNumber(config.slMultiplier),
    tp_multiplier: formatNumber(config.tpMultiplier),
    entry_price_source: config.entryPriceSource,
    notes: joinNotes(record.notes)
  };
}

export function formatLedgerCsv(records: readonly OutputRecord[], config: PipelineConfig): string {
  const lines = [formatCsvRow(LEDGER_COLUMNS)];
  for (const record of records) {
    const row = toLedgerRow(record, config);
    lines.push(formatCsvRow(LEDGER_COLUMNS.map((col) => row[col])));
  }
  return `${lines.join('\n')}\n`;
}

export async function writeLedger(filePath: string, records: readonly OutputRecord[], config: PipelineConfig): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, formatLedgerCsv(records, config), 'utf8');
}
