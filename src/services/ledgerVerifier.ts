/**
 * Ledger Verifier: re-reads a written ledger and recomputes SL/TP from its
 * entry_price / atr_value columns under the given settings.
 */

import fs from 'fs/promises';
import { existsSync } from 'fs';
import { pickColumns, resolveColumns } from '../lib/columns';
import { parseCsvRecords } from '../lib/csv';
import { DataError, InputNotFoundError, MissingColumnError } from '../lib/errors';
import { toNumber } from '../lib/numbers';
import { PipelineConfig } from '../schemas/config';
import { SignalType } from '../types/signal';
import { formatNumber } from './ledgerWriter';
import { computeSlTp } from './sltpCalculator';
import { directionFor, resolveTickSize, roundToTick } from './tickRounder';

/** Share of checked rows whose raw levels must match for a pass */
export const ACCEPTANCE_RATE = 0.9;

export const LEDGER_COLUMN_ALIASES: Record<string, string[]> = {
  signal_type: ['signal_type', 'signal', 'type'],
  entry_price: ['entry_price', 'entry'],
  atr_value: ['atr_value', 'atr'],
  sl_price: ['sl_price', 'sl'],
  tp_price: ['tp_price', 'tp'],
  sl_price_rounded: ['sl_price_rounded', 'sl_rounded'],
  tp_price_rounded: ['tp_price_rounded', 'tp_rounded'],
  notes: ['notes', 'note']
};

export interface LevelPair {
  sl?: number;
  tp?: number;
}

export interface VerifyMismatch {
  /** 1-based data row in the ledger file */
  row: number;
  type: SignalType;
  entry: number;
  atr: number;
  expected: LevelPair;
  found: LevelPair;
  expectedRounded: LevelPair;
  foundRounded: LevelPair;
  notes: string;
}

export interface VerifyReport {
  file: string;
  total: number;
  /** Rows with entry and ATR plus at least one written level */
  checked: number;
  okRaw: number;
  okRounded: number;
  /** Rows without entry or ATR */
  insufficient: number;
  /** Rows with entry and ATR but no levels (skipped or annotated rows) */
  unpriced: number;
  mismatches: VerifyMismatch[];
  rawRate: number;
  passed: boolean;
}

// Ledger numbers carry two decimals: entry, ATR and the level itself are each off by up to half a cent
const HALF_CENT = 0.005;

function closeEnough(expected: number | undefined, found: number | undefined, multiplier: number): boolean {
  if (expected === undefined || found === undefined) return expected === found;
  return Math.abs(expected - found) <= HALF_CENT * (2 + multiplier) + 1e-9;
}

function rawMatches(expected: LevelPair, found: LevelPair, config: PipelineConfig): boolean {
  return closeEnough(expected.sl, found.sl, config.slMultiplier) && closeEnough(expected.tp, found.tp, config.tpMultiplier);
}

function roundLevels(levels: LevelPair, type: SignalType, config: PipelineConfig): LevelPair {
  const tick = resolveTickSize(config.tickSize);
  if (tick === undefined) return levels;
  const out: LevelPair = {};
  if (levels.sl !== undefined) out.sl = roundToTick(levels.sl, tick, directionFor('slPrice', type, config.roundingMode));
  if (levels.tp !== undefined) out.tp = roundToTick(levels.tp, tick, directionFor('tpPrice', type, config.roundingMode));
  return out;
}

/** A rounded level passes when it matches the recomputed level or the written raw level snapped to tick */
function roundedMatches(found: LevelPair, candidates: readonly LevelPair[]): boolean {
  const same = (a: number | undefined, b: number | undefined) => formatNumber(a) === formatNumber(b);
  return (
    candidates.some((c) => same(c.sl, found.sl)) &&
    candidates.some((c) => same(c.tp, found.tp))
  );
}

function parseType(value: string | undefined): SignalType {
  return value?.trim().toUpperCase() === 'SELL' ? 'SELL' : 'BUY';
}

export function verifyLedger(text: string, config: PipelineConfig, source = 'ledger'): VerifyReport {
  const { headers, records } = parseCsvRecords(text);
  const { mapping, missing } = resolveColumns(headers, LEDGER_COLUMN_ALIASES, ['entry_price', 'atr_value']);
  if (missing.length > 0) throw new MissingColumnError(missing, source);

  const report: VerifyReport = {
    file: source,
    total: records.length,
    checked: 0,
    okRaw: 0,
    okRounded: 0,
    insufficient: 0,
    unpriced: 0,
    mismatches: [],
    rawRate: 0,
    passed: false
  };

  records.forEach((raw, i) => {
    const row = pickColumns(raw, mapping);
    if (!row.entry_price || !row.atr_value) {
      report.insufficient++;
      return;
    }
    const entry = toNumber(row.entry_price);
    const atr = toNumber(row.atr_value);
    if (entry === undefined || atr === undefined) {
      throw new DataError(`${source} row ${i + 1}: entry_price or atr_value is not a number`);
    }

    const found: LevelPair = { sl: toNumber(row.sl_price), tp: toNumber(row.tp_price) };
    if (found.sl === undefined && found.tp === undefined) {
      report.unpriced++;
      return;
    }
    report.checked++;

    const type = parseType(row.signal_type);
    const { sl, tp } = computeSlTp(entry, atr, config.slMultiplier, config.tpMultiplier, type);
    const expected: LevelPair = { sl, tp };
    const expectedR = roundLevels(expected, type, config);
    const foundRounded: LevelPair = { sl: toNumber(row.sl_price_rounded), tp: toNumber(row.tp_price_rounded) };

    const rawOk = rawMatches(expected, found, config);
    const roundedOk = roundedMatches(foundRounded, [expectedR, roundLevels(found, type, config)]);
    if (rawOk) report.okRaw++;
    if (roundedOk) report.okRounded++;
    if (!rawOk || !roundedOk) {
      report.mismatches.push({
        row: i + 1,
        type,
        entry,
        atr,
        expected,
        found,
        expectedRounded: expectedR,
        foundRounded,
        notes: row.notes ?? ''
      });
    }
  });

  report.rawRate = report.checked > 0 ? report.okRaw / report.checked : 0;
  report.passed = report.checked > 0 && report.rawRate >= ACCEPTANCE_RATE;
  return report;
}

export async function verifyLedgerFile(filePath: string, config: PipelineConfig): Promise<VerifyReport> {
  if (!existsSync(filePath)) throw new InputNotFoundError(filePath);
  const text = await fs.readFile(filePath, 'utf8');
  return verifyLedger(text, config, filePath);
}
