/**
 * Batch Runner: single-ticker runs plus a run-all over a data directory.
 * Tickers are independent: one failing ticker is recorded, the rest continue.
 */

import fs from 'fs/promises';
import { existsSync } from 'fs';
import path from 'path';
import { formatCsvRow } from '../lib/csv';
import { exitCodeFor, InputNotFoundError } from '../lib/errors';
import { logger } from '../lib/logger';
import { Semaphore } from '../lib/semaphore';
import { PipelineConfig } from '../schemas/config';
import { SignalRequest } from '../types/signal';
import { writeLedger } from './ledgerWriter';
import { PipelineResult, runPipeline } from './pipeline';
import { readBars } from './priceReader';
import { generateSignals } from './signalGenerator';
import { readSignals } from './signalReader';

export interface TickerJob {
  ticker: string;
  dataFile: string;
  signalsFile?: string;
  outputFile: string;
}

export interface TickerRunOptions {
  /** Derive signals from the bars when no signals file is given */
  generate?: boolean;
  /** Write overlapping signals into the ledger alongside kept ones */
  includeSkipped?: boolean;
}

export interface TickerOutcome {
  ticker: string;
  inputFile: string;
  signalsFile: string;
  status: string;
  outputFile: string;
  notes: string;
}

export interface RunAllOptions extends TickerRunOptions {
  dataDir: string;
  signalsDir: string;
  outputDir: string;
  parallel?: number;
}

export const SUMMARY_FILE = 'pipeline_summary.csv';
const SUMMARY_COLUMNS = ['ticker', 'input_file', 'signals_file', 'status', 'output_file', 'notes'];

export async function processTicker(
  job: TickerJob,
  config: PipelineConfig,
  options: TickerRunOptions = {}
): Promise<PipelineResult> {
  const bars = await readBars(job.dataFile);
  let requests: SignalRequest[];
  if (job.signalsFile === undefined && options.generate) {
    requests = generateSignals(bars);
    logger.info('Batch', `${job.ticker}: generated ${requests.length} signal(s) from price data`);
  } else {
    requests = await readSignals(job.signalsFile);
  }

  const result = runPipeline(bars, requests, config);
  const rows = options.includeSkipped === false ? result.records : result.ledger;
  await writeLedger(job.outputFile, rows, config);
  logger.info('Batch', `${job.ticker}: wrote ${rows.length} row(s) to ${job.outputFile}`, {
    kept: result.records.length,
    skipped: result.skipped.length
  });
  return result;
}

export function tickerFromFile(fileName: string): string {
  return path.basename(fileName, '.csv').split('.')[0];
}

export function findSignalsFile(signalsDir: string, ticker: string): string | undefined {
  const candidates = [`${ticker}_signals.csv`, `${ticker}.signals.csv`, `${ticker}.csv`];
  return candidates.map((name) => path.join(signalsDir, name)).find((p) => existsSync(p));
}

export async function discoverJobs(dataDir: string, signalsDir: string, outputDir: string): Promise<TickerJob[]> {
  if (!existsSync(dataDir)) throw new InputNotFoundError(dataDir);
  const entries = await fs.readdir(dataDir);
  return entries
    .filter((name) => name.toLowerCase().endsWith('.csv') && !name.endsWith('_signals.csv'))
    .sort()
    .map((name) => {
      const ticker = tickerFromFile(name);
      const job: TickerJob = {
        ticker,
        dataFile: path.join(dataDir, name),
        outputFile: path.join(outputDir, `${ticker}_signals.csv`)
      };
      const signalsFile = findSignalsFile(signalsDir, ticker);
      if (signalsFile) job.signalsFile = signalsFile;
      return job;
    });
}

export function formatSummaryCsv(outcomes: readonly TickerOutcome[]): string {
  const lines = [formatCsvRow(SUMMARY_COLUMNS)];
  for (const o of outcomes) {
    lines.push(formatCsvRow([o.ticker, o.inputFile, o.signalsFile, o.status, o.outputFile, o.notes]));
  }
  return `${lines.join('\n')}\n`;
}

export async function runAllTickers(config: PipelineConfig, options: RunAllOptions): Promise<TickerOutcome[]> {
  const jobs = await discoverJobs(options.dataDir, options.signalsDir, options.outputDir);
  if (jobs.length === 0) {
    logger.warn('Batch', `No ticker files found in ${options.dataDir}`);
  }

  const semaphore = new Semaphore(options.parallel ?? 1);
  const outcomes = await semaphore.map(jobs, async (job): Promise<TickerOutcome> => {
    const base = {
      ticker: job.ticker,
      inputFile: job.dataFile,
      signalsFile: job.signalsFile ?? '',
      outputFile: job.outputFile
    };
    try {
      const result = await processTicker(job, config, options);
      return { ...base, status: 'ok', notes: result.warnings.join(' | ') };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.error('Batch', `${job.ticker}: ${message}`);
      return { ...base, status: `error_${exitCodeFor(err)}`, notes: message };
    }
  });

  await fs.mkdir(options.outputDir, { recursive: true });
  const summaryPath = path.join(options.outputDir, SUMMARY_FILE);
  await fs.writeFile(summaryPath, formatSummaryCsv(outcomes), 'utf8');
  logger.info('Batch', `Processed ${outcomes.length} ticker(s), summary at ${summaryPath}`, {
    ok: outcomes.filter((o) => o.status === 'ok').length
  });
  return outcomes;
}
