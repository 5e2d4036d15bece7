#!/usr/bin/env node

import dotenv from 'dotenv';
import fs from 'fs/promises';
import path from 'path';

dotenv.config();

import { config, loadPipelineConfig } from './config';
import { EXIT_CODES, exitCodeFor } from './lib/errors';
import { logger } from './lib/logger';
import { PipelineConfig } from './schemas/config';
import { processTicker, runAllTickers, tickerFromFile } from './services/batchRunner';
import { validateDataFile } from './services/dataValidator';
import { ACCEPTANCE_RATE, verifyLedgerFile, VerifyReport } from './services/ledgerVerifier';
import { readBars } from './services/priceReader';
import { generateSignals } from './services/signalGenerator';
import { formatSignalsCsv } from './services/signalReader';

interface CliOptions {
  data?: string;
  signals?: string;
  ledger?: string;
  config?: string;
  out?: string;
  dataDir?: string;
  signalsDir?: string;
  outDir?: string;
  parallel?: number;
  generate?: boolean;
  keptOnly?: boolean;
}

interface ParsedCli {
  command: string | undefined;
  options: CliOptions;
}

async function main(): Promise<void> {
  const { command, options } = parseCli(process.argv.slice(2));

  switch (command) {
    case 'run':
      await handleRun(options);
      break;
    case 'run-all':
      await handleRunAll(options);
      break;
    case 'generate':
      await handleGenerate(options);
      break;
    case 'validate-config':
      handleValidateConfig(options);
      break;
    case 'validate-data':
      await handleValidateData(options);
      break;
    case 'verify':
      await handleVerify(options);
      break;
    case 'help':
    case undefined:
      printHelp();
      break;
    default:
      logger.error('CLI', `Unknown command: ${command}`);
      printHelp();
      process.exitCode = EXIT_CODES.usage;
  }
}

async function handleRun(options: CliOptions): Promise<void> {
  if (!options.data) {
    logger.error('CLI', 'Missing required option: --data <file>');
    process.exitCode = EXIT_CODES.usage;
    return;
  }

  const pipelineConfig = loadPipelineConfig(options.config);
  const ticker = tickerFromFile(options.data);
  const outputFile = options.out ?? path.join(config.outputDir, `${ticker}_signals.csv`);

  const result = await processTicker(
    { ticker, dataFile: options.data, signalsFile: options.signals, outputFile },
    pipelineConfig,
    { generate: options.generate, includeSkipped: options.keptOnly ? false : config.includeSkipped }
  );

  reportWarnings(result.warnings);
}

async function handleRunAll(options: CliOptions): Promise<void> {
  const pipelineConfig = loadPipelineConfig(options.config);
  const outcomes = await runAllTickers(pipelineConfig, {
    dataDir: options.dataDir ?? config.dataDir,
    signalsDir: options.signalsDir ?? config.signalsDir,
    outputDir: options.outDir ?? config.outputDir,
    parallel: options.parallel ?? config.parallel,
    generate: options.generate,
    includeSkipped: options.keptOnly ? false : config.includeSkipped
  });

  for (const outcome of outcomes) {
    console.log(`[${outcome.ticker}] -> ${outcome.status}`);
  }
}

async function handleGenerate(options: CliOptions): Promise<void> {
  if (!options.data) {
    logger.error('CLI', 'Missing required option: --data <file>');
    process.exitCode = EXIT_CODES.usage;
    return;
  }

  const bars = await readBars(options.data);
  const signals = generateSignals(bars);
  const csv = formatSignalsCsv(signals);

  if (options.out) {
    await fs.mkdir(path.dirname(options.out), { recursive: true });
    await fs.writeFile(options.out, csv, 'utf8');
    logger.info('CLI', `Wrote ${signals.length} signal(s) to ${options.out}`);
  } else {
    process.stdout.write(csv);
  }
}

function handleValidateConfig(options: CliOptions): void {
  const pipelineConfig = loadPipelineConfig(options.config);
  console.log('Config validation passed');
  printConfigSummary(pipelineConfig);
}

async function handleValidateData(options: CliOptions): Promise<void> {
  if (!options.data) {
    logger.error('CLI', 'Missing required option: --data <file>');
    process.exitCode = EXIT_CODES.usage;
    return;
  }

  const pipelineConfig = loadPipelineConfig(options.config);
  const report = await validateDataFile(options.data, pipelineConfig.atrPeriod);
  console.log(`Data validation passed: ${report.file}`);
  console.log(`  bars: ${report.bars} (${report.firstDate ?? '?'} .. ${report.lastDate ?? '?'})`);
  console.log(`  atr_period: ${report.atrPeriod}, min required: ${report.minRequired}, ideal: ${report.minIdeal}`);
  if (report.warning) logger.warn('DataValidator', report.warning, { file: report.file });
}

async function handleVerify(options: CliOptions): Promise<void> {
  if (!options.ledger) {
    logger.error('CLI', 'Missing required option: --ledger <file>');
    process.exitCode = EXIT_CODES.usage;
    return;
  }

  const pipelineConfig = loadPipelineConfig(options.config);
  const report = await verifyLedgerFile(options.ledger, pipelineConfig);
  printVerifyReport(report);
  if (!report.passed) process.exitCode = EXIT_CODES.verificationFailed;
}

function printVerifyReport(report: VerifyReport): void {
  console.log(`Ledger verification: ${report.file}`);
  console.log(`  rows: ${report.total}, checked: ${report.checked}`);
  console.log(`  ok_raw: ${report.okRaw}, ok_rounded: ${report.okRounded}`);
  console.log(`  insufficient: ${report.insufficient}, unpriced: ${report.unpriced}`);
  console.log(`  mismatches: ${report.mismatches.length}`);
  for (const m of report.mismatches.slice(0, 10)) {
    const detail = { expected: m.expected, found: m.found, expectedRounded: m.expectedRounded, foundRounded: m.foundRounded };
    console.log(`    row ${m.row} ${m.type}: ${JSON.stringify(detail)}`);
  }
  const rate = `${(report.rawRate * 100).toFixed(2)}%`;
  console.log(`ACCEPTANCE: ${report.passed ? 'PASS' : 'FAIL'} (raw_rate = ${rate}, need ${ACCEPTANCE_RATE * 100}%)`);
}

function printConfigSummary(cfg: PipelineConfig): void {
  const entries: [string, unknown][] = [
    ['atr_period', cfg.atrPeriod],
    ['sl_multiplier', cfg.slMultiplier],
    ['tp_multiplier', cfg.tpMultiplier],
    ['tick_size', cfg.tickSize],
    ['entry_price_source', cfg.entryPriceSource],
    ['rounding_mode', cfg.roundingMode],
    ['invalid_tick_behavior', cfg.invalidTickBehavior],
    ['close_policy', cfg.closePolicy]
  ];
  for (const [key, value] of entries) {
    console.log(`  ${key}: ${value === undefined ? '(none)' : JSON.stringify(value)}`);
  }
}

function reportWarnings(warnings: string[]): void {
  if (warnings.length === 0) return;
  logger.warn('TickRounder', `${warnings.length} rounding warning(s)`, { warnings });
}

function parseCli(argv: string[]): ParsedCli {
  const [command, ...rest] = argv;
  const options: CliOptions = {};

  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];
    switch (arg) {
      case '--data':
        options.data = rest[++i];
        break;
      case '--signals':
        options.signals = rest[++i];
        break;
      case '--ledger':
        options.ledger = rest[++i];
        break;
      case '--config':
        options.config = rest[++i];
        break;
      case '--out':
        options.out = rest[++i];
        break;
      case '--data-dir':
        options.dataDir = rest[++i];
        break;
      case '--signals-dir':
        options.signalsDir = rest[++i];
        break;
      case '--out-dir':
        options.outDir = rest[++i];
        break;
      case '--parallel': {
        const value = parseInt(rest[++i] ?? '', 10);
        if (Number.isNaN(value) || value < 1) {
          logger.warn('CLI', 'Invalid value for --parallel; ignoring.');
        } else {
          options.parallel = value;
        }
        break;
      }
      case '--generate':
        options.generate = true;
        break;
      case '--kept-only':
        options.keptOnly = true;
        break;
      default:
        logger.warn('CLI', `Unknown option ${arg}; ignoring.`);
    }
  }

  return { command, options };
}

function printHelp(): void {
  console.log(`
Usage: sltp-ledger <command> [options]

Commands:
  run --data <bars.csv> [--signals <signals.csv> | --generate]
      [--config <config.json>] [--out <ledger.csv>] [--kept-only]
      Annotate one ticker's signals with ATR-based SL/TP levels

  run-all [--data-dir dir] [--signals-dir dir] [--out-dir dir]
          [--config <config.json>] [--parallel N] [--generate] [--kept-only]
          Run every <TICKER>.csv in the data directory and write pipeline_summary.csv

  generate --data <bars.csv> [--out <signals.csv>]
           Derive BUY/SELL signals from EMA crossover + RSI

  validate-config [--config <config.json|config.yaml>]
           Validate pipeline settings and print the resolved values

  validate-data --data <bars.csv> [--config <file>]
           Check a price file on its own: columns, values, enough bars for ATR

  verify --ledger <ledger.csv> [--config <file>]
           Recompute SL/TP from a written ledger and report mismatches

  help     Show this message

Exit codes:
  2 input file missing, 3 missing bar column, 4 missing signals source,
  5 configuration error, 6 signal index out of range, 7 malformed data,
  8 not enough bars for ATR, 9 ledger verification failed
`);
}

void main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  logger.error('CLI', `Command failed: ${message}`);
  process.exitCode = exitCodeFor(error);
});
