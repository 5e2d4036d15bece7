export * from './types/signal';
export * from './lib/errors';
export { logger } from './lib/logger';
export { Semaphore } from './lib/semaphore';
export {
  DEFAULT_PIPELINE_CONFIG,
  ENTRY_PRICE_SOURCES,
  pipelineConfigSchema,
  type ClosePolicyName,
  type EntryPriceSource,
  type InvalidTickBehavior,
  type PipelineConfig,
  type PipelineConfigInput,
  type RoundingMode
} from './schemas/config';
export { config, loadPipelineConfig, parsePipelineConfig, DEFAULT_CONFIG_FILES } from './config';
export { computeAtr, computeTrueRange, trueRange, wilderAtr, DEFAULT_ATR_PERIOD } from './services/atrCalculator';
export { attachSignal, attachSignals, resolveBarIndex, resolveEntryPrice } from './services/signalAttacher';
export { computeSlTp, DEFAULT_SL_MULTIPLIER, DEFAULT_TP_MULTIPLIER } from './services/sltpCalculator';
export { roundRecords, roundToTick, resolveTickSize, directionFor } from './services/tickRounder';
export {
  createClosePolicy,
  OppositeSignalClosePolicy,
  SlTpHitClosePolicy,
  type OpenPosition,
  type PositionClosePolicy
} from './services/closePolicies';
export { filterOverlappingSignals, sortByBarIndex } from './services/positionFilter';
export { runPipeline, applySlTp, type PipelineResult } from './services/pipeline';
export { generateSignals, DEFAULT_GENERATOR_PARAMS, type GeneratorParams } from './services/signalGenerator';
export { parseBars, readBars, normalizeDate } from './services/priceReader';
export { parseSignals, readSignals, formatSignalsCsv } from './services/signalReader';
export { formatLedgerCsv, writeLedger, LEDGER_COLUMNS } from './services/ledgerWriter';
export { processTicker, runAllTickers, discoverJobs } from './services/batchRunner';
export { validateBars, validateDataFile, MIN_IDEAL_BARS, type DataReport } from './services/dataValidator';
export { verifyLedger, verifyLedgerFile, ACCEPTANCE_RATE, type VerifyReport, type VerifyMismatch } from './services/ledgerVerifier';
