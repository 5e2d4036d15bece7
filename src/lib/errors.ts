/**
 * Fatal pipeline errors. Each carries the exit code the CLI reports.
 * Data-quality problems never land here: they become row notes instead.
 */

export const EXIT_CODES = {
  ok: 0,
  usage: 1,
  inputNotFound: 2,
  missingColumn: 3,
  missingSignals: 4,
  config: 5,
  indexOutOfRange: 6,
  data: 7,
  insufficientData: 8,
  verificationFailed: 9
} as const;

export class PipelineError extends Error {
  readonly code: string;
  readonly exitCode: number;

  constructor(message: string, code: string, exitCode: number) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.exitCode = exitCode;
  }
}

export class InputNotFoundError extends PipelineError {
  constructor(readonly path: string) {
    super(`Input file not found: ${path}`, 'INPUT_NOT_FOUND', EXIT_CODES.inputNotFound);
  }
}

export class MissingColumnError extends PipelineError {
  constructor(readonly columns: string[], source: string) {
    super(`Missing required column(s) ${columns.join(', ')} in ${source}`, 'MISSING_COLUMN', EXIT_CODES.missingColumn);
  }
}

export class MissingSignalsError extends PipelineError {
  constructor(message = 'No signals source given: pass --signals <file> or --generate') {
    super(message, 'MISSING_SIGNALS', EXIT_CODES.missingSignals);
  }
}

export class ConfigError extends PipelineError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR', EXIT_CODES.config);
  }
}

export class IndexError extends PipelineError {
  constructor(readonly index: number, barCount: number) {
    super(`Signal index ${index} is outside the bar series [0, ${barCount})`, 'INDEX_OUT_OF_RANGE', EXIT_CODES.indexOutOfRange);
  }
}

export class DataError extends PipelineError {
  constructor(message: string) {
    super(message, 'DATA_ERROR', EXIT_CODES.data);
  }
}

export class InsufficientDataError extends PipelineError {
  constructor(readonly bars: number, readonly required: number, source: string) {
    super(
      `Not enough rows for ATR in ${source}: ${bars} bar(s), need at least ${required}`,
      'INSUFFICIENT_DATA',
      EXIT_CODES.insufficientData
    );
  }
}

export function exitCodeFor(err: unknown): number {
  return err instanceof PipelineError ? err.exitCode : EXIT_CODES.usage;
}
