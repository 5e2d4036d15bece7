/**
 * Centralized configuration: environment defaults for the CLI plus the
 * pipeline settings file (JSON or YAML) with env overrides on top.
 */

import fs from 'fs';
import path from 'path';
import { parse as parseYaml } from 'yaml';
import { ConfigError } from '../lib/errors';
import { describeIssue, pipelineConfigSchema, PipelineConfig } from '../schemas/config';

export const DEFAULT_CONFIG_FILES = ['config.json', 'config.yaml', 'config.yml'];

function envStr(key: string, fallback = ''): string {
  return (process.env[key] ?? fallback).trim();
}

function envNum(key: string, fallback: number): number {
  const v = process.env[key];
  if (v === undefined || v === '') return fallback;
  const n = Number(v);
  return Number.isFinite(n) ? n : fallback;
}

function envOptionalNum(key: string): number | undefined {
  const v = process.env[key]?.trim();
  if (v === undefined || v === '') return undefined;
  const n = Number(v);
  return Number.isFinite(n) ? n : undefined;
}

function envBool(key: string, fallback = false): boolean {
  const v = process.env[key]?.toLowerCase();
  if (v === undefined || v === '') return fallback;
  return v === '1' || v === 'true' || v === 'yes';
}

export const config = {
  /** Pipeline settings file; unset means the first of DEFAULT_CONFIG_FILES that exists */
  get configPath(): string | undefined {
    return envStr('SLTP_CONFIG_PATH') || DEFAULT_CONFIG_FILES.find((name) => fs.existsSync(name));
  },

  /** Directory layout used by run-all */
  get dataDir(): string {
    return envStr('SLTP_DATA_DIR', path.join('data', 'tickers'));
  },
  get signalsDir(): string {
    return envStr('SLTP_SIGNALS_DIR', 'signals');
  },
  get outputDir(): string {
    return envStr('SLTP_OUTPUT_DIR', 'OUTPUT');
  },
  /** Tickers processed side by side in run-all */
  get parallel(): number {
    return Math.max(1, Math.min(16, Math.floor(envNum('SLTP_PARALLEL', 1))));
  },
  /** Write skipped (overlapping) signals into the ledger too */
  get includeSkipped(): boolean {
    return envBool('SLTP_INCLUDE_SKIPPED', true);
  },

  /** Per-key overrides applied over the settings file */
  get overrides(): Record<string, number> {
    const out: Record<string, number> = {};
    const pairs: [string, number | undefined][] = [
      ['atr_period', envOptionalNum('SLTP_ATR_PERIOD')],
      ['sl_multiplier', envOptionalNum('SLTP_SL_MULTIPLIER')],
      ['tp_multiplier', envOptionalNum('SLTP_TP_MULTIPLIER')],
      ['tick_size', envOptionalNum('SLTP_TICK_SIZE')]
    ];
    for (const [key, value] of pairs) {
      if (value !== undefined) out[key] = value;
    }
    return out;
  }
};

export function parsePipelineConfig(raw: unknown): PipelineConfig {
  const result = pipelineConfigSchema.safeParse(raw ?? {});
  if (result.success) return result.data;
  throw new ConfigError(describeIssue(result.error, 'Invalid pipeline configuration'));
}

function isYamlFile(filePath: string): boolean {
  const ext = path.extname(filePath).toLowerCase();
  return ext === '.yaml' || ext === '.yml';
}

function readConfigFile(filePath: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    const text = fs.readFileSync(filePath, 'utf8');
    parsed = isYamlFile(filePath) ? parseYaml(text) : JSON.parse(text);
  } catch (e) {
    throw new ConfigError(`Failed to read config ${filePath}: ${e instanceof Error ? e.message : String(e)}`);
  }
  if (parsed === null || parsed === undefined) return {};
  if (typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new ConfigError(`Config ${filePath} must contain a key/value mapping`);
  }
  return { ...parsed };
}

/**
 * Loads the settings file and applies SLTP_* env overrides.
 * An explicitly requested file must exist; the default path may be absent.
 */
export function loadPipelineConfig(filePath?: string): PipelineConfig {
  const target = filePath ?? config.configPath;
  let fileValues: Record<string, unknown> = {};
  if (target !== undefined && fs.existsSync(target)) {
    fileValues = readConfigFile(target);
  } else if (filePath !== undefined) {
    throw new ConfigError(`Config file not found: ${filePath}`);
  }
  return parsePipelineConfig({ ...fileValues, ...config.overrides });
}

export default config;
