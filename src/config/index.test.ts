import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { config, loadPipelineConfig, parsePipelineConfig } from './index';
import { ConfigError } from '../lib/errors';

describe('parsePipelineConfig', () => {
  it('applies defaults', () => {
    expect(parsePipelineConfig({})).toEqual({
      atrPeriod: 14,
      slMultiplier: 1.5,
      tpMultiplier: 3,
      tickSize: undefined,
      entryPriceSource: 'close',
      roundingMode: 'nearest',
      invalidTickBehavior: 'no_round',
      closePolicy: 'opposite_signal'
    });
  });

  it('treats a null tick size as absent', () => {
    expect(parsePipelineConfig({ tick_size: null }).tickSize).toBeUndefined();
  });

  it('keeps an unusable tick size for the rounder to judge', () => {
    expect(parsePipelineConfig({ tick_size: 'abc' }).tickSize).toBe('abc');
  });

  it('rejects bad values with the offending key', () => {
    expect(() => parsePipelineConfig({ atr_period: 0 })).toThrow('atr_period: atr_period must be >= 1');
    expect(() => parsePipelineConfig({ sl_multiplier: -1 })).toThrow(ConfigError);
    expect(() => parsePipelineConfig({ entry_price_source: 'vwap' })).toThrow(ConfigError);
  });
});

describe('loadPipelineConfig', () => {
  const originalEnv = { ...process.env };
  let dir: string;

  beforeEach(() => {
    process.env = { ...originalEnv };
    for (const key of ['SLTP_ATR_PERIOD', 'SLTP_SL_MULTIPLIER', 'SLTP_TP_MULTIPLIER', 'SLTP_TICK_SIZE', 'SLTP_CONFIG_PATH']) {
      delete process.env[key];
    }
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'sltp-config-'));
  });

  afterEach(() => {
    process.env = originalEnv;
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('reads a JSON settings file', () => {
    const file = path.join(dir, 'config.json');
    fs.writeFileSync(file, JSON.stringify({ atr_period: 10, tick_size: 0.01, rounding_mode: 'directional' }));
    const cfg = loadPipelineConfig(file);
    expect(cfg.atrPeriod).toBe(10);
    expect(cfg.tickSize).toBe(0.01);
    expect(cfg.roundingMode).toBe('directional');
  });

  it('lets env overrides win over the file', () => {
    const file = path.join(dir, 'config.json');
    fs.writeFileSync(file, JSON.stringify({ atr_period: 10, sl_multiplier: 2 }));
    process.env.SLTP_ATR_PERIOD = '20';
    const cfg = loadPipelineConfig(file);
    expect(cfg.atrPeriod).toBe(20);
    expect(cfg.slMultiplier).toBe(2);
  });

  it('falls back to defaults when the default path is absent', () => {
    process.env.SLTP_CONFIG_PATH = path.join(dir, 'missing.json');
    expect(loadPipelineConfig().atrPeriod).toBe(14);
  });

  it('fails for an explicit path that does not exist', () => {
    expect(() => loadPipelineConfig(path.join(dir, 'missing.json'))).toThrow(ConfigError);
  });

  it('fails for malformed JSON or a non-object', () => {
    const bad = path.join(dir, 'bad.json');
    fs.writeFileSync(bad, '{ atr_period: ');
    expect(() => loadPipelineConfig(bad)).toThrow(ConfigError);
    fs.writeFileSync(bad, '[1, 2]');
    expect(() => loadPipelineConfig(bad)).toThrow(`Config ${bad} must contain a key/value mapping`);
  });

  it('reads a YAML settings file', () => {
    const file = path.join(dir, 'config.yaml');
    fs.writeFileSync(file, ['atr_period: 7', 'tick_size: 0.05', 'close_policy: sl_tp_hit', ''].join('\n'));
    const cfg = loadPipelineConfig(file);
    expect(cfg.atrPeriod).toBe(7);
    expect(cfg.tickSize).toBe(0.05);
    expect(cfg.closePolicy).toBe('sl_tp_hit');
  });

  it('treats an empty YAML file as defaults', () => {
    const file = path.join(dir, 'empty.yml');
    fs.writeFileSync(file, '');
    expect(loadPipelineConfig(file).atrPeriod).toBe(14);
  });

  it('validates YAML values like JSON ones', () => {
    const file = path.join(dir, 'config.yml');
    fs.writeFileSync(file, 'atr_period: 0\n');
    expect(() => loadPipelineConfig(file)).toThrow('atr_period: atr_period must be >= 1');
  });
});

describe('config', () => {
  const originalEnv = { ...process.env };

  afterEach(() => {
    process.env = originalEnv;
  });

  it('clamps parallelism', () => {
    process.env = { ...originalEnv, SLTP_PARALLEL: '64' };
    expect(config.parallel).toBe(16);
    process.env = { ...originalEnv, SLTP_PARALLEL: 'zero' };
    expect(config.parallel).toBe(1);
  });

  it('includes skipped rows unless disabled', () => {
    process.env = { ...originalEnv, SLTP_INCLUDE_SKIPPED: '' };
    expect(config.includeSkipped).toBe(true);
    process.env = { ...originalEnv, SLTP_INCLUDE_SKIPPED: 'false' };
    expect(config.includeSkipped).toBe(false);
  });
});
