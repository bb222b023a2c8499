import { describe, it, expect } from 'vitest';
import { defineConfig, loadConfigFromEnv } from '../src/config.js';
import { ConfigError } from '../src/core/errors.js';
import { chartWidth } from '../src/session/layout.js';

function configErrorOf(fn: () => unknown): ConfigError {
  try {
    fn();
  } catch (err) {
    if (err instanceof ConfigError) return err;
    throw err;
  }
  throw new Error('expected a ConfigError');
}

describe('Configuration', () => {
  it('fills in defaults', () => {
    expect(defineConfig()).toEqual({
      historySize: 600,
      pollIntervalMs: 1000,
      rangePadding: 5,
      chart: { minWidth: 15, maxWidth: 140, reservedColumns: 60 },
      scrubStep: 60,
      logLevel: 'none',
    });
  });

  it('merges partial chart settings with defaults', () => {
    const config = defineConfig({ chart: { maxWidth: 80 } });
    expect(config.chart).toEqual({ minWidth: 15, maxWidth: 80, reservedColumns: 60 });
  });

  it('rejects invalid values with the offending paths', () => {
    const error = configErrorOf(() => defineConfig({ historySize: 0, pollIntervalMs: 10 }));
    expect(error.paths).toEqual(['historySize', 'pollIntervalMs']);
    expect(error.suggestions.length).toBeGreaterThan(0);
  });

  it('rejects a chart minimum above its maximum', () => {
    expect(() => defineConfig({ chart: { minWidth: 50, maxWidth: 20 } })).toThrow(/chart\.minWidth/);
  });

  describe('loadConfigFromEnv()', () => {
    it('reads THERMOLINE_* variables', () => {
      const config = loadConfigFromEnv({
        THERMOLINE_HISTORY_SIZE: '120',
        THERMOLINE_POLL_INTERVAL: '500',
        THERMOLINE_LOG_LEVEL: 'warn',
      });
      expect(config.historySize).toBe(120);
      expect(config.pollIntervalMs).toBe(500);
      expect(config.logLevel).toBe('warn');
    });

    it('turns on debug logging from DEBUG', () => {
      expect(loadConfigFromEnv({ DEBUG: 'thermoline' }).logLevel).toBe('debug');
    });

    it('ignores blank variables', () => {
      expect(loadConfigFromEnv({ THERMOLINE_HISTORY_SIZE: ' ' }).historySize).toBe(600);
    });

    it('lets explicit overrides win', () => {
      expect(loadConfigFromEnv({ THERMOLINE_HISTORY_SIZE: '120' }, { historySize: 30 }).historySize).toBe(30);
    });

    it('rejects malformed variables', () => {
      expect(() => loadConfigFromEnv({ THERMOLINE_HISTORY_SIZE: 'lots' })).toThrow(ConfigError);
      expect(() => loadConfigFromEnv({ THERMOLINE_LOG_LEVEL: 'loud' })).toThrow(/logLevel/);
    });
  });

  describe('chartWidth()', () => {
    const { chart } = defineConfig();

    it('subtracts borders and fixed columns', () => {
      expect(chartWidth(120, chart)).toBe(56);
    });

    it('clamps to the configured bounds', () => {
      expect(chartWidth(40, chart)).toBe(15);
      expect(chartWidth(300, chart)).toBe(140);
    });
  });
});
