import { describe, it, expect } from 'vitest';
import { ThermolineError, ConfigError } from '../../src/core/errors.js';

describe('Error Classes', () => {
  it('ThermolineError carries suggestions', () => {
    const error = new ThermolineError('sensor unavailable', ['Load the coretemp module.']);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('ThermolineError');
    expect(error.message).toBe('sensor unavailable');
    expect(error.suggestions).toEqual(['Load the coretemp module.']);
  });

  it('ThermolineError defaults to no suggestions', () => {
    expect(new ThermolineError('x').suggestions).toEqual([]);
  });

  it('ConfigError records the offending paths', () => {
    const error = new ConfigError('Invalid configuration', ['historySize', 'chart.minWidth']);
    expect(error).toBeInstanceOf(ThermolineError);
    expect(error.name).toBe('ConfigError');
    expect(error.paths).toEqual(['historySize', 'chart.minWidth']);
    expect(error.suggestions).toContain('Unset THERMOLINE_* environment variables to fall back to defaults.');
  });
});
