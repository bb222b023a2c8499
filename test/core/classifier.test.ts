import { describe, it, expect } from 'vitest';
import { classify, tierColor } from '../../src/core/classifier.js';

describe('classify', () => {
  const thresholds = { high: 100, critical: 120 };

  it('puts boundary values in the more severe tier', () => {
    expect(classify(84.9, thresholds).tier).toBe('ok');
    expect(classify(85, thresholds).tier).toBe('warn');
    expect(classify(99.9, thresholds).tier).toBe('warn');
    expect(classify(100, thresholds).tier).toBe('high');
    expect(classify(119.9, thresholds).tier).toBe('high');
    expect(classify(120, thresholds).tier).toBe('critical');
  });

  it('flags only critical values for emphasis', () => {
    expect(classify(120, thresholds)).toEqual({ tier: 'critical', emphasis: true });
    expect(classify(110, thresholds)).toEqual({ tier: 'high', emphasis: false });
  });

  it('defaults to ok without thresholds', () => {
    expect(classify(500)).toEqual({ tier: 'ok', emphasis: false });
  });

  it('uses whichever threshold is present', () => {
    expect(classify(95, { critical: 100 }).tier).toBe('ok');
    expect(classify(100, { critical: 100 }).tier).toBe('critical');
    expect(classify(70, { high: 80 }).tier).toBe('warn');
  });

  it('maps tiers to terminal colors', () => {
    expect(tierColor('ok')).toBe(78);
    expect(tierColor('warn')).toBe(220);
    expect(tierColor('high')).toBe(208);
    expect(tierColor('critical')).toBe(196);
  });
});
