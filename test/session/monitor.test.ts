import { describe, it, expect, vi } from 'vitest';
import { MonitorSession, extendOrder } from '../../src/session/monitor.js';
import { sessionLogger } from '../../src/session/options.js';
import { defineConfig } from '../../src/config.js';
import { TerminalLogger } from '../../src/utils/logger.js';
import { silentLogger, type Logger } from '../../src/types/logger.js';
import type { SensorReading } from '../../src/types/index.js';
import type { MonitorCommand } from '../../src/session/events.js';
import { at, plain } from '../helpers/points.js';

const core = (value: number): SensorReading => ({
  chip: 'coretemp-isa-0000',
  adapter: 'ISA adapter',
  label: 'Core 0',
  value,
  high: 80,
  critical: 100,
});

const nvme = (value: number): SensorReading => ({
  chip: 'nvme-pci-0100',
  adapter: 'PCI adapter',
  label: 'Composite',
  value,
});

describe('MonitorSession', () => {
  it('polls and schedules the first tick on start', () => {
    const session = new MonitorSession({ colors: plain });
    expect(session.init()).toEqual([{ type: 'poll' }, { type: 'schedule-tick', delayMs: 1000 }]);
  });

  it('uses the configured poll interval', () => {
    const session = new MonitorSession({ config: defineConfig({ pollIntervalMs: 250 }), colors: plain });
    expect(session.handle({ type: 'tick', at: at(9, 0, 0) })).toEqual([
      { type: 'poll' },
      { type: 'schedule-tick', delayMs: 250 },
    ]);
  });

  it('keeps ticking but stops polling while paused', () => {
    const session = new MonitorSession({ colors: plain });

    session.handle({ type: 'key', key: 'p' });
    expect(session.paused).toBe(true);
    expect(session.handle({ type: 'tick', at: at(9, 0, 1) })).toEqual([{ type: 'schedule-tick', delayMs: 1000 }]);

    session.handle({ type: 'key', key: ' ' });
    expect(session.paused).toBe(false);
    expect(session.handle({ type: 'tick', at: at(9, 0, 2) })).toEqual([
      { type: 'poll' },
      { type: 'schedule-tick', delayMs: 1000 },
    ]);
  });

  it('records readings under the host timestamp and asks to persist them', () => {
    const session = new MonitorSession({ colors: plain });
    const readings = [nvme(35), core(48)];
    const timestamp = at(12, 0, 30);

    const commands = session.handle({ type: 'readings', readings, timestamp });

    expect(commands).toEqual([{ type: 'persist', readings, timestamp }]);
    expect(session.store.get('coretemp-isa-0000/Core 0')?.lastNPoints(1)).toEqual([{ value: 48, timestamp }]);
    expect(session.lastPoll).toEqual(timestamp);
    expect(session.order).toEqual(['coretemp-isa-0000/Core 0', 'nvme-pci-0100/Composite']);
    expect(session.isWaiting).toBe(false);
  });

  it('stores poll errors and clears them on the next batch', () => {
    const warn = vi.fn();
    const logger: Logger = { ...silentLogger, warn };
    const session = new MonitorSession({ logger, colors: plain });

    expect(session.handle({ type: 'error', error: new Error('boom') })).toEqual([]);
    expect(session.error?.message).toBe('boom');
    expect(warn).toHaveBeenCalledWith('sensor poll failed: boom');

    session.handle({ type: 'readings', readings: [core(40)], timestamp: at(12, 0, 31) });
    expect(session.error).toBeUndefined();
  });

  it('keeps a single tick chain when polls fail', () => {
    const session = new MonitorSession({ colors: plain });
    let pendingTicks = 0;
    function run(commands: MonitorCommand[]): void {
      for (const command of commands) {
        if (command.type === 'schedule-tick') pendingTicks++;
        if (command.type === 'poll') run(session.handle({ type: 'error', error: new Error('no sensors') }));
      }
    }

    run(session.init());
    expect(pendingTicks).toBe(1);

    for (let i = 0; i < 5; i++) {
      pendingTicks--;
      run(session.handle({ type: 'tick', at: at(9, 0, i) }));
      expect(pendingTicks).toBe(1);
    }
  });

  it('bounds each history by the configured size', () => {
    const session = new MonitorSession({ config: defineConfig({ historySize: 2 }), colors: plain });
    for (const [i, v] of [30, 50, 40].entries()) {
      session.handle({ type: 'readings', readings: [core(v)], timestamp: at(12, 0, 10 + i) });
    }

    const history = session.store.get('coretemp-isa-0000/Core 0');
    expect(history?.lastN(5)).toEqual([50, 40]);
    expect(history?.min).toBe(30);
  });

  it('handles scrolling, resizing and quitting', () => {
    const session = new MonitorSession({ colors: plain });

    session.handle({ type: 'key', key: 'k' });
    expect(session.scroll).toBe(0);
    session.handle({ type: 'key', key: 'j' });
    session.handle({ type: 'key', key: 'down' });
    expect(session.scroll).toBe(2);
    session.handle({ type: 'key', key: 'home' });
    expect(session.scroll).toBe(0);

    session.handle({ type: 'resize', width: 160, height: 48 });
    expect([session.width, session.height]).toEqual([160, 48]);

    expect(session.handle({ type: 'key', key: 'q' })).toEqual([{ type: 'quit' }]);
  });

  describe('panels()', () => {
    const session = new MonitorSession({ colors: plain });
    session.handle({ type: 'readings', readings: [core(40), nvme(35)], timestamp: at(12, 0, 58) });
    session.handle({ type: 'readings', readings: [core(50), nvme(36)], timestamp: at(12, 0, 59) });
    session.handle({ type: 'readings', readings: [core(60), nvme(37)], timestamp: at(12, 1, 0) });

    const panels = session.panels(20);

    it('groups rows by chip', () => {
      expect(panels.map((p) => [p.name, p.chip, p.adapter])).toEqual([
        ['CPU', 'coretemp-isa-0000', 'ISA adapter'],
        ['NVMe SSD', 'nvme-pci-0100', 'PCI adapter'],
      ]);
    });

    it('renders the live sparkline with its minute tick', () => {
      const [row] = panels[0].rows;
      // range 35..105: 40 -> level 0, 50 -> level 1, 12:01:00 -> tick
      expect(row.sparkline).toBe('╌'.repeat(17) + '▁▂│');
      expect(row.timeline).toBe(' '.repeat(20));
    });

    it('reports the current value, stats and thresholds', () => {
      const [row] = panels[0].rows;
      expect(row.label).toBe('Core 0');
      expect(row.current).toBe(60);
      expect(row.value).toBe(' 60.0°C');
      expect(row.stats).toEqual({ average: 50, min: 40, peak: 60 });
      expect(row.thresholds).toEqual({ high: 80, critical: 100 });
    });

    it('renders the threshold scale from the lifetime range', () => {
      const [row] = panels[0].rows;
      expect(row.scale).toBe('····◆··▪··▪·');
    });
  });
});

describe('extendOrder', () => {
  it('appends unseen keys sorted after the existing order', () => {
    const order = extendOrder(['x/2'], [
      { chip: 'x', label: '1', value: 0 },
      { chip: 'x', label: '2', value: 0 },
      { chip: 'a', label: 'z', value: 0 },
    ]);
    expect(order).toEqual(['x/2', 'a/z', 'x/1']);
  });
});

describe('sessionLogger', () => {
  it('is silent when logging is off', () => {
    expect(sessionLogger(defineConfig())).toBe(silentLogger);
  });

  it('builds a terminal logger for other levels', () => {
    expect(sessionLogger(defineConfig({ logLevel: 'info' }))).toBeInstanceOf(TerminalLogger);
  });

  it('prefers an injected logger', () => {
    const logger: Logger = { ...silentLogger };
    expect(sessionLogger(defineConfig({ logLevel: 'debug' }), logger)).toBe(logger);
  });
});
