import { describe, it, expect } from 'vitest';
import { EventEmitter } from 'events';
import { StatusSignalMonitor } from './status-signal';
import type { Sink } from '../types';

function collect(): Sink & { lines: string[] } {
  const lines: string[] = [];
  return { lines, write: (line) => { lines.push(line); } };
}

describe('StatusSignalMonitor', () => {
  it('writes the current status each time the signal arrives', () => {
    const signals = new EventEmitter();
    const sink = collect();
    let status = 'Last line at n/a: ""';
    const monitor = new StatusSignalMonitor({ reportStatus: () => status }, sink, signals);

    monitor.start();
    signals.emit('SIGUSR1');
    status = 'Last line at 17:20:00: "x"';
    signals.emit('SIGUSR1');

    expect(sink.lines).toEqual(['Last line at n/a: ""', 'Last line at 17:20:00: "x"']);
  });

  it('ignores the signal once stopped', () => {
    const signals = new EventEmitter();
    const sink = collect();
    const monitor = new StatusSignalMonitor({ reportStatus: () => 'status' }, sink, signals);

    monitor.start();
    expect(monitor.isRunning()).toBe(true);
    monitor.stop();
    expect(monitor.isRunning()).toBe(false);

    signals.emit('SIGUSR1');
    expect(sink.lines).toEqual([]);
    expect(signals.listenerCount('SIGUSR1')).toBe(0);
  });

  it('subscribes only once when started twice', () => {
    const signals = new EventEmitter();
    const monitor = new StatusSignalMonitor({ reportStatus: () => 'status' }, collect(), signals);

    monitor.start();
    monitor.start();
    expect(signals.listenerCount('SIGUSR1')).toBe(1);
    monitor.stop();
  });

  it('listens on a custom signal', () => {
    const signals = new EventEmitter();
    const sink = collect();
    const monitor = new StatusSignalMonitor({ reportStatus: () => 'status' }, sink, signals, 'SIGUSR2');

    monitor.start();
    signals.emit('SIGUSR1');
    signals.emit('SIGUSR2');
    expect(sink.lines).toEqual(['status']);
    monitor.stop();
  });
});
