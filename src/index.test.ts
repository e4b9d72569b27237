import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { EventEmitter } from 'events';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { PingSieve, ConfigurationError, EventLog, defaultConfig } from './index';
import type { PingSieveConfig, Sink } from './types';

// 2020-08-11 17:20:00 UTC
const T = 1597166400;

function collect(): Sink & { lines: string[] } {
  const lines: string[] = [];
  return { lines, write: (line) => { lines.push(line); } };
}

function makeSinks() {
  return { primary: collect(), heartbeat: collect(), error: collect() };
}

function reply(seq: number, rtt: number, offset: number): string {
  return `[${T + offset}.000000] 64 bytes from 8.8.8.8: icmp_seq=${seq} ttl=118 time=${rtt} ms`;
}

async function* fromArray(lines: string[], between?: (index: number) => void): AsyncGenerator<string> {
  for (let i = 0; i < lines.length; i++) {
    yield lines[i];
    between?.(i);
  }
}

function makeConfig(overrides: Partial<PingSieveConfig> = {}): PingSieveConfig {
  return { ...defaultConfig(), ...overrides };
}

describe('PingSieve', () => {
  it('routes records to their sinks and counts lines', async () => {
    const sinks = makeSinks();
    const sieve = new PingSieve(makeConfig({ heartbeatIntervalSeconds: 5 }), sinks, {
      clock: () => T,
      signalSource: new EventEmitter(),
    });

    const result = await sieve.run(fromArray([
      'PING 8.8.8.8 (8.8.8.8) 56(84) bytes of data.',
      reply(1, 14.2, 0),
      reply(2, 900, 1),
      reply(5, 10, 2),
      '[bad] 64 bytes from 8.8.8.8: icmp_seq=6 ttl=118 time=10 ms',
      reply(6, 10, 9),
    ]));

    expect(result).toEqual({ ok: true, linesRead: 6 });
    expect(sinks.primary.lines).toEqual([
      '2020-08-11 17:20:01 [1597166401.000000] 64 bytes from 8.8.8.8: icmp_seq=2 ttl=118 time=900 ms',
      '2020-08-11 17:20:02 Missed icmp_seq=2:5 (3 packets)',
      'Unparseable timestamp: [bad] 64 bytes from 8.8.8.8: icmp_seq=6 ttl=118 time=10 ms',
    ]);
    expect(sinks.heartbeat.lines).toEqual([
      'No anomalies found in the last 5 s. Last input was at 2020-08-11 17:20:09',
    ]);
    expect(sinks.error.lines).toEqual([
      'Unparseable timestamp: [bad] 64 bytes from 8.8.8.8: icmp_seq=6 ttl=118 time=10 ms',
    ]);
    expect(sieve.getStatus()).toMatchObject({
      linesProcessed: 5,
      anomalies: 1,
      sequenceGaps: 1,
      heartbeats: 1,
      unparseable: 1,
      lastSequence: 6,
    });
  });

  it('stops at the first fatal line and reports it', async () => {
    const sinks = makeSinks();
    const sieve = new PingSieve(makeConfig(), sinks, { clock: () => T, signalSource: new EventEmitter() });
    const untimestamped = '64 bytes from 8.8.8.8: icmp_seq=2 ttl=118 time=900 ms';

    const result = await sieve.run(fromArray([reply(1, 900, 0), untimestamped, reply(3, 900, 2)]));

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(ConfigurationError);
      expect(result.linesRead).toBe(2);
      expect(result.line).toBe(untimestamped);
    }
    expect(sinks.primary.lines.length).toBe(1);
  });

  it('answers the status signal between lines and unsubscribes when done', async () => {
    const sinks = makeSinks();
    const signals = new EventEmitter();
    const sieve = new PingSieve(makeConfig(), sinks, { clock: () => T, signalSource: signals });

    expect(signals.listenerCount('SIGUSR1')).toBe(0);
    await sieve.run(fromArray([reply(1, 10, 0), reply(2, 10, 1)], (i) => {
      if (i === 0) signals.emit('SIGUSR1');
    }));

    expect(sinks.error.lines).toEqual([
      `Last line at 2020-08-11 17:20:00: "${reply(1, 10, 0)}"`,
    ]);
    expect(signals.listenerCount('SIGUSR1')).toBe(0);
  });

  describe('event log', () => {
    let tmpDir: string;

    beforeEach(() => {
      tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'pingsieve-run-test-'));
    });

    afterEach(() => {
      fs.rmSync(tmpDir, { recursive: true, force: true });
    });

    it('appends every written record when dataDir is set', async () => {
      const sieve = new PingSieve(makeConfig({ dataDir: tmpDir }), makeSinks(), {
        clock: () => T,
        signalSource: new EventEmitter(),
      });

      await sieve.run(fromArray([reply(1, 10, 0), reply(4, 900, 1)]));

      const entries = new EventLog(tmpDir).tail();
      expect(entries.map((e) => e.kind)).toEqual(['anomaly', 'missed']);
      expect(entries[1].text).toBe('2020-08-11 17:20:01 Missed icmp_seq=1:4 (3 packets)');
    });
  });
});
