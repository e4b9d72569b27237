import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { EventLog } from './event-log';
import type { OutputRecord } from '../types';

function makeRecord(text: string, kind: OutputRecord['kind'] = 'anomaly'): OutputRecord {
  return { kind, channels: ['primary'], text, probeTimestamp: 1597166400 };
}

describe('EventLog', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'pingsieve-log-test-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('creates the data directory', () => {
    const dataDir = path.join(tmpDir, 'nested', 'data');
    new EventLog(dataDir);
    expect(fs.existsSync(dataDir)).toBe(true);
  });

  it('returns nothing before the first record', () => {
    expect(new EventLog(tmpDir).tail()).toEqual([]);
  });

  it('appends one JSON line per record', () => {
    const log = new EventLog(tmpDir);
    log.append(makeRecord('first'));
    log.append(makeRecord('second', 'missed'));

    const lines = fs.readFileSync(path.join(tmpDir, 'events.jsonl'), 'utf-8').trim().split('\n');
    expect(lines.length).toBe(2);

    const entries = log.tail();
    expect(entries.map((e) => [e.kind, e.text, e.probeTimestamp])).toEqual([
      ['anomaly', 'first', 1597166400],
      ['missed', 'second', 1597166400],
    ]);
    expect(Date.parse(entries[0].timestamp)).not.toBeNaN();
  });

  it('omits the probe timestamp when the record has none', () => {
    const log = new EventLog(tmpDir);
    log.append({ kind: 'unparseable', channels: ['primary', 'error'], text: 'Unparseable timestamp: x' });

    expect(log.tail()[0].probeTimestamp).toBeUndefined();
  });

  it('returns the last N entries', () => {
    const log = new EventLog(tmpDir);
    for (let i = 0; i < 5; i++) log.append(makeRecord(`line ${i}`));

    expect(log.tail(2).map((e) => e.text)).toEqual(['line 3', 'line 4']);
  });

  it('skips torn and foreign lines', () => {
    const log = new EventLog(tmpDir);
    log.append(makeRecord('kept'));
    fs.appendFileSync(log.filePath, '{"timestamp":"2020-08-11T17:20:00.000Z","kind":"anom\n');
    fs.appendFileSync(log.filePath, '{"timestamp":"2020-08-11T17:20:00.000Z","kind":"other","text":"x"}\n');

    expect(log.tail().map((e) => e.text)).toEqual(['kept']);
  });
});
