import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import type { EventLogEntry, OutputRecord } from '../types';

export const EVENT_LOG = 'events.jsonl';
const MAX_LOG_SIZE = 50 * 1024 * 1024; // 50MB

/**
 * Append-only JSONL log of every record pingsieve wrote.
 * An audit trail of output only; nothing is read back into the classifier.
 */
export class EventLog {
  private readonly dataDir: string;

  constructor(dataDir: string) {
    this.dataDir = dataDir;
    fs.mkdirSync(dataDir, { recursive: true });
  }

  get filePath(): string {
    return path.join(this.dataDir, EVENT_LOG);
  }

  append(record: OutputRecord): void {
    const entry: EventLogEntry = {
      timestamp: new Date().toISOString(),
      kind: record.kind,
      text: record.text,
      probeTimestamp: record.probeTimestamp,
    };

    this.rotateIfNeeded();
    fs.appendFileSync(this.filePath, JSON.stringify(entry) + '\n', 'utf-8');
  }

  /** Last N entries (all when limit is omitted) */
  tail(limit?: number): EventLogEntry[] {
    if (!fs.existsSync(this.filePath)) return [];

    const content = fs.readFileSync(this.filePath, 'utf-8');
    const entries: EventLogEntry[] = [];
    for (const line of content.split('\n')) {
      const entry = parseEntry(line);
      if (entry) entries.push(entry);
    }

    if (limit && limit > 0) {
      return entries.slice(-limit);
    }
    return entries;
  }

  private rotateIfNeeded(): void {
    let size: number;
    try {
      size = fs.statSync(this.filePath).size;
    } catch {
      return; // Not created yet
    }
    if (size > MAX_LOG_SIZE) {
      fs.renameSync(this.filePath, `${this.filePath}.${Date.now()}`);
    }
  }
}

const EventLogEntrySchema = z.object({
  timestamp: z.string(),
  kind: z.enum(['anomaly', 'missed', 'unparseable', 'heartbeat']),
  text: z.string(),
  probeTimestamp: z.number().optional(),
});

/** Skips blank and torn lines (e.g. a write cut short by a kill) */
function parseEntry(line: string): EventLogEntry | null {
  if (!line.trim()) return null;

  let value: unknown;
  try {
    value = JSON.parse(line);
  } catch {
    return null;
  }

  const result = EventLogEntrySchema.safeParse(value);
  return result.success ? result.data : null;
}
