import type {
  ClassifierConfig,
  ClassifierCounters,
  ClassifierStatus,
  Clock,
  LineOutcome,
  LineResult,
  LineSnapshot,
  OutputRecord,
  ProbeRecord,
  StatusReporter,
} from '../types';
import { ConfigurationError } from '../errors';
import { compileTimeFormat, type TimeFormatter } from '../format/time-format';
import { parseProbeLine, UNTIMESTAMPED_TOKEN_COUNT } from './probe-parser';

const SEQUENCE_MODULUS = 65536;
/** How far behind `lastSequence` a reply may arrive and still count as late */
export const LATE_REPLY_WINDOW = 64;
/** Largest `allowedSequenceGap` that leaves the late-reply window intact */
export const MAX_ALLOWED_SEQUENCE_GAP = SEQUENCE_MODULUS - LATE_REPLY_WINDOW - 1;

export type SequenceDecision =
  | 'init'       // First sequence number seen
  | 'accept'     // Within the allowed step
  | 'duplicate'  // Same as the last one
  | 'late'       // Up to LATE_REPLY_WINDOW behind the last one
  | 'gap';       // Ahead by more than the allowed step

/** Forward distance from `last` to `next` in the 16-bit sequence space */
export function sequenceDistance(last: number, next: number): number {
  return (next - last + SEQUENCE_MODULUS) % SEQUENCE_MODULUS;
}

export function classifySequence(
  last: number | undefined,
  next: number,
  allowedGap: number,
): { decision: SequenceDecision; distance: number } {
  if (last === undefined) return { decision: 'init', distance: 0 };

  const distance = sequenceDistance(last, next);
  if (distance === 0) return { decision: 'duplicate', distance };
  if (distance > allowedGap && distance >= SEQUENCE_MODULUS - LATE_REPLY_WINDOW) {
    return { decision: 'late', distance };
  }
  if (distance > allowedGap) return { decision: 'gap', distance };
  return { decision: 'accept', distance };
}

export interface LineClassifierOptions {
  /** Wall-clock source used to arm heartbeats (default: Date.now in seconds) */
  clock?: Clock;
}

const STATUS_TIME_PLACEHOLDER = 'n/a';

/**
 * Stateful reducer over the lines of `ping -D`.
 *
 * Each call to process() consumes one line and returns the records it
 * produced; routing them to sinks is the caller's job. Fatal input is
 * returned as a value, never thrown.
 */
export class LineClassifier implements StatusReporter {
  private readonly config: ClassifierConfig;
  private readonly formatTime: TimeFormatter;
  private readonly clock: Clock;
  private lastSequence?: number;
  /** Seconds; time of the last output, never moves backwards */
  private lastEventTimestamp: number;
  private lastLine?: LineSnapshot;
  private readonly counters: ClassifierCounters = {
    linesProcessed: 0,
    anomalies: 0,
    sequenceGaps: 0,
    heartbeats: 0,
    unparseable: 0,
  };

  constructor(config: ClassifierConfig, options: LineClassifierOptions = {}) {
    this.config = config;
    this.formatTime = compileTimeFormat(config.timeFormat);
    this.clock = options.clock ?? (() => Date.now() / 1000);
    this.lastEventTimestamp = this.clock();
  }

  process(line: string): LineResult {
    const parsed = parseProbeLine(line);

    switch (parsed.kind) {
      case 'blank':
      case 'header':
        return done(parsed.kind, []);

      case 'untimestamped':
        return {
          ok: false,
          error: new ConfigurationError(
            `Got ${UNTIMESTAMPED_TOKEN_COUNT} columns. Maybe you missed -D when calling "ping -D x.x.x.x"`,
          ),
        };

      case 'unparseable': {
        this.counters.linesProcessed++;
        this.counters.unparseable++;
        this.lastLine = { text: parsed.rawText, formattedTime: this.lastLine?.formattedTime };
        return done('unparseable', [{
          kind: 'unparseable',
          channels: ['primary', 'error'],
          text: `Unparseable timestamp: ${parsed.rawText}`,
        }]);
      }

      case 'probe':
        this.counters.linesProcessed++;
        return this.classify(parsed.record);
    }
  }

  /** Status line for on-demand reporting; reads a single snapshot */
  reportStatus(): string {
    const snapshot = this.lastLine;
    const time = snapshot?.formattedTime ?? STATUS_TIME_PLACEHOLDER;
    return `Last line at ${time}: "${snapshot?.text ?? ''}"`;
  }

  getStatus(): ClassifierStatus {
    return {
      ...this.counters,
      lastSequence: this.lastSequence,
      lastLine: this.lastLine,
    };
  }

  private classify(record: ProbeRecord): LineResult {
    const time = this.formatTime(record.timestamp);
    const records: OutputRecord[] = [];
    const seq = record.sequenceNumber;

    // Nothing to track without a sequence number; the line itself is the anomaly
    if (seq === undefined) {
      records.push(this.anomaly(record, time));
      this.lastLine = { text: record.rawText, formattedTime: time };
      return done('no-sequence', records);
    }

    const tooSlow = record.roundTripMs !== undefined && record.roundTripMs > this.config.maxRoundTripMs;
    const noReply = record.roundTripMs === undefined;
    if (tooSlow || noReply || record.hasSuffix) {
      records.push(this.anomaly(record, time));
    }

    const { decision, distance } = classifySequence(this.lastSequence, seq, this.config.allowedSequenceGap);
    if (decision === 'gap') {
      records.push({
        kind: 'missed',
        channels: ['primary'],
        text: `${time} Missed icmp_seq=${this.lastSequence}:${seq} (${distance} packets)`,
        probeTimestamp: record.timestamp,
      });
      this.counters.sequenceGaps++;
      this.markEvent(record.timestamp);
    }

    const interval = this.config.heartbeatIntervalSeconds;
    if (interval > 0 && record.timestamp - this.lastEventTimestamp > interval) {
      records.push({
        kind: 'heartbeat',
        channels: ['heartbeat'],
        text: `No anomalies found in the last ${interval} s. Last input was at ${time}`,
        probeTimestamp: record.timestamp,
      });
      this.counters.heartbeats++;
      // Re-arm on wall-clock time so a stalled input does not flood heartbeats
      this.markEvent(this.clock());
    }

    if (decision === 'init' || decision === 'accept' || decision === 'gap') {
      this.lastSequence = seq;
    }

    this.lastLine = { text: record.rawText, formattedTime: time };
    return done('classified', records);
  }

  private anomaly(record: ProbeRecord, time: string): OutputRecord {
    this.counters.anomalies++;
    this.markEvent(record.timestamp);
    return {
      kind: 'anomaly',
      channels: ['primary'],
      text: `${time} ${record.rawText}`,
      probeTimestamp: record.timestamp,
    };
  }

  private markEvent(timestamp: number): void {
    this.lastEventTimestamp = Math.max(this.lastEventTimestamp, timestamp);
  }
}

function done(outcome: LineOutcome, records: OutputRecord[]): LineResult {
  return { ok: true, outcome, records };
}
