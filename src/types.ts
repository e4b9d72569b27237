import type { ConfigurationError } from './errors';

// --- Probe Records ---

/** One parsed line of `ping -D` output */
export interface ProbeRecord {
  /** Seconds since epoch, from the bracketed prefix */
  timestamp: number;
  /** icmp_seq value in [0, 65535] (absent if missing or unparseable) */
  sequenceNumber?: number;
  /** Round-trip time in ms (absent on filtered/unreachable replies) */
  roundTripMs?: number;
  /** True when the line carries trailing annotations such as (DUP!) */
  hasSuffix: boolean;
  /** Original line without its trailing newline */
  rawText: string;
}

// --- Output ---

export type OutputKind = 'anomaly' | 'missed' | 'unparseable' | 'heartbeat';
export type OutputChannel = 'primary' | 'heartbeat' | 'error';

/** A line of output produced by the classifier */
export interface OutputRecord {
  kind: OutputKind;
  /** Sinks this record goes to */
  channels: OutputChannel[];
  text: string;
  /** Probe timestamp of the line that produced the record */
  probeTimestamp?: number;
}

/** Anything that accepts a line of text */
export interface Sink {
  write(line: string): void;
}

export interface SieveSinks {
  primary: Sink;
  heartbeat: Sink;
  error: Sink;
}

// --- Classification ---

export type LineOutcome =
  | 'blank'         // Whitespace-only line
  | 'header'        // PING banner
  | 'unparseable'   // No valid [timestamp] prefix
  | 'no-sequence'   // Timestamped, but no usable icmp_seq
  | 'classified';   // Went through the anomaly, gap and heartbeat tests

export type LineResult =
  | { ok: true; outcome: LineOutcome; records: OutputRecord[] }
  | { ok: false; error: ConfigurationError };

export type RunResult =
  | { ok: true; linesRead: number }
  | { ok: false; linesRead: number; error: ConfigurationError; line: string };

/** Last processed line, replaced as a whole on every update */
export interface LineSnapshot {
  text: string;
  /** Unset until a line with a valid timestamp arrives */
  formattedTime?: string;
}

export interface ClassifierCounters {
  linesProcessed: number;
  anomalies: number;
  sequenceGaps: number;
  heartbeats: number;
  unparseable: number;
}

export interface ClassifierStatus extends ClassifierCounters {
  lastSequence?: number;
  lastLine?: LineSnapshot;
}

/** Narrow read-only view handed to asynchronous status triggers */
export interface StatusReporter {
  reportStatus(): string;
}

/** Wall-clock source in seconds since epoch */
export type Clock = () => number;

// --- Configuration ---

export type HeartbeatTarget = 'stdout' | 'stderr';

export interface PingSieveConfig {
  /** Round-trip times above this are reported (default: 500) */
  maxRoundTripMs: number;
  /** strftime-style pattern for output timestamps */
  timeFormat: string;
  /** Seconds without output before a heartbeat is written (0 disables) */
  heartbeatIntervalSeconds: number;
  /** Largest icmp_seq step that is not reported as missed (default: 1) */
  allowedSequenceGap: number;
  /** Where heartbeat messages go (default: stdout) */
  heartbeatSink: HeartbeatTarget;
  /** Directory for the JSONL event log (unset disables it) */
  dataDir?: string;
}

export type ClassifierConfig = Pick<
  PingSieveConfig,
  'maxRoundTripMs' | 'timeFormat' | 'heartbeatIntervalSeconds' | 'allowedSequenceGap'
>;

// --- Event Log ---

export interface EventLogEntry {
  /** ISO wall-clock time the record was written */
  timestamp: string;
  kind: OutputKind;
  text: string;
  probeTimestamp?: number;
}

// --- Monitor Interface ---

export type MonitorType = 'status-signal';

export interface Monitor {
  readonly type: MonitorType;
  start(): void;
  stop(): void;
  isRunning(): boolean;
}
