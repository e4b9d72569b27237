export const VERSION = '0.1.0';

// Re-export types
export type {
  PingSieveConfig,
  ClassifierConfig,
  ProbeRecord,
  OutputRecord,
  OutputKind,
  OutputChannel,
  LineOutcome,
  LineResult,
  RunResult,
  LineSnapshot,
  ClassifierCounters,
  ClassifierStatus,
  StatusReporter,
  Sink,
  SieveSinks,
  Clock,
  EventLogEntry,
  Monitor,
  MonitorType,
} from './types';

// Re-export components
export { LineClassifier, classifySequence, sequenceDistance, LATE_REPLY_WINDOW, MAX_ALLOWED_SEQUENCE_GAP } from './engine/classifier';
export { parseProbeLine, parseTimestampToken } from './engine/probe-parser';
export { compileTimeFormat, toDateFnsPatterns, DEFAULT_TIME_FORMAT } from './format/time-format';
export { StreamSink, Dispatcher } from './reporting/sinks';
export { EventLog } from './reporting/event-log';
export { StatusSignalMonitor } from './monitors/status-signal';
export type { SignalSource } from './monitors/status-signal';
export { readLines, assertPipedInput } from './monitors/line-source';
export { loadConfig, defaultConfig, validateConfig } from './config/loader';
export { PingSieveError, ConfigurationError, TerminalInputError } from './errors';

import type { ClassifierStatus, Clock, Monitor, PingSieveConfig, RunResult, SieveSinks } from './types';
import type { SignalSource } from './monitors/status-signal';
import { LineClassifier } from './engine/classifier';
import { Dispatcher } from './reporting/sinks';
import { EventLog } from './reporting/event-log';
import { StatusSignalMonitor } from './monitors/status-signal';

export interface PingSieveOptions {
  /** Wall-clock source for heartbeat re-arming */
  clock?: Clock;
  /** Where the status signal is received from (default: process) */
  signalSource?: SignalSource;
}

/**
 * pingsieve — forwards only the interesting lines of `ping -D`.
 *
 * Wires the line classifier to its sinks, the optional event log and
 * the status signal. Usage:
 *   const sieve = new PingSieve(config, { primary, heartbeat, error });
 *   const result = await sieve.run(readLines(process.stdin));
 */
export class PingSieve {
  private readonly classifier: LineClassifier;
  private readonly dispatcher: Dispatcher;
  private readonly monitors: Monitor[] = [];

  constructor(config: PingSieveConfig, sinks: SieveSinks, options: PingSieveOptions = {}) {
    this.classifier = new LineClassifier(config, { clock: options.clock });
    const eventLog = config.dataDir ? new EventLog(config.dataDir) : undefined;
    this.dispatcher = new Dispatcher(sinks, eventLog);
    this.monitors.push(new StatusSignalMonitor(this.classifier, sinks.error, options.signalSource));
  }

  /**
   * Feed every line of the source through the classifier.
   * Stops at the first fatal condition and returns it; per-line problems never stop the loop.
   */
  async run(lines: AsyncIterable<string>): Promise<RunResult> {
    let linesRead = 0;

    for (const monitor of this.monitors) monitor.start();
    try {
      for await (const line of lines) {
        linesRead++;
        const result = this.classifier.process(line);
        if (!result.ok) {
          return { ok: false, linesRead, error: result.error, line };
        }
        this.dispatcher.dispatch(result.records);
      }
      return { ok: true, linesRead };
    } finally {
      for (const monitor of this.monitors) monitor.stop();
    }
  }

  reportStatus(): string {
    return this.classifier.reportStatus();
  }

  getStatus(): ClassifierStatus {
    return this.classifier.getStatus();
  }
}
