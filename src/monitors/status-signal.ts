import type { Monitor, MonitorType, Sink, StatusReporter } from '../types';

/** Subset of `process` the monitor needs; an EventEmitter works in tests */
export interface SignalSource {
  on(event: NodeJS.Signals, listener: () => void): unknown;
  off(event: NodeJS.Signals, listener: () => void): unknown;
}

/**
 * Status monitor — writes the reporter's status line whenever the
 * signal arrives (SIGUSR1 by default: `kill -USR1 <pid>`).
 *
 * Signal handlers run between stream callbacks, so a report always sees
 * the state between two lines, never mid-line.
 */
export class StatusSignalMonitor implements Monitor {
  readonly type: MonitorType = 'status-signal';
  private readonly reporter: StatusReporter;
  private readonly sink: Sink;
  private readonly source: SignalSource;
  private readonly signal: NodeJS.Signals;
  private listener?: () => void;

  constructor(
    reporter: StatusReporter,
    sink: Sink,
    source: SignalSource = process,
    signal: NodeJS.Signals = 'SIGUSR1',
  ) {
    this.reporter = reporter;
    this.sink = sink;
    this.source = source;
    this.signal = signal;
  }

  start(): void {
    if (this.listener) return;
    this.listener = () => this.sink.write(this.reporter.reportStatus());
    this.source.on(this.signal, this.listener);
  }

  stop(): void {
    if (this.listener) {
      this.source.off(this.signal, this.listener);
      this.listener = undefined;
    }
  }

  isRunning(): boolean {
    return this.listener !== undefined;
  }
}
