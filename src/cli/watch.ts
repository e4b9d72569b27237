import { PingSieve, type PingSieveOptions } from '../index';
import type { ClassifierStatus, PingSieveConfig, SieveSinks, Sink } from '../types';

/** The two process streams `watch` writes to */
export interface WatchStreams {
  stdout: Sink;
  stderr: Sink;
}

export function selectSinks(config: PingSieveConfig, streams: WatchStreams): SieveSinks {
  return {
    primary: streams.stdout,
    heartbeat: config.heartbeatSink === 'stderr' ? streams.stderr : streams.stdout,
    error: streams.stderr,
  };
}

export function formatSummary(status: ClassifierStatus): string {
  return (
    `pingsieve: ${status.linesProcessed} lines, ${status.anomalies} anomalies, ` +
    `${status.sequenceGaps} sequence gaps, ${status.heartbeats} heartbeats, ` +
    `${status.unparseable} unparseable`
  );
}

/**
 * One `watch` run: the sieve, its summary, and the exit code.
 * The summary goes to stderr; stdout carries the data.
 */
export class WatchSession {
  readonly sieve: PingSieve;

  constructor(config: PingSieveConfig, private readonly streams: WatchStreams, options: PingSieveOptions = {}) {
    this.sieve = new PingSieve(config, selectSinks(config, streams), options);
  }

  writeSummary(): void {
    this.streams.stderr.write(formatSummary(this.sieve.getStatus()));
  }

  /** Resolves with the process exit code */
  async run(lines: AsyncIterable<string>): Promise<number> {
    const result = await this.sieve.run(lines);
    this.writeSummary();

    if (result.ok) return 0;
    this.streams.stderr.write(`Error: ${result.error.message}`);
    this.streams.stderr.write(`  at input line ${result.linesRead}: ${result.line}`);
    return 1;
  }
}
