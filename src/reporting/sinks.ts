import type { OutputChannel, OutputRecord, SieveSinks, Sink } from '../types';
import type { EventLog } from './event-log';

/** Writes each line to a Node writable stream, newline-terminated */
export class StreamSink implements Sink {
  private readonly stream: NodeJS.WritableStream;

  constructor(stream: NodeJS.WritableStream) {
    this.stream = stream;
  }

  write(line: string): void {
    this.stream.write(line + '\n');
  }
}

/**
 * Routes classifier output to the sinks of each record's channels,
 * and to the event log when one is configured.
 */
export class Dispatcher {
  private readonly sinks: Record<OutputChannel, Sink>;
  private readonly eventLog?: EventLog;

  constructor(sinks: SieveSinks, eventLog?: EventLog) {
    this.sinks = sinks;
    this.eventLog = eventLog;
  }

  dispatch(records: OutputRecord[]): void {
    for (const record of records) {
      for (const channel of record.channels) {
        this.sinks[channel].write(record.text);
      }
      this.eventLog?.append(record);
    }
  }
}
