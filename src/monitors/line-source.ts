import * as readline from 'readline';
import { TerminalInputError } from '../errors';

/** Refuse interactive input: pingsieve expects `ping -D` piped in. */
export function assertPipedInput(stream: { isTTY?: boolean }): void {
  if (stream.isTTY) {
    throw new TerminalInputError();
  }
}

/** Lines of a readable stream, in order, until it closes */
export function readLines(stream: NodeJS.ReadableStream): AsyncIterable<string> {
  return readline.createInterface({ input: stream, crlfDelay: Infinity, terminal: false });
}
