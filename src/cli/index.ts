#!/usr/bin/env node

import {
  ConfigurationError,
  EventLog,
  StreamSink,
  VERSION,
  assertPipedInput,
  loadConfig,
  readLines,
} from '../index';
import { parseArgs, type CliArgs } from './args';
import { WatchSession } from './watch';

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));

  switch (args.command) {
    case 'watch':
      await watch(args);
      break;
    case 'tail':
      showTail(args);
      break;
    case 'version':
      console.log(`pingsieve v${VERSION}`);
      break;
    case 'help':
      showHelp();
      break;
  }
}

async function watch(args: CliArgs): Promise<void> {
  assertPipedInput(process.stdin);
  const config = loadConfig(args.configPath, args.overrides);

  const session = new WatchSession(config, {
    stdout: new StreamSink(process.stdout),
    stderr: new StreamSink(process.stderr),
  });

  const shutdown = () => {
    session.writeSummary();
    process.exit(0);
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  process.exitCode = await session.run(readLines(process.stdin));
}

function showTail(args: CliArgs): void {
  const config = loadConfig(args.configPath, args.overrides);
  if (!config.dataDir) {
    throw new ConfigurationError('No event log configured. Pass --data-dir or set dataDir in the config file.');
  }

  const entries = new EventLog(config.dataDir).tail(args.tailCount);
  if (entries.length === 0) {
    console.log('\n  No events recorded yet.\n');
    return;
  }

  console.log(`\n  Last ${entries.length} events:\n`);
  for (const entry of entries) {
    console.log(`  ${entry.timestamp}  ${entry.kind.padEnd(11)}  ${entry.text}`);
  }
  console.log();
}

function showHelp(): void {
  console.log(`
  pingsieve v${VERSION} — forward only the interesting lines of "ping -D"

  USAGE
    ping -D <host> | pingsieve [watch] [options]
    pingsieve tail [N] [--data-dir <path>]

  OPTIONS
    -t, --max-time-ms <T>        Round-trip times above T ms are reported (default: 500)
    --fmt <pattern>              strftime pattern for timestamps (default: "%Y-%m-%d %H:%M:%S");
                                 %f prints the microseconds of the input timestamp
    --heartbeat-interval <H>     Write a heartbeat after H seconds without output (default: 0, off)
    --allowed-seq-diff <N>       Report icmp_seq steps larger than N (default: 1)
    --heartbeat-to <stream>      stdout or stderr (default: stdout)
    --data-dir <path>            Append every reported line to <path>/events.jsonl
    --config <path>              Config file (YAML or JSON); pingsieve.yaml is found automatically

  STATUS
    kill -USR1 <pid>             Print the last line seen to stderr

  EXAMPLES
    ping -D 8.8.8.8 | pingsieve
    ping -D 8.8.8.8 | tee -a raw.log | pingsieve -t 200 --heartbeat-interval 3600
    pingsieve tail 50 --data-dir ./pingsieve-data
`);
}

main().catch((err) => {
  console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
