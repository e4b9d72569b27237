import type { HeartbeatTarget } from '../types';
import type { ConfigOverrides } from '../config/loader';
import { ConfigurationError } from '../errors';

export type CliCommand = 'watch' | 'tail' | 'help' | 'version';

export interface CliArgs {
  command: CliCommand;
  configPath?: string;
  overrides: ConfigOverrides;
  /** Entries to show for `tail` */
  tailCount: number;
}

const DEFAULT_TAIL_COUNT = 20;

/** Flags that take a value, by every spelling they accept */
const VALUE_FLAGS: Record<string, keyof ConfigOverrides | 'config'> = {
  '--max-time-ms': 'maxRoundTripMs',
  '-t': 'maxRoundTripMs',
  '--fmt': 'timeFormat',
  '--heartbeat-interval': 'heartbeatIntervalSeconds',
  '--allowed-seq-diff': 'allowedSequenceGap',
  '--heartbeat-to': 'heartbeatSink',
  '--data-dir': 'dataDir',
  '--config': 'config',
};

/**
 * Parse argv (without node and the script path).
 * Accepts `--flag value` and `--flag=value`.
 */
export function parseArgs(argv: string[]): CliArgs {
  const result: CliArgs = { command: 'watch', overrides: {}, tailCount: DEFAULT_TAIL_COUNT };
  const positionals: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === '--help' || arg === '-h') return { ...result, command: 'help' };
    if (arg === '--version' || arg === '-v') return { ...result, command: 'version' };

    if (!arg.startsWith('-')) {
      positionals.push(arg);
      continue;
    }

    const eq = arg.indexOf('=');
    const flag = eq === -1 ? arg : arg.slice(0, eq);
    const key = VALUE_FLAGS[flag];
    if (key === undefined) {
      throw new ConfigurationError(`Unknown option: ${flag}`);
    }

    let value: string;
    if (eq !== -1) {
      value = arg.slice(eq + 1);
    } else {
      const next = argv[i + 1];
      if (next === undefined) throw new ConfigurationError(`Option ${flag} needs a value`);
      value = next;
      i++;
    }

    applyFlag(result, flag, key, value);
  }

  const [command, count] = positionals;
  if (command === 'tail') {
    result.command = 'tail';
    if (count !== undefined) result.tailCount = parseNumber('tail', count);
  } else if (command === 'watch') {
    result.command = 'watch';
  } else if (command !== undefined) {
    throw new ConfigurationError(`Unknown command: ${command}`);
  }

  return result;
}

function applyFlag(result: CliArgs, flag: string, key: keyof ConfigOverrides | 'config', value: string): void {
  switch (key) {
    case 'config':
      result.configPath = value;
      break;
    case 'timeFormat':
    case 'dataDir':
      result.overrides[key] = value;
      break;
    case 'heartbeatSink':
      result.overrides.heartbeatSink = parseTarget(flag, value);
      break;
    case 'maxRoundTripMs':
    case 'heartbeatIntervalSeconds':
    case 'allowedSequenceGap':
      result.overrides[key] = parseNumber(flag, value);
      break;
  }
}

function parseNumber(flag: string, value: string): number {
  const n = Number(value);
  if (value.trim() === '' || !Number.isFinite(n)) {
    throw new ConfigurationError(`${flag} expects a number, got "${value}"`);
  }
  return n;
}

function parseTarget(flag: string, value: string): HeartbeatTarget {
  if (value === 'stdout' || value === 'stderr') return value;
  throw new ConfigurationError(`${flag} expects "stdout" or "stderr", got "${value}"`);
}
