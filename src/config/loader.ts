import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'js-yaml';
import { z } from 'zod';
import type { PingSieveConfig } from '../types';
import { ConfigurationError } from '../errors';
import { DEFAULT_TIME_FORMAT, toDateFnsPatterns } from '../format/time-format';
import { MAX_ALLOWED_SEQUENCE_GAP } from '../engine/classifier';

const CONFIG_CANDIDATES = [
  'pingsieve.yaml', 'pingsieve.yml', 'pingsieve.json',
  '.pingsieve/config.yaml', '.pingsieve/config.yml', '.pingsieve/config.json',
];

const ConfigSchema = z.object({
  maxRoundTripMs: z.number().positive(),
  timeFormat: z.string().superRefine((pattern, ctx) => {
    try {
      toDateFnsPatterns(pattern);
    } catch (err) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: err instanceof Error ? err.message : String(err) });
    }
  }),
  heartbeatIntervalSeconds: z.number().nonnegative(),
  allowedSequenceGap: z.number().int().nonnegative().max(MAX_ALLOWED_SEQUENCE_GAP),
  heartbeatSink: z.enum(['stdout', 'stderr']),
  dataDir: z.string().min(1).optional(),
}).strict();

export type ConfigOverrides = Partial<PingSieveConfig>;

/**
 * Load config: defaults ← config file ← overrides (CLI flags).
 * Without an explicit path, the working directory is searched for a config file.
 */
export function loadConfig(configPath?: string, overrides: ConfigOverrides = {}, cwd: string = process.cwd()): PingSieveConfig {
  const filePath = configPath ? path.resolve(cwd, configPath) : discoverConfig(cwd);
  const fromFile = filePath ? readConfigFile(filePath) : {};

  return validateConfig({ ...defaultConfig(), ...fromFile, ...dropUndefined(overrides) });
}

export function defaultConfig(): PingSieveConfig {
  return {
    maxRoundTripMs: 500,
    timeFormat: DEFAULT_TIME_FORMAT,
    heartbeatIntervalSeconds: 0,
    allowedSequenceGap: 1,
    heartbeatSink: 'stdout',
  };
}

export function validateConfig(raw: unknown): PingSieveConfig {
  const result = ConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid configuration: ${issues}`);
  }
  return result.data;
}

function discoverConfig(cwd: string): string | undefined {
  for (const candidate of CONFIG_CANDIDATES) {
    const fullPath = path.resolve(cwd, candidate);
    if (fs.existsSync(fullPath)) {
      return fullPath;
    }
  }
  return undefined;
}

function readConfigFile(filePath: string): Record<string, unknown> {
  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (err) {
    throw new ConfigurationError(`Cannot read config ${filePath}: ${err instanceof Error ? err.message : String(err)}`);
  }

  let parsed: unknown;
  try {
    parsed = path.extname(filePath).toLowerCase() === '.json' ? JSON.parse(content) : yaml.load(content);
  } catch (err) {
    throw new ConfigurationError(`Failed to parse config ${filePath}: ${err instanceof Error ? err.message : String(err)}`);
  }

  // An empty YAML file loads as undefined
  if (parsed === undefined || parsed === null) return {};
  if (typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new ConfigurationError(`Config ${filePath} must be a mapping of option names to values`);
  }
  return Object.fromEntries(Object.entries(parsed));
}

function dropUndefined(overrides: ConfigOverrides): Record<string, unknown> {
  return Object.fromEntries(Object.entries(overrides).filter(([, v]) => v !== undefined));
}
