import type { ProbeRecord } from '../types';

/** Tokens in a success line of `ping -D`: [ts] 64 bytes from ip: icmp_seq= ttl= time= ms */
export const CANONICAL_TOKEN_COUNT = 9;
/** Tokens in the same line when ping was run without -D */
export const UNTIMESTAMPED_TOKEN_COUNT = 8;

const SEQUENCE_PREFIX = 'icmp_seq=';
const TIME_PREFIX = 'time=';
const MAX_SEQUENCE = 65535;

const TIMESTAMP_TOKEN = /^\[([^\]]*)\]:?$/;
const FLOAT = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const UINT = /^\d+$/;

export type ParsedLine =
  | { kind: 'blank' }
  | { kind: 'untimestamped'; rawText: string }
  | { kind: 'header'; rawText: string }
  | { kind: 'unparseable'; rawText: string }
  | { kind: 'probe'; record: ProbeRecord };

/** Strict float parse: the whole string must be a decimal number */
export function parseFloatStrict(value: string): number | undefined {
  if (!FLOAT.test(value)) return undefined;
  const n = Number(value);
  return Number.isFinite(n) ? n : undefined;
}

/** Parse "[1597166438.798339]" (or with a trailing colon) into seconds */
export function parseTimestampToken(token: string): number | undefined {
  const match = TIMESTAMP_TOKEN.exec(token);
  if (!match) return undefined;
  return parseFloatStrict(match[1]);
}

function parseSequence(tokens: string[]): number | undefined {
  const token = tokens.find((t) => t.startsWith(SEQUENCE_PREFIX));
  if (!token) return undefined;
  const value = token.slice(SEQUENCE_PREFIX.length);
  if (!UINT.test(value)) return undefined;
  const seq = parseInt(value, 10);
  return seq <= MAX_SEQUENCE ? seq : undefined;
}

function parseRoundTrip(tokens: string[]): number | undefined {
  const token = tokens.find((t) => t.startsWith(TIME_PREFIX));
  if (!token) return undefined;
  return parseFloatStrict(token.slice(TIME_PREFIX.length));
}

/**
 * Split one line of `ping -D` output into its fields.
 *
 * Typical input:
 *   PING 8.8.8.8 (8.8.8.8) 56(84) bytes of data.
 *   [1597166438.798339] 64 bytes from 8.8.8.8: icmp_seq=1 ttl=118 time=14.2 ms
 *   [1597245144.447473] 64 bytes from 8.8.8.8: icmp_seq=877 ttl=118 time=244 ms (DUP!)
 *   [1597411489.934841] From 10.0.0.1 icmp_seq=14 Packet filtered
 */
export function parseProbeLine(line: string): ParsedLine {
  const rawText = line.replace(/[\r\n]+$/, '');
  if (rawText.trim().length === 0) return { kind: 'blank' };

  const tokens = rawText.split(' ');
  const first = tokens[0];

  // A bracketed 8-token line is a timestamped reply ("Time to live exceeded"), not ping without -D
  if (tokens.length === UNTIMESTAMPED_TOKEN_COUNT && !first.startsWith('[')) {
    return { kind: 'untimestamped', rawText };
  }

  if (first === 'PING') return { kind: 'header', rawText };

  const timestamp = parseTimestampToken(first);
  if (timestamp === undefined) return { kind: 'unparseable', rawText };

  return {
    kind: 'probe',
    record: {
      timestamp,
      sequenceNumber: parseSequence(tokens),
      roundTripMs: parseRoundTrip(tokens),
      hasSuffix: tokens.length > CANONICAL_TOKEN_COUNT,
      rawText,
    },
  };
}
