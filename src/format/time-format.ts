import { format } from 'date-fns';
import { ConfigurationError } from '../errors';

export const DEFAULT_TIME_FORMAT = '%Y-%m-%d %H:%M:%S';

/** Formats a probe timestamp (seconds since epoch) in local time */
export type TimeFormatter = (timestampSeconds: number) => string;

/** strftime directive → date-fns format tokens */
const DIRECTIVES: Record<string, string> = {
  Y: 'yyyy',
  y: 'yy',
  m: 'MM',
  d: 'dd',
  H: 'HH',
  I: 'hh',
  M: 'mm',
  S: 'ss',
  p: 'a',
  j: 'DDD',
  a: 'EEE',
  A: 'EEEE',
  b: 'MMM',
  h: 'MMM',
  B: 'MMMM',
  z: 'xx',
  Z: 'zzz',
  s: 't',
  u: 'i',
  F: 'yyyy-MM-dd',
  T: 'HH:mm:ss',
  D: 'MM/dd/yy',
  R: 'HH:mm',
};

/** Directives that expand to literal characters */
const LITERALS: Record<string, string> = {
  '%': '%',
  n: '\n',
  t: '\t',
};

function quote(literal: string): string {
  return `'${literal.replace(/'/g, "''")}'`;
}

/** Microseconds, zero-padded to six digits, taken from the timestamp's own fraction */
function microseconds(timestampSeconds: number): string {
  const micros = Math.min(999999, Math.round((timestampSeconds - Math.floor(timestampSeconds)) * 1e6));
  return String(micros).padStart(6, '0');
}

/**
 * Translate a strftime pattern into date-fns patterns, one for each run of
 * text between `%f` directives. `Date` keeps only milliseconds, so `%f` is
 * filled in separately. Literal text is quoted so date-fns never reads it as
 * tokens.
 */
export function toDateFnsPatterns(pattern: string): string[] {
  const segments: string[] = [];
  let out = '';
  let literal = '';

  for (let i = 0; i < pattern.length; i++) {
    const ch = pattern[i];
    if (ch !== '%') {
      literal += ch;
      continue;
    }

    const directive = pattern[i + 1];
    if (directive === undefined) {
      throw new ConfigurationError(`Time format "${pattern}" ends with a lone '%'`);
    }
    i++;

    const lit = LITERALS[directive];
    if (lit !== undefined) {
      literal += lit;
      continue;
    }

    if (directive === 'f') {
      if (literal) out += quote(literal);
      segments.push(out);
      out = '';
      literal = '';
      continue;
    }

    const tokens = DIRECTIVES[directive];
    if (tokens === undefined) {
      throw new ConfigurationError(`Unsupported time format directive "%${directive}" in "${pattern}"`);
    }

    if (literal) {
      out += quote(literal);
      literal = '';
    }
    out += tokens;
  }

  if (literal) out += quote(literal);
  segments.push(out);
  return segments;
}

/** Compile once at startup; unknown directives fail here, not per line. */
export function compileTimeFormat(pattern: string = DEFAULT_TIME_FORMAT): TimeFormatter {
  const segments = toDateFnsPatterns(pattern);
  return (timestampSeconds) => {
    const date = new Date(timestampSeconds * 1000);
    return segments
      .map((segment) => (segment ? format(date, segment, { useAdditionalDayOfYearTokens: true }) : ''))
      .join(microseconds(timestampSeconds));
  };
}
