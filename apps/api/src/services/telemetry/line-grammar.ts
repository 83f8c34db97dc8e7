/**
 * Field table for the inline telemetry grammar.
 *
 *   AT+RANGE=tid:4,mask:01,seq:218,range:(100,110,103,0,0,0,0,0),kx:152.75,ky:101.3,cmd:2,user:user1
 *
 * Each field is located independently, so order is free and unknown fields
 * (mask, seq, rssi, ...) are ignored. Adding a field means adding a row here.
 * `tid` and `range` are mandatory; the parser rejects a line without them.
 */

export const NUMBER_TOKEN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

/** Decodes a numeric token; anything unparsable or non-finite is absent. */
export function decodeNumber(token: string): number | null {
  const trimmed = token.trim();
  if (trimmed === '' || trimmed.toLowerCase() === 'nan') return null;
  if (!NUMBER_TOKEN.test(trimmed)) return null;
  const value = Number(trimmed);
  return Number.isFinite(value) ? value : null;
}

export interface FieldSpec<T> {
  readonly label: string;
  /** Pattern for the value that follows `label:`; its first group is decoded. */
  readonly value: string;
  readonly decode: (raw: string) => T;
}

function field<T>(fieldSpec: FieldSpec<T>): FieldSpec<T> {
  return fieldSpec;
}

const FLOAT = '([^,\\s)]*)';

export const TELEMETRY_FIELDS = {
  tagId: field({ label: 'tid', value: '(\\d+)', decode: (raw) => raw }),
  range: field({ label: 'range', value: '\\(([^)]*)\\)', decode: (raw) => raw.split(',') }),
  spanX: field({ label: 'kx', value: FLOAT, decode: decodeNumber }),
  spanY: field({ label: 'ky', value: FLOAT, decode: decodeNumber }),
  command: field({ label: 'cmd', value: '([+-]?\\d+)', decode: (raw) => Number.parseInt(raw, 10) }),
  sessionUser: field({ label: 'user', value: '([A-Za-z0-9_.@-]+)', decode: (raw) => raw }),
} as const;

const patternCache = new Map<string, RegExp>();

function patternFor(fieldSpec: FieldSpec<unknown>): RegExp {
  let pattern = patternCache.get(fieldSpec.label);
  if (!pattern) {
    // The label must start a word: `kx` must not match inside `mkx`.
    pattern = new RegExp(`(?<![A-Za-z0-9_])${fieldSpec.label}\\s*:\\s*${fieldSpec.value}`, 'i');
    patternCache.set(fieldSpec.label, pattern);
  }
  return pattern;
}

/** Raw text of the first occurrence of a field, or undefined when absent. */
export function matchField(line: string, fieldSpec: FieldSpec<unknown>): string | undefined {
  const m = patternFor(fieldSpec).exec(line);
  return m?.[1];
}
