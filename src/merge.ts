import { isJsonObject, metaOf } from './parse.js';
import { type JsonObject, type JsonValue, type LogRecord, type ParsedLine } from './types.js';

/**
 * Relabels a record with the target session's identity. Only the identity
 * path is copied; every other field is shared with the input.
 */
export const rehydrate = (record: LogRecord, cwd: string, id: string): LogRecord => {
  const payload: JsonObject = isJsonObject(record.payload) ? record.payload : {};
  if (record.type === 'session_meta') {
    const meta = metaOf(record) ?? {};
    return { ...record, payload: { ...payload, meta: { ...meta, cwd, id } } };
  }
  if (record.type === 'turn_context') {
    return { ...record, payload: { ...payload, cwd } };
  }
  return record;
};

// JSON text with object keys sorted at every depth.
export const canonicalKey = (value: JsonValue): string => {
  if (Array.isArray(value)) return `[${value.map(canonicalKey).join(',')}]`;
  if (isJsonObject(value)) {
    const keys = Object.keys(value).sort();
    return `{${keys.map((k) => `${JSON.stringify(k)}:${canonicalKey(value[k])}`).join(',')}}`;
  }
  return JSON.stringify(value);
};

// Only a record whose identity actually changed is written out anew; the rest keep their source text.
export const rehydrateLine = (line: ParsedLine<LogRecord>, cwd: string, id: string): ParsedLine<LogRecord> => {
  const value = rehydrate(line.value, cwd, id);
  if (value === line.value || canonicalKey(value) === canonicalKey(line.value)) return line;
  return { value, raw: JSON.stringify(value) };
};

// Lines are equal when their decoded values are; the first one seen is kept.
export const dedupPreserveOrder = <T extends ParsedLine>(lines: Iterable<T>): T[] => {
  const seen = new Set<string>();
  const out: T[] = [];
  for (const line of lines) {
    const key = canonicalKey(line.value);
    if (seen.has(key)) continue;
    seen.add(key);
    out.push(line);
  }
  return out;
};

// Recovered records go first so restored history precedes what the target already holds.
export const mergeRecords = (source: readonly ParsedLine[], existing: readonly ParsedLine[]): ParsedLine[] =>
  dedupPreserveOrder([...source, ...existing]);

export const serializeRecords = (lines: readonly ParsedLine[]): string => lines.map((l) => `${l.raw}\n`).join('');
