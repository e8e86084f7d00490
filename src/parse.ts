import fs from 'node:fs/promises';
import readline from 'node:readline';
import { isNotFound, warn } from './log.js';
import { type JsonObject, type JsonValue, type LogRecord, type ParsedLine, type SessionIdentity } from './types.js';

export const isJsonObject = (value: JsonValue | undefined): value is JsonObject =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export const parseLine = (line: string): JsonValue | undefined => {
  if (!line.trim()) return undefined;
  try {
    return JSON.parse(line);
  } catch {
    return undefined;
  }
};

export const parseRecord = (line: string): LogRecord | undefined => {
  const value = parseLine(line);
  return isJsonObject(value) ? value : undefined;
};

/**
 * Streams a file line by line. The stream is torn down when the consumer
 * finishes or breaks out early, so callers may stop reading at any point.
 */
export async function* readLines(file: string): AsyncGenerator<string> {
  const handle = await fs.open(file, 'r');
  const stream = handle.createReadStream({ encoding: 'utf8' });
  const rl = readline.createInterface({ input: stream, crlfDelay: Infinity });
  try {
    for await (const line of rl) {
      yield line;
    }
  } finally {
    rl.close();
    stream.destroy();
  }
}

export const readRecords = async (file: string): Promise<ParsedLine<LogRecord>[]> => {
  const out: ParsedLine<LogRecord>[] = [];
  for await (const line of readLines(file)) {
    const value = parseRecord(line);
    if (value) out.push({ value, raw: line.trim() });
  }
  return out;
};

// Everything parseable in the target, non-object documents included.
export const readExistingLines = async (file: string): Promise<ParsedLine[]> => {
  const out: ParsedLine[] = [];
  for await (const line of readLines(file)) {
    const value = parseLine(line);
    if (value !== undefined) out.push({ value, raw: line.trim() });
  }
  return out;
};

export const metaOf = (record: LogRecord): JsonObject | undefined => {
  const payload = record.payload;
  if (!isJsonObject(payload)) return undefined;
  const meta = payload.meta;
  return isJsonObject(meta) ? meta : undefined;
};

const stringField = (obj: JsonObject | undefined, key: string): string | undefined => {
  const v = obj?.[key];
  return typeof v === 'string' ? v : undefined;
};

/** cwd and id from the first session_meta record; `{}` when there is none. */
export const extractIdentity = async (file: string): Promise<SessionIdentity> => {
  try {
    for await (const line of readLines(file)) {
      const rec = parseRecord(line);
      if (rec?.type !== 'session_meta') continue;
      const meta = metaOf(rec);
      return { cwd: stringField(meta, 'cwd'), id: stringField(meta, 'id') };
    }
  } catch (err) {
    if (!isNotFound(err)) warn(`Failed reading meta from ${file}`, err);
  }
  return {};
};

export const turnContextCwd = (record: LogRecord): string | undefined => {
  const payload = record.payload;
  return isJsonObject(payload) ? stringField(payload, 'cwd') : undefined;
};

export const sessionMetaCwd = (record: LogRecord): string | undefined => stringField(metaOf(record), 'cwd');
