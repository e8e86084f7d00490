import { normalizeCwd } from './normalize.js';
import { readRecords, sessionMetaCwd, turnContextCwd } from './parse.js';
import { isNotFound, warn } from './log.js';
import { type LogRecord, type ParsedLine } from './types.js';

/** The cwd a session_meta or turn_context record declares, if any. */
export const contextOf = (record: LogRecord): string | undefined => {
  let cwd: string | undefined;
  if (record.type === 'session_meta') cwd = sessionMetaCwd(record);
  else if (record.type === 'turn_context') cwd = turnContextCwd(record);
  return cwd ? cwd : undefined;
};

type ScanState = {
  active?: string; // normalized cwd in effect
  kept: ParsedLine<LogRecord>[];
};

const step = (target: string) => (state: ScanState, line: ParsedLine<LogRecord>): ScanState => {
  const cwd = contextOf(line.value);
  const active = cwd !== undefined ? normalizeCwd(cwd) : state.active;
  if (active && active === target) state.kept.push(line);
  return { active, kept: state.kept };
};

/**
 * Keeps the records whose active context equals `target` (already normalized).
 * Records without a cwd of their own inherit the last one seen.
 */
export const filterByContext = (
  lines: Iterable<ParsedLine<LogRecord>>,
  target: string,
): ParsedLine<LogRecord>[] => {
  let state: ScanState = { kept: [] };
  const fold = step(target);
  for (const line of lines) state = fold(state, line);
  return state.kept;
};

export const collectContextRecords = async (file: string, target: string): Promise<ParsedLine<LogRecord>[]> => {
  let records: ParsedLine<LogRecord>[];
  try {
    records = await readRecords(file);
  } catch (err) {
    if (!isNotFound(err)) warn(`Failed reading backup ${file}`, err);
    return [];
  }
  return filterByContext(records, target);
};
