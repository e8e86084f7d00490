import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import chalk from 'chalk';
import { afterEach, beforeAll, describe, expect, it, vi } from 'vitest';
import { collectContextRecords, contextOf, filterByContext } from './filter.js';
import { type LogRecord, type ParsedLine } from './types.js';

const lineOf = (value: LogRecord): ParsedLine<LogRecord> => ({ value, raw: JSON.stringify(value) });
const meta = (cwd: string, id = 'OLD'): ParsedLine<LogRecord> =>
  lineOf({ type: 'session_meta', payload: { meta: { id, cwd } } });
const turn = (cwd: string): ParsedLine<LogRecord> => lineOf({ type: 'turn_context', payload: { cwd } });
const item = (n: number): ParsedLine<LogRecord> => lineOf({ type: 'response_item', payload: { n } });

beforeAll(() => {
  chalk.level = 0;
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('contextOf', () => {
  it('reads the cwd of context-bearing records only', () => {
    expect(contextOf(meta('/a').value)).toBe('/a');
    expect(contextOf(turn('/b').value)).toBe('/b');
    expect(contextOf({ type: 'response_item', payload: { cwd: '/c' } })).toBeUndefined();
    expect(contextOf(turn('').value)).toBeUndefined();
    expect(contextOf({ type: 'turn_context', payload: { cwd: 3 } })).toBeUndefined();
    expect(contextOf({ type: 'session_meta', payload: 'x' })).toBeUndefined();
  });
});

describe('filterByContext', () => {
  it('keeps blocks whose active context matches, switch records included', () => {
    const m = meta('/Work/Proj/');
    const d1 = item(1);
    const t1 = turn('/other');
    const d2 = item(2);
    const t2 = turn('\\work\\proj');
    const d3 = item(3);
    expect(filterByContext([m, d1, t1, d2, t2, d3], '/work/proj')).toEqual([m, d1, t2, d3]);
  });

  it('drops records seen before any context', () => {
    const m = meta('/work/proj');
    expect(filterByContext([item(1), m, item(2)], '/work/proj')).toEqual([m, item(2)]);
  });

  it('returns nothing when the context never matches', () => {
    expect(filterByContext([meta('/a'), item(1), turn('/b'), item(2)], '/work/proj')).toEqual([]);
  });

  it('lets a record with an empty cwd inherit the active context', () => {
    const m = meta('/work/proj');
    const t = turn('');
    expect(filterByContext([m, t, item(1)], '/work/proj')).toEqual([m, t, item(1)]);
  });

  it('never matches the empty context of a bare root', () => {
    expect(filterByContext([turn('/'), item(1)], '')).toEqual([]);
  });
});

describe('collectContextRecords', () => {
  it('yields an empty list for a missing backup', async () => {
    const missing = path.join(os.tmpdir(), `rollout-none-${process.pid}.mixed.bak`);
    expect(await collectContextRecords(missing, '/work/proj')).toEqual([]);
  });

  it('reports a backup it cannot read and yields nothing', async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'rollout-filter-'));
    const stderr: string[] = [];
    vi.spyOn(process.stderr, 'write').mockImplementation((chunk) => {
      stderr.push(String(chunk));
      return true;
    });
    try {
      expect(await collectContextRecords(dir, '/x')).toEqual([]);
      expect(stderr).toHaveLength(1);
      expect(stderr[0]?.startsWith(`[warn] Failed reading backup ${dir}: EISDIR`)).toBe(true);
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });
});
