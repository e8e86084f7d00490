import fs from 'node:fs/promises';
import path from 'node:path';
import { collectContextRecords } from './filter.js';
import { rehydrateLine, mergeRecords, serializeRecords } from './merge.js';
import { normalizeCwd } from './normalize.js';
import { extractIdentity, readExistingLines } from './parse.js';
import { findBackupCandidates, pickBackup, timestampPrefix } from './scan.js';
import { type RepairOptions, type RepairOutcome } from './types.js';

/**
 * Restores the records of one rollout file from its sibling `.mixed.bak`.
 * Stops at the first missing piece and reports which one it was.
 */
export const repairFile = async (file: string, opts: RepairOptions = {}): Promise<RepairOutcome> => {
  const { cwd, id } = await extractIdentity(file);
  if (!cwd || !id) return { path: file, status: 'no-identity' };

  const ts = timestampPrefix(file);
  if (!ts) return { path: file, status: 'no-timestamp' };

  const backup = pickBackup(await findBackupCandidates(path.dirname(file), ts));
  if (!backup) return { path: file, status: 'no-candidate' };

  const source = await collectContextRecords(backup, normalizeCwd(cwd));
  if (source.length === 0) return { path: file, status: 'no-matching-records', backup };

  const rehydrated = source.map((line) => rehydrateLine(line, cwd, id));
  const existing = await readExistingLines(file);
  const merged = mergeRecords(rehydrated, existing);

  if (!opts.dryRun) {
    await fs.writeFile(file, serializeRecords(merged), 'utf8');
  }
  return {
    path: file,
    status: 'repaired',
    backup,
    recovered: rehydrated.length,
    lines: merged.length,
    written: !opts.dryRun,
  };
};
