import fs from 'node:fs/promises';
import path from 'node:path';

export const ROLLOUT_PREFIX = 'rollout-';
export const BACKUP_SUFFIX = '.mixed.bak';
const TIMESTAMP_LENGTH = 19; // YYYY-MM-DDThh-mm-ss

export const isRolloutFile = (name: string): boolean =>
  name.startsWith(ROLLOUT_PREFIX) && name.endsWith('.jsonl') && !name.endsWith(BACKUP_SUFFIX);

export async function findRolloutFiles(root: string): Promise<string[]> {
  const results: string[] = [];

  async function walk(dir: string) {
    let entries;
    try {
      entries = await fs.readdir(dir, { withFileTypes: true });
    } catch {
      return;
    }
    for (const ent of entries) {
      const p = path.join(dir, ent.name);
      if (ent.isDirectory()) {
        await walk(p);
      } else if (ent.isFile()) {
        if (isRolloutFile(ent.name)) {
          results.push(p);
        }
      }
    }
  }

  await walk(root);
  return results.sort();
}

export const timestampPrefix = (file: string): string | undefined => {
  const name = path.basename(file);
  if (!name.startsWith(ROLLOUT_PREFIX)) return undefined;
  const core = name.slice(ROLLOUT_PREFIX.length);
  return core.length >= TIMESTAMP_LENGTH ? core.slice(0, TIMESTAMP_LENGTH) : undefined;
};

/** Sibling backups named `rollout-<ts>-*.mixed.bak`, sorted by name. */
export async function findBackupCandidates(dir: string, ts: string): Promise<string[]> {
  const head = `${ROLLOUT_PREFIX}${ts}-`;
  let entries;
  try {
    entries = await fs.readdir(dir, { withFileTypes: true });
  } catch {
    return [];
  }
  return entries
    .filter(
      (ent) =>
        ent.isFile() &&
        ent.name.length >= head.length + BACKUP_SUFFIX.length &&
        ent.name.startsWith(head) &&
        ent.name.endsWith(BACKUP_SUFFIX),
    )
    .map((ent) => ent.name)
    .sort()
    .map((name) => path.join(dir, name));
}

// Longest file name wins; Array#sort is stable so ties keep name order.
export const pickBackup = (candidates: readonly string[]): string | undefined =>
  [...candidates].sort((a, b) => path.basename(b).length - path.basename(a).length)[0];
