import { warn } from './log.js';
import { repairFile } from './repair.js';
import { findRolloutFiles } from './scan.js';
import { type BatchSummary, type RepairOptions, type RepairOutcome } from './types.js';

export const repairAll = async (root: string, opts: RepairOptions = {}): Promise<BatchSummary> => {
  const files = await findRolloutFiles(root);
  const outcomes: RepairOutcome[] = [];
  // One file at a time; a failure stays with its file.
  for (const f of files) {
    try {
      outcomes.push(await repairFile(f, opts));
    } catch (err) {
      warn(`Failed repairing ${f}`, err);
      outcomes.push({ path: f, status: 'error', error: err instanceof Error ? err.message : String(err) });
    }
  }
  return {
    scanned: files.length,
    repaired: outcomes.filter((o) => o.status === 'repaired').length,
    outcomes,
  };
};
