import chalk from 'chalk';
import stringWidth from 'string-width';
import { type BatchSummary, type RepairOutcome, type RepairStatus } from './types.js';

const STATUS_LABEL: Record<RepairStatus, string> = {
  'no-identity': 'no identity',
  'no-timestamp': 'no timestamp',
  'no-candidate': 'no backup',
  'no-matching-records': 'no matches',
  repaired: 'repaired',
  error: 'error',
};

const STATUS_W = Math.max(...Object.values(STATUS_LABEL).map((s) => stringWidth(s)));

export const padEndWidth = (s: string, width: number): string =>
  s + ' '.repeat(Math.max(0, width - stringWidth(s)));

// Longest run of whole characters, in iteration order, that fits in `width` columns.
const fitChars = (chars: readonly string[], width: number): string[] => {
  const kept: string[] = [];
  let used = 0;
  for (const ch of chars) {
    used += stringWidth(ch);
    if (used > width) break;
    kept.push(ch);
  }
  return kept;
};

// Keeps both ends of a path visible: the day directory and the file name.
export const truncateMiddleToWidth = (text: string, width: number): string => {
  if (stringWidth(text) <= width) return text;
  const ell = '…';
  const room = Math.max(1, width - stringWidth(ell));
  const chars = Array.from(text);
  const head = fitChars(chars, Math.floor(room / 2)).join('');
  const tail = fitChars([...chars].reverse(), Math.ceil(room / 2)).reverse().join('');
  return head + ell + tail;
};

const colorStatus = (status: RepairStatus, label: string): string => {
  if (status === 'repaired') return chalk.green(label);
  if (status === 'error') return chalk.red(label);
  return chalk.dim(label);
};

export const formatOutcomes = (outcomes: readonly RepairOutcome[], termWidth: number): string => {
  const sep = '  ';
  const pathMinW = 10;
  const pathW = Math.max(pathMinW, termWidth - STATUS_W - sep.length);
  return outcomes
    .map((o) => {
      const status = colorStatus(o.status, padEndWidth(STATUS_LABEL[o.status], STATUS_W));
      const extra = o.status === 'repaired' ? ` (+${o.recovered ?? 0})` : '';
      const pathStr = truncateMiddleToWidth(o.path, pathW - stringWidth(extra)) + extra;
      return `${status}${sep}${pathStr}\n`;
    })
    .join('');
};

export const formatSummary = (summary: BatchSummary, dryRun: boolean): string =>
  `Scanned ${summary.scanned} jsonl files; repaired ${summary.repaired}${dryRun ? ' (dry run)' : ''}\n`;
