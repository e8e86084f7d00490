import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { Command } from 'commander';
import chalk from 'chalk';
import { repairAll } from './batch.js';
import { formatOutcomes, formatSummary } from './format.js';
import { error, isNotFound } from './log.js';

type CliOptions = {
  dir?: string;
  root?: string; // alias of --dir
  dryRun?: boolean;
  verbose?: boolean;
  json?: boolean;
  color?: boolean; // false under --no-color
};

export const defaultSessionsDir = (env: NodeJS.ProcessEnv = process.env): string => {
  const home = env.CODEX_HOME ? path.resolve(env.CODEX_HOME) : path.join(os.homedir(), '.codex');
  return path.join(home, 'sessions');
};

export const resolveDir = (d?: string, env: NodeJS.ProcessEnv = process.env): string => {
  if (!d) return defaultSessionsDir(env);
  if (d.startsWith('~')) return path.join(os.homedir(), d.slice(1));
  return path.resolve(d);
};

const isDirectory = async (p: string): Promise<boolean> => {
  try {
    return (await fs.stat(p)).isDirectory();
  } catch (err) {
    if (isNotFound(err)) return false;
    throw err;
  }
};

/** Parses `argv` (node, script, ...args), repairs the tree and returns the exit code. */
export const runCli = async (argv: readonly string[]): Promise<number> => {
  const program = new Command();
  program
    .name('codex-rollout-repair')
    .description('Recover rollout session entries from their .mixed.bak backups')
    .option('-d, --dir <path>', 'sessions root (default: $CODEX_HOME/sessions or ~/.codex/sessions)')
    .option('--root <path>', 'alias of --dir')
    .option('--dry-run', 'do not write files')
    .option('--verbose', 'print the outcome for every file')
    .option('--json', 'output JSON')
    .option('--no-color', 'disable colored output');

  program.parse([...argv]);
  const opts = program.opts<CliOptions>();
  if (opts.color === false) {
    chalk.level = 0;
  }

  const dir = resolveDir(opts.dir ?? opts.root);
  if (!(await isDirectory(dir))) {
    error(`Root ${dir} does not exist`);
    return 1;
  }

  const dryRun = Boolean(opts.dryRun);
  const summary = await repairAll(dir, { dryRun });

  if (opts.json) {
    const files = summary.outcomes;
    process.stdout.write(
      JSON.stringify({ root: dir, dryRun, scanned: summary.scanned, repaired: summary.repaired, files }, null, 2) + '\n',
    );
    return 0;
  }

  if (opts.verbose) {
    process.stdout.write(formatOutcomes(summary.outcomes, process.stdout.columns || 120));
  }
  process.stdout.write(formatSummary(summary, dryRun));
  return 0;
};
