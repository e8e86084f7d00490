import chalk from 'chalk';

const errorMessage = (err: unknown): string => (err instanceof Error ? err.message : String(err));

export const warn = (message: string, err?: unknown): void => {
  const detail = err === undefined ? '' : `: ${errorMessage(err)}`;
  process.stderr.write(`${chalk.yellow('[warn]')} ${message}${detail}\n`);
};

export const error = (message: string): void => {
  process.stderr.write(`${chalk.red('[error]')} ${message}\n`);
};

export const isNotFound = (err: unknown): boolean =>
  err instanceof Error && 'code' in err && err.code === 'ENOENT';
