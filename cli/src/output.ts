import chalk from 'chalk';

/**
 * Where commands report to the user. Results go to stdout, problems to
 * stderr.
 */
export interface Output {
  log(message?: string): void;
  write(text: string): void;
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export function createConsoleOutput(): Output {
  return {
    log: (message = '') => console.log(message),
    write: (text) => {
      process.stdout.write(text);
    },
    info: (message) => console.log(chalk.cyan(message)),
    success: (message) => console.log(chalk.green(`✓ ${message}`)),
    warn: (message) => console.error(chalk.yellow(message)),
    error: (message) => console.error(chalk.red(message)),
  };
}

/** Left-aligned two-column rows, the first column padded to its widest cell. */
export function columns(rows: Array<[string, string]>, gap = 2): string[] {
  const width = Math.max(0, ...rows.map(([left]) => left.length));
  return rows.map(([left, right]) => `${left.padEnd(width + gap)}${right}`.trimEnd());
}
