import { execFile, spawn } from 'child_process';
import { CommandFailedError, CommandNotFoundError } from './error-handler.js';
import { logger } from './logger.js';

export interface ExecOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  input?: string;
  allowFailure?: boolean;
  timeoutMs?: number;
}

export interface ExecResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

function describe(file: string, args: string[]): string {
  return [file, ...args].join(' ');
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * Run a program without a shell. A missing program rejects with
 * CommandNotFoundError, a non-zero exit with CommandFailedError unless
 * `allowFailure` is set.
 */
export function execAsync(
  file: string,
  args: string[] = [],
  options: ExecOptions = {},
): Promise<ExecResult> {
  logger.debug('exec', { command: describe(file, args) });

  return new Promise((resolve, reject) => {
    const child = execFile(
      file,
      args,
      {
        cwd: options.cwd,
        env: options.env,
        timeout: options.timeoutMs,
        encoding: 'utf8',
        maxBuffer: 10 * 1024 * 1024,
      },
      (error, stdout, stderr) => {
        if (!error) {
          resolve({ stdout, stderr, exitCode: 0 });
          return;
        }
        const code: unknown = error.code;
        if (code === 'ENOENT') {
          reject(new CommandNotFoundError(file));
          return;
        }
        const exitCode = typeof code === 'number' ? code : null;
        if (options.allowFailure && exitCode !== null) {
          resolve({ stdout, stderr, exitCode });
          return;
        }
        reject(new CommandFailedError(describe(file, args), exitCode, stdout, stderr));
      },
    );

    if (options.input !== undefined) {
      child.stdin?.end(options.input);
    }
  });
}

/**
 * Launch a program in the background and forget about it. Resolves once the
 * child has spawned.
 */
export function spawnDetached(file: string, args: string[] = []): Promise<void> {
  logger.debug('spawn detached', { command: describe(file, args) });

  return new Promise((resolve, reject) => {
    const child = spawn(file, args, { detached: true, stdio: 'ignore' });

    child.once('error', (error) => {
      reject(isErrnoException(error) && error.code === 'ENOENT' ? new CommandNotFoundError(file) : error);
    });
    child.once('spawn', () => {
      child.unref();
      resolve();
    });
  });
}
