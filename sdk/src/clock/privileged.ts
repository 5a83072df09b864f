import {
  AuthCancelledError,
  CommandFailedError,
  CommandNotFoundError,
  ValidationError,
  logger,
} from '@icepanel/utils';
import type { CommandRunner } from '../command-runner.js';

/** pkexec exits with these when the user dismisses or fails authentication. */
const CANCELLED_EXIT_CODES = [126, 127];

/**
 * Runs shell command lines as root through pkexec. All commands passed to
 * one `run` go through a single pkexec call so the user authenticates once.
 */
export class PrivilegedRunner {
  private runner: CommandRunner;

  constructor(runner: CommandRunner) {
    this.runner = runner;
  }

  async run(commands: string[]): Promise<void> {
    if (commands.length === 0) {
      throw new ValidationError('No privileged commands to run');
    }
    const script = commands.join(' && ');
    logger.debug('pkexec', { script });

    try {
      await this.runner.run('pkexec', ['sh', '-c', script]);
    } catch (error) {
      if (error instanceof CommandNotFoundError) {
        throw new CommandNotFoundError(
          'pkexec',
          "The 'pkexec' command was not found. Please ensure Polkit is installed.",
        );
      }
      if (error instanceof CommandFailedError) {
        if (error.exitCode !== null && CANCELLED_EXIT_CODES.includes(error.exitCode)) {
          throw new AuthCancelledError();
        }
        throw new CommandFailedError(error.command, error.exitCode, error.stdout, error.stderr, 'Command failed');
      }
      throw error;
    }
  }
}
