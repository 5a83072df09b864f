import { FileUtils, ValidationError, logger, splitArgs } from '@icepanel/utils';
import type { CommandRunner } from './command-runner.js';

export const HISTORY_LIMIT = 20;
export const HISTORY_HEADER = '# icepanel run history: DO NOT EDIT!';
export const FALLBACK_SUGGESTION = 'xterm';

/**
 * Most-recently-used list of commands started from the run dialog.
 */
export class RunHistory {
  private entries: string[] = [];
  private filePath: string;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  get file(): string {
    return this.filePath;
  }

  /** Newest first. */
  list(): string[] {
    return [...this.entries];
  }

  suggestions(): string[] {
    return this.entries.length > 0 ? this.list() : [FALLBACK_SUGGESTION];
  }

  add(command: string) {
    const cmd = command.trim();
    if (!cmd) return;
    this.entries = [cmd, ...this.entries.filter((e) => e !== cmd)];
  }

  async load(): Promise<this> {
    const content = await FileUtils.readTextIfExists(this.filePath);
    this.entries = [];
    if (content === undefined) return this;

    for (const line of content.split('\n')) {
      const cmd = line.trim();
      if (cmd && !cmd.startsWith('#')) this.add(cmd);
    }
    return this;
  }

  /** Stores at most HISTORY_LIMIT entries, oldest first. */
  async save(): Promise<void> {
    const kept = this.entries.slice(0, HISTORY_LIMIT).reverse();
    await FileUtils.writeAtomic(this.filePath, [HISTORY_HEADER, ...kept].join('\n') + '\n');
  }
}

/**
 * Record `command` in the history and start it in the background.
 */
export async function runCommand(runner: CommandRunner, history: RunHistory, command: string): Promise<void> {
  const cmd = command.trim();
  if (!cmd) {
    throw new ValidationError('Enter a command to run.');
  }
  const argv = splitArgs(cmd);
  if (argv.length === 0) {
    throw new ValidationError('Enter a command to run.');
  }

  history.add(cmd);
  await history.save();
  logger.debug('launching', { command: cmd });
  await runner.launch(argv[0], argv.slice(1));
}
