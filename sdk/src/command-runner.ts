import { execAsync, spawnDetached } from '@icepanel/utils';
import type { ExecOptions, ExecResult } from '@icepanel/utils';

/**
 * Seam between the settings services and the processes they start.
 */
export interface CommandRunner {
  run(file: string, args?: string[], options?: ExecOptions): Promise<ExecResult>;
  launch(file: string, args?: string[]): Promise<void>;
}

export const systemRunner: CommandRunner = {
  run: (file, args = [], options) => execAsync(file, args, options),
  launch: (file, args = []) => spawnDetached(file, args),
};
