import { UnsupportedEnvironmentError, logger } from '@icepanel/utils';
import type { SessionInfo } from '@icepanel/utils';
import type { CommandRunner } from './command-runner.js';
import { isIceWmSession } from './environment.js';

export interface RestartOptions {
  force?: boolean;
}

/**
 * Ask the running IceWM to restart so it rereads its configuration.
 */
export async function restartIceWm(
  runner: CommandRunner,
  session: SessionInfo,
  options: RestartOptions = {},
): Promise<void> {
  if (!options.force && !isIceWmSession(session)) {
    throw new UnsupportedEnvironmentError(
      'Not in an IceWM session. Use --force to send the restart signal anyway.',
    );
  }
  await runner.run('killall', ['-HUP', 'icewm']);
  logger.debug('IceWM restart signal sent');
}
