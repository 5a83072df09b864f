import { Validator, shellQuote } from '@icepanel/utils';
import type { IntegerRange } from '@icepanel/utils';
import { isIceWmSession, restartIceWm } from '@icepanel/sdk';
import type { CliContext } from '../context.js';

export interface RestartFlags {
  force?: boolean;
  yes?: boolean;
}

/** Commander option parser for a whole number within `range`. */
export function integerOption(name: string, range?: IntegerRange) {
  return (value: string): number => Validator.integer(name, value, range);
}

/**
 * Turn command-line words back into one command string. A single word is
 * taken as the whole command, so `'xterm -e top'` keeps its own quoting.
 */
export function joinCommand(words: string[]): string {
  if (words.length === 1) return words[0].trim();
  return words.map(shellQuote).join(' ');
}

export function warnIfNotIceWm(ctx: CliContext) {
  if (!isIceWmSession(ctx.config.session)) {
    ctx.out.warn('Warning: Not in an IceWM session. Changes will not apply to the current desktop.');
  }
}

/**
 * Ask (unless `yes`) and then signal IceWM to restart. Returns false when the
 * user declined.
 */
export async function confirmAndRestart(ctx: CliContext, flags: RestartFlags, question: string): Promise<boolean> {
  if (!flags.yes) {
    const proceed = await ctx.prompter.confirm(question, false);
    if (!proceed) {
      ctx.out.info('Restart cancelled');
      return false;
    }
  }
  await restartIceWm(ctx.panel.runner, ctx.config.session, { force: flags.force });
  ctx.out.success('IceWM restart signal sent');
  return true;
}
