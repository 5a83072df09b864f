import { runCommand } from '@icepanel/sdk';
import type { CliContext } from '../context.js';
import { joinCommand } from './shared.js';

export interface RunOptions {
  history?: boolean;
}

const TYPE_NEW = 'Type a new command…';

export async function runAction(ctx: CliContext, words: string[], options: RunOptions = {}) {
  const history = await ctx.panel.history();

  if (options.history) {
    const entries = history.list();
    if (entries.length === 0) {
      ctx.out.info('No commands have been run yet');
      return;
    }
    entries.forEach((entry, index) => ctx.out.log(`${String(index + 1).padStart(2)}  ${entry}`));
    return;
  }

  let command = joinCommand(words);
  if (!command) {
    const suggestions = history.suggestions();
    const picked = await ctx.prompter.select('Run:', [...suggestions, TYPE_NEW], suggestions[0]);
    command = picked === TYPE_NEW ? await ctx.prompter.input('Command:') : picked;
  }

  await runCommand(ctx.panel.runner, history, command);
  ctx.out.success(`Started ${command.trim()}`);
}
