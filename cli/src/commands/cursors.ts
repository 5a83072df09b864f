import chalk from 'chalk';
import { installCursor, listCursors } from '@icepanel/sdk';
import type { CliContext } from '../context.js';
import { columns } from '../output.js';
import { confirmAndRestart, warnIfNotIceWm } from './shared.js';
import type { RestartFlags } from './shared.js';

export async function cursorsListCommand(ctx: CliContext) {
  warnIfNotIceWm(ctx);
  const entries = await listCursors(ctx.config.cursorDir);

  ctx.out.log(chalk.gray(ctx.config.cursorDir));
  const rows = entries.map((entry): [string, string] => [
    `${entry.installed ? chalk.green('✓') : chalk.gray('·')} ${entry.name}`,
    entry.installed ? entry.file : chalk.gray(`${entry.file} (default)`),
  ]);
  for (const line of columns(rows)) {
    ctx.out.log(line);
  }
}

export async function cursorsSetCommand(ctx: CliContext, role: string, source: string) {
  warnIfNotIceWm(ctx);
  const entry = await installCursor(ctx.config.cursorDir, role, source);
  ctx.out.success(`${entry.name} now uses ${entry.path}`);
  ctx.out.info('Restart IceWM to see the new cursor (icepanel cursors restart)');
}

export async function cursorsRestartCommand(ctx: CliContext, flags: RestartFlags = {}) {
  await confirmAndRestart(ctx, flags, 'Restart IceWM to apply the new cursors?');
}
