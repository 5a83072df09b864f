import type { CliContext } from '../context.js';
import { confirmAndRestart } from './shared.js';
import type { RestartFlags } from './shared.js';

export async function restartCommand(ctx: CliContext, flags: RestartFlags = {}) {
  await confirmAndRestart(ctx, flags, 'Restart IceWM now? Open windows stay open.');
}
