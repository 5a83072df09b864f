import chalk from 'chalk';
import { NotFoundError } from '@icepanel/utils';
import { isIceWmSession, loadKeysFile, normalizeCombo, saveKeysFile, testBinding } from '@icepanel/sdk';
import type { KeyBindingSet } from '@icepanel/sdk';
import type { CliContext } from '../context.js';
import { columns } from '../output.js';
import { confirmAndRestart, joinCommand, warnIfNotIceWm } from './shared.js';

export interface KeysWriteOptions {
  yes?: boolean;
  restart?: boolean;
}

function resolveCombo(set: KeyBindingSet, combo: string): string {
  const stored = set.findCombo(combo);
  if (stored === undefined) {
    const typed = combo.trim();
    throw new NotFoundError(`No shortcut is bound to '${typed}'.`, { combo: typed });
  }
  return stored;
}

async function save(ctx: CliContext, set: KeyBindingSet, existed: boolean, options: KeysWriteOptions) {
  const file = ctx.config.keysFile;
  if (existed && !options.yes) {
    const overwrite = await ctx.prompter.confirm(`Overwrite ${file}?`, true);
    if (!overwrite) {
      ctx.out.warn('Keys file not saved');
      return false;
    }
  }

  await saveKeysFile(file, set);
  ctx.logger.debug('keys file saved', { file, bindings: set.size });

  if (options.restart) {
    if (isIceWmSession(ctx.config.session)) {
      await confirmAndRestart(ctx, { yes: true }, 'Restart IceWM?');
    } else {
      ctx.out.warn('Skipping restart outside an IceWM session');
    }
  }
  return true;
}

export async function keysListCommand(ctx: CliContext) {
  warnIfNotIceWm(ctx);
  const { bindings, existed } = await loadKeysFile(ctx.config.keysFile);

  ctx.out.log(chalk.gray(ctx.config.keysFile));
  if (!existed) {
    ctx.out.warn('File not found. It will be created when a shortcut is saved.');
  }
  if (bindings.size === 0) {
    ctx.out.info('No shortcuts defined');
    return;
  }
  for (const line of columns(bindings.list().map(({ combo, command }) => [combo, command]))) {
    ctx.out.log(line);
  }
}

export async function keysAddCommand(ctx: CliContext, combo: string, words: string[], options: KeysWriteOptions = {}) {
  warnIfNotIceWm(ctx);
  const { bindings, existed } = await loadKeysFile(ctx.config.keysFile);
  const added = bindings.add(normalizeCombo(combo), joinCommand(words));

  if (await save(ctx, bindings, existed, options)) {
    ctx.out.success(`Added ${added.combo}: ${added.command}`);
  }
}

export async function keysUpdateCommand(
  ctx: CliContext,
  combo: string,
  words: string[],
  options: KeysWriteOptions = {},
) {
  warnIfNotIceWm(ctx);
  const { bindings, existed } = await loadKeysFile(ctx.config.keysFile);
  const updated = bindings.update(resolveCombo(bindings, combo), joinCommand(words));

  if (await save(ctx, bindings, existed, options)) {
    ctx.out.success(`Updated ${updated.combo}: ${updated.command}`);
  }
}

export async function keysRemoveCommand(ctx: CliContext, combo: string, options: KeysWriteOptions = {}) {
  warnIfNotIceWm(ctx);
  const { bindings, existed } = await loadKeysFile(ctx.config.keysFile);
  const target = resolveCombo(bindings, combo);

  if (!options.yes) {
    const proceed = await ctx.prompter.confirm(`Delete the shortcut for '${target}'?`, false);
    if (!proceed) {
      ctx.out.info('Nothing changed');
      return;
    }
  }

  bindings.remove(target);
  if (await save(ctx, bindings, existed, { ...options, yes: true })) {
    ctx.out.success(`Deleted ${target}`);
  }
}

export async function keysTestCommand(ctx: CliContext, combo: string) {
  const { bindings } = await loadKeysFile(ctx.config.keysFile);
  const target = resolveCombo(bindings, combo);
  const command = bindings.get(target) ?? '';

  await testBinding(ctx.panel.runner, command);
  ctx.out.success(`Started ${command}`);
}
