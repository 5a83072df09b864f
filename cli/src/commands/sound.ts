import type { SoundSettings } from '@icepanel/sdk';
import type { CliContext } from '../context.js';

export interface SoundSetOptions {
  click?: number | false;
  bell?: boolean;
  bellVolume?: number;
  bellPitch?: number;
  bellDuration?: number;
}

function printSettings(ctx: CliContext, settings: SoundSettings) {
  ctx.out.log(`Key click: ${settings.click ? `on, volume ${settings.clickVolume}%` : 'off'}`);
  ctx.out.log(
    settings.bell
      ? `Bell: on, volume ${settings.bellVolume}%, pitch ${settings.bellPitch} Hz, duration ${settings.bellDuration} ms`
      : 'Bell: off',
  );
}

export async function soundShowCommand(ctx: CliContext) {
  printSettings(ctx, await ctx.panel.sound.read());
}

/**
 * Start from the current settings. Giving any bell value turns the bell on;
 * `--no-bell` wins over them.
 */
export function mergeSoundOptions(current: SoundSettings, options: SoundSetOptions): SoundSettings {
  const next = { ...current };

  if (options.click === false) {
    next.click = false;
  } else if (options.click !== undefined) {
    next.click = true;
    next.clickVolume = options.click;
  }

  if (options.bellVolume !== undefined) next.bellVolume = options.bellVolume;
  if (options.bellPitch !== undefined) next.bellPitch = options.bellPitch;
  if (options.bellDuration !== undefined) next.bellDuration = options.bellDuration;
  if (options.bellVolume !== undefined || options.bellPitch !== undefined || options.bellDuration !== undefined) {
    next.bell = true;
  }
  if (options.bell === false) next.bell = false;

  return next;
}

export async function soundSetCommand(ctx: CliContext, options: SoundSetOptions = {}) {
  const next = mergeSoundOptions(await ctx.panel.sound.read(), options);
  await ctx.panel.sound.apply(next);
  ctx.out.success('Keyboard sound settings applied');
  printSettings(ctx, next);
}

export async function soundOffCommand(ctx: CliContext) {
  const current = await ctx.panel.sound.read();
  await ctx.panel.sound.apply({ ...current, click: false, bell: false });
  ctx.out.success('Key click and bell disabled');
}

export async function soundResetCommand(ctx: CliContext) {
  const settings = await ctx.panel.sound.reset();
  ctx.out.success('Keyboard sound reset to defaults');
  printSettings(ctx, settings);
}

export function soundBeepCommand(ctx: CliContext) {
  ctx.beep();
}
