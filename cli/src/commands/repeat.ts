import type { RepeatSettings } from '@icepanel/sdk';
import type { CliContext } from '../context.js';

export interface RepeatSetOptions {
  rate?: number;
  delay?: number;
}

function describe(settings: RepeatSettings): string {
  return `delay ${settings.delay} ms, rate ${settings.rate}/s`;
}

export async function repeatShowCommand(ctx: CliContext) {
  const settings = await ctx.panel.repeat.read();
  ctx.out.log(`Auto repeat: ${settings.enabled ? 'on' : 'off'}`);
  ctx.out.log(`  Delay: ${settings.delay} ms`);
  ctx.out.log(`  Rate:  ${settings.rate} per second`);
}

export async function repeatSetCommand(ctx: CliContext, options: RepeatSetOptions = {}) {
  const current = await ctx.panel.repeat.read();
  const next: RepeatSettings = {
    enabled: true,
    rate: options.rate ?? current.rate,
    delay: options.delay ?? current.delay,
  };
  await ctx.panel.repeat.apply(next);
  ctx.out.success(`Keyboard repeat set: ${describe(next)}`);
}

export async function repeatOffCommand(ctx: CliContext) {
  const current = await ctx.panel.repeat.read();
  await ctx.panel.repeat.apply({ ...current, enabled: false });
  ctx.out.success('Keyboard auto repeat disabled');
}

export async function repeatResetCommand(ctx: CliContext) {
  const settings = await ctx.panel.repeat.reset();
  ctx.out.success(`Keyboard repeat reset to defaults: ${describe(settings)}`);
}
