import { DEFAULT_POINTER, REVERT_TIMEOUT_MS } from '@icepanel/sdk';
import type { PointerSettings } from '@icepanel/sdk';
import type { CliContext } from '../context.js';

export interface MouseSetOptions {
  acceleration?: number;
  threshold?: number;
  yes?: boolean;
}

export async function mouseShowCommand(ctx: CliContext) {
  const { current, original } = await ctx.panel.mouse.read();
  ctx.out.log(`Acceleration: ${original.acceleration}`);
  ctx.out.log(`Threshold:    ${current.threshold} pixels`);
}

/**
 * Apply `settings` on trial. Unless confirmed in time they are put back the
 * way they were.
 */
async function applyOnTrial(ctx: CliContext, settings: PointerSettings, yes = false) {
  const trial = await ctx.panel.mouse.startTrial(settings, REVERT_TIMEOUT_MS);
  trial.on('tick', (seconds: number) => ctx.logger.debug('pointer trial', { secondsLeft: seconds }));

  if (yes) {
    await trial.keep();
  } else {
    const seconds = Math.ceil(REVERT_TIMEOUT_MS / 1000);
    const keep = await ctx.prompter.confirmUntil(
      `Keep the new mouse settings? They revert in ${seconds} seconds.`,
      trial.settled,
      false,
    );
    if (keep === true) {
      await trial.keep();
    } else {
      await trial.revert();
    }
  }

  const outcome = await trial.settled;
  if (outcome === 'kept') {
    ctx.out.success(`Mouse settings applied: acceleration ${settings.acceleration}, threshold ${settings.threshold}`);
  } else {
    ctx.out.info(
      `Mouse settings reverted to acceleration ${trial.original.acceleration}, threshold ${trial.original.threshold}`,
    );
  }
}

export async function mouseSetCommand(ctx: CliContext, options: MouseSetOptions = {}) {
  const { current } = await ctx.panel.mouse.read();
  await applyOnTrial(
    ctx,
    {
      acceleration: options.acceleration ?? current.acceleration,
      threshold: options.threshold ?? current.threshold,
    },
    options.yes,
  );
}

export async function mouseResetCommand(ctx: CliContext, options: Pick<MouseSetOptions, 'yes'> = {}) {
  await applyOnTrial(ctx, DEFAULT_POINTER, options.yes);
}
