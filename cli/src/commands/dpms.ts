import { DPMS_FIELDS, cascadeTimeouts, labelForSeconds } from '@icepanel/sdk';
import type { DpmsSettings, DpmsTimeoutField } from '@icepanel/sdk';
import type { CliContext } from '../context.js';
import { columns } from '../output.js';

export type DpmsSetOptions = Partial<Record<DpmsTimeoutField, number>>;

const FIELD_LABELS: Record<DpmsTimeoutField, string> = {
  standby: 'Standby after',
  suspend: 'Suspend after',
  off: 'Turn off after',
};

function printSettings(ctx: CliContext, settings: DpmsSettings) {
  ctx.out.log(`Monitor power saving: ${settings.enabled ? 'enabled' : 'disabled'}`);
  const rows = DPMS_FIELDS.map((field): [string, string] => [
    `  ${FIELD_LABELS[field]}:`,
    labelForSeconds(settings[field]),
  ]);
  for (const line of columns(rows, 1)) {
    ctx.out.log(line);
  }
}

export async function dpmsShowCommand(ctx: CliContext) {
  printSettings(ctx, await ctx.panel.dpms.read());
}

/**
 * Enables power saving. Timeouts are taken from the current settings and
 * overridden field by field, standby first, keeping them ordered after each
 * change.
 */
export async function dpmsSetCommand(ctx: CliContext, options: DpmsSetOptions = {}) {
  const current = await ctx.panel.dpms.read();
  let timeouts = { standby: current.standby, suspend: current.suspend, off: current.off };

  for (const field of DPMS_FIELDS) {
    const value = options[field];
    if (value === undefined) continue;
    timeouts = cascadeTimeouts({ ...timeouts, [field]: value }, field);
  }

  const next: DpmsSettings = { enabled: true, ...timeouts };
  await ctx.panel.dpms.apply(next);
  ctx.out.success('Monitor power settings applied');
  printSettings(ctx, next);
}

export async function dpmsOffCommand(ctx: CliContext) {
  const current = await ctx.panel.dpms.read();
  await ctx.panel.dpms.apply({ ...current, enabled: false });
  ctx.out.success('Monitor power saving disabled');
}
