import chalk from 'chalk';
import { ValidationError, Validator } from '@icepanel/utils';
import { ClockTicker, formatClock, parseDate, parseTime } from '@icepanel/sdk';
import type { ClockChange, Meridiem } from '@icepanel/sdk';
import type { CliContext } from '../context.js';
import { columns } from '../output.js';

export interface ClockSetOptions {
  date?: string;
  time?: string;
  meridiem?: string;
  ntp?: boolean;
}

const MERIDIEMS: readonly Meridiem[] = ['AM', 'PM'];

function isoDate(now: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return `${now.getFullYear()}-${pad(now.getMonth() + 1)}-${pad(now.getDate())}`;
}

export async function clockShowCommand(ctx: CliContext, now: Date = new Date()) {
  const status = await ctx.panel.clock.status();
  const ntp = status.ntpActive
    ? `on (${status.synchronized ? 'synchronized' : 'not synchronized'})`
    : 'off';

  const rows: Array<[string, string]> = [
    ['Time:', formatClock(now, status.abbreviation)],
    ['Date:', isoDate(now)],
    ['Time zone:', status.zone],
    ['Network time:', ntp],
  ];
  for (const line of columns(rows)) {
    ctx.out.log(line);
  }
}

/** Redraw the clock in place once a second until interrupted. */
export async function clockWatchCommand(ctx: CliContext) {
  const abbreviation = await ctx.panel.clock.abbreviation();
  const ticker = new ClockTicker((now) => ctx.out.write(`\r${formatClock(now, abbreviation)}`));

  ticker.start();
  try {
    await ctx.waitForInterrupt();
  } finally {
    ticker.stop();
    ctx.out.write('\n');
  }
}

/** Turn the command-line flags into the change to make. */
export function buildClockChange(options: ClockSetOptions, currentNtp: boolean): ClockChange {
  const ntp = options.ntp ?? currentNtp;
  if (ntp && (options.date || options.time)) {
    throw new ValidationError('Turn network time off (--no-ntp) to set the date or time by hand.');
  }

  const meridiem = options.meridiem
    ? Validator.oneOf('AM/PM', options.meridiem.toUpperCase(), MERIDIEMS)
    : undefined;
  if (meridiem && !options.time) {
    throw new ValidationError('--meridiem needs --time');
  }

  return {
    ntp,
    date: options.date ? parseDate(options.date) : undefined,
    time: options.time ? parseTime(options.time, meridiem) : undefined,
  };
}

export async function clockSetCommand(ctx: CliContext, options: ClockSetOptions = {}) {
  const initial = await ctx.panel.clock.ntpStatus();
  const change = buildClockChange(options, initial.active);
  const now = new Date();

  const plan = ctx.panel.clock.planApply(change, initial.active, now);
  if (plan.length === 0) {
    ctx.out.info('Nothing to change');
    return;
  }
  for (const command of plan) {
    ctx.logger.debug('planned', { command });
  }

  const spinner = ctx.spinner('Applying date and time settings...').start();
  try {
    await ctx.panel.clock.apply(change, initial.active, now);
    spinner.succeed(chalk.green('Date and time settings applied'));
  } catch (error) {
    spinner.fail('Date and time settings were not changed');
    throw error;
  }
}

export async function clockZonesCommand(ctx: CliContext, filter?: string) {
  const zones = await ctx.panel.clock.zones();
  const wanted = filter?.trim().toLowerCase();
  const matches = wanted ? zones.filter((zone) => zone.toLowerCase().includes(wanted)) : zones;

  if (matches.length === 0) {
    ctx.out.warn(wanted ? `No time zones match "${filter}"` : 'No time zones found');
    return;
  }
  for (const zone of matches) {
    ctx.out.log(zone);
  }
}

export async function clockZoneCommand(ctx: CliContext, zone?: string) {
  let target = zone?.trim();
  if (!target) {
    const [zones, current] = await Promise.all([ctx.panel.clock.zones(), ctx.panel.clock.currentZone()]);
    target = await ctx.prompter.select('Time zone:', zones, zones.includes(current) ? current : undefined);
  }

  const spinner = ctx.spinner(`Changing time zone to ${target}...`).start();
  try {
    await ctx.panel.clock.setZone(target);
    spinner.succeed(chalk.green(`Time zone set to ${target}`));
  } catch (error) {
    spinner.fail('Time zone was not changed');
    throw error;
  }
}
