import { ValidationError, Validator, logger, shellQuote } from '@icepanel/utils';
import type { CommandRunner } from '../command-runner.js';
import type { CalendarDate, ClockChange, ClockStatus, Meridiem, TimeOfDay } from '../types.js';
import { PrivilegedRunner } from './privileged.js';
import {
  currentZoneName,
  listZones,
  locateLocaltime,
  locateTimezoneFile,
  locateZoneinfo,
  resolveZoneFile,
} from './zoneinfo.js';
import type { ZoneinfoLayout } from './zoneinfo.js';

const pad = (n: number) => String(n).padStart(2, '0');

export function to24Hour(hour12: number, meridiem: Meridiem): number {
  Validator.inRange('Hour', hour12, { min: 1, max: 12 });
  if (meridiem === 'PM') return hour12 === 12 ? 12 : hour12 + 12;
  return hour12 === 12 ? 0 : hour12;
}

export function formatDateTime(date: CalendarDate, time: TimeOfDay): string {
  return `${date.year}-${pad(date.month)}-${pad(date.day)} ${pad(time.hour)}:${pad(time.minute)}:${pad(time.second)}`;
}

/** `hh:mm:ss AM ABBR`, the way the clock label reads. */
export function formatClock(now: Date, abbreviation: string): string {
  const hours = now.getHours();
  const meridiem: Meridiem = hours < 12 ? 'AM' : 'PM';
  const hour12 = hours % 12 === 0 ? 12 : hours % 12;
  const text = `${pad(hour12)}:${pad(now.getMinutes())}:${pad(now.getSeconds())} ${meridiem}`;
  return abbreviation ? `${text} ${abbreviation}` : text;
}

export function parseDate(input: string): CalendarDate {
  const match = /^(\d{4})-(\d{1,2})-(\d{1,2})$/.exec(input.trim());
  if (!match) {
    throw new ValidationError(`Date must look like YYYY-MM-DD (got "${input}")`);
  }
  const [year, month, day] = match.slice(1).map((v) => Number.parseInt(v, 10));
  const probe = new Date(year, month - 1, day);
  if (probe.getFullYear() !== year || probe.getMonth() !== month - 1 || probe.getDate() !== day) {
    throw new ValidationError(`Not a calendar date: ${input}`);
  }
  return { year, month, day };
}

/**
 * Parses `HH:MM[:SS]`. With a meridiem the hour is read on a 12-hour clock.
 */
export function parseTime(input: string, meridiem?: Meridiem): TimeOfDay {
  const match = /^(\d{1,2}):(\d{2})(?::(\d{2}))?$/.exec(input.trim());
  if (!match) {
    throw new ValidationError(`Time must look like HH:MM or HH:MM:SS (got "${input}")`);
  }
  const rawHour = Number.parseInt(match[1], 10);
  const minute = Validator.inRange('Minute', Number.parseInt(match[2], 10), { min: 0, max: 59 });
  const second = Validator.inRange('Second', Number.parseInt(match[3] ?? '0', 10), { min: 0, max: 59 });
  const hour = meridiem ? to24Hour(rawHour, meridiem) : Validator.inRange('Hour', rawHour, { min: 0, max: 23 });
  return { hour, minute, second };
}

export interface ClockPaths {
  zoneDir: string;
  localtime: string;
  timezoneFile?: string;
}

export class ClockService {
  private runner: CommandRunner;
  private layout: ZoneinfoLayout;
  private privileged: PrivilegedRunner;
  private paths?: ClockPaths;

  constructor(runner: CommandRunner, layout: ZoneinfoLayout, privileged?: PrivilegedRunner) {
    this.runner = runner;
    this.layout = layout;
    this.privileged = privileged ?? new PrivilegedRunner(runner);
  }

  async locate(): Promise<ClockPaths> {
    if (!this.paths) {
      this.paths = {
        zoneDir: await locateZoneinfo(this.layout),
        localtime: await locateLocaltime(this.layout),
        timezoneFile: await locateTimezoneFile(this.layout),
      };
      logger.debug('clock paths', { ...this.paths });
    }
    return this.paths;
  }

  async currentZone(): Promise<string> {
    const { zoneDir, localtime } = await this.locate();
    return currentZoneName(localtime, zoneDir);
  }

  async zones(): Promise<string[]> {
    const { zoneDir } = await this.locate();
    return listZones(zoneDir);
  }

  async abbreviation(): Promise<string> {
    try {
      const { stdout } = await this.runner.run('date', ['+%Z']);
      const abbr = stdout.trim();
      if (abbr) return abbr;
    } catch (error) {
      logger.debug('date +%Z failed', { error: String(error) });
    }
    const part = new Intl.DateTimeFormat('en-US', { timeZoneName: 'short' })
      .formatToParts(new Date())
      .find((p) => p.type === 'timeZoneName');
    return part?.value ?? '';
  }

  async ntpStatus(): Promise<{ active: boolean; synchronized: boolean }> {
    try {
      const { stdout } = await this.runner.run('timedatectl', ['status']);
      return {
        active: stdout.includes('NTP service: active'),
        synchronized: stdout.includes('System clock synchronized: yes'),
      };
    } catch (error) {
      logger.debug('timedatectl status failed', { error: String(error) });
      return { active: false, synchronized: false };
    }
  }

  async status(): Promise<ClockStatus> {
    const [zone, abbreviation, ntp] = await Promise.all([
      this.currentZone(),
      this.abbreviation(),
      this.ntpStatus(),
    ]);
    return { zone, abbreviation, ntpActive: ntp.active, synchronized: ntp.synchronized };
  }

  /**
   * Commands needed to move from `initialNtp` to `change`. A date without a
   * time (or the reverse) is completed from `now`.
   */
  planApply(change: ClockChange, initialNtp: boolean, now: Date = new Date()): string[] {
    const commands: string[] = [];

    if (change.ntp !== initialNtp) {
      commands.push(`timedatectl set-ntp ${change.ntp ? 'true' : 'false'}`);
    }

    if (!change.ntp && (change.date || change.time)) {
      const date = change.date ?? { year: now.getFullYear(), month: now.getMonth() + 1, day: now.getDate() };
      const time = change.time ?? { hour: now.getHours(), minute: now.getMinutes(), second: now.getSeconds() };
      commands.push(`timedatectl set-time ${shellQuote(formatDateTime(date, time))}`);
    }

    return commands;
  }

  /** Runs the plan in one privileged call. Returns the commands that ran. */
  async apply(change: ClockChange, initialNtp: boolean, now?: Date): Promise<string[]> {
    const plan = this.planApply(change, initialNtp, now);
    if (plan.length > 0) {
      await this.privileged.run(plan);
    }
    return plan;
  }

  planZone(paths: ClockPaths, zone: string, zoneFile: string): string[] {
    const commands = [
      `rm -f ${shellQuote(paths.localtime)}`,
      `ln -s ${shellQuote(zoneFile)} ${shellQuote(paths.localtime)}`,
    ];
    if (paths.timezoneFile) {
      commands.push(`printf '%s\\n' ${shellQuote(zone)} > ${shellQuote(paths.timezoneFile)}`);
    }
    return commands;
  }

  /** Point localtime at `zone`. Returns the zone file it now links to. */
  async setZone(zone: string): Promise<string> {
    const paths = await this.locate();
    const zoneFile = await resolveZoneFile(paths.zoneDir, zone);
    await this.privileged.run(this.planZone(paths, zone.trim(), zoneFile));
    return zoneFile;
  }
}

export interface TickerOptions {
  intervalMs?: number;
  now?: () => Date;
}

/**
 * Calls `render` right away and then once per interval until stopped.
 */
export class ClockTicker {
  private render: (now: Date) => void;
  private intervalMs: number;
  private now: () => Date;
  private timer?: NodeJS.Timeout;

  constructor(render: (now: Date) => void, options: TickerOptions = {}) {
    this.render = render;
    this.intervalMs = options.intervalMs ?? 1000;
    this.now = options.now ?? (() => new Date());
  }

  get running(): boolean {
    return this.timer !== undefined;
  }

  start() {
    if (this.timer) return;
    this.render(this.now());
    this.timer = setInterval(() => this.render(this.now()), this.intervalMs);
  }

  stop() {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
  }
}
