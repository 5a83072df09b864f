import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync, symlinkSync, writeFileSync } from 'fs';
import os from 'os';
import path from 'path';
import {
  AuthCancelledError,
  CommandFailedError,
  CommandNotFoundError,
  ValidationError,
  shellQuote,
} from '@icepanel/utils';
import {
  ClockService,
  ClockTicker,
  PrivilegedRunner,
  formatClock,
  formatDateTime,
  parseDate,
  parseTime,
  to24Hour,
} from '@icepanel/sdk';
import type { ZoneinfoLayout } from '@icepanel/sdk';
import { FakeRunner } from '../helpers/fake-runner.js';

const TIMEDATECTL_ON = [
  '               Local time: Tue 2024-03-05 14:07:09 CET',
  '                Time zone: Europe/Berlin (CET, +0100)',
  'System clock synchronized: yes',
  '              NTP service: active',
  '          RTC in local TZ: no',
].join('\n');

describe('time helpers', () => {
  it('should convert a 12-hour clock', () => {
    expect(to24Hour(12, 'AM')).toBe(0);
    expect(to24Hour(12, 'PM')).toBe(12);
    expect(to24Hour(1, 'PM')).toBe(13);
    expect(to24Hour(11, 'AM')).toBe(11);
    expect(() => to24Hour(13, 'AM')).toThrow(ValidationError);
  });

  it('should format for timedatectl', () => {
    expect(formatDateTime({ year: 2024, month: 3, day: 5 }, { hour: 7, minute: 4, second: 9 })).toBe(
      '2024-03-05 07:04:09',
    );
  });

  it('should format the clock label', () => {
    expect(formatClock(new Date(2024, 2, 5, 0, 7, 9), 'CET')).toBe('12:07:09 AM CET');
    expect(formatClock(new Date(2024, 2, 5, 13, 5, 0), 'CET')).toBe('01:05:00 PM CET');
    expect(formatClock(new Date(2024, 2, 5, 12, 0, 0), '')).toBe('12:00:00 PM');
  });

  it('should parse real calendar dates only', () => {
    expect(parseDate('2024-2-29')).toEqual({ year: 2024, month: 2, day: 29 });
    expect(() => parseDate('2023-02-29')).toThrow('Not a calendar date: 2023-02-29');
    expect(() => parseDate('tomorrow')).toThrow(ValidationError);
  });

  it('should parse times on either clock', () => {
    expect(parseTime('23:59:59')).toEqual({ hour: 23, minute: 59, second: 59 });
    expect(parseTime('7:05', 'PM')).toEqual({ hour: 19, minute: 5, second: 0 });
    expect(parseTime('12:30', 'AM')).toEqual({ hour: 0, minute: 30, second: 0 });
    expect(() => parseTime('24:00')).toThrow('Hour must be between 0 and 23 (got 24)');
    expect(() => parseTime('10:61')).toThrow(ValidationError);
    expect(() => parseTime('noon')).toThrow(ValidationError);
  });
});

describe('PrivilegedRunner', () => {
  it('should run all commands in one pkexec call', async () => {
    const runner = new FakeRunner();
    await new PrivilegedRunner(runner).run(['timedatectl set-ntp false', 'timedatectl set-time x']);

    expect(runner.calls).toHaveLength(1);
    expect(runner.calls[0].file).toBe('pkexec');
    expect(runner.calls[0].args).toEqual(['sh', '-c', 'timedatectl set-ntp false && timedatectl set-time x']);
  });

  it('should refuse an empty batch', async () => {
    await expect(new PrivilegedRunner(new FakeRunner()).run([])).rejects.toBeInstanceOf(ValidationError);
  });

  it('should explain a missing pkexec', async () => {
    const runner = new FakeRunner().respond('pkexec', new CommandNotFoundError('pkexec'));
    await expect(new PrivilegedRunner(runner).run(['true'])).rejects.toThrow(
      "The 'pkexec' command was not found. Please ensure Polkit is installed.",
    );
  });

  it('should treat exit 126 and 127 as a cancelled prompt', async () => {
    for (const code of [126, 127]) {
      const runner = new FakeRunner().respond('pkexec', new CommandFailedError('pkexec sh -c true', code, '', ''));
      await expect(new PrivilegedRunner(runner).run(['true'])).rejects.toBeInstanceOf(AuthCancelledError);
    }
  });

  it('should keep the output of other failures', async () => {
    const runner = new FakeRunner().respond(
      'pkexec',
      new CommandFailedError('pkexec sh -c x', 1, '', 'Failed to set time: NTP unit is active'),
    );
    const error = await new PrivilegedRunner(runner).run(['x']).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(CommandFailedError);
    expect(error).toMatchObject({ message: 'Command failed', stderr: 'Failed to set time: NTP unit is active' });
  });
});

describe('ClockService', () => {
  let root: string;
  let layout: ZoneinfoLayout;

  beforeEach(() => {
    root = mkdtempSync(path.join(os.tmpdir(), 'icepanel-clock-'));
    const zoneDir = path.join(root, 'zoneinfo');
    mkdirSync(path.join(zoneDir, 'Europe'), { recursive: true });
    writeFileSync(path.join(zoneDir, 'Europe', 'Berlin'), 'TZif2');
    writeFileSync(path.join(zoneDir, 'UTC'), 'TZif2');
    symlinkSync(path.join(zoneDir, 'UTC'), path.join(root, 'localtime'));
    layout = {
      zoneDirs: [zoneDir],
      localtimeFiles: [path.join(root, 'localtime')],
      timezoneFiles: [path.join(root, 'timezone')],
    };
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
    vi.useRealTimers();
  });

  it('should report zone, abbreviation and network time', async () => {
    const runner = new FakeRunner()
      .respond('date', { stdout: 'UTC\n' })
      .respond('timedatectl', { stdout: TIMEDATECTL_ON });
    const clock = new ClockService(runner, layout);

    expect(await clock.status()).toEqual({ zone: 'UTC', abbreviation: 'UTC', ntpActive: true, synchronized: true });
    expect(await clock.zones()).toEqual(['Europe/Berlin', 'UTC']);
  });

  it('should read network time as off when timedatectl fails', async () => {
    const runner = new FakeRunner().respond('timedatectl', new CommandNotFoundError('timedatectl'));
    expect(await new ClockService(runner, layout).ntpStatus()).toEqual({ active: false, synchronized: false });
  });

  describe('planApply', () => {
    const now = new Date(2024, 2, 5, 14, 7, 9);
    const clock = new ClockService(new FakeRunner(), {
      zoneDirs: [],
      localtimeFiles: [],
      timezoneFiles: [],
    });

    it('should do nothing when nothing changes', () => {
      expect(clock.planApply({ ntp: true }, true, now)).toEqual([]);
      expect(clock.planApply({ ntp: false }, false, now)).toEqual([]);
    });

    it('should toggle network time', () => {
      expect(clock.planApply({ ntp: true, date: { year: 2020, month: 1, day: 1 } }, false, now)).toEqual([
        'timedatectl set-ntp true',
      ]);
    });

    it('should complete a lone date with the current time', () => {
      expect(clock.planApply({ ntp: false, date: { year: 2025, month: 12, day: 31 } }, true, now)).toEqual([
        'timedatectl set-ntp false',
        "timedatectl set-time '2025-12-31 14:07:09'",
      ]);
    });

    it('should complete a lone time with the current date', () => {
      expect(clock.planApply({ ntp: false, time: { hour: 8, minute: 30, second: 0 } }, false, now)).toEqual([
        "timedatectl set-time '2024-03-05 08:30:00'",
      ]);
    });
  });

  it('should apply the plan through pkexec', async () => {
    const runner = new FakeRunner();
    const clock = new ClockService(runner, layout);

    const plan = await clock.apply({ ntp: false }, true);
    expect(plan).toEqual(['timedatectl set-ntp false']);
    expect(runner.commands()).toEqual(['pkexec sh -c timedatectl set-ntp false']);

    await clock.apply({ ntp: false }, false);
    expect(runner.calls).toHaveLength(1);
  });

  it('should relink localtime and update the timezone file', async () => {
    writeFileSync(path.join(root, 'timezone'), 'UTC\n');
    const runner = new FakeRunner();
    const clock = new ClockService(runner, layout);

    const zoneFile = await clock.setZone('Europe/Berlin');
    const localtime = path.join(root, 'localtime');
    const timezone = path.join(root, 'timezone');

    expect(zoneFile).toBe(path.join(root, 'zoneinfo', 'Europe', 'Berlin'));
    expect(runner.calls[0].args).toEqual([
      'sh',
      '-c',
      [
        `rm -f ${shellQuote(localtime)}`,
        `ln -s ${shellQuote(zoneFile)} ${shellQuote(localtime)}`,
        `printf '%s\\n' Europe/Berlin > ${shellQuote(timezone)}`,
      ].join(' && '),
    ]);
  });

  it('should leave out the timezone file when there is none', async () => {
    const runner = new FakeRunner();
    await new ClockService(runner, layout).setZone('UTC');

    const script = runner.calls[0].args[2];
    expect(script.split(' && ')).toHaveLength(2);
  });

  it('should refuse a zone table before asking for authentication', async () => {
    writeFileSync(path.join(root, 'zoneinfo', 'zone.tab'), '# table');
    const runner = new FakeRunner();

    await expect(new ClockService(runner, layout).setZone('zone.tab')).rejects.toThrow('Unknown time zone "zone.tab"');
    expect(runner.calls).toEqual([]);
  });

  it('should refuse an unknown zone before asking for authentication', async () => {
    const runner = new FakeRunner();
    await expect(new ClockService(runner, layout).setZone('Atlantis/Capital')).rejects.toThrow(
      'Unknown time zone "Atlantis/Capital"',
    );
    expect(runner.calls).toEqual([]);
  });
});

describe('ClockTicker', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('should render at once and then every interval until stopped', () => {
    vi.useFakeTimers();
    const render = vi.fn();
    const ticker = new ClockTicker(render, { intervalMs: 1000, now: () => new Date(2024, 0, 1, 9, 0, 0) });

    ticker.start();
    expect(render).toHaveBeenCalledTimes(1);
    expect(ticker.running).toBe(true);

    vi.advanceTimersByTime(3000);
    expect(render).toHaveBeenCalledTimes(4);

    ticker.stop();
    vi.advanceTimersByTime(3000);
    expect(render).toHaveBeenCalledTimes(4);
    expect(ticker.running).toBe(false);
  });
});
