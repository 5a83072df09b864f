import { logger } from '@icepanel/utils';
import type { SessionInfo } from '@icepanel/utils';
import type { CommandRunner } from './command-runner.js';
import { assertX11 } from './environment.js';
import type { XsetState } from './types.js';

function matchInt(output: string, pattern: RegExp, group = 1): number | undefined {
  const match = pattern.exec(output);
  return match ? Number.parseInt(match[group], 10) : undefined;
}

/**
 * Parse the report printed by `xset q`. Fields the report does not carry keep
 * their defaults.
 */
export function parseXsetQuery(output: string): XsetState {
  const repeat = /auto repeat delay:\s*(\d+)\s+repeat rate:\s*(\d+)/.exec(output);
  const pointer = /acceleration:\s*(\d+)\/(\d+)\s+threshold:\s*(\d+)/.exec(output);
  const dpms = /Standby:\s*(\d+)\s+Suspend:\s*(\d+)\s+Off:\s*(\d+)/.exec(output);
  const autoRepeat = /auto repeat:\s*(on|off)/i.exec(output);

  return {
    keyboard: {
      autoRepeat: autoRepeat ? autoRepeat[1].toLowerCase() === 'on' : false,
      repeatDelay: repeat ? Number.parseInt(repeat[1], 10) : 500,
      repeatRate: repeat ? Number.parseInt(repeat[2], 10) : 30,
      clickPercent: matchInt(output, /key click percent:\s*(\d+)/) ?? 0,
    },
    bell: {
      percent: matchInt(output, /bell percent:\s*(\d+)/) ?? 0,
      pitch: matchInt(output, /bell pitch:\s*(\d+)/) ?? 400,
      duration: matchInt(output, /bell duration:\s*(\d+)/) ?? 100,
    },
    pointer: {
      acceleration: {
        numerator: pointer ? Number.parseInt(pointer[1], 10) : 4,
        denominator: pointer ? Number.parseInt(pointer[2], 10) : 1,
      },
      threshold: pointer ? Number.parseInt(pointer[3], 10) : 4,
    },
    dpms: {
      enabled: output.includes('DPMS is Enabled'),
      standby: dpms ? Number.parseInt(dpms[1], 10) : 0,
      suspend: dpms ? Number.parseInt(dpms[2], 10) : 0,
      off: dpms ? Number.parseInt(dpms[3], 10) : 0,
    },
  };
}

export class XsetClient {
  private runner: CommandRunner;
  private session: SessionInfo;

  constructor(runner: CommandRunner, session: SessionInfo) {
    this.runner = runner;
    this.session = session;
  }

  async query(): Promise<XsetState> {
    assertX11(this.session);
    const { stdout } = await this.runner.run('xset', ['q']);
    return parseXsetQuery(stdout);
  }

  // DPMS

  async setDpms(standby: number, suspend: number, off: number): Promise<void> {
    await this.xset('+dpms');
    await this.xset('dpms', String(standby), String(suspend), String(off));
  }

  async disableDpms(): Promise<void> {
    await this.xset('-dpms');
  }

  // Keyboard

  async setRepeat(delay: number, rate: number): Promise<void> {
    await this.xset('r', 'rate', String(delay), String(rate));
  }

  async disableRepeat(): Promise<void> {
    await this.xset('-r');
  }

  async setClick(volume: number): Promise<void> {
    await this.xset('c', String(volume));
  }

  async disableClick(): Promise<void> {
    await this.xset('-c');
  }

  async setBell(volume: number, pitch: number, duration: number): Promise<void> {
    await this.xset('b', String(volume), String(pitch), String(duration));
  }

  async disableBell(): Promise<void> {
    await this.xset('b', 'off');
  }

  // Pointer

  /** `acceleration` may be a whole number or a `numerator/denominator` fraction. */
  async setPointer(acceleration: number | string, threshold: number): Promise<void> {
    await this.xset('m', String(acceleration), String(threshold));
  }

  private async xset(...args: string[]): Promise<void> {
    assertX11(this.session);
    logger.debug('xset', { args });
    await this.runner.run('xset', args);
  }
}
