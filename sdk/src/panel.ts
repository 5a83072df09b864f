import type { IcePanelConfig } from '@icepanel/utils';
import { systemRunner } from './command-runner.js';
import type { CommandRunner } from './command-runner.js';
import { ClockService } from './clock/clock.js';
import { PrivilegedRunner } from './clock/privileged.js';
import { defaultLayout } from './clock/zoneinfo.js';
import type { ZoneinfoLayout } from './clock/zoneinfo.js';
import { DpmsService } from './dpms.js';
import { KeyboardRepeatService, KeyboardSoundService } from './keyboard.js';
import { MouseService } from './mouse.js';
import { RunHistory } from './run-history.js';
import { XsetClient } from './xset.js';

export interface PanelOptions {
  runner?: CommandRunner;
  layout?: ZoneinfoLayout;
}

/**
 * One instance of every settings service, wired to the same command runner.
 */
export class IcePanel {
  readonly config: IcePanelConfig;
  readonly runner: CommandRunner;
  readonly xset: XsetClient;
  readonly dpms: DpmsService;
  readonly repeat: KeyboardRepeatService;
  readonly sound: KeyboardSoundService;
  readonly mouse: MouseService;
  readonly privileged: PrivilegedRunner;
  readonly clock: ClockService;

  constructor(config: IcePanelConfig, options: PanelOptions = {}) {
    this.config = config;
    this.runner = options.runner ?? systemRunner;
    this.xset = new XsetClient(this.runner, config.session);
    this.dpms = new DpmsService(this.xset);
    this.repeat = new KeyboardRepeatService(this.xset);
    this.sound = new KeyboardSoundService(this.xset);
    this.mouse = new MouseService(this.xset);
    this.privileged = new PrivilegedRunner(this.runner);
    this.clock = new ClockService(this.runner, options.layout ?? defaultLayout(config.tzDir), this.privileged);
  }

  history(): Promise<RunHistory> {
    return new RunHistory(this.config.historyFile).load();
  }
}
