import { Validator } from '@icepanel/utils';
import type { IntegerRange } from '@icepanel/utils';
import type { XsetClient } from './xset.js';
import type { RepeatSettings, SoundSettings } from './types.js';

export const REPEAT_RANGES = {
  rate: { min: 5, max: 100 },
  delay: { min: 200, max: 1000 },
} satisfies Record<string, IntegerRange>;

export const DEFAULT_REPEAT: RepeatSettings = { enabled: true, rate: 30, delay: 500 };

export const SOUND_RANGES = {
  clickVolume: { min: 0, max: 100 },
  bellVolume: { min: 0, max: 100 },
  bellPitch: { min: 50, max: 2000 },
  bellDuration: { min: 10, max: 800 },
} satisfies Record<string, IntegerRange>;

export const DEFAULT_SOUND: SoundSettings = {
  click: true,
  clickVolume: 50,
  bell: true,
  bellVolume: 50,
  bellPitch: 400,
  bellDuration: 100,
};

export class KeyboardRepeatService {
  private xset: XsetClient;

  constructor(xset: XsetClient) {
    this.xset = xset;
  }

  async read(): Promise<RepeatSettings> {
    const { keyboard } = await this.xset.query();
    return {
      enabled: keyboard.autoRepeat,
      rate: keyboard.repeatRate,
      delay: keyboard.repeatDelay,
    };
  }

  async apply(settings: RepeatSettings): Promise<void> {
    if (!settings.enabled) {
      await this.xset.disableRepeat();
      return;
    }
    Validator.inRange('Repeat rate', settings.rate, REPEAT_RANGES.rate);
    Validator.inRange('Repeat delay', settings.delay, REPEAT_RANGES.delay);
    await this.xset.setRepeat(settings.delay, settings.rate);
  }

  async reset(): Promise<RepeatSettings> {
    await this.apply(DEFAULT_REPEAT);
    return { ...DEFAULT_REPEAT };
  }
}

export class KeyboardSoundService {
  private xset: XsetClient;

  constructor(xset: XsetClient) {
    this.xset = xset;
  }

  async read(): Promise<SoundSettings> {
    const { keyboard, bell } = await this.xset.query();
    return {
      click: keyboard.clickPercent > 0,
      clickVolume: keyboard.clickPercent > 0 ? keyboard.clickPercent : DEFAULT_SOUND.clickVolume,
      bell: bell.percent > 0,
      bellVolume: bell.percent > 0 ? bell.percent : DEFAULT_SOUND.bellVolume,
      bellPitch: bell.pitch,
      bellDuration: bell.duration,
    };
  }

  /** Applies the click setting, then the bell. */
  async apply(settings: SoundSettings): Promise<void> {
    if (settings.click) {
      Validator.inRange('Click volume', settings.clickVolume, SOUND_RANGES.clickVolume);
    }
    if (settings.bell) {
      Validator.inRange('Bell volume', settings.bellVolume, SOUND_RANGES.bellVolume);
      Validator.inRange('Bell pitch', settings.bellPitch, SOUND_RANGES.bellPitch);
      Validator.inRange('Bell duration', settings.bellDuration, SOUND_RANGES.bellDuration);
    }

    if (settings.click) {
      await this.xset.setClick(settings.clickVolume);
    } else {
      await this.xset.disableClick();
    }

    if (settings.bell) {
      await this.xset.setBell(settings.bellVolume, settings.bellPitch, settings.bellDuration);
    } else {
      await this.xset.disableBell();
    }
  }

  async reset(): Promise<SoundSettings> {
    await this.apply(DEFAULT_SOUND);
    return { ...DEFAULT_SOUND };
  }
}
