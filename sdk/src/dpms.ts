import { ValidationError, logger } from '@icepanel/utils';
import type { XsetClient } from './xset.js';
import type { DpmsSettings, DpmsTimeoutField, DpmsTimeouts } from './types.js';

export interface TimeoutPreset {
  label: string;
  seconds: number;
}

export const TIMEOUT_PRESETS: readonly TimeoutPreset[] = [
  { label: 'NEVER', seconds: 0 },
  { label: '5 minutes', seconds: 300 },
  { label: '10 minutes', seconds: 600 },
  { label: '15 minutes', seconds: 900 },
  { label: '20 minutes', seconds: 1200 },
  { label: '30 minutes', seconds: 1800 },
  { label: '45 minutes', seconds: 2700 },
  { label: '1 hour', seconds: 3600 },
  { label: '1.5 hours', seconds: 5400 },
  { label: '2 hours', seconds: 7200 },
  { label: '3 hours', seconds: 10800 },
  { label: '4 hours', seconds: 14400 },
  { label: '5 hours', seconds: 18000 },
  { label: '6 hours', seconds: 21600 },
  { label: '9 hours', seconds: 32400 },
  { label: '12 hours', seconds: 43200 },
  { label: '18 hours', seconds: 64800 },
  { label: '24 hours', seconds: 86400 },
];

export const DPMS_FIELDS: readonly DpmsTimeoutField[] = ['standby', 'suspend', 'off'];

export function labelForSeconds(seconds: number): string {
  const preset = TIMEOUT_PRESETS.find((p) => p.seconds === seconds);
  return preset ? preset.label : `${seconds} seconds`;
}

/**
 * Accepts a preset label ("10 minutes", "never") or a number of seconds that
 * matches a preset.
 */
export function parseTimeout(input: string): number {
  const value = input.trim();
  const byLabel = TIMEOUT_PRESETS.find((p) => p.label.toLowerCase() === value.toLowerCase());
  if (byLabel) return byLabel.seconds;

  if (/^\d+$/.test(value)) {
    const seconds = Number.parseInt(value, 10);
    if (TIMEOUT_PRESETS.some((p) => p.seconds === seconds)) return seconds;
  }

  throw new ValidationError(
    `Unknown timeout "${input}". Use one of: ${TIMEOUT_PRESETS.map((p) => p.label).join(', ')}`,
  );
}

/**
 * Keep standby <= suspend <= off for the non-zero timeouts after `changed`
 * was edited. Zero means never and is left alone.
 */
export function cascadeTimeouts(values: DpmsTimeouts, changed: DpmsTimeoutField): DpmsTimeouts {
  const next = { ...values };

  if (changed === 'standby') {
    if (next.standby > next.suspend && next.suspend !== 0) next.suspend = next.standby;
    if (next.suspend > next.off && next.off !== 0) next.off = next.suspend;
  } else if (changed === 'suspend') {
    if (next.suspend < next.standby && next.suspend !== 0) next.standby = next.suspend;
    if (next.suspend > next.off && next.off !== 0) next.off = next.suspend;
  } else {
    if (next.off < next.suspend && next.off !== 0) next.suspend = next.off;
    if (next.suspend < next.standby && next.suspend !== 0) next.standby = next.suspend;
  }

  return next;
}

export class DpmsService {
  private xset: XsetClient;

  constructor(xset: XsetClient) {
    this.xset = xset;
  }

  async read(): Promise<DpmsSettings> {
    const state = await this.xset.query();
    return state.dpms;
  }

  async apply(settings: DpmsSettings): Promise<void> {
    if (settings.enabled) {
      await this.xset.setDpms(settings.standby, settings.suspend, settings.off);
      logger.debug('DPMS enabled', { ...settings });
    } else {
      await this.xset.disableDpms();
      logger.debug('DPMS disabled');
    }
  }
}
