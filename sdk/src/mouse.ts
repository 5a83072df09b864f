import { EventEmitter } from 'events';
import { Validator, deferred, logger } from '@icepanel/utils';
import type { Deferred, IntegerRange } from '@icepanel/utils';
import type { XsetClient } from './xset.js';
import type { PointerSettings } from './types.js';

export const POINTER_RANGES = {
  acceleration: { min: 1, max: 20 },
  threshold: { min: 1, max: 10 },
} satisfies Record<string, IntegerRange>;

export const DEFAULT_POINTER: PointerSettings = { acceleration: 4, threshold: 4 };

export const REVERT_TIMEOUT_MS = 7000;

/** Settings exactly as xset reported them, kept for reverting. */
export interface PointerSnapshot {
  acceleration: string;
  threshold: number;
}

export interface PointerReading {
  current: PointerSettings;
  original: PointerSnapshot;
}

export type TrialOutcome = 'kept' | 'reverted';

export class MouseService {
  private xset: XsetClient;

  constructor(xset: XsetClient) {
    this.xset = xset;
  }

  async read(): Promise<PointerReading> {
    const { pointer } = await this.xset.query();
    const { numerator, denominator } = pointer.acceleration;
    return {
      current: { acceleration: numerator, threshold: pointer.threshold },
      original: { acceleration: `${numerator}/${denominator}`, threshold: pointer.threshold },
    };
  }

  async apply(settings: PointerSettings): Promise<void> {
    Validator.inRange('Acceleration', settings.acceleration, POINTER_RANGES.acceleration);
    Validator.inRange('Threshold', settings.threshold, POINTER_RANGES.threshold);
    await this.xset.setPointer(settings.acceleration, settings.threshold);
  }

  async revert(snapshot: PointerSnapshot): Promise<void> {
    await this.xset.setPointer(snapshot.acceleration, snapshot.threshold);
    logger.debug('pointer settings reverted', { ...snapshot });
  }

  /**
   * Apply `settings` and return a started trial that reverts to the previous
   * values unless kept within `timeoutMs`.
   */
  async startTrial(settings: PointerSettings, timeoutMs = REVERT_TIMEOUT_MS): Promise<PointerTrial> {
    const { original } = await this.read();
    await this.apply(settings);
    const trial = new PointerTrial(this, original, timeoutMs);
    trial.start();
    return trial;
  }
}

/**
 * Emits `tick` with the seconds left once per second, and `reverted` after the
 * original settings are restored.
 */
export class PointerTrial extends EventEmitter {
  readonly original: PointerSnapshot;
  private service: MouseService;
  private timeoutMs: number;
  private outcome?: TrialOutcome;
  private settle: Deferred<TrialOutcome>;
  private revertTimer?: NodeJS.Timeout;
  private tickTimer?: NodeJS.Timeout;

  constructor(service: MouseService, original: PointerSnapshot, timeoutMs = REVERT_TIMEOUT_MS) {
    super();
    this.service = service;
    this.original = original;
    this.timeoutMs = timeoutMs;
    this.settle = deferred<TrialOutcome>();
  }

  get settled(): Promise<TrialOutcome> {
    return this.settle.promise;
  }

  get isSettled(): boolean {
    return this.outcome !== undefined;
  }

  start() {
    if (this.revertTimer || this.outcome) return;

    let remaining = Math.ceil(this.timeoutMs / 1000);
    this.emit('tick', remaining);
    this.tickTimer = setInterval(() => {
      remaining = Math.max(0, remaining - 1);
      this.emit('tick', remaining);
    }, 1000);
    this.revertTimer = setTimeout(() => {
      this.revert().catch((error: unknown) => {
        logger.warn('could not restore pointer settings', { error: String(error) });
      });
    }, this.timeoutMs);
  }

  keep(): Promise<TrialOutcome> {
    if (!this.outcome) {
      this.outcome = 'kept';
      this.clearTimers();
      this.settle.resolve('kept');
    }
    return this.settled;
  }

  revert(): Promise<TrialOutcome> {
    if (!this.outcome) {
      this.outcome = 'reverted';
      this.clearTimers();
      void this.service.revert(this.original).then(
        () => {
          this.emit('reverted');
          this.settle.resolve('reverted');
        },
        (error: unknown) => this.settle.reject(error),
      );
    }
    return this.settled;
  }

  private clearTimers() {
    if (this.revertTimer) {
      clearTimeout(this.revertTimer);
      this.revertTimer = undefined;
    }
    if (this.tickTimer) {
      clearInterval(this.tickTimer);
      this.tickTimer = undefined;
    }
  }
}
