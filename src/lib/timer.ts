/**
 * Countdown timer with overtime and a one-shot zero-crossing notification.
 *
 * Elapsed time is measured between `tick()` re-bases. Within one display cycle
 * callers run `advance()` (when the timer is running) and then `tick()`, so
 * time spent paused never accrues.
 */

import type { AdjustDirection } from '../types/command.js';
import type { Clock } from '../types/session.js';
import type { NotificationMessage, Notifier } from './notifier.js';
import { silentNotifier } from './notifier.js';

const SECONDS_PER_MINUTE = 60;
const SECONDS_PER_HOUR = 60 * SECONDS_PER_MINUTE;
const SECONDS_PER_DAY = 24 * SECONDS_PER_HOUR;

/** Monotonic milliseconds from the process performance timer */
export const systemClock: Clock = () => performance.now();

/**
 * Options for constructing a Timer.
 */
export interface TimerOptions {
  clock?: Clock;
  notifier?: Notifier;
  /** Sent to the notifier when the timer first goes negative */
  message?: NotificationMessage;
}

const DEFAULT_MESSAGE: NotificationMessage = {
  title: 'Timer finished',
  body: 'Time is up.',
};

function pad2(value: number): string {
  return value.toString().padStart(2, '0');
}

/**
 * Formats signed seconds as `[D:][HH:]MM:SS`.
 *
 * Fractions of a second are truncated. A leading `-` marks overtime.
 *
 * @example
 * ```typescript
 * formatRemaining(125);   // "02:05"
 * formatRemaining(-5);    // "-00:05"
 * formatRemaining(90000); // "1:01:00:00"
 * ```
 */
export function formatRemaining(seconds: number): string {
  const sign = seconds < 0 ? '-' : '';
  const total = Math.floor(Math.abs(seconds));

  const days = Math.floor(total / SECONDS_PER_DAY);
  const hours = Math.floor((total % SECONDS_PER_DAY) / SECONDS_PER_HOUR);
  const minutes = Math.floor((total % SECONDS_PER_HOUR) / SECONDS_PER_MINUTE);
  const secs = total % SECONDS_PER_MINUTE;

  let out = sign;
  if (days >= 1) {
    out += `${days}:`;
  }
  if (days >= 1 || hours >= 1) {
    out += `${pad2(hours)}:`;
  }
  return `${out}${pad2(minutes)}:${pad2(secs)}`;
}

export class Timer {
  private _remaining: number;
  private _lastTick: number;
  private _notified = false;
  private readonly clock: Clock;
  private readonly notifier: Notifier;
  private readonly message: NotificationMessage;

  constructor(durationSeconds: number, options: TimerOptions = {}) {
    this.clock = options.clock ?? systemClock;
    this.notifier = options.notifier ?? silentNotifier;
    this.message = options.message ?? DEFAULT_MESSAGE;
    this._remaining = durationSeconds;
    this._lastTick = this.clock();
  }

  get remaining(): number {
    return this._remaining;
  }

  get lastTick(): number {
    return this._lastTick;
  }

  get notified(): boolean {
    return this._notified;
  }

  /**
   * Re-bases the elapsed-time window without touching `remaining`.
   */
  tick(): void {
    this._lastTick = this.clock();
  }

  /**
   * Subtracts the time elapsed since the last `tick()`.
   *
   * The first time `remaining` is observed below zero the notifier fires.
   * It never fires again for this instance.
   */
  advance(): void {
    const deltaSeconds = (this.clock() - this._lastTick) / 1000;
    this._remaining -= deltaSeconds;

    if (this._remaining < 0 && !this._notified) {
      this._notified = true;
      this.notifier.notify(this.message);
    }
  }

  /**
   * Moves `remaining` by whole seconds. Does not re-arm the notification.
   */
  adjust(direction: AdjustDirection, amountSeconds: number): void {
    this._remaining += direction === 'add' ? amountSeconds : -amountSeconds;
  }

  format(): string {
    return formatRemaining(this._remaining);
  }
}
