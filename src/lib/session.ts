/**
 * Work/break session state machine.
 *
 * States are {work, break} × {running, paused} × {locked, unlocked}; a new
 * session starts in work, paused and locked. Exactly one Timer is live at a
 * time and it is replaced, never reused, on every phase change.
 */

import type { AdjustDirection } from '../types/command.js';
import type { Clock, Phase, SessionSnapshot } from '../types/session.js';
import type { NotificationMessage, Notifier } from './notifier.js';
import { silentNotifier } from './notifier.js';
import { Timer, systemClock } from './timer.js';
import type { RenderOptions } from './render.js';
import { DEFAULT_RENDER_OPTIONS, renderLine } from './render.js';

/**
 * Phase lengths captured when the session is created.
 */
export interface SessionDurations {
  workSeconds: number;
  breakSeconds: number;
}

export interface SessionDeps {
  clock?: Clock;
  notifier?: Notifier;
}

/** Notification sent when the timer of the given phase runs out */
export const PHASE_END_MESSAGES: Record<Phase, NotificationMessage> = {
  work: { title: 'Work session complete', body: 'Time for a break.' },
  break: { title: 'Break is over', body: 'Back to work.' },
};

export class Session {
  readonly workSeconds: number;
  readonly breakSeconds: number;

  private _phase: Phase = 'work';
  private _active = false;
  private _locked = true;
  private _timer: Timer;
  private readonly clock: Clock;
  private readonly notifier: Notifier;

  constructor(durations: SessionDurations, deps: SessionDeps = {}) {
    this.workSeconds = durations.workSeconds;
    this.breakSeconds = durations.breakSeconds;
    this.clock = deps.clock ?? systemClock;
    this.notifier = deps.notifier ?? silentNotifier;
    this._timer = this.createTimer('work');
  }

  get phase(): Phase {
    return this._phase;
  }

  get active(): boolean {
    return this._active;
  }

  get locked(): boolean {
    return this._locked;
  }

  get timer(): Timer {
    return this._timer;
  }

  toggleActive(): void {
    this._active = !this._active;
  }

  toggleLock(): void {
    this._locked = !this._locked;
  }

  /**
   * Per-cycle update. Runs every cycle, paused or not, so the next advance
   * only measures time spent running.
   */
  advanceTime(): void {
    if (this._active) {
      this._timer.advance();
    }
    this._timer.tick();
  }

  /**
   * Ends the current phase. The next phase always starts paused.
   */
  completePhase(): void {
    this._active = false;
    this._phase = this._phase === 'work' ? 'break' : 'work';
    this._timer = this.createTimer(this._phase);
  }

  /**
   * Adjusts the live timer unless the session is locked.
   */
  adjustTime(direction: AdjustDirection, amountSeconds: number): void {
    if (this._locked) {
      return;
    }
    this._timer.adjust(direction, amountSeconds);
  }

  snapshot(): SessionSnapshot {
    return {
      phase: this._phase,
      active: this._active,
      locked: this._locked,
      remaining: this._timer.remaining,
      notified: this._timer.notified,
      text: this._timer.format(),
    };
  }

  render(options: RenderOptions = DEFAULT_RENDER_OPTIONS): string {
    return renderLine(this.snapshot(), options);
  }

  private createTimer(phase: Phase): Timer {
    return new Timer(phase === 'work' ? this.workSeconds : this.breakSeconds, {
      clock: this.clock,
      notifier: this.notifier,
      message: PHASE_END_MESSAGES[phase],
    });
  }
}
