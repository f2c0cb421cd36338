/**
 * Command type definitions for the display control protocol.
 *
 * A command is decoded from one wire message, applied once to the session
 * and discarded.
 */

/** Direction of a manual time adjustment */
export type AdjustDirection = 'add' | 'sub';

/** Start or pause the running timer */
export interface ToggleCommand {
  type: 'toggle';
}

/** Finish the current phase and move to the next one */
export interface CompleteCommand {
  type: 'complete';
}

/** Flip the lock that gates time adjustments */
export interface ToggleLockCommand {
  type: 'toggle-lock';
}

/** Add or subtract whole seconds from the running timer */
export interface AdjustTimeCommand {
  type: 'adjust-time';
  direction: AdjustDirection;
  /** Non-negative whole seconds */
  amount: number;
}

export type Command = ToggleCommand | CompleteCommand | ToggleLockCommand | AdjustTimeCommand;

export type CommandType = Command['type'];

/**
 * Result of decoding a wire message.
 *
 * Decoding never throws; malformed input yields `ok: false` with a
 * human-readable reason.
 */
export type DecodeResult = { ok: true; command: Command } | { ok: false; error: string };
