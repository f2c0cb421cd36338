/**
 * Session type definitions.
 */

/** Kind of the current session phase */
export type Phase = 'work' | 'break';

/**
 * Read-only view of a session at one instant.
 */
export interface SessionSnapshot {
  phase: Phase;
  active: boolean;
  locked: boolean;
  /** Signed seconds left on the live timer (negative in overtime) */
  remaining: number;
  /** Whether the live timer already fired its zero-crossing notification */
  notified: boolean;
  /** Formatted remaining time, e.g. "24:59" or "-00:05" */
  text: string;
}

/**
 * Monotonic clock returning milliseconds.
 */
export type Clock = () => number;
