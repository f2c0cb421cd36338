/**
 * Display process control loop.
 *
 * Each cycle renders the session, advances its timer and then waits a
 * bounded window for at most one command. Commands arriving faster than that
 * stay queued in the source and are applied on later cycles, one per cycle.
 */

import type { CommandSource } from '../lib/endpoint.js';
import type { RenderOptions } from '../lib/render.js';
import { DEFAULT_RENDER_OPTIONS } from '../lib/render.js';
import { applyCommand, decodeMessage } from '../lib/protocol.js';
import type { Session } from '../lib/session.js';

/** Default wait for a command per cycle */
export const DEFAULT_POLL_INTERVAL_MS = 900;

/**
 * Where rendered lines go. `process.stdout` satisfies this.
 */
export interface RenderSink {
  write(line: string): unknown;
}

export interface ListenerOptions {
  /** Longest wait for a command in one cycle */
  pollIntervalMs?: number;
  render?: RenderOptions;
  sink?: RenderSink;
  /** Stops the loop after the current wait */
  signal?: AbortSignal;
  /** Stop after this many cycles */
  maxCycles?: number;
}

/** Why the loop returned */
export type ListenerStopReason = 'aborted' | 'max_cycles';

export interface ListenerResult {
  cycles: number;
  commandsApplied: number;
  commandsRejected: number;
  stop_reason: ListenerStopReason;
}

/**
 * Runs one listener cycle: render, advance, drain at most one command.
 *
 * @returns 'applied', 'rejected' or 'idle'
 */
export async function runCycle(
  session: Session,
  source: CommandSource,
  options: Required<Pick<ListenerOptions, 'pollIntervalMs' | 'render' | 'sink'>> & { signal?: AbortSignal }
): Promise<'applied' | 'rejected' | 'idle'> {
  options.sink.write(`${session.render(options.render)}\n`);
  session.advanceTime();

  const message = await source.receive(options.pollIntervalMs, options.signal);
  if (message === null) {
    return 'idle';
  }

  const decoded = decodeMessage(message);
  if (!decoded.ok) {
    console.warn(`[listener] Ignoring malformed command: ${decoded.error}`);
    return 'rejected';
  }

  applyCommand(session, decoded.command);
  return 'applied';
}

/**
 * Runs the listener loop until aborted or `maxCycles` is reached.
 */
export async function runListener(
  session: Session,
  source: CommandSource,
  options: ListenerOptions = {}
): Promise<ListenerResult> {
  const cycleOptions = {
    pollIntervalMs: options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS,
    render: options.render ?? DEFAULT_RENDER_OPTIONS,
    sink: options.sink ?? process.stdout,
    signal: options.signal,
  };

  let cycles = 0;
  let commandsApplied = 0;
  let commandsRejected = 0;

  while (true) {
    if (options.signal?.aborted) {
      return { cycles, commandsApplied, commandsRejected, stop_reason: 'aborted' };
    }
    if (options.maxCycles !== undefined && cycles >= options.maxCycles) {
      return { cycles, commandsApplied, commandsRejected, stop_reason: 'max_cycles' };
    }

    const outcome = await runCycle(session, source, cycleOptions);
    cycles++;
    if (outcome === 'applied') {
      commandsApplied++;
    } else if (outcome === 'rejected') {
      commandsRejected++;
    }
  }
}

/**
 * Installs SIGINT/SIGTERM handlers that abort the listener.
 *
 * @returns Function removing the handlers
 */
export function installListenerSignalHandlers(controller: AbortController): () => void {
  const sigintHandler = (): void => {
    console.warn('\n[listener] SIGINT received, shutting down');
    process.exitCode = 130;
    controller.abort();
  };
  const sigtermHandler = (): void => {
    console.warn('[listener] SIGTERM received, shutting down');
    controller.abort();
  };

  process.on('SIGINT', sigintHandler);
  process.on('SIGTERM', sigtermHandler);

  return () => {
    process.off('SIGINT', sigintHandler);
    process.off('SIGTERM', sigtermHandler);
  };
}
