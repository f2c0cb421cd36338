/**
 * `pomobar display`: the long-running status widget.
 *
 * Owns the session, binds the well-known endpoint and runs the listener loop
 * until SIGINT or SIGTERM.
 */

import type { PomobarConfig } from '../types/config.js';
import { sessionDurations } from '../lib/config.js';
import { CommandEndpoint } from '../lib/endpoint.js';
import type { CommandSource } from '../lib/endpoint.js';
import { createNotifier } from '../lib/notifier.js';
import type { Notifier } from '../lib/notifier.js';
import { Session } from '../lib/session.js';
import { installListenerSignalHandlers, runListener } from '../runner/listener.js';
import type { ListenerResult, RenderSink } from '../runner/listener.js';

export interface DisplayDeps {
  /** Binds the endpoint; defaults to CommandEndpoint.bind */
  bind?: (socketPath: string) => Promise<CommandSource & { close(): Promise<void> }>;
  notifier?: Notifier;
  sink?: RenderSink;
  signal?: AbortSignal;
  maxCycles?: number;
}

/**
 * Runs the display until aborted.
 *
 * @throws {BindError} If the endpoint cannot be bound
 */
export async function displayCommand(config: PomobarConfig, deps: DisplayDeps = {}): Promise<ListenerResult> {
  const bind = deps.bind ?? CommandEndpoint.bind;
  const session = new Session(sessionDurations(config), {
    notifier: deps.notifier ?? createNotifier(config.notifications),
  });

  const endpoint = await bind(config.socket_path);

  const controller = new AbortController();
  const forwardAbort = (): void => controller.abort();
  deps.signal?.addEventListener('abort', forwardAbort, { once: true });
  const cleanupSignalHandlers = installListenerSignalHandlers(controller);

  try {
    return await runListener(session, endpoint, {
      pollIntervalMs: config.poll_interval_ms,
      render: { format: config.output, glyphs: config.glyphs },
      sink: deps.sink ?? process.stdout,
      signal: controller.signal,
      maxCycles: deps.maxCycles,
    });
  } finally {
    cleanupSignalHandlers();
    deps.signal?.removeEventListener('abort', forwardAbort);
    await endpoint.close();
  }
}
