/**
 * One-shot command sender used by the client subcommands.
 *
 * Connects to the display's endpoint, writes one encoded command, closes the
 * write side and returns once the bytes are flushed. No reply is expected
 * and nothing is retried.
 */

import { createConnection } from 'node:net';
import type { Command } from '../types/command.js';
import { encodeCommand } from '../lib/protocol.js';
import { errnoCode } from '../lib/fs.js';

/** Default upper bound for connecting and flushing */
export const DEFAULT_DISPATCH_TIMEOUT_MS = 2000;

/**
 * Error thrown when a command could not be delivered.
 */
export class DispatchError extends Error {
  constructor(
    message: string,
    public readonly socketPath: string,
    public readonly code?: string
  ) {
    super(message);
    this.name = 'DispatchError';
  }
}

export interface DispatchOptions {
  timeoutMs?: number;
}

function describeFailure(socketPath: string, error: Error): string {
  const code = errnoCode(error);
  if (code === 'ENOENT' || code === 'ECONNREFUSED') {
    return `No display is listening on ${socketPath}`;
  }
  return `Failed to send command to ${socketPath}: ${error.message}`;
}

/**
 * Sends one command to the display listening on `socketPath`.
 *
 * @throws {DispatchError} If no display is listening, the connection fails
 *   or the send does not complete within the timeout
 */
export function sendCommand(socketPath: string, command: Command, options: DispatchOptions = {}): Promise<void> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_DISPATCH_TIMEOUT_MS;
  const payload = encodeCommand(command);

  return new Promise((resolve, reject) => {
    const socket = createConnection(socketPath);
    let settled = false;

    const settle = (error?: DispatchError): void => {
      if (settled) {
        return;
      }
      settled = true;
      socket.destroy();
      if (error) {
        reject(error);
      } else {
        resolve();
      }
    };

    socket.setTimeout(timeoutMs, () => {
      settle(new DispatchError(`Timed out sending command to ${socketPath}`, socketPath, 'ETIMEDOUT'));
    });

    socket.on('error', (error) => {
      settle(new DispatchError(describeFailure(socketPath, error), socketPath, errnoCode(error)));
    });

    socket.once('connect', () => {
      socket.end(payload, () => settle());
    });
  });
}
