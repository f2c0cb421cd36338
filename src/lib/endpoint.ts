/**
 * Well-known endpoint of the display process.
 *
 * The display binds a Unix-domain socket at a fixed path. Every client
 * connection carries exactly one message, terminated by the client closing
 * its write side. Received messages queue up and are handed out one per
 * `receive()` call.
 *
 * Binding is a forcible takeover: any file already at the path is removed
 * first. Release only removes the file while it is still the one this
 * process bound, so an instance that was taken over leaves its successor's
 * endpoint alone.
 */

import { createServer } from 'node:net';
import type { Server, Socket } from 'node:net';
import { statSync, unlinkSync } from 'node:fs';
import { stat } from 'node:fs/promises';
import { errnoCode, removeIfPresent } from './fs.js';
import { MAX_MESSAGE_BYTES } from './protocol.js';

/** How long a client may hold a connection open without finishing its message */
export const DEFAULT_CONNECTION_IDLE_MS = 5000;

export interface EndpointOptions {
  connectionIdleMs?: number;
}

/**
 * Error thrown when the endpoint cannot be bound. Fatal at startup.
 */
export class BindError extends Error {
  constructor(
    message: string,
    public readonly socketPath: string,
    public readonly code?: string
  ) {
    super(message);
    this.name = 'BindError';
  }
}

/**
 * Source of raw command messages for the listener loop.
 */
export interface CommandSource {
  /**
   * Resolves with the next message, or null when `timeoutMs` elapses, the
   * signal aborts or the source is closed.
   */
  receive(timeoutMs: number, signal?: AbortSignal): Promise<Buffer | null>;
}

interface FileIdentity {
  dev: number;
  ino: number;
}

function sameFile(a: FileIdentity, b: FileIdentity): boolean {
  return a.dev === b.dev && a.ino === b.ino;
}

export class CommandEndpoint implements CommandSource {
  private readonly server: Server;
  private readonly connections = new Set<Socket>();
  private readonly pending: Buffer[] = [];
  private waiter: ((message: Buffer | null) => void) | null = null;
  private identity: FileIdentity | null = null;
  private closed = false;
  private readonly exitHandler = (): void => this.releaseOnExit();

  private constructor(
    readonly socketPath: string,
    private readonly connectionIdleMs: number
  ) {
    this.server = createServer((socket) => this.handleConnection(socket));
  }

  /**
   * Removes any stale file at `socketPath` and binds a fresh endpoint there.
   *
   * @throws {BindError} If the bind fails
   */
  static async bind(socketPath: string, options: EndpointOptions = {}): Promise<CommandEndpoint> {
    try {
      if (await removeIfPresent(socketPath)) {
        console.warn(`[endpoint] Replaced existing endpoint at ${socketPath}`);
      }
    } catch (error) {
      // The bind below decides whether this was fatal
      console.warn(`[endpoint] ${error instanceof Error ? error.message : String(error)}`);
    }

    const endpoint = new CommandEndpoint(socketPath, options.connectionIdleMs ?? DEFAULT_CONNECTION_IDLE_MS);
    await endpoint.listen();
    return endpoint;
  }

  /** Number of messages received but not yet handed out */
  get pendingCount(): number {
    return this.pending.length;
  }

  /** Number of client connections still open */
  get connectionCount(): number {
    return this.connections.size;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  receive(timeoutMs: number, signal?: AbortSignal): Promise<Buffer | null> {
    const next = this.pending.shift();
    if (next !== undefined) {
      return Promise.resolve(next);
    }
    if (this.closed || signal?.aborted) {
      return Promise.resolve(null);
    }
    if (this.waiter !== null) {
      return Promise.reject(new Error('receive() is already pending'));
    }

    return new Promise((resolve) => {
      const finish = (message: Buffer | null): void => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        if (this.waiter === finish) {
          this.waiter = null;
        }
        resolve(message);
      };
      const onAbort = (): void => finish(null);
      const timer = setTimeout(() => finish(null), timeoutMs);
      signal?.addEventListener('abort', onAbort, { once: true });
      this.waiter = finish;
    });
  }

  /**
   * Stops accepting messages and releases the endpoint file.
   */
  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    process.off('exit', this.exitHandler);

    const waiter = this.waiter;
    this.waiter = null;
    waiter?.(null);

    for (const socket of this.connections) {
      socket.destroy();
    }
    this.connections.clear();

    // Closing a bound Unix socket unlinks its path by name, which would
    // delete a successor's endpoint after a takeover.
    if (!(await this.ownsSocketFile())) {
      this.server.unref();
      return;
    }

    await new Promise<void>((resolve) => {
      this.server.close(() => resolve());
    });
    try {
      await removeIfPresent(this.socketPath);
    } catch (error) {
      console.warn(`[endpoint] ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  private listen(): Promise<void> {
    return new Promise((resolve, reject) => {
      const onError = (error: Error): void => {
        reject(
          new BindError(`Failed to bind endpoint at ${this.socketPath}: ${error.message}`, this.socketPath, errnoCode(error))
        );
      };

      this.server.once('error', onError);
      this.server.listen(this.socketPath, () => {
        this.server.off('error', onError);
        this.server.on('error', (error) => {
          console.warn(`[endpoint] Server error: ${error.message}`);
        });

        stat(this.socketPath).then(
          (info) => {
            this.identity = { dev: info.dev, ino: info.ino };
            process.on('exit', this.exitHandler);
            resolve();
          },
          (error: unknown) => {
            this.server.close();
            reject(
              new BindError(
                `Endpoint at ${this.socketPath} vanished after bind: ${error instanceof Error ? error.message : String(error)}`,
                this.socketPath,
                errnoCode(error)
              )
            );
          }
        );
      });
    });
  }

  private handleConnection(socket: Socket): void {
    this.connections.add(socket);
    const chunks: Buffer[] = [];
    let size = 0;
    let dropped = false;

    socket.setTimeout(this.connectionIdleMs, () => {
      dropped = true;
      console.warn(`[endpoint] Closing client connection idle for ${this.connectionIdleMs} ms`);
      socket.destroy();
    });

    socket.on('data', (chunk: Buffer) => {
      if (dropped) {
        return;
      }
      size += chunk.byteLength;
      if (size > MAX_MESSAGE_BYTES) {
        dropped = true;
        console.warn(`[endpoint] Dropping message larger than ${MAX_MESSAGE_BYTES} bytes`);
        socket.destroy();
        return;
      }
      chunks.push(chunk);
    });

    socket.on('end', () => {
      // Zero-length connections are liveness probes, not commands
      if (!dropped && size > 0) {
        this.enqueue(Buffer.concat(chunks));
      }
    });

    socket.on('error', (error) => {
      dropped = true;
      console.warn(`[endpoint] Client connection error: ${error.message}`);
    });

    socket.on('close', () => {
      this.connections.delete(socket);
    });
  }

  private enqueue(message: Buffer): void {
    if (this.closed) {
      return;
    }
    const waiter = this.waiter;
    if (waiter !== null) {
      this.waiter = null;
      waiter(message);
      return;
    }
    this.pending.push(message);
  }

  private async ownsSocketFile(): Promise<boolean> {
    if (this.identity === null) {
      return false;
    }
    try {
      const info = await stat(this.socketPath);
      return sameFile(this.identity, { dev: info.dev, ino: info.ino });
    } catch {
      return false;
    }
  }

  private releaseOnExit(): void {
    if (this.identity === null) {
      return;
    }
    try {
      const info = statSync(this.socketPath);
      if (sameFile(this.identity, { dev: info.dev, ino: info.ino })) {
        unlinkSync(this.socketPath);
      }
    } catch (error) {
      if (errnoCode(error) !== 'ENOENT') {
        console.warn(`[endpoint] Failed to remove ${this.socketPath} on exit: ${error instanceof Error ? error.message : String(error)}`);
      }
    }
  }
}
