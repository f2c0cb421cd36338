/**
 * Desktop notification capability.
 *
 * The timer only knows the Notifier interface. The production implementation
 * spawns an external command fire-and-forget; when that command is missing the
 * notifier quietly disables itself.
 */

import { spawn } from 'node:child_process';
import type { NotificationsConfig } from '../types/config.js';

/**
 * Notification title and body.
 */
export interface NotificationMessage {
  title: string;
  body: string;
}

/**
 * Side-effecting notification capability injected into timers.
 */
export interface Notifier {
  notify(message: NotificationMessage): void;
}

/**
 * Notifier that does nothing. Used when notifications are disabled.
 */
export const silentNotifier: Notifier = {
  notify(): void {},
};

/**
 * Notifier backed by an external command such as `notify-send`.
 */
export class CommandNotifier implements Notifier {
  private available = true;

  constructor(private readonly command: string) {}

  /** False once a spawn attempt has failed */
  isAvailable(): boolean {
    return this.available;
  }

  notify(message: NotificationMessage): void {
    if (!this.available) {
      return;
    }

    try {
      const child = spawn(this.command, [message.title, message.body], {
        detached: true,
        stdio: 'ignore',
      });
      // ENOENT and friends arrive asynchronously
      child.once('error', () => {
        this.available = false;
      });
      child.unref();
    } catch {
      this.available = false;
    }
  }
}

/**
 * Builds the notifier described by the configuration.
 */
export function createNotifier(config: NotificationsConfig): Notifier {
  if (!config.enabled) {
    return silentNotifier;
  }
  return new CommandNotifier(config.command);
}
