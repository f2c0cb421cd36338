/**
 * Test helpers: a manually driven clock, a recording notifier, a scripted
 * command source and a minimal configuration.
 */

import type { PomobarConfig } from '@/types/config.js';
import type { Clock } from '@/types/session.js';
import type { NotificationMessage, Notifier } from '@/lib/notifier.js';
import type { CommandSource } from '@/lib/endpoint.js';

export interface FakeClock {
  clock: Clock;
  /** Moves time forward by whole seconds */
  advanceSeconds(seconds: number): void;
  now(): number;
}

export function createFakeClock(startMs = 1_000): FakeClock {
  let current = startMs;
  return {
    clock: () => current,
    advanceSeconds(seconds: number) {
      current += seconds * 1000;
    },
    now: () => current,
  };
}

export interface RecordingNotifier extends Notifier {
  messages: NotificationMessage[];
}

export function createRecordingNotifier(): RecordingNotifier {
  const messages: NotificationMessage[] = [];
  return {
    messages,
    notify(message: NotificationMessage) {
      messages.push(message);
    },
  };
}

/**
 * Command source fed from a script of per-cycle deliveries.
 *
 * Each `receive()` first lets `onWait` simulate the passage of the wait
 * window, then hands out the oldest queued message, if any.
 */
export class ScriptedSource implements CommandSource {
  readonly queue: Buffer[] = [];
  readonly waits: number[] = [];

  constructor(private readonly onWait: (timeoutMs: number) => void = () => undefined) {}

  push(...messages: string[]): void {
    for (const message of messages) {
      this.queue.push(Buffer.from(message, 'utf-8'));
    }
  }

  async receive(timeoutMs: number): Promise<Buffer | null> {
    this.waits.push(timeoutMs);
    this.onWait(timeoutMs);
    return this.queue.shift() ?? null;
  }
}

/**
 * Collects rendered lines.
 */
export class MemorySink {
  readonly lines: string[] = [];

  write(line: string): boolean {
    this.lines.push(line.replace(/\n$/, ''));
    return true;
  }
}

export function createMockConfig(overrides: Partial<PomobarConfig> = {}): PomobarConfig {
  return {
    work_minutes: 25,
    break_minutes: 5,
    socket_path: '/tmp/pomobar-test.sock',
    poll_interval_ms: 900,
    output: 'plain',
    glyphs: { work: 'W', break: 'B' },
    notifications: { enabled: false, command: 'notify-send' },
    ...overrides,
  };
}
