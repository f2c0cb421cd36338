import { describe, it, expect, vi, beforeEach } from 'vitest';

const mocks = vi.hoisted(() => {
  interface FakeChild {
    errorHandler: ((error: Error) => void) | null;
    once: (event: string, handler: (error: Error) => void) => FakeChild;
    unref: () => void;
  }
  const children: FakeChild[] = [];
  const unref = vi.fn();
  const createChild = (): FakeChild => {
    const child: FakeChild = {
      errorHandler: null,
      once(event, handler) {
        if (event === 'error') {
          child.errorHandler = handler;
        }
        return child;
      },
      unref,
    };
    children.push(child);
    return child;
  };
  return { children, unref, createChild };
});

vi.mock('node:child_process', () => ({
  spawn: vi.fn(() => mocks.createChild()),
}));

import { spawn } from 'node:child_process';
import { CommandNotifier, createNotifier, silentNotifier } from '@/lib/notifier.js';

describe('CommandNotifier', () => {
  beforeEach(() => {
    vi.mocked(spawn).mockClear();
    mocks.unref.mockClear();
    mocks.children.length = 0;
  });

  it('spawns the command detached with title and body', () => {
    const notifier = new CommandNotifier('notify-send');
    notifier.notify({ title: 'Work session complete', body: 'Time for a break.' });

    expect(spawn).toHaveBeenCalledWith('notify-send', ['Work session complete', 'Time for a break.'], {
      detached: true,
      stdio: 'ignore',
    });
    expect(mocks.unref).toHaveBeenCalledTimes(1);
  });

  it('disables itself after the command fails to start', () => {
    const notifier = new CommandNotifier('missing-notifier');
    notifier.notify({ title: 'a', body: 'b' });
    mocks.children[0]?.errorHandler?.(new Error('spawn missing-notifier ENOENT'));

    expect(notifier.isAvailable()).toBe(false);

    notifier.notify({ title: 'c', body: 'd' });
    expect(spawn).toHaveBeenCalledTimes(1);
  });

  it('disables itself when spawn throws', () => {
    vi.mocked(spawn).mockImplementationOnce(() => {
      throw new Error('bad arguments');
    });
    const notifier = new CommandNotifier('notify-send');

    expect(() => notifier.notify({ title: 'a', body: 'b' })).not.toThrow();
    expect(notifier.isAvailable()).toBe(false);
  });
});

describe('createNotifier', () => {
  it('returns the silent notifier when disabled', () => {
    expect(createNotifier({ enabled: false, command: 'notify-send' })).toBe(silentNotifier);
  });

  it('returns a command notifier when enabled', () => {
    expect(createNotifier({ enabled: true, command: 'notify-send' })).toBeInstanceOf(CommandNotifier);
  });
});
