import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { InvalidArgumentError } from 'commander';
import { mkdtemp, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { parseAdjustment, sendCommandAndReport } from '@/commands/send.js';
import { CommandEndpoint } from '@/lib/endpoint.js';

describe('parseAdjustment', () => {
  it('maps a leading + to add and - to sub', () => {
    expect(parseAdjustment('+60')).toEqual({ type: 'adjust-time', direction: 'add', amount: 60 });
    expect(parseAdjustment('-300')).toEqual({ type: 'adjust-time', direction: 'sub', amount: 300 });
  });

  it('treats an unsigned amount as add', () => {
    expect(parseAdjustment('15')).toEqual({ type: 'adjust-time', direction: 'add', amount: 15 });
  });

  it('rejects anything but digits after the sign', () => {
    for (const value of ['', '+', '-', '1m', '+-5', '--5', '1.5', ' 5']) {
      expect(() => parseAdjustment(value)).toThrow(InvalidArgumentError);
    }
  });
});

describe('sendCommandAndReport', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), 'pomobar-send-'));
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(testDir, { recursive: true, force: true });
  });

  it('returns true once the command is delivered', async () => {
    const socketPath = join(testDir, 'pomobar.sock');
    const endpoint = await CommandEndpoint.bind(socketPath);
    try {
      expect(await sendCommandAndReport(socketPath, { type: 'complete' })).toBe(true);
      expect((await endpoint.receive(5_000))?.toString()).toBe('end');
    } finally {
      await endpoint.close();
    }
  });

  it('prints the failure and returns false when no display listens', async () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const socketPath = join(testDir, 'absent.sock');

    expect(await sendCommandAndReport(socketPath, { type: 'toggle' })).toBe(false);
    expect(error).toHaveBeenCalledWith(`No display is listening on ${socketPath}`);
  });
});
