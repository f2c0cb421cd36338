/**
 * Client subcommands: `toggle`, `end`, `lock` and `time <±amount>`.
 *
 * Each invocation builds exactly one command, sends it and exits.
 */

import { InvalidArgumentError } from 'commander';
import type { AdjustTimeCommand, Command } from '../types/command.js';
import { parseAmount } from '../lib/protocol.js';
import { DispatchError, sendCommand } from '../runner/dispatch.js';
import type { DispatchOptions } from '../runner/dispatch.js';

/**
 * Parses a time adjustment argument: `+60` adds, `-60` subtracts, a bare
 * `60` adds. The magnitude must be plain digits.
 *
 * Usable as a commander argument parser.
 *
 * @throws {InvalidArgumentError} On anything else
 */
export function parseAdjustment(value: string): AdjustTimeCommand {
  let direction: AdjustTimeCommand['direction'] = 'add';
  let digits = value;

  if (value.startsWith('+')) {
    digits = value.slice(1);
  } else if (value.startsWith('-')) {
    direction = 'sub';
    digits = value.slice(1);
  }

  const amount = parseAmount(digits);
  if (amount === null) {
    throw new InvalidArgumentError(`Expected [+|-]<seconds>, got '${value}'.`);
  }
  return { type: 'adjust-time', direction, amount };
}

/**
 * Sends one command and reports a delivery failure on stderr.
 *
 * @returns true if the command was delivered
 */
export async function sendCommandAndReport(
  socketPath: string,
  command: Command,
  options: DispatchOptions = {}
): Promise<boolean> {
  try {
    await sendCommand(socketPath, command, options);
    return true;
  } catch (error) {
    if (error instanceof DispatchError) {
      console.error(error.message);
      return false;
    }
    throw error;
  }
}
