/**
 * Wire protocol between client invocations and the display process.
 *
 * One message is a single UTF-8 line of whitespace-separated fields:
 *
 *   toggle              start or pause
 *   end                 complete the current phase
 *   lock                toggle the adjustment lock
 *   time <add|sub> <n>  adjust by n whole seconds
 *
 * The channel carries no schema, so the decoder re-validates everything the
 * client side already checked.
 */

import type { AdjustDirection, Command, DecodeResult } from '../types/command.js';
import type { Session } from './session.js';

/** Largest message the display accepts, in bytes */
export const MAX_MESSAGE_BYTES = 1024;

const DIGITS = /^\d+$/;

const utf8 = new TextDecoder('utf-8', { fatal: true });

function fail(error: string): DecodeResult {
  return { ok: false, error };
}

function parseDirection(op: string): AdjustDirection | null {
  if (op === 'add' || op === 'sub') {
    return op;
  }
  return null;
}

/**
 * Parses a non-negative whole-second amount. Returns null for anything that
 * is not plain ASCII digits or does not fit a safe integer.
 */
export function parseAmount(text: string): number | null {
  if (!DIGITS.test(text)) {
    return null;
  }
  const amount = Number.parseInt(text, 10);
  return Number.isSafeInteger(amount) ? amount : null;
}

/**
 * Decodes one textual message into a Command.
 */
export function decodeCommand(text: string): DecodeResult {
  const fields = text.trim().split(/\s+/).filter((field) => field.length > 0);
  if (fields.length === 0) {
    return fail('empty message');
  }

  const [head, ...rest] = fields;

  switch (head) {
    case 'toggle':
    case 'end':
    case 'lock': {
      if (rest.length > 0) {
        return fail(`'${head}' takes no arguments, got ${rest.length}`);
      }
      if (head === 'toggle') return { ok: true, command: { type: 'toggle' } };
      if (head === 'end') return { ok: true, command: { type: 'complete' } };
      return { ok: true, command: { type: 'toggle-lock' } };
    }
    case 'time': {
      if (rest.length !== 2) {
        return fail(`'time' expects 2 arguments, got ${rest.length}`);
      }
      const [op, amountText] = rest;
      const direction = parseDirection(op);
      if (direction === null) {
        return fail(`unknown time operation '${op}'`);
      }
      const amount = parseAmount(amountText);
      if (amount === null) {
        return fail(`invalid time amount '${amountText}'`);
      }
      return { ok: true, command: { type: 'adjust-time', direction, amount } };
    }
    default:
      return fail(`unknown command '${head}'`);
  }
}

/**
 * Decodes raw message bytes. Oversize payloads and invalid UTF-8 are
 * rejected before parsing.
 */
export function decodeMessage(bytes: Uint8Array): DecodeResult {
  if (bytes.byteLength > MAX_MESSAGE_BYTES) {
    return fail(`message too large (${bytes.byteLength} bytes, max ${MAX_MESSAGE_BYTES})`);
  }

  let text: string;
  try {
    text = utf8.decode(bytes);
  } catch {
    return fail('message is not valid UTF-8');
  }
  return decodeCommand(text);
}

/**
 * Encodes a Command into its wire form.
 */
export function encodeCommand(command: Command): string {
  switch (command.type) {
    case 'toggle':
      return 'toggle';
    case 'complete':
      return 'end';
    case 'toggle-lock':
      return 'lock';
    case 'adjust-time':
      return `time ${command.direction} ${command.amount}`;
  }
}

/**
 * Applies a decoded Command to the session.
 */
export function applyCommand(session: Session, command: Command): void {
  switch (command.type) {
    case 'toggle':
      session.toggleActive();
      break;
    case 'complete':
      session.completePhase();
      break;
    case 'toggle-lock':
      session.toggleLock();
      break;
    case 'adjust-time':
      session.adjustTime(command.direction, command.amount);
      break;
  }
}
