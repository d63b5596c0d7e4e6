/**
 * RCON Wire Protocol — Error utilities
 */

import type { ErrorCode } from "./types.js";

/**
 * Error raised by the codec and the session client.
 * The message carries the cause's message, so it can be shown to the user as-is.
 */
export class RconError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, cause?: unknown) {
    super(cause === undefined ? message : `${message}: ${describeCause(cause)}`, { cause });
    this.name = "RconError";
    this.code = code;
  }
}

/**
 * Create a protocol error, optionally wrapping the error that caused it.
 */
export function createError(code: ErrorCode, message: string, cause?: unknown): RconError {
  return new RconError(code, message, cause);
}

/**
 * Create the error for a command that does not fit in a single packet.
 */
export function createCommandTooLongError(byteLength: number, maxBodyLength: number): RconError {
  return createError(
    "COMMAND_TOO_LONG",
    `command too long (${byteLength} bytes). Maximum: ${maxBodyLength}`,
  );
}

/**
 * Type guard: is this an RconError?
 */
export function isRconError(value: unknown): value is RconError {
  return value instanceof RconError;
}

/**
 * True when `error` or any error in its cause chain carries `code`.
 */
export function hasErrorCode(error: unknown, code: ErrorCode): boolean {
  let current: unknown = error;
  while (current instanceof Error) {
    if (isRconError(current) && current.code === code) return true;
    current = current.cause;
  }
  return false;
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
