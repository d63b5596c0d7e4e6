/**
 * Client configuration — command-line flags and environment variables
 *
 * Everything the session needs is resolved here, once, into a frozen
 * ClientConfig. Flags win over environment variables.
 */

import { parseArgs } from "node:util";
import type { ColorMode, DisplayOptions } from "./format.js";

export const CLIENT_NAME = "rcon-console";
export const CLIENT_VERSION = "0.1.0";

export const DEFAULT_HOST = "localhost";
export const DEFAULT_PORT = 25575;

/** Environment variables consulted when the matching flag is absent */
export const ENV_VARS = {
  host: "MCRCON_HOST",
  port: "MCRCON_PORT",
  password: "MCRCON_PASS",
} as const;

export const MIN_WAIT_SECONDS = 1;
export const MAX_WAIT_SECONDS = 600;

export interface ClientConfig {
  readonly host: string;
  readonly port: number;
  readonly password: string;
  /** Interactive console instead of a command batch */
  readonly terminal: boolean;
  readonly display: Readonly<DisplayOptions>;
  /** Pause between batch commands in ms (0 = none) */
  readonly waitMs: number;
}

export type CliRequest =
  | { kind: "help" }
  | { kind: "version" }
  | { kind: "run"; config: ClientConfig; commands: string[] };

/** Bad flags or values; the message is shown to the user as-is */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

const FLAGS = {
  host: { type: "string", short: "H" },
  port: { type: "string", short: "P" },
  password: { type: "string", short: "p" },
  terminal: { type: "boolean", short: "t" },
  silent: { type: "boolean", short: "s" },
  "no-color": { type: "boolean", short: "c" },
  raw: { type: "boolean", short: "r" },
  wait: { type: "string", short: "w" },
  help: { type: "boolean", short: "h" },
  version: { type: "boolean", short: "v" },
} as const;

/**
 * Parse argv (without the node and script entries) into a request.
 *
 * @throws UsageError on unknown flags, missing password, or invalid values
 */
export function parseCliArgs(argv: string[], env: NodeJS.ProcessEnv = process.env): CliRequest {
  const { values, positionals } = readFlags(argv);

  if (values.help) return { kind: "help" };
  if (values.version) return { kind: "version" };

  const password = values.password ?? fromEnv(env, ENV_VARS.password);
  if (!password) {
    throw new UsageError("You must provide password (-p password).");
  }

  const colors: ColorMode = values.raw ? "raw" : values["no-color"] ? "strip" : "ansi";

  const config: ClientConfig = Object.freeze({
    host: values.host ?? fromEnv(env, ENV_VARS.host) ?? DEFAULT_HOST,
    port: parsePort(values.port ?? fromEnv(env, ENV_VARS.port)),
    password,
    // No commands means there is nothing to do but open a console
    terminal: Boolean(values.terminal) || positionals.length === 0,
    display: Object.freeze({ silent: Boolean(values.silent), colors }),
    waitMs: values.wait === undefined ? 0 : parseWaitSeconds(values.wait) * 1000,
  });

  return { kind: "run", config, commands: positionals };
}

function readFlags(argv: string[]) {
  try {
    return parseArgs({ args: argv, options: FLAGS, allowPositionals: true, strict: true });
  } catch (err) {
    throw new UsageError(err instanceof Error ? err.message : String(err));
  }
}

/**
 * Parse a port number (0–65535). Undefined means the default port.
 */
export function parsePort(value: string | undefined): number {
  if (value === undefined) return DEFAULT_PORT;
  if (!/^\d+$/.test(value)) {
    throw new UsageError(`invalid port: ${value}`);
  }
  const port = Number.parseInt(value, 10);
  if (port > 65535) {
    throw new UsageError(`port out of range: ${value} (0-65535)`);
  }
  return port;
}

/**
 * Parse the -w value in whole seconds (1–600).
 */
export function parseWaitSeconds(value: string): number {
  if (!/^[+-]?\d+$/.test(value)) {
    throw new UsageError(`invalid wait value: ${value}`);
  }
  const seconds = Number.parseInt(value, 10);
  if (seconds < MIN_WAIT_SECONDS || seconds > MAX_WAIT_SECONDS) {
    throw new UsageError(`wait value out of range (${MIN_WAIT_SECONDS}-${MAX_WAIT_SECONDS})`);
  }
  return seconds;
}

/** Empty variables count as unset */
function fromEnv(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[name];
  return value ? value : undefined;
}
